export const CMDSPEC_VERSION = "0.1.0";
