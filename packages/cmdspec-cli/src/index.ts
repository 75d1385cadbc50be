export { createCli } from "./program.js";
export { CmdspecCommand } from "./commands/base.js";
export type { SpecInput } from "./commands/base.js";
export { CompleteWordCommand, splitCommandLine } from "./commands/complete-word.js";
export { DocsCommand } from "./commands/docs.js";
export { GenerateCompletionCommand, GenerateFigCommand } from "./commands/generate.js";
export { LintCommand } from "./commands/lint.js";
export {
  DEFAULT_SETTINGS,
  PROJECT_CONFIG_FILENAME,
  parseBoolean,
  parseTimeout,
  resolveSettings,
  userConfigPath,
} from "./config/settings.js";
export type { Settings, SettingsSources } from "./config/settings.js";
export { provenanceHeader } from "./services/provenance.js";
export { CMDSPEC_VERSION } from "./version.js";
