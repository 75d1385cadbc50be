import path from "node:path";
import type { LoadedSpec } from "@cmdspec/core";
import { CMDSPEC_VERSION } from "../version.js";

/** Comment text stamped on generated artifacts: tool version, root source, content digest. */
export function provenanceHeader(loaded: Pick<LoadedSpec, "sources" | "digest">): string {
  const [root] = loaded.sources;
  const source = root ? path.basename(root) : "<inline>";
  return [`Generated by cmdspec ${CMDSPEC_VERSION} from ${source}. Do not edit.`, `spec digest: ${loaded.digest}`].join("\n");
}
