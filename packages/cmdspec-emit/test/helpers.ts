import path from "node:path";
import { fileURLToPath } from "node:url";
import { loadModel, loadModelString, type CommandModel } from "@cmdspec/core";

/** Fixtures live with the core package and are shared by every package's tests. */
export const FIXTURES = path.join(
  path.dirname(fileURLToPath(import.meta.url)),
  "..",
  "..",
  "cmdspec-core",
  "test",
  "fixtures"
);

export const TOOL_SPEC = path.join(FIXTURES, "tool.yaml");

export function loadTool(): Promise<CommandModel> {
  return loadModel(TOOL_SPEC);
}

export function modelFrom(yaml: string): Promise<CommandModel> {
  return loadModelString(yaml, { baseDir: FIXTURES });
}

export function linesOf(text: string): string[] {
  return text.split("\n");
}
