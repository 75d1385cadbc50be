import path from "node:path";
import { fileURLToPath } from "node:url";
import { loadModel, loadModelString } from "../src/index.js";
import type { CommandModel } from "../src/index.js";

export const FIXTURES = path.join(path.dirname(fileURLToPath(import.meta.url)), "fixtures");

export const TOOL_SPEC = path.join(FIXTURES, "tool.yaml");

export function loadTool(): Promise<CommandModel> {
  return loadModel(TOOL_SPEC);
}

export function modelFrom(yaml: string): Promise<CommandModel> {
  return loadModelString(yaml, { baseDir: FIXTURES });
}
