import os from "node:os";
import path from "node:path";
import { Writable } from "node:stream";
import { fileURLToPath } from "node:url";
import fs from "fs-extra";
import { createCli } from "../src/index.js";

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

class Capture extends Writable {
  text = "";

  override _write(chunk: Buffer | string, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    this.text += chunk.toString();
    callback();
  }
}

export type CliRun = {
  exitCode: number;
  stdout: string;
  stderr: string;
};

export async function runCli(args: string[], env: Record<string, string> = {}): Promise<CliRun> {
  const stdout = new Capture();
  const stderr = new Capture();
  const exitCode = await createCli().run(args, { stdout, stderr, env, colorDepth: 1 });
  return { exitCode, stdout: stdout.text, stderr: stderr.text };
}

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), "cmdspec-cli-"));
}
