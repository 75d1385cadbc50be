import type { CommandModel } from "@cmdspec/core";
import { execa } from "execa";
import { beforeAll, describe, expect, it } from "vitest";

import { emitBash, posixQuote } from "../src/index.js";
import { modelFrom } from "./helpers.js";

let script: string;

beforeAll(async () => {
  const model: CommandModel = await modelFrom(`
name: tool
flags:
  - usage: "--mode <mode>"
    choices: ["my value", other, "it's", "*.yaml"]
commands:
  - name: build
    flags:
      - usage: "-t --target <target>"
        choices: [debug, release]
      - usage: "--color"
        negate: "--no-color"
    commands:
      - name: deep
        args:
          - usage: "<stage>"
            choices: [one, two]
  - name: start
    args:
      - usage: "<service>..."
        choices: [api, web]
`);
  script = emitBash(model);
});

/** Sources the script, fills the completion variables bash would set, and prints `COMPREPLY`. */
async function completeInBash(words: readonly string[]): Promise<string[]> {
  const driver = [
    script,
    `COMP_WORDS=(${words.map(posixQuote).join(" ")})`,
    `COMP_CWORD=${words.length - 1}`,
    "_tool",
    "printf '%s\\n' \"${COMPREPLY[@]}\"",
  ].join("\n");
  const { stdout } = await execa("bash", ["--norc", "--noprofile", "-c", driver]);
  return stdout === "" ? [] : stdout.split("\n");
}

describe("emitted bash script", () => {
  it("escapes literals so readline inserts them as one word", async () => {
    expect(await completeInBash(["tool", "--mode", "my"])).toEqual(["my\\ value"]);
    expect(await completeInBash(["tool", "--mode", ""])).toEqual(["my\\ value", "other", "it\\'s", "\\*.yaml"]);
  });

  it("inserts literals raw inside an open quote", async () => {
    expect(await completeInBash(["tool", "--mode", "'my"])).toEqual(["my value"]);
  });

  it("matches an escaped prefix", async () => {
    expect(await completeInBash(["tool", "--mode", "my\\ v"])).toEqual(["my\\ value"]);
  });

  it("descends into nested commands", async () => {
    expect(await completeInBash(["tool", "build", ""])).toEqual(["deep"]);
    expect(await completeInBash(["tool", "build", "deep", ""])).toEqual(["one", "two"]);
  });

  it("completes flag values given separately or after an equals sign", async () => {
    expect(await completeInBash(["tool", "build", "-t", "r"])).toEqual(["release"]);
    expect(await completeInBash(["tool", "build", "--target=d"])).toEqual(["debug"]);
  });

  it("offers negations and never treats them as taking a value", async () => {
    expect(await completeInBash(["tool", "build", "--no"])).toEqual(["--no-color"]);
    expect(await completeInBash(["tool", "build", "--no-color", ""])).toEqual(["deep"]);
  });

  it("keeps a variadic argument open for later words", async () => {
    expect(await completeInBash(["tool", "start", "api", "web", ""])).toEqual(["api", "web"]);
  });
});
