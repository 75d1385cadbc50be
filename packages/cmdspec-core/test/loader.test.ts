import os from "node:os";
import path from "node:path";
import fs from "fs-extra";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { IncludeError, ParseError, extractScriptSpec, loadSpec, loadSpecString } from "../src/index.js";

let tmp: string;

beforeEach(async () => {
  tmp = await fs.mkdtemp(path.join(os.tmpdir(), "cmdspec-loader-"));
});

afterEach(async () => {
  await fs.remove(tmp);
});

async function write(relative: string, text: string): Promise<string> {
  const file = path.join(tmp, relative);
  await fs.outputFile(file, text);
  return file;
}

describe("loadSpec includes", () => {
  it("appends included entries after own entries, in include order", async () => {
    const root = await write(
      "root.yaml",
      [
        "name: tool",
        "include: [./common.yaml, ./more.yaml]",
        "flags:",
        '  - usage: "--own"',
        "commands:",
        "  - name: a",
        "complete:",
        "  shared: { choices: [own] }",
      ].join("\n")
    );
    await write(
      "common.yaml",
      [
        "flags:",
        '  - usage: "--common"',
        "commands:",
        "  - name: b",
        "complete:",
        "  shared: { choices: [included] }",
        "  other: { choices: [x] }",
      ].join("\n")
    );
    await write("more.yaml", ["flags:", '  - usage: "--more"'].join("\n"));

    const loaded = await loadSpec(root);

    expect(loaded.raw.flags.map(flag => flag.usage)).toEqual(["--own", "--common", "--more"]);
    expect(loaded.raw.commands.map(command => command.name)).toEqual(["a", "b"]);
    expect(loaded.raw.complete.shared).toEqual({ choices: ["own"] });
    expect(loaded.raw.complete.other).toEqual({ choices: ["x"] });
    expect(loaded.sources).toEqual([root, path.join(tmp, "common.yaml"), path.join(tmp, "more.yaml")]);
  });

  it("merges included completers whatever their names", async () => {
    const root = await write("root.yaml", ["name: tool", "include: [./common.yaml]"].join("\n"));
    await write("common.yaml", ["complete:", "  constructor: { choices: [x] }", "  toString: file"].join("\n"));

    const loaded = await loadSpec(root);

    expect(Object.hasOwn(loaded.raw.complete, "constructor")).toBe(true);
    expect(loaded.raw.complete["constructor"]).toEqual({ choices: ["x"] });
    expect(loaded.raw.complete["toString"]).toBe("file");
  });

  it("resolves command-level includes relative to the including file", async () => {
    const root = await write(
      "root.yaml",
      ["name: tool", "commands:", "  - name: a", "    include: ./sub/extra.yaml", '    flags: [{ usage: "--a" }]'].join(
        "\n"
      )
    );
    await write("sub/extra.yaml", ["include: [../leaf.yaml]", "flags:", '  - usage: "--extra"'].join("\n"));
    await write("leaf.yaml", ["flags:", '  - usage: "--leaf"'].join("\n"));

    const loaded = await loadSpec(root);
    const [command] = loaded.raw.commands;

    expect(command?.flags?.map(flag => flag.usage)).toEqual(["--a", "--extra", "--leaf"]);
    expect(loaded.sources).toHaveLength(3);
  });

  it("accepts the same document reached through two branches", async () => {
    const root = await write("root.yaml", ["name: tool", "include: [left.yaml, right.yaml]"].join("\n"));
    await write("left.yaml", "include: [shared.yaml]\n");
    await write("right.yaml", "include: [shared.yaml]\n");
    await write("shared.yaml", "complete:\n  env: { choices: [dev, prod] }\n");

    const loaded = await loadSpec(root);

    expect(loaded.raw.complete.env).toEqual({ choices: ["dev", "prod"] });
    expect(loaded.sources).toHaveLength(4);
  });

  it("rejects a document that includes itself transitively", async () => {
    const a = await write("a.yaml", "name: tool\ninclude: [b.yaml]\n");
    const b = await write("b.yaml", "include: [a.yaml]\n");

    const error = await loadSpec(a).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(IncludeError);
    expect(error).toMatchObject({
      message: `circular include: ${a} -> ${b} -> ${a}`,
      chain: [a, b, a],
    });
  });

  it("reports a missing include with the chain that reached it", async () => {
    const root = await write("root.yaml", "name: tool\ninclude: [./missing.yaml]\n");

    const error = await loadSpec(root).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(IncludeError);
    expect(error).toMatchObject({
      message: "included file not found: ./missing.yaml",
      chain: [root, path.join(tmp, "missing.yaml")],
    });
  });

  it("computes a stable sha256 digest over the sources", async () => {
    const root = await write("root.yaml", "name: tool\n");

    const first = await loadSpec(root);
    const second = await loadSpec(root);

    expect(first.digest).toMatch(/^sha256:[0-9a-f]{64}$/);
    expect(second.digest).toBe(first.digest);
  });
});

describe("parse errors", () => {
  it("locates unknown keys at the offending key", async () => {
    const text = ["name: tool", "commands:", "  - name: build", "    flagz: []"].join("\n");

    const error = await loadSpecString(text, { label: "tool.yaml" }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ParseError);
    expect(error).toMatchObject({ location: { file: "tool.yaml", line: 4, column: 5 } });
  });

  it("reports YAML syntax errors as parse errors", async () => {
    const error = await loadSpecString("name: tool\nflags: [\n", { label: "broken.yaml" }).catch(
      (caught: unknown) => caught
    );

    expect(error).toBeInstanceOf(ParseError);
    expect(error).toMatchObject({ location: { file: "broken.yaml" } });
  });

  it("requires a name on the root document", async () => {
    const error = await loadSpecString("about: nameless\n", { label: "anon.yaml" }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ParseError);
    expect(error).toMatchObject({
      message: "the root spec document must declare a name",
      location: { file: "anon.yaml", line: 1, column: 1 },
    });
  });
});

describe("script specs", () => {
  const script = [
    "#!/usr/bin/env bash",
    "#USAGE name: deploy",
    "#USAGE flags:",
    '#USAGE   - usage: "--force"',
    "# [USAGE] about: Deploy things",
    'echo "deploying"',
  ].join("\n");

  it("extracts the spec from usage comment lines", () => {
    expect(extractScriptSpec(script)).toEqual({
      source: ["name: deploy", "flags:", '  - usage: "--force"', "about: Deploy things"].join("\n"),
      lines: [2, 3, 4, 5],
    });
    expect(extractScriptSpec("name: tool\n")).toBeNull();
  });

  it("loads a script as a spec document", async () => {
    const loaded = await loadSpecString(script);

    expect(loaded.raw.name).toBe("deploy");
    expect(loaded.raw.about).toBe("Deploy things");
    expect(loaded.raw.flags.map(flag => flag.usage)).toEqual(["--force"]);
  });

  it("maps error lines back to the script", async () => {
    const broken = ["#!/bin/sh", "#USAGE name: deploy", "#USAGE bogus: true"].join("\n");

    const error = await loadSpecString(broken, { label: "deploy.sh" }).catch((caught: unknown) => caught);

    expect(error).toMatchObject({ location: { file: "deploy.sh", line: 3 } });
  });
});
