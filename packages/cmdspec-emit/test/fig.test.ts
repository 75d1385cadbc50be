import { EmitError, type CommandModel } from "@cmdspec/core";
import { beforeAll, describe, expect, it } from "vitest";

import { COMPLETE_WORD_GENERATOR, buildFigSpec, emitFig } from "../src/index.js";
import { linesOf, loadTool, modelFrom } from "./helpers.js";

let model: CommandModel;

beforeAll(async () => {
  model = await loadTool();
});

describe("buildFigSpec", () => {
  it("mirrors the command tree", () => {
    const spec = buildFigSpec(model);

    expect(spec.name).toBe("tool");
    expect(spec.description).toBe("Example tool");
    expect(spec.subcommands?.map(command => command.name)).toEqual([
      ["build", "b"],
      "start",
      "stop",
      "plugin",
      "secret",
    ]);
    expect(spec.subcommands?.[4]).toMatchObject({ name: "secret", hidden: true });
    expect(spec.subcommands?.[3]?.subcommands?.map(command => command.name)).toEqual(["install", ["remove", "rm"]]);
  });

  it("marks aliased commands with a display name and an alias note", () => {
    const build = buildFigSpec(model).subcommands?.[0];

    expect(build?.displayName).toBe("build");
    expect(build?.description).toBe("Build the project [aliases: b]");
    expect(build?.args).toEqual([{ name: "project", isOptional: true, suggestions: [{ name: "app" }, { name: "lib" }] }]);
  });

  it("renders options with persistence, repetition and negation", () => {
    const spec = buildFigSpec(model);

    expect(spec.options).toEqual([
      { name: ["-v", "--verbose"], description: "Verbose output", isPersistent: true, isRepeatable: true },
      {
        name: ["-C", "--cwd"],
        description: "Working directory",
        args: { name: "dir", template: "folders" },
        isPersistent: true,
      },
    ]);
    expect(spec.subcommands?.[0]?.options).toEqual([
      {
        name: ["-t", "--target"],
        description: "Build target",
        args: { name: "target", suggestions: [{ name: "debug" }, { name: "release" }] },
      },
      { name: "--color", description: "Colorize output" },
      { name: "--no-color", description: "Colorize output", exclusiveOn: ["--color"] },
      { name: "--file", args: { name: "path", generators: COMPLETE_WORD_GENERATOR }, isRepeatable: true },
    ]);
  });

  it("uses the helper generator for runtime providers", () => {
    const remove = buildFigSpec(model).subcommands?.[3]?.subcommands?.[1];

    expect(remove?.args).toEqual([{ name: "plugin", generators: COMPLETE_WORD_GENERATOR }]);
  });
});

describe("emitFig", () => {
  it("prints a typed module with the generator", () => {
    const lines = linesOf(emitFig(model, { specFile: "tool.yaml", header: "generated" }));

    expect(lines[0]).toBe("// generated");
    expect(lines).toContain("const completeWord: Fig.Generator = {");
    expect(lines).toContain(
      '  script: tokens => ["cmdspec", "complete-word", "--shell", "fig", "--file", "tool.yaml", "--cword", String(tokens.length - 1), "--", ...tokens],'
    );
    expect(lines).toContain("const completionSpec: Fig.Spec = {");
    expect(lines).toContain('  name: "tool",');
    expect(lines).toContain('          name: ["-t", "--target"],');
    expect(lines).toContain("            generators: completeWord,");
    expect(lines.at(-2)).toBe("export default completionSpec;");
  });

  it("omits the generator when nothing calls back", async () => {
    const simple = await modelFrom(`
name: app
flags:
  - usage: "--mode <mode>"
    choices: [fast, slow]
`);
    const output = emitFig(simple);

    expect(output).not.toContain("completeWord");
    expect(linesOf(output)).toContain('      name: "--mode",');
  });

  it("needs a spec file for the generator", () => {
    expect(() => emitFig(model)).toThrow(EmitError);
  });
});
