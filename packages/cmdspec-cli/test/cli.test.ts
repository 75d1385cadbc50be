import path from "node:path";
import fs from "fs-extra";
import { afterEach, describe, expect, it } from "vitest";

import { splitCommandLine } from "../src/index.js";
import { TOOL_SPEC, makeTempDir, runCli } from "./helpers.js";

const tempDirs: string[] = [];

async function tempDir(): Promise<string> {
  const dir = await makeTempDir();
  tempDirs.push(dir);
  return dir;
}

afterEach(async () => {
  await Promise.all(tempDirs.splice(0).map(dir => fs.remove(dir)));
});

describe("generate completion", () => {
  it("prints a script stamped with its provenance", async () => {
    const result = await runCli(["generate", "completion", "bash", "-f", TOOL_SPEC]);
    const lines = result.stdout.split("\n");

    expect(result.exitCode).toBe(0);
    expect(lines[0]).toBe("# Generated by cmdspec 0.1.0 from tool.yaml. Do not edit.");
    expect(lines[1]).toMatch(/^# spec digest: sha256:[0-9a-f]{64}$/);
    expect(lines).toContain("complete -F _tool tool");
    expect(result.stdout).toContain(`complete-word --shell bash --file ${TOOL_SPEC} --cword`);
  });

  it("writes every shell concurrently with --all", async () => {
    const dir = await tempDir();
    const result = await runCli(["generate", "completion", "--all", "--out-dir", dir, "-f", TOOL_SPEC]);

    expect(result.exitCode).toBe(0);
    expect((await fs.readdir(dir)).sort()).toEqual(["_tool", "tool", "tool.fish", "tool.ts"]);
    expect(await fs.readFile(path.join(dir, "_tool"), "utf8")).toMatch(/^#compdef tool\n/);
  });

  it("rejects an unknown shell", async () => {
    const result = await runCli(["generate", "completion", "tcsh", "-f", TOOL_SPEC]);

    expect(result.exitCode).toBe(1);
    expect(result.stderr).toBe("error: unknown shell 'tcsh'; expected one of bash, zsh, fish, fig\n");
  });

  it("reports an inline spec that needs the runtime completer", async () => {
    const spec = `
name: app
args:
  - usage: "<host>"
    complete: { run: "app hosts {{ CURRENT }}" }
`;
    const result = await runCli(["generate", "completion", "zsh", "-s", spec]);

    expect(result.exitCode).toBe(1);
    expect(result.stderr).toBe(
      "error[EmitError]: zsh completion for 'app' uses helpers that run at completion time; pass the spec file they read\n"
    );
  });

  it("takes the completer command from the environment", async () => {
    const result = await runCli(["generate", "completion", "fish", "-f", TOOL_SPEC], {
      CMDSPEC_COMPLETER: "npx cmdspec",
    });

    expect(result.stdout).toContain("    'npx' 'cmdspec' 'complete-word' '--shell' 'fish' '--file'");
  });
});

describe("generate fig", () => {
  it("writes the spec module to --out", async () => {
    const dir = await tempDir();
    const out = path.join(dir, "specs", "tool.ts");
    const result = await runCli(["generate", "fig", "-f", TOOL_SPEC, "--out", out]);
    const text = await fs.readFile(out, "utf8");

    expect(result.exitCode).toBe(0);
    expect(result.stdout).toBe("");
    expect(text.split("\n")[0]).toBe("// Generated by cmdspec 0.1.0 from tool.yaml. Do not edit.");
    expect(text).toContain("export default completionSpec;");
  });
});

describe("complete-word", () => {
  it("prints candidates for the word under the cursor", async () => {
    const result = await runCli(["complete-word", "--shell", "bash", "-f", TOOL_SPEC, "--cword", "3", "--", "tool", "build", "--target", "re"]);

    expect(result.exitCode).toBe(0);
    expect(result.stdout).toBe("release\n");
  });

  it("answers to cw and splits --line", async () => {
    const result = await runCli(["cw", "-f", TOOL_SPEC, "--line", "tool s"]);

    expect(result.stdout).toBe("start\nstop\n");
  });

  it("prints descriptions for fish", async () => {
    const result = await runCli(["cw", "--shell", "fish", "-f", TOOL_SPEC, "--", "tool", "st"]);

    expect(result.stdout).toBe("start\tStart services\nstop\tStop services\n");
  });

  it("honours case-insensitive matching from the environment", async () => {
    const result = await runCli(["cw", "-f", TOOL_SPEC, "--line", "tool build -t RE"], { CMDSPEC_CASE_SENSITIVE: "false" });

    expect(result.stdout).toBe("release\n");
  });

  it("fails with the loader's error for a missing file", async () => {
    const dir = await tempDir();
    const result = await runCli(["cw", "-f", path.join(dir, "missing.yaml"), "--", "tool", ""]);

    expect(result.exitCode).toBe(1);
    expect(result.stderr).toMatch(/^error\[/);
    expect(result.stdout).toBe("");
  });
});

describe("docs", () => {
  it("renders help for a nested command", async () => {
    const result = await runCli(["docs", "-f", TOOL_SPEC, "--command", "plugin install"]);

    expect(result.exitCode).toBe(0);
    expect(result.stdout.split("\n").slice(0, 3)).toEqual(["Install a plugin", "", "Usage: tool plugin install [FLAGS] <source>"]);
  });

  it("renders a manpage", async () => {
    const result = await runCli(["docs", "--format", "manpage", "-f", TOOL_SPEC]);

    expect(result.stdout.split("\n")[0]).toBe('.TH TOOL 1 "" "tool 1.2.0" "User Commands"');
  });

  it("rejects an unknown format", async () => {
    const result = await runCli(["docs", "--format", "pdf", "-f", TOOL_SPEC]);

    expect(result.exitCode).toBe(1);
    expect(result.stderr).toBe("error: unknown format 'pdf'; expected one of help, markdown, manpage\n");
  });
});

describe("lint", () => {
  it("accepts a valid spec", async () => {
    const result = await runCli(["lint", "-f", TOOL_SPEC]);

    expect(result.exitCode).toBe(0);
    expect(result.stdout).toBe("tool: no problems found\n");
  });

  it("reports every problem", async () => {
    const spec = `
name: app
flags:
  - usage: "-v --verbose"
  - usage: "-v --version"
`;
    const result = await runCli(["lint", "-s", spec]);

    expect(result.exitCode).toBe(1);
    expect(result.stderr).toBe(
      "error[DuplicateFlagError]: flag trigger '-v' is declared more than once (at app)\n1 problem(s) found\n"
    );
  });
});

describe("splitCommandLine", () => {
  it("opens an empty word after trailing whitespace", () => {
    expect(splitCommandLine("tool build ")).toEqual(["tool", "build", ""]);
    expect(splitCommandLine("tool 'my file'")).toEqual(["tool", "my file"]);
    expect(splitCommandLine("")).toEqual([""]);
  });
});
