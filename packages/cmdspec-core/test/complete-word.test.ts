import { beforeAll, describe, expect, it } from "vitest";

import { completeWord, walkWords } from "../src/index.js";
import type { Candidate, CommandModel, HelperInvoker, HelperRequest } from "../src/index.js";
import { loadTool } from "./helpers.js";

let model: CommandModel;

beforeAll(async () => {
  model = await loadTool();
});

async function complete(words: string[], cword = words.length - 1): Promise<string[]> {
  const candidates = await completeWord(model, "bash", words, cword);
  return candidates.map(candidate => candidate.value);
}

describe("completeWord", () => {
  it("completes a flag value after its trigger", async () => {
    expect(await complete(["tool", "build", "--target", "re"], 3)).toEqual(["release"]);
  });

  it("offers subcommands in declaration order with aliases after their command", async () => {
    expect(await complete(["tool", ""])).toEqual(["build", "b", "start", "stop", "plugin"]);
    expect(await complete(["tool", "s"])).toEqual(["start", "stop"]);
  });

  it("attaches command help as the description", async () => {
    const candidates: Candidate[] = await completeWord(model, "fish", ["tool", "st"], 1);

    expect(candidates).toEqual([
      { value: "start", description: "Start services" },
      { value: "stop", description: "Stop services" },
    ]);
  });

  it("offers own flags then inherited globals", async () => {
    expect(await complete(["tool", "build", "-"])).toEqual([
      "-t",
      "--target",
      "--color",
      "--no-color",
      "--file",
      "-v",
      "--verbose",
      "-C",
      "--cwd",
    ]);
    expect(await complete(["tool", "build", "--no"])).toEqual(["--no-color"]);
    expect(await complete(["tool", "plugin", "rm", "--"])).toEqual(["--verbose", "--cwd"]);
  });

  it("completes the value part of --name=value", async () => {
    expect(await complete(["tool", "build", "--target=d"])).toEqual(["debug"]);
    expect(await complete(["tool", "build", "--color=x"])).toEqual([]);

    const fish = await completeWord(model, "fish", ["tool", "build", "--target=d"], 2);
    expect(fish).toEqual([{ value: "--target=debug" }]);
  });

  it("reads a split --name = value sequence as one flag value", async () => {
    expect(await complete(["tool", "build", "--target", "=", "r"])).toEqual(["release"]);
    expect(await complete(["tool", "build", "--target", "="])).toEqual(["debug", "release"]);
  });

  it("descends through aliases and skips presence flags", async () => {
    expect(await complete(["tool", "b", "--color", ""])).toEqual(["app", "lib"]);
    expect(await complete(["tool", "build", "--no-color", "-vv", ""])).toEqual(["app", "lib"]);
  });

  it("consumes the value of a flag before the cursor", async () => {
    expect(await complete(["tool", "-C", "build", ""])).toEqual(["build", "b", "start", "stop", "plugin"]);
    expect(await complete(["tool", "build", "-t", "debug", "l"])).toEqual(["lib"]);
  });

  it("handles short clusters", async () => {
    expect(await complete(["tool", "build", "-vt", ""])).toEqual(["debug", "release"]);
    expect(await complete(["tool", "build", "-tdebug", ""])).toEqual(["app", "lib"]);
  });

  it("treats everything after -- as positional", async () => {
    expect(await complete(["tool", "build", "--", ""])).toEqual(["app", "lib"]);
    expect(await complete(["tool", "build", "--", "-"])).toEqual([]);
  });

  it("lets a trailing variadic argument absorb surplus words", async () => {
    expect(await complete(["tool", "start", "api", "web", "w"])).toEqual(["web", "worker"]);
  });

  it("stops descending at the first unrecognized positional", async () => {
    expect(await complete(["tool", "unknown", "s"])).toEqual([]);
    expect(await complete(["tool", "stop", ""])).toEqual([]);
  });

  it("never offers hidden commands but still walks into them", async () => {
    expect(await complete(["tool", "sec"])).toEqual([]);
    expect(walkWords(model, ["tool", "secret", ""], 2).node.name).toBe("secret");
  });

  it("treats a cursor past the last word as an empty token", async () => {
    expect(await complete(["tool", "plugin"], 2)).toEqual(["install", "remove", "rm"]);
  });

  it("runs helper providers with the shell in the environment", async () => {
    const requests: HelperRequest[] = [];
    const invoker: HelperInvoker = async request => {
      requests.push(request);
      return { exitCode: 0, stdout: "alpha:First plugin\nbeta:Second plugin\n", stderr: "" };
    };

    const candidates = await completeWord(model, "zsh", ["tool", "plugin", "remove", "a"], 3, { invoker });

    expect(candidates).toEqual([{ value: "alpha", description: "First plugin" }]);
    expect(requests[0]?.command).toBe("tool plugins list");
    expect(requests[0]?.env).toMatchObject({
      CMDSPEC_SHELL: "zsh",
      CMDSPEC_CWORD: "3",
      CMDSPEC_COMMAND: "tool plugin remove",
    });
  });
});

describe("walkWords", () => {
  it("tracks the node, the positional index and the awaited flag", () => {
    const state = walkWords(model, ["tool", "build", "app", "--target", ""], 4);

    expect(state.node.name).toBe("build");
    expect(state.argIndex).toBe(1);
    expect(state.awaiting?.name).toBe("target");
    expect(state.afterDashDash).toBe(false);
  });
});
