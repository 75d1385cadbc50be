import path from "node:path";
import fs from "fs-extra";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { DEFAULT_SETTINGS, PROJECT_CONFIG_FILENAME, parseBoolean, resolveSettings, userConfigPath } from "../src/index.js";
import { makeTempDir } from "./helpers.js";

let home: string;
let project: string;

beforeEach(async () => {
  home = await makeTempDir();
  project = await makeTempDir();
});

afterEach(async () => {
  await Promise.all([fs.remove(home), fs.remove(project)]);
});

describe("resolveSettings", () => {
  it("falls back to defaults", () => {
    expect(resolveSettings({ cwd: project, homeDir: home, env: {} })).toEqual({
      helperTimeoutMs: 5000,
      caseSensitive: true,
      logLevel: "warn",
      completer: "cmdspec",
    });
    expect(DEFAULT_SETTINGS.helperTimeoutMs).toBe(5000);
  });

  it("layers user, project, environment and overrides in that order", async () => {
    await fs.outputFile(userConfigPath(home), "helperTimeoutMs: 1000\ncaseSensitive: false\ncompleter: user-cmdspec\n");
    await fs.outputFile(path.join(project, PROJECT_CONFIG_FILENAME), "settings:\n  helperTimeoutMs: 2000\n  logLevel: info\n");

    const settings = resolveSettings({
      cwd: project,
      homeDir: home,
      env: { CMDSPEC_LOG_LEVEL: "debug" },
      overrides: { completer: "npx cmdspec" },
    });

    expect(settings).toEqual({
      helperTimeoutMs: 2000,
      caseSensitive: false,
      logLevel: "debug",
      completer: "npx cmdspec",
    });
  });

  it("ignores malformed files and invalid values", async () => {
    await fs.outputFile(userConfigPath(home), "helperTimeoutMs: [unclosed\n");
    await fs.outputFile(path.join(project, PROJECT_CONFIG_FILENAME), "helperTimeoutMs: -5\nlogLevel: loud\n");

    const settings = resolveSettings({ cwd: project, homeDir: home, env: { CMDSPEC_HELPER_TIMEOUT_MS: "soon" } });

    expect(settings.helperTimeoutMs).toBe(5000);
    expect(settings.logLevel).toBe("warn");
  });

  it("reads timeouts from the environment", () => {
    expect(resolveSettings({ cwd: project, homeDir: home, env: { CMDSPEC_HELPER_TIMEOUT_MS: "750" } }).helperTimeoutMs).toBe(
      750
    );
  });
});

describe("parseBoolean", () => {
  it("accepts common spellings", () => {
    expect(parseBoolean("Yes")).toBe(true);
    expect(parseBoolean("off")).toBe(false);
    expect(parseBoolean(0)).toBe(false);
    expect(parseBoolean("maybe")).toBeNull();
  });
});
