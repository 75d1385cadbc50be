import { describe, expect, it } from "vitest";

import { parseArgUsage, parseFlagUsage } from "../src/index.js";

describe("parseFlagUsage", () => {
  it("reads triggers and a value", () => {
    expect(parseFlagUsage("-t, --target <target>")).toEqual({
      ok: true,
      value: { short: ["t"], long: ["target"], value: { name: "target", many: false, optional: false } },
    });
  });

  it("marks repeatable and optional values", () => {
    const result = parseFlagUsage("--file [path]...");
    expect(result.ok && result.value.value).toEqual({ name: "path", many: true, optional: true });
  });

  it("rejects malformed shorthand", () => {
    expect(parseFlagUsage("<value>")).toEqual({ ok: false, message: "flag usage '<value>' declares no trigger" });
    expect(parseFlagUsage("--x <a]")).toEqual({ ok: false, message: "unbalanced brackets in flag usage '--x <a]'" });
    expect(parseFlagUsage("--x value")).toEqual({
      ok: false,
      message: "unrecognized token 'value' in flag usage '--x value'",
    });
  });
});

describe("parseArgUsage", () => {
  it("distinguishes required, optional and variadic", () => {
    expect(parseArgUsage("<name>")).toEqual({ ok: true, value: { name: "name", required: true, variadic: false } });
    expect(parseArgUsage("[name]")).toEqual({ ok: true, value: { name: "name", required: false, variadic: false } });
    expect(parseArgUsage("<files>...")).toEqual({ ok: true, value: { name: "files", required: true, variadic: true } });
  });

  it("rejects anything else", () => {
    expect(parseArgUsage("name")).toEqual({ ok: false, message: "malformed argument usage 'name'" });
  });
});
