export type FlagUsage = {
  short: string[];
  long: string[];
  value?: { name: string; many: boolean; optional: boolean };
};

export type ArgUsage = {
  name: string;
  required: boolean;
  variadic: boolean;
};

export type UsageResult<T> = { ok: true; value: T } | { ok: false; message: string };

const VALUE_TOKEN = /^(<|\[)([^<>[\]\s]+)(>|\])(\.\.\.)?$/;
const LONG_TOKEN = /^--([A-Za-z0-9][\w.-]*)$/;
const SHORT_TOKEN = /^-([^-\s])$/;

/**
 * Parses flag shorthand such as `-t, --target <target>` or `--file <path>...`.
 */
export function parseFlagUsage(usage: string): UsageResult<FlagUsage> {
  const tokens = usage.split(/[\s,]+/).filter(Boolean);
  const result: FlagUsage = { short: [], long: [] };
  for (const token of tokens) {
    const short = SHORT_TOKEN.exec(token);
    if (short?.[1]) {
      result.short.push(short[1]);
      continue;
    }
    const long = LONG_TOKEN.exec(token);
    if (long?.[1]) {
      result.long.push(long[1]);
      continue;
    }
    const value = VALUE_TOKEN.exec(token);
    if (value?.[2]) {
      if (result.value) {
        return { ok: false, message: `flag usage '${usage}' declares more than one value` };
      }
      if (value[1] === "<" ? value[3] !== ">" : value[3] !== "]") {
        return { ok: false, message: `unbalanced brackets in flag usage '${usage}'` };
      }
      result.value = { name: value[2], many: value[4] === "...", optional: value[1] === "[" };
      continue;
    }
    return { ok: false, message: `unrecognized token '${token}' in flag usage '${usage}'` };
  }
  if (result.short.length === 0 && result.long.length === 0) {
    return { ok: false, message: `flag usage '${usage}' declares no trigger` };
  }
  return { ok: true, value: result };
}

/**
 * Parses argument shorthand: `<name>` required, `[name]` optional, a trailing `...` variadic.
 */
export function parseArgUsage(usage: string): UsageResult<ArgUsage> {
  const match = VALUE_TOKEN.exec(usage.trim());
  if (!match?.[2]) {
    return { ok: false, message: `malformed argument usage '${usage}'` };
  }
  const required = match[1] === "<";
  if (required ? match[3] !== ">" : match[3] !== "]") {
    return { ok: false, message: `unbalanced brackets in argument usage '${usage}'` };
  }
  return { ok: true, value: { name: match[2], required, variadic: match[4] === "..." } };
}
