const POSIX_SAFE = /^[A-Za-z0-9_@+:,./-]+$/;

/** Quotes a literal for bash and zsh: bare when safe, otherwise single-quoted. */
export function posixQuote(value: string): string {
  if (value === "") return "''";
  if (POSIX_SAFE.test(value)) return value;
  return `'${value.replace(/'/g, "'\\''")}'`;
}

/** fish single quotes only treat `\\` and `\'` specially. */
export function fishQuote(value: string): string {
  return `'${value.replace(/\\/g, "\\\\").replace(/'/g, "\\'")}'`;
}

/** `_describe` splits items on the first unescaped colon and unescapes only `\:`. */
export function zshDescribeItem(value: string, description?: string): string {
  const escaped = value.replace(/:/g, "\\:");
  return description ? `${escaped}:${oneLine(description)}` : escaped;
}

export function jsString(value: string): string {
  return JSON.stringify(value);
}

export function oneLine(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

export function commentBlock(header: string | undefined, marker: string): string[] {
  if (!header) return [];
  return header.split(/\r?\n/).map(line => (line ? `${marker} ${line}` : marker));
}

/** Shell function names keep letters, digits and underscores only. */
export function identifier(value: string): string {
  return value.replace(/[^A-Za-z0-9_]/g, "_");
}
