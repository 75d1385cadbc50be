import path from "node:path";
import { globby } from "globby";
import { CompletionProviderError } from "./errors.js";
import { execaInvoker, type HelperInvoker } from "./invoker.js";
import type { Logger } from "./logger.js";
import type { CommandNode, CompletionProvider } from "./model.js";
import { renderHelperTemplate } from "./template.js";

export const DEFAULT_HELPER_TIMEOUT_MS = 5000;

export type Candidate = {
  value: string;
  description?: string;
  weight?: number;
};

/** The command line being completed. */
export type ResolveContext = {
  words: readonly string[];
  cword: number;
};

export type ResolveOptions = {
  caseSensitive?: boolean;
  helperTimeoutMs?: number;
  invoker?: HelperInvoker;
  /** Directory path completion and helpers run in. Defaults to the process working directory. */
  cwd?: string;
  env?: Record<string, string>;
  onWarning?: (warning: CompletionProviderError) => void;
  logger?: Logger;
};

export type ResolveRequest = {
  node: CommandNode;
  provider: CompletionProvider;
  partial: string;
  context: ResolveContext;
};

export function matchesPrefix(value: string, prefix: string, caseSensitive = true): boolean {
  if (caseSensitive) return value.startsWith(prefix);
  return value.toLowerCase().startsWith(prefix.toLowerCase());
}

/**
 * Candidates for `partial` from one provider. Provider failures never escape: they reach
 * `onWarning` and the logger, and the answer is an empty list.
 */
export async function resolve(
  node: CommandNode,
  provider: CompletionProvider,
  partial: string,
  context: ResolveContext,
  options: ResolveOptions = {}
): Promise<Candidate[]> {
  const caseSensitive = options.caseSensitive ?? true;
  try {
    switch (provider.kind) {
      case "none":
        return [];
      case "static":
        return provider.values
          .filter(entry => matchesPrefix(entry.value, partial, caseSensitive))
          .map(entry => (entry.description === undefined ? { value: entry.value } : { ...entry }));
      case "path":
        return await resolvePath(provider, partial, options);
      case "helper":
        return await resolveHelper(node, provider, partial, context, options);
    }
  } catch (error) {
    const warning =
      error instanceof CompletionProviderError
        ? error
        : new CompletionProviderError(describe(error), provider.kind === "path" ? "path" : "helper", {
            cause: error,
          });
    options.logger?.debug(`completion provider failed: ${warning.message}`);
    options.onWarning?.(warning);
    return [];
  }
}

/** Resolves independent providers concurrently; results keep request order. */
export function resolveAll(requests: readonly ResolveRequest[], options: ResolveOptions = {}): Promise<Candidate[][]> {
  return Promise.all(
    requests.map(request => resolve(request.node, request.provider, request.partial, request.context, options))
  );
}

async function resolvePath(
  provider: Extract<CompletionProvider, { kind: "path" }>,
  partial: string,
  options: ResolveOptions
): Promise<Candidate[]> {
  const caseSensitive = options.caseSensitive ?? true;
  const slash = partial.lastIndexOf("/");
  const dirPart = slash >= 0 ? partial.slice(0, slash + 1) : "";
  const base = slash >= 0 ? partial.slice(slash + 1) : partial;
  const searchDir = path.resolve(options.cwd ?? process.cwd(), dirPart === "" ? "." : dirPart);
  const common = { cwd: searchDir, deep: 1, followSymbolicLinks: false, dot: base.startsWith(".") };

  let dirs: string[];
  let files: string[] = [];
  try {
    dirs = await globby("*", { ...common, onlyDirectories: true, markDirectories: true });
    if (provider.entry !== "dir") {
      files = await globby(provider.glob ?? "*", { ...common, onlyFiles: true });
    }
  } catch (error) {
    throw new CompletionProviderError(`cannot list '${searchDir}': ${describe(error)}`, "path", { cause: error });
  }

  const extensions = provider.extensions;
  const matchingFiles = extensions ? files.filter(file => extensions.some(ext => file.endsWith(ext))) : files;
  return [...dirs, ...matchingFiles]
    .filter(name => matchesPrefix(name, base, caseSensitive))
    .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0))
    .map(name => ({ value: `${dirPart}${name}` }));
}

async function resolveHelper(
  node: CommandNode,
  provider: Extract<CompletionProvider, { kind: "helper" }>,
  partial: string,
  context: ResolveContext,
  options: ResolveOptions
): Promise<Candidate[]> {
  let command: string;
  try {
    command = renderHelperTemplate(provider.run, {
      words: context.words,
      CURRENT: context.cword,
      PREV: context.cword > 0 ? context.cword - 1 : undefined,
      partial,
    });
  } catch (error) {
    throw new CompletionProviderError(`cannot render helper template: ${describe(error)}`, "helper", { cause: error });
  }

  const timeoutMs = provider.timeoutMs ?? options.helperTimeoutMs ?? DEFAULT_HELPER_TIMEOUT_MS;
  const invoker = options.invoker ?? execaInvoker;
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<"timeout">(resolveTimeout => {
    timer = setTimeout(() => resolveTimeout("timeout"), timeoutMs);
  });

  const running = invoker({
    command,
    cwd: options.cwd ?? process.cwd(),
    env: {
      ...options.env,
      CMDSPEC_COMPLETE: "1",
      CMDSPEC_CWORD: String(context.cword),
      CMDSPEC_COMMAND: node.path.join(" "),
    },
    signal: controller.signal,
  });

  let outcome: Awaited<typeof running> | "timeout";
  try {
    outcome = await Promise.race([running, timeout]);
  } finally {
    clearTimeout(timer);
  }
  if (outcome === "timeout") {
    controller.abort();
    // The abandoned invocation settles on its own once killed.
    running.catch(error => options.logger?.trace(`helper settled after timeout: ${describe(error)}`));
    throw new CompletionProviderError(`helper '${command}' timed out after ${timeoutMs}ms`, "helper", {
      timedOut: true,
    });
  }
  if (outcome.exitCode !== 0) {
    const stderr = outcome.stderr.trim();
    throw new CompletionProviderError(
      `helper '${command}' exited with status ${outcome.exitCode}${stderr ? `: ${stderr}` : ""}`,
      "helper"
    );
  }

  const caseSensitive = options.caseSensitive ?? true;
  return parseHelperOutput(outcome.stdout, provider.descriptions).filter(candidate =>
    matchesPrefix(candidate.value, partial, caseSensitive)
  );
}

/** One candidate per non-empty line; with descriptions, `value:description` where `\:` is a literal colon. */
export function parseHelperOutput(stdout: string, descriptions: boolean): Candidate[] {
  const candidates: Candidate[] = [];
  for (const line of stdout.split(/\r?\n/)) {
    if (line.trim() === "") continue;
    if (!descriptions) {
      candidates.push({ value: line });
      continue;
    }
    const split = findUnescapedColon(line);
    if (split < 0) {
      candidates.push({ value: unescapeColons(line) });
      continue;
    }
    const value = unescapeColons(line.slice(0, split));
    const description = unescapeColons(line.slice(split + 1)).trim();
    candidates.push(description ? { value, description } : { value });
  }
  return candidates;
}

function findUnescapedColon(line: string): number {
  for (let index = 0; index < line.length; index += 1) {
    const char = line[index];
    if (char === "\\" && line[index + 1] === ":") {
      index += 1;
      continue;
    }
    if (char === ":") return index;
  }
  return -1;
}

function unescapeColons(text: string): string {
  return text.replace(/\\:/g, ":");
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
