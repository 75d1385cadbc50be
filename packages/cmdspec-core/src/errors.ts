export type ErrorKind =
  | "ParseError"
  | "IncludeError"
  | "DuplicateFlagError"
  | "ArityError"
  | "CompletionSpecError"
  | "DefinitionError"
  | "EmitError"
  | "CompletionProviderError";

export abstract class CmdspecError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export type SourceLocation = {
  file: string;
  line?: number;
  column?: number;
};

export class ParseError extends CmdspecError {
  readonly kind = "ParseError";
  readonly location: SourceLocation;

  constructor(message: string, location: SourceLocation, options?: { cause?: unknown }) {
    super(message, options);
    this.location = location;
  }
}

export class IncludeError extends CmdspecError {
  readonly kind = "IncludeError";
  /** Absolute paths from the root document down to the failing include. */
  readonly chain: readonly string[];

  constructor(message: string, chain: readonly string[], options?: { cause?: unknown }) {
    super(message, options);
    this.chain = chain;
  }
}

export abstract class ModelError extends CmdspecError {
  /** Command names from the root to the offending node. */
  readonly path: readonly string[];
  related: readonly ModelError[] = [];

  constructor(message: string, path: readonly string[]) {
    super(message);
    this.path = path;
  }
}

export class DuplicateFlagError extends ModelError {
  readonly kind = "DuplicateFlagError";
  readonly trigger: string;

  constructor(trigger: string, path: readonly string[]) {
    super(`flag trigger '${trigger}' is declared more than once`, path);
    this.trigger = trigger;
  }
}

export class ArityError extends ModelError {
  readonly kind = "ArityError";
}

export class CompletionSpecError extends ModelError {
  readonly kind = "CompletionSpecError";
}

export class DefinitionError extends ModelError {
  readonly kind = "DefinitionError";
}

export class EmitError extends CmdspecError {
  readonly kind = "EmitError";
}

/**
 * Raised inside the resolver when a provider cannot produce candidates. Never thrown to callers:
 * the resolver hands it to the warning sink and answers with an empty list.
 */
export class CompletionProviderError extends CmdspecError {
  readonly kind = "CompletionProviderError";
  readonly provider: "path" | "helper";
  readonly timedOut: boolean;

  constructor(
    message: string,
    provider: "path" | "helper",
    options?: { cause?: unknown; timedOut?: boolean }
  ) {
    super(message, options);
    this.provider = provider;
    this.timedOut = options?.timedOut ?? false;
  }
}

export function isCmdspecError(error: unknown): error is CmdspecError {
  return error instanceof CmdspecError;
}

export function formatError(error: unknown): string {
  if (!isCmdspecError(error)) {
    const message = error instanceof Error ? error.message : String(error);
    return `error: ${message}`;
  }
  const lines = [`error[${error.kind}]: ${error.message}${describeLocation(error)}`];
  if (error instanceof ModelError) {
    for (const related of error.related) {
      lines.push(`error[${related.kind}]: ${related.message}${describeLocation(related)}`);
    }
  }
  return lines.join("\n");
}

function describeLocation(error: CmdspecError): string {
  if (error instanceof ParseError) {
    const { file, line, column } = error.location;
    if (line === undefined) return ` (${file})`;
    return column === undefined ? ` (${file}:${line})` : ` (${file}:${line}:${column})`;
  }
  if (error instanceof IncludeError) {
    return error.chain.length > 0 ? ` (via ${error.chain.join(" -> ")})` : "";
  }
  if (error instanceof ModelError) {
    return error.path.length > 0 ? ` (at ${error.path.join(" ")})` : "";
  }
  return "";
}
