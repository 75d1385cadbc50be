import { createHash } from "node:crypto";
import path from "node:path";
import fs from "fs-extra";
import { LineCounter, isMap, isNode, isScalar, parseDocument } from "yaml";
import type { ZodIssue } from "zod";
import { IncludeError, ParseError } from "./errors.js";
import {
  RawDocumentSchema,
  type RawCommand,
  type RawComplete,
  type RawDocument,
  type RawSpec,
} from "./raw.js";

export type LoadedSpec = {
  raw: RawSpec;
  /** Absolute paths of every document read, root first. Inline specs report `<inline>`. */
  sources: string[];
  /** `sha256:` digest over every source document, in load order. */
  digest: string;
};

export type LoadOptions = {
  readFile?: (file: string) => Promise<string>;
};

export type LoadStringOptions = LoadOptions & {
  /** Directory that relative includes resolve against. Defaults to the working directory. */
  baseDir?: string;
  label?: string;
};

type ParsedDocument = {
  file: string;
  document: RawDocument;
};

const USAGE_COMMENT = /^#\s?(?:\[USAGE\]|USAGE)(?: (.*))?$/;

class DocumentLoader {
  private readonly cache = new Map<string, ParsedDocument>();
  private readonly contents = new Map<string, string>();
  private readonly readFile: (file: string) => Promise<string>;

  constructor(options: LoadOptions) {
    this.readFile = options.readFile ?? (file => fs.readFile(file, "utf8"));
  }

  sources(): string[] {
    return Array.from(this.contents.keys());
  }

  digest(): string {
    const hash = createHash("sha256");
    for (const [file, content] of this.contents) {
      hash.update(file).update("\0").update(content).update("\0");
    }
    return `sha256:${hash.digest("hex")}`;
  }

  parseText(file: string, text: string): ParsedDocument {
    const cached = this.cache.get(file);
    if (cached) return cached;
    this.contents.set(file, text);
    const parsed = { file, document: parseSpecDocument(file, text) };
    this.cache.set(file, parsed);
    return parsed;
  }

  async load(file: string, chain: readonly string[], target?: string): Promise<ParsedDocument> {
    const cached = this.cache.get(file);
    if (cached) return cached;
    let text: string;
    try {
      text = await this.readFile(file);
    } catch (error) {
      if (target === undefined) {
        throw new IncludeError(`cannot read spec document '${file}'`, [file], { cause: error });
      }
      throw new IncludeError(`included file not found: ${target}`, [...chain, file], { cause: error });
    }
    return this.parseText(file, text);
  }

  async expandDocument(parsed: ParsedDocument, chain: readonly string[]): Promise<RawDocument> {
    const nextChain = [...chain, parsed.file];
    const document = parsed.document;
    const flags = [...(document.flags ?? [])];
    const args = [...(document.args ?? [])];
    const commands: RawCommand[] = [];
    for (const command of document.commands ?? []) {
      commands.push(await this.expandCommand(command, parsed.file, nextChain));
    }
    const included = new Map<string, RawComplete>();

    for (const target of document.include ?? []) {
      const expanded = await this.expandInclude(target, parsed.file, nextChain);
      flags.push(...(expanded.flags ?? []));
      args.push(...(expanded.args ?? []));
      commands.push(...(expanded.commands ?? []));
      for (const [key, value] of Object.entries(expanded.complete ?? {})) {
        if (!included.has(key)) included.set(key, value);
      }
    }
    const complete: Record<string, RawComplete> = Object.fromEntries([
      ...included,
      ...Object.entries(document.complete ?? {}),
    ]);

    return { ...document, include: undefined, flags, args, commands, complete };
  }

  private async expandCommand(command: RawCommand, file: string, chain: readonly string[]): Promise<RawCommand> {
    const flags = [...(command.flags ?? [])];
    const args = [...(command.args ?? [])];
    const commands: RawCommand[] = [];
    for (const child of command.commands ?? []) {
      commands.push(await this.expandCommand(child, file, chain));
    }
    for (const target of command.include ?? []) {
      const expanded = await this.expandInclude(target, file, chain);
      flags.push(...(expanded.flags ?? []));
      args.push(...(expanded.args ?? []));
      commands.push(...(expanded.commands ?? []));
    }
    return { ...command, include: undefined, flags, args, commands };
  }

  private async expandInclude(target: string, from: string, chain: readonly string[]): Promise<RawDocument> {
    const resolved = path.resolve(path.dirname(from), target);
    if (chain.includes(resolved)) {
      const cycle = [...chain.slice(chain.indexOf(resolved)), resolved];
      throw new IncludeError(`circular include: ${cycle.join(" -> ")}`, [...chain, resolved]);
    }
    const parsed = await this.load(resolved, chain, target);
    return this.expandDocument(parsed, chain);
  }
}

export async function loadSpec(file: string, options: LoadOptions = {}): Promise<LoadedSpec> {
  const loader = new DocumentLoader(options);
  const root = await loader.load(path.resolve(file), []);
  return finish(loader, root);
}

export async function loadSpecString(text: string, options: LoadStringOptions = {}): Promise<LoadedSpec> {
  const loader = new DocumentLoader(options);
  const label = options.label ?? "<inline>";
  const file = options.baseDir ? path.join(path.resolve(options.baseDir), label) : label;
  const root = loader.parseText(file, text);
  return finish(loader, root);
}

async function finish(loader: DocumentLoader, root: ParsedDocument): Promise<LoadedSpec> {
  const expanded = await loader.expandDocument(root, []);
  if (!expanded.name) {
    throw new ParseError("the root spec document must declare a name", { file: root.file, line: 1, column: 1 });
  }
  const raw: RawSpec = {
    name: expanded.name,
    bin: expanded.bin,
    version: expanded.version,
    about: expanded.about,
    long_about: expanded.long_about,
    usage: expanded.usage,
    flags: expanded.flags ?? [],
    args: expanded.args ?? [],
    commands: expanded.commands ?? [],
    complete: expanded.complete ?? {},
  };
  return { raw, sources: loader.sources(), digest: loader.digest() };
}

/**
 * Scripts that start with a shebang carry their spec in `#USAGE` comment lines. Returns the
 * extracted YAML plus, for each extracted line, its line number in the script.
 */
export function extractScriptSpec(text: string): { source: string; lines: number[] } | null {
  if (!text.startsWith("#!")) return null;
  const extracted: string[] = [];
  const lines: number[] = [];
  text.split(/\r?\n/).forEach((line, index) => {
    const match = USAGE_COMMENT.exec(line);
    if (match) {
      extracted.push(match[1] ?? "");
      lines.push(index + 1);
    }
  });
  return { source: extracted.join("\n"), lines };
}

export function parseSpecDocument(file: string, text: string): RawDocument {
  const script = extractScriptSpec(text);
  const source = script ? script.source : text;
  const mapLine = (line: number) => (script ? script.lines[line - 1] ?? line : line);

  const lineCounter = new LineCounter();
  const doc = parseDocument(source, { lineCounter, prettyErrors: false });
  const [first] = doc.errors;
  if (first) {
    const pos = lineCounter.linePos(first.pos[0]);
    throw new ParseError(first.message.split("\n")[0] ?? "invalid YAML", {
      file,
      line: mapLine(pos.line),
      column: pos.col,
    });
  }

  const data: unknown = doc.toJS() ?? {};
  const result = RawDocumentSchema.safeParse(data);
  if (!result.success) {
    const issue = result.error.issues[0];
    const offset = issue ? locateIssue(doc, issue) : 0;
    const pos = lineCounter.linePos(offset);
    throw new ParseError(describeIssue(issue), { file, line: mapLine(pos.line), column: pos.col });
  }
  return result.data;
}

function describeIssue(issue: ZodIssue | undefined): string {
  if (!issue) return "invalid spec document";
  const where = issue.path.length > 0 ? ` at '${issue.path.join(".")}'` : "";
  return `${issue.message}${where}`;
}

function locateIssue(doc: ReturnType<typeof parseDocument>, issue: ZodIssue): number {
  const segments = [...issue.path];
  while (segments.length > 0) {
    const node = doc.getIn(segments, true);
    if (isNode(node) && node.range) {
      if (issue.code === "unrecognized_keys" && isMap(node)) {
        const key = issue.keys[0];
        const pair = node.items.find(item => isScalar(item.key) && item.key.value === key);
        if (pair && isScalar(pair.key) && pair.key.range) {
          return pair.key.range[0];
        }
      }
      return node.range[0];
    }
    segments.pop();
  }
  const contents = doc.contents;
  if (issue.code === "unrecognized_keys" && isMap(contents)) {
    const key = issue.keys[0];
    const pair = contents.items.find(item => isScalar(item.key) && item.key.value === key);
    if (pair && isScalar(pair.key) && pair.key.range) {
      return pair.key.range[0];
    }
  }
  return contents && isNode(contents) && contents.range ? contents.range[0] : 0;
}
