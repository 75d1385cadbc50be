import {
  EmitError,
  childrenOf,
  rootNode,
  type ArgumentSpec,
  type CommandModel,
  type CommandNode,
  type CompletionProvider,
  type FlagSpec,
} from "@cmdspec/core";
import { commentBlock, jsString } from "./quote.js";
import { runtimeCommand, type EmitOptions } from "./shared.js";

/** Placeholder the printer renders as a reference to the runtime-completer generator. */
export const COMPLETE_WORD_GENERATOR = Object.freeze({ generator: "completeWord" } as const);

export type FigGeneratorRef = typeof COMPLETE_WORD_GENERATOR;

export type FigSuggestion = {
  name: string;
  description?: string;
};

export type FigArg = {
  name: string;
  description?: string;
  isOptional?: boolean;
  isVariadic?: boolean;
  default?: string;
  suggestions?: FigSuggestion[];
  template?: "filepaths" | "folders";
  generators?: FigGeneratorRef;
};

export type FigOption = {
  name: string | string[];
  description?: string;
  args?: FigArg;
  isPersistent?: boolean;
  isRepeatable?: boolean;
  isRequired?: boolean;
  hidden?: boolean;
  exclusiveOn?: string[];
};

export type FigSubcommand = {
  name: string | string[];
  displayName?: string;
  description?: string;
  hidden?: boolean;
  args?: FigArg[];
  options?: FigOption[];
  subcommands?: FigSubcommand[];
};

export type FigSpec = Omit<FigSubcommand, "name" | "displayName" | "hidden"> & { name: string };

function completion(provider: CompletionProvider): Pick<FigArg, "suggestions" | "template" | "generators"> {
  switch (provider.kind) {
    case "static":
      return {
        suggestions: provider.values.map(entry =>
          entry.description ? { name: entry.value, description: entry.description } : { name: entry.value }
        ),
      };
    case "path":
      if (provider.extensions || provider.glob) return { generators: COMPLETE_WORD_GENERATOR };
      return { template: provider.entry === "dir" ? "folders" : "filepaths" };
    case "helper":
      return { generators: COMPLETE_WORD_GENERATOR };
    case "none":
      return {};
  }
}

function figArg(arg: ArgumentSpec): FigArg {
  return {
    name: arg.name,
    ...(arg.help ? { description: arg.help } : {}),
    ...(arg.required ? {} : { isOptional: true }),
    ...(arg.arity === "variadic" ? { isVariadic: true } : {}),
    ...(arg.default !== undefined ? { default: arg.default } : {}),
    ...completion(arg.provider),
  };
}

function figOptions(flag: FlagSpec): FigOption[] {
  const triggers = [...flag.short.map(short => `-${short}`), ...flag.long.map(long => `--${long}`)];
  const option: FigOption = {
    name: triggers.length === 1 && triggers[0] !== undefined ? triggers[0] : triggers,
    ...(flag.help ? { description: flag.help } : {}),
    ...(flag.value ? { args: { name: flag.value.name, ...completion(flag.value.provider) } } : {}),
    ...(flag.global ? { isPersistent: true } : {}),
    ...(flag.count || flag.arity === "many" ? { isRepeatable: true } : {}),
    ...(flag.required ? { isRequired: true } : {}),
    ...(flag.hidden ? { hidden: true } : {}),
  };
  if (!flag.negate) return [option];
  const negation: FigOption = {
    name: flag.negate,
    ...(flag.help ? { description: flag.help } : {}),
    ...(flag.global ? { isPersistent: true } : {}),
    ...(flag.hidden ? { hidden: true } : {}),
    exclusiveOn: triggers,
  };
  return [option, negation];
}

function figBody(model: CommandModel, node: CommandNode): Pick<FigSubcommand, "args" | "options" | "subcommands"> {
  const children = childrenOf(model, node);
  return {
    ...(node.args.length > 0 ? { args: node.args.map(figArg) } : {}),
    ...(node.flags.length > 0 ? { options: node.flags.flatMap(figOptions) } : {}),
    ...(children.length > 0 ? { subcommands: children.map(child => figSubcommand(model, child)) } : {}),
  };
}

function figSubcommand(model: CommandModel, node: CommandNode): FigSubcommand {
  const aliases = node.aliases.length > 0 ? ` [aliases: ${node.aliases.join(", ")}]` : "";
  const description = `${node.help.short ?? ""}${aliases}`;
  return {
    name: node.aliases.length > 0 ? [node.name, ...node.aliases] : node.name,
    ...(node.aliases.length > 0 ? { displayName: node.name } : {}),
    ...(description ? { description } : {}),
    ...(node.hidden ? { hidden: true } : {}),
    ...figBody(model, node),
  };
}

/**
 * The `Fig.Spec` object tree for a model. Subcommands, options and args mirror the command tree
 * one to one; globals become persistent options on the node that declares them.
 */
export function buildFigSpec(model: CommandModel, options: Pick<EmitOptions, "bin"> = {}): FigSpec {
  const root = rootNode(model);
  return {
    name: options.bin ?? model.bin,
    ...(model.about ? { description: model.about } : {}),
    ...figBody(model, root),
  };
}

function isStringArray(value: unknown[]): value is string[] {
  return value.every(entry => typeof entry === "string");
}

function usesGenerator(value: unknown): boolean {
  if (value === COMPLETE_WORD_GENERATOR) return true;
  if (Array.isArray(value)) return value.some(usesGenerator);
  if (value !== null && typeof value === "object") return Object.values(value).some(usesGenerator);
  return false;
}

function print(value: unknown, depth: number): string {
  if (value === COMPLETE_WORD_GENERATOR) return COMPLETE_WORD_GENERATOR.generator;
  if (typeof value === "string") return jsString(value);
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  const pad = "  ".repeat(depth + 1);
  const close = "  ".repeat(depth);
  if (Array.isArray(value)) {
    if (isStringArray(value)) return `[${value.map(jsString).join(", ")}]`;
    return `[\n${value.map(entry => `${pad}${print(entry, depth + 1)},`).join("\n")}\n${close}]`;
  }
  if (value !== null && typeof value === "object") {
    const entries = Object.entries(value).filter(([, entry]) => entry !== undefined);
    return `{\n${entries.map(([key, entry]) => `${pad}${key}: ${print(entry, depth + 1)},`).join("\n")}\n${close}}`;
  }
  return "undefined";
}

/** A Fig completion spec module; helpers and filtered paths call back into the runtime completer. */
export function emitFig(model: CommandModel, options: EmitOptions = {}): string {
  const spec = buildFigSpec(model, options);
  const lines = [...commentBlock(options.header, "//")];
  if (usesGenerator(spec)) {
    if (!options.specFile) {
      throw new EmitError(`fig completion for '${spec.name}' uses the runtime completer; pass the spec file it reads`);
    }
    const command = runtimeCommand("fig", options.specFile, options).map(jsString).join(", ");
    lines.push(
      "const completeWord: Fig.Generator = {",
      `  script: tokens => [${command}, "--cword", String(tokens.length - 1), "--", ...tokens],`,
      "  postProcess: out =>",
      "    out",
      '      .split("\\n")',
      "      .filter(line => line.length > 0)",
      "      .map(line => {",
      '        const [name, description] = line.split("\\t");',
      "        return description ? { name, description } : { name };",
      "      }),",
      "};",
      ""
    );
  }
  lines.push(`const completionSpec: Fig.Spec = ${print(spec, 0)};`, "", "export default completionSpec;", "");
  return lines.join("\n");
}
