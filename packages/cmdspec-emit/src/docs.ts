import { fileURLToPath } from "node:url";
import nunjucks from "nunjucks";
import {
  EmitError,
  findCommand,
  longTriggers,
  rootNode,
  shortTriggers,
  visibleChildren,
  type ArgumentSpec,
  type CommandModel,
  type CommandNode,
  type CompletionProvider,
  type FlagSpec,
} from "@cmdspec/core";
import { oneLine } from "./quote.js";

export const DOC_FORMATS = ["help", "markdown", "manpage"] as const;

export type DocFormat = (typeof DOC_FORMATS)[number];

export function isDocFormat(value: string): value is DocFormat {
  return DOC_FORMATS.some(format => format === value);
}

export type DocItem = {
  term: string;
  help?: string;
};

export type DocCommand = {
  path: string;
  heading: string;
  about?: string;
  long?: string;
  usage: string;
  aliases: string[];
  commands: DocItem[];
  args: DocItem[];
  flags: DocItem[];
};

export type DocOptions = {
  bin?: string;
  /** Command path below the root whose help page `help` renders. */
  command?: readonly string[];
};

const TEMPLATE_DIR = fileURLToPath(new URL("../templates/", import.meta.url));

let environment: nunjucks.Environment | undefined;

function templates(): nunjucks.Environment {
  if (!environment) {
    environment = new nunjucks.Environment(new nunjucks.FileSystemLoader(TEMPLATE_DIR), {
      autoescape: false,
      trimBlocks: true,
      lstripBlocks: true,
    });
    environment.addFilter("roff", roff);
  }
  return environment;
}

/** Escapes text for a roff body: backslashes, hyphens, and control characters at line starts. */
export function roff(text: string): string {
  return text
    .replace(/\\/g, "\\e")
    .replace(/-/g, "\\-")
    .split("\n")
    .map(line => (/^[.']/.test(line) ? `\\&${line}` : line))
    .join("\n");
}

function possibleValues(provider: CompletionProvider): string | undefined {
  if (provider.kind !== "static" || provider.values.length === 0) return undefined;
  return `[possible values: ${provider.values.map(entry => entry.value).join(", ")}]`;
}

function annotate(help: string | undefined, notes: (string | undefined)[]): string | undefined {
  const parts = [help ? oneLine(help) : undefined, ...notes].filter((part): part is string => Boolean(part));
  return parts.length > 0 ? parts.join(" ") : undefined;
}

function item(term: string, help: string | undefined): DocItem {
  return help ? { term, help } : { term };
}

export function argUsage(arg: ArgumentSpec): string {
  const base = arg.required ? `<${arg.name}>` : `[${arg.name}]`;
  return arg.arity === "variadic" ? `${base}...` : base;
}

export function flagUsage(flag: FlagSpec): string {
  const triggers = [...shortTriggers(flag), ...longTriggers(flag)];
  if (flag.negate) triggers.push(flag.negate);
  const value = flag.value && flag.arity !== "none" ? ` <${flag.value.name}>${flag.arity === "many" ? "..." : ""}` : "";
  return `${triggers.join(", ")}${value}`;
}

function argItem(arg: ArgumentSpec): DocItem {
  return item(
    argUsage(arg),
    annotate(arg.help, [possibleValues(arg.provider), arg.default !== undefined ? `[default: ${arg.default}]` : undefined])
  );
}

function flagItem(flag: FlagSpec): DocItem {
  return item(
    flagUsage(flag),
    annotate(flag.help, [
      flag.value ? possibleValues(flag.value.provider) : undefined,
      flag.default !== undefined ? `[default: ${flag.default}]` : undefined,
      flag.env ? `[env: ${flag.env}]` : undefined,
    ])
  );
}

function commandItems(model: CommandModel, node: CommandNode): DocItem[] {
  return visibleChildren(model, node).map(child => item(child.name, child.help.short));
}

/** `bin sub [FLAGS] <arg> <COMMAND>`; the root uses the spec's own usage line when it has one. */
export function usageLine(model: CommandModel, node: CommandNode, bin = model.bin): string {
  if (node.id === model.root && model.usage) return model.usage;
  const parts = [bin, ...node.path.slice(1)];
  if (node.effectiveFlags.some(flag => !flag.hidden)) parts.push("[FLAGS]");
  parts.push(...node.args.map(argUsage));
  if (visibleChildren(model, node).length > 0) parts.push(node.subcommandRequired ? "<COMMAND>" : "[COMMAND]");
  return parts.join(" ");
}

function describeNode(model: CommandModel, node: CommandNode): { about?: string; long?: string } {
  if (node.id === model.root) {
    return { ...(model.about ? { about: model.about } : {}), ...(model.longAbout ? { long: model.longAbout } : {}) };
  }
  return { ...(node.help.short ? { about: node.help.short } : {}), ...(node.help.long ? { long: node.help.long } : {}) };
}

function docCommand(model: CommandModel, node: CommandNode, depth: number, bin: string): DocCommand {
  return {
    path: [bin, ...node.path.slice(1)].join(" "),
    heading: "#".repeat(depth + 2),
    ...describeNode(model, node),
    usage: usageLine(model, node, bin),
    aliases: [...node.aliases],
    commands: commandItems(model, node),
    args: node.args.map(argItem),
    flags: node.flags.filter(flag => !flag.hidden).map(flagItem),
  };
}

/** Visible commands in pre-order; a hidden command hides its whole subtree. */
export function docCommands(model: CommandModel, bin = model.bin): DocCommand[] {
  const commands: DocCommand[] = [];
  const step = (node: CommandNode, depth: number) => {
    commands.push(docCommand(model, node, depth, bin));
    for (const child of visibleChildren(model, node)) {
      step(child, depth + 1);
    }
  };
  step(rootNode(model), 0);
  return commands;
}

function section(title: string, items: readonly DocItem[]): string[] {
  if (items.length === 0) return [];
  const width = Math.max(...items.map(entry => entry.term.length));
  return [
    "",
    `${title}:`,
    ...items.map(entry => (entry.help ? `  ${entry.term.padEnd(width)}  ${entry.help}` : `  ${entry.term}`)),
  ];
}

/** Plain-text help for one command, listing its own flags followed by inherited globals. */
export function renderHelp(model: CommandModel, node: CommandNode = rootNode(model), options: DocOptions = {}): string {
  const bin = options.bin ?? model.bin;
  const { about, long } = describeNode(model, node);
  const description = long ?? about;
  const lines: string[] = description ? [description, ""] : [];
  lines.push(`Usage: ${usageLine(model, node, bin)}`);
  if (node.aliases.length > 0) lines.push("", `Aliases: ${node.aliases.join(", ")}`);
  lines.push(
    ...section("Commands", commandItems(model, node)),
    ...section("Arguments", node.args.map(argItem)),
    ...section("Flags", node.effectiveFlags.filter(flag => !flag.hidden).map(flagItem))
  );
  return `${lines.join("\n")}\n`;
}

export function renderMarkdown(model: CommandModel, options: DocOptions = {}): string {
  const bin = options.bin ?? model.bin;
  return templates().render("markdown.njk", {
    bin,
    version: model.version,
    commands: docCommands(model, bin),
  });
}

export function renderManpage(model: CommandModel, options: DocOptions = {}): string {
  const bin = options.bin ?? model.bin;
  const [root, ...subcommands] = docCommands(model, bin);
  return templates().render("manpage.njk", {
    bin,
    title: bin.toUpperCase(),
    footer: model.version ? `${bin} ${model.version}` : bin,
    root,
    subcommands,
  });
}

export function renderDocs(model: CommandModel, format: DocFormat, options: DocOptions = {}): string {
  switch (format) {
    case "help": {
      const names = options.command ?? [];
      const node = findCommand(model, names);
      if (!node) throw new EmitError(`no command '${names.join(" ")}' in '${model.bin}'`);
      return renderHelp(model, node, options);
    }
    case "markdown":
      return renderMarkdown(model, options);
    case "manpage":
      return renderManpage(model, options);
  }
}
