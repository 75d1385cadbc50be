export type CommandId = number;

export type StaticValue = {
  value: string;
  description?: string;
};

export type PathEntryKind = "any" | "file" | "dir";

export type CompletionProvider =
  | { kind: "static"; values: readonly StaticValue[] }
  | { kind: "path"; entry: PathEntryKind; extensions?: readonly string[]; glob?: string }
  | { kind: "helper"; run: string; timeoutMs?: number; descriptions: boolean }
  | { kind: "none" };

export type FlagArity = "none" | "one" | "many";

export interface FlagValue {
  name: string;
  provider: CompletionProvider;
}

export interface FlagSpec {
  name: string;
  short: readonly string[];
  long: readonly string[];
  negate?: string;
  arity: FlagArity;
  /** Repeatable presence flag, e.g. `-vvv`. */
  count: boolean;
  global: boolean;
  hidden: boolean;
  required: boolean;
  default?: string;
  env?: string;
  value?: FlagValue;
  help?: string;
  longHelp?: string;
  /** Node that declared this flag; differs from the holder for inherited globals. */
  origin: CommandId;
}

export type ArgumentArity = "one" | "optional" | "variadic";

export interface ArgumentSpec {
  position: number;
  name: string;
  arity: ArgumentArity;
  required: boolean;
  default?: string;
  provider: CompletionProvider;
  help?: string;
  longHelp?: string;
}

export interface CommandHooks {
  before?: string;
  after?: string;
}

export interface CommandNode {
  id: CommandId;
  name: string;
  aliases: readonly string[];
  parent: CommandId | null;
  children: readonly CommandId[];
  /** Command names from the root (inclusive) to this node. */
  path: readonly string[];
  flags: readonly FlagSpec[];
  /** Own flags followed by inherited globals that were not redeclared. */
  effectiveFlags: readonly FlagSpec[];
  args: readonly ArgumentSpec[];
  help: { short?: string; long?: string };
  hidden: boolean;
  subcommandRequired: boolean;
  hooks?: CommandHooks;
}

export interface CommandModel {
  name: string;
  bin: string;
  version?: string;
  about?: string;
  longAbout?: string;
  usage?: string;
  nodes: readonly CommandNode[];
  root: CommandId;
  sources: readonly string[];
}

export function getNode(model: CommandModel, id: CommandId): CommandNode {
  const node = model.nodes[id];
  if (!node) {
    throw new RangeError(`command id ${id} is not part of this model`);
  }
  return node;
}

export function rootNode(model: CommandModel): CommandNode {
  return getNode(model, model.root);
}

export function childrenOf(model: CommandModel, node: CommandNode): CommandNode[] {
  return node.children.map(id => getNode(model, id));
}

export function visibleChildren(model: CommandModel, node: CommandNode): CommandNode[] {
  return childrenOf(model, node).filter(child => !child.hidden);
}

/** Exact match on a child's name or one of its aliases; hidden children still match. */
export function findChild(model: CommandModel, node: CommandNode, token: string): CommandNode | undefined {
  return childrenOf(model, node).find(child => child.name === token || child.aliases.includes(token));
}

/** Looks a node up by its command path below the root, e.g. `["build", "release"]`. */
export function findCommand(model: CommandModel, names: readonly string[]): CommandNode | undefined {
  let current: CommandNode | undefined = rootNode(model);
  for (const name of names) {
    if (!current) return undefined;
    current = findChild(model, current, name);
  }
  return current;
}

export function shortTriggers(flag: FlagSpec): string[] {
  return flag.short.map(short => `-${short}`);
}

export function longTriggers(flag: FlagSpec): string[] {
  return flag.long.map(long => `--${long}`);
}

/** Every command-line string that selects this flag: short, long, then the negation. */
export function triggersOf(flag: FlagSpec): string[] {
  const triggers = [...shortTriggers(flag), ...longTriggers(flag)];
  if (flag.negate) triggers.push(flag.negate);
  return triggers;
}

export function takesValue(flag: FlagSpec): boolean {
  return flag.arity !== "none" && flag.value !== undefined;
}

export function findFlag(node: CommandNode, trigger: string): FlagSpec | undefined {
  return node.effectiveFlags.find(flag => triggersOf(flag).includes(trigger));
}

/** The argument a positional at `index` fills, letting a trailing variadic absorb the rest. */
export function argumentAt(node: CommandNode, index: number): ArgumentSpec | undefined {
  const direct = node.args[index];
  if (direct) return direct;
  const last = node.args[node.args.length - 1];
  return last && last.arity === "variadic" && index >= last.position ? last : undefined;
}

export function walkModel(model: CommandModel, visit: (node: CommandNode, depth: number) => void): void {
  const step = (node: CommandNode, depth: number) => {
    visit(node, depth);
    for (const child of childrenOf(model, node)) {
      step(child, depth + 1);
    }
  };
  step(rootNode(model), 0);
}
