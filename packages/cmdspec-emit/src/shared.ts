import {
  EmitError,
  hasTemplateTags,
  triggersOf,
  visibleChildren,
  childrenOf,
  type CommandModel,
  type CommandNode,
  type CompletionProvider,
  type PathEntryKind,
  type ShellKind,
  type StaticValue,
} from "@cmdspec/core";
import { identifier } from "./quote.js";

export type EmitOptions = {
  /** Provenance text written as a comment at the top of the output. */
  header?: string;
  /** Spec file the runtime completer is pointed at. */
  specFile?: string;
  /** Command emitted scripts call back into for runtime completion. */
  completer?: string;
  /** Overrides the model's binary name. */
  bin?: string;
};

export type Suggestion = StaticValue;

export type ValueAction =
  | { kind: "words"; values: readonly Suggestion[] }
  | { kind: "files"; entry: PathEntryKind; patterns: string[] }
  | { kind: "inline"; command: string }
  | { kind: "runtime" }
  | { kind: "none" };

export type ValueFlag = {
  /** Triggers that consume the next word; negations never do. */
  triggers: string[];
  action: ValueAction;
};

export type PositionalSlot = {
  position: number;
  variadic: boolean;
  action: ValueAction;
};

export type TableNode = {
  key: string;
  node: CommandNode;
  /** Every child including hidden ones, so the walk can still descend into them. */
  children: { names: string[]; key: string }[];
  commands: Suggestion[];
  flags: Suggestion[];
  valueFlags: ValueFlag[];
  positionals: PositionalSlot[];
};

export type CompletionTable = {
  bin: string;
  /** Prefix for generated shell function names. */
  fn: string;
  nodes: TableNode[];
  needsRuntime: boolean;
};

export function nodeKey(node: CommandNode): string {
  return `n${node.id}`;
}

export function actionFor(provider: CompletionProvider): ValueAction {
  switch (provider.kind) {
    case "static":
      return { kind: "words", values: provider.values };
    case "path": {
      const patterns = [...(provider.extensions ?? []).map(ext => `*${ext}`)];
      if (provider.glob) patterns.push(provider.glob);
      return { kind: "files", entry: provider.entry, patterns };
    }
    case "helper":
      return !hasTemplateTags(provider.run) && !provider.descriptions
        ? { kind: "inline", command: provider.run }
        : { kind: "runtime" };
    case "none":
      return { kind: "none" };
  }
}

function describe(text: string | undefined): Suggestion["description"] {
  return text ? text.replace(/\s+/g, " ").trim() : undefined;
}

function suggestion(value: string, description: string | undefined): Suggestion {
  const text = describe(description);
  return text ? { value, description: text } : { value };
}

/** Flattens the model into per-node lookup tables the script emitters render. */
export function buildTable(model: CommandModel, options: EmitOptions = {}): CompletionTable {
  const bin = options.bin ?? model.bin;
  const nodes: TableNode[] = model.nodes.map(node => {
    const flags: Suggestion[] = [];
    const seen = new Set<string>();
    const valueFlags: ValueFlag[] = [];
    for (const flag of node.effectiveFlags) {
      if (!flag.hidden) {
        for (const trigger of triggersOf(flag)) {
          if (seen.has(trigger)) continue;
          seen.add(trigger);
          flags.push(suggestion(trigger, flag.help));
        }
      }
      if (flag.value && flag.arity !== "none") {
        const triggers = triggersOf(flag).filter(trigger => trigger !== flag.negate);
        valueFlags.push({ triggers, action: actionFor(flag.value.provider) });
      }
    }
    const commands = visibleChildren(model, node).flatMap(child =>
      [child.name, ...child.aliases].map(name => suggestion(name, child.help.short))
    );
    return {
      key: nodeKey(node),
      node,
      children: childrenOf(model, node).map(child => ({ names: [child.name, ...child.aliases], key: nodeKey(child) })),
      commands,
      flags,
      valueFlags,
      positionals: node.args.map(arg => ({
        position: arg.position,
        variadic: arg.arity === "variadic",
        action: actionFor(arg.provider),
      })),
    };
  });
  const needsRuntime = nodes.some(
    node =>
      node.valueFlags.some(flag => flag.action.kind === "runtime") ||
      node.positionals.some(slot => slot.action.kind === "runtime")
  );
  return { bin, fn: `_${identifier(bin)}`, nodes, needsRuntime };
}

/** The spec file a runtime callback needs, or an {@link EmitError} naming the shell. */
export function requireSpecFile(table: CompletionTable, shell: ShellKind, options: EmitOptions): string | undefined {
  if (!table.needsRuntime) return undefined;
  if (!options.specFile) {
    throw new EmitError(
      `${shell} completion for '${table.bin}' uses helpers that run at completion time; pass the spec file they read`
    );
  }
  return options.specFile;
}

/** Argument vector of the runtime completer, ready to be quoted for a shell. */
export function runtimeCommand(shell: ShellKind, specFile: string, options: EmitOptions): string[] {
  const completer = (options.completer ?? "cmdspec").split(/\s+/).filter(Boolean);
  return [...completer, "complete-word", "--shell", shell, "--file", specFile];
}
