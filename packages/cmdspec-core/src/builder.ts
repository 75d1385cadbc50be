import {
  ArityError,
  CompletionSpecError,
  DefinitionError,
  DuplicateFlagError,
  type ModelError,
} from "./errors.js";
import type {
  ArgumentArity,
  ArgumentSpec,
  CommandHooks,
  CommandId,
  CommandModel,
  CommandNode,
  CompletionProvider,
  FlagArity,
  FlagSpec,
  PathEntryKind,
  StaticValue,
} from "./model.js";
import { triggersOf } from "./model.js";
import type { RawArg, RawChoice, RawCommand, RawComplete, RawCompleteObject, RawFlag, RawSpec } from "./raw.js";
import { compileHelperTemplate } from "./template.js";
import { parseArgUsage, parseFlagUsage } from "./usage.js";

export type BuildOptions = {
  /** Absolute paths of the documents the raw tree was loaded from. */
  sources?: readonly string[];
};

const BUILTIN_COMPLETERS = new Map<string, PathEntryKind>([
  ["path", "any"],
  ["file", "file"],
  ["dir", "dir"],
]);

type DraftNode = {
  id: CommandId;
  name: string;
  aliases: string[];
  parent: CommandId | null;
  children: CommandId[];
  path: string[];
  flags: FlagSpec[];
  effectiveFlags: FlagSpec[];
  args: ArgumentSpec[];
  help: { short?: string; long?: string };
  hidden: boolean;
  subcommandRequired: boolean;
  hooks?: CommandHooks;
};

class ModelBuilder {
  readonly nodes: DraftNode[] = [];
  readonly errors: ModelError[] = [];

  constructor(private readonly raw: RawSpec) {}

  build(): DraftNode[] {
    const root = this.addNode({
      name: this.raw.name,
      aliases: [],
      parent: null,
      path: [this.raw.name],
      help: { short: this.raw.about, long: this.raw.long_about },
      hidden: false,
      subcommandRequired: false,
    });
    this.lowerBody(root, this.raw.flags, this.raw.args, this.raw.commands);
    for (const node of this.nodes) {
      this.inheritFlags(node);
    }
    return this.nodes;
  }

  private addNode(init: Omit<DraftNode, "id" | "children" | "flags" | "effectiveFlags" | "args">): DraftNode {
    const node: DraftNode = { ...init, id: this.nodes.length, children: [], flags: [], effectiveFlags: [], args: [] };
    this.nodes.push(node);
    return node;
  }

  private lowerBody(node: DraftNode, flags: RawFlag[], args: RawArg[], commands: RawCommand[]): void {
    for (const flag of flags) {
      const lowered = this.lowerFlag(node, flag);
      if (lowered) node.flags.push(lowered);
    }
    args.forEach((arg, index) => {
      const lowered = this.lowerArg(node, arg, index);
      if (lowered) node.args.push(lowered);
    });
    this.checkArgs(node);
    this.checkOwnTriggers(node);

    const seen = new Set<string>();
    for (const command of commands) {
      for (const name of [command.name, ...(command.aliases ?? [])]) {
        if (seen.has(name)) {
          this.errors.push(new DefinitionError(`command name or alias '${name}' is declared more than once`, node.path));
        }
        seen.add(name);
      }
      const child = this.addNode({
        name: command.name,
        aliases: [...(command.aliases ?? [])],
        parent: node.id,
        path: [...node.path, command.name],
        help: { short: command.help, long: command.long_help },
        hidden: command.hide ?? false,
        subcommandRequired: command.subcommand_required ?? false,
        hooks: command.hooks ? { ...command.hooks } : undefined,
      });
      node.children.push(child.id);
      this.lowerBody(child, command.flags ?? [], command.args ?? [], command.commands ?? []);
    }
  }

  private lowerFlag(node: DraftNode, flag: RawFlag): FlagSpec | undefined {
    const short = (flag.short ?? []).map(value => value.replace(/^-+/, ""));
    const long = (flag.long ?? []).map(value => value.replace(/^-+/, ""));
    let value: { name: string; many: boolean } | undefined;

    if (flag.usage !== undefined) {
      const parsed = parseFlagUsage(flag.usage);
      if (!parsed.ok) {
        this.errors.push(new DefinitionError(parsed.message, node.path));
        return undefined;
      }
      short.unshift(...parsed.value.short);
      long.unshift(...parsed.value.long);
      if (parsed.value.value) {
        value = { name: parsed.value.value.name, many: parsed.value.value.many };
      }
    }

    if (short.length === 0 && long.length === 0) {
      const label = flag.name ?? flag.usage ?? "<unnamed>";
      this.errors.push(new DefinitionError(`flag '${label}' declares no short or long trigger`, node.path));
      return undefined;
    }
    const badShort = short.find(value => value.length !== 1);
    if (badShort !== undefined) {
      this.errors.push(new DefinitionError(`short trigger '${badShort}' must be a single character`, node.path));
      return undefined;
    }

    const name = flag.name ?? long[0] ?? short[0] ?? "";
    const choices = flag.arg?.choices ?? flag.choices;
    const complete = flag.arg?.complete ?? flag.complete;
    if (!value && (flag.arg !== undefined || choices !== undefined || complete !== undefined)) {
      value = { name: flag.arg?.name ?? name, many: false };
    }
    if (value && flag.arg?.name) {
      value.name = flag.arg.name;
    }
    if (value && flag.var) {
      value.many = true;
    }
    if (!value && flag.var) {
      this.errors.push(new ArityError(`flag '${name}' is marked var but takes no value`, node.path));
    }

    const arity: FlagArity = value ? (value.many ? "many" : "one") : "none";
    if (flag.count && arity !== "none") {
      this.errors.push(new ArityError(`count flag '${name}' cannot take a value`, node.path));
    }

    const spec: FlagSpec = {
      name,
      short,
      long,
      arity,
      count: flag.count === true && arity === "none",
      global: flag.global ?? false,
      hidden: flag.hide ?? false,
      required: flag.required ?? false,
      origin: node.id,
    };
    if (flag.negate !== undefined) {
      spec.negate = flag.negate.startsWith("-") ? flag.negate : `--${flag.negate}`;
    }
    if (flag.default !== undefined) spec.default = flag.default;
    if (flag.env !== undefined) spec.env = flag.env;
    if (flag.help !== undefined) spec.help = flag.help;
    if (flag.long_help !== undefined) spec.longHelp = flag.long_help;
    if (value) {
      spec.value = { name: value.name, provider: this.lowerProvider(node, complete, choices, value.name) };
    }
    return spec;
  }

  private lowerArg(node: DraftNode, arg: RawArg, index: number): ArgumentSpec | undefined {
    let name = arg.name;
    let required = arg.required ?? true;
    let variadic = arg.var ?? false;
    if (arg.usage !== undefined) {
      const parsed = parseArgUsage(arg.usage);
      if (!parsed.ok) {
        this.errors.push(new DefinitionError(parsed.message, node.path));
        return undefined;
      }
      name = name ?? parsed.value.name;
      required = arg.required ?? parsed.value.required;
      variadic = variadic || parsed.value.variadic;
    }
    if (!name) {
      this.errors.push(new DefinitionError(`argument ${index + 1} declares neither a name nor a usage`, node.path));
      return undefined;
    }
    const arity: ArgumentArity = variadic ? "variadic" : required ? "one" : "optional";
    const spec: ArgumentSpec = {
      position: index,
      name,
      arity,
      required,
      provider: this.lowerProvider(node, arg.complete, arg.choices, name),
    };
    if (arg.default !== undefined) spec.default = arg.default;
    if (arg.help !== undefined) spec.help = arg.help;
    if (arg.long_help !== undefined) spec.longHelp = arg.long_help;
    return spec;
  }

  private checkArgs(node: DraftNode): void {
    node.args.forEach((arg, index) => {
      arg.position = index;
    });
    const variadic = node.args.filter(arg => arg.arity === "variadic");
    if (variadic.length > 1) {
      const names = variadic.map(arg => `'${arg.name}'`).join(", ");
      this.errors.push(new ArityError(`more than one variadic argument: ${names}`, node.path));
      return;
    }
    const [only] = variadic;
    if (only && only.position !== node.args.length - 1) {
      this.errors.push(new ArityError(`variadic argument '${only.name}' must be the last argument`, node.path));
    }
  }

  private checkOwnTriggers(node: DraftNode): void {
    const seen = new Set<string>();
    const reported = new Set<string>();
    for (const flag of node.flags) {
      for (const trigger of triggersOf(flag)) {
        if (seen.has(trigger) && !reported.has(trigger)) {
          this.errors.push(new DuplicateFlagError(trigger, node.path));
          reported.add(trigger);
        }
        seen.add(trigger);
      }
    }
  }

  /** Copy-down: runs in arena order, so a parent's effective flags are final before its children. */
  private inheritFlags(node: DraftNode): void {
    const parent = node.parent === null ? undefined : this.nodes[node.parent];
    const inherited = parent ? parent.effectiveFlags.filter(flag => flag.global) : [];
    const own = new Set(node.flags.flatMap(flag => triggersOf(flag)));
    const kept = inherited.filter(flag => !triggersOf(flag).some(trigger => own.has(trigger)));
    node.effectiveFlags = [...node.flags, ...kept];
  }

  private lowerProvider(
    node: DraftNode,
    complete: RawComplete | undefined,
    choices: RawChoice[] | undefined,
    valueName: string
  ): CompletionProvider {
    if (choices !== undefined) {
      if (typeof complete === "object" && complete.run !== undefined) {
        this.errors.push(
          new CompletionSpecError(`'${valueName}' declares both choices and a run helper`, node.path)
        );
        return { kind: "none" };
      }
      if (complete === undefined) return staticProvider(choices);
    }
    if (complete === undefined) {
      const named = this.namedCompleter(valueName) ?? this.namedCompleter(valueName.toLowerCase());
      if (named !== undefined) return this.lowerNamed(node, named, valueName);
      const builtin = BUILTIN_COMPLETERS.get(valueName.toLowerCase());
      return builtin ? { kind: "path", entry: builtin } : { kind: "none" };
    }
    if (typeof complete === "string") {
      const named = this.namedCompleter(complete);
      if (named !== undefined) return this.lowerNamed(node, named, complete);
      const builtin = BUILTIN_COMPLETERS.get(complete);
      if (builtin) return { kind: "path", entry: builtin };
      this.errors.push(new CompletionSpecError(`unknown completer '${complete}' for '${valueName}'`, node.path));
      return { kind: "none" };
    }
    return this.lowerObject(node, complete, valueName, choices);
  }

  private namedCompleter(name: string): RawComplete | undefined {
    return Object.hasOwn(this.raw.complete, name) ? this.raw.complete[name] : undefined;
  }

  /** Entries of the root `complete` map may name a builtin but never another entry. */
  private lowerNamed(node: DraftNode, named: RawComplete, label: string): CompletionProvider {
    if (typeof named === "string") {
      const builtin = BUILTIN_COMPLETERS.get(named);
      if (builtin) return { kind: "path", entry: builtin };
      this.errors.push(new CompletionSpecError(`completer '${label}' refers to unknown builtin '${named}'`, node.path));
      return { kind: "none" };
    }
    return this.lowerObject(node, named, label, undefined);
  }

  private lowerObject(
    node: DraftNode,
    spec: RawCompleteObject,
    label: string,
    outerChoices: RawChoice[] | undefined
  ): CompletionProvider {
    const choices = spec.choices ?? outerChoices;
    if (spec.run !== undefined) {
      if (choices !== undefined) {
        this.errors.push(new CompletionSpecError(`'${label}' declares both choices and a run helper`, node.path));
        return { kind: "none" };
      }
      if (spec.run.trim() === "") {
        this.errors.push(new CompletionSpecError(`helper for '${label}' has an empty template`, node.path));
        return { kind: "none" };
      }
      try {
        compileHelperTemplate(spec.run);
      } catch (error) {
        const reason = error instanceof Error ? error.message.split("\n")[0] : String(error);
        this.errors.push(
          new CompletionSpecError(`helper template for '${label}' is malformed: ${reason}`, node.path)
        );
        return { kind: "none" };
      }
      if (spec.timeout !== undefined && !(Number.isFinite(spec.timeout) && spec.timeout > 0)) {
        this.errors.push(
          new CompletionSpecError(`helper timeout for '${label}' must be a positive number of milliseconds`, node.path)
        );
        return { kind: "none" };
      }
      return spec.timeout === undefined
        ? { kind: "helper", run: spec.run, descriptions: spec.descriptions ?? false }
        : { kind: "helper", run: spec.run, timeoutMs: spec.timeout, descriptions: spec.descriptions ?? false };
    }
    if (choices !== undefined) return staticProvider(choices);
    if (spec.type === "none") return { kind: "none" };
    if (spec.type !== undefined || spec.extensions !== undefined || spec.glob !== undefined) {
      const entry: PathEntryKind = spec.type === "file" ? "file" : spec.type === "dir" ? "dir" : "any";
      const extensions = spec.extensions?.map(ext => (ext.startsWith(".") ? ext : `.${ext}`));
      return {
        kind: "path",
        entry,
        ...(extensions ? { extensions } : {}),
        ...(spec.glob !== undefined ? { glob: spec.glob } : {}),
      };
    }
    return { kind: "none" };
  }
}

function staticProvider(choices: RawChoice[]): CompletionProvider {
  const values: StaticValue[] = choices.map(choice =>
    typeof choice === "string"
      ? { value: choice }
      : choice.help === undefined
        ? { value: choice.value }
        : { value: choice.value, description: choice.help }
  );
  return { kind: "static", values };
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}

/** Every validation problem in the raw tree, in source order. */
export function validateSpec(raw: RawSpec): ModelError[] {
  const builder = new ModelBuilder(raw);
  builder.build();
  return [...builder.errors];
}

/**
 * Lowers a merged raw tree into a frozen {@link CommandModel}. Throws the first validation
 * problem; the remaining ones ride along on its `related` list.
 */
export function buildModel(raw: RawSpec, options: BuildOptions = {}): CommandModel {
  const builder = new ModelBuilder(raw);
  const drafts = builder.build();
  const [first, ...rest] = builder.errors;
  if (first) {
    first.related = rest;
    throw first;
  }
  const nodes: CommandNode[] = drafts.map(draft => {
    const node: CommandNode = {
      id: draft.id,
      name: draft.name,
      aliases: draft.aliases,
      parent: draft.parent,
      children: draft.children,
      path: draft.path,
      flags: draft.flags,
      effectiveFlags: draft.effectiveFlags,
      args: draft.args,
      help: draft.help,
      hidden: draft.hidden,
      subcommandRequired: draft.subcommandRequired,
    };
    if (draft.hooks) node.hooks = draft.hooks;
    return node;
  });
  const model: CommandModel = {
    name: raw.name,
    bin: raw.bin ?? raw.name,
    nodes,
    root: 0,
    sources: [...(options.sources ?? [])],
  };
  if (raw.version !== undefined) model.version = raw.version;
  if (raw.about !== undefined) model.about = raw.about;
  if (raw.long_about !== undefined) model.longAbout = raw.long_about;
  if (raw.usage !== undefined) model.usage = raw.usage;
  return deepFreeze(model);
}
