import type { CommandModel } from "@cmdspec/core";
import { commentBlock, posixQuote, zshDescribeItem } from "./quote.js";
import {
  buildTable,
  requireSpecFile,
  runtimeCommand,
  type CompletionTable,
  type EmitOptions,
  type Suggestion,
  type ValueAction,
} from "./shared.js";

function pattern(keys: readonly string[]): string {
  return keys.map(posixQuote).join("|");
}

function describeCall(table: CompletionTable, tag: string, items: readonly Suggestion[]): string {
  return [`${table.fn}_describe ${tag}`, ...items.map(item => posixQuote(zshDescribeItem(item.value, item.description)))].join(
    " "
  );
}

function filesCall(value: Extract<ValueAction, { kind: "files" }>): string {
  if (value.entry === "dir") return "_path_files -/";
  const [only, ...rest] = value.patterns;
  if (only === undefined) return "_files";
  const glob = rest.length === 0 ? only : `(${value.patterns.join("|")})`;
  return `_files -g ${posixQuote(glob)}`;
}

function action(table: CompletionTable, value: ValueAction): string {
  switch (value.kind) {
    case "words":
      return describeCall(table, "values", value.values);
    case "files":
      return filesCall(value);
    case "inline":
      return `${table.fn}_lines ${posixQuote(value.command)}`;
    case "runtime":
      return `${table.fn}_runtime`;
    case "none":
      return ":";
  }
}

/** A zsh completion function in `#compdef` form, loadable from fpath or by sourcing. */
export function emitZsh(model: CommandModel, options: EmitOptions = {}): string {
  const table = buildTable(model, options);
  const specFile = requireSpecFile(table, "zsh", options);
  const fn = table.fn;

  const takes = table.nodes.flatMap(node =>
    node.valueFlags.flatMap(flag => flag.triggers.map(trigger => `${node.key}:${trigger}`))
  );
  const values = table.nodes.flatMap(node =>
    node.valueFlags.map(
      flag => `    ${pattern(flag.triggers.map(trigger => `${node.key}:${trigger}`))}) ${action(table, flag.action)} ;;`
    )
  );
  const descents = table.nodes.flatMap(node =>
    node.children.map(
      child => `        ${pattern(child.names.map(name => `${node.key}:${name}`))}) node=${child.key}; continue ;;`
    )
  );
  const flagArms = table.nodes
    .filter(node => node.flags.length > 0)
    .map(node => `      ${node.key}) ${describeCall(table, "flags", node.flags)} ;;`);
  const commandArms = table.nodes
    .filter(node => node.commands.length > 0)
    .map(node => `        ${node.key}) ${describeCall(table, "commands", node.commands)} && return 0 ;;`);
  const argArms = table.nodes.flatMap(node =>
    node.positionals.map(slot => {
      const index = slot.variadic ? "*" : String(slot.position);
      return `    ${posixQuote(node.key)}:${index}) ${action(table, slot.action)} ;;`;
    })
  );

  const lines: string[] = [
    `#compdef ${table.bin}`,
    ...commentBlock(options.header, "#"),
    `# zsh completion for ${table.bin}`,
    "",
    `${fn}_describe() {`,
    '  local tag="$1"',
    "  shift",
    "  local -a items",
    '  items=("$@")',
    '  (( $#items )) && _describe -t "$tag" "$tag" items',
    "}",
    "",
    `${fn}_lines() {`,
    "  local -a lines",
    '  lines=("${(@f)$(sh -c "$1" 2>/dev/null)}")',
    '  lines=("${(@)lines//:/\\\\:}")',
    `  ${fn}_describe values "\${(@)lines:#}"`,
    "}",
    "",
  ];
  if (specFile !== undefined) {
    const command = runtimeCommand("zsh", specFile, options).map(posixQuote).join(" ");
    lines.push(
      `${fn}_runtime() {`,
      "  local -a lines",
      `  lines=("\${(@f)$(${command} --cword $((CURRENT - 1)) -- "\${words[@]}" 2>/dev/null)}")`,
      `  ${fn}_describe values "\${(@)lines:#}"`,
      "}",
      ""
    );
  }
  lines.push(`${fn}_takes() {`, '  case "$1" in');
  if (takes.length > 0) lines.push(`    ${pattern(takes)}) return 0 ;;`);
  lines.push("  esac", "  return 1", "}", "", `${fn}_value() {`, '  case "$1" in', ...values, "  esac", "}", "");

  lines.push(
    `${fn}() {`,
    '  local cur="${words[CURRENT]}" node=n0 argi=0 await="" dd=0 i w key',
    "  for (( i = 2; i < CURRENT; i++ )); do",
    '    w="${words[i]}"',
    "    if [[ -n $await ]]; then",
    '      [[ $w == = ]] || await=""',
    "      continue",
    "    fi",
    "    if [[ $dd == 0 && $w == -- ]]; then",
    "      dd=1",
    "      continue",
    "    fi",
    "    if [[ $dd == 0 && $w == -?* ]]; then",
    "      [[ $w == --*=* ]] && continue",
    '      key="$w"',
    "      if [[ $w != --* && ${#w} -gt 2 ]]; then",
    `        ${fn}_takes "$node:\${w[1,2]}" && continue`,
    '        key="-${w[-1]}"',
    "      fi",
    `      ${fn}_takes "$node:$key" && await="$node:$key"`,
    "      continue",
    "    fi"
  );
  if (descents.length > 0) {
    lines.push("    if [[ $dd == 0 && $argi == 0 ]]; then", '      case "$node:$w" in', ...descents, "      esac", "    fi");
  }
  lines.push(
    "    argi=$(( argi + 1 ))",
    "  done",
    "",
    "  if [[ -n $await ]]; then",
    `    ${fn}_value "$await"`,
    "  elif [[ $dd == 0 && $cur == --*=* ]]; then",
    '    key="$node:${cur%%=*}"',
    "    compset -P '*='",
    `    ${fn}_value "$key"`,
    "  elif [[ $dd == 0 && $cur == -* ]]; then",
    '    case "$node" in',
    ...flagArms,
    "    esac",
    "  else"
  );
  if (commandArms.length > 0) {
    lines.push("    if [[ $dd == 0 && $argi == 0 ]]; then", '      case "$node" in', ...commandArms, "      esac", "    fi");
  }
  lines.push(
    '    case "$node:$argi" in',
    ...argArms.map(arm => `  ${arm}`),
    "    esac",
    "  fi",
    "}",
    "",
    "if [[ $zsh_eval_context[-1] == loadautofunc ]]; then",
    `  ${fn} "$@"`,
    "else",
    `  compdef ${fn} ${posixQuote(table.bin)}`,
    "fi",
    ""
  );
  return lines.join("\n");
}
