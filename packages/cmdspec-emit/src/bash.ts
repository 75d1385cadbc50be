import type { CommandModel } from "@cmdspec/core";
import { commentBlock, posixQuote } from "./quote.js";
import {
  buildTable,
  requireSpecFile,
  runtimeCommand,
  type CompletionTable,
  type EmitOptions,
  type TableNode,
  type ValueAction,
} from "./shared.js";

function pattern(keys: readonly string[]): string {
  return keys.map(posixQuote).join("|");
}

function action(table: CompletionTable, value: ValueAction): string {
  const fn = table.fn;
  switch (value.kind) {
    case "words":
      return [`${fn}_words "$cur"`, ...value.values.map(entry => posixQuote(entry.value))].join(" ");
    case "files":
      return [`${fn}_files`, value.entry, '"$cur"', ...value.patterns.map(posixQuote)].join(" ");
    case "inline":
      return `${fn}_lines "$cur" < <(sh -c ${posixQuote(value.command)} 2>/dev/null)`;
    case "runtime":
      return `${fn}_runtime`;
    case "none":
      return ":";
  }
}

function positionalArms(table: CompletionTable, node: TableNode): string[] {
  return node.positionals.map(slot => {
    const index = slot.variadic ? "*" : String(slot.position);
    return `      ${posixQuote(node.key)}:${index}) ${action(table, slot.action)} ;;`;
  });
}

function helperFunctions(table: CompletionTable, runtime: string[] | undefined): string[] {
  const fn = table.fn;
  const lines = [
    `${fn}_add() {`,
    '  local cur="$1" word="$2" quoted',
    "  if [[ $cur == [\\\"\\']* ]]; then",
    '    [[ $word == "${cur:1}"* ]] && COMPREPLY+=("$word")',
    "    return 0",
    "  fi",
    "  printf -v quoted '%q' \"$word\"",
    '  [[ $quoted == "$cur"* ]] && COMPREPLY+=("$quoted")',
    "  return 0",
    "}",
    "",
    `${fn}_words() {`,
    '  local cur="$1" word',
    "  shift",
    '  for word in "$@"; do',
    `    ${fn}_add "$cur" "$word"`,
    "  done",
    "}",
    "",
    `${fn}_lines() {`,
    '  local cur="$1" line',
    "  while IFS= read -r line; do",
    `    [[ -n $line ]] && ${fn}_add "$cur" "$line"`,
    "  done",
    "}",
    "",
    `${fn}_files() {`,
    '  local entry="$1" cur="$2" path pattern',
    "  shift 2",
    "  compopt -o filenames 2>/dev/null",
    "  while IFS= read -r path; do",
    '    COMPREPLY+=("$path")',
    '  done < <(compgen -d -- "$cur")',
    "  [[ $entry == dir ]] && return",
    "  while IFS= read -r path; do",
    "    [[ -d $path ]] && continue",
    "    if (( $# == 0 )); then",
    '      COMPREPLY+=("$path")',
    "      continue",
    "    fi",
    '    for pattern in "$@"; do',
    "      if [[ ${path##*/} == $pattern ]]; then",
    '        COMPREPLY+=("$path")',
    "        break",
    "      fi",
    "    done",
    '  done < <(compgen -f -- "$cur")',
    "}",
    "",
  ];
  if (runtime) {
    lines.push(
      `${fn}_runtime() {`,
      "  local line",
      "  while IFS= read -r line; do",
      `    [[ -n $line ]] && ${fn}_add "$cur" "$line"`,
      `  done < <(${runtime.map(posixQuote).join(" ")} --cword "$cword" -- "\${words[@]}" 2>/dev/null)`,
      "}",
      ""
    );
  }
  return lines;
}

/** A bash completion script that walks the command tree with `case` tables. */
export function emitBash(model: CommandModel, options: EmitOptions = {}): string {
  const table = buildTable(model, options);
  const specFile = requireSpecFile(table, "bash", options);
  const runtime = specFile === undefined ? undefined : runtimeCommand("bash", specFile, options);
  const fn = table.fn;

  const takes = table.nodes.flatMap(node =>
    node.valueFlags.flatMap(flag => flag.triggers.map(trigger => `${node.key}:${trigger}`))
  );
  const values = table.nodes.flatMap(node =>
    node.valueFlags.map(
      flag =>
        `    ${pattern(flag.triggers.map(trigger => `${node.key}:${trigger}`))}) ${action(table, flag.action)} ;;`
    )
  );
  const descents = table.nodes.flatMap(node =>
    node.children.map(
      child => `        ${pattern(child.names.map(name => `${node.key}:${name}`))}) node=${child.key}; continue ;;`
    )
  );
  const flagArms = table.nodes
    .filter(node => node.flags.length > 0)
    .map(node => `      ${node.key}) ${fn}_words "$cur" ${node.flags.map(flag => posixQuote(flag.value)).join(" ")} ;;`);
  const commandArms = table.nodes
    .filter(node => node.commands.length > 0)
    .map(
      node => `        ${node.key}) ${fn}_words "$cur" ${node.commands.map(command => posixQuote(command.value)).join(" ")} ;;`
    );
  const argArms = table.nodes.flatMap(node => positionalArms(table, node));

  const lines: string[] = [
    ...commentBlock(options.header, "#"),
    `# bash completion for ${table.bin}`,
    "",
    ...helperFunctions(table, runtime),
    `${fn}_takes() {`,
    '  case "$1" in',
  ];
  if (takes.length > 0) lines.push(`    ${pattern(takes)}) return 0 ;;`);
  lines.push("  esac", "  return 1", "}", "", `${fn}_value() {`, '  local cur="$2"', '  case "$1" in', ...values, "  esac", "}", "");

  lines.push(
    `${fn}() {`,
    "  local cur words cword",
    "  if declare -F _get_comp_words_by_ref >/dev/null 2>&1; then",
    "    _get_comp_words_by_ref -n =: cur words cword",
    "  else",
    '    words=("${COMP_WORDS[@]}")',
    "    cword=$COMP_CWORD",
    '    cur="${COMP_WORDS[COMP_CWORD]}"',
    "  fi",
    "  COMPREPLY=()",
    "",
    '  local node=n0 argi=0 await="" dd=0 i w key',
    "  for ((i = 1; i < cword; i++)); do",
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
    `        ${fn}_takes "$node:\${w:0:2}" && continue`,
    '        key="-${w: -1}"',
    "      fi",
    `      ${fn}_takes "$node:$key" && await="$node:$key"`,
    "      continue",
    "    fi"
  );
  if (descents.length > 0) {
    lines.push("    if [[ $dd == 0 && $argi == 0 ]]; then", '      case "$node:$w" in', ...descents, "      esac", "    fi");
  }
  lines.push(
    "    argi=$((argi + 1))",
    "  done",
    "",
    "  if [[ -n $await ]]; then",
    '    [[ $cur == = ]] && cur=""',
    `    ${fn}_value "$await" "$cur"`,
    "  elif [[ $dd == 0 && $cur == --*=* ]]; then",
    `    ${fn}_value "$node:\${cur%%=*}" "\${cur#*=}"`,
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
    "    if (( ${#COMPREPLY[@]} == 0 )); then",
    '      case "$node:$argi" in',
    ...argArms,
    "      esac",
    "    fi",
    "  fi",
    "",
    "  if [[ $cur == *:* && $COMP_WORDBREAKS == *:* ]]; then",
    '    local colon="${cur%"${cur##*:}"}"',
    '    COMPREPLY=("${COMPREPLY[@]#"$colon"}")',
    "  fi",
    "  return 0",
    "}",
    "",
    `complete -F ${fn} ${posixQuote(table.bin)}`,
    ""
  );
  return lines.join("\n");
}
