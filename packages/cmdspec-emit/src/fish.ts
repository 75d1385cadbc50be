import type { CommandModel } from "@cmdspec/core";
import { commentBlock, fishQuote } from "./quote.js";
import {
  buildTable,
  requireSpecFile,
  runtimeCommand,
  type CompletionTable,
  type EmitOptions,
  type Suggestion,
  type ValueAction,
} from "./shared.js";

type Arm = { condition: string; body: string[] };

function chain(arms: readonly Arm[], indent: string): string[] {
  if (arms.length === 0) return [];
  const lines: string[] = [];
  arms.forEach((arm, index) => {
    lines.push(`${indent}${index === 0 ? "if" : "else if"} ${arm.condition}`);
    lines.push(...arm.body.map(line => `${indent}    ${line}`));
  });
  lines.push(`${indent}end`);
  return lines;
}

/** Single-quoted literal with an unquoted `\t` joining the description. */
function item(entry: Suggestion): string {
  return entry.description ? `${fishQuote(entry.value)}\\t${fishQuote(entry.description)}` : fishQuote(entry.value);
}

function printItems(items: readonly Suggestion[]): string {
  return `printf '%s\\n' ${items.map(item).join(" ")}`;
}

function contains(keys: readonly string[], subject: string): string {
  return `contains -- ${subject} ${keys.map(fishQuote).join(" ")}`;
}

function action(fn: string, value: ValueAction): string {
  switch (value.kind) {
    case "words":
      return printItems(value.values);
    case "files":
      return [`${fn}_files`, value.entry, '"$cur"', ...value.patterns.map(fishQuote)].join(" ");
    case "inline":
      return `sh -c ${fishQuote(value.command)} 2>/dev/null`;
    case "runtime":
      return `${fn}_runtime`;
    case "none":
      return "true";
  }
}

function helperFunctions(table: CompletionTable, fn: string, runtime: string[] | undefined): string[] {
  const lines = [
    `function ${fn}_files`,
    "    set -l entry $argv[1]",
    "    set -l cur $argv[2]",
    "    set -l patterns $argv",
    "    set -e patterns[1..2]",
    '    for candidate in (__fish_complete_path "$cur")',
    "        set -l name (string split -f 1 \\t -- $candidate)",
    "        if string match -q -- '*/' $name",
    "            echo $name",
    "        else if test $entry != dir",
    "            if test (count $patterns) -eq 0",
    "                echo $name",
    "                continue",
    "            end",
    "            set -l base (string replace -r '.*/' '' -- $name)",
    "            for pattern in $patterns",
    "                if string match -q -- $pattern $base",
    "                    echo $name",
    "                    break",
    "                end",
    "            end",
    "        end",
    "    end",
    "end",
    "",
  ];
  if (runtime) {
    lines.push(
      `function ${fn}_runtime`,
      "    set -l words (commandline -opc)",
      `    ${runtime.map(fishQuote).join(" ")} --cword (count $words) -- $words (commandline -ct) 2>/dev/null`,
      "end",
      ""
    );
  }
  const takes = table.nodes.flatMap(node =>
    node.valueFlags.flatMap(flag => flag.triggers.map(trigger => `${node.key}:${trigger}`))
  );
  lines.push(`function ${fn}_takes`, takes.length > 0 ? `    ${contains(takes, "$argv[1]")}` : "    return 1", "end", "");

  const values = table.nodes.flatMap(node =>
    node.valueFlags.map(flag => ({
      condition: contains(
        flag.triggers.map(trigger => `${node.key}:${trigger}`),
        "$argv[1]"
      ),
      body: [action(fn, flag.action)],
    }))
  );
  lines.push(`function ${fn}_value`, "    set -l cur $argv[2]", ...chain(values, "    "), "end", "");
  return lines;
}

/** A fish completion function that walks the command tree and prints every candidate. */
export function emitFish(model: CommandModel, options: EmitOptions = {}): string {
  const table = buildTable(model, options);
  const specFile = requireSpecFile(table, "fish", options);
  const runtime = specFile === undefined ? undefined : runtimeCommand("fish", specFile, options);
  const fn = `_${table.fn}`;

  const descents = table.nodes.flatMap(node =>
    node.children.map(child => ({
      condition: contains(
        child.names.map(name => `${node.key}:${name}`),
        '"$node:$w"'
      ),
      body: [`set node ${child.key}`, "continue"],
    }))
  );
  const flagArms = table.nodes
    .filter(node => node.flags.length > 0)
    .map(node => ({ condition: `test $node = ${node.key}`, body: [printItems(node.flags)] }));
  const commandArms = table.nodes
    .filter(node => node.commands.length > 0)
    .map(node => ({ condition: `test $node = ${node.key}`, body: [`set commands ${node.commands.map(item).join(" ")}`] }));
  const argArms = table.nodes.flatMap(node =>
    node.positionals.map(slot => ({
      condition: `test $node = ${node.key} -a $argi ${slot.variadic ? "-ge" : "-eq"} ${slot.position}`,
      body: [action(fn, slot.action)],
    }))
  );

  const lines: string[] = [
    ...commentBlock(options.header, "#"),
    `# fish completion for ${table.bin}`,
    "",
    ...helperFunctions(table, fn, runtime),
    `function ${fn}_complete`,
    "    set -l words (commandline -opc)",
    "    set -l cur (commandline -ct)",
    "    set -l node n0",
    "    set -l argi 0",
    "    set -l await ''",
    "    set -l dd 0",
    "    set -l i 1",
    "    while test $i -lt (count $words)",
    "        set i (math $i + 1)",
    "        set -l w $words[$i]",
    '        if test -n "$await"',
    "            set await ''",
    "            continue",
    "        end",
    "        if test $dd -eq 0; and test \"$w\" = '--'",
    "            set dd 1",
    "            continue",
    "        end",
    "        if test $dd -eq 0; and string match -q -- '-?*' \"$w\"",
    "            string match -q -- '--*=*' \"$w\"; and continue",
    "            set -l key $w",
    "            if not string match -q -- '--*' \"$w\"; and test (string length -- \"$w\") -gt 2",
    `                ${fn}_takes "$node:"(string sub -l 2 -- "$w"); and continue`,
    '                set key "-"(string sub -s -1 -- "$w")',
    "            end",
    `            ${fn}_takes "$node:$key"; and set await "$node:$key"`,
    "            continue",
    "        end",
  ];
  if (descents.length > 0) {
    lines.push("        if test $dd -eq 0 -a $argi -eq 0", ...chain(descents, "            "), "        end");
  }
  lines.push(
    "        set argi (math $argi + 1)",
    "    end",
    "",
    '    if test -n "$await"',
    `        ${fn}_value $await "$cur"`,
    "    else if test $dd -eq 0; and string match -q -- '--*=*' \"$cur\"",
    '        set -l flag (string split -m 1 -f 1 = -- "$cur")',
    `        for value in (${fn}_value "$node:$flag" (string split -m 1 -f 2 = -- "$cur"))`,
    '            echo "$flag=$value"',
    "        end",
    "    else if test $dd -eq 0; and string match -q -- '-*' \"$cur\"",
    ...chain(flagArms, "        "),
    "    else"
  );
  if (commandArms.length > 0) {
    lines.push(
      "        if test $dd -eq 0 -a $argi -eq 0",
      "            set -l commands",
      ...chain(commandArms, "            "),
      "            set -l matched",
      "            for candidate in $commands",
      '                if test -z "$cur"; or test (string sub -l (string length -- "$cur") -- "$candidate") = "$cur"',
      "                    set -a matched $candidate",
      "                end",
      "            end",
      "            if test (count $matched) -gt 0",
      "                printf '%s\\n' $matched",
      "                return",
      "            end",
      "        end"
    );
  }
  lines.push(...chain(argArms, "        "), "    end", "end", "", `complete -c ${fishQuote(table.bin)} -f -a '(${fn}_complete)'`, "");
  return lines.join("\n");
}
