import type { CommandModel, CommandNode, FlagSpec } from "./model.js";
import { argumentAt, findChild, findFlag, rootNode, takesValue, triggersOf, visibleChildren } from "./model.js";
import { matchesPrefix, resolve, type Candidate, type ResolveOptions } from "./resolver.js";
import type { ShellKind } from "./shells.js";

export type WalkState = {
  node: CommandNode;
  /** Index of the next positional argument of `node`. */
  argIndex: number;
  /** Flag whose value the cursor token supplies. */
  awaiting?: FlagSpec;
  afterDashDash: boolean;
};

/**
 * Replays the words before the cursor: exact command names and aliases descend until the first
 * positional, flags are skipped along with the value they take, and `--` ends flag parsing.
 */
export function walkWords(model: CommandModel, words: readonly string[], cword: number): WalkState {
  const state: WalkState = { node: rootNode(model), argIndex: 0, afterDashDash: false };
  const end = Math.min(cword, words.length);
  for (let index = 1; index < end; index += 1) {
    const token = words[index] ?? "";
    if (state.awaiting) {
      // bash without bash-completion splits `--name=value` into three words.
      if (token !== "=") state.awaiting = undefined;
      continue;
    }
    if (!state.afterDashDash) {
      if (token === "--") {
        state.afterDashDash = true;
        continue;
      }
      if (token.startsWith("-") && token !== "-") {
        state.awaiting = flagAwaitingValue(state.node, token);
        continue;
      }
      if (state.argIndex === 0) {
        const child = findChild(model, state.node, token);
        if (child) {
          state.node = child;
          continue;
        }
      }
    }
    state.argIndex += 1;
  }
  return state;
}

function flagAwaitingValue(node: CommandNode, token: string): FlagSpec | undefined {
  if (token.startsWith("--")) {
    if (token.includes("=")) return undefined;
    const flag = findFlag(node, token);
    return flag && token !== flag.negate && takesValue(flag) ? flag : undefined;
  }
  const exact = findFlag(node, token);
  if (exact && token === exact.negate) return undefined;
  for (let index = 1; index < token.length; index += 1) {
    const flag = findFlag(node, `-${token.charAt(index)}`);
    if (!flag) return undefined;
    if (takesValue(flag)) {
      return index === token.length - 1 ? flag : undefined;
    }
  }
  return undefined;
}

export type CompleteWordOptions = ResolveOptions;

/**
 * Candidates for `words[cword]`. `words[0]` is the program name; the cursor may sit one past the
 * last word, in which case the current token is empty.
 */
export async function completeWord(
  model: CommandModel,
  shell: ShellKind,
  words: readonly string[],
  cword: number,
  options: CompleteWordOptions = {}
): Promise<Candidate[]> {
  const state = walkWords(model, words, cword);
  const word = words[cword] ?? "";
  const current = state.awaiting && word === "=" ? "" : word;
  const context = { words, cword };
  const caseSensitive = options.caseSensitive ?? true;
  const resolveOptions: ResolveOptions = { ...options, env: { ...options.env, CMDSPEC_SHELL: shell } };
  const node = state.node;

  if (state.awaiting?.value) {
    return resolve(node, state.awaiting.value.provider, current, context, resolveOptions);
  }

  if (!state.afterDashDash && current.startsWith("-")) {
    const equals = current.indexOf("=");
    if (current.startsWith("--") && equals > 0) {
      const trigger = current.slice(0, equals);
      const flag = findFlag(node, trigger);
      if (!flag?.value || trigger === flag.negate) return [];
      const values = await resolve(node, flag.value.provider, current.slice(equals + 1), context, resolveOptions);
      // bash and zsh replace only the text after `=`; fish and fig replace the whole token.
      if (shell === "bash" || shell === "zsh") return values;
      return values.map(candidate => ({ ...candidate, value: `${trigger}=${candidate.value}` }));
    }
    return flagCandidates(node, current, caseSensitive);
  }

  if (!state.afterDashDash && state.argIndex === 0) {
    const commands = commandCandidates(model, node, current, caseSensitive);
    if (commands.length > 0) return commands;
  }

  const arg = argumentAt(node, state.argIndex);
  if (arg) {
    return resolve(node, arg.provider, current, context, resolveOptions);
  }
  return [];
}

function flagCandidates(node: CommandNode, current: string, caseSensitive: boolean): Candidate[] {
  const seen = new Set<string>();
  const candidates: Candidate[] = [];
  for (const flag of node.effectiveFlags) {
    if (flag.hidden) continue;
    for (const trigger of triggersOf(flag)) {
      if (seen.has(trigger) || !matchesPrefix(trigger, current, caseSensitive)) continue;
      seen.add(trigger);
      candidates.push(flag.help ? { value: trigger, description: flag.help } : { value: trigger });
    }
  }
  return candidates;
}

function commandCandidates(
  model: CommandModel,
  node: CommandNode,
  current: string,
  caseSensitive: boolean
): Candidate[] {
  const candidates: Candidate[] = [];
  for (const child of visibleChildren(model, node)) {
    for (const name of [child.name, ...child.aliases]) {
      if (!matchesPrefix(name, current, caseSensitive)) continue;
      candidates.push(child.help.short ? { value: name, description: child.help.short } : { value: name });
    }
  }
  return candidates;
}
