import { Command, Option } from "clipanion";
import { parse } from "shell-quote";
import { SHELL_KINDS, completeWord, execaInvoker, formatCandidates, isShellKind } from "@cmdspec/core";
import { parseTimeout } from "../config/settings.js";
import { CmdspecCommand } from "./base.js";

/** Words of a command line as the shell would split them; trailing whitespace opens an empty word. */
export function splitCommandLine(line: string): string[] {
  const words = parse(line).filter((entry): entry is string => typeof entry === "string");
  if (line.length === 0 || /\s$/.test(line)) words.push("");
  return words;
}

export class CompleteWordCommand extends CmdspecCommand {
  static paths = [["complete-word"], ["cw"]];

  static usage = Command.Usage({
    description: "Print completion candidates for one word of a command line",
    details: `
      Words after \`--\` are the command line, starting with the program name. \`--cword\` is the index of the word
      under the cursor and defaults to the last one. Candidates are printed one per line in the format the
      \`--shell\` expects.
    `,
    examples: [["Complete the third word", "$0 complete-word --shell bash -f tool.yaml --cword 2 -- tool build --ta"]],
  });

  shell = Option.String("--shell", "bash", { description: "Output format: bash, zsh, fish or fig" });

  cword = Option.String("--cword", { description: "Index of the word under the cursor" });

  line = Option.String("--line", { description: "Whole command line, split like a POSIX shell" });

  timeout = Option.String("--timeout", { description: "Helper timeout in milliseconds" });

  words = Option.Rest();

  async execute() {
    try {
      if (!isShellKind(this.shell)) {
        throw new Error(`unknown shell '${this.shell}'; expected one of ${SHELL_KINDS.join(", ")}`);
      }
      let timeout: number | undefined;
      if (this.timeout !== undefined) {
        const parsed = parseTimeout(this.timeout);
        if (parsed === null) {
          throw new Error(`--timeout must be a positive number of milliseconds, got '${this.timeout}'`);
        }
        timeout = parsed;
      }
      const settings = this.resolveSettings(timeout !== undefined ? { helperTimeoutMs: timeout } : {}, true);
      const logger = this.createLogger(settings);

      const words = this.line !== undefined ? splitCommandLine(this.line) : this.commandWords();
      if (words.length === 0) {
        throw new Error("pass the command line after -- or with --line");
      }
      const cword = this.cursorIndex(words);
      const input = await this.loadInput();

      const candidates = await completeWord(input.model, this.shell, words, cword, {
        caseSensitive: settings.caseSensitive,
        helperTimeoutMs: settings.helperTimeoutMs,
        invoker: execaInvoker,
        env: this.helperEnv(),
        logger,
      });
      for (const line of formatCandidates(this.shell, candidates)) {
        this.context.stdout.write(`${line}\n`);
      }
      return 0;
    } catch (error) {
      return this.fail(error);
    }
  }

  private commandWords(): string[] {
    const [first, ...rest] = this.words;
    return first === "--" ? rest : [...this.words];
  }

  private cursorIndex(words: readonly string[]): number {
    if (this.cword === undefined || this.line !== undefined) return words.length - 1;
    const index = Number(this.cword);
    if (!Number.isInteger(index) || index < 0) {
      throw new Error(`--cword must be a non-negative integer, got '${this.cword}'`);
    }
    return index;
  }
}
