export type { CompletionTable, EmitOptions, PositionalSlot, Suggestion, TableNode, ValueAction, ValueFlag } from "./shared.js";
export type { FigArg, FigGeneratorRef, FigOption, FigSpec, FigSubcommand, FigSuggestion } from "./fig.js";
export type { DocCommand, DocFormat, DocItem, DocOptions } from "./docs.js";

export { emitBash } from "./bash.js";
export { emitZsh } from "./zsh.js";
export { emitFish } from "./fish.js";
export { COMPLETE_WORD_GENERATOR, buildFigSpec, emitFig } from "./fig.js";
export { actionFor, buildTable, nodeKey, runtimeCommand } from "./shared.js";
export { fishQuote, posixQuote, zshDescribeItem } from "./quote.js";
export {
  DOC_FORMATS,
  argUsage,
  docCommands,
  flagUsage,
  isDocFormat,
  renderDocs,
  renderHelp,
  renderManpage,
  renderMarkdown,
  roff,
  usageLine,
} from "./docs.js";

import type { CommandModel, ShellKind } from "@cmdspec/core";
import { emitBash } from "./bash.js";
import { emitFig } from "./fig.js";
import { emitFish } from "./fish.js";
import type { EmitOptions } from "./shared.js";
import { emitZsh } from "./zsh.js";

/** Renders the completion artifact for one shell. */
export function emit(model: CommandModel, kind: ShellKind, options: EmitOptions = {}): string {
  switch (kind) {
    case "bash":
      return emitBash(model, options);
    case "zsh":
      return emitZsh(model, options);
    case "fish":
      return emitFish(model, options);
    case "fig":
      return emitFig(model, options);
  }
}

/** Conventional file name for a shell's completion artifact. */
export function completionFileName(bin: string, kind: ShellKind): string {
  switch (kind) {
    case "bash":
      return bin;
    case "zsh":
      return `_${bin}`;
    case "fish":
      return `${bin}.fish`;
    case "fig":
      return `${bin}.ts`;
  }
}
