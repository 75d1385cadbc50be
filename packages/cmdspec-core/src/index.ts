export type { BuildOptions } from "./builder.js";
export type { CompleteWordOptions, WalkState } from "./complete-word.js";
export type { SourceLocation, ErrorKind } from "./errors.js";
export type { HelperInvoker, HelperRequest, HelperResult } from "./invoker.js";
export type { LoadOptions, LoadStringOptions, LoadedSpec } from "./loader.js";
export type { LogLevel, Logger, LoggerOptions } from "./logger.js";
export type {
  ArgumentArity,
  ArgumentSpec,
  CommandHooks,
  CommandId,
  CommandModel,
  CommandNode,
  CompletionProvider,
  FlagArity,
  FlagSpec,
  FlagValue,
  PathEntryKind,
  StaticValue,
} from "./model.js";
export type { RawArg, RawCommand, RawComplete, RawFlag, RawSpec } from "./raw.js";
export type { Candidate, ResolveContext, ResolveOptions, ResolveRequest } from "./resolver.js";
export type { ShellKind } from "./shells.js";
export type { HelperTemplateContext } from "./template.js";

export { buildModel, validateSpec } from "./builder.js";
export { completeWord, walkWords } from "./complete-word.js";
export {
  ArityError,
  CmdspecError,
  CompletionProviderError,
  CompletionSpecError,
  DefinitionError,
  DuplicateFlagError,
  EmitError,
  IncludeError,
  ModelError,
  ParseError,
  formatError,
  isCmdspecError,
} from "./errors.js";
export { formatCandidates } from "./format.js";
export { execaInvoker } from "./invoker.js";
export { extractScriptSpec, loadSpec, loadSpecString, parseSpecDocument } from "./loader.js";
export { LOG_LEVELS, createLogger, parseLogLevel, silentLogger } from "./logger.js";
export {
  argumentAt,
  childrenOf,
  findChild,
  findCommand,
  findFlag,
  getNode,
  longTriggers,
  rootNode,
  shortTriggers,
  takesValue,
  triggersOf,
  visibleChildren,
  walkModel,
} from "./model.js";
export { DEFAULT_HELPER_TIMEOUT_MS, matchesPrefix, parseHelperOutput, resolve, resolveAll } from "./resolver.js";
export { SHELL_KINDS, isShellKind } from "./shells.js";
export { hasTemplateTags } from "./template.js";
export { parseArgUsage, parseFlagUsage } from "./usage.js";

import { buildModel } from "./builder.js";
import { loadSpec, loadSpecString, type LoadOptions, type LoadStringOptions } from "./loader.js";
import type { CommandModel } from "./model.js";

/** Loads a spec file with its includes and builds the frozen model. */
export async function loadModel(file: string, options: LoadOptions = {}): Promise<CommandModel> {
  const loaded = await loadSpec(file, options);
  return buildModel(loaded.raw, { sources: loaded.sources });
}

export async function loadModelString(text: string, options: LoadStringOptions = {}): Promise<CommandModel> {
  const loaded = await loadSpecString(text, options);
  return buildModel(loaded.raw, { sources: loaded.sources });
}
