import path from "node:path";
import fs from "fs-extra";
import { Command, Option } from "clipanion";
import {
  buildModel,
  createLogger,
  formatError,
  loadSpec,
  loadSpecString,
  parseLogLevel,
  type CommandModel,
  type LoadedSpec,
  type Logger,
} from "@cmdspec/core";
import { resolveSettings, type Settings } from "../config/settings.js";

export type SpecInput = {
  loaded: LoadedSpec;
  model: CommandModel;
  /** Absolute path of the spec file; absent for inline specs. */
  specFile?: string;
};

export abstract class CmdspecCommand extends Command {
  file = Option.String("-f,--file", { description: "Spec file to read" });

  spec = Option.String("-s,--spec", { description: "Spec document passed inline" });

  logLevel = Option.String("--log-level", { description: "silent, error, warn, info, debug or trace" });

  protected resolveSettings(overrides: Partial<Settings> = {}, quiet = false): Settings {
    const extra: Partial<Settings> = { ...overrides };
    if (this.logLevel !== undefined) {
      const level = parseLogLevel(this.logLevel);
      if (!level) {
        throw new Error(`unknown log level '${this.logLevel}'`);
      }
      extra.logLevel = level;
    } else if (quiet && this.context.env.CMDSPEC_LOG_LEVEL === undefined) {
      extra.logLevel = "error";
    }
    return resolveSettings({
      env: this.context.env,
      overrides: extra,
      ...(this.context.env.HOME ? { homeDir: this.context.env.HOME } : {}),
    });
  }

  protected createLogger(settings: Settings): Logger {
    return createLogger({
      level: settings.logLevel,
      stream: this.context.stderr,
      color: this.context.colorDepth > 1,
    });
  }

  protected async loadInput(): Promise<SpecInput> {
    if (this.file !== undefined && this.spec !== undefined) {
      throw new Error("pass either --file or --spec, not both");
    }
    if (this.file !== undefined) {
      const specFile = path.resolve(this.file);
      const loaded = await loadSpec(specFile);
      return { loaded, model: buildModel(loaded.raw, { sources: loaded.sources }), specFile };
    }
    if (this.spec !== undefined) {
      const loaded = await loadSpecString(this.spec, { baseDir: process.cwd() });
      return { loaded, model: buildModel(loaded.raw, { sources: loaded.sources }) };
    }
    throw new Error("pass a spec with --file <path> or --spec <text>");
  }

  /** Environment for helper processes, without unset entries. */
  protected helperEnv(): Record<string, string> {
    const env: Record<string, string> = {};
    for (const [key, value] of Object.entries(this.context.env)) {
      if (value !== undefined) env[key] = value;
    }
    return env;
  }

  protected async writeOutput(text: string, out: string | undefined, logger: Logger): Promise<void> {
    if (out === undefined) {
      this.context.stdout.write(text);
      return;
    }
    const target = path.resolve(out);
    await fs.outputFile(target, text);
    logger.info(`wrote ${target}`);
  }

  protected fail(error: unknown): number {
    this.context.stderr.write(`${formatError(error)}\n`);
    return 1;
  }
}
