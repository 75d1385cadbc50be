import { Command } from "clipanion";
import { formatError, loadSpec, loadSpecString, validateSpec } from "@cmdspec/core";
import { CmdspecCommand } from "./base.js";

export class LintCommand extends CmdspecCommand {
  static paths = [["lint"]];

  static usage = Command.Usage({
    description: "Report every problem in a spec instead of stopping at the first",
  });

  async execute() {
    try {
      const settings = this.resolveSettings();
      const logger = this.createLogger(settings);
      const loaded =
        this.file !== undefined
          ? await loadSpec(this.file)
          : this.spec !== undefined
            ? await loadSpecString(this.spec, { baseDir: process.cwd() })
            : undefined;
      if (!loaded) {
        throw new Error("pass a spec with --file <path> or --spec <text>");
      }
      logger.debug(`read ${loaded.sources.length} document(s), ${loaded.digest}`);

      const problems = validateSpec(loaded.raw);
      for (const problem of problems) {
        this.context.stderr.write(`${formatError(problem)}\n`);
      }
      if (problems.length > 0) {
        this.context.stderr.write(`${problems.length} problem(s) found\n`);
        return 1;
      }
      this.context.stdout.write(`${loaded.raw.name}: no problems found\n`);
      return 0;
    } catch (error) {
      return this.fail(error);
    }
  }
}
