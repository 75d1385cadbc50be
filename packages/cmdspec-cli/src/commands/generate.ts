import path from "node:path";
import fs from "fs-extra";
import { Command, Option } from "clipanion";
import { SHELL_KINDS, isShellKind } from "@cmdspec/core";
import { completionFileName, emit, emitFig, type EmitOptions } from "@cmdspec/emit";
import { provenanceHeader } from "../services/provenance.js";
import { CmdspecCommand, type SpecInput } from "./base.js";

function emitOptions(input: SpecInput, completer: string, bin: string | undefined): EmitOptions {
  return {
    header: provenanceHeader(input.loaded),
    completer,
    ...(input.specFile ? { specFile: input.specFile } : {}),
    ...(bin ? { bin } : {}),
  };
}

export class GenerateCompletionCommand extends CmdspecCommand {
  static paths = [["generate", "completion"]];

  static usage = Command.Usage({
    description: "Generate a shell completion script",
    examples: [
      ["Print the bash script", "$0 generate completion bash -f tool.yaml"],
      ["Write every shell's script", "$0 generate completion --all --out-dir completions -f tool.yaml"],
    ],
  });

  shell = Option.String({ required: false });

  all = Option.Boolean("--all", false, { description: "Emit every supported shell" });

  out = Option.String("-o,--out", { description: "File to write instead of stdout" });

  outDir = Option.String("--out-dir", { description: "Directory for --all" });

  bin = Option.String("--bin", { description: "Binary name the scripts register for" });

  completer = Option.String("--completer", { description: "Command scripts call back into" });

  async execute() {
    try {
      const settings = this.resolveSettings(this.completer ? { completer: this.completer } : {});
      const logger = this.createLogger(settings);
      const input = await this.loadInput();
      const options = emitOptions(input, settings.completer, this.bin);

      if (this.all) {
        if (this.shell !== undefined) {
          throw new Error("pass either a shell or --all, not both");
        }
        if (this.outDir === undefined) {
          throw new Error("--all needs --out-dir <dir>");
        }
        const dir = path.resolve(this.outDir);
        const bin = options.bin ?? input.model.bin;
        await Promise.all(
          SHELL_KINDS.map(async kind => {
            const target = path.join(dir, completionFileName(bin, kind));
            await fs.outputFile(target, emit(input.model, kind, options));
            logger.info(`wrote ${target}`);
          })
        );
        return 0;
      }

      if (this.shell === undefined) {
        throw new Error(`pass a shell (${SHELL_KINDS.join(", ")}) or --all`);
      }
      if (!isShellKind(this.shell)) {
        throw new Error(`unknown shell '${this.shell}'; expected one of ${SHELL_KINDS.join(", ")}`);
      }
      await this.writeOutput(emit(input.model, this.shell, options), this.out, logger);
      return 0;
    } catch (error) {
      return this.fail(error);
    }
  }
}

export class GenerateFigCommand extends CmdspecCommand {
  static paths = [["generate", "fig"]];

  static usage = Command.Usage({
    description: "Generate a Fig completion spec",
  });

  out = Option.String("-o,--out", { description: "File to write instead of stdout" });

  bin = Option.String("--bin", { description: "Binary name of the spec" });

  completer = Option.String("--completer", { description: "Command generators call back into" });

  async execute() {
    try {
      const settings = this.resolveSettings(this.completer ? { completer: this.completer } : {});
      const logger = this.createLogger(settings);
      const input = await this.loadInput();
      await this.writeOutput(emitFig(input.model, emitOptions(input, settings.completer, this.bin)), this.out, logger);
      return 0;
    } catch (error) {
      return this.fail(error);
    }
  }
}
