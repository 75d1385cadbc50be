import { Command, Option } from "clipanion";
import { DOC_FORMATS, isDocFormat, renderDocs } from "@cmdspec/emit";
import { CmdspecCommand } from "./base.js";

export class DocsCommand extends CmdspecCommand {
  static paths = [["docs"]];

  static usage = Command.Usage({
    description: "Render help text, Markdown or a manpage",
    examples: [
      ["Print a manpage", "$0 docs --format manpage -f tool.yaml"],
      ["Help for one subcommand", "$0 docs --command 'plugin install' -f tool.yaml"],
    ],
  });

  format = Option.String("--format", "help", { description: "help, markdown or manpage" });

  command = Option.String("--command", { description: "Command path for --format help" });

  out = Option.String("-o,--out", { description: "File to write instead of stdout" });

  bin = Option.String("--bin", { description: "Binary name shown in usage lines" });

  async execute() {
    try {
      if (!isDocFormat(this.format)) {
        throw new Error(`unknown format '${this.format}'; expected one of ${DOC_FORMATS.join(", ")}`);
      }
      const settings = this.resolveSettings();
      const logger = this.createLogger(settings);
      const input = await this.loadInput();
      const text = renderDocs(input.model, this.format, {
        ...(this.bin ? { bin: this.bin } : {}),
        ...(this.command ? { command: this.command.split(/\s+/).filter(Boolean) } : {}),
      });
      await this.writeOutput(text, this.out, logger);
      return 0;
    } catch (error) {
      return this.fail(error);
    }
  }
}
