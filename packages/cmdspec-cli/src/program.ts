import { Builtins, Cli } from "clipanion";
import { CompleteWordCommand } from "./commands/complete-word.js";
import { DocsCommand } from "./commands/docs.js";
import { GenerateCompletionCommand, GenerateFigCommand } from "./commands/generate.js";
import { LintCommand } from "./commands/lint.js";
import { CMDSPEC_VERSION } from "./version.js";

export function createCli(): Cli {
  const cli = new Cli({ binaryLabel: "cmdspec", binaryName: "cmdspec", binaryVersion: CMDSPEC_VERSION });

  cli.register(Builtins.HelpCommand);
  cli.register(Builtins.VersionCommand);
  cli.register(GenerateCompletionCommand);
  cli.register(GenerateFigCommand);
  cli.register(CompleteWordCommand);
  cli.register(DocsCommand);
  cli.register(LintCommand);

  return cli;
}
