import { Builtins, Cli } from "clipanion";
import { ConfigShowCommand, ConfigValidateCommand } from "./commands/config-cmd.js";
import { RulesInspectCommand, RulesResetCommand, RulesValidateCommand } from "./commands/rules-cmd.js";

export function createCli(): Cli {
  const cli = new Cli({
    binaryLabel: "Emote Reactor",
    binaryName: "emote-reactor",
    binaryVersion: "0.1.0",
  });

  cli.register(Builtins.HelpCommand);
  cli.register(Builtins.VersionCommand);

  // Rule file commands
  cli.register(RulesValidateCommand);
  cli.register(RulesResetCommand);
  cli.register(RulesInspectCommand);

  // Config commands
  cli.register(ConfigShowCommand);
  cli.register(ConfigValidateCommand);

  return cli;
}
