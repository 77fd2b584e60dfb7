import { Command, Option } from "clipanion";
import { loadConfig, readConfigFile } from "../../config/loader.js";

export class ConfigShowCommand extends Command {
  static override paths = [["config", "show"]];

  static override usage = Command.Usage({
    description: "Show the effective configuration, defaults included",
    examples: [
      ["Show config", "emote-reactor config show"],
      ["Show a specific file", "emote-reactor config show ./reactor.config.json"],
    ],
  });

  configFile = Option.String({ name: "path", required: false });

  async execute(): Promise<void> {
    let config;
    try {
      config = loadConfig(this.configFile);
    } catch (err) {
      this.context.stdout.write(
        `Failed to load config: ${err instanceof Error ? err.message : String(err)}\n`,
      );
      process.exitCode = 1;
      return;
    }

    this.context.stdout.write(JSON.stringify(config, null, 2) + "\n");
  }
}

export class ConfigValidateCommand extends Command {
  static override paths = [["config", "validate"]];

  static override usage = Command.Usage({
    description: "Validate a configuration file",
    examples: [
      ["Validate default config", "emote-reactor config validate"],
      ["Validate specific file", "emote-reactor config validate ./my-config.json"],
    ],
  });

  configFile = Option.String({ name: "path", required: false });

  async execute(): Promise<void> {
    const result = readConfigFile(this.configFile);
    switch (result.status) {
      case "missing":
        this.context.stdout.write(`Config file not found: ${result.path}\n`);
        process.exitCode = 1;
        return;
      case "invalid":
        this.context.stdout.write(`Config is INVALID: ${result.path}\n  ${result.reason}\n`);
        process.exitCode = 1;
        return;
      case "valid":
        this.context.stdout.write(`Config is valid: ${result.path}\n`);
    }
  }
}
