import { Command, Option } from "clipanion";
import { readFileSync } from "node:fs";
import { loadConfig, substituteEnv } from "../../config/loader.js";
import { getConfigPath, getStateDir } from "../../config/paths.js";
import { parseConfig } from "../../config/schema.js";
import type { TidebotConfig } from "../../config/types.js";
import { errorMessage } from "../../utils/errors.js";

const REDACTED = "***REDACTED***";

export function redactConfig(config: TidebotConfig): TidebotConfig {
  return {
    ...config,
    bots: config.bots.map((bot) =>
      bot.accessToken ? { ...bot, accessToken: REDACTED } : bot,
    ),
  };
}

export class ConfigShowCommand extends Command {
  static override paths = [["config", "show"]];

  static override usage = Command.Usage({
    description: "Show the effective configuration (access tokens redacted)",
    examples: [["Show config", "tidebot config show"]],
  });

  async execute(): Promise<void> {
    let config: TidebotConfig;
    try {
      config = loadConfig(undefined, getStateDir());
    } catch (err) {
      this.context.stdout.write(`Failed to load config: ${errorMessage(err)}\n`);
      process.exitCode = 1;
      return;
    }

    this.context.stdout.write(JSON.stringify(redactConfig(config), null, 2) + "\n");
  }
}

export class ConfigValidateCommand extends Command {
  static override paths = [["config", "validate"]];

  static override usage = Command.Usage({
    description: "Validate a configuration file",
    examples: [
      ["Validate default config", "tidebot config validate"],
      ["Validate specific file", "tidebot config validate ./my-config.json"],
    ],
  });

  configFile = Option.String({ name: "path", required: false });

  async execute(): Promise<void> {
    const configPath = this.configFile ?? getConfigPath();

    let content: string;
    try {
      content = readFileSync(configPath, "utf-8");
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === "ENOENT") {
        this.context.stdout.write(`Config file not found: ${configPath}\n`);
        process.exitCode = 1;
        return;
      }
      throw err;
    }

    try {
      parseConfig(JSON.parse(substituteEnv(content)));
      this.context.stdout.write(`Config is valid: ${configPath}\n`);
    } catch (err) {
      this.context.stdout.write(`Config is INVALID: ${configPath}\n  ${errorMessage(err)}\n`);
      process.exitCode = 1;
    }
  }
}
