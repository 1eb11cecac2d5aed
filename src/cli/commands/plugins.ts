import { Command, Option } from "clipanion";
import { loadConfig } from "../../config/loader.js";
import { getStateDir } from "../../config/paths.js";
import { ConfigStore } from "../../config/store.js";
import { createLogger } from "../../logging/logger.js";
import { buildDefaultPipeline } from "../../plugins/builtin/index.js";

function openStore(): ConfigStore {
  const stateDir = getStateDir();
  const logger = createLogger({ level: "error", json: true });
  const store = new ConfigStore(loadConfig(undefined, stateDir), logger, stateDir);
  store.applyPluginDefaults(buildDefaultPipeline().defaultConfigs());
  return store;
}

export class PluginsListCommand extends Command {
  static override paths = [["plugins", "list"]];

  static override usage = Command.Usage({
    description: "List registered plugins in processing order",
    examples: [["List plugins", "tidebot plugins list"]],
  });

  async execute(): Promise<void> {
    const store = openStore();
    const pipeline = buildDefaultPipeline();

    this.context.stdout.write(`Plugins (${pipeline.names.length}):\n`);
    for (const name of pipeline.names) {
      const status = store.isPluginEnabled(name) ? "enabled" : "disabled";
      this.context.stdout.write(`  ${name}  [${status}]\n`);
    }
  }
}

abstract class PluginToggleCommand extends Command {
  name = Option.String({ name: "name", required: true });

  protected abstract readonly enable: boolean;

  async execute(): Promise<void> {
    const names = buildDefaultPipeline().names;
    if (!names.includes(this.name)) {
      this.context.stdout.write(`Unknown plugin: ${this.name} (known: ${names.join(", ")})\n`);
      process.exitCode = 1;
      return;
    }

    const saved = await openStore().setPluginEnabled(this.name, this.enable);
    if (!saved) {
      this.context.stdout.write(`Failed to save plugin settings for ${this.name}\n`);
      process.exitCode = 1;
      return;
    }
    this.context.stdout.write(`Plugin ${this.name} ${this.enable ? "enabled" : "disabled"}\n`);
  }
}

export class PluginsEnableCommand extends PluginToggleCommand {
  static override paths = [["plugins", "enable"]];

  static override usage = Command.Usage({
    description: "Enable a plugin (takes effect on the next event)",
    examples: [["Enable echo", "tidebot plugins enable echo"]],
  });

  protected readonly enable = true;
}

export class PluginsDisableCommand extends PluginToggleCommand {
  static override paths = [["plugins", "disable"]];

  static override usage = Command.Usage({
    description: "Disable a plugin",
    examples: [["Disable echo", "tidebot plugins disable echo"]],
  });

  protected readonly enable = false;
}
