import { Builtins, Cli } from "clipanion";
import { ConfigShowCommand, ConfigValidateCommand } from "./commands/config-cmd.js";
import {
  PluginsDisableCommand,
  PluginsEnableCommand,
  PluginsListCommand,
} from "./commands/plugins.js";
import { RunCommand } from "./commands/run.js";

export function createCli(version: string): Cli {
  const cli = new Cli({
    binaryLabel: "tidebot",
    binaryName: "tidebot",
    binaryVersion: version,
  });

  cli.register(RunCommand);

  cli.register(ConfigShowCommand);
  cli.register(ConfigValidateCommand);

  cli.register(PluginsListCommand);
  cli.register(PluginsEnableCommand);
  cli.register(PluginsDisableCommand);

  cli.register(Builtins.HelpCommand);
  cli.register(Builtins.VersionCommand);

  return cli;
}
