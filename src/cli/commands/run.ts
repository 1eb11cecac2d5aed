import { Command, Option } from "clipanion";
import { startBot } from "../../gateway/lifecycle.js";
import { errorMessage } from "../../utils/errors.js";

export class RunCommand extends Command {
  static override paths = [["run"], Command.Default];

  static override usage = Command.Usage({
    description: "Connect the configured bots and start processing events",
    examples: [
      ["Start with default config", "tidebot run"],
      ["Start with custom config", "tidebot run --config ./my-config.json"],
    ],
  });

  config = Option.String("--config,-c", {
    description: "Path to config file",
    required: false,
  });

  async execute(): Promise<number> {
    try {
      await startBot({ configPath: this.config, handleSignals: true });
    } catch (err) {
      this.context.stderr.write(`Failed to start: ${errorMessage(err)}\n`);
      return 1;
    }
    // Runs until a signal handler exits the process
    await new Promise<never>(() => {});
    return 0;
  }
}
