import { messageOf } from "../../pipeline/context.js";
import { sendMessage } from "../../pipeline/send.js";
import type { PluginDefinition } from "../../pipeline/types.js";
import { matchCommand } from "../../protocol/command.js";

export const echoPlugin: PluginDefinition = {
  name: "echo",
  defaultConfig: { enabled: true },

  async handle(ctx, writer) {
    const msg = messageOf(ctx);
    if (!msg) return ctx;
    const command = matchCommand(msg.event, ctx.config.snapshot().commandPrefixes, "echo");
    if (!command || command.args.length === 0) return ctx;

    await sendMessage(ctx, writer, { groupId: msg.groupId, userId: msg.userId }, command.args);
    return null;
  },
};
