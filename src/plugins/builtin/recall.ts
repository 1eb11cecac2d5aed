import { deleteMsg } from "../../api/actions.js";
import { messageOf } from "../../pipeline/context.js";
import type { PluginDefinition } from "../../pipeline/types.js";
import { matchCommand } from "../../protocol/command.js";
import { errorMessage } from "../../utils/errors.js";

/** Reply to a message with `/recall` to delete it along with the command. */
export const recallPlugin: PluginDefinition = {
  name: "recall",
  defaultConfig: { enabled: true },

  async handle(ctx, writer) {
    const msg = messageOf(ctx);
    if (!msg) return ctx;
    const command = matchCommand(msg.event, ctx.config.snapshot().commandPrefixes, "recall");
    if (!command?.replyId) return ctx;

    const targetId = Number.parseInt(command.replyId, 10);
    if (Number.isNaN(targetId)) return ctx;

    for (const messageId of [targetId, msg.messageId]) {
      try {
        await deleteMsg(ctx, writer, messageId);
      } catch (err) {
        ctx.logger.warn({ messageId, err: errorMessage(err) }, "Could not recall message");
      }
    }
    return null;
  },
};
