import { getGroupMemberInfo, setGroupSpecialTitle } from "../../api/actions.js";
import { messageOf } from "../../pipeline/context.js";
import type { PluginDefinition } from "../../pipeline/types.js";
import { argsText, matchCommand } from "../../protocol/command.js";
import { readInteger } from "../../utils/json.js";
import { errorMessage } from "../../utils/errors.js";

/**
 * `/title <text>` sets the sender's special title in the group. Only a group
 * owner may set titles, so the command is ignored unless the bot owns the group.
 */
export const selfTitlePlugin: PluginDefinition = {
  name: "group_self_title",
  defaultConfig: { enabled: true },

  async handle(ctx, writer) {
    const msg = messageOf(ctx);
    if (!msg) return ctx;
    const command = matchCommand(msg.event, ctx.config.snapshot().commandPrefixes, "title");
    if (!command || msg.groupId === undefined) return ctx;

    const groupId = msg.groupId;
    const selfId = readInteger(msg.event, "self_id") ?? Number(ctx.bot.loginUser.id);
    const log = ctx.logger.child({ plugin: "group_self_title", groupId });

    try {
      const self = await getGroupMemberInfo(ctx, writer, groupId, selfId, true);
      if (self.role !== "owner") {
        log.warn({ role: self.role ?? "unknown" }, "Bot does not own the group, cannot set titles");
        return ctx;
      }
    } catch (err) {
      log.error({ err: errorMessage(err) }, "Could not look up the bot's group membership");
      return ctx;
    }

    try {
      await setGroupSpecialTitle(ctx, writer, groupId, msg.userId, argsText(command));
    } catch (err) {
      log.error({ err: errorMessage(err), userId: msg.userId }, "Could not set title");
      return ctx;
    }
    return null;
  },
};
