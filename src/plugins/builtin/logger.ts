import { z } from "zod";
import { messageOf, postTypeOf } from "../../pipeline/context.js";
import type { PluginDefinition } from "../../pipeline/types.js";
import { isRecord, readInteger, readString } from "../../utils/json.js";

const settingsSchema = z.object({ debug: z.boolean().default(false) }).passthrough();

const SEGMENT_LABELS: Record<string, string> = {
  face: "[face]",
  image: "[image]",
  record: "[voice]",
  video: "[video]",
  reply: "[reply]",
  json: "[card]",
  poke: "[poke]",
};

/** Flattens a message chain into one readable line. */
export function formatMessage(message: unknown): string {
  if (typeof message === "string") return message;
  if (!Array.isArray(message)) return "";

  return message
    .map((segment) => {
      if (!isRecord(segment)) return "";
      const type = readString(segment, "type") ?? "unknown";
      const data = isRecord(segment["data"]) ? segment["data"] : {};
      if (type === "text") return readString(data, "text") ?? "";
      if (type === "at") {
        const qq = readString(data, "qq") ?? readInteger(data, "qq")?.toString() ?? "unknown";
        return ` [@${qq}] `;
      }
      return ` ${SEGMENT_LABELS[type] ?? `[${type}]`} `;
    })
    .join("");
}

export const loggerPlugin: PluginDefinition = {
  name: "logger",
  defaultConfig: { enabled: true, debug: false },

  handle(ctx) {
    const parsed = settingsSchema.safeParse(ctx.config.pluginSettings("logger") ?? {});
    const debug = parsed.success && parsed.data.debug;
    const log = ctx.logger.child({ component: "chat" });
    const { event } = ctx;

    if (event.kind === "inbound") {
      if (debug) log.debug({ event: event.event }, "Inbound event");
      const msg = messageOf(ctx);
      if (msg) {
        log.info(
          {
            direction: "in",
            groupId: msg.groupId,
            sender: `${msg.senderName}(${msg.userId})`,
            text: formatMessage(event.event["message"]),
          },
          msg.groupId === undefined ? "Private message received" : "Group message received",
        );
      } else {
        const type = postTypeOf(ctx);
        if (type !== "meta_event") log.debug({ postType: type }, "Event received");
      }
    } else if (event.kind === "outbound") {
      const { packet } = event;
      if (debug) log.debug({ packet }, "Outbound packet");
      if (packet.action === "send_msg") {
        log.info(
          {
            direction: "out",
            messageType: readString(packet.params, "message_type") ?? "unknown",
            groupId: readInteger(packet.params, "group_id"),
            userId: readInteger(packet.params, "user_id"),
            text: formatMessage(packet.params["message"]),
          },
          "Message sent",
        );
      } else {
        log.debug({ action: packet.action }, "Action sent");
      }
    }
    return ctx;
  },
};
