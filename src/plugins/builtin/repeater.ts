import { z } from "zod";
import { messageOf } from "../../pipeline/context.js";
import { sendMessage } from "../../pipeline/send.js";
import type { PluginDefinition } from "../../pipeline/types.js";
import type { MessageContent, Segment } from "../../protocol/message.js";
import { isRecord, readInteger, readString } from "../../utils/json.js";

const settingsSchema = z
  .object({
    minTimes: z.number().int().positive().default(2),
    probability: z.number().min(0).max(1).default(1),
  })
  .passthrough();

const BOT_SELF = "<bot>";

interface ChatState {
  /** Serialized message chain the run is about. */
  content: string;
  times: number;
  lastSender: string;
  repeated: boolean;
}

export interface RepeaterOptions {
  /** Uniform draw in [0, 1) compared against `probability`. */
  readonly random?: () => number;
}

function toContent(message: unknown): MessageContent | null {
  if (typeof message === "string") return message.length > 0 ? message : null;
  if (!Array.isArray(message) || message.length === 0) return null;
  const segments: Segment[] = [];
  for (const value of message) {
    if (!isRecord(value)) return null;
    const type = readString(value, "type");
    const data = value["data"];
    if (type === undefined || !isRecord(data)) return null;
    segments.push({ type, data });
  }
  return segments;
}

/**
 * Joins in when the same message is posted by different people in a row,
 * once per run. The bot's own sends count as a message from the bot, so it
 * never repeats a run it started.
 */
export function createRepeaterPlugin(options: RepeaterOptions = {}): PluginDefinition {
  const random = options.random ?? Math.random;
  const chats = new Map<string, ChatState>();

  function stateOf(chat: string): ChatState {
    let state = chats.get(chat);
    if (!state) {
      state = { content: "", times: 0, lastSender: "", repeated: false };
      chats.set(chat, state);
    }
    return state;
  }

  return {
    name: "repeater",
    defaultConfig: { enabled: true, minTimes: 2, probability: 1 },

    async handle(ctx, writer) {
      const { event } = ctx;

      if (event.kind === "outbound") {
        if (event.packet.action !== "send_msg") return ctx;
        const groupId = readInteger(event.packet.params, "group_id");
        if (groupId === undefined) return ctx;
        const state = stateOf(String(groupId));
        const content = JSON.stringify(event.packet.params["message"] ?? []);
        state.repeated = true;
        if (state.content !== content) {
          state.content = content;
          state.times = 1;
          state.lastSender = BOT_SELF;
        } else if (state.lastSender !== BOT_SELF) {
          state.times += 1;
          state.lastSender = BOT_SELF;
        }
        return ctx;
      }

      const msg = messageOf(ctx);
      if (!msg) return ctx;
      const chat = msg.groupId !== undefined ? String(msg.groupId) : msg.userId ? String(msg.userId) : null;
      const message = toContent(msg.event["message"]);
      if (chat === null || message === null) return ctx;

      const parsed = settingsSchema.safeParse(ctx.config.pluginSettings("repeater") ?? {});
      const settings = parsed.success ? parsed.data : settingsSchema.parse({});
      const sender = String(msg.userId);
      const content = JSON.stringify(message);
      const state = stateOf(chat);

      if (state.content !== content) {
        state.content = content;
        state.times = 1;
        state.lastSender = sender;
        state.repeated = false;
        return ctx;
      }
      if (state.lastSender === sender) return ctx;

      state.times += 1;
      state.lastSender = sender;
      if (state.repeated || state.times < settings.minTimes || random() >= settings.probability) {
        return ctx;
      }

      state.repeated = true;
      ctx.logger.debug({ chat, times: state.times }, "Repeating message");
      await sendMessage(ctx, writer, { groupId: msg.groupId, userId: msg.userId }, message);
      return ctx;
    },
  };
}

export const repeaterPlugin: PluginDefinition = createRepeaterPlugin();
