import type { Writer } from "../connection/writer.js";
import type { OneBotEvent } from "../protocol/event.js";
import type { MessageContent } from "../protocol/message.js";
import { buildSendMessagePacket, type MessageTarget } from "../protocol/packet.js";
import { originatingEvent, withEvent, type Context } from "./context.js";

/**
 * Sends a message through the pipeline so outbound interceptors see it first.
 * Returns false when the target names no group or user.
 */
export async function sendMessage(
  ctx: Context,
  writer: Writer,
  target: MessageTarget,
  message: MessageContent,
): Promise<boolean> {
  const packet = buildSendMessagePacket(target, message);
  if (!packet) {
    ctx.logger.debug({ target }, "No message target, nothing sent");
    return false;
  }
  const outbound = withEvent(ctx, { kind: "outbound", packet, original: originatingEvent(ctx) });
  await ctx.pipeline.run(outbound, writer);
  return true;
}

/** Feeds a synthesized inbound event through the whole pipeline. */
export async function replayEvent(ctx: Context, writer: Writer, event: OneBotEvent): Promise<void> {
  await ctx.pipeline.run(withEvent(ctx, { kind: "inbound", event }), writer);
}
