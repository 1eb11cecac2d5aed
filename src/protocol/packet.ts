import type { OneBotEvent } from "./event.js";
import type { MessageContent } from "./message.js";
import { readInteger, type JsonObject } from "../utils/json.js";

export interface OutboundPacket {
  readonly action: string;
  readonly params: JsonObject;
  /** Present when the caller waits for a reply carrying the same token. */
  readonly echo?: string;
}

export interface MessageTarget {
  readonly groupId?: number;
  readonly userId?: number;
}

export function encodePacket(packet: OutboundPacket): string {
  const frame: JsonObject = { action: packet.action, params: packet.params };
  if (packet.echo !== undefined) frame["echo"] = packet.echo;
  return JSON.stringify(frame);
}

/**
 * A non-zero group id sends to the group; otherwise a non-zero user id sends
 * privately. With neither there is nowhere to send and null is returned.
 */
export function buildSendMessagePacket(
  target: MessageTarget,
  message: MessageContent,
): OutboundPacket | null {
  if (target.groupId) {
    return {
      action: "send_msg",
      params: { message_type: "group", group_id: target.groupId, message },
    };
  }
  if (target.userId) {
    return {
      action: "send_msg",
      params: { message_type: "private", user_id: target.userId, message },
    };
  }
  return null;
}

/** Reply target for an inbound event: its group when it has one, else its sender. */
export function replyTarget(event: OneBotEvent): MessageTarget {
  return { groupId: readInteger(event, "group_id"), userId: readInteger(event, "user_id") };
}
