import { isRecord, readInteger, readString, tryParseJson, type JsonObject } from "../utils/json.js";

/** A platform event exactly as decoded from the wire. */
export type OneBotEvent = JsonObject;

/**
 * How an inbound frame can be matched against a waiter. Computed once when
 * the frame is decoded so nothing downstream has to probe fields again.
 */
export type Correlatable =
  | { readonly kind: "echo"; readonly echo: string }
  | { readonly kind: "subject"; readonly groupId?: number; readonly userId?: number }
  | { readonly kind: "none" };

export interface InboundFrame {
  readonly event: OneBotEvent;
  readonly correlation: Correlatable;
}

export function classify(event: OneBotEvent): Correlatable {
  const echo = readString(event, "echo");
  if (echo !== undefined) return { kind: "echo", echo };

  const groupId = readInteger(event, "group_id");
  const userId = readInteger(event, "user_id");
  if (groupId === undefined && userId === undefined) return { kind: "none" };
  return { kind: "subject", groupId, userId };
}

export function decodeFrame(text: string): InboundFrame | null {
  const parsed = tryParseJson(text);
  if (!isRecord(parsed)) return null;
  return { event: parsed, correlation: classify(parsed) };
}

export function postType(event: OneBotEvent): string | undefined {
  return readString(event, "post_type");
}

export function groupIdOf(event: OneBotEvent): number | undefined {
  return readInteger(event, "group_id");
}

export interface LoginUser {
  readonly id: string;
  readonly name?: string;
  readonly nick?: string;
  readonly avatar?: string;
}

export interface BotStatus {
  readonly adapter: string;
  readonly platform: string;
  readonly loginUser: LoginUser;
}

export function unknownBot(adapter: string, platform: string): BotStatus {
  return { adapter, platform, loginUser: { id: "0" } };
}

export type SenderRole = "owner" | "admin" | "member";

/** Typed read access to a `post_type: "message"` event. */
export class MessageView {
  private constructor(readonly event: OneBotEvent) {}

  static from(event: OneBotEvent): MessageView | null {
    return postType(event) === "message" ? new MessageView(event) : null;
  }

  get groupId(): number | undefined {
    return groupIdOf(this.event);
  }

  get userId(): number {
    return readInteger(this.event, "user_id") ?? 0;
  }

  get messageId(): number {
    return readInteger(this.event, "message_id") ?? 0;
  }

  get text(): string {
    return readString(this.event, "raw_message") ?? "";
  }

  get isGroup(): boolean {
    return readString(this.event, "message_type") === "group";
  }

  get segments(): unknown[] {
    const message = this.event["message"];
    return Array.isArray(message) ? message : [];
  }

  private get sender(): JsonObject {
    const sender = this.event["sender"];
    return isRecord(sender) ? sender : {};
  }

  get senderNickname(): string | undefined {
    return readString(this.sender, "nickname");
  }

  get senderCard(): string | undefined {
    const card = readString(this.sender, "card");
    return card ? card : undefined;
  }

  get senderName(): string {
    return this.senderCard ?? this.senderNickname ?? "Unknown";
  }

  get senderRole(): SenderRole | undefined {
    const role = readString(this.sender, "role");
    return role === "owner" || role === "admin" || role === "member" ? role : undefined;
  }
}
