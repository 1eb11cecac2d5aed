import { isRecord, readString, type JsonObject } from "../utils/json.js";
import type { Segment } from "./message.js";
import type { OneBotEvent } from "./event.js";

export interface CommandMatch {
  /** Segments after the command word; the rest of its text segment comes first when non-blank. */
  readonly args: Segment[];
  /** Id of the first quoted message in front of the command. */
  readonly replyId?: string;
  readonly atIds: string[];
}

function readId(data: JsonObject, key: string): string | undefined {
  const value = data[key];
  if (typeof value === "string") return value;
  if (typeof value === "number" && Number.isInteger(value)) return String(value);
  return undefined;
}

function toSegment(value: unknown): Segment | null {
  if (!isRecord(value)) return null;
  const type = readString(value, "type");
  const data = value["data"];
  if (type === undefined || !isRecord(data)) return null;
  return { type, data };
}

/**
 * Matches `<prefix><name>` at the start of a message. Leading quote and
 * mention segments and blank text are skipped over; anything else in front of
 * the command makes it a miss.
 */
export function matchCommand(
  event: OneBotEvent,
  prefixes: readonly string[],
  name: string,
): CommandMatch | null {
  if (readString(event, "post_type") !== "message") return null;
  const message = event["message"];
  if (!Array.isArray(message)) return null;

  let replyId: string | undefined;
  const atIds: string[] = [];

  for (let i = 0; i < message.length; i++) {
    const segment = toSegment(message[i]);
    if (!segment) return null;
    const data = { ...segment.data };

    switch (segment.type) {
      case "reply":
        replyId ??= readId(data, "id");
        break;
      case "at": {
        const qq = readId(data, "qq");
        if (qq !== undefined) atIds.push(qq);
        break;
      }
      case "text": {
        const text = (readString(data, "text") ?? "").trimStart();
        if (text.length === 0) break;

        const prefix = prefixes.find((p) => text.startsWith(p + name));
        if (prefix === undefined) return null;

        const args: Segment[] = [];
        const rest = text.slice(prefix.length + name.length).trimStart();
        if (rest.length > 0) args.push({ type: "text", data: { ...data, text: rest } });
        for (const later of message.slice(i + 1)) {
          const next = toSegment(later);
          if (next) args.push(next);
        }
        return { args, replyId, atIds };
      }
      default:
        return null;
    }
  }
  return null;
}

/** Concatenated text of the argument segments, trimmed. */
export function argsText(match: CommandMatch): string {
  return match.args
    .map((segment) => (segment.type === "text" ? String(segment.data["text"] ?? "") : ""))
    .join("")
    .trim();
}
