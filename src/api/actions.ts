import { z } from "zod";
import type { Writer } from "../connection/writer.js";
import type { Context } from "../pipeline/context.js";
import { encodePacket } from "../protocol/packet.js";
import type { JsonObject } from "../utils/json.js";
import { ApiCallError, ApiTimeoutError } from "../utils/errors.js";

let requestSeq = 0;

/** Echo tokens are unique for the life of the process. */
export function nextEcho(): string {
  requestSeq += 1;
  return `api-req-${requestSeq}`;
}

const replySchema = z
  .object({
    status: z.string().optional(),
    retcode: z.number().int(),
    data: z.unknown(),
    msg: z.string().optional(),
    wording: z.string().optional(),
  })
  .passthrough();

/**
 * Sends an action and waits for the reply carrying the same echo token. The
 * waiter is registered before the frame goes out, so a fast reply is never
 * missed. Resolves with `data` parsed by `schema`.
 */
export async function callAction<S extends z.ZodTypeAny>(
  ctx: Context,
  writer: Writer,
  action: string,
  params: JsonObject,
  schema: S,
): Promise<z.output<S>> {
  const echo = nextEcho();
  const abandon = new AbortController();
  const reply = ctx.correlator.registerWait(
    { kind: "echo", echo },
    { timeoutMs: ctx.apiTimeoutMs, signal: abandon.signal },
  );

  try {
    await writer.send(encodePacket({ action, params, echo }));
  } catch (err) {
    abandon.abort();
    throw err;
  }

  const event = await reply;
  if (!event) throw new ApiTimeoutError(action, ctx.apiTimeoutMs);

  const parsed = replySchema.parse(event);
  if (parsed.retcode !== 0) {
    throw new ApiCallError(action, parsed.retcode, parsed.msg ?? parsed.wording ?? "unknown error");
  }
  return schema.parse(parsed.data);
}

/** Sends an action with a fresh echo token and does not wait for the reply. */
export async function callActionNoWait(
  writer: Writer,
  action: string,
  params: JsonObject,
): Promise<string> {
  const echo = nextEcho();
  await writer.send(encodePacket({ action, params, echo }));
  return echo;
}

export const loginInfoSchema = z.object({
  user_id: z.number().int(),
  nickname: z.string(),
});
export type LoginInfo = z.infer<typeof loginInfoSchema>;

export const groupInfoSchema = z
  .object({
    group_id: z.number().int(),
    group_name: z.string().default(""),
    member_count: z.number().int().optional(),
    max_member_count: z.number().int().optional(),
  })
  .passthrough();
export type GroupInfo = z.infer<typeof groupInfoSchema>;

export const groupMemberSchema = z
  .object({
    group_id: z.number().int(),
    user_id: z.number().int(),
    nickname: z.string().default(""),
    card: z.string().optional(),
    role: z.enum(["owner", "admin", "member"]).optional(),
    title: z.string().optional(),
  })
  .passthrough();
export type GroupMember = z.infer<typeof groupMemberSchema>;

export function getLoginInfo(ctx: Context, writer: Writer): Promise<LoginInfo> {
  return callAction(ctx, writer, "get_login_info", {}, loginInfoSchema);
}

export function getGroupList(ctx: Context, writer: Writer): Promise<GroupInfo[]> {
  return callAction(ctx, writer, "get_group_list", {}, z.array(groupInfoSchema));
}

export async function deleteMsg(ctx: Context, writer: Writer, messageId: number): Promise<void> {
  await callAction(ctx, writer, "delete_msg", { message_id: messageId }, z.unknown());
}

export function getGroupMemberInfo(
  ctx: Context,
  writer: Writer,
  groupId: number,
  userId: number,
  noCache = false,
): Promise<GroupMember> {
  return callAction(
    ctx,
    writer,
    "get_group_member_info",
    { group_id: groupId, user_id: userId, no_cache: noCache },
    groupMemberSchema,
  );
}

export async function setGroupSpecialTitle(
  ctx: Context,
  writer: Writer,
  groupId: number,
  userId: number,
  title: string,
): Promise<void> {
  await callAction(
    ctx,
    writer,
    "set_group_special_title",
    { group_id: groupId, user_id: userId, special_title: title },
    z.unknown(),
  );
}
