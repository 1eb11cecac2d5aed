import { describe, it, expect, afterEach, vi } from "vitest";
import { z } from "zod";
import {
  callAction,
  callActionNoWait,
  deleteMsg,
  getGroupList,
  getGroupMemberInfo,
  getLoginInfo,
  nextEcho,
} from "../../src/api/actions.js";
import { ApiCallError, ApiTimeoutError } from "../../src/utils/errors.js";
import { AnsweringWriter, RecordingWriter, makeContext, makeServices, ok } from "../helpers/fixtures.js";

describe("nextEcho", () => {
  it("hands out distinct tokens", () => {
    const a = nextEcho();
    const b = nextEcho();
    expect(a).toMatch(/^api-req-\d+$/);
    expect(b).not.toBe(a);
  });
});

describe("callAction", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("returns the reply data parsed by the schema", async () => {
    const ctx = makeContext(makeServices());
    const writer = new AnsweringWriter(ctx.correlator, () => ok({ user_id: 10001, nickname: "tide" }));

    const info = await getLoginInfo(ctx, writer);

    expect(info).toEqual({ user_id: 10001, nickname: "tide" });
    expect(writer.packets[0]).toMatchObject({ action: "get_login_info", params: {} });
    expect(ctx.correlator.pending).toBe(0);
  });

  it("sends the documented parameters", async () => {
    const ctx = makeContext(makeServices());
    const writer = new AnsweringWriter(ctx.correlator, () =>
      ok({ group_id: 1001, user_id: 42, nickname: "alice", role: "admin" }),
    );

    const member = await getGroupMemberInfo(ctx, writer, 1001, 42);

    expect(member.role).toBe("admin");
    expect(writer.packets[0]?.["params"]).toEqual({ group_id: 1001, user_id: 42, no_cache: false });
  });

  it("fills defaults in list replies", async () => {
    const ctx = makeContext(makeServices());
    const writer = new AnsweringWriter(ctx.correlator, () => ok([{ group_id: 1001 }, { group_id: 2002, group_name: "b" }]));

    const groups = await getGroupList(ctx, writer);

    expect(groups.map((g) => [g.group_id, g.group_name])).toEqual([
      [1001, ""],
      [2002, "b"],
    ]);
  });

  it("raises ApiCallError on a non-zero retcode", async () => {
    const ctx = makeContext(makeServices());
    const writer = new AnsweringWriter(ctx.correlator, () => ({
      status: "failed",
      retcode: 1404,
      data: null,
      wording: "message not found",
    }));

    const error = await deleteMsg(ctx, writer, 77).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ApiCallError);
    expect(error).toMatchObject({ action: "delete_msg", retcode: 1404 });
    expect(String(error)).toContain("message not found");
  });

  it("raises when the data does not fit the schema", async () => {
    const ctx = makeContext(makeServices());
    const writer = new AnsweringWriter(ctx.correlator, () => ok({ nickname: "no id" }));

    await expect(getLoginInfo(ctx, writer)).rejects.toBeInstanceOf(z.ZodError);
  });

  it("times out when no reply arrives", async () => {
    vi.useFakeTimers();
    const ctx = { ...makeContext(makeServices()), apiTimeoutMs: 50 };
    const writer = new RecordingWriter();

    const pending = callAction(ctx, writer, "get_status", {}, z.unknown());
    const assertion = expect(pending).rejects.toBeInstanceOf(ApiTimeoutError);
    await vi.advanceTimersByTimeAsync(50);
    await assertion;
    expect(ctx.correlator.pending).toBe(0);
  });

  it("removes the waiter and rethrows when the send fails", async () => {
    const ctx = makeContext(makeServices());
    const writer = {
      send: (): Promise<void> => Promise.reject(new Error("socket down")),
    };

    await expect(callAction(ctx, writer, "get_status", {}, z.unknown())).rejects.toThrow("socket down");
    expect(ctx.correlator.pending).toBe(0);
  });
});

describe("callActionNoWait", () => {
  it("sends with a fresh echo and returns it", async () => {
    const writer = new RecordingWriter();

    const echo = await callActionNoWait(writer, "send_like", { user_id: 42, times: 1 });

    expect(writer.packets).toEqual([{ action: "send_like", params: { user_id: 42, times: 1 }, echo }]);
  });
});
