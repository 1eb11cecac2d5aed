import { describe, it, expect } from "vitest";
import { classify, decodeFrame, MessageView } from "../../src/protocol/event.js";
import { MessageBuilder } from "../../src/protocol/message.js";
import { buildSendMessagePacket, encodePacket, replyTarget } from "../../src/protocol/packet.js";
import { groupMessage } from "../helpers/fixtures.js";

describe("decodeFrame", () => {
  it("returns null for malformed text and non-object JSON", () => {
    expect(decodeFrame("{not json")).toBeNull();
    expect(decodeFrame("[1,2]")).toBeNull();
    expect(decodeFrame("42")).toBeNull();
  });

  it("classifies echo replies, subjects and plain events", () => {
    expect(decodeFrame('{"echo":"api-req-1","retcode":0}')?.correlation).toEqual({
      kind: "echo",
      echo: "api-req-1",
    });
    expect(decodeFrame('{"group_id":7,"user_id":8}')?.correlation).toEqual({
      kind: "subject",
      groupId: 7,
      userId: 8,
    });
    expect(decodeFrame('{"post_type":"meta_event"}')?.correlation).toEqual({ kind: "none" });
  });

  it("prefers the echo token when subject ids are also present", () => {
    expect(classify({ echo: "api-req-2", group_id: 7 })).toEqual({ kind: "echo", echo: "api-req-2" });
  });

  it("ignores ids that are not integers", () => {
    expect(classify({ group_id: "7" })).toEqual({ kind: "none" });
  });
});

describe("MessageView", () => {
  it("only wraps message events", () => {
    expect(MessageView.from({ post_type: "notice" })).toBeNull();
  });

  it("reads the common message fields", () => {
    const view = MessageView.from(groupMessage("hi"));
    expect(view?.groupId).toBe(1001);
    expect(view?.userId).toBe(42);
    expect(view?.messageId).toBe(501);
    expect(view?.text).toBe("hi");
    expect(view?.isGroup).toBe(true);
    expect(view?.senderRole).toBe("member");
  });

  it("uses the card, then the nickname, then a placeholder for the display name", () => {
    const withCard = MessageView.from(groupMessage("x", { sender: { card: "Al", nickname: "alice" } }));
    const blankCard = MessageView.from(groupMessage("x", { sender: { card: "", nickname: "alice" } }));
    const anonymous = MessageView.from(groupMessage("x", { sender: {} }));

    expect(withCard?.senderName).toBe("Al");
    expect(blankCard?.senderName).toBe("alice");
    expect(anonymous?.senderName).toBe("Unknown");
  });
});

describe("outbound packets", () => {
  it("omits the echo field for fire-and-forget packets", () => {
    expect(encodePacket({ action: "send_like", params: { user_id: 1 } })).toBe(
      '{"action":"send_like","params":{"user_id":1}}',
    );
    expect(encodePacket({ action: "get_login_info", params: {}, echo: "api-req-9" })).toBe(
      '{"action":"get_login_info","params":{},"echo":"api-req-9"}',
    );
  });

  it("sends to the group when a group id is given", () => {
    expect(buildSendMessagePacket({ groupId: 5, userId: 6 }, "hello")).toEqual({
      action: "send_msg",
      params: { message_type: "group", group_id: 5, message: "hello" },
    });
  });

  it("falls back to a private message, and to nothing without a target", () => {
    expect(buildSendMessagePacket({ groupId: 0, userId: 6 }, "hello")).toEqual({
      action: "send_msg",
      params: { message_type: "private", user_id: 6, message: "hello" },
    });
    expect(buildSendMessagePacket({ groupId: 0, userId: 0 }, "hello")).toBeNull();
    expect(buildSendMessagePacket({}, "hello")).toBeNull();
  });

  it("derives the reply target from an inbound event", () => {
    expect(replyTarget(groupMessage("x"))).toEqual({ groupId: 1001, userId: 42 });
  });
});

describe("MessageBuilder", () => {
  it("builds a segment chain in call order", () => {
    const chain = new MessageBuilder().reply(9).at(42).text(" hi").face(14).file("a.txt", "notes").build();
    expect(chain).toEqual([
      { type: "reply", data: { id: "9" } },
      { type: "at", data: { qq: "42" } },
      { type: "text", data: { text: " hi" } },
      { type: "face", data: { id: "14" } },
      { type: "file", data: { file: "a.txt", name: "notes" } },
    ]);
  });

  it("mentions everyone with atAll", () => {
    expect(new MessageBuilder().atAll().build()).toEqual([{ type: "at", data: { qq: "all" } }]);
  });
});
