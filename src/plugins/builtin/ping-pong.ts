import { messageOf } from "../../pipeline/context.js";
import { sendMessage } from "../../pipeline/send.js";
import type { PluginDefinition } from "../../pipeline/types.js";
import { matchCommand } from "../../protocol/command.js";
import { MessageBuilder } from "../../protocol/message.js";

const CREATE_TABLE_SQL = `
CREATE TABLE IF NOT EXISTS plugin_ping_stats (
  id         INTEGER PRIMARY KEY AUTOINCREMENT,
  user_id    INTEGER NOT NULL,
  created_at INTEGER NOT NULL
)`;

export const pingPongPlugin: PluginDefinition = {
  name: "ping_pong",
  defaultConfig: { enabled: true },

  init(ctx) {
    ctx.db.raw().exec(CREATE_TABLE_SQL);
  },

  async handle(ctx, writer) {
    const msg = messageOf(ctx);
    if (!msg || !matchCommand(msg.event, ctx.config.snapshot().commandPrefixes, "ping")) {
      return ctx;
    }

    const db = ctx.db.raw();
    db.prepare<[number, number]>(
      "INSERT INTO plugin_ping_stats (user_id, created_at) VALUES (?, ?)",
    ).run(msg.userId, Date.now());
    const row = db
      .prepare<[], { total: number }>("SELECT COUNT(*) AS total FROM plugin_ping_stats")
      .get();

    const reply = new MessageBuilder()
      .reply(msg.messageId)
      .text(`Pong! Pings so far: ${row?.total ?? 0}`)
      .build();
    await sendMessage(ctx, writer, { groupId: msg.groupId, userId: msg.userId }, reply);
    return null;
  },
};
