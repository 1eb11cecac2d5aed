import { z } from "zod";
import { MAX_TIMER_MS } from "../utils/sleep.js";
import type { TidebotConfig } from "./types.js";

const timeoutMsSchema = z.number().int().positive().max(MAX_TIMER_MS);

const botSchema = z
  .object({
    protocol: z.enum(["onebot", "console"]).default("onebot"),
    url: z.string().url().optional(),
    accessToken: z.string().optional(),
    reconnectDelayMs: timeoutMsSchema.default(3_000),
    apiTimeoutMs: timeoutMsSchema.default(60_000),
  })
  .refine((bot) => bot.protocol !== "onebot" || bot.url !== undefined, {
    message: "onebot connections require a url",
    path: ["url"],
  });

const groupIdSchema = z.number().int().positive();

const groupFilterSchema = z.object({
  allowlist: z.array(groupIdSchema).default([]),
  blocklist: z.array(groupIdSchema).default([]),
});

export const pluginSettingsSchema = z
  .object({ enabled: z.boolean().default(false) })
  .passthrough();

const loggingSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]).default("info"),
  file: z.string().optional(),
  json: z.boolean().optional(),
});

const healthSchema = z.object({
  enabled: z.boolean().default(false),
  port: z.number().int().positive().default(19877),
  hostname: z.string().default("127.0.0.1"),
});

export const tidebotConfigSchema = z.object({
  commandPrefixes: z.array(z.string().min(1)).min(1).default(["/"]),
  bots: z.array(botSchema).default([{ protocol: "onebot", url: "ws://127.0.0.1:3001" }]),
  groupFilter: groupFilterSchema.default({}),
  plugins: z.record(z.string(), pluginSettingsSchema).default({}),
  logging: loggingSchema.default({}),
  database: z.object({ path: z.string().optional() }).default({}),
  health: healthSchema.default({}),
  remote: z
    .object({ requestTimeoutMs: timeoutMsSchema.default(30_000) })
    .default({}),
});

export function parseConfig(raw: unknown): TidebotConfig {
  return tidebotConfigSchema.parse(raw);
}
