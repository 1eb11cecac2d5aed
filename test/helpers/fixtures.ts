import pino from "pino";
import { ConfigStore } from "../../src/config/store.js";
import { parseConfig } from "../../src/config/schema.js";
import type { TidebotConfig } from "../../src/config/types.js";
import type { Writer } from "../../src/connection/writer.js";
import { Correlator } from "../../src/correlation/correlator.js";
import type { Logger } from "../../src/logging/logger.js";
import type { BotServices, Context, ContextSource, PipelineEvent } from "../../src/pipeline/context.js";
import { PipelineBuilder, type Pipeline } from "../../src/pipeline/pipeline.js";
import { unknownBot, type OneBotEvent } from "../../src/protocol/event.js";
import { Scheduler } from "../../src/scheduler/scheduler.js";
import { BotDatabase, IN_MEMORY } from "../../src/storage/db.js";
import { isRecord, tryParseJson, type JsonObject } from "../../src/utils/json.js";

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}

export function makeConfig(raw: Record<string, unknown> = {}): TidebotConfig {
  return parseConfig(raw);
}

export interface TestServicesOptions {
  readonly config?: Record<string, unknown>;
  readonly pipeline?: Pipeline;
  readonly logger?: Logger;
}

export function makeServices(options: TestServicesOptions = {}): BotServices {
  const logger = options.logger ?? silentLogger();
  return {
    config: new ConfigStore(makeConfig(options.config), logger),
    db: new BotDatabase(IN_MEMORY),
    scheduler: new Scheduler(logger),
    pipeline: options.pipeline ?? new PipelineBuilder().build(),
    logger,
  };
}

export function makeContext(
  services: BotServices,
  event: PipelineEvent = { kind: "startup" },
  correlator = new Correlator(),
): Context {
  return {
    ...services,
    event,
    correlator,
    bot: unknownBot("onebot", "qq"),
    apiTimeoutMs: 60_000,
  };
}

/** Context source over fixed services, writer and correlator. */
export function makeSource(
  services: BotServices,
  writer: Writer,
  correlator = new Correlator(),
  id = "test-bot",
): ContextSource {
  return {
    id,
    writer,
    createContext: (event) => makeContext(services, event, correlator),
  };
}

export function groupMessage(text: string, overrides: JsonObject = {}): OneBotEvent {
  return {
    post_type: "message",
    message_type: "group",
    group_id: 1001,
    user_id: 42,
    message_id: 501,
    raw_message: text,
    message: [{ type: "text", data: { text } }],
    sender: { user_id: 42, nickname: "alice", card: "", role: "member" },
    ...overrides,
  };
}

export function privateMessage(text: string, overrides: JsonObject = {}): OneBotEvent {
  return {
    post_type: "message",
    message_type: "private",
    user_id: 42,
    message_id: 601,
    raw_message: text,
    message: [{ type: "text", data: { text } }],
    sender: { user_id: 42, nickname: "alice" },
    ...overrides,
  };
}

/** Writer that keeps every frame it is given. */
export class RecordingWriter implements Writer {
  readonly frames: string[] = [];

  async send(frame: string): Promise<void> {
    this.frames.push(frame);
  }

  get packets(): JsonObject[] {
    return this.frames.map((frame) => {
      const parsed = tryParseJson(frame);
      return isRecord(parsed) ? parsed : {};
    });
  }
}

export type Responder = (packet: JsonObject) => JsonObject | null;

/**
 * Writer that plays the platform: every request carrying an echo is answered
 * through the correlator with whatever `respond` returns (null: no answer).
 */
export class AnsweringWriter extends RecordingWriter {
  constructor(
    private readonly correlator: Correlator,
    private readonly respond: Responder,
  ) {
    super();
  }

  override async send(frame: string): Promise<void> {
    await super.send(frame);
    const packet = this.packets[this.packets.length - 1] ?? {};
    const echo = packet["echo"];
    if (typeof echo !== "string") return;
    const reply = this.respond(packet);
    if (!reply) return;
    const event = { ...reply, echo };
    this.correlator.dispatch({ event, correlation: { kind: "echo", echo } });
  }
}

/** Successful reply envelope for an API call. */
export function ok(data: unknown): JsonObject {
  return { status: "ok", retcode: 0, data };
}

export interface CapturedLogs {
  readonly logger: Logger;
  /** Every record written so far, parsed. */
  readonly records: JsonObject[];
  messages(level?: "debug" | "info" | "warn" | "error"): string[];
}

const LEVEL_NUMBERS = { debug: 20, info: 30, warn: 40, error: 50 } as const;

/** Logger that keeps its JSON output in memory, child loggers included. */
export function capturingLogger(): CapturedLogs {
  const records: JsonObject[] = [];
  const logger = pino(
    { level: "debug" },
    {
      write(line: string) {
        const parsed = tryParseJson(line);
        if (isRecord(parsed)) records.push(parsed);
      },
    },
  );
  return {
    logger,
    records,
    messages: (level) =>
      records
        .filter((r) => level === undefined || r["level"] === LEVEL_NUMBERS[level])
        .map((r) => String(r["msg"])),
  };
}
