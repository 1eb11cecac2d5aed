import { createInterface } from "node:readline";
import type { Readable, Writable } from "node:stream";
import type { BotConnectionConfig } from "../config/types.js";
import { Correlator } from "../correlation/correlator.js";
import type { Logger } from "../logging/logger.js";
import type { BotServices, Context, PipelineEvent } from "../pipeline/context.js";
import { classify, type BotStatus, type OneBotEvent } from "../protocol/event.js";
import { MessageBuilder } from "../protocol/message.js";
import { isRecord, tryParseJson, type JsonObject } from "../utils/json.js";
import { contextFor, processFrame, type BotConnection, type ConnectionState, type FrameScope } from "./frame.js";
import type { Writer } from "./writer.js";

export const CONSOLE_USER_ID = 1;

const CONSOLE_BOT: BotStatus = {
  adapter: "console",
  platform: "console",
  loginUser: { id: "0", name: "ConsoleBot", nick: "ConsoleBot" },
};

export interface ConsoleAdapterOptions {
  readonly id: string;
  readonly config: BotConnectionConfig;
  readonly services: BotServices;
  readonly input?: Readable;
  readonly output?: Writable;
}

/** Wraps one line typed at the terminal as a private message from the console user. */
export function consoleMessageEvent(line: string, messageId: number, now = Date.now()): OneBotEvent {
  return {
    post_type: "message",
    message_type: "private",
    sub_type: "friend",
    time: Math.floor(now / 1000),
    self_id: 0,
    user_id: CONSOLE_USER_ID,
    message_id: messageId,
    font: 0,
    sender: { user_id: CONSOLE_USER_ID, nickname: "ConsoleUser", card: "" },
    raw_message: line,
    message: new MessageBuilder().text(line).build(),
  };
}

function describeMessage(message: unknown): string {
  if (typeof message === "string") return message;
  if (!Array.isArray(message)) return "";
  return message
    .map((segment) => {
      if (!isRecord(segment)) return "";
      const data = segment["data"];
      const type = String(segment["type"] ?? "unknown");
      if (type === "text") return isRecord(data) ? String(data["text"] ?? "") : "";
      return `[${type}]`;
    })
    .join("");
}

/** Human-readable line for one outbound frame. */
export function describeOutbound(frame: string): string {
  const parsed = tryParseJson(frame);
  if (!isRecord(parsed)) return frame;
  const action = String(parsed["action"] ?? "unknown");
  const params: JsonObject = isRecord(parsed["params"]) ? parsed["params"] : {};
  if (action === "send_msg") return `Bot: ${describeMessage(params["message"])}`;
  return `[action] ${action}`;
}

/**
 * Local stand-in for a platform connection: stdin lines become inbound
 * messages and outbound frames are printed. Useful for trying plugins
 * without a running platform.
 */
export class ConsoleAdapter implements BotConnection {
  readonly id: string;
  readonly bot = CONSOLE_BOT;
  readonly writer: Writer;

  private readonly correlator = new Correlator();
  private readonly services: BotServices;
  private readonly config: BotConnectionConfig;
  private readonly input: Readable;
  private readonly output: Writable;
  private readonly logger: Logger;
  private readonly inflight = new Set<Promise<void>>();
  private currentState: ConnectionState = "disconnected";
  private closeReader: (() => void) | null = null;
  private readerDone: Promise<void> = Promise.resolve();
  private messageSeq = 0;

  constructor(options: ConsoleAdapterOptions) {
    this.id = options.id;
    this.config = options.config;
    this.services = options.services;
    this.input = options.input ?? process.stdin;
    this.output = options.output ?? process.stdout;
    this.logger = options.services.logger.child({ component: "console", bot: options.id });
    this.writer = {
      send: async (frame) => {
        this.output.write(`${describeOutbound(frame)}\n`);
      },
    };
  }

  get state(): ConnectionState {
    return this.currentState;
  }

  get pendingWaiters(): number {
    return this.correlator.pending;
  }

  get oldestWaiterAgeMs(): number {
    return this.correlator.oldestAgeMs();
  }

  createContext(event: PipelineEvent = { kind: "startup" }): Context {
    return contextFor(this.scope(), event);
  }

  start(): void {
    if (this.closeReader) return;
    const rl = createInterface({ input: this.input, terminal: false });
    this.closeReader = () => rl.close();
    this.readerDone = new Promise<void>((resolve) => rl.once("close", resolve));
    rl.on("line", (line) => this.handleLine(line));
    this.currentState = "connected";
    this.logger.info({ userId: CONSOLE_USER_ID }, "Console mode ready, type a command such as /echo hello");
  }

  async stop(): Promise<void> {
    this.closeReader?.();
    await this.readerDone;
    await this.idle();
    this.currentState = "disconnected";
  }

  async idle(): Promise<void> {
    while (this.inflight.size > 0) {
      await Promise.all([...this.inflight]);
    }
  }

  private handleLine(line: string): void {
    const text = line.trim();
    if (text.length === 0) return;
    this.messageSeq += 1;
    const event = consoleMessageEvent(text, this.messageSeq);
    const task = processFrame({ event, correlation: classify(event) }, this.scope());
    this.inflight.add(task);
    void task
      .catch((err) => this.logger.error({ err }, "Console line failed"))
      .finally(() => this.inflight.delete(task));
  }

  private scope(): FrameScope {
    return {
      services: this.services,
      correlator: this.correlator,
      writer: this.writer,
      bot: this.bot,
      apiTimeoutMs: this.config.apiTimeoutMs,
      logger: this.logger,
    };
  }
}
