import { getLoginInfo } from "../api/actions.js";
import type { BotConnectionConfig } from "../config/types.js";
import { Correlator } from "../correlation/correlator.js";
import type { Logger } from "../logging/logger.js";
import type { BotServices, Context, PipelineEvent } from "../pipeline/context.js";
import { decodeFrame, unknownBot, type BotStatus } from "../protocol/event.js";
import { errorMessage, NotConnectedError } from "../utils/errors.js";
import { sleep } from "../utils/sleep.js";
import { TypedEventEmitter } from "../utils/typed-emitter.js";
import { contextFor, processFrame, type BotConnection, type ConnectionState, type FrameScope } from "./frame.js";
import type { PlatformSocket, SocketConnector } from "./socket.js";
import { connectWebSocket } from "./websocket.js";
import { FrameWriter, type Writer } from "./writer.js";

export interface ConnectionEvents {
  state: [state: ConnectionState, previous: ConnectionState];
  identity: [bot: BotStatus];
}

export interface ConnectionManagerOptions {
  readonly id: string;
  readonly config: BotConnectionConfig;
  readonly services: BotServices;
  readonly connect?: SocketConnector;
  /** Pause between the handshake and the identity request. */
  readonly identityDelayMs?: number;
}

export const DEFAULT_IDENTITY_DELAY_MS = 1_000;

function avatarUrl(userId: number): string {
  return `https://q1.qlogo.cn/g?b=qq&nk=${userId}&s=640`;
}

/**
 * Keeps one WebSocket to the platform open. Connects at once on start and,
 * after any failure or close, retries after a flat delay until stopped.
 * Every connection gets its own correlator; it is drained when the
 * connection ends so nobody waits on a reply that cannot arrive.
 */
export class ConnectionManager extends TypedEventEmitter<ConnectionEvents> implements BotConnection {
  readonly id: string;
  readonly writer: Writer;

  private readonly config: BotConnectionConfig;
  private readonly services: BotServices;
  private readonly connect: SocketConnector;
  private readonly identityDelayMs: number;
  private readonly logger: Logger;
  private readonly stopController = new AbortController();
  private readonly inflight = new Set<Promise<void>>();

  private currentState: ConnectionState = "disconnected";
  private correlator = new Correlator();
  private frameWriter: FrameWriter | null = null;
  private botStatus: BotStatus = unknownBot("onebot", "qq");
  private loop: Promise<void> | null = null;
  private attempts = 0;

  constructor(options: ConnectionManagerOptions) {
    super();
    this.id = options.id;
    this.config = options.config;
    this.services = options.services;
    this.connect = options.connect ?? connectWebSocket;
    this.identityDelayMs = options.identityDelayMs ?? DEFAULT_IDENTITY_DELAY_MS;
    this.logger = options.services.logger.child({ component: "connection", bot: options.id });
    this.writer = {
      send: (frame) =>
        this.frameWriter ? this.frameWriter.send(frame) : Promise.reject(new NotConnectedError()),
    };
  }

  get state(): ConnectionState {
    return this.currentState;
  }

  get bot(): BotStatus {
    return this.botStatus;
  }

  get pendingWaiters(): number {
    return this.correlator.pending;
  }

  get oldestWaiterAgeMs(): number {
    return this.correlator.oldestAgeMs();
  }

  get connectAttempts(): number {
    return this.attempts;
  }

  createContext(event: PipelineEvent = { kind: "startup" }): Context {
    return contextFor(this.scope(this.correlator, this.writer), event);
  }

  start(): void {
    if (this.loop) return;
    this.loop = this.run().catch((err) => {
      this.logger.error({ err }, "Connection loop crashed");
    });
  }

  async stop(): Promise<void> {
    this.stopController.abort();
    await this.loop;
    await this.idle();
  }

  /** Resolves once every in-flight frame task has finished. */
  async idle(): Promise<void> {
    while (this.inflight.size > 0) {
      await Promise.all([...this.inflight]);
    }
  }

  private async run(): Promise<void> {
    const { signal } = this.stopController;
    const url = this.config.url;
    if (!url) throw new Error(`Bot ${this.id} has no url`);

    while (!signal.aborted) {
      this.setState("connecting");
      this.attempts++;

      let socket: PlatformSocket;
      try {
        socket = await this.connect({ url, accessToken: this.config.accessToken });
      } catch (err) {
        this.setState("disconnected");
        this.logger.warn(
          { err: errorMessage(err), attempt: this.attempts, retryInMs: this.config.reconnectDelayMs },
          "Connection failed",
        );
        if (!(await sleep(this.config.reconnectDelayMs, signal))) break;
        continue;
      }

      if (signal.aborted) {
        socket.close();
        break;
      }

      const reason = await this.serve(socket, signal);
      if (signal.aborted) break;
      this.logger.warn({ reason, retryInMs: this.config.reconnectDelayMs }, "Connection lost");
      if (!(await sleep(this.config.reconnectDelayMs, signal))) break;
    }

    this.setState("disconnected");
  }

  private async serve(socket: PlatformSocket, stopSignal: AbortSignal): Promise<string> {
    const correlator = new Correlator();
    const writer = new FrameWriter(socket);
    this.correlator = correlator;
    this.frameWriter = writer;
    this.botStatus = unknownBot("onebot", "qq");

    const scope = this.scope(correlator, writer);
    socket.onMessage((text) => {
      const frame = decodeFrame(text);
      if (!frame) {
        this.logger.debug({ length: text.length }, "Dropped malformed frame");
        return;
      }
      this.track(processFrame(frame, { ...scope, bot: this.botStatus }));
    });

    this.setState("connected");
    this.logger.info({ url: this.config.url }, "Connected");

    const connectionEnded = new AbortController();
    this.track(this.fetchIdentity(correlator, writer, connectionEnded.signal));

    const closeOnStop = (): void => socket.close();
    stopSignal.addEventListener("abort", closeOnStop, { once: true });
    const reason = await socket.closed;
    stopSignal.removeEventListener("abort", closeOnStop);

    connectionEnded.abort();
    writer.detach();
    this.frameWriter = null;
    const drained = correlator.drain();
    this.setState("disconnected");
    this.logger.info({ reason, drained }, "Disconnected");
    return reason;
  }

  private async fetchIdentity(
    correlator: Correlator,
    writer: Writer,
    signal: AbortSignal,
  ): Promise<void> {
    if (!(await sleep(this.identityDelayMs, signal))) return;

    try {
      const info = await getLoginInfo(contextFor(this.scope(correlator, writer), { kind: "startup" }), writer);
      if (signal.aborted) return;
      this.botStatus = {
        adapter: "onebot",
        platform: "qq",
        loginUser: {
          id: String(info.user_id),
          name: info.nickname,
          nick: info.nickname,
          avatar: avatarUrl(info.user_id),
        },
      };
    } catch (err) {
      this.logger.warn({ err: errorMessage(err) }, "Could not fetch bot identity");
      return;
    }

    this.logger.info(
      { userId: this.botStatus.loginUser.id, nickname: this.botStatus.loginUser.nick },
      "Bot identity fetched",
    );
    this.emit("identity", this.botStatus);
    await this.services.pipeline.connected(
      contextFor(this.scope(correlator, writer), { kind: "startup" }),
      writer,
      this,
    );
  }

  private scope(correlator: Correlator, writer: Writer): FrameScope {
    return {
      services: this.services,
      correlator,
      writer,
      bot: this.botStatus,
      apiTimeoutMs: this.config.apiTimeoutMs,
      logger: this.logger,
    };
  }

  private track(task: Promise<void>): void {
    this.inflight.add(task);
    void task
      .catch((err) => this.logger.error({ err }, "Background task failed"))
      .finally(() => this.inflight.delete(task));
  }

  private setState(next: ConnectionState): void {
    const previous = this.currentState;
    if (previous === next) return;
    this.currentState = next;
    this.logger.debug({ from: previous, to: next }, "Connection state changed");
    this.emit("state", next, previous);
  }
}
