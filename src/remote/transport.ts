import type { Logger } from "../logging/logger.js";
import { connectWebSocket } from "../connection/websocket.js";
import type { PlatformSocket } from "../connection/socket.js";
import {
  errorMessage,
  RemoteIdInUseError,
  RemoteTimeoutError,
  TransportClosedError,
} from "../utils/errors.js";
import { isRecord, readInteger, readString, tryParseJson, type JsonObject } from "../utils/json.js";
import { MAX_TIMER_MS } from "../utils/sleep.js";
import { nextRemoteId } from "./ids.js";
import { Mailbox } from "./mailbox.js";

export type RemoteResponse =
  /** Direct reply to a command sent on this socket. */
  | { readonly kind: "response"; readonly id: number; readonly value: JsonObject }
  /** Reply from inside a target session, unwrapped from its envelope. */
  | { readonly kind: "target"; readonly value: JsonObject };

export interface RemoteCommand extends JsonObject {
  readonly id: number;
  readonly method: string;
}

interface Pending<T> {
  readonly resolve: (value: T) => void;
  readonly reject: (err: Error) => void;
}

type Mail =
  | { readonly kind: "frame"; readonly text: string }
  | { readonly kind: "socket-closed"; readonly reason: string }
  | { readonly kind: "request"; readonly command: RemoteCommand; readonly reply: Pending<RemoteResponse> }
  | { readonly kind: "listen"; readonly id: number; readonly reply: Pending<RemoteResponse> }
  | {
      readonly kind: "wait-event";
      readonly sessionId: string;
      readonly method: string;
      readonly reply: Pending<void>;
    }
  | { readonly kind: "shutdown" };

const TARGET_MESSAGE = "Target.receivedMessageFromTarget";

export const DEFAULT_REMOTE_TIMEOUT_MS = 30_000;

function eventKey(sessionId: string, method: string): string {
  return `${sessionId}\u0000${method}`;
}

function withDeadline<T>(work: Promise<T>, timeoutMs: number, what: string): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(
      () => reject(new RemoteTimeoutError(what, timeoutMs)),
      Math.min(timeoutMs, MAX_TIMER_MS),
    );
    work.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (err: unknown) => {
        clearTimeout(timer);
        reject(err);
      },
    );
  });
}

/**
 * Owns one remote-control socket. Socket frames and caller commands share a
 * single mailbox that one loop works through in order; that loop is the only
 * code that touches the pending-reply and event-waiter tables.
 */
export class RemoteTransport {
  private readonly mailbox = new Mailbox<Mail>();
  private readonly pending = new Map<number, Pending<RemoteResponse>>();
  private readonly eventWaiters = new Map<string, Array<Pending<void>>>();
  private readonly finished: Promise<void>;
  private closedReason: string | null = null;

  constructor(
    private readonly socket: PlatformSocket,
    private readonly logger: Logger,
    private readonly timeoutMs = DEFAULT_REMOTE_TIMEOUT_MS,
  ) {
    socket.onMessage((text) => this.mailbox.push({ kind: "frame", text }));
    void socket.closed.then((reason) => this.mailbox.push({ kind: "socket-closed", reason }));
    this.finished = this.run().catch((err) => {
      this.logger.error({ err }, "Remote transport loop crashed");
      this.close("loop crashed");
    });
  }

  static async connect(url: string, logger: Logger, timeoutMs?: number): Promise<RemoteTransport> {
    const socket = await connectWebSocket({ url });
    return new RemoteTransport(socket, logger, timeoutMs);
  }

  get isClosed(): boolean {
    return this.closedReason !== null;
  }

  /** Writes a command and resolves with the reply carrying its id. */
  request(command: RemoteCommand): Promise<RemoteResponse> {
    const reply = this.enqueue<RemoteResponse>((pending) => ({ kind: "request", command, reply: pending }));
    return withDeadline(reply, this.timeoutMs, `reply to ${command.method}`);
  }

  /** Resolves with the target-session reply whose inner id is `id`. */
  listenForTargetMessage(id: number): Promise<RemoteResponse> {
    const reply = this.enqueue<RemoteResponse>((pending) => ({ kind: "listen", id, reply: pending }));
    return withDeadline(reply, this.timeoutMs, `target message ${id}`);
  }

  /** Resolves the next time `method` fires in the given session. */
  waitForEvent(sessionId: string, method: string): Promise<void> {
    const fired = this.enqueue<void>((pending) => ({ kind: "wait-event", sessionId, method, reply: pending }));
    return withDeadline(fired, this.timeoutMs, `event ${method}`);
  }

  /** Asks the browser to close, closes the socket and rejects everything still waiting. */
  async shutdown(): Promise<void> {
    if (!this.isClosed) this.mailbox.push({ kind: "shutdown" });
    await this.finished;
  }

  private enqueue<T>(build: (pending: Pending<T>) => Mail): Promise<T> {
    if (this.closedReason !== null) {
      return Promise.reject(new TransportClosedError(`Remote transport closed: ${this.closedReason}`));
    }
    return new Promise<T>((resolve, reject) => {
      this.mailbox.push(build({ resolve, reject }));
    });
  }

  private async run(): Promise<void> {
    for (;;) {
      const mail = await this.mailbox.take();
      if (!(await this.handle(mail))) return;
    }
  }

  /** Returns false when the loop should stop. */
  private async handle(mail: Mail): Promise<boolean> {
    switch (mail.kind) {
      case "frame":
        this.handleFrame(mail.text);
        return true;

      case "request": {
        if (this.pending.has(mail.command.id)) {
          mail.reply.reject(new RemoteIdInUseError(mail.command.id));
          return true;
        }
        try {
          await this.socket.send(JSON.stringify(mail.command));
          this.pending.set(mail.command.id, mail.reply);
        } catch (err) {
          mail.reply.reject(new Error(`Remote send failed: ${errorMessage(err)}`));
        }
        return true;
      }

      case "listen":
        if (this.pending.has(mail.id)) {
          mail.reply.reject(new RemoteIdInUseError(mail.id));
          return true;
        }
        this.pending.set(mail.id, mail.reply);
        return true;

      case "wait-event": {
        const key = eventKey(mail.sessionId, mail.method);
        const waiters = this.eventWaiters.get(key) ?? [];
        waiters.push(mail.reply);
        this.eventWaiters.set(key, waiters);
        return true;
      }

      case "shutdown":
        await this.sendBrowserClose();
        this.socket.close();
        this.close("shut down");
        return false;

      case "socket-closed":
        this.logger.info({ reason: mail.reason }, "Remote transport socket closed");
        this.close(mail.reason);
        return false;
    }
  }

  private handleFrame(text: string): void {
    const frame = tryParseJson(text);
    if (!isRecord(frame)) {
      this.logger.debug({ length: text.length }, "Dropped undecodable remote frame");
      return;
    }

    const id = readInteger(frame, "id");
    if (id !== undefined) {
      const pending = this.pending.get(id);
      if (pending) {
        this.pending.delete(id);
        pending.resolve({ kind: "response", id, value: frame });
      }
      return;
    }

    if (readString(frame, "method") !== TARGET_MESSAGE) return;
    const params = frame["params"];
    if (!isRecord(params)) return;
    const message = readString(params, "message");
    if (message === undefined) return;
    const inner = tryParseJson(message);
    if (!isRecord(inner)) {
      this.logger.debug("Dropped undecodable target message");
      return;
    }
    this.handleTargetMessage(inner, params);
  }

  private handleTargetMessage(inner: JsonObject, outerParams: JsonObject): void {
    const innerId = readInteger(inner, "id");
    if (innerId !== undefined) {
      const pending = this.pending.get(innerId);
      if (pending) {
        this.pending.delete(innerId);
        pending.resolve({ kind: "target", value: inner });
      }
      return;
    }

    const method = readString(inner, "method");
    const sessionId = readString(outerParams, "sessionId");
    if (method === undefined || sessionId === undefined) return;

    const key = eventKey(sessionId, method);
    const waiters = this.eventWaiters.get(key);
    if (!waiters) return;
    this.eventWaiters.delete(key);
    for (const waiter of waiters) waiter.resolve();
  }

  private async sendBrowserClose(): Promise<void> {
    try {
      await this.socket.send(JSON.stringify({ id: nextRemoteId(), method: "Browser.close", params: {} }));
    } catch (err) {
      this.logger.debug({ err: errorMessage(err) }, "Browser.close could not be sent");
    }
  }

  private close(reason: string): void {
    if (this.closedReason !== null) return;
    this.closedReason = reason;
    const error = (): TransportClosedError => new TransportClosedError(`Remote transport closed: ${reason}`);

    for (const pending of this.pending.values()) pending.reject(error());
    this.pending.clear();
    for (const waiters of this.eventWaiters.values()) {
      for (const waiter of waiters) waiter.reject(error());
    }
    this.eventWaiters.clear();

    for (const mail of this.mailbox.drain()) {
      if (mail.kind === "request" || mail.kind === "listen" || mail.kind === "wait-event") {
        mail.reply.reject(error());
      }
    }
  }
}
