import { isRecord, readString, type JsonObject } from "../utils/json.js";
import { nextRemoteId } from "./ids.js";
import type { RemoteResponse, RemoteTransport } from "./transport.js";

function resultOf(response: RemoteResponse, method: string): JsonObject {
  const { value } = response;
  const error = value["error"];
  if (isRecord(error)) {
    throw new Error(`${method} failed: ${readString(error, "message") ?? "unknown error"}`);
  }
  const result = value["result"];
  return isRecord(result) ? result : {};
}

function requireString(result: JsonObject, key: string, method: string): string {
  const value = readString(result, key);
  if (value === undefined) throw new Error(`${method} returned no ${key}`);
  return value;
}

/**
 * One attached page. Commands for the page travel inside
 * Target.sendMessageToTarget envelopes; their replies come back nested in
 * Target.receivedMessageFromTarget and are matched by the inner id.
 */
export class TargetSession {
  private constructor(
    private readonly transport: RemoteTransport,
    readonly targetId: string,
    readonly sessionId: string,
  ) {}

  static async create(transport: RemoteTransport, url = "about:blank"): Promise<TargetSession> {
    const created = await transport.request({
      id: nextRemoteId(),
      method: "Target.createTarget",
      params: { url },
    });
    const targetId = requireString(resultOf(created, "Target.createTarget"), "targetId", "Target.createTarget");

    const attached = await transport.request({
      id: nextRemoteId(),
      method: "Target.attachToTarget",
      params: { targetId },
    });
    const sessionId = requireString(
      resultOf(attached, "Target.attachToTarget"),
      "sessionId",
      "Target.attachToTarget",
    );
    return new TargetSession(transport, targetId, sessionId);
  }

  /** Sends a command into the page and resolves with its `result`. */
  async send(method: string, params: JsonObject = {}): Promise<JsonObject> {
    const innerId = nextRemoteId();
    // the listener is queued ahead of the envelope, so the reply cannot slip past it
    const reply = this.transport.listenForTargetMessage(innerId);
    const envelope = this.transport.request({
      id: nextRemoteId(),
      method: "Target.sendMessageToTarget",
      params: {
        sessionId: this.sessionId,
        message: JSON.stringify({ id: innerId, method, params }),
      },
    });
    const [, response] = await Promise.all([envelope, reply]);
    return resultOf(response, method);
  }

  async evaluate(expression: string): Promise<JsonObject> {
    return this.send("Runtime.evaluate", { expression, awaitPromise: true, returnByValue: true });
  }

  /** Replaces the document and waits for its load event. */
  async setContent(html: string): Promise<void> {
    await this.send("Page.enable");
    const loaded = this.transport.waitForEvent(this.sessionId, "Page.loadEventFired");
    const write = `document.open(); document.write(${JSON.stringify(html)}); document.close();`;
    await Promise.all([loaded, this.send("Runtime.evaluate", { expression: write, awaitPromise: true })]);
  }

  async close(): Promise<void> {
    await this.send("Target.closeTarget", { targetId: this.targetId });
  }
}
