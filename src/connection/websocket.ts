import WebSocket from "ws";
import { NotConnectedError } from "../utils/errors.js";
import { authHeaders, type ConnectOptions, type PlatformSocket } from "./socket.js";

function rawToText(data: WebSocket.RawData): string {
  if (Buffer.isBuffer(data)) return data.toString("utf-8");
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf-8");
  return Buffer.from(data).toString("utf-8");
}

class WsPlatformSocket implements PlatformSocket {
  readonly closed: Promise<string>;
  private readonly listeners: Array<(text: string) => void> = [];

  constructor(private readonly ws: WebSocket) {
    ws.on("message", (data, isBinary) => {
      if (isBinary) return;
      const text = rawToText(data);
      for (const listener of this.listeners) listener(text);
    });

    this.closed = new Promise<string>((resolve) => {
      ws.once("close", (code, reason) => {
        const detail = reason.length > 0 ? `: ${reason.toString("utf-8")}` : "";
        resolve(`closed with code ${code}${detail}`);
      });
      ws.on("error", (err) => {
        resolve(`socket error: ${err.message}`);
        ws.terminate();
      });
    });
  }

  onMessage(listener: (text: string) => void): void {
    this.listeners.push(listener);
  }

  send(frame: string): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      if (this.ws.readyState !== WebSocket.OPEN) {
        reject(new NotConnectedError());
        return;
      }
      this.ws.send(frame, (err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  close(): void {
    this.ws.close();
  }
}

/** Opens a `ws` client connection, resolving once the handshake completes. */
export function connectWebSocket(options: ConnectOptions): Promise<PlatformSocket> {
  return new Promise<PlatformSocket>((resolve, reject) => {
    const ws = new WebSocket(options.url, { headers: authHeaders(options.accessToken) });

    const onError = (err: Error): void => {
      ws.off("open", onOpen);
      reject(err);
    };
    const onOpen = (): void => {
      ws.off("error", onError);
      resolve(new WsPlatformSocket(ws));
    };

    ws.once("open", onOpen);
    ws.on("error", onError);
  });
}
