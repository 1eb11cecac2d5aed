import { NotConnectedError } from "../utils/errors.js";
import type { PlatformSocket } from "./socket.js";

/** Handle plugins and helpers use to put one outbound frame on the wire. */
export interface Writer {
  send(frame: string): Promise<void>;
}

/**
 * Serializes frames onto one socket. Each send waits for the previous one to
 * be handed to the socket, so frames from concurrent callers never interleave.
 */
export class FrameWriter implements Writer {
  private tail: Promise<void> = Promise.resolve();
  private socket: PlatformSocket | null;

  constructor(socket: PlatformSocket) {
    this.socket = socket;
  }

  send(frame: string): Promise<void> {
    const run = this.tail.then(() => {
      if (!this.socket) throw new NotConnectedError();
      return this.socket.send(frame);
    });
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  /** Later sends reject with NotConnectedError. */
  detach(): void {
    this.socket = null;
  }
}

/** Writer for code that runs with no connection at all. */
export const disconnectedWriter: Writer = {
  send: () => Promise.reject(new NotConnectedError()),
};
