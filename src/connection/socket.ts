/**
 * The slice of a WebSocket the connection layer relies on. The `ws` client
 * implements it in production; tests hand in an in-process fake.
 */
export interface PlatformSocket {
  /** Text frames only, in arrival order. */
  onMessage(listener: (text: string) => void): void;
  send(frame: string): Promise<void>;
  close(): void;
  /** Resolves once with a description of why the socket ended. Never rejects. */
  readonly closed: Promise<string>;
}

export interface ConnectOptions {
  readonly url: string;
  readonly accessToken?: string;
}

export type SocketConnector = (options: ConnectOptions) => Promise<PlatformSocket>;

export function authHeaders(accessToken?: string): Record<string, string> {
  return accessToken ? { Authorization: `Bearer ${accessToken}` } : {};
}
