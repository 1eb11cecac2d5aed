export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Raised when a frame is written while the platform socket is down. */
export class NotConnectedError extends Error {
  constructor(message = "Not connected to the platform") {
    super(message);
    this.name = "NotConnectedError";
  }
}

/** A plugin handler failed; scoped to the one event being processed. */
export class PluginError extends Error {
  constructor(
    readonly plugin: string,
    cause: unknown,
  ) {
    super(`Plugin ${plugin} failed: ${errorMessage(cause)}`, { cause });
    this.name = "PluginError";
  }
}

/** The platform answered an API call with a non-zero retcode. */
export class ApiCallError extends Error {
  constructor(
    readonly action: string,
    readonly retcode: number,
    detail: string,
  ) {
    super(`API call ${action} failed (retcode=${retcode}): ${detail}`);
    this.name = "ApiCallError";
  }
}

export class ApiTimeoutError extends Error {
  constructor(
    readonly action: string,
    readonly timeoutMs: number,
  ) {
    super(`API call ${action} timed out after ${timeoutMs}ms`);
    this.name = "ApiTimeoutError";
  }
}

/** The remote-control transport has shut down; the feature using it is unavailable. */
export class TransportClosedError extends Error {
  constructor(message = "Remote transport closed") {
    super(message);
    this.name = "TransportClosedError";
  }
}

/** A command or listener named an id that is still waiting for its reply. */
export class RemoteIdInUseError extends Error {
  constructor(readonly id: number) {
    super(`Remote id ${id} is already waiting for a reply`);
    this.name = "RemoteIdInUseError";
  }
}

export class RemoteTimeoutError extends Error {
  constructor(what: string, timeoutMs: number) {
    super(`Timed out after ${timeoutMs}ms waiting for ${what}`);
    this.name = "RemoteTimeoutError";
  }
}
