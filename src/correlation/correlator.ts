import type { InboundFrame, OneBotEvent } from "../protocol/event.js";
import { MAX_TIMER_MS } from "../utils/sleep.js";

export type WaitPredicate =
  | { readonly kind: "echo"; readonly echo: string }
  | { readonly kind: "subject"; readonly groupId?: number; readonly userId?: number };

export interface WaitOptions {
  readonly timeoutMs: number;
  /** Aborting removes the waiter and resolves it with null. */
  readonly signal?: AbortSignal;
}

interface Waiter {
  readonly predicate: WaitPredicate;
  readonly createdAt: number;
  readonly settle: (event: OneBotEvent | null) => void;
}

function matches(predicate: WaitPredicate, frame: InboundFrame): boolean {
  const key = frame.correlation;
  if (predicate.kind === "echo") {
    return key.kind === "echo" && key.echo === predicate.echo;
  }
  if (key.kind !== "subject") return false;
  const groupMatches = predicate.groupId === undefined || predicate.groupId === key.groupId;
  const userMatches = predicate.userId === undefined || predicate.userId === key.userId;
  return groupMatches && userMatches;
}

/**
 * Table of single-use waiters for future frames: API replies keyed by echo
 * token, and "next message from this group/user" prompts keyed by subject ids.
 *
 * Each frame satisfies at most one waiter, the oldest that matches. A timeout
 * is a normal outcome and resolves the wait with `null`.
 */
export class Correlator {
  private readonly waiters: Waiter[] = [];

  get pending(): number {
    return this.waiters.length;
  }

  /** The waiter is in the table when this returns, so it is safe to send the request afterwards. */
  registerWait(predicate: WaitPredicate, options: WaitOptions): Promise<OneBotEvent | null> {
    return new Promise<OneBotEvent | null>((resolve) => {
      const { signal } = options;
      if (signal?.aborted) {
        resolve(null);
        return;
      }

      const onAbort = (): void => waiter.settle(null);
      const timer = setTimeout(() => waiter.settle(null), Math.min(options.timeoutMs, MAX_TIMER_MS));

      const waiter: Waiter = {
        predicate,
        createdAt: Date.now(),
        settle: (event) => {
          clearTimeout(timer);
          signal?.removeEventListener("abort", onAbort);
          this.remove(waiter);
          resolve(event);
        },
      };

      signal?.addEventListener("abort", onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  waitForReply(echo: string, timeoutMs: number): Promise<OneBotEvent | null> {
    return this.registerWait({ kind: "echo", echo }, { timeoutMs });
  }

  waitForMessage(
    subject: { groupId?: number; userId?: number },
    timeoutMs: number,
  ): Promise<OneBotEvent | null> {
    return this.registerWait({ kind: "subject", ...subject }, { timeoutMs });
  }

  /**
   * Hands the frame to the first matching waiter. Returns null when a waiter
   * consumed it, otherwise the frame itself for normal processing.
   */
  dispatch(frame: InboundFrame): InboundFrame | null {
    if (frame.correlation.kind === "none") return frame;

    const waiter = this.waiters.find((w) => matches(w.predicate, frame));
    if (!waiter) return frame;

    waiter.settle(frame.event);
    return null;
  }

  /** Resolves every outstanding waiter with null. */
  drain(): number {
    const outstanding = [...this.waiters];
    for (const waiter of outstanding) waiter.settle(null);
    return outstanding.length;
  }

  /** Age in milliseconds of the longest-waiting entry, or 0 when empty. */
  oldestAgeMs(now = Date.now()): number {
    const oldest = this.waiters[0];
    return oldest ? now - oldest.createdAt : 0;
  }

  private remove(waiter: Waiter): void {
    const idx = this.waiters.indexOf(waiter);
    if (idx >= 0) this.waiters.splice(idx, 1);
  }
}
