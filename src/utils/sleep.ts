// setTimeout rejects delays above this and fires immediately instead
export const MAX_TIMER_MS = 2_147_483_647;

/** Resolves true after `ms`, or false as soon as the signal aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  if (signal?.aborted) return Promise.resolve(false);
  return new Promise<boolean>((resolve) => {
    const chunk = Math.min(Math.max(ms, 0), MAX_TIMER_MS);
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      if (ms > MAX_TIMER_MS) {
        resolve(sleep(ms - MAX_TIMER_MS, signal));
      } else {
        resolve(true);
      }
    }, chunk);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/** Resolves true when `work` settles, or false if the signal aborts first. */
export function untilAborted(work: Promise<unknown>, signal: AbortSignal): Promise<boolean> {
  if (signal.aborted) return Promise.resolve(false);
  return new Promise<boolean>((resolve) => {
    const onAbort = (): void => resolve(false);
    signal.addEventListener("abort", onAbort, { once: true });
    const done = (): void => {
      signal.removeEventListener("abort", onAbort);
      resolve(true);
    };
    work.then(done, done);
  });
}
