import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { Mailbox } from "../../src/remote/mailbox.js";
import { sleep, untilAborted } from "../../src/utils/sleep.js";

describe("sleep", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("resolves true once the time has passed", async () => {
    let result: boolean | null = null;
    void sleep(1_000).then((value) => {
      result = value;
    });

    await vi.advanceTimersByTimeAsync(999);
    expect(result).toBeNull();
    await vi.advanceTimersByTimeAsync(1);
    expect(result).toBe(true);
  });

  it("resolves false as soon as the signal aborts", async () => {
    const controller = new AbortController();
    const slept = sleep(60_000, controller.signal);
    controller.abort();
    await expect(slept).resolves.toBe(false);
    await expect(sleep(10, controller.signal)).resolves.toBe(false);
  });

  it("waits out delays longer than one timer allows", async () => {
    const week = 7 * 24 * 60 * 60 * 1_000;
    const done = vi.fn();
    void sleep(week * 4).then(done);

    await vi.advanceTimersByTimeAsync(week * 4 - 1);
    expect(done).not.toHaveBeenCalled();
    await vi.advanceTimersByTimeAsync(1);
    expect(done).toHaveBeenCalledWith(true);
  });
});

describe("untilAborted", () => {
  it("reports whether the work settled before the abort", async () => {
    const controller = new AbortController();
    await expect(untilAborted(Promise.reject(new Error("x")), controller.signal)).resolves.toBe(true);

    const never = new Promise<void>(() => undefined);
    const waiting = untilAborted(never, controller.signal);
    controller.abort();
    await expect(waiting).resolves.toBe(false);
  });
});

describe("Mailbox", () => {
  it("hands items out in the order they were pushed", async () => {
    const mailbox = new Mailbox<number>();
    mailbox.push(1);
    mailbox.push(2);
    expect(await mailbox.take()).toBe(1);
    expect(await mailbox.take()).toBe(2);
  });

  it("wakes a consumer that is already waiting", async () => {
    const mailbox = new Mailbox<string>();
    const next = mailbox.take();
    mailbox.push("frame");
    await expect(next).resolves.toBe("frame");
    expect(mailbox.drain()).toEqual([]);
  });
});
