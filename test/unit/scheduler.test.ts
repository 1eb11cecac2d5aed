import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { Scheduler } from "../../src/scheduler/scheduler.js";
import { capturingLogger, silentLogger } from "../helpers/fixtures.js";

describe("Scheduler", () => {
  let scheduler: Scheduler;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date(2026, 0, 10, 12, 0, 0));
    scheduler = new Scheduler(silentLogger());
  });

  afterEach(() => {
    scheduler.shutdown();
    vi.useRealTimers();
  });

  it("rolls a daily slot that has already passed to the next day", async () => {
    vi.setSystemTime(new Date(2026, 0, 10, 23, 31, 0));
    const runs: Date[] = [];
    scheduler.addDailyAt(23, 30, 0, () => {
      runs.push(new Date());
    });

    // 23h58m later it is 23:29 on the next day
    await vi.advanceTimersByTimeAsync(86_280_000);
    expect(runs).toEqual([]);

    await vi.advanceTimersByTimeAsync(60_000);
    expect(runs).toEqual([new Date(2026, 0, 11, 23, 30, 0)]);
  });

  it("fires a daily slot later the same day when it is still ahead", async () => {
    const runs: Date[] = [];
    scheduler.addDailyAt(12, 0, 30, () => {
      runs.push(new Date());
    });

    await vi.advanceTimersByTimeAsync(30_000);
    expect(runs).toEqual([new Date(2026, 0, 10, 12, 0, 30)]);
  });

  it("runs a daily slot once when the clock steps back before it fires", async () => {
    vi.setSystemTime(new Date(2026, 0, 10, 7, 59, 59));
    const runs: Date[] = [];
    scheduler.addDailyAt(8, 0, 0, () => {
      runs.push(new Date());
    });

    vi.setSystemTime(Date.now() - 5);
    await vi.advanceTimersByTimeAsync(2_000);

    expect(runs).toEqual([new Date(2026, 0, 10, 8, 0, 0)]);
  });

  it("rejects an impossible time of day", () => {
    expect(() => scheduler.addDailyAt(24, 0, 0, () => undefined)).toThrow(RangeError);
    expect(() => scheduler.addDailyAt(8, 60, 0, () => undefined)).toThrow(RangeError);
  });

  it("runs an interval task once per period", async () => {
    const task = vi.fn();
    scheduler.addInterval(1_000, task);

    await vi.advanceTimersByTimeAsync(3_000);
    expect(task).toHaveBeenCalledTimes(3);
  });

  it("follows a cron pattern", async () => {
    vi.setSystemTime(new Date(2026, 0, 10, 8, 59, 30));
    const runs: Date[] = [];
    scheduler.addCron("0 9 * * *", () => {
      runs.push(new Date());
    });

    await vi.advanceTimersByTimeAsync(30_000);
    expect(runs).toEqual([new Date(2026, 0, 10, 9, 0, 0)]);
  });

  it("keeps the series going after a task error", async () => {
    const logs = capturingLogger();
    scheduler = new Scheduler(logs.logger);
    const task = vi.fn().mockRejectedValueOnce(new Error("flaky")).mockResolvedValue(undefined);
    scheduler.addInterval(1_000, task);

    await vi.advanceTimersByTimeAsync(2_000);
    expect(task).toHaveBeenCalledTimes(2);
    expect(logs.messages("error")).toEqual(["Scheduled task failed"]);
  });

  it("ends the series when the calculator returns null", async () => {
    const task = vi.fn();
    let remaining = 2;
    scheduler.addSchedule((now) => (remaining-- > 0 ? new Date(now.getTime() + 100) : null), task);

    await vi.advanceTimersByTimeAsync(1_000);
    expect(task).toHaveBeenCalledTimes(2);
    expect(scheduler.size).toBe(0);
  });

  it("runs immediately when the calculator returns a time already due", async () => {
    const task = vi.fn();
    let first = true;
    scheduler.addSchedule((now) => {
      if (!first) return null;
      first = false;
      return new Date(now.getTime() - 5_000);
    }, task);

    await vi.advanceTimersByTimeAsync(0);
    expect(task).toHaveBeenCalledTimes(1);
  });

  it("cancels a pending sleep on remove", async () => {
    const task = vi.fn();
    const id = scheduler.addInterval(1_000, task);

    expect(scheduler.remove(id)).toBe(true);
    expect(scheduler.remove(id)).toBe(false);
    await vi.advanceTimersByTimeAsync(5_000);

    expect(task).not.toHaveBeenCalled();
    expect(scheduler.size).toBe(0);
  });

  it("aborts an in-flight run on remove and schedules nothing after it", async () => {
    const signals: AbortSignal[] = [];
    const task = vi.fn((signal: AbortSignal) => {
      signals.push(signal);
      return new Promise<void>(() => undefined);
    });
    const id = scheduler.addInterval(1_000, task);

    await vi.advanceTimersByTimeAsync(1_000);
    expect(signals).toHaveLength(1);
    expect(signals[0]?.aborted).toBe(false);

    scheduler.remove(id);
    expect(signals[0]?.aborted).toBe(true);

    await vi.advanceTimersByTimeAsync(5_000);
    expect(task).toHaveBeenCalledTimes(1);
  });

  it("finds a live schedule by its label", () => {
    const id = scheduler.addInterval(1_000, () => undefined, "heartbeat");

    expect(scheduler.findByLabel("heartbeat")).toBe(id);
    expect(scheduler.findByLabel("missing")).toBeUndefined();

    scheduler.remove(id);
    expect(scheduler.findByLabel("heartbeat")).toBeUndefined();
  });

  it("shutdown removes every schedule", async () => {
    const task = vi.fn();
    scheduler.addInterval(1_000, task);
    scheduler.addDailyAt(13, 0, 0, task);
    expect(scheduler.size).toBe(2);

    scheduler.shutdown();
    await vi.advanceTimersByTimeAsync(2 * 60 * 60 * 1_000);

    expect(scheduler.size).toBe(0);
    expect(task).not.toHaveBeenCalled();
  });
});
