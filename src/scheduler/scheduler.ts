import { Cron } from "croner";
import type { Logger } from "../logging/logger.js";
import { sleep, untilAborted } from "../utils/sleep.js";
import { nextDailyOccurrence, validateWallClock } from "./daily.js";

/** Returns the next fire time after `now`, or null to end the series. */
export type NextRunCalculator = (now: Date) => Date | null;

/** The signal aborts when the schedule is removed. */
export type ScheduledTask = (signal: AbortSignal) => Promise<void> | void;

export type ScheduleId = number;

interface ScheduleEntry {
  readonly id: ScheduleId;
  readonly label: string;
  readonly controller: AbortController;
}

export class Scheduler {
  private readonly entries = new Map<ScheduleId, ScheduleEntry>();
  private nextId = 1;

  constructor(private readonly logger: Logger) {}

  get size(): number {
    return this.entries.size;
  }

  /** The calculator is first called before this returns. */
  addSchedule(calculator: NextRunCalculator, task: ScheduledTask, label = "schedule"): ScheduleId {
    const entry: ScheduleEntry = { id: this.nextId++, label, controller: new AbortController() };
    this.entries.set(entry.id, entry);

    void this.loop(entry, calculator, task)
      .catch((err) => {
        this.logger.error({ err, schedule: entry.id, label }, "Schedule loop failed");
      })
      .finally(() => {
        this.entries.delete(entry.id);
      });

    this.logger.debug({ schedule: entry.id, label }, "Schedule added");
    return entry.id;
  }

  addInterval(intervalMs: number, task: ScheduledTask, label = "interval"): ScheduleId {
    if (!(intervalMs > 0)) {
      throw new RangeError(`Interval must be positive, got ${intervalMs}`);
    }
    return this.addSchedule((now) => new Date(now.getTime() + intervalMs), task, label);
  }

  addDailyAt(
    hour: number,
    minute: number,
    second: number,
    task: ScheduledTask,
    label = `daily ${hour}:${minute}:${second}`,
  ): ScheduleId {
    const time = validateWallClock({ hour, minute, second });
    return this.addSchedule((now) => nextDailyOccurrence(now, time), task, label);
  }

  /** Throws on an invalid pattern. */
  addCron(pattern: string, task: ScheduledTask, label = `cron ${pattern}`): ScheduleId {
    const cron = new Cron(pattern);
    return this.addSchedule((now) => cron.nextRun(now), task, label);
  }

  /** Id of the live schedule carrying `label`, if any. */
  findByLabel(label: string): ScheduleId | undefined {
    for (const entry of this.entries.values()) {
      if (entry.label === label) return entry.id;
    }
    return undefined;
  }

  /** Aborts a pending sleep or an in-flight run; returns false for an unknown id. */
  remove(id: ScheduleId): boolean {
    const entry = this.entries.get(id);
    if (!entry) return false;
    entry.controller.abort();
    this.entries.delete(id);
    this.logger.debug({ schedule: id, label: entry.label }, "Schedule removed");
    return true;
  }

  shutdown(): void {
    const count = this.entries.size;
    for (const entry of this.entries.values()) entry.controller.abort();
    this.entries.clear();
    this.logger.info({ count }, "Scheduler stopped");
  }

  private async loop(
    entry: ScheduleEntry,
    calculator: NextRunCalculator,
    task: ScheduledTask,
  ): Promise<void> {
    const { signal } = entry.controller;
    let next = calculator(new Date());

    while (next !== null && !signal.aborted) {
      // a timer can fire early against the wall clock, or the clock can step back
      let delay = next.getTime() - Date.now();
      while (delay > 0) {
        if (!(await sleep(delay, signal))) return;
        delay = next.getTime() - Date.now();
      }

      const run = Promise.resolve()
        .then(() => task(signal))
        .catch((err: unknown) => {
          if (!signal.aborted) {
            this.logger.error({ err, schedule: entry.id, label: entry.label }, "Scheduled task failed");
          }
        });
      if (!(await untilAborted(run, signal))) return;

      next = calculator(new Date());
    }
  }
}
