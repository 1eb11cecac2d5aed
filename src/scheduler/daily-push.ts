import { getGroupList } from "../api/actions.js";
import type { Writer } from "../connection/writer.js";
import type { Context, ContextSource } from "../pipeline/context.js";
import { isGroupAllowed } from "../security/group-filter.js";
import { sleep } from "../utils/sleep.js";
import { parseWallClock } from "./daily.js";
import type { ScheduleId } from "./scheduler.js";

export type GroupPushTask = (
  groupId: number,
  ctx: Context,
  writer: Writer,
  signal: AbortSignal,
) => Promise<void>;

export interface DailyPushOptions {
  readonly name: string;
  /** Local wall-clock time, "HH:MM:SS". */
  readonly time: string;
  readonly task: GroupPushTask;
  /** Pause between two groups to stay under platform rate limits. */
  readonly interGroupDelayMs?: number;
  /** Defaults to the platform's current group list. */
  readonly fetchGroups?: (ctx: Context, writer: Writer) => Promise<number[]>;
}

export const DEFAULT_INTER_GROUP_DELAY_MS = 2_000;

async function activeGroups(ctx: Context, writer: Writer): Promise<number[]> {
  const groups = await getGroupList(ctx, writer);
  return groups.map((group) => group.group_id);
}

/**
 * Once a day, runs `task` for every active group the shared group filter
 * lets through, one group at a time. Each day's run takes a fresh context
 * from `source`, so a push registered on one connection keeps working after
 * a reconnect. Registering the same name again for the same source returns
 * the existing schedule. Throws on an invalid time.
 */
export function scheduleDailyPush(source: ContextSource, options: DailyPushOptions): ScheduleId {
  const { hour, minute, second } = parseWallClock(options.time);
  const delayMs = options.interGroupDelayMs ?? DEFAULT_INTER_GROUP_DELAY_MS;
  const fetchGroups = options.fetchGroups ?? activeGroups;
  const { scheduler, logger: baseLogger } = source.createContext();
  const logger = baseLogger.child({ push: options.name, bot: source.id });
  const label = `push ${source.id}/${options.name}`;

  const existing = scheduler.findByLabel(label);
  if (existing !== undefined) {
    logger.debug({ schedule: existing }, "Daily push already scheduled");
    return existing;
  }

  return scheduler.addDailyAt(
    hour,
    minute,
    second,
    async (signal) => {
      const ctx = source.createContext();
      const { writer } = source;

      let groups: number[];
      try {
        groups = await fetchGroups(ctx, writer);
      } catch (err) {
        logger.error({ err }, "Could not fetch groups, skipping today's push");
        return;
      }

      const filter = ctx.config.snapshot().groupFilter;
      const targets = groups.filter((groupId) => isGroupAllowed(filter, groupId));
      logger.info({ groups: groups.length, targets: targets.length }, "Daily push started");

      for (const [index, groupId] of targets.entries()) {
        if (index > 0 && !(await sleep(delayMs, signal))) return;
        try {
          await options.task(groupId, source.createContext(), writer, signal);
        } catch (err) {
          logger.error({ err, groupId }, "Daily push failed for group");
        }
      }
      logger.info({ targets: targets.length }, "Daily push finished");
    },
    label,
  );
}
