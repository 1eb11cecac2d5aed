export interface WallClockTime {
  readonly hour: number;
  readonly minute: number;
  readonly second: number;
}

const TIME_PATTERN = /^(\d{1,2}):(\d{2}):(\d{2})$/;

// a skipped wall-clock time only happens around a DST change, so the next day has it
const MAX_DAYS_AHEAD = 7;

export function validateWallClock(time: WallClockTime): WallClockTime {
  const { hour, minute, second } = time;
  const valid =
    Number.isInteger(hour) && hour >= 0 && hour <= 23 &&
    Number.isInteger(minute) && minute >= 0 && minute <= 59 &&
    Number.isInteger(second) && second >= 0 && second <= 59;
  if (!valid) {
    throw new RangeError(`Invalid time of day: ${hour}:${minute}:${second}`);
  }
  return time;
}

/** Parses "HH:MM:SS". */
export function parseWallClock(text: string): WallClockTime {
  const match = TIME_PATTERN.exec(text.trim());
  if (!match) {
    throw new RangeError(`Invalid time of day "${text}", expected HH:MM:SS`);
  }
  return validateWallClock({
    hour: Number(match[1]),
    minute: Number(match[2]),
    second: Number(match[3]),
  });
}

function localAt(base: Date, dayOffset: number, time: WallClockTime): Date | null {
  const candidate = new Date(
    base.getFullYear(),
    base.getMonth(),
    base.getDate() + dayOffset,
    time.hour,
    time.minute,
    time.second,
  );
  // Date normalizes a time inside a forward clock jump to a different wall time
  const exists =
    candidate.getHours() === time.hour &&
    candidate.getMinutes() === time.minute &&
    candidate.getSeconds() === time.second;
  return exists ? candidate : null;
}

/**
 * Next local occurrence of `time` strictly after `now`: today while the slot
 * is still ahead, otherwise the first following day on which that wall-clock
 * time exists.
 */
export function nextDailyOccurrence(now: Date, time: WallClockTime): Date | null {
  for (let offset = 0; offset <= MAX_DAYS_AHEAD; offset++) {
    const candidate = localAt(now, offset, time);
    if (candidate && candidate.getTime() > now.getTime()) return candidate;
  }
  return null;
}
