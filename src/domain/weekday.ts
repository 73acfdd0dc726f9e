/**
 * Weekday arithmetic in UTC.
 *
 * Weekdays use ISO numbering throughout (Monday = 1 … Sunday = 7).
 * `Date#getUTCDay()` is 0-based with Sunday = 0 and must never leak
 * past `isoWeekday()`.
 */

export const Weekday = {
  Monday: 1,
  Tuesday: 2,
  Wednesday: 3,
  Thursday: 4,
  Friday: 5,
  Saturday: 6,
  Sunday: 7,
} as const;

export type Weekday = (typeof Weekday)[keyof typeof Weekday];

/** A UTC wall-clock time. Omitted fields are zero. */
export interface TimeOfDay {
  readonly hour: number;
  readonly minute?: number;
  readonly second?: number;
}

export const DAY_MS = 86_400_000;
export const WEEK_MS = 7 * DAY_MS;
export const HOUR_MS = 3_600_000;
export const MINUTE_MS = 60_000;

export function isoWeekday(date: Date): Weekday {
  switch (date.getUTCDay()) {
    case 1: return Weekday.Monday;
    case 2: return Weekday.Tuesday;
    case 3: return Weekday.Wednesday;
    case 4: return Weekday.Thursday;
    case 5: return Weekday.Friday;
    case 6: return Weekday.Saturday;
    default: return Weekday.Sunday;
  }
}

/** Milliseconds elapsed since UTC midnight. */
export function timeOfDayMs(date: Date): number {
  return (
    date.getUTCHours() * HOUR_MS
    + date.getUTCMinutes() * MINUTE_MS
    + date.getUTCSeconds() * 1000
    + date.getUTCMilliseconds()
  );
}

export function toMs(time: TimeOfDay): number {
  return time.hour * HOUR_MS + (time.minute ?? 0) * MINUTE_MS + (time.second ?? 0) * 1000;
}

/** Same UTC calendar day as `date`, pinned to `time`. */
export function atTimeOfDay(date: Date, time: TimeOfDay): Date {
  return new Date(Date.UTC(
    date.getUTCFullYear(),
    date.getUTCMonth(),
    date.getUTCDate(),
    time.hour,
    time.minute ?? 0,
    time.second ?? 0,
  ));
}

export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * DAY_MS);
}

export interface ResolveNextWeekdayOptions {
  readonly target: Weekday;
  readonly source: Date;
  /** When false, a `source` already on `target` always moves a week ahead. */
  readonly currentWeekIncluded: boolean;
  /** Cutoff for "today": at or after this time, today's window has passed. */
  readonly beforeTime?: TimeOfDay;
}

/**
 * Resolves the next date falling on `target`.
 *
 * Only the day is resolved: the result keeps `source`'s time-of-day, and
 * callers pin the event's own clock with `atTimeOfDay()`.
 */
export function resolveNextWeekday(options: ResolveNextWeekdayOptions): Date {
  const { target, source, currentWeekIncluded, beforeTime } = options;
  const current = isoWeekday(source);

  if (current === target) {
    if (!currentWeekIncluded) {
      return addDays(source, 7);
    }
    if (beforeTime !== undefined && timeOfDayMs(source) >= toMs(beforeTime)) {
      return addDays(source, 7);
    }
    return new Date(source.getTime());
  }

  const diff = (target - current + 7) % 7;
  return addDays(source, diff);
}
