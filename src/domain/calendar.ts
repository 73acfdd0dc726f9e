import { CyclicScheduleCalculator } from './schedule/cyclic-schedule.js';
import {
  Weekday,
  HOUR_MS,
  WEEK_MS,
  addDays,
  atTimeOfDay,
  isoWeekday,
  resolveNextWeekday,
  timeOfDayMs,
  toMs,
  type TimeOfDay,
} from './weekday.js';

/**
 * Fixed reset clocks. All times are UTC.
 */
export const DAILY_RESET_TIME: TimeOfDay = { hour: 15 };
export const DAILY_RESET_REMINDER_TIME: TimeOfDay = { hour: 14 };
export const WEEKLY_RESET_DAY = Weekday.Tuesday;
export const WEEKLY_RESET_TIME: TimeOfDay = { hour: 8 };
export const WEEKLY_RESET_REMINDER_TIME: TimeOfDay = { hour: 7 };

export const FASHION_REPORT_OPEN_DAY = Weekday.Friday;
export const FASHION_REPORT_CLOSE_DAY = Weekday.Tuesday;
export const FASHION_REPORT_TIME: TimeOfDay = { hour: 8 };
/** Week 0 of the fashion report numbering. */
export const FASHION_REPORT_EPOCH = new Date('2018-01-26T08:00:00Z');

export type JumboCactpotRegion = 'na' | 'eu' | 'jp' | 'oce';

export interface WeeklyClock {
  readonly weekday: Weekday;
  readonly time: TimeOfDay;
}

export const JUMBO_CACTPOT_DRAWINGS: Record<JumboCactpotRegion, WeeklyClock> = {
  na: { weekday: Weekday.Sunday, time: { hour: 2 } },
  eu: { weekday: Weekday.Saturday, time: { hour: 19 } },
  jp: { weekday: Weekday.Saturday, time: { hour: 12 } },
  oce: { weekday: Weekday.Saturday, time: { hour: 9 } },
};

/** The next instant strictly after `now` at `time` UTC. */
export function nextDailyOccurrence(time: TimeOfDay, now: Date): Date {
  const today = atTimeOfDay(now, time);
  return today.getTime() > now.getTime() ? today : addDays(today, 1);
}

/** The next instant strictly after `now` on `weekday` at `time` UTC. */
export function nextWeeklyOccurrence(weekday: Weekday, time: TimeOfDay, now: Date): Date {
  const day = resolveNextWeekday({
    target: weekday,
    source: now,
    currentWeekIncluded: true,
    beforeTime: time,
  });
  return atTimeOfDay(day, time);
}

export function nextDailyReset(now: Date): Date {
  return nextDailyOccurrence(DAILY_RESET_TIME, now);
}

export function nextWeeklyReset(now: Date): Date {
  return nextWeeklyOccurrence(WEEKLY_RESET_DAY, WEEKLY_RESET_TIME, now);
}

export function nextJumboCactpotDrawing(region: JumboCactpotRegion, now: Date): Date {
  const { weekday, time } = JUMBO_CACTPOT_DRAWINGS[region];
  return nextWeeklyOccurrence(weekday, time, now);
}

/** Judging runs from Friday 08:00 UTC until Tuesday 08:00 UTC. */
export function isJudgingOpen(now: Date): boolean {
  const weekday = isoWeekday(now);
  const pastReset = timeOfDayMs(now) >= toMs(FASHION_REPORT_TIME);

  switch (weekday) {
    case Weekday.Friday:
      return pastReset;
    case Weekday.Saturday:
    case Weekday.Sunday:
    case Weekday.Monday:
      return true;
    case Weekday.Tuesday:
      return !pastReset;
    default:
      return false;
  }
}

export interface FashionReportWindow {
  readonly judgingOpen: boolean;
  readonly opensAt: Date;
  readonly closesAt: Date;
}

export function nextFashionReportWindow(now: Date): FashionReportWindow {
  return {
    judgingOpen: isJudgingOpen(now),
    opensAt: nextWeeklyOccurrence(FASHION_REPORT_OPEN_DAY, FASHION_REPORT_TIME, now),
    closesAt: nextWeeklyOccurrence(FASHION_REPORT_CLOSE_DAY, FASHION_REPORT_TIME, now),
  };
}

/** Whole weeks elapsed since {@link FASHION_REPORT_EPOCH}. */
export function fashionReportWeek(now: Date): number {
  return Math.floor((now.getTime() - FASHION_REPORT_EPOCH.getTime()) / WEEK_MS);
}

// Open tournaments start on every odd UTC hour.
const OPEN_TOURNAMENT = new CyclicScheduleCalculator({
  name: 'open-tournament',
  anchor: new Date('2020-06-28T01:00:00Z'),
  slotWidthMs: 2 * HOUR_MS,
  openWindowMs: 0,
  destinations: ['Open Tournament'],
  times: ['signup'],
});

export function nextOpenTournament(now: Date): Date {
  return OPEN_TOURNAMENT.nextStartAfter(now).startsAt;
}
