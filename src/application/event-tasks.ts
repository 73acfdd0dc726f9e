import {
  FASHION_REPORT_CLOSE_DAY,
  FASHION_REPORT_OPEN_DAY,
  FASHION_REPORT_TIME,
  DAILY_RESET_REMINDER_TIME,
  WEEKLY_RESET_DAY,
  WEEKLY_RESET_REMINDER_TIME,
  HOUR_MS,
  MINUTE_MS,
  createGateCalculator,
  createVoyageCalculators,
  fashionReportWeek,
  nextDailyOccurrence,
  nextDailyReset,
  nextJumboCactpotDrawing,
  nextOpenTournament,
  nextWeeklyOccurrence,
  nextWeeklyReset,
  type EventKind,
  type JumboCactpotRegion,
} from '../domain/index.js';
import type { FashionReportService } from './fashion-report.js';
import {
  dailyResetPayload,
  fashionReportPayload,
  fashionReportUnavailablePayload,
  gatePayload,
  jumboCactpotPayload,
  oceanFishingPayload,
  openTournamentPayload,
  weeklyResetPayload,
  type NotificationPayload,
} from './payloads.js';

/**
 * One recurring notification.
 *
 * `nextFireTime(now)` is strictly after `now`. `isDue(firedAt)` tells the
 * scheduler whether a wake-up actually landed on an occurrence.
 */
export interface EventTask {
  readonly kind: EventKind;
  readonly name: string;
  nextFireTime(now: Date): Date;
  isDue(firedAt: Date): boolean;
  buildPayload(firedAt: Date, signal: AbortSignal): Promise<NotificationPayload>;
}

/** How late a wake-up may be and still count as the occurrence it waited for. */
export const DEFAULT_GRACE_MS = 5 * MINUTE_MS;

interface TaskDefinition {
  kind: EventKind;
  name: string;
  nextFireTime(now: Date): Date;
  /** Receives the scheduled occurrence, not the wake-up time. */
  build(occurrence: Date, signal: AbortSignal): Promise<NotificationPayload> | NotificationPayload;
}

export function defineTask(definition: TaskDefinition, graceMs: number = DEFAULT_GRACE_MS): EventTask {
  // The most recent occurrence at or before `firedAt` within the grace window,
  // or the next one when there is none.
  const occurrenceFor = (firedAt: Date): Date =>
    definition.nextFireTime(new Date(firedAt.getTime() - graceMs));

  return {
    kind: definition.kind,
    name: definition.name,
    nextFireTime: definition.nextFireTime,
    isDue: (firedAt) => occurrenceFor(firedAt).getTime() <= firedAt.getTime(),
    buildPayload: async (firedAt, signal) => definition.build(occurrenceFor(firedAt), signal),
  };
}

export function dailyResetTask(): EventTask {
  return defineTask({
    kind: 'daily_reset',
    name: 'Daily reset reminder',
    nextFireTime: (now) => nextDailyOccurrence(DAILY_RESET_REMINDER_TIME, now),
    build: (occurrence) => dailyResetPayload(nextDailyReset(occurrence)),
  });
}

export function weeklyResetTask(): EventTask {
  return defineTask({
    kind: 'weekly_reset',
    name: 'Weekly reset reminder',
    nextFireTime: (now) => nextWeeklyOccurrence(WEEKLY_RESET_DAY, WEEKLY_RESET_REMINDER_TIME, now),
    build: (occurrence) => weeklyResetPayload(nextWeeklyReset(occurrence)),
  });
}

/** Fires when judging opens; a new week always starts from an empty cache. */
export function fashionReportTask(reports: Pick<FashionReportService, 'reset' | 'obtain'>): EventTask {
  return defineTask({
    kind: 'fashion_report',
    name: 'Fashion Report',
    nextFireTime: (now) => nextWeeklyOccurrence(FASHION_REPORT_OPEN_DAY, FASHION_REPORT_TIME, now),
    build: async (occurrence, signal) => {
      reports.reset();
      const result = await reports.obtain(occurrence, signal);
      if (result.status === 'found') {
        const closesAt = nextWeeklyOccurrence(FASHION_REPORT_CLOSE_DAY, FASHION_REPORT_TIME, occurrence);
        return fashionReportPayload(result.report, closesAt);
      }
      return fashionReportUnavailablePayload(fashionReportWeek(occurrence), result.reason);
    },
  });
}

/** Fires when registration for a voyage opens. */
export function oceanFishingTask(): EventTask {
  const routes = createVoyageCalculators();
  return defineTask({
    kind: 'ocean_fishing',
    name: 'Ocean Fishing',
    nextFireTime: (now) => routes.indigo.nextStartAfter(now).startsAt,
    build: (occurrence) => oceanFishingPayload({
      indigo: routes.indigo.slotFor(occurrence),
      ruby: routes.ruby.slotFor(occurrence),
    }),
  });
}

const CACTPOT_KINDS: Record<JumboCactpotRegion, EventKind> = {
  na: 'jumbo_cactpot_na',
  eu: 'jumbo_cactpot_eu',
  jp: 'jumbo_cactpot_jp',
  oce: 'jumbo_cactpot_oce',
};

/** Fires one hour before the region's drawing. */
export function jumboCactpotTask(region: JumboCactpotRegion): EventTask {
  return defineTask({
    kind: CACTPOT_KINDS[region],
    name: `Jumbo Cactpot (${region.toUpperCase()})`,
    nextFireTime: (now) => new Date(nextJumboCactpotDrawing(region, new Date(now.getTime() + HOUR_MS)).getTime() - HOUR_MS),
    build: (occurrence) => jumboCactpotPayload(region, nextJumboCactpotDrawing(region, occurrence)),
  });
}

export function gateTask(): EventTask {
  const gates = createGateCalculator();
  return defineTask({
    kind: 'gate',
    name: 'GATE',
    nextFireTime: (now) => gates.nextStartAfter(now).startsAt,
    build: (occurrence) => gatePayload(gates.slotFor(occurrence)),
  });
}

export function openTournamentTask(): EventTask {
  return defineTask({
    kind: 'open_tournament',
    name: 'Triple Triad open tournament',
    nextFireTime: nextOpenTournament,
    build: (occurrence) => openTournamentPayload(occurrence),
  });
}

/** One task per event kind. */
export function createEventTasks(reports: Pick<FashionReportService, 'reset' | 'obtain'>): EventTask[] {
  return [
    dailyResetTask(),
    weeklyResetTask(),
    fashionReportTask(reports),
    oceanFishingTask(),
    jumboCactpotTask('na'),
    jumboCactpotTask('eu'),
    jumboCactpotTask('jp'),
    jumboCactpotTask('oce'),
    gateTask(),
    openTournamentTask(),
  ];
}
