import { CyclicScheduleCalculator } from './cyclic-schedule.js';
import type { CyclicScheduleDefinition, ScheduleSlot } from './types.js';
import { HOUR_MS, MINUTE_MS } from '../weekday.js';

/**
 * Ocean fishing voyage rotation.
 *
 * Voyages leave every two hours on even UTC hours. The route's day rolls
 * over in Japan time (UTC+9), where voyages fall on odd hours: the 23:00
 * voyage is followed by 01:00 the next day and both cycles skip a position.
 * 2020-06-28T00:00Z is 09:00 JST, the fifth voyage (slot 4) of its day.
 */

export type VoyageRoute = 'indigo' | 'ruby';

export type VoyageTime = 'day' | 'sunset' | 'night';

export type FishingStop =
  | 'Galadion Bay'
  | 'The Southern Strait of Merlthor'
  | 'The Northern Strait of Merlthor'
  | 'Rhotano Sea'
  | 'The Cieldalaes'
  | 'The Bloodbrine Sea'
  | 'The Rothlyt Sound'
  | 'The Sirensong Sea'
  | 'Kugane'
  | 'The Ruby Sea'
  | 'The One River';

/** Voyages are named after their final stop. */
export type VoyageDestination = Extract<
  FishingStop,
  | 'The Northern Strait of Merlthor'
  | 'Rhotano Sea'
  | 'The Bloodbrine Sea'
  | 'The Rothlyt Sound'
  | 'The Ruby Sea'
  | 'The One River'
>;

export type VoyageSlot = ScheduleSlot<VoyageDestination, VoyageTime>;

export const VOYAGE_ANCHOR = new Date('2020-06-28T00:00:00Z');
export const VOYAGE_WIDTH_MS = 2 * HOUR_MS;
/** A voyage counts as current until 45 minutes after registration opens. */
export const VOYAGE_OPEN_WINDOW_MS = 45 * MINUTE_MS;
/** Registration closes and the boat leaves 15 minutes after the slot starts. */
export const VOYAGE_BOARDING_MS = 15 * MINUTE_MS;

const ROLLOVER = { slotsPerDay: 12, anchorSlotOfDay: 4, step: 2 } as const;

export const VOYAGE_DEFINITIONS: Record<VoyageRoute, CyclicScheduleDefinition<VoyageDestination, VoyageTime>> = {
  indigo: {
    name: 'ocean-fishing:indigo',
    anchor: VOYAGE_ANCHOR,
    slotWidthMs: VOYAGE_WIDTH_MS,
    openWindowMs: VOYAGE_OPEN_WINDOW_MS,
    initialIndex: 4,
    rollover: ROLLOVER,
    destinations: [
      'The Bloodbrine Sea',
      'The Rothlyt Sound',
      'The Northern Strait of Merlthor',
      'Rhotano Sea',
    ],
    times: [
      'sunset', 'sunset', 'sunset', 'sunset',
      'night', 'night', 'night', 'night',
      'day', 'day', 'day', 'day',
    ],
  },
  ruby: {
    name: 'ocean-fishing:ruby',
    anchor: VOYAGE_ANCHOR,
    slotWidthMs: VOYAGE_WIDTH_MS,
    openWindowMs: VOYAGE_OPEN_WINDOW_MS,
    initialIndex: 4,
    rollover: ROLLOVER,
    destinations: ['The One River', 'The Ruby Sea'],
    times: ['day', 'day', 'sunset', 'sunset', 'night', 'night'],
  },
};

const STOPS: Record<VoyageDestination, readonly [FishingStop, FishingStop, FishingStop]> = {
  'The Northern Strait of Merlthor': ['The Southern Strait of Merlthor', 'Galadion Bay', 'The Northern Strait of Merlthor'],
  'Rhotano Sea': ['Galadion Bay', 'The Southern Strait of Merlthor', 'Rhotano Sea'],
  'The Bloodbrine Sea': ['The Cieldalaes', 'The Northern Strait of Merlthor', 'The Bloodbrine Sea'],
  'The Rothlyt Sound': ['The Cieldalaes', 'Rhotano Sea', 'The Rothlyt Sound'],
  'The Ruby Sea': ['The Sirensong Sea', 'Kugane', 'The Ruby Sea'],
  'The One River': ['The Sirensong Sea', 'Kugane', 'The One River'],
};

// Time of day at each stop, keyed by the time at the final stop.
const STOP_TIMES: Record<VoyageTime, readonly [VoyageTime, VoyageTime, VoyageTime]> = {
  day: ['sunset', 'night', 'day'],
  night: ['day', 'sunset', 'night'],
  sunset: ['night', 'day', 'sunset'],
};

export interface VoyageStop {
  readonly stop: FishingStop;
  readonly time: VoyageTime;
}

export function voyageStops(slot: VoyageSlot): VoyageStop[] {
  const stops = STOPS[slot.destination];
  const times = STOP_TIMES[slot.timeOfDay];
  return [
    { stop: stops[0], time: times[0] },
    { stop: stops[1], time: times[1] },
    { stop: stops[2], time: times[2] },
  ];
}

export function setsSailAt(slot: VoyageSlot): Date {
  return new Date(slot.startsAt.getTime() + VOYAGE_BOARDING_MS);
}

export function hasSetSail(slot: VoyageSlot, now: Date): boolean {
  return setsSailAt(slot).getTime() < now.getTime();
}

export function createVoyageCalculators(): Record<VoyageRoute, CyclicScheduleCalculator<VoyageDestination, VoyageTime>> {
  return {
    indigo: new CyclicScheduleCalculator(VOYAGE_DEFINITIONS.indigo),
    ruby: new CyclicScheduleCalculator(VOYAGE_DEFINITIONS.ruby),
  };
}
