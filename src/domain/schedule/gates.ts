import { CyclicScheduleCalculator } from './cyclic-schedule.js';
import type { ScheduleSlot } from './types.js';
import { MINUTE_MS } from '../weekday.js';

export type GateMinute = 0 | 20 | 40;

export interface Gate {
  readonly name: string;
  readonly url: string;
}

const WIKI = 'https://ffxiv.consolegameswiki.com/wiki';

const CLIFFHANGER: Gate = { name: 'Cliffhanger', url: `${WIKI}/Cliffhanger` };
const ANY_WAY_THE_WIND_BLOWS: Gate = { name: 'Any Way the Wind Blows', url: `${WIKI}/Any_Way_the_Wind_Blows` };
const THE_SLICE_IS_RIGHT: Gate = { name: 'The Slice Is Right', url: `${WIKI}/The_Slice_Is_Right` };

function leapOfFaith(minute: GateMinute): Gate {
  const course = minute === 0 ? 'Nym' : minute === 20 ? "Belah'dia" : 'Sylphstep';
  return { name: `Leap of Faith [${course}]`, url: `${WIKI}/Leap_of_Faith` };
}

function airForceOne(minute: GateMinute): Gate {
  const course = minute === 20 ? 'The Gold Saucer' : 'Cieldalaes';
  return { name: `Air Force One [${course}]`, url: `${WIKI}/Air_Force_One` };
}

/** One of these three GATEs opens at the given minute past the hour. */
export const GATE_LINEUPS: readonly (readonly Gate[])[] = [
  [CLIFFHANGER, airForceOne(0), leapOfFaith(0)],
  [ANY_WAY_THE_WIND_BLOWS, THE_SLICE_IS_RIGHT, airForceOne(20)],
  [THE_SLICE_IS_RIGHT, airForceOne(40), leapOfFaith(40)],
];

export const GATE_MINUTES: readonly GateMinute[] = [0, 20, 40];

export type GateSlot = ScheduleSlot<readonly Gate[], GateMinute>;

export function createGateCalculator(): CyclicScheduleCalculator<readonly Gate[], GateMinute> {
  return new CyclicScheduleCalculator({
    name: 'gate',
    anchor: new Date('2020-06-28T00:00:00Z'),
    slotWidthMs: 20 * MINUTE_MS,
    openWindowMs: 0,
    destinations: GATE_LINEUPS,
    times: GATE_MINUTES,
  });
}
