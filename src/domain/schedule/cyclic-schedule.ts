import { ScheduleDefinitionError } from '../errors.js';
import type { CyclicScheduleDefinition, ScheduleSlot } from './types.js';

interface CycleEntry {
  readonly destinationIndex: number;
  readonly timeIndex: number;
}

function gcd(a: number, b: number): number {
  return b === 0 ? a : gcd(b, a % b);
}

function lcm(a: number, b: number): number {
  return (a / gcd(a, b)) * b;
}

/** Remainder that is never negative, also for slots before the anchor. */
export function positiveMod(value: number, modulus: number): number {
  return ((value % modulus) + modulus) % modulus;
}

function assertNonNegativeInteger(value: number, label: string, name: string): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new ScheduleDefinitionError(`${name}: ${label} must be a non-negative integer, got ${value}`);
  }
}

/**
 * Maps any point in time onto a repeating destination / time-of-day rotation.
 *
 * One full period (`slotsPerDay × lcm(destinations, times)` slots) is stepped
 * through once at construction; every query afterwards is a table lookup.
 */
export class CyclicScheduleCalculator<D, T> {
  readonly name: string;
  readonly cycleLength: number;

  private readonly anchorMs: number;
  private readonly widthMs: number;
  private readonly openWindowMs: number;
  private readonly destinations: readonly D[];
  private readonly times: readonly T[];
  private readonly table: readonly CycleEntry[];

  constructor(definition: CyclicScheduleDefinition<D, T>) {
    const { name, destinations, times, rollover } = definition;
    const initialIndex = definition.initialIndex ?? 0;

    if (destinations.length === 0 || times.length === 0) {
      throw new ScheduleDefinitionError(`${name}: destination and time cycles must be non-empty`);
    }
    if (!Number.isFinite(definition.slotWidthMs) || definition.slotWidthMs <= 0) {
      throw new ScheduleDefinitionError(`${name}: slot width must be positive, got ${definition.slotWidthMs}`);
    }
    if (Number.isNaN(definition.anchor.getTime())) {
      throw new ScheduleDefinitionError(`${name}: anchor is not a valid date`);
    }
    assertNonNegativeInteger(initialIndex, 'initialIndex', name);

    const openWindowMs = definition.openWindowMs ?? definition.slotWidthMs;
    if (openWindowMs < 0 || openWindowMs > definition.slotWidthMs) {
      throw new ScheduleDefinitionError(`${name}: open window must lie within the slot width`);
    }

    const slotsPerDay = rollover?.slotsPerDay ?? 1;
    if (rollover) {
      if (!Number.isInteger(slotsPerDay) || slotsPerDay < 1) {
        throw new ScheduleDefinitionError(`${name}: slotsPerDay must be a positive integer`);
      }
      assertNonNegativeInteger(rollover.anchorSlotOfDay, 'anchorSlotOfDay', name);
      assertNonNegativeInteger(rollover.step, 'step', name);
      if (rollover.anchorSlotOfDay >= slotsPerDay) {
        throw new ScheduleDefinitionError(`${name}: anchorSlotOfDay must be below slotsPerDay`);
      }
    }

    this.name = name;
    this.anchorMs = definition.anchor.getTime();
    this.widthMs = definition.slotWidthMs;
    this.openWindowMs = openWindowMs;
    this.destinations = destinations;
    this.times = times;
    this.cycleLength = slotsPerDay * lcm(destinations.length, times.length);

    const table: CycleEntry[] = [];
    let destinationIndex = initialIndex % destinations.length;
    let timeIndex = initialIndex % times.length;

    for (let i = 0; i < this.cycleLength; i++) {
      table.push({ destinationIndex, timeIndex });

      const lastSlotOfDay = rollover !== undefined
        && (rollover.anchorSlotOfDay + i) % slotsPerDay === slotsPerDay - 1;
      const step = lastSlotOfDay ? rollover.step : 1;

      destinationIndex = (destinationIndex + step) % destinations.length;
      timeIndex = (timeIndex + step) % times.length;
    }

    this.table = table;
  }

  /** The slot with the given index (index 0 starts at the anchor). */
  slotAt(slotIndex: number): ScheduleSlot<D, T> {
    const entry = this.table[positiveMod(slotIndex, this.cycleLength)];
    const destination = entry && this.destinations[entry.destinationIndex];
    const timeOfDay = entry && this.times[entry.timeIndex];
    if (entry === undefined || destination === undefined || timeOfDay === undefined) {
      throw new ScheduleDefinitionError(`${this.name}: no table entry for slot ${slotIndex}`);
    }

    return {
      slotIndex,
      startsAt: new Date(this.anchorMs + slotIndex * this.widthMs),
      destination,
      timeOfDay,
    };
  }

  /** The slot whose window contains `time`. */
  slotFor(time: Date): ScheduleSlot<D, T> {
    return this.slotAt(Math.floor((time.getTime() - this.anchorMs) / this.widthMs));
  }

  /**
   * `count` consecutive slots, starting with the first one that is still
   * open at `from` (start + open window lies after `from`).
   */
  upcoming(from: Date, count: number): ScheduleSlot<D, T>[] {
    if (!Number.isInteger(count) || count < 0) {
      throw new ScheduleDefinitionError(`${this.name}: count must be a non-negative integer, got ${count}`);
    }

    const first = Math.floor((from.getTime() - this.anchorMs - this.openWindowMs) / this.widthMs) + 1;
    const slots: ScheduleSlot<D, T>[] = [];
    for (let i = 0; i < count; i++) {
      slots.push(this.slotAt(first + i));
    }
    return slots;
  }

  /** The first slot starting strictly after `time`. */
  nextStartAfter(time: Date): ScheduleSlot<D, T> {
    return this.slotAt(Math.floor((time.getTime() - this.anchorMs) / this.widthMs) + 1);
  }
}
