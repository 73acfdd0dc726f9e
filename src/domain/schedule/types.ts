/**
 * Day-boundary correction for cyclic schedules.
 *
 * Some rotations skip a position when the source domain's day rolls over.
 * `anchorSlotOfDay` places slot 0 inside that day (the day may be
 * timezone-shifted relative to UTC); after the last slot of each day both
 * cycles advance by `step` instead of 1.
 */
export interface RolloverCorrection {
  readonly slotsPerDay: number;
  readonly anchorSlotOfDay: number;
  readonly step: number;
}

export interface CyclicScheduleDefinition<D, T> {
  readonly name: string;
  /** Start of slot index 0. */
  readonly anchor: Date;
  readonly slotWidthMs: number;
  readonly destinations: readonly D[];
  readonly times: readonly T[];
  /** Position of slot 0 in both cycles. Defaults to 0. */
  readonly initialIndex?: number;
  /**
   * How long after its start a slot still counts as open for `upcoming()`.
   * Defaults to the full slot width.
   */
  readonly openWindowMs?: number;
  readonly rollover?: RolloverCorrection;
}

/** One fixed-width window of a cyclic schedule. */
export interface ScheduleSlot<D, T> {
  readonly slotIndex: number;
  readonly startsAt: Date;
  readonly destination: D;
  readonly timeOfDay: T;
}
