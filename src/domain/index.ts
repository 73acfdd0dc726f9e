export * from './errors.js';
export * from './weekday.js';
export * from './event-kind.js';
export * from './destination.js';
export * from './calendar.js';
export type { CyclicScheduleDefinition, RolloverCorrection, ScheduleSlot } from './schedule/types.js';
export { CyclicScheduleCalculator, positiveMod } from './schedule/cyclic-schedule.js';
export * from './schedule/voyages.js';
export * from './schedule/gates.js';
