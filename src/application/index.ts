export { MemoizingCache, serializeArgs } from './memoizing-cache.js';
export type { CacheArgs, CachedFunction, CachedFunctionOptions } from './memoizing-cache.js';
export type {
  SubscriptionStore,
  SubscriptionUpsert,
  NotificationTransport,
  ReportSource,
  ReportLookup,
  ReportQuery,
} from './ports.js';
export * from './payloads.js';
export { SubscriptionRegistry } from './subscription-registry.js';
export type { SubscriptionRegistryOptions, GetOptions, DeleteOptions } from './subscription-registry.js';
export { DispatchFanout } from './dispatch-fanout.js';
export type { DispatchItem, DispatchReport } from './dispatch-fanout.js';
export { NotificationScheduler, MAX_TIMER_MS } from './notification-scheduler.js';
export type { TaskState, NotificationSchedulerOptions } from './notification-scheduler.js';
export {
  defineTask,
  createEventTasks,
  dailyResetTask,
  weeklyResetTask,
  fashionReportTask,
  oceanFishingTask,
  jumboCactpotTask,
  gateTask,
  openTournamentTask,
  DEFAULT_GRACE_MS,
} from './event-tasks.js';
export type { EventTask } from './event-tasks.js';
export { FashionReportService, FASHION_REPORT_CACHE_KEY } from './fashion-report.js';
export type { FashionReportServiceOptions } from './fashion-report.js';
export { abortableSleep } from './sleep.js';
export type { Sleep } from './sleep.js';
export { putSubscriptionSchema, entityParamsSchema, scheduleQuerySchema } from './subscription-schema.js';
export type { PutSubscriptionInput, ScheduleQuery } from './subscription-schema.js';
