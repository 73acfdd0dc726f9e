export { default as subscriptionRoutes, toSubscriptionResponse } from './subscription-routes.js';
export { default as scheduleRoutes } from './schedule-routes.js';
export type { ScheduleRoutesOptions } from './schedule-routes.js';
export { default as adminRoutes } from './admin-routes.js';
