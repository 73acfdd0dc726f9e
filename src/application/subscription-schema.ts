import { z } from 'zod';
import { isEventKind, isSnowflake, type EventKind } from '../domain/index.js';

const snowflake = z.string().refine(isSnowflake, 'must be a Discord snowflake');

const eventKind = z.custom<EventKind>(
  (value) => typeof value === 'string' && isEventKind(value),
  { message: 'unknown event kind' },
);

/**
 * Schema for PUT /api/v1/subscriptions/:entity_id.
 *
 * Subscriptions are given either as a list of kinds or as the raw bitset
 * (decimal string, since it may exceed 2^53). Exactly one of the two.
 */
export const putSubscriptionSchema = z.object({
  kinds: z.array(eventKind).optional(),
  flags: z.string().regex(/^[0-9]{1,20}$/, 'must be a decimal integer').optional(),
  channel_id: snowflake,
  thread_id: snowflake.nullable().optional(),
}).refine(
  (body) => (body.kinds === undefined) !== (body.flags === undefined),
  { message: 'exactly one of kinds or flags is required' },
);

export type PutSubscriptionInput = z.infer<typeof putSubscriptionSchema>;

export const entityParamsSchema = z.object({
  entity_id: snowflake,
});

/** Query for GET /api/v1/schedules/*. */
export const scheduleQuerySchema = z.object({
  route: z.enum(['indigo', 'ruby']).optional(),
  count: z.coerce.number().int().min(1).max(50).default(5),
});

export type ScheduleQuery = z.infer<typeof scheduleQuerySchema>;
