import { pgTable, bigint, text, timestamp, customType, index } from 'drizzle-orm/pg-core';

/**
 * PostgreSQL `bit(64)`. postgres.js reads and writes it in its text form:
 * 64 characters of 0/1, most significant bit first.
 */
export const bit64 = customType<{ data: string; driverData: string }>({
  dataType() {
    return 'bit(64)';
  },
});

export const EMPTY_BITS = '0'.repeat(64);

/**
 * One row per subscribing guild.
 *
 * Snowflakes are stored as `bigint` and handled as `bigint` in JS so no
 * precision is lost above 2^53.
 */
export const eventSubscriptions = pgTable('event_subscriptions', {
  entity_id: bigint('entity_id', { mode: 'bigint' }).primaryKey(),
  channel_id: bigint('channel_id', { mode: 'bigint' }).notNull(),
  thread_id: bigint('thread_id', { mode: 'bigint' }),
  subscriptions: bit64('subscriptions').notNull().default(EMPTY_BITS),
  updated_at: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
});

/**
 * The webhook used to deliver to a guild. Removed together with the
 * guild's subscription row.
 */
export const deliveryEndpoints = pgTable('delivery_endpoints', {
  entity_id: bigint('entity_id', { mode: 'bigint' })
    .primaryKey()
    .references(() => eventSubscriptions.entity_id, { onDelete: 'cascade' }),
  endpoint_id: bigint('endpoint_id', { mode: 'bigint' }).notNull().unique(),
  token: text('token').notNull(),
  channel_id: bigint('channel_id', { mode: 'bigint' }).notNull(),
  url: text('url').notNull(),
  created_at: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => [
  index('idx_delivery_endpoints_channel_id').on(table.channel_id),
]);
