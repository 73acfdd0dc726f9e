import type { SqlClient } from './client.js';

/**
 * Creates the tables when they are missing.
 *
 * drizzle-kit owns real migrations (`drizzle.config.ts`); this keeps a
 * fresh local database usable on the worker's first start.
 */
export async function ensureSchema(sql: SqlClient): Promise<void> {
  await sql.unsafe(`
    CREATE TABLE IF NOT EXISTS event_subscriptions (
      entity_id      BIGINT      PRIMARY KEY,
      channel_id     BIGINT      NOT NULL,
      thread_id      BIGINT,
      subscriptions  BIT(64)     NOT NULL DEFAULT B'0'::BIT(64),
      updated_at     TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `);

  await sql.unsafe(`
    CREATE TABLE IF NOT EXISTS delivery_endpoints (
      entity_id    BIGINT      PRIMARY KEY REFERENCES event_subscriptions (entity_id) ON DELETE CASCADE,
      endpoint_id  BIGINT      NOT NULL UNIQUE,
      token        TEXT        NOT NULL,
      channel_id   BIGINT      NOT NULL,
      url          TEXT        NOT NULL,
      created_at   TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `);

  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_delivery_endpoints_channel_id ON delivery_endpoints (channel_id)`);
}
