import { eq, sql } from 'drizzle-orm';
import {
  SubscriptionFlags,
  type DeliveryEndpoint,
  type DestinationConfig,
  type EventKind,
  type Snowflake,
} from '../../domain/index.js';
import type { SubscriptionStore, SubscriptionUpsert } from '../../application/ports.js';
import type { Database } from './client.js';
import { EMPTY_BITS, deliveryEndpoints, eventSubscriptions } from './schema.js';

/** Row shapes returned by subscription queries. */
export type SubscriptionRow = typeof eventSubscriptions.$inferSelect;
export type EndpointRow = typeof deliveryEndpoints.$inferSelect;

function toConfig(row: SubscriptionRow, endpointId: bigint | null): DestinationConfig {
  return {
    entityId: row.entity_id.toString(),
    channelId: row.channel_id.toString(),
    threadId: row.thread_id === null ? null : row.thread_id.toString(),
    flags: SubscriptionFlags.fromBitString(row.subscriptions),
    endpointId: endpointId === null ? null : endpointId.toString(),
  };
}

function toEndpoint(row: EndpointRow): DeliveryEndpoint {
  return {
    entityId: row.entity_id.toString(),
    id: row.endpoint_id.toString(),
    token: row.token,
    channelId: row.channel_id.toString(),
    url: row.url,
  };
}

/**
 * Drizzle-backed subscription storage.
 *
 * Bitset membership is tested in SQL (`subscriptions & mask`), so
 * `findSubscribers` never loads rows that are not subscribed.
 */
export class DrizzleSubscriptionStore implements SubscriptionStore {
  constructor(private readonly db: Database) {}

  async findSubscription(entityId: Snowflake): Promise<DestinationConfig | null> {
    const rows = await this.db
      .select({ subscription: eventSubscriptions, endpointId: deliveryEndpoints.endpoint_id })
      .from(eventSubscriptions)
      .leftJoin(deliveryEndpoints, eq(deliveryEndpoints.entity_id, eventSubscriptions.entity_id))
      .where(eq(eventSubscriptions.entity_id, BigInt(entityId)))
      .limit(1);

    const row = rows[0];
    return row ? toConfig(row.subscription, row.endpointId) : null;
  }

  async findSubscribers(kind: EventKind): Promise<DestinationConfig[]> {
    const mask = SubscriptionFlags.of(kind).toBitString();
    const rows = await this.db
      .select({ subscription: eventSubscriptions, endpointId: deliveryEndpoints.endpoint_id })
      .from(eventSubscriptions)
      .leftJoin(deliveryEndpoints, eq(deliveryEndpoints.entity_id, eventSubscriptions.entity_id))
      .where(sql`(${eventSubscriptions.subscriptions} & ${mask}::bit(64)) <> ${EMPTY_BITS}::bit(64)`);

    return rows.map((row) => toConfig(row.subscription, row.endpointId));
  }

  async upsertSubscription(input: SubscriptionUpsert): Promise<DestinationConfig> {
    const values = {
      entity_id: BigInt(input.entityId),
      channel_id: BigInt(input.channelId),
      thread_id: input.threadId === null ? null : BigInt(input.threadId),
      subscriptions: input.flags.toBitString(),
      updated_at: new Date(),
    };

    const [row] = await this.db
      .insert(eventSubscriptions)
      .values(values)
      .onConflictDoUpdate({
        target: eventSubscriptions.entity_id,
        set: {
          channel_id: values.channel_id,
          thread_id: values.thread_id,
          subscriptions: values.subscriptions,
          updated_at: values.updated_at,
        },
      })
      .returning();

    if (!row) {
      throw new Error(`Upsert of subscription ${input.entityId} returned no row`);
    }
    const endpoint = await this.findEndpoint(input.entityId);
    return toConfig(row, endpoint === null ? null : BigInt(endpoint.id));
  }

  async deleteSubscription(entityId: Snowflake): Promise<boolean> {
    const rows = await this.db
      .delete(eventSubscriptions)
      .where(eq(eventSubscriptions.entity_id, BigInt(entityId)))
      .returning({ entity_id: eventSubscriptions.entity_id });
    return rows.length > 0;
  }

  async findEndpoint(entityId: Snowflake): Promise<DeliveryEndpoint | null> {
    const rows = await this.db
      .select()
      .from(deliveryEndpoints)
      .where(eq(deliveryEndpoints.entity_id, BigInt(entityId)))
      .limit(1);

    const row = rows[0];
    return row ? toEndpoint(row) : null;
  }

  async saveEndpoint(endpoint: DeliveryEndpoint): Promise<void> {
    const values = {
      entity_id: BigInt(endpoint.entityId),
      endpoint_id: BigInt(endpoint.id),
      token: endpoint.token,
      channel_id: BigInt(endpoint.channelId),
      url: endpoint.url,
    };

    await this.db
      .insert(deliveryEndpoints)
      .values(values)
      .onConflictDoUpdate({
        target: deliveryEndpoints.entity_id,
        set: {
          endpoint_id: values.endpoint_id,
          token: values.token,
          channel_id: values.channel_id,
          url: values.url,
          created_at: new Date(),
        },
      });
  }

  async deleteEndpoint(entityId: Snowflake): Promise<boolean> {
    const rows = await this.db
      .delete(deliveryEndpoints)
      .where(eq(deliveryEndpoints.entity_id, BigInt(entityId)))
      .returning({ entity_id: deliveryEndpoints.entity_id });
    return rows.length > 0;
  }
}
