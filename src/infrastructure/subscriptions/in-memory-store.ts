import type {
  DeliveryEndpoint,
  DestinationConfig,
  EventKind,
  Snowflake,
} from '../../domain/index.js';
import type { SubscriptionStore, SubscriptionUpsert } from '../../application/ports.js';

interface StoredSubscription {
  entityId: Snowflake;
  channelId: Snowflake;
  threadId: Snowflake | null;
  flags: DestinationConfig['flags'];
}

/**
 * In-memory subscription store.
 *
 * Mirrors the Drizzle store's behaviour, including the cascade from a
 * subscription to its endpoint, so the engine can run without Postgres
 * (tests, local previews).
 */
export class InMemorySubscriptionStore implements SubscriptionStore {
  private readonly subscriptions = new Map<Snowflake, StoredSubscription>();
  private readonly endpoints = new Map<Snowflake, DeliveryEndpoint>();

  async findSubscription(entityId: Snowflake): Promise<DestinationConfig | null> {
    const row = this.subscriptions.get(entityId);
    return row ? this.toConfig(row) : null;
  }

  async findSubscribers(kind: EventKind): Promise<DestinationConfig[]> {
    return [...this.subscriptions.values()]
      .filter((row) => row.flags.has(kind))
      .map((row) => this.toConfig(row));
  }

  async upsertSubscription(input: SubscriptionUpsert): Promise<DestinationConfig> {
    const row: StoredSubscription = { ...input };
    this.subscriptions.set(input.entityId, row);
    return this.toConfig(row);
  }

  async deleteSubscription(entityId: Snowflake): Promise<boolean> {
    this.endpoints.delete(entityId);
    return this.subscriptions.delete(entityId);
  }

  async findEndpoint(entityId: Snowflake): Promise<DeliveryEndpoint | null> {
    return this.endpoints.get(entityId) ?? null;
  }

  async saveEndpoint(endpoint: DeliveryEndpoint): Promise<void> {
    this.endpoints.set(endpoint.entityId, endpoint);
  }

  async deleteEndpoint(entityId: Snowflake): Promise<boolean> {
    return this.endpoints.delete(entityId);
  }

  /** Number of stored subscriptions (useful for testing). */
  get size(): number {
    return this.subscriptions.size;
  }

  private toConfig(row: StoredSubscription): DestinationConfig {
    return {
      ...row,
      endpointId: this.endpoints.get(row.entityId)?.id ?? null,
    };
  }
}
