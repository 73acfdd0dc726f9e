import type { BaseLogger } from 'pino';
import {
  ChannelUnavailableError,
  MisconfiguredDestinationError,
  SubscriptionFlags,
  emptyDestination,
  type DeliveryEndpoint,
  type DestinationConfig,
  type EventKind,
  type Snowflake,
} from '../domain/index.js';
import type { CachedFunction, MemoizingCache } from './memoizing-cache.js';
import type { NotificationTransport, SubscriptionStore } from './ports.js';

export interface SubscriptionRegistryOptions {
  store: SubscriptionStore;
  transport: NotificationTransport;
  cache: MemoizingCache;
  log: BaseLogger;
  /** Called after every write, e.g. to tell other processes to invalidate. */
  onChange?: (entityId: Snowflake) => Promise<void>;
}

export interface GetOptions {
  /** A just-created endpoint to persist before reading. */
  freshEndpoint?: DeliveryEndpoint;
}

export interface DeleteOptions {
  /** Also delete the endpoint on the transport side. Defaults to true. */
  deleteRemote?: boolean;
}

type EntityArgs = { entityId: Snowflake };
type EndpointArgs = { entityId: Snowflake; channelId: Snowflake };

/**
 * Owns every destination's subscription and delivery endpoint.
 *
 * Reads go through the memoizing cache; every write invalidates the
 * affected entity before it returns, so a read following a write in the
 * same process always sees the write.
 */
export class SubscriptionRegistry {
  private readonly store: SubscriptionStore;
  private readonly transport: NotificationTransport;
  private readonly log: BaseLogger;
  private readonly onChange: ((entityId: Snowflake) => Promise<void>) | undefined;
  private readonly configs: CachedFunction<EntityArgs, DestinationConfig>;
  private readonly endpoints: CachedFunction<EndpointArgs, DeliveryEndpoint>;

  constructor(options: SubscriptionRegistryOptions) {
    this.store = options.store;
    this.transport = options.transport;
    this.log = options.log;
    this.onChange = options.onChange;

    this.configs = options.cache.define('registry.config', async ({ entityId }: EntityArgs) => {
      const config = await this.store.findSubscription(entityId);
      return config ?? emptyDestination(entityId);
    });

    // channelId is left out of the key: a channel change invalidates the entity.
    this.endpoints = options.cache.define(
      'registry.endpoint',
      (args: EndpointArgs) => this.loadOrCreateEndpoint(args),
      { ignore: ['channelId'] },
    );
  }

  async get(entityId: Snowflake, options: GetOptions = {}): Promise<DestinationConfig> {
    if (options.freshEndpoint) {
      await this.store.saveEndpoint(options.freshEndpoint);
      this.invalidate(entityId);
    }
    return this.configs.call({ entityId });
  }

  async setSubscriptions(
    entityId: Snowflake,
    flags: SubscriptionFlags | bigint | number,
    channelId: Snowflake,
    threadId: Snowflake | null = null,
  ): Promise<DestinationConfig> {
    const validated = flags instanceof SubscriptionFlags ? flags : SubscriptionFlags.fromValue(flags);

    const previous = await this.store.findSubscription(entityId);
    if (previous !== null && previous.channelId !== channelId) {
      await this.dropEndpoint(entityId);
    }

    const config = await this.store.upsertSubscription({ entityId, channelId, threadId, flags: validated });
    this.invalidate(entityId);
    this.log.info({ entity_id: entityId, kinds: validated.kinds() }, 'Subscriptions updated');

    await this.notifyChange(entityId);
    return config;
  }

  async delete(entityId: Snowflake, options: DeleteOptions = {}): Promise<boolean> {
    const endpoint = await this.store.findEndpoint(entityId);
    const deleted = await this.store.deleteSubscription(entityId);
    this.invalidate(entityId);

    if (endpoint !== null && (options.deleteRemote ?? true)) {
      await this.deleteRemote(endpoint);
    }

    if (deleted) {
      this.log.info({ entity_id: entityId }, 'Subscription deleted');
      await this.notifyChange(entityId);
    }
    return deleted;
  }

  async subscribersOf(kind: EventKind): Promise<DestinationConfig[]> {
    return this.store.findSubscribers(kind);
  }

  /**
   * The entity's endpoint, created in its channel on first use.
   *
   * Concurrent calls for one entity share a single creation. A cached
   * endpoint in another channel than `config.channelId` is reloaded.
   */
  async resolveEndpoint(config: DestinationConfig): Promise<DeliveryEndpoint> {
    const { entityId, channelId } = config;
    if (channelId === null) {
      throw new MisconfiguredDestinationError(entityId, 'no channel configured');
    }

    const cached = await this.endpoints.call({ entityId, channelId });
    if (cached.channelId === channelId) return cached;

    // A missed invalidation left an endpoint for the previous channel cached.
    this.log.info({ entity_id: entityId, channel_id: channelId, stale_channel_id: cached.channelId }, 'Dropping stale endpoint');
    this.invalidate(entityId);
    return this.endpoints.call({ entityId, channelId });
  }

  /** Drops cached reads for one entity, or for all of them. */
  invalidate(entityId?: Snowflake): boolean {
    const args = entityId === undefined ? undefined : { entityId };
    const configs = this.configs.invalidate(args);
    // channelId is ignored in the endpoint key
    const endpoints = entityId === undefined
      ? this.endpoints.invalidate()
      : this.endpoints.invalidate({ entityId, channelId: '' });
    return configs || endpoints;
  }

  private async loadOrCreateEndpoint({ entityId, channelId }: EndpointArgs): Promise<DeliveryEndpoint> {
    const existing = await this.store.findEndpoint(entityId);
    if (existing !== null && existing.channelId === channelId) {
      return existing;
    }
    if (existing !== null) {
      await this.store.deleteEndpoint(entityId);
      await this.deleteRemote(existing);
    }

    let created: DeliveryEndpoint;
    try {
      created = await this.transport.createEndpoint(channelId, entityId);
    } catch (err: unknown) {
      if (err instanceof ChannelUnavailableError) {
        throw new MisconfiguredDestinationError(entityId, `channel ${channelId} is unavailable`, { cause: err });
      }
      throw err;
    }

    await this.store.saveEndpoint(created);
    this.configs.invalidate({ entityId });
    this.log.info({ entity_id: entityId, channel_id: channelId, endpoint_id: created.id }, 'Delivery endpoint created');

    await this.notifyChange(entityId);
    return created;
  }

  private async dropEndpoint(entityId: Snowflake): Promise<void> {
    const endpoint = await this.store.findEndpoint(entityId);
    if (endpoint === null) return;

    await this.store.deleteEndpoint(entityId);
    await this.deleteRemote(endpoint);
  }

  private async deleteRemote(endpoint: DeliveryEndpoint): Promise<void> {
    try {
      await this.transport.deleteEndpoint(endpoint);
    } catch (err: unknown) {
      this.log.warn({ err, entity_id: endpoint.entityId, endpoint_id: endpoint.id }, 'Failed to delete remote endpoint');
    }
  }

  private async notifyChange(entityId: Snowflake): Promise<void> {
    if (!this.onChange) return;
    try {
      await this.onChange(entityId);
    } catch (err: unknown) {
      this.log.warn({ err, entity_id: entityId }, 'Subscription change hook failed');
    }
  }
}
