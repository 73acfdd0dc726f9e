import type {
  DeliveryEndpoint,
  DestinationConfig,
  EventKind,
  Snowflake,
  SubscriptionFlags,
} from '../domain/index.js';
import type { FashionReport, NotificationPayload } from './payloads.js';

export interface SubscriptionUpsert {
  entityId: Snowflake;
  channelId: Snowflake;
  threadId: Snowflake | null;
  flags: SubscriptionFlags;
}

/**
 * Persistence of subscriptions and their delivery endpoints.
 *
 * Deleting a subscription deletes its endpoint with it.
 */
export interface SubscriptionStore {
  findSubscription(entityId: Snowflake): Promise<DestinationConfig | null>;
  findSubscribers(kind: EventKind): Promise<DestinationConfig[]>;
  upsertSubscription(input: SubscriptionUpsert): Promise<DestinationConfig>;
  /** Returns false when no row existed. */
  deleteSubscription(entityId: Snowflake): Promise<boolean>;
  findEndpoint(entityId: Snowflake): Promise<DeliveryEndpoint | null>;
  /** Inserts or replaces the entity's endpoint. */
  saveEndpoint(endpoint: DeliveryEndpoint): Promise<void>;
  deleteEndpoint(entityId: Snowflake): Promise<boolean>;
}

/**
 * Delivery channel for payloads.
 *
 * `send` raises EndpointNotFoundError when the endpoint is gone and
 * `createEndpoint` raises ChannelUnavailableError when the channel is.
 */
export interface NotificationTransport {
  send(endpoint: DeliveryEndpoint, payload: NotificationPayload, threadId: Snowflake | null): Promise<void>;
  createEndpoint(channelId: Snowflake, entityId: Snowflake): Promise<DeliveryEndpoint>;
  deleteEndpoint(endpoint: DeliveryEndpoint): Promise<void>;
}

export type ReportLookup =
  | { status: 'found'; report: FashionReport }
  | { status: 'not-yet-available'; reason: string };

export type ReportQuery = {
  week: number;
  now: Date;
};

export interface ReportSource {
  fetchReport(query: ReportQuery): Promise<ReportLookup>;
}
