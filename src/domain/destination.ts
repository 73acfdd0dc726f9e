import { SubscriptionFlags } from './event-kind.js';

/**
 * Discord snowflakes are 64-bit integers; they travel through the system as
 * decimal strings so no precision is lost in JSON or `number`.
 */
export type Snowflake = string;

export const SNOWFLAKE_RE = /^[0-9]{1,20}$/;

/** Snowflakes are stored in signed `bigint` columns. */
export const MAX_SNOWFLAKE = 2n ** 63n - 1n;

export function isSnowflake(value: string): value is Snowflake {
  return SNOWFLAKE_RE.test(value) && BigInt(value) <= MAX_SNOWFLAKE;
}

/**
 * A subscribing guild's delivery configuration.
 *
 * Snapshots are immutable. The registry replaces them wholesale on write.
 */
export interface DestinationConfig {
  readonly entityId: Snowflake;
  readonly channelId: Snowflake | null;
  /** Messages go to this thread inside `channelId` when set. */
  readonly threadId: Snowflake | null;
  readonly flags: SubscriptionFlags;
  readonly endpointId: Snowflake | null;
}

/** A Discord webhook the engine can post to without further permission checks. */
export interface DeliveryEndpoint {
  readonly entityId: Snowflake;
  readonly id: Snowflake;
  readonly token: string;
  readonly channelId: Snowflake;
  readonly url: string;
}

/** The config returned for an entity that has never subscribed. Not persisted. */
export function emptyDestination(entityId: Snowflake): DestinationConfig {
  return {
    entityId,
    channelId: null,
    threadId: null,
    flags: SubscriptionFlags.none(),
    endpointId: null,
  };
}
