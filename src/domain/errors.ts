/**
 * Error taxonomy for the scheduling & dispatch engine.
 *
 * Every error carries a stable `code` so log queries and the HTTP layer
 * can branch on it without `instanceof` across module boundaries.
 */
export abstract class HeraldError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A subscription bitset contains bits outside the known event kinds or width. */
export class InvalidFlagValueError extends HeraldError {
  readonly code = 'INVALID_FLAG_VALUE';

  constructor(readonly value: string, reason: string) {
    super(`Invalid subscription flags ${value}: ${reason}`);
  }
}

/**
 * The destination's delivery target is gone (channel deleted, no channel
 * configured, or no permission to manage webhooks there).
 *
 * DispatchFanout reacts by deleting the subscription.
 */
export class MisconfiguredDestinationError extends HeraldError {
  readonly code = 'MISCONFIGURED_DESTINATION';

  constructor(readonly entityId: string, reason: string, options?: { cause?: unknown }) {
    super(`Destination ${entityId} is misconfigured: ${reason}`, options);
  }
}

/** The webhook behind an endpoint was deleted externally (HTTP 404 on send). */
export class EndpointNotFoundError extends HeraldError {
  readonly code = 'ENDPOINT_NOT_FOUND';

  constructor(readonly endpointId: string) {
    super(`Delivery endpoint ${endpointId} no longer exists`);
  }
}

/** The channel an endpoint should be created in is missing or unusable. */
export class ChannelUnavailableError extends HeraldError {
  readonly code = 'CHANNEL_UNAVAILABLE';

  constructor(readonly channelId: string, readonly status: number) {
    super(`Channel ${channelId} is unavailable (HTTP ${status})`);
  }
}

/** Any other transport failure: rate limits, 5xx, network blips. */
export class TransportError extends HeraldError {
  readonly code = 'TRANSPORT_ERROR';

  constructor(
    message: string,
    readonly status: number | null,
    readonly retryAfterMs: number | null = null,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** A cyclic schedule definition that cannot produce slots. */
export class ScheduleDefinitionError extends HeraldError {
  readonly code = 'SCHEDULE_DEFINITION';
}
