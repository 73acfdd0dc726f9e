import { vi } from 'vitest';
import {
  SubscriptionFlags,
  type DeliveryEndpoint,
  type DestinationConfig,
  type EventKind,
  type Snowflake,
} from '../src/domain/index.js';
import type { NotificationTransport } from '../src/application/ports.js';
import type { NotificationPayload } from '../src/application/payloads.js';

/** Minimal fake logger. */
export function fakeLogger() {
  return {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    trace: vi.fn(),
    silent: vi.fn(),
    level: 'info',
    child: vi.fn(),
  } as unknown as import('pino').Logger;
}

export function makeDestination(
  entityId: Snowflake,
  kinds: EventKind[] = ['daily_reset'],
  overrides: Partial<DestinationConfig> = {},
): DestinationConfig {
  return {
    entityId,
    channelId: `${entityId}0`,
    threadId: null,
    flags: SubscriptionFlags.of(...kinds),
    endpointId: null,
    ...overrides,
  };
}

export interface SentMessage {
  endpoint: DeliveryEndpoint;
  payload: NotificationPayload;
  threadId: Snowflake | null;
}

/**
 * In-process transport. Failures are scripted per channel (creation) and
 * per entity (sending).
 */
export class FakeTransport implements NotificationTransport {
  readonly sent: SentMessage[] = [];
  readonly created: DeliveryEndpoint[] = [];
  readonly deleted: DeliveryEndpoint[] = [];
  readonly createFailures = new Map<Snowflake, Error>();
  readonly sendFailures = new Map<Snowflake, Error>();
  private nextId = 9000;

  async send(endpoint: DeliveryEndpoint, payload: NotificationPayload, threadId: Snowflake | null): Promise<void> {
    const failure = this.sendFailures.get(endpoint.entityId);
    if (failure) throw failure;
    this.sent.push({ endpoint, payload, threadId });
  }

  async createEndpoint(channelId: Snowflake, entityId: Snowflake): Promise<DeliveryEndpoint> {
    const failure = this.createFailures.get(channelId);
    if (failure) throw failure;

    const id = String(this.nextId++);
    const endpoint: DeliveryEndpoint = {
      entityId,
      id,
      token: 'test-token',
      channelId,
      url: `https://discord.test/api/webhooks/${id}/test-token`,
    };
    this.created.push(endpoint);
    return endpoint;
  }

  async deleteEndpoint(endpoint: DeliveryEndpoint): Promise<void> {
    this.deleted.push(endpoint);
  }
}

export const samplePayload: NotificationPayload = {
  embeds: [{ title: 'Test event' }],
};
