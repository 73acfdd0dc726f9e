import type { BaseLogger } from 'pino';
import { z } from 'zod';
import {
  ChannelUnavailableError,
  EndpointNotFoundError,
  TransportError,
  type DeliveryEndpoint,
  type Snowflake,
} from '../../domain/index.js';
import type { NotificationTransport } from '../../application/ports.js';
import type { NotificationPayload } from '../../application/payloads.js';

export interface DiscordWebhookTransportOptions {
  botToken: string;
  apiBase: string;
  webhookName: string;
  log: BaseLogger;
}

const webhookSchema = z.object({
  id: z.string(),
  token: z.string(),
  channel_id: z.string(),
});

/** `Retry-After` is in seconds; Discord may send fractions. */
function retryAfterMs(response: Response): number | null {
  const header = response.headers.get('retry-after');
  if (header === null) return null;
  const seconds = Number(header);
  return Number.isFinite(seconds) ? Math.ceil(seconds * 1000) : null;
}

function failure(action: string, response: Response): TransportError {
  if (response.status === 429) {
    return new TransportError(`${action}: rate limited`, 429, retryAfterMs(response));
  }
  return new TransportError(`${action}: HTTP ${response.status}`, response.status);
}

/**
 * Delivers payloads through Discord channel webhooks.
 *
 * Webhooks are created with the bot token; executing one needs only the
 * webhook's own token, which lives in the endpoint URL.
 */
export class DiscordWebhookTransport implements NotificationTransport {
  private readonly botToken: string;
  private readonly apiBase: string;
  private readonly webhookName: string;
  private readonly log: BaseLogger;

  constructor(options: DiscordWebhookTransportOptions) {
    this.botToken = options.botToken;
    this.apiBase = options.apiBase.replace(/\/+$/, '');
    this.webhookName = options.webhookName;
    this.log = options.log;
  }

  async send(endpoint: DeliveryEndpoint, payload: NotificationPayload, threadId: Snowflake | null): Promise<void> {
    const url = new URL(endpoint.url);
    url.searchParams.set('wait', 'true');
    if (threadId !== null) {
      url.searchParams.set('thread_id', threadId);
    }

    const response = await this.request(url.toString(), {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ ...payload, allowed_mentions: { parse: [] } }),
    });

    if (response.status === 404) {
      throw new EndpointNotFoundError(endpoint.id);
    }
    if (!response.ok) {
      throw failure(`Sending to endpoint ${endpoint.id}`, response);
    }
    this.log.debug({ entity_id: endpoint.entityId, endpoint_id: endpoint.id }, 'Notification delivered');
  }

  async createEndpoint(channelId: Snowflake, entityId: Snowflake): Promise<DeliveryEndpoint> {
    const response = await this.request(`${this.apiBase}/channels/${channelId}/webhooks`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bot ${this.botToken}`,
      },
      body: JSON.stringify({ name: this.webhookName }),
    });

    if (response.status === 403 || response.status === 404) {
      throw new ChannelUnavailableError(channelId, response.status);
    }
    if (!response.ok) {
      throw failure(`Creating webhook in channel ${channelId}`, response);
    }

    const parsed = webhookSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new TransportError(`Creating webhook in channel ${channelId}: unexpected response body`, response.status);
    }

    const { id, token, channel_id } = parsed.data;
    return {
      entityId,
      id,
      token,
      channelId: channel_id,
      url: `${this.apiBase}/webhooks/${id}/${token}`,
    };
  }

  /** A webhook that is already gone counts as deleted. */
  async deleteEndpoint(endpoint: DeliveryEndpoint): Promise<void> {
    const response = await this.request(endpoint.url, { method: 'DELETE' });
    if (response.ok || response.status === 404) return;
    throw failure(`Deleting endpoint ${endpoint.id}`, response);
  }

  private async request(url: string, init: RequestInit): Promise<Response> {
    try {
      return await fetch(url, init);
    } catch (err: unknown) {
      throw new TransportError(`Request to Discord failed`, null, null, { cause: err });
    }
  }
}
