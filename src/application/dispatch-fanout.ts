import type { BaseLogger } from 'pino';
import {
  EndpointNotFoundError,
  MisconfiguredDestinationError,
  type DeliveryEndpoint,
  type DestinationConfig,
  type Snowflake,
} from '../domain/index.js';
import type { NotificationPayload } from './payloads.js';
import type { NotificationTransport } from './ports.js';
import type { SubscriptionRegistry } from './subscription-registry.js';

export interface DispatchItem {
  destination: DestinationConfig;
  payload: NotificationPayload;
}

export interface DispatchReport {
  delivered: Snowflake[];
  failed: Snowflake[];
  deregistered: Snowflake[];
}

interface Resolved {
  item: DispatchItem;
  endpoint: DeliveryEndpoint;
}

/**
 * Sends one payload per destination, concurrently.
 *
 * Every entry is its own failure domain. Destinations whose delivery target
 * no longer exists are deregistered instead of retried.
 */
export class DispatchFanout {
  constructor(
    private readonly registry: SubscriptionRegistry,
    private readonly transport: NotificationTransport,
    private readonly log: BaseLogger,
  ) {}

  async dispatch(batch: readonly DispatchItem[]): Promise<DispatchReport> {
    const report: DispatchReport = { delivered: [], failed: [], deregistered: [] };

    const resolutions = await Promise.allSettled(
      batch.map(async (item): Promise<Resolved> => ({
        item,
        endpoint: await this.registry.resolveEndpoint(item.destination),
      })),
    );

    const resolved: Resolved[] = [];
    const removals: Promise<void>[] = [];

    resolutions.forEach((outcome, i) => {
      const item = batch[i];
      if (item === undefined) return;
      const entityId = item.destination.entityId;

      if (outcome.status === 'fulfilled') {
        resolved.push(outcome.value);
      } else if (outcome.reason instanceof MisconfiguredDestinationError) {
        this.log.info({ entity_id: entityId, reason: outcome.reason.message }, 'Misconfigured destination, deregistering');
        removals.push(this.deregister(entityId, true, report));
      } else {
        this.log.warn({ err: outcome.reason, entity_id: entityId }, 'Failed to resolve delivery endpoint');
        report.failed.push(entityId);
      }
    });

    const sends = await Promise.allSettled(
      resolved.map(({ item, endpoint }) =>
        this.transport.send(endpoint, item.payload, item.destination.threadId),
      ),
    );

    sends.forEach((outcome, i) => {
      const entry = resolved[i];
      if (entry === undefined) return;
      const entityId = entry.item.destination.entityId;

      if (outcome.status === 'fulfilled') {
        report.delivered.push(entityId);
      } else if (outcome.reason instanceof EndpointNotFoundError) {
        this.log.info({ entity_id: entityId, endpoint_id: entry.endpoint.id }, 'Delivery endpoint gone, deregistering');
        removals.push(this.deregister(entityId, false, report));
      } else {
        this.log.warn({ err: outcome.reason, entity_id: entityId }, 'Failed to deliver notification');
        report.failed.push(entityId);
      }
    });

    await Promise.all(removals);

    this.log.info(
      {
        delivered: report.delivered.length,
        failed: report.failed.length,
        deregistered: report.deregistered.length,
      },
      'Dispatch finished',
    );
    return report;
  }

  private async deregister(entityId: Snowflake, deleteRemote: boolean, report: DispatchReport): Promise<void> {
    try {
      await this.registry.delete(entityId, { deleteRemote });
      report.deregistered.push(entityId);
    } catch (err: unknown) {
      this.log.error({ err, entity_id: entityId }, 'Failed to deregister destination');
      report.failed.push(entityId);
    }
  }
}
