import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import { SubscriptionRegistry } from '../../src/application/subscription-registry.js';
import { MemoizingCache } from '../../src/application/memoizing-cache.js';
import { InMemorySubscriptionStore } from '../../src/infrastructure/subscriptions/in-memory-store.js';
import {
  ChannelUnavailableError,
  InvalidFlagValueError,
  MisconfiguredDestinationError,
  SubscriptionFlags,
  TransportError,
} from '../../src/domain/index.js';
import { FakeTransport, fakeLogger } from '../helpers.js';

describe('SubscriptionRegistry', () => {
  let store: InMemorySubscriptionStore;
  let transport: FakeTransport;
  let log: ReturnType<typeof fakeLogger>;
  let onChange: Mock<(entityId: string) => Promise<void>>;
  let registry: SubscriptionRegistry;

  beforeEach(() => {
    store = new InMemorySubscriptionStore();
    transport = new FakeTransport();
    log = fakeLogger();
    onChange = vi.fn<(entityId: string) => Promise<void>>().mockResolvedValue(undefined);
    registry = new SubscriptionRegistry({ store, transport, cache: new MemoizingCache(), log, onChange });
  });

  it('should return an empty, unpersisted config for unknown entities', async () => {
    const config = await registry.get('100');
    expect(config.channelId).toBeNull();
    expect(config.flags.isEmpty()).toBe(true);
    expect(store.size).toBe(0);
  });

  it('should store subscriptions and notify listeners', async () => {
    await registry.setSubscriptions('100', SubscriptionFlags.of('gate'), '200');

    const config = await registry.get('100');
    expect(config.flags.kinds()).toEqual(['gate']);
    expect(config.channelId).toBe('200');
    expect(onChange).toHaveBeenCalledWith('100');
  });

  it('should accept raw numeric flags', async () => {
    const config = await registry.setSubscriptions('100', 257n, '200', '300');
    expect(config.flags.kinds()).toEqual(['daily_reset', 'gate']);
    expect(config.threadId).toBe('300');
  });

  it('should reject unknown bits without writing', async () => {
    await expect(registry.setSubscriptions('100', 1024, '200')).rejects.toThrow(InvalidFlagValueError);
    expect(store.size).toBe(0);
    expect(onChange).not.toHaveBeenCalled();
  });

  it('should see its own writes through the cache', async () => {
    await registry.setSubscriptions('100', SubscriptionFlags.of('gate'), '200');
    await registry.get('100');
    await registry.setSubscriptions('100', SubscriptionFlags.of('weekly_reset'), '200');

    expect((await registry.get('100')).flags.kinds()).toEqual(['weekly_reset']);
  });

  it('should serve repeated reads from the cache', async () => {
    await registry.setSubscriptions('100', SubscriptionFlags.of('gate'), '200');
    const spy = vi.spyOn(store, 'findSubscription');

    await registry.get('100');
    await registry.get('100');
    expect(spy).toHaveBeenCalledTimes(1);

    expect(registry.invalidate('100')).toBe(true);
    await registry.get('100');
    expect(spy).toHaveBeenCalledTimes(2);
  });

  it('should create an endpoint once and reuse it', async () => {
    const config = await registry.setSubscriptions('100', SubscriptionFlags.of('gate'), '200');

    const [a, b] = await Promise.all([registry.resolveEndpoint(config), registry.resolveEndpoint(config)]);
    expect(a).toBe(b);
    expect(transport.created).toHaveLength(1);
    expect(a.channelId).toBe('200');
    expect((await registry.get('100')).endpointId).toBe(a.id);
  });

  it('should notify listeners when it creates an endpoint', async () => {
    const config = await registry.setSubscriptions('100', SubscriptionFlags.of('gate'), '200');
    onChange.mockClear();

    await registry.resolveEndpoint(config);
    await registry.resolveEndpoint(config);
    expect(onChange).toHaveBeenCalledOnce();
    expect(onChange).toHaveBeenCalledWith('100');
  });

  it('should persist a fresh endpoint passed to get()', async () => {
    await registry.setSubscriptions('100', SubscriptionFlags.of('gate'), '200');
    await registry.get('100');

    const endpoint = { entityId: '100', id: '555', token: 'test-token', channelId: '200', url: 'https://discord.test/w/555' };
    const config = await registry.get('100', { freshEndpoint: endpoint });
    expect(config.endpointId).toBe('555');
  });

  it('should replace the endpoint when the channel changes', async () => {
    const first = await registry.setSubscriptions('100', SubscriptionFlags.of('gate'), '200');
    const old = await registry.resolveEndpoint(first);

    const moved = await registry.setSubscriptions('100', SubscriptionFlags.of('gate'), '201');
    expect(transport.deleted).toEqual([old]);
    expect(moved.endpointId).toBeNull();

    const fresh = await registry.resolveEndpoint(moved);
    expect(fresh.channelId).toBe('201');
    expect(fresh.id).not.toBe(old.id);
  });

  it('should report destinations without a channel as misconfigured', async () => {
    const config = await registry.get('100');
    await expect(registry.resolveEndpoint(config)).rejects.toThrow(MisconfiguredDestinationError);
  });

  it('should report unavailable channels as misconfigured', async () => {
    transport.createFailures.set('200', new ChannelUnavailableError('200', 404));
    const config = await registry.setSubscriptions('100', SubscriptionFlags.of('gate'), '200');

    await expect(registry.resolveEndpoint(config)).rejects.toThrow(MisconfiguredDestinationError);
  });

  it('should pass other creation failures through and retry later', async () => {
    transport.createFailures.set('200', new TransportError('rate limited', 429));
    const config = await registry.setSubscriptions('100', SubscriptionFlags.of('gate'), '200');

    await expect(registry.resolveEndpoint(config)).rejects.toThrow(TransportError);

    transport.createFailures.clear();
    const endpoint = await registry.resolveEndpoint(config);
    expect(endpoint.channelId).toBe('200');
  });

  it('should delete subscriptions together with their endpoint', async () => {
    const config = await registry.setSubscriptions('100', SubscriptionFlags.of('gate'), '200');
    const endpoint = await registry.resolveEndpoint(config);
    onChange.mockClear();

    expect(await registry.delete('100')).toBe(true);
    expect(transport.deleted).toEqual([endpoint]);
    expect(await store.findEndpoint('100')).toBeNull();
    expect((await registry.get('100')).channelId).toBeNull();
    expect(onChange).toHaveBeenCalledWith('100');
  });

  it('should skip the remote delete when asked to', async () => {
    const config = await registry.setSubscriptions('100', SubscriptionFlags.of('gate'), '200');
    await registry.resolveEndpoint(config);

    await registry.delete('100', { deleteRemote: false });
    expect(transport.deleted).toEqual([]);
  });

  it('should return false when deleting an unknown entity', async () => {
    expect(await registry.delete('999')).toBe(false);
    expect(onChange).not.toHaveBeenCalled();
  });

  it('should keep writing when the remote delete fails', async () => {
    const config = await registry.setSubscriptions('100', SubscriptionFlags.of('gate'), '200');
    await registry.resolveEndpoint(config);
    vi.spyOn(transport, 'deleteEndpoint').mockRejectedValue(new TransportError('down', 503));

    expect(await registry.delete('100')).toBe(true);
    expect(log.warn).toHaveBeenCalledWith(
      expect.objectContaining({ entity_id: '100' }),
      'Failed to delete remote endpoint',
    );
  });

  it('should log and swallow change hook failures', async () => {
    onChange.mockRejectedValue(new Error('redis down'));
    await registry.setSubscriptions('100', SubscriptionFlags.of('gate'), '200');
    expect(log.warn).toHaveBeenCalledWith(
      expect.objectContaining({ entity_id: '100' }),
      'Subscription change hook failed',
    );
  });

  it('should list subscribers of a kind', async () => {
    await registry.setSubscriptions('1', SubscriptionFlags.of('gate'), '10');
    await registry.setSubscriptions('2', SubscriptionFlags.of('daily_reset'), '20');
    await registry.setSubscriptions('3', SubscriptionFlags.of('gate', 'daily_reset'), '30');

    const subscribers = await registry.subscribersOf('gate');
    expect(subscribers.map((s) => s.entityId)).toEqual(['1', '3']);
  });
});

describe('SubscriptionRegistry sharing a store with another process', () => {
  let store: InMemorySubscriptionStore;
  let transport: FakeTransport;
  let api: SubscriptionRegistry;
  let worker: SubscriptionRegistry;

  beforeEach(() => {
    store = new InMemorySubscriptionStore();
    transport = new FakeTransport();
    api = new SubscriptionRegistry({ store, transport, cache: new MemoizingCache(), log: fakeLogger() });
    worker = new SubscriptionRegistry({ store, transport, cache: new MemoizingCache(), log: fakeLogger() });
  });

  it('should not reuse a cached endpoint from the previous channel', async () => {
    await api.setSubscriptions('1', SubscriptionFlags.of('gate'), '10');
    const [before] = await worker.subscribersOf('gate');
    expect(before).toBeDefined();
    if (before === undefined) return;
    const old = await worker.resolveEndpoint(before);
    expect(old.channelId).toBe('10');

    // The worker never hears about the move.
    await api.setSubscriptions('1', SubscriptionFlags.of('gate'), '20');
    expect(transport.deleted).toEqual([old]);

    const [after] = await worker.subscribersOf('gate');
    expect(after?.channelId).toBe('20');
    if (after === undefined) return;
    const endpoint = await worker.resolveEndpoint(after);
    expect(endpoint.channelId).toBe('20');
    expect(endpoint.id).not.toBe(old.id);
    expect(await store.findEndpoint('1')).toEqual(endpoint);
  });
});
