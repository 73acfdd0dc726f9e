import { describe, it, expect, vi, afterEach } from 'vitest';
import Fastify, { type FastifyInstance } from 'fastify';
import fp from 'fastify-plugin';
import type { Redis } from 'ioredis';
import scheduleRoutes from '../../src/interfaces/http/schedule-routes.js';
import adminRoutes from '../../src/interfaces/http/admin-routes.js';
import { INVALIDATION_CHANNEL } from '../../src/infrastructure/redis/invalidation-notifier.js';

async function buildApp(now: string): Promise<FastifyInstance> {
  const app = Fastify({ logger: false });
  await app.register(scheduleRoutes, { clock: () => new Date(now) });
  await app.ready();
  return app;
}

describe('schedule routes', () => {
  let app: FastifyInstance;

  afterEach(async () => {
    await app.close();
  });

  it('lists upcoming voyages of one route', async () => {
    app = await buildApp('2020-06-28T00:30:00Z');

    const res = await app.inject({ method: 'GET', url: '/api/v1/schedules/ocean-fishing?route=indigo&count=2' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      now: '2020-06-28T00:30:00.000Z',
      voyages: [
        {
          route: 'indigo',
          destination: 'The Bloodbrine Sea',
          time: 'night',
          registration_opens_at: '2020-06-28T00:00:00.000Z',
          sets_sail_at: '2020-06-28T00:15:00.000Z',
          stops: [
            { stop: 'The Cieldalaes', time: 'day' },
            { stop: 'The Northern Strait of Merlthor', time: 'sunset' },
            { stop: 'The Bloodbrine Sea', time: 'night' },
          ],
        },
        {
          route: 'indigo',
          destination: 'The Rothlyt Sound',
          time: 'night',
          registration_opens_at: '2020-06-28T02:00:00.000Z',
          sets_sail_at: '2020-06-28T02:15:00.000Z',
          stops: [
            { stop: 'The Cieldalaes', time: 'day' },
            { stop: 'Rhotano Sea', time: 'sunset' },
            { stop: 'The Rothlyt Sound', time: 'night' },
          ],
        },
      ],
    });
  });

  it('lists both routes by default', async () => {
    app = await buildApp('2020-06-28T00:30:00Z');

    const res = await app.inject({ method: 'GET', url: '/api/v1/schedules/ocean-fishing' });
    const body: { voyages: { route: string }[] } = res.json();

    expect(body.voyages.map((v) => v.route)).toEqual([
      'indigo', 'indigo', 'indigo', 'indigo', 'indigo',
      'ruby', 'ruby', 'ruby', 'ruby', 'ruby',
    ]);
  });

  it.each([
    '/api/v1/schedules/ocean-fishing?count=0',
    '/api/v1/schedules/ocean-fishing?route=lake',
    '/api/v1/schedules/gates?count=51',
  ])('rejects the query of %s', async (url) => {
    app = await buildApp('2020-06-28T00:30:00Z');
    const res = await app.inject({ method: 'GET', url });
    expect(res.statusCode).toBe(400);
  });

  it('lists upcoming GATEs', async () => {
    app = await buildApp('2024-01-02T10:25:00Z');

    const res = await app.inject({ method: 'GET', url: '/api/v1/schedules/gates?count=1' });
    const body: { gates: { starts_at: string; minute: number; candidates: { name: string }[] }[] } = res.json();

    expect(body.gates).toHaveLength(1);
    expect(body.gates[0]?.starts_at).toBe('2024-01-02T10:40:00.000Z');
    expect(body.gates[0]?.minute).toBe(40);
    expect(body.gates[0]?.candidates.map((g) => g.name)).toEqual([
      'The Slice Is Right',
      'Air Force One [Cieldalaes]',
      'Leap of Faith [Sylphstep]',
    ]);
  });

  it('lists the next fixed-clock events', async () => {
    app = await buildApp('2024-01-06T00:00:00Z');

    const res = await app.inject({ method: 'GET', url: '/api/v1/schedules/resets' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      now: '2024-01-06T00:00:00.000Z',
      daily_reset: '2024-01-06T15:00:00.000Z',
      weekly_reset: '2024-01-09T08:00:00.000Z',
      fashion_report: {
        week: 310,
        judging_open: true,
        opens_at: '2024-01-12T08:00:00.000Z',
        closes_at: '2024-01-09T08:00:00.000Z',
      },
      jumbo_cactpot: {
        na: '2024-01-07T02:00:00.000Z',
        eu: '2024-01-06T19:00:00.000Z',
        jp: '2024-01-06T12:00:00.000Z',
        oce: '2024-01-06T09:00:00.000Z',
      },
      open_tournament: '2024-01-06T01:00:00.000Z',
    });
  });
});

describe('admin routes', () => {
  it('queues a fashion report reset', async () => {
    const publish = vi.fn().mockResolvedValue(1);
    const app = Fastify({ logger: false });
    await app.register(fp(async (instance) => {
      instance.decorate('redis', { publish } as unknown as Redis);
    }, { name: 'redis' }));
    await app.register(adminRoutes);

    const res = await app.inject({ method: 'POST', url: '/api/v1/admin/fashion-report/reset' });

    expect(res.statusCode).toBe(202);
    expect(res.json()).toEqual({ status: 'queued' });
    expect(publish).toHaveBeenCalledWith(INVALIDATION_CHANNEL, expect.stringContaining('"scope":"fashion-report"'));
    await app.close();
  });
});
