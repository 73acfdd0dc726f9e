import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import {
  createGateCalculator,
  createVoyageCalculators,
  fashionReportWeek,
  nextDailyReset,
  nextFashionReportWindow,
  nextJumboCactpotDrawing,
  nextOpenTournament,
  nextWeeklyReset,
  setsSailAt,
  voyageStops,
  type JumboCactpotRegion,
  type VoyageRoute,
  type VoyageSlot,
} from '../../domain/index.js';
import { scheduleQuerySchema } from '../../application/subscription-schema.js';

export interface ScheduleRoutesOptions {
  clock?: () => Date;
}

const REGIONS: readonly JumboCactpotRegion[] = ['na', 'eu', 'jp', 'oce'];

function voyageView(route: VoyageRoute, slot: VoyageSlot) {
  return {
    route,
    destination: slot.destination,
    time: slot.timeOfDay,
    registration_opens_at: slot.startsAt.toISOString(),
    sets_sail_at: setsSailAt(slot).toISOString(),
    stops: voyageStops(slot),
  };
}

/**
 * Read-only schedule previews.
 *
 * GET /api/v1/schedules/ocean-fishing?route=&count=  - upcoming voyages
 * GET /api/v1/schedules/gates?count=                - upcoming GATE lineups
 * GET /api/v1/schedules/resets                      - next fixed-clock events
 */
async function scheduleRoutes(fastify: FastifyInstance, options: ScheduleRoutesOptions): Promise<void> {
  const clock = options.clock ?? (() => new Date());
  const voyages = createVoyageCalculators();
  const gates = createGateCalculator();

  // ── GET /api/v1/schedules/ocean-fishing ──────────────────
  fastify.get(
    '/api/v1/schedules/ocean-fishing',
    async (request: FastifyRequest<{ Querystring: unknown }>, reply: FastifyReply) => {
      const parsed = scheduleQuerySchema.safeParse(request.query);
      if (!parsed.success) {
        return reply.status(400).send({ error: parsed.error.flatten() });
      }

      const now = clock();
      const { route, count } = parsed.data;
      const routes: readonly VoyageRoute[] = route ? [route] : ['indigo', 'ruby'];

      const result = routes.flatMap((r) =>
        voyages[r].upcoming(now, count).map((slot) => voyageView(r, slot)));
      return reply.status(200).send({ now: now.toISOString(), voyages: result });
    },
  );

  // ── GET /api/v1/schedules/gates ──────────────────────────
  fastify.get(
    '/api/v1/schedules/gates',
    async (request: FastifyRequest<{ Querystring: unknown }>, reply: FastifyReply) => {
      const parsed = scheduleQuerySchema.safeParse(request.query);
      if (!parsed.success) {
        return reply.status(400).send({ error: parsed.error.flatten() });
      }

      const now = clock();
      const upcoming = gates.upcoming(now, parsed.data.count).map((slot) => ({
        starts_at: slot.startsAt.toISOString(),
        minute: slot.timeOfDay,
        candidates: slot.destination,
      }));
      return reply.status(200).send({ now: now.toISOString(), gates: upcoming });
    },
  );

  // ── GET /api/v1/schedules/resets ─────────────────────────
  fastify.get(
    '/api/v1/schedules/resets',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const now = clock();
      const fashion = nextFashionReportWindow(now);

      return reply.status(200).send({
        now: now.toISOString(),
        daily_reset: nextDailyReset(now).toISOString(),
        weekly_reset: nextWeeklyReset(now).toISOString(),
        fashion_report: {
          week: fashionReportWeek(now),
          judging_open: fashion.judgingOpen,
          opens_at: fashion.opensAt.toISOString(),
          closes_at: fashion.closesAt.toISOString(),
        },
        jumbo_cactpot: Object.fromEntries(
          REGIONS.map((region) => [region, nextJumboCactpotDrawing(region, now).toISOString()]),
        ),
        open_tournament: nextOpenTournament(now).toISOString(),
      });
    },
  );
}

export default fp(scheduleRoutes, {
  name: 'schedule-routes',
  fastify: '5.x',
});
