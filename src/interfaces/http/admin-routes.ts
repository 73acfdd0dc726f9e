import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { publishInvalidation } from '../../infrastructure/redis/invalidation-notifier.js';

/**
 * Operator routes.
 *
 * POST /api/v1/admin/fashion-report/reset - make the worker forget its cached report
 */
async function adminRoutes(fastify: FastifyInstance): Promise<void> {

  fastify.post(
    '/api/v1/admin/fashion-report/reset',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      await publishInvalidation(fastify.redis, fastify.log, { scope: 'fashion-report' });
      return reply.status(202).send({ status: 'queued' });
    },
  );
}

export default fp(adminRoutes, {
  name: 'admin-routes',
  dependencies: ['redis'],
  fastify: '5.x',
});
