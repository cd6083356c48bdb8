import type { FastifyInstance } from 'fastify';
import { rebalanceQuerySchema } from '../schemas/rebalance.schema.js';

// ============================================================================
// Rebalance Routes
// ============================================================================

export async function rebalanceRoutes(fastify: FastifyInstance): Promise<void> {
  const { rebalance } = fastify.services;

  // GET /api/rebalance/plan - Dry-run: compute the plan, never write
  fastify.get<{ Querystring: unknown }>('/api/rebalance/plan', async (request, reply) => {
    const { limit } = rebalanceQuerySchema.parse(request.query);
    const result = await rebalance.preview({ limit });
    return reply.code(200).send(result);
  });

  // POST /api/rebalance/apply - Compute the plan and apply it to the store
  fastify.post<{ Querystring: unknown }>('/api/rebalance/apply', async (request, reply) => {
    const { limit } = rebalanceQuerySchema.parse(request.query);
    const result = await rebalance.apply({ limit });
    return reply.code(200).send(result);
  });
}
