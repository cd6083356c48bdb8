import type { FastifyInstance } from 'fastify';
import { intakeSchema } from '../schemas/intake.schema.js';

// ============================================================================
// Intake Routes
// ============================================================================

export async function intakeRoutes(fastify: FastifyInstance): Promise<void> {
  const { intake } = fastify.services;

  // POST /api/intake/simulate - Simulate a donation and plan the follow-up rebalance
  fastify.post<{ Body: unknown }>('/api/intake/simulate', async (request, reply) => {
    const data = intakeSchema.parse(request.body);
    const simulation = await intake.simulate(data);
    return reply.code(200).send(simulation);
  });

  // POST /api/intake - Receive books into a library
  fastify.post<{ Body: unknown }>('/api/intake', async (request, reply) => {
    const data = intakeSchema.parse(request.body);
    const receipt = await intake.receive(data);
    return reply.code(200).send(receipt);
  });
}
