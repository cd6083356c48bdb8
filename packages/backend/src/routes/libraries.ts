import type { FastifyInstance } from 'fastify';
import {
  createLibrarySchema,
  libraryIdParamsSchema,
  updateLibrarySchema,
} from '../schemas/libraries.schema.js';

// ============================================================================
// Library Routes
// ============================================================================

export async function librariesRoutes(fastify: FastifyInstance): Promise<void> {
  const { libraries } = fastify.services;

  // GET /api/libraries - List libraries with slack and target
  fastify.get('/api/libraries', async (_request, reply) => {
    const items = await libraries.list();
    return reply.code(200).send({ items, total: items.length });
  });

  // GET /api/libraries/:id - Get a single library
  fastify.get<{ Params: { id: string } }>('/api/libraries/:id', async (request, reply) => {
    const { id } = libraryIdParamsSchema.parse(request.params);
    const library = await libraries.get(id);
    return reply.code(200).send(library);
  });

  // POST /api/libraries - Create a library
  fastify.post<{ Body: unknown }>('/api/libraries', async (request, reply) => {
    const data = createLibrarySchema.parse(request.body);
    const library = await libraries.create(data);
    return reply.code(201).send(library);
  });

  // PUT /api/libraries/:id - Update name, capacity or count
  fastify.put<{ Params: { id: string }; Body: unknown }>('/api/libraries/:id', async (request, reply) => {
    const { id } = libraryIdParamsSchema.parse(request.params);
    const data = updateLibrarySchema.parse(request.body);
    const library = await libraries.update(id, data);
    return reply.code(200).send(library);
  });

  // DELETE /api/libraries/:id - Remove a library
  fastify.delete<{ Params: { id: string } }>('/api/libraries/:id', async (request, reply) => {
    const { id } = libraryIdParamsSchema.parse(request.params);
    await libraries.delete(id);
    return reply.code(204).send();
  });
}
