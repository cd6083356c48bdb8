import Fastify, { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import type { AppConfig } from './lib/config.js';
import { registerErrorHandler } from './lib/error-handler.js';
import servicesPlugin from './plugins/services.plugin.js';
import { createServices } from './services/index.js';
import type { LibraryStore } from './store/library-store.js';
import { librariesRoutes } from './routes/libraries.js';
import { rebalanceRoutes } from './routes/rebalance.js';
import { intakeRoutes } from './routes/intake.js';

export interface AppDependencies {
  config: AppConfig;
  store: LibraryStore;
}

export async function buildApp({ config, store }: AppDependencies): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: { name: 'bookshift', level: config.logLevel },
  });

  // CORS for the admin UI
  await fastify.register(cors, {
    origin: config.frontendUrl,
  });

  await fastify.register(servicesPlugin, {
    services: createServices(store, config, fastify.log),
  });

  registerErrorHandler(fastify);

  fastify.get('/health', async () => {
    return { status: 'ok' };
  });

  // Register API routes
  await fastify.register(librariesRoutes);
  await fastify.register(rebalanceRoutes);
  await fastify.register(intakeRoutes);

  return fastify;
}
