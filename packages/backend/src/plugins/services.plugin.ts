import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { Services } from '../services/index.js';

declare module 'fastify' {
  interface FastifyInstance {
    services: Services;
  }
}

export interface ServicesPluginOptions {
  services: Services;
}

async function servicesPlugin(fastify: FastifyInstance, options: ServicesPluginOptions): Promise<void> {
  fastify.decorate('services', options.services);
}

export default fp(servicesPlugin, {
  name: 'services',
});
