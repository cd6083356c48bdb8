import 'dotenv/config';
import { buildApp } from './app.js';
import { loadConfig } from './lib/config.js';
import { openDatabase } from './lib/database.js';
import { createLogger } from './lib/logger.js';
import { SqliteLibraryStore } from './store/sqlite-library-store.js';

const config = loadConfig();
const logger = createLogger(config);
const store = new SqliteLibraryStore(openDatabase(config, logger));
const fastify = await buildApp({ config, store });

const shutdown = async (signal: string) => {
  fastify.log.info(`Received ${signal}, shutting down`);
  try {
    await fastify.close();
    store.close();
    process.exit(0);
  } catch (err) {
    fastify.log.error(err);
    process.exit(1);
  }
};

process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));

const start = async () => {
  try {
    await fastify.listen({ port: config.port, host: config.host });
  } catch (err) {
    fastify.log.error(err);
    store.close();
    process.exit(1);
  }
};

await start();
