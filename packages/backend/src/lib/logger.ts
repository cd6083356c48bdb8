import { pino, type Logger as PinoLogger } from 'pino';
import type { AppConfig } from './config.js';

type LogMethod = (obj: object, msg?: string) => void;

/**
 * The logging surface services depend on. Satisfied by a pino logger and by
 * a Fastify instance's `log`.
 */
export interface Logger {
  error: LogMethod;
  warn: LogMethod;
  info: LogMethod;
  debug: LogMethod;
  child(bindings: Record<string, unknown>): Logger;
}

export function createLogger(config: Pick<AppConfig, 'logLevel'>, name = 'bookshift'): PinoLogger {
  return pino({
    name,
    level: config.logLevel,
  });
}
