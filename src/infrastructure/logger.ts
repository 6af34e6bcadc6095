import pino, { type Logger } from 'pino';
import type { AppConfig } from './config.js';

/**
 * Root logger shared by Fastify and the pipeline components.
 * Components take a `child({ component })` so every line is attributable.
 */
export function createLogger(config: Pick<AppConfig, 'logLevel'>): Logger {
  return pino({
    level: config.logLevel,
    base: { service: 'order-pipeline' },
  });
}
