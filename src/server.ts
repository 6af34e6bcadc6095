import Fastify, { type FastifyInstance } from 'fastify';
import type { OrderPublisher } from './application/order-processor.js';
import type { AppConfig } from './infrastructure/config.js';
import { healthRoutes, orderRoutes, type PipelineStatus } from './interfaces/http/index.js';

export interface ServerDeps {
  publisher: OrderPublisher;
  status: PipelineStatus;
  defaultClientId: string;
  queueName?: string | undefined;
  /** `false` silences request logging (tests). */
  logLevel?: AppConfig['logLevel'] | false;
}

/**
 * Builds the Fastify instance with every HTTP route registered.
 * Does not listen; the caller decides (bootstrap) or uses `inject` (tests).
 */
export async function buildServer(deps: ServerDeps): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger:
      deps.logLevel === false
        ? false
        : { level: deps.logLevel ?? 'info', base: { service: 'order-pipeline' } },
  });

  await fastify.register(healthRoutes, { status: deps.status });
  await fastify.register(orderRoutes, {
    publisher: deps.publisher,
    queueName: deps.queueName,
    defaultClientId: deps.defaultClientId,
  });

  return fastify;
}
