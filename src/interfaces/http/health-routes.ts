import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';

/** Snapshot of the moving parts, supplied by the bootstrap. */
export interface PipelineStatus {
  brokerConnected(): boolean;
  consumerRunning(): boolean;
  inFlight(): number;
  clientCount(): number;
}

export interface HealthRoutesOptions {
  status: PipelineStatus;
}

/**
 * GET /ping:   liveness, no dependencies touched.
 * GET /health: broker connection and subscription state; 503 when either is down.
 */
async function healthRoutes(fastify: FastifyInstance, opts: HealthRoutesOptions): Promise<void> {
  fastify.get('/ping', async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.status(200).send({ message: 'Order pipeline is up', statusCode: 200 });
  });

  fastify.get('/health', async (_request: FastifyRequest, reply: FastifyReply) => {
    const connected = opts.status.brokerConnected();
    const running = opts.status.consumerRunning();
    const healthy = connected && running;

    return reply.status(healthy ? 200 : 503).send({
      status: healthy ? 'ok' : 'degraded',
      broker: connected ? 'connected' : 'disconnected',
      consumer: { running, inFlight: opts.status.inFlight() },
      clients: opts.status.clientCount(),
    });
  });
}

export default fp(healthRoutes, {
  name: 'health-routes',
  fastify: '5.x',
});
