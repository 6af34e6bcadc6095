import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { orderInputSchema } from '../../application/order-schema.js';
import type { OrderPublisher } from '../../application/order-processor.js';
import { PipelineError, errorMessage, type OrderEvent } from '../../domain/index.js';

export interface OrderRoutesOptions {
  publisher: OrderPublisher;
  /** Queue new orders enter; undefined means the publisher's default. */
  queueName?: string | undefined;
  defaultClientId: string;
}

/**
 * Order admission.
 *
 * POST /orders/create accepts any JSON object, stamps it ORDERED with the
 * caller's client identity, and publishes it. Processing continues
 * asynchronously; updates arrive on the caller's WebSocket.
 *
 * Client identity comes from the `x-client-id` header, then a `client_id`
 * body field, then the configured default. Empty values count as absent.
 */
async function orderRoutes(fastify: FastifyInstance, opts: OrderRoutesOptions): Promise<void> {
  fastify.post('/orders/create', async (request: FastifyRequest, reply: FastifyReply) => {
    const parsed = orderInputSchema.safeParse(request.body);

    if (!parsed.success) {
      return reply.status(400).send({
        message: 'Invalid order data provided',
        statusCode: 400,
        code: 'INVALID_ORDER',
        issues: parsed.error.issues,
      });
    }

    const header = request.headers['x-client-id'];
    const headerClientId = typeof header === 'string' && header !== '' ? header : undefined;
    const bodyField = parsed.data['client_id'];
    const bodyClientId = typeof bodyField === 'string' && bodyField !== '' ? bodyField : undefined;

    const order: OrderEvent = {
      ...parsed.data,
      order_status: 'ORDERED',
      client_id: headerClientId ?? bodyClientId ?? opts.defaultClientId,
    };

    try {
      await opts.publisher.publish(opts.queueName, order);
    } catch (err: unknown) {
      request.log.error({ err, client_id: order.client_id }, 'Failed to admit order');
      return reply.status(500).send({
        message: 'Failed to send order to kitchen',
        statusCode: 500,
        code: err instanceof PipelineError ? err.code : 'INTERNAL_ERROR',
        error: errorMessage(err),
      });
    }

    request.log.info({ client_id: order.client_id }, 'Order accepted');

    return reply.status(200).send({
      data: order,
      statusCode: 200,
      message: 'Order accepted successfully! The kitchen is being notified.',
    });
  });
}

export default fp(orderRoutes, {
  name: 'order-routes',
  fastify: '5.x',
});
