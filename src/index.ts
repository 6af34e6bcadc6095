import { ConnectionRegistry } from './application/connection-registry.js';
import { OrderProcessor } from './application/order-processor.js';
import { randomPreparationDelay } from './application/preparation-delay.js';
import { BrokerConnectionManager, EventConsumer, EventPublisher, type ConsumerHandle } from './infrastructure/amqp/index.js';
import { loadConfig } from './infrastructure/config.js';
import { createLogger } from './infrastructure/logger.js';
import { WebSocketServer } from './interfaces/ws/websocket-server.js';
import { buildServer } from './server.js';

/**
 * Bootstrap.
 *
 * Order:
 * 1) Config + logger
 * 2) Broker connection (fatal if unreachable)
 * 3) Registry, publisher, processor
 * 4) HTTP routes, listen()
 * 5) WebSocket attach
 * 6) Consumer subscription
 */
async function main(): Promise<void> {
  const config = loadConfig();
  const log = createLogger(config);

  const broker = new BrokerConnectionManager({
    config: config.broker,
    log: log.child({ component: 'broker' }),
  });
  await broker.connect();

  const queue = config.broker.defaultQueue;
  const registry = new ConnectionRegistry(log.child({ component: 'registry' }));

  const publisher = new EventPublisher({
    connection: broker,
    log: log.child({ component: 'publisher' }),
    timeoutMs: config.broker.publishTimeoutMs,
  });

  const processor = new OrderProcessor({
    publisher,
    notifier: registry,
    delay: randomPreparationDelay({
      minSeconds: config.processor.preparationSeconds.min,
      maxSeconds: config.processor.preparationSeconds.max,
    }),
    log: log.child({ component: 'processor' }),
    queueName: queue,
    defaultClientId: config.processor.defaultClientId,
  });

  const consumer = new EventConsumer({
    connection: broker,
    log: log.child({ component: 'consumer' }),
    prefetch: config.consumer.prefetch,
  });

  const fastify = await buildServer({
    publisher,
    queueName: queue,
    defaultClientId: config.processor.defaultClientId,
    logLevel: config.logLevel,
    status: {
      brokerConnected: () => broker.isConnected(),
      consumerRunning: () => consumer.isRunning(),
      inFlight: () => consumer.inFlight,
      clientCount: () => registry.size,
    },
  });

  const wsServer = new WebSocketServer(log.child({ component: 'websocket' }), registry, {
    defaultClientId: config.processor.defaultClientId,
  });

  let subscription: ConsumerHandle | null = null;

  // onClose MUST be registered before listen()
  fastify.addHook('onClose', async () => {
    if (subscription) await subscription.stop();
    wsServer.close();
    registry.closeAll();
    await broker.close();
  });

  await fastify.listen({ host: config.http.host, port: config.http.port });

  wsServer.attach(fastify.server);

  subscription = await consumer.consume(queue, processor);
  subscription.closed
    .then((reason) => {
      if (reason !== 'stopped') {
        log.error({ reason, queue }, 'Order subscription ended; no further orders will be processed');
      }
    })
    .catch((err: unknown) => {
      log.error({ err }, 'Subscription watcher failed');
    });

  let shuttingDown = false;
  const shutdown = (signal: string): void => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info({ signal }, 'Shutting down');
    fastify
      .close()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        log.error({ err }, 'Error during shutdown');
        process.exit(1);
      });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((err: unknown) => {
  console.error('Fatal: failed to start order pipeline', err);
  process.exit(1);
});
