import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ConnectionRegistry } from '../src/application/connection-registry.js';
import { OrderProcessor } from '../src/application/order-processor.js';
import {
  BrokerConnectionManager,
  EventConsumer,
  EventPublisher,
  type ConsumerHandle,
} from '../src/infrastructure/amqp/index.js';
import { FakeBroker } from './helpers/fake-broker.js';
import { RecordingConnection } from './helpers/connections.js';
import { fakeLogger } from './helpers/logger.js';

const QUEUE = 'kitchen.orders';

describe('order pipeline', () => {
  let broker: FakeBroker;
  let manager: BrokerConnectionManager;
  let publisher: EventPublisher;
  let registry: ConnectionRegistry;
  let handle: ConsumerHandle;

  const statusOf = (content: Buffer): unknown => {
    const parsed: unknown = JSON.parse(content.toString('utf-8'));
    return typeof parsed === 'object' && parsed !== null && 'order_status' in parsed
      ? parsed.order_status
      : undefined;
  };

  beforeEach(async () => {
    broker = new FakeBroker();
    const log = fakeLogger();
    manager = new BrokerConnectionManager({
      config: {
        host: 'localhost',
        port: 5672,
        username: 'guest',
        password: 'guest',
        defaultQueue: QUEUE,
        publishTimeoutMs: 1000,
      },
      log,
      connect: broker.connect,
    });
    publisher = new EventPublisher({ connection: manager, log, timeoutMs: 1000 });
    registry = new ConnectionRegistry(log);
    const processor = new OrderProcessor({
      publisher,
      notifier: registry,
      delay: async () => 0,
      log,
      queueName: QUEUE,
      defaultClientId: 'anonymous',
    });
    handle = await new EventConsumer({ connection: manager, log, prefetch: 4 }).consume(QUEUE, processor);
  });

  afterEach(async () => {
    await handle.stop();
    await manager.close();
  });

  it('walks an order from ORDERED to DELIVERED', async () => {
    const client = new RecordingConnection();
    registry.register('pizza', client);

    await publisher.publish(QUEUE, { order_no: 42, order_status: 'ORDERED', client_id: 'pizza' });

    await vi.waitFor(() => expect(client.messages).toHaveLength(1));
    expect(client.json()).toEqual([{ order_no: 42, order_status: 'DELIVERED', client_id: 'pizza' }]);
    expect(broker.published.map((m) => statusOf(m.content))).toEqual(['ORDERED', 'PREPARING', 'PREPARED']);
    expect(broker.depth(QUEUE)).toBe(0);
  });

  it('routes orders without a client id to the default client', async () => {
    const fallback = new RecordingConnection();
    registry.register('anonymous', fallback);

    await publisher.publish(undefined, { order_no: 5, order_status: 'ORDERED' });

    await vi.waitFor(() => expect(fallback.json()).toEqual([{ order_no: 5, order_status: 'DELIVERED' }]));
  });

  it('cancels towards the client and retries when an advance cannot be published', async () => {
    const client = new RecordingConnection();
    registry.register('pizza', client);
    broker.failPublishes((_queue, content) => statusOf(content) === 'PREPARED');

    await publisher.publish(QUEUE, { order_no: 42, order_status: 'ORDERED', client_id: 'pizza' });

    await vi.waitFor(() => expect(client.messages).toHaveLength(2));
    expect(client.json()).toEqual([
      {
        order_no: 42,
        order_status: 'CANCELLED',
        client_id: 'pizza',
        error: { code: 'PUBLISH_REJECTED', message: 'Publish to "kitchen.orders" failed: message nacked' },
      },
      { order_no: 42, order_status: 'DELIVERED', client_id: 'pizza' },
    ]);
    expect(broker.delivered.map((d) => [statusOf(d.content), d.redelivered])).toEqual([
      ['ORDERED', false],
      ['PREPARING', false],
      ['PREPARING', true],
      ['PREPARED', false],
    ]);
  });

  it('drops a delivered order for a client that is not connected', async () => {
    await publisher.publish(QUEUE, { order_no: 9, order_status: 'ORDERED', client_id: 'ghost' });

    await vi.waitFor(() => {
      const consumerChannel = broker.transports[0]?.channels.find((c) => c.prefetchCount > 0);
      expect(consumerChannel?.acked).toHaveLength(3);
    });
    expect(broker.depth(QUEUE)).toBe(0);
    expect(registry.size).toBe(0);
  });

  it('keeps requeueing a payload that is not an order event', async () => {
    broker.inject(QUEUE, 'not json');

    await vi.waitFor(() => expect(broker.delivered.length).toBeGreaterThanOrEqual(3));
    const consumerChannel = broker.transports[0]?.channels.find((c) => c.prefetchCount > 0);
    expect(consumerChannel?.acked).toEqual([]);
    expect(consumerChannel?.nacked.every((n) => n.requeue)).toBe(true);
    expect(broker.delivered.slice(1).every((d) => d.redelivered)).toBe(true);
  });
});
