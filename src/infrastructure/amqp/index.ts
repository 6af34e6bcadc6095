export { BrokerConnectionManager, closeQuietly } from './connection-manager.js';
export type { ConnectionManagerOptions } from './connection-manager.js';
export { EventPublisher } from './event-publisher.js';
export type { ChannelSource, EventPublisherOptions } from './event-publisher.js';
export { EventConsumer } from './event-consumer.js';
export type {
  ConsumerConnection,
  ConsumerHandle,
  EventConsumerOptions,
  SubscriptionEndReason,
} from './event-consumer.js';
export { QUEUE_OPTIONS } from './types.js';
export type { BrokerChannel, BrokerTransport, TransportFactory } from './types.js';
