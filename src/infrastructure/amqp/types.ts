import type { Options, Replies } from 'amqplib';
import type { QueueDelivery } from '../../application/order-processor.js';

/**
 * The slice of an amqplib confirm channel the pipeline relies on.
 *
 * amqplib's `ConfirmChannel` satisfies this structurally; the narrow shape
 * lets tests substitute an in-process broker.
 */
export interface BrokerChannel {
  assertQueue(queue: string, options?: Options.AssertQueue): Promise<Replies.AssertQueue>;
  sendToQueue(queue: string, content: Buffer, options?: Options.Publish): boolean;
  waitForConfirms(): Promise<void>;
  prefetch(count: number): Promise<unknown>;
  consume(
    queue: string,
    onMessage: (msg: QueueDelivery | null) => void,
    options?: Options.Consume,
  ): Promise<Replies.Consume>;
  cancel(consumerTag: string): Promise<unknown>;
  ack(message: QueueDelivery): void;
  nack(message: QueueDelivery, allUpTo?: boolean, requeue?: boolean): void;
  close(): Promise<void>;
  on(event: 'close' | 'error', listener: (err?: Error) => void): unknown;
}

/** The slice of an amqplib `ChannelModel` (the physical connection) in use. */
export interface BrokerTransport {
  createConfirmChannel(): Promise<BrokerChannel>;
  close(): Promise<void>;
  on(event: 'close' | 'error', listener: (err?: Error) => void): unknown;
}

export type TransportFactory = (url: string) => Promise<BrokerTransport>;

/** Queue properties shared by every declaration: survives broker restarts. */
export const QUEUE_OPTIONS = {
  durable: true,
  exclusive: false,
  autoDelete: false,
} as const satisfies Options.AssertQueue;
