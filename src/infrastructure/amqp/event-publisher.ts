import type { Logger } from 'pino';
import { PublishError, errorMessage, type OrderEvent } from '../../domain/index.js';
import type { OrderPublisher } from '../../application/order-processor.js';
import { closeQuietly } from './connection-manager.js';
import type { BrokerChannel } from './types.js';

/** Where the publisher gets its channels. Implemented by BrokerConnectionManager. */
export interface ChannelSource {
  readonly defaultQueue: string;
  acquire(): Promise<BrokerChannel>;
}

export interface EventPublisherOptions {
  connection: ChannelSource;
  log: Logger;
  /** Budget for one publish, from channel send to broker confirm. */
  timeoutMs: number;
}

/**
 * Publishes order events straight to a queue (default exchange, queue name
 * as routing key) as persistent JSON.
 *
 * Each publish opens its own confirm channel, waits for the broker confirm
 * within the time budget, then closes the channel. Channels are never shared
 * between publishes, so there is exactly one writer per channel.
 */
export class EventPublisher implements OrderPublisher {
  private readonly connection: ChannelSource;
  private readonly log: Logger;
  private readonly timeoutMs: number;

  constructor(options: EventPublisherOptions) {
    this.connection = options.connection;
    this.log = options.log;
    this.timeoutMs = options.timeoutMs;
  }

  /**
   * @param queueName - target queue; empty or undefined means the configured default.
   * @throws PublishError with code SERIALIZATION_FAILED, CHANNEL_UNAVAILABLE,
   *   PUBLISH_TIMEOUT or PUBLISH_REJECTED.
   */
  async publish(queueName: string | undefined, event: OrderEvent): Promise<void> {
    const queue = queueName ? queueName : this.connection.defaultQueue;
    const body = serialize(event);

    let channel: BrokerChannel;
    try {
      channel = await this.connection.acquire();
    } catch (err: unknown) {
      throw new PublishError('CHANNEL_UNAVAILABLE', `No channel available: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    try {
      const accepted = channel.sendToQueue(queue, body, {
        persistent: true,
        contentType: 'application/json',
      });
      if (!accepted) {
        this.log.debug({ queue }, 'Channel write buffer full, waiting for confirm');
      }

      await withTimeout(
        channel.waitForConfirms(),
        this.timeoutMs,
        () => new PublishError('PUBLISH_TIMEOUT', `Publish to "${queue}" exceeded ${this.timeoutMs}ms`),
      );
    } catch (err: unknown) {
      this.log.warn({ err, queue, order_status: event.order_status }, 'Publish failed');
      // Not awaited: a broker that never confirmed may never answer the close either.
      void closeQuietly(channel, this.log);
      if (err instanceof PublishError) throw err;
      throw new PublishError('PUBLISH_REJECTED', `Publish to "${queue}" failed: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    await closeQuietly(channel, this.log);

    this.log.debug({ queue, order_status: event.order_status, bytes: body.length }, 'Event published');
  }
}

function serialize(event: OrderEvent): Buffer {
  let json: string | undefined;
  try {
    json = JSON.stringify(event);
  } catch (err: unknown) {
    throw new PublishError('SERIALIZATION_FAILED', `Event cannot be serialized: ${errorMessage(err)}`, {
      cause: err,
    });
  }
  if (json === undefined) {
    throw new PublishError('SERIALIZATION_FAILED', 'Event serialized to nothing');
  }
  return Buffer.from(json, 'utf-8');
}

/**
 * Settles with `promise` unless `ms` elapses first, in which case it rejects
 * with `onTimeout()`. The losing promise keeps its handler attached.
 */
function withTimeout<T>(promise: Promise<T>, ms: number, onTimeout: () => Error): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(onTimeout()), ms);
    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (err: unknown) => {
        clearTimeout(timer);
        reject(err);
      },
    );
  });
}
