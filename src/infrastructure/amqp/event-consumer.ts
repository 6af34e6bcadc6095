import type { Logger } from 'pino';
import type { MessageProcessor, QueueDelivery } from '../../application/order-processor.js';
import { closeQuietly } from './connection-manager.js';
import type { BrokerChannel } from './types.js';

/** What the consumer needs from the connection manager. */
export interface ConsumerConnection {
  readonly defaultQueue: string;
  acquire(): Promise<BrokerChannel>;
  declareQueue(queueName: string): Promise<void>;
}

export interface EventConsumerOptions {
  connection: ConsumerConnection;
  log: Logger;
  /** Maximum unacknowledged deliveries, and so concurrent processing units. */
  prefetch: number;
}

export type SubscriptionEndReason = 'stopped' | 'cancelled_by_broker' | 'channel_closed';

export interface ConsumerHandle {
  readonly queue: string;
  readonly consumerTag: string;
  /** Resolves once the delivery stream has ended, for whatever reason. */
  readonly closed: Promise<SubscriptionEndReason>;
  stop(): Promise<void>;
}

/**
 * Subscribes a MessageProcessor to a queue with manual acknowledgement.
 *
 * Each delivery is dispatched to its own async unit as soon as it arrives;
 * the subscription callback never waits on processing. Concurrency is capped
 * by the channel prefetch: the broker stops delivering once `prefetch`
 * messages are unacknowledged and resumes as they settle.
 *
 * Processing success → ack. Any failure → nack with requeue, so delivery is
 * at-least-once and retries may reorder messages.
 *
 * A subscription that ends (broker cancel, channel close) is not restarted.
 */
export class EventConsumer {
  private readonly connection: ConsumerConnection;
  private readonly log: Logger;
  private readonly prefetch: number;
  private inFlightCount = 0;
  private active = 0;

  constructor(options: EventConsumerOptions) {
    this.connection = options.connection;
    this.log = options.log;
    this.prefetch = options.prefetch;
  }

  /** Deliveries currently being processed. */
  get inFlight(): number {
    return this.inFlightCount;
  }

  /** True while at least one subscription is live. */
  isRunning(): boolean {
    return this.active > 0;
  }

  async consume(queueName: string | undefined, processor: MessageProcessor): Promise<ConsumerHandle> {
    const queue = queueName ? queueName : this.connection.defaultQueue;

    await this.connection.declareQueue(queue);
    const channel = await this.connection.acquire();

    let ended = false;
    let resolveClosed: (reason: SubscriptionEndReason) => void = () => undefined;
    const closed = new Promise<SubscriptionEndReason>((resolve) => {
      resolveClosed = resolve;
    });

    const end = (reason: SubscriptionEndReason): void => {
      if (ended) return;
      ended = true;
      this.active--;
      const level = reason === 'stopped' ? 'info' : 'error';
      this.log[level]({ queue, reason, inFlight: this.inFlightCount }, 'Subscription ended');
      resolveClosed(reason);
    };

    channel.on('error', (err) => {
      this.log.error({ err, queue }, 'Consumer channel error');
    });
    channel.on('close', () => end('channel_closed'));
    this.active++;

    let consumerTag: string;
    try {
      await channel.prefetch(this.prefetch);
      const reply = await channel.consume(
        queue,
        (delivery) => {
          if (delivery === null) {
            end('cancelled_by_broker');
            return;
          }
          void this.dispatch(channel, queue, delivery, processor);
        },
        { noAck: false },
      );
      consumerTag = reply.consumerTag;
    } catch (err: unknown) {
      if (!ended) {
        ended = true;
        this.active--;
      }
      await closeQuietly(channel, this.log);
      throw err;
    }

    this.log.info({ queue, consumerTag, prefetch: this.prefetch }, 'Consumer started');

    const stop = async (): Promise<void> => {
      if (ended) return;
      try {
        await channel.cancel(consumerTag);
      } catch (err: unknown) {
        this.log.warn({ err, consumerTag }, 'Error cancelling consumer');
      }
      end('stopped');
      await closeQuietly(channel, this.log);
    };

    return { queue, consumerTag, closed, stop };
  }

  /** Runs one delivery to completion and settles it. Never rejects. */
  private async dispatch(
    channel: BrokerChannel,
    queue: string,
    delivery: QueueDelivery,
    processor: MessageProcessor,
  ): Promise<void> {
    const { deliveryTag, redelivered } = delivery.fields;
    this.inFlightCount++;

    let succeeded = false;
    try {
      await processor.process(delivery);
      succeeded = true;
    } catch (err: unknown) {
      this.log.warn({ err, queue, deliveryTag, redelivered }, 'Processing failed, requeueing delivery');
    }

    try {
      if (succeeded) {
        channel.ack(delivery);
      } else {
        channel.nack(delivery, false, true);
      }
    } catch (err: unknown) {
      // Channel is gone; the broker redelivers anything left unsettled.
      this.log.error({ err, queue, deliveryTag }, 'Failed to settle delivery');
    } finally {
      this.inFlightCount--;
    }
  }
}
