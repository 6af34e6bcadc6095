import type { Logger } from 'pino';
import {
  PipelineError,
  ProcessingError,
  clientIdOf,
  errorMessage,
  isOrderStatus,
  withStatus,
  type OrderEvent,
  type OrderStatus,
} from '../domain/index.js';
import { decodeOrderEvent } from './order-schema.js';
import type { PreparationDelay } from './preparation-delay.js';

/** One message handed over by the broker. Only the body is interpreted. */
export interface QueueDelivery {
  readonly content: Buffer;
  readonly fields: {
    readonly deliveryTag: number;
    readonly redelivered: boolean;
  };
}

/**
 * Contract between the consumer and whatever handles its deliveries.
 * Resolving means "acknowledge"; rejecting means "requeue".
 */
export interface MessageProcessor {
  process(delivery: QueueDelivery): Promise<void>;
}

export interface OrderPublisher {
  publish(queueName: string | undefined, event: OrderEvent): Promise<void>;
}

export interface ClientNotifier {
  send(clientId: string, message: string): Promise<void>;
}

export interface OrderProcessorDeps {
  publisher: OrderPublisher;
  notifier: ClientNotifier;
  delay: PreparationDelay;
  log: Logger;
  /** Queue the processor re-publishes advanced orders to. */
  queueName: string;
  /** Routing target for events that carry no `client_id`. */
  defaultClientId: string;
}

/**
 * The order state machine.
 *
 *   ORDERED   → re-publish as PREPARING
 *   PREPARING → wait a random preparation time, re-publish as PREPARED
 *   PREPARED  → notify the client with the order marked DELIVERED
 *
 * A failed re-publish notifies the client with the order marked CANCELLED
 * and rejects so the delivery is requeued. Terminal and unknown statuses are
 * logged and dropped.
 *
 * Every delivery is handled independently; the processor keeps no per-order
 * state, so two stages of the same order may run concurrently.
 */
export class OrderProcessor implements MessageProcessor {
  private readonly deps: OrderProcessorDeps;
  private readonly log: Logger;

  constructor(deps: OrderProcessorDeps) {
    this.deps = deps;
    this.log = deps.log;
  }

  async process(delivery: QueueDelivery): Promise<void> {
    const { deliveryTag, redelivered } = delivery.fields;

    // DecodeError propagates as-is: the consumer requeues it like any failure.
    const event = decodeOrderEvent(delivery.content);
    const clientId = clientIdOf(event) ?? this.deps.defaultClientId;
    const status = event.order_status;

    this.log.debug({ deliveryTag, redelivered, status, clientId }, 'Processing order event');

    if (!isOrderStatus(status)) {
      this.log.warn({ deliveryTag, status }, 'Unknown order status, dropping event');
      return;
    }

    switch (status) {
      case 'ORDERED':
        await this.advance(event, status, 'PREPARING', clientId);
        return;

      case 'PREPARING': {
        const seconds = await this.deps.delay();
        this.log.debug({ deliveryTag, seconds }, 'Preparation finished');
        await this.advance(event, status, 'PREPARED', clientId);
        return;
      }

      case 'PREPARED':
        await this.deliver(event, clientId);
        return;

      case 'DELIVERED':
      case 'CANCELLED':
        this.log.debug({ deliveryTag, status }, 'Order already in terminal state, nothing to do');
        return;
    }
  }

  private async advance(
    event: OrderEvent,
    from: OrderStatus,
    next: OrderStatus,
    clientId: string,
  ): Promise<void> {
    try {
      await this.deps.publisher.publish(this.deps.queueName, withStatus(event, next));
    } catch (err: unknown) {
      this.log.error({ err, from, to: next, clientId }, 'Failed to advance order');
      await this.notifyFailure(event, clientId, err);
      throw new ProcessingError(`Failed to advance order from ${from} to ${next}`, {
        cause: err,
      });
    }
    this.log.info({ from, to: next, clientId }, 'Order advanced');
  }

  private async deliver(event: OrderEvent, clientId: string): Promise<void> {
    const delivered = withStatus(event, 'DELIVERED');
    try {
      await this.deps.notifier.send(clientId, JSON.stringify(delivered));
    } catch (err: unknown) {
      throw new ProcessingError('Failed to notify client of delivered order', { cause: err });
    }
    this.log.info({ clientId }, 'Order delivered');
  }

  /** Best-effort: a failed error notification is logged, never raised. */
  private async notifyFailure(event: OrderEvent, clientId: string, cause: unknown): Promise<void> {
    const notification = {
      ...withStatus(event, 'CANCELLED'),
      error: {
        code: cause instanceof PipelineError ? cause.code : 'PROCESSING_FAILED',
        message: errorMessage(cause),
      },
    };

    try {
      await this.deps.notifier.send(clientId, JSON.stringify(notification));
    } catch (err: unknown) {
      this.log.warn({ err, clientId }, 'Failed to notify client of cancelled order');
    }
  }
}
