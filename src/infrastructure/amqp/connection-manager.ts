import amqplib from 'amqplib';
import type { Logger } from 'pino';
import { TransportError, errorMessage } from '../../domain/index.js';
import { buildBrokerUrl, describeBrokerUrl, type BrokerConfig } from '../config.js';
import { QUEUE_OPTIONS, type BrokerChannel, type BrokerTransport, type TransportFactory } from './types.js';

const defaultFactory: TransportFactory = (url) => amqplib.connect(url);

export interface ConnectionManagerOptions {
  config: BrokerConfig;
  log: Logger;
  /** Dials the broker. Defaults to `amqplib.connect`. */
  connect?: TransportFactory;
}

/**
 * Owns the single physical broker connection and hands out short-lived
 * confirm channels over it.
 *
 * - The connection is dialled lazily and re-dialled on the next `acquire()`
 *   after it closes. Dial failures are not retried here; they surface as
 *   `TransportError` and the caller decides.
 * - Opening a channel is retried exactly once before giving up.
 * - Concurrent callers share one in-flight dial.
 * - `close()` tears the connection down once; later calls are no-ops and
 *   every later `acquire()` rejects.
 */
export class BrokerConnectionManager {
  private readonly config: BrokerConfig;
  private readonly log: Logger;
  private readonly connectTransport: TransportFactory;

  private transport: BrokerTransport | null = null;
  private connecting: Promise<BrokerTransport> | null = null;
  private closed = false;

  constructor(options: ConnectionManagerOptions) {
    this.config = options.config;
    this.log = options.log;
    this.connectTransport = options.connect ?? defaultFactory;
  }

  get defaultQueue(): string {
    return this.config.defaultQueue;
  }

  isConnected(): boolean {
    return this.transport !== null;
  }

  /** Dials the broker if no live connection exists. */
  async connect(): Promise<BrokerTransport> {
    if (this.closed) {
      throw new TransportError('TRANSPORT_UNAVAILABLE', 'Broker connection manager is closed');
    }
    if (this.transport) return this.transport;
    if (this.connecting) return this.connecting;

    this.connecting = this.dial();
    try {
      return await this.connecting;
    } finally {
      this.connecting = null;
    }
  }

  /** Returns a fresh channel. The caller owns it and must close it. */
  async acquire(): Promise<BrokerChannel> {
    const transport = await this.connect();

    try {
      return await this.openChannel(transport);
    } catch (first: unknown) {
      this.log.warn({ err: first }, 'Failed to open channel, retrying once');
    }

    // The first failure may have been the connection dying under us.
    const retryTransport = this.transport ?? (await this.connect());
    try {
      return await this.openChannel(retryTransport);
    } catch (err: unknown) {
      this.log.error({ err }, 'Permanent channel failure');
      throw new TransportError('CHANNEL_UNAVAILABLE', `Failed to open channel: ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }

  /**
   * Asserts `queueName` as a durable, shared, non-auto-deleted queue.
   * Idempotent: re-declaring with identical properties is a no-op on the broker.
   */
  async declareQueue(queueName: string): Promise<void> {
    const channel = await this.acquire();
    try {
      await channel.assertQueue(queueName, QUEUE_OPTIONS);
      this.log.debug({ queue: queueName }, 'Queue declared');
    } finally {
      await closeQuietly(channel, this.log);
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    // An in-flight dial sees `closed` and closes its own transport.
    const transport = this.transport;
    this.transport = null;
    if (!transport) return;

    try {
      await transport.close();
      this.log.info('Broker connection closed');
    } catch (err: unknown) {
      this.log.warn({ err }, 'Error closing broker connection');
    }
  }

  private async openChannel(transport: BrokerTransport): Promise<BrokerChannel> {
    const channel = await transport.createConfirmChannel();
    // An unhandled 'error' event would crash the process.
    channel.on('error', (err) => {
      this.log.warn({ err }, 'Channel error');
    });
    return channel;
  }

  private async dial(): Promise<BrokerTransport> {
    const target = describeBrokerUrl(this.config);
    this.log.info({ broker: target }, 'Connecting to broker');

    let transport: BrokerTransport;
    try {
      transport = await this.connectTransport(buildBrokerUrl(this.config));
    } catch (err: unknown) {
      this.log.error({ err, broker: target }, 'Failed to connect to broker');
      throw new TransportError('TRANSPORT_UNAVAILABLE', `Failed to connect to ${target}: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    transport.on('error', (err) => {
      this.log.error({ err }, 'Broker connection error');
    });
    transport.on('close', () => {
      if (this.transport === transport) {
        this.transport = null;
        if (!this.closed) this.log.warn('Broker connection closed, will reconnect on next use');
      }
    });

    if (this.closed) {
      // close() ran while dialling; do not leak the socket.
      await transport.close().catch((err: unknown) => {
        this.log.debug({ err }, 'Error closing late broker connection');
      });
      throw new TransportError('TRANSPORT_UNAVAILABLE', 'Broker connection manager is closed');
    }

    this.transport = transport;
    this.log.info({ broker: target }, 'Broker connected');
    return transport;
  }
}

/** Closes a channel, logging instead of throwing. */
export async function closeQuietly(channel: BrokerChannel, log: Logger): Promise<void> {
  try {
    await channel.close();
  } catch (err: unknown) {
    log.debug({ err }, 'Error closing channel');
  }
}
