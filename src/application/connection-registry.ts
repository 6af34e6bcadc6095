import type { Logger } from 'pino';
import { SendError } from '../domain/index.js';

/**
 * A live duplex connection to one client. The WebSocket server supplies the
 * real implementation; anything that can deliver a text message will do.
 */
export interface LiveConnection {
  send(message: string): Promise<void>;
  close(): void;
}

/**
 * Directory of live client connections keyed by client identity.
 *
 * At most one connection is held per identity; registering again replaces
 * the previous entry (last writer wins). Sends to the same connection are
 * chained so that concurrent callers never interleave frames on the wire.
 *
 * The registry never evicts on its own. Whoever owns the accept loop calls
 * `unregister` when a transport closes.
 */
export class ConnectionRegistry {
  private readonly connections = new Map<string, LiveConnection>();
  private readonly tails = new WeakMap<LiveConnection, Promise<void>>();
  private readonly log: Logger;

  constructor(log: Logger) {
    this.log = log;
  }

  /** Inserts or replaces the connection for `clientId`. Returns the replaced one, if any. */
  register(clientId: string, connection: LiveConnection): LiveConnection | undefined {
    const previous = this.connections.get(clientId);
    this.connections.set(clientId, connection);

    if (previous && previous !== connection) {
      this.log.info({ clientId }, 'Client connection replaced');
    } else {
      this.log.info({ clientId, clientCount: this.connections.size }, 'Client connection registered');
    }
    return previous;
  }

  /**
   * Removes `clientId` only while it still maps to `connection`, so a
   * late close from a replaced socket cannot drop its successor.
   */
  unregister(clientId: string, connection: LiveConnection): boolean {
    if (this.connections.get(clientId) !== connection) return false;
    this.connections.delete(clientId);
    this.log.info({ clientId, clientCount: this.connections.size }, 'Client connection removed');
    return true;
  }

  lookup(clientId: string): LiveConnection | undefined {
    return this.connections.get(clientId);
  }

  get size(): number {
    return this.connections.size;
  }

  /**
   * Sends `message` to the client registered under `clientId`.
   *
   * An unknown client is a silent no-op. A transport failure rejects with
   * `SendError`; the next queued send still runs.
   */
  async send(clientId: string, message: string): Promise<void> {
    const connection = this.connections.get(clientId);
    if (!connection) {
      this.log.debug({ clientId }, 'No live connection for client, message dropped');
      return;
    }

    const previous = this.tails.get(connection) ?? Promise.resolve();
    const write = previous.then(() => connection.send(message));
    this.tails.set(
      connection,
      write.then(
        () => undefined,
        () => undefined,
      ),
    );

    try {
      await write;
    } catch (err: unknown) {
      this.log.warn({ err, clientId }, 'Send to client failed');
      throw new SendError(clientId, { cause: err });
    }
  }

  /** Closes every registered connection and clears the directory. */
  closeAll(): void {
    for (const [clientId, connection] of this.connections) {
      try {
        connection.close();
      } catch (err: unknown) {
        this.log.debug({ err, clientId }, 'Error closing client connection');
      }
    }
    this.connections.clear();
  }
}
