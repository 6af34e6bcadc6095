import type { IncomingMessage, Server as HttpServer } from 'node:http';
import { Socket } from 'node:net';
import type { Duplex } from 'node:stream';
import { createHash } from 'node:crypto';
import type { Logger } from 'pino';
import type { ConnectionRegistry, LiveConnection } from '../../application/connection-registry.js';
import {
  CLOSE_CODE,
  FrameError,
  OPCODE,
  encodeCloseFrame,
  encodeControlFrame,
  encodeTextFrame,
  tryParseFrame,
} from './frames.js';

/**
 * Order-update WebSocket endpoint on raw Node.js HTTP upgrade.
 *
 *   GET /ws?client_id=<id>
 *
 * On accept the server sends a greeting, registers the connection under the
 * client identity, then reads frames until the socket closes. Client text
 * frames are ignored; the channel is server → client. Ping/pong and close
 * are handled per RFC 6455, with a server heartbeat to drop dead peers.
 */

/** Fixed GUID appended to the client key when computing the accept hash (§1.3). */
const WS_GUID = '258EAFA5-E914-47DA-95CA-C5AB0DC85B11';

const CLOSE_TIMEOUT_MS = 1_000;

export const GREETING = 'Connection Established: Started taking order updates...';

export interface WebSocketServerOptions {
  defaultClientId: string;
  path?: string;
  heartbeatMs?: number;
}

let nextConnectionId = 1;

/** One accepted socket. Implements the registry's LiveConnection. */
class WsConnection implements LiveConnection {
  readonly id = nextConnectionId++;
  alive = true;
  closed = false;
  buffer: Buffer;

  constructor(
    readonly clientId: string,
    readonly socket: Socket,
    head: Buffer,
    private readonly onClose: (conn: WsConnection, reason: string) => void,
  ) {
    this.buffer = head.length > 0 ? Buffer.from(head) : Buffer.alloc(0);
  }

  send(message: string): Promise<void> {
    return this.write(encodeTextFrame(message));
  }

  write(frame: Buffer): Promise<void> {
    return new Promise((resolve, reject) => {
      if (this.closed || this.socket.destroyed) {
        reject(new Error('WebSocket connection is closed'));
        return;
      }
      this.socket.write(frame, (err) => {
        if (err) {
          this.terminate('write_error');
          reject(err);
          return;
        }
        resolve();
      });
    });
  }

  /** LiveConnection close: sends a close frame, then half-closes the socket. */
  close(code: number = CLOSE_CODE.GOING_AWAY, reason = 'server_shutdown'): void {
    if (this.closed) return;
    this.closed = true;
    this.socket.end(encodeCloseFrame(code));
    // Peers that never finish the closing handshake are cut off.
    this.socket.setTimeout(CLOSE_TIMEOUT_MS, () => this.socket.destroy());
    this.onClose(this, reason);
  }

  /** Idempotent teardown. */
  terminate(reason: string): void {
    if (this.closed) return;
    this.closed = true;
    if (!this.socket.destroyed) this.socket.destroy();
    this.onClose(this, reason);
  }
}

export class WebSocketServer {
  private readonly connections = new Set<WsConnection>();
  private readonly log: Logger;
  private readonly registry: ConnectionRegistry;
  private readonly path: string;
  private readonly defaultClientId: string;
  private readonly heartbeatMs: number;
  private pingInterval: ReturnType<typeof setInterval> | null = null;

  constructor(log: Logger, registry: ConnectionRegistry, options: WebSocketServerOptions) {
    this.log = log;
    this.registry = registry;
    this.path = options.path ?? '/ws';
    this.defaultClientId = options.defaultClientId;
    this.heartbeatMs = options.heartbeatMs ?? 30_000;
  }

  get connectionCount(): number {
    return this.connections.size;
  }

  attach(server: HttpServer): void {
    server.on('upgrade', (req: IncomingMessage, socket: Duplex, head: Buffer) => {
      this.handleUpgrade(req, socket, head);
    });

    // Heartbeat: PING every interval, drop peers that never answered the last one.
    this.pingInterval = setInterval(() => {
      for (const conn of this.connections) {
        if (!conn.alive) {
          conn.terminate('heartbeat_timeout');
          continue;
        }
        conn.alive = false;
        conn.write(encodeControlFrame(OPCODE.PING)).catch((err: unknown) => {
          this.log.debug({ connId: conn.id, err }, 'Ping failed');
        });
      }
    }, this.heartbeatMs);
    this.pingInterval.unref();

    this.log.info({ path: this.path }, 'WebSocket server attached');
  }

  close(): void {
    if (this.pingInterval) {
      clearInterval(this.pingInterval);
      this.pingInterval = null;
    }
    for (const conn of this.connections) {
      conn.close();
    }
    this.connections.clear();
  }

  /* ------------------------------------------------------------------ */
  /*  Handshake                                                          */
  /* ------------------------------------------------------------------ */

  private handleUpgrade(req: IncomingMessage, socket: Duplex, head: Buffer): void {
    if (!(socket instanceof Socket)) {
      socket.destroy();
      return;
    }

    const url = new URL(req.url ?? '/', 'http://localhost');
    if (url.pathname.replace(/\/+$/, '') !== this.path) {
      rejectUpgrade(socket, 404, 'Not Found');
      return;
    }

    const upgrade = req.headers.upgrade;
    if (req.method !== 'GET' || upgrade?.toLowerCase() !== 'websocket') {
      rejectUpgrade(socket, 400, 'Bad Request');
      return;
    }

    if (req.headers['sec-websocket-version'] !== '13') {
      rejectUpgrade(socket, 426, 'Upgrade Required', ['Sec-WebSocket-Version: 13']);
      return;
    }

    const key = req.headers['sec-websocket-key'];
    if (typeof key !== 'string' || Buffer.from(key, 'base64').length !== 16) {
      rejectUpgrade(socket, 400, 'Bad Request');
      return;
    }

    const clientId = url.searchParams.get('client_id') || this.defaultClientId;
    const accept = createHash('sha1').update(key + WS_GUID).digest('base64');

    socket.write(
      'HTTP/1.1 101 Switching Protocols\r\n' +
        'Upgrade: websocket\r\n' +
        'Connection: Upgrade\r\n' +
        `Sec-WebSocket-Accept: ${accept}\r\n` +
        '\r\n',
    );

    socket.setTimeout(0);
    socket.setNoDelay(true);

    const conn = new WsConnection(clientId, socket, head, (closed, reason) => {
      this.connections.delete(closed);
      this.registry.unregister(closed.clientId, closed);
      this.log.info({ connId: closed.id, clientId: closed.clientId, reason }, 'WebSocket client disconnected');
    });

    this.connections.add(conn);
    this.log.info({ connId: conn.id, clientId }, 'WebSocket upgrade accepted');

    conn.send(GREETING).catch((err: unknown) => {
      this.log.warn({ connId: conn.id, err }, 'Failed to send greeting');
    });
    this.registry.register(clientId, conn);

    socket.on('data', (chunk: Buffer) => {
      conn.buffer = Buffer.concat([conn.buffer, chunk]);
      this.drainFrames(conn);
    });
    // A peer that half-closes without a close frame is gone; nothing more will be read.
    socket.on('end', () => conn.terminate('end'));
    socket.on('close', (hadError: boolean) => conn.terminate(hadError ? 'close_error' : 'close'));
    socket.on('error', (err) => {
      this.log.debug({ connId: conn.id, err: String(err) }, 'Socket error');
      conn.terminate('error');
    });

    if (conn.buffer.length > 0) this.drainFrames(conn);
    socket.resume();
  }

  /* ------------------------------------------------------------------ */
  /*  Read loop                                                          */
  /* ------------------------------------------------------------------ */

  private drainFrames(conn: WsConnection): void {
    while (!conn.closed && conn.buffer.length > 0) {
      let frame: ReturnType<typeof tryParseFrame>;
      try {
        frame = tryParseFrame(conn.buffer);
      } catch (err: unknown) {
        const code = err instanceof FrameError ? err.closeCode : CLOSE_CODE.PROTOCOL_ERROR;
        this.log.warn({ connId: conn.id, err, code }, 'WebSocket protocol error, closing client');
        conn.close(code, 'protocol_error');
        return;
      }
      if (!frame) return;

      conn.buffer = conn.buffer.subarray(frame.nextOffset);

      // §5.1: every client-to-server frame is masked.
      if (!frame.masked) {
        this.log.warn({ connId: conn.id }, 'Unmasked client frame, closing client');
        conn.close(CLOSE_CODE.PROTOCOL_ERROR, 'unmasked_frame');
        return;
      }

      conn.alive = true;

      switch (frame.opcode) {
        case OPCODE.PONG:
          break;
        case OPCODE.PING:
          conn.write(encodeControlFrame(OPCODE.PONG, frame.payload)).catch((err: unknown) => {
            this.log.debug({ connId: conn.id, err }, 'Pong failed');
          });
          break;
        case OPCODE.CLOSE: {
          // Echo the peer's status code, or close normally when it sent none.
          const code = frame.payload.length >= 2 ? frame.payload.readUInt16BE(0) : CLOSE_CODE.NORMAL;
          conn.close(code, 'close_frame');
          return;
        }
        default:
          this.log.debug({ connId: conn.id, opcode: frame.opcode }, 'Ignoring client frame');
      }
    }
  }
}

function rejectUpgrade(
  socket: Socket,
  status: number,
  reason: string,
  headers: readonly string[] = [],
): void {
  socket.end(
    [`HTTP/1.1 ${status} ${reason}`, 'Connection: close', 'Content-Length: 0', ...headers, '', ''].join('\r\n'),
  );
}
