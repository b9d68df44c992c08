import WebSocket from 'ws';
import type { RawData } from 'ws';
import { ConnectError, TimeoutError } from '../../errors';
import { InboundQueue } from './InboundQueue';

// ==================== Transport Contract ====================

/**
 * Item of a transport's inbound sequence.
 *
 * A `timeout` item means the keep-alive expired; it is always the last item.
 */
export type TransportEvent =
  | { type: 'frame'; data: string }
  | { type: 'timeout'; error: TimeoutError };

/**
 * A live, bidirectional text transport.
 */
export interface Transport {
  /** Sends one text frame; throws ConnectError if the transport is closed */
  send(data: string): void;
  /** Inbound sequence; ends when the transport closes */
  events(): AsyncIterable<TransportEvent>;
  /** Idempotent; ends the inbound sequence immediately */
  close(): void;
  /** Whether frames can currently be sent */
  readonly isOpen: boolean;
}

/**
 * Opens a transport to a URL. Rejects with ConnectError.
 */
export type TransportFactory = (url: string) => Promise<Transport>;

// ==================== WebSocket Implementation ====================

/**
 * Connection options
 */
export interface ConnectionOptions {
  /** Interval between keep-alive pings in ms (default: 15000) */
  pingIntervalMs?: number;
  /** Grace window for the matching pong in ms (default: 10000) */
  pongTimeoutMs?: number;
  /** Maximum time to wait for the socket to open in ms (default: 15000) */
  openTimeoutMs?: number;
}

/**
 * WebSocket transport with ping/pong keep-alive.
 *
 * @remarks
 * Inbound text frames are queued and consumed through {@link events}. A ping is sent
 * every `pingIntervalMs`; if no pong arrives within `pongTimeoutMs` the socket is
 * terminated and the sequence ends with a keep-alive {@link TimeoutError}.
 */
export class Connection implements Transport {
  private readonly inbound = new InboundQueue<TransportEvent>();
  private pingTimer: ReturnType<typeof setInterval> | null = null;
  private pongTimer: ReturnType<typeof setTimeout> | null = null;
  private closed: boolean = false;

  private constructor(
    private readonly socket: WebSocket,
    private readonly pingIntervalMs: number,
    private readonly pongTimeoutMs: number
  ) {
    socket.on('message', this.handleMessage);
    socket.on('pong', this.handlePong);
    socket.on('close', this.handleClose);
    this.startKeepalive();
  }

  /**
   * Opens a WebSocket connection.
   *
   * @param url - Gateway URL (ws:// or wss://)
   * @returns Promise that resolves with an open connection
   * @throws {ConnectError} If the socket cannot be opened
   */
  static connect(url: string, options: ConnectionOptions = {}): Promise<Connection> {
    const pingIntervalMs = options.pingIntervalMs ?? 15_000;
    const pongTimeoutMs = options.pongTimeoutMs ?? 10_000;
    const openTimeoutMs = options.openTimeoutMs ?? 15_000;

    return new Promise((resolve, reject) => {
      let socket: WebSocket;
      try {
        socket = new WebSocket(url, { handshakeTimeout: openTimeoutMs });
      } catch (error) {
        reject(new ConnectError(`Failed to open ${url}`, { cause: error }));
        return;
      }

      // socket errors are always followed by 'close', which is where we react
      socket.on('error', ignoreSocketError);

      const cleanup = () => {
        socket.off('open', onOpen);
        socket.off('error', onError);
        socket.off('close', onClose);
      };

      const onOpen = () => {
        cleanup();
        resolve(new Connection(socket, pingIntervalMs, pongTimeoutMs));
      };

      const onError = (error: Error) => {
        cleanup();
        reject(new ConnectError(`Failed to connect to ${url}: ${error.message}`, { cause: error }));
      };

      const onClose = (code: number) => {
        cleanup();
        reject(new ConnectError(`Connection to ${url} closed before opening (code ${code})`));
      };

      socket.on('open', onOpen);
      socket.on('error', onError);
      socket.on('close', onClose);
    });
  }

  get isOpen(): boolean {
    return !this.closed && this.socket.readyState === WebSocket.OPEN;
  }

  send(data: string): void {
    if (!this.isOpen) {
      throw new ConnectError('Cannot send on a closed connection');
    }
    this.socket.send(data);
  }

  events(): AsyncIterable<TransportEvent> {
    return this.inbound;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.stopKeepalive();
    this.inbound.end();

    if (this.socket.readyState === WebSocket.OPEN) {
      this.socket.close(1000, 'Client disconnect');
    } else if (this.socket.readyState === WebSocket.CONNECTING) {
      this.socket.terminate();
    }
  }

  // ==================== Keep-alive ====================

  private startKeepalive(): void {
    this.pingTimer = setInterval(() => this.sendPing(), this.pingIntervalMs);
  }

  private stopKeepalive(): void {
    if (this.pingTimer) {
      clearInterval(this.pingTimer);
      this.pingTimer = null;
    }
    if (this.pongTimer) {
      clearTimeout(this.pongTimer);
      this.pongTimer = null;
    }
  }

  private sendPing(): void {
    if (!this.isOpen) return;
    this.socket.ping();
    // an outstanding deadline keeps running; only a pong clears it
    if (!this.pongTimer) {
      this.pongTimer = setTimeout(() => this.handlePongTimeout(), this.pongTimeoutMs);
    }
  }

  private handlePongTimeout(): void {
    this.pongTimer = null;
    if (this.closed) return;

    this.inbound.push({
      type: 'timeout',
      error: new TimeoutError('keepalive', `No pong within ${this.pongTimeoutMs}ms`, this.pongTimeoutMs),
    });
    this.closed = true;
    this.stopKeepalive();
    this.inbound.end();
    this.socket.terminate();
  }

  // ==================== Socket Handlers ====================

  private readonly handleMessage = (raw: RawData): void => {
    this.inbound.push({ type: 'frame', data: rawToString(raw) });
  };

  private readonly handlePong = (): void => {
    if (this.pongTimer) {
      clearTimeout(this.pongTimer);
      this.pongTimer = null;
    }
  };

  private readonly handleClose = (): void => {
    this.closed = true;
    this.stopKeepalive();
    this.inbound.end();
  };
}

function rawToString(raw: RawData): string {
  if (Buffer.isBuffer(raw)) return raw.toString('utf8');
  if (Array.isArray(raw)) return Buffer.concat(raw).toString('utf8');
  return Buffer.from(raw).toString('utf8');
}

function ignoreSocketError(): void {
  // handled through 'close'
}

/**
 * Default factory used by the client: a {@link Connection} with the given keep-alive settings.
 */
export function webSocketTransport(options: ConnectionOptions = {}): TransportFactory {
  return (url: string) => Connection.connect(url, options);
}
