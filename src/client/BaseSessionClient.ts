import { toError } from '../errors';
import { Anomaly, ReconnectPolicy, SessionState } from '../types';

// ==================== Shared Types ====================

/**
 * Payload of each event emitted by session clients
 */
export interface SessionEventMap {
  /** Every lifecycle transition */
  stateChange: { from: SessionState; to: SessionState };
  /** Transport open and session authenticated */
  connected: { url: string };
  /** Transport lost or closed */
  disconnected: { reason: string; error: Error | null };
  /** A reconnect is scheduled */
  reconnecting: { attempt: number; delayMs: number };
  /** A frame was dropped; the connection continues */
  anomaly: Anomaly;
  /** A failure nobody awaits: auth failure during reconnect, failed resubscribe, throwing handler */
  error: Error;
}

export type SessionEvent = keyof SessionEventMap;

/**
 * Event listener callback type
 */
export type SessionEventListener<E extends SessionEvent> = (data: SessionEventMap[E]) => void;

type ListenerTable = { [E in SessionEvent]: Set<SessionEventListener<E>> };

// ==================== Base Client Configuration ====================

/**
 * Base configuration options shared by session clients
 */
export interface BaseSessionClientOptions {
  /** Whether to log verbose debug information */
  verbose?: boolean;
  /** Reconnect backoff (default: 1000ms base, 30000ms cap, no jitter) */
  reconnect?: Partial<ReconnectPolicy>;
  /** Random source for jitter, in [0, 1) (default: Math.random) */
  random?: () => number;
}

/**
 * Abstract base class for streaming session clients.
 *
 * @remarks
 * Provides typed event handling, verbose logging, the lifecycle state with its
 * `stateChange` notifications, and the backoff arithmetic and interruptible
 * sleep the reconnect loop is built from. Subclasses own the connection.
 */
export abstract class BaseSessionClient {
  // ==================== Shared State ====================

  /** Event listeners */
  protected readonly eventListeners: ListenerTable = {
    stateChange: new Set(),
    connected: new Set(),
    disconnected: new Set(),
    reconnecting: new Set(),
    anomaly: new Set(),
    error: new Set(),
  };

  /** Current lifecycle state */
  protected sessionState: SessionState = 'Disconnected';

  /** Reconnect backoff settings */
  protected readonly reconnectPolicy: ReconnectPolicy;

  /** Whether to log verbose debug information */
  protected readonly verbose: boolean;

  private readonly random: () => number;
  private wakeSleeper: (() => void) | null = null;

  /** Client name for logging */
  protected abstract readonly clientName: string;

  // ==================== Constructor ====================

  constructor(options: BaseSessionClientOptions = {}) {
    this.verbose = options.verbose ?? false;
    this.random = options.random ?? Math.random;

    const baseDelayMs = options.reconnect?.baseDelayMs ?? 1000;
    this.reconnectPolicy = {
      baseDelayMs,
      maxDelayMs: Math.max(baseDelayMs, options.reconnect?.maxDelayMs ?? 30_000),
      jitter: Math.min(1, Math.max(0, options.reconnect?.jitter ?? 0)),
    };
  }

  // ==================== Concrete Public Methods ====================

  /**
   * Current lifecycle state.
   */
  get state(): SessionState {
    return this.sessionState;
  }

  /**
   * Registers an event listener.
   * @param event - Event type to listen for
   * @param listener - Callback function
   */
  on<E extends SessionEvent>(event: E, listener: SessionEventListener<E>): this {
    this.eventListeners[event].add(listener);
    return this;
  }

  /**
   * Removes an event listener.
   * @param event - Event type
   * @param listener - Callback function to remove
   */
  off<E extends SessionEvent>(event: E, listener: SessionEventListener<E>): this {
    this.eventListeners[event].delete(listener);
    return this;
  }

  /**
   * Registers a listener that is removed after its first call.
   */
  once<E extends SessionEvent>(event: E, listener: SessionEventListener<E>): this {
    const wrapped: SessionEventListener<E> = data => {
      this.off(event, wrapped);
      listener(data);
    };
    return this.on(event, wrapped);
  }

  // ==================== Protected Helpers ====================

  /**
   * Emits an event to all registered listeners.
   * A throwing listener is reported as an `error` event (or logged, if it was an `error` listener).
   */
  protected emit<E extends SessionEvent>(event: E, data: SessionEventMap[E]): void {
    for (const listener of Array.from(this.eventListeners[event])) {
      try {
        listener(data);
      } catch (error) {
        if (event === 'error') {
          console.error(`[${this.clientName}] Event listener error:`, error);
        } else {
          this.emit('error', toError(error));
        }
      }
    }
  }

  /**
   * Moves to a new lifecycle state, emitting `stateChange` when it differs.
   */
  protected setState(next: SessionState): void {
    const from = this.sessionState;
    if (from === next) return;
    this.sessionState = next;
    this.log(`State ${from} -> ${next}`);
    this.emit('stateChange', { from, to: next });
  }

  /**
   * Calculates the reconnection delay for an attempt (1-based) with exponential backoff.
   *
   * @remarks
   * `baseDelayMs * 2^(attempt - 1)`, capped at `maxDelayMs`, then spread by up to
   * `jitter` of itself in either direction and capped again.
   */
  protected getReconnectDelay(attempt: number): number {
    const { baseDelayMs, maxDelayMs, jitter } = this.reconnectPolicy;
    const exponential = Math.min(maxDelayMs, baseDelayMs * Math.pow(2, Math.max(0, attempt - 1)));
    if (jitter === 0) return exponential;

    const spread = exponential * jitter * (this.random() * 2 - 1);
    return Math.round(Math.min(maxDelayMs, Math.max(0, exponential + spread)));
  }

  /**
   * Sleep utility for reconnection backoff; {@link interruptSleep} ends it early.
   */
  protected sleep(ms: number): Promise<void> {
    return new Promise(resolve => {
      const timer = setTimeout(() => {
        this.wakeSleeper = null;
        resolve();
      }, ms);
      this.wakeSleeper = () => {
        clearTimeout(timer);
        this.wakeSleeper = null;
        resolve();
      };
    });
  }

  protected interruptSleep(): void {
    this.wakeSleeper?.();
  }

  /**
   * Logs a message if verbose mode is enabled.
   */
  protected log(message: string): void {
    if (this.verbose) {
      console.log(`[${this.clientName}] ${message}`);
    }
  }
}
