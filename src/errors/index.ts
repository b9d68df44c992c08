/**
 * Error taxonomy for the NDAX session engine.
 *
 * @remarks
 * Every failure the client surfaces is an {@link NdaxError} subclass, so callers
 * can branch with `instanceof` instead of matching on messages.
 * Unmatched frames are not errors; they are reported through the client's
 * `anomaly` event.
 */

/**
 * Base class for all errors raised by this library.
 */
export class NdaxError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Socket, DNS or handshake failure, or a connection lost while a request was in flight.
 * Retried by the reconnect policy.
 */
export class ConnectError extends NdaxError {}

/**
 * A malformed wire frame. The frame is dropped and the connection continues.
 */
export class DecodeError extends NdaxError {
  /** The raw text that failed to decode (truncated) */
  readonly raw: string;

  constructor(message: string, raw: string, options?: { cause?: unknown }) {
    super(message, options);
    this.raw = raw.length > 200 ? `${raw.slice(0, 200)}…` : raw;
  }
}

/**
 * Why an authentication attempt failed.
 *
 * - `credentials`: username/password rejected
 * - `second-factor`: the one-time code was rejected
 * - `clock-skew`: the code was rejected in a way that points at the local clock
 * - `protocol`: the gateway answered with something we could not interpret
 */
export type AuthFailureKind = 'credentials' | 'second-factor' | 'clock-skew' | 'protocol';

/**
 * Login or second-factor rejection. Not retried automatically.
 */
export class AuthFailedError extends NdaxError {
  readonly kind: AuthFailureKind;
  /** Reason as supplied by the gateway, when it gave one */
  readonly reason: string;

  constructor(kind: AuthFailureKind, reason: string) {
    super(`Authentication failed (${kind}): ${reason}`);
    this.kind = kind;
    this.reason = reason;
  }
}

/**
 * Scope of a timeout: a single request, or the connection keep-alive.
 */
export type TimeoutScope = 'request' | 'keepalive';

export class TimeoutError extends NdaxError {
  readonly scope: TimeoutScope;
  readonly timeoutMs: number;

  constructor(scope: TimeoutScope, message: string, timeoutMs: number) {
    super(message);
    this.scope = scope;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Raised for every outstanding request when the client is stopped.
 */
export class ShuttingDownError extends NdaxError {
  constructor(message: string = 'Client is shutting down') {
    super(message);
  }
}

/**
 * The gateway answered a request with an error frame or a `result: false` reply.
 */
export class RequestRejectedError extends NdaxError {
  readonly endpoint: string;
  readonly code: number | null;

  constructor(endpoint: string, message: string, code: number | null = null) {
    super(`${endpoint} rejected: ${message}`);
    this.endpoint = endpoint;
    this.code = code;
  }
}

/**
 * Missing or malformed configuration, such as credentials in the environment.
 */
export class ConfigError extends NdaxError {}

/**
 * Normalizes anything thrown into an Error.
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
