/**
 * ndax-stream - NDAX WebSocket Session Engine
 *
 * One authenticated, self-healing session with the NDAX exchange gateway:
 * request/reply correlation, two-factor login, and market data and account
 * streams that survive reconnects.
 */

// Core types
export * from './types';

// Errors
export {
  NdaxError,
  ConnectError,
  DecodeError,
  AuthFailedError,
  TimeoutError,
  ShuttingDownError,
  RequestRejectedError,
  ConfigError,
} from './errors';
export type { AuthFailureKind, TimeoutScope } from './errors';

// Client
export { NdaxClient, DEFAULT_GATEWAY_URL } from './client/NdaxClient';
export type { NdaxClientOptions } from './client/NdaxClient';
export type { SessionEvent, SessionEventMap, SessionEventListener } from './client/BaseSessionClient';

// Transport
export { Connection, webSocketTransport } from './client/transport/Connection';
export type { Transport, TransportEvent, TransportFactory, ConnectionOptions } from './client/transport/Connection';

// Payloads and feeds
export { FEEDS, ACCOUNT_EVENT_NAMES, feedForEvent } from './feeds';
export type {
  AccountEvent,
  AccountEventName,
  AccountInfo,
  AccountPosition,
  FeedUpdateMap,
  GenericResponse,
  Instrument,
  Level1Update,
  Level2Entry,
  Order,
  Product,
  SendOrderReply,
  TickerBar,
  Trade,
  TradeReport,
} from './feeds';

// Wire codec
export { encodeFrame, decodeFrame } from './codec';

// One-time codes
export { totp, hotp, base32Decode } from './totp';

// Environment
export { loadCredentials, loadEnvFile } from './utils/env';
