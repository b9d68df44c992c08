/**
 * Core types for the NDAX session engine
 */

/**
 * Login material for one NDAX account.
 *
 * @remarks
 * Supplied once at construction and never logged.
 */
export interface Credentials {
  /** Numeric account identifier used by account-scoped endpoints */
  readonly accountId: number;
  /** Exchange username */
  readonly username: string;
  /** Exchange password */
  readonly password: string;
  /** Base32 shared secret for time-based one-time codes */
  readonly twoFactorSecret: string;
}

/**
 * Lifecycle state of a client session.
 */
export type SessionState =
  | 'Disconnected'
  | 'Connecting'
  | 'Authenticating'
  | 'Authenticated'
  | 'Reconnecting'
  | 'Closed';

/**
 * State of the login handshake on the current connection.
 */
export type AuthState =
  | 'Disconnected'
  | 'Connecting'
  | 'AwaitingChallenge'
  | 'AwaitingSecondFactor'
  | 'Authenticated'
  | 'AuthFailed';

/**
 * Wire message type tag (`m` field of the envelope).
 */
export enum MessageType {
  Request = 0,
  Reply = 1,
  Subscribe = 2,
  Event = 3,
  Unsubscribe = 4,
  Error = 5,
}

/**
 * One decoded wire message.
 */
export interface Frame {
  /** Message type */
  type: MessageType;
  /** Sequence number; replies echo the request's number */
  sequence: number;
  /** Endpoint or event name */
  endpoint: string;
  /** Decoded payload body, not yet validated */
  payload: unknown;
}

/**
 * Names of the streaming feeds the client can subscribe to.
 */
export type FeedName = 'level1' | 'level2' | 'ticker' | 'trades' | 'accountEvents';

/**
 * Handle returned by every subscribe call.
 */
export interface SubscriptionHandle {
  /** Stable id derived from the subscription key */
  readonly id: string;
  readonly feed: FeedName;
  /** Subscribe endpoint on the wire, e.g. `SubscribeLevel1` */
  readonly endpoint: string;
  /** Instrument id, or the account id for account events */
  readonly instrumentId: number;
}

/**
 * Wire status of a registered subscription.
 *
 * - `pending`: waiting to be sent (not live, or the connection dropped)
 * - `requested`: subscribe frame sent, acknowledgement outstanding
 * - `active`: acknowledged by the gateway
 */
export type SubscriptionStatus = 'pending' | 'requested' | 'active';

/**
 * Snapshot of a registered subscription.
 */
export interface SubscriptionInfo extends SubscriptionHandle {
  readonly status: SubscriptionStatus;
}

/**
 * Handler invoked for every update of a subscription.
 */
export type UpdateHandler<T> = (update: T) => void;

/**
 * Exponential backoff settings for reconnects.
 */
export interface ReconnectPolicy {
  /** Delay before the first reconnect in ms (default: 1000) */
  baseDelayMs: number;
  /** Upper bound for any single delay in ms (default: 30000) */
  maxDelayMs: number;
  /** Random spread as a ratio of the delay, 0 to 1 (default: 0) */
  jitter: number;
}

/**
 * Non-fatal protocol oddities reported through the `anomaly` event.
 */
export type Anomaly =
  | { kind: 'DecodeError'; message: string; raw: string }
  | { kind: 'UnmatchedFrame'; frame: Frame; reason: string };

// ==================== Orders ====================

export type OrderSide = 'Buy' | 'Sell';

export type OrderType = 'Market' | 'Limit' | 'StopMarket' | 'StopLimit' | 'TrailingStopMarket' | 'TrailingStopLimit';

export type TimeInForce = 'GTC' | 'IOC' | 'FOK';

/**
 * New order parameters for `sendOrder`.
 */
export interface OrderRequest {
  instrumentId: number;
  side: OrderSide;
  orderType: OrderType;
  quantity: number;
  timeInForce: TimeInForce;
  /** Required for limit orders; sent as 0 otherwise */
  limitPrice?: number;
  /** Trigger price for stop orders */
  stopPrice?: number;
  useDisplayQuantity?: boolean;
  clientOrderId?: number;
}
