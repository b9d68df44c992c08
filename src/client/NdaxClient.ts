import { z } from 'zod';
import { decodeFrame } from '../codec';
import {
  AuthFailedError,
  ConnectError,
  DecodeError,
  RequestRejectedError,
  ShuttingDownError,
  toError,
} from '../errors';
import {
  AccountEvent,
  AccountInfo,
  accountInfoSchema,
  AccountPosition,
  accountPositionSchema,
  GenericResponse,
  genericResponseSchema,
  Instrument,
  instrumentSchema,
  Level1Update,
  level1Schema,
  Level2Entry,
  level2BatchSchema,
  Order,
  orderSchema,
  Product,
  productSchema,
  SendOrderReply,
  sendOrderReplySchema,
  TickerBar,
  tickerBatchSchema,
  Trade,
  TradeReport,
  tradeReportSchema,
} from '../feeds';
import {
  AuthState,
  Credentials,
  Frame,
  MessageType,
  OrderRequest,
  OrderSide,
  OrderType,
  SubscriptionHandle,
  SubscriptionInfo,
  TimeInForce,
  UpdateHandler,
} from '../types';
import { BaseSessionClient, BaseSessionClientOptions } from './BaseSessionClient';
import { Authenticator } from './session/Authenticator';
import { RequestCorrelator } from './session/RequestCorrelator';
import { SubscriptionRegistry } from './session/SubscriptionRegistry';
import { Transport, TransportFactory, webSocketTransport } from './transport/Connection';

export const DEFAULT_GATEWAY_URL = 'wss://api.ndax.io/WSGateway/';

const ORDER_SIDE: Record<OrderSide, number> = { Buy: 0, Sell: 1 };

const ORDER_TYPE: Record<OrderType, number> = {
  Market: 1,
  Limit: 2,
  StopMarket: 3,
  StopLimit: 4,
  TrailingStopMarket: 5,
  TrailingStopLimit: 6,
};

const TIME_IN_FORCE: Record<TimeInForce, number> = { GTC: 1, IOC: 3, FOK: 4 };

/**
 * How a connection ended.
 */
interface ConnectionEnd {
  reason: string;
  error: Error | null;
}

/**
 * NDAX client configuration options
 */
export interface NdaxClientOptions extends BaseSessionClientOptions {
  /** Login material; never logged */
  credentials: Credentials;
  /** Gateway URL (default: wss://api.ndax.io/WSGateway/) */
  url?: string;
  /** Order management system id (default: 1) */
  omsId?: number;
  /** Default request timeout in ms (default: 10000) */
  requestTimeoutMs?: number;
  /** Interval between keep-alive pings in ms (default: 15000) */
  pingIntervalMs?: number;
  /** Grace window for a pong in ms (default: 10000) */
  pongTimeoutMs?: number;
  /** Maximum time to wait for the socket to open in ms (default: 15000) */
  openTimeoutMs?: number;
  /** Opens transports (default: WebSocket with the keep-alive settings above) */
  transportFactory?: TransportFactory;
  /** Clock for one-time codes and request timestamps (default: Date.now) */
  now?: () => number;
}

/**
 * NdaxClient keeps one authenticated session with the NDAX gateway.
 *
 * @remarks
 * A single lifecycle loop connects, logs in (password, then a time-based code),
 * replays every registered subscription and then reads frames until the
 * connection drops, after which it backs off exponentially and starts over.
 * Replies are matched to requests by sequence number; events are routed to
 * subscription handlers in arrival order.
 *
 * Subscriptions made before `start()` or while reconnecting are queued and sent
 * once the session is authenticated. A rejected login stops the loop.
 *
 * @example
 * ```typescript
 * const client = new NdaxClient({ credentials: loadCredentials(process.env) });
 *
 * client.on('error', (error) => console.error(error));
 * await client.subscribeLevel1(1, (update) => {
 *   console.log(`${update.InstrumentId}: ${update.BestBid} / ${update.BestOffer}`);
 * });
 *
 * await client.start();
 * const positions = await client.getAccountPositions();
 * await client.stop();
 * ```
 */
export class NdaxClient extends BaseSessionClient {
  protected readonly clientName = 'Ndax';

  /** Gateway URL */
  readonly url: string;

  private readonly credentials: Credentials;
  private readonly omsId: number;
  private readonly transportFactory: TransportFactory;
  private readonly correlator: RequestCorrelator;
  private readonly authenticator: Authenticator;
  private readonly registry: SubscriptionRegistry;

  /** Current transport, while one is open */
  private transport: Transport | null = null;

  /** Lifecycle loop, while it runs */
  private lifecycle: Promise<void> | null = null;
  private running: boolean = false;
  private stopped: boolean = false;

  /** Reconnection attempt counter, reset by a successful login */
  private reconnectAttempts: number = 0;

  private startPromise: Promise<void> | null = null;
  private startWaiter: { resolve: () => void; reject: (error: Error) => void } | null = null;

  /**
   * Creates a new NdaxClient instance.
   *
   * @param options - Client configuration options
   * @param options.credentials - Account id, username, password and two-factor secret (required)
   * @param options.verbose - Whether to log verbose debug information (default: false)
   */
  constructor(options: NdaxClientOptions) {
    super(options);
    this.url = options.url ?? DEFAULT_GATEWAY_URL;
    this.credentials = options.credentials;
    this.omsId = options.omsId ?? 1;
    this.transportFactory =
      options.transportFactory ??
      webSocketTransport({
        pingIntervalMs: options.pingIntervalMs,
        pongTimeoutMs: options.pongTimeoutMs,
        openTimeoutMs: options.openTimeoutMs,
      });

    const log = (message: string) => this.log(message);
    this.correlator = new RequestCorrelator({ defaultTimeoutMs: options.requestTimeoutMs, now: options.now });
    this.authenticator = new Authenticator({ credentials: options.credentials, now: options.now, log });
    this.registry = new SubscriptionRegistry({
      submit: (endpoint, payload, submitOptions) => this.correlator.submit(endpoint, payload, submitOptions),
      isLive: () => this.isAuthenticated(),
      onAnomaly: anomaly => this.emit('anomaly', anomaly),
      onError: error => this.emit('error', error),
      log,
    });
  }

  // ==================== Lifecycle ====================

  /**
   * Connects, authenticates and replays subscriptions.
   *
   * @returns Promise that resolves once the session is authenticated
   * @throws {AuthFailedError} If the gateway rejects the login; the client is left `Disconnected`
   * @throws {ShuttingDownError} If the client is stopped first, or was stopped before
   */
  start(): Promise<void> {
    if (this.sessionState === 'Closed') {
      return Promise.reject(new ShuttingDownError('Client has been stopped'));
    }
    if (this.isAuthenticated()) {
      return Promise.resolve();
    }

    if (!this.startPromise) {
      this.startPromise = new Promise<void>((resolve, reject) => {
        this.startWaiter = { resolve, reject };
      });
    }
    if (!this.running) {
      this.stopped = false;
      this.lifecycle = this.run();
    }
    return this.startPromise;
  }

  /**
   * Shuts the client down for good.
   *
   * @remarks
   * Every outstanding request is rejected with {@link ShuttingDownError} at once,
   * subscriptions are dropped, and the promise resolves after the lifecycle loop
   * has finished. The client ends `Closed`.
   */
  async stop(): Promise<void> {
    if (this.sessionState === 'Closed') return;
    this.log('Stopping');
    this.stopped = true;
    this.interruptSleep();

    const shuttingDown = new ShuttingDownError();
    const failed = this.correlator.failAll(shuttingDown);
    if (failed > 0) {
      this.log(`Cancelled ${failed} pending request(s)`);
    }
    this.registry.clear();
    this.settleStart(shuttingDown);
    this.transport?.close();

    await this.lifecycle;
    this.lifecycle = null;
    this.correlator.detach();
    this.authenticator.reset();
    this.setState('Closed');
  }

  // ==================== Accessors ====================

  get authState(): AuthState {
    return this.authenticator.state;
  }

  get sessionToken(): string | null {
    return this.authenticator.currentSession?.sessionToken ?? null;
  }

  get userId(): number | null {
    return this.authenticator.currentSession?.userId ?? null;
  }

  get pendingRequestCount(): number {
    return this.correlator.pendingCount;
  }

  isAuthenticated(): boolean {
    return this.sessionState === 'Authenticated';
  }

  /**
   * Registered subscriptions, in registration order.
   */
  subscriptions(): SubscriptionInfo[] {
    return this.registry.list();
  }

  // ==================== Requests ====================

  /**
   * Sends any request on the authenticated session and resolves with the raw reply payload.
   *
   * @param timeoutMs - Overrides the default request timeout
   * @throws {ConnectError} If the session is not authenticated or the connection drops
   * @throws {TimeoutError} If no reply arrives in time
   * @throws {RequestRejectedError} On an error frame or a `{ result: false }` reply
   */
  async request(endpoint: string, payload: unknown, timeoutMs?: number): Promise<unknown> {
    if (!this.isAuthenticated()) {
      throw new ConnectError(`Cannot send ${endpoint}: session is ${this.sessionState}`);
    }
    return this.correlator.submit(endpoint, payload, { timeoutMs });
  }

  async getAccountPositions(): Promise<AccountPosition[]> {
    return this.call('GetAccountPositions', this.accountPayload(), z.array(accountPositionSchema));
  }

  async getAccountInfo(): Promise<AccountInfo> {
    return this.call('GetAccountInfo', this.accountPayload(), accountInfoSchema);
  }

  async getOpenOrders(): Promise<Order[]> {
    return this.call('GetOpenOrders', this.accountPayload(), z.array(orderSchema));
  }

  async getOpenTradeReports(): Promise<TradeReport[]> {
    return this.call('GetOpenTradeReports', this.accountPayload(), z.array(tradeReportSchema));
  }

  async getProducts(): Promise<Product[]> {
    return this.call('GetProducts', { OMSId: this.omsId }, z.array(productSchema));
  }

  async getInstruments(): Promise<Instrument[]> {
    return this.call('GetInstruments', { OMSId: this.omsId }, z.array(instrumentSchema));
  }

  async getLevel1(instrumentId: number): Promise<Level1Update> {
    return this.call('GetLevel1', { OMSId: this.omsId, InstrumentId: instrumentId }, level1Schema);
  }

  /**
   * Fetches the order book for one instrument.
   *
   * @param depth - Number of price levels per side (default: 10)
   */
  async getL2Snapshot(instrumentId: number, depth: number = 10): Promise<Level2Entry[]> {
    return this.call(
      'GetL2Snapshot',
      { OMSId: this.omsId, InstrumentId: instrumentId, Depth: depth },
      level2BatchSchema
    );
  }

  /**
   * Fetches OHLC bars for one instrument.
   *
   * @param interval - Bar length in seconds (default: 60)
   * @param range - Optional start and end of the window; the gateway picks the window when omitted
   */
  async getTickerHistory(
    instrumentId: number,
    interval: number = 60,
    range: { from?: Date; to?: Date } = {}
  ): Promise<TickerBar[]> {
    const payload: Record<string, unknown> = {
      ...this.accountPayload(),
      InstrumentId: instrumentId,
      Interval: interval,
    };
    if (range.from) payload.FromDate = range.from.toISOString();
    if (range.to) payload.ToDate = range.to.toISOString();
    return this.call('GetTickerHistory', payload, tickerBatchSchema);
  }

  /**
   * Places an order for the configured account.
   *
   * @throws {RequestRejectedError} If the gateway does not accept the order
   */
  async sendOrder(order: OrderRequest): Promise<SendOrderReply> {
    const payload: Record<string, unknown> = {
      ...this.accountPayload(),
      InstrumentId: order.instrumentId,
      TimeInForce: TIME_IN_FORCE[order.timeInForce],
      Side: ORDER_SIDE[order.side],
      OrderType: ORDER_TYPE[order.orderType],
      UseDisplayQuantity: order.useDisplayQuantity ?? false,
      Quantity: order.quantity,
      LimitPrice: order.limitPrice ?? 0,
    };
    if (order.stopPrice !== undefined) payload.StopPrice = order.stopPrice;
    if (order.clientOrderId !== undefined) payload.ClientOrderId = order.clientOrderId;

    const reply = await this.call('SendOrder', payload, sendOrderReplySchema);
    if (reply.status !== 'Accepted') {
      throw new RequestRejectedError('SendOrder', reply.errormsg || `Order ${reply.status}`);
    }
    return reply;
  }

  async cancelOrder(orderId: number): Promise<GenericResponse> {
    return this.call('CancelOrder', { ...this.accountPayload(), OrderId: orderId }, genericResponseSchema);
  }

  async cancelAllOrders(): Promise<GenericResponse> {
    return this.call('CancelAllOrders', this.accountPayload(), genericResponseSchema);
  }

  /**
   * Ends the session on the gateway. The connection stays open; call `stop()` to close it.
   */
  async logout(): Promise<GenericResponse> {
    return this.call('LogOut', {}, genericResponseSchema);
  }

  // ==================== Subscriptions ====================

  /**
   * Streams top-of-book updates for an instrument.
   */
  subscribeLevel1(instrumentId: number, handler: UpdateHandler<Level1Update>): Promise<SubscriptionHandle> {
    return this.registry.subscribe('level1', instrumentId, { OMSId: this.omsId, InstrumentId: instrumentId }, handler);
  }

  /**
   * Streams order book changes for an instrument.
   *
   * @param depth - Number of price levels per side (default: 10)
   */
  subscribeLevel2(
    instrumentId: number,
    handler: UpdateHandler<Level2Entry[]>,
    depth: number = 10
  ): Promise<SubscriptionHandle> {
    return this.registry.subscribe(
      'level2',
      instrumentId,
      { OMSId: this.omsId, InstrumentId: instrumentId, Depth: depth },
      handler
    );
  }

  /**
   * Streams OHLC bars for an instrument.
   *
   * @param interval - Bar length in seconds (default: 60)
   * @param includeLastCount - Number of past bars in the initial snapshot (default: 100)
   */
  subscribeTicker(
    instrumentId: number,
    handler: UpdateHandler<TickerBar[]>,
    interval: number = 60,
    includeLastCount: number = 100
  ): Promise<SubscriptionHandle> {
    return this.registry.subscribe(
      'ticker',
      instrumentId,
      { OMSId: this.omsId, InstrumentId: instrumentId, Interval: interval, IncludeLastCount: includeLastCount },
      handler
    );
  }

  /**
   * Streams public trades for an instrument.
   *
   * @param includeLastCount - Number of past trades in the initial snapshot (default: 100)
   */
  subscribeTrades(
    instrumentId: number,
    handler: UpdateHandler<Trade[]>,
    includeLastCount: number = 100
  ): Promise<SubscriptionHandle> {
    return this.registry.subscribe(
      'trades',
      instrumentId,
      { OMSId: this.omsId, InstrumentId: instrumentId, IncludeLastCount: includeLastCount },
      handler
    );
  }

  /**
   * Streams balance, order and trade events for the configured account.
   */
  subscribeAccountEvents(handler: UpdateHandler<AccountEvent>): Promise<SubscriptionHandle> {
    return this.registry.subscribe('accountEvents', this.credentials.accountId, this.accountPayload(), handler);
  }

  /**
   * Cancels a subscription.
   *
   * @returns false if the handle was not registered
   */
  unsubscribe(handle: SubscriptionHandle): Promise<boolean> {
    return this.registry.unsubscribe(handle);
  }

  // ==================== Connection Loop ====================

  private async run(): Promise<void> {
    this.running = true;
    try {
      this.setState('Connecting');
      while (!this.stopped) {
        const authError = await this.runConnection();
        if (this.stopped) break;
        if (authError) {
          this.handleAuthFailure(authError);
          return;
        }

        this.reconnectAttempts++;
        const delayMs = this.getReconnectDelay(this.reconnectAttempts);
        this.setState('Reconnecting');
        this.log(`Reconnecting in ${delayMs}ms (attempt ${this.reconnectAttempts})`);
        this.emit('reconnecting', { attempt: this.reconnectAttempts, delayMs });
        await this.sleep(delayMs);
      }
    } catch (error) {
      const failure = toError(error);
      this.setState('Disconnected');
      this.emit('error', failure);
      this.settleStart(failure);
    } finally {
      this.running = false;
    }
  }

  /**
   * One connection, from opening to loss.
   *
   * @returns The login rejection that ended it, if any
   */
  private async runConnection(): Promise<AuthFailedError | null> {
    this.authenticator.markConnecting();

    let transport: Transport;
    try {
      transport = await this.transportFactory(this.url);
    } catch (error) {
      this.authenticator.reset();
      this.log(`Connection failed: ${toError(error).message}`);
      return null;
    }
    if (this.stopped) {
      transport.close();
      this.authenticator.reset();
      return null;
    }

    this.transport = transport;
    this.correlator.attach(data => transport.send(data));
    // requests in flight during login or the replay fail as soon as the stream ends
    const ended = this.dispatch(transport).then(end => {
      this.correlator.detach();
      this.correlator.failAll(new ConnectError(`Connection lost: ${end.reason}`));
      return end;
    });
    let authError: AuthFailedError | null = null;

    try {
      this.setState('Authenticating');
      await this.authenticator.authenticate((endpoint, payload) => this.correlator.submit(endpoint, payload));
      this.reconnectAttempts = 0;
      this.setState('Authenticated');
      this.emit('connected', { url: this.url });
      await this.registry.flush();
      if (transport.isOpen && this.isAuthenticated()) {
        this.settleStart(null);
      }
    } catch (error) {
      if (error instanceof AuthFailedError) {
        authError = error;
      } else {
        this.log(`Login interrupted: ${toError(error).message}`);
      }
      transport.close();
    }

    const { reason, error } = await ended;
    this.transport = null;
    this.registry.markAllPending();
    if (!authError) {
      this.authenticator.reset();
    }
    this.setState('Disconnected');
    this.log(`Disconnected (${reason})`);
    this.emit('disconnected', { reason, error });
    return authError;
  }

  /**
   * Sole consumer of a transport's inbound frames.
   */
  private async dispatch(transport: Transport): Promise<ConnectionEnd> {
    try {
      for await (const event of transport.events()) {
        if (event.type === 'timeout') {
          return { reason: 'keep-alive timeout', error: event.error };
        }
        this.handleFrame(event.data);
      }
    } catch (error) {
      return { reason: 'transport failure', error: toError(error) };
    }
    return { reason: this.stopped ? 'client stopped' : 'connection closed', error: null };
  }

  private handleFrame(data: string): void {
    let frame: Frame;
    try {
      frame = decodeFrame(data);
    } catch (error) {
      if (error instanceof DecodeError) {
        this.emit('anomaly', { kind: 'DecodeError', message: error.message, raw: error.raw });
        return;
      }
      throw error;
    }

    switch (frame.type) {
      case MessageType.Event:
        this.registry.route(frame);
        break;
      case MessageType.Request:
        this.emit('anomaly', { kind: 'UnmatchedFrame', frame, reason: 'Unexpected request from gateway' });
        break;
      default:
        if (!this.correlator.resolve(frame)) {
          this.emit('anomaly', { kind: 'UnmatchedFrame', frame, reason: `No pending request #${frame.sequence}` });
        }
    }
  }

  private handleAuthFailure(error: AuthFailedError): void {
    this.setState('Disconnected');
    this.log(error.message);
    if (this.startWaiter) {
      this.settleStart(error);
    } else {
      this.emit('error', error);
    }
  }

  private settleStart(error: Error | null): void {
    const waiter = this.startWaiter;
    this.startWaiter = null;
    this.startPromise = null;
    if (!waiter) return;
    if (error) {
      waiter.reject(error);
    } else {
      waiter.resolve();
    }
  }

  // ==================== Helpers ====================

  private accountPayload(): { OMSId: number; AccountId: number } {
    return { OMSId: this.omsId, AccountId: this.credentials.accountId };
  }

  /**
   * Sends a request and validates the reply.
   *
   * @throws {DecodeError} If the reply does not have the expected shape
   */
  private async call<T extends z.ZodTypeAny>(endpoint: string, payload: unknown, schema: T): Promise<z.output<T>> {
    const reply = await this.request(endpoint, payload);
    const result = schema.safeParse(reply);
    if (!result.success) {
      const issue = result.error.issues[0];
      const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
      throw new DecodeError(
        `Unexpected ${endpoint} reply${where}: ${issue?.message ?? 'invalid'}`,
        String(JSON.stringify(reply))
      );
    }
    return result.data;
  }
}
