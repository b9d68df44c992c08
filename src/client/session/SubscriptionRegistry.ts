import { ConnectError, toError } from '../../errors';
import { FEEDS, feedForEvent, FeedUpdateMap } from '../../feeds';
import {
  Anomaly,
  FeedName,
  Frame,
  MessageType,
  SubscriptionHandle,
  SubscriptionInfo,
  SubscriptionStatus,
  UpdateHandler,
} from '../../types';
import { SubmitOptions } from './RequestCorrelator';

/**
 * Registry configuration and reporting hooks
 */
export interface SubscriptionRegistryOptions {
  /** Sends a request on the current connection (the correlator's `submit`) */
  submit: (endpoint: string, payload: unknown, options: SubmitOptions) => Promise<unknown>;
  /** Whether the session is authenticated, so subscribe frames can go out now */
  isLive: () => boolean;
  onAnomaly: (anomaly: Anomaly) => void;
  onError: (error: Error) => void;
  log?: (message: string) => void;
}

interface Entry {
  readonly handle: SubscriptionHandle;
  /** Body of the subscribe request; the unsubscribe request reuses it */
  readonly payload: Record<string, unknown>;
  status: SubscriptionStatus;
  /** Subscribe request awaiting its acknowledgement */
  inFlight: Promise<unknown> | null;
  /** Validates an event payload and hands it to the current handler; returns the validation error, if any */
  deliver: (event: string, payload: unknown) => string | undefined;
}

/**
 * Tracks every subscription the caller wants, independent of connection state.
 *
 * @remarks
 * Entries are keyed by `(subscribe endpoint, instrument id)` and survive reconnects:
 * after each authentication {@link flush} sends one subscribe frame per entry,
 * in registration order. Subscribing again under an existing key swaps the
 * handler without a second wire request.
 *
 * Inbound events are routed synchronously, so updates of one stream reach its
 * handler in arrival order.
 */
export class SubscriptionRegistry {
  private readonly entries: Map<string, Entry> = new Map();
  private readonly submit: SubscriptionRegistryOptions['submit'];
  private readonly isLive: () => boolean;
  private readonly onAnomaly: (anomaly: Anomaly) => void;
  private readonly onError: (error: Error) => void;
  private readonly log: (message: string) => void;

  constructor(options: SubscriptionRegistryOptions) {
    this.submit = options.submit;
    this.isLive = options.isLive;
    this.onAnomaly = options.onAnomaly;
    this.onError = options.onError;
    this.log = options.log ?? (() => undefined);
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Registered subscriptions, in registration order.
   */
  list(): SubscriptionInfo[] {
    return Array.from(this.entries.values()).map(entry => ({ ...entry.handle, status: entry.status }));
  }

  /**
   * Registers a subscription, sending it now when the session is live.
   *
   * @param payload - Subscribe request body
   * @returns Handle for {@link unsubscribe}
   * @throws {RequestRejectedError} If the gateway refuses the subscription (the entry is removed)
   * @throws {TimeoutError} If the acknowledgement does not arrive in time (the entry is removed)
   */
  async subscribe<F extends FeedName>(
    feed: F,
    instrumentId: number,
    payload: Record<string, unknown>,
    handler: UpdateHandler<FeedUpdateMap[F]>
  ): Promise<SubscriptionHandle> {
    const definition = FEEDS[feed];
    const id = `${definition.subscribeEndpoint}:${instrumentId}`;
    const deliver = this.createDelivery(feed, id, handler);

    const existing = this.entries.get(id);
    if (existing) {
      existing.deliver = deliver;
      this.log(`Replaced handler for ${id}`);
      return existing.handle;
    }

    const entry: Entry = {
      handle: { id, feed, endpoint: definition.subscribeEndpoint, instrumentId },
      payload,
      status: 'pending',
      inFlight: null,
      deliver,
    };
    this.entries.set(id, entry);

    if (!this.isLive()) {
      this.log(`Queued ${id} until authenticated`);
      return entry.handle;
    }

    try {
      await this.send(entry);
    } catch (error) {
      // a dropped connection leaves the entry pending for the next flush
      if (error instanceof ConnectError) {
        this.log(`Connection lost while subscribing ${id}; will resubscribe`);
        return entry.handle;
      }
      if (this.entries.get(id) === entry) {
        this.entries.delete(id);
      }
      throw error;
    }
    return entry.handle;
  }

  /**
   * Removes a subscription. When it was acknowledged and the feed can be cancelled,
   * the gateway is told; a failure there is reported, not thrown. A subscription
   * still awaiting its acknowledgement is cancelled once the gateway confirms it.
   *
   * @returns false if the handle was not registered
   */
  async unsubscribe(handle: SubscriptionHandle): Promise<boolean> {
    const entry = this.entries.get(handle.id);
    if (!entry) return false;
    this.entries.delete(handle.id);

    const endpoint = FEEDS[entry.handle.feed].unsubscribeEndpoint;
    if (entry.status === 'requested' && entry.inFlight !== null && endpoint !== null) {
      // a refused subscribe rejects its own caller and leaves nothing to cancel
      await entry.inFlight.then(
        () => undefined,
        () => undefined
      );
    }
    if (entry.status !== 'active' || endpoint === null || !this.isLive()) {
      return true;
    }

    try {
      await this.submit(endpoint, entry.payload, { type: MessageType.Unsubscribe });
    } catch (error) {
      this.onError(toError(error));
    }
    return true;
  }

  /**
   * Sends every pending entry, in registration order. Called after each authentication.
   *
   * @returns Number of subscriptions the gateway acknowledged
   */
  async flush(): Promise<number> {
    const pending = Array.from(this.entries.values()).filter(entry => entry.status === 'pending');
    if (pending.length === 0) return 0;

    this.log(`Resubscribing ${pending.length} feed(s)`);
    const results = await Promise.allSettled(pending.map(entry => this.send(entry)));

    let acknowledged = 0;
    results.forEach((result, index) => {
      if (result.status === 'fulfilled') {
        acknowledged++;
      } else {
        const error = toError(result.reason);
        this.onError(new ConnectError(`Resubscribe of ${pending[index].handle.id} failed: ${error.message}`, { cause: error }));
      }
    });
    return acknowledged;
  }

  /**
   * Marks every entry for replay; called when the connection is lost.
   */
  markAllPending(): void {
    for (const entry of this.entries.values()) {
      entry.status = 'pending';
    }
  }

  clear(): void {
    this.entries.clear();
  }

  /**
   * Delivers an Event frame to the subscription it belongs to.
   * Frames that cannot be routed or validated are reported as anomalies and dropped.
   */
  route(frame: Frame): void {
    const feed = feedForEvent(frame.endpoint);
    if (!feed) {
      this.onAnomaly({ kind: 'UnmatchedFrame', frame, reason: `Unknown event ${frame.endpoint}` });
      return;
    }

    const definition = FEEDS[feed];
    const key = definition.keyOf(frame.payload);
    if (key === undefined) {
      this.onAnomaly({ kind: 'UnmatchedFrame', frame, reason: `${frame.endpoint} carries no routing key` });
      return;
    }

    const entry = this.entries.get(`${definition.subscribeEndpoint}:${key}`);
    if (!entry) {
      this.onAnomaly({ kind: 'UnmatchedFrame', frame, reason: `No ${feed} subscription for ${key}` });
      return;
    }

    const invalid = entry.deliver(frame.endpoint, frame.payload);
    if (invalid !== undefined) {
      this.onAnomaly({ kind: 'UnmatchedFrame', frame, reason: `Invalid ${frame.endpoint} payload: ${invalid}` });
    }
  }

  // ==================== Private ====================

  private async send(entry: Entry): Promise<void> {
    entry.status = 'requested';
    // the subscribe reply carries a snapshot; updates are delivered from events only
    const request = this.submit(entry.handle.endpoint, entry.payload, { type: MessageType.Subscribe });
    entry.inFlight = request;
    try {
      await request;
    } catch (error) {
      entry.status = 'pending';
      throw error;
    } finally {
      if (entry.inFlight === request) entry.inFlight = null;
    }
    if (entry.status === 'requested') {
      entry.status = 'active';
    }
  }

  private createDelivery<F extends FeedName>(
    feed: F,
    id: string,
    handler: UpdateHandler<FeedUpdateMap[F]>
  ): Entry['deliver'] {
    const definition = FEEDS[feed];
    return (event, payload) => {
      const parsed = definition.parse(event, payload);
      if (!parsed.success) return parsed.error;
      try {
        handler(parsed.data);
      } catch (error) {
        this.onError(new Error(`Handler for ${id} threw: ${toError(error).message}`, { cause: error }));
      }
      return undefined;
    };
  }
}
