import { ConnectError, RequestRejectedError } from '../../errors';
import { Level1Update } from '../../feeds';
import { Anomaly, Frame, MessageType } from '../../types';
import { SubmitOptions } from './RequestCorrelator';
import { SubscriptionRegistry } from './SubscriptionRegistry';

interface SentRequest {
  endpoint: string;
  payload: unknown;
  type: SubmitOptions['type'];
  resolve: (reply: unknown) => void;
  reject: (error: Error) => void;
}

function level1Event(instrumentId: number, bestBid: number): Frame {
  return {
    type: MessageType.Event,
    sequence: 0,
    endpoint: 'Level1UpdateEvent',
    payload: { InstrumentId: instrumentId, BestBid: bestBid, BestOffer: bestBid + 1 },
  };
}

describe('SubscriptionRegistry', () => {
  let live: boolean;
  let sent: SentRequest[];
  let anomalies: Anomaly[];
  let errors: Error[];
  let registry: SubscriptionRegistry;

  beforeEach(() => {
    live = false;
    sent = [];
    anomalies = [];
    errors = [];
    registry = new SubscriptionRegistry({
      submit: (endpoint, payload, options) =>
        new Promise((resolve, reject) => {
          sent.push({ endpoint, payload, type: options.type, resolve, reject });
        }),
      isLive: () => live,
      onAnomaly: anomaly => anomalies.push(anomaly),
      onError: error => errors.push(error),
    });
  });

  /** Acknowledges every outstanding request and lets the registry observe it. */
  async function acknowledgeAll(): Promise<void> {
    for (const request of sent) request.resolve({});
    await Promise.resolve();
    await Promise.resolve();
  }

  describe('subscribe', () => {
    it('should queue without sending while not live', async () => {
      const handle = await registry.subscribe('level1', 7, { OMSId: 1, InstrumentId: 7 }, () => undefined);

      expect(handle).toEqual({ id: 'SubscribeLevel1:7', feed: 'level1', endpoint: 'SubscribeLevel1', instrumentId: 7 });
      expect(sent).toHaveLength(0);
      expect(registry.list()).toEqual([{ ...handle, status: 'pending' }]);
    });

    it('should send a Subscribe frame when live and resolve on acknowledgement', async () => {
      live = true;
      const subscribed = registry.subscribe('level1', 7, { OMSId: 1, InstrumentId: 7 }, () => undefined);

      expect(sent.map(({ endpoint, payload, type }) => ({ endpoint, payload, type }))).toEqual([
        { endpoint: 'SubscribeLevel1', payload: { OMSId: 1, InstrumentId: 7 }, type: MessageType.Subscribe },
      ]);
      expect(registry.list()[0].status).toBe('requested');

      sent[0].resolve({ InstrumentId: 7, BestBid: 1, BestOffer: 2 });
      await subscribed;

      expect(registry.list()[0].status).toBe('active');
    });

    it('should remove the entry when the gateway rejects it', async () => {
      live = true;
      const subscribed = registry.subscribe('trades', 7, {}, () => undefined);

      sent[0].reject(new RequestRejectedError('SubscribeTrades', 'Instrument not found'));

      await expect(subscribed).rejects.toBeInstanceOf(RequestRejectedError);
      expect(registry.size).toBe(0);
    });

    it('should keep the entry pending when the connection drops before the acknowledgement', async () => {
      live = true;
      const subscribed = registry.subscribe('trades', 7, {}, () => undefined);

      sent[0].reject(new ConnectError('Connection lost'));

      await expect(subscribed).resolves.toMatchObject({ id: 'SubscribeTrades:7' });
      expect(registry.list()[0].status).toBe('pending');
    });

    it('should replace the handler without a second request for the same key', async () => {
      const first: number[] = [];
      const second: number[] = [];
      live = true;

      const subscribed = registry.subscribe('level1', 7, {}, update => first.push(update.BestBid));
      await acknowledgeAll();
      await subscribed;
      await registry.subscribe('level1', 7, {}, update => second.push(update.BestBid));
      registry.route(level1Event(7, 100));

      expect(sent).toHaveLength(1);
      expect(first).toEqual([]);
      expect(second).toEqual([100]);
    });
  });

  describe('flush', () => {
    it('should send each pending entry once, in registration order', async () => {
      await registry.subscribe('level1', 7, { InstrumentId: 7 }, () => undefined);
      await registry.subscribe('trades', 8, { InstrumentId: 8 }, () => undefined);
      await registry.subscribe('level2', 7, { InstrumentId: 7 }, () => undefined);

      live = true;
      const flushed = registry.flush();
      expect(sent.map(request => request.endpoint)).toEqual(['SubscribeLevel1', 'SubscribeTrades', 'SubscribeLevel2']);

      await acknowledgeAll();
      expect(await flushed).toBe(3);
      expect(registry.list().map(info => info.status)).toEqual(['active', 'active', 'active']);

      expect(await registry.flush()).toBe(0);
      expect(sent).toHaveLength(3);
    });

    it('should replay every entry after markAllPending', async () => {
      await registry.subscribe('level1', 7, {}, () => undefined);
      live = true;
      const first = registry.flush();
      await acknowledgeAll();
      await first;

      registry.markAllPending();
      sent = [];
      const second = registry.flush();
      await acknowledgeAll();

      expect(await second).toBe(1);
      expect(sent.map(request => request.endpoint)).toEqual(['SubscribeLevel1']);
    });

    it('should report failures and leave those entries pending', async () => {
      await registry.subscribe('level1', 7, {}, () => undefined);
      await registry.subscribe('level1', 8, {}, () => undefined);
      live = true;

      const flushed = registry.flush();
      sent[0].reject(new RequestRejectedError('SubscribeLevel1', 'Instrument not found'));
      sent[1].resolve({});

      expect(await flushed).toBe(1);
      expect(errors.map(error => error.message)).toEqual([
        'Resubscribe of SubscribeLevel1:7 failed: SubscribeLevel1 rejected: Instrument not found',
      ]);
      expect(registry.list().map(info => info.status)).toEqual(['pending', 'active']);
    });
  });

  describe('unsubscribe', () => {
    it('should send the unsubscribe request for an active subscription', async () => {
      live = true;
      const subscribed = registry.subscribe('level1', 7, { OMSId: 1, InstrumentId: 7 }, () => undefined);
      await acknowledgeAll();
      const handle = await subscribed;

      const removed = registry.unsubscribe(handle);
      expect(sent[1]).toMatchObject({
        endpoint: 'UnsubscribeLevel1',
        payload: { OMSId: 1, InstrumentId: 7 },
        type: MessageType.Unsubscribe,
      });
      sent[1].resolve({ result: true });

      expect(await removed).toBe(true);
      expect(registry.size).toBe(0);
    });

    it('should cancel a subscription on the gateway once its acknowledgement arrives', async () => {
      live = true;
      const subscribed = registry.subscribe('level1', 7, { OMSId: 1, InstrumentId: 7 }, () => undefined);
      const [handle] = registry.list();

      const removed = registry.unsubscribe(handle);
      expect(registry.size).toBe(0);
      expect(sent).toHaveLength(1);

      sent[0].resolve({ result: true });
      await subscribed;
      await new Promise(resolve => setImmediate(resolve));

      expect(sent).toHaveLength(2);
      expect(sent[1]).toMatchObject({
        endpoint: 'UnsubscribeLevel1',
        payload: { OMSId: 1, InstrumentId: 7 },
        type: MessageType.Unsubscribe,
      });
      sent[1].resolve({ result: true });
      expect(await removed).toBe(true);
    });

    it('should send nothing when an unacknowledged subscription is then refused', async () => {
      live = true;
      const subscribed = registry.subscribe('level1', 7, {}, () => undefined);
      const [handle] = registry.list();

      const removed = registry.unsubscribe(handle);
      sent[0].reject(new RequestRejectedError('SubscribeLevel1', 'Unknown instrument'));

      await expect(subscribed).rejects.toThrow(RequestRejectedError);
      expect(await removed).toBe(true);
      expect(sent).toHaveLength(1);
      expect(errors).toEqual([]);
    });

    it('should only drop a pending subscription locally', async () => {
      const handle = await registry.subscribe('level1', 7, {}, () => undefined);

      expect(await registry.unsubscribe(handle)).toBe(true);
      expect(sent).toHaveLength(0);
    });

    it('should not send anything for a feed the gateway cannot cancel', async () => {
      live = true;
      const subscribed = registry.subscribe('accountEvents', 42, { AccountId: 42 }, () => undefined);
      await acknowledgeAll();

      expect(await registry.unsubscribe(await subscribed)).toBe(true);
      expect(sent).toHaveLength(1);
    });

    it('should report a failed unsubscribe request without throwing', async () => {
      live = true;
      const subscribed = registry.subscribe('level1', 7, {}, () => undefined);
      await acknowledgeAll();
      const removed = registry.unsubscribe(await subscribed);

      sent[1].reject(new ConnectError('Connection lost'));

      expect(await removed).toBe(true);
      expect(errors).toHaveLength(1);
      expect(errors[0]).toBeInstanceOf(ConnectError);
    });

    it('should return false for an unknown handle', async () => {
      const handle = { id: 'SubscribeLevel1:99', feed: 'level1' as const, endpoint: 'SubscribeLevel1', instrumentId: 99 };

      expect(await registry.unsubscribe(handle)).toBe(false);
    });
  });

  describe('route', () => {
    it('should deliver updates for one instrument in arrival order', async () => {
      const received: Level1Update[] = [];
      await registry.subscribe('level1', 7, {}, update => received.push(update));

      registry.route(level1Event(7, 10));
      registry.route(level1Event(7, 11));
      registry.route(level1Event(7, 12));

      expect(received.map(update => update.BestBid)).toEqual([10, 11, 12]);
      expect(anomalies).toEqual([]);
    });

    it('should deliver account events keyed by account id', async () => {
      const events: string[] = [];
      await registry.subscribe('accountEvents', 42, {}, update => events.push(update.event));

      registry.route({ type: MessageType.Event, sequence: 0, endpoint: 'OrderTradeEvent', payload: { AccountId: 42 } });

      expect(events).toEqual(['OrderTradeEvent']);
    });

    it('should report an unknown event as an anomaly', () => {
      const frame: Frame = { type: MessageType.Event, sequence: 0, endpoint: 'MysteryEvent', payload: {} };

      registry.route(frame);

      expect(anomalies).toEqual([{ kind: 'UnmatchedFrame', frame, reason: 'Unknown event MysteryEvent' }]);
    });

    it('should report an event for an instrument nobody subscribed to', async () => {
      await registry.subscribe('level1', 7, {}, () => undefined);
      const frame = level1Event(8, 10);

      registry.route(frame);

      expect(anomalies).toEqual([{ kind: 'UnmatchedFrame', frame, reason: 'No level1 subscription for 8' }]);
    });

    it('should report an event without a routing key', () => {
      const frame: Frame = { type: MessageType.Event, sequence: 0, endpoint: 'Level2UpdateEvent', payload: [] };

      registry.route(frame);

      expect(anomalies).toEqual([{ kind: 'UnmatchedFrame', frame, reason: 'Level2UpdateEvent carries no routing key' }]);
    });

    it('should drop and report a payload that fails validation', async () => {
      const handler = jest.fn();
      await registry.subscribe('level1', 7, {}, handler);

      registry.route({
        type: MessageType.Event,
        sequence: 0,
        endpoint: 'Level1UpdateEvent',
        payload: { InstrumentId: 7, BestBid: 'high', BestOffer: 1 },
      });

      expect(handler).not.toHaveBeenCalled();
      expect(anomalies).toHaveLength(1);
      expect(anomalies[0].kind).toBe('UnmatchedFrame');
    });

    it('should report a throwing handler and keep routing', async () => {
      const received: number[] = [];
      await registry.subscribe('level1', 7, {}, update => {
        if (update.BestBid === 10) throw new Error('boom');
        received.push(update.BestBid);
      });

      registry.route(level1Event(7, 10));
      registry.route(level1Event(7, 11));

      expect(errors.map(error => error.message)).toEqual(['Handler for SubscribeLevel1:7 threw: boom']);
      expect(received).toEqual([11]);
    });
  });

  it('should forget everything on clear', async () => {
    await registry.subscribe('level1', 7, {}, () => undefined);

    registry.clear();

    expect(registry.list()).toEqual([]);
  });
});
