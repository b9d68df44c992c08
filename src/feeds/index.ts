import { z } from 'zod';
import { FeedName } from '../types';
import {
  accountEventPayloadSchema,
  Level1Update,
  level1Schema,
  Level2Entry,
  level2BatchSchema,
  TickerBar,
  tickerBatchSchema,
  Trade,
  tradeBatchSchema,
} from './schemas';

export * from './schemas';

// ==================== Account Events ====================

export const ACCOUNT_EVENT_NAMES = [
  'AccountPositionEvent',
  'OrderStateEvent',
  'OrderTradeEvent',
  'TransactionEvent',
  'CancelOrderRejectEvent',
  'NewOrderRejectEvent',
  'PendingDepositUpdate',
  'AccountInfoUpdateEvent',
] as const;

export type AccountEventName = (typeof ACCOUNT_EVENT_NAMES)[number];

/**
 * One account event, tagged with the event name it arrived under.
 */
export interface AccountEvent {
  event: AccountEventName;
  accountId: number;
  payload: z.infer<typeof accountEventPayloadSchema>;
}

function isAccountEventName(event: string): event is AccountEventName {
  return ACCOUNT_EVENT_NAMES.some(name => name === event);
}

// ==================== Feed Definitions ====================

/**
 * Update type delivered to handlers of each feed.
 */
export interface FeedUpdateMap {
  level1: Level1Update;
  level2: Level2Entry[];
  ticker: TickerBar[];
  trades: Trade[];
  accountEvents: AccountEvent;
}

export type FeedParseResult<T> = { success: true; data: T } | { success: false; error: string };

/**
 * How one streaming feed looks on the wire.
 */
export interface FeedDefinition<F extends FeedName = FeedName> {
  readonly feed: F;
  readonly subscribeEndpoint: string;
  /** null when the gateway offers no way to cancel the feed */
  readonly unsubscribeEndpoint: string | null;
  /** Event names the feed is delivered under */
  readonly events: readonly string[];
  /** Routing key of an event payload: instrument id, or account id for account events */
  keyOf(payload: unknown): number | undefined;
  parse(event: string, payload: unknown): FeedParseResult<FeedUpdateMap[F]>;
}

function fromZod<I, T>(result: z.SafeParseReturnType<I, T>): FeedParseResult<T> {
  if (result.success) {
    return { success: true, data: result.data };
  }
  const issue = result.error.issues[0];
  const path = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
  return { success: false, error: `${path}${issue?.message ?? 'Invalid payload'}` };
}

function numberAt(value: unknown, key: string): number | undefined {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return undefined;
  const field: unknown = Reflect.get(value, key);
  return typeof field === 'number' ? field : undefined;
}

/**
 * Key of a batch of positional rows: the instrument column of the first row.
 */
function rowKey(index: number): (payload: unknown) => number | undefined {
  return payload => {
    if (!Array.isArray(payload)) return undefined;
    const first: unknown = payload[0];
    if (!Array.isArray(first)) return undefined;
    const value: unknown = first[index];
    return typeof value === 'number' ? value : undefined;
  };
}

const level1Feed: FeedDefinition<'level1'> = {
  feed: 'level1',
  subscribeEndpoint: 'SubscribeLevel1',
  unsubscribeEndpoint: 'UnsubscribeLevel1',
  events: ['Level1UpdateEvent'],
  keyOf: payload => numberAt(payload, 'InstrumentId'),
  parse: (_event, payload) => fromZod(level1Schema.safeParse(payload)),
};

const level2Feed: FeedDefinition<'level2'> = {
  feed: 'level2',
  subscribeEndpoint: 'SubscribeLevel2',
  unsubscribeEndpoint: 'UnsubscribeLevel2',
  events: ['Level2UpdateEvent'],
  keyOf: rowKey(7),
  parse: (_event, payload) => fromZod(level2BatchSchema.safeParse(payload)),
};

const tickerFeed: FeedDefinition<'ticker'> = {
  feed: 'ticker',
  subscribeEndpoint: 'SubscribeTicker',
  unsubscribeEndpoint: 'UnsubscribeTicker',
  events: ['TickerDataUpdateEvent'],
  keyOf: rowKey(8),
  parse: (_event, payload) => fromZod(tickerBatchSchema.safeParse(payload)),
};

const tradesFeed: FeedDefinition<'trades'> = {
  feed: 'trades',
  subscribeEndpoint: 'SubscribeTrades',
  unsubscribeEndpoint: 'UnsubscribeTrades',
  events: ['TradeDataUpdateEvent'],
  keyOf: rowKey(1),
  parse: (_event, payload) => fromZod(tradeBatchSchema.safeParse(payload)),
};

const accountEventsFeed: FeedDefinition<'accountEvents'> = {
  feed: 'accountEvents',
  subscribeEndpoint: 'SubscribeAccountEvents',
  unsubscribeEndpoint: null,
  events: ACCOUNT_EVENT_NAMES,
  keyOf: payload => numberAt(payload, 'AccountId') ?? numberAt(payload, 'Account'),
  parse: (event, payload) => {
    if (!isAccountEventName(event)) {
      return { success: false, error: `Not an account event: ${event}` };
    }
    const result = fromZod(accountEventPayloadSchema.safeParse(payload));
    if (!result.success) return result;
    const accountId = result.data.AccountId ?? result.data.Account;
    if (accountId === undefined) {
      return { success: false, error: 'Account event carries no account id' };
    }
    return { success: true, data: { event, accountId, payload: result.data } };
  },
};

/**
 * Wire description of every feed, by name.
 */
export const FEEDS: { readonly [F in FeedName]: FeedDefinition<F> } = {
  level1: level1Feed,
  level2: level2Feed,
  ticker: tickerFeed,
  trades: tradesFeed,
  accountEvents: accountEventsFeed,
};

const feedsByEvent: ReadonlyMap<string, FeedName> = new Map(
  Object.values(FEEDS).flatMap(definition =>
    definition.events.map((event): [string, FeedName] => [event, definition.feed])
  )
);

/**
 * Feed an inbound event name belongs to, if any.
 */
export function feedForEvent(event: string): FeedName | undefined {
  return feedsByEvent.get(event);
}
