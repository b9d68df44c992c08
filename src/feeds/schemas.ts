import { z } from 'zod';

// ==================== Authentication ====================

/**
 * Reply to `AuthenticateUser`. `Requires2FA: true` is the second-factor challenge.
 */
export const authenticateUserReplySchema = z
  .object({
    Authenticated: z.boolean(),
    Requires2FA: z.boolean().optional(),
    AuthType: z.string().nullish(),
    AddtlInfo: z.string().nullish(),
    SessionToken: z.string().nullish(),
    UserId: z.number().int().nullish(),
    User: z.object({ UserId: z.number().int() }).passthrough().nullish(),
    errormsg: z.string().nullish(),
  })
  .passthrough();

export type AuthenticateUserReply = z.infer<typeof authenticateUserReplySchema>;

/**
 * Reply to `Authenticate2FA`.
 */
export const authenticate2FAReplySchema = z
  .object({
    Authenticated: z.boolean(),
    SessionToken: z.string().nullish(),
    UserId: z.number().int().nullish(),
    errormsg: z.string().nullish(),
  })
  .passthrough();

export type Authenticate2FAReply = z.infer<typeof authenticate2FAReplySchema>;

// ==================== Generic ====================

/**
 * Generic acknowledgement used by cancel, logout and subscription endpoints.
 */
export const genericResponseSchema = z
  .object({
    result: z.boolean(),
    errormsg: z.string().nullish(),
    errorcode: z.number().int().nullish(),
    detail: z.string().nullish(),
  })
  .passthrough();

export type GenericResponse = z.infer<typeof genericResponseSchema>;

// ==================== Market Data ====================

/**
 * Top-of-book snapshot for one instrument (`Level1UpdateEvent`, `GetLevel1`).
 */
export const level1Schema = z
  .object({
    OMSId: z.number().int().optional(),
    InstrumentId: z.number().int(),
    BestBid: z.number(),
    BestOffer: z.number(),
    LastTradedPx: z.number().optional(),
    LastTradedQty: z.number().optional(),
    LastTradeTime: z.number().optional(),
    SessionOpen: z.number().optional(),
    SessionHigh: z.number().optional(),
    SessionLow: z.number().optional(),
    SessionClose: z.number().optional(),
    Volume: z.number().optional(),
    CurrentDayVolume: z.number().optional(),
    CurrentDayNumTrades: z.number().optional(),
    CurrentDayPxChange: z.number().optional(),
    Rolling24HrVolume: z.number().optional(),
    Rolling24NumTrades: z.number().optional(),
    Rolling24HrPxChange: z.number().optional(),
    TimeStamp: z.union([z.number(), z.string()]).optional(),
  })
  .passthrough();

export type Level1Update = z.infer<typeof level1Schema>;

/**
 * One order book row. The gateway sends rows as positional arrays:
 * `[MDUpdateId, Accounts, ActionDateTime, ActionType, LastTradePrice, Orders, Price, InstrumentId, Quantity, Side]`.
 */
export const level2EntrySchema = z
  .tuple([
    z.number(),
    z.number(),
    z.number(),
    z.number(),
    z.number(),
    z.number(),
    z.number(),
    z.number().int(),
    z.number(),
    z.number(),
  ])
  .rest(z.unknown())
  .transform(row => ({
    mdUpdateId: row[0],
    accounts: row[1],
    actionDateTime: row[2],
    /** 0 new, 1 update, 2 delete */
    actionType: row[3],
    lastTradePrice: row[4],
    orders: row[5],
    price: row[6],
    instrumentId: row[7],
    quantity: row[8],
    /** 0 buy, 1 sell */
    side: row[9],
  }));

export type Level2Entry = z.output<typeof level2EntrySchema>;

export const level2BatchSchema = z.array(level2EntrySchema);

/**
 * One OHLC bar:
 * `[EndDateTime, High, Low, Open, Close, Volume, InsideBidPrice, InsideAskPrice, InstrumentId, BeginDateTime?]`.
 */
export const tickerBarSchema = z
  .tuple([
    z.number(),
    z.number(),
    z.number(),
    z.number(),
    z.number(),
    z.number(),
    z.number(),
    z.number(),
    z.number().int(),
  ])
  .rest(z.unknown())
  .transform(row => ({
    endDateTime: row[0],
    high: row[1],
    low: row[2],
    open: row[3],
    close: row[4],
    volume: row[5],
    insideBidPrice: row[6],
    insideAskPrice: row[7],
    instrumentId: row[8],
    beginDateTime: typeof row[9] === 'number' ? row[9] : null,
  }));

export type TickerBar = z.output<typeof tickerBarSchema>;

export const tickerBatchSchema = z.array(tickerBarSchema);

/**
 * One public trade:
 * `[TradeId, InstrumentId, Quantity, Price, Order1, Order2, TradeTime, Direction, TakerSide, BlockTrade, ...]`.
 */
export const tradeSchema = z
  .tuple([
    z.number().int(),
    z.number().int(),
    z.number(),
    z.number(),
    z.number(),
    z.number(),
    z.number(),
    z.number(),
    z.number(),
    z.union([z.boolean(), z.number()]),
  ])
  .rest(z.unknown())
  .transform(row => ({
    tradeId: row[0],
    instrumentId: row[1],
    quantity: row[2],
    price: row[3],
    order1: row[4],
    order2: row[5],
    tradeTime: row[6],
    /** 0 no change, 1 uptick, 2 downtick */
    direction: row[7],
    /** 0 buy, 1 sell */
    takerSide: row[8],
    blockTrade: row[9] === true || row[9] === 1,
  }));

export type Trade = z.output<typeof tradeSchema>;

export const tradeBatchSchema = z.array(tradeSchema);

// ==================== Reference Data ====================

export const productSchema = z
  .object({
    OMSId: z.number().int().optional(),
    ProductId: z.number().int(),
    Product: z.string(),
    ProductFullName: z.string().optional(),
    ProductType: z.string().optional(),
    DecimalPlaces: z.number().int().optional(),
    IsDisabled: z.boolean().optional(),
  })
  .passthrough();

export type Product = z.infer<typeof productSchema>;

export const instrumentSchema = z
  .object({
    OMSId: z.number().int().optional(),
    InstrumentId: z.number().int(),
    Symbol: z.string(),
    Product1: z.number().int().optional(),
    Product1Symbol: z.string().optional(),
    Product2: z.number().int().optional(),
    Product2Symbol: z.string().optional(),
    QuantityIncrement: z.number().optional(),
    PriceIncrement: z.number().optional(),
    MinimumQuantity: z.number().optional(),
    IsDisable: z.boolean().optional(),
  })
  .passthrough();

export type Instrument = z.infer<typeof instrumentSchema>;

// ==================== Account ====================

export const accountPositionSchema = z
  .object({
    OMSId: z.number().int().optional(),
    AccountId: z.number().int(),
    ProductSymbol: z.string(),
    ProductId: z.number().int(),
    Amount: z.number(),
    Hold: z.number(),
    PendingDeposits: z.number().optional(),
    PendingWithdraws: z.number().optional(),
    TotalDayDeposits: z.number().optional(),
    TotalDayWithdrawals: z.number().optional(),
  })
  .passthrough();

export type AccountPosition = z.infer<typeof accountPositionSchema>;

export const accountInfoSchema = z
  .object({
    OMSID: z.number().int().optional(),
    AccountId: z.number().int(),
    AccountName: z.string().optional(),
    AccountHandle: z.string().nullish(),
    AccountType: z.string().optional(),
    FeeGroupID: z.number().int().optional(),
    VerificationLevel: z.number().int().optional(),
  })
  .passthrough();

export type AccountInfo = z.infer<typeof accountInfoSchema>;

/**
 * Order record as returned by `GetOpenOrders` and carried by `OrderStateEvent`.
 */
export const orderSchema = z
  .object({
    OrderId: z.number().int(),
    Account: z.number().int(),
    Instrument: z.number().int(),
    Side: z.string(),
    OrderType: z.string(),
    OrderState: z.string(),
    Quantity: z.number(),
    Price: z.number(),
    QuantityExecuted: z.number().optional(),
    ReceiveTime: z.number().optional(),
    ClientOrderId: z.number().optional(),
  })
  .passthrough();

export type Order = z.infer<typeof orderSchema>;

/**
 * Execution report as returned by `GetOpenTradeReports` and carried by `OrderTradeEvent`.
 */
export const tradeReportSchema = z
  .object({
    OrderId: z.number().int(),
    AccountId: z.number().int().optional(),
    Instrument: z.number().int().optional(),
    InstrumentId: z.number().int().optional(),
    Side: z.string().optional(),
    Quantity: z.number(),
    Price: z.number(),
    TradeId: z.number().int().optional(),
    TradeTime: z.number().optional(),
  })
  .passthrough();

export type TradeReport = z.infer<typeof tradeReportSchema>;

/**
 * Reply to `SendOrder`.
 */
export const sendOrderReplySchema = z
  .object({
    status: z.string(),
    errormsg: z.string().nullish(),
    OrderId: z.number().int().optional(),
  })
  .passthrough();

export type SendOrderReply = z.infer<typeof sendOrderReplySchema>;

/**
 * Body of any account event; the account is named by `AccountId` or `Account`.
 */
export const accountEventPayloadSchema = z
  .object({
    AccountId: z.number().int().optional(),
    Account: z.number().int().optional(),
  })
  .passthrough();
