/**
 * Valibot schemas for BitMEX REST responses and realtime socket messages.
 *
 * Only the fields the connector reads are declared; unknown keys are
 * stripped. Fields the exchange sends as null on administrative rows are
 * nullish.
 */

import * as v from "valibot";

export const ExchangeSideSchema = v.picklist(["Buy", "Sell"]);

export type ExchangeSide = v.InferOutput<typeof ExchangeSideSchema>;

/** Body of every non-2xx response */
export const ErrorBodySchema = v.object({
  error: v.object({
    name: v.optional(v.string(), "Error"),
    message: v.string(),
  }),
});

export const InstrumentSchema = v.object({
  symbol: v.string(),
  tickSize: v.number(),
  lotSize: v.nullish(v.number()),
  takerFee: v.nullish(v.number()),
  isInverse: v.optional(v.boolean(), false),
  underlying: v.string(),
  quoteCurrency: v.string(),
  settlCurrency: v.nullish(v.string()),
  markPrice: v.nullish(v.number()),
});

export type Instrument = v.InferOutput<typeof InstrumentSchema>;

export const InstrumentListSchema = v.array(InstrumentSchema);

export const OrderBookL2RowSchema = v.object({
  symbol: v.string(),
  id: v.number(),
  side: ExchangeSideSchema,
  size: v.number(),
  price: v.number(),
});

export const OrderBookL2Schema = v.array(OrderBookL2RowSchema);

export const TradeSchema = v.object({
  timestamp: v.string(),
  symbol: v.string(),
  side: ExchangeSideSchema,
  size: v.number(),
  price: v.number(),
});

export const TradeListSchema = v.array(TradeSchema);

export const OrderSchema = v.object({
  orderID: v.string(),
  symbol: v.nullish(v.string()),
  side: v.nullish(v.string()),
  price: v.nullish(v.number()),
  orderQty: v.nullish(v.number()),
  ordStatus: v.nullish(v.string()),
  text: v.nullish(v.string()),
  /** Set on bulk cancel rows the exchange could not cancel */
  error: v.nullish(v.string()),
});

export type ExchangeOrder = v.InferOutput<typeof OrderSchema>;

export const OrderListSchema = v.array(OrderSchema);

export const PositionSchema = v.object({
  symbol: v.string(),
  currentQty: v.number(),
  avgEntryPrice: v.nullish(v.number()),
  posCost: v.nullish(v.number()),
});

export const PositionListSchema = v.array(PositionSchema);

export const WalletSchema = v.object({
  currency: v.string(),
  amount: v.number(),
});

/** `user/wallet` returns one object, or an array with `currency=all` */
export const WalletResponseSchema = v.union([v.array(WalletSchema), WalletSchema]);

export const ExecutionSchema = v.object({
  execID: v.string(),
  orderID: v.string(),
  symbol: v.string(),
  /** Empty on funding and other administrative rows */
  side: v.nullish(v.string()),
  lastQty: v.nullish(v.number()),
  price: v.nullish(v.number()),
  timestamp: v.string(),
  execCost: v.nullish(v.number()),
  execComm: v.nullish(v.number()),
});

export type ExchangeExecution = v.InferOutput<typeof ExecutionSchema>;

export const ExecutionListSchema = v.array(ExecutionSchema);

export const QuoteFillRatioSchema = v.object({
  quoteFillRatioMavg7: v.nullish(v.number()),
});

export const QuoteFillRatioResponseSchema = v.union([
  v.array(QuoteFillRatioSchema),
  QuoteFillRatioSchema,
]);

// Realtime socket

export const WelcomeMessageSchema = v.object({
  info: v.string(),
});

export const SubscribeAckSchema = v.object({
  success: v.literal(true),
  subscribe: v.string(),
});

export const BookActionSchema = v.picklist(["partial", "insert", "update", "delete"]);

export const StreamBookRowSchema = v.object({
  id: v.union([v.number(), v.string()]),
  side: ExchangeSideSchema,
  size: v.nullish(v.number()),
  price: v.nullish(v.number()),
});

export const TableMessageSchema = v.object({
  table: v.string(),
  action: BookActionSchema,
  data: v.array(StreamBookRowSchema),
});
