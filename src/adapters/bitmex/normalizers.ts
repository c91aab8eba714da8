/**
 * Normalizers from validated BitMEX payloads to connector domain types.
 */

import type * as v from "valibot";

import type {
  Asset,
  Balance,
  BookSide,
  BookSnapshot,
  Market,
  Offer,
  PlacedOrder,
  Position,
  Trade,
} from "../types";
import { decimalPlaces } from "./quantize";
import type {
  ExchangeOrder,
  ExchangeSide,
  Instrument,
  OrderBookL2Schema,
  PositionSchema,
  TradeSchema,
  WalletSchema,
} from "./schemas";

/** Decimals of the raw integer amounts the exchange reports per currency */
const ASSET_DECIMALS: Record<string, number> = {
  XBt: 8,
  USDt: 6,
  Gwei: 9,
};

export const assetDecimals = (symbol: string): number => ASSET_DECIMALS[symbol] ?? 0;

export const toAsset = (symbol: string): Asset => ({ symbol, decimals: assetDecimals(symbol) });

export const sideFromExchange = (side: ExchangeSide): BookSide => (side === "Buy" ? "bid" : "ask");

export const sideToExchange = (side: BookSide): ExchangeSide => (side === "bid" ? "Buy" : "Sell");

/** Parse a free-form side string; null for empty or unknown values */
export const parseSide = (side: string | null | undefined): BookSide | null => {
  if (side === "Buy") return "bid";
  if (side === "Sell") return "ask";
  return null;
};

export const byPriceAscending = (a: Offer, b: Offer): number => a.price - b.price;

export const normalizeMarket = (instrument: Instrument): Market => {
  const lotSize = instrument.lotSize ?? 1;
  return {
    symbol: instrument.symbol,
    tickSize: instrument.tickSize,
    lotSize,
    pricePrecision: decimalPlaces(instrument.tickSize),
    quantityPrecision: decimalPlaces(lotSize),
    takerFee: instrument.takerFee ?? 0,
    isInverse: instrument.isInverse,
    primary: toAsset(instrument.underlying),
    counter: toAsset(instrument.quoteCurrency),
    markPrice: instrument.markPrice ?? null,
  };
};

export const normalizeOrderBook = (
  symbol: string,
  rows: v.InferOutput<typeof OrderBookL2Schema>,
  timestamp: Date,
): BookSnapshot => {
  const asks: Offer[] = [];
  const bids: Offer[] = [];
  for (const row of rows) {
    const offer: Offer = {
      side: sideFromExchange(row.side),
      symbol,
      price: row.price,
      volume: row.size,
    };
    (offer.side === "ask" ? asks : bids).push(offer);
  }
  return {
    symbol,
    asks: asks.sort(byPriceAscending),
    bids: bids.sort(byPriceAscending),
    timestamp,
  };
};

export const normalizeTrade = (trade: v.InferOutput<typeof TradeSchema>): Trade => ({
  symbol: trade.symbol,
  side: sideFromExchange(trade.side),
  price: trade.price,
  volume: trade.size,
  timestamp: new Date(trade.timestamp),
});

/** Null when the row lacks the fields an open order must carry */
export const normalizeOrder = (order: ExchangeOrder): PlacedOrder | null => {
  const side = parseSide(order.side);
  if (
    side === null ||
    order.symbol == null ||
    order.price == null ||
    order.orderQty == null
  ) {
    return null;
  }
  return {
    id: order.orderID,
    symbol: order.symbol,
    side,
    price: order.price,
    volume: order.orderQty,
    status: order.ordStatus ?? "Unknown",
  };
};

export const normalizePosition = (position: v.InferOutput<typeof PositionSchema>): Position => ({
  symbol: position.symbol,
  quantity: position.currentQty,
  avgEntryPrice: position.avgEntryPrice ?? null,
  positionCost: position.posCost ?? 0,
});

export const normalizeBalance = (wallet: v.InferOutput<typeof WalletSchema>): Balance => ({
  asset: wallet.currency,
  amount: wallet.amount / 10 ** assetDecimals(wallet.currency),
});
