/**
 * BitMEX connector: the host-facing facade over the transport, the market
 * registry, the order manager, the execution reconciler and one book
 * synchronizer per streamed market.
 */

import { silentLogger, type Logger } from "@/lib/logger";

import { resolveEndpoints, type ConnectorConfig } from "../config";
import { ExchangeError } from "../errors";
import { createEventChannel } from "../events";
import type {
  Balance,
  BookSnapshot,
  BookStream,
  ExchangeConnector,
  PlacedOrder,
  Position,
  StreamStats,
  Trade,
  Venue,
} from "../types";
import { createBookSync, type BookSync, type BookSyncConfig } from "./book-sync";
import { createExecutionReconciler } from "./executions";
import { sampleFillRatio } from "./fill-ratio";
import { createMarketRegistry } from "./markets";
import {
  normalizeBalance,
  normalizeOrder,
  normalizeOrderBook,
  normalizePosition,
  normalizeTrade,
} from "./normalizers";
import { createOrderManager } from "./orders";
import {
  OrderBookL2Schema,
  OrderListSchema,
  PositionListSchema,
  TradeListSchema,
  WalletResponseSchema,
} from "./schemas";
import { EXCHANGE, createTransport, unwrap, type Transport } from "./transport";

/** Largest page the REST API returns */
const MAX_PAGE = 1000;

export interface BitmexConnectorDeps {
  logger?: Logger;
  /** Prebuilt transport; one is created from the config otherwise */
  transport?: Transport;
  /** Builds the synchronizer for a streamed market */
  createStream?: (config: BookSyncConfig) => BookSync;
  now?: () => number;
}

/**
 * Create a BitMEX connector.
 *
 * Markets start on a STATIC venue; `streamBook` moves one to a STREAMING
 * venue backed by its own socket.
 */
export const createBitmexConnector = (
  config: ConnectorConfig,
  deps: BitmexConnectorDeps = {},
): ExchangeConnector => {
  const { now = Date.now, createStream = createBookSync } = deps;
  const logger = (deps.logger ?? silentLogger).child({ exchange: EXCHANGE });
  const endpoints = resolveEndpoints(config);

  const transport =
    deps.transport ??
    createTransport({
      baseUrl: endpoints.restUrl,
      ...(config.credentials && { credentials: config.credentials }),
      throttleEpsilon: config.throttleEpsilon,
      requestTimeoutMs: config.requestTimeoutMs,
      logger,
      now,
    });

  const events = createEventChannel({ exchange: EXCHANGE, logger, now });
  const markets = createMarketRegistry({ transport, logger, ttlMs: config.marketTtlMs });
  const orders = createOrderManager({ transport, events, logger });
  const reconciler = createExecutionReconciler({
    transport,
    logger,
    lookbackMs: config.executionLookbackMs,
    now,
  });

  const venues = new Map<string, Venue>();

  const venue = (symbol: string): Venue => venues.get(symbol) ?? { kind: "STATIC", symbol };

  const streamBook = async (symbol: string): Promise<BookStream> => {
    const current = venues.get(symbol);
    if (current?.kind === "STREAMING" && current.stream.getState() !== "CLOSED") {
      return current.stream;
    }

    const stream = createStream({
      symbol,
      wsUrl: endpoints.wsUrl,
      events,
      logger,
      greeting: config.greeting,
      now,
    });
    venues.set(symbol, { kind: "STREAMING", symbol, stream });
    logger.info("Starting book stream", { symbol, replaced: current !== undefined });
    await stream.start();
    return stream;
  };

  const fetchBook = async (symbol: string): Promise<BookSnapshot> => {
    const rows = unwrap(
      await transport.request({
        verb: "GET",
        path: "orderBook/L2",
        params: { symbol, depth: 0 },
        schema: OrderBookL2Schema,
      }),
      `Failed to fetch order book for ${symbol}`,
    );
    return normalizeOrderBook(symbol, rows, new Date(now()));
  };

  const getBook = async (symbol: string): Promise<BookSnapshot> => {
    const current = venue(symbol);
    if (current.kind === "STATIC") {
      return fetchBook(symbol);
    }
    if (current.stream.getState() === "CLOSED") {
      throw new ExchangeError(`Book stream for ${symbol} is closed`, "STREAM_CLOSED", EXCHANGE);
    }
    return current.stream.getBook();
  };

  const tradesSince = async (symbol: string, since: Date): Promise<Trade[]> => {
    const rows = unwrap(
      await transport.request({
        verb: "GET",
        path: "trade",
        params: { symbol, startTime: since.toISOString(), count: MAX_PAGE },
        schema: TradeListSchema,
      }),
      `Failed to fetch trades for ${symbol}`,
    );
    return rows.map(normalizeTrade);
  };

  const placedOffers = async (symbol?: string): Promise<PlacedOrder[]> => {
    const rows = unwrap(
      await transport.request({
        verb: "GET",
        path: "order",
        params: { symbol, filter: JSON.stringify({ open: true }), count: MAX_PAGE },
        schema: OrderListSchema,
        signed: true,
      }),
      "Failed to fetch open orders",
    );
    return rows.map(normalizeOrder).filter((order): order is PlacedOrder => order !== null);
  };

  const accountPositions = async (): Promise<Position[]> => {
    const rows = unwrap(
      await transport.request({
        verb: "GET",
        path: "position",
        schema: PositionListSchema,
        signed: true,
      }),
      "Failed to fetch positions",
    );
    return rows.filter((row) => row.currentQty !== 0).map(normalizePosition);
  };

  const accountBalances = async (): Promise<Balance[]> => {
    const payload = unwrap(
      await transport.request({
        verb: "GET",
        path: "user/wallet",
        params: { currency: "all" },
        schema: WalletResponseSchema,
        signed: true,
      }),
      "Failed to fetch balances",
    );
    return (Array.isArray(payload) ? payload : [payload]).map(normalizeBalance);
  };

  const streamStats = (): Record<string, StreamStats> => {
    const stats: Record<string, StreamStats> = {};
    for (const [symbol, current] of venues) {
      if (current.kind === "STREAMING") {
        stats[symbol] = current.stream.getStats();
      }
    }
    return stats;
  };

  return {
    exchange: EXCHANGE,

    getMarket: markets.get,
    getAsset: markets.getAsset,
    refreshMarkets: markets.refresh,

    venue,
    streamBook,
    getBook,
    tradesSince,

    placedOffers,
    accountPositions,
    accountBalances,

    postOffer: async (offer) => {
      try {
        const market = await markets.get(offer.symbol);
        return await orders.postOffer(market, offer);
      } catch (error) {
        if (error instanceof ExchangeError) {
          logger.warn("Offer rejected before submission", {
            symbol: offer.symbol,
            code: error.code,
            reason: error.message,
          });
          return { status: "REJECTED", reason: error.message };
        }
        throw error;
      }
    },
    cancelOffer: orders.cancelOffer,
    executionsSince: async (symbol, cursor) =>
      reconciler.executionsSince(await markets.get(symbol), cursor),

    sampleFillRatio: () => sampleFillRatio(transport),
    onEvent: events.subscribe,
    getStatus: () => ({
      exchange: EXCHANGE,
      rateLimit: transport.getRateLimit(),
      transport: transport.getMetrics(),
      circuit: transport.getCircuitState(),
      streams: streamStats(),
    }),

    close: () => {
      for (const current of venues.values()) {
        if (current.kind === "STREAMING") {
          current.stream.close();
        }
      }
    },
  };
};
