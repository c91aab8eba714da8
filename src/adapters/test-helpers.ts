import { vi } from "vitest";

import type { BookStream, ConnectorStatus, ExchangeConnector, StreamState } from "./types";

export const EMPTY_STATUS: ConnectorStatus = {
  exchange: "bitmex",
  rateLimit: { remaining: null, limit: null, resetAt: null, observedAt: null },
  transport: {
    requests: 0,
    successes: 0,
    transientErrors: 0,
    clientErrors: 0,
    networkErrors: 0,
    invalidResponses: 0,
    throttleSleepMs: 0,
  },
  circuit: "CLOSED",
  streams: {},
};

/** Book stream stand-in whose state the test sets directly */
export const createFakeStream = (symbol: string, initial: StreamState = "STREAMING") => {
  let state = initial;
  const stream = {
    symbol,
    getState: () => state,
    getBook: () => ({ symbol, asks: [], bids: [], timestamp: new Date(0) }),
    getStats: () => ({ state, messages: 0, levels: 0 }),
    close: vi.fn(() => {
      state = "CLOSED";
    }),
  } satisfies BookStream;
  return {
    stream,
    setState: (next: StreamState) => {
      state = next;
    },
  };
};

/**
 * Connector whose every member is a spy. Streams start STREAMING and
 * `venue` reports whatever `streamBook` last returned.
 */
export const createFakeConnector = () => {
  const streams = new Map<string, ReturnType<typeof createFakeStream>>();

  const connector = {
    exchange: "bitmex",
    getMarket: vi.fn<ExchangeConnector["getMarket"]>(),
    getAsset: vi.fn<ExchangeConnector["getAsset"]>(),
    refreshMarkets: vi.fn<ExchangeConnector["refreshMarkets"]>(async () => []),
    venue: vi.fn<ExchangeConnector["venue"]>((symbol) => {
      const fake = streams.get(symbol);
      return fake ? { kind: "STREAMING", symbol, stream: fake.stream } : { kind: "STATIC", symbol };
    }),
    streamBook: vi.fn<ExchangeConnector["streamBook"]>(async (symbol) => {
      const fake = createFakeStream(symbol);
      streams.set(symbol, fake);
      return fake.stream;
    }),
    getBook: vi.fn<ExchangeConnector["getBook"]>(),
    tradesSince: vi.fn<ExchangeConnector["tradesSince"]>(async () => []),
    placedOffers: vi.fn<ExchangeConnector["placedOffers"]>(async () => []),
    accountPositions: vi.fn<ExchangeConnector["accountPositions"]>(async () => []),
    accountBalances: vi.fn<ExchangeConnector["accountBalances"]>(async () => []),
    postOffer: vi.fn<ExchangeConnector["postOffer"]>(),
    cancelOffer: vi.fn<ExchangeConnector["cancelOffer"]>(),
    executionsSince: vi.fn<ExchangeConnector["executionsSince"]>(async (_symbol, cursor) => ({
      executions: [],
      cursor,
    })),
    sampleFillRatio: vi.fn<ExchangeConnector["sampleFillRatio"]>(async () => []),
    onEvent: vi.fn<ExchangeConnector["onEvent"]>(() => () => {}),
    getStatus: vi.fn<ExchangeConnector["getStatus"]>(() => EMPTY_STATUS),
    close: vi.fn<ExchangeConnector["close"]>(),
  } satisfies ExchangeConnector;

  return { connector, streams };
};
