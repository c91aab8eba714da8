/**
 * Connector interface and shared domain types.
 *
 * Prices and sizes are plain numbers in exchange units: prices in the quote
 * currency, sizes in contracts. Raw integer wallet amounts are scaled by the
 * asset's decimals before they leave the connector.
 */

import type { CircuitBreakerState, RateLimitState } from "@/lib/rate-limiter";

import type { ConnectorEvent } from "./events";

export type BookSide = "bid" | "ask";

export interface Asset {
  symbol: string;
  /** Decimals of the exchange's raw integer amounts (XBt → 8) */
  decimals: number;
}

export interface Market {
  symbol: string;
  tickSize: number;
  lotSize: number;
  /** Decimal places of the tick size */
  pricePrecision: number;
  /** Decimal places of the lot size */
  quantityPrecision: number;
  takerFee: number;
  isInverse: boolean;
  /** Underlying asset */
  primary: Asset;
  /** Quote asset */
  counter: Asset;
  markPrice: number | null;
}

/** One price level on one side of a book; replaced, never mutated */
export interface Offer {
  readonly side: BookSide;
  readonly symbol: string;
  readonly price: number;
  readonly volume: number;
}

export interface BookSnapshot {
  symbol: string;
  /** Ascending by price */
  asks: Offer[];
  /** Ascending by price */
  bids: Offer[];
  timestamp: Date;
}

export interface PlacedOrder {
  id: string;
  symbol: string;
  side: BookSide;
  price: number;
  volume: number;
  /** Exchange order status, e.g. "New" */
  status: string;
}

export interface Execution {
  orderId: string;
  /** Unique trade id, used as the reconciliation cursor */
  tradeId: string;
  symbol: string;
  side: BookSide;
  price: number;
  quantity: number;
  grossVolume: number;
  /** Gross volume less the exchange commission */
  netVolume: number;
  timestamp: Date;
}

export interface ExecutionCursor {
  tradeId: string;
  timestamp: Date;
}

export interface ExecutionBatch {
  executions: Execution[];
  /** Cursor of the last parsed execution, or the input cursor */
  cursor: ExecutionCursor | null;
}

export interface Trade {
  symbol: string;
  side: BookSide;
  price: number;
  volume: number;
  timestamp: Date;
}

export interface Position {
  symbol: string;
  /** Signed contract quantity; negative when short */
  quantity: number;
  avgEntryPrice: number | null;
  positionCost: number;
}

export interface Balance {
  asset: string;
  amount: number;
}

export type PostOfferResult =
  | { status: "PLACED"; order: PlacedOrder }
  | { status: "POST_ONLY_REJECTED" }
  | { status: "REJECTED"; reason: string };

export type CancelOfferResult =
  | { status: "CANCELLED" | "ALREADY_FILLED" | "NOT_FOUND" }
  | { status: "UNEXPECTED"; reason: string };

export type StreamState = "AWAITING_WELCOME" | "AWAITING_SUBSCRIBE_ACK" | "STREAMING" | "CLOSED";

export interface StreamStats {
  state: StreamState;
  /** Data messages applied since the stream started */
  messages: number;
  /** Price levels currently held */
  levels: number;
}

/** A live order book mirror fed by the exchange socket */
export interface BookStream {
  readonly symbol: string;
  getState(): StreamState;
  getBook(): BookSnapshot;
  getStats(): StreamStats;
  close(): void;
}

/**
 * Where a market's book comes from: a REST snapshot per read, or a
 * stream that owns a socket and an in-memory map.
 */
export type Venue =
  | { kind: "STATIC"; symbol: string }
  | { kind: "STREAMING"; symbol: string; stream: BookStream };

export interface TransportMetrics {
  requests: number;
  successes: number;
  transientErrors: number;
  clientErrors: number;
  networkErrors: number;
  invalidResponses: number;
  /** Cumulative self-throttle sleep */
  throttleSleepMs: number;
}

export interface ConnectorStatus {
  exchange: string;
  rateLimit: RateLimitState;
  transport: TransportMetrics;
  circuit: CircuitBreakerState;
  streams: Record<string, StreamStats>;
}

export interface ExchangeConnector {
  readonly exchange: string;

  // Reference data
  getMarket(symbol: string): Promise<Market>;
  getAsset(symbol: string): Promise<Asset>;
  refreshMarkets(): Promise<Market[]>;

  // Order books
  venue(symbol: string): Venue;
  /** Start a stream for the market, replacing a closed one */
  streamBook(symbol: string): Promise<BookStream>;
  getBook(symbol: string): Promise<BookSnapshot>;
  tradesSince(symbol: string, since: Date): Promise<Trade[]>;

  // Account
  placedOffers(symbol?: string): Promise<PlacedOrder[]>;
  accountPositions(): Promise<Position[]>;
  accountBalances(): Promise<Balance[]>;

  // Orders
  postOffer(offer: Offer): Promise<PostOfferResult>;
  cancelOffer(order: PlacedOrder): Promise<CancelOfferResult>;
  executionsSince(symbol: string, cursor: ExecutionCursor | null): Promise<ExecutionBatch>;

  // Monitoring
  sampleFillRatio(): Promise<number[]>;
  onEvent(handler: (event: ConnectorEvent) => void): () => void;
  getStatus(): ConnectorStatus;

  /** Close every stream */
  close(): void;
}
