/**
 * BitMEX connector exports.
 */

export { createBitmexConnector } from "./adapter";
export type { BitmexConnectorDeps } from "./adapter";
export { BOOK_TABLE, bookTopic, createBookSync } from "./book-sync";
export type { BookSync, BookSyncConfig } from "./book-sync";
export { createExecutionReconciler, DEFAULT_EXECUTION_LOOKBACK_MS } from "./executions";
export { sampleFillRatio } from "./fill-ratio";
export { createMarketRegistry, DEFAULT_MARKET_TTL_MS } from "./markets";
export type { MarketRegistry } from "./markets";
export { createOrderManager, MAKER_ONLY_INSTRUCTION } from "./orders";
export { formatPrice, quantizePrice, quantizeVolume } from "./quantize";
export { createTransport } from "./transport";
export type { RestFailure, RestResult, Transport, TransportConfig } from "./transport";
