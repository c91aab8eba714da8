/**
 * Exchange connector exports.
 */

export type {
  Asset,
  Balance,
  BookSide,
  BookSnapshot,
  BookStream,
  CancelOfferResult,
  ConnectorStatus,
  ExchangeConnector,
  Execution,
  ExecutionBatch,
  ExecutionCursor,
  Market,
  Offer,
  PlacedOrder,
  Position,
  PostOfferResult,
  StreamState,
  StreamStats,
  Trade,
  TransportMetrics,
  Venue,
} from "./types";

export { ExchangeError, ProtocolViolationError } from "./errors";
export type { ExchangeErrorCode } from "./errors";

export { createEventChannel, EVENT_SEVERITY } from "./events";
export type { ConnectorEvent, ConnectorEventType, EventChannel, EventSeverity } from "./events";

// Factory function
export { createExchangeConnector } from "./factory";

// Config validation
export {
  ConnectorConfigSchema,
  NETWORK_ENDPOINTS,
  parseConnectorConfig,
  resolveEndpoints,
} from "./config";
export type { ConnectorConfig, ConnectorConfigInput } from "./config";

export { createBitmexConnector } from "./bitmex";
export type { BitmexConnectorDeps } from "./bitmex";
