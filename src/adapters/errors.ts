/**
 * Connector error types.
 */

export type ExchangeErrorCode =
  | "SERVER_UNAVAILABLE"
  | "AUTHENTICATION_FAILED"
  | "REQUEST_REJECTED"
  | "NETWORK_ERROR"
  | "INVALID_RESPONSE"
  | "MARKET_NOT_FOUND"
  | "STREAM_CLOSED";

export class ExchangeError extends Error {
  public override readonly name = "ExchangeError";

  constructor(
    message: string,
    public readonly code: ExchangeErrorCode,
    public readonly exchange: string,
    public override readonly cause?: unknown,
  ) {
    super(message, { cause });
  }
}

/**
 * A socket message that does not fit the stream protocol in its current state.
 * Fatal for the stream that received it.
 */
export class ProtocolViolationError extends Error {
  public override readonly name = "ProtocolViolationError";

  constructor(
    message: string,
    public readonly payload?: unknown,
  ) {
    super(message);
  }
}
