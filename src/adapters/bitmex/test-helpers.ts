import * as v from "valibot";
import { vi } from "vitest";

import { silentLogger, type Logger } from "@/lib/logger";
import type { CloseCategory, WebSocketManager } from "@/lib/websocket";

import { createEventChannel, type ConnectorEvent, type EventChannel } from "../events";
import type { Market } from "../types";
import type { RestRequest, RestResult, Transport } from "./transport";

export const XBTUSD: Market = {
  symbol: "XBTUSD",
  tickSize: 0.5,
  lotSize: 100,
  pricePrecision: 1,
  quantityPrecision: 0,
  takerFee: 0.00075,
  isInverse: true,
  primary: { symbol: "XBT", decimals: 0 },
  counter: { symbol: "USD", decimals: 0 },
  markPrice: 42_000,
};

export const ETHUSD: Market = {
  symbol: "ETHUSD",
  tickSize: 0.05,
  lotSize: 1,
  pricePrecision: 2,
  quantityPrecision: 0,
  takerFee: 0.00075,
  isInverse: false,
  primary: { symbol: "ETH", decimals: 0 },
  counter: { symbol: "USD", decimals: 0 },
  markPrice: 2_500,
};

export const ok = <T>(payload: T, status = 200): RestResult<T> => ({ ok: true, status, payload });

/**
 * Transport that answers from a queue of canned results, in call order.
 * Successful payloads still go through the request's schema.
 */
export const createFakeTransport = (responses: RestResult<unknown>[] = []) => {
  const queue = [...responses];
  const calls: RestRequest<v.GenericSchema>[] = [];

  const request = async <TSchema extends v.GenericSchema>(
    req: RestRequest<TSchema>,
  ): Promise<RestResult<v.InferOutput<TSchema>>> => {
    calls.push(req);
    const next = queue.shift();
    if (!next) {
      throw new Error(`No fake response queued for ${req.verb} ${req.path}`);
    }
    if (!next.ok) {
      return next;
    }
    return { ok: true, status: next.status, payload: v.parse(req.schema, next.payload) };
  };

  const transport: Transport = {
    request,
    hasCredentials: () => true,
    getRateLimit: () => ({ remaining: 10, limit: 120, resetAt: null, observedAt: null }),
    getMetrics: () => ({
      requests: calls.length,
      successes: 0,
      transientErrors: 0,
      clientErrors: 0,
      networkErrors: 0,
      invalidResponses: 0,
      throttleSleepMs: 0,
    }),
    getCircuitState: () => "CLOSED",
  };

  return {
    transport,
    calls,
    push: (...more: RestResult<unknown>[]) => {
      queue.push(...more);
    },
  };
};

export const createRecordingChannel = (
  logger: Logger = silentLogger,
): { channel: EventChannel; events: ConnectorEvent[] } => {
  const channel = createEventChannel({ exchange: "bitmex", logger, now: () => 0 });
  const events: ConnectorEvent[] = [];
  channel.subscribe((event) => events.push(event));
  return { channel, events };
};

/** Socket manager whose inbound traffic the test drives by hand */
export const createFakeSocket = () => {
  let onMessage: (data: unknown) => void = () => {};
  let onClose: (code: number, reason: string, category: CloseCategory) => void = () => {};
  const socket = {
    connect: vi.fn(async () => {}),
    close: vi.fn(),
    getState: vi.fn(() => "CONNECTED" as const),
    onMessage: vi.fn((handler: (data: unknown) => void) => {
      onMessage = handler;
      return () => {};
    }),
    onClose: vi.fn((handler: (code: number, reason: string, category: CloseCategory) => void) => {
      onClose = handler;
      return () => {};
    }),
    onError: vi.fn(() => () => {}),
  } satisfies WebSocketManager;

  return {
    socket,
    deliver: (data: unknown) => onMessage(data),
    closeRemotely: (code: number, reason: string) => onClose(code, reason, "NORMAL"),
  };
};
