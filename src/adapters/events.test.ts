import { describe, expect, it, vi } from "vitest";

import type { Logger } from "@/lib/logger";

import { createEventChannel } from "./events";

const createMockLogger = (): Logger => {
  const logger: Logger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: vi.fn(() => logger),
  };
  return logger;
};

describe("createEventChannel", () => {
  it("should stamp events with severity, exchange and time", () => {
    const channel = createEventChannel({
      exchange: "bitmex",
      logger: createMockLogger(),
      now: () => 1_700_000_000_000,
    });

    const event = channel.emit({
      type: "STREAM_CLOSED",
      symbol: "XBTUSD",
      code: 1006,
      reason: "",
    });

    expect(event).toEqual({
      type: "STREAM_CLOSED",
      symbol: "XBTUSD",
      code: 1006,
      reason: "",
      severity: "fatal",
      exchange: "bitmex",
      timestamp: new Date(1_700_000_000_000),
    });
  });

  it("should log fatal events as errors and advisory events as warnings", () => {
    const logger = createMockLogger();
    const channel = createEventChannel({ exchange: "bitmex", logger });

    channel.emit({ type: "PROTOCOL_VIOLATION", symbol: "XBTUSD", message: "bad table" });
    channel.emit({
      type: "UNEXPECTED_ORDER_STATUS",
      symbol: "XBTUSD",
      status: "Rejected",
      reason: "Unexpected order status Rejected",
    });

    expect(logger.error).toHaveBeenCalledWith(
      "Connector event PROTOCOL_VIOLATION",
      undefined,
      expect.objectContaining({ severity: "fatal", message: "bad table" }),
    );
    expect(logger.warn).toHaveBeenCalledWith(
      "Connector event UNEXPECTED_ORDER_STATUS",
      expect.objectContaining({ severity: "advisory", status: "Rejected" }),
    );
  });

  it("should deliver events to subscribers until they unsubscribe", () => {
    const channel = createEventChannel({ exchange: "bitmex", logger: createMockLogger() });
    const handler = vi.fn();

    const unsubscribe = channel.subscribe(handler);
    channel.emit({
      type: "UNEXPECTED_CANCEL_STATUS",
      symbol: "XBTUSD",
      orderId: "order-1",
      status: "New",
      reason: "Unexpected cancel status New",
    });
    unsubscribe();
    channel.emit({ type: "PROTOCOL_VIOLATION", symbol: "XBTUSD", message: "late" });

    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler.mock.calls[0]?.[0]).toMatchObject({
      type: "UNEXPECTED_CANCEL_STATUS",
      orderId: "order-1",
    });
  });

  it("should keep delivering when a subscriber throws", () => {
    const logger = createMockLogger();
    const channel = createEventChannel({ exchange: "bitmex", logger });
    const second = vi.fn();

    channel.subscribe(() => {
      throw new Error("subscriber failed");
    });
    channel.subscribe(second);
    channel.emit({ type: "PROTOCOL_VIOLATION", symbol: "XBTUSD", message: "bad action" });

    expect(second).toHaveBeenCalledTimes(1);
    expect(logger.error).toHaveBeenCalledWith(
      "Connector event handler failed",
      expect.any(Error),
      { type: "PROTOCOL_VIOLATION" },
    );
  });
});
