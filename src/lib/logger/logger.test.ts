import { afterEach, describe, expect, it, vi } from "vitest";

import { createLogger, formatLog, silentLogger, toError } from "./logger";

describe("logger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should log info messages to console.log", () => {
    const consoleSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    const logger = createLogger({ level: "debug" });

    logger.info("test message");

    expect(consoleSpy).toHaveBeenCalledTimes(1);
    expect(consoleSpy).toHaveBeenCalledWith(expect.stringContaining('"message":"test message"'));
  });

  it("should log warnings to console.warn and errors to console.error", () => {
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => {});
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    const logger = createLogger({ level: "debug" });

    logger.warn("careful");
    logger.error("test error", new Error("boom"));

    expect(warnSpy).toHaveBeenCalledWith(expect.stringContaining('"level":"warn"'));
    expect(errorSpy).toHaveBeenCalledWith(expect.stringContaining('"message":"boom"'));
  });

  it("should drop entries below the configured level", () => {
    const consoleSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    const logger = createLogger({ level: "info" });

    logger.debug("hidden");

    expect(consoleSpy).not.toHaveBeenCalled();
  });

  it("should merge child context into every entry", () => {
    const consoleSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    const logger = createLogger({ level: "debug", context: { service: "worker" } }).child({
      symbol: "XBTUSD",
    });

    logger.info("tick", { step: 1 });

    const line = consoleSpy.mock.calls[0]?.[0];
    expect(typeof line).toBe("string");
    expect(JSON.parse(String(line)).context).toEqual({
      service: "worker",
      symbol: "XBTUSD",
      step: 1,
    });
  });

  it("should format pretty entries on one line", () => {
    const line = formatLog(
      {
        timestamp: "2024-01-01T00:00:00.000Z",
        level: "info",
        message: "hello",
        context: { a: 1 },
      },
      "pretty",
    );

    expect(line).toBe('2024-01-01T00:00:00.000Z [INFO] hello {"a":1}');
  });

  it("should not write anything with the silent logger", () => {
    const consoleSpy = vi.spyOn(console, "log").mockImplementation(() => {});

    silentLogger.info("nothing");
    silentLogger.child({ a: 1 }).info("still nothing");

    expect(consoleSpy).not.toHaveBeenCalled();
  });

  it("should wrap non-Error values", () => {
    const original = new Error("x");

    expect(toError(original)).toBe(original);
    expect(toError("text").message).toBe("text");
  });
});
