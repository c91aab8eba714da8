import { describe, expect, it } from "vitest";

import { silentLogger } from "@/lib/logger";

import { ExchangeError } from "../errors";
import { createExecutionReconciler, dropThroughCursor, parseExecution } from "./executions";
import type { ExchangeExecution } from "./schemas";
import { ETHUSD, XBTUSD, createFakeTransport, ok } from "./test-helpers";

const NOW = Date.parse("2024-03-02T00:00:00.000Z");

const fill = (execID: string, overrides: Partial<ExchangeExecution> = {}): ExchangeExecution => ({
  execID,
  orderID: `order-${execID}`,
  symbol: "XBTUSD",
  side: "Buy",
  lastQty: 100,
  price: 42_000,
  timestamp: "2024-03-01T12:00:00.000Z",
  execCost: -238_095,
  execComm: 95,
  ...overrides,
});

const setup = (...rows: ExchangeExecution[][]) => {
  const fake = createFakeTransport(rows.map((page) => ok(page)));
  const reconciler = createExecutionReconciler({
    transport: fake.transport,
    logger: silentLogger,
    now: () => NOW,
  });
  return { ...fake, reconciler };
};

describe("parseExecution", () => {
  it("should scale gross and net volume by the price precision", () => {
    expect(parseExecution(fill("a"), XBTUSD)).toEqual({
      orderId: "order-a",
      tradeId: "a",
      symbol: "XBTUSD",
      side: "bid",
      price: 42_000,
      quantity: 100,
      grossVolume: 23_809.5,
      netVolume: 23_800,
      timestamp: new Date("2024-03-01T12:00:00.000Z"),
    });
  });

  it("should treat a missing commission as zero", () => {
    const execution = parseExecution(fill("a", { execCost: 5_000, execComm: null }), ETHUSD);

    expect(execution?.grossVolume).toBe(50);
    expect(execution?.netVolume).toBe(50);
  });

  const incomplete: [string, Partial<ExchangeExecution>][] = [
    ["an empty side", { side: "" }],
    ["a null side", { side: null }],
    ["no quantity", { lastQty: null }],
    ["no cost", { execCost: null }],
  ];

  it.each(incomplete)("should skip rows with %s", (_label, overrides) => {
    expect(parseExecution(fill("a", overrides), XBTUSD)).toBeNull();
  });
});

describe("dropThroughCursor", () => {
  const rows = [fill("a"), fill("b"), fill("c")];
  const at = new Date("2024-03-01T12:00:00.000Z");

  it("should keep every row without a cursor", () => {
    expect(dropThroughCursor(rows, null)).toEqual(rows);
  });

  it("should drop rows up to and including the cursor", () => {
    expect(dropThroughCursor(rows, { tradeId: "b", timestamp: at }).map((r) => r.execID)).toEqual([
      "c",
    ]);
  });

  it("should keep every row when the cursor is absent from the page", () => {
    expect(dropThroughCursor(rows, { tradeId: "z", timestamp: at })).toEqual(rows);
  });
});

describe("executionsSince", () => {
  it("should start from the lookback window without a cursor", async () => {
    const { reconciler, calls } = setup([fill("a"), fill("b")]);

    const batch = await reconciler.executionsSince(XBTUSD, null);

    expect(calls[0]).toMatchObject({
      verb: "GET",
      path: "execution/tradeHistory",
      signed: true,
      params: { symbol: "XBTUSD", startTime: "2024-03-01T00:00:00.000Z", count: 500 },
    });
    expect(batch.executions.map((e) => e.tradeId)).toEqual(["a", "b"]);
    expect(batch.cursor).toEqual({
      tradeId: "b",
      timestamp: new Date("2024-03-01T12:00:00.000Z"),
    });
  });

  it("should resume from the cursor and skip what it already saw", async () => {
    const cursor = { tradeId: "a", timestamp: new Date("2024-03-01T12:00:00.000Z") };
    const { reconciler, calls } = setup([
      fill("a"),
      fill("funding", { side: "", lastQty: 0 }),
      fill("b", { side: "Sell", timestamp: "2024-03-01T13:00:00.000Z" }),
    ]);

    const batch = await reconciler.executionsSince(XBTUSD, cursor);

    expect(calls[0]?.params).toMatchObject({ startTime: "2024-03-01T12:00:00.000Z" });
    expect(batch.executions).toHaveLength(1);
    expect(batch.executions[0]?.side).toBe("ask");
    expect(batch.cursor).toEqual({
      tradeId: "b",
      timestamp: new Date("2024-03-01T13:00:00.000Z"),
    });
  });

  it("should return the input cursor when nothing new was parsed", async () => {
    const cursor = { tradeId: "a", timestamp: new Date("2024-03-01T12:00:00.000Z") };
    const { reconciler } = setup([fill("a")]);

    expect(await reconciler.executionsSince(XBTUSD, cursor)).toEqual({ executions: [], cursor });
  });

  it("should return the same batch when called twice with the same cursor", async () => {
    const cursor = { tradeId: "a", timestamp: new Date("2024-03-01T12:00:00.000Z") };
    const page = [fill("a"), fill("b")];
    const { reconciler } = setup(page, page);

    const first = await reconciler.executionsSince(XBTUSD, cursor);
    const second = await reconciler.executionsSince(XBTUSD, cursor);

    expect(second).toEqual(first);
  });

  it("should throw an ExchangeError when the request fails", async () => {
    const fake = createFakeTransport([{ ok: false, kind: "TRANSIENT_SERVER_ERROR", status: 502 }]);
    const reconciler = createExecutionReconciler({
      transport: fake.transport,
      logger: silentLogger,
    });

    const error = await reconciler.executionsSince(XBTUSD, null).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ExchangeError);
    expect(error).toMatchObject({
      code: "SERVER_UNAVAILABLE",
      message: "Failed to fetch executions for XBTUSD: Server unavailable (HTTP 502)",
    });
  });
});
