import { beforeEach, describe, expect, it } from "vitest";

import { ExchangeError, type Execution } from "@/adapters";
import { createFakeConnector } from "@/adapters/test-helpers";
import { createSpyLogger } from "@/lib/logger/test-helpers";
import { createStateStore, type StateStore } from "@/worker/state";

import { runReconcile } from "./reconcile";
import { hasFailures, type ReconcilerConfig } from "./types";

const NOW = Date.parse("2024-03-01T00:00:00.000Z");

const CONFIG: ReconcilerConfig = {
  symbol: "XBTUSD",
  authenticated: true,
  superviseStream: true,
};

const execution = (tradeId: string): Execution => ({
  orderId: "order-1",
  tradeId,
  symbol: "XBTUSD",
  side: "bid",
  price: 42_000,
  quantity: 100,
  grossVolume: 0.0024,
  netVolume: 0.0023,
  timestamp: new Date(NOW),
});

describe("runReconcile", () => {
  let fake: ReturnType<typeof createFakeConnector>;
  let stateStore: StateStore;
  let logger: ReturnType<typeof createSpyLogger>;

  const run = (config: ReconcilerConfig = CONFIG) =>
    runReconcile({ connector: fake.connector, stateStore, logger, now: () => NOW }, config);

  beforeEach(async () => {
    fake = createFakeConnector();
    stateStore = createStateStore(() => NOW);
    logger = createSpyLogger();
    await fake.connector.streamBook("XBTUSD");
    fake.connector.streamBook.mockClear();
  });

  it("should resume executions from the stored cursor", async () => {
    const cursor = { tradeId: "a", timestamp: new Date(NOW) };
    stateStore.recordExecutions("XBTUSD", { executions: [], cursor });
    fake.connector.executionsSince.mockResolvedValueOnce({
      executions: [execution("b")],
      cursor: { tradeId: "b", timestamp: new Date(NOW) },
    });

    const result = await run();

    expect(fake.connector.executionsSince).toHaveBeenCalledWith("XBTUSD", cursor);
    expect(stateStore.getSymbol("XBTUSD").cursor?.tradeId).toBe("b");
    expect(result).toEqual({
      symbol: "XBTUSD",
      stream: "OK",
      executions: "OK",
      orders: "OK",
      account: "OK",
      newExecutions: 1,
      timestamp: new Date(NOW),
    });
  });

  it("should refresh orders, positions and balances", async () => {
    fake.connector.placedOffers.mockResolvedValueOnce([
      { id: "o-1", symbol: "XBTUSD", side: "bid", price: 41_000, volume: 100, status: "New" },
    ]);
    fake.connector.accountPositions.mockResolvedValueOnce([
      { symbol: "XBTUSD", quantity: 100, avgEntryPrice: 41_000, positionCost: -243_902 },
    ]);
    fake.connector.accountBalances.mockResolvedValueOnce([{ asset: "XBt", amount: 0.5 }]);

    await run();

    expect(fake.connector.placedOffers).toHaveBeenCalledWith("XBTUSD");
    expect([...stateStore.getSymbol("XBTUSD").openOrders.keys()]).toEqual(["o-1"]);
    expect(stateStore.getState().positions.get("XBTUSD")?.quantity).toBe(100);
    expect(stateStore.getState().balances.get("XBt")?.amount).toBe(0.5);
  });

  it("should rebuild a closed stream", async () => {
    fake.streams.get("XBTUSD")?.setState("CLOSED");

    const result = await run();

    expect(fake.connector.streamBook).toHaveBeenCalledWith("XBTUSD");
    expect(result.stream).toBe("REBUILT");
  });

  it("should start a stream for a market still on a static venue", async () => {
    const result = await run({ ...CONFIG, symbol: "ETHUSD" });

    expect(fake.connector.streamBook).toHaveBeenCalledWith("ETHUSD");
    expect(result.stream).toBe("REBUILT");
  });

  it("should leave streams alone when not supervising them", async () => {
    fake.streams.get("XBTUSD")?.setState("CLOSED");

    const result = await run({ ...CONFIG, superviseStream: false });

    expect(fake.connector.streamBook).not.toHaveBeenCalled();
    expect(result.stream).toBe("SKIPPED");
  });

  it("should skip signed steps without credentials", async () => {
    const result = await run({ ...CONFIG, authenticated: false });

    expect(fake.connector.executionsSince).not.toHaveBeenCalled();
    expect(fake.connector.placedOffers).not.toHaveBeenCalled();
    expect(fake.connector.accountPositions).not.toHaveBeenCalled();
    expect(result).toMatchObject({ executions: "SKIPPED", orders: "SKIPPED", account: "SKIPPED" });
  });

  it("should continue past a failed step", async () => {
    const failure = new ExchangeError("Failed to fetch open orders", "NETWORK_ERROR", "bitmex");
    fake.connector.placedOffers.mockRejectedValueOnce(failure);

    const result = await run();

    expect(result).toMatchObject({ executions: "OK", orders: "FAILED", account: "OK" });
    expect(hasFailures(result)).toBe(true);
    expect(logger.error).toHaveBeenCalledWith("Reconcile step orders failed", failure);
  });

  it("should keep the cursor when execution reconciliation fails", async () => {
    const cursor = { tradeId: "a", timestamp: new Date(NOW) };
    stateStore.recordExecutions("XBTUSD", { executions: [], cursor });
    fake.connector.executionsSince.mockRejectedValueOnce(new Error("boom"));

    await run();

    expect(stateStore.getSymbol("XBTUSD").cursor).toEqual(cursor);
  });

  it("should throw when every signed step fails", async () => {
    const failure = new ExchangeError("Server unavailable", "SERVER_UNAVAILABLE", "bitmex");
    fake.connector.executionsSince.mockRejectedValueOnce(failure);
    fake.connector.placedOffers.mockRejectedValueOnce(failure);
    fake.connector.accountPositions.mockRejectedValueOnce(failure);

    await expect(run()).rejects.toBe(failure);
  });
});
