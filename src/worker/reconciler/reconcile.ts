/**
 * Reconciler: resume execution reconciliation, refresh open orders and
 * account state into the store, and rebuild a closed book stream.
 *
 * Stateless apart from the store; scheduling is handled by the caller.
 */

import type { ExchangeConnector } from "@/adapters";
import { toError, type Logger } from "@/lib/logger";
import type { StateStore } from "@/worker/state";

import type { ReconcilerConfig, ReconcilerResult, StepOutcome } from "./types";

export interface ReconcileDeps {
  connector: ExchangeConnector;
  stateStore: StateStore;
  logger: Logger;
  now?: () => number;
}

/**
 * Run one reconciliation pass for a market.
 *
 * Steps run in order and each failure is logged and recorded in the result.
 * Throws only when every attempted step failed, so the scheduler can retry.
 */
export const runReconcile = async (
  deps: ReconcileDeps,
  config: ReconcilerConfig,
): Promise<ReconcilerResult> => {
  const { connector, stateStore, now = Date.now } = deps;
  const { symbol, authenticated } = config;
  const logger = deps.logger.child({ symbol, component: "reconciler" });
  const errors: Error[] = [];

  const step = async (name: string, fn: () => Promise<void>): Promise<StepOutcome> => {
    try {
      await fn();
      return "OK";
    } catch (error) {
      const err = toError(error);
      errors.push(err);
      logger.error(`Reconcile step ${name} failed`, err);
      return "FAILED";
    }
  };

  // 1. Rebuild a closed stream
  let stream: ReconcilerResult["stream"] = "SKIPPED";
  if (config.superviseStream) {
    const venue = connector.venue(symbol);
    if (venue.kind === "STREAMING" && venue.stream.getState() !== "CLOSED") {
      stream = "OK";
    } else {
      const outcome = await step("stream", async () => {
        logger.warn("Book stream is down, rebuilding", { venue: venue.kind });
        await connector.streamBook(symbol);
      });
      stream = outcome === "OK" ? "REBUILT" : outcome;
    }
  }

  if (!authenticated) {
    return {
      symbol,
      stream,
      executions: "SKIPPED",
      orders: "SKIPPED",
      account: "SKIPPED",
      newExecutions: 0,
      timestamp: new Date(now()),
    };
  }

  // 2. Executions since the in-memory cursor
  let newExecutions = 0;
  const executions = await step("executions", async () => {
    const batch = await connector.executionsSince(symbol, stateStore.getSymbol(symbol).cursor);
    stateStore.recordExecutions(symbol, batch);
    newExecutions = batch.executions.length;
  });

  // 3. Open orders
  const orders = await step("orders", async () => {
    stateStore.updateOrders(symbol, await connector.placedOffers(symbol));
  });

  // 4. Positions and balances
  const account = await step("account", async () => {
    const [positions, balances] = await Promise.all([
      connector.accountPositions(),
      connector.accountBalances(),
    ]);
    stateStore.updatePositions(positions);
    stateStore.updateBalances(balances);
  });

  const result: ReconcilerResult = {
    symbol,
    stream,
    executions,
    orders,
    account,
    newExecutions,
    timestamp: new Date(now()),
  };

  const [firstError] = errors;
  if (firstError && executions === "FAILED" && orders === "FAILED" && account === "FAILED") {
    throw firstError;
  }

  if (newExecutions > 0) {
    logger.info("Reconciled new executions", { count: newExecutions });
  } else {
    logger.debug("Reconciliation complete", { stream, executions, orders, account });
  }

  return result;
};
