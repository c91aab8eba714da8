/**
 * Worker: opens a book stream per configured market and keeps the state
 * store reconciled with the exchange on a schedule.
 */

import * as v from "valibot";

import type { ExchangeConnector } from "@/adapters";
import { toError, type Logger } from "@/lib/logger";

import { ReconcilerConfigSchema, runReconcile } from "./reconciler";
import { createScheduler, type Scheduler } from "./scheduler";
import { createStateStore, type StateStore } from "./state";

export interface WorkerConfig {
  connector: ExchangeConnector;
  logger: Logger;
  symbols: string[];
  /** Whether the connector holds API credentials */
  authenticated: boolean;
  reconcileIntervalMs: number;
  fillRatioIntervalMs: number;
  stateStore?: StateStore;
  scheduler?: Scheduler;
}

export interface Worker {
  stateStore: StateStore;
  shutdown: () => Promise<void>;
}

export const startWorker = async (config: WorkerConfig): Promise<Worker> => {
  const { connector, symbols, authenticated } = config;
  const logger = config.logger.child({ component: "worker" });
  const stateStore = config.stateStore ?? createStateStore();
  const scheduler = config.scheduler ?? createScheduler({ logger });

  const unsubscribe = connector.onEvent((event) => stateStore.recordEvent(event));

  const markets = await connector.refreshMarkets();
  logger.info("Markets loaded", { count: markets.length });

  for (const symbol of symbols) {
    try {
      await connector.streamBook(symbol);
    } catch (error) {
      // The reconcile task rebuilds it on its next run
      logger.error("Failed to open book stream", toError(error), { symbol });
    }
  }

  for (const symbol of symbols) {
    const reconcilerConfig = v.parse(ReconcilerConfigSchema, { symbol, authenticated });
    scheduler.schedule({
      id: `reconcile-${symbol}`,
      fn: async () => {
        await runReconcile({ connector, stateStore, logger }, reconcilerConfig);
      },
      intervalMs: config.reconcileIntervalMs,
      enabled: true,
    });
  }

  scheduler.schedule({
    id: "fill-ratio",
    fn: async () => {
      stateStore.updateFillRatio(await connector.sampleFillRatio());
    },
    intervalMs: config.fillRatioIntervalMs,
    enabled: authenticated,
  });

  logger.info("Worker started", { symbols, authenticated });

  const shutdown = async (): Promise<void> => {
    logger.info("Worker shutting down...");
    scheduler.cancelAll();
    await scheduler.waitForRunning();
    unsubscribe();
    connector.close();
    logger.info("Worker shutdown complete");
  };

  return { stateStore, shutdown };
};

export * from "./scheduler";
export * from "./state";
export * from "./reconciler";
