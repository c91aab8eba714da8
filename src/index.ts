/**
 * BitMEX connector service
 *
 * Entry point: streams the configured order books, reconciles account state
 * on a schedule and serves health and metrics over HTTP.
 */

import { createExchangeConnector, parseConnectorConfig } from "./adapters";
import { loadConfig } from "./lib/config";
import { EnvValidationError, getEnv, type Env } from "./lib/env";
import { createLogger, toError } from "./lib/logger";
import { startHttpServer } from "./server";
import { startWorker } from "./worker";

const loadEnv = (): Env => {
  try {
    return getEnv();
  } catch (error) {
    if (error instanceof EnvValidationError) {
      console.error(error.message);
      process.exit(1);
    }
    throw error;
  }
};

const main = async (): Promise<void> => {
  const config = loadConfig(loadEnv());
  const logger = createLogger({
    level: config.logging.level,
    format: config.logging.format,
    context: { service: "bitmex-connector" },
  });

  logger.info("BitMEX connector starting...", {
    network: config.exchange.network,
    symbols: config.exchange.symbols,
  });

  try {
    // 1. Build the connector
    const connector = createExchangeConnector(
      parseConnectorConfig({
        exchange: "bitmex",
        network: config.exchange.network,
        credentials: config.exchange.credentials,
        throttleEpsilon: config.exchange.throttleEpsilon,
        executionLookbackMs: config.worker.executionLookbackMs,
      }),
      { logger },
    );

    // 2. Start worker (streams and reconciliation)
    logger.info("Starting worker...");
    const worker = await startWorker({
      connector,
      logger,
      symbols: config.exchange.symbols,
      authenticated: config.exchange.credentials !== undefined,
      reconcileIntervalMs: config.worker.reconcileIntervalMs,
      fillRatioIntervalMs: config.worker.fillRatioIntervalMs,
    });

    // 3. Start HTTP server (health checks, metrics)
    logger.info("Starting HTTP server...");
    const httpServer = await startHttpServer({
      port: config.server.port,
      logger,
      connector,
      symbols: config.exchange.symbols,
      stateStore: worker.stateStore,
    });

    // 4. Setup graceful shutdown
    const shutdown = async (signal: string): Promise<void> => {
      logger.info(`Received ${signal}, initiating graceful shutdown`);
      await worker.shutdown();
      await httpServer.close();
      logger.info("Graceful shutdown complete");
      process.exit(0);
    };

    process.on("SIGTERM", () => void shutdown("SIGTERM"));
    process.on("SIGINT", () => void shutdown("SIGINT"));

    logger.info("Connector initialized successfully");
  } catch (error) {
    logger.error("Fatal error during startup", toError(error));
    process.exit(1);
  }
};

main().catch((error: unknown) => {
  console.error("Unhandled error:", error);
  process.exit(1);
});
