import { serve } from "@hono/node-server";
import { Hono } from "hono";

import type { ExchangeConnector } from "../adapters";
import type { Logger } from "../lib/logger";
import type { StateStore } from "../worker/state";
import { createHealthRoute } from "./routes/health";
import { createHttpMetrics, createMetricsRoute } from "./routes/metrics";

export interface ServerDeps {
  port: number;
  logger: Logger;
  connector: ExchangeConnector;
  /** Markets whose streams gate health */
  symbols: string[];
  stateStore?: StateStore;
}

export interface HttpServer {
  port: number;
  close: () => Promise<void>;
}

export const createApp = (deps: ServerDeps): Hono => {
  const app = new Hono();
  const http = createHttpMetrics();
  const getStatus = (): ReturnType<ExchangeConnector["getStatus"]> => deps.connector.getStatus();

  // Request logging middleware
  app.use("*", async (c, next) => {
    const start = Date.now();
    await next();
    const duration = Date.now() - start;
    deps.logger.debug("HTTP request", {
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: duration,
    });
    http.incrementRequests();
    http.recordDuration(duration);
  });

  // Routes
  app.get("/", (c) => c.json({ message: "BitMEX connector", exchange: deps.connector.exchange }));
  app.route("/health", createHealthRoute({ getStatus, symbols: deps.symbols }));
  app.route(
    "/metrics",
    createMetricsRoute({
      http,
      getStatus,
      ...(deps.stateStore && { getState: deps.stateStore.getState }),
    }),
  );

  return app;
};

export const startHttpServer = async (deps: ServerDeps): Promise<HttpServer> => {
  const app = createApp(deps);

  const server = serve(
    {
      fetch: app.fetch,
      port: deps.port,
    },
    (info) => {
      deps.logger.info(`HTTP server listening on port ${info.port}`);
    },
  );

  return {
    port: deps.port,
    close: async (): Promise<void> => {
      return new Promise<void>((resolve) => {
        server.close(() => {
          deps.logger.info("HTTP server closed");
          resolve();
        });
      });
    },
  };
};
