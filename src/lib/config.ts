import type { Env, Network } from "./env";
import type { LogFormat, LogLevel } from "./logger";

export interface AppConfig {
  server: {
    port: number;
    nodeEnv: Env["NODE_ENV"];
  };
  logging: {
    level: LogLevel;
    format: LogFormat;
  };
  exchange: {
    network: Network;
    symbols: string[];
    /** Absent credentials leave the connector read-only */
    credentials?: { apiKey: string; apiSecret: string };
    throttleEpsilon: number;
  };
  worker: {
    reconcileIntervalMs: number;
    fillRatioIntervalMs: number;
    executionLookbackMs: number;
  };
}

export const loadConfig = (env: Env): AppConfig => ({
  server: {
    port: env.PORT,
    nodeEnv: env.NODE_ENV,
  },
  logging: {
    level: env.LOG_LEVEL ?? (env.NODE_ENV === "production" ? "info" : "debug"),
    format: env.LOG_FORMAT ?? (env.NODE_ENV === "development" ? "pretty" : "json"),
  },
  exchange: {
    network: env.BITMEX_NETWORK,
    symbols: env.BITMEX_SYMBOLS,
    ...(env.BITMEX_API_KEY !== undefined && env.BITMEX_API_SECRET !== undefined
      ? { credentials: { apiKey: env.BITMEX_API_KEY, apiSecret: env.BITMEX_API_SECRET } }
      : {}),
    throttleEpsilon: env.THROTTLE_EPSILON,
  },
  worker: {
    reconcileIntervalMs: env.RECONCILE_INTERVAL_MS,
    fillRatioIntervalMs: env.FILL_RATIO_INTERVAL_MS,
    executionLookbackMs: env.EXECUTION_LOOKBACK_MS,
  },
});
