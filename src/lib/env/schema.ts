import * as v from "valibot";

import { logFormatSchema, logLevelSchema } from "../logger/schema";

const integerFromString = (min: number, max = Number.MAX_SAFE_INTEGER) =>
  v.pipe(
    v.string(),
    v.transform(Number),
    v.number(),
    v.integer(),
    v.minValue(min),
    v.maxValue(max),
  );

const symbolListSchema = v.pipe(
  v.string(),
  v.transform((raw) =>
    raw
      .split(",")
      .map((symbol) => symbol.trim())
      .filter((symbol) => symbol.length > 0),
  ),
  v.array(v.string()),
  v.minLength(1, "At least one symbol is required"),
);

const epsilonSchema = v.pipe(
  v.string(),
  v.transform(Number),
  v.number(),
  v.check((value) => value > 0 && value <= 1, "Must be in (0, 1]"),
);

export const networkSchema = v.picklist(["mainnet", "testnet"]);

export type Network = v.InferOutput<typeof networkSchema>;

export const envSchema = v.object({
  // Server
  NODE_ENV: v.picklist(["development", "production", "test"]),
  PORT: v.optional(integerFromString(1, 65535), "8080"),

  // Logging
  LOG_LEVEL: v.optional(logLevelSchema),
  LOG_FORMAT: v.optional(logFormatSchema),

  // Exchange
  BITMEX_NETWORK: v.optional(networkSchema, "mainnet"),
  BITMEX_API_KEY: v.optional(v.pipe(v.string(), v.minLength(1))),
  BITMEX_API_SECRET: v.optional(v.pipe(v.string(), v.minLength(1))),
  BITMEX_SYMBOLS: v.optional(symbolListSchema, "XBTUSD"),

  // Transport and reconciliation tuning
  THROTTLE_EPSILON: v.optional(epsilonSchema, "0.1"),
  EXECUTION_LOOKBACK_MS: v.optional(integerFromString(1), "86400000"),
  RECONCILE_INTERVAL_MS: v.optional(integerFromString(1000), "30000"),
  FILL_RATIO_INTERVAL_MS: v.optional(integerFromString(1000), "300000"),
});

export type Env = v.InferOutput<typeof envSchema>;
