/**
 * Connector configuration validation schemas.
 *
 * One config object is passed into every constructor; there is no
 * process-wide default exchange.
 */

import * as v from "valibot";

import { networkSchema, type Network } from "@/lib/env/schema";

export const NETWORK_ENDPOINTS: Record<Network, { restUrl: string; wsUrl: string }> = {
  mainnet: {
    restUrl: "https://www.bitmex.com/api/v1",
    wsUrl: "wss://ws.bitmex.com/realtime",
  },
  testnet: {
    restUrl: "https://testnet.bitmex.com/api/v1",
    wsUrl: "wss://ws.testnet.bitmex.com/realtime",
  },
};

const positiveInteger = v.pipe(v.number(), v.integer(), v.minValue(1));

export const ConnectorConfigSchema = v.variant("exchange", [
  v.object({
    exchange: v.literal("bitmex"),
    network: v.optional(networkSchema, "mainnet"),
    /** Overrides the network's REST base URL */
    restUrl: v.optional(v.pipe(v.string(), v.url())),
    /** Overrides the network's socket URL */
    wsUrl: v.optional(v.pipe(v.string(), v.url())),
    credentials: v.optional(
      v.object({
        apiKey: v.pipe(v.string(), v.minLength(1)),
        apiSecret: v.pipe(v.string(), v.minLength(1)),
      }),
    ),
    throttleEpsilon: v.optional(
      v.pipe(
        v.number(),
        v.check((value) => value > 0, "Must be positive"),
      ),
      0.1,
    ),
    requestTimeoutMs: v.optional(positiveInteger, 10_000),
    executionLookbackMs: v.optional(positiveInteger, 86_400_000),
    marketTtlMs: v.optional(positiveInteger, 3_600_000),
    /** Text the socket's first message must contain */
    greeting: v.optional(v.string(), "Welcome to the BitMEX Realtime API"),
  }),
]);

export type ConnectorConfig = v.InferOutput<typeof ConnectorConfigSchema>;

export type ConnectorConfigInput = v.InferInput<typeof ConnectorConfigSchema>;

export const parseConnectorConfig = (config: unknown): ConnectorConfig =>
  v.parse(ConnectorConfigSchema, config);

export const resolveEndpoints = (config: ConnectorConfig): { restUrl: string; wsUrl: string } => {
  const defaults = NETWORK_ENDPOINTS[config.network];
  return {
    restUrl: config.restUrl ?? defaults.restUrl,
    wsUrl: config.wsUrl ?? defaults.wsUrl,
  };
};
