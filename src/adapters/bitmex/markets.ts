/**
 * Market and asset descriptors loaded from the active instrument list.
 */

import { LRUCache } from "lru-cache";

import type { Logger } from "@/lib/logger";

import { ExchangeError } from "../errors";
import type { Asset, Market } from "../types";
import { normalizeMarket, toAsset } from "./normalizers";
import { InstrumentListSchema } from "./schemas";
import { EXCHANGE, unwrap, type Transport } from "./transport";

export const DEFAULT_MARKET_TTL_MS = 60 * 60 * 1000;

const MAX_ENTRIES = 5000;

export interface MarketRegistryConfig {
  transport: Transport;
  logger: Logger;
  /** How long a loaded set stays fresh */
  ttlMs?: number;
}

export interface MarketRegistry {
  /** Refreshes on a miss; throws MARKET_NOT_FOUND if still unknown */
  get: (symbol: string) => Promise<Market>;
  getAsset: (symbol: string) => Promise<Asset>;
  /** Replace the whole set; concurrent calls share one request */
  refresh: () => Promise<Market[]>;
  /** Currently cached markets */
  list: () => Market[];
}

export const createMarketRegistry = (config: MarketRegistryConfig): MarketRegistry => {
  const { transport, ttlMs = DEFAULT_MARKET_TTL_MS } = config;
  const logger = config.logger.child({ component: "markets" });

  const cacheOptions = {
    max: MAX_ENTRIES,
    ttl: ttlMs,
    // Entry ages follow the wall clock
    perf: {
      now: () => Date.now(),
    },
  };
  const markets = new LRUCache<string, Market>(cacheOptions);
  const assets = new LRUCache<string, Asset>(cacheOptions);

  let inflight: Promise<Market[]> | null = null;

  const load = async (): Promise<Market[]> => {
    const instruments = unwrap(
      await transport.request({
        verb: "GET",
        path: "instrument/active",
        schema: InstrumentListSchema,
      }),
      "Failed to load active instruments",
    );

    markets.clear();
    assets.clear();
    const loaded: Market[] = [];
    for (const instrument of instruments) {
      const market = normalizeMarket(instrument);
      markets.set(market.symbol, market);
      loaded.push(market);
      for (const symbol of [instrument.underlying, instrument.quoteCurrency, instrument.settlCurrency]) {
        if (symbol && !assets.has(symbol)) {
          assets.set(symbol, toAsset(symbol));
        }
      }
    }

    logger.info("Markets refreshed", { markets: loaded.length, assets: assets.size });
    return loaded;
  };

  const refresh = (): Promise<Market[]> => {
    if (!inflight) {
      inflight = load().finally(() => {
        inflight = null;
      });
    }
    return inflight;
  };

  const lookup = async <T extends object>(
    cache: LRUCache<string, T>,
    symbol: string,
    kind: string,
  ): Promise<T> => {
    const cached = cache.get(symbol);
    if (cached) return cached;

    await refresh();
    const loaded = cache.get(symbol);
    if (!loaded) {
      throw new ExchangeError(`Unknown ${kind} ${symbol}`, "MARKET_NOT_FOUND", EXCHANGE);
    }
    return loaded;
  };

  return {
    get: (symbol) => lookup(markets, symbol, "market"),
    getAsset: (symbol) => lookup(assets, symbol, "asset"),
    refresh,
    list: () => [...markets.values()],
  };
};
