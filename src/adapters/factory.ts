/**
 * Factory function for creating exchange connectors.
 */

import { createBitmexConnector, type BitmexConnectorDeps } from "./bitmex";
import type { ConnectorConfig } from "./config";
import type { ExchangeConnector } from "./types";

/**
 * Create an exchange connector based on configuration.
 *
 * @param config - Validated connector configuration
 */
export const createExchangeConnector = (
  config: ConnectorConfig,
  deps: BitmexConnectorDeps = {},
): ExchangeConnector => {
  switch (config.exchange) {
    case "bitmex":
      return createBitmexConnector(config, deps);
  }
};
