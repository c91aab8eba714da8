/**
 * Incremental execution reconciliation from the trade history endpoint.
 *
 * Records are returned oldest first. When the cursor's trade is not among
 * them (pruned, or beyond the page), nothing is dropped and fills between
 * the cursor and the page start are missed without notice.
 */

import type { Logger } from "@/lib/logger";

import type { Execution, ExecutionBatch, ExecutionCursor, Market } from "../types";
import { parseSide } from "./normalizers";
import { ExecutionListSchema, type ExchangeExecution } from "./schemas";
import { unwrap, type Transport } from "./transport";

export const DEFAULT_EXECUTION_LOOKBACK_MS = 24 * 60 * 60 * 1000;

/** Page size requested per reconciliation pass */
export const EXECUTION_PAGE_SIZE = 500;

export interface ExecutionReconcilerDeps {
  transport: Transport;
  logger: Logger;
  /** How far back the first pass looks when there is no cursor */
  lookbackMs?: number;
  now?: () => number;
}

export interface ExecutionReconciler {
  executionsSince: (market: Market, cursor: ExecutionCursor | null) => Promise<ExecutionBatch>;
}

/** Rows after the cursor's trade, or every row when it is absent */
export const dropThroughCursor = (
  rows: ExchangeExecution[],
  cursor: ExecutionCursor | null,
): ExchangeExecution[] => {
  if (!cursor) return rows;
  const index = rows.findIndex((row) => row.execID === cursor.tradeId);
  return index === -1 ? rows : rows.slice(index + 1);
};

/** Null for administrative rows (funding, settlement) and incomplete fills */
export const parseExecution = (row: ExchangeExecution, market: Market): Execution | null => {
  const side = parseSide(row.side);
  if (side === null || row.lastQty == null || row.price == null || row.execCost == null) {
    return null;
  }
  const scale = 10 ** market.pricePrecision;
  const cost = Math.abs(row.execCost);
  return {
    orderId: row.orderID,
    tradeId: row.execID,
    symbol: row.symbol,
    side,
    price: row.price,
    quantity: row.lastQty,
    grossVolume: cost / scale,
    netVolume: (cost - (row.execComm ?? 0)) / scale,
    timestamp: new Date(row.timestamp),
  };
};

export const createExecutionReconciler = (deps: ExecutionReconcilerDeps): ExecutionReconciler => {
  const { transport, lookbackMs = DEFAULT_EXECUTION_LOOKBACK_MS, now = Date.now } = deps;
  const logger = deps.logger.child({ component: "executions" });

  const executionsSince = async (
    market: Market,
    cursor: ExecutionCursor | null,
  ): Promise<ExecutionBatch> => {
    const startTime = cursor ? cursor.timestamp : new Date(now() - lookbackMs);

    const rows = unwrap(
      await transport.request({
        verb: "GET",
        path: "execution/tradeHistory",
        params: {
          symbol: market.symbol,
          startTime: startTime.toISOString(),
          count: EXECUTION_PAGE_SIZE,
        },
        schema: ExecutionListSchema,
        signed: true,
      }),
      `Failed to fetch executions for ${market.symbol}`,
    );

    const executions: Execution[] = [];
    for (const row of dropThroughCursor(rows, cursor)) {
      const execution = parseExecution(row, market);
      if (execution) {
        executions.push(execution);
      }
    }

    const last = executions.at(-1);
    const next = last ? { tradeId: last.tradeId, timestamp: last.timestamp } : cursor;

    logger.debug("Executions reconciled", {
      symbol: market.symbol,
      received: rows.length,
      parsed: executions.length,
      ...(next && { cursor: next.tradeId }),
    });

    return { executions, cursor: next };
  };

  return { executionsSince };
};
