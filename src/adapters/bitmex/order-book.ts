/**
 * In-memory L2 order book keyed by the exchange's opaque level id.
 *
 * Every message is applied as one batch: rows are validated and staged
 * against the committed map, then committed in a single synchronous step.
 * A batch with any invalid row commits nothing.
 */

import { ProtocolViolationError } from "../errors";
import type { BookSide, BookSnapshot, Offer } from "../types";
import { byPriceAscending } from "./normalizers";

export type BookAction = "partial" | "insert" | "update" | "delete";

export interface BookRow {
  id: number | string;
  side: BookSide;
  size?: number | null;
  price?: number | null;
}

export interface OrderBookEntry {
  price: number;
  offer: Offer;
}

export interface OrderBook {
  /** Apply one message's rows atomically; throws ProtocolViolationError */
  apply: (action: BookAction, rows: readonly BookRow[]) => void;
  snapshot: (timestamp: Date) => BookSnapshot;
  size: () => number;
  get: (id: number | string) => OrderBookEntry | undefined;
}

const entryFor = (symbol: string, side: BookSide, price: number, size: number): OrderBookEntry => ({
  price,
  offer: { side, symbol, price, volume: size },
});

export const createOrderBook = (symbol: string): OrderBook => {
  let entries = new Map<string, OrderBookEntry>();

  const requireNumber = (
    value: number | null | undefined,
    field: string,
    action: BookAction,
    row: BookRow,
  ): number => {
    if (typeof value !== "number" || !Number.isFinite(value)) {
      throw new ProtocolViolationError(`${action} row ${row.id} has no ${field}`, row);
    }
    return value;
  };

  const applyPartial = (rows: readonly BookRow[]): void => {
    if (entries.size > 0) {
      throw new ProtocolViolationError("partial received for a non-empty book");
    }
    const next = new Map<string, OrderBookEntry>();
    for (const row of rows) {
      const price = requireNumber(row.price, "price", "partial", row);
      const size = requireNumber(row.size, "size", "partial", row);
      next.set(String(row.id), entryFor(symbol, row.side, price, size));
    }
    entries = next;
  };

  const applyDiff = (action: Exclude<BookAction, "partial">, rows: readonly BookRow[]): void => {
    // null marks a staged delete
    const staged = new Map<string, OrderBookEntry | null>();
    const lookup = (key: string): OrderBookEntry | undefined => {
      if (staged.has(key)) {
        return staged.get(key) ?? undefined;
      }
      return entries.get(key);
    };

    for (const row of rows) {
      const key = String(row.id);
      const existing = lookup(key);

      switch (action) {
        case "insert": {
          if (existing) {
            throw new ProtocolViolationError(`insert for existing id ${row.id}`, row);
          }
          const price = requireNumber(row.price, "price", action, row);
          const size = requireNumber(row.size, "size", action, row);
          staged.set(key, entryFor(symbol, row.side, price, size));
          break;
        }
        case "update": {
          if (!existing) {
            throw new ProtocolViolationError(`update for unknown id ${row.id}`, row);
          }
          const size = requireNumber(row.size, "size", action, row);
          staged.set(key, entryFor(symbol, row.side, existing.price, size));
          break;
        }
        case "delete":
          if (existing) {
            staged.set(key, null);
          }
          break;
      }
    }

    for (const [key, entry] of staged) {
      if (entry === null) {
        entries.delete(key);
      } else {
        entries.set(key, entry);
      }
    }
  };

  return {
    apply: (action, rows) => {
      if (action === "partial") {
        applyPartial(rows);
      } else {
        applyDiff(action, rows);
      }
    },

    snapshot: (timestamp) => {
      const asks: Offer[] = [];
      const bids: Offer[] = [];
      for (const { offer } of entries.values()) {
        (offer.side === "ask" ? asks : bids).push(offer);
      }
      return {
        symbol,
        asks: asks.sort(byPriceAscending),
        bids: bids.sort(byPriceAscending),
        timestamp,
      };
    },

    size: () => entries.size,

    get: (id) => entries.get(String(id)),
  };
};
