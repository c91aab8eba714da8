import { describe, expect, it } from "vitest";

import { ProtocolViolationError } from "../errors";
import { createOrderBook } from "./order-book";

const AT = new Date("2024-01-01T00:00:00.000Z");

const seeded = () => {
  const book = createOrderBook("XBTUSD");
  book.apply("partial", [
    { id: 1, side: "bid", price: 100, size: 10 },
    { id: 2, side: "ask", price: 101, size: 5 },
  ]);
  return book;
};

describe("createOrderBook", () => {
  it("should apply partial, update and delete to a single bid", () => {
    const book = seeded();

    book.apply("update", [{ id: 1, side: "bid", size: 20 }]);
    book.apply("delete", [{ id: 2, side: "ask" }]);

    expect(book.snapshot(AT)).toEqual({
      symbol: "XBTUSD",
      asks: [],
      bids: [{ side: "bid", symbol: "XBTUSD", price: 100, volume: 20 }],
      timestamp: AT,
    });
  });

  it("should sort both sides ascending by price", () => {
    const book = createOrderBook("XBTUSD");
    book.apply("partial", [
      { id: "a", side: "ask", price: 103, size: 1 },
      { id: "b", side: "ask", price: 101, size: 1 },
      { id: "c", side: "bid", price: 98, size: 1 },
      { id: "d", side: "bid", price: 99, size: 1 },
    ]);

    const snapshot = book.snapshot(AT);
    expect(snapshot.asks.map((offer) => offer.price)).toEqual([101, 103]);
    expect(snapshot.bids.map((offer) => offer.price)).toEqual([98, 99]);
  });

  it("should take the price of an update from the stored entry", () => {
    const book = seeded();

    book.apply("update", [{ id: 1, side: "bid", size: 3, price: 555 }]);

    expect(book.get(1)).toEqual({
      price: 100,
      offer: { side: "bid", symbol: "XBTUSD", price: 100, volume: 3 },
    });
  });

  it("should insert new levels", () => {
    const book = seeded();

    book.apply("insert", [{ id: 3, side: "ask", price: 102, size: 8 }]);

    expect(book.size()).toBe(3);
    expect(book.snapshot(AT).asks.map((offer) => offer.price)).toEqual([101, 102]);
  });

  it("should key numeric and string ids the same way", () => {
    const book = seeded();

    book.apply("update", [{ id: "1", side: "bid", size: 4 }]);

    expect(book.get(1)?.offer.volume).toBe(4);
  });

  it("should ignore deletes of unknown ids", () => {
    const book = seeded();

    book.apply("delete", [{ id: 99, side: "bid" }]);

    expect(book.size()).toBe(2);
  });

  it("should never hold duplicate ids", () => {
    const book = seeded();

    book.apply("delete", [{ id: 1, side: "bid" }]);
    book.apply("insert", [{ id: 1, side: "bid", price: 99.5, size: 1 }]);
    book.apply("update", [{ id: 1, side: "bid", size: 2 }]);

    const snapshot = book.snapshot(AT);
    expect(book.size()).toBe(2);
    expect(snapshot.bids).toEqual([{ side: "bid", symbol: "XBTUSD", price: 99.5, volume: 2 }]);
  });

  describe("violations", () => {
    it("should reject a partial for a non-empty book", () => {
      const book = seeded();
      expect(() => book.apply("partial", [])).toThrow(ProtocolViolationError);
    });

    it("should reject an update for an unknown id", () => {
      const book = seeded();
      expect(() => book.apply("update", [{ id: 7, side: "bid", size: 1 }])).toThrow(
        "update for unknown id 7",
      );
    });

    it("should reject an insert without a price", () => {
      const book = seeded();
      expect(() => book.apply("insert", [{ id: 7, side: "bid", size: 1 }])).toThrow(
        "insert row 7 has no price",
      );
    });

    it("should reject an insert for an existing id", () => {
      const book = seeded();
      expect(() => book.apply("insert", [{ id: 1, side: "bid", price: 1, size: 1 }])).toThrow(
        "insert for existing id 1",
      );
    });

    it("should commit nothing when any row of a batch is invalid", () => {
      const book = seeded();
      const before = book.snapshot(AT);

      expect(() =>
        book.apply("update", [
          { id: 1, side: "bid", size: 50 },
          { id: 42, side: "bid", size: 1 },
        ]),
      ).toThrow(ProtocolViolationError);

      expect(book.snapshot(AT)).toEqual(before);
    });

    it("should leave the book empty when a partial is invalid", () => {
      const book = createOrderBook("XBTUSD");

      expect(() =>
        book.apply("partial", [
          { id: 1, side: "bid", price: 100, size: 1 },
          { id: 2, side: "ask", size: 1 },
        ]),
      ).toThrow("partial row 2 has no price");

      expect(book.size()).toBe(0);
    });
  });

  it("should see staged rows within the same batch", () => {
    const book = seeded();

    book.apply("insert", [
      { id: 3, side: "ask", price: 104, size: 1 },
    ]);
    book.apply("delete", [
      { id: 3, side: "ask" },
      { id: 3, side: "ask" },
    ]);

    expect(book.get(3)).toBeUndefined();
  });
});
