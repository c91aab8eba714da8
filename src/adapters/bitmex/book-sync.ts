/**
 * Order book synchronizer for one market on one realtime socket.
 *
 * AWAITING_WELCOME → AWAITING_SUBSCRIBE_ACK → STREAMING, with CLOSED terminal
 * and reachable from every state. Any message that does not fit the current
 * state is a protocol violation: the stream emits a fatal event, closes its
 * socket and never resumes. A new synchronizer must be built instead.
 */

import * as v from "valibot";

import type { Logger } from "@/lib/logger";
import { createWebSocketManager, type WebSocketManager } from "@/lib/websocket";

import { ExchangeError, ProtocolViolationError } from "../errors";
import type { EventChannel } from "../events";
import type { BookSnapshot, BookStream, StreamState, StreamStats } from "../types";
import { sideFromExchange } from "./normalizers";
import { createOrderBook } from "./order-book";
import { SubscribeAckSchema, TableMessageSchema, WelcomeMessageSchema } from "./schemas";
import { EXCHANGE } from "./transport";

export const BOOK_TABLE = "orderBookL2";

export const DEFAULT_GREETING = "Welcome to the BitMEX Realtime API";

export const bookTopic = (symbol: string): string => `${BOOK_TABLE}:${symbol}`;

export interface BookSyncConfig {
  symbol: string;
  /** Realtime socket URL without query */
  wsUrl: string;
  events: EventChannel;
  logger: Logger;
  greeting?: string;
  now?: () => number;
  /** Prebuilt socket; one is created from `wsUrl` otherwise */
  socket?: WebSocketManager;
}

export interface BookSync extends BookStream {
  /** Open the socket; resolves once connected, before the snapshot arrives */
  start: () => Promise<void>;
  /** Apply one decoded socket message */
  handleMessage: (data: unknown) => void;
}

export const createBookSync = (config: BookSyncConfig): BookSync => {
  const { symbol, wsUrl, events, greeting = DEFAULT_GREETING, now = Date.now } = config;
  const logger = config.logger.child({ symbol, component: "book-sync" });
  const topic = bookTopic(symbol);
  const socket =
    config.socket ??
    createWebSocketManager({ url: `${wsUrl}?subscribe=${encodeURIComponent(topic)}` });

  const book = createOrderBook(symbol);
  let state: StreamState = "AWAITING_WELCOME";
  let messages = 0;
  let lastUpdate: number | null = null;
  let started = false;

  const setState = (next: StreamState): void => {
    if (state !== next) {
      logger.debug("Book stream state change", { from: state, to: next });
      state = next;
    }
  };

  const violate = (message: string, payload: unknown): void => {
    setState("CLOSED");
    events.emit({ type: "PROTOCOL_VIOLATION", symbol, message, payload });
    socket.close(1000, "protocol violation");
  };

  const handleWelcome = (data: unknown): void => {
    const parsed = v.safeParse(WelcomeMessageSchema, data);
    if (!parsed.success || !parsed.output.info.includes(greeting)) {
      throw new ProtocolViolationError("Expected welcome message", data);
    }
    setState("AWAITING_SUBSCRIBE_ACK");
  };

  const handleSubscribeAck = (data: unknown): void => {
    const parsed = v.safeParse(SubscribeAckSchema, data);
    if (!parsed.success || parsed.output.subscribe !== topic) {
      throw new ProtocolViolationError(`Expected subscribe acknowledgement for ${topic}`, data);
    }
    setState("STREAMING");
    logger.info("Book stream subscribed", { topic });
  };

  const handleTable = (data: unknown): void => {
    const parsed = v.safeParse(TableMessageSchema, data);
    if (!parsed.success) {
      throw new ProtocolViolationError("Malformed table message", data);
    }
    const { table, action, data: rows } = parsed.output;
    if (table !== BOOK_TABLE) {
      throw new ProtocolViolationError(`Unexpected table ${table}`, data);
    }
    book.apply(
      action,
      rows.map((row) => ({
        id: row.id,
        side: sideFromExchange(row.side),
        size: row.size,
        price: row.price,
      })),
    );
    messages++;
    lastUpdate = now();
  };

  const handleMessage = (data: unknown): void => {
    try {
      switch (state) {
        case "CLOSED":
          return;
        case "AWAITING_WELCOME":
          handleWelcome(data);
          return;
        case "AWAITING_SUBSCRIBE_ACK":
          handleSubscribeAck(data);
          return;
        case "STREAMING":
          handleTable(data);
          return;
      }
    } catch (error) {
      if (error instanceof ProtocolViolationError) {
        violate(error.message, error.payload ?? data);
        return;
      }
      throw error;
    }
  };

  const start = async (): Promise<void> => {
    if (started) {
      throw new ExchangeError(`Book stream for ${symbol} was already started`, "STREAM_CLOSED", EXCHANGE);
    }
    started = true;

    socket.onMessage(handleMessage);
    socket.onClose((code, reason, category) => {
      if (state === "CLOSED") return;
      setState("CLOSED");
      events.emit({ type: "STREAM_CLOSED", symbol, code, reason });
      logger.debug("Book stream closed remotely", { code, reason, category });
    });
    socket.onError((error) => {
      logger.warn("Book stream socket error", { message: error.message });
    });

    try {
      await socket.connect();
    } catch (error) {
      setState("CLOSED");
      throw new ExchangeError(
        `Failed to open book stream for ${symbol}`,
        "NETWORK_ERROR",
        EXCHANGE,
        error,
      );
    }
  };

  const getBook = (): BookSnapshot => book.snapshot(new Date(lastUpdate ?? now()));

  const getStats = (): StreamStats => ({ state, messages, levels: book.size() });

  const close = (): void => {
    if (state === "CLOSED") return;
    setState("CLOSED");
    socket.close(1000, "closed by owner");
  };

  return {
    symbol,
    start,
    handleMessage,
    getState: () => state,
    getBook,
    getStats,
    close,
  };
};
