/**
 * Structured connector events.
 *
 * Fatal events end the life of the stream that raised them; advisory events
 * report anomalies the caller may retry or ignore.
 */

import type { Logger } from "@/lib/logger";
import { toError } from "@/lib/logger";

export type EventSeverity = "fatal" | "advisory";

export type ConnectorEventBody =
  | {
      type: "PROTOCOL_VIOLATION";
      symbol: string;
      message: string;
      payload?: unknown;
    }
  | {
      type: "STREAM_CLOSED";
      symbol: string;
      code: number;
      reason: string;
    }
  | {
      type: "UNEXPECTED_ORDER_STATUS";
      symbol: string;
      /** Exchange order status, null when the request itself failed */
      status: string | null;
      reason: string;
    }
  | {
      type: "UNEXPECTED_CANCEL_STATUS";
      symbol: string;
      orderId: string;
      status: string | null;
      reason: string;
    };

export type ConnectorEventType = ConnectorEventBody["type"];

export type ConnectorEvent = ConnectorEventBody & {
  severity: EventSeverity;
  exchange: string;
  timestamp: Date;
};

export const EVENT_SEVERITY: Record<ConnectorEventType, EventSeverity> = {
  PROTOCOL_VIOLATION: "fatal",
  STREAM_CLOSED: "fatal",
  UNEXPECTED_ORDER_STATUS: "advisory",
  UNEXPECTED_CANCEL_STATUS: "advisory",
};

export interface EventChannel {
  /** Stamp, log and deliver an event to every subscriber */
  emit: (body: ConnectorEventBody) => ConnectorEvent;
  subscribe: (handler: (event: ConnectorEvent) => void) => () => void;
}

export interface EventChannelConfig {
  exchange: string;
  logger: Logger;
  now?: () => number;
}

export const createEventChannel = (config: EventChannelConfig): EventChannel => {
  const { exchange, logger, now = Date.now } = config;
  const handlers = new Set<(event: ConnectorEvent) => void>();

  const emit = (body: ConnectorEventBody): ConnectorEvent => {
    const event: ConnectorEvent = {
      ...body,
      severity: EVENT_SEVERITY[body.type],
      exchange,
      timestamp: new Date(now()),
    };

    const { timestamp: _timestamp, ...context } = event;
    if (event.severity === "fatal") {
      logger.error(`Connector event ${event.type}`, undefined, context);
    } else {
      logger.warn(`Connector event ${event.type}`, context);
    }

    for (const handler of handlers) {
      try {
        handler(event);
      } catch (error) {
        logger.error("Connector event handler failed", toError(error), { type: event.type });
      }
    }
    return event;
  };

  return {
    emit,
    subscribe: (handler) => {
      handlers.add(handler);
      return () => {
        handlers.delete(handler);
      };
    },
  };
};
