/**
 * Maker-only order placement and cancellation.
 *
 * Neither operation throws: every outcome, including transport failures,
 * comes back as a result value. Anomalies are also reported as advisory
 * events.
 */

import type { Logger } from "@/lib/logger";

import type { EventChannel } from "../events";
import type { CancelOfferResult, Market, Offer, PlacedOrder, PostOfferResult } from "../types";
import { sideToExchange } from "./normalizers";
import { formatPrice, quantizePrice, quantizeVolume } from "./quantize";
import { OrderListSchema, OrderSchema } from "./schemas";
import { describeFailure, type Transport } from "./transport";

/** Execution instruction that cancels instead of taking liquidity */
export const MAKER_ONLY_INSTRUCTION = "ParticipateDoNotInitiate";

export interface OrderManagerDeps {
  transport: Transport;
  events: EventChannel;
  logger: Logger;
}

export interface OrderManager {
  postOffer: (market: Market, offer: Offer) => Promise<PostOfferResult>;
  cancelOffer: (order: PlacedOrder) => Promise<CancelOfferResult>;
}

const NOT_FOUND_PATTERN = /not found/i;
const FILLED_PATTERN = /filled/i;

export const createOrderManager = (deps: OrderManagerDeps): OrderManager => {
  const { transport, events } = deps;
  const logger = deps.logger.child({ component: "orders" });

  const postOffer = async (market: Market, offer: Offer): Promise<PostOfferResult> => {
    const price = quantizePrice(offer.price, market.tickSize);
    const volume = quantizeVolume(offer.volume, market.lotSize);

    if (!(price > 0) || !(volume > 0)) {
      const reason = `Quantized price ${price} or volume ${volume} is not positive`;
      logger.warn("Offer rejected before submission", { symbol: market.symbol, reason });
      return { status: "REJECTED", reason };
    }

    const renderedPrice = formatPrice(price, market.pricePrecision);

    const result = await transport.request({
      verb: "POST",
      path: "order",
      params: {
        symbol: market.symbol,
        side: sideToExchange(offer.side),
        orderQty: volume,
        price: Number(renderedPrice),
        ordType: "Limit",
        execInst: MAKER_ONLY_INSTRUCTION,
      },
      schema: OrderSchema,
      signed: true,
    });

    if (!result.ok) {
      const reason = describeFailure(result);
      events.emit({ type: "UNEXPECTED_ORDER_STATUS", symbol: market.symbol, status: null, reason });
      return { status: "REJECTED", reason };
    }

    const { orderID, ordStatus, text } = result.payload;

    if (ordStatus === "New") {
      const order: PlacedOrder = {
        id: orderID,
        symbol: market.symbol,
        side: offer.side,
        price: Number(renderedPrice),
        volume,
        status: ordStatus,
      };
      logger.debug("Offer placed", { orderId: orderID, price: renderedPrice, volume });
      return { status: "PLACED", order };
    }

    if (ordStatus === "Canceled" && text?.includes(MAKER_ONLY_INSTRUCTION)) {
      logger.debug("Offer would have crossed the book", { orderId: orderID, price: renderedPrice });
      return { status: "POST_ONLY_REJECTED" };
    }

    const reason = `Unexpected order status ${ordStatus ?? "(none)"}${text ? `: ${text}` : ""}`;
    events.emit({
      type: "UNEXPECTED_ORDER_STATUS",
      symbol: market.symbol,
      status: ordStatus ?? null,
      reason,
    });
    return { status: "REJECTED", reason };
  };

  const cancelOffer = async (order: PlacedOrder): Promise<CancelOfferResult> => {
    const result = await transport.request({
      verb: "DELETE",
      path: "order",
      params: { orderID: order.id },
      schema: OrderListSchema,
      signed: true,
    });

    const unexpected = (status: string | null, reason: string): CancelOfferResult => {
      events.emit({
        type: "UNEXPECTED_CANCEL_STATUS",
        symbol: order.symbol,
        orderId: order.id,
        status,
        reason,
      });
      return { status: "UNEXPECTED", reason };
    };

    if (!result.ok) {
      if (result.kind === "CLIENT_ERROR") {
        const { message } = result.error;
        if (result.status === 404 || NOT_FOUND_PATTERN.test(message)) {
          return { status: "NOT_FOUND" };
        }
        if (FILLED_PATTERN.test(message)) {
          return { status: "ALREADY_FILLED" };
        }
      }
      return unexpected(null, describeFailure(result));
    }

    const [row] = result.payload;
    if (!row) {
      return { status: "NOT_FOUND" };
    }

    if (row.ordStatus === "Canceled") {
      logger.debug("Offer cancelled", { orderId: order.id });
      return { status: "CANCELLED" };
    }
    if (row.ordStatus === "Filled" || (row.error && FILLED_PATTERN.test(row.error))) {
      return { status: "ALREADY_FILLED" };
    }
    if (row.error && NOT_FOUND_PATTERN.test(row.error)) {
      return { status: "NOT_FOUND" };
    }

    return unexpected(
      row.ordStatus ?? null,
      `Unexpected cancel status ${row.ordStatus ?? "(none)"}${row.error ? `: ${row.error}` : ""}`,
    );
  };

  return { postOffer, cancelOffer };
};
