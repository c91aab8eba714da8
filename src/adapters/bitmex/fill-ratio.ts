import { QuoteFillRatioResponseSchema } from "./schemas";
import { unwrap, type Transport } from "./transport";

/**
 * Seven-day moving average quote fill ratios of the account.
 * Stateless; null and non-finite samples are dropped.
 */
export const sampleFillRatio = async (transport: Transport): Promise<number[]> => {
  const payload = unwrap(
    await transport.request({
      verb: "GET",
      path: "user/quoteFillRatio",
      schema: QuoteFillRatioResponseSchema,
      signed: true,
    }),
    "Failed to sample quote fill ratio",
  );

  const records = Array.isArray(payload) ? payload : [payload];
  return records
    .map((record) => record.quoteFillRatioMavg7)
    .filter((value): value is number => typeof value === "number" && Number.isFinite(value));
};
