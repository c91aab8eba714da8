/**
 * Price and volume quantization to a market's tick size and lot size.
 */

/** Decimal places needed to write `value` exactly, e.g. 0.5 → 1, 1e-8 → 8 */
export const decimalPlaces = (value: number): number => {
  if (!Number.isFinite(value)) return 0;
  const text = Math.abs(value).toString();
  const exponent = /e-(\d+)$/.exec(text);
  if (exponent?.[1] !== undefined) {
    const mantissa = text.slice(0, text.indexOf("e"));
    return decimalPlaces(Number(mantissa)) + Number(exponent[1]);
  }
  const dot = text.indexOf(".");
  return dot === -1 ? 0 : text.length - dot - 1;
};

/** Nearest multiple of `tickSize` */
export const quantizePrice = (price: number, tickSize: number): number =>
  tickSize > 0 ? Math.round(price / tickSize) * tickSize : price;

/** Always at least one digit after the decimal point */
export const formatPrice = (price: number, precision: number): string =>
  price.toFixed(Math.max(precision, 1));

/** Nearest multiple of `lotSize`, written to the lot's own decimals */
export const quantizeVolume = (volume: number, lotSize: number): number => {
  if (!(lotSize > 0)) return Math.round(volume);
  const lots = Math.round(volume / lotSize);
  return Number((lots * lotSize).toFixed(decimalPlaces(lotSize)));
};
