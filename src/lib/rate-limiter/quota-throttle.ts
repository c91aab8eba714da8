/**
 * Quota-driven self-throttle.
 *
 * Every REST response reports the remaining request quota in
 * `x-ratelimit-*` headers. After each response the caller sleeps
 * `ceil(1 / max(remaining, epsilon))` seconds, so the pause grows as the
 * quota drains and never reaches zero.
 */

export interface RateLimitState {
  /** Requests left in the current window, null until first observed */
  remaining: number | null;
  /** Window size reported by the exchange */
  limit: number | null;
  /** Unix ms when the window resets */
  resetAt: number | null;
  /** Unix ms of the last observation */
  observedAt: number | null;
}

export interface QuotaThrottleConfig {
  /** Floor applied to the remaining quota before inverting it */
  epsilon: number;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

export interface QuotaThrottle {
  /** Record quota headers from a response; absent headers keep the previous value */
  observe: (headers: Headers) => void;
  /** Sleep duration implied by the current state */
  delayMs: () => number;
  /** Sleep for `delayMs()` and resolve with the duration slept */
  wait: () => Promise<number>;
  getState: () => RateLimitState;
}

export const DEFAULT_THROTTLE_EPSILON = 0.1;

/** Quota assumed before the first response has been observed */
const UNOBSERVED_REMAINING = 1;

export const throttleDelayMs = (remaining: number, epsilon = DEFAULT_THROTTLE_EPSILON): number =>
  Math.ceil(1 / Math.max(remaining, epsilon)) * 1000;

const parseHeaderNumber = (headers: Headers, name: string): number | null => {
  const raw = headers.get(name);
  if (raw === null || raw.trim() === "") return null;
  const value = Number(raw);
  return Number.isFinite(value) ? value : null;
};

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

export const createQuotaThrottle = (config: QuotaThrottleConfig): QuotaThrottle => {
  const { epsilon, sleep = defaultSleep, now = Date.now } = config;

  let state: RateLimitState = {
    remaining: null,
    limit: null,
    resetAt: null,
    observedAt: null,
  };

  const observe = (headers: Headers): void => {
    const remaining = parseHeaderNumber(headers, "x-ratelimit-remaining");
    const limit = parseHeaderNumber(headers, "x-ratelimit-limit");
    const reset = parseHeaderNumber(headers, "x-ratelimit-reset");

    state = {
      remaining: remaining ?? state.remaining,
      limit: limit ?? state.limit,
      // header carries unix seconds
      resetAt: reset !== null ? reset * 1000 : state.resetAt,
      observedAt: now(),
    };
  };

  const delayMs = (): number => throttleDelayMs(state.remaining ?? UNOBSERVED_REMAINING, epsilon);

  const wait = async (): Promise<number> => {
    const ms = delayMs();
    await sleep(ms);
    return ms;
  };

  return {
    observe,
    delayMs,
    wait,
    getState: () => ({ ...state }),
  };
};
