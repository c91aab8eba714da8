// Circuit breaker
export {
  CircuitOpenError,
  createCircuitBreaker,
  DEFAULT_CIRCUIT_BREAKER_CONFIG,
  type CircuitBreaker,
  type CircuitBreakerConfig,
  type CircuitBreakerState,
} from "./circuit-breaker";

// Quota throttle
export {
  createQuotaThrottle,
  DEFAULT_THROTTLE_EPSILON,
  throttleDelayMs,
  type QuotaThrottle,
  type QuotaThrottleConfig,
  type RateLimitState,
} from "./quota-throttle";
