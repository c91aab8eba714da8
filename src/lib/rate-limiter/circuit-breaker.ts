/**
 * Circuit breaker wrapper around cockatiel library.
 *
 * - CLOSED: requests pass through
 * - OPEN: after `failureThreshold` consecutive failures, requests fail fast
 * - HALF_OPEN: after `resetTimeoutMs`, one trial request decides the next state
 */

import {
  BrokenCircuitError,
  CircuitState,
  ConsecutiveBreaker,
  circuitBreaker,
  handleAll,
} from "cockatiel";

export type CircuitBreakerState = "CLOSED" | "OPEN" | "HALF_OPEN";

export interface CircuitBreakerConfig {
  /** Number of consecutive failures before opening circuit */
  failureThreshold: number;
  /** Time in ms before attempting HALF_OPEN from OPEN */
  resetTimeoutMs: number;
}

export interface CircuitBreaker {
  /** Execute a function through the circuit breaker */
  execute: <T>(fn: () => Promise<T>) => Promise<T>;
  getState: () => CircuitBreakerState;
  /** Subscribe to state change events */
  onStateChange: (callback: (state: CircuitBreakerState) => void) => () => void;
}

export const DEFAULT_CIRCUIT_BREAKER_CONFIG: CircuitBreakerConfig = {
  failureThreshold: 5,
  resetTimeoutMs: 30000,
};

/**
 * Error thrown when circuit is open.
 */
export class CircuitOpenError extends Error {
  constructor(message = "Circuit breaker is open") {
    super(message);
    this.name = "CircuitOpenError";
  }
}

const mapCircuitState = (state: CircuitState): CircuitBreakerState => {
  switch (state) {
    case CircuitState.Open:
    case CircuitState.Isolated:
      return "OPEN";
    case CircuitState.HalfOpen:
      return "HALF_OPEN";
    default:
      return "CLOSED";
  }
};

/**
 * Creates a circuit breaker using cockatiel.
 *
 * @example
 * ```typescript
 * const breaker = createCircuitBreaker({
 *   failureThreshold: 5,
 *   resetTimeoutMs: 30000,
 * });
 *
 * const response = await breaker.execute(() => fetch(url));
 * ```
 */
export const createCircuitBreaker = (
  config: CircuitBreakerConfig = DEFAULT_CIRCUIT_BREAKER_CONFIG,
): CircuitBreaker => {
  const { failureThreshold, resetTimeoutMs } = config;

  const breaker = circuitBreaker(handleAll, {
    halfOpenAfter: resetTimeoutMs,
    breaker: new ConsecutiveBreaker(failureThreshold),
  });

  const stateChangeListeners = new Set<(state: CircuitBreakerState) => void>();

  breaker.onStateChange((state) => {
    const mappedState = mapCircuitState(state);
    for (const listener of stateChangeListeners) {
      listener(mappedState);
    }
  });

  const execute = async <T>(fn: () => Promise<T>): Promise<T> => {
    try {
      return await breaker.execute(fn);
    } catch (error) {
      if (error instanceof BrokenCircuitError) {
        throw new CircuitOpenError(`Circuit breaker is open after ${failureThreshold} failures`);
      }
      throw error;
    }
  };

  return {
    execute,
    getState: () => mapCircuitState(breaker.state),
    onStateChange: (callback) => {
      stateChangeListeners.add(callback);
      return () => {
        stateChangeListeners.delete(callback);
      };
    },
  };
};
