/**
 * Consecutive-failure circuit breaker for spreadsheet calls, built on
 * cockatiel. OPEN fails fast; after `resetTimeoutMs` one trial call is let
 * through (HALF_OPEN).
 */

import { BrokenCircuitError, CircuitState, ConsecutiveBreaker, circuitBreaker, handleAll } from "cockatiel";

export type CircuitBreakerState = "CLOSED" | "OPEN" | "HALF_OPEN";

export interface CircuitBreakerConfig {
  failureThreshold: number;
  resetTimeoutMs: number;
  onStateChange?: (state: CircuitBreakerState) => void;
}

export interface CircuitBreaker {
  execute: <T>(fn: () => Promise<T>) => Promise<T>;
  getState: () => CircuitBreakerState;
}

export const DEFAULT_CIRCUIT_BREAKER_CONFIG: CircuitBreakerConfig = {
  failureThreshold: 5,
  resetTimeoutMs: 30_000,
};

export class CircuitOpenError extends Error {
  public override readonly name = "CircuitOpenError";
}

const toState = (state: CircuitState): CircuitBreakerState => {
  if (state === CircuitState.HalfOpen) {
    return "HALF_OPEN";
  }
  return state === CircuitState.Open || state === CircuitState.Isolated ? "OPEN" : "CLOSED";
};

export const createCircuitBreaker = (
  config: CircuitBreakerConfig = DEFAULT_CIRCUIT_BREAKER_CONFIG,
): CircuitBreaker => {
  const { failureThreshold, resetTimeoutMs, onStateChange } = config;

  const breaker = circuitBreaker(handleAll, {
    halfOpenAfter: resetTimeoutMs,
    breaker: new ConsecutiveBreaker(failureThreshold),
  });

  if (onStateChange) {
    breaker.onStateChange((state) => {
      onStateChange(toState(state));
    });
  }

  return {
    execute: async (fn) => {
      try {
        return await breaker.execute(fn);
      } catch (error) {
        if (error instanceof BrokenCircuitError) {
          throw new CircuitOpenError(
            `Spreadsheet circuit open after ${failureThreshold} consecutive failures`,
            { cause: error },
          );
        }
        throw error;
      }
    },
    getState: () => toState(breaker.state),
  };
};
