// CHANGE: Resolve resilience settings and build the shared executor.
// WHY: One executor per process keeps breaker and rate-limit state common to every endpoint of the API.

import { RESILIENCE } from "../config.js";
import { ResilienceOptions, ResilientExecutor } from "./executor.js";

export type { CircuitBreakerOptions, CircuitBreakerStatus, CircuitState } from "./circuit-breaker.js";
export { CircuitBreaker } from "./circuit-breaker.js";
export type { RateLimitOptions, RateLimitStatus } from "./rate-limit.js";
export { RateLimitTracker } from "./rate-limit.js";
export type { RetryPolicy } from "./retry.js";
export { computeBackoff, isTransientError, TRANSIENT_STATUSES } from "./retry.js";
export type { ResilienceOptions, ResilienceStatus } from "./executor.js";
export { ResilientExecutor } from "./executor.js";

/**
 * Resilience settings resolved from the environment.
 */
export function defaultResilienceOptions(): ResilienceOptions {
  return {
    retry: {
      maxRetries: RESILIENCE.MAX_RETRIES,
      baseDelayMs: RESILIENCE.BASE_DELAY_MS,
      maxDelayMs: RESILIENCE.MAX_DELAY_MS,
      jitter: RESILIENCE.JITTER
    },
    breaker: {
      failureThreshold: RESILIENCE.FAILURE_THRESHOLD,
      cooldownMs: RESILIENCE.COOLDOWN_MS,
      successThreshold: RESILIENCE.SUCCESS_THRESHOLD
    },
    rateLimit: {
      maxWaitMs: RESILIENCE.RATE_LIMIT_MAX_WAIT_MS,
      throttleThreshold: RESILIENCE.THROTTLE_THRESHOLD
    },
    maxRateLimitWaits: RESILIENCE.RATE_LIMIT_MAX_WAITS
  };
}

/**
 * Build the executor a process shares across all endpoints of one remote API.
 */
export function createResilientExecutor(overrides: Partial<ResilienceOptions> = {}): ResilientExecutor {
  return new ResilientExecutor({ ...defaultResilienceOptions(), ...overrides });
}
