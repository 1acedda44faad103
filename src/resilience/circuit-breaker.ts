// CHANGE: Circuit breaker guarding the remote API.
// WHY: Repeated transient failures must stop hitting the API until a cooldown has elapsed.

import { debug, warn } from "../logger.js";

export type CircuitState = "CLOSED" | "OPEN" | "HALF_OPEN";

/**
 * @property failureThreshold - Consecutive failures that open the circuit.
 * @property cooldownMs - Time spent OPEN before a trial call is admitted.
 * @property successThreshold - Consecutive trial successes that close the circuit.
 */
export interface CircuitBreakerOptions {
  readonly failureThreshold: number;
  readonly cooldownMs: number;
  readonly successThreshold: number;
}

export interface CircuitBreakerStatus {
  readonly state: CircuitState;
  readonly failures: number;
  readonly successes: number;
  readonly retryInMs: number;
}

/**
 * CLOSED → OPEN → HALF_OPEN → CLOSED state machine.
 *
 * Invariant: in HALF_OPEN at most one trial call is in flight.
 */
export class CircuitBreaker {
  private state: CircuitState = "CLOSED";
  private failures = 0;
  private successes = 0;
  private openedAt = 0;
  private trialInFlight = false;

  constructor(private readonly options: CircuitBreakerOptions) {}

  /**
   * Ask permission for one call. A `true` answer must be followed by exactly one record call.
   */
  tryAcquire(now: number): boolean {
    if (this.state === "CLOSED") {
      return true;
    }
    if (this.state === "OPEN") {
      if (now - this.openedAt < this.options.cooldownMs) {
        return false;
      }
      this.transition("HALF_OPEN");
      this.successes = 0;
    }
    if (this.trialInFlight) {
      return false;
    }
    this.trialInFlight = true;
    return true;
  }

  recordSuccess(): void {
    this.trialInFlight = false;
    if (this.state === "HALF_OPEN") {
      this.successes += 1;
      if (this.successes >= this.options.successThreshold) {
        this.transition("CLOSED");
        this.failures = 0;
        this.successes = 0;
      }
      return;
    }
    this.failures = 0;
  }

  recordFailure(now: number): void {
    this.trialInFlight = false;
    if (this.state === "HALF_OPEN") {
      this.open(now, "trial call failed");
      return;
    }
    this.failures += 1;
    if (this.state === "CLOSED" && this.failures >= this.options.failureThreshold) {
      this.open(now, `${this.failures} consecutive failure(s)`);
    }
  }

  /**
   * Release an acquired slot without counting the outcome (rate-limited or aborted calls).
   */
  recordNeutral(): void {
    this.trialInFlight = false;
  }

  retryInMs(now: number): number {
    return this.state === "OPEN" ? Math.max(0, this.options.cooldownMs - (now - this.openedAt)) : 0;
  }

  status(now: number): CircuitBreakerStatus {
    return {
      state: this.state,
      failures: this.failures,
      successes: this.successes,
      retryInMs: this.retryInMs(now)
    };
  }

  reset(): void {
    this.state = "CLOSED";
    this.failures = 0;
    this.successes = 0;
    this.openedAt = 0;
    this.trialInFlight = false;
  }

  private open(now: number, reason: string): void {
    this.openedAt = now;
    this.successes = 0;
    this.transition("OPEN");
    warn(`Circuit breaker opened (${reason}); cooling down ${this.options.cooldownMs}ms.`);
  }

  private transition(next: CircuitState): void {
    if (this.state !== next) {
      debug(`Circuit breaker ${this.state} -> ${next}`);
      this.state = next;
    }
  }
}
