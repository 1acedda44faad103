// CHANGE: Compose rate limiting, circuit breaking and retries into one ordered chain.
// WHY: Every remote call passes the same stages: rate-limit-check → breaker-check → attempt → classify → retry-or-propagate.

import { AxiosResponse } from "axios";
import {
  CallDescriptor,
  CircuitOpenError,
  PermanentError,
  RemoteCallError,
  RetryExhaustedError
} from "../errors.js";
import { debug, warn } from "../logger.js";
import { normaliseHeaders } from "../utils/http.js";
import { CircuitBreaker, CircuitBreakerOptions, CircuitBreakerStatus } from "./circuit-breaker.js";
import { RateLimitOptions, RateLimitStatus, RateLimitTracker } from "./rate-limit.js";
import { RetryPolicy, TRANSIENT_STATUSES, computeBackoff, describeError, isTransientError } from "./retry.js";

/**
 * @property maxRateLimitWaits - Rate-limit waits allowed per call; they do not consume retries.
 * @property sleep - Injected for tests; defaults to a timer.
 * @property now - Millisecond clock.
 * @property random - Jitter source in [0, 1).
 */
export interface ResilienceOptions {
  readonly retry: RetryPolicy;
  readonly breaker: CircuitBreakerOptions;
  readonly rateLimit: RateLimitOptions;
  readonly maxRateLimitWaits: number;
  readonly sleep?: (delayMs: number) => Promise<void>;
  readonly now?: () => number;
  readonly random?: () => number;
}

export interface ResilienceStatus {
  readonly breaker: CircuitBreakerStatus;
  readonly rateLimit: RateLimitStatus;
}

type Attempt<T> =
  | { readonly ok: true; readonly response: AxiosResponse<T> }
  | { readonly ok: false; readonly error: unknown };

type Classification<T> =
  | { readonly kind: "success"; readonly response: AxiosResponse<T> }
  | { readonly kind: "rate-limited"; readonly waitMs: number; readonly status: number }
  | { readonly kind: "transient"; readonly reason: string; readonly status?: number };

function sleep(delayMs: number): Promise<void> {
  return new Promise(resolve => {
    setTimeout(resolve, delayMs);
  });
}

/**
 * Executes remote calls under one shared retry/breaker/rate-limit policy.
 *
 * Invariant: one instance per process and remote API, shared by every session.
 */
export class ResilientExecutor {
  readonly breaker: CircuitBreaker;
  readonly rateLimit: RateLimitTracker;
  private readonly sleep: (delayMs: number) => Promise<void>;
  private readonly now: () => number;
  private readonly random: () => number;

  constructor(private readonly options: ResilienceOptions) {
    this.breaker = new CircuitBreaker(options.breaker);
    this.rateLimit = new RateLimitTracker(options.rateLimit);
    this.sleep = options.sleep ?? sleep;
    this.now = options.now ?? Date.now;
    this.random = options.random ?? Math.random;
  }

  /**
   * Run `attempt` until it yields a non-transient response or the policy gives up.
   *
   * Non-transient responses (including 4xx) are returned for the caller to interpret.
   *
   * @throws CircuitOpenError when the breaker rejects the call; no attempt is made.
   * @throws RetryExhaustedError when transient failures outlast `maxRetries`.
   * @throws PermanentError when the attempt throws a non-transient error.
   */
  async execute<T>(call: CallDescriptor, attempt: () => Promise<AxiosResponse<T>>): Promise<AxiosResponse<T>> {
    let retries = 0;
    let rateLimitWaits = 0;
    for (;;) {
      await this.checkRateLimit();
      this.checkBreaker(call);
      const outcome = this.classify(await this.attempt(call, attempt));
      switch (outcome.kind) {
        case "success":
          this.breaker.recordSuccess();
          return outcome.response;
        case "rate-limited":
          this.breaker.recordNeutral();
          if (rateLimitWaits >= this.options.maxRateLimitWaits) {
            throw new RetryExhaustedError(call, retries + rateLimitWaits + 1, "rate limit still exceeded", {
              status: outcome.status
            });
          }
          rateLimitWaits += 1;
          await this.sleep(outcome.waitMs);
          break;
        case "transient":
          this.breaker.recordFailure(this.now());
          retries = await this.retryOrPropagate(call, retries, outcome);
          break;
      }
    }
  }

  status(): ResilienceStatus {
    const now = this.now();
    return { breaker: this.breaker.status(now), rateLimit: this.rateLimit.status(now) };
  }

  reset(): void {
    this.breaker.reset();
    this.rateLimit.reset();
  }

  private async checkRateLimit(): Promise<void> {
    const delay = this.rateLimit.delayBeforeRequest(this.now());
    if (delay > 0) {
      debug(`Rate limit quota low, delaying request ${delay}ms.`);
      await this.sleep(delay);
    }
  }

  private checkBreaker(call: CallDescriptor): void {
    const now = this.now();
    if (!this.breaker.tryAcquire(now)) {
      throw new CircuitOpenError(call, this.breaker.retryInMs(now));
    }
  }

  private async attempt<T>(call: CallDescriptor, attempt: () => Promise<AxiosResponse<T>>): Promise<Attempt<T>> {
    try {
      return { ok: true, response: await attempt() };
    } catch (error) {
      if (isTransientError(error)) {
        return { ok: false, error };
      }
      this.breaker.recordNeutral();
      if (error instanceof RemoteCallError) {
        throw error;
      }
      throw new PermanentError(call, describeError(error), { cause: error });
    }
  }

  private classify<T>(attempt: Attempt<T>): Classification<T> {
    if (!attempt.ok) {
      return { kind: "transient", reason: describeError(attempt.error) };
    }
    const { status } = attempt.response;
    const headers = normaliseHeaders(attempt.response.headers);
    this.rateLimit.update(headers);
    if (this.rateLimit.isRateLimited(status, headers)) {
      return { kind: "rate-limited", waitMs: this.rateLimit.delayAfterLimited(headers, this.now()), status };
    }
    if (TRANSIENT_STATUSES.has(status)) {
      return { kind: "transient", reason: `HTTP ${status}`, status };
    }
    return { kind: "success", response: attempt.response };
  }

  private async retryOrPropagate(
    call: CallDescriptor,
    retries: number,
    outcome: { readonly reason: string; readonly status?: number }
  ): Promise<number> {
    if (retries >= this.options.retry.maxRetries) {
      throw new RetryExhaustedError(call, retries + 1, outcome.reason, { status: outcome.status });
    }
    const delay = computeBackoff(this.options.retry, retries, this.random);
    warn(
      `${call.operation} ${call.resource}: ${outcome.reason}, retry ${retries + 1}/${this.options.retry.maxRetries} in ${delay}ms`
    );
    await this.sleep(delay);
    return retries + 1;
  }
}
