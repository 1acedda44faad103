// CHANGE: Track the remote API quota from response headers and compute waits.
// WHY: The quota belongs to the credential and host, so one tracker serves every endpoint.

import { debug } from "../logger.js";

const DEFAULT_LIMITED_WAIT_MS = 60000;
const MIN_THROTTLE_MS = 100;
const MAX_THROTTLE_MS = 5000;

/**
 * @property maxWaitMs - Ceiling for any single rate-limit wait.
 * @property throttleThreshold - Remaining quota below which requests are spread until reset.
 */
export interface RateLimitOptions {
  readonly maxWaitMs: number;
  readonly throttleThreshold: number;
}

export interface RateLimitStatus {
  readonly remaining?: number;
  readonly limit?: number;
  readonly resetAt?: number;
  readonly limited: boolean;
}

function parseHeaderInt(value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : undefined;
}

/**
 * Remaining-quota tracker fed by `x-ratelimit-*` headers.
 */
export class RateLimitTracker {
  private remaining?: number;
  private limit?: number;
  private resetAtMs?: number;

  constructor(private readonly options: RateLimitOptions) {}

  /**
   * Record quota headers of any response. Unparseable values keep the previous state.
   */
  update(headers: Readonly<Record<string, string>>): void {
    const remaining = parseHeaderInt(headers["x-ratelimit-remaining"]);
    const limit = parseHeaderInt(headers["x-ratelimit-limit"]);
    const reset = parseHeaderInt(headers["x-ratelimit-reset"]);
    if (remaining !== undefined) {
      this.remaining = remaining;
    }
    if (limit !== undefined) {
      this.limit = limit;
    }
    if (reset !== undefined) {
      this.resetAtMs = reset * 1000;
    }
  }

  /**
   * Delay to honour before the next request given the cached quota.
   */
  delayBeforeRequest(now: number): number {
    if (this.remaining === undefined || this.resetAtMs === undefined || now >= this.resetAtMs) {
      return 0;
    }
    const untilReset = this.resetAtMs - now;
    if (this.remaining <= 0) {
      return Math.min(untilReset, this.options.maxWaitMs);
    }
    if (this.remaining < this.options.throttleThreshold) {
      const spread = Math.floor(untilReset / this.remaining);
      return Math.min(Math.max(spread, MIN_THROTTLE_MS), MAX_THROTTLE_MS);
    }
    return 0;
  }

  /**
   * Whether a response reports that the quota is exceeded.
   */
  isRateLimited(status: number, headers: Readonly<Record<string, string>>): boolean {
    if (status === 429) {
      return true;
    }
    if (status !== 403) {
      return false;
    }
    return headers["retry-after"] !== undefined || headers["x-ratelimit-remaining"] === "0";
  }

  /**
   * Wait prescribed by a rate-limited response: `Retry-After` first, then the reset time.
   */
  delayAfterLimited(headers: Readonly<Record<string, string>>, now: number): number {
    const retryAfter = headers["retry-after"];
    let wait: number | undefined;
    if (retryAfter !== undefined) {
      const seconds = Number(retryAfter);
      if (Number.isFinite(seconds)) {
        wait = Math.max(0, seconds * 1000);
      } else {
        const date = Date.parse(retryAfter);
        wait = Number.isNaN(date) ? undefined : Math.max(0, date - now);
      }
    }
    if (wait === undefined && this.resetAtMs !== undefined && this.resetAtMs > now) {
      wait = this.resetAtMs - now;
    }
    const bounded = Math.min(wait ?? DEFAULT_LIMITED_WAIT_MS, this.options.maxWaitMs);
    debug(`Rate limit exceeded, waiting ${bounded}ms.`);
    return bounded;
  }

  status(now: number): RateLimitStatus {
    return {
      remaining: this.remaining,
      limit: this.limit,
      resetAt: this.resetAtMs,
      limited: this.remaining !== undefined && this.remaining <= 0 && this.resetAtMs !== undefined && now < this.resetAtMs
    };
  }

  reset(): void {
    this.remaining = undefined;
    this.limit = undefined;
    this.resetAtMs = undefined;
  }
}
