// CHANGE: Exponential backoff policy with jitter and transient-failure classification.
// WHY: Only timeouts, resets and gateway errors are worth repeating against the release API.

import { isAxiosError } from "axios";

/**
 * @property maxRetries - Additional attempts after the first one.
 * @property jitter - Fraction of the exponential delay added or removed at random.
 */
export interface RetryPolicy {
  readonly maxRetries: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
  readonly jitter: number;
}

export const TRANSIENT_STATUSES: ReadonlySet<number> = new Set([502, 503, 504]);

const TRANSIENT_ERROR_CODES: ReadonlySet<string> = new Set([
  "ECONNRESET",
  "ETIMEDOUT",
  "ECONNABORTED",
  "ECONNREFUSED",
  "EPIPE",
  "EAI_AGAIN",
  "ESOCKETTIMEDOUT"
]);

/**
 * Delay before retry number `attempt` (0-based).
 *
 * Invariant: result lies in `[base·2^n·(1-jitter), base·2^n·(1+jitter)]` and never exceeds `maxDelayMs`.
 *
 * @param random - Uniform source in [0, 1).
 */
export function computeBackoff(policy: RetryPolicy, attempt: number, random: () => number = Math.random): number {
  const exponential = policy.baseDelayMs * 2 ** attempt;
  const spread = (random() * 2 - 1) * policy.jitter;
  const delay = Math.round(exponential * (1 + spread));
  return Math.max(0, Math.min(delay, policy.maxDelayMs));
}

function errorCode(error: unknown): string | undefined {
  if (isAxiosError(error)) {
    return error.code;
  }
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

/**
 * Whether a thrown error is a network-level failure that may succeed on retry.
 */
export function isTransientError(error: unknown): boolean {
  const code = errorCode(error);
  return code !== undefined && TRANSIENT_ERROR_CODES.has(code);
}

export function describeError(error: unknown): string {
  const code = errorCode(error);
  const message = error instanceof Error ? error.message : String(error);
  return code ? `${code}: ${message}` : message;
}
