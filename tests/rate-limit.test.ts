// CHANGE: Verify rate-limit header tracking and the waits it computes.
// WHY: Waiting out the quota must not consume retries or block longer than the configured bound.

import { describe, expect, it } from "vitest";
import { RateLimitTracker } from "../src/resilience/rate-limit.js";

function createTracker(maxWaitMs = 300000): RateLimitTracker {
  return new RateLimitTracker({ maxWaitMs, throttleThreshold: 100 });
}

describe("RateLimitTracker.delayBeforeRequest", () => {
  it("does not delay without quota information", () => {
    expect(createTracker().delayBeforeRequest(0)).toBe(0);
  });

  it("waits until the reset time when the quota is exhausted", () => {
    const tracker = createTracker();
    tracker.update({ "x-ratelimit-remaining": "0", "x-ratelimit-reset": "100" });
    expect(tracker.delayBeforeRequest(40000)).toBe(60000);
    expect(tracker.delayBeforeRequest(100000)).toBe(0);
  });

  it("bounds the wait by maxWaitMs", () => {
    const tracker = createTracker();
    tracker.update({ "x-ratelimit-remaining": "0", "x-ratelimit-reset": "1000" });
    expect(tracker.delayBeforeRequest(0)).toBe(300000);
  });

  it("spreads requests when the quota runs low", () => {
    const tracker = createTracker();
    tracker.update({ "x-ratelimit-remaining": "50", "x-ratelimit-reset": "100" });
    expect(tracker.delayBeforeRequest(0)).toBe(2000);
    tracker.update({ "x-ratelimit-remaining": "1" });
    expect(tracker.delayBeforeRequest(0)).toBe(5000);
    tracker.update({ "x-ratelimit-remaining": "99", "x-ratelimit-reset": "1" });
    expect(tracker.delayBeforeRequest(0)).toBe(100);
  });

  it("keeps the previous state when headers are unparseable", () => {
    const tracker = createTracker();
    tracker.update({ "x-ratelimit-remaining": "0", "x-ratelimit-reset": "10" });
    tracker.update({ "x-ratelimit-remaining": "many" });
    expect(tracker.status(0)).toEqual({ remaining: 0, limit: undefined, resetAt: 10000, limited: true });
  });
});

describe("RateLimitTracker.isRateLimited", () => {
  it.each([
    [429, {}, true],
    [403, {}, false],
    [403, { "retry-after": "5" }, true],
    [403, { "x-ratelimit-remaining": "0" }, true],
    [500, { "retry-after": "5" }, false]
  ])("status %i with %o is %s", (status, headers, expected) => {
    expect(createTracker().isRateLimited(status, headers)).toBe(expected);
  });
});

describe("RateLimitTracker.delayAfterLimited", () => {
  it("honours Retry-After in seconds", () => {
    expect(createTracker().delayAfterLimited({ "retry-after": "5" }, 0)).toBe(5000);
  });

  it("honours Retry-After as an HTTP date", () => {
    const retryAt = new Date(30000).toUTCString();
    expect(createTracker().delayAfterLimited({ "retry-after": retryAt }, 10000)).toBe(20000);
  });

  it("falls back to the reset time, then to one minute", () => {
    const tracker = createTracker();
    expect(tracker.delayAfterLimited({}, 0)).toBe(60000);
    tracker.update({ "x-ratelimit-reset": "50" });
    expect(tracker.delayAfterLimited({}, 20000)).toBe(30000);
  });

  it("never exceeds maxWaitMs", () => {
    expect(createTracker(1000).delayAfterLimited({ "retry-after": "120" }, 0)).toBe(1000);
  });
});
