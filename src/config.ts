// CHANGE: Centralise configuration with environment validation.
// WHY: Timeouts, retry policy and breaker thresholds are shared by every session in the process.

import * as dotenv from "dotenv";
import { homedir } from "os";
import { join } from "path";
import { ConfigurationError } from "./errors.js";

dotenv.config();

function readInt(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  const value = Number.parseInt(raw, 10);
  if (!Number.isFinite(value) || value < 0) {
    throw new ConfigurationError(`${name} must be a non-negative integer, got "${raw}"`);
  }
  return value;
}

function readFloat(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  const value = Number.parseFloat(raw);
  if (!Number.isFinite(value) || value < 0 || value >= 1) {
    throw new ConfigurationError(`${name} must be a number in [0, 1), got "${raw}"`);
  }
  return value;
}

function readFlag(name: string, fallback: boolean): boolean {
  const raw = process.env[name];
  return raw === undefined || raw.trim() === "" ? fallback : raw.toLowerCase() === "true";
}

/**
 * Remote API locations. The upload host differs from the API host on GitHub.
 */
export const GITHUB = {
  API_URL: process.env.RELASSET_API_URL ?? "https://api.github.com",
  UPLOAD_URL: process.env.RELASSET_UPLOAD_URL ?? "https://uploads.github.com",
  API_VERSION: "2022-11-28"
} as const;

/**
 * Network-level configuration for HTTP operations.
 *
 * Invariant: `CONCURRENCY` is at least 1.
 */
export const NET = {
  CONNECT_TIMEOUT: readInt("HTTP_CONNECT_TIMEOUT", 30000),
  READ_TIMEOUT: readInt("HTTP_READ_TIMEOUT", 60000),
  MAX_REDIRECTS: readInt("HTTP_MAX_REDIRECTS", 5),
  FORWARD_AUTH_ON_REDIRECT: readFlag("RELASSET_FORWARD_AUTH_ON_REDIRECT", false),
  CONCURRENCY: Math.max(1, readInt("RELASSET_CONCURRENCY", 4))
} as const;

/**
 * Retry, circuit-breaker and rate-limit defaults.
 */
export const RESILIENCE = {
  MAX_RETRIES: readInt("RETRY_MAX", 3),
  BASE_DELAY_MS: readInt("RETRY_BASE_DELAY", 1000),
  MAX_DELAY_MS: readInt("RETRY_MAX_DELAY", 30000),
  JITTER: readFloat("RETRY_JITTER", 0.1),
  FAILURE_THRESHOLD: readInt("BREAKER_FAILURE_THRESHOLD", 5),
  COOLDOWN_MS: readInt("BREAKER_COOLDOWN", 60000),
  SUCCESS_THRESHOLD: readInt("BREAKER_SUCCESS_THRESHOLD", 3),
  RATE_LIMIT_MAX_WAIT_MS: readInt("RATE_LIMIT_MAX_WAIT", 300000),
  RATE_LIMIT_MAX_WAITS: readInt("RATE_LIMIT_MAX_WAITS", 5),
  THROTTLE_THRESHOLD: readInt("RATE_LIMIT_THROTTLE_THRESHOLD", 100)
} as const;

/**
 * Local archive cache location.
 */
export const CACHE = {
  ROOT: process.env.RELASSET_CACHE_DIR || join(homedir(), ".relasset", "repos")
} as const;

/**
 * Credential source: a token literal or a path to a file holding it.
 */
export const AUTH = {
  TOKEN: process.env.RELASSET_TOKEN ?? ""
} as const;
