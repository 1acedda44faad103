// CHANGE: Shared wiring of the repository against the in-process release API.
// WHY: Every integration test needs the same client, executor and throwaway cache directory.

import fs from "fs-extra";
import { tmpdir } from "os";
import { join } from "path";
import { ArchiveCacheManager } from "../../src/cache.js";
import { ReleaseAssetRepository } from "../../src/repository.js";
import { ResilienceOptions, ResilientExecutor } from "../../src/resilience/executor.js";
import { createHttpClient } from "../../src/utils/http.js";
import { API_URL, FakeGitHub, UPLOAD_URL } from "./fake-github.js";

export const FIXED_NOW = new Date(Date.UTC(2024, 0, 2, 3, 4, 5));

export function createTestExecutor(overrides: Partial<ResilienceOptions> = {}): ResilientExecutor {
  return new ResilientExecutor({
    retry: { maxRetries: 3, baseDelayMs: 1, maxDelayMs: 10, jitter: 0 },
    breaker: { failureThreshold: 5, cooldownMs: 60000, successThreshold: 3 },
    rateLimit: { maxWaitMs: 1000, throttleThreshold: 0 },
    maxRateLimitWaits: 5,
    sleep: async () => undefined,
    ...overrides
  });
}

export function createFakeClient(fake: FakeGitHub) {
  const client = createHttpClient({ connectTimeoutMs: 1000, readTimeoutMs: 1000 });
  client.defaults.adapter = fake.adapter;
  return client;
}

export function createTestRepository(
  fake: FakeGitHub,
  cacheRoot: string,
  executor: ResilientExecutor = createTestExecutor()
): ReleaseAssetRepository {
  return new ReleaseAssetRepository({
    executor,
    client: createFakeClient(fake),
    cacheManager: new ArchiveCacheManager(cacheRoot),
    apiUrl: API_URL,
    uploadUrl: UPLOAD_URL,
    redirects: { maxRedirects: 5, forwardCredentialAcrossHosts: false },
    clock: () => FIXED_NOW
  });
}

export async function createTempDir(): Promise<string> {
  return fs.mkdtemp(join(tmpdir(), "relasset-test-"));
}
