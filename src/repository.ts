// CHANGE: Process-wide entry point that opens sessions against release-asset repositories.
// WHY: The resilience state, HTTP connections and cache ownership are shared by every session of a process.

import { AxiosInstance } from "axios";
import { ArchiveCacheManager } from "./cache.js";
import { AUTH } from "./config.js";
import { resolveCredential } from "./credential.js";
import { formatEndpoint, parseEndpoint } from "./endpoint.js";
import { debug, info } from "./logger.js";
import { ReleaseDirectory } from "./releases.js";
import { ResilienceStatus, ResilientExecutor } from "./resilience/executor.js";
import { createResilientExecutor } from "./resilience/index.js";
import { RepositorySession } from "./session.js";
import { RedirectPolicy, createHttpClient, defaultRedirectPolicy } from "./utils/http.js";

export interface RepositoryOptions {
  readonly executor?: ResilientExecutor;
  readonly client?: AxiosInstance;
  readonly cacheManager?: ArchiveCacheManager;
  readonly redirects?: RedirectPolicy;
  readonly apiUrl?: string;
  readonly uploadUrl?: string;
  readonly concurrency?: number;
  readonly clock?: () => Date;
}

export interface OpenSessionOptions {
  /** Download the remote archive even when a local cache file exists. */
  readonly refresh?: boolean;
}

/**
 * Factory for sessions; owns the executor, HTTP client and cache manager they share.
 */
export class ReleaseAssetRepository {
  readonly executor: ResilientExecutor;
  readonly client: AxiosInstance;
  readonly cacheManager: ArchiveCacheManager;
  private readonly redirects: RedirectPolicy;

  constructor(private readonly options: RepositoryOptions = {}) {
    this.executor = options.executor ?? createResilientExecutor();
    this.client = options.client ?? createHttpClient();
    this.cacheManager = options.cacheManager ?? new ArchiveCacheManager();
    this.redirects = options.redirects ?? defaultRedirectPolicy();
  }

  /**
   * Open `uri` (`scheme://owner/repo/tag/asset.zip`).
   *
   * @param credential - Token literal or path to a token file; defaults to `RELASSET_TOKEN`.
   * @throws ConfigurationError for a malformed URI or a missing credential.
   */
  async open(uri: string, credential?: string, options: OpenSessionOptions = {}): Promise<RepositorySession> {
    const endpoint = parseEndpoint(uri);
    const token = await resolveCredential(credential ?? AUTH.TOKEN);
    const directory = new ReleaseDirectory({
      endpoint,
      token,
      executor: this.executor,
      client: this.client,
      redirects: this.redirects,
      apiUrl: this.options.apiUrl,
      uploadUrl: this.options.uploadUrl
    });
    const cache = await this.cacheManager.openForEndpoint(endpoint, directory, options);
    info(`Opened ${formatEndpoint(endpoint)} (cache ${cache.cacheKey}).`);
    debug(`Resilience state: ${JSON.stringify(this.status())}`);
    return new RepositorySession({
      endpoint,
      cache,
      cacheManager: this.cacheManager,
      publisher: directory,
      concurrency: this.options.concurrency,
      clock: this.options.clock
    });
  }

  status(): ResilienceStatus {
    return this.executor.status();
  }
}
