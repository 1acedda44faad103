// CHANGE: Map endpoints to local archive files and guard them against double opens.
// WHY: One endpoint identity maps to one cache file, downloaded only when missing or on refresh.

import fs from "fs-extra";
import { join } from "path";
import { LocalArchive } from "./archive.js";
import { CACHE } from "./config.js";
import { canonicalEndpoint } from "./endpoint.js";
import { CacheInUseError } from "./errors.js";
import { debug, info } from "./logger.js";
import { RepositoryEndpoint } from "./types.js";
import { sha1 } from "./utils/hashing.js";

/**
 * Anything able to fetch the remote archive bytes; null when nothing was published yet.
 */
export interface ArchiveSource {
  downloadArchive(): Promise<Buffer | null>;
}

export interface OpenArchiveOptions {
  readonly refresh?: boolean;
}

/**
 * An opened cache file held by one session.
 */
export interface LocalArchiveCache {
  readonly cacheKey: string;
  readonly archiveFile: string;
  readonly archive: LocalArchive;
}

export interface CacheEntryInfo {
  readonly cacheKey: string;
  readonly archiveFile: string;
  readonly size: number;
  readonly modifiedAt: string;
}

/**
 * Wrapper around the cache directory holding one `<sha1>.zip` per endpoint.
 *
 * Invariant: a cache key is held by at most one open archive within the process.
 */
export class ArchiveCacheManager {
  private readonly held = new Set<string>();

  constructor(readonly root: string = CACHE.ROOT) {}

  cacheKeyFor(endpoint: RepositoryEndpoint): string {
    return sha1(canonicalEndpoint(endpoint));
  }

  archiveFileFor(endpoint: RepositoryEndpoint): string {
    return join(this.root, `${this.cacheKeyFor(endpoint)}.zip`);
  }

  isHeld(cacheKey: string): boolean {
    return this.held.has(cacheKey);
  }

  /**
   * Open the cache file of `endpoint`, downloading it when absent locally or when `refresh` is set.
   *
   * A remote archive that does not exist yet yields the local file if any, otherwise an empty archive.
   *
   * @throws CacheInUseError when the key is already open in this process.
   * @throws CacheCorruptionError when the local file or the downloaded bytes are not a readable zip.
   */
  async openForEndpoint(
    endpoint: RepositoryEndpoint,
    source: ArchiveSource,
    options: OpenArchiveOptions = {}
  ): Promise<LocalArchiveCache> {
    const cacheKey = this.cacheKeyFor(endpoint);
    if (this.held.has(cacheKey)) {
      throw new CacheInUseError(cacheKey);
    }
    this.held.add(cacheKey);
    const archiveFile = join(this.root, `${cacheKey}.zip`);
    try {
      const archive = await this.load(archiveFile, source, options.refresh ?? false);
      debug(`Cache ${cacheKey} opened for ${canonicalEndpoint(endpoint)} at ${archiveFile}.`);
      return { cacheKey, archiveFile, archive };
    } catch (error) {
      this.held.delete(cacheKey);
      throw error;
    }
  }

  release(cacheKey: string): void {
    if (this.held.delete(cacheKey)) {
      debug(`Cache ${cacheKey} released.`);
    }
  }

  /**
   * Describe the cache file of `endpoint`, or null when it does not exist.
   */
  async describe(endpoint: RepositoryEndpoint): Promise<CacheEntryInfo | null> {
    const archiveFile = this.archiveFileFor(endpoint);
    if (!(await fs.pathExists(archiveFile))) {
      return null;
    }
    const stats = await fs.stat(archiveFile);
    return {
      cacheKey: this.cacheKeyFor(endpoint),
      archiveFile,
      size: stats.size,
      modifiedAt: stats.mtime.toISOString()
    };
  }

  /**
   * Delete the cache file of `endpoint`.
   *
   * @returns Whether a file was removed.
   * @throws CacheInUseError when the archive is currently open.
   */
  async evict(endpoint: RepositoryEndpoint): Promise<boolean> {
    const cacheKey = this.cacheKeyFor(endpoint);
    if (this.held.has(cacheKey)) {
      throw new CacheInUseError(cacheKey);
    }
    const archiveFile = this.archiveFileFor(endpoint);
    if (!(await fs.pathExists(archiveFile))) {
      return false;
    }
    await fs.remove(archiveFile);
    info(`Removed cached archive ${archiveFile}.`);
    return true;
  }

  private async load(archiveFile: string, source: ArchiveSource, refresh: boolean): Promise<LocalArchive> {
    const exists = await fs.pathExists(archiveFile);
    if (exists && !refresh) {
      return LocalArchive.open(archiveFile);
    }
    const bytes = await source.downloadArchive();
    if (bytes) {
      const archive = LocalArchive.fromBuffer(archiveFile, bytes);
      await archive.flush();
      info(`Downloaded archive (${bytes.length} bytes) into ${archiveFile}.`);
      return archive;
    }
    if (exists) {
      debug(`No remote archive; keeping local ${archiveFile}.`);
      return LocalArchive.open(archiveFile);
    }
    debug(`No remote archive; starting empty at ${archiveFile}.`);
    return LocalArchive.empty(archiveFile);
  }
}
