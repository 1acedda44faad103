// CHANGE: Expose the repository operations a build tool drives during one session.
// WHY: Reads hit the local archive, writes are staged there, and close() publishes the archive once.

import fs from "fs-extra";
import pLimit from "p-limit";
import { join, relative, sep } from "path";
import { LocalArchive, normaliseDirectoryPrefix, normaliseEntryPath } from "./archive.js";
import { ArchiveCacheManager, LocalArchiveCache } from "./cache.js";
import { NET } from "./config.js";
import { formatEndpoint } from "./endpoint.js";
import { SessionClosedError } from "./errors.js";
import { debug, info, warn } from "./logger.js";
import { DerivedArtifactPipeline } from "./pipeline.js";
import { RemoteAsset, RepositoryEndpoint } from "./types.js";

/**
 * Remote side of a session: where the archive is published and described.
 */
export interface ArchivePublisher {
  publishArchive(body: Buffer): Promise<RemoteAsset>;
  describeArchive(): Promise<RemoteAsset | null>;
}

/**
 * @property concurrency - Parallel local file reads in `putDirectory`.
 * @property clock - Time source for metadata timestamps.
 */
export interface RepositorySessionOptions {
  readonly endpoint: RepositoryEndpoint;
  readonly cache: LocalArchiveCache;
  readonly cacheManager: ArchiveCacheManager;
  readonly publisher: ArchivePublisher;
  readonly concurrency?: number;
  readonly clock?: () => Date;
}

async function listFiles(directory: string): Promise<string[]> {
  const entries = await fs.readdir(directory, { withFileTypes: true });
  const nested = await Promise.all(
    entries.map(async entry => {
      const full = join(directory, entry.name);
      if (entry.isDirectory()) {
        return listFiles(full);
      }
      return entry.isFile() ? [full] : [];
    })
  );
  return nested.flat();
}

/**
 * One open repository endpoint.
 *
 * Invariant: every staged path is present in the archive; publishing happens only in `close()`.
 */
export class RepositorySession {
  readonly endpoint: RepositoryEndpoint;
  private readonly staged = new Set<string>();
  private readonly pipeline: DerivedArtifactPipeline;
  private closed = false;

  constructor(private readonly options: RepositorySessionOptions) {
    this.endpoint = options.endpoint;
    this.pipeline = new DerivedArtifactPipeline(options.cache.archive, options.clock);
  }

  get archiveFile(): string {
    return this.options.cache.archiveFile;
  }

  /**
   * Paths written in this session, primary and derived, in first-write order.
   */
  get stagedPaths(): readonly string[] {
    return [...this.staged];
  }

  get isClosed(): boolean {
    return this.closed;
  }

  async readResource(path: string): Promise<Buffer | null> {
    this.assertOpen();
    return this.archive.read(path);
  }

  async resourceExists(path: string): Promise<boolean> {
    this.assertOpen();
    return this.archive.has(path);
  }

  /**
   * Stage `content` at `path`, then its checksums and metadata.
   */
  async writeResource(path: string, content: Buffer): Promise<void> {
    this.assertOpen();
    const name = normaliseEntryPath(path);
    this.stage(name, content);
    await this.pipeline.process(name, content, (derivedPath, derived) => this.stage(derivedPath, derived));
    debug(`Staged ${name} (${content.length} bytes).`);
  }

  async writeFile(localFile: string, path: string): Promise<void> {
    this.assertOpen();
    const content = await fs.readFile(localFile);
    await this.writeResource(path, content);
  }

  /**
   * Stage every file below `localDir` under `prefix`.
   *
   * Files are read concurrently and written one by one in sorted path order.
   *
   * @returns Repository paths written, sorted.
   */
  async putDirectory(localDir: string, prefix = ""): Promise<string[]> {
    this.assertOpen();
    const base = normaliseDirectoryPrefix(prefix);
    const files = await listFiles(localDir);
    const limit = pLimit(this.options.concurrency ?? NET.CONCURRENCY);
    const loaded = await Promise.all(
      files.map(file =>
        limit(async () => ({
          path: `${base}${relative(localDir, file).split(sep).join("/")}`,
          content: await fs.readFile(file)
        }))
      )
    );
    loaded.sort((left, right) => (left.path < right.path ? -1 : left.path > right.path ? 1 : 0));
    for (const file of loaded) {
      await this.writeResource(file.path, file.content);
    }
    info(`Staged ${loaded.length} file(s) from ${localDir}.`);
    return loaded.map(file => file.path);
  }

  /**
   * Immediate children of `prefix`; sub-directories end with `/`.
   */
  async listResources(prefix = ""): Promise<string[]> {
    this.assertOpen();
    const directory = normaliseDirectoryPrefix(prefix);
    const children = new Set<string>();
    for (const entry of this.archive.list(directory)) {
      const rest = entry.slice(directory.length);
      const slash = rest.indexOf("/");
      children.add(slash < 0 ? rest : rest.slice(0, slash + 1));
    }
    return [...children].sort();
  }

  /**
   * Whether the published archive changed after `timestamp` (epoch milliseconds).
   *
   * An absent asset is not newer; a missing or unparseable remote time counts as newer.
   */
  async isNewer(timestamp: number): Promise<boolean> {
    this.assertOpen();
    const asset = await this.options.publisher.describeArchive();
    if (!asset) {
      return false;
    }
    const updated = asset.updatedAt === undefined ? Number.NaN : Date.parse(asset.updatedAt);
    if (Number.isNaN(updated)) {
      warn(`Remote archive ${asset.name} has no usable update time (${asset.updatedAt ?? "missing"}); treating it as newer.`);
      return true;
    }
    return updated > timestamp;
  }

  /**
   * Publish staged changes and release the cache.
   *
   * On failure the archive stays open and staged, so `close()` may be called again.
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    const { cache, cacheManager, publisher } = this.options;
    if (this.staged.size === 0) {
      cache.archive.dispose();
    } else {
      await cache.archive.flush();
      const asset = await publisher.publishArchive(cache.archive.toBuffer());
      info(`Published ${this.staged.size} staged path(s) to ${formatEndpoint(this.endpoint)} as asset ${asset.assetId}.`);
      this.staged.clear();
      await cache.archive.close();
    }
    cacheManager.release(cache.cacheKey);
    this.closed = true;
  }

  /**
   * Release the cache without publishing. Unflushed writes are dropped; the cache file is left as it is.
   */
  discard(): void {
    if (this.closed) {
      return;
    }
    this.archive.dispose();
    if (this.staged.size > 0) {
      warn(`Discarded ${this.staged.size} staged path(s) for ${formatEndpoint(this.endpoint)}.`);
    }
    this.staged.clear();
    this.options.cacheManager.release(this.options.cache.cacheKey);
    this.closed = true;
  }

  private get archive(): LocalArchive {
    return this.options.cache.archive;
  }

  private stage(path: string, content: Buffer): void {
    this.archive.write(path, content);
    this.staged.add(normaliseEntryPath(path));
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new SessionClosedError(`Session for ${formatEndpoint(this.endpoint)} is closed`);
    }
  }
}
