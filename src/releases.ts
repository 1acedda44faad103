// CHANGE: Implement the idempotent tag/release/asset lifecycle against the release API.
// WHY: Each remote object follows CHECK → found: reuse, 404: CREATE, anything else: permanent failure.

import { AxiosInstance, AxiosResponse, Method, ResponseType } from "axios";
import { GITHUB } from "./config.js";
import { AssetConflictError, CallDescriptor, PermanentError } from "./errors.js";
import { canonicalEndpoint } from "./endpoint.js";
import { debug, info, warn } from "./logger.js";
import { ResilientExecutor } from "./resilience/executor.js";
import { RemoteAsset, RemoteRelease, RemoteTag, RepositoryEndpoint } from "./types.js";
import { RedirectPolicy, defaultRedirectPolicy, followRedirects } from "./utils/http.js";
import { describeBody, isRecord, readNumber, readRecord, readString } from "./utils/json.js";

const PAGE_SIZE = 100;

/**
 * @property apiUrl - REST API base, e.g. `https://api.github.com`.
 * @property uploadUrl - Asset upload base, e.g. `https://uploads.github.com`.
 */
export interface ReleaseDirectoryOptions {
  readonly endpoint: RepositoryEndpoint;
  readonly token: string;
  readonly executor: ResilientExecutor;
  readonly client: AxiosInstance;
  readonly redirects?: RedirectPolicy;
  readonly apiUrl?: string;
  readonly uploadUrl?: string;
}

interface ApiRequest {
  readonly operation: string;
  readonly resource: string;
  readonly method: Method;
  readonly url: string;
  readonly data?: unknown;
  readonly headers?: Readonly<Record<string, string>>;
  readonly responseType?: ResponseType;
}

function trimBase(url: string): string {
  return url.replace(/\/+$/, "");
}

/**
 * Remote release directory of one endpoint.
 *
 * Invariant: remote identifiers are resolved per call and never cached.
 */
export class ReleaseDirectory {
  private readonly endpoint: RepositoryEndpoint;
  private readonly apiUrl: string;
  private readonly uploadUrl: string;
  private readonly redirects: RedirectPolicy;

  constructor(private readonly options: ReleaseDirectoryOptions) {
    this.endpoint = options.endpoint;
    this.apiUrl = trimBase(options.apiUrl ?? GITHUB.API_URL);
    this.uploadUrl = trimBase(options.uploadUrl ?? GITHUB.UPLOAD_URL);
    this.redirects = options.redirects ?? defaultRedirectPolicy();
  }

  private get repoPath(): string {
    return `${this.endpoint.owner}/${this.endpoint.repo}`;
  }

  private get repoUrl(): string {
    return `${this.apiUrl}/repos/${encodeURIComponent(this.endpoint.owner)}/${encodeURIComponent(this.endpoint.repo)}`;
  }

  async getDefaultBranch(): Promise<string> {
    const call = { operation: "getDefaultBranch", resource: this.repoPath };
    const response = await this.send({ ...call, method: "GET", url: this.repoUrl });
    if (response.status !== 200) {
      throw this.unexpected(call, response);
    }
    return this.requireString(call, response.data, "default_branch");
  }

  async getBranchHead(branch: string): Promise<string> {
    const call = { operation: "getBranchHead", resource: `${this.repoPath}#${branch}` };
    const response = await this.send({
      ...call,
      method: "GET",
      url: `${this.repoUrl}/branches/${encodeURIComponent(branch)}`
    });
    if (response.status !== 200) {
      throw this.unexpected(call, response);
    }
    return this.requireString(call, readRecord(response.data, "commit"), "sha");
  }

  /**
   * @returns Tag of the endpoint, or null when it does not exist.
   */
  async findTag(): Promise<RemoteTag | null> {
    const call = { operation: "findTag", resource: `${this.repoPath}@${this.endpoint.tag}` };
    const response = await this.send({
      ...call,
      method: "GET",
      url: `${this.repoUrl}/git/ref/tags/${encodeURIComponent(this.endpoint.tag)}`
    });
    if (response.status === 404) {
      return null;
    }
    if (response.status !== 200) {
      throw this.unexpected(call, response);
    }
    return { name: this.endpoint.tag, commitSha: this.requireString(call, readRecord(response.data, "object"), "sha") };
  }

  /**
   * Return the endpoint tag, creating it at `commitSha` when absent. An existing tag is never moved.
   */
  async ensureTag(commitSha: string): Promise<RemoteTag> {
    const existing = await this.findTag();
    if (existing) {
      debug(`Tag ${this.endpoint.tag} exists at ${existing.commitSha}.`);
      return existing;
    }
    const call = { operation: "ensureTag", resource: `${this.repoPath}@${this.endpoint.tag}` };
    const response = await this.send({
      ...call,
      method: "POST",
      url: `${this.repoUrl}/git/refs`,
      data: { ref: `refs/tags/${this.endpoint.tag}`, sha: commitSha }
    });
    if (response.status !== 201) {
      throw this.unexpected(call, response);
    }
    info(`Created tag ${this.endpoint.tag} at ${commitSha} in ${this.repoPath}.`);
    return { name: this.endpoint.tag, commitSha };
  }

  async findRelease(): Promise<RemoteRelease | null> {
    const call = { operation: "findRelease", resource: `${this.repoPath}@${this.endpoint.tag}` };
    const response = await this.send({
      ...call,
      method: "GET",
      url: `${this.repoUrl}/releases/tags/${encodeURIComponent(this.endpoint.tag)}`
    });
    if (response.status === 404) {
      return null;
    }
    if (response.status !== 200) {
      throw this.unexpected(call, response);
    }
    return this.toRelease(call, response.data, readString(response.data, "target_commitish") ?? "");
  }

  /**
   * Return the release of `tag`, creating a published, non-prerelease one when absent.
   */
  async ensureRelease(tag: RemoteTag): Promise<RemoteRelease> {
    const existing = await this.findRelease();
    if (existing) {
      debug(`Release ${existing.releaseId} exists for tag ${tag.name}.`);
      return existing;
    }
    const call = { operation: "ensureRelease", resource: `${this.repoPath}@${tag.name}` };
    const response = await this.send({
      ...call,
      method: "POST",
      url: `${this.repoUrl}/releases`,
      data: {
        tag_name: tag.name,
        name: tag.name,
        body: `Repository archive ${this.endpoint.archiveAssetName}`,
        draft: false,
        prerelease: false,
        generate_release_notes: false
      }
    });
    if (response.status !== 201) {
      throw this.unexpected(call, response);
    }
    const release = this.toRelease(call, response.data, tag.commitSha);
    info(`Created release ${release.releaseId} for tag ${tag.name}.`);
    return release;
  }

  async listAssets(release: RemoteRelease): Promise<RemoteAsset[]> {
    const call = { operation: "listAssets", resource: `${this.repoPath}@${release.tagName}` };
    const assets: RemoteAsset[] = [];
    for (let page = 1; ; page += 1) {
      const response = await this.send({
        ...call,
        method: "GET",
        url: `${this.repoUrl}/releases/${release.releaseId}/assets?per_page=${PAGE_SIZE}&page=${page}`
      });
      if (response.status !== 200) {
        throw this.unexpected(call, response);
      }
      if (!Array.isArray(response.data)) {
        throw new PermanentError(call, "malformed response: expected an array of assets", { status: response.status });
      }
      const batch: unknown[] = response.data;
      assets.push(...batch.map(item => this.toAsset(call, item, release)));
      if (batch.length < PAGE_SIZE) {
        return assets;
      }
    }
  }

  async findAsset(release: RemoteRelease, name: string): Promise<RemoteAsset | null> {
    const assets = await this.listAssets(release);
    return assets.find(asset => asset.name === name) ?? null;
  }

  /**
   * Delete an asset. An asset already gone counts as deleted.
   */
  async deleteAsset(asset: RemoteAsset): Promise<void> {
    const call = { operation: "deleteAsset", resource: `${this.repoPath}/assets/${asset.assetId}` };
    const response = await this.send({
      ...call,
      method: "DELETE",
      url: `${this.repoUrl}/releases/assets/${asset.assetId}`
    });
    if (response.status !== 204 && response.status !== 404) {
      throw this.unexpected(call, response);
    }
    debug(`Deleted asset ${asset.name} (${asset.assetId}).`);
  }

  /**
   * Upload `body` as asset `name`; on a name collision delete the old asset once and create once more.
   *
   * @throws AssetConflictError when the second create still collides.
   */
  async uploadAsset(release: RemoteRelease, name: string, body: Buffer): Promise<RemoteAsset> {
    const call = { operation: "uploadAsset", resource: `${this.repoPath}@${release.tagName}/${name}` };
    let response = await this.createAsset(call, release, name, body);
    if (response.status === 422) {
      warn(`Asset ${name} already exists on release ${release.tagName}; replacing it.`);
      const existing = await this.findAsset(release, name);
      if (existing) {
        await this.deleteAsset(existing);
      }
      response = await this.createAsset(call, release, name, body);
      if (response.status === 422) {
        throw new AssetConflictError(call, "asset name still in use after replacing it", {
          status: response.status,
          body: describeBody(response.data)
        });
      }
    }
    if (response.status !== 201) {
      throw this.unexpected(call, response);
    }
    const asset = this.toAsset(call, response.data, release);
    info(`Uploaded ${name} (${body.length} bytes) to release ${release.tagName}.`);
    return asset;
  }

  /**
   * Publish the archive: default branch → head commit → tag → release → asset.
   */
  async publishArchive(body: Buffer): Promise<RemoteAsset> {
    const branch = await this.getDefaultBranch();
    const head = await this.getBranchHead(branch);
    const tag = await this.ensureTag(head);
    const release = await this.ensureRelease(tag);
    return this.uploadAsset(release, this.endpoint.archiveAssetName, body);
  }

  /**
   * Remote asset holding the archive, or null when the release or the asset is absent.
   */
  async describeArchive(): Promise<RemoteAsset | null> {
    const release = await this.findRelease();
    if (!release) {
      return null;
    }
    return this.findAsset(release, this.endpoint.archiveAssetName);
  }

  /**
   * Download the archive bytes, following the storage redirect.
   *
   * @returns Archive bytes, or null when the release or the asset is absent.
   */
  async downloadArchive(): Promise<Buffer | null> {
    const asset = await this.describeArchive();
    if (!asset) {
      debug(`No remote archive for ${canonicalEndpoint(this.endpoint)}.`);
      return null;
    }
    const call = { operation: "downloadArchive", resource: `${this.repoPath}/assets/${asset.assetId}` };
    const response = await this.send<ArrayBuffer>({
      ...call,
      method: "GET",
      url: `${this.repoUrl}/releases/assets/${asset.assetId}`,
      headers: { Accept: "application/octet-stream" },
      responseType: "arraybuffer"
    });
    if (response.status !== 200) {
      throw this.unexpected(call, response);
    }
    const bytes = Buffer.from(response.data);
    debug(`Downloaded ${asset.name}: ${bytes.length} bytes.`);
    return bytes;
  }

  private send<T = unknown>(request: ApiRequest): Promise<AxiosResponse<T>> {
    const call: CallDescriptor = { operation: request.operation, resource: request.resource };
    const headers = {
      Accept: "application/vnd.github+json",
      Authorization: `Bearer ${this.options.token}`,
      "X-GitHub-Api-Version": GITHUB.API_VERSION,
      ...request.headers
    };
    return this.options.executor.execute(call, () =>
      followRedirects<T>(
        this.options.client,
        { method: request.method, url: request.url, headers, data: request.data, responseType: request.responseType },
        this.redirects,
        call
      )
    );
  }

  private createAsset(
    call: CallDescriptor,
    release: RemoteRelease,
    name: string,
    body: Buffer
  ): Promise<AxiosResponse<unknown>> {
    const owner = encodeURIComponent(this.endpoint.owner);
    const repo = encodeURIComponent(this.endpoint.repo);
    return this.send({
      ...call,
      method: "POST",
      url: `${this.uploadUrl}/repos/${owner}/${repo}/releases/${release.releaseId}/assets?name=${encodeURIComponent(name)}`,
      data: body,
      headers: { "Content-Type": "application/octet-stream" }
    });
  }

  private toRelease(call: CallDescriptor, data: unknown, commitSha: string): RemoteRelease {
    return {
      releaseId: this.requireNumber(call, data, "id"),
      tagName: this.requireString(call, data, "tag_name"),
      commitSha
    };
  }

  private toAsset(call: CallDescriptor, data: unknown, release: RemoteRelease): RemoteAsset {
    return {
      assetId: this.requireNumber(call, data, "id"),
      name: this.requireString(call, data, "name"),
      releaseId: release.releaseId,
      size: readNumber(data, "size"),
      updatedAt: readString(data, "updated_at")
    };
  }

  private requireString(call: CallDescriptor, data: unknown, key: string): string {
    const value = readString(data, key);
    if (value === undefined || value === "") {
      throw new PermanentError(call, `malformed response: missing "${key}"`);
    }
    return value;
  }

  private requireNumber(call: CallDescriptor, data: unknown, key: string): number {
    const value = readNumber(data, key);
    if (value === undefined) {
      throw new PermanentError(call, `malformed response: missing "${key}"${isRecord(data) ? "" : " (not an object)"}`);
    }
    return value;
  }

  private unexpected(call: CallDescriptor, response: AxiosResponse<unknown>): PermanentError {
    return new PermanentError(call, `unexpected response ${response.status}`, {
      status: response.status,
      body: describeBody(response.data)
    });
  }
}
