// CHANGE: Parse repository URIs into immutable endpoint descriptors.
// WHY: One endpoint identity maps to exactly one remote archive and one local cache file.

import sanitize from "sanitize-filename";
import { ConfigurationError } from "./errors.js";
import { RepositoryEndpoint } from "./types.js";

const ARCHIVE_EXTENSION = ".zip";
const URI_PATTERN = /^([a-z][a-z0-9+.-]*):\/\/(.*)$/i;

/**
 * Parse `scheme://owner/repo/tag/assetName.zip`.
 *
 * @throws ConfigurationError when the URI does not have exactly four segments after the scheme
 *   or the asset name is not a valid `.zip` file name.
 */
export function parseEndpoint(uri: string): RepositoryEndpoint {
  const match = URI_PATTERN.exec(uri.trim());
  if (!match) {
    throw new ConfigurationError(`Repository URI must look like scheme://owner/repo/tag/asset.zip, got "${uri}"`);
  }
  const [, scheme, rest] = match;
  const segments = rest.replace(/\/+$/, "").split("/");
  if (segments.length !== 4 || segments.some(segment => segment.length === 0)) {
    throw new ConfigurationError(
      `Repository URI needs exactly four segments (owner/repo/tag/asset), got ${segments.length} in "${uri}"`
    );
  }
  const [owner, repo, tag, archiveAssetName] = segments;
  if (!archiveAssetName.toLowerCase().endsWith(ARCHIVE_EXTENSION) || archiveAssetName.length === ARCHIVE_EXTENSION.length) {
    throw new ConfigurationError(`Archive asset name must end with ${ARCHIVE_EXTENSION}: "${archiveAssetName}"`);
  }
  if (sanitize(archiveAssetName) !== archiveAssetName) {
    throw new ConfigurationError(`Archive asset name is not a valid file name: "${archiveAssetName}"`);
  }
  return Object.freeze({
    scheme: scheme.toLowerCase(),
    owner,
    repo,
    tag,
    archiveAssetName
  });
}

/**
 * Canonical identity string; the scheme does not take part in it.
 */
export function canonicalEndpoint(endpoint: RepositoryEndpoint): string {
  return `${endpoint.owner}/${endpoint.repo}/${endpoint.tag}/${endpoint.archiveAssetName}`;
}

export function formatEndpoint(endpoint: RepositoryEndpoint): string {
  return `${endpoint.scheme}://${canonicalEndpoint(endpoint)}`;
}
