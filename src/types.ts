// CHANGE: Define strongly typed domain models for endpoints, remote objects and coordinates.
// WHY: Remote identifiers are re-resolved per operation; the types keep them short-lived values.

/**
 * One remote archive, parsed once from `scheme://owner/repo/tag/assetName.zip`.
 *
 * Invariant: every field is non-empty and `archiveAssetName` ends with `.zip`.
 */
export interface RepositoryEndpoint {
  readonly scheme: string;
  readonly owner: string;
  readonly repo: string;
  readonly tag: string;
  readonly archiveAssetName: string;
}

/**
 * Tag reference as resolved on the remote.
 */
export interface RemoteTag {
  readonly name: string;
  readonly commitSha: string;
}

/**
 * Release attached to a tag.
 *
 * Invariant: `tagName` equals the tag the release was created for.
 */
export interface RemoteRelease {
  readonly releaseId: number;
  readonly tagName: string;
  readonly commitSha: string;
}

/**
 * Binary asset of a release.
 *
 * @property updatedAt - Raw `updated_at` value reported by the API.
 */
export interface RemoteAsset {
  readonly assetId: number;
  readonly name: string;
  readonly releaseId: number;
  readonly size?: number;
  readonly updatedAt?: string;
}

/**
 * Repository coordinates derived from a repository-relative path.
 */
export interface CoordinateTriple {
  readonly groupId: string;
  readonly artifactId: string;
  readonly version: string;
  readonly classifier?: string;
  readonly extension: string;
}
