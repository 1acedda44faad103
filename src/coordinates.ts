// CHANGE: Decompose repository paths into coordinates.
// WHY: Metadata synthesis needs group, artifact, version, classifier and extension of every primary write.

import { normaliseEntryPath } from "./archive.js";
import { sideFileExtension } from "./checksums.js";
import { CoordinateTriple } from "./types.js";

export const METADATA_FILE = "maven-metadata.xml";
export const SNAPSHOT_SUFFIX = "-SNAPSHOT";

const SNAPSHOT_STAMP = /^-(\d{8}\.\d{6})-(\d+)/;
const COMPONENT = /^[A-Za-z0-9._-]+$/;

/**
 * Timestamp and build number carried by a timestamped snapshot file name.
 */
export interface SnapshotStamp {
  readonly timestamp: string;
  readonly buildNumber: number;
}

export interface ArtifactPath {
  readonly kind: "artifact";
  readonly path: string;
  readonly groupPath: string;
  readonly coordinates: CoordinateTriple;
  /** Version as written in the file name; differs from the directory version for timestamped snapshots. */
  readonly fileVersion: string;
  readonly snapshot?: SnapshotStamp;
  readonly sideExtension?: string;
}

export interface MetadataPath {
  readonly kind: "metadata";
  readonly path: string;
  readonly directory: string;
  readonly sideExtension?: string;
}

export interface InvalidPath {
  readonly kind: "invalid";
  readonly path: string;
  readonly reason: string;
}

export type RepositoryPath = ArtifactPath | MetadataPath | InvalidPath;

export function isSnapshotVersion(version: string): boolean {
  return version.endsWith(SNAPSHOT_SUFFIX);
}

/**
 * Parse `<groupPath>/<artifactId>/<version>/<artifactId>-<version>[-<classifier>].<extension>[.<side>]`.
 *
 * Paths ending in `maven-metadata.xml` (optionally followed by a side file extension) are metadata paths.
 * Any mismatch between the file name and the directory segments is reported with the conflicting value.
 * Group segments, artifactId, version and classifier are limited to letters, digits, `.`, `_` and `-`.
 *
 * @throws InvalidResourcePathError for empty paths and `..` segments.
 */
export function parseRepositoryPath(rawPath: string): RepositoryPath {
  const path = normaliseEntryPath(rawPath);
  const segments = path.split("/");
  const fullName = segments[segments.length - 1];
  const sideExtension = sideFileExtension(fullName);
  const fileName = sideExtension ? fullName.slice(0, -(sideExtension.length + 1)) : fullName;

  if (fileName === METADATA_FILE) {
    return { kind: "metadata", path, directory: segments.slice(0, -1).join("/"), sideExtension };
  }
  if (segments.length < 4) {
    return { kind: "invalid", path, reason: "expected <groupPath>/<artifactId>/<version>/<file>" };
  }

  const version = segments[segments.length - 2];
  const artifactId = segments[segments.length - 3];
  const groupPath = segments.slice(0, -3).join("/");
  const invalid = (reason: string): InvalidPath => ({ kind: "invalid", path, reason });

  const badSegment = segments.slice(0, -3).find(segment => !COMPONENT.test(segment));
  if (badSegment !== undefined) {
    return invalid(`groupId segment "${badSegment}" contains illegal characters`);
  }
  if (!COMPONENT.test(artifactId)) {
    return invalid(`artifactId "${artifactId}" contains illegal characters`);
  }
  if (!COMPONENT.test(version)) {
    return invalid(`version "${version}" contains illegal characters`);
  }

  if (!fileName.startsWith(`${artifactId}-`)) {
    return invalid(`file name "${fileName}" does not start with artifactId "${artifactId}"`);
  }
  const rest = fileName.slice(artifactId.length + 1);

  let fileVersion: string;
  let snapshot: SnapshotStamp | undefined;
  if (rest.startsWith(version) && /^[.-]/.test(rest.slice(version.length))) {
    fileVersion = version;
  } else {
    const stamp = isSnapshotVersion(version) ? matchSnapshotStamp(version, rest) : undefined;
    if (!stamp) {
      return invalid(`file name "${fileName}" does not match version "${version}"`);
    }
    snapshot = stamp;
    fileVersion = `${version.slice(0, -SNAPSHOT_SUFFIX.length)}-${stamp.timestamp}-${stamp.buildNumber}`;
  }

  const tail = rest.slice(fileVersion.length);
  let classifier: string | undefined;
  let extension: string;
  if (tail.startsWith("-")) {
    const dot = tail.indexOf(".");
    if (dot < 0) {
      return invalid(`file name "${fileName}" has no extension`);
    }
    classifier = tail.slice(1, dot);
    extension = tail.slice(dot + 1);
    if (classifier === "") {
      return invalid(`file name "${fileName}" has an empty classifier`);
    }
    if (!COMPONENT.test(classifier)) {
      return invalid(`classifier "${classifier}" contains illegal characters`);
    }
  } else {
    extension = tail.slice(1);
  }
  if (extension === "") {
    return invalid(`file name "${fileName}" has no extension`);
  }

  return {
    kind: "artifact",
    path,
    groupPath,
    coordinates: {
      groupId: groupPath.split("/").join("."),
      artifactId,
      version,
      ...(classifier === undefined ? {} : { classifier }),
      extension
    },
    fileVersion,
    ...(snapshot ? { snapshot } : {}),
    ...(sideExtension ? { sideExtension } : {})
  };
}

function matchSnapshotStamp(version: string, rest: string): SnapshotStamp | undefined {
  const base = version.slice(0, -SNAPSHOT_SUFFIX.length);
  if (!rest.startsWith(base)) {
    return undefined;
  }
  const after = rest.slice(base.length);
  const match = SNAPSHOT_STAMP.exec(after);
  if (!match || !/^[.-]/.test(after.slice(match[0].length))) {
    return undefined;
  }
  return { timestamp: match[1], buildNumber: Number.parseInt(match[2], 10) };
}
