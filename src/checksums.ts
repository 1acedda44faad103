// CHANGE: Generate checksum side files and recognise side files by extension.
// WHY: Every primary resource is accompanied by MD5, SHA-1 and SHA-256 files consumers verify against.

import { DigestAlgorithm, digest } from "./utils/hashing.js";

/**
 * Algorithms written next to every primary resource, in staging order.
 */
const GENERATED_ALGORITHMS: readonly DigestAlgorithm[] = ["md5", "sha1", "sha256"];

/**
 * Extensions of side files: checksums and detached signatures.
 */
const SIDE_FILE_EXTENSIONS: readonly string[] = ["md5", "sha1", "sha256", "sha512", "asc"];

export interface DerivedFile {
  readonly path: string;
  readonly content: Buffer;
}

/**
 * Side file extension of `path` (without dot), or undefined for a primary resource.
 */
export function sideFileExtension(path: string): string | undefined {
  const lower = path.toLowerCase();
  return SIDE_FILE_EXTENSIONS.find(extension => lower.endsWith(`.${extension}`));
}

export function isSideFile(path: string): boolean {
  return sideFileExtension(path) !== undefined;
}

/**
 * Checksum side files for `path`: `<path>.md5`, `<path>.sha1`, `<path>.sha256`.
 */
export function checksumFiles(path: string, content: Buffer): DerivedFile[] {
  return GENERATED_ALGORITHMS.map(algorithm => ({
    path: `${path}.${algorithm}`,
    content: Buffer.from(digest(algorithm, content), "utf8")
  }));
}
