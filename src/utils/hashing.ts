// CHANGE: Hex digests for cache keys and repository checksums.
// WHY: Cache files are keyed by SHA-1 of the endpoint; artifacts get MD5, SHA-1 and SHA-256 side files.

import { createHash } from "crypto";

export type DigestAlgorithm = "md5" | "sha1" | "sha256";

/**
 * Compute a lowercase hexadecimal digest.
 */
export function digest(algorithm: DigestAlgorithm, content: Buffer | string): string {
  return createHash(algorithm).update(content).digest("hex");
}

export function sha1(content: Buffer | string): string {
  return digest("sha1", content);
}
