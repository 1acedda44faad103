#!/usr/bin/env node
// CHANGE: Delegate execution to modular CLI runner and expose the library surface.
// WHY: Allows importing the repository API without triggering immediate command parsing.

import { pathToFileURL } from "url";
import { runCli } from "./cli.js";

const executedDirectly = process.argv[1]
  ? pathToFileURL(process.argv[1]).href === import.meta.url
  : false;

if (executedDirectly) {
  void runCli(process.argv);
}

export { runCli };
export { ReleaseAssetRepository } from "./repository.js";
export type { OpenSessionOptions, RepositoryOptions } from "./repository.js";
export { RepositorySession } from "./session.js";
export type { ArchivePublisher, RepositorySessionOptions } from "./session.js";
export { ReleaseDirectory } from "./releases.js";
export { ArchiveCacheManager } from "./cache.js";
export { LocalArchive } from "./archive.js";
export { parseEndpoint, formatEndpoint, canonicalEndpoint } from "./endpoint.js";
export { resolveCredential } from "./credential.js";
export { parseRepositoryPath } from "./coordinates.js";
export { compareVersions } from "./metadata.js";
export * from "./errors.js";
export * from "./resilience/index.js";
export { createHttpClient, followRedirects } from "./utils/http.js";
export type { RepositoryEndpoint, RemoteAsset, RemoteRelease, RemoteTag, CoordinateTriple } from "./types.js";
