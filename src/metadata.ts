// CHANGE: Render and parse repository metadata documents.
// WHY: Artifact, plugin-group and snapshot metadata must be regenerated from accumulated state on every write.

import xml2js from "xml2js";
import { isRecord } from "./utils/json.js";

const { Builder, parseStringPromise } = xml2js;

export interface PluginEntry {
  readonly name: string;
  readonly prefix: string;
  readonly artifactId: string;
}

export interface SnapshotVersionEntry {
  readonly classifier?: string;
  readonly extension: string;
  readonly value: string;
  readonly updated: string;
}

export interface ArtifactMetadata {
  readonly groupId: string;
  readonly artifactId: string;
  readonly versions: readonly string[];
  readonly lastUpdated?: string;
}

export interface GroupMetadata {
  readonly groupId: string;
  readonly plugins: readonly PluginEntry[];
}

export interface VersionMetadata {
  readonly groupId: string;
  readonly artifactId: string;
  readonly version: string;
  readonly timestamp?: string;
  readonly buildNumber?: number;
  readonly lastUpdated?: string;
  readonly snapshotVersions: readonly SnapshotVersionEntry[];
}

function createBuilder() {
  return new Builder({
    xmldec: { version: "1.0", encoding: "UTF-8" },
    renderOpts: { pretty: true, indent: "  ", newline: "\n" }
  });
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

/**
 * `yyyyMMddHHmmss` in UTC, the `lastUpdated` format.
 */
export function formatLastUpdated(date: Date): string {
  return `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}${pad(date.getUTCHours())}${pad(
    date.getUTCMinutes()
  )}${pad(date.getUTCSeconds())}`;
}

/**
 * `yyyyMMdd.HHmmss` in UTC, the snapshot timestamp format.
 */
export function formatSnapshotTimestamp(date: Date): string {
  const stamp = formatLastUpdated(date);
  return `${stamp.slice(0, 8)}.${stamp.slice(8)}`;
}

function isNumeric(token: string): boolean {
  return /^\d+$/.test(token);
}

function isSnapshotToken(token: string): boolean {
  return token.toUpperCase() === "SNAPSHOT";
}

function compareTokens(left: string | undefined, right: string | undefined): number {
  if (left === right) {
    return 0;
  }
  if (left === undefined || right === undefined) {
    const present = left ?? right ?? "";
    // Missing token: zero against numbers, newer than qualifiers.
    let missingVsPresent: number;
    if (isNumeric(present)) {
      missingVsPresent = Math.sign(0 - Number.parseInt(present, 10));
    } else {
      missingVsPresent = 1;
    }
    return left === undefined ? missingVsPresent : -missingVsPresent;
  }
  if (isSnapshotToken(left) || isSnapshotToken(right)) {
    return isSnapshotToken(left) ? (isSnapshotToken(right) ? 0 : -1) : 1;
  }
  const leftNumeric = isNumeric(left);
  const rightNumeric = isNumeric(right);
  if (leftNumeric && rightNumeric) {
    return Math.sign(Number.parseInt(left, 10) - Number.parseInt(right, 10));
  }
  if (leftNumeric !== rightNumeric) {
    return leftNumeric ? 1 : -1;
  }
  return left < right ? -1 : left > right ? 1 : 0;
}

/**
 * Numeric-aware version comparison: `1.10` sorts after `1.9`, `1.0-SNAPSHOT` before `1.0`.
 */
export function compareVersions(left: string, right: string): number {
  const leftTokens = left.split(/[.-]/);
  const rightTokens = right.split(/[.-]/);
  const length = Math.max(leftTokens.length, rightTokens.length);
  for (let index = 0; index < length; index += 1) {
    const result = compareTokens(leftTokens[index], rightTokens[index]);
    if (result !== 0) {
      return result;
    }
  }
  return 0;
}

/**
 * Goal prefix of a plugin: `maven-X-plugin`, `X-maven-plugin` and `X-plugin` all yield `X`.
 */
export function pluginPrefix(artifactId: string): string {
  const official = /^maven-(.+)-plugin$/.exec(artifactId);
  if (official) {
    return official[1];
  }
  const thirdParty = /^(.+)-maven-plugin$/.exec(artifactId);
  if (thirdParty) {
    return thirdParty[1];
  }
  const generic = /^(.+)-plugin$/.exec(artifactId);
  return generic ? generic[1] : artifactId;
}

export function isPluginArtifact(artifactId: string, path: string): boolean {
  return artifactId.includes("-plugin") || path.includes("maven-plugin");
}

export function renderArtifactMetadata(metadata: ArtifactMetadata): string {
  const versions = [...new Set(metadata.versions)].sort(compareVersions);
  const releases = versions.filter(version => !version.toUpperCase().endsWith("-SNAPSHOT"));
  const latest = versions[versions.length - 1];
  const release = releases[releases.length - 1];
  return createBuilder().buildObject({
    metadata: {
      groupId: metadata.groupId,
      artifactId: metadata.artifactId,
      ...(latest === undefined
        ? {}
        : {
            versioning: {
              latest,
              ...(release === undefined ? {} : { release }),
              versions: { version: versions },
              ...(metadata.lastUpdated === undefined ? {} : { lastUpdated: metadata.lastUpdated })
            }
          })
    }
  });
}

export function renderGroupMetadata(metadata: GroupMetadata): string {
  const plugins = [...metadata.plugins].sort((left, right) =>
    left.artifactId < right.artifactId ? -1 : left.artifactId > right.artifactId ? 1 : 0
  );
  return createBuilder().buildObject({
    metadata: {
      groupId: metadata.groupId,
      ...(plugins.length === 0
        ? {}
        : {
            plugins: {
              plugin: plugins.map(plugin => ({ name: plugin.name, prefix: plugin.prefix, artifactId: plugin.artifactId }))
            }
          })
    }
  });
}

export function renderVersionMetadata(metadata: VersionMetadata): string {
  const snapshot =
    metadata.timestamp === undefined || metadata.buildNumber === undefined
      ? {}
      : { snapshot: { timestamp: metadata.timestamp, buildNumber: metadata.buildNumber } };
  const entries = metadata.snapshotVersions.map(entry => ({
    ...(entry.classifier === undefined ? {} : { classifier: entry.classifier }),
    extension: entry.extension,
    value: entry.value,
    updated: entry.updated
  }));
  return createBuilder().buildObject({
    metadata: {
      groupId: metadata.groupId,
      artifactId: metadata.artifactId,
      version: metadata.version,
      versioning: {
        ...snapshot,
        ...(metadata.lastUpdated === undefined ? {} : { lastUpdated: metadata.lastUpdated }),
        ...(entries.length === 0 ? {} : { snapshotVersions: { snapshotVersion: entries } })
      }
    }
  });
}

function nodes(parent: unknown, key: string): unknown[] {
  if (!isRecord(parent)) {
    return [];
  }
  const value = parent[key];
  return Array.isArray(value) ? value : [];
}

function node(parent: unknown, key: string): unknown {
  return nodes(parent, key)[0];
}

function text(parent: unknown, key: string): string | undefined {
  const value = node(parent, key);
  if (typeof value === "string") {
    return value.trim();
  }
  if (isRecord(value) && typeof value._ === "string") {
    return value._.trim();
  }
  return undefined;
}

async function parseRoot(xml: string): Promise<unknown> {
  const parsed: unknown = await parseStringPromise(xml);
  return isRecord(parsed) ? parsed.metadata : undefined;
}

export async function parseArtifactMetadata(xml: string): Promise<ArtifactMetadata> {
  const root = await parseRoot(xml);
  const versioning = node(root, "versioning");
  const versions = nodes(node(versioning, "versions"), "version").flatMap(value =>
    typeof value === "string" && value.trim() !== "" ? [value.trim()] : []
  );
  return {
    groupId: text(root, "groupId") ?? "",
    artifactId: text(root, "artifactId") ?? "",
    versions,
    lastUpdated: text(versioning, "lastUpdated")
  };
}

export async function parseGroupMetadata(xml: string): Promise<GroupMetadata> {
  const root = await parseRoot(xml);
  const plugins = nodes(node(root, "plugins"), "plugin").flatMap(plugin => {
    const artifactId = text(plugin, "artifactId");
    if (artifactId === undefined) {
      return [];
    }
    return [{ artifactId, name: text(plugin, "name") ?? artifactId, prefix: text(plugin, "prefix") ?? pluginPrefix(artifactId) }];
  });
  return { groupId: text(root, "groupId") ?? "", plugins };
}

export async function parseVersionMetadata(xml: string): Promise<VersionMetadata> {
  const root = await parseRoot(xml);
  const versioning = node(root, "versioning");
  const snapshot = node(versioning, "snapshot");
  const buildNumber = Number.parseInt(text(snapshot, "buildNumber") ?? "", 10);
  const snapshotVersions = nodes(node(versioning, "snapshotVersions"), "snapshotVersion").flatMap(entry => {
    const extension = text(entry, "extension");
    const value = text(entry, "value");
    if (extension === undefined || value === undefined) {
      return [];
    }
    const classifier = text(entry, "classifier");
    return [
      {
        ...(classifier === undefined ? {} : { classifier }),
        extension,
        value,
        updated: text(entry, "updated") ?? ""
      }
    ];
  });
  return {
    groupId: text(root, "groupId") ?? "",
    artifactId: text(root, "artifactId") ?? "",
    version: text(root, "version") ?? "",
    timestamp: text(snapshot, "timestamp"),
    buildNumber: Number.isFinite(buildNumber) ? buildNumber : undefined,
    lastUpdated: text(versioning, "lastUpdated"),
    snapshotVersions
  };
}
