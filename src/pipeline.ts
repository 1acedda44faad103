// CHANGE: Stage checksums and metadata after every primary write.
// WHY: Consumers resolve artifacts through maven-metadata.xml and verify them through checksum side files.

import { LocalArchive } from "./archive.js";
import { checksumFiles, isSideFile } from "./checksums.js";
import { ArtifactPath, METADATA_FILE, SNAPSHOT_SUFFIX, isSnapshotVersion, parseRepositoryPath } from "./coordinates.js";
import { debug, warn } from "./logger.js";
import {
  PluginEntry,
  SnapshotVersionEntry,
  formatLastUpdated,
  formatSnapshotTimestamp,
  isPluginArtifact,
  parseArtifactMetadata,
  parseGroupMetadata,
  parseVersionMetadata,
  pluginPrefix,
  renderArtifactMetadata,
  renderGroupMetadata,
  renderVersionMetadata
} from "./metadata.js";

/**
 * Receives every derived file; the session writes it to the archive and the staging list.
 */
export type Stage = (path: string, content: Buffer) => void;

interface ArtifactState {
  readonly versions: Set<string>;
  readonly observed: Set<string>;
  lastUpdated?: string;
}

interface GroupState {
  readonly plugins: Map<string, PluginEntry>;
}

interface SnapshotState {
  timestamp: string;
  buildNumber: number;
  lastUpdated: string;
  readonly files: Map<string, SnapshotVersionEntry>;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Derived-artifact generator bound to one open archive.
 *
 * Invariant: state is seeded from the archive the first time an artifact, group or snapshot is touched,
 * so identical state always renders byte-identical metadata.
 */
export class DerivedArtifactPipeline {
  private readonly artifacts = new Map<string, ArtifactState>();
  private readonly groups = new Map<string, GroupState>();
  private readonly snapshots = new Map<string, SnapshotState>();

  constructor(private readonly archive: LocalArchive, private readonly clock: () => Date = () => new Date()) {}

  /**
   * Stage derived files for `path`. Failures are logged; they never fail the primary write.
   */
  async process(path: string, content: Buffer, stage: Stage): Promise<void> {
    if (isSideFile(path)) {
      return;
    }
    try {
      this.stageChecksums(path, content, stage);
      const parsed = parseRepositoryPath(path);
      switch (parsed.kind) {
        case "metadata":
          return;
        case "invalid":
          warn(`No metadata for ${parsed.path}: ${parsed.reason}`);
          return;
        case "artifact":
          await this.updateMetadata(parsed, stage);
          return;
      }
    } catch (error) {
      warn(`Derived artifacts for ${path} failed: ${errorMessage(error)}`);
    }
  }

  private stageChecksums(path: string, content: Buffer, stage: Stage): void {
    for (const file of checksumFiles(path, content)) {
      stage(file.path, file.content);
    }
  }

  private stageDocument(path: string, xml: string, stage: Stage): void {
    const content = Buffer.from(xml, "utf8");
    stage(path, content);
    this.stageChecksums(path, content, stage);
  }

  private async updateMetadata(artifact: ArtifactPath, stage: Stage): Promise<void> {
    const { groupId, artifactId, version } = artifact.coordinates;
    const artifactDir = `${artifact.groupPath}/${artifactId}`;
    const now = this.clock();

    const state = await this.artifactState(artifact.groupPath, artifactId);
    if (!state.observed.has(version)) {
      state.observed.add(version);
      state.versions.add(version);
      state.lastUpdated = formatLastUpdated(now);
    }
    const artifactXml = renderArtifactMetadata({
      groupId,
      artifactId,
      versions: [...state.versions],
      lastUpdated: state.lastUpdated
    });
    this.stageDocument(`${artifactDir}/${METADATA_FILE}`, artifactXml, stage);

    if (isPluginArtifact(artifactId, artifact.path)) {
      const group = await this.groupState(artifact.groupPath);
      if (!group.plugins.has(artifactId)) {
        group.plugins.set(artifactId, { name: artifactId, prefix: pluginPrefix(artifactId), artifactId });
      }
      const groupXml = renderGroupMetadata({ groupId, plugins: [...group.plugins.values()] });
      this.stageDocument(`${artifact.groupPath}/${METADATA_FILE}`, groupXml, stage);
    }

    if (isSnapshotVersion(version)) {
      const versionDir = `${artifactDir}/${version}`;
      const snapshot = await this.snapshotState(versionDir, now);
      if (artifact.snapshot) {
        snapshot.timestamp = artifact.snapshot.timestamp;
        snapshot.buildNumber = artifact.snapshot.buildNumber;
      }
      const { classifier, extension } = artifact.coordinates;
      const baseVersion = version.slice(0, -SNAPSHOT_SUFFIX.length);
      snapshot.files.set(`${classifier ?? ""}:${extension}`, {
        ...(classifier === undefined ? {} : { classifier }),
        extension,
        value: `${baseVersion}-${snapshot.timestamp}-${snapshot.buildNumber}`,
        updated: snapshot.lastUpdated
      });
      const versionXml = renderVersionMetadata({
        groupId,
        artifactId,
        version,
        timestamp: snapshot.timestamp,
        buildNumber: snapshot.buildNumber,
        lastUpdated: snapshot.lastUpdated,
        snapshotVersions: [...snapshot.files.values()]
      });
      this.stageDocument(`${versionDir}/${METADATA_FILE}`, versionXml, stage);
    }
  }

  /**
   * Versions of one artifact: primary files of that artifact in the archive plus the archived metadata.
   * Nested groups below the artifact directory do not count.
   */
  private async artifactState(groupPath: string, artifactId: string): Promise<ArtifactState> {
    const artifactDir = `${groupPath}/${artifactId}`;
    const known = this.artifacts.get(artifactDir);
    if (known) {
      return known;
    }
    const state: ArtifactState = { versions: new Set(), observed: new Set() };
    for (const entry of this.archive.list(artifactDir)) {
      const parsed = parseRepositoryPath(entry);
      if (
        parsed.kind === "artifact" &&
        !parsed.sideExtension &&
        parsed.groupPath === groupPath &&
        parsed.coordinates.artifactId === artifactId
      ) {
        state.versions.add(parsed.coordinates.version);
      }
    }
    const existing = this.archive.read(`${artifactDir}/${METADATA_FILE}`);
    if (existing) {
      const parsed = await parseArtifactMetadata(existing.toString("utf8"));
      parsed.versions.forEach(version => state.versions.add(version));
      state.lastUpdated = parsed.lastUpdated;
    }
    debug(`Seeded ${artifactDir} with ${state.versions.size} version(s).`);
    this.artifacts.set(artifactDir, state);
    return state;
  }

  private async groupState(groupPath: string): Promise<GroupState> {
    const known = this.groups.get(groupPath);
    if (known) {
      return known;
    }
    const state: GroupState = { plugins: new Map() };
    const existing = this.archive.read(`${groupPath}/${METADATA_FILE}`);
    if (existing) {
      const parsed = await parseGroupMetadata(existing.toString("utf8"));
      parsed.plugins.forEach(plugin => state.plugins.set(plugin.artifactId, plugin));
    }
    this.groups.set(groupPath, state);
    return state;
  }

  /**
   * Snapshot state of one `-SNAPSHOT` directory; the build number advances once per pipeline instance.
   */
  private async snapshotState(versionDir: string, now: Date): Promise<SnapshotState> {
    const known = this.snapshots.get(versionDir);
    if (known) {
      return known;
    }
    let previousBuild = 0;
    const files = new Map<string, SnapshotVersionEntry>();
    const existing = this.archive.read(`${versionDir}/${METADATA_FILE}`);
    if (existing) {
      const parsed = await parseVersionMetadata(existing.toString("utf8"));
      previousBuild = parsed.buildNumber ?? 0;
      parsed.snapshotVersions.forEach(entry => files.set(`${entry.classifier ?? ""}:${entry.extension}`, entry));
    }
    const state: SnapshotState = {
      timestamp: formatSnapshotTimestamp(now),
      buildNumber: previousBuild + 1,
      lastUpdated: formatLastUpdated(now),
      files
    };
    this.snapshots.set(versionDir, state);
    return state;
  }
}
