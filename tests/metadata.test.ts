// CHANGE: Check metadata rendering, parsing and version ordering.
// WHY: Rendered XML must list versions in a stable order so that repeated writes produce identical files.

import { describe, expect, it } from "vitest";
import {
  compareVersions,
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
} from "../src/metadata.js";

describe("compareVersions", () => {
  it.each([
    ["1.9", "1.10", -1],
    ["1.0-SNAPSHOT", "1.0", -1],
    ["1.0-alpha", "1.0", -1],
    ["1.0-alpha", "1.0-beta", -1],
    ["1.0", "1.0.0", 0],
    ["1.0.1", "1.0", 1],
    ["1.0-1", "1.0-alpha", 1],
    ["2.0", "10.0", -1]
  ])("%s vs %s is %i", (left, right, expected) => {
    expect(compareVersions(left, right)).toBe(expected);
    expect(compareVersions(right, left)).toBe(expected === 0 ? 0 : -expected);
  });

  it("sorts snapshots below every release of the same version", () => {
    const versions = ["1.10", "1.0-SNAPSHOT", "1.9", "1.0", "1.0-alpha", "2.0-SNAPSHOT"];
    expect([...versions].sort(compareVersions)).toEqual(["1.0-SNAPSHOT", "1.0-alpha", "1.0", "1.9", "1.10", "2.0-SNAPSHOT"]);
  });
});

describe("timestamps", () => {
  const date = new Date(Date.UTC(2024, 0, 2, 3, 4, 5));

  it("formats lastUpdated and snapshot timestamps in UTC", () => {
    expect(formatLastUpdated(date)).toBe("20240102030405");
    expect(formatSnapshotTimestamp(date)).toBe("20240102.030405");
  });
});

describe("plugins", () => {
  it.each([
    ["maven-compiler-plugin", "compiler"],
    ["exec-maven-plugin", "exec"],
    ["lint-plugin", "lint"],
    ["toolkit", "toolkit"]
  ])("prefix of %s is %s", (artifactId, prefix) => {
    expect(pluginPrefix(artifactId)).toBe(prefix);
  });

  it("detects plugin artifacts by name or path", () => {
    expect(isPluginArtifact("lint-plugin", "com/example/lint-plugin/1.0/lint-plugin-1.0.jar")).toBe(true);
    expect(isPluginArtifact("tool", "com/example/maven-plugin/tool/1.0/tool-1.0.jar")).toBe(true);
    expect(isPluginArtifact("tool", "com/example/tool/1.0/tool-1.0.jar")).toBe(false);
  });
});

describe("renderArtifactMetadata", () => {
  const metadata = {
    groupId: "com.example",
    artifactId: "foo",
    versions: ["1.10", "1.0-SNAPSHOT", "1.9", "1.9"],
    lastUpdated: "20240102030405"
  };

  it("lists distinct versions in order with latest and release", async () => {
    const xml = renderArtifactMetadata(metadata);
    expect(xml.startsWith('<?xml version="1.0" encoding="UTF-8"?>')).toBe(true);
    expect(xml).toContain("<latest>1.10</latest>");
    expect(xml).toContain("<release>1.10</release>");
    expect(xml).toContain("<lastUpdated>20240102030405</lastUpdated>");
    expect(await parseArtifactMetadata(xml)).toEqual({
      groupId: "com.example",
      artifactId: "foo",
      versions: ["1.0-SNAPSHOT", "1.9", "1.10"],
      lastUpdated: "20240102030405"
    });
  });

  it("renders the same bytes for the same state", () => {
    expect(renderArtifactMetadata({ ...metadata, versions: ["1.9", "1.10", "1.0-SNAPSHOT"] })).toBe(
      renderArtifactMetadata(metadata)
    );
  });

  it("omits release when only snapshots exist", () => {
    const xml = renderArtifactMetadata({ groupId: "com.example", artifactId: "foo", versions: ["1.0-SNAPSHOT"] });
    expect(xml).toContain("<latest>1.0-SNAPSHOT</latest>");
    expect(xml).not.toContain("<release>");
  });
});

describe("renderGroupMetadata", () => {
  it("lists plugins sorted by artifactId", async () => {
    const xml = renderGroupMetadata({
      groupId: "com.example",
      plugins: [
        { name: "zeta-maven-plugin", prefix: "zeta", artifactId: "zeta-maven-plugin" },
        { name: "maven-alpha-plugin", prefix: "alpha", artifactId: "maven-alpha-plugin" }
      ]
    });
    expect(xml).toContain("<prefix>alpha</prefix>");
    expect((await parseGroupMetadata(xml)).plugins.map(plugin => plugin.artifactId)).toEqual([
      "maven-alpha-plugin",
      "zeta-maven-plugin"
    ]);
  });
});

describe("renderVersionMetadata", () => {
  it("describes the latest snapshot build of each file", async () => {
    const xml = renderVersionMetadata({
      groupId: "com.example",
      artifactId: "foo",
      version: "1.0-SNAPSHOT",
      timestamp: "20240102.030405",
      buildNumber: 3,
      lastUpdated: "20240102030405",
      snapshotVersions: [
        { extension: "jar", value: "1.0-20240102.030405-3", updated: "20240102030405" },
        { classifier: "sources", extension: "jar", value: "1.0-20240102.030405-3", updated: "20240102030405" }
      ]
    });
    expect(xml).toContain("<buildNumber>3</buildNumber>");
    expect(await parseVersionMetadata(xml)).toEqual({
      groupId: "com.example",
      artifactId: "foo",
      version: "1.0-SNAPSHOT",
      timestamp: "20240102.030405",
      buildNumber: 3,
      lastUpdated: "20240102030405",
      snapshotVersions: [
        { extension: "jar", value: "1.0-20240102.030405-3", updated: "20240102030405" },
        { classifier: "sources", extension: "jar", value: "1.0-20240102.030405-3", updated: "20240102030405" }
      ]
    });
  });
});
