// CHANGE: Check checksum side file generation and side file detection.
// WHY: The pipeline skips side files and stages exactly three digests for every other write.

import { describe, expect, it } from "vitest";
import { checksumFiles, isSideFile, sideFileExtension } from "../src/checksums.js";
import { digest, sha1 } from "../src/utils/hashing.js";

const ABC = Buffer.from("abc");

describe("checksums", () => {
  it("computes the well-known digests of abc", () => {
    expect(digest("md5", ABC)).toBe("900150983cd24fb0d6963f7d28e17f72");
    expect(sha1("abc")).toBe("a9993e364706816aba3e25717850c26c9cd0d89d");
  });

  it("derives md5, sha1 and sha256 side files", () => {
    const files = checksumFiles("com/example/foo/1.0/foo-1.0.jar", ABC);
    expect(files.map(file => [file.path, file.content.toString()])).toEqual([
      ["com/example/foo/1.0/foo-1.0.jar.md5", "900150983cd24fb0d6963f7d28e17f72"],
      ["com/example/foo/1.0/foo-1.0.jar.sha1", "a9993e364706816aba3e25717850c26c9cd0d89d"],
      [
        "com/example/foo/1.0/foo-1.0.jar.sha256",
        "ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad"
      ]
    ]);
  });

  it.each([
    ["foo-1.0.jar", undefined],
    ["foo-1.0.jar.md5", "md5"],
    ["foo-1.0.jar.SHA1", "sha1"],
    ["foo-1.0.jar.sha512", "sha512"],
    ["foo-1.0.jar.asc", "asc"]
  ])("side file extension of %s is %s", (path, expected) => {
    expect(sideFileExtension(path)).toBe(expected);
    expect(isSideFile(path)).toBe(expected !== undefined);
  });
});
