// CHANGE: Confirm CLI wiring exposes the repository commands and drives sessions end to end.
// WHY: Each command opens one session against the injected repository and closes it.

import fs from "fs-extra";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { buildProgram, cacheAction, existsAction, getAction, listAction, putAction, runCli } from "../src/cli.js";
import { parseEndpoint } from "../src/endpoint.js";
import { InvalidResourcePathError } from "../src/errors.js";
import { setLogLevel } from "../src/logger.js";
import { ReleaseAssetRepository } from "../src/repository.js";
import { FakeGitHub } from "./support/fake-github.js";
import { createTempDir, createTestRepository } from "./support/harness.js";

const URI = "gh://acme/widgets/v1/repository.zip";
const options = { token: "test-secret" };

describe("CLI program", () => {
  it("registers expected commands", () => {
    const program = buildProgram();
    expect(program.commands.map(command => command.name())).toEqual(["put", "get", "list", "exists", "cache"]);
  });
});

describe("CLI actions", () => {
  let fake: FakeGitHub;
  let workDir: string;
  let cacheRoot: string;
  let factory: () => ReleaseAssetRepository;

  beforeEach(async () => {
    fake = new FakeGitHub();
    workDir = await createTempDir();
    cacheRoot = join(workDir, "cache");
    factory = () => createTestRepository(fake, cacheRoot);
    setLogLevel("warn");
    vi.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    setLogLevel("info");
    await fs.remove(workDir);
  });

  function printed(): unknown[] {
    return vi.mocked(console.log).mock.calls.map(call => call[0]);
  }

  it("puts a single file under an explicit path and reads it back", async () => {
    const source = join(workDir, "foo-1.0.jar");
    await fs.writeFile(source, "jar-bytes");
    const written = await putAction(URI, source, "com/example/foo/1.0/foo-1.0.jar", options, factory);
    expect(written).toEqual(["com/example/foo/1.0/foo-1.0.jar"]);
    expect(fake.findRelease("v1")?.assets.map(asset => asset.name)).toEqual(["repository.zip"]);

    const output = join(workDir, "out", "foo.jar");
    await getAction(URI, "com/example/foo/1.0/foo-1.0.jar", output, options, factory);
    expect(await fs.readFile(output, "utf8")).toBe("jar-bytes");
  });

  it("defaults the target of a file to its name", async () => {
    const source = join(workDir, "notes.txt");
    await fs.writeFile(source, "hello");
    await expect(putAction(URI, source, undefined, options, factory)).resolves.toEqual(["notes.txt"]);
  });

  it("lists children and answers existence checks", async () => {
    const source = join(workDir, "foo-1.0.jar");
    await fs.writeFile(source, "jar-bytes");
    await putAction(URI, source, "com/example/foo/1.0/foo-1.0.jar", options, factory);

    await listAction(URI, "com/example", options, factory);
    await existsAction(URI, "com/example/foo/1.0/foo-1.0.jar.sha1", options, factory);
    await existsAction(URI, "com/example/foo/2.0/foo-2.0.jar", options, factory);
    expect(printed().slice(-3)).toEqual(["foo/", "true", "false"]);
  });

  it("fails get for a missing resource", async () => {
    await expect(getAction(URI, "missing.txt", undefined, options, factory)).rejects.toThrow(
      `Resource missing.txt not found in ${URI}`
    );
  });

  it("releases the cache when a command fails inside its session", async () => {
    const repository = factory();
    const shared = () => repository;
    await expect(getAction(URI, "../x", undefined, options, shared)).rejects.toBeInstanceOf(InvalidResourcePathError);
    expect(repository.cacheManager.isHeld(repository.cacheManager.cacheKeyFor(parseEndpoint(URI)))).toBe(false);

    await existsAction(URI, "a.txt", options, shared);
    expect(printed()).toEqual(["false"]);
  });

  it("describes and clears the local cache", async () => {
    await cacheAction(URI, false, factory);
    const source = join(workDir, "notes.txt");
    await fs.writeFile(source, "hello");
    await putAction(URI, source, undefined, options, factory);
    const file = factory().cacheManager.archiveFileFor(parseEndpoint(URI));
    await cacheAction(URI, true, factory);
    await cacheAction(URI, true, factory);
    expect(printed().slice(-2)).toEqual([`Removed ${file}`, "No cached archive"]);
    expect(printed()[0]).toBe("No cached archive");
  });

  it("reports failures through the exit code", async () => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    const previous = process.exitCode;
    await runCli(["node", "relasset", "--token", "test-secret", "get", "not-a-uri", "a.txt"], factory);
    expect(process.exitCode).toBe(1);
    process.exitCode = previous;
  });
});
