// CHANGE: Extract CLI orchestration functions for reuse in program entrypoint and tests.
// WHY: Each command opens one session and closes it, or discards it when the operation fails; tests inject the repository.

import { Command } from "commander";
import fs from "fs-extra";
import { basename } from "path";
import { parseEndpoint } from "./endpoint.js";
import { RelAssetError } from "./errors.js";
import { error as logError, info, setLogLevel } from "./logger.js";
import { ReleaseAssetRepository } from "./repository.js";
import { RepositorySession } from "./session.js";

export type CliOptions = {
  readonly token?: string;
  readonly refresh?: boolean;
  readonly debug?: boolean;
};

export type RepositoryFactory = () => ReleaseAssetRepository;

async function withSession<T>(
  createRepository: RepositoryFactory,
  uri: string,
  options: CliOptions,
  work: (session: RepositorySession) => Promise<T>
): Promise<T> {
  const session = await createRepository().open(uri, options.token, { refresh: options.refresh });
  let result: T;
  try {
    result = await work(session);
  } catch (error) {
    session.discard();
    throw error;
  }
  await session.close();
  return result;
}

/**
 * Upload a file, or every file of a directory, and publish the archive.
 *
 * @param target - Repository path of a file, or prefix of a directory; defaults to the file name or the root.
 */
export async function putAction(
  uri: string,
  source: string,
  target: string | undefined,
  options: CliOptions,
  createRepository: RepositoryFactory
): Promise<string[]> {
  const stats = await fs.stat(source);
  return withSession(createRepository, uri, options, async session => {
    if (stats.isDirectory()) {
      return session.putDirectory(source, target ?? "");
    }
    const path = target ?? basename(source);
    await session.writeFile(source, path);
    info(`Staged ${path}.`);
    return [path];
  });
}

/**
 * Print a resource to stdout, or save it to `output`.
 */
export async function getAction(
  uri: string,
  path: string,
  output: string | undefined,
  options: CliOptions,
  createRepository: RepositoryFactory
): Promise<void> {
  const content = await withSession(createRepository, uri, options, session => session.readResource(path));
  if (!content) {
    throw new RelAssetError(`Resource ${path} not found in ${uri}`);
  }
  if (output) {
    await fs.outputFile(output, content);
    info(`Saved ${path} to ${output} (${content.length} bytes).`);
    return;
  }
  process.stdout.write(content);
}

export async function listAction(
  uri: string,
  prefix: string | undefined,
  options: CliOptions,
  createRepository: RepositoryFactory
): Promise<void> {
  const children = await withSession(createRepository, uri, options, session => session.listResources(prefix ?? ""));
  children.forEach(child => console.log(child));
}

export async function existsAction(
  uri: string,
  path: string,
  options: CliOptions,
  createRepository: RepositoryFactory
): Promise<void> {
  const exists = await withSession(createRepository, uri, options, session => session.resourceExists(path));
  console.log(exists ? "true" : "false");
}

/**
 * Show or remove the local cache file of an endpoint. Needs no credential.
 */
export async function cacheAction(
  uri: string,
  clear: boolean,
  createRepository: RepositoryFactory
): Promise<void> {
  const endpoint = parseEndpoint(uri);
  const { cacheManager } = createRepository();
  if (clear) {
    const removed = await cacheManager.evict(endpoint);
    console.log(removed ? `Removed ${cacheManager.archiveFileFor(endpoint)}` : "No cached archive");
    return;
  }
  const entry = await cacheManager.describe(endpoint);
  console.log(entry ? JSON.stringify(entry, null, 2) : "No cached archive");
}

/**
 * Construct commander program with configured commands.
 *
 * @returns Ready-to-use commander instance.
 */
export function buildProgram(createRepository: RepositoryFactory = () => new ReleaseAssetRepository()): Command {
  const program = new Command();
  program
    .name("relasset")
    .description("Maven-style repository stored as a release asset archive")
    .version("1.0.0")
    .option("--token <token>", "token or path to a token file (default: RELASSET_TOKEN)")
    .option("--refresh", "download the remote archive even when cached locally")
    .option("--debug", "enable debug logging");

  program.hook("preAction", () => {
    if (program.opts<CliOptions>().debug) {
      setLogLevel("debug");
    }
  });

  const globals = (): CliOptions => program.opts<CliOptions>();

  program
    .command("put")
    .description("Upload a file or directory and publish the archive")
    .argument("<uri>", "scheme://owner/repo/tag/asset.zip")
    .argument("<source>", "local file or directory")
    .argument("[target]", "repository path or directory prefix")
    .action(async (uri: string, source: string, target: string | undefined) => {
      await putAction(uri, source, target, globals(), createRepository);
    });

  program
    .command("get")
    .description("Read a resource from the archive")
    .argument("<uri>", "scheme://owner/repo/tag/asset.zip")
    .argument("<path>", "repository path")
    .argument("[output]", "file to write instead of stdout")
    .action(async (uri: string, path: string, output: string | undefined) => {
      await getAction(uri, path, output, globals(), createRepository);
    });

  program
    .command("list")
    .description("List the immediate children of a directory")
    .argument("<uri>", "scheme://owner/repo/tag/asset.zip")
    .argument("[prefix]", "directory prefix")
    .action(async (uri: string, prefix: string | undefined) => {
      await listAction(uri, prefix, globals(), createRepository);
    });

  program
    .command("exists")
    .description("Check whether a resource exists")
    .argument("<uri>", "scheme://owner/repo/tag/asset.zip")
    .argument("<path>", "repository path")
    .action(async (uri: string, path: string) => {
      await existsAction(uri, path, globals(), createRepository);
    });

  program
    .command("cache")
    .description("Show or clear the local cache file of an endpoint")
    .argument("<uri>", "scheme://owner/repo/tag/asset.zip")
    .option("--clear", "remove the cached archive")
    .action(async (uri: string, commandOptions: { readonly clear?: boolean }) => {
      await cacheAction(uri, commandOptions.clear ?? false, createRepository);
    });

  return program;
}

/**
 * Execute CLI with provided argv array.
 *
 * @param argv - Process arguments.
 */
export async function runCli(
  argv: readonly string[],
  createRepository?: RepositoryFactory
): Promise<void> {
  const program = buildProgram(createRepository);
  try {
    await program
      .configureOutput({
        outputError: (str: string) => logError(str)
      })
      .parseAsync([...argv]);
  } catch (error) {
    logError(`CLI failed: ${error instanceof Error ? error.message : String(error)}`);
    process.exitCode = 1;
  }
}
