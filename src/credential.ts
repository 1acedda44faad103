// CHANGE: Resolve the bearer credential once per session.
// WHY: CI systems pass either the token itself or a path to a mounted secret file.

import fs from "fs-extra";
import { ConfigurationError } from "./errors.js";
import { debug } from "./logger.js";

/**
 * Resolve a token literal or a path to a file containing the token.
 *
 * @param source - Token value or file path.
 * @returns Trimmed token.
 * @throws ConfigurationError when no usable token is found.
 */
export async function resolveCredential(source: string | undefined): Promise<string> {
  const candidate = source?.trim() ?? "";
  if (candidate === "") {
    throw new ConfigurationError("A token is required (set RELASSET_TOKEN or pass --token)");
  }
  if (await fs.pathExists(candidate)) {
    let content: string;
    try {
      content = await fs.readFile(candidate, "utf8");
    } catch (cause) {
      throw new ConfigurationError(`Failed to read token from file ${candidate}`, { cause });
    }
    const token = content.trim();
    if (token === "") {
      throw new ConfigurationError(`Token file ${candidate} is empty`);
    }
    debug(`Token read from file ${candidate}.`);
    return token;
  }
  return candidate;
}
