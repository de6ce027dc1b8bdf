/**
 * Environment and configuration resolution
 *
 * Priority for every setting: CLI option > environment variable > default.
 * Empty environment variables count as unset.
 */

import * as path from "node:path";
import { homedir } from "node:os";
import { DEFAULT_METADATA_FILE } from "@sqlcatalog/sdk";

/**
 * Expand tilde (~) to home directory
 */
export function expandTilde(input: string): string {
  if (!input.startsWith("~")) {
    return input;
  }

  if (input === "~") {
    return homedir();
  }

  const match = input.match(/^~([\\/]|$)(.*)/);
  if (!match) {
    // "~user" style references are left untouched
    return input;
  }

  const rest = match[2] ?? "";
  return path.join(homedir(), rest);
}

/**
 * Resolve the catalog root directory
 * Priority: CLI option > SQLCATALOG_ROOT env var > default "./scripts"
 */
export function resolveRoot(cliRoot?: string): string {
  const root = cliRoot ?? (process.env.SQLCATALOG_ROOT || "./scripts");
  return path.resolve(expandTilde(root));
}

/**
 * Resolve the metadata file; relative paths are taken from the catalog root
 */
export function resolveMetadataFile(root: string, cliFile?: string): string {
  const file = cliFile ?? (process.env.SQLCATALOG_METADATA || DEFAULT_METADATA_FILE);
  return path.resolve(root, expandTilde(file));
}

/**
 * Resolve the database descriptor, if any
 *
 * Descriptors may be URLs, so only a leading tilde is expanded.
 */
export function resolveDatabase(cliDatabase?: string): string | undefined {
  const database = cliDatabase ?? process.env.SQLCATALOG_DATABASE;
  if (database === undefined || database.trim() === "") {
    return undefined;
  }
  return expandTilde(database.trim());
}

/**
 * Whether failed transactions rethrow their triggering error
 */
export function isStrict(cliStrict?: boolean): boolean {
  return cliStrict === true || process.env.SQLCATALOG_STRICT === "1";
}

/**
 * Check if running in verbose mode
 */
export function isVerbose(): boolean {
  return process.env.SQLCATALOG_CLI_DEBUG === "1";
}

/**
 * Check if output is a TTY
 */
export function isTTY(): boolean {
  return process.stdout.isTTY ?? false;
}
