/**
 * File system test utilities
 */

import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { openCatalog } from "@sqlcatalog/sdk";
import type { CatalogOptions, SqlCatalog } from "@sqlcatalog/sdk";

/**
 * Create a unique temporary directory for testing
 * @param prefix - Prefix for the temp directory (default: "sqlcatalog-test-")
 * @returns Absolute path to temp directory
 */
export async function createTempRoot(prefix = "sqlcatalog-test-"): Promise<string> {
  return await mkdtemp(join(tmpdir(), prefix));
}

/**
 * Remove a directory recursively
 */
export async function removeDir(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}

/**
 * Execute a function with a catalog in a fresh temp root, cleaning up after
 * @param options - Optional catalog options (root will be overridden)
 */
export async function withTempCatalog<T>(
  fn: (catalog: SqlCatalog, root: string) => Promise<T>,
  options?: Partial<CatalogOptions>
): Promise<T> {
  return withTempDir(async (root) => fn(await openCatalog({ ...options, root }), root));
}

/**
 * Execute a function with a clean temp directory
 * @returns Result of fn
 */
export async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await createTempRoot();
  try {
    return await fn(dir);
  } finally {
    await removeDir(dir);
  }
}
