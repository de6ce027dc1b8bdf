/**
 * Catalog and engine wiring for CLI commands
 */

import {
  createSqliteDriver,
  openCatalog,
  type ExecutionEngine,
  type SqlCatalog,
} from "@sqlcatalog/sdk";
import { resolveDatabase, resolveMetadataFile, resolveRoot, isStrict } from "./env.js";
import { CliError } from "./errors.js";

/**
 * Global options shared by every command
 */
export interface GlobalOptions {
  root?: string;
  metadataFile?: string;
  database?: string;
  strict?: boolean;
  verbose?: boolean;
}

/**
 * Open the catalog selected by the global options
 */
export async function openCliCatalog(opts: GlobalOptions): Promise<SqlCatalog> {
  const root = resolveRoot(opts.root);
  return openCatalog({ root, metadataFile: resolveMetadataFile(root, opts.metadataFile) });
}

/**
 * Engine over the configured SQLite database
 * @throws CliError when no database is configured
 */
export function createCliEngine(
  catalog: SqlCatalog,
  opts: GlobalOptions,
  overrides: { strict?: boolean } = {}
): ExecutionEngine {
  const database = resolveDatabase(opts.database);
  if (database === undefined) {
    throw new CliError("No database configured: pass --database or set SQLCATALOG_DATABASE");
  }

  return catalog.createEngine({
    driver: createSqliteDriver(),
    database,
    strict: isStrict(overrides.strict ?? opts.strict),
  });
}
