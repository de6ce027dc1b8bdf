/**
 * Core types for the SQL catalog
 */

/**
 * Where a script body lives
 *
 * `inline` bodies are embedded in the metadata file; `file` bodies are plain
 * `.sql` files. Relative paths resolve against the scripts directory.
 */
export type BodyLocation =
  | { readonly kind: "inline"; readonly text: string }
  | { readonly kind: "file"; readonly path: string };

/**
 * One cataloged script
 */
export interface ScriptRecord {
  /** Unique lookup key (case-sensitive) */
  name: string;
  /** Grouping label; also the folder of file-backed bodies */
  category: string;
  /** Free text, may be empty */
  description: string;
  body: BodyLocation;
  /** ISO-8601 timestamp set on insert */
  createdAt: string;
  /** ISO-8601 timestamp refreshed on every content mutation */
  updatedAt: string;
}

/**
 * Record as supplied by callers; timestamps are assigned by the index
 */
export type ScriptRecordInput = Omit<ScriptRecord, "createdAt" | "updatedAt" | "description"> & {
  description?: string;
};

/**
 * Fields that may change on an existing record
 */
export interface ScriptRecordPatch {
  category?: string;
  description?: string;
  body?: BodyLocation;
}

/**
 * Outcome of deleting a body file while removing a record
 */
export type BodyRemoval =
  | { status: "kept" }
  | { status: "deleted"; path: string }
  | { status: "missing"; path: string }
  | { status: "failed"; path: string; error: Error };

/**
 * Result of `MetadataIndex.remove`: metadata removal and body deletion are reported separately
 */
export interface RemovalReport {
  record: ScriptRecord;
  body: BodyRemoval;
}

/**
 * Loads and saves the full ordered record collection
 */
export interface MetadataPersistence {
  /** Human-readable location, used in messages */
  readonly location: string;
  load(): Promise<ScriptRecord[]>;
  save(records: readonly ScriptRecord[]): Promise<void>;
}

/**
 * Reads and writes script bodies stored outside the metadata
 */
export interface BodyStorage {
  /** @throws FileNotFoundError when the body is absent */
  read(path: string): Promise<string>;
  /** @returns false when the existing content was already identical */
  write(path: string, text: string): Promise<boolean>;
  /** @throws FileNotFoundError when the body is absent */
  delete(path: string): Promise<void>;
  exists(path: string): Promise<boolean>;
  /** Absolute location of a stored body */
  resolvePath(path: string): string;
}

/**
 * Values the driver can bind
 */
export type SqlValue = string | number | bigint | boolean | null | Buffer;

/**
 * Mapping from placeholder key to value
 *
 * Keys name `:key`, `@key` and `$key` placeholders. For `?` placeholders the
 * values are taken in enumeration order, which puts integer-like keys first;
 * a map mixing such keys with other names is rejected for `?` scripts.
 */
export type ParameterMap = Readonly<Record<string, SqlValue>>;

/**
 * Placeholder values of one script: a map, or an array for `?` placeholders
 */
export type ScriptParameters = ParameterMap | readonly SqlValue[];

/**
 * One result row, keyed by column name
 */
export type Row = Record<string, unknown>;

/**
 * Parameters prepared for one statement
 */
export type StatementBinding =
  | { kind: "none" }
  | { kind: "positional"; values: SqlValue[] }
  | { kind: "named"; values: Record<string, SqlValue> };

/**
 * Result of one statement
 */
export interface StatementResult {
  /** True when the statement produces rows (SELECT, RETURNING, some PRAGMAs) */
  returnsRows: boolean;
  rows: Row[];
  changes: number;
}

/**
 * Live connection owned by exactly one execution request
 */
export interface DatabaseConnection {
  execute(sql: string, binding: StatementBinding): Promise<StatementResult>;
  begin(): Promise<void>;
  commit(): Promise<void>;
  rollback(): Promise<void>;
  close(): Promise<void>;
}

/**
 * Opens connections from a descriptor (path, URL or DSN, driver-specific)
 */
export interface DatabaseDriver {
  readonly name: string;
  open(descriptor: string): Promise<DatabaseConnection>;
}

/**
 * Lifecycle of one execution request
 */
export type ExecutionState =
  | "idle"
  | "resolving"
  | "bound"
  | "executing"
  | "committed"
  | "rolled_back"
  | "failed";

/**
 * Outcome of one script inside a transaction
 */
export type StepResult =
  | { ok: true; name: string; rows: Row[] }
  | { ok: false; name: string; error: Error };

/**
 * Aggregate of a transaction run
 */
export interface TransactionReport {
  success: boolean;
  state: ExecutionState;
  /** Steps that were attempted, in order; execution stops at the first failure */
  steps: StepResult[];
  /** Error that triggered the rollback */
  error?: Error;
  /** Set when the rollback itself failed */
  rollbackError?: Error;
}

/**
 * Options for transaction calls
 */
export interface TransactionOptions {
  /** Rethrow the triggering error after rollback instead of returning false */
  strict?: boolean;
}

/**
 * Engine configuration
 */
export interface ExecutionEngineOptions {
  driver: DatabaseDriver;
  /** Passed to `driver.open` for every request */
  database: string;
  /** Default for `TransactionOptions.strict` (default: false) */
  strict?: boolean;
}

/**
 * Catalog configuration
 */
export interface CatalogOptions {
  /** Root directory of the catalog */
  root: string;
  /** Metadata file (default: `<root>/scripts_metadata.json`) */
  metadataFile?: string;
  /** Directory of file-backed bodies (default: root) */
  scriptsDir?: string;
  /** JSON indentation of the metadata file (default: 2) */
  indent?: number;
}
