/**
 * SQL Catalog SDK
 *
 * Named, categorized SQL scripts with parameterized and transactional execution
 */

export type {
  BodyLocation,
  ScriptRecord,
  ScriptRecordInput,
  ScriptRecordPatch,
  BodyRemoval,
  RemovalReport,
  MetadataPersistence,
  BodyStorage,
  SqlValue,
  ParameterMap,
  ScriptParameters,
  Row,
  StatementBinding,
  StatementResult,
  DatabaseConnection,
  DatabaseDriver,
  ExecutionState,
  StepResult,
  TransactionReport,
  TransactionOptions,
  ExecutionEngineOptions,
  CatalogOptions,
} from "./types.js";

// Catalog facade
export { openCatalog, SqlCatalog, DEFAULT_METADATA_FILE } from "./catalog.js";
export type {
  AddScriptInput,
  UpdateScriptInput,
  ScriptWithContent,
  RemoveScriptOptions,
} from "./catalog.js";

// Core components
export { MetadataIndex } from "./metadata-index.js";
export type { MetadataIndexOptions, RemoveOptions } from "./metadata-index.js";
export { ScriptRepository } from "./repository.js";
export type { ResolvedScript, StoreResult, BodyTarget } from "./repository.js";
export { ExecutionEngine, ExecutionRequest } from "./engine.js";

// Collaborators
export { JsonMetadataFile, METADATA_VERSION } from "./metadata-file.js";
export { FileBodyStorage } from "./body-storage.js";
export { InMemoryBodyStorage, InMemoryMetadata } from "./memory.js";
export { createSqliteDriver, sqliteFilename, sqlSnippet } from "./drivers/sqlite.js";
export type { SqliteDriverOptions } from "./drivers/sqlite.js";

// Utilities
export { bindScript, scanScript } from "./binding.js";
export type { Placeholder, ScannedStatement, BoundStatement } from "./binding.js";
export { toSlug, bodyPathFor, BODY_EXTENSION } from "./slug.js";
export { stableStringify } from "./format.js";
export { validateLabel, validateBody } from "./validation.js";
export { atomicWrite, readTextFile, removeFile, fileExists, ensureDirectory } from "./io.js";

// Observability
export { logger, formatLogEntry } from "./observability/logs.js";
export type { LogLevel, LogEntry, LogFields, LogSink } from "./observability/logs.js";
export { metrics } from "./observability/metrics.js";
export type { ScriptMetrics, TransactionMetrics } from "./observability/metrics.js";

// Errors
export {
  SqlCatalogError,
  FileNotFoundError,
  FileReadError,
  FileWriteError,
  FileRemoveError,
  DirectoryError,
  DuplicateNameError,
  NotFoundError,
  ScriptNotFoundError,
  BodyNotFoundError,
  BodyReadError,
  BodyWriteError,
  BodyDeleteError,
  BodyConflictError,
  InvalidRecordError,
  ParameterBindingError,
  ArgumentMismatchError,
  ConnectionError,
  ExecutionError,
  RollbackError,
  MetadataReadError,
  MetadataWriteError,
  describeError,
} from "./errors.js";
