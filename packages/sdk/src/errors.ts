/**
 * Error types for SQL catalog operations
 *
 * Invariants:
 * - Every message names what was being operated on (script, category, path or SQL)
 * - All errors support a `cause` property for wrapping underlying errors
 * - All errors have stable `name` and `code` fields for programmatic handling
 */

/**
 * Base class for all SQL catalog errors
 */
export abstract class SqlCatalogError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when a file cannot be found
 */
export class FileNotFoundError extends SqlCatalogError {
  readonly code = "ENOENT";

  constructor(
    public readonly path: string,
    options?: ErrorOptions
  ) {
    super(`File not found: ${path}`, options);
  }
}

/**
 * Thrown when a file read operation fails
 */
export class FileReadError extends SqlCatalogError {
  readonly code = "READ_ERROR";

  constructor(
    public readonly path: string,
    options?: ErrorOptions
  ) {
    super(`Failed to read file: ${path}`, options);
  }
}

/**
 * Thrown when a file write operation fails
 */
export class FileWriteError extends SqlCatalogError {
  readonly code = "WRITE_ERROR";

  constructor(
    public readonly path: string,
    options?: ErrorOptions
  ) {
    super(`Failed to write file: ${path}`, options);
  }
}

/**
 * Thrown when a file removal operation fails
 */
export class FileRemoveError extends SqlCatalogError {
  readonly code = "REMOVE_ERROR";

  constructor(
    public readonly path: string,
    options?: ErrorOptions
  ) {
    super(`Failed to remove file: ${path}`, options);
  }
}

/**
 * Thrown when a directory operation fails
 */
export class DirectoryError extends SqlCatalogError {
  readonly code = "DIRECTORY_ERROR";

  constructor(
    public readonly path: string,
    options?: ErrorOptions
  ) {
    super(`Directory operation failed: ${path}`, options);
  }
}

/**
 * Thrown when a script name is already taken in the index
 */
export class DuplicateNameError extends SqlCatalogError {
  readonly code: string = "E_DUPLICATE";

  constructor(
    public readonly scriptName: string,
    options?: ErrorOptions
  ) {
    super(`Script "${scriptName}" already exists`, options);
  }
}

/**
 * Thrown when a metadata operation targets a script or category that is not cataloged
 */
export class NotFoundError extends SqlCatalogError {
  readonly code: string = "E_NOT_FOUND";

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
  }

  static forScript(name: string, operation: string): NotFoundError {
    return new NotFoundError(`Cannot ${operation} script "${name}": not found`);
  }
}

/**
 * Thrown when execution is requested for a name the index does not know
 */
export class ScriptNotFoundError extends NotFoundError {
  override readonly code: string = "E_SCRIPT_NOT_FOUND";

  constructor(
    public readonly scriptName: string,
    options?: ErrorOptions
  ) {
    super(`Script "${scriptName}" not found`, options);
  }
}

/**
 * Thrown when a file-backed body points at a file that does not exist
 */
export class BodyNotFoundError extends SqlCatalogError {
  readonly code = "E_BODY_NOT_FOUND";

  constructor(
    public readonly scriptName: string,
    public readonly category: string,
    public readonly path: string,
    options?: ErrorOptions
  ) {
    super(`Body file for script "${scriptName}" (category "${category}") not found: ${path}`, options);
  }
}

/**
 * Thrown when a body file exists but cannot be read
 */
export class BodyReadError extends SqlCatalogError {
  readonly code = "E_BODY_READ";

  constructor(
    public readonly scriptName: string,
    public readonly category: string,
    public readonly path: string,
    options?: ErrorOptions
  ) {
    super(`Failed to read body of script "${scriptName}" (category "${category}"): ${path}`, options);
  }
}

/**
 * Thrown when a body file cannot be written
 */
export class BodyWriteError extends SqlCatalogError {
  readonly code = "E_BODY_WRITE";

  constructor(
    public readonly path: string,
    options?: ErrorOptions
  ) {
    super(`Failed to write script body: ${path}`, options);
  }
}

/**
 * Thrown when a body file cannot be deleted
 */
export class BodyDeleteError extends SqlCatalogError {
  readonly code = "E_BODY_DELETE";

  constructor(
    public readonly path: string,
    options?: ErrorOptions
  ) {
    super(`Failed to delete script body: ${path}`, options);
  }
}

/**
 * Thrown when two scripts would share the same body file
 */
export class BodyConflictError extends SqlCatalogError {
  readonly code = "E_BODY_CONFLICT";

  constructor(
    public readonly scriptName: string,
    public readonly path: string,
    public readonly ownerName: string,
    options?: ErrorOptions
  ) {
    super(
      `Body path ${path} for script "${scriptName}" is already used by script "${ownerName}"`,
      options
    );
  }
}

/**
 * Thrown when a script name or category is malformed
 */
export class InvalidRecordError extends SqlCatalogError {
  readonly code = "E_INVALID";

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
  }
}

/**
 * Thrown when parameters do not cover the placeholders of a script
 */
export class ParameterBindingError extends SqlCatalogError {
  readonly code = "E_BINDING";

  constructor(
    message: string,
    public readonly missing: readonly string[] = [],
    options?: ErrorOptions
  ) {
    super(message, options);
  }
}

/**
 * Thrown when the arguments of a call do not line up (name/parameter counts, indexes)
 */
export class ArgumentMismatchError extends SqlCatalogError {
  readonly code = "E_ARGUMENTS";

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
  }
}

/**
 * Thrown when the database cannot be opened
 */
export class ConnectionError extends SqlCatalogError {
  readonly code = "E_CONNECTION";

  constructor(
    public readonly descriptor: string,
    options?: ErrorOptions
  ) {
    super(`Failed to open database connection: ${descriptor}`, options);
  }
}

/**
 * Thrown when the driver rejects a statement or a transaction command
 */
export class ExecutionError extends SqlCatalogError {
  readonly code = "E_EXECUTION";

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
  }
}

/**
 * Reported when rolling back a failed transaction fails as well
 */
export class RollbackError extends SqlCatalogError {
  readonly code = "E_ROLLBACK";

  constructor(
    public readonly triggeringError: unknown,
    options?: ErrorOptions
  ) {
    super(`Rollback failed after transaction error: ${describeError(triggeringError)}`, options);
  }
}

/**
 * Thrown when the metadata file exists but cannot be read or parsed
 */
export class MetadataReadError extends SqlCatalogError {
  readonly code = "E_METADATA_READ";

  constructor(filePath: string, reason: string, options?: ErrorOptions) {
    super(`Failed to load script metadata from ${filePath}: ${reason}`, options);
  }
}

/**
 * Thrown when the metadata file cannot be written
 */
export class MetadataWriteError extends SqlCatalogError {
  readonly code = "E_METADATA_WRITE";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Failed to save script metadata to ${filePath}`, options);
  }
}

/**
 * Render any thrown value as a single-line message
 */
export function describeError(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}
