/**
 * SQLite driver built on better-sqlite3
 *
 * Descriptors:
 * - a file path (`./app.db`, `/var/data/app.db`)
 * - `:memory:` (a fresh database per connection)
 * - a `sqlite:` URL: `sqlite:///abs/path.db`, `sqlite:relative/path.db`,
 *   `sqlite://` or `sqlite::memory:` for memory
 */

import Database from "better-sqlite3";
import {
  ConnectionError,
  ExecutionError,
  ParameterBindingError,
  describeError,
} from "../errors.js";
import type {
  DatabaseConnection,
  DatabaseDriver,
  Row,
  SqlValue,
  StatementBinding,
  StatementResult,
} from "../types.js";

export interface SqliteDriverOptions {
  /** Busy timeout in milliseconds (default: 5000) */
  timeoutMs?: number;
  /** Open connections read-only */
  readonly?: boolean;
  /** Fail instead of creating the database file when it does not exist */
  fileMustExist?: boolean;
}

const SNIPPET_LENGTH = 120;

/**
 * Translate a descriptor into the filename better-sqlite3 expects
 */
export function sqliteFilename(descriptor: string): string {
  const trimmed = descriptor.trim();
  if (!trimmed.startsWith("sqlite:")) {
    return trimmed;
  }

  let rest = trimmed.slice("sqlite:".length);
  // Empty authority: sqlite:///abs/path
  if (rest.startsWith("//")) {
    rest = rest.slice(2);
  }

  return rest === "" || rest === "/:memory:" ? ":memory:" : rest;
}

/**
 * Shorten SQL for error messages
 */
export function sqlSnippet(sql: string): string {
  const flat = sql.replace(/\s+/g, " ").trim();
  return flat.length > SNIPPET_LENGTH ? `${flat.slice(0, SNIPPET_LENGTH)}...` : flat;
}

function toSqliteValue(value: SqlValue): string | number | bigint | Buffer | null {
  if (typeof value === "boolean") {
    return value ? 1 : 0;
  }
  return value;
}

class SqliteConnection implements DatabaseConnection {
  #db: Database.Database | null;

  constructor(db: Database.Database) {
    this.#db = db;
  }

  #handle(): Database.Database {
    if (!this.#db) {
      throw new ExecutionError("Connection is closed");
    }
    return this.#db;
  }

  async execute(sql: string, binding: StatementBinding): Promise<StatementResult> {
    const db = this.#handle();

    let statement: Database.Statement<unknown[], Row>;
    try {
      statement = db.prepare<unknown[], Row>(sql);
    } catch (err) {
      throw new ExecutionError(`Failed to prepare "${sqlSnippet(sql)}": ${describeError(err)}`, {
        cause: err,
      });
    }

    const args = bindingArguments(binding);

    try {
      if (statement.reader) {
        const rows = statement.all(...args);
        return { returnsRows: true, rows, changes: 0 };
      }
      const info = statement.run(...args);
      return { returnsRows: false, rows: [], changes: info.changes };
    } catch (err) {
      // better-sqlite3 reports binding problems as RangeError/TypeError
      if (err instanceof RangeError || err instanceof TypeError) {
        throw new ParameterBindingError(
          `Cannot bind parameters for "${sqlSnippet(sql)}": ${err.message}`,
          [],
          { cause: err }
        );
      }
      throw new ExecutionError(`Statement failed "${sqlSnippet(sql)}": ${describeError(err)}`, {
        cause: err,
      });
    }
  }

  async begin(): Promise<void> {
    this.#command("BEGIN");
  }

  async commit(): Promise<void> {
    this.#command("COMMIT");
  }

  async rollback(): Promise<void> {
    this.#command("ROLLBACK");
  }

  async close(): Promise<void> {
    if (!this.#db) {
      return;
    }
    const db = this.#db;
    this.#db = null;
    try {
      db.close();
    } catch (err) {
      throw new ExecutionError(`Failed to close connection: ${describeError(err)}`, { cause: err });
    }
  }

  #command(command: "BEGIN" | "COMMIT" | "ROLLBACK"): void {
    try {
      this.#handle().exec(command);
    } catch (err) {
      throw new ExecutionError(`${command} failed: ${describeError(err)}`, { cause: err });
    }
  }
}

function bindingArguments(binding: StatementBinding): unknown[] {
  switch (binding.kind) {
    case "none":
      return [];
    case "positional":
      return binding.values.map(toSqliteValue);
    case "named": {
      const values: Record<string, unknown> = {};
      for (const [key, value] of Object.entries(binding.values)) {
        values[key] = toSqliteValue(value);
      }
      return [values];
    }
  }
}

/**
 * Create a SQLite driver
 */
export function createSqliteDriver(options: SqliteDriverOptions = {}): DatabaseDriver {
  const timeout = options.timeoutMs ?? 5000;

  return {
    name: "sqlite",

    async open(descriptor: string): Promise<DatabaseConnection> {
      const filename = sqliteFilename(descriptor);
      try {
        const db = new Database(filename, {
          timeout,
          readonly: options.readonly ?? false,
          fileMustExist: options.fileMustExist ?? false,
        });
        return new SqliteConnection(db);
      } catch (err) {
        throw new ConnectionError(descriptor, { cause: err });
      }
    },
  };
}
