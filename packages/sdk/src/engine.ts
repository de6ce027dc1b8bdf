/**
 * Execution engine: resolves scripts, binds parameters and runs them
 *
 * Every request owns exactly one connection, opened for the request and closed
 * when it settles. Atomicity spans one transaction call; separate
 * `executeByName` calls are never grouped.
 */

import { bindScript, type BoundStatement } from "./binding.js";
import {
  ArgumentMismatchError,
  ExecutionError,
  NotFoundError,
  RollbackError,
  describeError,
} from "./errors.js";
import { logger } from "./observability/logs.js";
import { metrics } from "./observability/metrics.js";
import type { ScriptRepository } from "./repository.js";
import type {
  DatabaseConnection,
  DatabaseDriver,
  ExecutionEngineOptions,
  ExecutionState,
  ScriptParameters,
  Row,
  StepResult,
  TransactionOptions,
  TransactionReport,
} from "./types.js";

const TRANSITIONS: Record<ExecutionState, readonly ExecutionState[]> = {
  idle: ["resolving", "failed"],
  resolving: ["bound", "rolled_back", "failed"],
  bound: ["executing", "failed"],
  // A transaction goes back to resolving for its next script
  executing: ["resolving", "committed", "rolled_back", "failed"],
  committed: [],
  rolled_back: [],
  failed: [],
};

/**
 * Lifecycle of one execution request
 */
export class ExecutionRequest {
  #state: ExecutionState = "idle";

  constructor(readonly label: string) {}

  get state(): ExecutionState {
    return this.#state;
  }

  get settled(): boolean {
    return TRANSITIONS[this.#state].length === 0;
  }

  /**
   * @throws ExecutionError on a transition the lifecycle does not allow
   */
  transition(next: ExecutionState): void {
    if (!TRANSITIONS[this.#state].includes(next)) {
      throw new ExecutionError(
        `Illegal state transition for "${this.label}": ${this.#state} -> ${next}`
      );
    }
    this.#state = next;
  }
}

export class ExecutionEngine {
  readonly #repository: ScriptRepository;
  readonly #driver: DatabaseDriver;
  readonly #database: string;
  readonly #strict: boolean;

  constructor(repository: ScriptRepository, options: ExecutionEngineOptions) {
    this.#repository = repository;
    this.#driver = options.driver;
    this.#database = options.database;
    this.#strict = options.strict ?? false;
  }

  get strict(): boolean {
    return this.#strict;
  }

  /**
   * Run one cataloged script as a single unit
   *
   * @returns rows of the last row-returning statement, `[]` for writes
   * @throws ScriptNotFoundError if the name is not cataloged
   * @throws BodyNotFoundError / BodyReadError if the body cannot be resolved
   * @throws ParameterBindingError if placeholders lack values
   */
  async executeByName(name: string, params: ScriptParameters = {}): Promise<Row[]> {
    return this.#executeOne(name, async () => {
      const { text } = await this.#repository.resolveByName(name);
      return bindScript(text, params, name);
    });
  }

  /**
   * Run ad-hoc SQL through the same binding and execution path
   */
  async executeSql(sql: string, params: ScriptParameters = {}): Promise<Row[]> {
    return this.#executeOne("(inline sql)", async () => bindScript(sql, params));
  }

  /**
   * Run the `index`-th script (insertion order) of a category
   *
   * @throws NotFoundError if the category has no scripts
   * @throws ArgumentMismatchError if the index is out of range
   */
  async executeFromCategory(
    category: string,
    index = 0,
    params: ScriptParameters = {}
  ): Promise<Row[]> {
    const records = Array.from(this.#repository.index.findByCategory(category));
    if (records.length === 0) {
      throw new NotFoundError(`No scripts found in category "${category}"`);
    }

    const record = records[index];
    if (!Number.isInteger(index) || index < 0 || !record) {
      throw new ArgumentMismatchError(
        `Index ${index} is out of range for category "${category}" (${records.length} script(s))`
      );
    }

    return this.executeByName(record.name, params);
  }

  /**
   * Run several scripts in one transaction
   *
   * @param names - Scripts in execution order
   * @param params - Parameter set per script, aligned by position
   * @returns true when committed, false when rolled back
   * @throws ArgumentMismatchError before any connection is opened
   * @throws the triggering error after rollback when strict is on, or the
   * RollbackError (carrying the triggering error) when the rollback failed
   */
  async executeTransaction(
    names: readonly string[],
    params?: readonly ScriptParameters[],
    options: TransactionOptions = {}
  ): Promise<boolean> {
    const report = await this.runTransaction(names, params);
    const strict = options.strict ?? this.#strict;

    if (!report.success && strict) {
      const thrown = report.rollbackError ?? report.error;
      if (thrown) {
        throw thrown;
      }
    }
    return report.success;
  }

  /**
   * Run several scripts in one transaction and return the full aggregate
   *
   * Execution stops at the first failing step. The report lists the steps that
   * were attempted, the triggering error and a failed rollback, if any.
   *
   * @throws ArgumentMismatchError before any connection is opened
   */
  async runTransaction(
    names: readonly string[],
    params?: readonly ScriptParameters[]
  ): Promise<TransactionReport> {
    const paramSets = alignParameters(names, params);
    const request = new ExecutionRequest(names.join(", "));
    const steps: StepResult[] = [];

    let connection: DatabaseConnection;
    try {
      connection = await this.#driver.open(this.#database);
    } catch (err) {
      request.transition("failed");
      return { success: false, state: request.state, steps, error: toError(err) };
    }

    try {
      try {
        await connection.begin();
      } catch (err) {
        request.transition("failed");
        return { success: false, state: request.state, steps, error: toError(err) };
      }

      for (const [i, name] of names.entries()) {
        const step = await this.#runStep(connection, request, name, paramSets[i] ?? {});
        steps.push(step);
        if (!step.ok) {
          return this.#rollback(connection, request, steps, step.error);
        }
      }

      try {
        await connection.commit();
      } catch (err) {
        return this.#rollback(connection, request, steps, toError(err));
      }

      request.transition("committed");
      metrics.recordCommit();
      logger.debug("engine.commit", {
        message: `Committed ${steps.length} script(s)`,
        details: { scripts: names },
      });
      return { success: true, state: request.state, steps };
    } finally {
      await closeQuietly(connection);
    }
  }

  async #runStep(
    connection: DatabaseConnection,
    request: ExecutionRequest,
    name: string,
    params: ScriptParameters
  ): Promise<StepResult> {
    const started = performance.now();
    request.transition("resolving");

    try {
      const { record, text } = await this.#repository.resolveByName(name);
      const statements = bindScript(text, params, name);
      request.transition("bound");

      request.transition("executing");
      const rows = await runStatements(connection, statements);

      metrics.recordExecution(name, performance.now() - started, true);
      logger.debug("engine.execute", { script: name, category: record.category });
      return { ok: true, name, rows };
    } catch (err) {
      metrics.recordExecution(name, performance.now() - started, false);
      return { ok: false, name, error: toError(err) };
    }
  }

  async #rollback(
    connection: DatabaseConnection,
    request: ExecutionRequest,
    steps: StepResult[],
    error: Error
  ): Promise<TransactionReport> {
    try {
      await connection.rollback();
    } catch (err) {
      const rollbackError = new RollbackError(error, { cause: err });
      request.transition("failed");
      metrics.recordRollback(false);
      logger.error("engine.rollback_failed", {
        message: rollbackError.message,
        details: { rollback: describeError(err) },
      });
      return { success: false, state: request.state, steps, error, rollbackError };
    }

    request.transition("rolled_back");
    metrics.recordRollback(true);
    logger.warn("engine.rollback", {
      message: `Transaction rolled back: ${error.message}`,
      details: { steps: steps.length },
    });
    return { success: false, state: request.state, steps, error };
  }

  async #executeOne(label: string, prepare: () => Promise<BoundStatement[]>): Promise<Row[]> {
    const started = performance.now();
    const request = new ExecutionRequest(label);

    try {
      request.transition("resolving");
      const statements = await prepare();
      request.transition("bound");

      const connection = await this.#driver.open(this.#database);
      try {
        request.transition("executing");
        const rows = await runAsUnit(connection, statements);
        request.transition("committed");
        metrics.recordExecution(label, performance.now() - started, true);
        logger.debug("engine.execute", {
          script: label,
          details: { statements: statements.length, rows: rows.length },
        });
        return rows;
      } finally {
        await closeQuietly(connection);
      }
    } catch (err) {
      if (!request.settled) {
        request.transition("failed");
      }
      metrics.recordExecution(label, performance.now() - started, false);
      throw err;
    }
  }
}

function alignParameters(
  names: readonly string[],
  params: readonly ScriptParameters[] | undefined
): readonly ScriptParameters[] {
  if (names.length === 0) {
    throw new ArgumentMismatchError("A transaction needs at least one script");
  }
  if (params === undefined) {
    return names.map(() => ({}));
  }
  if (params.length !== names.length) {
    throw new ArgumentMismatchError(
      `Got ${names.length} script name(s) but ${params.length} parameter set(s)`
    );
  }
  return params;
}

async function runStatements(
  connection: DatabaseConnection,
  statements: readonly BoundStatement[]
): Promise<Row[]> {
  let rows: Row[] = [];
  for (const statement of statements) {
    const result = await connection.execute(statement.sql, statement.binding);
    if (result.returnsRows) {
      rows = result.rows;
    }
  }
  return rows;
}

/**
 * Multi-statement scripts run inside their own transaction
 */
async function runAsUnit(
  connection: DatabaseConnection,
  statements: readonly BoundStatement[]
): Promise<Row[]> {
  if (statements.length <= 1) {
    return runStatements(connection, statements);
  }

  await connection.begin();
  try {
    const rows = await runStatements(connection, statements);
    await connection.commit();
    return rows;
  } catch (err) {
    try {
      await connection.rollback();
    } catch (rollbackErr) {
      throw new RollbackError(err, { cause: rollbackErr });
    }
    throw err;
  }
}

async function closeQuietly(connection: DatabaseConnection): Promise<void> {
  try {
    await connection.close();
  } catch (err) {
    logger.warn("engine.close_failed", { message: describeError(err) });
  }
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
