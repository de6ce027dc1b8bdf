/**
 * In-memory metadata index
 *
 * Invariants:
 * - Names are unique across the index at all times (exact, case-sensitive)
 * - No two file-backed records resolve to the same body file
 * - Every mutation is persisted in full before it resolves; a failed save
 *   leaves the in-memory state as it was before the call
 * - Records handed out are copies; callers cannot mutate the index directly
 */

import {
  BodyConflictError,
  BodyDeleteError,
  DuplicateNameError,
  FileNotFoundError,
  MetadataReadError,
  NotFoundError,
} from "./errors.js";
import { logger } from "./observability/logs.js";
import { validatePatch, validateRecordInput } from "./validation.js";
import type {
  BodyLocation,
  BodyRemoval,
  BodyStorage,
  MetadataPersistence,
  RemovalReport,
  ScriptRecord,
  ScriptRecordInput,
  ScriptRecordPatch,
} from "./types.js";

export interface MetadataIndexOptions {
  /** Time source for record timestamps (default: system clock) */
  clock?: () => Date;
}

export interface RemoveOptions {
  /** Also delete the body file of a file-backed record */
  alsoDeleteBody?: boolean;
}

function cloneRecord(record: ScriptRecord): ScriptRecord {
  return { ...record, body: { ...record.body } };
}

export class MetadataIndex {
  #records = new Map<string, ScriptRecord>();
  #persistence: MetadataPersistence;
  #bodies: BodyStorage;
  #clock: () => Date;

  private constructor(
    persistence: MetadataPersistence,
    bodies: BodyStorage,
    options: MetadataIndexOptions
  ) {
    this.#persistence = persistence;
    this.#bodies = bodies;
    this.#clock = options.clock ?? (() => new Date());
  }

  /**
   * Hydrate an index from its persisted records
   * @throws MetadataReadError when persisted records violate name uniqueness
   */
  static async load(
    persistence: MetadataPersistence,
    bodies: BodyStorage,
    options: MetadataIndexOptions = {}
  ): Promise<MetadataIndex> {
    const index = new MetadataIndex(persistence, bodies, options);
    const records = await persistence.load();

    for (const record of records) {
      if (index.#records.has(record.name)) {
        throw new MetadataReadError(
          persistence.location,
          `script "${record.name}" is listed more than once`,
          { cause: new DuplicateNameError(record.name) }
        );
      }
      index.#records.set(record.name, cloneRecord(record));
    }

    logger.debug("index.load", {
      message: `Loaded ${index.size} script(s)`,
      details: { location: persistence.location },
    });

    return index;
  }

  get size(): number {
    return this.#records.size;
  }

  has(name: string): boolean {
    return this.#records.has(name);
  }

  /**
   * Insert a new record
   * @throws DuplicateNameError if the name is taken (index unchanged)
   * @throws BodyConflictError if another record already uses the body file
   * @throws MetadataWriteError if persisting fails (index unchanged)
   */
  async add(input: ScriptRecordInput): Promise<ScriptRecord> {
    validateRecordInput(input);

    if (this.#records.has(input.name)) {
      throw new DuplicateNameError(input.name);
    }
    this.#assertBodyAvailable(input.name, input.body);

    const now = this.#clock().toISOString();
    const record: ScriptRecord = {
      name: input.name,
      category: input.category,
      description: input.description ?? "",
      body: { ...input.body },
      createdAt: now,
      updatedAt: now,
    };

    this.#records.set(record.name, record);
    try {
      await this.#flush();
    } catch (err) {
      this.#records.delete(record.name);
      throw err;
    }

    logger.debug("index.add", { script: record.name, category: record.category });
    return cloneRecord(record);
  }

  /**
   * Exact, case-sensitive lookup
   * @returns the record, or undefined when absent
   */
  findByName(name: string): ScriptRecord | undefined {
    const record = this.#records.get(name);
    return record ? cloneRecord(record) : undefined;
  }

  /**
   * Records of a category in insertion order
   *
   * The sequence is lazy and can be iterated any number of times; each pass
   * reflects the index at the time it runs.
   */
  findByCategory(category: string): Iterable<ScriptRecord> {
    const index = this;
    return {
      *[Symbol.iterator]() {
        for (const record of index.#records.values()) {
          if (record.category === category) {
            yield cloneRecord(record);
          }
        }
      },
    };
  }

  /**
   * Change category, description or body of an existing record
   * @throws NotFoundError if absent
   */
  async update(name: string, patch: ScriptRecordPatch): Promise<ScriptRecord> {
    const current = this.#records.get(name);
    if (!current) {
      throw NotFoundError.forScript(name, "update");
    }
    validatePatch(name, patch);
    if (patch.body) {
      this.#assertBodyAvailable(name, patch.body);
    }

    const updated: ScriptRecord = {
      ...current,
      category: patch.category ?? current.category,
      description: patch.description ?? current.description,
      body: patch.body ? { ...patch.body } : current.body,
      updatedAt: this.#clock().toISOString(),
    };

    this.#records.set(name, updated);
    try {
      await this.#flush();
    } catch (err) {
      this.#records.set(name, current);
      throw err;
    }

    logger.debug("index.update", { script: name, category: updated.category });
    return cloneRecord(updated);
  }

  /**
   * Remove a record, optionally deleting its body file
   *
   * The metadata removal is persisted first and stands on its own: a failed
   * body deletion is reported in the result, never thrown.
   *
   * @throws NotFoundError if absent (index unchanged)
   */
  async remove(name: string, options: RemoveOptions = {}): Promise<RemovalReport> {
    const record = this.#records.get(name);
    if (!record) {
      throw NotFoundError.forScript(name, "remove");
    }

    const previous = new Map(this.#records);
    this.#records.delete(name);
    try {
      await this.#flush();
    } catch (err) {
      this.#records = previous;
      throw err;
    }

    logger.debug("index.remove", { script: name, category: record.category });

    const body = options.alsoDeleteBody ? await this.#deleteBody(record) : { status: "kept" as const };
    return { record: cloneRecord(record), body };
  }

  listAll(): ScriptRecord[] {
    return Array.from(this.#records.values(), cloneRecord);
  }

  listCategories(): Set<string> {
    return new Set(Array.from(this.#records.values(), (record) => record.category));
  }

  /**
   * Name of the record whose file body resolves to the given path, if any
   */
  ownerOfBody(bodyPath: string): string | undefined {
    const target = this.#bodies.resolvePath(bodyPath);
    for (const record of this.#records.values()) {
      if (record.body.kind === "file" && this.#bodies.resolvePath(record.body.path) === target) {
        return record.name;
      }
    }
    return undefined;
  }

  #assertBodyAvailable(name: string, body: BodyLocation): void {
    if (body.kind !== "file") {
      return;
    }
    const owner = this.ownerOfBody(body.path);
    if (owner !== undefined && owner !== name) {
      throw new BodyConflictError(name, body.path, owner);
    }
  }

  async #deleteBody(record: ScriptRecord): Promise<BodyRemoval> {
    if (record.body.kind !== "file") {
      return { status: "kept" };
    }

    const bodyPath = record.body.path;
    try {
      await this.#bodies.delete(bodyPath);
      return { status: "deleted", path: bodyPath };
    } catch (err) {
      if (err instanceof FileNotFoundError) {
        logger.warn("index.body_missing", {
          script: record.name,
          category: record.category,
          message: `Body file already absent: ${bodyPath}`,
        });
        return { status: "missing", path: bodyPath };
      }
      const error = new BodyDeleteError(bodyPath, { cause: err });
      logger.warn("index.body_delete_failed", {
        script: record.name,
        category: record.category,
        message: error.message,
      });
      return { status: "failed", path: bodyPath, error };
    }
  }

  async #flush(): Promise<void> {
    await this.#persistence.save(Array.from(this.#records.values()));
  }
}
