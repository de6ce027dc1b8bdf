/**
 * Catalog facade: metadata file, body storage, index and repository in one place
 */

import * as path from "node:path";
import { FileBodyStorage } from "./body-storage.js";
import { ExecutionEngine } from "./engine.js";
import {
  BodyConflictError,
  BodyDeleteError,
  BodyNotFoundError,
  DuplicateNameError,
  InvalidRecordError,
  ScriptNotFoundError,
  describeError,
} from "./errors.js";
import { JsonMetadataFile } from "./metadata-file.js";
import { MetadataIndex } from "./metadata-index.js";
import { logger } from "./observability/logs.js";
import { ScriptRepository } from "./repository.js";
import { bodyPathFor } from "./slug.js";
import { validateLabel } from "./validation.js";
import type {
  BodyLocation,
  CatalogOptions,
  ExecutionEngineOptions,
  RemovalReport,
  ScriptRecord,
} from "./types.js";

export const DEFAULT_METADATA_FILE = "scripts_metadata.json";

export interface AddScriptInput {
  name: string;
  category: string;
  description?: string;
  /** SQL text to store */
  content?: string;
  /** Existing body file to register (or to write `content` to) */
  sourceFile?: string;
  /** Embed the body in the metadata file instead of a `.sql` file */
  inline?: boolean;
}

export interface UpdateScriptInput {
  category?: string;
  description?: string;
  content?: string;
}

export interface ScriptWithContent {
  record: ScriptRecord;
  content: string;
}

export interface RemoveScriptOptions {
  /** Also delete the body file */
  deleteFile?: boolean;
}

/**
 * Catalog of named SQL scripts
 *
 * @example
 * ```typescript
 * const catalog = await openCatalog({ root: './scripts' });
 *
 * await catalog.addScript({
 *   name: 'get_user',
 *   category: 'users',
 *   content: 'SELECT * FROM users WHERE id = :id',
 * });
 *
 * const engine = catalog.createEngine({ driver: createSqliteDriver(), database: './app.db' });
 * const rows = await engine.executeByName('get_user', { id: 1 });
 * ```
 */
export class SqlCatalog {
  readonly #root: string;
  readonly #metadataFile: string;
  readonly #bodies: FileBodyStorage;
  readonly #index: MetadataIndex;
  readonly #repository: ScriptRepository;

  private constructor(
    root: string,
    metadataFile: string,
    bodies: FileBodyStorage,
    index: MetadataIndex
  ) {
    this.#root = root;
    this.#metadataFile = metadataFile;
    this.#bodies = bodies;
    this.#index = index;
    this.#repository = new ScriptRepository(index, bodies);
  }

  static async open(options: CatalogOptions): Promise<SqlCatalog> {
    const root = path.resolve(options.root);
    const metadataFile = path.resolve(
      root,
      options.metadataFile ?? DEFAULT_METADATA_FILE
    );
    const bodies = new FileBodyStorage(options.scriptsDir ?? root);
    const persistence = new JsonMetadataFile(metadataFile, { indent: options.indent ?? 2 });
    const index = await MetadataIndex.load(persistence, bodies);
    return new SqlCatalog(root, metadataFile, bodies, index);
  }

  get root(): string {
    return this.#root;
  }

  get metadataFile(): string {
    return this.#metadataFile;
  }

  get scriptsDir(): string {
    return this.#bodies.root;
  }

  get index(): MetadataIndex {
    return this.#index;
  }

  get repository(): ScriptRepository {
    return this.#repository;
  }

  /**
   * Engine bound to this catalog's repository
   */
  createEngine(options: ExecutionEngineOptions): ExecutionEngine {
    return new ExecutionEngine(this.#repository, options);
  }

  /**
   * Store a body and catalog it
   *
   * The name and body path are checked before anything is written; a body
   * write failure leaves the index untouched, and a body file created here is
   * removed again when the metadata cannot be saved.
   *
   * @throws DuplicateNameError if the name is taken
   * @throws BodyConflictError if another script already uses the body file
   * @throws BodyNotFoundError if `sourceFile` is missing and no content is given
   */
  async addScript(input: AddScriptInput): Promise<ScriptRecord> {
    validateLabel(input.name, "name");
    validateLabel(input.category, "category");

    if (this.#index.has(input.name)) {
      throw new DuplicateNameError(input.name);
    }
    if (input.content === undefined && input.sourceFile === undefined) {
      throw new InvalidRecordError(
        `Script "${input.name}" needs either content or a source file`
      );
    }

    if (input.inline) {
      const content = input.content ?? (await this.#readSource(input));
      return this.#index.add({
        name: input.name,
        category: input.category,
        description: input.description,
        body: { kind: "inline", text: content },
      });
    }

    const bodyPath =
      input.sourceFile !== undefined
        ? this.#relativeBodyPath(input.sourceFile)
        : bodyPathFor(input.category, input.name);
    const body: BodyLocation = { kind: "file", path: bodyPath };

    const owner = this.#index.ownerOfBody(bodyPath);
    if (owner !== undefined) {
      throw new BodyConflictError(input.name, bodyPath, owner);
    }

    let created = false;
    if (input.content !== undefined) {
      created = !(await this.#bodies.exists(bodyPath));
      await this.#repository.store({ name: input.name, category: input.category, body }, input.content);
    } else if (!(await this.#bodies.exists(bodyPath))) {
      throw new BodyNotFoundError(input.name, input.category, this.#bodies.resolvePath(bodyPath));
    }

    try {
      return await this.#index.add({
        name: input.name,
        category: input.category,
        description: input.description,
        body,
      });
    } catch (err) {
      if (created) {
        await this.#discardBody(input.name, bodyPath);
      }
      throw err;
    }
  }

  /**
   * @throws ScriptNotFoundError if the name is not cataloged
   */
  async getScript(name: string): Promise<ScriptWithContent> {
    const { record, text } = await this.#repository.resolveByName(name);
    return { record, content: text };
  }

  /**
   * Scripts of a category with their bodies, in insertion order
   */
  async findByCategory(category: string): Promise<ScriptWithContent[]> {
    const results: ScriptWithContent[] = [];
    for (const record of this.#index.findByCategory(category)) {
      results.push({ record, content: await this.#repository.resolve(record) });
    }
    return results;
  }

  listScripts(): ScriptRecord[] {
    return this.#index.listAll();
  }

  /**
   * Distinct categories, sorted
   */
  listCategories(): string[] {
    return [...this.#index.listCategories()].sort();
  }

  async removeScript(name: string, options: RemoveScriptOptions = {}): Promise<RemovalReport> {
    return this.#index.remove(name, { alsoDeleteBody: options.deleteFile ?? false });
  }

  /**
   * Change description, category or content of a script
   *
   * A file body at its derived location follows a category change. New
   * content replaces the body without reading the old one, so a missing body
   * file can be restored this way.
   *
   * @throws ScriptNotFoundError if the name is not cataloged
   */
  async updateScript(name: string, patch: UpdateScriptInput): Promise<ScriptRecord> {
    const record = this.#index.findByName(name);
    if (!record) {
      throw new ScriptNotFoundError(name);
    }
    const category = patch.category ?? record.category;

    if (patch.category !== undefined) {
      validateLabel(patch.category, "category");
    }

    let body = record.body;
    let previousPath: string | undefined;

    if (
      body.kind === "file" &&
      category !== record.category &&
      body.path === bodyPathFor(record.category, name)
    ) {
      previousPath = body.path;
      body = { kind: "file", path: bodyPathFor(category, name) };
      const owner = this.#index.ownerOfBody(body.path);
      if (owner !== undefined && owner !== name) {
        throw new BodyConflictError(name, body.path, owner);
      }
    }

    // Only the index update below saves the metadata file
    if (patch.content !== undefined || previousPath !== undefined) {
      const content = patch.content ?? (await this.#repository.resolve(record));
      const placed = await this.#repository.place({ name, category, body }, content);
      body = placed.body;
    }

    const updated = await this.#index.update(name, {
      category: patch.category,
      description: patch.description,
      body,
    });

    if (previousPath !== undefined) {
      await this.#discardBody(name, previousPath);
    }

    return updated;
  }

  async #readSource(input: AddScriptInput): Promise<string> {
    const sourceFile = input.sourceFile ?? "";
    const bodyPath = this.#relativeBodyPath(sourceFile);
    try {
      return await this.#bodies.read(bodyPath);
    } catch (err) {
      throw new BodyNotFoundError(input.name, input.category, this.#bodies.resolvePath(bodyPath), {
        cause: err,
      });
    }
  }

  /**
   * Paths under the scripts directory are stored relative to it
   */
  #relativeBodyPath(sourceFile: string): string {
    const absolute = path.resolve(sourceFile);
    const relative = path.relative(this.#bodies.root, absolute);
    if (relative === "" || relative.startsWith("..") || path.isAbsolute(relative)) {
      return absolute;
    }
    return relative.split(path.sep).join("/");
  }

  async #discardBody(name: string, bodyPath: string): Promise<void> {
    try {
      await this.#bodies.delete(bodyPath);
    } catch (err) {
      const error = new BodyDeleteError(this.#bodies.resolvePath(bodyPath), { cause: err });
      logger.warn("index.body_delete_failed", {
        script: name,
        message: `${error.message}: ${describeError(err)}`,
      });
    }
  }
}

/**
 * Open (or create) a catalog rooted at a directory
 */
export async function openCatalog(options: CatalogOptions): Promise<SqlCatalog> {
  return SqlCatalog.open(options);
}
