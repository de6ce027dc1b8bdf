/**
 * Script repository: turns index records into executable SQL text
 */

import {
  BodyNotFoundError,
  BodyReadError,
  BodyWriteError,
  FileNotFoundError,
  ScriptNotFoundError,
} from "./errors.js";
import { bodyPathFor } from "./slug.js";
import type { MetadataIndex } from "./metadata-index.js";
import type { BodyLocation, BodyStorage, ScriptRecord } from "./types.js";

/**
 * Record fields needed to place a body
 */
export type BodyTarget = Pick<ScriptRecord, "name" | "category" | "body">;

export interface StoreResult {
  body: BodyLocation;
  /** False when the stored content was already identical */
  written: boolean;
}

export interface ResolvedScript {
  record: ScriptRecord;
  text: string;
}

export class ScriptRepository {
  readonly #index: MetadataIndex;
  readonly #bodies: BodyStorage;

  constructor(index: MetadataIndex, bodies: BodyStorage) {
    this.#index = index;
    this.#bodies = bodies;
  }

  get index(): MetadataIndex {
    return this.#index;
  }

  /**
   * Derived relative body path for a category and name
   */
  bodyPathFor(category: string, name: string): string {
    return bodyPathFor(category, name);
  }

  /**
   * Full SQL text of a record
   * @throws BodyNotFoundError if a file-backed body is missing
   * @throws BodyReadError for any other read failure
   */
  async resolve(record: ScriptRecord): Promise<string> {
    const body = record.body;
    switch (body.kind) {
      case "inline":
        return body.text;
      case "file":
        try {
          return await this.#bodies.read(body.path);
        } catch (err) {
          const location = this.#bodies.resolvePath(body.path);
          if (err instanceof FileNotFoundError) {
            throw new BodyNotFoundError(record.name, record.category, location, { cause: err });
          }
          throw new BodyReadError(record.name, record.category, location, { cause: err });
        }
    }
  }

  /**
   * Look a name up in the index and resolve its body
   * @throws ScriptNotFoundError if the name is not cataloged
   */
  async resolveByName(name: string): Promise<ResolvedScript> {
    const record = this.#index.findByName(name);
    if (!record) {
      throw new ScriptNotFoundError(name);
    }
    return { record, text: await this.resolve(record) };
  }

  /**
   * Store body content at the record's location
   *
   * File bodies are written to their path (the category directory is created
   * as needed) and left untouched when the content is unchanged. Inline bodies
   * carry the content in the returned location. When the record is already
   * cataloged and the content changed, the index entry is updated too.
   *
   * @throws BodyWriteError when the file cannot be written
   */
  async store(record: BodyTarget, content: string): Promise<StoreResult> {
    const result = await this.place(record, content);

    if (result.written && this.#index.has(record.name)) {
      await this.#index.update(record.name, { body: result.body });
    }

    return result;
  }

  /**
   * Write body content without touching the index
   * @throws BodyWriteError when the file cannot be written
   */
  async place(record: BodyTarget, content: string): Promise<StoreResult> {
    const body = record.body;
    switch (body.kind) {
      case "inline":
        return { body: { kind: "inline", text: content }, written: body.text !== content };
      case "file":
        try {
          return {
            body: { kind: "file", path: body.path },
            written: await this.#bodies.write(body.path, content),
          };
        } catch (err) {
          throw new BodyWriteError(this.#bodies.resolvePath(body.path), { cause: err });
        }
    }
  }
}
