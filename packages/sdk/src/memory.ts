/**
 * In-memory collaborators for tests and embedding
 */

import * as path from "node:path";
import { FileNotFoundError } from "./errors.js";
import type { BodyStorage, MetadataPersistence, ScriptRecord } from "./types.js";

/**
 * Bodies kept in a map, keyed by normalized relative path
 */
export class InMemoryBodyStorage implements BodyStorage {
  readonly files = new Map<string, string>();

  resolvePath(bodyPath: string): string {
    return path.posix.normalize(bodyPath.replace(/\\/g, "/"));
  }

  async read(bodyPath: string): Promise<string> {
    const key = this.resolvePath(bodyPath);
    const text = this.files.get(key);
    if (text === undefined) {
      throw new FileNotFoundError(key);
    }
    return text;
  }

  async write(bodyPath: string, text: string): Promise<boolean> {
    const key = this.resolvePath(bodyPath);
    if (this.files.get(key) === text) {
      return false;
    }
    this.files.set(key, text);
    return true;
  }

  async delete(bodyPath: string): Promise<void> {
    const key = this.resolvePath(bodyPath);
    if (!this.files.delete(key)) {
      throw new FileNotFoundError(key);
    }
  }

  async exists(bodyPath: string): Promise<boolean> {
    return this.files.has(this.resolvePath(bodyPath));
  }
}

/**
 * Metadata persistence holding the last saved snapshot
 */
export class InMemoryMetadata implements MetadataPersistence {
  readonly location = "memory";
  #snapshot: ScriptRecord[];
  saves = 0;

  constructor(records: readonly ScriptRecord[] = []) {
    this.#snapshot = records.map(cloneRecord);
  }

  async load(): Promise<ScriptRecord[]> {
    return this.#snapshot.map(cloneRecord);
  }

  async save(records: readonly ScriptRecord[]): Promise<void> {
    this.#snapshot = records.map(cloneRecord);
    this.saves++;
  }

  /** Records as of the last save */
  get snapshot(): ScriptRecord[] {
    return this.#snapshot.map(cloneRecord);
  }
}

function cloneRecord(record: ScriptRecord): ScriptRecord {
  return { ...record, body: { ...record.body } };
}
