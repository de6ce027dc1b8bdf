/**
 * Plain-file storage for script bodies
 *
 * One body per file, stored verbatim (no header or footer). Relative paths
 * resolve against the scripts directory.
 */

import * as path from "node:path";
import { atomicWrite, fileExists, readTextFile, removeFile } from "./io.js";
import { FileNotFoundError } from "./errors.js";
import type { BodyStorage } from "./types.js";

export class FileBodyStorage implements BodyStorage {
  readonly #root: string;

  constructor(root: string) {
    this.#root = path.resolve(root);
  }

  get root(): string {
    return this.#root;
  }

  resolvePath(bodyPath: string): string {
    return path.resolve(this.#root, bodyPath);
  }

  async read(bodyPath: string): Promise<string> {
    return readTextFile(this.resolvePath(bodyPath));
  }

  /**
   * Write a body, skipping the write when the file already holds the same text
   */
  async write(bodyPath: string, text: string): Promise<boolean> {
    const target = this.resolvePath(bodyPath);

    try {
      if ((await readTextFile(target)) === text) {
        return false;
      }
    } catch (err) {
      // Anything but a missing file is a real failure
      if (!(err instanceof FileNotFoundError)) {
        throw err;
      }
    }

    await atomicWrite(target, text);
    return true;
  }

  async delete(bodyPath: string): Promise<void> {
    await removeFile(this.resolvePath(bodyPath));
  }

  async exists(bodyPath: string): Promise<boolean> {
    return fileExists(this.resolvePath(bodyPath));
  }
}
