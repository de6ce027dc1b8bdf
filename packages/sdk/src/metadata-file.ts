/**
 * JSON file persistence for the metadata index
 *
 * Layout:
 * {
 *   "version": 1,
 *   "scripts": [ { name, category, description, body, createdAt, updatedAt }, ... ]
 * }
 *
 * The whole collection is read at startup and rewritten atomically on every
 * save. Entries written by older tools (`{ name, category, description, path }`)
 * load as file-backed records.
 */

import { z } from "zod";
import { atomicWrite, readTextFile } from "./io.js";
import { stableStringify } from "./format.js";
import { FileNotFoundError, MetadataReadError, MetadataWriteError } from "./errors.js";
import type { MetadataPersistence, ScriptRecord } from "./types.js";

export const METADATA_VERSION = 1;

/** Key order of records in the file; unlisted keys follow alphabetically */
const KEY_ORDER = [
  "version",
  "scripts",
  "name",
  "category",
  "description",
  "body",
  "kind",
  "text",
  "path",
  "createdAt",
  "updatedAt",
] as const;

const bodySchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("inline"), text: z.string() }),
  z.object({ kind: z.literal("file"), path: z.string().min(1) }),
]);

function metadataSchema(loadedAt: string) {
  const entrySchema = z
    .object({
      name: z.string().min(1),
      category: z.string().min(1),
      description: z.string().default(""),
      body: bodySchema.optional(),
      path: z.string().min(1).optional(),
      createdAt: z.string().optional(),
      updatedAt: z.string().optional(),
    })
    .transform((entry, ctx): ScriptRecord => {
      const body = entry.body ?? (entry.path ? { kind: "file" as const, path: entry.path } : undefined);
      if (!body) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["body"], message: "Required" });
        return z.NEVER;
      }
      const createdAt = entry.createdAt ?? loadedAt;
      return {
        name: entry.name,
        category: entry.category,
        description: entry.description,
        body,
        createdAt,
        updatedAt: entry.updatedAt ?? createdAt,
      };
    });

  return z.object({
    version: z.literal(METADATA_VERSION).optional(),
    scripts: z.array(entrySchema),
  });
}

/**
 * Describe the first schema issue as `path: message`
 */
function describeIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) {
    return "invalid content";
  }
  const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
  return `${where}: ${issue.message}`;
}

export interface JsonMetadataFileOptions {
  /** Indentation (default: 2) */
  indent?: number;
}

/**
 * Metadata persistence backed by one JSON file
 */
export class JsonMetadataFile implements MetadataPersistence {
  readonly #filePath: string;
  readonly #indent: number;

  constructor(filePath: string, options: JsonMetadataFileOptions = {}) {
    this.#filePath = filePath;
    this.#indent = options.indent ?? 2;
  }

  get location(): string {
    return this.#filePath;
  }

  /**
   * Read all records; a missing file is an empty catalog
   * @throws MetadataReadError when the file is unreadable, not JSON or malformed
   */
  async load(): Promise<ScriptRecord[]> {
    let content: string;
    try {
      content = await readTextFile(this.#filePath);
    } catch (err) {
      if (err instanceof FileNotFoundError) {
        return [];
      }
      throw new MetadataReadError(this.#filePath, "file could not be read", { cause: err });
    }

    // Strip BOM if present
    const cleaned = content.charCodeAt(0) === 0xfeff ? content.slice(1) : content;

    let raw: unknown;
    try {
      raw = JSON.parse(cleaned);
    } catch (err) {
      const reason = err instanceof SyntaxError ? err.message : String(err);
      throw new MetadataReadError(this.#filePath, `invalid JSON (${reason})`, { cause: err });
    }

    const parsed = metadataSchema(new Date().toISOString()).safeParse(raw);
    if (!parsed.success) {
      throw new MetadataReadError(this.#filePath, describeIssue(parsed.error), {
        cause: parsed.error,
      });
    }

    return parsed.data.scripts;
  }

  /**
   * Rewrite the whole file
   * @throws MetadataWriteError when the write fails
   */
  async save(records: readonly ScriptRecord[]): Promise<void> {
    const content = stableStringify(
      { version: METADATA_VERSION, scripts: records },
      this.#indent,
      KEY_ORDER
    );

    try {
      await atomicWrite(this.#filePath, content);
    } catch (err) {
      throw new MetadataWriteError(this.#filePath, { cause: err });
    }
  }
}
