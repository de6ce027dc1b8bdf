/**
 * Catalog facade against a real directory and SQLite file
 */

import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach, vi } from "vitest";
import { mkdtemp, rm, readFile, writeFile, mkdir, access } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import Database from "better-sqlite3";
import { openCatalog, type SqlCatalog } from "./catalog.js";
import { createSqliteDriver } from "./drivers/sqlite.js";
import { JsonMetadataFile } from "./metadata-file.js";
import { logger } from "./observability/logs.js";
import {
  BodyConflictError,
  BodyNotFoundError,
  DuplicateNameError,
  InvalidRecordError,
  NotFoundError,
  ScriptNotFoundError,
} from "./errors.js";

async function exists(filePath: string): Promise<boolean> {
  return access(filePath).then(
    () => true,
    () => false
  );
}

describe("SqlCatalog", () => {
  let root: string;
  let catalog: SqlCatalog;

  beforeAll(() => {
    logger.setEnabled(false);
  });

  afterAll(() => {
    logger.setEnabled(true);
  });

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "sqlcatalog-catalog-"));
    catalog = await openCatalog({ root });
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  describe("addScript", () => {
    it("writes the body to its derived path and persists the record", async () => {
      const record = await catalog.addScript({
        name: "get_user",
        category: "users",
        description: "One user by id",
        content: "SELECT * FROM users WHERE id = :id",
      });

      expect(record.body).toEqual({ kind: "file", path: "users/get_user.sql" });
      expect(await readFile(join(root, "users", "get_user.sql"), "utf-8")).toBe(
        "SELECT * FROM users WHERE id = :id"
      );

      const saved = JSON.parse(await readFile(join(root, "scripts_metadata.json"), "utf-8"));
      expect(saved.version).toBe(1);
      expect(saved.scripts[0].name).toBe("get_user");
      expect(catalog.metadataFile).toBe(join(root, "scripts_metadata.json"));
    });

    it("keeps inline bodies in the metadata file", async () => {
      const record = await catalog.addScript({
        name: "count_users",
        category: "reports",
        content: "SELECT COUNT(*) FROM users",
        inline: true,
      });

      expect(record.body).toEqual({ kind: "inline", text: "SELECT COUNT(*) FROM users" });
      expect(await exists(join(root, "reports"))).toBe(false);
    });

    it("rejects a duplicate name and leaves the body alone", async () => {
      await catalog.addScript({ name: "get_user", category: "users", content: "SELECT 1" });

      await expect(
        catalog.addScript({ name: "get_user", category: "users", content: "SELECT 2" })
      ).rejects.toThrow(DuplicateNameError);

      expect(await readFile(join(root, "users", "get_user.sql"), "utf-8")).toBe("SELECT 1");
    });

    it("registers an existing source file relative to the scripts directory", async () => {
      await mkdir(join(root, "legacy"));
      await writeFile(join(root, "legacy", "old.sql"), "SELECT 'old'");

      const record = await catalog.addScript({
        name: "old",
        category: "legacy",
        sourceFile: join(root, "legacy", "old.sql"),
      });

      expect(record.body).toEqual({ kind: "file", path: "legacy/old.sql" });
      expect((await catalog.getScript("old")).content).toBe("SELECT 'old'");
    });

    it("reads a source file into an inline body", async () => {
      await writeFile(join(root, "seed.sql"), "SELECT 'seed'");

      const record = await catalog.addScript({
        name: "seed",
        category: "misc",
        sourceFile: join(root, "seed.sql"),
        inline: true,
      });

      expect(record.body).toEqual({ kind: "inline", text: "SELECT 'seed'" });
    });

    it("fails when the source file is missing and no content is given", async () => {
      await expect(
        catalog.addScript({ name: "ghost", category: "misc", sourceFile: join(root, "ghost.sql") })
      ).rejects.toThrow(BodyNotFoundError);
      expect(catalog.listScripts()).toEqual([]);
    });

    it("requires content or a source file", async () => {
      await expect(catalog.addScript({ name: "empty", category: "misc" })).rejects.toThrow(
        InvalidRecordError
      );
    });

    it("refuses to share a body file", async () => {
      await catalog.addScript({ name: "get_user", category: "users", content: "SELECT 1" });

      await expect(
        catalog.addScript({
          name: "alias",
          category: "users",
          sourceFile: join(root, "users", "get_user.sql"),
        })
      ).rejects.toThrow(BodyConflictError);
    });
  });

  describe("lookups", () => {
    beforeEach(async () => {
      await catalog.addScript({ name: "get_user", category: "users", content: "SELECT 1" });
      await catalog.addScript({ name: "count_orders", category: "reports", content: "SELECT 2" });
      await catalog.addScript({
        name: "deactivate_user",
        category: "users",
        content: "SELECT 3",
        inline: true,
      });
    });

    it("returns a script with its content", async () => {
      const script = await catalog.getScript("get_user");

      expect(script.record.category).toBe("users");
      expect(script.content).toBe("SELECT 1");
    });

    it("fails with ScriptNotFoundError for an unknown name", async () => {
      await expect(catalog.getScript("nope")).rejects.toThrow(ScriptNotFoundError);
    });

    it("finds a category's scripts with contents in insertion order", async () => {
      const scripts = await catalog.findByCategory("users");

      expect(scripts.map((s) => [s.record.name, s.content])).toEqual([
        ["get_user", "SELECT 1"],
        ["deactivate_user", "SELECT 3"],
      ]);
    });

    it("lists scripts and sorted categories", () => {
      expect(catalog.listScripts().map((r) => r.name)).toEqual([
        "get_user",
        "count_orders",
        "deactivate_user",
      ]);
      expect(catalog.listCategories()).toEqual(["reports", "users"]);
    });

    it("survives a reopen", async () => {
      const reopened = await openCatalog({ root });

      expect((await reopened.getScript("deactivate_user")).content).toBe("SELECT 3");
      expect(reopened.listScripts()).toHaveLength(3);
    });
  });

  describe("removeScript", () => {
    it("deletes the body file on request", async () => {
      await catalog.addScript({ name: "get_user", category: "users", content: "SELECT 1" });

      const report = await catalog.removeScript("get_user", { deleteFile: true });

      expect(report.body).toEqual({ status: "deleted", path: "users/get_user.sql" });
      expect(await exists(join(root, "users", "get_user.sql"))).toBe(false);
    });

    it("keeps the body file by default", async () => {
      await catalog.addScript({ name: "get_user", category: "users", content: "SELECT 1" });

      await catalog.removeScript("get_user");

      expect(await exists(join(root, "users", "get_user.sql"))).toBe(true);
    });

    it("fails for an unknown name", async () => {
      await expect(catalog.removeScript("nope")).rejects.toThrow(NotFoundError);
    });
  });

  describe("updateScript", () => {
    it("rewrites the body file", async () => {
      await catalog.addScript({ name: "get_user", category: "users", content: "SELECT 1" });

      await catalog.updateScript("get_user", { content: "SELECT 2", description: "v2" });

      const script = await catalog.getScript("get_user");
      expect(script.content).toBe("SELECT 2");
      expect(script.record.description).toBe("v2");
    });

    it("moves a derived body file with its category", async () => {
      await catalog.addScript({ name: "get_user", category: "users", content: "SELECT 1" });

      const updated = await catalog.updateScript("get_user", { category: "people" });

      expect(updated.body).toEqual({ kind: "file", path: "people/get_user.sql" });
      expect(await readFile(join(root, "people", "get_user.sql"), "utf-8")).toBe("SELECT 1");
      expect(await exists(join(root, "users", "get_user.sql"))).toBe(false);
    });

    it("restores a missing body file from new content", async () => {
      await catalog.addScript({ name: "get_user", category: "users", content: "SELECT 1" });
      await rm(join(root, "users", "get_user.sql"));

      const updated = await catalog.updateScript("get_user", { content: "SELECT 2" });

      expect(updated.body).toEqual({ kind: "file", path: "users/get_user.sql" });
      expect(await readFile(join(root, "users", "get_user.sql"), "utf-8")).toBe("SELECT 2");
    });

    it("still needs the old body to move it to a new category", async () => {
      await catalog.addScript({ name: "get_user", category: "users", content: "SELECT 1" });
      await rm(join(root, "users", "get_user.sql"));

      await expect(catalog.updateScript("get_user", { category: "people" })).rejects.toThrow(
        BodyNotFoundError
      );
      expect(catalog.index.findByName("get_user")?.category).toBe("users");
    });

    it("saves the metadata file once per update", async () => {
      await catalog.addScript({ name: "get_user", category: "users", content: "SELECT 1" });
      const save = vi.spyOn(JsonMetadataFile.prototype, "save");

      try {
        await catalog.updateScript("get_user", { content: "SELECT 2", category: "people" });
        expect(save).toHaveBeenCalledTimes(1);
      } finally {
        save.mockRestore();
      }
    });

    it("fails for an unknown name", async () => {
      await expect(catalog.updateScript("nope", { content: "SELECT 1" })).rejects.toThrow(
        ScriptNotFoundError
      );
    });
  });

  describe("legacy metadata", () => {
    it("loads entries that only carry a path", async () => {
      await mkdir(join(root, "selects"));
      await writeFile(join(root, "selects", "get_active_users.sql"), "SELECT * FROM users");
      await writeFile(
        join(root, "scripts_metadata.json"),
        JSON.stringify({
          scripts: [
            {
              name: "Active users",
              category: "selects",
              description: "Everyone active",
              path: "selects/get_active_users.sql",
            },
          ],
        })
      );

      const legacy = await openCatalog({ root });

      expect((await legacy.getScript("Active users")).content).toBe("SELECT * FROM users");
    });
  });

  describe("createEngine", () => {
    it("executes cataloged scripts against a database", async () => {
      const dbPath = join(root, "app.db");
      const db = new Database(dbPath);
      db.exec(
        "CREATE TABLE users (id INTEGER PRIMARY KEY, status TEXT); INSERT INTO users VALUES (1, 'active');"
      );
      db.close();

      await catalog.addScript({
        name: "deactivate_user",
        category: "users",
        content: "UPDATE users SET status = 'inactive' WHERE id = :id",
      });
      await catalog.addScript({
        name: "get_user",
        category: "users",
        content: "SELECT status FROM users WHERE id = :id",
      });

      const engine = catalog.createEngine({ driver: createSqliteDriver(), database: dbPath });
      const ok = await engine.executeTransaction(["deactivate_user", "get_user"], [
        { id: 1 },
        { id: 1 },
      ]);

      expect(ok).toBe(true);
      expect(await engine.executeByName("get_user", { id: 1 })).toEqual([{ status: "inactive" }]);
    });
  });
});
