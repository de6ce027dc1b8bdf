import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, readdir, mkdir, writeFile, readFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { atomicWrite, readTextFile, removeFile, ensureDirectory, fileExists, errnoCode } from "./io.js";
import {
  FileNotFoundError,
  FileReadError,
  FileRemoveError,
  FileWriteError,
  DirectoryError,
} from "./errors.js";

describe("io operations", () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), "sqlcatalog-io-"));
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  describe("atomicWrite and readTextFile", () => {
    it("should write and read file successfully", async () => {
      const filePath = join(testDir, "get_user.sql");
      const content = "SELECT * FROM users WHERE id = :id";

      await atomicWrite(filePath, content);

      expect(await readTextFile(filePath)).toBe(content);
    });

    it("should not leave temp files after successful write", async () => {
      await atomicWrite(join(testDir, "a.sql"), "SELECT 1");

      const files = await readdir(testDir);
      expect(files).toEqual(["a.sql"]);
    });

    it("should overwrite existing file", async () => {
      const filePath = join(testDir, "a.sql");

      await atomicWrite(filePath, "SELECT 1");
      await atomicWrite(filePath, "SELECT 2");

      expect(await readFile(filePath, "utf-8")).toBe("SELECT 2");
    });

    it("should create missing parent directories", async () => {
      const filePath = join(testDir, "users", "nested", "get_user.sql");

      await atomicWrite(filePath, "SELECT 1");

      expect(await readTextFile(filePath)).toBe("SELECT 1");
    });

    it("should keep content verbatim, unicode included", async () => {
      const filePath = join(testDir, "u.sql");
      const content = "-- Пользователи\nSELECT 'café';\n";

      await atomicWrite(filePath, content);

      expect(await readTextFile(filePath)).toBe(content);
    });

    it("should throw FileWriteError when the target is a directory", async () => {
      const target = join(testDir, "taken");
      await mkdir(target);

      await expect(atomicWrite(target, "SELECT 1")).rejects.toThrow(FileWriteError);
      const files = await readdir(testDir);
      expect(files).toEqual(["taken"]);
    });
  });

  describe("readTextFile", () => {
    it("should throw FileNotFoundError for a missing file", async () => {
      const filePath = join(testDir, "missing.sql");

      await expect(readTextFile(filePath)).rejects.toThrow(FileNotFoundError);
      await expect(readTextFile(filePath)).rejects.toThrow(`File not found: ${filePath}`);
    });

    it("should throw FileReadError for a directory", async () => {
      await expect(readTextFile(testDir)).rejects.toThrow(FileReadError);
    });
  });

  describe("removeFile", () => {
    it("should remove an existing file", async () => {
      const filePath = join(testDir, "a.sql");
      await writeFile(filePath, "SELECT 1");

      await removeFile(filePath);

      expect(await fileExists(filePath)).toBe(false);
    });

    it("should throw FileNotFoundError for a missing file", async () => {
      await expect(removeFile(join(testDir, "missing.sql"))).rejects.toThrow(FileNotFoundError);
    });

    it("should throw FileRemoveError for a directory", async () => {
      const dir = join(testDir, "dir");
      await mkdir(dir);

      await expect(removeFile(dir)).rejects.toThrow(FileRemoveError);
    });
  });

  describe("fileExists", () => {
    it("should report regular files only", async () => {
      const filePath = join(testDir, "a.sql");
      await writeFile(filePath, "SELECT 1");

      expect(await fileExists(filePath)).toBe(true);
      expect(await fileExists(testDir)).toBe(false);
      expect(await fileExists(join(testDir, "missing.sql"))).toBe(false);
    });

    it("should treat a file in the path as absent", async () => {
      const filePath = join(testDir, "a.sql");
      await writeFile(filePath, "SELECT 1");

      expect(await fileExists(join(filePath, "inner.sql"))).toBe(false);
    });
  });

  describe("ensureDirectory", () => {
    it("should create nested directories", async () => {
      const dir = join(testDir, "a", "b", "c");

      await ensureDirectory(dir);

      expect(await readdir(join(testDir, "a", "b"))).toEqual(["c"]);
    });

    it("should be idempotent", async () => {
      const dir = join(testDir, "a");

      await ensureDirectory(dir);
      await ensureDirectory(dir);

      expect(await readdir(testDir)).toEqual(["a"]);
    });

    it("should throw DirectoryError for an empty path", async () => {
      await expect(ensureDirectory("")).rejects.toThrow(DirectoryError);
    });

    it("should throw DirectoryError when a file is in the way", async () => {
      const filePath = join(testDir, "file");
      await writeFile(filePath, "x");

      await expect(ensureDirectory(filePath)).rejects.toThrow(DirectoryError);
    });
  });

  describe("errnoCode", () => {
    it("should extract string codes only", () => {
      const err = Object.assign(new Error("boom"), { code: "ENOENT" });

      expect(errnoCode(err)).toBe("ENOENT");
      expect(errnoCode(new Error("plain"))).toBeUndefined();
      expect(errnoCode("ENOENT")).toBeUndefined();
    });
  });
});
