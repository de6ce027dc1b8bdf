/**
 * Unit tests for environment resolution
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as path from "node:path";
import { homedir } from "node:os";
import {
  expandTilde,
  resolveRoot,
  resolveMetadataFile,
  resolveDatabase,
  isStrict,
  isVerbose,
} from "../src/lib/env.js";

const VARS = [
  "SQLCATALOG_ROOT",
  "SQLCATALOG_METADATA",
  "SQLCATALOG_DATABASE",
  "SQLCATALOG_STRICT",
  "SQLCATALOG_CLI_DEBUG",
] as const;

describe("environment resolution", () => {
  const saved = new Map<string, string | undefined>();

  beforeEach(() => {
    for (const name of VARS) {
      saved.set(name, process.env[name]);
      delete process.env[name];
    }
  });

  afterEach(() => {
    for (const name of VARS) {
      const value = saved.get(name);
      if (value === undefined) {
        delete process.env[name];
      } else {
        process.env[name] = value;
      }
    }
  });

  describe("expandTilde", () => {
    it("should expand the home directory", () => {
      expect(expandTilde("~")).toBe(homedir());
      expect(expandTilde("~/catalog")).toBe(path.join(homedir(), "catalog"));
    });

    it("should leave other paths alone", () => {
      expect(expandTilde("/srv/catalog")).toBe("/srv/catalog");
      expect(expandTilde("~other/catalog")).toBe("~other/catalog");
    });
  });

  describe("resolveRoot", () => {
    it("should prefer the CLI option", () => {
      process.env.SQLCATALOG_ROOT = "/env/path";
      expect(resolveRoot("/cli/path")).toBe(path.resolve("/cli/path"));
    });

    it("should fall back to SQLCATALOG_ROOT", () => {
      process.env.SQLCATALOG_ROOT = "/env/path";
      expect(resolveRoot()).toBe(path.resolve("/env/path"));
    });

    it("should default to ./scripts", () => {
      expect(resolveRoot()).toBe(path.resolve("./scripts"));
    });
  });

  describe("resolveMetadataFile", () => {
    it("should default to scripts_metadata.json under the root", () => {
      expect(resolveMetadataFile("/catalog")).toBe("/catalog/scripts_metadata.json");
    });

    it("should resolve relative files against the root", () => {
      process.env.SQLCATALOG_METADATA = "meta/catalog.json";
      expect(resolveMetadataFile("/catalog")).toBe("/catalog/meta/catalog.json");
      expect(resolveMetadataFile("/catalog", "/etc/catalog.json")).toBe("/etc/catalog.json");
    });
  });

  describe("resolveDatabase", () => {
    it("should return undefined when nothing is configured", () => {
      expect(resolveDatabase()).toBeUndefined();
      expect(resolveDatabase("  ")).toBeUndefined();
    });

    it("should prefer the CLI option over SQLCATALOG_DATABASE", () => {
      process.env.SQLCATALOG_DATABASE = "env.db";
      expect(resolveDatabase()).toBe("env.db");
      expect(resolveDatabase(" sqlite:///tmp/app.db ")).toBe("sqlite:///tmp/app.db");
    });
  });

  describe("flags", () => {
    it("should read strict mode from the option or SQLCATALOG_STRICT", () => {
      expect(isStrict()).toBe(false);
      expect(isStrict(true)).toBe(true);
      process.env.SQLCATALOG_STRICT = "1";
      expect(isStrict()).toBe(true);
    });

    it("should read verbose mode from SQLCATALOG_CLI_DEBUG", () => {
      expect(isVerbose()).toBe(false);
      process.env.SQLCATALOG_CLI_DEBUG = "1";
      expect(isVerbose()).toBe(true);
    });
  });
});
