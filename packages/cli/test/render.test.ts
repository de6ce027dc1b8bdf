/**
 * Unit tests for output rendering
 */

import { describe, it, expect } from "vitest";
import type { ScriptRecord } from "@sqlcatalog/sdk";
import { formatRows, formatScript, formatScripts } from "../src/lib/render.js";

const RULE = "-".repeat(50);

const record: ScriptRecord = {
  name: "get_user",
  category: "users",
  description: "One user by id",
  body: { kind: "file", path: "users/get_user.sql" },
  createdAt: "2024-01-01T00:00:00.000Z",
  updatedAt: "2024-01-01T00:00:00.000Z",
};

describe("render", () => {
  describe("formatScript", () => {
    it("should describe a script without content", () => {
      expect(formatScript(record)).toEqual([
        "Name: get_user",
        "Category: users",
        "Description: One user by id",
        "Body: users/get_user.sql",
      ]);
    });

    it("should append the content below a rule", () => {
      expect(formatScript(record, "SELECT 1").slice(4)).toEqual(["", "Content:", RULE, "SELECT 1"]);
    });

    it("should mark inline bodies", () => {
      const inline: ScriptRecord = { ...record, body: { kind: "inline", text: "SELECT 1" } };
      expect(formatScript(inline)[3]).toBe("Body: (inline)");
    });
  });

  describe("formatScripts", () => {
    it("should follow every script with a rule", () => {
      const lines = formatScripts([{ record }, { record: { ...record, name: "other" } }]);

      expect(lines).toHaveLength(10);
      expect(lines[4]).toBe(RULE);
      expect(lines[5]).toBe("Name: other");
      expect(lines[9]).toBe(RULE);
    });
  });

  describe("formatRows", () => {
    it("should print a header and tab-separated values", () => {
      expect(
        formatRows([
          { id: 1, name: "alice", note: null },
          { id: 2, name: "bob", note: "admin" },
        ])
      ).toEqual(["id\tname\tnote", "1\talice\tNULL", "2\tbob\tadmin"]);
    });

    it("should summarize blobs", () => {
      expect(formatRows([{ data: Buffer.from([1, 2, 3]) }])).toEqual(["data", "<blob 3 bytes>"]);
    });

    it("should say when there are no rows", () => {
      expect(formatRows([])).toEqual(["(no rows)"]);
    });
  });
});
