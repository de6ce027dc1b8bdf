import { describe, it, expect } from "vitest";
import { bindScript, scanScript } from "./binding.js";
import { ParameterBindingError } from "./errors.js";

describe("scanScript", () => {
  it("finds named placeholders of every prefix", () => {
    const [statement] = scanScript("SELECT * FROM t WHERE a = :a AND b = @b AND c = $c");

    expect(statement?.placeholders).toEqual([
      { kind: "named", name: "a", prefix: ":" },
      { kind: "named", name: "b", prefix: "@" },
      { kind: "named", name: "c", prefix: "$" },
    ]);
  });

  it("splits statements on top-level semicolons", () => {
    const statements = scanScript("INSERT INTO t VALUES (1);\nSELECT * FROM t;");

    expect(statements.map((s) => s.sql)).toEqual(["INSERT INTO t VALUES (1)", "SELECT * FROM t"]);
  });

  it("ignores placeholders and semicolons inside quoted text", () => {
    const statements = scanScript(`SELECT ':skip; ?', "a?b", 'it''s :x' FROM t WHERE id = :id`);

    expect(statements).toHaveLength(1);
    expect(statements[0]?.placeholders).toEqual([{ kind: "named", name: "id", prefix: ":" }]);
  });

  it("ignores placeholders inside comments", () => {
    const statements = scanScript("-- uses :ghost; and ?\n/* :other */ SELECT 1");

    expect(statements).toHaveLength(1);
    expect(statements[0]?.placeholders).toEqual([]);
  });

  it("drops statements holding only whitespace or comments", () => {
    const statements = scanScript("SELECT 1;\n-- done\n;  ");

    expect(statements.map((s) => s.sql)).toEqual(["SELECT 1"]);
  });

  it("leaves type casts and identifier characters alone", () => {
    const [statement] = scanScript("SELECT x::text, foo$bar, a@b FROM t WHERE id = :id");

    expect(statement?.placeholders).toEqual([{ kind: "named", name: "id", prefix: ":" }]);
  });

  it("returns nothing for an empty script", () => {
    expect(scanScript("")).toEqual([]);
    expect(scanScript("  \n ")).toEqual([]);
  });
});

describe("bindScript", () => {
  it("binds named values by key", () => {
    const bound = bindScript("SELECT * FROM users WHERE id = :id", { id: 1, unused: "x" });

    expect(bound).toEqual([
      {
        sql: "SELECT * FROM users WHERE id = :id",
        binding: { kind: "named", values: { id: 1 } },
      },
    ]);
  });

  it("binds a repeated placeholder once", () => {
    const [statement] = bindScript("SELECT :id, :id", { id: 3 });

    expect(statement?.binding).toEqual({ kind: "named", values: { id: 3 } });
  });

  it("binds positional values in insertion order", () => {
    const [statement] = bindScript("UPDATE users SET status = ? WHERE id = ?", {
      status: "inactive",
      id: 7,
    });

    expect(statement?.binding).toEqual({ kind: "positional", values: ["inactive", 7] });
  });

  it("consumes positional values across statements", () => {
    const bound = bindScript("INSERT INTO t VALUES (?); SELECT * FROM t WHERE x = ?", {
      a: 1,
      b: 2,
    });

    expect(bound).toEqual([
      { sql: "INSERT INTO t VALUES (?)", binding: { kind: "positional", values: [1] } },
      { sql: "SELECT * FROM t WHERE x = ?", binding: { kind: "positional", values: [2] } },
    ]);
  });

  it("ignores extra positional values", () => {
    const [statement] = bindScript("SELECT ?", { a: 1, b: 2 });

    expect(statement?.binding).toEqual({ kind: "positional", values: [1] });
  });

  it("keeps null values for named placeholders", () => {
    const [statement] = bindScript("UPDATE t SET deleted_at = :at", { at: null });

    expect(statement?.binding).toEqual({ kind: "named", values: { at: null } });
  });

  it("uses no binding for statements without placeholders", () => {
    const bound = bindScript("DELETE FROM t; SELECT :id", { id: 1 });

    expect(bound[0]?.binding).toEqual({ kind: "none" });
    expect(bound[1]?.binding).toEqual({ kind: "named", values: { id: 1 } });
  });

  it("lists every missing named value", () => {
    const bind = () => bindScript("SELECT * FROM t WHERE a = :a AND b = @b", {});

    expect(bind).toThrow(ParameterBindingError);
    expect(bind).toThrow('Script "(inline sql)" is missing value(s) for :a, @b');
  });

  it("reports missing values on the error", () => {
    try {
      bindScript("SELECT ?, ?", { x: 1 }, "pair");
      expect.unreachable("binding should fail");
    } catch (err) {
      expect(err).toBeInstanceOf(ParameterBindingError);
      if (err instanceof ParameterBindingError) {
        expect(err.message).toBe('Script "pair" expects 2 positional value(s), got 1');
        expect(err.missing).toEqual(["?2"]);
        expect(err.code).toBe("E_BINDING");
      }
    }
  });

  it("binds an array of positional values in order", () => {
    const [statement] = bindScript("INSERT INTO t (a, b) VALUES (?, ?)", ["A", "B"]);

    expect(statement?.binding).toEqual({ kind: "positional", values: ["A", "B"] });
  });

  it("rejects positional maps that mix numeric and named keys", () => {
    const bind = () => bindScript("INSERT INTO t (a, b) VALUES (?, ?)", { first: "A", "2": "B" }, "ins");

    expect(bind).toThrow(ParameterBindingError);
    expect(bind).toThrow(
      'Script "ins" uses ? placeholders, but its parameter keys mix numbers (2) with names; pass the values as an array'
    );
  });

  it("takes all-numeric keys in numeric order", () => {
    const [statement] = bindScript("SELECT ?, ?", { "1": "second", "0": "first" });

    expect(statement?.binding).toEqual({ kind: "positional", values: ["first", "second"] });
  });

  it("refuses an array for named placeholders", () => {
    expect(() => bindScript("SELECT :id", [1])).toThrow(
      'Script "(inline sql)" uses named placeholders and needs a parameter map, not an array'
    );
  });

  it("rejects mixed placeholder styles", () => {
    expect(() => bindScript("SELECT ?, :a", { a: 1 })).toThrow(
      'Script "(inline sql)" mixes positional (?) and named placeholders'
    );
  });
});
