/**
 * Placeholder scanning and parameter binding
 *
 * Script bodies stay opaque: the scanner only looks for statement separators
 * and placeholders outside quoted text and comments. Recognized placeholders:
 *
 * - `?`                      positional, values taken from the map in insertion order
 * - `:name` `@name` `$name`  named, values looked up by `name`
 *
 * `::` (type casts) and `$1`-style markers are left alone. Statements are split
 * on top-level `;`, so bodies containing compound statements with inner
 * semicolons (trigger bodies) must be stored one script per statement.
 */

import { ParameterBindingError } from "./errors.js";
import type { ParameterMap, ScriptParameters, SqlValue, StatementBinding } from "./types.js";

export type Placeholder =
  | { kind: "positional" }
  | { kind: "named"; name: string; prefix: ":" | "@" | "$" };

export interface ScannedStatement {
  sql: string;
  placeholders: Placeholder[];
}

export interface BoundStatement {
  sql: string;
  binding: StatementBinding;
}

const IDENT_START = /[A-Za-z_]/;
const IDENT_PART = /[A-Za-z0-9_]/;

/**
 * Split a script into statements and collect their placeholders
 *
 * Statements that hold nothing but whitespace and comments are dropped.
 */
export function scanScript(sql: string): ScannedStatement[] {
  const statements: ScannedStatement[] = [];
  let start = 0;
  let placeholders: Placeholder[] = [];
  let hasContent = false;
  let i = 0;

  const finish = (end: number) => {
    if (hasContent) {
      statements.push({ sql: sql.slice(start, end).trim(), placeholders });
    }
    start = end + 1;
    placeholders = [];
    hasContent = false;
  };

  while (i < sql.length) {
    const ch = sql[i];
    const next = sql[i + 1];

    // Quoted text: 'string', "identifier", `identifier`; doubled quote escapes
    if (ch === "'" || ch === '"' || ch === "`") {
      hasContent = true;
      i++;
      while (i < sql.length) {
        if (sql[i] === ch) {
          if (sql[i + 1] === ch) {
            i += 2;
            continue;
          }
          break;
        }
        i++;
      }
      i++;
      continue;
    }

    if (ch === "-" && next === "-") {
      const end = sql.indexOf("\n", i);
      i = end === -1 ? sql.length : end + 1;
      continue;
    }

    if (ch === "/" && next === "*") {
      const end = sql.indexOf("*/", i + 2);
      i = end === -1 ? sql.length : end + 2;
      continue;
    }

    if (ch === ";") {
      finish(i);
      i++;
      continue;
    }

    if (ch === "?") {
      hasContent = true;
      placeholders.push({ kind: "positional" });
      i++;
      continue;
    }

    if (ch === ":" && next === ":") {
      hasContent = true;
      i += 2;
      continue;
    }

    const prev = sql[i - 1] ?? "";
    if (
      (ch === ":" || ch === "@" || ch === "$") &&
      next !== undefined &&
      IDENT_START.test(next) &&
      !IDENT_PART.test(prev)
    ) {
      let end = i + 2;
      while (end < sql.length && IDENT_PART.test(sql[end] ?? "")) {
        end++;
      }
      hasContent = true;
      placeholders.push({ kind: "named", name: sql.slice(i + 1, end), prefix: ch });
      i = end;
      continue;
    }

    if (ch !== undefined && !/\s/.test(ch)) {
      hasContent = true;
    }
    i++;
  }

  finish(sql.length);
  return statements;
}

const INTEGER_KEY = /^(0|[1-9]\d*)$/;

function isValueList(params: ScriptParameters): params is readonly SqlValue[] {
  return Array.isArray(params);
}

/**
 * Values for `?` placeholders, in order
 *
 * Objects enumerate integer-like keys before all others, so a map that mixes
 * both kinds has no usable insertion order.
 */
function positionalValues(params: ScriptParameters, label: string): readonly SqlValue[] {
  if (isValueList(params)) {
    return params;
  }

  const map: ParameterMap = params;
  const keys = Object.keys(map);
  const integerKeys = keys.filter((key) => INTEGER_KEY.test(key));
  if (integerKeys.length > 0 && integerKeys.length < keys.length) {
    throw new ParameterBindingError(
      `Script "${label}" uses ? placeholders, but its parameter keys mix numbers (${integerKeys.join(", ")}) with names; pass the values as an array`
    );
  }
  return keys.map((key) => map[key]);
}

/**
 * Bind placeholder values to every statement of a script
 *
 * @param sql - Script body
 * @param params - A map, or an array of values for `?` placeholders
 * @param label - Script name used in error messages
 * @throws ParameterBindingError when styles are mixed or values are missing
 */
export function bindScript(
  sql: string,
  params: ScriptParameters = {},
  label = "(inline sql)"
): BoundStatement[] {
  const statements = scanScript(sql);
  const all = statements.flatMap((statement) => statement.placeholders);

  const positionalCount = all.filter((p) => p.kind === "positional").length;
  const namedPlaceholders = all.filter(
    (p): p is Extract<Placeholder, { kind: "named" }> => p.kind === "named"
  );

  if (positionalCount > 0 && namedPlaceholders.length > 0) {
    throw new ParameterBindingError(
      `Script "${label}" mixes positional (?) and named placeholders`
    );
  }

  if (positionalCount > 0) {
    return bindPositional(statements, positionalValues(params, label), positionalCount, label);
  }

  if (namedPlaceholders.length > 0) {
    if (isValueList(params)) {
      throw new ParameterBindingError(
        `Script "${label}" uses named placeholders and needs a parameter map, not an array`,
        namedPlaceholders.map((p) => `${p.prefix}${p.name}`)
      );
    }
    return bindNamed(statements, params, namedPlaceholders, label);
  }

  return statements.map(
    (statement): BoundStatement => ({ sql: statement.sql, binding: { kind: "none" } })
  );
}

function bindPositional(
  statements: ScannedStatement[],
  values: readonly SqlValue[],
  expected: number,
  label: string
): BoundStatement[] {
  if (values.length < expected) {
    const missing = Array.from(
      { length: expected - values.length },
      (_, i) => `?${values.length + i + 1}`
    );
    throw new ParameterBindingError(
      `Script "${label}" expects ${expected} positional value(s), got ${values.length}`,
      missing
    );
  }

  let offset = 0;
  return statements.map((statement): BoundStatement => {
    const count = statement.placeholders.length;
    if (count === 0) {
      return { sql: statement.sql, binding: { kind: "none" } };
    }
    const slice = values.slice(offset, offset + count);
    offset += count;
    return { sql: statement.sql, binding: { kind: "positional", values: slice } };
  });
}

function bindNamed(
  statements: ScannedStatement[],
  params: ParameterMap,
  placeholders: Extract<Placeholder, { kind: "named" }>[],
  label: string
): BoundStatement[] {
  const missing = [
    ...new Set(
      placeholders
        .filter((placeholder) => !Object.hasOwn(params, placeholder.name))
        .map((placeholder) => `${placeholder.prefix}${placeholder.name}`)
    ),
  ];

  if (missing.length > 0) {
    throw new ParameterBindingError(
      `Script "${label}" is missing value(s) for ${missing.join(", ")}`,
      missing
    );
  }

  return statements.map((statement): BoundStatement => {
    if (statement.placeholders.length === 0) {
      return { sql: statement.sql, binding: { kind: "none" } };
    }
    const values: Record<string, SqlValue> = {};
    for (const placeholder of statement.placeholders) {
      if (placeholder.kind === "named") {
        const value = params[placeholder.name];
        if (value !== undefined) {
          values[placeholder.name] = value;
        }
      }
    }
    return { sql: statement.sql, binding: { kind: "named", values } };
  });
}
