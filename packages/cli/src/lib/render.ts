/**
 * Output rendering helpers
 */

import type { Row, ScriptRecord } from "@sqlcatalog/sdk";

type Color = "red" | "green" | "yellow";

const SEPARATOR = "-".repeat(50);

/**
 * Print JSON to stdout
 */
export function printJson(data: unknown, options?: { raw?: boolean }): void {
  const json = options?.raw ? JSON.stringify(data) : JSON.stringify(data, null, 2);
  console.log(json);
}

/**
 * Print lines to stdout (one per line)
 */
export function printLines(lines: string[]): void {
  lines.forEach((line) => console.log(line));
}

/**
 * Apply ANSI color only if output stream is a TTY
 */
export function colorize(
  text: string,
  color: Color,
  stream: NodeJS.WriteStream = process.stdout
): string {
  if (!(stream.isTTY ?? false)) {
    return text;
  }

  const codes: Record<Color, string> = {
    red: "\x1b[31m",
    green: "\x1b[32m",
    yellow: "\x1b[33m",
  };

  const reset = "\x1b[0m";
  return `${codes[color]}${text}${reset}`;
}

/**
 * Human-readable description of a script, optionally followed by its body
 */
export function formatScript(record: ScriptRecord, content?: string): string[] {
  const lines = [
    `Name: ${record.name}`,
    `Category: ${record.category}`,
    `Description: ${record.description}`,
    `Body: ${record.body.kind === "file" ? record.body.path : "(inline)"}`,
  ];

  if (content !== undefined) {
    lines.push("", "Content:", SEPARATOR, content);
  }

  return lines;
}

/**
 * Several scripts, separated by a rule
 */
export function formatScripts(
  scripts: readonly { record: ScriptRecord; content?: string }[]
): string[] {
  return scripts.flatMap(({ record, content }) => [...formatScript(record, content), SEPARATOR]);
}

function formatValue(value: unknown): string {
  if (value === null || value === undefined) {
    return "NULL";
  }
  if (Buffer.isBuffer(value)) {
    return `<blob ${value.length} bytes>`;
  }
  if (typeof value === "object") {
    return JSON.stringify(value);
  }
  return String(value);
}

/**
 * Tab-separated result rows with a header line
 */
export function formatRows(rows: readonly Row[]): string[] {
  const first = rows[0];
  if (!first) {
    return ["(no rows)"];
  }

  const columns = Object.keys(first);
  return [
    columns.join("\t"),
    ...rows.map((row) => columns.map((column) => formatValue(row[column])).join("\t")),
  ];
}
