/**
 * Reading script bodies from the command line, files and stdin
 */

import * as fs from "node:fs/promises";
import { InvalidArgumentError } from "commander";
import { CliError } from "./errors.js";

const MAX_STDIN_BYTES = 10 * 1024 * 1024;

function stripBom(text: string): string {
  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}

/**
 * Read all of stdin as UTF-8
 * @throws CliError past `maxBytes`
 */
export async function readStdin(maxBytes = MAX_STDIN_BYTES): Promise<string> {
  const chunks: Buffer[] = [];
  let total = 0;

  for await (const chunk of process.stdin) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    total += buffer.length;
    if (total > maxBytes) {
      throw new CliError(`stdin too large (max ${Math.floor(maxBytes / (1024 * 1024))}MB)`);
    }
    chunks.push(buffer);
  }

  return stripBom(Buffer.concat(chunks).toString("utf8"));
}

/**
 * Read a SQL file given on the command line
 */
export async function readSqlFile(filePath: string): Promise<string> {
  try {
    return stripBom(await fs.readFile(filePath, "utf8"));
  } catch (err) {
    throw new CliError(`Cannot read SQL file ${filePath}`, { cause: err });
  }
}

/**
 * Where `add` takes the body from
 */
export interface BodySourceOptions {
  content?: string;
  file?: string;
  /** Catalog `file` in place instead of reading it */
  register?: boolean;
}

export interface BodySource {
  content?: string;
  sourceFile?: string;
}

/**
 * Pick the body of a new script: `--content`, `--file`, or piped stdin
 */
export async function resolveBodySource(options: BodySourceOptions): Promise<BodySource> {
  const { content, file, register } = options;

  if (content !== undefined && file !== undefined) {
    throw new InvalidArgumentError("Cannot use both --content and --file; choose one");
  }

  if (file !== undefined) {
    return register ? { sourceFile: file } : { content: await readSqlFile(file) };
  }
  if (register) {
    throw new InvalidArgumentError("--register needs --file");
  }
  if (content !== undefined) {
    return { content };
  }

  if (isStdinTTY()) {
    throw new InvalidArgumentError(
      "No script body provided. Use --content, --file, or pipe SQL to stdin"
    );
  }

  const piped = await readStdin();
  if (!piped.trim()) {
    throw new InvalidArgumentError("stdin is empty");
  }
  return { content: piped };
}

/**
 * Write to stderr
 */
export function writeStderr(content: string): void {
  process.stderr.write(content);
}

/**
 * Check if stdin is a TTY (interactive terminal)
 */
export function isStdinTTY(): boolean {
  return process.stdin.isTTY ?? false;
}
