/**
 * Argument parsing and validation helpers
 */

import { InvalidArgumentError } from "commander";
import { z } from "zod";
import type { ScriptParameters } from "@sqlcatalog/sdk";

const sqlValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);
const parameterMapSchema = z.record(sqlValueSchema);
const valueListSchema = z.array(sqlValueSchema);
const parameterListSchema = z.array(z.union([valueListSchema, parameterMapSchema]));

/**
 * Parse a non-negative integer argument
 */
export function parseNonNegativeInt(value: string, name: string): number {
  const trimmed = value.trim();

  if (!/^\d+$/.test(trimmed)) {
    throw new InvalidArgumentError(`${name} must be a non-negative integer`);
  }

  const parsed = Number.parseInt(trimmed, 10);

  if (parsed > 10000) {
    throw new InvalidArgumentError(`${name} must be <= 10000`);
  }

  return parsed;
}

/**
 * Parse JSON with descriptive error messages
 */
export function parseJson(value: string, source: string): unknown {
  try {
    // Strip BOM if present
    const cleaned = value.charCodeAt(0) === 0xfeff ? value.slice(1) : value;
    return JSON.parse(cleaned);
  } catch (err) {
    if (err instanceof SyntaxError) {
      throw new InvalidArgumentError(`Invalid JSON in ${source}: ${err.message}`);
    }
    throw err;
  }
}

function describeIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) {
    return "invalid value";
  }
  return issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message;
}

/**
 * Parse placeholder values: a JSON object for named placeholders, or a JSON
 * array of values for `?` placeholders
 *
 * Values must be strings, numbers, booleans or null.
 */
export function parseParams(value: string, source = "--params"): ScriptParameters {
  const json = parseJson(value, source);
  const parsed = Array.isArray(json)
    ? valueListSchema.safeParse(json)
    : parameterMapSchema.safeParse(json);
  if (!parsed.success) {
    throw new InvalidArgumentError(
      `${source} must be a JSON object or array of strings, numbers, booleans or null (${describeIssue(parsed.error)})`
    );
  }
  return parsed.data;
}

/**
 * Parse a JSON array of parameter sets (objects or value arrays), one per script
 */
export function parseParamsList(value: string, source = "--params"): ScriptParameters[] {
  const parsed = parameterListSchema.safeParse(parseJson(value, source));
  if (!parsed.success) {
    throw new InvalidArgumentError(
      `${source} must be a JSON array of parameter sets (${describeIssue(parsed.error)})`
    );
  }
  return parsed.data;
}
