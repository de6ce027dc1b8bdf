/**
 * Validation of caller-supplied record fields
 */

import { InvalidRecordError } from "./errors.js";
import type { BodyLocation, ScriptRecordInput, ScriptRecordPatch } from "./types.js";

const MAX_LABEL_LENGTH = 200;

// eslint-disable-next-line no-control-regex
const CONTROL_CHARS = /[\u0000-\u001f\u007f]/;

/**
 * Validate a script name or category
 * @throws InvalidRecordError if invalid
 */
export function validateLabel(value: string, label: "name" | "category"): void {
  if (typeof value !== "string" || value.length === 0) {
    throw new InvalidRecordError(`Script ${label} must be a non-empty string`);
  }

  if (value.trim() !== value) {
    throw new InvalidRecordError(
      `Script ${label} cannot start or end with whitespace: "${value}"`
    );
  }

  if (CONTROL_CHARS.test(value)) {
    throw new InvalidRecordError(`Script ${label} contains control characters: ${JSON.stringify(value)}`);
  }

  if (value.length > MAX_LABEL_LENGTH) {
    throw new InvalidRecordError(
      `Script ${label} is longer than ${MAX_LABEL_LENGTH} characters: "${value.slice(0, 32)}..."`
    );
  }
}

/**
 * Validate a body location
 */
export function validateBody(body: BodyLocation, name: string): void {
  switch (body.kind) {
    case "inline":
      if (typeof body.text !== "string") {
        throw new InvalidRecordError(`Inline body of script "${name}" must be a string`);
      }
      return;
    case "file":
      if (!body.path) {
        throw new InvalidRecordError(`File body of script "${name}" needs a path`);
      }
      if (body.path.split(/[\\/]+/).includes("..")) {
        throw new InvalidRecordError(
          `File body of script "${name}" cannot contain ".." path segments: ${body.path}`
        );
      }
      return;
  }
}

/**
 * Validate a record before insertion
 */
export function validateRecordInput(input: ScriptRecordInput): void {
  validateLabel(input.name, "name");
  validateLabel(input.category, "category");
  validateBody(input.body, input.name);
}

/**
 * Validate the fields of an update
 */
export function validatePatch(name: string, patch: ScriptRecordPatch): void {
  if (patch.category !== undefined) {
    validateLabel(patch.category, "category");
  }
  if (patch.body !== undefined) {
    validateBody(patch.body, name);
  }
}
