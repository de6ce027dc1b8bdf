/**
 * Filename slugs for file-backed script bodies
 *
 * Pipeline:
 * 1. Normalize (NFKC, trim, lowercase)
 * 2. Transliterate (strip diacritics)
 * 3. Clean (whitespace and dashes to underscores, drop punctuation)
 * 4. Limit length (with word boundary preservation)
 *
 * The result never contains path separators or dots, so a slug is always a
 * single path segment.
 */

import { posix } from "node:path";
import { InvalidRecordError } from "./errors.js";

export interface SlugOptions {
  /** Maximum length for the slug (default: 96) */
  maxLength?: number;
  /** Locale for case conversion (default: 'en') */
  locale?: string;
}

/** Extension of body files */
export const BODY_EXTENSION = ".sql";

/**
 * Normalize a string using Unicode NFKC normalization, trim and lowercase it
 */
export function normalize(input: string, locale: string = "en"): string {
  return input.normalize("NFKC").trim().toLocaleLowerCase(locale);
}

/**
 * Replace accented Latin letters with their base letter
 */
export function transliterate(input: string): string {
  return input
    .normalize("NFKD")
    .replace(/\p{M}+/gu, "")
    .replace(/ß/g, "ss")
    .replace(/æ/g, "ae")
    .replace(/ø/g, "o")
    .replace(/œ/g, "oe")
    .normalize("NFC");
}

/**
 * Replace separators with underscores, remove punctuation and collapse runs
 * Preserves Unicode letters and numbers
 */
export function clean(input: string): string {
  return input
    .replace(/[\s\-]+/g, "_")
    .replace(/[^\p{L}\p{N}_]/gu, "")
    .replace(/_+/g, "_")
    .replace(/^_+|_+$/g, "");
}

/**
 * Limit length, breaking at an underscore when one is close to the limit
 */
export function limitLength(input: string, maxLength: number): string {
  if (input.length <= maxLength) {
    return input;
  }

  const truncated = input.substring(0, maxLength);
  const lastBreak = truncated.lastIndexOf("_");

  if (lastBreak > maxLength * 0.6) {
    return truncated.substring(0, lastBreak);
  }

  return truncated;
}

/**
 * Generate a filename slug from a script name or category
 * @throws InvalidRecordError when nothing usable is left after cleaning
 */
export function toSlug(input: string, options: SlugOptions = {}): string {
  const { maxLength = 96, locale = "en" } = options;

  const slug = limitLength(clean(transliterate(normalize(input, locale))), maxLength);

  if (!slug) {
    throw new InvalidRecordError(`Unable to derive a file name from "${input}"`);
  }

  return slug;
}

/**
 * Relative path of the body file of a script: `<category>/<name>.sql`
 *
 * Always uses forward slashes so metadata files stay portable.
 */
export function bodyPathFor(category: string, name: string): string {
  return posix.join(toSlug(category), `${toSlug(name)}${BODY_EXTENSION}`);
}
