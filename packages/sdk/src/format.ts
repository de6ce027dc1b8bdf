/**
 * Deterministic JSON formatting for the metadata file
 */

export type KeyOrder = "alpha" | readonly string[];

/**
 * Stable, deterministic JSON stringification with guaranteed key ordering
 * @param value - Value to stringify
 * @param indent - Number of spaces for indentation (default: 2)
 * @param order - Key ordering: "alpha" or explicit list, unlisted keys follow alphabetically
 * @returns Formatted JSON string with trailing newline
 */
export function stableStringify(value: unknown, indent = 2, order: KeyOrder = "alpha"): string {
  const seen = new WeakSet<object>();

  const sorter = (a: string, b: string): number => {
    if (order === "alpha") {
      return a.localeCompare(b);
    }
    const aIndex = order.indexOf(a);
    const bIndex = order.indexOf(b);

    if (aIndex !== -1 && bIndex !== -1) {
      return aIndex - bIndex;
    }
    if (aIndex !== -1) return -1;
    if (bIndex !== -1) return 1;
    return a.localeCompare(b);
  };

  const normalize = (current: unknown): unknown => {
    if (current === null || typeof current !== "object") {
      return current;
    }

    if (seen.has(current)) {
      throw new Error("Circular reference detected in object");
    }
    seen.add(current);

    try {
      // Arrays: preserve order but normalize contents
      if (Array.isArray(current)) {
        return current.map(normalize);
      }

      const out: Record<string, unknown> = {};
      for (const [key, child] of Object.entries(current).sort(([a], [b]) => sorter(a, b))) {
        out[key] = normalize(child);
      }
      return out;
    } finally {
      seen.delete(current);
    }
  };

  return JSON.stringify(normalize(value), null, indent) + "\n";
}
