// src/store/rows.ts
// Helpers for JSON columns.

/** Parse a JSON string array column; anything else yields [] */
export function parseStringArray(json: string | null): string[] {
  if (!json) return [];
  try {
    const value: unknown = JSON.parse(json);
    return Array.isArray(value) ? value.filter((v): v is string => typeof v === "string") : [];
  } catch {
    return [];
  }
}

/** Parse a JSON number array column; non-numeric entries become 0 */
export function parseNumberArray(json: string | null): number[] {
  if (!json) return [];
  try {
    const value: unknown = JSON.parse(json);
    return Array.isArray(value) ? value.map((v) => (typeof v === "number" ? v : 0)) : [];
  } catch {
    return [];
  }
}

/** Union of two id lists, first-seen order */
export function mergeIds(existing: readonly string[], added: readonly string[]): string[] {
  return [...new Set([...existing, ...added])];
}
