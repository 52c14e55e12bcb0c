/**
 * Lenient numeric parse for price and quantity cells: everything except
 * digits, "." and "-" is stripped before conversion. Returns null for empty
 * or unparsable input.
 */
export function parseLenientNumber(value: unknown): number | null {
  if (value === null || value === undefined) return null;
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (value instanceof Date) return null;

  const cleaned = String(value).trim().replace(/[^0-9.\-]/gu, "");
  if (!cleaned) return null;

  const numeric = Number(cleaned);
  return Number.isFinite(numeric) ? numeric : null;
}
