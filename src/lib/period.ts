import { format, isValid, parse } from "date-fns";

// Most specific first: a full date beats year-month, which beats a bare year.
const ROW_DATE_FORMATS = [
  "yyyy-MM-dd",
  "yyyy/MM/dd",
  "yyyy.MM.dd",
  "yyyy-MM",
  "yyyy/MM",
  "yyyy.MM",
  "yyyy",
];

const REFERENCE_DATE = new Date(2000, 0, 1);

// `yyyy` also accepts one to three digits; a period needs a four-digit year.
function tryParse(value: string, pattern: string): Date | null {
  const parsed = parse(value, pattern, REFERENCE_DATE);
  return isValid(parsed) && parsed.getFullYear() >= 1000 ? parsed : null;
}

/**
 * Resolves a row's date cell to a `YYYY-MM` period, falling back to the
 * task-level period. Returns "" when neither yields one; substituting the
 * current month is left to the caller.
 */
export function resolvePeriod(
  rowValue: string | null | undefined,
  fallback?: string | null
): string {
  const value = rowValue?.trim() ?? "";
  if (value) {
    for (const pattern of ROW_DATE_FORMATS) {
      const parsed = tryParse(value, pattern);
      if (parsed) return format(parsed, "yyyy-MM");
    }
  }

  const fallbackValue = fallback?.trim() ?? "";
  if (fallbackValue.length >= 7) {
    return fallbackValue.slice(0, 7);
  }
  if (fallbackValue) {
    const compact = tryParse(fallbackValue, "yyyyMM");
    if (compact) return format(compact, "yyyy-MM");
  }

  return "";
}

export function currentPeriod(now: Date = new Date()): string {
  return format(now, "yyyy-MM");
}

/**
 * Converts a spreadsheet cell into text for period resolution and error
 * reporting.
 */
export function cellToText(value: unknown): string {
  if (value === null || value === undefined) return "";
  if (value instanceof Date) {
    return isValid(value) ? format(value, "yyyy-MM-dd") : "";
  }
  if (typeof value === "number") {
    return Number.isFinite(value) ? String(value) : "";
  }
  return String(value).replace(/\s+/gu, " ").trim();
}
