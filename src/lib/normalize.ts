/**
 * Weight and packaging units that carry no identity for a product name.
 */
const UNIT_TOKENS = ["千克", "公斤", "kg", "g", "斤", "箱", "袋", "包", "克"];

const BRACKET_SPAN = /[(（][^]*?[)）]/gu;

const WORD = String.raw`[\p{L}\p{N}_]`;
const UNIT_PATTERN = new RegExp(
  `(?<!${WORD})(?:${UNIT_TOKENS.join("|")})(?!${WORD})`,
  "gu"
);

const DISALLOWED_CHARS = /[^\p{L}\p{N}_\s()（）\u4e00-\u9fff]/gu;

/**
 * Turns a raw product label into the key used for catalog lookups.
 *
 * Every bracketed span is dropped, not just the first, so that the result
 * is a fixed point: `normalizeEntityName(normalizeEntityName(x))` equals
 * `normalizeEntityName(x)`.
 */
export function normalizeEntityName(raw: string | null | undefined): string {
  if (!raw) return "";

  return String(raw)
    .trim()
    .toLowerCase()
    .replace(BRACKET_SPAN, "")
    .replace(UNIT_PATTERN, "")
    .replace(DISALLOWED_CHARS, " ")
    .replace(/\s+/gu, " ")
    .trim();
}
