import stringSimilarity from "string-similarity";

/**
 * Symmetric 0-100 similarity between two keys. 100 means identical.
 */
export type SimilarityScorer = (a: string, b: string) => number;

export type ScorerName = "indel" | "dice";

function longestCommonSubsequence(a: string, b: string): number {
  const left = Array.from(a);
  const right = Array.from(b);
  if (left.length === 0 || right.length === 0) return 0;

  let previous = new Array<number>(right.length + 1).fill(0);
  let current = new Array<number>(right.length + 1).fill(0);

  for (let i = 1; i <= left.length; i++) {
    for (let j = 1; j <= right.length; j++) {
      current[j] =
        left[i - 1] === right[j - 1]
          ? previous[j - 1] + 1
          : Math.max(previous[j], current[j - 1]);
    }
    [previous, current] = [current, previous];
  }

  return previous[right.length];
}

/**
 * Normalized indel similarity (insertions and deletions only), the usual
 * "ratio" of fuzzy matching libraries.
 */
export const indelRatio: SimilarityScorer = (a, b) => {
  const lengthSum = Array.from(a).length + Array.from(b).length;
  if (lengthSum === 0) return 100;

  const indelDistance = lengthSum - 2 * longestCommonSubsequence(a, b);
  return 100 * (1 - indelDistance / lengthSum);
};

/**
 * Bigram Dice coefficient scaled to 0-100.
 */
export const diceRatio: SimilarityScorer = (a, b) => {
  if (a === b) return 100;
  return stringSimilarity.compareTwoStrings(a, b) * 100;
};

export function getScorer(name: ScorerName): SimilarityScorer {
  return name === "dice" ? diceRatio : indelRatio;
}
