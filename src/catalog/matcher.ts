import { indelRatio, type SimilarityScorer } from "@/lib/similarity";

import type { CatalogStore } from "./types";

export type MatchCandidate = {
  entityId: number;
  displayName: string;
  normalizedKey: string;
  score: number;
};

export type MatchOptions = {
  threshold: number;
  limit: number;
};

export const DEFAULT_MATCH_THRESHOLD = 90;
export const DEFAULT_MATCH_LIMIT = 3;

export interface MatchStrategy {
  readonly name: string;
  find(key: string, options: MatchOptions): Promise<MatchCandidate[]>;
}

/**
 * Index lookup on the normalized key. A hit is always a perfect score.
 */
export function exactKeyStrategy(store: Pick<CatalogStore, "findEntityByKey">): MatchStrategy {
  return {
    name: "exact",
    async find(key) {
      const entity = await store.findEntityByKey(key);
      if (!entity) return [];
      return [
        {
          entityId: entity.id,
          displayName: entity.displayName,
          normalizedKey: entity.normalizedKey,
          score: 100,
        },
      ];
    },
  };
}

/**
 * Scores every catalog entry against the key. This is a full scan per call,
 * so it grows linearly with the catalog.
 */
export function similarityStrategy(
  store: Pick<CatalogStore, "listEntityCandidates">,
  scorer: SimilarityScorer = indelRatio
): MatchStrategy {
  return {
    name: "similarity",
    async find(key, { threshold, limit }) {
      const candidates = await store.listEntityCandidates();

      const scored: MatchCandidate[] = [];
      for (const candidate of candidates) {
        const score = scorer(key, candidate.normalizedKey || candidate.displayName);
        if (score >= threshold) {
          scored.push({
            entityId: candidate.id,
            displayName: candidate.displayName,
            normalizedKey: candidate.normalizedKey,
            score: Math.floor(score),
          });
        }
      }

      // Array.prototype.sort is stable, so equal scores keep catalog order.
      scored.sort((a, b) => b.score - a.score);
      return scored.slice(0, limit);
    },
  };
}

export type Matcher = {
  match(key: string, threshold?: number, limit?: number): Promise<MatchCandidate[]>;
};

/**
 * Runs the strategies in order and returns the first non-empty result.
 */
export function createMatcher(strategies: MatchStrategy[]): Matcher {
  return {
    async match(key, threshold = DEFAULT_MATCH_THRESHOLD, limit = DEFAULT_MATCH_LIMIT) {
      if (!key) return [];

      for (const strategy of strategies) {
        const found = await strategy.find(key, { threshold, limit });
        if (found.length > 0) return found;
      }
      return [];
    },
  };
}

export function createCatalogMatcher(store: CatalogStore, scorer?: SimilarityScorer): Matcher {
  return createMatcher([exactKeyStrategy(store), similarityStrategy(store, scorer)]);
}
