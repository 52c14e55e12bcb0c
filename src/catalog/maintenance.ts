import { normalizeEntityName } from "@/lib/normalize";

import type { EntityCandidate } from "./types";

export type DuplicateGroup = {
  normalizedKey: string;
  entities: EntityCandidate[];
};

export type KeyUpdate = {
  id: number;
  previousKey: string;
  normalizedKey: string;
};

export type KeyCollision = {
  id: number;
  displayName: string;
  normalizedKey: string;
  conflictsWith: number;
};

/**
 * Groups entities whose display names normalize to the same key under the
 * current normalizer. Only groups with more than one entity are returned, in
 * the order their first member appears.
 */
export function findNormalizedDuplicates(entities: EntityCandidate[]): DuplicateGroup[] {
  const groups = new Map<string, EntityCandidate[]>();
  for (const entity of entities) {
    const key = normalizeEntityName(entity.displayName);
    if (!key) continue;
    const members = groups.get(key);
    if (members) {
      members.push(entity);
    } else {
      groups.set(key, [entity]);
    }
  }

  return Array.from(groups, ([normalizedKey, members]) => ({ normalizedKey, entities: members })).filter(
    (group) => group.entities.length > 1
  );
}

/**
 * Works out which stored keys differ from the current normalizer output.
 * A new key already held by another entity, or claimed earlier in the same
 * plan, is reported as a collision and left alone.
 */
export function planKeyBackfill(entities: EntityCandidate[]): {
  updates: KeyUpdate[];
  collisions: KeyCollision[];
} {
  const held = new Map<string, number>();
  for (const entity of entities) {
    if (!held.has(entity.normalizedKey)) held.set(entity.normalizedKey, entity.id);
  }

  const claimed = new Map<string, number>();
  const updates: KeyUpdate[] = [];
  const collisions: KeyCollision[] = [];

  for (const entity of entities) {
    const next = normalizeEntityName(entity.displayName);
    if (!next || next === entity.normalizedKey) continue;

    const holder = held.get(next) ?? claimed.get(next);
    if (holder !== undefined && holder !== entity.id) {
      collisions.push({ id: entity.id, displayName: entity.displayName, normalizedKey: next, conflictsWith: holder });
      continue;
    }

    claimed.set(next, entity.id);
    updates.push({ id: entity.id, previousKey: entity.normalizedKey, normalizedKey: next });
  }

  return { updates, collisions };
}
