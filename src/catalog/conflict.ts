import { format } from "date-fns";

import type { ConflictMode } from "@/pipeline/types";

import type { ValueRecord } from "./types";

export type ConflictAction = "insert" | "update" | "skip";

export function normalizeConflictMode(mode: unknown): ConflictMode {
  return mode === "overwrite" ? "overwrite" : "skip";
}

/**
 * Decides what to do with an incoming value for an (entity, partner, period)
 * triple. Unrecognized modes behave like "skip".
 */
export function resolveConflict(existing: ValueRecord | null, mode: string): ConflictAction {
  if (!existing) return "insert";
  return normalizeConflictMode(mode) === "overwrite" ? "update" : "skip";
}

export function provenanceNote(action: "insert" | "update", now: Date = new Date()): string {
  const stamp = format(now, "yyyy-MM-dd");
  return action === "insert" ? `imported ${stamp}` : `updated ${stamp}`;
}
