import { z } from "zod";

import { normalizeConflictMode } from "@/catalog/conflict";
import { DEFAULT_MATCH_THRESHOLD, type Matcher } from "@/catalog/matcher";
import type { CatalogStore } from "@/catalog/types";
import { normalizeEntityName } from "@/lib/normalize";
import { cellToText } from "@/lib/period";

import type { DataSourceResolver } from "./dataSource";
import { missingColumns, parseMappingSpec } from "./mapping";
import { createPriceImportJob, readPeriod, readValueGroups } from "./stages/importPriceSheet";
import type { TaskRunner } from "./taskRunner";
import {
  SubmissionValidationError,
  type ConflictMode,
  type ImportTaskStatus,
  type MappingSpec,
} from "./types";

export const PREVIEW_MAX_ROWS = 50;

const importRequestSchema = z.object({
  data_ref: z.string({ required_error: "data_ref is required" }).trim().min(1, "data_ref is required"),
  column_mapping: z.unknown(),
  conflict_mode: z.unknown().optional(),
  fallback_period: z
    .string()
    .trim()
    .nullish()
    .transform((value) => (value ? value : null)),
  match_threshold: z.number().min(0).max(100).nullish(),
});

export type ImportStatusResponse = {
  task_id: string;
  status: ImportTaskStatus;
  data_ref: string;
  conflict_mode: ConflictMode;
  total: number;
  success: number;
  failed: number;
  skipped: number;
  error_message: string | null;
  created_at: string;
  updated_at: string;
  errors: Array<{ row_no: number; raw_row: Record<string, unknown> | null; error_message: string }>;
};

export type PreviewValue = {
  partner: string;
  value_type: string;
  value: number;
  /** Stored value for the same entity, partner and period, if any. */
  existing_value: number | null;
};

export type PreviewRow = {
  row_no: number;
  raw_name: string;
  normalized_name: string;
  period: string;
  matches: Array<{ entity_id: number; display_name: string; score: number }>;
  values: PreviewValue[];
  problem: string | null;
};

export type ImportPreview = {
  data_ref: string;
  conflict_mode: ConflictMode;
  columns: string[];
  total_rows: number;
  rows: PreviewRow[];
  /** Values that would be left untouched because a stored value exists. */
  conflicts: number;
};

export type ImportServiceDeps = {
  runner: TaskRunner;
  catalog: CatalogStore;
  matcher: Matcher;
  source: DataSourceResolver;
  matchThreshold?: number;
  now?: () => Date;
};

type ParsedRequest = {
  dataRef: string;
  mapping: MappingSpec;
  conflictMode: ConflictMode;
  fallbackPeriod: string | null;
  matchThreshold: number;
};

export function createImportService(deps: ImportServiceDeps) {
  const defaultThreshold = deps.matchThreshold ?? DEFAULT_MATCH_THRESHOLD;

  function parseRequest(request: unknown): ParsedRequest {
    const parsed = importRequestSchema.safeParse(request);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
      );
      throw new SubmissionValidationError(`Invalid import request: ${issues.join("; ")}`, { issues });
    }

    return {
      dataRef: parsed.data.data_ref,
      mapping: parseMappingSpec(parsed.data.column_mapping),
      conflictMode: normalizeConflictMode(parsed.data.conflict_mode),
      fallbackPeriod: parsed.data.fallback_period,
      matchThreshold: parsed.data.match_threshold ?? defaultThreshold,
    };
  }

  /**
   * Validates the request and queues an import task. Throws
   * SubmissionValidationError without creating a task when the request is
   * malformed or the data reference cannot be resolved.
   */
  async function submitImport(request: unknown): Promise<{ task_id: string }> {
    const { dataRef, mapping, conflictMode, fallbackPeriod, matchThreshold } = parseRequest(request);
    const file = await deps.source.resolve(dataRef);

    const job = createPriceImportJob({
      source: deps.source,
      file,
      catalog: deps.catalog,
      matcher: deps.matcher,
      mapping,
      conflictMode,
      fallbackPeriod,
      matchThreshold,
      now: deps.now,
    });

    const { taskId } = await deps.runner.submit(job);
    return { task_id: taskId };
  }

  async function getImportStatus(taskId: string): Promise<ImportStatusResponse> {
    const status = await deps.runner.getStatus(taskId);
    return {
      task_id: status.id,
      status: status.status,
      data_ref: status.dataRef,
      conflict_mode: status.conflictMode,
      total: status.total,
      success: status.success,
      failed: status.failed,
      skipped: status.skipped,
      error_message: status.errorMessage,
      created_at: status.createdAt.toISOString(),
      updated_at: status.updatedAt.toISOString(),
      errors: status.errors.map((error) => ({
        row_no: error.rowNo,
        raw_row: error.rawRow,
        error_message: error.errorMessage,
      })),
    };
  }

  /**
   * Dry run over the first rows of a staged file: shows how names would match
   * and which values collide with stored ones. Writes nothing.
   */
  async function previewImport(request: unknown, maxRows = PREVIEW_MAX_ROWS): Promise<ImportPreview> {
    const { dataRef, mapping, conflictMode, fallbackPeriod, matchThreshold } = parseRequest(request);
    const file = await deps.source.resolve(dataRef);
    const table = await deps.source.read(file);

    const missing = missingColumns(mapping, table.columns);
    if (missing.length > 0) {
      throw new SubmissionValidationError(`Source is missing mapped column(s): ${missing.join(", ")}`, {
        missing,
        columns: table.columns,
      });
    }

    const now = deps.now ? deps.now() : new Date();
    const rows: PreviewRow[] = [];
    let conflicts = 0;

    for (const [index, row] of table.rows.slice(0, maxRows).entries()) {
      const rawName = cellToText(row[mapping.nameColumn]);
      const normalizedName = normalizeEntityName(rawName);
      const period = readPeriod(row, mapping, fallbackPeriod, now);
      const { usable, rejected } = readValueGroups(row, mapping);

      const matches = normalizedName ? await deps.matcher.match(normalizedName, matchThreshold) : [];
      const best = matches[0];

      const values: PreviewValue[] = [];
      for (const { group, value } of usable) {
        const existing = best ? await deps.catalog.findValueRecord(best.entityId, group.partner, period) : null;
        if (existing && conflictMode !== "overwrite") conflicts++;
        values.push({
          partner: group.partner,
          value_type: group.valueType,
          value,
          existing_value: existing ? existing.value : null,
        });
      }

      let problem: string | null = null;
      if (!rawName) problem = "blank name, row is excluded";
      else if (!normalizedName) problem = "name has no usable characters after normalization";
      else if (rejected.length > 0) problem = "value must be greater than 0";
      else if (usable.length === 0) problem = "no usable value, row is excluded";

      rows.push({
        row_no: index + 1,
        raw_name: rawName,
        normalized_name: normalizedName,
        period,
        matches: matches.map((match) => ({
          entity_id: match.entityId,
          display_name: match.displayName,
          score: match.score,
        })),
        values,
        problem,
      });
    }

    return {
      data_ref: file.dataRef,
      conflict_mode: conflictMode,
      columns: table.columns,
      total_rows: table.rows.length,
      rows,
      conflicts,
    };
  }

  return { submitImport, getImportStatus, previewImport };
}

export type ImportService = ReturnType<typeof createImportService>;
