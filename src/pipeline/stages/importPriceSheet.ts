import { provenanceNote, resolveConflict } from "@/catalog/conflict";
import type { Matcher } from "@/catalog/matcher";
import type { CatalogStore } from "@/catalog/types";
import { parseLenientNumber } from "@/lib/amount";
import { normalizeEntityName } from "@/lib/normalize";
import { cellToText, currentPeriod, resolvePeriod } from "@/lib/period";

import type { DataSourceResolver, StagedFile } from "../dataSource";
import { missingColumns } from "../mapping";
import {
  PipelineError,
  type ConflictMode,
  type ImportJob,
  type MappingSpec,
  type PipelineLogger,
  type RowOutcome,
  type SourceRow,
  type ValueGroup,
} from "../types";

export type PriceRowContext = {
  catalog: CatalogStore;
  matcher: Matcher;
  mapping: MappingSpec;
  conflictMode: ConflictMode;
  fallbackPeriod: string | null;
  matchThreshold: number;
  /** Stamped on written records as their source. */
  taskId: string;
  log: PipelineLogger;
  now?: () => Date;
};

export type ParsedValue = {
  group: ValueGroup;
  value: number;
};

export type ParsedValues = {
  usable: ParsedValue[];
  rejected: ParsedValue[];
};

type WriteResult = "insert" | "update" | "skip";

const MAX_WRITE_ATTEMPTS = 2;

/**
 * Reads every value group of a row. Empty or unparsable cells are ignored;
 * non-positive numbers are rejected.
 */
export function readValueGroups(row: SourceRow, mapping: MappingSpec): ParsedValues {
  const usable: ParsedValue[] = [];
  const rejected: ParsedValue[] = [];

  for (const group of mapping.valueGroups) {
    const value = parseLenientNumber(row[group.column]);
    if (value === null) continue;
    if (value <= 0) {
      rejected.push({ group, value });
    } else {
      usable.push({ group, value });
    }
  }

  return { usable, rejected };
}

export function readQuantity(row: SourceRow, mapping: MappingSpec): number {
  if (!mapping.quantityColumn) return 1;
  const parsed = parseLenientNumber(row[mapping.quantityColumn]);
  if (parsed === null) return 1;
  const quantity = Math.trunc(parsed);
  return quantity > 0 ? quantity : 1;
}

export function readPeriod(
  row: SourceRow,
  mapping: MappingSpec,
  fallbackPeriod: string | null,
  now: Date = new Date()
): string {
  const dateCell = mapping.dateColumn ? cellToText(row[mapping.dateColumn]) : "";
  return resolvePeriod(dateCell, fallbackPeriod) || currentPeriod(now);
}

/**
 * Processes one source row: validates it, resolves the catalog entity and
 * writes each value under the conflict policy.
 */
export async function processPriceRow(ctx: PriceRowContext, row: SourceRow): Promise<RowOutcome> {
  const now = ctx.now ?? (() => new Date());
  const rawName = cellToText(row[ctx.mapping.nameColumn]);
  if (!rawName) {
    return { kind: "excluded", reason: "blank_name" };
  }

  const normalizedKey = normalizeEntityName(rawName);
  if (!normalizedKey) {
    return { kind: "rowError", reason: `name '${rawName}' has no usable characters after normalization` };
  }

  const { usable, rejected } = readValueGroups(row, ctx.mapping);
  if (rejected.length > 0) {
    const partners = rejected.map((item) => item.group.partner).join(", ");
    return { kind: "rowError", reason: `value for ${partners} must be greater than 0` };
  }
  if (usable.length === 0) {
    return { kind: "excluded", reason: "no_value" };
  }

  const entityId = await resolveEntityId(ctx, rawName, normalizedKey);
  const period = readPeriod(row, ctx.mapping, ctx.fallbackPeriod, now());
  const quantity = readQuantity(row, ctx.mapping);

  let inserted = 0;
  let updated = 0;
  let skipped = 0;
  for (const { group, value } of usable) {
    const result = await writeValue(ctx, { entityId, period, group, value, quantity }, now());
    if (result === "insert") inserted++;
    else if (result === "update") updated++;
    else skipped++;
  }

  if (inserted + updated === 0) {
    return { kind: "excluded", reason: "no_write", skipped };
  }
  return { kind: "success", inserted, updated, skipped };
}

async function resolveEntityId(ctx: PriceRowContext, rawName: string, normalizedKey: string) {
  const [best] = await ctx.matcher.match(normalizedKey, ctx.matchThreshold);
  if (best) {
    if (best.score < 100) {
      await ctx.log({
        level: "debug",
        message: `Fuzzy matched '${rawName}' to '${best.displayName}' (${best.score})`,
        meta: { entityId: best.entityId, normalizedKey, score: best.score },
      });
    }
    return best.entityId;
  }

  const { entity, created } = await ctx.catalog.insertOrFetchEntity({
    displayName: rawName,
    normalizedKey,
  });
  if (created) {
    await ctx.log({
      level: "debug",
      message: `Catalog entity created: ${rawName}`,
      meta: { entityId: entity.id, normalizedKey },
    });
  }
  return entity.id;
}

async function writeValue(
  ctx: PriceRowContext,
  input: { entityId: number; period: string; group: ValueGroup; value: number; quantity: number },
  now: Date
): Promise<WriteResult> {
  const { entityId, period, group, value, quantity } = input;

  for (let attempt = 1; attempt <= MAX_WRITE_ATTEMPTS; attempt++) {
    const existing = await ctx.catalog.findValueRecord(entityId, group.partner, period);
    const action = resolveConflict(existing, ctx.conflictMode);

    if (action === "skip") return "skip";

    if (action === "update" && existing) {
      await ctx.catalog.updateValueRecord(existing.id, {
        value,
        valueType: group.valueType,
        quantity,
        note: provenanceNote("update", now),
        source: ctx.taskId,
      });
      return "update";
    }

    const inserted = await ctx.catalog.insertValueRecord({
      entityId,
      partner: group.partner,
      period,
      value,
      valueType: group.valueType,
      quantity,
      note: provenanceNote("insert", now),
      source: ctx.taskId,
    });
    if (inserted) return "insert";

    // Another writer took the triple after our read; decide again.
  }

  throw new Error(`could not write value for ${group.partner} in ${period}`);
}

export type PriceImportJobOptions = Omit<PriceRowContext, "taskId" | "log"> & {
  source: DataSourceResolver;
  file: StagedFile;
};

/**
 * Builds the task-runner job for one staged price sheet.
 */
export function createPriceImportJob(options: PriceImportJobOptions): ImportJob {
  const { source, file, ...rowContext } = options;

  return {
    dataRef: file.dataRef,
    mapping: rowContext.mapping,
    conflictMode: rowContext.conflictMode,
    fallbackPeriod: rowContext.fallbackPeriod,
    async loadRows() {
      const table = await source.read(file);
      const missing = missingColumns(rowContext.mapping, table.columns);
      if (missing.length > 0) {
        throw new PipelineError(
          "missing_columns",
          `Source is missing mapped column(s): ${missing.join(", ")}`,
          { missing, columns: table.columns }
        );
      }
      return table.rows;
    },
    processRow(row, _rowNo, ctx) {
      return processPriceRow({ ...rowContext, taskId: ctx.taskId, log: ctx.log }, row);
    },
  };
}
