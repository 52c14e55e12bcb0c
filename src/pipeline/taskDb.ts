import { asc, eq } from "drizzle-orm";

import type { DbClient } from "@/db";
import { importErrors, importTasks, type ImportTaskRow } from "@/db/schema";
import { normalizeConflictMode } from "@/catalog/conflict";

import type { ImportTask, ImportTaskStatus, TaskStore } from "./types";

const TASK_STATUSES: readonly ImportTaskStatus[] = ["pending", "processing", "completed", "failed"];

function toStatus(value: string): ImportTaskStatus {
  const status = TASK_STATUSES.find((candidate) => candidate === value);
  if (!status) {
    throw new Error(`Unknown import task status '${value}'`);
  }
  return status;
}

function toImportTask(row: ImportTaskRow): ImportTask {
  return {
    id: row.id,
    dataRef: row.dataRef,
    conflictMode: normalizeConflictMode(row.conflictMode),
    fallbackPeriod: row.fallbackPeriod,
    status: toStatus(row.status),
    total: row.total,
    success: row.success,
    failed: row.failed,
    skipped: row.skipped,
    errorMessage: row.errorMessage,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

export function createTaskDb(db: DbClient): TaskStore {
  async function patchTask(
    taskId: string,
    patch: Partial<typeof importTasks.$inferInsert>
  ) {
    await db
      .update(importTasks)
      .set({ ...patch, updatedAt: new Date() })
      .where(eq(importTasks.id, taskId));
  }

  return {
    async createTask(input) {
      const [row] = await db
        .insert(importTasks)
        .values({
          id: input.id,
          dataRef: input.dataRef,
          mapping: { ...input.mapping },
          conflictMode: input.conflictMode,
          fallbackPeriod: input.fallbackPeriod,
          status: "pending",
        })
        .returning();
      return toImportTask(row);
    },

    async getTask(taskId) {
      const rows = await db
        .select()
        .from(importTasks)
        .where(eq(importTasks.id, taskId))
        .limit(1);
      return rows[0] ? toImportTask(rows[0]) : null;
    },

    async markProcessing(taskId) {
      await patchTask(taskId, { status: "processing", startedAt: new Date() });
    },

    async setTotal(taskId, total) {
      await patchTask(taskId, { total });
    },

    async saveProgress(taskId, counters) {
      await patchTask(taskId, { ...counters });
    },

    async markCompleted(taskId, counters) {
      await patchTask(taskId, {
        ...counters,
        status: "completed",
        finishedAt: new Date(),
      });
    },

    async markFailed(taskId, errorMessage, counters) {
      await patchTask(taskId, {
        ...(counters ?? {}),
        status: "failed",
        errorMessage,
        finishedAt: new Date(),
      });
    },

    async appendError(record) {
      await db.insert(importErrors).values({
        taskId: record.taskId,
        rowNo: record.rowNo,
        rawRow: record.rawRow,
        errorMessage: record.errorMessage,
      });
    },

    async listErrors(taskId, limit) {
      const rows = await db
        .select()
        .from(importErrors)
        .where(eq(importErrors.taskId, taskId))
        .orderBy(asc(importErrors.rowNo))
        .limit(limit);
      return rows.map((row) => ({
        taskId: row.taskId,
        rowNo: row.rowNo,
        rawRow: row.rawRow,
        errorMessage: row.errorMessage,
      }));
    },
  };
}
