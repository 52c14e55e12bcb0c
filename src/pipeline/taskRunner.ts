import { randomUUID } from "node:crypto";

import { silentLogger } from "./logger";
import {
  TaskNotFoundError,
  type ImportErrorRecord,
  type ImportJob,
  type ImportTask,
  type PipelineLogger,
  type RowOutcome,
  type SourceRow,
  type TaskCounters,
  type TaskStore,
} from "./types";

export const STATUS_ERROR_LIMIT = 100;

export type TaskRunnerOptions = {
  /** Number of tasks executed at the same time. */
  poolSize: number;
  store: TaskStore;
  /** Progress counters are written every N rows and at the last row. */
  checkpointEvery?: number;
  loggerFor?: (taskId: string) => PipelineLogger;
  generateId?: () => string;
};

export type ImportStatus = ImportTask & {
  errors: ImportErrorRecord[];
};

type QueuedTask = {
  taskId: string;
  job: ImportJob;
};

/**
 * Bounded in-process worker pool for import tasks. Tasks beyond the pool size
 * wait in FIFO order; rows within a task run one after another.
 */
export class TaskRunner {
  private readonly poolSize: number;
  private readonly store: TaskStore;
  private readonly checkpointEvery: number;
  private readonly loggerFor: (taskId: string) => PipelineLogger;
  private readonly generateId: () => string;

  private readonly queue: QueuedTask[] = [];
  private active = 0;
  private idleWaiters: Array<() => void> = [];

  constructor(options: TaskRunnerOptions) {
    if (!Number.isInteger(options.poolSize) || options.poolSize <= 0) {
      throw new Error("poolSize must be a positive integer");
    }
    const checkpointEvery = options.checkpointEvery ?? 100;
    if (!Number.isInteger(checkpointEvery) || checkpointEvery <= 0) {
      throw new Error("checkpointEvery must be a positive integer");
    }

    this.poolSize = options.poolSize;
    this.store = options.store;
    this.checkpointEvery = checkpointEvery;
    this.loggerFor = options.loggerFor ?? (() => silentLogger);
    this.generateId = options.generateId ?? randomUUID;
  }

  /**
   * Persists the task as pending, then queues it. The returned id can be
   * polled immediately.
   */
  async submit(job: ImportJob): Promise<{ taskId: string }> {
    const taskId = this.generateId();
    await this.store.createTask({
      id: taskId,
      dataRef: job.dataRef,
      mapping: job.mapping,
      conflictMode: job.conflictMode,
      fallbackPeriod: job.fallbackPeriod,
    });

    await this.loggerFor(taskId)({
      level: "info",
      message: "Import task queued",
      meta: { taskId, dataRef: job.dataRef, queued: this.queue.length, active: this.active },
    });

    this.queue.push({ taskId, job });
    this.drain();
    return { taskId };
  }

  async getStatus(taskId: string): Promise<ImportStatus> {
    const task = await this.store.getTask(taskId);
    if (!task) {
      throw new TaskNotFoundError(taskId);
    }
    const errors = await this.store.listErrors(taskId, STATUS_ERROR_LIMIT);
    return { ...task, errors };
  }

  /**
   * Resolves once no task is running or waiting.
   */
  onIdle(): Promise<void> {
    if (this.isIdle()) return Promise.resolve();
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  get pending(): number {
    return this.queue.length;
  }

  get running(): number {
    return this.active;
  }

  private isIdle() {
    return this.active === 0 && this.queue.length === 0;
  }

  private drain() {
    while (this.active < this.poolSize && this.queue.length > 0) {
      const next = this.queue.shift();
      if (!next) break;

      this.active++;
      void this.runTask(next.taskId, next.job).finally(() => {
        this.active--;
        this.drain();
        if (this.isIdle()) {
          const waiters = this.idleWaiters;
          this.idleWaiters = [];
          for (const resolve of waiters) resolve();
        }
      });
    }
  }

  private async runTask(taskId: string, job: ImportJob) {
    const log = this.loggerFor(taskId);
    const counters: TaskCounters = { success: 0, failed: 0, skipped: 0 };
    const startTime = Date.now();

    try {
      await this.store.markProcessing(taskId);
      await log({ level: "info", message: "Import task started", meta: { taskId } });

      const loadStartTime = Date.now();
      const rows = await job.loadRows();
      await this.store.setTotal(taskId, rows.length);
      await log({
        level: "info",
        message: "Source rows loaded",
        meta: { taskId, total: rows.length, durationMs: Date.now() - loadStartTime },
      });

      for (let index = 0; index < rows.length; index++) {
        const rowNo = index + 1;
        const row = rows[index];
        const outcome = await this.runRow(job, row, rowNo, { taskId, log });

        switch (outcome.kind) {
          case "success":
            counters.success++;
            counters.skipped += outcome.skipped;
            break;
          case "rowError":
            counters.failed++;
            counters.skipped += outcome.skipped ?? 0;
            await this.store.appendError({
              taskId,
              rowNo,
              rawRow: row,
              errorMessage: outcome.reason,
            });
            break;
          case "excluded":
            counters.skipped += outcome.skipped ?? 0;
            break;
        }

        if (rowNo % this.checkpointEvery === 0 || rowNo === rows.length) {
          await this.store.saveProgress(taskId, { ...counters });
          await log({
            level: "debug",
            message: `Progress: ${rowNo}/${rows.length} rows processed`,
            meta: { taskId, ...counters },
          });
        }
      }

      await this.store.markCompleted(taskId, { ...counters });
      await log({
        level: "info",
        message: "Import task completed",
        meta: { taskId, total: rows.length, ...counters, durationMs: Date.now() - startTime },
      });
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      const errorStack = error instanceof Error ? error.stack : undefined;
      await log({
        level: "error",
        message: "Import task failed",
        meta: { taskId, error: errorMessage, stack: errorStack, durationMs: Date.now() - startTime },
      });

      try {
        await this.store.markFailed(taskId, errorMessage, { ...counters });
      } catch (markError) {
        await log({
          level: "error",
          message: "Could not record task failure",
          meta: {
            taskId,
            error: markError instanceof Error ? markError.message : String(markError),
          },
        });
      }
    }
  }

  private async runRow(
    job: ImportJob,
    row: SourceRow,
    rowNo: number,
    ctx: { taskId: string; log: PipelineLogger }
  ): Promise<RowOutcome> {
    try {
      return await job.processRow(row, rowNo, ctx);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      await ctx.log({
        level: "warn",
        message: `Row ${rowNo} failed`,
        meta: { taskId: ctx.taskId, rowNo, error: reason },
      });
      return { kind: "rowError", reason };
    }
  }
}
