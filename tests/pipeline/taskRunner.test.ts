import { setTimeout as sleep } from "node:timers/promises";

import { describe, expect, it } from "vitest";

import { TaskRunner } from "@/pipeline/taskRunner";
import {
  PipelineError,
  TaskNotFoundError,
  type ImportJob,
  type RowOutcome,
  type SourceRow,
  type TaskCounters,
} from "@/pipeline/types";

import { MemoryTaskStore, sequentialIds } from "../support/memoryStores";

const ok: RowOutcome = { kind: "success", inserted: 1, updated: 0, skipped: 0 };

function makeJob(
  rows: SourceRow[],
  processRow: ImportJob["processRow"] = async () => ok,
  loadRows: ImportJob["loadRows"] = async () => rows
): ImportJob {
  return {
    dataRef: "ref",
    mapping: { nameColumn: "Name", valueGroups: [{ column: "Price", partner: "Acme", valueType: "bid" }] },
    conflictMode: "skip",
    fallbackPeriod: null,
    loadRows,
    processRow,
  };
}

function rowsOf(count: number): SourceRow[] {
  return Array.from({ length: count }, (_, index) => ({ Name: `item ${index + 1}` }));
}

describe("TaskRunner", () => {
  it("rejects a non-positive pool size", () => {
    expect(() => new TaskRunner({ poolSize: 0, store: new MemoryTaskStore() })).toThrow(
      "poolSize must be a positive integer"
    );
  });

  it("runs at most poolSize tasks at once and completes every task in FIFO order", async () => {
    const store = new MemoryTaskStore();
    const runner = new TaskRunner({ poolSize: 2, store, generateId: sequentialIds() });

    let active = 0;
    let maxActive = 0;
    const started: string[] = [];

    const ids: string[] = [];
    for (let i = 1; i <= 5; i++) {
      const job = makeJob([], undefined, async () => {
        started.push(`job-${i}`);
        active++;
        maxActive = Math.max(maxActive, active);
        await sleep(5);
        active--;
        return rowsOf(3);
      });
      ids.push((await runner.submit(job)).taskId);
    }

    expect(runner.running).toBe(2);
    expect(runner.pending).toBe(3);

    await runner.onIdle();

    expect(maxActive).toBe(2);
    expect(started).toEqual(["job-1", "job-2", "job-3", "job-4", "job-5"]);
    for (const id of ids) {
      const status = await runner.getStatus(id);
      expect(status.status).toBe("completed");
      expect(status.total).toBe(3);
      expect(status.success).toBe(3);
    }
  });

  it("persists the task before returning its id", async () => {
    const store = new MemoryTaskStore();
    const runner = new TaskRunner({ poolSize: 1, store, generateId: sequentialIds() });

    const { taskId } = await runner.submit(makeJob(rowsOf(1)));

    expect(taskId).toBe("task-1");
    expect(["pending", "processing"]).toContain((await runner.getStatus(taskId)).status);
    await runner.onIdle();
  });

  it("checkpoints counters every N rows and at the last row", async () => {
    const store = new MemoryTaskStore();
    const runner = new TaskRunner({ poolSize: 1, store, checkpointEvery: 2 });

    await runner.submit(makeJob(rowsOf(5)));
    await runner.onIdle();

    expect(store.progressLog.map((entry) => entry.success)).toEqual([2, 4, 5]);
  });

  it("keeps each row failure inside the row", async () => {
    const store = new MemoryTaskStore();
    const runner = new TaskRunner({ poolSize: 1, store, generateId: sequentialIds() });
    const rows = rowsOf(5);

    const outcomes = new Map<number, () => RowOutcome>([
      [
        2,
        () => {
          throw new Error("database hiccup");
        },
      ],
      [3, () => ({ kind: "rowError", reason: "value for Acme must be greater than 0" })],
      [4, () => ({ kind: "excluded", reason: "no_write", skipped: 2 })],
    ]);

    const { taskId } = await runner.submit(
      makeJob(rows, async (_row, rowNo) => {
        const outcome = outcomes.get(rowNo);
        return outcome ? outcome() : ok;
      })
    );
    await runner.onIdle();

    const status = await runner.getStatus(taskId);
    expect(status).toMatchObject({ status: "completed", total: 5, success: 2, failed: 2, skipped: 2 });
    expect(status.errors).toEqual([
      { taskId, rowNo: 2, rawRow: rows[1], errorMessage: "database hiccup" },
      { taskId, rowNo: 3, rawRow: rows[2], errorMessage: "value for Acme must be greater than 0" },
    ]);
  });

  it("marks the task failed when the source cannot be loaded", async () => {
    const store = new MemoryTaskStore();
    const runner = new TaskRunner({ poolSize: 1, store, generateId: sequentialIds() });

    const { taskId } = await runner.submit(
      makeJob([], undefined, async () => {
        throw new PipelineError("missing_columns", "Source is missing mapped column(s): Price");
      })
    );
    await runner.onIdle();

    const status = await runner.getStatus(taskId);
    expect(status.status).toBe("failed");
    expect(status.errorMessage).toBe("Source is missing mapped column(s): Price");
    expect(status.success).toBe(0);
  });

  it("keeps the counters of committed rows when a task fails midway", async () => {
    class FlakyStore extends MemoryTaskStore {
      private writes = 0;

      override async saveProgress(taskId: string, counters: TaskCounters) {
        this.writes++;
        if (this.writes === 3) throw new Error("connection lost");
        await super.saveProgress(taskId, counters);
      }
    }

    const store = new FlakyStore();
    const runner = new TaskRunner({ poolSize: 1, store, checkpointEvery: 1, generateId: sequentialIds() });

    const { taskId } = await runner.submit(makeJob(rowsOf(5)));
    await runner.onIdle();

    const status = await runner.getStatus(taskId);
    expect(status).toMatchObject({ status: "failed", errorMessage: "connection lost", success: 3, total: 5 });
  });

  it("returns at most 100 errors ordered by row number", async () => {
    const store = new MemoryTaskStore();
    const runner = new TaskRunner({ poolSize: 1, store, generateId: sequentialIds() });

    const { taskId } = await runner.submit(
      makeJob(rowsOf(150), async (_row, rowNo) => ({ kind: "rowError", reason: `bad row ${rowNo}` }))
    );
    await runner.onIdle();

    const status = await runner.getStatus(taskId);
    expect(status.failed).toBe(150);
    expect(status.errors).toHaveLength(100);
    expect(status.errors[0]?.rowNo).toBe(1);
    expect(status.errors[99]?.rowNo).toBe(100);
  });

  it("throws TaskNotFoundError for unknown ids", async () => {
    const runner = new TaskRunner({ poolSize: 1, store: new MemoryTaskStore() });

    await expect(runner.getStatus("missing")).rejects.toBeInstanceOf(TaskNotFoundError);
  });

  it("resolves onIdle immediately when nothing is queued", async () => {
    const runner = new TaskRunner({ poolSize: 1, store: new MemoryTaskStore() });

    await expect(runner.onIdle()).resolves.toBeUndefined();
  });
});
