export type PipelineLogLevel = "debug" | "info" | "warn" | "error";

export type PipelineLogger = (entry: {
  level: PipelineLogLevel;
  message: string;
  meta?: Record<string, unknown>;
}) => Promise<void> | void;

export type ImportTaskStatus = "pending" | "processing" | "completed" | "failed";

export type ConflictMode = "skip" | "overwrite";

export type ValueGroup = {
  column: string;
  partner: string;
  valueType: string;
};

export type MappingSpec = {
  nameColumn: string;
  dateColumn?: string;
  quantityColumn?: string;
  valueGroups: ValueGroup[];
};

export type ImportTask = {
  id: string;
  dataRef: string;
  conflictMode: ConflictMode;
  fallbackPeriod: string | null;
  status: ImportTaskStatus;
  total: number;
  success: number;
  failed: number;
  skipped: number;
  errorMessage: string | null;
  createdAt: Date;
  updatedAt: Date;
};

export type ImportErrorRecord = {
  taskId: string;
  rowNo: number;
  rawRow: Record<string, unknown> | null;
  errorMessage: string;
};

export type TaskCounters = {
  success: number;
  failed: number;
  skipped: number;
};

/**
 * Persistence contract for import tasks and their row errors.
 */
export interface TaskStore {
  createTask(input: {
    id: string;
    dataRef: string;
    mapping: MappingSpec;
    conflictMode: ConflictMode;
    fallbackPeriod: string | null;
  }): Promise<ImportTask>;
  getTask(taskId: string): Promise<ImportTask | null>;
  markProcessing(taskId: string): Promise<void>;
  setTotal(taskId: string, total: number): Promise<void>;
  saveProgress(taskId: string, counters: TaskCounters): Promise<void>;
  markCompleted(taskId: string, counters: TaskCounters): Promise<void>;
  markFailed(taskId: string, errorMessage: string, counters?: TaskCounters): Promise<void>;
  appendError(record: ImportErrorRecord): Promise<void>;
  listErrors(taskId: string, limit: number): Promise<ImportErrorRecord[]>;
}

/**
 * Result of processing one input row. Expected failures are values, not
 * exceptions; a thrown error is converted to a row error by the runner.
 */
export type RowOutcome =
  | { kind: "success"; inserted: number; updated: number; skipped: number }
  | { kind: "rowError"; reason: string; skipped?: number }
  | { kind: "excluded"; reason: "blank_name" | "no_value" | "no_write"; skipped?: number };

export type SourceRow = Record<string, unknown>;

/**
 * Unit of work handed to the task runner: how to load the rows and how to
 * process each one.
 */
export type ImportJob = {
  dataRef: string;
  mapping: MappingSpec;
  conflictMode: ConflictMode;
  fallbackPeriod: string | null;
  loadRows: () => Promise<SourceRow[]>;
  processRow: (row: SourceRow, rowNo: number, ctx: { taskId: string; log: PipelineLogger }) => Promise<RowOutcome>;
};

export class PipelineError extends Error {
  readonly code: string;
  readonly meta?: Record<string, unknown>;

  constructor(
    code: string,
    message: string,
    meta?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "PipelineError";
    this.code = code;
    this.meta = meta;
  }
}

/**
 * Raised synchronously at submission; no task is created.
 */
export class SubmissionValidationError extends PipelineError {
  constructor(message: string, meta?: Record<string, unknown>, options?: { cause?: unknown }) {
    super("invalid_submission", message, meta, options);
    this.name = "SubmissionValidationError";
  }
}

export class TaskNotFoundError extends PipelineError {
  constructor(taskId: string) {
    super("task_not_found", `Import task not found: ${taskId}`, { taskId });
    this.name = "TaskNotFoundError";
  }
}
