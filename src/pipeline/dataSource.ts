import { readdir, readFile, stat, unlink } from "node:fs/promises";
import path from "node:path";

import { read, utils, type WorkBook } from "xlsx";

import { cellToText } from "@/lib/period";

import { SubmissionValidationError, type SourceRow } from "./types";

export const ALLOWED_EXTENSIONS = new Set([".csv", ".xls", ".xlsx"]);
export const STAGED_FILE_MAX_AGE_MS = 24 * 60 * 60 * 1000;

export type StagedFile = {
  dataRef: string;
  filePath: string;
  originalName: string;
  extension: string;
};

export type TabularData = {
  columns: string[];
  rows: SourceRow[];
};

export interface DataSourceResolver {
  /** Throws SubmissionValidationError when the reference cannot be read. */
  resolve(dataRef: string): Promise<StagedFile>;
  read(file: StagedFile): Promise<TabularData>;
}

/**
 * Uploads staged on local disk as `<ref>_<original name>`.
 */
export class StagingDirectory implements DataSourceResolver {
  constructor(private readonly directory: string) {}

  async resolve(dataRef: string): Promise<StagedFile> {
    const ref = dataRef.trim();
    if (!ref || ref.includes("/") || ref.includes("\\") || ref.startsWith(".")) {
      throw new SubmissionValidationError("data_ref is not a valid staged file reference", { dataRef });
    }

    let names: string[];
    try {
      names = await readdir(this.directory);
    } catch (err) {
      throw new SubmissionValidationError(
        "Staging directory is not readable",
        { dataRef, directory: this.directory },
        { cause: err }
      );
    }

    const name = names.sort().find((candidate) => candidate === ref || candidate.startsWith(`${ref}_`));
    if (!name) {
      throw new SubmissionValidationError(`Staged file not found or expired: ${ref}`, { dataRef: ref });
    }

    const extension = path.extname(name).toLowerCase();
    if (!ALLOWED_EXTENSIONS.has(extension)) {
      throw new SubmissionValidationError(`Unsupported file type '${extension || name}'`, {
        dataRef: ref,
        allowed: Array.from(ALLOWED_EXTENSIONS),
      });
    }

    return {
      dataRef: ref,
      filePath: path.join(this.directory, name),
      originalName: name === ref ? name : name.slice(ref.length + 1),
      extension,
    };
  }

  async read(file: StagedFile): Promise<TabularData> {
    const workbook = await loadWorkbook(file);
    return sheetToTable(workbook);
  }

  /**
   * Columns plus the first few rows, for choosing a column mapping.
   */
  async inspect(dataRef: string, previewRows = 5) {
    const file = await this.resolve(dataRef);
    const table = await this.read(file);
    return {
      dataRef: file.dataRef,
      fileName: file.originalName,
      columns: table.columns,
      totalRows: table.rows.length,
      previewRows: table.rows.slice(0, previewRows),
    };
  }

  /**
   * Deletes staged files older than `maxAgeMs`. Returns the removed names.
   */
  async purgeExpired(maxAgeMs = STAGED_FILE_MAX_AGE_MS, now: number = Date.now()): Promise<string[]> {
    const removed: string[] = [];
    for (const name of await readdir(this.directory)) {
      const filePath = path.join(this.directory, name);
      const info = await stat(filePath);
      if (!info.isFile() || now - info.mtimeMs <= maxAgeMs) continue;
      await unlink(filePath);
      removed.push(name);
    }
    return removed;
  }
}

async function loadWorkbook(file: StagedFile): Promise<WorkBook> {
  if (file.extension === ".csv") {
    // CSV is read as UTF-8 text and kept as text; numbers and dates are
    // interpreted per column later.
    const text = await readFile(file.filePath, "utf8");
    return read(text.replace(/^\uFEFF/u, ""), { type: "string", raw: true });
  }
  const buffer = await readFile(file.filePath);
  return read(buffer, { type: "buffer", cellDates: true });
}

export function sheetToTable(workbook: WorkBook): TabularData {
  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName ? workbook.Sheets[sheetName] : undefined;
  if (!sheet) {
    return { columns: [], rows: [] };
  }

  const matrix = utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    defval: null,
    raw: true,
    blankrows: false,
  });
  const [header = [], ...body] = matrix;
  // Row keys use the same cleaned header text as `columns`, so a padded
  // header cell still matches its mapped column.
  const names = header.map((cell) => cellToText(cell));
  const columns = names.filter((name, index) => name !== "" && names.indexOf(name) === index);

  const rows = body.map((cells) => {
    const row: SourceRow = {};
    names.forEach((name, index) => {
      if (name && !(name in row)) row[name] = cells[index] ?? null;
    });
    return row;
  });

  return { columns, rows };
}
