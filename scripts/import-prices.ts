import { readFile } from "node:fs/promises";
import process from "node:process";
import { setTimeout as sleep } from "node:timers/promises";

import { loadConfig, loadDotenv } from "@/config";
import { createPriceImportApp } from "@/index";

loadDotenv();

type CliOptions = {
  dataRef: string;
  mappingPath: string;
  mode: string;
  period?: string;
  threshold?: number;
};

const POLL_INTERVAL_MS = 1000;

async function main() {
  const options = parseArgs();
  const config = loadConfig();
  const app = createPriceImportApp(config);

  try {
    const mapping: unknown = JSON.parse(await readFile(options.mappingPath, "utf8"));

    const { task_id: taskId } = await app.submitImport({
      data_ref: options.dataRef,
      column_mapping: mapping,
      conflict_mode: options.mode,
      fallback_period: options.period,
      match_threshold: options.threshold,
    });
    console.info(`\n📄 Import task ${taskId} queued for ${options.dataRef}`);

    for (;;) {
      const status = await app.getImportStatus(taskId);
      console.info(
        `  ${status.status}: ${status.success + status.failed}/${status.total} rows ` +
          `(success ${status.success}, failed ${status.failed}, skipped ${status.skipped})`
      );

      if (status.status === "completed" || status.status === "failed") {
        for (const error of status.errors) {
          console.warn(`  ⚠️  row ${error.row_no}: ${error.error_message}`);
        }
        if (status.status === "failed") {
          console.error(`✖ Import failed: ${status.error_message ?? "unknown error"}`);
          process.exitCode = 1;
        } else {
          console.info("✅ Import completed");
        }
        break;
      }

      await sleep(POLL_INTERVAL_MS);
    }
  } finally {
    await app.close();
  }
}

function parseArgs(): CliOptions {
  const args = process.argv.slice(2);
  let dataRef: string | undefined;
  let mappingPath: string | undefined;
  let mode = "skip";
  let period: string | undefined;
  let threshold: number | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--mapping") {
      mappingPath = args[++i];
      continue;
    }
    if (arg === "--mode") {
      mode = args[++i] ?? mode;
      continue;
    }
    if (arg === "--period") {
      period = args[++i];
      continue;
    }
    if (arg === "--threshold") {
      const value = args[++i];
      threshold = value ? Number(value) : undefined;
      continue;
    }
    if (!dataRef) {
      dataRef = arg;
    }
  }

  if (!dataRef || !mappingPath) {
    console.error(
      "Usage: npm run import:prices -- <data_ref> --mapping <mapping.json> [--mode skip|overwrite] [--period YYYY-MM] [--threshold 0-100]"
    );
    process.exit(1);
  }

  return { dataRef, mappingPath, mode, period, threshold };
}

main().catch((error: unknown) => {
  console.error("✖ Import failed:", error instanceof Error ? error.message : error);
  process.exit(1);
});
