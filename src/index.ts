import type { AppConfig } from "./config";
import { createCatalogDb } from "./catalog/catalogDb";
import { createCatalogMatcher } from "./catalog/matcher";
import { createDb } from "./db";
import { getScorer } from "./lib/similarity";
import { StagingDirectory } from "./pipeline/dataSource";
import { createImportService } from "./pipeline/importService";
import { createRootLogger, createTaskLogger } from "./pipeline/logger";
import { createTaskDb } from "./pipeline/taskDb";
import { TaskRunner } from "./pipeline/taskRunner";

export { loadConfig, loadDotenv, type AppConfig } from "./config";
export { normalizeEntityName } from "./lib/normalize";
export { currentPeriod, resolvePeriod } from "./lib/period";
export { diceRatio, getScorer, indelRatio, type ScorerName, type SimilarityScorer } from "./lib/similarity";
export {
  createCatalogMatcher,
  createMatcher,
  exactKeyStrategy,
  similarityStrategy,
  type MatchCandidate,
  type Matcher,
  type MatchStrategy,
} from "./catalog/matcher";
export { normalizeConflictMode, provenanceNote, resolveConflict, type ConflictAction } from "./catalog/conflict";
export type { CatalogStore, CanonicalEntity, ValueRecord } from "./catalog/types";
export { StagingDirectory, type DataSourceResolver, type StagedFile, type TabularData } from "./pipeline/dataSource";
export { parseMappingSpec, missingColumns } from "./pipeline/mapping";
export { createPriceImportJob, processPriceRow } from "./pipeline/stages/importPriceSheet";
export {
  createImportService,
  type ImportPreview,
  type ImportService,
  type ImportStatusResponse,
} from "./pipeline/importService";
export { TaskRunner, type ImportStatus } from "./pipeline/taskRunner";
export {
  PipelineError,
  SubmissionValidationError,
  TaskNotFoundError,
  type ConflictMode,
  type ImportTask,
  type MappingSpec,
  type RowOutcome,
  type TaskStore,
} from "./pipeline/types";

/**
 * Wires the database-backed stores, the worker pool and the staging directory
 * from one configuration. `close()` waits for running imports before ending
 * the connection pool.
 */
export function createPriceImportApp(config: AppConfig) {
  const { db, close: closeDb } = createDb(config.DATABASE_URL);
  const logger = createRootLogger(config.LOG_LEVEL);

  const catalog = createCatalogDb(db);
  const tasks = createTaskDb(db);
  const matcher = createCatalogMatcher(catalog, getScorer(config.MATCH_SCORER));
  const staging = new StagingDirectory(config.IMPORT_STAGING_DIR);

  const runner = new TaskRunner({
    poolSize: config.IMPORT_POOL_SIZE,
    store: tasks,
    checkpointEvery: config.IMPORT_CHECKPOINT_EVERY,
    loggerFor: (taskId) => createTaskLogger(logger, taskId).log,
  });

  const service = createImportService({
    runner,
    catalog,
    matcher,
    source: staging,
    matchThreshold: config.MATCH_THRESHOLD,
  });

  return {
    ...service,
    runner,
    staging,
    logger,
    async close() {
      await runner.onIdle();
      await closeDb();
    },
  };
}

export type PriceImportApp = ReturnType<typeof createPriceImportApp>;
