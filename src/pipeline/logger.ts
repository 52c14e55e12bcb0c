import pino, { type Logger } from "pino";

import type { PipelineLogger, PipelineLogLevel } from "./types";

export function createRootLogger(level: string = process.env.LOG_LEVEL || "info"): Logger {
  return pino({
    level,
    formatters: {
      level: (label) => {
        return { level: label };
      },
    },
    base: {
      service: "price-import",
    },
  });
}

/**
 * Adapts a pino logger to the pipeline's `{ level, message, meta }` call
 * shape, binding `taskId` into every line when given.
 */
export function createTaskLogger(root: Logger, taskId?: string): { log: PipelineLogger } {
  const logger = taskId ? root.child({ taskId }) : root;

  const write: Record<PipelineLogLevel, (meta: Record<string, unknown>, message: string) => void> = {
    debug: (meta, message) => logger.debug(meta, message),
    info: (meta, message) => logger.info(meta, message),
    warn: (meta, message) => logger.warn(meta, message),
    error: (meta, message) => logger.error(meta, message),
  };

  return {
    log: (entry) => {
      write[entry.level](entry.meta ?? {}, entry.message);
    },
  };
}

/**
 * Logger that drops everything; used where no output is wanted.
 */
export const silentLogger: PipelineLogger = () => {};
