import dotenv from "dotenv";
import { z } from "zod";

const configSchema = z.object({
  DATABASE_URL: z.string().min(1).optional(),
  LOG_LEVEL: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]).default("info"),
  IMPORT_POOL_SIZE: z.coerce.number().int().positive().default(2),
  IMPORT_CHECKPOINT_EVERY: z.coerce.number().int().positive().default(100),
  IMPORT_STAGING_DIR: z.string().min(1).default("./uploads"),
  MATCH_THRESHOLD: z.coerce.number().int().min(0).max(100).default(90),
  MATCH_SCORER: z.enum(["indel", "dice"]).default("indel"),
});

export type AppConfig = z.infer<typeof configSchema>;

/**
 * Parses import settings from an environment map. Pure, so callers (and tests)
 * can pass their own map instead of `process.env`.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = configSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new Error(`Invalid configuration: ${issues.join("; ")}`);
  }
  return parsed.data;
}

/**
 * Loads .env first, then .env.local overrides (if exists).
 */
export function loadDotenv() {
  dotenv.config({ path: ".env" });
  dotenv.config({ path: ".env.local", override: true });
}
