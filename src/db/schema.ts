import {
  index,
  integer,
  jsonb,
  numeric,
  pgTable,
  serial,
  text,
  timestamp,
  uniqueIndex,
} from "drizzle-orm/pg-core";

// =============================================================================
// Catalog
// =============================================================================

/**
 * Deduplicated product catalog. Imported names resolve to one of these rows
 * through their normalized key.
 */
export const catalogEntities = pgTable(
  "catalog_entities",
  {
    id: serial("id").primaryKey(),
    displayName: text("display_name").notNull(),
    normalizedKey: text("normalized_key").notNull(),
    createdAt: timestamp("created_at", { withTimezone: true })
      .defaultNow()
      .notNull(),
  },
  (entity) => ({
    normalizedKeyIdx: uniqueIndex("catalog_entities_normalized_key_unique").on(
      entity.normalizedKey
    ),
  })
);

/**
 * One value (e.g. a quoted price) per entity, partner and month.
 */
export const valueRecords = pgTable(
  "value_records",
  {
    id: serial("id").primaryKey(),
    entityId: integer("entity_id")
      .references(() => catalogEntities.id, { onDelete: "cascade" })
      .notNull(),
    partner: text("partner").notNull(),
    period: text("period").notNull(), // YYYY-MM
    value: numeric("value", { precision: 14, scale: 4 }).notNull(),
    valueType: text("value_type").notNull().default("bid"),
    quantity: integer("quantity").notNull().default(1),
    note: text("note"),
    source: text("source"), // import task id
    createdAt: timestamp("created_at", { withTimezone: true })
      .defaultNow()
      .notNull(),
    updatedAt: timestamp("updated_at", { withTimezone: true })
      .defaultNow()
      .notNull(),
  },
  (record) => ({
    uniqueTriple: uniqueIndex("value_records_entity_partner_period_unique").on(
      record.entityId,
      record.partner,
      record.period
    ),
    periodIdx: index("value_records_period_idx").on(record.period),
  })
);

// =============================================================================
// Import tasks
// =============================================================================

export const importTasks = pgTable(
  "import_tasks",
  {
    id: text("id").primaryKey(),
    dataRef: text("data_ref").notNull(),
    mapping: jsonb("mapping").$type<Record<string, unknown>>().notNull(),
    conflictMode: text("conflict_mode").notNull().default("skip"),
    fallbackPeriod: text("fallback_period"),
    status: text("status").notNull().default("pending"), // pending | processing | completed | failed
    total: integer("total").notNull().default(0),
    success: integer("success").notNull().default(0),
    failed: integer("failed").notNull().default(0),
    skipped: integer("skipped").notNull().default(0),
    errorMessage: text("error_message"),
    startedAt: timestamp("started_at", { withTimezone: true }),
    finishedAt: timestamp("finished_at", { withTimezone: true }),
    createdAt: timestamp("created_at", { withTimezone: true })
      .defaultNow()
      .notNull(),
    updatedAt: timestamp("updated_at", { withTimezone: true })
      .defaultNow()
      .notNull(),
  },
  (task) => ({
    statusIdx: index("import_tasks_status_idx").on(task.status),
    createdAtIdx: index("import_tasks_created_at_idx").on(task.createdAt),
  })
);

export const importErrors = pgTable(
  "import_errors",
  {
    id: serial("id").primaryKey(),
    taskId: text("task_id")
      .references(() => importTasks.id, { onDelete: "cascade" })
      .notNull(),
    rowNo: integer("row_no").notNull(),
    rawRow: jsonb("raw_row").$type<Record<string, unknown> | null>(),
    errorMessage: text("error_message").notNull(),
    createdAt: timestamp("created_at", { withTimezone: true })
      .defaultNow()
      .notNull(),
  },
  (table) => ({
    taskRowIdx: uniqueIndex("import_errors_task_row_unique").on(
      table.taskId,
      table.rowNo
    ),
  })
);

export type ValueRecordRow = typeof valueRecords.$inferSelect;
export type ImportTaskRow = typeof importTasks.$inferSelect;
