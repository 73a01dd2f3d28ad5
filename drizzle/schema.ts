import { sqliteTable, integer, text, index, unique } from "drizzle-orm/sqlite-core";

/**
 * Internal tables of the record store.
 *
 * Resource tables (countries, leagues, matches, ...) are not declared here: their columns are
 * derived from the data at write time and recorded in `store_columns`.
 */

// ============================================================================
// SCHEMA METADATA
// ============================================================================

export const VALUE_KINDS = ["integer", "real", "text", "structured"] as const;
export const STORAGE_CLASSES = ["INTEGER", "REAL", "TEXT"] as const;
export const COLUMN_ROLES = ["identity", "surrogate", "data"] as const;

export const storeColumns = sqliteTable("store_columns", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  tableName: text("tableName").notNull(),
  columnName: text("columnName").notNull(),
  role: text("role", { enum: COLUMN_ROLES }).notNull(),
  valueKind: text("valueKind", { enum: VALUE_KINDS }).notNull(),
  storageClass: text("storageClass", { enum: STORAGE_CLASSES }).notNull(),
  position: integer("position").notNull(),
  createdAt: integer("createdAt", { mode: "timestamp" }).notNull().$defaultFn(() => new Date()),
}, (table) => ({
  tableColumnUnique: unique("store_columns_table_column_unique").on(table.tableName, table.columnName),
  tableIdx: index("store_columns_table_idx").on(table.tableName),
}));

// ============================================================================
// INGESTION LOG
// ============================================================================

export const INGESTION_STATUSES = ["success", "partial", "failure", "no_data", "skipped"] as const;

export const dataIngestionLog = sqliteTable("data_ingestion_log", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  source: text("source").notNull(), // footystats
  entityType: text("entityType").notNull(), // task name: leagues, teams, ...
  status: text("status", { enum: INGESTION_STATUSES }).notNull(),
  parameters: text("parameters"), // JSON of the task parameters
  recordsProcessed: integer("recordsProcessed").default(0).notNull(),
  recordsWritten: integer("recordsWritten").default(0).notNull(),
  errorMessage: text("errorMessage"),
  startedAt: integer("startedAt", { mode: "timestamp_ms" }).notNull(),
  completedAt: integer("completedAt", { mode: "timestamp_ms" }),
}, (table) => ({
  entityTypeIdx: index("data_ingestion_log_entity_type_idx").on(table.entityType),
  startedAtIdx: index("data_ingestion_log_started_at_idx").on(table.startedAt),
}));

// ============================================================================
// TYPE EXPORTS
// ============================================================================

export type ValueKind = (typeof VALUE_KINDS)[number];
export type StorageClass = (typeof STORAGE_CLASSES)[number];
export type ColumnRole = (typeof COLUMN_ROLES)[number];
export type IngestionStatus = (typeof INGESTION_STATUSES)[number];

export type StoreColumn = typeof storeColumns.$inferSelect;
export type InsertStoreColumn = typeof storeColumns.$inferInsert;

export type DataIngestionLog = typeof dataIngestionLog.$inferSelect;
export type InsertDataIngestionLog = typeof dataIngestionLog.$inferInsert;
