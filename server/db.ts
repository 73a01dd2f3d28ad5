import Database from "better-sqlite3";
import { drizzle } from "drizzle-orm/better-sqlite3";
import type { RunResult } from "better-sqlite3";
import type { BaseSQLiteDatabase } from "drizzle-orm/sqlite-core";
import * as schema from "../drizzle/schema";
import { StoreError, errorMessage } from "./_core/errors";

export type StoreSchema = typeof schema;

/** The drizzle database or one of its transactions. */
export type StoreDb = BaseSQLiteDatabase<"sync", RunResult, StoreSchema>;

export interface StoreConnection {
  sqlite: Database.Database;
  db: StoreDb;
}

export const INTERNAL_TABLES: ReadonlySet<string> = new Set(["store_columns", "data_ingestion_log"]);

// Mirrors drizzle/schema.ts; the store bootstraps its own tables on open.
const BOOTSTRAP_DDL = `
  CREATE TABLE IF NOT EXISTS "store_columns" (
    "id" INTEGER PRIMARY KEY AUTOINCREMENT,
    "tableName" TEXT NOT NULL,
    "columnName" TEXT NOT NULL,
    "role" TEXT NOT NULL,
    "valueKind" TEXT NOT NULL,
    "storageClass" TEXT NOT NULL,
    "position" INTEGER NOT NULL,
    "createdAt" INTEGER NOT NULL,
    CONSTRAINT "store_columns_table_column_unique" UNIQUE ("tableName", "columnName")
  );
  CREATE INDEX IF NOT EXISTS "store_columns_table_idx" ON "store_columns" ("tableName");

  CREATE TABLE IF NOT EXISTS "data_ingestion_log" (
    "id" INTEGER PRIMARY KEY AUTOINCREMENT,
    "source" TEXT NOT NULL,
    "entityType" TEXT NOT NULL,
    "status" TEXT NOT NULL,
    "parameters" TEXT,
    "recordsProcessed" INTEGER NOT NULL DEFAULT 0,
    "recordsWritten" INTEGER NOT NULL DEFAULT 0,
    "errorMessage" TEXT,
    "startedAt" INTEGER NOT NULL,
    "completedAt" INTEGER
  );
  CREATE INDEX IF NOT EXISTS "data_ingestion_log_entity_type_idx" ON "data_ingestion_log" ("entityType");
  CREATE INDEX IF NOT EXISTS "data_ingestion_log_started_at_idx" ON "data_ingestion_log" ("startedAt");
`;

/**
 * Opens (or creates) the SQLite database at `path`. `:memory:` gives a private in-memory store.
 * Failure here is fatal for the process; nothing has run yet.
 */
export function openDatabase(path: string): StoreConnection {
  let sqlite: Database.Database;
  try {
    sqlite = new Database(path);
  } catch (error) {
    throw new StoreError(`Could not open database '${path}': ${errorMessage(error)}`, null, error);
  }

  try {
    if (path !== ":memory:") {
      sqlite.pragma("journal_mode = WAL");
    }
    sqlite.exec(BOOTSTRAP_DDL);
  } catch (error) {
    sqlite.close();
    throw new StoreError(`Could not initialize database '${path}': ${errorMessage(error)}`, null, error);
  }

  return { sqlite, db: drizzle(sqlite, { schema }) };
}
