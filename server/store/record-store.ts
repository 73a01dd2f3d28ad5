/**
 * Record Store
 *
 * Schema-agnostic persistence for API records. Tables and columns are created on first sight
 * of a record shape; the storage class of each column is decided from its first value and
 * recorded in `store_columns`. Records with an `id` replace any earlier row with that id,
 * records without one are appended.
 *
 * Schema evolution and the write that needed it run in one transaction, so a failed write
 * never leaves a half-applied ALTER behind.
 */

import type Database from "better-sqlite3";
import { asc, eq, sql, type SQL } from "drizzle-orm";
import { dataIngestionLog, storeColumns, type ColumnRole, type InsertDataIngestionLog } from "../../drizzle/schema";
import { INTERNAL_TABLES, openDatabase, type StoreConnection, type StoreDb } from "../db";
import { StoreError, errorMessage } from "../_core/errors";
import { createLogger } from "../_core/logger";
import {
  STORAGE_CLASS_BY_KIND,
  classifyValue,
  hasIdentity,
  storageClassFromDeclaredType,
  toStorable,
  valueKindFromStorageClass,
  type StorageClass,
  type StoreRecord,
  type ValueKind,
} from "./storage-class";

const log = createLogger("record-store");

export const IDENTITY_COLUMN = "id";

export interface ColumnDefinition {
  name: string;
  role: ColumnRole;
  valueKind: ValueKind;
  storageClass: StorageClass;
  position: number;
}

export interface TableSchema {
  table: string;
  /** The identity column comes first. */
  columns: readonly ColumnDefinition[];
}

export interface UpsertResult {
  table: string;
  mode: "replace" | "insert";
  createdTable: boolean;
  addedColumns: string[];
}

export type IdentityValue = number | string | bigint;

interface LoadedSchema {
  schema: TableSchema;
  /** True when the table exists but had no recorded metadata. */
  adopted: boolean;
}

interface SchemaPlan {
  table: string;
  create: boolean;
  adopted: boolean;
  added: ColumnDefinition[];
  after: TableSchema;
}

interface PragmaColumn {
  name: string;
  type: string;
  pk: number;
}

function assertIdentifier(name: string, table: string): void {
  if (name.length === 0 || name.includes('"') || name.includes("\0")) {
    throw new StoreError(`Invalid SQL identifier ${JSON.stringify(name)} for table '${table}'`, table);
  }
}

function assertResourceTable(table: string): void {
  assertIdentifier(table, table);
  if (INTERNAL_TABLES.has(table)) {
    throw new StoreError(`Table '${table}' is reserved for the store's own metadata`, table);
  }
}

function isIdentityValue(value: unknown): value is IdentityValue {
  return typeof value === "number" || typeof value === "string" || typeof value === "bigint";
}

/**
 * Merges keys that name the same SQLite column. Any spelling of `id` becomes `id`; other
 * columns keep their first spelling and take the last value.
 */
export function collapseKeys(record: StoreRecord): StoreRecord {
  const names = new Map<string, string>();
  const collapsed: StoreRecord = {};
  for (const [key, value] of Object.entries(record)) {
    const folded = key.toLowerCase();
    const name = names.get(folded) ?? (folded === IDENTITY_COLUMN ? IDENTITY_COLUMN : key);
    names.set(folded, name);
    collapsed[name] = value;
  }
  return collapsed;
}

function identityColumn(sample: StoreRecord): ColumnDefinition {
  if (hasIdentity(sample)) {
    const valueKind = classifyValue(sample[IDENTITY_COLUMN]);
    return {
      name: IDENTITY_COLUMN,
      role: "identity",
      valueKind,
      storageClass: STORAGE_CLASS_BY_KIND[valueKind],
      position: 0,
    };
  }
  return { name: IDENTITY_COLUMN, role: "surrogate", valueKind: "integer", storageClass: "INTEGER", position: 0 };
}

function columnDdl(column: ColumnDefinition): SQL {
  const name = sql.identifier(column.name);
  if (column.role === "surrogate") {
    return sql`${name} INTEGER PRIMARY KEY AUTOINCREMENT`;
  }
  if (column.role === "identity") {
    return sql`${name} ${sql.raw(column.storageClass)} PRIMARY KEY`;
  }
  return sql`${name} ${sql.raw(column.storageClass)}`;
}

export class RecordStore {
  private readonly schemas = new Map<string, TableSchema>();
  private closed = false;

  private constructor(private readonly connection: StoreConnection, readonly path: string) {}

  static open(path: string): RecordStore {
    return new RecordStore(openDatabase(path), path);
  }

  /** Raw connection, for diagnostics and tests. */
  get sqlite(): Database.Database {
    return this.connection.sqlite;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  async ensureSchema(table: string, input: StoreRecord = {}): Promise<TableSchema> {
    this.assertOpen();
    assertResourceTable(table);
    const sample = collapseKeys(input);

    const plan = this.transact(table, (tx) => {
      const plan = this.planSchema(tx, table, sample);
      this.applyPlan(tx, plan);
      return plan;
    });
    this.commitPlan(plan);
    return plan.after;
  }

  async upsert(table: string, input: StoreRecord): Promise<UpsertResult> {
    this.assertOpen();
    assertResourceTable(table);
    const record = collapseKeys(input);

    const identified = hasIdentity(record);
    // A null id is no identity: leave the column to the store
    const keys = Object.keys(record).filter(key => identified || key !== IDENTITY_COLUMN);

    const plan = this.transact(table, (tx) => {
      const plan = this.planSchema(tx, table, record);
      this.applyPlan(tx, plan);
      tx.run(this.writeStatement(table, record, keys, identified));
      return plan;
    });
    this.commitPlan(plan);

    if (plan.added.length > 0 && !plan.create) {
      log.info(`Added ${plan.added.length} column(s) to '${table}'`, { columns: plan.added.map(c => c.name) });
    }

    return {
      table,
      mode: identified ? "replace" : "insert",
      createdTable: plan.create,
      addedColumns: plan.added.filter(column => column.role === "data").map(column => column.name),
    };
  }

  /**
   * Distinct non-null values of `column`, ascending. A table that was never created has
   * produced nothing yet, so the result is empty rather than an error.
   */
  async distinctIdentities(table: string, column: string = IDENTITY_COLUMN): Promise<Set<IdentityValue>> {
    this.assertOpen();
    assertIdentifier(table, table);
    assertIdentifier(column, table);

    try {
      const schema = this.currentSchema(this.connection.db, table);
      if (!schema) {
        return new Set();
      }
      const wanted = column.toLowerCase();
      if (!schema.columns.some(c => c.name.toLowerCase() === wanted)) {
        log.warn(`Column '${column}' not found in '${table}'`);
        return new Set();
      }

      const name = sql.identifier(column);
      const rows = this.connection.db.all<{ value: unknown }>(
        sql`SELECT DISTINCT ${name} AS "value" FROM ${sql.identifier(table)} WHERE ${name} IS NOT NULL ORDER BY 1`
      );
      return new Set(rows.map(row => row.value).filter(isIdentityValue));
    } catch (error) {
      if (error instanceof StoreError) throw error;
      throw new StoreError(`Could not read '${column}' from '${table}': ${errorMessage(error)}`, table, error);
    }
  }

  async describeTable(table: string): Promise<TableSchema | undefined> {
    this.assertOpen();
    assertIdentifier(table, table);
    return this.currentSchema(this.connection.db, table);
  }

  async recordIngestion(entry: InsertDataIngestionLog): Promise<void> {
    this.assertOpen();
    try {
      this.connection.db.insert(dataIngestionLog).values(entry).run();
    } catch (error) {
      throw new StoreError(`Could not write ingestion log: ${errorMessage(error)}`, "data_ingestion_log", error);
    }
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.schemas.clear();
    this.connection.sqlite.close();
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new StoreError(`Store '${this.path}' is closed`);
    }
  }

  private transact<T>(table: string, work: (tx: StoreDb) => T): T {
    try {
      return this.connection.db.transaction((tx) => work(tx));
    } catch (error) {
      if (error instanceof StoreError) throw error;
      throw new StoreError(`Write to '${table}' failed: ${errorMessage(error)}`, table, error);
    }
  }

  private currentSchema(db: StoreDb, table: string): TableSchema | undefined {
    return this.schemas.get(table) ?? this.loadSchema(db, table)?.schema;
  }

  private loadSchema(db: StoreDb, table: string): LoadedSchema | undefined {
    const recorded = db
      .select()
      .from(storeColumns)
      .where(eq(storeColumns.tableName, table))
      .orderBy(asc(storeColumns.position))
      .all();

    if (recorded.length > 0) {
      const schema: TableSchema = {
        table,
        columns: recorded.map(row => ({
          name: row.columnName,
          role: row.role,
          valueKind: row.valueKind,
          storageClass: row.storageClass,
          position: row.position,
        })),
      };
      this.schemas.set(table, schema);
      return { schema, adopted: false };
    }

    const existing = db.get<{ name: string } | undefined>(
      sql`SELECT name FROM sqlite_master WHERE type = 'table' AND name = ${table}`
    );
    if (!existing) {
      return undefined;
    }

    // Created outside the store: take the columns as declared
    const pragma = db.all<PragmaColumn>(sql`PRAGMA table_info(${sql.identifier(table)})`);
    const columns = pragma.map((column, position): ColumnDefinition => {
      const storageClass = storageClassFromDeclaredType(column.type);
      return {
        name: column.name,
        role: column.pk > 0 && column.name === IDENTITY_COLUMN ? "identity" : "data",
        valueKind: valueKindFromStorageClass(storageClass),
        storageClass,
        position,
      };
    });
    return { schema: { table, columns }, adopted: true };
  }

  private planSchema(tx: StoreDb, table: string, sample: StoreRecord): SchemaPlan {
    const keys = Object.keys(sample);
    for (const key of keys) {
      assertIdentifier(key, table);
    }

    const cached = this.schemas.get(table);
    const loaded = cached ? { schema: cached, adopted: false } : this.loadSchema(tx, table);

    // SQLite column names are case-insensitive
    const known = new Set([IDENTITY_COLUMN]);

    if (!loaded) {
      const columns = [identityColumn(sample)];
      for (const key of keys) {
        if (known.has(key.toLowerCase())) continue;
        known.add(key.toLowerCase());
        const valueKind = classifyValue(sample[key]);
        columns.push({
          name: key,
          role: "data",
          valueKind,
          storageClass: STORAGE_CLASS_BY_KIND[valueKind],
          position: columns.length,
        });
      }
      return { table, create: true, adopted: false, added: columns, after: { table, columns } };
    }

    for (const column of loaded.schema.columns) {
      known.add(column.name.toLowerCase());
    }
    const added: ColumnDefinition[] = [];
    let position = loaded.schema.columns.length;

    for (const key of keys) {
      if (known.has(key.toLowerCase())) continue;
      known.add(key.toLowerCase());
      const valueKind = classifyValue(sample[key]);
      added.push({
        name: key,
        role: "data",
        valueKind,
        storageClass: STORAGE_CLASS_BY_KIND[valueKind],
        position: position++,
      });
    }

    return {
      table,
      create: false,
      adopted: loaded.adopted,
      added,
      after: { table, columns: [...loaded.schema.columns, ...added] },
    };
  }

  private applyPlan(tx: StoreDb, plan: SchemaPlan): void {
    const table = sql.identifier(plan.table);

    if (plan.create) {
      tx.run(sql`CREATE TABLE ${table} (${sql.join(plan.added.map(columnDdl), sql`, `)})`);
      log.info(`Table '${plan.table}' created`, { columns: plan.added.length });
    } else {
      for (const column of plan.added) {
        tx.run(sql`ALTER TABLE ${table} ADD COLUMN ${columnDdl(column)}`);
      }
    }

    const toRecord = plan.adopted ? plan.after.columns : plan.added;
    if (toRecord.length > 0) {
      tx.insert(storeColumns)
        .values(toRecord.map(column => ({
          tableName: plan.table,
          columnName: column.name,
          role: column.role,
          valueKind: column.valueKind,
          storageClass: column.storageClass,
          position: column.position,
        })))
        .run();
    }
  }

  private commitPlan(plan: SchemaPlan): void {
    this.schemas.set(plan.table, plan.after);
  }

  private writeStatement(table: string, record: StoreRecord, keys: string[], identified: boolean): SQL {
    const target = sql.identifier(table);

    if (keys.length === 0) {
      return sql`INSERT INTO ${target} DEFAULT VALUES`;
    }

    const columns = sql.join(keys.map(key => sql.identifier(key)), sql`, `);
    const values = sql.join(keys.map(key => sql`${toStorable(record[key])}`), sql`, `);

    return identified
      ? sql`INSERT OR REPLACE INTO ${target} (${columns}) VALUES (${values})`
      : sql`INSERT INTO ${target} (${columns}) VALUES (${values})`;
  }
}
