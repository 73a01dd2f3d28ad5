import type { StorageClass, ValueKind } from "../../drizzle/schema";

export type { StorageClass, ValueKind };

/** A value better-sqlite3 can bind. */
export type StorableValue = string | number | bigint | null;

export type RecordValue = unknown;
export type StoreRecord = Record<string, RecordValue>;

export const STORAGE_CLASS_BY_KIND: Readonly<Record<ValueKind, StorageClass>> = {
  integer: "INTEGER",
  real: "REAL",
  text: "TEXT",
  structured: "TEXT",
};

export function classifyValue(value: RecordValue): ValueKind {
  switch (typeof value) {
    case "boolean":
    case "bigint":
      return "integer";
    case "number":
      return Number.isInteger(value) ? "integer" : "real";
    case "object":
      return value === null ? "text" : "structured";
    default:
      return "text";
  }
}

export function storageClassOf(value: RecordValue): StorageClass {
  return STORAGE_CLASS_BY_KIND[classifyValue(value)];
}

/**
 * Maps a declared SQLite column type onto a storage class, following SQLite's affinity rules
 * loosely. Used when adopting tables that have no recorded metadata.
 */
export function storageClassFromDeclaredType(declared: string): StorageClass {
  const type = declared.toUpperCase();
  if (type.includes("INT")) return "INTEGER";
  if (type.includes("REAL") || type.includes("FLOA") || type.includes("DOUB")) return "REAL";
  return "TEXT";
}

export function valueKindFromStorageClass(storageClass: StorageClass): ValueKind {
  if (storageClass === "INTEGER") return "integer";
  if (storageClass === "REAL") return "real";
  return "text";
}

/** Nested structures become JSON text, booleans 1/0, undefined NULL. */
export function toStorable(value: RecordValue): StorableValue {
  switch (typeof value) {
    case "string":
    case "number":
    case "bigint":
      return value;
    case "boolean":
      return value ? 1 : 0;
    case "undefined":
      return null;
    case "object":
      return value === null ? null : JSON.stringify(value);
    default:
      return String(value);
  }
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** An `id` of null or undefined means the record carries no identity. */
export function hasIdentity(record: StoreRecord): boolean {
  return record.id !== undefined && record.id !== null;
}
