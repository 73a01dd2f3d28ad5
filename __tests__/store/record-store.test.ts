import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { StoreError } from "../../server/_core/errors";
import { RecordStore } from "../../server/store/record-store";

function rows(store: RecordStore, table: string): unknown[] {
  return store.sqlite.prepare(`SELECT * FROM "${table}" ORDER BY rowid`).all();
}

function tableColumns(store: RecordStore, table: string): unknown[] {
  return store.sqlite.prepare(`PRAGMA table_info("${table}")`).all().map(column =>
    typeof column === "object" && column !== null && "name" in column ? column.name : undefined
  );
}

describe("RecordStore", () => {
  let store: RecordStore;

  beforeEach(() => {
    store = RecordStore.open(":memory:");
  });

  afterEach(() => {
    store.close();
  });

  describe("ensureSchema", () => {
    it("creates the table once and is idempotent", async () => {
      const first = await store.ensureSchema("teams", { id: 1, name: "A" });
      const second = await store.ensureSchema("teams", { id: 1, name: "A" });

      expect(first.columns.map(c => c.name)).toEqual(["id", "name"]);
      expect(second).toEqual(first);
      expect(store.sqlite.prepare("SELECT COUNT(*) AS n FROM store_columns WHERE tableName = ?").get("teams")).toEqual({ n: 2 });
    });

    it("adds only the missing columns", async () => {
      await store.ensureSchema("teams", { id: 1, name: "A" });
      const schema = await store.ensureSchema("teams", { id: 1, name: "A", rating: 7.5 });

      expect(schema.columns.map(c => [c.name, c.storageClass, c.position])).toEqual([
        ["id", "INTEGER", 0],
        ["name", "TEXT", 1],
        ["rating", "REAL", 2],
      ]);
      expect(tableColumns(store, "teams")).toEqual(["id", "name", "rating"]);
    });
  });

  describe("upsert", () => {
    it("replaces a record with the same id and widens the table", async () => {
      const created = await store.upsert("teams", { id: 5, name: "A" });
      const replaced = await store.upsert("teams", { id: 5, name: "B", extra: 1 });

      expect(created).toEqual({ table: "teams", mode: "replace", createdTable: true, addedColumns: ["name"] });
      expect(replaced).toEqual({ table: "teams", mode: "replace", createdTable: false, addedColumns: ["extra"] });
      expect(rows(store, "teams")).toEqual([{ id: 5, name: "B", extra: 1 }]);
    });

    it("leaves earlier rows null in added columns", async () => {
      await store.upsert("teams", { id: 1, name: "A" });
      await store.upsert("teams", { id: 2, name: "B", founded: 1899 });

      expect(rows(store, "teams")).toEqual([
        { id: 1, name: "A", founded: null },
        { id: 2, name: "B", founded: 1899 },
      ]);
    });

    it("appends records without an id under a surrogate key", async () => {
      await store.upsert("btts_stats", { category: "teams" });
      const second = await store.upsert("btts_stats", { category: "teams" });

      expect(second.mode).toBe("insert");
      expect(rows(store, "btts_stats")).toEqual([
        { id: 1, category: "teams" },
        { id: 2, category: "teams" },
      ]);
      const schema = await store.describeTable("btts_stats");
      expect(schema?.columns[0]).toMatchObject({ name: "id", role: "surrogate", storageClass: "INTEGER" });
    });

    it("treats a null id as no identity", async () => {
      const result = await store.upsert("league_table", { id: null, position: 1 });

      expect(result.mode).toBe("insert");
      expect(rows(store, "league_table")).toEqual([{ id: 1, position: 1 }]);
    });

    it("writes an empty record as a bare row", async () => {
      await store.upsert("events", {});

      expect(rows(store, "events")).toEqual([{ id: 1 }]);
    });

    it("stores nested values as JSON and booleans as integers", async () => {
      await store.upsert("matches", { id: 9, odds: { home: 1.8 }, finished: true });

      expect(rows(store, "matches")).toEqual([{ id: 9, odds: '{"home":1.8}', finished: 1 }]);
    });

    it("keeps a column's storage class once decided", async () => {
      await store.upsert("players", { id: 1, shirt: 10 });
      await store.upsert("players", { id: 2, shirt: "ten" });

      const schema = await store.describeTable("players");
      expect(schema?.columns.find(c => c.name === "shirt")).toMatchObject({ valueKind: "integer", storageClass: "INTEGER" });
    });

    it("matches column names case-insensitively", async () => {
      await store.upsert("teams", { id: 1, Name: "A" });
      const result = await store.upsert("teams", { id: 2, name: "B" });

      expect(result.addedColumns).toEqual([]);
      expect(tableColumns(store, "teams")).toEqual(["id", "Name"]);
    });

    it("treats any spelling of id as the identity", async () => {
      const result = await store.upsert("countries", { ID: 5, name: "x" });
      await store.upsert("countries", { Id: 5, name: "y" });

      expect(result).toEqual({ table: "countries", mode: "replace", createdTable: true, addedColumns: ["name"] });
      expect(tableColumns(store, "countries")).toEqual(["id", "name"]);
      expect(rows(store, "countries")).toEqual([{ id: 5, name: "y" }]);
    });

    it("merges keys that differ only by case, last value wins", async () => {
      await store.upsert("teams", { id: 1, Name: "A", name: "B" });
      await store.upsert("teams", { id: 2, NAME: "C", name: "D" });

      expect(tableColumns(store, "teams")).toEqual(["id", "Name"]);
      expect(rows(store, "teams")).toEqual([
        { id: 1, Name: "B" },
        { id: 2, Name: "D" },
      ]);
    });

    it("rolls back added columns when the write fails", async () => {
      await store.upsert("teams", { id: 1, name: "A" });

      // "id" is an INTEGER PRIMARY KEY: text cannot be stored in it
      await expect(store.upsert("teams", { id: "abc", extra: 1 })).rejects.toBeInstanceOf(StoreError);

      expect(tableColumns(store, "teams")).toEqual(["id", "name"]);
      const schema = await store.describeTable("teams");
      expect(schema?.columns.map(c => c.name)).toEqual(["id", "name"]);

      const retried = await store.upsert("teams", { id: 2, extra: 1 });
      expect(retried.addedColumns).toEqual(["extra"]);
    });

    it("rejects unsafe identifiers and reserved tables", async () => {
      await expect(store.upsert('bad"table', { id: 1 })).rejects.toBeInstanceOf(StoreError);
      await expect(store.upsert("teams", { id: 1, 'bad"column': 2 })).rejects.toBeInstanceOf(StoreError);
      await expect(store.upsert("", { id: 1 })).rejects.toBeInstanceOf(StoreError);
      await expect(store.upsert("store_columns", { id: 1 })).rejects.toBeInstanceOf(StoreError);
      expect(await store.describeTable("teams")).toBeUndefined();
    });

    it("adopts a table created outside the store", async () => {
      store.sqlite.exec('CREATE TABLE "legacy" ("id" INTEGER PRIMARY KEY, "label" VARCHAR(20))');

      const result = await store.upsert("legacy", { id: 1, label: "x", extra: 2.5 });

      expect(result).toEqual({ table: "legacy", mode: "replace", createdTable: false, addedColumns: ["extra"] });
      const schema = await store.describeTable("legacy");
      expect(schema?.columns.map(c => [c.name, c.role, c.storageClass])).toEqual([
        ["id", "identity", "INTEGER"],
        ["label", "data", "TEXT"],
        ["extra", "data", "REAL"],
      ]);
    });
  });

  describe("distinctIdentities", () => {
    it("returns distinct ids in ascending order", async () => {
      for (const id of [3, 1, 2, 3]) {
        await store.upsert("countries", { id, name: `c${id}` });
      }

      expect([...(await store.distinctIdentities("countries"))]).toEqual([1, 2, 3]);
    });

    it("reads any column and skips nulls", async () => {
      await store.upsert("players", { id: 1, club_team_id: 7 });
      await store.upsert("players", { id: 2, club_team_id: null });
      await store.upsert("players", { id: 3, club_team_id: 7 });

      expect([...(await store.distinctIdentities("players", "club_team_id"))]).toEqual([7]);
    });

    it("is empty for a missing table or column", async () => {
      await store.upsert("teams", { id: 1 });

      expect((await store.distinctIdentities("nowhere")).size).toBe(0);
      expect((await store.distinctIdentities("teams", "season_id")).size).toBe(0);
    });
  });

  describe("recordIngestion", () => {
    it("writes to the run log", async () => {
      await store.recordIngestion({
        source: "footystats",
        entityType: "countries",
        status: "success",
        parameters: "{}",
        recordsProcessed: 2,
        recordsWritten: 2,
        startedAt: new Date(1_000),
        completedAt: new Date(2_000),
      });

      expect(store.sqlite.prepare('SELECT "entityType", "status", "startedAt", "completedAt" FROM data_ingestion_log').all()).toEqual([
        { entityType: "countries", status: "success", startedAt: 1_000, completedAt: 2_000 },
      ]);
    });
  });

  describe("close", () => {
    it("can be called twice and rejects later use", async () => {
      store.close();
      store.close();

      expect(store.isClosed).toBe(true);
      await expect(store.upsert("teams", { id: 1 })).rejects.toBeInstanceOf(StoreError);
    });
  });
});

describe("RecordStore on disk", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "record-store-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("keeps schema metadata across reopen", async () => {
    const path = join(dir, "store.db");

    const first = RecordStore.open(path);
    await first.upsert("players", { id: 1, shirt: 10 });
    first.close();

    const second = RecordStore.open(path);
    try {
      const schema = await second.describeTable("players");
      expect(schema?.columns.map(c => [c.name, c.role, c.storageClass])).toEqual([
        ["id", "identity", "INTEGER"],
        ["shirt", "data", "INTEGER"],
      ]);

      await second.upsert("players", { id: 2, shirt: "ten" });
      expect([...(await second.distinctIdentities("players"))]).toEqual([1, 2]);
      expect((await second.describeTable("players"))?.columns[1]?.storageClass).toBe("INTEGER");
    } finally {
      second.close();
    }
  });

  it("fails to open a path in a missing directory", () => {
    expect(() => RecordStore.open(join(dir, "missing", "store.db"))).toThrow(StoreError);
  });
});
