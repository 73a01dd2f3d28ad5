import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { loadEnv } from "../server/_core/env";
import { ConfigError } from "../server/_core/errors";
import { RecordStore } from "../server/store/record-store";
import { DatabaseUpdater } from "../server/updater";
import { FakeSource, ok } from "./helpers/fake-source";

describe("DatabaseUpdater", () => {
  let store: RecordStore;
  let source: FakeSource;
  let updater: DatabaseUpdater;

  beforeEach(() => {
    store = RecordStore.open(":memory:");
    source = new FakeSource();
    updater = new DatabaseUpdater({ store, source });
  });

  afterEach(() => {
    updater.close();
  });

  function ingestionLog(): unknown[] {
    return store.sqlite
      .prepare('SELECT "entityType", "status", "parameters", "recordsWritten", "errorMessage" FROM data_ingestion_log ORDER BY id')
      .all();
  }

  it("records every task run in the ingestion log", async () => {
    source.respond("getCountries", ok([{ id: 1, name: "England" }]));

    await updater.runTasks(["countries"]);
    await updater.runTasks(["teams"]);
    await updater.runTasks(["teams"], { seasonId: 10 });

    expect(ingestionLog()).toEqual([
      { entityType: "countries", status: "success", parameters: "{}", recordsWritten: 1, errorMessage: null },
      {
        entityType: "teams",
        status: "skipped",
        parameters: "{}",
        recordsWritten: 0,
        errorMessage: "Parameter 'seasonId' is required for the 'teams' task",
      },
      { entityType: "teams", status: "no_data", parameters: '{"seasonId":10}', recordsWritten: 0, errorMessage: null },
    ]);
  });

  it("closes the store", () => {
    updater.close();
    updater.close();

    expect(store.isClosed).toBe(true);
  });

  it("needs an API key to build from the environment", () => {
    expect(() => DatabaseUpdater.create(":memory:", loadEnv({}))).toThrow(ConfigError);
  });
});
