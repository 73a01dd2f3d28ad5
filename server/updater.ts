/**
 * Database updater: the record store, the FootyStats source and the task graph wired together.
 * Every task run lands in `data_ingestion_log`.
 */

import { loadEnv, requireApiKey, type Env } from "./_core/env";
import { FootyStatsClient } from "./ingestion/sources/footystats-client";
import type { RemoteDataSource } from "./ingestion/sources/types";
import { SyncLogger, type SyncLog } from "./ingestion/utils/sync-logger";
import { RecordStore } from "./store/record-store";
import { runCascade, runGeneral, runTasks, type RunReport } from "./workers/orchestrator";
import { createTaskGraph, type ReadonlyTaskGraph } from "./workers/registry";
import { SCHEDULER_CONFIG, Scheduler, type CronApi, type JobName, type JobRunner } from "./workers/scheduler";
import type { TaskParameters } from "./workers/task";

export interface UpdaterOptions {
  store: RecordStore;
  source: RemoteDataSource;
}

export class DatabaseUpdater {
  readonly store: RecordStore;
  readonly graph: ReadonlyTaskGraph;

  constructor({ store, source }: UpdaterOptions) {
    this.store = store;
    const syncLogger = new SyncLogger(entry => this.persistRun(entry));
    this.graph = createTaskGraph({ source, store, syncLogger });
  }

  /** Opens the store at `dbPath` and a FootyStats client configured from `env`. */
  static create(dbPath: string, env: Env = loadEnv()): DatabaseUpdater {
    const apiKey = requireApiKey(env);
    const store = RecordStore.open(dbPath);
    const source = new FootyStatsClient({
      apiKey,
      baseURL: env.FOOTYSTATS_BASE_URL,
      minDelayMs: env.REQUEST_DELAY_MS,
    });
    return new DatabaseUpdater({ store, source });
  }

  runTasks(names: readonly string[], params: TaskParameters = {}): Promise<RunReport> {
    return runTasks(this.graph, names, params);
  }

  runGeneral(params: TaskParameters = {}): Promise<RunReport> {
    return runGeneral(this.graph, params);
  }

  runCascade(): Promise<RunReport> {
    return runCascade(this.graph, this.store);
  }

  createScheduler(cronApi?: CronApi): Scheduler {
    const jobs: Record<JobName, JobRunner> = {
      cascade: () => this.runCascade(),
      matches: () => this.runTasks(["matches"]),
      general: () => this.runGeneral(),
    };
    return new Scheduler(jobs, SCHEDULER_CONFIG, cronApi);
  }

  close(): void {
    this.store.close();
  }

  private async persistRun(entry: SyncLog): Promise<void> {
    if (this.store.isClosed) return;
    await this.store.recordIngestion({
      source: entry.source,
      entityType: entry.worker,
      status: entry.status,
      parameters: JSON.stringify(entry.parameters),
      recordsProcessed: entry.recordsProcessed,
      recordsWritten: entry.recordsWritten,
      errorMessage: entry.errors.length > 0 ? entry.errors.join("; ") : null,
      startedAt: entry.startedAt,
      completedAt: entry.completedAt,
    });
  }
}
