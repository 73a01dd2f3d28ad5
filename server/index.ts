export { ConfigError, InvalidParameterError, MissingParameterError, StoreError } from "./_core/errors";
export { loadEnv, type Env } from "./_core/env";
export { createLogger, type Logger } from "./_core/logger";
export { FootyStatsClient, type FootyStatsClientOptions } from "./ingestion/sources/footystats-client";
export type { FetchResult, RemoteDataSource } from "./ingestion/sources/types";
export { RecordStore, type TableSchema, type UpsertResult } from "./store/record-store";
export type { StoreRecord } from "./store/storage-class";
export { DatabaseUpdater } from "./updater";
export { runCascade, runGeneral, runTasks, type RunReport } from "./workers/orchestrator";
export { CASCADE_PLAN, TASK_DEFINITIONS, TaskGraph, createTaskGraph, type ReadonlyTaskGraph } from "./workers/registry";
export { SCHEDULER_CONFIG, Scheduler } from "./workers/scheduler";
export { TASK_NAMES, type IngestionTask, type TaskName, type TaskOutcome, type TaskParameters } from "./workers/task";
