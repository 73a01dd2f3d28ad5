/**
 * Ingestion task contract.
 *
 * A task is declared once as a `TaskDefinition` (what to fetch, how to flatten it, where it
 * goes) and bound to a data source and store with `bindTask`. Ad-hoc runs and the cascade use
 * the same bound tasks.
 */

import { isValid, parse } from "date-fns";
import { z } from "zod";
import { MissingParameterError, errorMessage } from "../_core/errors";
import { createLogger } from "../_core/logger";
import type { FetchResult, RemoteDataSource } from "../ingestion/sources/types";
import { statusOf, type SyncContext, type SyncLogger } from "../ingestion/utils/sync-logger";
import type { RecordStore } from "../store/record-store";
import type { StoreRecord } from "../store/storage-class";
import { toRecords } from "./normalize";

const log = createLogger("tasks");

export const DATA_SOURCE = "footystats";

export const TASK_NAMES = [
  "countries",
  "leagues",
  "matches",
  "schedules",
  "league_stats",
  "teams",
  "players",
  "referees",
  "league_table",
  "team_data",
  "team_form",
  "match_details",
  "player_stats",
  "referee_stats",
  "btts_stats",
  "over_25_stats",
] as const;

export type TaskName = (typeof TASK_NAMES)[number];

export const RESOURCE_TABLES = [
  "countries",
  "leagues",
  "matches",
  "teams",
  "players",
  "referees",
  "league_stats",
  "league_table",
  "match_details",
  "team_form",
  "btts_stats",
  "over_25_stats",
] as const;

export type ResourceTable = (typeof RESOURCE_TABLES)[number];

export function isTaskName(value: string): value is TaskName {
  return TASK_NAMES.some(name => name === value);
}

// ============================================================================
// PARAMETERS
// ============================================================================

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

export function isIsoDate(value: string): boolean {
  return ISO_DATE.test(value) && isValid(parse(value, "yyyy-MM-dd", new Date()));
}

// A blank flag is not id 0
const idSchema = z.preprocess(
  value => (typeof value === "string" && value.trim() !== "" ? Number(value) : value),
  z.number({ invalid_type_error: "expected a non-negative integer" }).int().nonnegative()
);

export const taskParametersSchema = z.object({
  countryId: idSchema.optional(),
  seasonId: idSchema.optional(),
  teamId: idSchema.optional(),
  matchId: idSchema.optional(),
  playerId: idSchema.optional(),
  refereeId: idSchema.optional(),
  maxTime: idSchema.optional(),
  date: z.string().refine(isIsoDate, "expected a date as yyyy-MM-dd").optional(),
  chosenOnly: z.boolean().optional(),
  stats: z.boolean().optional(),
});

export type TaskParameters = z.infer<typeof taskParametersSchema>;
export type ParameterName = keyof TaskParameters;
export type IdParameterName = "countryId" | "seasonId" | "teamId" | "matchId" | "playerId" | "refereeId";

export interface ParameterSpec {
  name: ParameterName;
  required: boolean;
  description: string;
}

export const PARAMETER_FLAGS: Readonly<Record<ParameterName, string>> = {
  countryId: "--country-id",
  seasonId: "--season-id",
  teamId: "--team-id",
  matchId: "--match-id",
  playerId: "--player-id",
  refereeId: "--referee-id",
  maxTime: "--max-time",
  date: "--date",
  chosenOnly: "--chosen-only",
  stats: "--stats",
};

export function required(name: ParameterName, description: string): ParameterSpec {
  return { name, required: true, description };
}

export function optional(name: ParameterName, description: string): ParameterSpec {
  return { name, required: false, description };
}

/** Narrows an id parameter the task declared as required. */
export function requireId(task: TaskName, params: TaskParameters, name: IdParameterName): number {
  const value = params[name];
  if (value === undefined) {
    throw new MissingParameterError(task, name);
  }
  return value;
}

// ============================================================================
// TASKS
// ============================================================================

export type TaskOutcome =
  | {
      task: TaskName;
      status: "success" | "partial" | "failure";
      table: ResourceTable;
      recordsProcessed: number;
      recordsWritten: number;
      errors: string[];
    }
  | { task: TaskName; status: "no_data"; reason: string }
  | { task: TaskName; status: "skipped"; reason: string };

export type TaskStatus = TaskOutcome["status"];

export interface TaskDefinition {
  name: TaskName;
  table: ResourceTable;
  description: string;
  parameters: readonly ParameterSpec[];
  /** Part of a general run: needs no input and feeds nothing downstream. */
  general?: boolean;
  fetch(source: RemoteDataSource, params: TaskParameters): Promise<FetchResult>;
  /** Defaults to `toRecords`. */
  normalize?(data: unknown, params: TaskParameters): StoreRecord[];
}

export interface IngestionTask {
  readonly name: TaskName;
  readonly table: ResourceTable;
  readonly description: string;
  readonly general: boolean;
  declareParameters(): readonly ParameterSpec[];
  execute(params?: TaskParameters): Promise<TaskOutcome>;
}

export interface TaskContext {
  source: RemoteDataSource;
  store: RecordStore;
  syncLogger: SyncLogger;
}

export function bindTask(definition: TaskDefinition, context: TaskContext): IngestionTask {
  const { source, store, syncLogger } = context;
  const { name, table } = definition;

  async function skip(sync: SyncContext, reason: string): Promise<TaskOutcome> {
    log.warn(`Skipping ${name}: ${reason}`);
    sync.errors.push(reason);
    await syncLogger.endSync(sync, DATA_SOURCE, "skipped");
    return { task: name, status: "skipped", reason };
  }

  async function noData(sync: SyncContext, reason: string): Promise<TaskOutcome> {
    log.warn(`No data for ${name}: ${reason}`);
    await syncLogger.endSync(sync, DATA_SOURCE, "no_data");
    return { task: name, status: "no_data", reason };
  }

  return {
    name,
    table,
    description: definition.description,
    general: definition.general === true && definition.parameters.every(parameter => !parameter.required),

    declareParameters: () => definition.parameters,

    async execute(raw: TaskParameters = {}): Promise<TaskOutcome> {
      const sync = syncLogger.startSync(name, { ...raw });

      const parsed = taskParametersSchema.safeParse(raw);
      if (!parsed.success) {
        const issues = parsed.error.issues.map(issue => `${issue.path.join(".")}: ${issue.message}`);
        return skip(sync, `Invalid parameters (${issues.join("; ")})`);
      }
      const params = parsed.data;

      const missing = definition.parameters.find(parameter => parameter.required && params[parameter.name] === undefined);
      if (missing) {
        return skip(sync, new MissingParameterError(name, missing.name).message);
      }

      log.info(`Updating ${name}`, params);

      let result: FetchResult;
      try {
        result = await definition.fetch(source, params);
      } catch (error) {
        if (error instanceof MissingParameterError) {
          return skip(sync, error.message);
        }
        result = { ok: false, error: errorMessage(error) };
      }

      if (!result.ok) {
        return noData(sync, result.error);
      }

      const records = (definition.normalize ?? toRecords)(result.payload.data, params);
      if (records.length === 0) {
        return noData(sync, "Response contained no records");
      }

      for (const record of records) {
        sync.recordsProcessed++;
        try {
          await store.upsert(table, record);
          sync.recordsWritten++;
        } catch (error) {
          const message = `${table}${record.id !== undefined ? ` id=${String(record.id)}` : ""}: ${errorMessage(error)}`;
          sync.errors.push(message);
          log.error(`Error writing ${name} record`, message);
        }
      }

      const status = statusOf(sync);
      await syncLogger.endSync(sync, DATA_SOURCE, status);

      return {
        task: name,
        status,
        table,
        recordsProcessed: sync.recordsProcessed,
        recordsWritten: sync.recordsWritten,
        errors: [...sync.errors],
      };
    },
  };
}
