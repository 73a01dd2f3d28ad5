/**
 * Orchestrator
 *
 * Three ways to run tasks over one Task Graph:
 * - `runTasks`: named tasks, one parameter set;
 * - `runGeneral`: the tasks that need no input;
 * - `runCascade`: every level of the plan, each level's inputs read from what the previous
 *   levels stored.
 *
 * Everything runs sequentially. A failing task or identity is reported and the run goes on.
 */

import { errorMessage } from "../_core/errors";
import { createLogger } from "../_core/logger";
import type { IdentityValue } from "../store/record-store";
import type { CascadeStep, ReadonlyTaskGraph } from "./registry";
import type { IngestionTask, ResourceTable, TaskName, TaskOutcome, TaskParameters, TaskStatus } from "./task";

const log = createLogger("orchestrator");

export type RunMode = "tasks" | "general" | "cascade";

/** The part of the record store the cascade reads from. */
export interface IdentityReader {
  distinctIdentities(table: string, column?: string): Promise<Set<IdentityValue>>;
}

export interface LevelReport {
  level: number;
  label: string;
  /** Distinct identities read per input table at the start of the level. */
  identities: Partial<Record<ResourceTable, number>>;
  runs: number;
}

export interface RunReport {
  mode: RunMode;
  outcomes: TaskOutcome[];
  counts: Record<TaskStatus, number>;
  /** Names that matched no registered task. */
  unknown: string[];
  levels: LevelReport[];
  durationMs: number;
}

export function countOutcomes(outcomes: readonly TaskOutcome[]): Record<TaskStatus, number> {
  const counts: Record<TaskStatus, number> = { success: 0, partial: 0, failure: 0, no_data: 0, skipped: 0 };
  for (const outcome of outcomes) {
    counts[outcome.status]++;
  }
  return counts;
}

/**
 * Identities arrive as whatever SQLite stored. Only non-negative integers (or strings of
 * digits) can be passed on as an id parameter.
 */
export function toIdentityParameter(value: IdentityValue): number | undefined {
  if (typeof value === "number") {
    return Number.isSafeInteger(value) && value >= 0 ? value : undefined;
  }
  if (typeof value === "bigint") {
    return value >= 0n && value <= BigInt(Number.MAX_SAFE_INTEGER) ? Number(value) : undefined;
  }
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) return undefined;
  const parsed = Number(trimmed);
  return Number.isSafeInteger(parsed) ? parsed : undefined;
}

async function runOne(task: IngestionTask, params: TaskParameters): Promise<TaskOutcome> {
  try {
    return await task.execute(params);
  } catch (error) {
    const message = errorMessage(error);
    log.error(`Task ${task.name} threw`, error);
    return {
      task: task.name,
      status: "failure",
      table: task.table,
      recordsProcessed: 0,
      recordsWritten: 0,
      errors: [message],
    };
  }
}

function report(mode: RunMode, startedAt: number, outcomes: TaskOutcome[], unknown: string[], levels: LevelReport[] = []): RunReport {
  const result: RunReport = {
    mode,
    outcomes,
    counts: countOutcomes(outcomes),
    unknown,
    levels,
    durationMs: Date.now() - startedAt,
  };
  log.info(`Run '${mode}' finished`, { ...result.counts, durationMs: result.durationMs });
  return result;
}

export async function runTasks(
  graph: ReadonlyTaskGraph,
  names: readonly string[],
  params: TaskParameters = {}
): Promise<RunReport> {
  const startedAt = Date.now();
  const outcomes: TaskOutcome[] = [];
  const unknown: string[] = [];

  for (const name of names) {
    const task = graph.get(name);
    if (!task) {
      log.warn(`Unknown task '${name}', skipping`);
      unknown.push(name);
      continue;
    }
    outcomes.push(await runOne(task, params));
  }

  return report("tasks", startedAt, outcomes, unknown);
}

export async function runGeneral(graph: ReadonlyTaskGraph, params: TaskParameters = {}): Promise<RunReport> {
  const startedAt = Date.now();
  const outcomes: TaskOutcome[] = [];

  for (const task of graph.generalTasks()) {
    outcomes.push(await runOne(task, params));
  }

  return report("general", startedAt, outcomes, []);
}

export async function runCascade(graph: ReadonlyTaskGraph, store: IdentityReader): Promise<RunReport> {
  const startedAt = Date.now();
  const outcomes: TaskOutcome[] = [];
  const unknown = new Set<string>();
  const levels: LevelReport[] = [];

  function resolve(names: readonly TaskName[]): IngestionTask[] {
    const tasks: IngestionTask[] = [];
    for (const name of names) {
      const task = graph.get(name);
      if (task) {
        tasks.push(task);
      } else if (!unknown.has(name)) {
        log.warn(`Cascade names unregistered task '${name}', skipping`);
        unknown.add(name);
      }
    }
    return tasks;
  }

  for (const level of graph.plan()) {
    log.info(`Level ${level.level}: ${level.label}`);
    const levelReport: LevelReport = { level: level.level, label: level.label, identities: {}, runs: 0 };

    // Inputs are fixed before any task of this level writes
    const inputs: { step: CascadeStep; ids: IdentityValue[] }[] = [];
    for (const step of level.steps) {
      let ids: IdentityValue[];
      try {
        ids = [...(await store.distinctIdentities(step.table))];
      } catch (error) {
        log.error(`Could not read identities from '${step.table}'`, error);
        ids = [];
      }
      levelReport.identities[step.table] = ids.length;
      inputs.push({ step, ids });
    }

    for (const task of resolve(level.roots)) {
      outcomes.push(await runOne(task, {}));
      levelReport.runs++;
    }

    for (const { step, ids } of inputs) {
      const tasks = resolve(step.tasks);
      if (ids.length === 0) {
        log.warn(`No identities in '${step.table}' for ${step.tasks.join(", ")}`);
        continue;
      }

      for (const raw of ids) {
        const id = toIdentityParameter(raw);
        if (id === undefined) {
          log.warn(`Skipping non-integer identity ${JSON.stringify(String(raw))} from '${step.table}'`);
          continue;
        }

        const params: TaskParameters = { ...step.fixed };
        params[step.parameter] = id;

        for (const task of tasks) {
          const outcome = await runOne(task, params);
          if (outcome.status === "failure") {
            log.warn(`${task.name} failed for ${step.parameter}=${id}, continuing`);
          }
          outcomes.push(outcome);
          levelReport.runs++;
        }
      }
    }

    levels.push(levelReport);
  }

  return report("cascade", startedAt, outcomes, [...unknown], levels);
}
