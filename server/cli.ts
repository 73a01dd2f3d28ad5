import { parseArgs } from "node:util";
import { loadEnv, type Env } from "./_core/env";
import { ConfigError, InvalidParameterError, StoreError, errorMessage } from "./_core/errors";
import { createLogger } from "./_core/logger";
import { DatabaseUpdater } from "./updater";
import type { RunReport } from "./workers/orchestrator";
import { TASK_DEFINITIONS } from "./workers/registry";
import { PARAMETER_FLAGS, isTaskName, taskParametersSchema, type TaskParameters } from "./workers/task";

const log = createLogger("update-db");

export const USAGE = `Usage: update-db [dbPath] [--task NAME ...] [--all] [--general] [--schedule] [--list]
                 [--country-id N] [--season-id N] [--team-id N] [--match-id N]
                 [--player-id N] [--referee-id N] [--max-time N] [--date YYYY-MM-DD]
                 [--chosen-only] [--stats] [--help]

  --all        cascading update of every resource
  --general    tasks that need no input (countries, matches, aggregate stats)
  --task NAME  run the named task(s); repeat or separate with commas
  --schedule   keep running and update on the built-in cron schedule
  --list       list tasks and their parameters`;

export type RunTarget = "tasks" | "general" | "cascade" | "schedule";

export type CliCommand =
  | { kind: "help" }
  | { kind: "list" }
  | { kind: "run"; target: RunTarget; dbPath?: string; tasks: string[]; params: TaskParameters };

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

const ID_OPTIONS = [
  ["country-id", "countryId"],
  ["season-id", "seasonId"],
  ["team-id", "teamId"],
  ["match-id", "matchId"],
  ["player-id", "playerId"],
  ["referee-id", "refereeId"],
  ["max-time", "maxTime"],
] as const;

function readArgs(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      allowPositionals: true,
      strict: true,
      options: {
        task: { type: "string", multiple: true },
        all: { type: "boolean" },
        general: { type: "boolean" },
        schedule: { type: "boolean" },
        list: { type: "boolean" },
        help: { type: "boolean", short: "h" },
        "country-id": { type: "string" },
        "season-id": { type: "string" },
        "team-id": { type: "string" },
        "match-id": { type: "string" },
        "player-id": { type: "string" },
        "referee-id": { type: "string" },
        "max-time": { type: "string" },
        date: { type: "string" },
        "chosen-only": { type: "boolean" },
        stats: { type: "boolean" },
      },
    });
  } catch (error) {
    throw new UsageError(errorMessage(error));
  }
}

function flagOf(key: PropertyKey | undefined): string {
  const entry = Object.entries(PARAMETER_FLAGS).find(([name]) => name === key);
  return entry ? entry[1] : String(key);
}

export function parseCliArgs(argv: readonly string[]): CliCommand {
  const { values, positionals } = readArgs(argv);

  if (values.help) return { kind: "help" };
  if (values.list) return { kind: "list" };

  const tasks = (values.task ?? []).flatMap(value => value.split(",")).map(name => name.trim()).filter(Boolean);
  let dbPath: string | undefined;
  for (const positional of positionals) {
    if (isTaskName(positional)) {
      tasks.push(positional);
    } else if (dbPath === undefined) {
      dbPath = positional;
    } else {
      throw new UsageError(`Unexpected argument '${positional}'`);
    }
  }

  const unknown = tasks.filter(name => !isTaskName(name));
  if (unknown.length > 0) {
    throw new UsageError(`Unknown task(s): ${unknown.join(", ")} (see --list)`);
  }

  const raw: Record<string, unknown> = {};
  for (const [flag, name] of ID_OPTIONS) {
    const value = values[flag];
    if (value !== undefined) raw[name] = value;
  }
  if (values.date !== undefined) raw.date = values.date;
  if (values["chosen-only"]) raw.chosenOnly = true;
  if (values.stats) raw.stats = true;

  const checked = taskParametersSchema.safeParse(raw);
  if (!checked.success) {
    const details = checked.error.issues.map(issue => `${flagOf(issue.path[0])}: ${issue.message}`);
    throw new UsageError(new InvalidParameterError("Invalid parameters", details).message);
  }

  let target: RunTarget;
  if (values.schedule) target = "schedule";
  else if (values.all) target = "cascade";
  else if (values.general) target = "general";
  else if (tasks.length > 0) target = "tasks";
  else throw new UsageError("Nothing to do: pass --task, --all, --general, --schedule or --list");

  return { kind: "run", target, dbPath, tasks, params: checked.data };
}

export function formatTaskList(): string {
  const lines = ["Tasks:"];
  for (const definition of TASK_DEFINITIONS) {
    const parameters = definition.parameters
      .map(parameter => (parameter.required ? PARAMETER_FLAGS[parameter.name] : `[${PARAMETER_FLAGS[parameter.name]}]`))
      .join(" ");
    lines.push(`  ${definition.name.padEnd(14)} -> ${definition.table.padEnd(14)} ${definition.description}${parameters ? `  ${parameters}` : ""}`);
  }
  return lines.join("\n");
}

export function formatReport(report: RunReport): string {
  const { counts } = report;
  const lines = [
    `Run '${report.mode}' finished in ${report.durationMs}ms: ` +
      `${counts.success} success, ${counts.partial} partial, ${counts.failure} failure, ` +
      `${counts.no_data} no data, ${counts.skipped} skipped`,
  ];
  for (const level of report.levels) {
    const inputs = Object.entries(level.identities).map(([table, count]) => `${table}=${count}`).join(", ");
    lines.push(`  level ${level.level} (${level.label}): ${level.runs} runs${inputs ? `, inputs ${inputs}` : ""}`);
  }
  if (report.unknown.length > 0) {
    lines.push(`  unknown tasks: ${report.unknown.join(", ")}`);
  }
  return lines.join("\n");
}

function waitForShutdownSignal(): Promise<void> {
  return new Promise(resolve => {
    process.once("SIGINT", () => resolve());
    process.once("SIGTERM", () => resolve());
  });
}

export interface CliDeps {
  env?: () => Env;
  createUpdater?: (dbPath: string, env: Env) => DatabaseUpdater;
  waitForShutdown?: () => Promise<void>;
  print?: (text: string) => void;
}

/** Returns the process exit code. */
export async function main(argv: readonly string[], deps: CliDeps = {}): Promise<number> {
  const print = deps.print ?? ((text: string) => console.log(text));

  let command: CliCommand;
  try {
    command = parseCliArgs(argv);
  } catch (error) {
    if (!(error instanceof UsageError)) throw error;
    print(`${error.message}\n\n${USAGE}`);
    return 1;
  }

  if (command.kind === "help") {
    print(USAGE);
    return 0;
  }
  if (command.kind === "list") {
    print(formatTaskList());
    return 0;
  }

  let updater: DatabaseUpdater;
  try {
    const env = (deps.env ?? loadEnv)();
    const dbPath = command.dbPath ?? env.DATABASE_PATH;
    updater = (deps.createUpdater ?? DatabaseUpdater.create)(dbPath, env);
    log.info(`Using database ${dbPath}`);
  } catch (error) {
    if (error instanceof ConfigError || error instanceof StoreError) {
      log.error(error.message);
      return 1;
    }
    throw error;
  }

  try {
    switch (command.target) {
      case "cascade":
        print(formatReport(await updater.runCascade()));
        break;
      case "general":
        print(formatReport(await updater.runGeneral(command.params)));
        break;
      case "tasks":
        print(formatReport(await updater.runTasks(command.tasks, command.params)));
        break;
      case "schedule": {
        const scheduler = updater.createScheduler();
        scheduler.start();
        await (deps.waitForShutdown ?? waitForShutdownSignal)();
        await scheduler.stop();
        break;
      }
    }
    return 0;
  } finally {
    updater.close();
  }
}
