/**
 * Task Graph
 *
 * The registry of bound tasks plus the cascade plan that says which stored identities feed
 * which tasks. Built once per updater and frozen.
 */

import { bttsStatsTask, countriesTask, matchesTask, over25StatsTask } from "./general-sync";
import { leaguesTask } from "./leagues-sync";
import {
  leagueStatsTask,
  leagueTableTask,
  playersTask,
  refereesTask,
  schedulesTask,
  teamsTask,
} from "./season-sync";
import {
  matchDetailsTask,
  playerStatsTask,
  refereeStatsTask,
  teamDataTask,
  teamFormTask,
} from "./details-sync";
import {
  bindTask,
  type IdParameterName,
  type IngestionTask,
  type ResourceTable,
  type TaskContext,
  type TaskDefinition,
  type TaskName,
  type TaskParameters,
} from "./task";

export const TASK_DEFINITIONS: readonly TaskDefinition[] = [
  countriesTask,
  leaguesTask,
  matchesTask,
  leagueStatsTask,
  schedulesTask,
  teamsTask,
  playersTask,
  refereesTask,
  leagueTableTask,
  teamDataTask,
  teamFormTask,
  matchDetailsTask,
  playerStatsTask,
  refereeStatsTask,
  bttsStatsTask,
  over25StatsTask,
];

/** Tasks run once per distinct `id` of `table`, passed as `parameter`. */
export interface CascadeStep {
  table: ResourceTable;
  parameter: IdParameterName;
  tasks: readonly TaskName[];
  /** Extra parameters every run of this step gets. */
  fixed?: TaskParameters;
}

export interface CascadeLevel {
  level: number;
  label: string;
  /** Tasks that run once with no input. */
  roots: readonly TaskName[];
  steps: readonly CascadeStep[];
}

export const CASCADE_PLAN: readonly CascadeLevel[] = [
  { level: 0, label: "countries", roots: ["countries"], steps: [] },
  {
    level: 1,
    label: "leagues",
    roots: [],
    steps: [{ table: "countries", parameter: "countryId", tasks: ["leagues"], fixed: { chosenOnly: false } }],
  },
  {
    level: 2,
    label: "league seasons",
    roots: [],
    steps: [
      {
        table: "leagues",
        parameter: "seasonId",
        tasks: ["league_stats", "schedules", "teams", "players", "referees", "league_table"],
        fixed: { stats: true },
      },
    ],
  },
  {
    level: 3,
    label: "teams and matches",
    roots: [],
    steps: [
      { table: "teams", parameter: "teamId", tasks: ["team_data", "team_form"] },
      { table: "matches", parameter: "matchId", tasks: ["match_details"] },
    ],
  },
  {
    level: 4,
    label: "players and referees",
    roots: [],
    steps: [
      { table: "players", parameter: "playerId", tasks: ["player_stats"] },
      { table: "referees", parameter: "refereeId", tasks: ["referee_stats"] },
    ],
  },
];

/** What the orchestrator may see of the registry. */
export interface ReadonlyTaskGraph {
  get(name: string): IngestionTask | undefined;
  names(): readonly TaskName[];
  generalTasks(): readonly IngestionTask[];
  plan(): readonly CascadeLevel[];
}

export class TaskGraph implements ReadonlyTaskGraph {
  private readonly tasks: ReadonlyMap<string, IngestionTask>;

  constructor(tasks: readonly IngestionTask[], private readonly levels: readonly CascadeLevel[] = CASCADE_PLAN) {
    const byName = new Map<string, IngestionTask>();
    for (const task of tasks) {
      if (byName.has(task.name)) {
        throw new Error(`Task '${task.name}' is registered twice`);
      }
      byName.set(task.name, task);
    }
    this.tasks = byName;
    Object.freeze(this);
  }

  get(name: string): IngestionTask | undefined {
    return this.tasks.get(name);
  }

  names(): readonly TaskName[] {
    return [...this.tasks.values()].map(task => task.name);
  }

  generalTasks(): readonly IngestionTask[] {
    return [...this.tasks.values()].filter(task => task.general);
  }

  plan(): readonly CascadeLevel[] {
    return this.levels;
  }
}

export function createTaskGraph(context: TaskContext, definitions: readonly TaskDefinition[] = TASK_DEFINITIONS): TaskGraph {
  return new TaskGraph(definitions.map(definition => bindTask(definition, context)));
}
