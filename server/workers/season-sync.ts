/**
 * Season-level tasks. Each needs a league season id and accepts `maxTime`, a unix timestamp
 * that asks the API for the data as it stood at that moment.
 */

import { hoistStats, stampMissing, toRecords } from "./normalize";
import {
  optional,
  required,
  requireId,
  type ParameterSpec,
  type TaskDefinition,
  type TaskName,
  type TaskParameters,
} from "./task";

const SEASON_PARAMETERS: readonly ParameterSpec[] = [
  required("seasonId", "League season id"),
  optional("maxTime", "Unix timestamp to read the data as of"),
];

function seasonFilters(task: TaskName, params: TaskParameters): { seasonId: number; maxTime?: number } {
  return { seasonId: requireId(task, params, "seasonId"), maxTime: params.maxTime };
}

export const leagueStatsTask: TaskDefinition = {
  name: "league_stats",
  table: "league_stats",
  description: "Season statistics of a league",
  parameters: SEASON_PARAMETERS,
  fetch: (source, params) => source.getLeagueStats(seasonFilters("league_stats", params)),
};

export const schedulesTask: TaskDefinition = {
  name: "schedules",
  table: "matches",
  description: "Every match of a league season",
  parameters: SEASON_PARAMETERS,
  fetch: (source, params) => source.getSchedule(seasonFilters("schedules", params)),
};

export const teamsTask: TaskDefinition = {
  name: "teams",
  table: "teams",
  description: "Teams of a league season",
  parameters: [...SEASON_PARAMETERS, optional("stats", "Include season stats per team")],
  fetch: (source, params) => source.getLeagueTeams({ ...seasonFilters("teams", params), stats: params.stats }),
  normalize: (data, params) => {
    const records = toRecords(data);
    return params.stats ? records.map(record => hoistStats(record)) : records;
  },
};

export const playersTask: TaskDefinition = {
  name: "players",
  table: "players",
  description: "Players of a league season",
  parameters: SEASON_PARAMETERS,
  fetch: (source, params) => source.getLeaguePlayers(seasonFilters("players", params)),
};

export const refereesTask: TaskDefinition = {
  name: "referees",
  table: "referees",
  description: "Referees of a league season",
  parameters: SEASON_PARAMETERS,
  fetch: (source, params) => source.getLeagueReferees(seasonFilters("referees", params)),
};

export const leagueTableTask: TaskDefinition = {
  name: "league_table",
  table: "league_table",
  description: "Standings of a league season",
  parameters: SEASON_PARAMETERS,
  fetch: (source, params) => source.getLeagueTable(seasonFilters("league_table", params)),
  // Tables carry no season of their own
  normalize: (data, params) => toRecords(data).map(record => stampMissing(record, "season_id", params.seasonId)),
};
