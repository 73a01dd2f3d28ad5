import { hoistStats, toRecords, withFormIdentity } from "./normalize";
import { required, requireId, type TaskDefinition } from "./task";

export const teamDataTask: TaskDefinition = {
  name: "team_data",
  table: "teams",
  description: "Full profile and stats of one team",
  parameters: [required("teamId", "Team id")],
  fetch: (source, params) => source.getTeam({ teamId: requireId("team_data", params, "teamId") }),
  normalize: data => toRecords(data).map(record => hoistStats(record)),
};

export const teamFormTask: TaskDefinition = {
  name: "team_form",
  table: "team_form",
  description: "Last 5, 6 and 10 match form of one team",
  parameters: [required("teamId", "Team id")],
  fetch: (source, params) => source.getTeamForm({ teamId: requireId("team_form", params, "teamId") }),
  normalize: data => toRecords(data).map(record => withFormIdentity(hoistStats(record))),
};

export const matchDetailsTask: TaskDefinition = {
  name: "match_details",
  table: "match_details",
  description: "Detail of one match (lineups, odds, H2H)",
  parameters: [required("matchId", "Match id")],
  fetch: (source, params) => source.getMatchDetails({ matchId: requireId("match_details", params, "matchId") }),
};

export const playerStatsTask: TaskDefinition = {
  name: "player_stats",
  table: "players",
  description: "Career stats of one player, one row per player",
  parameters: [required("playerId", "Player id")],
  fetch: (source, params) => source.getPlayerStats({ playerId: requireId("player_stats", params, "playerId") }),
};

export const refereeStatsTask: TaskDefinition = {
  name: "referee_stats",
  table: "referees",
  description: "Career stats of one referee",
  parameters: [required("refereeId", "Referee id")],
  fetch: (source, params) => source.getRefereeStats({ refereeId: requireId("referee_stats", params, "refereeId") }),
};
