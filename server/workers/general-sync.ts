import { getUnixTime } from "date-fns";
import { expandCategories } from "./normalize";
import { optional, type TaskDefinition } from "./task";

function fetchedNow(): number {
  return getUnixTime(new Date());
}

export const countriesTask: TaskDefinition = {
  name: "countries",
  table: "countries",
  description: "Country list",
  parameters: [],
  general: true,
  fetch: source => source.getCountries(),
};

export const matchesTask: TaskDefinition = {
  name: "matches",
  table: "matches",
  description: "Matches played on a day (today by default)",
  parameters: [optional("date", "Day to fetch, yyyy-MM-dd")],
  general: true,
  fetch: (source, params) => source.getMatches({ date: params.date }),
};

export const bttsStatsTask: TaskDefinition = {
  name: "btts_stats",
  table: "btts_stats",
  description: "Both-teams-to-score leaderboards",
  parameters: [],
  general: true,
  fetch: source => source.getBttsStats(),
  normalize: data => expandCategories(data, fetchedNow()),
};

export const over25StatsTask: TaskDefinition = {
  name: "over_25_stats",
  table: "over_25_stats",
  description: "Over 2.5 goals leaderboards",
  parameters: [],
  general: true,
  fetch: source => source.getOver25Stats(),
  normalize: data => expandCategories(data, fetchedNow()),
};
