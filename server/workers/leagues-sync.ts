import { flattenLeagueSeasons } from "./normalize";
import { optional, type TaskDefinition } from "./task";

/**
 * Leagues are stored one row per season: the season id is the identity the season-level
 * tasks run on.
 */
export const leaguesTask: TaskDefinition = {
  name: "leagues",
  table: "leagues",
  description: "League seasons, optionally limited to a country or to chosen leagues",
  parameters: [
    optional("countryId", "Only leagues of this country"),
    optional("chosenOnly", "Only the leagues selected in the FootyStats account"),
  ],
  fetch: (source, params) => source.getLeagues({ countryId: params.countryId, chosenOnly: params.chosenOnly }),
  normalize: data => flattenLeagueSeasons(data),
};
