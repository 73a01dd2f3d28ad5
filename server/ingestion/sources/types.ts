export interface Pager {
  currentPage: number;
  maxPage: number;
  resultsPerPage?: number;
  totalResults?: number;
}

export interface ApiPayload {
  data: unknown;
  pager?: Pager;
}

export type FetchResult =
  | { ok: true; payload: ApiPayload }
  | { ok: false; error: string; status?: number };

export interface LeagueFilters {
  countryId?: number;
  chosenOnly?: boolean;
}

export interface SeasonFilters {
  seasonId: number;
  maxTime?: number;
}

export interface TeamListFilters extends SeasonFilters {
  stats?: boolean;
}

/**
 * One fetch per FootyStats resource. Implementations resolve to `ok: false` for transport
 * and shape problems instead of rejecting.
 */
export interface RemoteDataSource {
  getCountries(): Promise<FetchResult>;
  getLeagues(filters?: LeagueFilters): Promise<FetchResult>;
  getMatches(filters?: { date?: string }): Promise<FetchResult>;
  getLeagueStats(filters: SeasonFilters): Promise<FetchResult>;
  getSchedule(filters: SeasonFilters): Promise<FetchResult>;
  getLeagueTeams(filters: TeamListFilters): Promise<FetchResult>;
  getLeaguePlayers(filters: SeasonFilters): Promise<FetchResult>;
  getLeagueReferees(filters: SeasonFilters): Promise<FetchResult>;
  getLeagueTable(filters: SeasonFilters): Promise<FetchResult>;
  getTeam(filters: { teamId: number }): Promise<FetchResult>;
  getTeamForm(filters: { teamId: number }): Promise<FetchResult>;
  getMatchDetails(filters: { matchId: number }): Promise<FetchResult>;
  getPlayerStats(filters: { playerId: number }): Promise<FetchResult>;
  getRefereeStats(filters: { refereeId: number }): Promise<FetchResult>;
  getBttsStats(): Promise<FetchResult>;
  getOver25Stats(): Promise<FetchResult>;
}
