import type { FetchResult, Pager, RemoteDataSource } from "../../server/ingestion/sources/types";

export type SourceMethod = keyof RemoteDataSource;

/** Union of every filter a source method takes. */
export interface Filters {
  countryId?: number;
  chosenOnly?: boolean;
  date?: string;
  seasonId?: number;
  maxTime?: number;
  stats?: boolean;
  teamId?: number;
  matchId?: number;
  playerId?: number;
  refereeId?: number;
}

export type Responder = FetchResult | ((filters: Filters) => FetchResult | Promise<FetchResult>);

export function ok(data: unknown, pager?: Pager): FetchResult {
  return { ok: true, payload: { data, pager } };
}

export function fail(error = "HTTP 500 from test", status = 500): FetchResult {
  return { ok: false, error, status };
}

/**
 * In-process RemoteDataSource. Unconfigured methods answer with an empty list.
 */
export class FakeSource implements RemoteDataSource {
  readonly calls: { method: SourceMethod; filters: Filters }[] = [];
  private readonly responders = new Map<SourceMethod, Responder>();

  respond(method: SourceMethod, responder: Responder): this {
    this.responders.set(method, responder);
    return this;
  }

  callsTo(method: SourceMethod): Filters[] {
    return this.calls.filter(call => call.method === method).map(call => call.filters);
  }

  private async answer(method: SourceMethod, filters: Filters = {}): Promise<FetchResult> {
    this.calls.push({ method, filters });
    const responder = this.responders.get(method);
    if (responder === undefined) return ok([]);
    return typeof responder === "function" ? responder(filters) : responder;
  }

  getCountries = () => this.answer("getCountries");
  getLeagues = (filters: Filters = {}) => this.answer("getLeagues", { ...filters });
  getMatches = (filters: Filters = {}) => this.answer("getMatches", { ...filters });
  getLeagueStats = (filters: Filters) => this.answer("getLeagueStats", { ...filters });
  getSchedule = (filters: Filters) => this.answer("getSchedule", { ...filters });
  getLeagueTeams = (filters: Filters) => this.answer("getLeagueTeams", { ...filters });
  getLeaguePlayers = (filters: Filters) => this.answer("getLeaguePlayers", { ...filters });
  getLeagueReferees = (filters: Filters) => this.answer("getLeagueReferees", { ...filters });
  getLeagueTable = (filters: Filters) => this.answer("getLeagueTable", { ...filters });
  getTeam = (filters: Filters) => this.answer("getTeam", { ...filters });
  getTeamForm = (filters: Filters) => this.answer("getTeamForm", { ...filters });
  getMatchDetails = (filters: Filters) => this.answer("getMatchDetails", { ...filters });
  getPlayerStats = (filters: Filters) => this.answer("getPlayerStats", { ...filters });
  getRefereeStats = (filters: Filters) => this.answer("getRefereeStats", { ...filters });
  getBttsStats = () => this.answer("getBttsStats");
  getOver25Stats = () => this.answer("getOver25Stats");
}
