import axios, { type AxiosAdapter, type AxiosInstance } from "axios";
import { z } from "zod";
import { DEFAULT_BASE_URL, DEFAULT_REQUEST_DELAY_MS } from "../../_core/env";
import { errorMessage } from "../../_core/errors";
import { createLogger } from "../../_core/logger";
import { fetchAllPages } from "../utils/paginate";
import type {
  FetchResult,
  LeagueFilters,
  RemoteDataSource,
  SeasonFilters,
  TeamListFilters,
} from "./types";

const log = createLogger("footystats");

type QueryParams = Record<string, string | number | undefined>;

export interface FootyStatsClientOptions {
  apiKey: string;
  baseURL?: string;
  /** Minimum gap between two requests. */
  minDelayMs?: number;
  adapter?: AxiosAdapter;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

const wirePagerSchema = z.object({
  current_page: z.coerce.number().int(),
  max_page: z.coerce.number().int(),
  results_per_page: z.coerce.number().int().optional(),
  total_results: z.coerce.number().int().optional(),
});

const responseSchema = z.object({
  success: z.boolean().optional(),
  message: z.string().optional(),
  data: z.unknown(),
  pager: wirePagerSchema.optional(),
});

function compact(params: QueryParams): Record<string, string | number> {
  const result: Record<string, string | number> = {};
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) result[key] = value;
  }
  return result;
}

export function parseResponseBody(body: unknown, endpoint: string): FetchResult {
  const parsed = responseSchema.safeParse(body);
  if (!parsed.success) {
    return { ok: false, error: `Malformed response from ${endpoint}: ${parsed.error.issues[0]?.message ?? "invalid body"}` };
  }

  const { data, pager, message } = parsed.data;
  if (data === undefined || data === null) {
    return { ok: false, error: `No data in response from ${endpoint}${message ? `: ${message}` : ""}` };
  }

  return {
    ok: true,
    payload: {
      data,
      pager: pager && {
        currentPage: pager.current_page,
        maxPage: pager.max_page,
        resultsPerPage: pager.results_per_page,
        totalResults: pager.total_results,
      },
    },
  };
}

/**
 * FootyStats API client (https://api.football-data-api.com).
 *
 * Requests are spaced by `minDelayMs` to stay under the 1800 requests/hour quota.
 */
export class FootyStatsClient implements RemoteDataSource {
  private readonly client: AxiosInstance;
  private readonly minDelayMs: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private nextRequestAt = 0;

  constructor(options: FootyStatsClientOptions) {
    this.minDelayMs = options.minDelayMs ?? DEFAULT_REQUEST_DELAY_MS;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? (ms => new Promise(resolve => setTimeout(resolve, ms)));

    this.client = axios.create({
      baseURL: options.baseURL ?? DEFAULT_BASE_URL,
      timeout: 30_000,
      adapter: options.adapter,
    });

    const apiKey = options.apiKey;
    this.client.interceptors.request.use(async (config) => {
      const wait = this.nextRequestAt - this.now();
      if (wait > 0) {
        await this.sleep(wait);
      }
      this.nextRequestAt = this.now() + this.minDelayMs;
      config.params = { ...config.params, key: apiKey };
      return config;
    });
  }

  getCountries(): Promise<FetchResult> {
    return this.request("country-list");
  }

  getLeagues(filters: LeagueFilters = {}): Promise<FetchResult> {
    return this.request("league-list", {
      chosen_leagues_only: filters.chosenOnly ? "true" : undefined,
      country: filters.countryId,
    });
  }

  /** Up to 200 matches on the given day (today when no date). */
  getMatches(filters: { date?: string } = {}): Promise<FetchResult> {
    return this.request("todays-matches", {
      timezone: "Europe/London",
      date: filters.date,
    });
  }

  getLeagueStats({ seasonId, maxTime }: SeasonFilters): Promise<FetchResult> {
    return this.request("league-statistics", { season_id: seasonId, max_time: maxTime });
  }

  getSchedule({ seasonId, maxTime }: SeasonFilters): Promise<FetchResult> {
    return this.requestAllPages("league-matches", {
      season_id: seasonId,
      max_per_page: 1000,
      max_time: maxTime,
    });
  }

  getLeagueTeams({ seasonId, stats, maxTime }: TeamListFilters): Promise<FetchResult> {
    return this.request("league-teams", {
      season_id: seasonId,
      include: stats ? "stats" : undefined,
      max_time: maxTime,
    });
  }

  getLeaguePlayers({ seasonId, maxTime }: SeasonFilters): Promise<FetchResult> {
    return this.requestAllPages("league-players", { season_id: seasonId, max_time: maxTime });
  }

  getLeagueReferees({ seasonId, maxTime }: SeasonFilters): Promise<FetchResult> {
    return this.request("league-referees", { season_id: seasonId, max_time: maxTime });
  }

  getLeagueTable({ seasonId, maxTime }: SeasonFilters): Promise<FetchResult> {
    return this.request("league-tables", { season_id: seasonId, max_time: maxTime });
  }

  getTeam({ teamId }: { teamId: number }): Promise<FetchResult> {
    return this.request("team", { team_id: teamId });
  }

  /** Last 5, 6 and 10 match stats in one call. */
  getTeamForm({ teamId }: { teamId: number }): Promise<FetchResult> {
    return this.request("lastx", { team_id: teamId });
  }

  getMatchDetails({ matchId }: { matchId: number }): Promise<FetchResult> {
    return this.request("match", { match_id: matchId });
  }

  getPlayerStats({ playerId }: { playerId: number }): Promise<FetchResult> {
    return this.request("player-stats", { player_id: playerId });
  }

  getRefereeStats({ refereeId }: { refereeId: number }): Promise<FetchResult> {
    return this.request("referee", { referee_id: refereeId });
  }

  getBttsStats(): Promise<FetchResult> {
    return this.request("stats-data-btts");
  }

  getOver25Stats(): Promise<FetchResult> {
    return this.request("stats-data-over25");
  }

  private requestAllPages(endpoint: string, params: QueryParams): Promise<FetchResult> {
    return fetchAllPages(page => this.request(endpoint, { ...params, page }), endpoint);
  }

  private async request(endpoint: string, params: QueryParams = {}): Promise<FetchResult> {
    try {
      const response = await this.client.get<unknown>(`/${endpoint}`, { params: compact(params) });
      const result = parseResponseBody(response.data, endpoint);
      if (!result.ok) {
        log.warn(result.error);
      }
      return result;
    } catch (error) {
      if (axios.isAxiosError(error)) {
        const status = error.response?.status;
        const message = status
          ? `HTTP ${status} from ${endpoint}`
          : `Request to ${endpoint} failed: ${error.message}`;
        log.error(message);
        return { ok: false, error: message, status };
      }
      const message = `Request to ${endpoint} failed: ${errorMessage(error)}`;
      log.error(message);
      return { ok: false, error: message };
    }
  }
}
