/**
 * Record normalization
 *
 * Turns FootyStats payloads into flat records for the store. Only shapes that would otherwise
 * land as opaque JSON (league seasons, team stats, last-X form windows, aggregate categories)
 * get special handling.
 */

import { isPlainObject, type StoreRecord } from "../store/storage-class";

function isPresent(value: unknown): boolean {
  return value !== undefined && value !== null;
}

/** Arrays yield their object elements, a single object yields itself, anything else nothing. */
export function toRecords(data: unknown): StoreRecord[] {
  if (Array.isArray(data)) {
    return data.filter(isPlainObject).map(item => ({ ...item }));
  }
  if (isPlainObject(data)) {
    return [{ ...data }];
  }
  return [];
}

/**
 * One record per league season: the league's own fields plus `id` (season id) and
 * `season` (season year). A league-level `id` is kept as `league_id`.
 */
export function flattenLeagueSeasons(data: unknown): StoreRecord[] {
  const records: StoreRecord[] = [];

  for (const league of toRecords(data)) {
    const seasons = league.season;
    if (!Array.isArray(seasons)) continue;

    const parent: StoreRecord = {};
    for (const [key, value] of Object.entries(league)) {
      if (key === "season" || key === "id") continue;
      parent[key] = value;
    }
    if (isPresent(league.id)) {
      parent.league_id = league.id;
    }

    for (const season of seasons) {
      if (!isPlainObject(season)) continue;
      records.push({ id: season.id, ...parent, season: season.year });
    }
  }

  return records;
}

/** Replaces a nested `stats` object with `stats_<key>` fields on the record itself. */
export function hoistStats(record: StoreRecord, field = "stats"): StoreRecord {
  const nested = record[field];
  if (!isPlainObject(nested)) return record;

  const flat: StoreRecord = {};
  for (const [key, value] of Object.entries(record)) {
    if (key !== field) flat[key] = value;
  }
  for (const [key, value] of Object.entries(nested)) {
    flat[`${field}_${key}`] = value;
  }
  return flat;
}

/**
 * Last-X records share the team's id across the 5/6/10-match windows. Each window gets its
 * own identity `<teamId>:last<N>` and the team id moves to `team_id`.
 */
export function withFormIdentity(record: StoreRecord): StoreRecord {
  const teamId = record.id;
  const window = record.last_x_match_num;
  if (!isPresent(teamId) || !isPresent(window)) return record;

  return { ...record, id: `${String(teamId)}:last${String(window)}`, team_id: teamId };
}

export function stampMissing(record: StoreRecord, field: string, value: unknown): StoreRecord {
  return isPresent(record[field]) ? record : { ...record, [field]: value };
}

/**
 * Aggregate stats (BTTS, Over 2.5) arrive as an object of categories. Each category becomes
 * one record tagged with `category` and the fetch time.
 */
export function expandCategories(data: unknown, fetchedAt: number): StoreRecord[] {
  if (Array.isArray(data)) {
    return toRecords(data).map(record => ({ ...record, fetched_at: fetchedAt }));
  }
  if (!isPlainObject(data)) return [];

  return Object.entries(data).map(([category, value]) =>
    isPlainObject(value)
      ? { ...value, category, fetched_at: fetchedAt }
      : { category, value, fetched_at: fetchedAt }
  );
}
