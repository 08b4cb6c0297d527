import type { Hero, MatchFilter, MatchPage, MatchRecord, Team, UpsertOutcome } from "../types/match.js";

export interface MatchStore {
  upsert(record: MatchRecord): Promise<UpsertOutcome>;
  /** Newest first. Each iteration starts over from `filter.cursor`. */
  query(filter?: MatchFilter): AsyncIterable<MatchRecord>;
  queryPage(filter?: MatchFilter, page?: { cursor?: string; limit?: number }): Promise<MatchPage>;
  get(matchId: string): Promise<MatchRecord | null>;
  upsertHeroes(heroes: Hero[]): Promise<void>;
  listTeams(): Promise<Team[]>;
  listHeroes(): Promise<Hero[]>;
  close(): Promise<void>;
}

export const DEFAULT_PAGE_SIZE = 100;
export const MAX_PAGE_SIZE = 500;

const CURSOR_SEPARATOR = "|";

export interface MatchCursor {
  startTime: string;
  matchId: string;
}

export const clampPageSize = (limit?: number): number => {
  if (!limit || !Number.isFinite(limit) || limit < 1) return DEFAULT_PAGE_SIZE;
  return Math.min(Math.floor(limit), MAX_PAGE_SIZE);
};

export const buildMatchCursor = ({ startTime, matchId }: MatchCursor): string =>
  `${startTime}${CURSOR_SEPARATOR}${matchId}`;

export const parseMatchCursor = (cursor: string): MatchCursor | null => {
  const [iso, matchId] = cursor.split(CURSOR_SEPARATOR);
  if (!iso || !matchId) return null;
  const startTime = new Date(iso);
  if (!Number.isFinite(startTime.getTime())) return null;
  return { startTime: startTime.toISOString(), matchId };
};

export function nextCursorFor(items: MatchRecord[], limit: number): string | null {
  if (items.length < limit) return null;
  const last = items[items.length - 1];
  return buildMatchCursor({ startTime: last.startTime, matchId: last.matchId });
}

/**
 * Lazy keyset pagination over `loadPage`. The returned iterable restarts from
 * `filter.cursor` every time it is iterated.
 */
export function paginateMatches(
  filter: MatchFilter,
  loadPage: (filter: MatchFilter, page: { cursor?: string; limit: number }) => Promise<MatchPage>
): AsyncIterable<MatchRecord> {
  const limit = clampPageSize(filter.pageSize);
  return {
    async *[Symbol.asyncIterator]() {
      let cursor = filter.cursor;
      while (true) {
        const page = await loadPage(filter, { cursor, limit });
        yield* page.items;
        if (!page.nextCursor) return;
        cursor = page.nextCursor;
      }
    }
  };
}

/** Same predicate the SQL stores express in their WHERE clauses. */
export function recordMatchesFilter(record: MatchRecord, filter: MatchFilter): boolean {
  if (filter.from && record.startTime < filter.from.toISOString()) return false;
  if (filter.to && record.startTime > filter.to.toISOString()) return false;
  if (filter.patch !== undefined && record.patch !== filter.patch) return false;
  if (filter.leagueId !== undefined && record.leagueId !== filter.leagueId) return false;
  if (filter.teamId !== undefined && record.radiant.teamId !== filter.teamId && record.dire.teamId !== filter.teamId) {
    return false;
  }
  return true;
}

export function isAfterCursor(record: MatchRecord, cursor: MatchCursor): boolean {
  if (record.startTime !== cursor.startTime) return record.startTime < cursor.startTime;
  return record.matchId < cursor.matchId;
}

export function compareNewestFirst(a: MatchRecord, b: MatchRecord): number {
  if (a.startTime !== b.startTime) return a.startTime < b.startTime ? 1 : -1;
  if (a.matchId === b.matchId) return 0;
  return a.matchId < b.matchId ? 1 : -1;
}
