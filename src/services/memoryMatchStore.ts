import {
  draftHeroIds,
  heroPlaceholder,
  serializeMatchRecord,
  type Hero,
  type MatchFilter,
  type MatchPage,
  type MatchRecord,
  type Team,
  type UpsertOutcome
} from "../types/match.js";
import { StoreError, type StoreOperation } from "./errors.js";
import {
  clampPageSize,
  compareNewestFirst,
  isAfterCursor,
  nextCursorFor,
  paginateMatches,
  parseMatchCursor,
  recordMatchesFilter,
  type MatchStore
} from "./matchStore.js";

/** In-process store. Records are kept as serialized snapshots so callers never share state with it. */
export class MemoryMatchStore implements MatchStore {
  private readonly matches = new Map<string, string>();
  private readonly teams = new Map<string, Team>();
  private readonly heroes = new Map<number, Hero>();
  private closed = false;

  private assertOpen(operation: StoreOperation, matchId?: string): void {
    if (this.closed) throw new StoreError("Match store is closed.", { operation, matchId });
  }

  async upsert(record: MatchRecord): Promise<UpsertOutcome> {
    this.assertOpen("upsert", record.matchId);
    const serialized = serializeMatchRecord(record);
    const existing = this.matches.get(record.matchId);
    if (existing === serialized) return "unchanged";

    this.matches.set(record.matchId, serialized);
    for (const team of [record.radiant, record.dire]) {
      this.teams.set(team.teamId, { teamId: team.teamId, name: team.name });
    }
    for (const heroId of draftHeroIds(record)) {
      if (!this.heroes.has(heroId)) this.heroes.set(heroId, heroPlaceholder(heroId));
    }
    return existing === undefined ? "inserted" : "updated";
  }

  query(filter: MatchFilter = {}): AsyncIterable<MatchRecord> {
    return paginateMatches(filter, (current, page) => this.queryPage(current, page));
  }

  async queryPage(filter: MatchFilter = {}, page: { cursor?: string; limit?: number } = {}): Promise<MatchPage> {
    this.assertOpen("query");
    const limit = clampPageSize(page.limit);
    const cursor = page.cursor ? parseMatchCursor(page.cursor) : null;
    if (page.cursor && !cursor) throw new StoreError(`Invalid cursor "${page.cursor}".`, { operation: "query" });

    const items = [...this.matches.values()]
      .map((serialized): MatchRecord => JSON.parse(serialized))
      .filter((record) => recordMatchesFilter(record, filter))
      .filter((record) => !cursor || isAfterCursor(record, cursor))
      .sort(compareNewestFirst)
      .slice(0, limit);

    return { items, nextCursor: nextCursorFor(items, limit) };
  }

  async get(matchId: string): Promise<MatchRecord | null> {
    this.assertOpen("get", matchId);
    const serialized = this.matches.get(matchId);
    return serialized === undefined ? null : JSON.parse(serialized);
  }

  async upsertHeroes(heroes: Hero[]): Promise<void> {
    this.assertOpen("upsertHeroes");
    for (const hero of heroes) {
      this.heroes.set(hero.heroId, { heroId: hero.heroId, name: hero.name });
    }
  }

  async listTeams(): Promise<Team[]> {
    this.assertOpen("listTeams");
    return [...this.teams.values()]
      .map((team) => ({ ...team }))
      .sort((a, b) => a.name.localeCompare(b.name));
  }

  async listHeroes(): Promise<Hero[]> {
    this.assertOpen("listHeroes");
    return [...this.heroes.values()].map((hero) => ({ ...hero })).sort((a, b) => a.heroId - b.heroId);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
