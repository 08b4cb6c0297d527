import type { Database } from "sqlite";
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
import { StoreError, toStoreError, type StoreOperation } from "./errors.js";
import { clampPageSize, nextCursorFor, paginateMatches, parseMatchCursor, type MatchStore } from "./matchStore.js";

interface MatchRow {
  record_json: string;
}

interface TeamRow {
  team_id: string;
  name: string;
}

interface HeroRow {
  hero_id: number;
  name: string;
}

export class SqliteMatchRepository implements MatchStore {
  private writeQueue: Promise<void> = Promise.resolve();
  private closed = false;

  constructor(private readonly db: Database) {}

  // One connection cannot hold two transactions, so writes run one at a time.
  private serialize<T>(handler: () => Promise<T>): Promise<T> {
    const task = this.writeQueue.then(handler);
    this.writeQueue = task.then(
      () => undefined,
      () => undefined
    );
    return task;
  }

  private async inTransaction<T>(handler: () => Promise<T>): Promise<T> {
    await this.db.exec("BEGIN IMMEDIATE TRANSACTION");
    try {
      const result = await handler();
      await this.db.exec("COMMIT");
      return result;
    } catch (error) {
      await this.db.exec("ROLLBACK");
      throw error;
    }
  }

  private assertOpen(operation: StoreOperation, matchId?: string): void {
    if (this.closed) throw new StoreError("Match store is closed.", { operation, matchId });
  }

  async upsert(record: MatchRecord): Promise<UpsertOutcome> {
    this.assertOpen("upsert", record.matchId);
    const serialized = serializeMatchRecord(record);

    try {
      return await this.serialize(() =>
        this.inTransaction(async (): Promise<UpsertOutcome> => {
          const existing = await this.db.get<MatchRow>(`SELECT record_json FROM matches WHERE match_id = ?`, [
            record.matchId
          ]);
          if (existing?.record_json === serialized) return "unchanged";

          const now = new Date().toISOString();
          for (const team of [record.radiant, record.dire]) {
            await this.db.run(
              `
                INSERT INTO teams (team_id, name, updated_at) VALUES (?, ?, ?)
                ON CONFLICT(team_id) DO UPDATE SET name = excluded.name, updated_at = excluded.updated_at
              `,
              [team.teamId, team.name, now]
            );
          }
          for (const heroId of draftHeroIds(record)) {
            const hero = heroPlaceholder(heroId);
            await this.db.run(`INSERT INTO heroes (hero_id, name) VALUES (?, ?) ON CONFLICT(hero_id) DO NOTHING`, [
              hero.heroId,
              hero.name
            ]);
          }

          await this.db.run(
            `
              INSERT INTO matches (
                match_id, start_time, patch, league_id, radiant_team_id, dire_team_id,
                winner_team_id, record_json, ingested_at, updated_at
              ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
              ON CONFLICT(match_id) DO UPDATE SET
                start_time = excluded.start_time,
                patch = excluded.patch,
                league_id = excluded.league_id,
                radiant_team_id = excluded.radiant_team_id,
                dire_team_id = excluded.dire_team_id,
                winner_team_id = excluded.winner_team_id,
                record_json = excluded.record_json,
                updated_at = excluded.updated_at
            `,
            [
              record.matchId,
              record.startTime,
              record.patch,
              record.leagueId,
              record.radiant.teamId,
              record.dire.teamId,
              record.winnerTeamId,
              serialized,
              now,
              now
            ]
          );
          return existing ? "updated" : "inserted";
        })
      );
    } catch (error) {
      throw toStoreError(error, "upsert", record.matchId);
    }
  }

  query(filter: MatchFilter = {}): AsyncIterable<MatchRecord> {
    return paginateMatches(filter, (current, page) => this.queryPage(current, page));
  }

  async queryPage(filter: MatchFilter = {}, page: { cursor?: string; limit?: number } = {}): Promise<MatchPage> {
    this.assertOpen("query");
    const limit = clampPageSize(page.limit);
    const cursor = page.cursor ? parseMatchCursor(page.cursor) : null;
    if (page.cursor && !cursor) throw new StoreError(`Invalid cursor "${page.cursor}".`, { operation: "query" });

    const from = filter.from?.toISOString() ?? null;
    const to = filter.to?.toISOString() ?? null;
    const teamId = filter.teamId ?? null;
    const patch = filter.patch ?? null;
    const leagueId = filter.leagueId ?? null;
    const cursorTime = cursor?.startTime ?? null;
    const cursorId = cursor?.matchId ?? null;

    try {
      const rows = await this.db.all<MatchRow[]>(
        `
          SELECT record_json
          FROM matches
          WHERE (? IS NULL OR start_time >= ?)
            AND (? IS NULL OR start_time <= ?)
            AND (? IS NULL OR radiant_team_id = ? OR dire_team_id = ?)
            AND (? IS NULL OR patch = ?)
            AND (? IS NULL OR league_id = ?)
            AND (? IS NULL OR start_time < ? OR (start_time = ? AND match_id < ?))
          ORDER BY start_time DESC, match_id DESC
          LIMIT ?
        `,
        [
          from, from,
          to, to,
          teamId, teamId, teamId,
          patch, patch,
          leagueId, leagueId,
          cursorTime, cursorTime, cursorTime, cursorId,
          limit
        ]
      );
      const items = rows.map((row): MatchRecord => JSON.parse(row.record_json));
      return { items, nextCursor: nextCursorFor(items, limit) };
    } catch (error) {
      throw toStoreError(error, "query");
    }
  }

  async get(matchId: string): Promise<MatchRecord | null> {
    this.assertOpen("get", matchId);
    try {
      const row = await this.db.get<MatchRow>(`SELECT record_json FROM matches WHERE match_id = ? LIMIT 1`, [matchId]);
      return row ? JSON.parse(row.record_json) : null;
    } catch (error) {
      throw toStoreError(error, "get", matchId);
    }
  }

  async upsertHeroes(heroes: Hero[]): Promise<void> {
    this.assertOpen("upsertHeroes");
    if (heroes.length === 0) return;
    try {
      await this.serialize(() =>
        this.inTransaction(async () => {
          for (const hero of heroes) {
            await this.db.run(
              `INSERT INTO heroes (hero_id, name) VALUES (?, ?) ON CONFLICT(hero_id) DO UPDATE SET name = excluded.name`,
              [hero.heroId, hero.name]
            );
          }
        })
      );
    } catch (error) {
      throw toStoreError(error, "upsertHeroes");
    }
  }

  async listTeams(): Promise<Team[]> {
    this.assertOpen("listTeams");
    try {
      const rows = await this.db.all<TeamRow[]>(`SELECT team_id, name FROM teams ORDER BY name`);
      return rows.map((row) => ({ teamId: row.team_id, name: row.name }));
    } catch (error) {
      throw toStoreError(error, "listTeams");
    }
  }

  async listHeroes(): Promise<Hero[]> {
    this.assertOpen("listHeroes");
    try {
      const rows = await this.db.all<HeroRow[]>(`SELECT hero_id, name FROM heroes ORDER BY hero_id`);
      return rows.map((row) => ({ heroId: row.hero_id, name: row.name }));
    } catch (error) {
      throw toStoreError(error, "listHeroes");
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    try {
      await this.writeQueue;
      await this.db.close();
    } catch (error) {
      throw toStoreError(error, "close");
    }
  }
}
