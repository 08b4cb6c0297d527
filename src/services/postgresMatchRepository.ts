import type { Pool } from "pg";
import { withTransaction } from "../db/postgres.js";
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

interface ExistingRow {
  same: boolean;
}

interface MatchRow {
  record_json: MatchRecord;
}

interface TeamRow {
  team_id: string;
  name: string;
}

interface HeroRow {
  hero_id: number;
  name: string;
}

export class PostgresMatchRepository implements MatchStore {
  private closed = false;

  constructor(private readonly pool: Pool) {}

  private assertOpen(operation: StoreOperation, matchId?: string): void {
    if (this.closed) throw new StoreError("Match store is closed.", { operation, matchId });
  }

  async upsert(record: MatchRecord): Promise<UpsertOutcome> {
    this.assertOpen("upsert", record.matchId);
    const serialized = serializeMatchRecord(record);

    try {
      return await withTransaction(this.pool, async (client): Promise<UpsertOutcome> => {
        const existing = await client.query<ExistingRow>(
          `SELECT record_json = $2::jsonb AS same FROM matches WHERE match_id = $1 FOR UPDATE`,
          [record.matchId, serialized]
        );
        if (existing.rows[0]?.same) return "unchanged";

        for (const team of [record.radiant, record.dire]) {
          await client.query(
            `
              INSERT INTO teams (team_id, name, updated_at) VALUES ($1, $2, NOW())
              ON CONFLICT (team_id) DO UPDATE SET name = EXCLUDED.name, updated_at = EXCLUDED.updated_at
            `,
            [team.teamId, team.name]
          );
        }
        for (const heroId of draftHeroIds(record)) {
          const hero = heroPlaceholder(heroId);
          await client.query(`INSERT INTO heroes (hero_id, name) VALUES ($1, $2) ON CONFLICT (hero_id) DO NOTHING`, [
            hero.heroId,
            hero.name
          ]);
        }

        await client.query(
          `
            INSERT INTO matches (
              match_id, start_time, patch, league_id, radiant_team_id, dire_team_id,
              winner_team_id, record_json, ingested_at, updated_at
            ) VALUES ($1, $2::timestamptz, $3, $4, $5, $6, $7, $8::jsonb, NOW(), NOW())
            ON CONFLICT (match_id) DO UPDATE SET
              start_time = EXCLUDED.start_time,
              patch = EXCLUDED.patch,
              league_id = EXCLUDED.league_id,
              radiant_team_id = EXCLUDED.radiant_team_id,
              dire_team_id = EXCLUDED.dire_team_id,
              winner_team_id = EXCLUDED.winner_team_id,
              record_json = EXCLUDED.record_json,
              updated_at = EXCLUDED.updated_at
          `,
          [
            record.matchId,
            record.startTime,
            record.patch,
            record.leagueId,
            record.radiant.teamId,
            record.dire.teamId,
            record.winnerTeamId,
            serialized
          ]
        );
        return existing.rows.length === 0 ? "inserted" : "updated";
      });
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

    try {
      const result = await this.pool.query<MatchRow>(
        `
          SELECT record_json
          FROM matches
          WHERE ($1::timestamptz IS NULL OR start_time >= $1)
            AND ($2::timestamptz IS NULL OR start_time <= $2)
            AND ($3::text IS NULL OR radiant_team_id = $3 OR dire_team_id = $3)
            AND ($4::text IS NULL OR patch = $4)
            AND ($5::integer IS NULL OR league_id = $5)
            AND ($6::timestamptz IS NULL OR (start_time, match_id) < ($6, $7::text))
          ORDER BY start_time DESC, match_id DESC
          LIMIT $8
        `,
        [
          filter.from?.toISOString() ?? null,
          filter.to?.toISOString() ?? null,
          filter.teamId ?? null,
          filter.patch ?? null,
          filter.leagueId ?? null,
          cursor?.startTime ?? null,
          cursor?.matchId ?? null,
          limit
        ]
      );
      const items = result.rows.map((row) => row.record_json);
      return { items, nextCursor: nextCursorFor(items, limit) };
    } catch (error) {
      throw toStoreError(error, "query");
    }
  }

  async get(matchId: string): Promise<MatchRecord | null> {
    this.assertOpen("get", matchId);
    try {
      const result = await this.pool.query<MatchRow>(`SELECT record_json FROM matches WHERE match_id = $1 LIMIT 1`, [
        matchId
      ]);
      return result.rows[0]?.record_json ?? null;
    } catch (error) {
      throw toStoreError(error, "get", matchId);
    }
  }

  async upsertHeroes(heroes: Hero[]): Promise<void> {
    this.assertOpen("upsertHeroes");
    if (heroes.length === 0) return;
    try {
      await withTransaction(this.pool, async (client) => {
        for (const hero of heroes) {
          await client.query(
            `INSERT INTO heroes (hero_id, name) VALUES ($1, $2) ON CONFLICT (hero_id) DO UPDATE SET name = EXCLUDED.name`,
            [hero.heroId, hero.name]
          );
        }
      });
    } catch (error) {
      throw toStoreError(error, "upsertHeroes");
    }
  }

  async listTeams(): Promise<Team[]> {
    this.assertOpen("listTeams");
    try {
      const result = await this.pool.query<TeamRow>(`SELECT team_id, name FROM teams ORDER BY name`);
      return result.rows.map((row) => ({ teamId: row.team_id, name: row.name }));
    } catch (error) {
      throw toStoreError(error, "listTeams");
    }
  }

  async listHeroes(): Promise<Hero[]> {
    this.assertOpen("listHeroes");
    try {
      const result = await this.pool.query<HeroRow>(`SELECT hero_id, name FROM heroes ORDER BY hero_id`);
      return result.rows.map((row) => ({ heroId: row.hero_id, name: row.name }));
    } catch (error) {
      throw toStoreError(error, "listHeroes");
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    try {
      await this.pool.end();
    } catch (error) {
      throw toStoreError(error, "close");
    }
  }
}
