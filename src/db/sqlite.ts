import fs from "node:fs/promises";
import path from "node:path";
import sqlite3 from "sqlite3";
import { open, type Database } from "sqlite";

const IN_MEMORY = ":memory:";

export async function migrateSqlite(db: Database): Promise<void> {
  await db.exec(`
    CREATE TABLE IF NOT EXISTS teams (
      team_id TEXT PRIMARY KEY,
      name TEXT NOT NULL,
      updated_at TEXT NOT NULL
    );
    CREATE TABLE IF NOT EXISTS heroes (
      hero_id INTEGER PRIMARY KEY,
      name TEXT NOT NULL
    );
    CREATE TABLE IF NOT EXISTS matches (
      match_id TEXT PRIMARY KEY,
      start_time TEXT NOT NULL,
      patch TEXT NOT NULL,
      league_id INTEGER,
      radiant_team_id TEXT NOT NULL REFERENCES teams (team_id),
      dire_team_id TEXT NOT NULL REFERENCES teams (team_id),
      winner_team_id TEXT NOT NULL,
      record_json TEXT NOT NULL,
      ingested_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_matches_start_time ON matches (start_time DESC, match_id DESC);
    CREATE INDEX IF NOT EXISTS idx_matches_patch ON matches (patch);
    CREATE INDEX IF NOT EXISTS idx_matches_radiant_team ON matches (radiant_team_id);
    CREATE INDEX IF NOT EXISTS idx_matches_dire_team ON matches (dire_team_id);
    CREATE INDEX IF NOT EXISTS idx_matches_league ON matches (league_id);
  `);
}

/** Opens (creating if needed) the match database. The caller owns the handle and must close it. */
export async function openSqliteDatabase(filename: string): Promise<Database> {
  let target = filename;
  if (filename !== IN_MEMORY) {
    target = path.isAbsolute(filename) ? filename : path.resolve(process.cwd(), filename);
    await fs.mkdir(path.dirname(target), { recursive: true });
  }

  const db = await open({
    filename: target,
    driver: sqlite3.Database
  });
  await db.exec("PRAGMA foreign_keys = ON");
  if (target !== IN_MEMORY) await db.exec("PRAGMA journal_mode = WAL");

  try {
    await migrateSqlite(db);
  } catch (error) {
    await db.close();
    throw error;
  }
  return db;
}
