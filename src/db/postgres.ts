import { Pool, type PoolClient } from "pg";

export async function withClient<T>(pool: Pool, handler: (client: PoolClient) => Promise<T>): Promise<T> {
  const client = await pool.connect();
  try {
    return await handler(client);
  } finally {
    client.release();
  }
}

export async function withTransaction<T>(pool: Pool, handler: (client: PoolClient) => Promise<T>): Promise<T> {
  return withClient(pool, async (client) => {
    await client.query("BEGIN");
    try {
      const result = await handler(client);
      await client.query("COMMIT");
      return result;
    } catch (error) {
      await client.query("ROLLBACK");
      throw error;
    }
  });
}

/** Creates a pool and applies the schema. The caller owns the pool and must end it. */
export async function createPostgresPool(connectionString: string): Promise<Pool> {
  const pool = new Pool({
    connectionString,
    ssl: connectionString.includes("localhost") ? false : { rejectUnauthorized: false }
  });

  try {
    await withClient(pool, async (client) => {
      await client.query(`
        CREATE TABLE IF NOT EXISTS teams (
          team_id TEXT PRIMARY KEY,
          name TEXT NOT NULL,
          updated_at TIMESTAMPTZ NOT NULL
        );
      `);
      await client.query(`
        CREATE TABLE IF NOT EXISTS heroes (
          hero_id INTEGER PRIMARY KEY,
          name TEXT NOT NULL
        );
      `);
      await client.query(`
        CREATE TABLE IF NOT EXISTS matches (
          match_id TEXT COLLATE "C" PRIMARY KEY,
          start_time TIMESTAMPTZ NOT NULL,
          patch TEXT NOT NULL,
          league_id INTEGER,
          radiant_team_id TEXT NOT NULL REFERENCES teams (team_id),
          dire_team_id TEXT NOT NULL REFERENCES teams (team_id),
          winner_team_id TEXT NOT NULL,
          record_json JSONB NOT NULL,
          ingested_at TIMESTAMPTZ NOT NULL,
          updated_at TIMESTAMPTZ NOT NULL
        );
      `);
      await client.query(`
        CREATE INDEX IF NOT EXISTS idx_matches_start_time
          ON matches (start_time DESC, match_id DESC);
      `);
      await client.query(`CREATE INDEX IF NOT EXISTS idx_matches_patch ON matches (patch);`);
      await client.query(`CREATE INDEX IF NOT EXISTS idx_matches_league ON matches (league_id);`);
      await client.query(`CREATE INDEX IF NOT EXISTS idx_matches_radiant_team ON matches (radiant_team_id);`);
      await client.query(`CREATE INDEX IF NOT EXISTS idx_matches_dire_team ON matches (dire_team_id);`);
    });
  } catch (error) {
    await pool.end();
    throw error;
  }

  return pool;
}
