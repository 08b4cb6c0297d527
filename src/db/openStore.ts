import type { AppEnv } from "../config/env.js";
import type { MatchStore } from "../services/matchStore.js";
import { SqliteMatchRepository } from "../services/matchRepository.js";
import { MemoryMatchStore } from "../services/memoryMatchStore.js";
import { PostgresMatchRepository } from "../services/postgresMatchRepository.js";
import { createPostgresPool } from "./postgres.js";
import { openSqliteDatabase } from "./sqlite.js";

type StoreEnv = Pick<AppEnv, "DB_PROVIDER" | "DATABASE_URL" | "MATCH_DB_PATH">;

export async function openMatchStore(config: StoreEnv): Promise<MatchStore> {
  if (config.DB_PROVIDER === "postgres") {
    if (!config.DATABASE_URL) {
      throw new Error("DATABASE_URL is required when DB_PROVIDER=postgres.");
    }
    const pool = await createPostgresPool(config.DATABASE_URL);
    console.log("[db] Using postgres provider for match storage.");
    return new PostgresMatchRepository(pool);
  }

  if (config.DB_PROVIDER === "memory") {
    console.log("[db] Using in-memory match storage; nothing is persisted.");
    return new MemoryMatchStore();
  }

  const db = await openSqliteDatabase(config.MATCH_DB_PATH);
  console.log(`[db] Using sqlite provider at ${config.MATCH_DB_PATH}.`);
  return new SqliteMatchRepository(db);
}
