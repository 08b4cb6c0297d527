import { z } from "zod";
import dotenv from "dotenv";

dotenv.config();

const booleanFlag = (fallback: "true" | "false") =>
  z.enum(["true", "false"]).optional().default(fallback).transform((v) => v === "true");

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(4000),
  CORS_ORIGIN: z.string().default("*"),
  OPENDOTA_BASE_URL: z.string().url().default("https://api.opendota.com/api"),
  OPENDOTA_API_KEY: z.string().min(8).optional(),
  OPENDOTA_REQUEST_MIN_INTERVAL_MS: z.coerce.number().int().nonnegative().default(1000),
  OPENDOTA_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
  OPENDOTA_RATE_LIMIT_COOLDOWN_SECONDS: z.coerce.number().int().positive().default(60),
  INGEST_MAX_RETRIES: z.coerce.number().int().nonnegative().default(3),
  INGEST_RETRY_BASE_MS: z.coerce.number().int().nonnegative().default(1000),
  INGEST_DEFAULT_LIMIT: z.coerce.number().int().positive().default(200),
  DB_PROVIDER: z.enum(["sqlite", "postgres", "memory"]).default("sqlite"),
  DATABASE_URL: z.string().url().optional(),
  MATCH_DB_PATH: z.string().min(1).default("./data/dota-matches.db"),
  SCHEDULED_INGEST_ENABLED: booleanFlag("false"),
  SCHEDULED_INGEST_HOUR_UTC: z.coerce.number().int().min(0).max(23).default(4),
  SCHEDULED_INGEST_LOOKBACK_DAYS: z.coerce.number().int().positive().default(2),
  ADMIN_API_TOKEN: z.string().min(12).optional()
});

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  console.error("Invalid environment variables:", parsed.error.flatten().fieldErrors);
  throw new Error("Environment variable validation failed.");
}

export const env = parsed.data;
export type AppEnv = typeof env;
