import { createApp } from "./app.js";
import { env } from "./config/env.js";
import { openMatchStore } from "./db/openStore.js";
import { MatchIngestionService } from "./services/ingestionService.js";
import { OpenDotaMatchFetcher } from "./services/matchFetcher.js";
import { OpenDotaClient } from "./services/openDotaClient.js";
import { startScheduledIngestion, type ScheduledIngestionHandle } from "./services/scheduledIngestion.js";

async function bootstrap(): Promise<void> {
  const store = await openMatchStore(env);

  const client = new OpenDotaClient({
    baseUrl: env.OPENDOTA_BASE_URL,
    apiKey: env.OPENDOTA_API_KEY,
    minIntervalMs: env.OPENDOTA_REQUEST_MIN_INTERVAL_MS,
    requestTimeoutMs: env.OPENDOTA_REQUEST_TIMEOUT_MS,
    rateLimitCooldownMs: env.OPENDOTA_RATE_LIMIT_COOLDOWN_SECONDS * 1000
  });
  const ingestionService = new MatchIngestionService(new OpenDotaMatchFetcher(client), store, {
    maxRetries: env.INGEST_MAX_RETRIES,
    retryBaseMs: env.INGEST_RETRY_BASE_MS,
    defaultLimit: env.INGEST_DEFAULT_LIMIT
  });

  let schedule: ScheduledIngestionHandle | undefined;
  if (env.SCHEDULED_INGEST_ENABLED) {
    schedule = startScheduledIngestion(ingestionService, {
      hourUtc: env.SCHEDULED_INGEST_HOUR_UTC,
      lookbackDays: env.SCHEDULED_INGEST_LOOKBACK_DAYS,
      limit: env.INGEST_DEFAULT_LIMIT
    });
    console.log(
      `[scheduled-ingest] enabled at ${env.SCHEDULED_INGEST_HOUR_UTC}:00 UTC, lookback ${env.SCHEDULED_INGEST_LOOKBACK_DAYS}d`
    );
  }

  const { app, cancelIngestion } = createApp({
    store,
    ingestionService,
    corsOrigin: env.CORS_ORIGIN,
    adminApiToken: env.ADMIN_API_TOKEN
  });

  const server = app.listen(env.PORT, () => {
    console.log(`dota-match-ingest listening on http://localhost:${env.PORT}`);
  });

  const shutdown = (signal: string): void => {
    console.log(`[server] ${signal} received, shutting down.`);
    schedule?.stop();
    if (cancelIngestion()) {
      console.log("[server] cancelled the running ingestion.");
    }
    server.close(() => {
      store
        .close()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          console.error("[db] Failed to close match store:", error);
          process.exit(1);
        });
    });
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

bootstrap().catch((error) => {
  console.error("Failed to start dota match ingest service:", error);
  process.exit(1);
});
