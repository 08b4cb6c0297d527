import { env } from "../config/env.js";
import { openMatchStore } from "../db/openStore.js";
import { IngestionAbortedError } from "../services/errors.js";
import { MatchIngestionService } from "../services/ingestionService.js";
import { OpenDotaMatchFetcher } from "../services/matchFetcher.js";
import { OpenDotaClient } from "../services/openDotaClient.js";
import {
  checkpointQueryFor,
  clearCheckpoint,
  loadCheckpoint,
  resumeCursorFrom,
  runLeftMatchesBehind,
  saveCheckpoint
} from "./checkpoint.js";
import { parseCliOptions } from "./cliOptions.js";

function formatDuration(ms: number): string {
  const totalSeconds = Math.max(0, Math.floor(ms / 1000));
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  return `${hours}h ${minutes}m ${seconds}s`;
}

async function main(): Promise<void> {
  const startedAt = Date.now();
  const options = parseCliOptions(process.argv.slice(2));

  const checkpointQuery = checkpointQueryFor(options);
  const checkpoint = options.resume && !options.cursor ? await loadCheckpoint(options.checkpointPath) : null;
  const resumeCursor = resumeCursorFrom(checkpoint, checkpointQuery);
  if (resumeCursor) {
    console.log(`[cli] resuming after match ${resumeCursor} (checkpoint saved ${checkpoint?.savedAt ?? "earlier"})`);
  } else if (checkpoint) {
    console.log("[cli] checkpoint was written for a different query; starting from the newest match.");
  }

  const store = await openMatchStore(env);
  const client = new OpenDotaClient({
    baseUrl: env.OPENDOTA_BASE_URL,
    apiKey: env.OPENDOTA_API_KEY,
    minIntervalMs: env.OPENDOTA_REQUEST_MIN_INTERVAL_MS,
    requestTimeoutMs: env.OPENDOTA_REQUEST_TIMEOUT_MS,
    rateLimitCooldownMs: env.OPENDOTA_RATE_LIMIT_COOLDOWN_SECONDS * 1000
  });
  const service = new MatchIngestionService(new OpenDotaMatchFetcher(client), store, {
    maxRetries: env.INGEST_MAX_RETRIES,
    retryBaseMs: env.INGEST_RETRY_BASE_MS,
    defaultLimit: env.INGEST_DEFAULT_LIMIT
  });

  const controller = new AbortController();
  process.once("SIGINT", () => {
    console.log("[cli] SIGINT received; stopping after the current match.");
    controller.abort();
  });

  try {
    if (options.syncHeroes) {
      await service.syncHeroes({ signal: controller.signal });
    }

    const summary = await service.ingest(
      {
        from: options.from,
        to: options.to,
        leagueId: options.leagueId,
        teamId: options.teamId,
        limit: options.limit,
        cursor: options.cursor ?? resumeCursor ?? undefined
      },
      { signal: controller.signal }
    );

    if (runLeftMatchesBehind(summary) && summary.lastCursor) {
      await saveCheckpoint(options.checkpointPath, summary.lastCursor, checkpointQuery);
      console.log(`[cli] checkpoint saved at ${summary.lastCursor}`);
    } else {
      await clearCheckpoint(options.checkpointPath);
    }

    console.log("");
    console.log(`[cli] ${summary.cancelled ? "CANCELLED" : "SUCCESS"}`);
    console.log(`[cli] duration=${formatDuration(Date.now() - startedAt)}`);
    console.log(
      `[cli] fetched=${summary.fetched} inserted=${summary.inserted} updated=${summary.updated} unchanged=${summary.unchanged} malformed=${summary.malformed} retries=${summary.retries}`
    );
    if (summary.malformedIds.length > 0) {
      console.log(`[cli] malformedIds=${summary.malformedIds.join(",")}`);
    }
    console.log(`[cli] lastCursor=${summary.lastCursor ?? "none"}`);
  } catch (error) {
    if (error instanceof IngestionAbortedError && error.context.cursor) {
      await saveCheckpoint(options.checkpointPath, error.context.cursor, checkpointQuery);
      console.error(`[cli] checkpoint saved at ${error.context.cursor}; rerun to resume.`);
    }
    throw error;
  } finally {
    await store.close();
  }
}

main().catch((error) => {
  console.error("[cli] FAILED");
  console.error("[cli] failed:", error);
  process.exit(1);
});
