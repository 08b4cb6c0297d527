import type { IngestQuery, IngestionSummary } from "../types/ingestion.js";
import type { MatchRecord } from "../types/match.js";
import { buildPatchNameMap } from "../utils/patch.js";
import { IngestionAbortedError, MalformedRecordError, StoreError, TransientFetchError } from "./errors.js";
import type { FetchedMatch, MatchFetcher } from "./matchFetcher.js";
import { normalizeMatch, type NormalizeContext } from "./matchNormalizer.js";
import type { MatchStore } from "./matchStore.js";

export type IngestionLogger = Pick<Console, "log" | "warn" | "error">;

export interface MatchIngestionOptions {
  maxRetries?: number;
  retryBaseMs?: number;
  defaultLimit?: number;
  logger?: IngestionLogger;
}

/** Resolves true once `ms` elapsed, false as soon as `signal` aborts. */
export async function sleepUnlessAborted(ms: number, signal?: AbortSignal): Promise<boolean> {
  if (signal?.aborted) return false;
  if (ms <= 0) return true;
  return new Promise((resolve) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve(true);
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class MatchIngestionService {
  private readonly maxRetries: number;
  private readonly retryBaseMs: number;
  private readonly logger: IngestionLogger;

  constructor(
    private readonly fetcher: MatchFetcher,
    private readonly store: MatchStore,
    private readonly options: MatchIngestionOptions = {}
  ) {
    this.maxRetries = Math.max(0, Math.floor(options.maxRetries ?? 3));
    this.retryBaseMs = Math.max(0, options.retryBaseMs ?? 1000);
    this.logger = options.logger ?? console;
  }

  private backoffMs(error: TransientFetchError, attempt: number): number {
    return error.context.retryAfterMs ?? this.retryBaseMs * 2 ** attempt;
  }

  /** Runs `operation`, retrying transient fetch failures. Resolves null when cancelled while waiting. */
  private async withTransientRetry<T>(
    label: string,
    operation: () => Promise<T>,
    onRetry: () => void,
    signal?: AbortSignal
  ): Promise<T | null> {
    for (let attempt = 0; ; attempt += 1) {
      try {
        return await operation();
      } catch (error) {
        if (!(error instanceof TransientFetchError) || attempt >= this.maxRetries) throw error;
        const delayMs = this.backoffMs(error, attempt);
        onRetry();
        this.logger.warn(`[ingest] ${label} failed (${error.message}); retry ${attempt + 1}/${this.maxRetries} in ${delayMs}ms`);
        if (!(await sleepUnlessAborted(delayMs, signal))) return null;
      }
    }
  }

  private async processMatch(
    fetched: FetchedMatch,
    context: NormalizeContext,
    summary: IngestionSummary
  ): Promise<void> {
    let record: MatchRecord;
    try {
      record = normalizeMatch(fetched.payload, context);
    } catch (error) {
      if (!(error instanceof MalformedRecordError)) throw error;
      summary.malformed += 1;
      summary.malformedIds.push(error.context.matchId ?? fetched.matchId);
      this.logger.warn(`[ingest] skipping malformed match ${fetched.matchId}: ${error.message}`);
      return;
    }

    const outcome = await this.store.upsert(record);
    summary[outcome] += 1;
  }

  /**
   * Pulls matches for `query`, normalizes each and upserts it, one at a time.
   * Malformed payloads are skipped; fetch and store failures abort with {@link IngestionAbortedError}.
   */
  async ingest(query: IngestQuery = {}, options: { signal?: AbortSignal } = {}): Promise<IngestionSummary> {
    const started = Date.now();
    const { signal } = options;
    const effectiveQuery: IngestQuery = { ...query, limit: query.limit ?? this.options.defaultLimit };
    const summary: IngestionSummary = {
      query: effectiveQuery,
      fetched: 0,
      inserted: 0,
      updated: 0,
      unchanged: 0,
      malformed: 0,
      malformedIds: [],
      retries: 0,
      cancelled: false,
      lastCursor: query.cursor ?? null,
      durationMs: 0
    };
    const finish = (): IngestionSummary => {
      summary.durationMs = Date.now() - started;
      return summary;
    };
    const abort = (error: unknown): IngestionAbortedError => {
      finish();
      const matchId = error instanceof StoreError ? error.context.matchId : undefined;
      this.logger.error(`[ingest] aborted after ${summary.fetched} matches: ${describe(error)}`);
      return new IngestionAbortedError(
        `Ingestion aborted after ${summary.fetched} matches: ${describe(error)}`,
        { query: effectiveQuery, matchId, cursor: summary.lastCursor, summary },
        { cause: error }
      );
    };
    const countRetry = (): void => {
      summary.retries += 1;
    };

    this.logger.log(`[ingest] starting query=${JSON.stringify(effectiveQuery)}`);

    let context: NormalizeContext;
    try {
      const patches = await this.withTransientRetry("patch catalog", () => this.fetcher.fetchPatches(), countRetry, signal);
      if (patches === null) {
        summary.cancelled = true;
        return finish();
      }
      context = { patchNames: buildPatchNameMap(patches) };
    } catch (error) {
      throw abort(error);
    }

    const limit = effectiveQuery.limit;
    let attempt = 0;
    let done = false;
    while (!done) {
      if (signal?.aborted) {
        summary.cancelled = true;
        break;
      }
      if (limit !== undefined && summary.fetched >= limit) break;

      try {
        const stream = this.fetcher.fetchMatches({
          ...effectiveQuery,
          cursor: summary.lastCursor ?? undefined,
          limit: limit === undefined ? undefined : limit - summary.fetched
        });
        for await (const fetched of stream) {
          if (signal?.aborted) {
            summary.cancelled = true;
            break;
          }
          attempt = 0;
          summary.fetched += 1;
          await this.processMatch(fetched, context, summary);
          summary.lastCursor = fetched.cursor;
        }
        done = true;
      } catch (error) {
        if (!(error instanceof TransientFetchError) || attempt >= this.maxRetries) throw abort(error);

        // Resume from the last fully processed match so nothing is upserted twice.
        const delayMs = this.backoffMs(error, attempt);
        attempt += 1;
        countRetry();
        this.logger.warn(
          `[ingest] transient fetch failure (${error.message}); resuming after ${summary.lastCursor ?? "start"} in ${delayMs}ms (${attempt}/${this.maxRetries})`
        );
        if (!(await sleepUnlessAborted(delayMs, signal))) {
          summary.cancelled = true;
          done = true;
        }
      }
    }

    finish();
    this.logger.log(
      `[ingest] ${summary.cancelled ? "cancelled" : "completed"} fetched=${summary.fetched} inserted=${summary.inserted} updated=${summary.updated} unchanged=${summary.unchanged} malformed=${summary.malformed} retries=${summary.retries} durationMs=${summary.durationMs}`
    );
    return summary;
  }

  /** Replaces placeholder hero names with the API's hero catalog. */
  async syncHeroes(options: { signal?: AbortSignal } = {}): Promise<number> {
    const heroes = await this.withTransientRetry("hero catalog", () => this.fetcher.fetchHeroes(), () => undefined, options.signal);
    if (heroes === null) return 0;
    await this.store.upsertHeroes(heroes);
    this.logger.log(`[ingest] synced ${heroes.length} heroes`);
    return heroes.length;
  }
}
