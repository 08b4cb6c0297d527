import type { IngestQuery, IngestionSummary } from "../types/ingestion.js";

export interface FetchErrorContext {
  url?: string;
  status?: number;
}

export class FetchError extends Error {
  constructor(
    message: string,
    public readonly context: FetchErrorContext = {},
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "FetchError";
  }
}

export class TransientFetchError extends Error {
  constructor(
    message: string,
    public readonly context: FetchErrorContext & { retryAfterMs?: number } = {},
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "TransientFetchError";
  }
}

export class MalformedRecordError extends Error {
  constructor(
    message: string,
    public readonly context: { matchId?: string; field: string }
  ) {
    super(message);
    this.name = "MalformedRecordError";
  }
}

export type StoreOperation = "open" | "upsert" | "query" | "get" | "upsertHeroes" | "listTeams" | "listHeroes" | "close";

export class StoreError extends Error {
  constructor(
    message: string,
    public readonly context: { operation: StoreOperation; matchId?: string },
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "StoreError";
  }
}

export function toStoreError(
  error: unknown,
  operation: StoreOperation,
  matchId?: string
): StoreError {
  if (error instanceof StoreError) return error;
  const detail = error instanceof Error ? error.message : String(error);
  const subject = matchId ? ` for match ${matchId}` : "";
  return new StoreError(`Store ${operation} failed${subject}: ${detail}`, { operation, matchId }, { cause: error });
}

export class IngestionAbortedError extends Error {
  constructor(
    message: string,
    public readonly context: {
      query: IngestQuery;
      matchId?: string;
      cursor: string | null;
      summary: IngestionSummary;
    },
    options: { cause: unknown }
  ) {
    super(message, options);
    this.name = "IngestionAbortedError";
  }
}
