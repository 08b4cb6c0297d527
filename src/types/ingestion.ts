export interface IngestQuery {
  from?: Date;
  to?: Date;
  leagueId?: number;
  teamId?: string;
  cursor?: string;
  limit?: number;
}

export interface IngestionSummary {
  query: IngestQuery;
  fetched: number;
  inserted: number;
  updated: number;
  unchanged: number;
  malformed: number;
  malformedIds: string[];
  retries: number;
  cancelled: boolean;
  lastCursor: string | null;
  durationMs: number;
}
