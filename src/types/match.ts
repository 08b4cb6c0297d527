export interface Team {
  teamId: string;
  name: string;
}

export interface Hero {
  heroId: number;
  name: string;
}

export interface DraftEntry {
  order: number;
  heroId: number;
  isPick: boolean;
}

export interface MatchDraft {
  radiant: DraftEntry[];
  dire: DraftEntry[];
}

export interface MatchRecord {
  matchId: string;
  startTime: string;
  durationSeconds: number;
  patch: string;
  leagueId: number | null;
  seriesId: number | null;
  radiant: Team;
  dire: Team;
  radiantScore: number;
  direScore: number;
  winnerTeamId: string;
  draft: MatchDraft;
}

export interface MatchFilter {
  from?: Date;
  to?: Date;
  teamId?: string;
  patch?: string;
  leagueId?: number;
  cursor?: string;
  pageSize?: number;
}

export interface MatchPage {
  items: MatchRecord[];
  nextCursor: string | null;
}

export type UpsertOutcome = "inserted" | "updated" | "unchanged";

export function heroPlaceholder(heroId: number): Hero {
  return { heroId, name: `Hero ${heroId}` };
}

export function draftHeroIds(record: MatchRecord): number[] {
  return [...new Set([...record.draft.radiant, ...record.draft.dire].map((entry) => entry.heroId))];
}

/**
 * Serializes a record with a fixed key order so two records compare equal
 * exactly when every field matches.
 */
export function serializeMatchRecord(record: MatchRecord): string {
  const draftEntry = (entry: DraftEntry): DraftEntry => ({
    order: entry.order,
    heroId: entry.heroId,
    isPick: entry.isPick
  });
  const canonical: MatchRecord = {
    matchId: record.matchId,
    startTime: record.startTime,
    durationSeconds: record.durationSeconds,
    patch: record.patch,
    leagueId: record.leagueId,
    seriesId: record.seriesId,
    radiant: { teamId: record.radiant.teamId, name: record.radiant.name },
    dire: { teamId: record.dire.teamId, name: record.dire.name },
    radiantScore: record.radiantScore,
    direScore: record.direScore,
    winnerTeamId: record.winnerTeamId,
    draft: {
      radiant: record.draft.radiant.map(draftEntry),
      dire: record.draft.dire.map(draftEntry)
    }
  };
  return JSON.stringify(canonical);
}
