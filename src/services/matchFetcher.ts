import type { Hero } from "../types/match.js";
import type { ProMatchListing } from "../schemas/opendota.js";
import type { OpenDotaClient, PatchInfo } from "./openDotaClient.js";

export interface FetchQuery {
  from?: Date;
  to?: Date;
  leagueId?: number;
  teamId?: string;
  /** Resume strictly after this match; matches are listed newest first. */
  cursor?: string;
  limit?: number;
}

export interface FetchedMatch {
  matchId: string;
  cursor: string;
  payload: unknown;
}

export interface MatchFetcher {
  fetchMatches(query: FetchQuery): AsyncIterable<FetchedMatch>;
  fetchHeroes(): Promise<Hero[]>;
  fetchPatches(): Promise<PatchInfo[]>;
}

type ListingSource = Pick<OpenDotaClient, "getProMatches" | "getMatch" | "getHeroes" | "getPatches">;

export function listingMatchesQuery(listing: ProMatchListing, query: FetchQuery): boolean {
  const startMs = listing.start_time * 1000;
  if (query.from && startMs < query.from.getTime()) return false;
  if (query.to && startMs > query.to.getTime()) return false;
  if (query.leagueId !== undefined && listing.leagueid !== query.leagueId) return false;
  if (query.teamId !== undefined) {
    const teamIds = [listing.radiant_team_id, listing.dire_team_id].map((id) => (id ? String(id) : null));
    if (!teamIds.includes(query.teamId)) return false;
  }
  return true;
}

export class OpenDotaMatchFetcher implements MatchFetcher {
  constructor(
    private readonly client: ListingSource,
    private readonly options: { maxPages?: number } = {}
  ) {}

  async *fetchMatches(query: FetchQuery): AsyncGenerator<FetchedMatch> {
    const limit = query.limit !== undefined ? Math.max(0, Math.floor(query.limit)) : Number.POSITIVE_INFINITY;
    const maxPages = this.options.maxPages ?? 500;
    let lessThan = query.cursor;
    let yielded = 0;

    for (let page = 0; page < maxPages && yielded < limit; page += 1) {
      const listings = await this.client.getProMatches(lessThan);
      if (listings.length === 0) return;

      let inRange = 0;
      for (const listing of listings) {
        if (yielded >= limit) return;
        if (!listingMatchesQuery(listing, query)) continue;
        inRange += 1;

        const matchId = String(listing.match_id);
        const payload = await this.client.getMatch(matchId);
        yielded += 1;
        yield { matchId, cursor: matchId, payload };
      }

      const oldest = listings[listings.length - 1];
      // Listings come newest first, so a page ending before `from` means nothing older can match.
      if (query.from && oldest.start_time * 1000 < query.from.getTime() && inRange === 0) return;
      lessThan = String(oldest.match_id);
    }
  }

  async fetchHeroes(): Promise<Hero[]> {
    return this.client.getHeroes();
  }

  async fetchPatches(): Promise<PatchInfo[]> {
    return this.client.getPatches();
  }
}
