import { test } from "node:test";
import assert from "node:assert/strict";

import type { ProMatchListing } from "../../src/schemas/opendota.js";
import { TransientFetchError } from "../../src/services/errors.js";
import { OpenDotaMatchFetcher, listingMatchesQuery, type FetchQuery } from "../../src/services/matchFetcher.js";
import type { PatchInfo } from "../../src/services/openDotaClient.js";
import type { Hero } from "../../src/types/match.js";

const listing = (matchId: number, startTime: number, overrides: Partial<ProMatchListing> = {}): ProMatchListing => ({
  match_id: matchId,
  start_time: startTime,
  leagueid: 16700,
  radiant_team_id: 111,
  dire_team_id: 222,
  ...overrides
});

class FakeListingClient {
  readonly listingCalls: Array<string | undefined> = [];
  readonly detailCalls: string[] = [];
  failListingsWith: Error | null = null;

  constructor(private readonly pages: Map<string, ProMatchListing[]>) {}

  async getProMatches(lessThanMatchId?: string): Promise<ProMatchListing[]> {
    this.listingCalls.push(lessThanMatchId);
    if (this.failListingsWith) throw this.failListingsWith;
    return this.pages.get(lessThanMatchId ?? "") ?? [];
  }

  async getMatch(matchId: string): Promise<unknown> {
    this.detailCalls.push(matchId);
    return { match_id: Number(matchId) };
  }

  async getHeroes(): Promise<Hero[]> {
    return [{ heroId: 1, name: "Anti-Mage" }];
  }

  async getPatches(): Promise<PatchInfo[]> {
    return [{ id: 56, name: "7.36" }];
  }
}

const collect = async (fetcher: OpenDotaMatchFetcher, query: FetchQuery) => {
  const items: Array<{ matchId: string; cursor: string; payload: unknown }> = [];
  for await (const item of fetcher.fetchMatches(query)) items.push(item);
  return items;
};

const threePages = () =>
  new Map<string, ProMatchListing[]>([
    ["", [listing(105, 5000), listing(104, 4000)]],
    ["104", [listing(103, 3000)]]
  ]);

test("pages through listings newest first until an empty page", async () => {
  const client = new FakeListingClient(threePages());
  const items = await collect(new OpenDotaMatchFetcher(client), {});

  assert.deepEqual(items, [
    { matchId: "105", cursor: "105", payload: { match_id: 105 } },
    { matchId: "104", cursor: "104", payload: { match_id: 104 } },
    { matchId: "103", cursor: "103", payload: { match_id: 103 } }
  ]);
  assert.deepEqual(client.listingCalls, [undefined, "104", "103"]);
});

test("resumes strictly after the cursor", async () => {
  const client = new FakeListingClient(threePages());
  const items = await collect(new OpenDotaMatchFetcher(client), { cursor: "104" });

  assert.deepEqual(
    items.map((item) => item.matchId),
    ["103"]
  );
  assert.deepEqual(client.listingCalls, ["104", "103"]);
});

test("stops fetching details once the limit is reached", async () => {
  const client = new FakeListingClient(threePages());
  const items = await collect(new OpenDotaMatchFetcher(client), { limit: 1 });

  assert.deepEqual(
    items.map((item) => item.matchId),
    ["105"]
  );
  assert.deepEqual(client.detailCalls, ["105"]);
  assert.deepEqual(client.listingCalls, [undefined]);
});

test("skips listings outside the league or team without fetching them", async () => {
  const client = new FakeListingClient(
    new Map([
      [
        "",
        [
          listing(105, 5000, { leagueid: 1 }),
          listing(104, 4000, { dire_team_id: 333 }),
          listing(103, 3000, { radiant_team_id: 333, dire_team_id: 111 })
        ]
      ]
    ])
  );
  const items = await collect(new OpenDotaMatchFetcher(client), { leagueId: 16700, teamId: "111" });

  assert.deepEqual(
    items.map((item) => item.matchId),
    ["104", "103"]
  );
  assert.deepEqual(client.detailCalls, ["104", "103"]);
});

test("stops paging once a whole page is older than the lower bound", async () => {
  const client = new FakeListingClient(
    new Map([
      ["", [listing(105, 5000), listing(104, 4000)]],
      ["104", [listing(103, 3000), listing(102, 2000)]],
      ["102", [listing(101, 1000)]],
      ["101", [listing(100, 900)]]
    ])
  );
  const items = await collect(new OpenDotaMatchFetcher(client), { from: new Date(3000 * 1000) });

  assert.deepEqual(
    items.map((item) => item.matchId),
    ["105", "104", "103"]
  );
  assert.deepEqual(client.listingCalls, [undefined, "104", "102"]);
});

test("respects the page cap", async () => {
  const client = new FakeListingClient(threePages());
  const items = await collect(new OpenDotaMatchFetcher(client, { maxPages: 1 }), {});

  assert.deepEqual(
    items.map((item) => item.matchId),
    ["105", "104"]
  );
});

test("surfaces listing failures to the consumer", async () => {
  const client = new FakeListingClient(threePages());
  client.failListingsWith = new TransientFetchError("OpenDota 503 Service Unavailable");

  await assert.rejects(collect(new OpenDotaMatchFetcher(client), {}), TransientFetchError);
});

test("listingMatchesQuery checks the upper date bound", () => {
  const entry = listing(105, 5000);
  assert.equal(listingMatchesQuery(entry, { to: new Date(5000 * 1000) }), true);
  assert.equal(listingMatchesQuery(entry, { to: new Date(4999 * 1000) }), false);
});

test("delegates catalog lookups to the client", async () => {
  const fetcher = new OpenDotaMatchFetcher(new FakeListingClient(new Map()));
  assert.deepEqual(await fetcher.fetchHeroes(), [{ heroId: 1, name: "Anti-Mage" }]);
  assert.deepEqual(await fetcher.fetchPatches(), [{ id: 56, name: "7.36" }]);
});
