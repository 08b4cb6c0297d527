import { beforeEach, test } from "node:test";
import assert from "node:assert/strict";
import request from "supertest";

import { createApp } from "../../src/app.js";
import { FetchError, IngestionAbortedError, StoreError } from "../../src/services/errors.js";
import type { MatchIngestionService } from "../../src/services/ingestionService.js";
import { MemoryMatchStore } from "../../src/services/memoryMatchStore.js";
import type { IngestQuery, IngestionSummary } from "../../src/types/ingestion.js";
import { sampleRecord } from "../helpers/fixtures.js";

type IngestionApi = Pick<MatchIngestionService, "ingest" | "syncHeroes">;

const ADMIN_TOKEN = "test-admin-token";

const summaryFor = (query: IngestQuery, overrides: Partial<IngestionSummary> = {}): IngestionSummary => ({
  query,
  fetched: 0,
  inserted: 0,
  updated: 0,
  unchanged: 0,
  malformed: 0,
  malformedIds: [],
  retries: 0,
  cancelled: false,
  lastCursor: null,
  durationMs: 0,
  ...overrides
});

const olderMatch = sampleRecord();
const newerMatch = sampleRecord({
  matchId: "7100000002",
  startTime: "2024-06-02T12:00:00.000Z",
  patch: "7.37",
  dire: { teamId: "333", name: "Team Charlie" },
  winnerTeamId: "333"
});

let store: MemoryMatchStore;

beforeEach(async () => {
  store = new MemoryMatchStore();
  await store.upsert(olderMatch);
  await store.upsert(newerMatch);
});

const appWith = (ingestionService?: IngestionApi, adminApiToken?: string) =>
  createApp({ store, ingestionService, adminApiToken }).app;

test("health reports whether ingestion is available", async () => {
  const res = await request(appWith()).get("/health");
  assert.equal(res.status, 200);
  assert.deepEqual(res.body, { ok: true, service: "dota-match-ingest", ingestionEnabled: false });
});

test("lists matches newest first", async () => {
  const res = await request(appWith()).get("/api/matches");
  assert.equal(res.status, 200, res.text);
  assert.deepEqual(res.body, { items: [newerMatch, olderMatch], nextCursor: null });
});

test("pages matches with a cursor", async () => {
  const agent = request(appWith());
  const first = await agent.get("/api/matches").query({ limit: 1 });
  assert.equal(first.status, 200, first.text);
  assert.deepEqual(first.body.items, [newerMatch]);
  assert.equal(first.body.nextCursor, "2024-06-02T12:00:00.000Z|7100000002");

  const second = await agent.get("/api/matches").query({ limit: 1, cursor: first.body.nextCursor });
  assert.deepEqual(second.body.items, [olderMatch]);
});

test("filters matches by team, patch and date", async () => {
  const agent = request(appWith());

  const byTeam = await agent.get("/api/matches").query({ teamId: "333" });
  assert.deepEqual(
    byTeam.body.items.map((item: { matchId: string }) => item.matchId),
    ["7100000002"]
  );

  const byPatch = await agent.get("/api/matches").query({ patch: "7.36" });
  assert.deepEqual(
    byPatch.body.items.map((item: { matchId: string }) => item.matchId),
    ["7100000001"]
  );

  const byDate = await agent.get("/api/matches").query({ to: "2024-06-01T12:00:00Z" });
  assert.deepEqual(
    byDate.body.items.map((item: { matchId: string }) => item.matchId),
    ["7100000001"]
  );
});

test("rejects unreadable match queries", async () => {
  const agent = request(appWith());

  const badDate = await agent.get("/api/matches").query({ from: "last tuesday" });
  assert.equal(badDate.status, 400);
  assert.equal(badDate.body.error, "Invalid query parameters.");

  const badCursor = await agent.get("/api/matches").query({ cursor: "next" });
  assert.equal(badCursor.status, 400);

  const reversed = await agent.get("/api/matches").query({ from: "2024-06-02", to: "2024-06-01" });
  assert.equal(reversed.status, 400);
});

test("fetches a single match", async () => {
  const agent = request(appWith());

  const found = await agent.get("/api/matches/7100000001");
  assert.equal(found.status, 200);
  assert.deepEqual(found.body, olderMatch);

  const missing = await agent.get("/api/matches/7199999999");
  assert.equal(missing.status, 404);
  assert.deepEqual(missing.body, { error: "Match 7199999999 not found." });

  const invalid = await agent.get("/api/matches/abc");
  assert.equal(invalid.status, 400);

  const padded = await agent.get("/api/matches/07100000001");
  assert.equal(padded.status, 400);
  assert.deepEqual(padded.body, { error: "matchId must be numeric." });
});

test("lists teams and heroes seen in stored matches", async () => {
  const agent = request(appWith());

  const teams = await agent.get("/api/teams");
  assert.deepEqual(teams.body, {
    teams: [
      { teamId: "111", name: "Team Alpha" },
      { teamId: "222", name: "Team Bravo" },
      { teamId: "333", name: "Team Charlie" }
    ]
  });

  const heroes = await agent.get("/api/heroes");
  assert.deepEqual(
    heroes.body.heroes.map((hero: { heroId: number }) => hero.heroId),
    [1, 2, 8, 14]
  );
});

test("ingestion is unavailable without a service", async () => {
  const res = await request(appWith()).post("/api/ingest").send({});
  assert.equal(res.status, 503);
});

test("ingestion requires the admin token when one is configured", async () => {
  const service: IngestionApi = {
    ingest: async (query = {}) => summaryFor(query),
    syncHeroes: async () => 0
  };
  const agent = request(appWith(service, ADMIN_TOKEN));

  const missing = await agent.post("/api/ingest").send({});
  assert.equal(missing.status, 401);

  const wrong = await agent.post("/api/ingest").set("x-admin-token", "not-the-token").send({});
  assert.equal(wrong.status, 401);

  const allowed = await agent.post("/api/ingest").set("x-admin-token", ADMIN_TOKEN).send({});
  assert.equal(allowed.status, 200, allowed.text);
});

test("runs an ingestion with the requested bounds", async () => {
  const queries: IngestQuery[] = [];
  const service: IngestionApi = {
    ingest: async (query = {}) => {
      queries.push(query);
      return summaryFor(query, { fetched: 2, inserted: 2, lastCursor: "7100000001" });
    },
    syncHeroes: async () => 0
  };

  const res = await request(appWith(service))
    .post("/api/ingest")
    .send({ from: "2024-06-01T00:00:00Z", leagueId: 16700, limit: 10 });

  assert.equal(res.status, 200, res.text);
  assert.equal(queries.length, 1);
  assert.equal(queries[0].from?.toISOString(), "2024-06-01T00:00:00.000Z");
  assert.equal(queries[0].leagueId, 16700);
  assert.equal(queries[0].limit, 10);
  assert.equal(res.body.summary.inserted, 2);
  assert.equal(res.body.summary.lastCursor, "7100000001");
  assert.equal(res.body.summary.query.from, "2024-06-01T00:00:00.000Z");
});

test("rejects unknown ingestion fields", async () => {
  const service: IngestionApi = {
    ingest: async (query = {}) => summaryFor(query),
    syncHeroes: async () => 0
  };
  const res = await request(appWith(service)).post("/api/ingest").send({ region: "SEA" });
  assert.equal(res.status, 400);
  assert.equal(res.body.error, "Invalid request body.");
});

test("an upstream failure maps to 502 with the partial summary", async () => {
  const service: IngestionApi = {
    ingest: async (query = {}) => {
      const summary = summaryFor(query, { fetched: 1, inserted: 1, lastCursor: "7100000002" });
      throw new IngestionAbortedError(
        "Ingestion aborted after 1 matches: OpenDota 404",
        { query, cursor: "7100000002", summary },
        { cause: new FetchError("OpenDota 404", { status: 404 }) }
      );
    },
    syncHeroes: async () => 0
  };

  const res = await request(appWith(service)).post("/api/ingest").send({});

  assert.equal(res.status, 502);
  assert.equal(res.body.error, "Ingestion aborted.");
  assert.equal(res.body.matchId, null);
  assert.equal(res.body.cursor, "7100000002");
  assert.equal(res.body.summary.inserted, 1);
});

test("a store failure maps to 500 and names the match", async () => {
  const service: IngestionApi = {
    ingest: async (query = {}) => {
      throw new IngestionAbortedError(
        "Ingestion aborted after 1 matches: disk full",
        { query, matchId: "7100000003", cursor: null, summary: summaryFor(query, { fetched: 1 }) },
        { cause: new StoreError("disk full", { operation: "upsert", matchId: "7100000003" }) }
      );
    },
    syncHeroes: async () => 0
  };

  const res = await request(appWith(service)).post("/api/ingest").send({});

  assert.equal(res.status, 500);
  assert.equal(res.body.matchId, "7100000003");
  assert.equal(res.body.cursor, null);
});

test("a running ingestion blocks another and can be cancelled", async () => {
  let markStarted: () => void = () => undefined;
  const started = new Promise<void>((resolve) => {
    markStarted = resolve;
  });
  const service: IngestionApi = {
    ingest: (query = {}, options = {}) =>
      new Promise<IngestionSummary>((resolve) => {
        options.signal?.addEventListener("abort", () => resolve(summaryFor(query, { cancelled: true })), {
          once: true
        });
        markStarted();
      }),
    syncHeroes: async () => 0
  };
  const app = appWith(service);

  const idle = await request(app).post("/api/ingest/cancel");
  assert.deepEqual(idle.body, { cancelled: false });

  const running = request(app).post("/api/ingest").send({}).then((res) => res);
  await started;

  const blocked = await request(app).post("/api/ingest").send({});
  assert.equal(blocked.status, 409);

  const cancel = await request(app).post("/api/ingest/cancel");
  assert.equal(cancel.status, 202);
  assert.deepEqual(cancel.body, { cancelled: true });

  const finished = await running;
  assert.equal(finished.status, 200);
  assert.equal(finished.body.summary.cancelled, true);
});

test("the cancel hook stops an ingestion started over HTTP", async () => {
  let markStarted: () => void = () => undefined;
  const started = new Promise<void>((resolve) => {
    markStarted = resolve;
  });
  const service: IngestionApi = {
    ingest: (query = {}, options = {}) =>
      new Promise<IngestionSummary>((resolve) => {
        options.signal?.addEventListener("abort", () => resolve(summaryFor(query, { cancelled: true })), {
          once: true
        });
        markStarted();
      }),
    syncHeroes: async () => 0
  };
  const { app, cancelIngestion } = createApp({ store, ingestionService: service });

  assert.equal(cancelIngestion(), false);

  const running = request(app).post("/api/ingest").send({}).then((res) => res);
  await started;
  assert.equal(cancelIngestion(), true);

  const finished = await running;
  assert.equal(finished.status, 200);
  assert.equal(finished.body.summary.cancelled, true);
  assert.equal(cancelIngestion(), false);
});

test("syncs the hero catalog", async () => {
  const service: IngestionApi = {
    ingest: async (query = {}) => summaryFor(query),
    syncHeroes: async () => 124
  };

  const res = await request(appWith(service)).post("/api/heroes/sync");
  assert.equal(res.status, 200);
  assert.deepEqual(res.body, { synced: 124 });
});

test("reports a failed hero sync as an upstream error", async () => {
  const service: IngestionApi = {
    ingest: async (query = {}) => summaryFor(query),
    syncHeroes: async () => {
      throw new FetchError("OpenDota 500");
    }
  };

  const res = await request(appWith(service)).post("/api/heroes/sync");
  assert.equal(res.status, 502);
  assert.equal(res.body.error, "Hero sync failed.");
});
