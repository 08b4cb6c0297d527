import { Router, type Request } from "express";
import { ingestRequestSchema, matchListQuerySchema } from "../schemas/matches.js";
import { FetchError, IngestionAbortedError, TransientFetchError } from "../services/errors.js";
import type { MatchIngestionService } from "../services/ingestionService.js";
import type { MatchStore } from "../services/matchStore.js";

interface CreateMatchesRouterOptions {
  store: MatchStore;
  ingestionService?: Pick<MatchIngestionService, "ingest" | "syncHeroes">;
  adminApiToken?: string;
}

export interface MatchesRouter {
  router: Router;
  /** Aborts the ingestion started over HTTP, if one is running. */
  cancelIngestion: () => boolean;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : "Unknown error";
}

export function createMatchesRouter(options: CreateMatchesRouterOptions): MatchesRouter {
  const { store, ingestionService, adminApiToken } = options;
  const router = Router();
  let runningIngestion: AbortController | null = null;

  const cancelIngestion = (): boolean => {
    if (!runningIngestion) return false;
    runningIngestion.abort();
    return true;
  };

  const requireAdminToken = (req: Request): boolean => {
    if (!adminApiToken) return true;
    const headerToken = String(req.headers["x-admin-token"] ?? "");
    return headerToken.length > 0 && headerToken === adminApiToken;
  };

  router.get("/matches", async (req, res) => {
    const parsed = matchListQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return res.status(400).json({
        error: "Invalid query parameters.",
        details: parsed.error.flatten()
      });
    }

    const { cursor, limit, ...filter } = parsed.data;
    try {
      const page = await store.queryPage(filter, { cursor, limit });
      return res.json(page);
    } catch (error) {
      return res.status(500).json({
        error: "Failed to load matches.",
        message: errorMessage(error)
      });
    }
  });

  router.get("/matches/:matchId", async (req, res) => {
    const matchId = req.params.matchId.trim();
    if (!/^[1-9]\d*$/.test(matchId)) {
      return res.status(400).json({ error: "matchId must be numeric." });
    }

    try {
      const record = await store.get(matchId);
      if (!record) return res.status(404).json({ error: `Match ${matchId} not found.` });
      return res.json(record);
    } catch (error) {
      return res.status(500).json({
        error: "Failed to load match.",
        message: errorMessage(error)
      });
    }
  });

  router.get("/teams", async (_req, res) => {
    try {
      return res.json({ teams: await store.listTeams() });
    } catch (error) {
      return res.status(500).json({ error: "Failed to load teams.", message: errorMessage(error) });
    }
  });

  router.get("/heroes", async (_req, res) => {
    try {
      return res.json({ heroes: await store.listHeroes() });
    } catch (error) {
      return res.status(500).json({ error: "Failed to load heroes.", message: errorMessage(error) });
    }
  });

  router.post("/ingest", async (req, res) => {
    if (!requireAdminToken(req)) {
      return res.status(401).json({ error: "Unauthorized admin request." });
    }
    if (!ingestionService) {
      return res.status(503).json({ error: "Ingestion is not configured." });
    }
    if (runningIngestion) {
      return res.status(409).json({ error: "An ingestion is already running." });
    }

    const parsed = ingestRequestSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      return res.status(400).json({
        error: "Invalid request body.",
        details: parsed.error.flatten()
      });
    }

    const controller = new AbortController();
    runningIngestion = controller;
    try {
      const summary = await ingestionService.ingest(parsed.data, { signal: controller.signal });
      return res.json({ summary });
    } catch (error) {
      if (error instanceof IngestionAbortedError) {
        const upstream = error.cause instanceof FetchError || error.cause instanceof TransientFetchError;
        return res.status(upstream ? 502 : 500).json({
          error: "Ingestion aborted.",
          message: error.message,
          matchId: error.context.matchId ?? null,
          cursor: error.context.cursor,
          summary: error.context.summary
        });
      }
      return res.status(500).json({ error: "Ingestion failed.", message: errorMessage(error) });
    } finally {
      runningIngestion = null;
    }
  });

  router.post("/ingest/cancel", (req, res) => {
    if (!requireAdminToken(req)) {
      return res.status(401).json({ error: "Unauthorized admin request." });
    }
    if (!cancelIngestion()) return res.json({ cancelled: false });
    return res.status(202).json({ cancelled: true });
  });

  router.post("/heroes/sync", async (req, res) => {
    if (!requireAdminToken(req)) {
      return res.status(401).json({ error: "Unauthorized admin request." });
    }
    if (!ingestionService) {
      return res.status(503).json({ error: "Ingestion is not configured." });
    }

    try {
      const synced = await ingestionService.syncHeroes();
      return res.json({ synced });
    } catch (error) {
      return res.status(502).json({ error: "Hero sync failed.", message: errorMessage(error) });
    }
  });

  return { router, cancelIngestion };
}
