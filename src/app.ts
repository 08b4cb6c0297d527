import cors from "cors";
import express, { type Express } from "express";
import { createMatchesRouter } from "./routes/matches.js";
import type { MatchIngestionService } from "./services/ingestionService.js";
import type { MatchStore } from "./services/matchStore.js";

export interface CreateAppOptions {
  store: MatchStore;
  ingestionService?: Pick<MatchIngestionService, "ingest" | "syncHeroes">;
  corsOrigin?: string;
  adminApiToken?: string;
}

export interface MatchIngestApp {
  app: Express;
  cancelIngestion: () => boolean;
}

export function createApp(options: CreateAppOptions): MatchIngestApp {
  const app = express();
  const corsOrigin = options.corsOrigin ?? "*";
  app.use(
    cors({
      origin: corsOrigin === "*" ? true : corsOrigin
    })
  );
  app.use(express.json());

  app.get("/health", (_req, res) => {
    res.json({
      ok: true,
      service: "dota-match-ingest",
      ingestionEnabled: Boolean(options.ingestionService)
    });
  });

  const { router, cancelIngestion } = createMatchesRouter({
    store: options.store,
    ingestionService: options.ingestionService,
    adminApiToken: options.adminApiToken
  });
  app.use("/api", router);

  return { app, cancelIngestion };
}
