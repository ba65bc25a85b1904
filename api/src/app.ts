// api/src/app.ts
import express from "express";
import cors from "cors";
import type { CatalogProvider } from "./catalogProviders.js";
import { createRecommendationsRouter } from "./recommendations.js";
import { errorHandler } from "./middleware/errorHandler.js";

export type AppOptions = {
  catalogProvider: CatalogProvider;
  corsOrigin?: string[];
};

export function createApp({ catalogProvider, corsOrigin }: AppOptions) {
  const app = express();

  app.use(express.json({ limit: "100kb" }));
  app.use(cors({ origin: corsOrigin ?? true, credentials: true }));

  // health без каталога
  app.get("/health", (_req, res) => res.json({ ok: true }));
  app.get("/", (_req, res) => res.json({ ok: true }));

  app.use(createRecommendationsRouter(catalogProvider));

  app.use(errorHandler);
  return app;
}
