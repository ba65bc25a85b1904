// api/src/recommendations.ts
import { Router, type Request, type Response } from "express";
import { determineCohort } from "./cohortScorer.js";
import { matchFacilities } from "./facilityMatcher.js";
import { loadCatalog, type CatalogError } from "./facilityCatalog.js";
import type { CatalogProvider } from "./catalogProviders.js";
import { AppError, asyncHandler, CatalogUnavailableError } from "./middleware/errorHandler.js";
import { UserInputSchema, validate } from "./validation.js";
import type { Facility, Recommendation, UserInput } from "./types.js";

export type RecommendationResult = {
  recommendation: Recommendation;
  rejected: CatalogError[];
};

// Чистая композиция: когорта -> фильтр каталога
export function buildRecommendation(user: UserInput, facilities: readonly Facility[]): Recommendation {
  const cohort = determineCohort(user);
  return { cohort, recommended_facilities: matchFacilities(cohort, facilities) };
}

async function fetchCatalog(provider: CatalogProvider) {
  try {
    return loadCatalog(await provider.fetchEntries());
  } catch (err) {
    if (err instanceof CatalogUnavailableError) throw err;
    throw new CatalogUnavailableError(provider.name, err instanceof Error ? err.message : String(err));
  }
}

export async function recommendFacilities(
  user: UserInput,
  provider: CatalogProvider
): Promise<RecommendationResult> {
  const { facilities, rejected } = await fetchCatalog(provider);
  return { recommendation: buildRecommendation(user, facilities), rejected };
}

function warnRejected(source: string, rejected: CatalogError[]) {
  for (const e of rejected) {
    console.warn(`catalog(${source}): skipped "${e.facilityName}" (${e.rawRange}): ${e.message}`);
  }
}

export function createRecommendationsRouter(provider: CatalogProvider): Router {
  const router = Router();

  router.post(
    "/recommendations",
    asyncHandler(async (req: Request, res: Response) => {
      const v = validate(UserInputSchema, req.body);
      if (!v.success) throw new AppError(v.error, 400, { code: "validation_error" });

      const { recommendation, rejected } = await recommendFacilities(v.data, provider);
      warnRejected(provider.name, rejected);
      res.json(recommendation);
    })
  );

  router.get(
    "/facilities",
    asyncHandler(async (_req: Request, res: Response) => {
      const { facilities, rejected } = await fetchCatalog(provider);
      warnRejected(provider.name, rejected);
      res.json({
        facilities: facilities.map((f) => ({ name: f.name, low: f.lowInclusive, high: f.highExclusive })),
        rejected: rejected.length,
      });
    })
  );

  return router;
}
