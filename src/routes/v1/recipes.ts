import { Router } from "express";
import { listPersonalities, type RecipeCatalog } from "../../config/recipeCatalog.js";
import { AppError, asyncHandler } from "../../middleware/error.js";
import { searchRequestSchema, venueQuerySchema } from "../../schemas/search.schema.js";
import type { RecipeFinder } from "../../services/recipeFinder.js";
import { MEAL_TYPES, NUTRIENT_NAMES, type SearchOptions } from "../../types/contracts.js";
import { isRecord } from "../../utils/normalize.js";

export function createRecipesRouter(finder: RecipeFinder, catalog: RecipeCatalog): Router {
  const router = Router();

  router.get("/search-options", (_req, res) => {
    const options: SearchOptions = {
      personalities: listPersonalities(catalog),
      diets: [...catalog.diets],
      nutrients: [...NUTRIENT_NAMES],
      mealTypes: [...MEAL_TYPES]
    };
    res.json(options);
  });

  router.post("/recipes/search", asyncHandler(async (req, res) => {
    if (!isRecord(req.body)) {
      throw new AppError("Search payload must be a JSON object", 400, "invalid_search_payload");
    }
    const request = searchRequestSchema.parse(req.body);

    const controller = new AbortController();
    res.on("close", () => {
      if (!res.writableEnded) {
        controller.abort();
      }
    });

    const outcome = await finder.search(request, { signal: controller.signal });
    if (outcome.state === "found") {
      res.json({ found: true, recipe: outcome.recipe, venues: outcome.venues });
      return;
    }
    res.json({ found: false, message: outcome.message });
  }));

  router.get("/venues", asyncHandler(async (req, res) => {
    const query = venueQuerySchema.parse(req.query);
    const items = await finder.findNearbyVenues(query.location, query.cuisine);
    res.json({ items });
  }));

  return router;
}
