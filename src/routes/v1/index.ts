import { Router } from "express";
import type { RecipeCatalog } from "../../config/recipeCatalog.js";
import type { RecipeFinder } from "../../services/recipeFinder.js";
import { createRecipesRouter } from "./recipes.js";

export function createV1Router(finder: RecipeFinder, catalog: RecipeCatalog): Router {
  const router = Router();

  router.use("/", createRecipesRouter(finder, catalog));

  return router;
}
