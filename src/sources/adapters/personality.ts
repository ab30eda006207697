import { resolvePersonalityCuisine } from "../../config/recipeCatalog.js";
import type { PersonalityQuery } from "../../types/contracts.js";
import { isRecord } from "../../utils/normalize.js";
import type { AdapterContext, AdapterOutcome, RecipeSourceAdapter } from "../types.js";
import { getSpoonacular } from "./spoonacular.js";

export const personalityAdapter: RecipeSourceAdapter<"personality"> = {
  id: "spoonacular_random",
  mode: "personality",
  backend: "spoonacular",
  fetch: (query, context) => fetchRecipeByPersonality(query, context)
};

export async function fetchRecipeByPersonality(
  query: PersonalityQuery,
  context: AdapterContext
): Promise<AdapterOutcome> {
  const cuisine = resolvePersonalityCuisine(context.config.catalog, query.personality);
  const tags = [query.diet.trim(), cuisine].filter((tag) => tag.length > 0).join(",");

  const filtered = await requestRandomRecipe({ "include-tags": tags }, context, cuisine);
  if (filtered.status !== "failed" || !filtered.error.retryable) {
    return filtered;
  }

  context.logger.warn({
    msg: "Filtered random recipe request failed, retrying once without filters",
    code: filtered.error.code,
    status: filtered.error.status
  });
  return requestRandomRecipe({}, context);
}

async function requestRandomRecipe(
  params: Record<string, string>,
  context: AdapterContext,
  cuisineHint?: string
): Promise<AdapterOutcome> {
  const result = await getSpoonacular("/recipes/random", { number: 1, ...params }, context);
  if (!result.ok) {
    return { status: "failed", error: result.error };
  }

  const recipes: unknown[] = isRecord(result.body) && Array.isArray(result.body.recipes) ? result.body.recipes : [];
  const first = recipes[0];
  if (!isRecord(first)) {
    return { status: "empty" };
  }

  return { status: "found", payload: { kind: "structured", data: first, cuisineHint } };
}
