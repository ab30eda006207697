import type { IngredientQuery } from "../../types/contracts.js";
import type { AdapterContext, AdapterOutcome, RecipeSourceAdapter } from "../types.js";
import { searchThenFetchDetail } from "./spoonacular.js";

export const ingredientAdapter: RecipeSourceAdapter<"ingredient"> = {
  id: "spoonacular_ingredient",
  mode: "ingredient",
  backend: "spoonacular",
  fetch: (query, context) => fetchRecipeByIngredient(query, context)
};

export function fetchRecipeByIngredient(query: IngredientQuery, context: AdapterContext): Promise<AdapterOutcome> {
  return searchThenFetchDetail(
    {
      includeIngredients: query.ingredient.trim(),
      maxReadyTime: Math.round(query.maxTime)
    },
    context
  );
}
