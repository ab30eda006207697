import type { NutrientQuery } from "../../types/contracts.js";
import type { AdapterContext, AdapterOutcome, RecipeSourceAdapter } from "../types.js";
import { searchThenFetchDetail } from "./spoonacular.js";

export const nutrientsAdapter: RecipeSourceAdapter<"nutrients"> = {
  id: "spoonacular_nutrients",
  mode: "nutrients",
  backend: "spoonacular",
  fetch: (query, context) => fetchRecipeByNutrients(query, context)
};

export function fetchRecipeByNutrients(query: NutrientQuery, context: AdapterContext): Promise<AdapterOutcome> {
  const [low, high] = orderedBounds(query.min, query.max);
  return searchThenFetchDetail(
    {
      [`min${query.nutrient}`]: low,
      [`max${query.nutrient}`]: high,
      maxReadyTime: query.maxTime === undefined ? undefined : Math.round(query.maxTime)
    },
    context
  );
}

/** Bounds given the wrong way round are swapped rather than rejected. */
export function orderedBounds(min: number, max: number): [number, number] {
  return min <= max ? [min, max] : [max, min];
}
