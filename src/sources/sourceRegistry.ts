import type { SearchMode } from "../types/contracts.js";
import type { RecipeSourceAdapter } from "./types.js";
import { personalityAdapter } from "./adapters/personality.js";
import { ingredientAdapter } from "./adapters/ingredient.js";
import { nutrientsAdapter } from "./adapters/nutrients.js";
import { mealTypeAdapter } from "./adapters/mealType.js";

export type RecipeSourceRegistry = { [M in SearchMode]: RecipeSourceAdapter<M> };

export const recipeSourceRegistry: RecipeSourceRegistry = {
  personality: personalityAdapter,
  ingredient: ingredientAdapter,
  nutrients: nutrientsAdapter,
  meal_type: mealTypeAdapter
};
