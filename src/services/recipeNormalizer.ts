import * as cheerio from "cheerio";
import type { ScrapeSelectors } from "../config/recipeCatalog.js";
import type {
  NormalizedRecipe,
  Nutrient,
  RawRecipePayload,
  ReadyMinutes,
  ScrapedHtmlPayload,
  StructuredApiPayload
} from "../types/contracts.js";
import { collapseWhitespace, isRecord, numeric, readString } from "../utils/normalize.js";
import { RecipeSourceError } from "./recipeSourceError.js";

export const STRUCTURED_TITLE_FALLBACK = "No title";
export const SCRAPED_TITLE_FALLBACK = "Unknown Recipe";
export const READY_TIME_UNKNOWN = "N/A";

export type NormalizeOptions = {
  defaultCuisine: string;
  selectors: ScrapeSelectors;
};

/**
 * Turns the raw payload of any source adapter into the canonical record.
 * Pure: the same payload always yields an equal, frozen record.
 */
export function normalizeRecipe(raw: RawRecipePayload, options: NormalizeOptions): NormalizedRecipe {
  switch (raw.kind) {
    case "structured":
      return normalizeStructuredRecipe(raw, options.defaultCuisine);
    case "scraped":
      return normalizeScrapedRecipe(raw, options.selectors, options.defaultCuisine);
  }
}

export function normalizeStructuredRecipe(raw: StructuredApiPayload, defaultCuisine: string): NormalizedRecipe {
  const data = raw.data;
  if (!isRecord(data)) {
    throw new RecipeSourceError("Recipe payload is not an object", "invalid_payload");
  }

  const cuisines: unknown[] = Array.isArray(data.cuisines) ? data.cuisines : [];
  const ingredientItems: unknown[] = Array.isArray(data.extendedIngredients) ? data.extendedIngredients : [];

  return freezeRecipe({
    title: readString(data.title) ?? STRUCTURED_TITLE_FALLBACK,
    imageURL: readString(data.image) ?? "",
    readyMinutes: readyMinutes(data.readyInMinutes),
    ingredients: ingredientItems
      .map((item) => (isRecord(item) ? readString(item.original) ?? readString(item.name) : null))
      .filter((item): item is string => item !== null),
    instructions: typeof data.instructions === "string" ? data.instructions.trim() : "",
    nutrients: structuredNutrients(data.nutrition),
    cuisine: readString(raw.cuisineHint) ?? readString(cuisines[0]) ?? defaultCuisine
  });
}

export function normalizeScrapedRecipe(
  raw: ScrapedHtmlPayload,
  selectors: ScrapeSelectors,
  defaultCuisine: string
): NormalizedRecipe {
  const $ = cheerio.load(raw.html);

  const title = collapseWhitespace($(selectors.title).first().text());
  const image = $(selectors.image).first();
  const imageURL = readString(image.attr("data-src")) ?? readString(image.attr("src")) ?? "";

  const ingredients: string[] = [];
  $(selectors.ingredient).each((_, element) => {
    const line = collapseWhitespace($(element).text());
    if (line) {
      ingredients.push(line);
    }
  });

  const steps: string[] = [];
  $(selectors.instructionStep).each((_, element) => {
    const step = collapseWhitespace($(element).text());
    if (step) {
      steps.push(step);
    }
  });

  const nutrients: Nutrient[] = [];
  $(selectors.nutritionRow).each((_, row) => {
    const cells = $(row)
      .find(selectors.nutritionCell)
      .map((_, cell) => collapseWhitespace($(cell).text()))
      .get();
    const nutrient = nutrientFromCells(cells);
    if (nutrient) {
      nutrients.push(nutrient);
    }
  });

  return freezeRecipe({
    title: title || SCRAPED_TITLE_FALLBACK,
    imageURL: resolveURL(imageURL, raw.url),
    readyMinutes: READY_TIME_UNKNOWN,
    ingredients,
    instructions: steps.join("\n"),
    nutrients,
    cuisine: defaultCuisine
  });
}

function readyMinutes(value: unknown): ReadyMinutes {
  const minutes = numeric(value);
  return minutes === undefined ? READY_TIME_UNKNOWN : minutes;
}

function structuredNutrients(nutrition: unknown): Nutrient[] {
  if (!isRecord(nutrition) || !Array.isArray(nutrition.nutrients)) {
    return [];
  }

  const items: unknown[] = nutrition.nutrients;
  const result: Nutrient[] = [];
  for (const item of items) {
    if (!isRecord(item)) continue;
    const name = readString(item.name);
    const amount = numeric(item.amount);
    if (!name || amount === undefined) continue;
    result.push({ name, amount, unit: readString(item.unit) ?? "" });
  }
  return result;
}

// Rows come as "Calories | 285" on some layouts and "285 | Calories" on others.
function nutrientFromCells(cells: string[]): Nutrient | null {
  if (cells.length !== 2) {
    return null;
  }
  const [first, second] = cells;
  if (!first || !second) {
    return null;
  }
  const firstIsAmount = /^\d/.test(first) && !/^\d/.test(second);
  return firstIsAmount
    ? { name: second, amount: first, unit: "" }
    : { name: first, amount: second, unit: "" };
}

function resolveURL(value: string, base: string): string {
  if (!value) return "";
  try {
    return new URL(value, base).toString();
  } catch {
    return value;
  }
}

function freezeRecipe(recipe: NormalizedRecipe): NormalizedRecipe {
  Object.freeze(recipe.ingredients);
  Object.freeze(recipe.nutrients);
  recipe.nutrients.forEach((nutrient) => Object.freeze(nutrient));
  return Object.freeze(recipe);
}
