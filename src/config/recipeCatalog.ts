import type { MealType } from "../types/contracts.js";

export type ScrapeSelectors = {
  title: string;
  image: string;
  ingredient: string;
  instructionStep: string;
  nutritionRow: string;
  nutritionCell: string;
};

export type RecipeCatalog = {
  personalityCuisines: Readonly<Record<string, readonly string[]>>;
  /** Cuisine requested when the personality is not in the table. */
  fallbackCuisine: string;
  /** Cuisine stamped on a recipe whose source names none. */
  defaultCuisine: string;
  diets: readonly string[];
  mealTypeCategories: Readonly<Record<MealType, string>>;
  recipeLinkPattern: RegExp;
  scrapeSelectors: ScrapeSelectors;
};

const PERSONALITY_CUISINES: Record<string, readonly string[]> = {
  Openness: ["Thai", "Indian", "Japanese"],
  Conscientiousness: ["Mediterranean", "Greek", "Nordic"],
  Extraversion: ["BBQ", "Mexican", "Caribbean"],
  Agreeableness: ["Italian", "American", "Southern"],
  Neuroticism: ["French", "Chinese", "Korean"]
};

const DIETS = ["Vegetarian", "Vegan", "Gluten Free", "Ketogenic", "Paleo", "Pescetarian"];

const MEAL_TYPE_CATEGORIES: Record<MealType, string> = {
  Breakfast: "https://www.allrecipes.com/recipes/78/breakfast-and-brunch/",
  Lunch: "https://www.allrecipes.com/recipes/17561/lunch/",
  Dinner: "https://www.allrecipes.com/recipes/17562/dinner/",
  Dessert: "https://www.allrecipes.com/recipes/79/desserts/",
  Snack: "https://www.allrecipes.com/recipes/76/appetizers-and-snacks/"
};

// Allrecipes detail page markup; these break whenever the site restyles.
const SCRAPE_SELECTORS: ScrapeSelectors = {
  title: "h1",
  image: "img.primary-image__image, img.universal-image__image",
  ingredient: "li.mm-recipes-structured-ingredients__list-item",
  instructionStep: "ol.mntl-sc-block-group--OL > li p",
  nutritionRow: "tr.mm-recipes-nutrition-facts-summary__table-row",
  nutritionCell: "td"
};

export const defaultRecipeCatalog: RecipeCatalog = {
  personalityCuisines: PERSONALITY_CUISINES,
  fallbackCuisine: "Italian",
  defaultCuisine: "General",
  diets: DIETS,
  mealTypeCategories: MEAL_TYPE_CATEGORIES,
  recipeLinkPattern: /\/recipe\/\d+\//,
  scrapeSelectors: SCRAPE_SELECTORS
};

export function resolvePersonalityCuisine(catalog: RecipeCatalog, personality: string): string {
  const cuisines = Object.hasOwn(catalog.personalityCuisines, personality)
    ? catalog.personalityCuisines[personality]
    : undefined;
  return cuisines?.[0] ?? catalog.fallbackCuisine;
}

export function listPersonalities(catalog: RecipeCatalog): string[] {
  return Object.keys(catalog.personalityCuisines);
}
