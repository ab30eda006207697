import type { Env } from "./env.js";
import { defaultRecipeCatalog, type RecipeCatalog } from "./recipeCatalog.js";

export type RecipeServiceConfig = {
  readonly credentials: {
    readonly spoonacularApiKey?: string;
    readonly yelpApiKey?: string;
  };
  readonly endpoints: {
    readonly spoonacularBaseURL: string;
    readonly yelpBaseURL: string;
  };
  readonly timeouts: {
    readonly recipeApiMs: number;
    readonly scrapeMs: number;
  };
  readonly cache: {
    /** Zero keeps entries for the lifetime of the process. */
    readonly ttlMs: number;
    readonly maxEntries: number;
  };
  readonly userAgent: string;
  readonly catalog: RecipeCatalog;
};

export function buildRecipeServiceConfig(
  env: Env,
  catalog: RecipeCatalog = defaultRecipeCatalog
): RecipeServiceConfig {
  return Object.freeze({
    credentials: Object.freeze({
      spoonacularApiKey: blankToUndefined(env.SPOONACULAR_API_KEY),
      yelpApiKey: blankToUndefined(env.YELP_API_KEY)
    }),
    endpoints: Object.freeze({
      spoonacularBaseURL: trimTrailingSlash(env.SPOONACULAR_API_URL),
      yelpBaseURL: trimTrailingSlash(env.YELP_API_URL)
    }),
    timeouts: Object.freeze({
      recipeApiMs: env.RECIPE_API_TIMEOUT_MS,
      scrapeMs: env.SCRAPE_TIMEOUT_MS
    }),
    cache: Object.freeze({
      ttlMs: env.RECIPE_CACHE_TTL_SECONDS * 1000,
      maxEntries: env.RECIPE_CACHE_MAX_ENTRIES
    }),
    userAgent: env.SCRAPER_USER_AGENT,
    catalog
  });
}

function blankToUndefined(value: string | undefined): string | undefined {
  const normalized = value?.trim();
  return normalized ? normalized : undefined;
}

function trimTrailingSlash(value: string): string {
  return value.replace(/\/+$/, "");
}
