import type { RecipeServiceConfig } from "../config/serviceConfig.js";
import { pickRandom } from "../sources/linkPicker.js";
import { recipeSourceRegistry, type RecipeSourceRegistry } from "../sources/sourceRegistry.js";
import type { AdapterContext, AdapterOutcome, LinkPicker, RecipeSourceAdapter } from "../sources/types.js";
import type {
  MealType,
  NormalizedRecipe,
  NutrientName,
  RecipeLookupResult,
  SearchMode,
  SearchOutcome,
  SearchQueryByMode,
  SearchRequest,
  Venue
} from "../types/contracts.js";
import type { Logger } from "../utils/logger.js";
import { isBlank } from "../utils/normalize.js";
import { CacheStore } from "./cacheStore.js";
import { findNearbyVenues } from "./companionLookup.js";
import type { FetchLike } from "./httpClient.js";
import { normalizeRecipe } from "./recipeNormalizer.js";
import { toRecipeSourceError } from "./recipeSourceError.js";

export const NOT_FOUND_MESSAGE = "No recipe found for these options. Try a different search.";

export type RecipeFinderDeps = {
  logger: Logger;
  fetchImpl?: FetchLike;
  pickLink?: LinkPicker;
  registry?: RecipeSourceRegistry;
};

export type CallOptions = {
  signal?: AbortSignal;
};

type MemoizedLookup =
  | { found: true; recipe: NormalizedRecipe; sourceId: string }
  | { found: false; reason: "empty" };

/**
 * Entry point for every search mode. Holds no per-search state; only the memo
 * tables outlive a call.
 */
export class RecipeFinder {
  private readonly fetchImpl: FetchLike;
  private readonly pickLink: LinkPicker;
  private readonly registry: RecipeSourceRegistry;
  private readonly logger: Logger;
  private readonly recipeCache: CacheStore<MemoizedLookup>;
  private readonly venueCache: CacheStore<Venue[]>;

  constructor(
    private readonly config: RecipeServiceConfig,
    deps: RecipeFinderDeps
  ) {
    this.fetchImpl = deps.fetchImpl ?? fetch;
    this.pickLink = deps.pickLink ?? pickRandom();
    this.registry = deps.registry ?? recipeSourceRegistry;
    this.logger = deps.logger;
    this.recipeCache = new CacheStore(config.cache.ttlMs, config.cache.maxEntries);
    this.venueCache = new CacheStore(config.cache.ttlMs, config.cache.maxEntries);
  }

  findByPersonality(personality: string, diet: string, options: CallOptions = {}): Promise<RecipeLookupResult> {
    return this.lookup("personality", { personality: personality.trim(), diet: diet.trim() }, options);
  }

  findByIngredient(ingredient: string, maxTime: number, options: CallOptions = {}): Promise<RecipeLookupResult> {
    return this.lookup("ingredient", { ingredient: ingredient.trim(), maxTime }, options);
  }

  findByNutrients(
    nutrient: NutrientName,
    min: number,
    max: number,
    maxTime?: number,
    options: CallOptions = {}
  ): Promise<RecipeLookupResult> {
    return this.lookup("nutrients", { nutrient, min, max, maxTime }, options);
  }

  findByMealType(mealType: MealType, options: CallOptions = {}): Promise<RecipeLookupResult> {
    return this.lookup("meal_type", { mealType }, options);
  }

  async findNearbyVenues(location: string, cuisine: string, options: CallOptions = {}): Promise<Venue[]> {
    if (isBlank(location)) {
      return [];
    }

    const key = CacheStore.key(location, cuisine);
    const cached = this.venueCache.get(key);
    if (cached) {
      return [...cached];
    }

    const result = await findNearbyVenues(location, cuisine, {
      config: this.config,
      fetchImpl: this.fetchImpl,
      logger: this.logger,
      signal: options.signal
    });
    if (result.succeeded) {
      this.venueCache.set(key, result.venues);
    }
    return [...result.venues];
  }

  async search(request: SearchRequest, options: CallOptions = {}): Promise<SearchOutcome> {
    const result = await this.dispatch(request, options);
    if (!result.found) {
      return { state: "not_found", reason: result.reason, message: NOT_FOUND_MESSAGE };
    }

    const venues = request.location && !isBlank(request.location)
      ? await this.findNearbyVenues(request.location, result.recipe.cuisine, options)
      : [];

    return { state: "found", recipe: result.recipe, venues };
  }

  private dispatch(request: SearchRequest, options: CallOptions): Promise<RecipeLookupResult> {
    switch (request.mode) {
      case "personality":
        return this.findByPersonality(request.personality, request.diet, options);
      case "ingredient":
        return this.findByIngredient(request.ingredient, request.maxTime, options);
      case "nutrients":
        return this.findByNutrients(request.nutrient, request.min, request.max, request.maxTime, options);
      case "meal_type":
        return this.findByMealType(request.mealType, options);
    }
  }

  private async lookup<M extends SearchMode>(
    mode: M,
    query: SearchQueryByMode[M],
    options: CallOptions
  ): Promise<RecipeLookupResult> {
    const adapter: RecipeSourceAdapter<M> = this.registry[mode];
    const key = CacheStore.key(mode, ...Object.values(query).map(cacheKeyPart));
    const cached = this.recipeCache.get(key);
    if (cached) {
      return cached.found ? cached : { found: false, recipe: null, reason: cached.reason };
    }

    const context: AdapterContext = {
      config: this.config,
      fetchImpl: this.fetchImpl,
      pickLink: this.pickLink,
      logger: this.logger,
      signal: options.signal
    };

    const outcome = await this.runAdapter(adapter, query, context);

    switch (outcome.status) {
      case "found": {
        try {
          const recipe = normalizeRecipe(outcome.payload, {
            defaultCuisine: this.config.catalog.defaultCuisine,
            selectors: this.config.catalog.scrapeSelectors
          });
          const lookup = { found: true as const, recipe, sourceId: adapter.id };
          this.recipeCache.set(key, lookup);
          return lookup;
        } catch (error) {
          const sourceError = toRecipeSourceError(error);
          this.logger.warn({ msg: "Recipe payload could not be normalized", adapter: adapter.id, error: sourceError.message });
          return { found: false, recipe: null, reason: "failed" };
        }
      }
      case "empty":
        this.logger.debug({ msg: "No recipe matched", adapter: adapter.id, mode });
        this.recipeCache.set(key, { found: false, reason: "empty" });
        return { found: false, recipe: null, reason: "empty" };
      case "failed":
        this.logger.warn({
          msg: "Recipe source failed",
          adapter: adapter.id,
          code: outcome.error.code,
          status: outcome.error.status,
          retryable: outcome.error.retryable,
          error: outcome.error.message
        });
        return { found: false, recipe: null, reason: "failed" };
    }
  }

  private async runAdapter<M extends SearchMode>(
    adapter: RecipeSourceAdapter<M>,
    query: SearchQueryByMode[M],
    context: AdapterContext
  ): Promise<AdapterOutcome> {
    try {
      return await adapter.fetch(query, context);
    } catch (error) {
      return { status: "failed", error: toRecipeSourceError(error) };
    }
  }
}

function cacheKeyPart(value: unknown): string | number | undefined {
  return typeof value === "string" || typeof value === "number" ? value : undefined;
}
