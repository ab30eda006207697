import type { RecipeServiceConfig } from "../config/serviceConfig.js";
import type { FetchLike } from "../services/httpClient.js";
import type { RecipeSourceError } from "../services/recipeSourceError.js";
import type { RawRecipePayload, SearchMode, SearchQueryByMode } from "../types/contracts.js";
import type { Logger } from "../utils/logger.js";

export type RecipeBackend = "spoonacular" | "allrecipes";

/** Chooses one recipe link from a category listing. */
export type LinkPicker = (links: readonly string[]) => string | undefined;

export type AdapterContext = {
  config: RecipeServiceConfig;
  fetchImpl: FetchLike;
  pickLink: LinkPicker;
  logger: Logger;
  signal?: AbortSignal;
};

export type AdapterOutcome =
  | { status: "found"; payload: RawRecipePayload }
  | { status: "empty" }
  | { status: "failed"; error: RecipeSourceError };

export type RecipeSourceAdapter<M extends SearchMode> = {
  id: string;
  mode: M;
  backend: RecipeBackend;
  fetch: (query: SearchQueryByMode[M], context: AdapterContext) => Promise<AdapterOutcome>;
};
