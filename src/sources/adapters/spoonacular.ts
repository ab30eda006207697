import { fetchJSON, type FetchOutcome } from "../../services/httpClient.js";
import { RecipeSourceError } from "../../services/recipeSourceError.js";
import { isRecord, numeric } from "../../utils/normalize.js";
import type { AdapterContext, AdapterOutcome } from "../types.js";

type QueryParams = Record<string, string | number | undefined>;

export async function getSpoonacular(
  path: string,
  params: QueryParams,
  context: AdapterContext
): Promise<FetchOutcome<unknown>> {
  const apiKey = context.config.credentials.spoonacularApiKey;
  if (!apiKey) {
    return {
      ok: false,
      error: new RecipeSourceError("SPOONACULAR_API_KEY is not configured", "missing_credentials")
    };
  }

  const url = new URL(`${context.config.endpoints.spoonacularBaseURL}${path}`);
  url.searchParams.set("apiKey", apiKey);
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined && value !== "") {
      url.searchParams.set(key, String(value));
    }
  }

  return fetchJSON(url, {
    fetchImpl: context.fetchImpl,
    timeoutMs: context.config.timeouts.recipeApiMs,
    signal: context.signal
  });
}

/**
 * complexSearch only returns summaries, so the single best match is looked up
 * again through the information endpoint to get ingredients and nutrition.
 */
export async function searchThenFetchDetail(params: QueryParams, context: AdapterContext): Promise<AdapterOutcome> {
  const search = await getSpoonacular("/recipes/complexSearch", { ...params, number: 1 }, context);
  if (!search.ok) {
    return { status: "failed", error: search.error };
  }

  const id = firstResultId(search.body);
  if (id === undefined) {
    context.logger.debug({ msg: "Recipe search returned no results", params });
    return { status: "empty" };
  }

  return fetchRecipeDetail(id, context);
}

export async function fetchRecipeDetail(id: number, context: AdapterContext): Promise<AdapterOutcome> {
  const detail = await getSpoonacular(`/recipes/${id}/information`, { includeNutrition: "true" }, context);
  if (!detail.ok) {
    return { status: "failed", error: detail.error };
  }
  if (!isRecord(detail.body)) {
    return {
      status: "failed",
      error: new RecipeSourceError(`Recipe ${id} detail payload is not an object`, "invalid_payload")
    };
  }
  return { status: "found", payload: { kind: "structured", data: detail.body } };
}

function firstResultId(body: unknown): number | undefined {
  if (!isRecord(body) || !Array.isArray(body.results)) {
    return undefined;
  }
  const first: unknown = body.results[0];
  return isRecord(first) ? numeric(first.id) : undefined;
}
