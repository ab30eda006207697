import * as cheerio from "cheerio";
import { fetchHTML, type RequestOptions } from "../../services/httpClient.js";
import type { MealTypeQuery } from "../../types/contracts.js";
import type { AdapterContext, AdapterOutcome, RecipeSourceAdapter } from "../types.js";

export const mealTypeAdapter: RecipeSourceAdapter<"meal_type"> = {
  id: "allrecipes_category",
  mode: "meal_type",
  backend: "allrecipes",
  fetch: (query, context) => fetchRecipeByMealType(query, context)
};

export async function fetchRecipeByMealType(query: MealTypeQuery, context: AdapterContext): Promise<AdapterOutcome> {
  const { catalog, timeouts, userAgent } = context.config;
  const categoryURL = catalog.mealTypeCategories[query.mealType];
  const options: RequestOptions = {
    fetchImpl: context.fetchImpl,
    timeoutMs: timeouts.scrapeMs,
    signal: context.signal,
    headers: { "User-Agent": userAgent }
  };

  const listing = await fetchHTML(categoryURL, options);
  if (!listing.ok) {
    return { status: "failed", error: listing.error };
  }

  const links = extractRecipeLinks(listing.body, categoryURL, catalog.recipeLinkPattern);
  const picked = context.pickLink(links);
  if (!picked) {
    context.logger.debug({ msg: "Category page has no recipe links", mealType: query.mealType, url: categoryURL });
    return { status: "empty" };
  }

  const detail = await fetchHTML(picked, options);
  if (!detail.ok) {
    return { status: "failed", error: detail.error };
  }

  return { status: "found", payload: { kind: "scraped", url: picked, html: detail.body } };
}

export function extractRecipeLinks(html: string, baseURL: string, pattern: RegExp): string[] {
  const $ = cheerio.load(html);
  const links = new Set<string>();

  $("a[href]").each((_, element) => {
    const href = $(element).attr("href");
    if (!href || !pattern.test(href)) {
      return;
    }
    try {
      links.add(new URL(href, baseURL).toString());
    } catch {
      return;
    }
  });

  return Array.from(links);
}
