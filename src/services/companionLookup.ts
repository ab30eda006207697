import type { RecipeServiceConfig } from "../config/serviceConfig.js";
import type { Venue } from "../types/contracts.js";
import type { Logger } from "../utils/logger.js";
import { isBlank, isRecord, numeric, readString, type UnknownRecord } from "../utils/normalize.js";
import { fetchJSON, type FetchLike } from "./httpClient.js";

export const MAX_VENUES = 5;
export const ADDRESS_NOT_AVAILABLE = "Address not available";

export type VenueLookupContext = {
  config: RecipeServiceConfig;
  fetchImpl: FetchLike;
  logger: Logger;
  signal?: AbortSignal;
};

export type VenueLookupResult = {
  venues: Venue[];
  /** False when the backend could not be asked or failed; the venue list is then empty. */
  succeeded: boolean;
};

export async function findNearbyVenues(
  location: string,
  cuisine: string,
  context: VenueLookupContext
): Promise<VenueLookupResult> {
  if (isBlank(location)) {
    return { venues: [], succeeded: true };
  }

  const apiKey = context.config.credentials.yelpApiKey;
  if (!apiKey) {
    context.logger.warn({ msg: "YELP_API_KEY is not configured, skipping restaurant lookup" });
    return { venues: [], succeeded: false };
  }

  const url = new URL(`${context.config.endpoints.yelpBaseURL}/businesses/search`);
  url.searchParams.set("term", searchTerm(cuisine, context.config.catalog.defaultCuisine));
  url.searchParams.set("location", location.trim());
  url.searchParams.set("limit", String(MAX_VENUES));
  url.searchParams.set("sort_by", "best_match");

  const result = await fetchJSON(url, {
    fetchImpl: context.fetchImpl,
    timeoutMs: context.config.timeouts.recipeApiMs,
    signal: context.signal,
    headers: { Authorization: `Bearer ${apiKey}` }
  });

  if (!result.ok) {
    context.logger.warn({
      msg: "Restaurant lookup failed",
      code: result.error.code,
      status: result.error.status,
      error: result.error.message
    });
    return { venues: [], succeeded: false };
  }

  return { venues: parseVenues(result.body), succeeded: true };
}

export function parseVenues(payload: unknown): Venue[] {
  const businesses: unknown[] = isRecord(payload) && Array.isArray(payload.businesses) ? payload.businesses : [];

  return businesses
    .map(toVenue)
    .filter((venue): venue is Venue => venue !== null)
    .slice(0, MAX_VENUES);
}

function toVenue(business: unknown): Venue | null {
  if (!isRecord(business)) {
    return null;
  }
  const name = readString(business.name);
  if (!name) {
    return null;
  }

  const location: UnknownRecord = isRecord(business.location) ? business.location : {};
  const venue: Venue = {
    name,
    rating: numeric(business.rating) ?? null,
    address: readString(location.address1) ?? ADDRESS_NOT_AVAILABLE
  };

  const reviewCount = numeric(business.review_count);
  if (reviewCount !== undefined) {
    venue.reviewCount = reviewCount;
  }
  return venue;
}

function searchTerm(cuisine: string, defaultCuisine: string): string {
  const normalized = cuisine.trim();
  if (!normalized || normalized.toLowerCase() === defaultCuisine.toLowerCase()) {
    return "restaurants";
  }
  return normalized;
}
