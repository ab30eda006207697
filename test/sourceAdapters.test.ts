import test from "node:test";
import assert from "node:assert/strict";
import { defaultRecipeCatalog } from "../src/config/recipeCatalog.js";
import { fetchRecipeByPersonality } from "../src/sources/adapters/personality.js";
import { fetchRecipeByIngredient } from "../src/sources/adapters/ingredient.js";
import { fetchRecipeByNutrients, orderedBounds } from "../src/sources/adapters/nutrients.js";
import { extractRecipeLinks, fetchRecipeByMealType } from "../src/sources/adapters/mealType.js";
import { pickAt } from "../src/sources/linkPicker.js";
import { recipeSourceRegistry } from "../src/sources/sourceRegistry.js";
import { RECIPE_DETAIL, PANCAKE_PAGE, adapterContext, fakeFetch, htmlResponse, jsonResponse, testConfig } from "./helpers.js";

const BREAKFAST_URL = "https://www.allrecipes.com/recipes/78/breakfast-and-brunch/";

const CATEGORY_PAGE = `
<html><body>
  <a href="https://www.allrecipes.com/recipe/21014/good-old-fashioned-pancakes/">Pancakes</a>
  <a href="/recipe/20334/banana-pancakes-i/">Banana Pancakes</a>
  <a href="https://www.allrecipes.com/recipe/21014/good-old-fashioned-pancakes/">Pancakes again</a>
  <a href="/recipes/78/breakfast-and-brunch/">Breakfast</a>
  <a href="https://www.allrecipes.com/gallery/best-brunch/">Gallery</a>
</body></html>
`;

test("personality adapter requests the first mapped cuisine with the diet filter", async () => {
  const { fetchImpl, calls } = fakeFetch(() =>
    jsonResponse({ recipes: [{ title: "Vegan BBQ Tofu Skewers", readyInMinutes: 30 }] })
  );

  const outcome = await fetchRecipeByPersonality({ personality: "Extraversion", diet: "Vegan" }, adapterContext(fetchImpl));

  assert.equal(calls.length, 1);
  const url = calls[0]?.url;
  assert.equal(url?.pathname, "/recipes/random");
  assert.equal(url?.searchParams.get("include-tags"), "Vegan,BBQ");
  assert.equal(url?.searchParams.get("number"), "1");
  assert.equal(url?.searchParams.get("apiKey"), "test-spoonacular-key");
  assert.equal(outcome.status, "found");
  if (outcome.status === "found" && outcome.payload.kind === "structured") {
    assert.equal(outcome.payload.cuisineHint, "BBQ");
  }
});

test("personality adapter maps every known personality to its first cuisine and unknown ones to the fallback", async () => {
  const entries = Object.entries(defaultRecipeCatalog.personalityCuisines);
  assert.ok(entries.length > 0);

  for (const [personality, cuisines] of [...entries, ["Stoicism", ["Italian"]] as const]) {
    const { fetchImpl, calls } = fakeFetch(() => jsonResponse({ recipes: [] }));
    await fetchRecipeByPersonality({ personality, diet: "" }, adapterContext(fetchImpl));
    assert.equal(calls[0]?.url.searchParams.get("include-tags"), cuisines[0]);
  }
});

test("personality adapter returns empty without retrying when no recipe matches", async () => {
  const { fetchImpl, calls } = fakeFetch(() => jsonResponse({ recipes: [] }));

  const outcome = await fetchRecipeByPersonality({ personality: "Openness", diet: "Paleo" }, adapterContext(fetchImpl));

  assert.deepEqual(outcome, { status: "empty" });
  assert.equal(calls.length, 1);
});

test("personality adapter retries once without filters after a transient failure", async () => {
  const { fetchImpl, calls } = fakeFetch((url) =>
    url.searchParams.has("include-tags")
      ? jsonResponse({ message: "unavailable" }, 503)
      : jsonResponse({ recipes: [{ title: "Plain Pasta", cuisines: ["Italian"] }] })
  );

  const outcome = await fetchRecipeByPersonality({ personality: "Extraversion", diet: "Vegan" }, adapterContext(fetchImpl));

  assert.equal(calls.length, 2);
  assert.equal(calls[1]?.url.searchParams.has("include-tags"), false);
  assert.equal(outcome.status, "found");
  if (outcome.status === "found" && outcome.payload.kind === "structured") {
    assert.equal(outcome.payload.cuisineHint, undefined);
  }
});

test("personality adapter gives up when the unfiltered retry also fails", async () => {
  const { fetchImpl, calls } = fakeFetch(() => jsonResponse({ message: "unavailable" }, 502));

  const outcome = await fetchRecipeByPersonality({ personality: "Extraversion", diet: "Vegan" }, adapterContext(fetchImpl));

  assert.equal(calls.length, 2);
  assert.equal(outcome.status, "failed");
});

test("personality adapter does not retry a rejected API key", async () => {
  const { fetchImpl, calls } = fakeFetch(() => jsonResponse({ message: "invalid key" }, 401));

  const outcome = await fetchRecipeByPersonality({ personality: "Extraversion", diet: "Vegan" }, adapterContext(fetchImpl));

  assert.equal(calls.length, 1);
  assert.equal(outcome.status, "failed");
  if (outcome.status === "failed") {
    assert.equal(outcome.error.status, 401);
  }
});

test("API adapters fail without a request when no API key is configured", async () => {
  const { fetchImpl, calls } = fakeFetch(() => jsonResponse({}));
  const context = adapterContext(fetchImpl, { config: testConfig({ SPOONACULAR_API_KEY: "" }) });

  const outcome = await fetchRecipeByIngredient({ ingredient: "chicken", maxTime: 30 }, context);

  assert.equal(outcome.status, "failed");
  if (outcome.status === "failed") {
    assert.equal(outcome.error.code, "missing_credentials");
  }
  assert.equal(calls.length, 0);
});

test("ingredient adapter searches one result and then fetches its detail", async () => {
  const { fetchImpl, calls } = fakeFetch((url) =>
    url.pathname === "/recipes/complexSearch"
      ? jsonResponse({ results: [{ id: 715538, title: "Lemon Garlic Salmon" }], totalResults: 1 })
      : jsonResponse(RECIPE_DETAIL)
  );

  const outcome = await fetchRecipeByIngredient({ ingredient: " salmon ", maxTime: 30 }, adapterContext(fetchImpl));

  assert.equal(calls.length, 2);
  assert.equal(calls[0]?.url.searchParams.get("includeIngredients"), "salmon");
  assert.equal(calls[0]?.url.searchParams.get("maxReadyTime"), "30");
  assert.equal(calls[0]?.url.searchParams.get("number"), "1");
  assert.equal(calls[1]?.url.pathname, "/recipes/715538/information");
  assert.equal(calls[1]?.url.searchParams.get("includeNutrition"), "true");
  assert.deepEqual(outcome, { status: "found", payload: { kind: "structured", data: RECIPE_DETAIL } });
});

test("ingredient adapter fails when the detail request fails", async () => {
  const { fetchImpl } = fakeFetch((url) =>
    url.pathname === "/recipes/complexSearch"
      ? jsonResponse({ results: [{ id: 42 }] })
      : jsonResponse({ message: "not found" }, 404)
  );

  const outcome = await fetchRecipeByIngredient({ ingredient: "tofu", maxTime: 20 }, adapterContext(fetchImpl));

  assert.equal(outcome.status, "failed");
});

test("nutrient adapter returns empty and skips the detail fetch when nothing matches", async () => {
  const { fetchImpl, calls } = fakeFetch(() => jsonResponse({ results: [], totalResults: 0 }));

  const outcome = await fetchRecipeByNutrients({ nutrient: "Protein", min: 20, max: 40 }, adapterContext(fetchImpl));

  assert.deepEqual(outcome, { status: "empty" });
  assert.equal(calls.length, 1);
  assert.equal(calls[0]?.url.pathname, "/recipes/complexSearch");
  assert.equal(calls[0]?.url.searchParams.get("minProtein"), "20");
  assert.equal(calls[0]?.url.searchParams.get("maxProtein"), "40");
  assert.equal(calls[0]?.url.searchParams.has("maxReadyTime"), false);
});

test("nutrient adapter swaps bounds given in the wrong order", async () => {
  const { fetchImpl, calls } = fakeFetch(() => jsonResponse({ results: [] }));

  await fetchRecipeByNutrients({ nutrient: "Calories", min: 800, max: 300, maxTime: 45 }, adapterContext(fetchImpl));

  assert.equal(calls[0]?.url.searchParams.get("minCalories"), "300");
  assert.equal(calls[0]?.url.searchParams.get("maxCalories"), "800");
  assert.equal(calls[0]?.url.searchParams.get("maxReadyTime"), "45");
  assert.deepEqual(orderedBounds(5, 5), [5, 5]);
});

test("extractRecipeLinks keeps distinct recipe links resolved against the page", () => {
  const links = extractRecipeLinks(CATEGORY_PAGE, BREAKFAST_URL, defaultRecipeCatalog.recipeLinkPattern);

  assert.deepEqual(links, [
    "https://www.allrecipes.com/recipe/21014/good-old-fashioned-pancakes/",
    "https://www.allrecipes.com/recipe/20334/banana-pancakes-i/"
  ]);
});

test("meal type adapter scrapes the link chosen by the picker", async () => {
  const { fetchImpl, calls } = fakeFetch((url) =>
    url.href === BREAKFAST_URL ? htmlResponse(CATEGORY_PAGE) : htmlResponse(PANCAKE_PAGE)
  );

  const outcome = await fetchRecipeByMealType({ mealType: "Breakfast" }, adapterContext(fetchImpl, { pickLink: pickAt(1) }));

  assert.equal(calls.length, 2);
  assert.equal(calls[1]?.url.href, "https://www.allrecipes.com/recipe/20334/banana-pancakes-i/");
  assert.equal(new Headers(calls[0]?.init?.headers).get("User-Agent"), testConfig().userAgent);
  assert.deepEqual(outcome, {
    status: "found",
    payload: { kind: "scraped", url: "https://www.allrecipes.com/recipe/20334/banana-pancakes-i/", html: PANCAKE_PAGE }
  });
});

test("meal type adapter stops when the category page fails", async () => {
  const { fetchImpl, calls } = fakeFetch(() => htmlResponse("<h1>Server error</h1>", 500));

  const outcome = await fetchRecipeByMealType({ mealType: "Breakfast" }, adapterContext(fetchImpl));

  assert.equal(outcome.status, "failed");
  assert.equal(calls.length, 1);
  assert.equal(calls[0]?.url.href, BREAKFAST_URL);
});

test("meal type adapter returns empty when the category page lists no recipes", async () => {
  const { fetchImpl, calls } = fakeFetch(() => htmlResponse("<html><body><a href='/about'>About</a></body></html>"));

  const outcome = await fetchRecipeByMealType({ mealType: "Dessert" }, adapterContext(fetchImpl));

  assert.deepEqual(outcome, { status: "empty" });
  assert.equal(calls.length, 1);
});

test("registry binds every search mode to exactly one adapter", () => {
  assert.deepEqual(
    Object.entries(recipeSourceRegistry).map(([mode, adapter]) => [mode, adapter.mode, adapter.backend]),
    [
      ["personality", "personality", "spoonacular"],
      ["ingredient", "ingredient", "spoonacular"],
      ["nutrients", "nutrients", "spoonacular"],
      ["meal_type", "meal_type", "allrecipes"]
    ]
  );
});
