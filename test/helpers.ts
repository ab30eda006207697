import pino from "pino";
import { parseEnv } from "../src/config/env.js";
import { buildRecipeServiceConfig, type RecipeServiceConfig } from "../src/config/serviceConfig.js";
import { pickAt } from "../src/sources/linkPicker.js";
import type { AdapterContext } from "../src/sources/types.js";

export const silentLogger = pino({ level: "silent" });

export function testConfig(overrides: NodeJS.ProcessEnv = {}): RecipeServiceConfig {
  return buildRecipeServiceConfig(
    parseEnv({
      SPOONACULAR_API_KEY: "test-spoonacular-key",
      YELP_API_KEY: "test-yelp-key",
      ...overrides
    })
  );
}

export type RecordedCall = {
  url: URL;
  init?: RequestInit;
};

export function fakeFetch(handler: (url: URL, init?: RequestInit) => Response | Promise<Response>) {
  const calls: RecordedCall[] = [];
  const fetchImpl: typeof fetch = async (input, init) => {
    const url = new URL(String(input));
    calls.push({ url, init });
    return handler(url, init);
  };
  return { fetchImpl, calls };
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" }
  });
}

export function htmlResponse(body: string, status = 200): Response {
  return new Response(body, {
    status,
    headers: { "Content-Type": "text/html" }
  });
}

export function adapterContext(fetchImpl: typeof fetch, overrides: Partial<AdapterContext> = {}): AdapterContext {
  return {
    config: testConfig(),
    fetchImpl,
    pickLink: pickAt(0),
    logger: silentLogger,
    ...overrides
  };
}

export const RECIPE_DETAIL = {
  id: 715538,
  title: "Lemon Garlic Salmon",
  image: "https://img.example.com/salmon.jpg",
  readyInMinutes: 25,
  cuisines: ["Mediterranean"],
  extendedIngredients: [
    { original: "2 salmon fillets", name: "salmon" },
    { name: "lemon" }
  ],
  instructions: "Bake the salmon with lemon and garlic.",
  nutrition: {
    nutrients: [
      { name: "Calories", amount: 410.5, unit: "kcal" },
      { name: "Protein", amount: 34, unit: "g" }
    ]
  }
};

export const PANCAKE_PAGE = `
<!doctype html>
<html>
  <head><title>Fluffy Buttermilk Pancakes Recipe</title></head>
  <body>
    <h1 class="article-heading">  Fluffy Buttermilk Pancakes </h1>
    <img class="primary-image__image" data-src="https://images.example.com/pancakes.jpg" src="data:image/gif;base64,R0lGOD">
    <ul>
      <li class="mm-recipes-structured-ingredients__list-item">
        <p><span>2 cups</span> <span>all-purpose flour</span></p>
      </li>
      <li class="mm-recipes-structured-ingredients__list-item"><p>2 large eggs</p></li>
    </ul>
    <ol class="mntl-sc-block-group--OL">
      <li><p>Whisk the dry ingredients.</p></li>
      <li><p>Fold in the   eggs and buttermilk.</p></li>
    </ol>
    <table>
      <tr class="mm-recipes-nutrition-facts-summary__table-row"><td>285</td><td>Calories</td></tr>
      <tr class="mm-recipes-nutrition-facts-summary__table-row"><td>Protein</td><td>9g</td></tr>
    </table>
  </body>
</html>
`;
