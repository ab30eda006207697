import { z } from "zod";

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  PORT: z.coerce.number().min(1).max(65535).default(8080),

  // Rate limiting
  SEARCH_RATE_WINDOW_MS: z.coerce.number().default(60_000),
  SEARCH_RATE_MAX: z.coerce.number().default(30),

  // CORS
  CORS_ORIGIN: z.string().default("*"),

  // Logging
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
  LOG_PRETTY: z.string().transform((val) => val === "true").default("true"),

  // Structured recipe API
  SPOONACULAR_API_KEY: z.string().optional(),
  SPOONACULAR_API_URL: z.string().url().default("https://api.spoonacular.com"),
  RECIPE_API_TIMEOUT_MS: z.coerce.number().min(100).default(10_000),

  // Recipe site scraping
  SCRAPE_TIMEOUT_MS: z.coerce.number().min(100).default(10_000),
  SCRAPER_USER_AGENT: z.string().default("Mozilla/5.0 (compatible; RecipeCompass/0.1)"),

  // Restaurant lookup
  YELP_API_KEY: z.string().optional(),
  YELP_API_URL: z.string().url().default("https://api.yelp.com/v3"),

  // Search memoization
  RECIPE_CACHE_TTL_SECONDS: z.coerce.number().min(0).default(60 * 60 * 24),
  RECIPE_CACHE_MAX_ENTRIES: z.coerce.number().int().min(1).default(1_000),
});

export type Env = z.infer<typeof envSchema>;

let env: Env | undefined;

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    console.error("Invalid environment variables:");
    console.error(result.error.flatten().fieldErrors);
    throw new Error("Invalid environment configuration");
  }

  return result.data;
}

export function getEnv(): Env {
  if (env) {
    return env;
  }

  env = parseEnv(process.env);
  return env;
}

export function initEnv(): Env {
  const e = getEnv();

  if (e.NODE_ENV === "development") {
    console.log("Running in development mode");
    console.log("Port:", e.PORT);
    if (!e.SPOONACULAR_API_KEY) {
      console.log("SPOONACULAR_API_KEY is not set, recipe API searches will return nothing");
    }
    if (!e.YELP_API_KEY) {
      console.log("YELP_API_KEY is not set, restaurant lookups will return nothing");
    }
  }

  return e;
}
