export type Nutrient = {
  name: string;
  amount: number | string;
  unit: string;
};

export type ReadyMinutes = number | "N/A";

export type NormalizedRecipe = {
  title: string;
  imageURL: string;
  readyMinutes: ReadyMinutes;
  ingredients: string[];
  instructions: string;
  nutrients: Nutrient[];
  cuisine: string;
};

export type Venue = {
  name: string;
  rating: number | null;
  address: string;
  reviewCount?: number;
};

export type StructuredApiPayload = {
  kind: "structured";
  data: unknown;
  cuisineHint?: string;
};

export type ScrapedHtmlPayload = {
  kind: "scraped";
  url: string;
  html: string;
};

export type RawRecipePayload = StructuredApiPayload | ScrapedHtmlPayload;

export const NUTRIENT_NAMES = ["Calories", "Protein", "Fat", "Carbs"] as const;
export type NutrientName = (typeof NUTRIENT_NAMES)[number];

export const MEAL_TYPES = ["Breakfast", "Lunch", "Dinner", "Dessert", "Snack"] as const;
export type MealType = (typeof MEAL_TYPES)[number];

export type SearchMode = "personality" | "ingredient" | "nutrients" | "meal_type";

export type PersonalityQuery = {
  personality: string;
  diet: string;
};

export type IngredientQuery = {
  ingredient: string;
  maxTime: number;
};

export type NutrientQuery = {
  nutrient: NutrientName;
  min: number;
  max: number;
  maxTime?: number;
};

export type MealTypeQuery = {
  mealType: MealType;
};

export type SearchQueryByMode = {
  personality: PersonalityQuery;
  ingredient: IngredientQuery;
  nutrients: NutrientQuery;
  meal_type: MealTypeQuery;
};

export type SearchRequest = {
  [M in SearchMode]: { mode: M; location?: string } & SearchQueryByMode[M];
}[SearchMode];

export type NotFoundReason = "empty" | "failed";

export type RecipeLookupResult =
  | { found: true; recipe: NormalizedRecipe; sourceId: string }
  | { found: false; recipe: null; reason: NotFoundReason };

export type SearchOutcome =
  | { state: "found"; recipe: NormalizedRecipe; venues: Venue[] }
  | { state: "not_found"; reason: NotFoundReason; message: string };

export type SearchOptions = {
  personalities: string[];
  diets: string[];
  nutrients: NutrientName[];
  mealTypes: MealType[];
};
