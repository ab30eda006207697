import { z } from "zod";
import { MEAL_TYPES, NUTRIENT_NAMES } from "../types/contracts.js";

const locationField = z.string().trim().max(200).optional();
const minutesField = z.coerce.number().int().positive().max(24 * 60);

export const personalitySearchSchema = z.object({
  mode: z.literal("personality"),
  personality: z.string().trim().min(1).max(60),
  diet: z.string().trim().max(60).default(""),
  location: locationField
});

export const ingredientSearchSchema = z.object({
  mode: z.literal("ingredient"),
  ingredient: z.string().trim().min(1).max(120),
  maxTime: minutesField,
  location: locationField
});

export const nutrientSearchSchema = z.object({
  mode: z.literal("nutrients"),
  nutrient: z.enum(NUTRIENT_NAMES),
  min: z.coerce.number().min(0),
  max: z.coerce.number().min(0),
  maxTime: minutesField.optional(),
  location: locationField
});

export const mealTypeSearchSchema = z.object({
  mode: z.literal("meal_type"),
  mealType: z.enum(MEAL_TYPES),
  location: locationField
});

export const searchRequestSchema = z.discriminatedUnion("mode", [
  personalitySearchSchema,
  ingredientSearchSchema,
  nutrientSearchSchema,
  mealTypeSearchSchema
]);

export const venueQuerySchema = z.object({
  location: z.string().trim().max(200).default(""),
  cuisine: z.string().trim().max(60).default("")
});

