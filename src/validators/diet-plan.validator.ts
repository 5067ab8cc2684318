import { z } from "zod";
import type { DietPlanRequest } from "../types/request/dietPlanRequest";
import type { DietPlanResponse, MealItems } from "../types/response/dietPlan.response";

const dietPlanRequestBody: z.ZodType<DietPlanRequest, z.ZodTypeDef, unknown> = z.object({
  name: z.string(),
  age: z.number().int(),
  goal: z.string(),
  height: z.number().int(),
  current_weight: z.number(),
  target_weight: z.number(),
  health_conditions: z.array(z.string()).default([]),
  region: z.string(),
  cuisine_preference: z.string(),
  allergies: z.array(z.string()).default([]),
});

export const generateDietPlanSchema = {
  body: dietPlanRequestBody,
};

const mealItemsSchema: z.ZodType<MealItems> = z.object({
  items: z.array(z.string()),
  calories: z.number().int(),
});

export const dietPlanResponseSchema: z.ZodType<DietPlanResponse> = z.object({
  daily_plan: z.object({
    total_calories: z.number().int(),
    meals: z.object({
      breakfast: mealItemsSchema,
      lunch: mealItemsSchema,
      dinner: mealItemsSchema,
    }),
    snacks: z.array(z.string()),
  }),
});
