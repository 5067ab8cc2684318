import { z } from "zod";
import type { NutritionRequest } from "../types/request/nutritionRequest";
import type {
  MacroNutrients,
  NutritionBreakdownResponse,
} from "../types/response/nutrition.response";

const nutritionRequestBody: z.ZodType<NutritionRequest> = z.object({
  foods: z.array(
    z.object({
      item: z.string(),
      quantity: z.string(),
    })
  ),
});

export const nutritionBreakdownSchema = {
  body: nutritionRequestBody,
};

const macrosShape = {
  protein: z.number(),
  carbs: z.number(),
  fat: z.number(),
};

const macrosSchema: z.ZodType<MacroNutrients> = z.object(macrosShape);

export const nutritionResponseSchema: z.ZodType<NutritionBreakdownResponse> = z.object({
  meal_nutrition: z.object({
    total_calories: z.number().int(),
    macros: macrosSchema,
    breakdown: z.array(
      z.object({
        item: z.string(),
        calories: z.number().int(),
        ...macrosShape,
      })
    ),
  }),
});
