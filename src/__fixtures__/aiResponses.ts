import type { DietPlanRequest } from "../types/request/dietPlanRequest";
import type { DietPlanResponse } from "../types/response/dietPlan.response";
import type { NutritionBreakdownResponse } from "../types/response/nutrition.response";

export const samRequest: DietPlanRequest = {
  name: "Sam",
  age: 30,
  goal: "Weight Loss",
  height: 175,
  current_weight: 80,
  target_weight: 70,
  health_conditions: [],
  region: "India",
  cuisine_preference: "Vegetarian",
  allergies: [],
};

export const dietPlan: DietPlanResponse = {
  daily_plan: {
    total_calories: 1800,
    meals: {
      breakfast: { items: ["Vegetable poha", "Green tea"], calories: 400 },
      lunch: { items: ["Brown rice", "Dal tadka", "Cucumber raita"], calories: 650 },
      dinner: { items: ["Two phulkas", "Palak paneer"], calories: 550 },
    },
    snacks: ["Roasted chana", "Apple slices"],
  },
};

export const nutritionBreakdown: NutritionBreakdownResponse = {
  meal_nutrition: {
    total_calories: 390,
    macros: { protein: 14.5, carbs: 70.2, fat: 5.1 },
    breakdown: [
      { item: "Rice (200 gms)", calories: 260, protein: 5.4, carbs: 56.4, fat: 0.6 },
      { item: "Dal (1 bowl)", calories: 130, protein: 9.1, carbs: 13.8, fat: 4.5 },
    ],
  },
};

export const fenced = (value: unknown): string =>
  "Here is the plan you asked for:\n```json\n" + JSON.stringify(value, null, 2) + "\n```\n";
