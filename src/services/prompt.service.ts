import type { DietPlanRequest } from "../types/request/dietPlanRequest";
import type { NutritionRequest } from "../types/request/nutritionRequest";

const listOrNone = (values: string[]): string =>
  values.length > 0 ? values.join(", ") : "None";

const DIET_PLAN_OUTPUT_FORMAT = `{
  "daily_plan": {
    "total_calories": <number>,
    "meals": {
      "breakfast": {
        "items": ["item1", "item2"],
        "calories": <number>
      },
      "lunch": {
        "items": ["item1", "item2", "item3"],
        "calories": <number>
      },
      "dinner": {
        "items": ["item1", "item2"],
        "calories": <number>
      }
    },
    "snacks": ["snack1", "snack2"]
  }
}`;

const NUTRITION_OUTPUT_FORMAT = `{
  "meal_nutrition": {
    "total_calories": <number>,
    "macros": {
      "protein": <number in grams>,
      "carbs": <number in grams>,
      "fat": <number in grams>
    },
    "breakdown": [
      {
        "item": "<name> (<quantity>)",
        "calories": <number>,
        "protein": <number in grams>,
        "carbs": <number in grams>,
        "fat": <number in grams>
      }
    ]
  }
}`;

/**
 * Build the Gemini prompt for a personalized daily diet plan.
 */
export const buildDietPlanPrompt = (request: DietPlanRequest): string =>
  `You are a professional nutritionist and dietitian. Generate a personalized diet plan as a JSON object.

User Profile:
- Name: ${request.name}
- Age: ${request.age} years
- Goal: ${request.goal}
- Height: ${request.height} cm
- Current Weight: ${request.current_weight} kg
- Target Weight: ${request.target_weight} kg
- Health Conditions: ${listOrNone(request.health_conditions)}
- Region: ${request.region}
- Cuisine Preference: ${request.cuisine_preference}
- Allergies: ${listOrNone(request.allergies)}

Calculate appropriate daily calorie intake based on the user's goal and body metrics.

Requirements:
1. Generate a SINGLE representative daily plan
2. Total daily calories should be appropriate for the user's goal
3. Include breakfast, lunch, and dinner with specific items
4. All food items must comply with cuisine preference and avoid allergens
5. Use regional cuisine from ${request.region}
6. Consider health conditions when selecting foods
7. Include 2-3 healthy snacks

Output Format (valid JSON only, no markdown):
${DIET_PLAN_OUTPUT_FORMAT}

Important:
- Return ONLY valid JSON, no additional text or explanation
- Make the diet plan healthy, balanced, and appropriate for the goal
- Ensure item names are clear and specific`;

/**
 * Build the Gemini prompt for a per-item nutrition breakdown.
 */
export const buildNutritionPrompt = (request: NutritionRequest): string => {
  const foods = request.foods.map((food) => `- ${food.item}: ${food.quantity}`).join("\n");

  return `You are a professional nutritionist. Analyze the nutritional content of the following food items.

Food Items:
${foods}

Provide accurate nutritional breakdown including calories, protein, carbohydrates, and fats.

Output Format (valid JSON only, no markdown):
${NUTRITION_OUTPUT_FORMAT}

Important:
- Return ONLY valid JSON, no additional text or explanation
- Provide realistic and accurate nutritional values
- Ensure breakdown matches individual food items`;
};
