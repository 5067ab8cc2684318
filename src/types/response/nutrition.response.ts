export interface MacroNutrients {
  protein: number;
  carbs: number;
  fat: number;
}

export interface NutritionBreakdown extends MacroNutrients {
  /** Food name with quantity, e.g. "Rice (200 gms)" */
  item: string;
  calories: number;
}

export interface MealNutrition {
  total_calories: number;
  macros: MacroNutrients;
  breakdown: NutritionBreakdown[];
}

export interface NutritionBreakdownResponse {
  meal_nutrition: MealNutrition;
}
