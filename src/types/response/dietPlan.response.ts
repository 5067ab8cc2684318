export interface MealItems {
  items: string[];
  calories: number;
}

export interface Meals {
  breakfast: MealItems;
  lunch: MealItems;
  dinner: MealItems;
}

export interface DailyPlan {
  total_calories: number;
  meals: Meals;
  snacks: string[];
}

export interface DietPlanResponse {
  daily_plan: DailyPlan;
}
