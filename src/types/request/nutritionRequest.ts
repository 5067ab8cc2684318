export interface FoodItem {
  item: string;
  /** Free text, e.g. "200 gms" or "4 pieces" */
  quantity: string;
}

export interface NutritionRequest {
  foods: FoodItem[];
}
