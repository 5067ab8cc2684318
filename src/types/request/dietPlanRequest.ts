export interface DietPlanRequest {
  name: string;
  age: number;
  goal: string;
  /** cm */
  height: number;
  /** kg */
  current_weight: number;
  /** kg */
  target_weight: number;
  health_conditions: string[];
  region: string;
  cuisine_preference: string;
  allergies: string[];
}
