import type { AnalysisResult, NutritionFacts } from './nutrition.types';

export interface FoodItemResponse {
  name: string;
  nutrition: NutritionFacts;
}

export interface NutritionResponse {
  success: boolean;
  foods_detected: FoodItemResponse[];
  total_nutrition: NutritionFacts;
}

export function toNutritionResponse(result: AnalysisResult): NutritionResponse {
  return {
    success: result.success,
    foods_detected: result.foods.map((f) => ({ name: f.name, nutrition: f.nutrition })),
    total_nutrition: result.total,
  };
}
