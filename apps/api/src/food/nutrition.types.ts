export const NUTRIENT_FIELDS = [
  'calories',
  'protein',
  'carbs',
  'fat',
  'fiber',
  'sugar',
  'sodium',
  'cholesterol',
] as const;

export type NutrientField = (typeof NUTRIENT_FIELDS)[number];

/** Energy in kcal, sodium and cholesterol in mg, everything else in g. All zeros means no data. */
export type NutritionFacts = Readonly<Record<NutrientField, number>>;

export interface FoodItem {
  readonly name: string;
  readonly nutrition: NutritionFacts;
}

export interface AnalysisResult {
  success: boolean;
  foods: FoodItem[];
  total: NutritionFacts;
}

export function emptyNutrition(): Record<NutrientField, number> {
  return {
    calories: 0,
    protein: 0,
    carbs: 0,
    fat: 0,
    fiber: 0,
    sugar: 0,
    sodium: 0,
    cholesterol: 0,
  };
}
