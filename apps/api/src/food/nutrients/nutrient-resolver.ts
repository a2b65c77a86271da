import { Injectable, Logger } from '@nestjs/common';
import { errorMessage } from '../../common/errors';
import { UsdaService } from '../usda/usda.service';
import type { UsdaFood } from '../usda/usda.types';
import { emptyNutrition, type NutrientField, type NutritionFacts } from '../nutrition.types';

// FoodData Central nutrient ids
export const USDA_NUTRIENT_FIELDS: ReadonlyMap<number, NutrientField> = new Map<number, NutrientField>([
  [1008, 'calories'], // Energy (kcal)
  [1003, 'protein'],
  [1005, 'carbs'], // Carbohydrate, by difference
  [1004, 'fat'], // Total lipid (fat)
  [1079, 'fiber'], // Fiber, total dietary
  [2000, 'sugar'], // Sugars, total
  [1093, 'sodium'],
  [1253, 'cholesterol'],
]);

export function extractNutrition(food: UsdaFood): NutritionFacts {
  const facts = emptyNutrition();

  for (const nutrient of food.foodNutrients) {
    if (nutrient.nutrientId === undefined || nutrient.value === undefined) continue;
    const field = USDA_NUTRIENT_FIELDS.get(nutrient.nutrientId);
    if (!field || !Number.isFinite(nutrient.value) || nutrient.value < 0) continue;
    facts[field] = nutrient.value;
  }

  return facts;
}

@Injectable()
export class NutrientResolver {
  private readonly logger = new Logger(NutrientResolver.name);

  constructor(private readonly usda: UsdaService) {}

  /** Never rejects: a miss and a failed lookup both resolve to zeros, logged at different levels. */
  async resolve(label: string): Promise<NutritionFacts> {
    this.logger.debug(`Resolving nutrient data for: ${label}`);

    try {
      const food = await this.usda.searchBestMatch(label);

      if (!food) {
        this.logger.warn(`Food "${label}" not found in USDA database`);
        return emptyNutrition();
      }

      return extractNutrition(food);
    } catch (error) {
      this.logger.error(`USDA lookup failed for "${label}": ${errorMessage(error)}`);
      return emptyNutrition();
    }
  }
}
