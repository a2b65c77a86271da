import { Injectable } from '@nestjs/common';
import { emptyNutrition, NUTRIENT_FIELDS, type FoodItem, type NutritionFacts } from '../nutrition.types';

export function roundTo2(value: number): number {
  return Math.round((value + Number.EPSILON) * 100) / 100;
}

@Injectable()
export class NutritionComposer {
  /** Element-wise sum across items, each field rounded to two decimals. */
  total(items: readonly FoodItem[]): NutritionFacts {
    const sum = emptyNutrition();

    for (const item of items) {
      for (const field of NUTRIENT_FIELDS) {
        sum[field] += item.nutrition[field];
      }
    }

    for (const field of NUTRIENT_FIELDS) {
      sum[field] = roundTo2(sum[field]);
    }

    return sum;
  }
}
