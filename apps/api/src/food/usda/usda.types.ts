import { z } from 'zod';

// Only the fields the resolver reads; unknown keys are dropped.
const usdaFoodNutrientSchema = z.object({
  nutrientId: z.number().optional().catch(undefined),
  nutrientName: z.string().optional().catch(undefined),
  unitName: z.string().optional().catch(undefined),
  value: z.number().optional().catch(undefined),
});

type UsdaFoodNutrient = z.infer<typeof usdaFoodNutrientSchema>;

const usdaFoodSchema = z.object({
  fdcId: z.number(),
  description: z.string(),
  dataType: z.string().optional(),
  // a malformed entry is dropped, not the whole food
  foodNutrients: z
    .array(usdaFoodNutrientSchema.nullable().catch(null))
    .default([])
    .transform((list) => list.filter((n): n is UsdaFoodNutrient => n !== null)),
});

export const usdaSearchResponseSchema = z.object({
  totalHits: z.number().optional(),
  foods: z.array(usdaFoodSchema).default([]),
});

export type UsdaFood = z.infer<typeof usdaFoodSchema>;

/** Curated sources, most authoritative first. */
export const USDA_DATA_TYPES = ['Foundation', 'SR Legacy'] as const;
