export interface LabelerProvider {
  /** Ordered food names as the model reported them; duplicates are kept. */
  extractFoods(image: Buffer, mimeType: string): Promise<string[]>;
}

export const LABELER_PROVIDER = Symbol('LABELER_PROVIDER');

export const FOOD_PROMPT =
  'Identify every food and ingredient visible in this image. ' +
  'Respond with JSON only, shaped like {"foods": ["apple", "banana", "rice"]}, and no other text.';
