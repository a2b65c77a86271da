import { z } from 'zod';

/** A strategy returns null when it does not apply; the first non-null result wins. */
export type FoodNameStrategy = (reply: string) => string[] | null;

export const PLACEHOLDER_FOOD = 'food';
export const MAX_GUESSED_WORDS = 5;

export const KNOWN_FOODS: readonly string[] = [
  'apple',
  'banana',
  'orange',
  'rice',
  'chicken',
  'beef',
  'pork',
  'fish',
  'bread',
  'pasta',
  'salad',
  'vegetables',
  'fruits',
  'eggs',
  'cheese',
  'yogurt',
  'milk',
  'potato',
  'tomato',
  'carrot',
  'broccoli',
  'spinach',
];

export const STOP_WORDS: ReadonlySet<string> = new Set([
  'the', 'and', 'or', 'but', 'in', 'on', 'at', 'to', 'for', 'of', 'with', 'by', 'a', 'an',
]);

const foodsReplySchema = z.object({
  foods: z.array(z.unknown()).optional(),
});

export const fromJsonObject: FoodNameStrategy = (reply) => {
  const start = reply.indexOf('{');
  const end = reply.lastIndexOf('}');
  if (start === -1 || end <= start) return null;

  let raw: unknown;
  try {
    raw = JSON.parse(reply.slice(start, end + 1));
  } catch {
    return null;
  }

  const parsed = foodsReplySchema.safeParse(raw);
  if (!parsed.success) return null;

  return (parsed.data.foods ?? [])
    .filter((f): f is string => typeof f === 'string')
    .map((f) => f.trim())
    .filter((f) => f.length > 0);
};

export const fromKnownFoods: FoodNameStrategy = (reply) => {
  const text = reply.toLowerCase();
  const found = KNOWN_FOODS.filter((food) => text.includes(food));
  return found.length ? found : null;
};

export const fromLeadingWords: FoodNameStrategy = (reply) => {
  const words = reply
    .toLowerCase()
    .split(/\s+/)
    .filter((w) => w.length > 3 && !STOP_WORDS.has(w))
    .slice(0, MAX_GUESSED_WORDS);
  return words.length ? words : null;
};

export const FOOD_NAME_STRATEGIES: readonly FoodNameStrategy[] = [fromJsonObject, fromKnownFoods, fromLeadingWords];

/**
 * Extracts food names from a free-form classifier reply.
 * An explicit `{"foods": []}` is honoured as "nothing detected".
 */
export function parseFoodNames(reply: string): string[] {
  for (const strategy of FOOD_NAME_STRATEGIES) {
    const names = strategy(reply);
    if (names) return names;
  }
  return [PLACEHOLDER_FOOD];
}
