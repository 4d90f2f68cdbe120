/**
 * Serving Unit Normalization
 *
 * Maps the unit spellings found on labels and in AI answers onto the short
 * units the entry form offers.
 */

// ============================================
// Unit Types
// ============================================

export const CANONICAL_UNITS = [
  'g',
  'ml',
  'oz',
  'cup',
  'tbsp',
  'tsp',
  'piece',
  'slice',
  'serving',
] as const;

export type ServingUnit = (typeof CANONICAL_UNITS)[number];

/**
 * Unit tokens recognized after an amount, longest spellings first so the
 * regex alternation prefers "grams" over "g".
 */
export const SERVING_UNIT_TOKENS = [
  'milliliters',
  'kilograms',
  'ounces',
  'pounds',
  'grams',
  'serving',
  'piece',
  'slice',
  'tbsp',
  'tsp',
  'cup',
  'ml',
  'oz',
  'kg',
  'lb',
  'g',
] as const;

// NOTE: kilograms and pounds are relabeled without converting the amount,
// so "1 kg" becomes 1 g and "2 lb" becomes 2 oz. Kept for compatibility with
// entries already saved this way.
const UNIT_SYNONYMS: Record<string, ServingUnit> = {
  milliliters: 'ml',
  milliliter: 'ml',
  mls: 'ml',
  grams: 'g',
  gram: 'g',
  gr: 'g',
  ounces: 'oz',
  ounce: 'oz',
  kilograms: 'g',
  kilogram: 'g',
  kgs: 'g',
  pounds: 'oz',
  pound: 'oz',
  lbs: 'oz',
  lb: 'oz',
  tablespoons: 'tbsp',
  tablespoon: 'tbsp',
  teaspoons: 'tsp',
  teaspoon: 'tsp',
  pieces: 'piece',
  slices: 'slice',
  servings: 'serving',
  cups: 'cup',
};

export function isCanonicalUnit(unit: string): unit is ServingUnit {
  const units: ReadonlyArray<string> = CANONICAL_UNITS;
  return units.includes(unit);
}

/**
 * Normalize a unit name to one of the canonical serving units.
 * Unknown units fall back to grams.
 */
export function normalizeUnit(unit: string): ServingUnit {
  const lowercase = unit.trim().toLowerCase();

  const synonym = UNIT_SYNONYMS[lowercase];
  if (synonym) {
    return synonym;
  }

  return isCanonicalUnit(lowercase) ? lowercase : 'g';
}
