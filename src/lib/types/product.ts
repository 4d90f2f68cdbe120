// Nutrition values on the canonical basis: per 100g / 100ml.
// A missing field means "unknown", never zero.
export interface NutritionFacts {
  calories?: number;
  protein?: number; // grams
  carbs?: number; // grams
  fat?: number; // grams
  fiber?: number; // grams
  sugar?: number; // grams
  salt?: number; // grams
}

export const NUTRITION_FIELDS = [
  'calories',
  'protein',
  'carbs',
  'fat',
  'fiber',
  'sugar',
  'salt',
] as const satisfies ReadonlyArray<keyof NutritionFacts>;

export type NutritionField = (typeof NUTRITION_FIELDS)[number];

export interface ProductMatch {
  productName: string;
  brand: string;
  barcode?: string;
  servingSize?: string; // free-form, e.g. "1 can (330ml)"
  ingredientsText: string;
  nutrition: NutritionFacts;
  sourceUrl?: string;
  confidenceScore?: number; // 0-100
  sourceName?: string; // e.g. "Tesco"
  recommended?: boolean;
}

export interface LookupResult {
  found: boolean;
  productName?: string;
  brand?: string;
  barcode?: string;
  servingSize?: string;
  ingredientsText?: string;
  nutrition?: NutritionFacts;
  imageUrl?: string;
  sourceUrl?: string;
  matches?: ProductMatch[]; // alternatives, at most 3
  cachedAt?: string; // ISO timestamp, only set for cached results
}

/**
 * Hints the user adds when the first result was the wrong product.
 * Only varies the search and the cache key.
 */
export interface RefinementContext {
  store?: string;
  packageSize?: string;
  additionalDetails?: string;
}

export type CacheType = 'standard' | 'alternatives' | 'refinement';

export interface LookupRequest {
  productName: string;
  brand?: string;
  barcode?: string;
  refinementContext?: RefinementContext;
  skipCache?: boolean;
  maxResults?: number; // 1-3
}
