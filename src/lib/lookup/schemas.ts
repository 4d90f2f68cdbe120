import { z } from 'zod';

// Nutrition numbers come from an AI answer: any field may be null or missing.
const nullableNumber = z.number().nullish();
const nullableString = z.string().nullish();

export const NutritionPayloadSchema = z.object({
  calories: nullableNumber,
  protein: nullableNumber,
  carbs: nullableNumber,
  fat: nullableNumber,
  fiber: nullableNumber,
  sugar: nullableNumber,
  salt: nullableNumber,
});

export const MatchPayloadSchema = z.object({
  product_name: z.string(),
  brand: z.string(),
  barcode: nullableString,
  serving_size: nullableString,
  ingredients_text: z.string(),
  nutrition_per_100g: NutritionPayloadSchema,
  source_url: nullableString,
  confidence_score: nullableNumber,
  source_name: nullableString,
});

/**
 * Body returned by the find-ingredients endpoint.
 */
export const LookupPayloadSchema = z.object({
  ingredients_found: z.boolean(),
  product_name: nullableString,
  brand: nullableString,
  barcode: nullableString,
  serving_size: nullableString,
  ingredients_text: nullableString,
  nutrition_per_100g: NutritionPayloadSchema.nullish(),
  image_url: nullableString,
  source_url: nullableString,
  matches: z.array(MatchPayloadSchema).nullish(),
  cached_at: nullableString,
});

export type NutritionPayload = z.infer<typeof NutritionPayloadSchema>;
export type MatchPayload = z.infer<typeof MatchPayloadSchema>;
export type LookupPayload = z.infer<typeof LookupPayloadSchema>;

/**
 * One pack-size variant as answered by Gemini.
 */
export const GeminiVariantSchema = z.object({
  size_description: nullableString,
  product_name: nullableString,
  brand: nullableString,
  barcode: nullableString,
  serving_size_g: nullableNumber,
  ingredients_text: nullableString,
  nutrition_per_100g: NutritionPayloadSchema.nullish(),
  source_url: nullableString,
  source_name: nullableString,
  confidence_score: nullableNumber,
});

export const GeminiVariantsSchema = z.array(GeminiVariantSchema);

export type GeminiVariant = z.infer<typeof GeminiVariantSchema>;

const StoredNutritionSchema = z.object({
  calories: z.number().optional(),
  protein: z.number().optional(),
  carbs: z.number().optional(),
  fat: z.number().optional(),
  fiber: z.number().optional(),
  sugar: z.number().optional(),
  salt: z.number().optional(),
});

/**
 * Shape of a LookupResult as written to the persistent cache.
 */
export const StoredLookupResultSchema = z.object({
  found: z.boolean(),
  productName: z.string().optional(),
  brand: z.string().optional(),
  barcode: z.string().optional(),
  servingSize: z.string().optional(),
  ingredientsText: z.string().optional(),
  nutrition: StoredNutritionSchema.optional(),
  imageUrl: z.string().optional(),
  sourceUrl: z.string().optional(),
  matches: z
    .array(
      z.object({
        productName: z.string(),
        brand: z.string(),
        barcode: z.string().optional(),
        servingSize: z.string().optional(),
        ingredientsText: z.string(),
        nutrition: StoredNutritionSchema,
        sourceUrl: z.string().optional(),
        confidenceScore: z.number().optional(),
        sourceName: z.string().optional(),
        recommended: z.boolean().optional(),
      })
    )
    .optional(),
  cachedAt: z.string().optional(),
});
