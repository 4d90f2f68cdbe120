import {
  NUTRITION_FIELDS,
  type LookupResult,
  type NutritionFacts,
  type NutritionField,
  type ProductMatch,
} from '@/lib/types';
import type { LookupPayload, MatchPayload, NutritionPayload } from '@/lib/lookup/schemas';

const MAX_SERVING_AMOUNT = 10000;

function optional<T>(value: T | null | undefined): T | undefined {
  return value ?? undefined;
}

function roundField(field: NutritionField, value: number): number {
  // Calories are shown as whole numbers, everything else to one decimal
  if (field === 'calories') {
    return Math.round(value);
  }
  return Math.round(value * 10) / 10;
}

/**
 * Scale factor for a serving amount such as "50" (grams or ml).
 * Anything that is not a plain number in (0, 10000) leaves values as they are.
 */
export function servingScaleFactor(servingSizeText: string): number {
  const trimmed = servingSizeText.trim();
  if (trimmed.length === 0) {
    return 1;
  }
  const value = Number(trimmed);
  if (!Number.isFinite(value) || value <= 0 || value >= MAX_SERVING_AMOUNT) {
    return 1;
  }
  return value / 100;
}

/**
 * Scale per-100g nutrition to a serving amount.
 *
 * The numbers come from an AI response, so a negative or non-finite value
 * never reaches the output: that field is dropped instead.
 */
export function scaleNutrition(facts: NutritionFacts, servingSizeText: string): NutritionFacts {
  const factor = servingScaleFactor(servingSizeText);
  const scaled: NutritionFacts = {};

  for (const field of NUTRITION_FIELDS) {
    const source = facts[field];
    if (source === undefined || !Number.isFinite(source) || source < 0) {
      continue;
    }
    const value = source * factor;
    if (!Number.isFinite(value)) {
      continue;
    }
    scaled[field] = roundField(field, value);
  }

  return scaled;
}

export function hasAnyNutrition(facts: NutritionFacts | undefined): boolean {
  if (!facts) return false;
  return NUTRITION_FIELDS.some((field) => facts[field] !== undefined);
}

/**
 * Convert a nullable payload nutrition block into NutritionFacts,
 * dropping nulls rather than defaulting them to zero.
 */
export function normalizeNutrition(payload: NutritionPayload | null | undefined): NutritionFacts {
  const facts: NutritionFacts = {};
  if (!payload) return facts;

  for (const field of NUTRITION_FIELDS) {
    const value = payload[field];
    if (typeof value === 'number') {
      facts[field] = value;
    }
  }
  return facts;
}

export function normalizeMatch(match: MatchPayload): ProductMatch {
  return {
    productName: match.product_name,
    brand: match.brand,
    barcode: optional(match.barcode),
    servingSize: optional(match.serving_size),
    ingredientsText: match.ingredients_text,
    nutrition: normalizeNutrition(match.nutrition_per_100g),
    sourceUrl: optional(match.source_url),
    confidenceScore: optional(match.confidence_score),
    sourceName: optional(match.source_name),
  };
}

/**
 * Normalize the find-ingredients response body into a LookupResult.
 * Match order is kept exactly as returned.
 */
export function normalizeLookupPayload(payload: LookupPayload, maxResults = 3): LookupResult {
  const result: LookupResult = {
    found: payload.ingredients_found,
    productName: optional(payload.product_name),
    brand: optional(payload.brand),
    barcode: optional(payload.barcode),
    servingSize: optional(payload.serving_size),
    ingredientsText: optional(payload.ingredients_text),
    imageUrl: optional(payload.image_url),
    sourceUrl: optional(payload.source_url),
  };

  if (payload.nutrition_per_100g) {
    result.nutrition = normalizeNutrition(payload.nutrition_per_100g);
  }

  if (payload.matches && payload.matches.length > 0) {
    result.matches = payload.matches.slice(0, maxResults).map(normalizeMatch);
  }

  return result;
}
