import { formatCacheAge } from '@/lib/cache';
import { cleanIngredientsText } from '@/lib/ingredients/textNormalizer';
import { scaleNutrition } from '@/lib/normalizer';
import { parseServingSize } from '@/lib/servingSize';
import type { ServingUnit } from '@/lib/unitConversions';
import type { LookupResult, NutritionFacts, ProductMatch } from '@/lib/types';

// Above this, the first alternative is shown with a "Recommended" badge
export const RECOMMENDED_CONFIDENCE = 85;

/**
 * Values used to pre-fill the manual entry form from a lookup.
 */
export interface EntryDraft {
  productName: string;
  brand: string;
  barcode?: string;
  servingAmount: string;
  servingUnit: ServingUnit;
  nutritionPer100g: NutritionFacts;
  nutritionPerServing: NutritionFacts;
  ingredientsText: string;
  sourceDomain: string;
  cacheAge: string | null;
}

/**
 * Copy the alternatives in their original order, flagging the first one as
 * recommended when the source was confident about it.
 */
export function annotateMatches(matches: ReadonlyArray<ProductMatch>): ProductMatch[] {
  return matches.map((match, index) => ({
    ...match,
    recommended: index === 0 && (match.confidenceScore ?? 0) > RECOMMENDED_CONFIDENCE,
  }));
}

export function extractSourceDomain(url: string | undefined): string {
  if (!url) return 'Unknown';
  try {
    return new URL(url).hostname.replace(/^www\./, '') || 'Unknown';
  } catch {
    return 'Unknown';
  }
}

// Only mass and volume amounts are on the same basis as per-100g values
function scalableAmount(amount: string, unit: ServingUnit): string {
  return unit === 'g' || unit === 'ml' ? amount : '';
}

export function buildEntryDraft(source: LookupResult | ProductMatch, now: Date = new Date()): EntryDraft {
  const serving = parseServingSize(source.servingSize ?? '');
  const nutritionPer100g = source.nutrition ?? {};
  const cachedAt = 'cachedAt' in source ? source.cachedAt : undefined;

  return {
    productName: source.productName ?? '',
    brand: source.brand ?? '',
    barcode: source.barcode,
    servingAmount: serving.amount,
    servingUnit: serving.unit,
    nutritionPer100g,
    nutritionPerServing: scaleNutrition(nutritionPer100g, scalableAmount(serving.amount, serving.unit)),
    ingredientsText: cleanIngredientsText(source.ingredientsText ?? ''),
    sourceDomain: extractSourceDomain(source.sourceUrl),
    cacheAge: cachedAt ? formatCacheAge(cachedAt, now) : null,
  };
}
