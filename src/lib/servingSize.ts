import { normalizeUnit, SERVING_UNIT_TOKENS, type ServingUnit } from '@/lib/unitConversions';
import { logDebug } from '@/lib/logger';

export interface ParsedServing {
  amount: string;
  unit: ServingUnit;
}

export const DEFAULT_SERVING: Readonly<ParsedServing> = { amount: '100', unit: 'g' };

const MAX_SERVING_AMOUNT = 10000;

const UNIT_PATTERN = SERVING_UNIT_TOKENS.join('|');
const PARENTHESIZED_AMOUNT = new RegExp(`\\((\\d+(?:\\.\\d+)?)\\s*(${UNIT_PATTERN})\\)`);
const AMOUNT_WITH_UNIT = new RegExp(`(\\d+(?:\\.\\d+)?)\\s*(${UNIT_PATTERN})`);

function defaultServing(): ParsedServing {
  return { ...DEFAULT_SERVING };
}

function extractAmountAndUnit(text: string): ParsedServing {
  const match = text.match(AMOUNT_WITH_UNIT);
  if (!match) {
    logDebug('No serving amount found, using default 100g', { text });
    return defaultServing();
  }

  const [, amount, unit] = match;
  const value = Number(amount);
  if (!Number.isFinite(value) || value <= 0 || value >= MAX_SERVING_AMOUNT) {
    logDebug('Serving amount out of range, using default 100g', { amount });
    return defaultServing();
  }

  return { amount, unit: normalizeUnit(unit) };
}

/**
 * Parse a serving size string like "330ml", "30 g" or "1 can (330ml)".
 * A parenthesized amount wins over anything else in the text, since labels
 * put the measurable quantity there ("2 biscuits (25g)").
 * Never throws; unparseable input yields 100g.
 */
export function parseServingSize(text: string): ParsedServing {
  const cleaned = text.trim().toLowerCase();
  if (cleaned.length === 0) {
    return defaultServing();
  }

  const parenthesized = cleaned.match(PARENTHESIZED_AMOUNT);
  if (parenthesized) {
    return extractAmountAndUnit(parenthesized[0].replace(/[()]/g, ''));
  }

  return extractAmountAndUnit(cleaned);
}
