import vocabulary from './labelVocabulary.json';

/**
 * Ingredient text normalization for recognized (OCR) label text.
 *
 * Recognized text is a whole label: product name, ingredients, nutrition
 * table, storage advice, manufacturer address. These helpers cut out the
 * ingredients part and strip what is left of the rest. Nothing here throws;
 * the worst case returns the input unchanged.
 */

// Non-nutrition end markers closer than this to the start of the section
// are usually part of an ingredient ("milk (from England)").
const MIN_SECTION_LENGTH = 30;
// A nutrition keyword this early is more likely an ingredient ("energy drink").
const MIN_TRUNCATION_PREFIX = 50;
const MIN_LONG_LINE = 50;

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Regex source for a phrase that must start and end on a word boundary
 * where the phrase itself starts or ends with a word character.
 */
function phrasePattern(phrase: string): string {
  const lead = /^\w/.test(phrase) ? '\\b' : '';
  const tail = /\w$/.test(phrase) ? '\\b' : '';
  return `${lead}${escapeRegExp(phrase)}${tail}`;
}

function byLengthDesc(a: string, b: string): number {
  return b.length - a.length;
}

const NUTRITION_MARKERS = vocabulary.nutritionMarkers.map(
  (marker) => new RegExp(phrasePattern(marker), 'gi')
);
const END_MARKERS = vocabulary.endMarkers.map(
  (marker) => new RegExp(phrasePattern(marker), 'gi')
);
const HEADER_PHRASES = [...vocabulary.headerPhrases]
  .sort(byLengthDesc)
  .map((phrase) => new RegExp(`${phrasePattern(phrase)}\\s*:?`, 'gi'));
const NUTRITION_KEYWORDS = new RegExp(
  [...vocabulary.nutritionKeywords].sort(byLengthDesc).map(phrasePattern).join('|'),
  'i'
);

// Applied in order; later patterns see the output of earlier ones
const NOISE_PATTERNS: RegExp[] = [
  // Best before / use by / storage advice, up to the end of the sentence
  /\b(?:best before(?: end)?|use by|display until|store in|store at|store below|keep refrigerated|keep frozen|once opened|after opening)\b[^.;]*[.;]?/gi,
  // Weight call-outs
  /\b(?:net\s+)?(?:weight|wt\.?|net)\s*:?\s*\d+(?:\.\d+)?\s*(?:kg|g|ml|cl|l)\b\s*℮?/gi,
  /\b\d+(?:\.\d+)?\s*(?:kg|g|ml|cl|l)\s*℮/gi,
  // URLs, with and without a scheme
  /\b(?:https?:\/\/|www\.)\S+/gi,
  /(?<![@\w.-])(?:[a-z0-9-]+\.)+(?:com|co\.uk|org|net|ie|eu)\b(?:\/\S*)?/gi,
  // Phone numbers
  /(?:\b(?:tel|phone|call us|freephone)\.?\s*:?\s*)?(?:\+\d{1,3}[\s-]?)?(?:\(\d{2,5}\)|\b\d{2,5})(?:[\s-]?\d{3,4}){2}\b/gi,
  // Batch / lot codes
  /\b(?:batch|lot)\s*(?:no\.?|number|code)?\s*:?\s*[a-z0-9-]*\d[a-z0-9-]*/gi,
  // UK postcodes (upper case only, so E-numbers survive)
  /\b[A-Z]{1,2}\d[A-Z\d]?\s*\d[A-Z]{2}\b/g,
  // Street addresses
  /\b\d{1,5}[a-z]?\s+(?:[a-z]+\s+){1,3}(?:street|st|road|rd|avenue|ave|lane|ln|way|drive|dr|close|place|park|court|crescent)\b\.?/gi,
  // Company name followed by the rest of the address
  /[^,.;]*\b(?:ltd|limited|plc|llc|inc|gmbh)\b[\s\S]*$/i,
  // Emails
  /\b[\w.+-]+@[\w-]+(?:\.[\w-]+)+/g,
];

const E_NUMBER = /\bE\d{3,4}[a-z]?\b/i;

function firstMatchIndex(pattern: RegExp, text: string, minIndex = 0): number {
  pattern.lastIndex = 0;
  let match = pattern.exec(text);
  while (match) {
    if (match.index >= minIndex) {
      return match.index;
    }
    match = pattern.exec(text);
  }
  return -1;
}

function findStartMarker(lower: string): { index: number; length: number } | null {
  let best: { index: number; length: number } | null = null;
  for (const marker of vocabulary.startMarkers) {
    const index = lower.indexOf(marker);
    // Strict comparison: at equal offsets the earlier-listed marker wins
    if (index >= 0 && (best === null || index < best.index)) {
      best = { index, length: marker.length };
    }
  }
  return best;
}

function findSectionEnd(candidate: string): number {
  let cut = -1;
  const consider = (index: number) => {
    if (index >= 0 && (cut < 0 || index < cut)) {
      cut = index;
    }
  };

  for (const marker of NUTRITION_MARKERS) {
    consider(firstMatchIndex(marker, candidate));
  }
  for (const marker of END_MARKERS) {
    consider(firstMatchIndex(marker, candidate, MIN_SECTION_LENGTH));
  }
  return cut;
}

function isIngredientLikeLine(line: string): boolean {
  if (!line.includes(',')) {
    return false;
  }
  return (
    (line.includes('(') && line.includes(')')) ||
    E_NUMBER.test(line) ||
    line.includes('%') ||
    line.length > MIN_LONG_LINE
  );
}

function extractIngredientLines(rawText: string): string | null {
  const collected: string[] = [];

  for (const rawLine of rawText.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (collected.length === 0) {
      if (isIngredientLikeLine(line)) {
        collected.push(line);
      }
      continue;
    }
    if (!line.includes(',')) {
      break;
    }
    collected.push(line);
  }

  return collected.length > 0 ? collected.join(' ') : null;
}

/**
 * Pull the ingredients section out of recognized label text.
 *
 * Looks for an "Ingredients" heading (several languages) and cuts the text
 * after it at the nutrition table or at the first storage / allergen /
 * manufacturer marker. Without a heading, falls back to the first run of
 * comma-separated lines that look like an ingredient list.
 */
export function extractIngredientsSection(rawText: string): string {
  const start = findStartMarker(rawText.toLowerCase());

  if (start) {
    let candidate = rawText.slice(start.index + start.length);
    const end = findSectionEnd(candidate);
    if (end >= 0) {
      candidate = candidate.slice(0, end);
    }
    const section = candidate.trim();
    if (section.length > 0) {
      return section;
    }
  }

  return extractIngredientLines(rawText) ?? rawText;
}

/**
 * Clean an ingredients string: drop label headings, anything after the
 * nutrition table, dates, codes, contact details and addresses, then tidy
 * whitespace and punctuation.
 */
export function cleanIngredientsText(text: string): string {
  let cleaned = text;

  for (const phrase of HEADER_PHRASES) {
    cleaned = cleaned.replace(phrase, ' ');
  }

  const nutritionIndex = cleaned.search(NUTRITION_KEYWORDS);
  if (nutritionIndex >= MIN_TRUNCATION_PREFIX) {
    cleaned = cleaned.slice(0, nutritionIndex);
  }

  for (const pattern of NOISE_PATTERNS) {
    cleaned = cleaned.replace(pattern, ' ');
  }

  cleaned = cleaned.split(/\s+/).filter(Boolean).join(' ');

  cleaned = cleaned.replace(/\s+,/g, ',').replace(/,(?:\s*,)+/g, ',');

  return cleaned.replace(/^[\s,.;:\-–]+/, '').replace(/[\s,.;:\-–]+$/, '');
}

/**
 * Entry point for OCR output: extract the section, then clean it.
 */
export function extractIngredientsFromRecognizedText(rawText: string): string {
  return cleanIngredientsText(extractIngredientsSection(rawText));
}

/**
 * Split a cleaned ingredient list on top-level commas, keeping
 * sub-ingredients in parentheses together.
 */
export function splitIngredients(text: string): string[] {
  const parts: string[] = [];
  let depth = 0;
  let current = '';

  for (const char of text) {
    if (char === '(' || char === '[') depth += 1;
    if ((char === ')' || char === ']') && depth > 0) depth -= 1;

    if (char === ',' && depth === 0) {
      parts.push(current);
      current = '';
      continue;
    }
    current += char;
  }
  parts.push(current);

  return parts.map((part) => part.trim().replace(/\.$/, '').trim()).filter((part) => part.length > 0);
}
