/**
 * Text Normalizer
 * Cleans raw catalog requirement text before it reaches the parsers
 */

// Boilerplate labels the catalog prepends to requirement text
const LEADING_LABELS: RegExp[] = [
  /^Pre-requisites\s+or\s+concurrent:\s*/i,
  /^Prerequisite:\s*/i,
];

/**
 * Collapse whitespace runs to single spaces and trim
 */
export function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Remove known leading labels such as "Prerequisite:"
 */
export function stripLeadingLabels(text: string): string {
  let result = text.trim();
  for (const label of LEADING_LABELS) {
    result = result.replace(label, '');
  }
  return result.trim();
}

export function normalizeText(text: string): string {
  if (!text) return '';
  return stripLeadingLabels(normalizeWhitespace(text));
}
