/**
 * Course Code Utilities
 *
 * Catalog codes are four uppercase letters and four digits:
 * - "CSCE 1001" -> "CSCE1001"
 * - "MACT1121"  -> "MACT1121"
 * Three-letter departments are deliberately not matched here.
 */

const COURSE_CODE_SOURCE = '\\b[A-Z]{4}\\s*\\d{4}\\b';

// Join key pattern used on display titles ("CSCE 1101 - Fundamentals ...")
const TITLE_CODE_REGEX = /([A-Z]{4})\s*(\d{4})/;

/**
 * Remove internal whitespace from a matched code
 */
export function normalizeCourseCode(code: string): string {
  return code.replace(/\s+/g, '');
}

/**
 * All course codes in order of appearance (duplicates kept)
 */
export function findCourseCodes(text: string): string[] {
  const regex = new RegExp(COURSE_CODE_SOURCE, 'g');
  return Array.from(text.matchAll(regex), match => normalizeCourseCode(match[0]));
}

export function findFirstCourseCode(text: string): string | null {
  const match = text.match(new RegExp(COURSE_CODE_SOURCE));
  return match ? normalizeCourseCode(match[0]) : null;
}

/**
 * Derive the graph join key from a course title, "" when there is none
 */
export function courseCodeFromTitle(title: string): string {
  const match = title.match(TITLE_CODE_REGEX);
  if (match) {
    return match[1] + match[2];
  }
  return '';
}
