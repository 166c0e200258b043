/**
 * Course Title Parser
 * Splits catalog display titles into code, name and difficulty level
 *
 * Patterns seen in the catalog:
 * - Standard:     "APLN 5331 - Sociolinguistics (3 cr.)"
 * - Cross-listed: "SOC/ANTH 5280 - History and Memory (3 cr.)"
 * - Sequence:     "ALIN 1101-1102-1103-1104 - Elementary Arabic (...)" (first number kept)
 * - Lab:          "ECNG 1501L - Exploring Electrical Engineering (1 cr.)"
 * - No credits:   "ECNG 5980 - Thesis"
 */

import { normalizeWhitespace } from './normalizer.js';
import type { CourseMetadata } from '../types.js';

export interface CourseTitleParsed {
  courseCode: string;   // "APLN 5331", "" when unrecognized
  courseTitle: string;  // "Sociolinguistics"
}

const TITLE_PATTERNS: Array<{ pattern: RegExp; firstNumberOnly?: boolean }> = [
  { pattern: /^([A-Z]{3,4}\/[A-Z]{3,4})\s+(\d{4})\s+-\s+(.+?)\s+\(.+\)$/ },
  { pattern: /^([A-Z]{3,4})\s+([\d-]+)\s+-\s+(.+?)\s+\(.+\)$/, firstNumberOnly: true },
  { pattern: /^([A-Z]{3,4})\s+(\d{4}L)\s+-\s+(.+?)\s+\(.+\)$/ },
  { pattern: /^([A-Z]{3,4})\s+(\d{4})\s+-\s+(.+?)\s+\(.+\)$/ },
  { pattern: /^([A-Z]{3,4})\s+(\d{4})\s+-\s+(.+)$/ },
];

/**
 * Parse a display title into its code and name
 */
export function parseCourseTitle(title: string): CourseTitleParsed {
  const cleaned = normalizeWhitespace(title);

  for (const { pattern, firstNumberOnly } of TITLE_PATTERNS) {
    const match = cleaned.match(pattern);
    if (!match) continue;

    const number = firstNumberOnly ? match[2].split('-')[0] : match[2];
    return {
      courseCode: `${match[1]} ${number}`,
      courseTitle: match[3].trim(),
    };
  }

  return { courseCode: '', courseTitle: '' };
}

/**
 * Difficulty from the first digit of the course number: 0 counts as 1,
 * anything above 4 is capped at 4
 */
export function difficultyLevel(courseCode: string): number {
  const match = courseCode.match(/(\d)\d{3}L?/);
  if (!match) return 1;

  const firstDigit = parseInt(match[1]);
  if (firstDigit === 0) return 1;
  return Math.min(firstDigit, 4);
}

export function courseMetadata(title: string): CourseMetadata {
  const { courseCode, courseTitle } = parseCourseTitle(title);
  return {
    course_code: courseCode,
    course_title: courseTitle,
    difficulty_level: difficultyLevel(courseCode),
  };
}
