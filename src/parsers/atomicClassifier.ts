/**
 * Atomic Classifier
 * Turns one minimal requirement fragment into a leaf node
 *
 * Examples:
 * - "CSCE 1001"                  -> course CSCE1001
 * - "CSCE 1001 (or concurrent)"  -> course CSCE1001, is_concurrent
 * - "Senior standing"            -> text_condition (standing)
 * - "."                          -> null
 */

import { findFirstCourseCode } from './courseCode.js';
import { courseNode } from './nodes.js';
import type { RequirementNode, TextConditionCategory } from '../types.js';

// Checked in order; the first category with a matching phrase wins
export const TEXT_CONDITION_KEYWORDS: ReadonlyArray<[Exclude<TextConditionCategory, 'other'>, string[]]> = [
  ['standing', ['senior standing', 'junior standing', 'sophomore standing', 'freshman standing', 'standing']],
  ['approval', ['instructor approval', 'consent of instructor', 'approval', 'permission', 'instructor consent']],
  ['exemption', ['exemption']],
  ['preparation', ['preparation course', 'college level']],
];

// Unclassified fragments this short are treated as noise
const MIN_OTHER_CONDITION_LENGTH = 5;

const OR_CONCURRENT_REGEX = /\(\s*or\s+concurrent\s*\)/i;

/**
 * Trim spaces, commas and periods from both ends
 */
function stripEdges(text: string): string {
  return text.replace(/^[\s,.]+|[\s,.]+$/g, '');
}

export function categorizeCondition(text: string): TextConditionCategory {
  const lower = text.toLowerCase();
  for (const [category, keywords] of TEXT_CONDITION_KEYWORDS) {
    if (keywords.some(keyword => lower.includes(keyword))) {
      return category;
    }
  }
  return 'other';
}

/**
 * Classify a fragment with no and/or structure left in it
 */
export function classifyAtom(fragment: string): RequirementNode | null {
  let text = stripEdges(fragment);
  if (!text) return null;

  let isConcurrent = false;
  const modifier = text.match(OR_CONCURRENT_REGEX);
  if (modifier && modifier.index !== undefined) {
    isConcurrent = true;
    text = stripEdges(
      `${text.slice(0, modifier.index).trim()} ${text.slice(modifier.index + modifier[0].length).trim()}`
    );
  }

  const courseCode = findFirstCourseCode(text);
  if (courseCode) {
    return courseNode(courseCode, isConcurrent);
  }

  const category = categorizeCondition(text);
  if (category === 'other' && text.length <= MIN_OTHER_CONDITION_LENGTH) {
    return null;
  }

  return { type: 'text_condition', condition: text, category };
}
