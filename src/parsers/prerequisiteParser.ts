/**
 * Prerequisite Parser
 * Assembles one course's prerequisite and concurrent fields into a
 * prerequisite AST
 *
 * Examples:
 * - "CSCE 1001 and CSCE 1101"   -> and[CSCE1001, CSCE1101]
 * - "CSCE 1001 or CSCE 1101"    -> or[CSCE1001, CSCE1101]
 * - "Senior standing and concurrent with CSCE 4301"
 *     -> prerequisites: standing condition, corequisites: concurrent[CSCE4301]
 * - "" / ""                     -> no requirements
 */

import { parseConcurrent, splitConcurrent } from './concurrentSplitter.js';
import { parseExpression } from './expressionParser.js';
import { freezeNode } from './nodes.js';
import type { PrerequisiteAst, RequirementNode } from '../types.js';

export const EMPTY_PREREQUISITE_AST: PrerequisiteAst = Object.freeze({
  prerequisites: null,
  corequisites: null,
  raw_text: '',
});

/**
 * Parse prerequisite text (and an optional separate concurrent field)
 */
export function parsePrerequisites(prerequisitesText: string, concurrentText: string = ''): PrerequisiteAst {
  const prereqText = prerequisitesText.trim();
  const coreqText = concurrentText.trim();

  if (!prereqText && !coreqText) {
    return EMPTY_PREREQUISITE_AST;
  }

  let rawText = prereqText;
  const split = splitConcurrent(prereqText);
  const prerequisites = parseExpression(split.prerequisiteText);
  let corequisites: RequirementNode | null = parseConcurrent(split.concurrentText);

  // A separate concurrent field is merged with any embedded one, duplicates and all
  if (coreqText) {
    rawText += ` | Concurrent: ${coreqText}`;
    const fromField = parseConcurrent(coreqText);
    if (fromField) {
      corequisites = corequisites
        ? { type: 'and', children: [corequisites, fromField] }
        : fromField;
    }
  }

  return Object.freeze({
    prerequisites: prerequisites && freezeNode(prerequisites),
    corequisites: corequisites && freezeNode(corequisites),
    raw_text: rawText,
  });
}

/**
 * Marker AST for a course whose parse threw
 */
export function failedPrerequisiteAst(rawText: string, error: unknown): PrerequisiteAst {
  return Object.freeze({
    prerequisites: null,
    corequisites: null,
    raw_text: rawText,
    parse_error: error instanceof Error ? error.message : String(error),
  });
}
