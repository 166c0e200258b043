/**
 * Concurrent Splitter
 * Separates the prerequisite part of a requirement string from its
 * concurrent (corequisite) part, and parses concurrent text.
 *
 * Examples:
 * - "Concurrent with CSCE 2301"                      -> concurrent only
 * - "CSCE 1001 and concurrent with CSCE 2301"        -> "CSCE 1001" | "CSCE 2301"
 * - "CSCE 1001. Must be taken concurrently with ..." -> "CSCE 1001." | "..."
 */

import { findCourseCodes } from './courseCode.js';
import { courseNode } from './nodes.js';
import { normalizeWhitespace } from './normalizer.js';
import type { ConcurrentNode, RequirementNode } from '../types.js';

const CONCURRENT_ONLY_REGEX = /^(?:concurrent|prerequisite:\s*concurrent)/i;
const CONCURRENT_TRANSITION_REGEX = /,?\s*and\s+concurrent\s+with|must\s+be\s+taken\s+concurrently\s+with/i;
const NOTE_REGEX = /\bfor\s+(.+?)(?:\.|$)/i;

export interface ConcurrentSplit {
  prerequisiteText: string;
  concurrentText: string;
}

export function isConcurrentOnly(text: string): boolean {
  return CONCURRENT_ONLY_REGEX.test(text.trim());
}

/**
 * Split requirement text at the first concurrent transition phrase.
 * Either side may come back empty.
 */
export function splitConcurrent(text: string): ConcurrentSplit {
  const normalized = normalizeWhitespace(text);
  if (!normalized) {
    return { prerequisiteText: '', concurrentText: '' };
  }

  if (isConcurrentOnly(normalized)) {
    return { prerequisiteText: '', concurrentText: normalized };
  }

  const match = normalized.match(CONCURRENT_TRANSITION_REGEX);
  if (match && match.index !== undefined) {
    return {
      prerequisiteText: normalized.slice(0, match.index).trim(),
      concurrentText: normalized.slice(match.index + match[0].length).trim(),
    };
  }

  return { prerequisiteText: normalized, concurrentText: '' };
}

/**
 * Parse concurrent text into a concurrent node, or null when it names no course
 */
export function parseConcurrent(text: string): ConcurrentNode | null {
  if (!text) return null;

  const codes = findCourseCodes(text);
  if (codes.length === 0) return null;

  const noteMatch = text.match(NOTE_REGEX);
  const note = noteMatch ? noteMatch[1].trim() : '';

  const course: RequirementNode = codes.length === 1
    ? courseNode(codes[0])
    : { type: 'or', children: codes.map(code => courseNode(code)) };

  return { type: 'concurrent', course, note };
}
