/**
 * Expression Parser
 * Recursive parser from requirement text to a boolean requirement tree
 *
 * "and" is the outer split and "or" the inner one, matching how the catalog
 * writes lists:
 * - "A and B"           -> and[A, B]
 * - "A or B and C"      -> and[or[A, B], C]
 * - "A and (B or C)"    -> and[A, group[or[B, C]]]
 */

import { classifyAtom } from './atomicClassifier.js';
import { extractGroups, resolvePlaceholders, stripTokenDelimiters } from './groupExtractor.js';
import { combine, isNode } from './nodes.js';
import { normalizeText } from './normalizer.js';
import type { RequirementNode } from '../types.js';

// "and concurrent ..." marks a concurrent clause, not a list conjunction
const AND_SPLIT_REGEX = /\s+and\s+(?!concurrent\b)/i;
const OR_SPLIT_REGEX = /\s+or\s+/i;

export function parseExpression(text: string): RequirementNode | null {
  return parseText(stripTokenDelimiters(text));
}

// Group contents come back through here with the enclosing call's tokens intact
function parseText(text: string): RequirementNode | null {
  const cleaned = normalizeText(text);
  if (!cleaned) return null;

  if (cleaned.includes('(') && cleaned.includes(')')) {
    return parseWithGroups(cleaned);
  }

  return parseConjunction(cleaned);
}

function parseWithGroups(text: string): RequirementNode | null {
  const { text: outer, groups } = extractGroups(text);
  const tree = parseConjunction(outer);
  // Nothing extracted: tokens left in the text belong to an enclosing call
  if (!tree || groups.size === 0) return tree;
  return resolvePlaceholders(tree, groups, parseText);
}

function parseConjunction(text: string): RequirementNode | null {
  const parts = text.split(AND_SPLIT_REGEX);
  if (parts.length > 1) {
    return combine('and', parts.map(part => parseDisjunction(part.trim())).filter(isNode));
  }
  return parseDisjunction(text);
}

function parseDisjunction(text: string): RequirementNode | null {
  if (!text) return null;

  const parts = text.split(OR_SPLIT_REGEX);
  if (parts.length > 1) {
    return combine('or', parts.map(part => classifyAtom(part.trim())).filter(isNode));
  }
  return classifyAtom(text);
}
