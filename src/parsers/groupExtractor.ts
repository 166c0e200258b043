/**
 * Group Extractor
 * Replaces parenthesized spans with placeholder tokens so the outer
 * expression parses flat, then swaps each token for a parsed group node.
 *
 * "CSCE 1001 and (CSCE 1101 or CSCE 2303)"
 *   -> outer "CSCE 1001 and \0grp0\0", groups { "\0grp0\0": "CSCE 1101 or CSCE 2303" }
 *
 * Tokens are NUL-delimited; callers strip NUL from raw input with
 * stripTokenDelimiters so catalog text can never spell a token.
 */

import { assertNever, combine, isNode } from './nodes.js';
import type { RequirementNode } from '../types.js';

// Innermost span only; outer spans are picked up on the next pass
const INNERMOST_GROUP_REGEX = /\(([^()]*)\)/g;
const OR_CONCURRENT_REGEX = /\(\s*or\s+concurrent\s*\)/gi;
const OR_CONCURRENT_MARK = '\u0000orconc\u0000';
const PLACEHOLDER_REGEX = /\u0000grp\d+\u0000/g;
const PLACEHOLDER_PREFIX = '\u0000grp';

export interface ExtractedGroups {
  text: string;
  groups: Map<string, string>;
}

function placeholderFor(index: number): string {
  return `${PLACEHOLDER_PREFIX}${index}\u0000`;
}

export function isPlaceholder(text: string): boolean {
  return /^\u0000grp\d+\u0000$/.test(text);
}

/**
 * Remove the token delimiter from raw input
 */
export function stripTokenDelimiters(text: string): string {
  return text.replace(/\u0000/g, '');
}

/**
 * Substitute every parenthesized span with a token. The "(or concurrent)"
 * modifier is a leaf annotation, not a group, and is left in place.
 */
export function extractGroups(text: string): ExtractedGroups {
  const groups = new Map<string, string>();
  let current = text.replace(OR_CONCURRENT_REGEX, OR_CONCURRENT_MARK);
  let replaced = true;

  while (replaced) {
    replaced = false;
    current = current.replace(INNERMOST_GROUP_REGEX, (_span, content: string) => {
      replaced = true;
      if (!content.trim()) return ' ';
      const token = placeholderFor(groups.size);
      groups.set(token, unmask(content.trim()));
      return ` ${token} `;
    });
  }

  return { text: unmask(current).replace(/\s+/g, ' ').trim(), groups };
}

function unmask(text: string): string {
  return text.split(OR_CONCURRENT_MARK).join('(or concurrent)');
}

/**
 * Put the original "(...)" text back for tokens embedded in a longer fragment
 */
export function restoreGroupText(text: string, groups: Map<string, string>): string {
  return text.replace(PLACEHOLDER_REGEX, token => {
    const content = groups.get(token);
    return content === undefined ? '' : `(${restoreGroupText(content, groups)})`;
  }).replace(/\s+/g, ' ').trim();
}

/**
 * Walk a parsed outer tree, replacing placeholder leaves with group nodes.
 * Group contents are parsed with `parseContent` and resolved against the
 * same table, so nested groups come out nested.
 */
export function resolvePlaceholders(
  node: RequirementNode,
  groups: Map<string, string>,
  parseContent: (text: string) => RequirementNode | null
): RequirementNode | null {
  const resolve = (child: RequirementNode) => resolvePlaceholders(child, groups, parseContent);

  switch (node.type) {
    case 'course':
      return node;

    case 'text_condition': {
      if (!isPlaceholder(node.condition)) {
        if (!node.condition.includes(PLACEHOLDER_PREFIX)) return node;
        return { ...node, condition: restoreGroupText(node.condition, groups) };
      }
      const content = groups.get(node.condition);
      if (content === undefined) return null;
      const inner = parseContent(content);
      const expression = inner ? resolve(inner) : null;
      return expression ? { type: 'group', expression } : null;
    }

    case 'and':
    case 'or':
      return combine(node.type, node.children.map(resolve).filter(isNode));

    case 'group': {
      const expression = resolve(node.expression);
      return expression ? { type: 'group', expression } : null;
    }

    case 'concurrent': {
      const course = resolve(node.course);
      return course ? { ...node, course } : null;
    }

    default:
      return assertNever(node);
  }
}
