/**
 * Requirement node builders shared by the parsers
 */

import type { CourseNode, RequirementNode } from '../types.js';

export function courseNode(courseCode: string, isConcurrent = false): CourseNode {
  return {
    type: 'course',
    course_code: courseCode,
    is_concurrent: isConcurrent,
    is_optional: false,
  };
}

export function isNode(node: RequirementNode | null): node is RequirementNode {
  return node !== null;
}

/**
 * Build an and/or node, collapsing a single child and dropping an empty list
 */
export function combine(type: 'and' | 'or', children: RequirementNode[]): RequirementNode | null {
  if (children.length === 0) return null;
  if (children.length === 1) return children[0];
  return { type, children };
}

/**
 * Recursively freeze a tree so it cannot be mutated after assembly
 */
export function freezeNode(node: RequirementNode): RequirementNode {
  switch (node.type) {
    case 'and':
    case 'or':
      node.children.forEach(child => freezeNode(child));
      Object.freeze(node.children);
      break;
    case 'group':
      freezeNode(node.expression);
      break;
    case 'concurrent':
      freezeNode(node.course);
      break;
    case 'course':
    case 'text_condition':
      break;
    default:
      return assertNever(node);
  }
  return Object.freeze(node);
}

export function assertNever(node: never): never {
  throw new Error(`Unknown requirement node: ${JSON.stringify(node)}`);
}
