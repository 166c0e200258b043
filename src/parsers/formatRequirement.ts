/**
 * Render a requirement tree back to readable text
 */

import { assertNever } from './nodes.js';
import type { RequirementNode } from '../types.js';

export function formatRequirement(node: RequirementNode | null): string {
  if (!node) return 'None';

  switch (node.type) {
    case 'course':
      return node.is_concurrent ? `${node.course_code} (or concurrent)` : node.course_code;
    case 'and':
      return node.children.map(formatRequirement).join(' and ');
    case 'or':
      return node.children.map(formatRequirement).join(' or ');
    case 'group':
      return `(${formatRequirement(node.expression)})`;
    case 'concurrent': {
      const base = `concurrent with ${formatRequirement(node.course)}`;
      return node.note ? `${base} for ${node.note}` : base;
    }
    case 'text_condition':
      return node.condition;
    default:
      return assertNever(node);
  }
}
