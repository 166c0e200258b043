/**
 * Runtime checks for prerequisite ASTs read back from a saved catalog
 */

import type { PrerequisiteAst, RequirementNode, TextConditionCategory } from '../types.js';

const CATEGORIES: readonly TextConditionCategory[] = ['standing', 'approval', 'exemption', 'preparation', 'other'];

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isCategory(value: unknown): value is TextConditionCategory {
  return CATEGORIES.some(category => category === value);
}

export function isRequirementNode(value: unknown): value is RequirementNode {
  if (!isObject(value)) return false;

  switch (value.type) {
    case 'course':
      return typeof value.course_code === 'string'
        && typeof value.is_concurrent === 'boolean'
        && typeof value.is_optional === 'boolean';
    case 'and':
    case 'or':
      return Array.isArray(value.children)
        && value.children.length > 0
        && value.children.every(isRequirementNode);
    case 'group':
      return isRequirementNode(value.expression);
    case 'concurrent':
      return isRequirementNode(value.course) && typeof value.note === 'string';
    case 'text_condition':
      return typeof value.condition === 'string' && isCategory(value.category);
    default:
      return false;
  }
}

function isNodeOrNull(value: unknown): value is RequirementNode | null {
  return value === null || isRequirementNode(value);
}

export function isPrerequisiteAst(value: unknown): value is PrerequisiteAst {
  return isObject(value)
    && isNodeOrNull(value.prerequisites)
    && isNodeOrNull(value.corequisites)
    && typeof value.raw_text === 'string'
    && (value.parse_error === undefined || typeof value.parse_error === 'string');
}
