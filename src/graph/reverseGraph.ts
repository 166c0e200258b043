/**
 * Reverse Dependency Graph
 * Inverts the course references of every prerequisite AST into
 * "is prerequisite for" / "is corequisite for" maps.
 *
 * Built in two passes over the whole catalog: collect each course's forward
 * references, then invert them. Never updated incrementally.
 */

import { courseCodeFromTitle } from '../parsers/courseCode.js';
import { assertNever } from '../parsers/nodes.js';
import type {
  ForwardEdges,
  LinkedCourseRecord,
  ParsedCourseRecord,
  RequirementNode,
  ReverseGraph,
} from '../types.js';

export interface CollectOptions {
  /** Descend into concurrent wrappers */
  includeConcurrent: boolean;
}

/**
 * All course codes referenced in a tree
 */
export function collectCourseCodes(
  node: RequirementNode | null,
  options: CollectOptions,
  into: Set<string> = new Set()
): Set<string> {
  if (!node) return into;

  switch (node.type) {
    case 'course':
      if (node.course_code) into.add(node.course_code);
      break;
    case 'and':
    case 'or':
      for (const child of node.children) {
        collectCourseCodes(child, options, into);
      }
      break;
    case 'group':
      collectCourseCodes(node.expression, options, into);
      break;
    case 'concurrent':
      // A concurrent requirement is not a true prerequisite
      if (options.includeConcurrent) {
        collectCourseCodes(node.course, options, into);
      }
      break;
    case 'text_condition':
      break;
    default:
      assertNever(node);
  }

  return into;
}

/**
 * Pass 1: forward references per keyed course. Courses without a join key
 * are skipped.
 */
export function collectForwardEdges(courses: ParsedCourseRecord[]): ForwardEdges[] {
  const edges: ForwardEdges[] = [];

  for (const course of courses) {
    const courseCode = courseCodeFromTitle(course.title);
    if (!courseCode) continue;

    const ast = course.prerequisite_ast;
    edges.push({
      courseCode,
      prerequisites: collectCourseCodes(ast.prerequisites, { includeConcurrent: false }),
      corequisites: collectCourseCodes(ast.corequisites, { includeConcurrent: true }),
    });
  }

  return edges;
}

function addEdge(map: Map<string, Set<string>>, target: string, source: string): void {
  const dependents = map.get(target) ?? new Set<string>();
  dependents.add(source);
  map.set(target, dependents);
}

/**
 * Pass 2: invert forward references into reverse adjacency maps
 */
export function invertEdges(forward: ForwardEdges[]): ReverseGraph {
  const graph: ReverseGraph = { prereqOf: new Map(), coreqOf: new Map() };

  for (const { courseCode, prerequisites, corequisites } of forward) {
    for (const prereq of prerequisites) {
      if (prereq) addEdge(graph.prereqOf, prereq, courseCode);
    }
    for (const coreq of corequisites) {
      if (coreq) addEdge(graph.coreqOf, coreq, courseCode);
    }
  }

  return graph;
}

/**
 * Union of graphs built over separate partitions of the catalog
 */
export function mergeReverseGraphs(parts: ReverseGraph[]): ReverseGraph {
  const merged: ReverseGraph = { prereqOf: new Map(), coreqOf: new Map() };

  for (const part of parts) {
    for (const [target, sources] of part.prereqOf) {
      sources.forEach(source => addEdge(merged.prereqOf, target, source));
    }
    for (const [target, sources] of part.coreqOf) {
      sources.forEach(source => addEdge(merged.coreqOf, target, source));
    }
  }

  return merged;
}

export function buildReverseGraph(courses: ParsedCourseRecord[]): ReverseGraph {
  return invertEdges(collectForwardEdges(courses));
}

export function sortedDependents(map: Map<string, Set<string>>, courseCode: string): string[] {
  if (!courseCode) return [];
  return [...(map.get(courseCode) ?? [])].sort();
}

/**
 * Copy each record with its sorted reverse edges attached
 */
export function attachReverseEdges(courses: ParsedCourseRecord[], graph: ReverseGraph): LinkedCourseRecord[] {
  return courses.map(course => {
    const courseCode = courseCodeFromTitle(course.title);
    return {
      ...course,
      is_prerequisite_for: sortedDependents(graph.prereqOf, courseCode),
      is_corequisite_for: sortedDependents(graph.coreqOf, courseCode),
    };
  });
}

/**
 * Courses no other course requires, as prerequisite or corequisite
 */
export function countLeafCourses(courses: LinkedCourseRecord[]): number {
  return courses.filter(c => c.is_prerequisite_for.length === 0 && c.is_corequisite_for.length === 0).length;
}
