import { describe, expect, test } from 'vitest';

import {
  attachReverseEdges,
  buildReverseGraph,
  collectCourseCodes,
  collectForwardEdges,
  countLeafCourses,
  mergeReverseGraphs,
} from '../src/graph/reverseGraph.js';
import { courseCodeFromTitle } from '../src/parsers/courseCode.js';
import { parsePrerequisites } from '../src/parsers/prerequisiteParser.js';
import type { ParsedCourseRecord } from '../src/types.js';

function course(title: string, prerequisites = '', concurrent = ''): ParsedCourseRecord {
  return {
    title,
    prerequisites,
    concurrent,
    prerequisite_ast: parsePrerequisites(prerequisites, concurrent),
  };
}

const catalog: ParsedCourseRecord[] = [
  course('CSCE 4001 - Senior Project', 'CSCE 2001 and (CSCE 3001 or Senior standing)'),
  course('CSCE 2001 - Data Structures', 'CSCE 1001 and concurrent with MACT 2123'),
  course('CSCE 3001 - Algorithms', 'CSCE 2001'),
  course('CSCE 1001 - Fundamentals'),
  course('MACT 2123 - Discrete Math', 'MACT 1121 (or concurrent)'),
  course('Independent Study', 'CSCE 1001'),
];

describe('collectCourseCodes', () => {
  test('descends into and, or and group nodes', () => {
    const ast = parsePrerequisites('CSCE 1001 (or concurrent) and (CSCE 1101 or CSCE 2303)');
    expect([...collectCourseCodes(ast.prerequisites, { includeConcurrent: false })]).toEqual([
      'CSCE1001',
      'CSCE1101',
      'CSCE2303',
    ]);
  });

  test('enters concurrent wrappers only when asked', () => {
    const ast = parsePrerequisites('Concurrent with CSCE 1001 or CSCE 1002');
    expect(collectCourseCodes(ast.corequisites, { includeConcurrent: false }).size).toBe(0);
    expect([...collectCourseCodes(ast.corequisites, { includeConcurrent: true })]).toEqual(['CSCE1001', 'CSCE1002']);
  });

  test('collects each code once', () => {
    const ast = parsePrerequisites('CSCE 1001 or CSCE 1001');
    expect([...collectCourseCodes(ast.prerequisites, { includeConcurrent: false })]).toEqual(['CSCE1001']);
  });

  test('null trees contribute nothing', () => {
    expect(collectCourseCodes(null, { includeConcurrent: true }).size).toBe(0);
  });
});

describe('reverse graph', () => {
  test('lists dependents sorted', () => {
    const courses = [
      course('CSCE 4001 - C', 'CSCE 2001'),
      course('CSCE 2001 - B'),
      course('CSCE 3001 - A', 'CSCE 2001'),
    ];
    const linked = attachReverseEdges(courses, buildReverseGraph(courses));
    expect(linked[1].is_prerequisite_for).toEqual(['CSCE3001', 'CSCE4001']);
    expect(linked[0].is_prerequisite_for).toEqual([]);
    expect(linked[2].is_prerequisite_for).toEqual([]);
  });

  test('keeps prerequisite and corequisite edges apart', () => {
    const graph = buildReverseGraph(catalog);
    expect([...(graph.prereqOf.get('CSCE1001') ?? [])]).toEqual(['CSCE2001']);
    expect(graph.prereqOf.has('MACT2123')).toBe(false);
    expect([...(graph.coreqOf.get('MACT2123') ?? [])]).toEqual(['CSCE2001']);
  });

  test('a course marked (or concurrent) is still a prerequisite', () => {
    const graph = buildReverseGraph(catalog);
    expect([...(graph.prereqOf.get('MACT1121') ?? [])]).toEqual(['MACT2123']);
  });

  test('courses without a join key are not keyed but keep empty edge lists', () => {
    const linked = attachReverseEdges(catalog, buildReverseGraph(catalog));
    const independent = linked[5];
    expect(independent.is_prerequisite_for).toEqual([]);
    expect(independent.is_corequisite_for).toEqual([]);
    expect(linked[3].is_prerequisite_for).toEqual(['CSCE2001']);
  });

  test('self references are kept', () => {
    const courses = [course('CSCE 1001 - Loop', 'CSCE 1001')];
    const linked = attachReverseEdges(courses, buildReverseGraph(courses));
    expect(linked[0].is_prerequisite_for).toEqual(['CSCE1001']);
  });

  test('inversion matches the forward references', () => {
    const forward = collectForwardEdges(catalog);
    const linked = attachReverseEdges(catalog, buildReverseGraph(catalog));
    const byCode = new Map(linked.map(c => [courseCodeFromTitle(c.title), c]));

    for (const { courseCode, prerequisites } of forward) {
      for (const prereq of prerequisites) {
        const target = byCode.get(prereq);
        if (target) expect(target.is_prerequisite_for).toContain(courseCode);
      }
    }

    for (const target of linked) {
      for (const dependent of target.is_prerequisite_for) {
        const edges = forward.find(f => f.courseCode === dependent);
        expect(edges?.prerequisites.has(courseCodeFromTitle(target.title))).toBe(true);
      }
    }
  });

  test('leaf count equals keyed courses never collected as prerequisites', () => {
    const linked = attachReverseEdges(catalog, buildReverseGraph(catalog));
    const collected = new Set(collectForwardEdges(catalog).flatMap(f => [...f.prerequisites]));
    const noPrereqFor = linked.filter(c => c.is_prerequisite_for.length === 0).length;
    const neverCollected = linked.filter(c => !collected.has(courseCodeFromTitle(c.title))).length;

    expect(noPrereqFor).toBe(neverCollected);
    expect(noPrereqFor).toBe(3);
    // MACT 2123 is a corequisite of CSCE 2001, so it is not a leaf
    expect(countLeafCourses(linked)).toBe(2);
  });

  test('partitioned builds merge to the full graph', () => {
    const whole = buildReverseGraph(catalog);
    const merged = mergeReverseGraphs([buildReverseGraph(catalog.slice(0, 3)), buildReverseGraph(catalog.slice(3))]);
    expect(merged).toEqual(whole);
  });
});
