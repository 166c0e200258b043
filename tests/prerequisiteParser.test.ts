import { describe, expect, test } from 'vitest';

import { courseNode } from '../src/parsers/nodes.js';
import { parsePrerequisites } from '../src/parsers/prerequisiteParser.js';

describe('parsePrerequisites', () => {
  test('separates a standing condition from a concurrent course', () => {
    expect(parsePrerequisites('Senior standing and concurrent with CSCE 4301')).toEqual({
      prerequisites: { type: 'text_condition', condition: 'Senior standing', category: 'standing' },
      corequisites: { type: 'concurrent', course: courseNode('CSCE4301'), note: '' },
      raw_text: 'Senior standing and concurrent with CSCE 4301',
    });
  });

  test('empty fields mean no requirements', () => {
    expect(parsePrerequisites('', '')).toEqual({ prerequisites: null, corequisites: null, raw_text: '' });
    expect(parsePrerequisites('  ')).toEqual({ prerequisites: null, corequisites: null, raw_text: '' });
  });

  test('concurrent-only text produces no prerequisite tree', () => {
    expect(parsePrerequisites('Concurrent with CSCE 1001')).toEqual({
      prerequisites: null,
      corequisites: { type: 'concurrent', course: courseNode('CSCE1001'), note: '' },
      raw_text: 'Concurrent with CSCE 1001',
    });
  });

  test('parses a separate concurrent field', () => {
    expect(parsePrerequisites('CSCE 1001', 'CSCE 1002')).toEqual({
      prerequisites: courseNode('CSCE1001'),
      corequisites: { type: 'concurrent', course: courseNode('CSCE1002'), note: '' },
      raw_text: 'CSCE 1001 | Concurrent: CSCE 1002',
    });
  });

  test('merges embedded and separate concurrent requirements without deduplicating', () => {
    const concurrent = { type: 'concurrent', course: courseNode('CSCE1002'), note: '' };
    expect(parsePrerequisites('CSCE 1001 and concurrent with CSCE 1002', 'CSCE 1002').corequisites).toEqual({
      type: 'and',
      children: [concurrent, concurrent],
    });
  });

  test('concurrent field alone', () => {
    expect(parsePrerequisites('', 'PHYS 1011')).toEqual({
      prerequisites: null,
      corequisites: { type: 'concurrent', course: courseNode('PHYS1011'), note: '' },
      raw_text: ' | Concurrent: PHYS 1011',
    });
  });

  test('result trees are frozen', () => {
    const ast = parsePrerequisites('CSCE 1001 and (CSCE 1101 or CSCE 2303)');
    expect(Object.isFrozen(ast)).toBe(true);
    expect(Object.isFrozen(ast.prerequisites)).toBe(true);
    if (ast.prerequisites?.type !== 'and') throw new Error('expected an and node');
    expect(Object.isFrozen(ast.prerequisites.children)).toBe(true);
    expect(Object.isFrozen(ast.prerequisites.children[1])).toBe(true);
  });
});
