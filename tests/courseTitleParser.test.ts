import { describe, expect, test } from 'vitest';

import { courseMetadata, difficultyLevel, parseCourseTitle } from '../src/parsers/courseTitleParser.js';

describe('parseCourseTitle', () => {
  test('standard title with credits', () => {
    expect(parseCourseTitle('APLN 5331 - Sociolinguistics (3 cr.)')).toEqual({
      courseCode: 'APLN 5331',
      courseTitle: 'Sociolinguistics',
    });
  });

  test('cross-listed departments', () => {
    expect(parseCourseTitle('SOC/ANTH 5280 - History and Memory (3 cr.)')).toEqual({
      courseCode: 'SOC/ANTH 5280',
      courseTitle: 'History and Memory',
    });
  });

  test('course sequences keep the first number', () => {
    expect(parseCourseTitle('ALIN 1101-1102-1103-1104 - Elementary Modern Standard Arabic (4 cr.)')).toEqual({
      courseCode: 'ALIN 1101',
      courseTitle: 'Elementary Modern Standard Arabic',
    });
  });

  test('lab suffix', () => {
    expect(parseCourseTitle('ECNG 1501L - Exploring Electrical Engineering (1 cr.)')).toEqual({
      courseCode: 'ECNG 1501L',
      courseTitle: 'Exploring Electrical Engineering',
    });
  });

  test('no credits parenthetical and extra whitespace', () => {
    expect(parseCourseTitle('LAW  5286 -   Independent Study')).toEqual({
      courseCode: 'LAW 5286',
      courseTitle: 'Independent Study',
    });
  });

  test('unrecognized titles give empty fields', () => {
    expect(parseCourseTitle('Special Topics')).toEqual({ courseCode: '', courseTitle: '' });
  });
});

describe('difficultyLevel', () => {
  test('uses the first digit, capped at 4', () => {
    expect(difficultyLevel('CSCE 2303')).toBe(2);
    expect(difficultyLevel('CSCE 4301')).toBe(4);
    expect(difficultyLevel('APLN 5331')).toBe(4);
  });

  test('zero, lab and missing numbers count as level 1', () => {
    expect(difficultyLevel('ELIN 0101')).toBe(1);
    expect(difficultyLevel('ECNG 1501L')).toBe(1);
    expect(difficultyLevel('')).toBe(1);
  });

  test('builds metadata fields from a title', () => {
    expect(courseMetadata('CSCE 3301 - Computer Architecture (3 cr.)')).toEqual({
      course_code: 'CSCE 3301',
      course_title: 'Computer Architecture',
      difficulty_level: 3,
    });
  });
});
