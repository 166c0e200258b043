/**
 * Catalog Pipeline
 * Parses every course's requirement text, then builds the reverse graph
 * over the whole catalog
 */

import { isPrerequisiteAst } from './graph/astGuards.js';
import { attachReverseEdges, buildReverseGraph, countLeafCourses } from './graph/reverseGraph.js';
import { courseMetadata } from './parsers/courseTitleParser.js';
import { failedPrerequisiteAst, parsePrerequisites } from './parsers/prerequisiteParser.js';
import { logger } from './logger.js';
import type {
  CatalogRecord,
  CourseMetadata,
  GraphStats,
  LinkedCourseRecord,
  ParsedCourseRecord,
  ParseStats,
  PrerequisiteAst,
  ReverseGraph,
} from './types.js';

export type AstParser = (prerequisites: string, concurrent: string) => PrerequisiteAst;

export interface ParseCatalogResult {
  courses: ParsedCourseRecord[];
  stats: ParseStats;
}

export interface BuildGraphResult {
  courses: LinkedCourseRecord[];
  graph: ReverseGraph;
  stats: GraphStats;
}

const PROGRESS_EVERY = 100;

/**
 * Attach a prerequisite AST to every course. A course whose parse throws is
 * kept with a parse_error marker and the batch carries on.
 */
export function parseCatalog(records: CatalogRecord[], parse: AstParser = parsePrerequisites): ParseCatalogResult {
  const stats: ParseStats = {
    total: records.length,
    withPrerequisites: 0,
    withCorequisites: 0,
    empty: 0,
    errors: 0,
  };

  const courses = records.map((record, i): ParsedCourseRecord => {
    const prereqText = record.prerequisites.trim();
    const concurrentText = record.concurrent.trim();

    let ast: PrerequisiteAst;
    try {
      ast = parse(prereqText, concurrentText);
    } catch (error) {
      stats.errors++;
      logger.warn('Parser', `Failed to parse ${record.title || 'Unknown'}`, {
        error: error instanceof Error ? error.message : String(error),
      });
      ast = failedPrerequisiteAst(prereqText, error);
    }

    if (!prereqText && !concurrentText) stats.empty++;
    if (ast.prerequisites) stats.withPrerequisites++;
    if (ast.corequisites) stats.withCorequisites++;

    if ((i + 1) % PROGRESS_EVERY === 0 || i + 1 === records.length) {
      logger.progress('Parser', i + 1, records.length, 'courses parsed');
    }

    return { ...record, prerequisite_ast: ast };
  });

  return { courses, stats };
}

/**
 * Reuse the prerequisite ASTs of a previously parsed catalog, parsing only
 * the courses that lack a valid one
 */
export function ensureParsed(records: CatalogRecord[]): ParsedCourseRecord[] {
  const missing = records.filter(record => !isPrerequisiteAst(record.prerequisite_ast));
  if (missing.length > 0) {
    logger.warn('Parser', `${missing.length} of ${records.length} courses have no prerequisite_ast, parsing them now`);
  }

  // parseCatalog keeps input order, so results line up with `missing`
  const parsed = parseCatalog(missing).courses;
  let next = 0;

  return records.map((record): ParsedCourseRecord => {
    const ast = record.prerequisite_ast;
    if (isPrerequisiteAst(ast)) {
      return { ...record, prerequisite_ast: ast };
    }
    return parsed[next++];
  });
}

/**
 * Build the reverse graph and merge its edges back into every course
 */
export function buildCatalogGraph(courses: ParsedCourseRecord[]): BuildGraphResult {
  const graph = buildReverseGraph(courses);
  logger.debug('Graph', `Built mappings for ${graph.prereqOf.size} prerequisite and ${graph.coreqOf.size} corequisite targets`);

  const linked = attachReverseEdges(courses, graph);
  const stats: GraphStats = {
    total: linked.length,
    withPrereqFor: linked.filter(c => c.is_prerequisite_for.length > 0).length,
    withCoreqFor: linked.filter(c => c.is_corequisite_for.length > 0).length,
    leaves: countLeafCourses(linked),
  };

  return { courses: linked, graph, stats };
}

export function addCourseMetadata<T extends CatalogRecord>(courses: T[]): Array<T & CourseMetadata> {
  return courses.map(course => ({ ...course, ...courseMetadata(course.title) }));
}

export interface ProcessOptions {
  metadata?: boolean;
}

export interface ProcessCatalogResult {
  courses: LinkedCourseRecord[];
  graph: ReverseGraph;
  parseStats: ParseStats;
  graphStats: GraphStats;
}

/**
 * Full run: parse, graph, and optionally title metadata
 */
export function processCatalog(records: CatalogRecord[], options: ProcessOptions = {}): ProcessCatalogResult {
  const parsed = parseCatalog(records);
  const linked = buildCatalogGraph(parsed.courses);
  const courses: LinkedCourseRecord[] = options.metadata ? addCourseMetadata(linked.courses) : linked.courses;

  return {
    courses,
    graph: linked.graph,
    parseStats: parsed.stats,
    graphStats: linked.stats,
  };
}
