/**
 * Database Module
 * Exports the parsed catalog and its reverse graph to SQLite
 */

import Database from 'better-sqlite3';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import { courseCodeFromTitle } from '../parsers/courseCode.js';
import { CatalogIOError } from './catalogStore.js';
import { logger } from '../logger.js';
import type { LinkedCourseRecord, ParsedCourseRecord, ReverseGraph } from '../types.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export type EdgeType = 'prerequisite' | 'corequisite';

export interface DatabaseStats {
  courses: number;
  prerequisiteEdges: number;
  corequisiteEdges: number;
}

export class CatalogDatabase {
  private db: Database.Database;

  constructor(dbPath: string = 'catalog.db') {
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
  }

  /**
   * Initialize database with schema
   */
  initialize(): void {
    const schemaPath = join(__dirname, 'schema.sql');
    const schema = readFileSync(schemaPath, 'utf-8');
    this.db.exec(schema);
    logger.debug('Database', 'Schema initialized');
  }

  /**
   * Save parsed courses. Courses without a course code have no key and are skipped.
   */
  saveCourses(courses: ParsedCourseRecord[]): number {
    const stmt = this.db.prepare(`
      INSERT OR REPLACE INTO courses
      (course_code, title, prerequisites_text, concurrent_text, prerequisite_ast, parse_error, updated_at)
      VALUES (?, ?, ?, ?, ?, ?, CURRENT_TIMESTAMP)
    `);

    const transaction = this.db.transaction((rows: ParsedCourseRecord[]) => {
      let saved = 0;
      for (const course of rows) {
        const courseCode = courseCodeFromTitle(course.title);
        if (!courseCode) continue;

        const ast = course.prerequisite_ast;
        stmt.run(
          courseCode,
          course.title,
          course.prerequisites,
          course.concurrent,
          JSON.stringify(ast),
          ast.parse_error ?? null
        );
        saved++;
      }
      return saved;
    });

    const saved = transaction(courses);
    logger.info('Database', `Saved ${saved} courses (${courses.length - saved} without a course code)`);
    return saved;
  }

  /**
   * Replace all edges with the given reverse graph
   */
  saveEdges(graph: ReverseGraph): void {
    const edgeStmt = this.db.prepare(`
      INSERT OR IGNORE INTO prerequisite_edges (course_id, prerequisite_id, prereq_type)
      VALUES (?, ?, ?)
    `);

    const transaction = this.db.transaction((g: ReverseGraph) => {
      this.db.prepare('DELETE FROM prerequisite_edges').run();

      const insert = (map: Map<string, Set<string>>, type: EdgeType) => {
        for (const [required, dependents] of map) {
          for (const dependent of dependents) {
            edgeStmt.run(dependent, required, type);
          }
        }
      };

      insert(g.prereqOf, 'prerequisite');
      insert(g.coreqOf, 'corequisite');
    });

    transaction(graph);
    const stats = this.getStats();
    logger.info('Database', `Saved ${stats.prerequisiteEdges} prerequisite and ${stats.corequisiteEdges} corequisite edges`);
  }

  /**
   * Courses that list `courseCode` as a requirement of the given type
   */
  getDependents(courseCode: string, type: EdgeType = 'prerequisite'): string[] {
    const rows = this.db.prepare<[string, EdgeType], { course_id: string }>(`
      SELECT course_id FROM prerequisite_edges
      WHERE prerequisite_id = ? AND prereq_type = ?
      ORDER BY course_id
    `).all(courseCode, type);

    return rows.map(row => row.course_id);
  }

  /**
   * Get statistics
   */
  getStats(): DatabaseStats {
    const count = (sql: string, ...params: string[]): number =>
      this.db.prepare<string[], { count: number }>(sql).get(...params)?.count ?? 0;

    return {
      courses: count('SELECT COUNT(*) as count FROM courses'),
      prerequisiteEdges: count('SELECT COUNT(*) as count FROM prerequisite_edges WHERE prereq_type = ?', 'prerequisite'),
      corequisiteEdges: count('SELECT COUNT(*) as count FROM prerequisite_edges WHERE prereq_type = ?', 'corequisite'),
    };
  }

  /**
   * Close database
   */
  close(): void {
    this.db.close();
  }
}

/**
 * Write courses and edges to a SQLite file. Any failure, including a
 * missing schema file, surfaces as a CatalogIOError.
 */
export function exportCatalogDatabase(dbPath: string, courses: LinkedCourseRecord[], graph: ReverseGraph): DatabaseStats {
  const fail = (error: unknown) =>
    new CatalogIOError(`Failed to export catalog to ${dbPath}`, dbPath, { cause: error });

  let db: CatalogDatabase;
  try {
    db = new CatalogDatabase(dbPath);
  } catch (error) {
    throw fail(error);
  }

  try {
    db.initialize();
    db.saveCourses(courses);
    db.saveEdges(graph);
    return db.getStats();
  } catch (error) {
    throw fail(error);
  } finally {
    db.close();
  }
}
