#!/usr/bin/env npx tsx

/**
 * Catalog Prerequisite Graph - Main Entry Point
 * Parses prerequisite text into ASTs and builds the reverse dependency graph
 *
 * Usage:
 *   npm start -- parse all_courses.json                 # attach prerequisite_ast
 *   npm start -- graph all_courses.json -o final.json   # attach is_prerequisite_for / is_corequisite_for
 *   npm start -- build all_courses.json --metadata --db catalog.db
 *   npm start -- show all_courses.json CSCE1001
 */

import { Command } from 'commander';
import { loadEnvConfig, type CatalogConfig } from './config.js';
import { exportCatalogDatabase } from './db/database.js';
import { CatalogIOError, loadCatalog, saveCatalog } from './db/catalogStore.js';
import { sortedDependents } from './graph/reverseGraph.js';
import { courseCodeFromTitle, normalizeCourseCode } from './parsers/courseCode.js';
import { formatRequirement } from './parsers/formatRequirement.js';
import { LogLevel, logger } from './logger.js';
import {
  addCourseMetadata,
  buildCatalogGraph,
  ensureParsed,
  parseCatalog,
  processCatalog,
} from './pipeline.js';
import type { GraphStats, ParseStats } from './types.js';

const config = loadEnvConfig();
logger.setLevel(config.logLevel);
logger.setLogDir(config.logDir);

interface OutputOptions {
  output?: string;
  backup: boolean;
  verbose?: boolean;
}

interface BuildOptions extends OutputOptions {
  metadata?: boolean;
  db?: string;
}

function applyVerbose(options: { verbose?: boolean }) {
  if (options.verbose) logger.setLevel(LogLevel.DEBUG);
}

function printParseStats(stats: ParseStats) {
  logger.summary('Parsing Statistics', {
    'Total courses': stats.total,
    'With prerequisites': stats.withPrerequisites,
    'With corequisites': stats.withCorequisites,
    'Empty (no requirements)': stats.empty,
    'Parsing errors': stats.errors,
  });
}

function printGraphStats(stats: GraphStats) {
  logger.summary('Reverse Graph Statistics', {
    'Total courses': stats.total,
    'Are prerequisites': stats.withPrereqFor,
    'Are corequisites': stats.withCoreqFor,
    'Leaf courses': stats.leaves,
  });
}

/**
 * Run one command; only catalog I/O failures end the process with an error
 */
function run(task: () => void) {
  try {
    task();
  } catch (error) {
    if (error instanceof CatalogIOError) {
      logger.error('CLI', error.message, error.cause instanceof Error ? { cause: error.cause.message } : undefined);
      process.exitCode = 1;
      return;
    }
    throw error;
  } finally {
    logger.flush();
  }
}

function outputPath(input: string, options: OutputOptions, cfg: CatalogConfig): string {
  return options.output ?? cfg.outputPath ?? input;
}

const program = new Command();

program
  .name('catalog-prereq-graph')
  .description('Parse course prerequisite text into ASTs and build the reverse dependency graph')
  .version('1.0.0');

program
  .command('parse')
  .description('Attach a prerequisite_ast to every course')
  .argument('[input]', 'catalog JSON file', config.catalogPath)
  .option('-o, --output <file>', 'output file (default: overwrite input)')
  .option('--no-backup', 'do not keep <output>.backup')
  .option('-v, --verbose', 'verbose output')
  .action((input: string, options: OutputOptions) => run(() => {
    applyVerbose(options);
    logger.startSession('parse');
    const { courses, stats } = parseCatalog(loadCatalog(input));
    saveCatalog(outputPath(input, options, config), courses, { backup: options.backup && config.backup });
    printParseStats(stats);
  }));

program
  .command('graph')
  .description('Attach is_prerequisite_for and is_corequisite_for to every course')
  .argument('[input]', 'catalog JSON file with prerequisite_ast', config.catalogPath)
  .option('-o, --output <file>', 'output file (default: overwrite input)')
  .option('--no-backup', 'do not keep <output>.backup')
  .option('-v, --verbose', 'verbose output')
  .action((input: string, options: OutputOptions) => run(() => {
    applyVerbose(options);
    logger.startSession('graph');
    const { courses, stats } = buildCatalogGraph(ensureParsed(loadCatalog(input)));
    saveCatalog(outputPath(input, options, config), courses, { backup: options.backup && config.backup });
    printGraphStats(stats);
  }));

program
  .command('build')
  .description('Parse, build the graph and optionally add title metadata and a SQLite export')
  .argument('[input]', 'catalog JSON file', config.catalogPath)
  .option('-o, --output <file>', 'output file (default: overwrite input)')
  .option('--metadata', 'add course_code, course_title and difficulty_level')
  .option('--db <file>', 'also export courses and edges to SQLite')
  .option('--no-backup', 'do not keep <output>.backup')
  .option('-v, --verbose', 'verbose output')
  .action((input: string, options: BuildOptions) => run(() => {
    applyVerbose(options);
    logger.startSession('build');
    const result = processCatalog(loadCatalog(input), { metadata: options.metadata });
    saveCatalog(outputPath(input, options, config), result.courses, { backup: options.backup && config.backup });

    const dbPath = options.db ?? config.dbPath;
    if (dbPath) {
      exportCatalogDatabase(dbPath, result.courses, result.graph);
    }

    printParseStats(result.parseStats);
    printGraphStats(result.graphStats);
  }));

program
  .command('show')
  .description('Show one course\'s parsed requirements and dependents')
  .argument('<input>', 'catalog JSON file')
  .argument('<code>', 'course code, e.g. CSCE1001')
  .action((input: string, code: string) => run(() => {
    const target = normalizeCourseCode(code).toUpperCase();
    const { courses, graph } = buildCatalogGraph(ensureParsed(loadCatalog(input)));
    const course = courses.find(c => courseCodeFromTitle(c.title) === target);

    if (!course) {
      logger.warn('CLI', `No course ${target} in ${input}`);
      const dependents = sortedDependents(graph.prereqOf, target);
      if (dependents.length > 0) {
        console.log(`Referenced as a prerequisite by: ${dependents.join(', ')}`);
      }
      return;
    }

    const ast = course.prerequisite_ast;
    const metadata = addCourseMetadata([course])[0];
    console.log(`\n${course.title}`);
    console.log(`  Difficulty:          ${metadata.difficulty_level}`);
    console.log(`  Raw:                 ${ast.raw_text || '(none)'}`);
    console.log(`  Prerequisites:       ${formatRequirement(ast.prerequisites)}`);
    console.log(`  Corequisites:        ${formatRequirement(ast.corequisites)}`);
    console.log(`  Is prerequisite for: ${course.is_prerequisite_for.join(', ') || '(none)'}`);
    console.log(`  Is corequisite for:  ${course.is_corequisite_for.join(', ') || '(none)'}\n`);
  }));

program.parse();
