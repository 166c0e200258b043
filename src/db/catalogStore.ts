/**
 * Catalog Store
 * Loads and saves the course catalog as a JSON array of records
 */

import * as fs from 'fs';
import * as path from 'path';
import { logger } from '../logger.js';
import type { CatalogRecord } from '../types.js';

export class CatalogIOError extends Error {
  constructor(message: string, readonly filePath: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CatalogIOError';
  }
}

export interface SaveOptions {
  /** Copy an existing target to `<path>.backup` before replacing it */
  backup?: boolean;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringField(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

/**
 * Coerce one parsed JSON value into a catalog record; other fields pass through
 */
export function toCatalogRecord(value: unknown, index: number, filePath: string): CatalogRecord {
  if (!isObject(value)) {
    throw new CatalogIOError(`Record ${index} is not an object`, filePath);
  }
  return {
    ...value,
    title: stringField(value.title),
    prerequisites: stringField(value.prerequisites),
    concurrent: stringField(value.concurrent),
  };
}

/**
 * Read a catalog file
 */
export function loadCatalog(filePath: string): CatalogRecord[] {
  if (!fs.existsSync(filePath)) {
    throw new CatalogIOError(`${filePath} not found`, filePath);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new CatalogIOError(`Failed to read ${filePath}`, filePath, { cause: error });
  }

  if (!Array.isArray(parsed)) {
    throw new CatalogIOError(`${filePath} does not contain a JSON array`, filePath);
  }

  const records = parsed.map((value: unknown, i) => toCatalogRecord(value, i, filePath));
  logger.info('Store', `Loaded ${records.length} courses from ${filePath}`);
  return records;
}

/**
 * Write a catalog file. The records are fully serialized and written to a
 * temp file before the target is touched.
 */
export function saveCatalog(filePath: string, records: object[], options: SaveOptions = {}): void {
  let content: string;
  try {
    content = JSON.stringify(records, null, 2) + '\n';
  } catch (error) {
    throw new CatalogIOError(`Failed to serialize catalog for ${filePath}`, filePath, { cause: error });
  }

  const tempPath = path.join(path.dirname(filePath), `.${path.basename(filePath)}.${process.pid}.tmp`);

  try {
    fs.writeFileSync(tempPath, content, 'utf-8');

    if (options.backup && fs.existsSync(filePath)) {
      fs.copyFileSync(filePath, `${filePath}.backup`);
      logger.debug('Store', `Backup written: ${filePath}.backup`);
    }

    fs.renameSync(tempPath, filePath);
  } catch (error) {
    if (fs.existsSync(tempPath)) {
      fs.rmSync(tempPath, { force: true });
    }
    throw new CatalogIOError(`Failed to write ${filePath}`, filePath, { cause: error });
  }

  logger.info('Store', `Saved ${records.length} courses to ${filePath}`);
}
