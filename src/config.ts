/**
 * Runtime configuration from environment (.env supported)
 */

import { config as loadEnv } from 'dotenv';
import { LogLevel, parseLogLevel } from './logger.js';

export interface CatalogConfig {
  catalogPath: string;   // input catalog JSON
  outputPath: string | null; // null = write back over the input
  logLevel: LogLevel;
  logDir: string;
  backup: boolean;       // keep <file>.backup before overwriting
  dbPath: string | null; // optional SQLite export
}

/**
 * Read configuration from an environment map
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): CatalogConfig {
  return {
    catalogPath: env.CATALOG_PATH || 'all_courses.json',
    outputPath: env.CATALOG_OUTPUT || null,
    logLevel: env.DEBUG_CATALOG === 'true' ? LogLevel.DEBUG : parseLogLevel(env.LOG_LEVEL),
    logDir: env.LOG_DIR || 'logs',
    backup: env.CATALOG_BACKUP !== 'false',
    dbPath: env.CATALOG_DB || null,
  };
}

/**
 * Load .env into process.env, then read configuration
 */
export function loadEnvConfig(): CatalogConfig {
  loadEnv();
  return loadConfig(process.env);
}
