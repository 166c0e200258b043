import { describe, expect, test } from 'vitest';

import { loadConfig } from '../src/config.js';
import { LogLevel, parseLogLevel } from '../src/logger.js';

describe('loadConfig', () => {
  test('defaults', () => {
    expect(loadConfig({})).toEqual({
      catalogPath: 'all_courses.json',
      outputPath: null,
      logLevel: LogLevel.INFO,
      logDir: 'logs',
      backup: true,
      dbPath: null,
    });
  });

  test('reads overrides from the environment', () => {
    expect(loadConfig({
      CATALOG_PATH: 'catalog.json',
      CATALOG_OUTPUT: 'final.json',
      LOG_LEVEL: 'warn',
      CATALOG_BACKUP: 'false',
      CATALOG_DB: 'catalog.db',
    })).toMatchObject({
      catalogPath: 'catalog.json',
      outputPath: 'final.json',
      logLevel: LogLevel.WARN,
      backup: false,
      dbPath: 'catalog.db',
    });
  });

  test('DEBUG_CATALOG forces debug logging', () => {
    expect(loadConfig({ DEBUG_CATALOG: 'true', LOG_LEVEL: 'error' }).logLevel).toBe(LogLevel.DEBUG);
  });

  test('unknown levels fall back', () => {
    expect(parseLogLevel('loud')).toBe(LogLevel.INFO);
    expect(parseLogLevel('SILENT')).toBe(LogLevel.SILENT);
  });
});
