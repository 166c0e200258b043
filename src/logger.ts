/**
 * Catalog Logger - structured logging for batch runs
 * Provides levels, colors, progress output and session log files
 */

import * as fs from 'fs';
import * as path from 'path';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

interface LogEntry {
  timestamp: string;
  level: string;
  component: string;
  message: string;
  data?: unknown;
}

// ANSI colors for terminal output
const COLORS = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: COLORS.dim,
  [LogLevel.INFO]: COLORS.green,
  [LogLevel.WARN]: COLORS.yellow,
  [LogLevel.ERROR]: COLORS.red,
  [LogLevel.SILENT]: COLORS.reset,
};

const LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: 'DEBUG',
  [LogLevel.INFO]: 'INFO',
  [LogLevel.WARN]: 'WARN',
  [LogLevel.ERROR]: 'ERROR',
  [LogLevel.SILENT]: 'SILENT',
};

export function parseLogLevel(value: string | undefined, fallback: LogLevel = LogLevel.INFO): LogLevel {
  switch ((value ?? '').toLowerCase()) {
    case 'debug': return LogLevel.DEBUG;
    case 'info': return LogLevel.INFO;
    case 'warn': return LogLevel.WARN;
    case 'error': return LogLevel.ERROR;
    case 'silent': return LogLevel.SILENT;
    default: return fallback;
  }
}

export class Logger {
  private minLevel: LogLevel = LogLevel.INFO;
  private logDir: string = path.join(process.cwd(), 'logs');
  private logFile: string | null = null;
  private logBuffer: LogEntry[] = [];

  setLevel(level: LogLevel) {
    this.minLevel = level;
  }

  setLogDir(dir: string) {
    this.logDir = dir;
  }

  /**
   * Start a new log session with timestamped file
   */
  startSession(name: string = 'catalog') {
    if (!fs.existsSync(this.logDir)) {
      fs.mkdirSync(this.logDir, { recursive: true });
    }
    const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
    this.logFile = path.join(this.logDir, `${name}-${timestamp}.log`);
    this.logBuffer = [];
    this.info('Logger', `Session started: ${this.logFile}`);
  }

  private formatTime(): string {
    return new Date().toISOString().substring(11, 23); // HH:MM:SS.mmm
  }

  private log(level: LogLevel, component: string, message: string, data?: unknown) {
    if (level < this.minLevel) return;

    const timestamp = this.formatTime();
    const levelName = LEVEL_NAMES[level];
    const color = LEVEL_COLORS[level];

    const prefix = `${COLORS.dim}${timestamp}${COLORS.reset} ${color}${levelName.padEnd(5)}${COLORS.reset}`;
    const componentStr = `${COLORS.cyan}[${component}]${COLORS.reset}`;

    console.log(`${prefix} ${componentStr} ${message}`);

    if (data !== undefined) {
      console.log(`${COLORS.dim}  └─ ${JSON.stringify(data, null, 2).split('\n').join('\n     ')}${COLORS.reset}`);
    }

    // Only buffered while a session file is open
    if (this.logFile) {
      this.logBuffer.push({ timestamp, level: levelName, component, message, data });
    }
  }

  debug(component: string, message: string, data?: unknown) {
    this.log(LogLevel.DEBUG, component, message, data);
  }

  info(component: string, message: string, data?: unknown) {
    this.log(LogLevel.INFO, component, message, data);
  }

  warn(component: string, message: string, data?: unknown) {
    this.log(LogLevel.WARN, component, message, data);
  }

  error(component: string, message: string, data?: unknown) {
    this.log(LogLevel.ERROR, component, message, data);
  }

  /**
   * Log progress for batch operations
   */
  progress(component: string, current: number, total: number, item: string) {
    if (this.minLevel > LogLevel.INFO) return;
    const pct = total === 0 ? 100 : Math.round((current / total) * 100);
    const bar = '█'.repeat(Math.floor(pct / 5)) + '░'.repeat(20 - Math.floor(pct / 5));
    console.log(`${COLORS.dim}${this.formatTime()}${COLORS.reset} ${COLORS.blue}${bar}${COLORS.reset} ${current}/${total} ${COLORS.cyan}[${component}]${COLORS.reset} ${item}`);
  }

  /**
   * Log a summary table
   */
  summary(title: string, data: Record<string, number | string>) {
    if (this.minLevel > LogLevel.INFO) return;
    console.log(`\n${COLORS.cyan}╭${'─'.repeat(48)}╮${COLORS.reset}`);
    console.log(`${COLORS.cyan}│${COLORS.reset} ${COLORS.green}${title.padEnd(47)}${COLORS.reset}${COLORS.cyan}│${COLORS.reset}`);
    console.log(`${COLORS.cyan}├${'─'.repeat(48)}┤${COLORS.reset}`);

    for (const [key, value] of Object.entries(data)) {
      const valueStr = typeof value === 'number' ? value.toLocaleString() : value;
      console.log(`${COLORS.cyan}│${COLORS.reset}  ${key.padEnd(25)} ${String(valueStr).padStart(20)} ${COLORS.cyan}│${COLORS.reset}`);
    }

    console.log(`${COLORS.cyan}╰${'─'.repeat(48)}╯${COLORS.reset}\n`);
  }

  /**
   * Flush log buffer to file
   */
  flush() {
    if (this.logFile && this.logBuffer.length > 0) {
      const content = this.logBuffer.map(entry =>
        `${entry.timestamp} [${entry.level}] [${entry.component}] ${entry.message}${entry.data !== undefined ? ' ' + JSON.stringify(entry.data) : ''}`
      ).join('\n');
      fs.appendFileSync(this.logFile, content + '\n');
      this.logBuffer = [];
    }
  }
}

// Singleton instance
export const logger = new Logger();
