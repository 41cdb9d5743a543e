import { existsSync, mkdirSync, appendFileSync, readdirSync, readFileSync } from 'fs';
import { join } from 'path';
import { getConfigDir } from './config';
import type { VoiceLogger } from './voice/types';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  data?: unknown;
  scope?: string;
}

const LOG_FILE_PATTERN = /^\d{4}-\d{2}-\d{2}\.log$/;
const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

/**
 * Logger that appends JSON lines to <configDir>/logs/YYYY-MM-DD.log
 */
export class Logger implements VoiceLogger {
  private logDir: string;
  private logFile: string;
  private scope: string;

  constructor(scope: string, basePath?: string) {
    this.scope = scope;
    this.logDir = join(basePath || getConfigDir(), 'logs');
    this.ensureDir(this.logDir);

    const date = new Date().toISOString().split('T')[0];
    this.logFile = join(this.logDir, `${date}.log`);
  }

  private ensureDir(dir: string) {
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  private write(level: LogLevel, message: string, data?: unknown) {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      data,
      scope: this.scope,
    };

    try {
      appendFileSync(this.logFile, JSON.stringify(entry) + '\n');
    } catch {
      // Ignore write errors
    }
  }

  debug(message: string, data?: unknown) {
    this.write('debug', message, data);
  }

  info(message: string, data?: unknown) {
    this.write('info', message, data);
  }

  warn(message: string, data?: unknown) {
    this.write('warn', message, data);
  }

  error(message: string, data?: unknown) {
    this.write('error', message, data);
  }

  /**
   * Read log entries from daily JSONL log files, newest first.
   */
  static readEntries(options?: {
    basePath?: string;
    scope?: string;
    level?: LogLevel;
    since?: string;
    limit?: number;
    offset?: number;
  }): LogEntry[] {
    const logDir = join(options?.basePath || getConfigDir(), 'logs');
    if (!existsSync(logDir)) return [];

    const minLevel = options?.level ? LEVEL_ORDER[options.level] : 0;
    const files = readdirSync(logDir)
      .filter((f) => LOG_FILE_PATTERN.test(f))
      .sort((a, b) => b.localeCompare(a));

    const entries: LogEntry[] = [];

    for (const file of files) {
      if (options?.since) {
        const fileDate = file.replace('.log', '');
        const sinceDate = options.since.split('T')[0];
        if (fileDate < sinceDate) break;
      }

      let content: string;
      try {
        content = readFileSync(join(logDir, file), 'utf-8');
      } catch {
        continue;
      }

      for (const line of content.trim().split('\n').filter(Boolean)) {
        const entry = parseEntry(line);
        if (!entry) continue;
        if (LEVEL_ORDER[entry.level] < minLevel) continue;
        if (options?.scope && entry.scope !== options.scope) continue;
        if (options?.since && entry.timestamp < options.since) continue;
        entries.push(entry);
      }
    }

    entries.sort((a, b) => b.timestamp.localeCompare(a.timestamp));

    const offset = options?.offset ?? 0;
    const limit = options?.limit ?? entries.length;
    return entries.slice(offset, offset + limit);
  }

  /**
   * List available log file dates.
   */
  static listLogDates(basePath?: string): string[] {
    const logDir = join(basePath || getConfigDir(), 'logs');
    if (!existsSync(logDir)) return [];

    return readdirSync(logDir)
      .filter((f) => LOG_FILE_PATTERN.test(f))
      .map((f) => f.replace('.log', ''))
      .sort((a, b) => b.localeCompare(a));
  }
}

function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && value in LEVEL_ORDER;
}

function parseEntry(line: string): LogEntry | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    return null;
  }
  if (typeof parsed !== 'object' || parsed === null) return null;

  const level: unknown = Reflect.get(parsed, 'level');
  const timestamp: unknown = Reflect.get(parsed, 'timestamp');
  const message: unknown = Reflect.get(parsed, 'message');
  const scope: unknown = Reflect.get(parsed, 'scope');
  if (!isLogLevel(level) || typeof timestamp !== 'string' || typeof message !== 'string') {
    return null;
  }

  return {
    timestamp,
    level,
    message,
    data: Reflect.get(parsed, 'data'),
    scope: typeof scope === 'string' ? scope : undefined,
  };
}

/**
 * Logger that drops everything
 */
export const silentLogger: VoiceLogger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
