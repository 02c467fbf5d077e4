/** Structured engine logging: JSONL for machines, .log for humans, console for operators. */

import fs from 'node:fs';
import path from 'node:path';
import { errorMessage } from './errors.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogData = Record<string, unknown>;

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  event: string;
  data?: LogData;
}

export interface Logger {
  debug(event: string, data?: LogData): void;
  info(event: string, data?: LogData): void;
  warn(event: string, data?: LogData): void;
  error(event: string, data?: LogData): void;
}

export interface EngineLoggerOptions {
  /** Directory for engine.jsonl and engine.log. Omit to skip file output. */
  logDir?: string;
  /** Suppress console output. */
  quiet?: boolean;
  /** Debug entries reach the console only when set. */
  verbose?: boolean;
}

const LOG_BASENAME = 'engine';
const MAX_VALUE_CHARS = 200;

export class EngineLogger implements Logger {
  private jsonlPath: string | null = null;
  private textPath: string | null = null;
  private fileFailed = false;
  private readonly quiet: boolean;
  private readonly verbose: boolean;

  constructor(options: EngineLoggerOptions = {}) {
    this.quiet = options.quiet ?? false;
    this.verbose = options.verbose ?? false;
    if (options.logDir) {
      fs.mkdirSync(options.logDir, { recursive: true });
      this.jsonlPath = path.join(options.logDir, `${LOG_BASENAME}.jsonl`);
      this.textPath = path.join(options.logDir, `${LOG_BASENAME}.log`);
    }
  }

  log(level: LogLevel, event: string, data?: LogData): void {
    const timestamp = new Date().toISOString();
    const entry: LogEntry = { timestamp, level, event, ...(data !== undefined ? { data } : {}) };
    const dataStr = data ? ' ' + formatData(data) : '';

    if (this.jsonlPath && this.textPath && !this.fileFailed) {
      try {
        fs.appendFileSync(this.jsonlPath, JSON.stringify(entry) + '\n');
        fs.appendFileSync(this.textPath, `[${timestamp}] [${level.toUpperCase()}] ${event}${dataStr}\n`);
      } catch (err) {
        // Stop retrying a broken log file; the console still gets the entry.
        this.fileFailed = true;
        console.error(`[specloom] log file write failed: ${errorMessage(err)}`);
      }
    }

    if (this.quiet || (level === 'debug' && !this.verbose)) return;
    const consoleMsg = `[specloom] ${event}${dataStr}`;
    if (level === 'error') {
      console.error(consoleMsg);
    } else if (level === 'warn') {
      console.warn(consoleMsg);
    } else {
      console.log(consoleMsg);
    }
  }

  debug(event: string, data?: LogData): void {
    this.log('debug', event, data);
  }

  info(event: string, data?: LogData): void {
    this.log('info', event, data);
  }

  warn(event: string, data?: LogData): void {
    this.log('warn', event, data);
  }

  error(event: string, data?: LogData): void {
    this.log('error', event, data);
  }
}

/** Format data object for a human-readable log line. */
export function formatData(data: LogData): string {
  const parts: string[] = [];
  for (const [key, value] of Object.entries(data)) {
    if (typeof value === 'string' && value.length > MAX_VALUE_CHARS) {
      parts.push(`${key}=[${value.length} chars]`);
    } else if (typeof value === 'object' && value !== null) {
      parts.push(`${key}=${JSON.stringify(value)}`);
    } else {
      parts.push(`${key}=${String(value)}`);
    }
  }
  return parts.join(', ');
}

/** A logger that drops everything. */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
