// =========================================================
// LOGGER — CONSOLE AND FILE LOGGING
// =========================================================

import * as fs from 'fs';
import * as path from 'path';
import { LOG_CONFIG } from '../config';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

/**
 * State shared by the root logger and every scoped child
 */
export class LogSink {
  level: LogLevel;
  private logDir: string;
  private toFile: boolean;
  private stream: fs.WriteStream | null = null;
  private streamDate = '';

  constructor() {
    const configured = LOG_CONFIG.level.toLowerCase();
    this.level = isLogLevel(configured) ? configured : 'info';
    this.logDir = LOG_CONFIG.dir;
    this.toFile = LOG_CONFIG.toFile;
  }

  /**
   * Append a line to today's log file, reopening the stream when the date rolls
   */
  writeFile(line: string): void {
    if (!this.toFile) return;

    const date = new Date().toISOString().slice(0, 10);
    if (!this.stream || date !== this.streamDate) {
      try {
        if (!fs.existsSync(this.logDir)) {
          fs.mkdirSync(this.logDir, { recursive: true });
        }
        this.stream?.end();
        this.stream = fs.createWriteStream(path.join(this.logDir, `pipeline_${date}.log`), { flags: 'a' });
        this.streamDate = date;
      } catch (error) {
        console.error('Failed to open log file, file logging disabled:', error);
        this.toFile = false;
        return;
      }
    }

    this.stream?.write(line + '\n');
  }

  close(): void {
    this.stream?.end();
    this.stream = null;
  }
}

/**
 * Leveled logger with console and optional file output
 */
export class Logger {
  private readonly sink: LogSink;
  private readonly scope?: string;

  constructor(sink: LogSink = new LogSink(), scope?: string) {
    this.sink = sink;
    this.scope = scope;
  }

  /**
   * Format a log message
   */
  private format(level: LogLevel, message: string, data?: unknown): string {
    const timestamp = new Date().toISOString();
    const scopeStr = this.scope ? ` [${this.scope}]` : '';
    const dataStr = data !== undefined ? ` ${JSON.stringify(data)}` : '';
    return `[${timestamp}] [${level.toUpperCase()}]${scopeStr} ${message}${dataStr}`;
  }

  /**
   * Log to console with color
   */
  private logToConsole(level: LogLevel, formatted: string): void {
    const colors: Record<LogLevel, string> = {
      debug: '\x1b[36m', // Cyan
      info: '\x1b[32m',  // Green
      warn: '\x1b[33m',  // Yellow
      error: '\x1b[31m', // Red
    };
    const reset = '\x1b[0m';
    console.log(`${colors[level]}${formatted}${reset}`);
  }

  /**
   * Core log method
   */
  private log(level: LogLevel, message: string, data?: unknown): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[this.sink.level]) {
      return;
    }

    const formatted = this.format(level, message, data);
    this.logToConsole(level, formatted);
    this.sink.writeFile(formatted);
  }

  debug(message: string, data?: unknown): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: unknown): void {
    this.log('info', message, data);
  }

  warn(message: string, data?: unknown): void {
    this.log('warn', message, data);
  }

  error(message: string, data?: unknown): void {
    this.log('error', message, data);
  }

  /**
   * Logger tagged with a component name, sharing level and file output
   */
  child(scope: string): Logger {
    return new Logger(this.sink, this.scope ? `${this.scope}:${scope}` : scope);
  }

  /**
   * Flush and close the log file
   */
  close(): void {
    this.sink.close();
  }
}

// Export root instance
export const logger = new Logger();
