/**
 * Logger Implementation
 *
 * Leveled, structured logger used by every knowledge base component and the
 * maintenance CLI. Writes to the console and, optionally, to a log file.
 */

import { appendFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import {
  type LogEntry,
  type LoggerConfig,
  type LogLevel,
  LogLevelName,
  LogLevelColors,
  LogColors,
  createDefaultLoggerConfig,
  shouldLog,
  formatError,
  LogLevel as LogLevelEnum,
  LogFormat,
} from './types.js';

// =============================================================================
// Logger Class
// =============================================================================

export class Logger {
  private readonly config: LoggerConfig;
  private fileReady = false;

  constructor(config?: Partial<LoggerConfig>) {
    this.config = createDefaultLoggerConfig(config);
  }

  /**
   * Create a child logger; sources nest as "parent:child"
   */
  child(source: string): Logger {
    return new Logger({
      ...this.config,
      source: this.config.source ? `${this.config.source}:${source}` : source,
    });
  }

  error(message: string, context?: Record<string, unknown>): void;
  error(message: string, error: unknown, context?: Record<string, unknown>): void;
  error(message: string, errorOrContext?: unknown, context?: Record<string, unknown>): void {
    if (errorOrContext instanceof Error) {
      this.log(LogLevelEnum.ERROR, message, context, errorOrContext);
    } else if (isContext(errorOrContext)) {
      this.log(LogLevelEnum.ERROR, message, errorOrContext);
    } else if (errorOrContext !== undefined) {
      this.log(LogLevelEnum.ERROR, message, context, errorOrContext);
    } else {
      this.log(LogLevelEnum.ERROR, message, context);
    }
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevelEnum.WARN, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevelEnum.INFO, message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevelEnum.DEBUG, message, context);
  }

  trace(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevelEnum.TRACE, message, context);
  }

  private log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: unknown
  ): void {
    if (!shouldLog(level, this.config.level)) {
      return;
    }

    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date(),
    };
    if (context && Object.keys(context).length > 0) entry.context = context;
    if (this.config.source) entry.source = this.config.source;
    if (error !== undefined) entry.error = formatError(error);

    this.output(this.format(entry), level);

    if (this.config.filePath) {
      this.appendToFile(this.config.format === LogFormat.JSON ? this.formatJson(entry) : this.formatText(entry));
    }
  }

  private format(entry: LogEntry): string {
    switch (this.config.format) {
      case LogFormat.JSON:
        return this.formatJson(entry);
      case LogFormat.PRETTY:
        return this.formatPretty(entry);
      case LogFormat.TEXT:
      default:
        return this.formatText(entry);
    }
  }

  private formatText(entry: LogEntry): string {
    const parts: string[] = [];

    if (this.config.timestamps) {
      parts.push(`[${entry.timestamp.toISOString()}]`);
    }

    parts.push(LogLevelName[entry.level].padEnd(5));

    if (entry.source) {
      parts.push(`[${entry.source}]`);
    }

    parts.push(entry.message);

    if (entry.context) {
      parts.push(JSON.stringify(entry.context));
    }

    if (entry.error) {
      const code = entry.error.code ? ` (${entry.error.code})` : '';
      parts.push(`\n  Error: ${entry.error.name}${code}: ${entry.error.message}`);
      if (entry.error.stack) {
        parts.push(`\n  ${entry.error.stack.replace(/\n/g, '\n  ')}`);
      }
    }

    return parts.join(' ');
  }

  private formatJson(entry: LogEntry): string {
    return JSON.stringify({
      timestamp: entry.timestamp.toISOString(),
      level: LogLevelName[entry.level],
      message: entry.message,
      source: entry.source,
      context: entry.context,
      error: entry.error,
    });
  }

  private formatPretty(entry: LogEntry): string {
    if (!this.config.colors) {
      return this.formatText(entry);
    }

    const parts: string[] = [];
    const levelColor = LogLevelColors[entry.level];

    if (this.config.timestamps) {
      parts.push(`${LogColors.gray}[${entry.timestamp.toISOString()}]${LogColors.reset}`);
    }

    parts.push(`${levelColor}${LogLevelName[entry.level].padEnd(5)}${LogColors.reset}`);

    if (entry.source) {
      parts.push(`${LogColors.cyan}[${entry.source}]${LogColors.reset}`);
    }

    parts.push(entry.message);

    if (entry.context) {
      parts.push(`${LogColors.dim}${JSON.stringify(entry.context)}${LogColors.reset}`);
    }

    if (entry.error) {
      const code = entry.error.code ? ` (${entry.error.code})` : '';
      parts.push(
        `\n  ${LogColors.red}Error: ${entry.error.name}${code}: ${entry.error.message}${LogColors.reset}`
      );
      if (entry.error.stack) {
        parts.push(`\n  ${LogColors.gray}${entry.error.stack.replace(/\n/g, '\n  ')}${LogColors.reset}`);
      }
    }

    return parts.join(' ');
  }

  private output(formatted: string, level: LogLevel): void {
    if (this.config.output) {
      this.config.output(formatted, level);
      return;
    }

    if (this.config.console) {
      if (level === LogLevelEnum.ERROR) {
        console.error(formatted);
      } else if (level === LogLevelEnum.WARN) {
        console.warn(formatted);
      } else {
        console.log(formatted);
      }
    }
  }

  private appendToFile(line: string): void {
    const filePath = this.config.filePath;
    if (!filePath) return;

    if (!this.fileReady) {
      mkdirSync(dirname(filePath), { recursive: true });
      this.fileReady = true;
    }
    appendFileSync(filePath, `${line}\n`, 'utf-8');
  }

  setLevel(level: LogLevel): void {
    this.config.level = level;
  }

  getLevel(): LogLevel {
    return this.config.level;
  }

  getConfig(): Readonly<LoggerConfig> {
    return this.config;
  }
}

function isContext(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// =============================================================================
// Global Logger Instance
// =============================================================================

let globalLogger: Logger | null = null;

export function getGlobalLogger(): Logger {
  if (!globalLogger) {
    globalLogger = new Logger({
      level: LogLevelEnum.INFO,
      format: 'pretty',
    });
  }
  return globalLogger;
}

export function setGlobalLogger(logger: Logger): void {
  globalLogger = logger;
}

export function resetGlobalLogger(): void {
  globalLogger = null;
}

export function createLogger(source: string, config?: Partial<LoggerConfig>): Logger {
  return new Logger({
    ...config,
    source,
  });
}
