/**
 * Structured Logging System
 *
 * Log entries carry a level, message and optional context. They are written
 * to stderr as human-readable lines so that stdout only ever carries the
 * preview report.
 */

import chalk from 'chalk';

/**
 * Log severity levels
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Structured log entry with contextual metadata
 */
export interface LogEntry {
  timestamp: string; // ISO 8601 format
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  minLevel?: LogLevel;
  /** Include stack frames of logged errors */
  showStacks?: boolean;
  /** Output sink; defaults to stderr */
  write?: (line: string) => void;
}

/**
 * Log level severity (higher = more severe)
 */
const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LEVEL_COLORS: Record<LogLevel, (text: string) => string> = {
  debug: chalk.cyan,
  info: chalk.blue,
  warn: chalk.yellow,
  error: chalk.red,
};

const LEVEL_ICONS: Record<LogLevel, string> = {
  debug: '🔍',
  info: 'ℹ️ ',
  warn: '⚠️ ',
  error: '❌',
};

/**
 * Minimal logging surface the rest of the code depends on
 */
export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: Error, context?: Record<string, unknown>): void;
}

/**
 * Structured logger writing human-readable lines
 */
export class StructuredLogger implements Logger {
  private minLevel: LogLevel;
  private showStacks: boolean;
  private write: (line: string) => void;

  constructor(config: LoggerConfig = {}) {
    this.minLevel = config.minLevel ?? 'warn';
    this.showStacks = config.showStacks ?? false;
    this.write = config.write ?? (line => process.stderr.write(line + '\n'));
  }

  /**
   * Check if log level meets the minimum threshold
   */
  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.minLevel];
  }

  private createEntry(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error
  ): LogEntry {
    return {
      timestamp: new Date().toISOString(),
      level,
      message,
      context,
      error: error
        ? {
            name: error.name,
            message: error.message,
            stack: error.stack,
          }
        : undefined,
    };
  }

  /**
   * Format log entry for human-readable terminal output
   */
  formatForTerminal(entry: LogEntry): string {
    const color = LEVEL_COLORS[entry.level];
    const time = new Date(entry.timestamp).toLocaleTimeString();
    const level = entry.level.toUpperCase().padEnd(5);

    let output = `${chalk.dim(`[${time}]`)} ${color(`${LEVEL_ICONS[entry.level]} ${level}`)} ${entry.message}`;

    // Context as key=value pairs, not as JSON
    if (entry.context && Object.keys(entry.context).length > 0) {
      const contextStr = Object.entries(entry.context)
        .map(([key, value]) => `${key}=${JSON.stringify(value)}`)
        .join(' ');
      output += chalk.dim(` (${contextStr})`);
    }

    if (entry.error) {
      output += `\n  ${LEVEL_COLORS.error(`Error: ${entry.error.message}`)}`;
      if (this.showStacks && entry.error.stack) {
        const stackLines = entry.error.stack.split('\n').slice(1, 4);
        output += `\n${chalk.dim(stackLines.join('\n'))}`;
      }
    }

    return output;
  }

  private output(entry: LogEntry): void {
    this.write(this.formatForTerminal(entry));
  }

  debug(message: string, context?: Record<string, unknown>): void {
    if (this.shouldLog('debug')) {
      this.output(this.createEntry('debug', message, context));
    }
  }

  info(message: string, context?: Record<string, unknown>): void {
    if (this.shouldLog('info')) {
      this.output(this.createEntry('info', message, context));
    }
  }

  warn(message: string, context?: Record<string, unknown>): void {
    if (this.shouldLog('warn')) {
      this.output(this.createEntry('warn', message, context));
    }
  }

  /**
   * Log error message
   *
   * @param error - Error object (optional)
   */
  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    if (this.shouldLog('error')) {
      this.output(this.createEntry('error', message, context, error));
    }
  }
}

/**
 * Global logger instance (singleton)
 */
let globalLogger: StructuredLogger | null = null;

/**
 * Get or create global logger instance
 *
 * @param config - Logger configuration (only used on first call)
 */
export function getLogger(config?: LoggerConfig): StructuredLogger {
  if (!globalLogger) {
    globalLogger = new StructuredLogger(config);
  }
  return globalLogger;
}

/**
 * Reset global logger (useful for testing)
 */
export function resetLogger(): void {
  globalLogger = null;
}
