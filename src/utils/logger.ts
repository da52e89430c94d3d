import chalk from 'chalk';
import { randomUUID } from 'crypto';
import { StructuredError, type ErrorContext } from './errors.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFormat = 'pretty' | 'json';

/**
 * Settings shared by a logger and every child derived from it, so that
 * reconfiguring the root logger after startup reaches component loggers too.
 */
interface LoggerSettings {
  level: LogLevel;
  format: LogFormat;
  includeTimestamp: boolean;
  includeStack: boolean;
  correlationId?: string;
}

interface ErrorLogOptions {
  context?: ErrorContext;
  includeStack?: boolean;
  includeRecovery?: boolean;
}

/**
 * Structured JSON log entry schema for consistent logging
 */
export interface StructuredLogEntry {
  timestamp?: string;
  level: LogLevel;
  message: string;
  correlationId?: string;
  component?: string;
  meta?: Record<string, unknown>;
  error?: {
    code?: string;
    message: string;
    severity?: string;
    isRetryable?: boolean;
    stack?: string;
    cause?: string;
    context?: Record<string, unknown>;
    recoveryActions?: Array<{ description: string; automatic: boolean }>;
  };
}

const levelPriority: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const levelColors: Record<LogLevel, (text: string) => string> = {
  debug: chalk.gray,
  info: chalk.blue,
  warn: chalk.yellow,
  error: chalk.red,
};

const levelIcons: Record<LogLevel, string> = {
  debug: '🔍',
  info: '📋',
  warn: '⚠️',
  error: '❌',
};

/**
 * Generate a new correlation ID
 */
export function generateCorrelationId(): string {
  return randomUUID();
}

export class Logger {
  private readonly settings: LoggerSettings;
  private readonly prefix: string;

  constructor(settings: Partial<LoggerSettings> = {}, prefix = '', shared?: LoggerSettings) {
    this.settings = shared ?? {
      level: settings.level ?? 'info',
      format: settings.format ?? 'pretty',
      includeTimestamp: settings.includeTimestamp ?? true,
      includeStack: settings.includeStack ?? false,
      correlationId: settings.correlationId,
    };
    this.prefix = prefix;
  }

  setLevel(level: LogLevel): void {
    this.settings.level = level;
  }

  getLevel(): LogLevel {
    return this.settings.level;
  }

  setFormat(format: LogFormat): void {
    this.settings.format = format;
  }

  setIncludeTimestamp(include: boolean): void {
    this.settings.includeTimestamp = include;
  }

  /**
   * Include stack traces when logging structured errors (verbose mode)
   */
  setIncludeStack(include: boolean): void {
    this.settings.includeStack = include;
  }

  setCorrelationId(id: string): void {
    this.settings.correlationId = id;
  }

  getCorrelationId(): string | undefined {
    return this.settings.correlationId;
  }

  private shouldLog(level: LogLevel): boolean {
    return levelPriority[level] >= levelPriority[this.settings.level];
  }

  private createLogEntry(level: LogLevel, message: string, meta?: object): StructuredLogEntry {
    const entry: StructuredLogEntry = { level, message };

    if (this.settings.includeTimestamp) {
      entry.timestamp = new Date().toISOString();
    }
    if (this.settings.correlationId) {
      entry.correlationId = this.settings.correlationId;
    }
    if (this.prefix) {
      entry.component = this.prefix;
    }
    if (meta && Object.keys(meta).length > 0) {
      entry.meta = { ...meta };
    }

    return entry;
  }

  private formatPretty(level: LogLevel, message: string, meta?: object): string {
    const timestamp = this.settings.includeTimestamp ? `${chalk.gray(new Date().toISOString())} ` : '';
    const prefix = this.prefix ? `[${this.prefix}] ` : '';
    const correlationId = this.settings.correlationId;
    const contextStr = correlationId ? chalk.gray(` [${correlationId.slice(0, 8)}]`) : '';

    let formatted = `${timestamp}${levelIcons[level]} ${levelColors[level](level.toUpperCase().padEnd(5))} ${prefix}${message}${contextStr}`;

    if (meta && Object.keys(meta).length > 0) {
      formatted += ` ${chalk.gray(JSON.stringify(meta))}`;
    }

    return formatted;
  }

  private writeLog(level: LogLevel, message: string, meta?: object): void {
    if (this.settings.format === 'json') {
      const output = level === 'error' ? console.error : console.log;
      output(JSON.stringify(this.createLogEntry(level, message, meta)));
    } else {
      const output = level === 'error' ? console.error : level === 'warn' ? console.warn : console.log;
      output(this.formatPretty(level, message, meta));
    }
  }

  debug(message: string, meta?: object): void {
    if (this.shouldLog('debug')) {
      this.writeLog('debug', message, meta);
    }
  }

  info(message: string, meta?: object): void {
    if (this.shouldLog('info')) {
      this.writeLog('info', message, meta);
    }
  }

  warn(message: string, meta?: object): void {
    if (this.shouldLog('warn')) {
      this.writeLog('warn', message, meta);
    }
  }

  error(message: string, meta?: object): void {
    if (this.shouldLog('error')) {
      this.writeLog('error', message, meta);
    }
  }

  /**
   * Log a structured error with full context, recovery suggestions, and optional stack trace
   */
  structuredError(error: StructuredError, options: ErrorLogOptions = {}): void {
    if (!this.shouldLog('error')) return;

    const { context, includeStack = this.settings.includeStack, includeRecovery = true } = options;
    const mergedContext = context ? { ...error.context, ...context } : error.context;

    if (this.settings.format === 'json') {
      const entry = this.createLogEntry('error', error.message);
      entry.error = {
        code: error.code,
        message: error.message,
        severity: error.severity,
        isRetryable: error.isRetryable,
        context: mergedContext,
      };
      if (includeStack && error.stack) {
        entry.error.stack = error.stack;
      }
      if (includeRecovery && error.recoveryActions.length > 0) {
        entry.error.recoveryActions = error.recoveryActions;
      }
      if (error.cause) {
        entry.error.cause = error.cause.message;
      }
      console.error(JSON.stringify(entry));
      return;
    }

    const prefix = this.prefix ? `[${this.prefix}] ` : '';

    console.error();
    console.error(`${levelIcons.error} ${levelColors.error('ERROR')} ${prefix}${chalk.bold(`[${error.code}]`)} ${error.message}`);
    console.error(chalk.gray('  Severity:'), this.getSeverityColor(error.severity)(error.severity));

    const contextEntries = Object.entries(mergedContext).filter(
      ([key, value]) => value !== undefined && key !== 'timestamp'
    );
    if (contextEntries.length > 0) {
      console.error(chalk.gray('  Context:'));
      for (const [key, value] of contextEntries) {
        const displayValue = typeof value === 'object' ? JSON.stringify(value) : String(value);
        console.error(chalk.gray(`    ${key}:`), displayValue);
      }
    }

    if (includeRecovery && error.recoveryActions.length > 0) {
      console.error(chalk.yellow('  Recovery suggestions:'));
      for (const action of error.recoveryActions) {
        const actionType = action.automatic ? chalk.cyan('(auto)') : chalk.magenta('(manual)');
        console.error(`    ${actionType} ${action.description}`);
      }
    }

    if (includeStack && error.stack) {
      console.error(chalk.gray('  Stack trace:'));
      for (const line of error.stack.split('\n').slice(1, 6)) {
        console.error(chalk.gray(`  ${line}`));
      }
    }

    if (error.cause) {
      console.error(chalk.gray('  Caused by:'), error.cause.message);
    }

    console.error();
  }

  private getSeverityColor(severity: string): (text: string) => string {
    switch (severity) {
      case 'critical':
        return chalk.red.bold;
      case 'error':
        return chalk.red;
      case 'warning':
        return chalk.yellow;
      case 'transient':
        return chalk.cyan;
      default:
        return chalk.white;
    }
  }

  // Special formatted outputs
  success(message: string): void {
    if (this.settings.format === 'json') {
      const entry = this.createLogEntry('info', message);
      entry.meta = { status: 'success' };
      console.log(JSON.stringify(entry));
    } else {
      console.log(`${chalk.green('✓')} ${message}`);
    }
  }

  failure(message: string): void {
    if (this.settings.format === 'json') {
      const entry = this.createLogEntry('error', message);
      entry.meta = { status: 'failure' };
      console.log(JSON.stringify(entry));
    } else {
      console.log(`${chalk.red('✗')} ${message}`);
    }
  }

  header(title: string): void {
    if (this.settings.format === 'json') {
      const entry = this.createLogEntry('info', title);
      entry.meta = { type: 'header' };
      console.log(JSON.stringify(entry));
    } else {
      console.log();
      console.log(chalk.bold.cyan(`═══ ${title} ${'═'.repeat(Math.max(0, 50 - title.length))}`));
      console.log();
    }
  }

  /**
   * Create a child logger with a component prefix. Level, format and
   * correlation ID stay shared with the parent.
   */
  child(prefix: string): Logger {
    return new Logger({}, prefix, this.settings);
  }
}

export const logger = new Logger({ level: 'info' });
