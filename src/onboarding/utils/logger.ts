/**
 * Onboarding logger
 * Structured log lines to the console and an append-only log file
 */

import fs from 'fs';
import path from 'path';

export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
  FATAL = 'fatal'
}

export interface LogEntry {
  /** Severity */
  level: LogLevel;

  message: string;

  /** Dotted module path, e.g. `onboarding.email` */
  module: string;

  /** Operation in progress, shown in brackets after the module */
  operation?: string;

  timestamp: Date;

  /** Structured data, written as JSON on its own line */
  data?: Record<string, unknown>;

  /** Error whose message (and, at fatal, stack) follows the entry */
  error?: Error;
}

export interface LoggerOptions {
  /** Minimum level written, defaults to info */
  minLevel?: LogLevel;

  /** Write entries to the console, defaults to true */
  consoleOutput?: boolean;

  /** Append entries to filePath */
  fileOutput?: boolean;

  /** Log file, created with its directory on first write */
  filePath?: string;

  /** Module tag for every entry, defaults to onboarding */
  moduleName?: string;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
  [LogLevel.FATAL]: 4
};

export class OnboardingLogger {
  private options: LoggerOptions;

  constructor(options: LoggerOptions = {}) {
    this.options = {
      minLevel: LogLevel.INFO,
      consoleOutput: true,
      fileOutput: false,
      moduleName: 'onboarding',
      ...options
    };
  }

  /**
   * Log at debug level
   */
  debug(message: string, data?: Record<string, unknown>, operation?: string): void {
    this.log(LogLevel.DEBUG, message, data, operation);
  }

  /**
   * Log at info level
   */
  info(message: string, data?: Record<string, unknown>, operation?: string): void {
    this.log(LogLevel.INFO, message, data, operation);
  }

  /**
   * Log at warn level
   */
  warn(message: string, data?: Record<string, unknown>, operation?: string): void {
    this.log(LogLevel.WARN, message, data, operation);
  }

  /**
   * Log an error, with the Error's message on the following line
   */
  error(message: string, error?: Error, data?: Record<string, unknown>, operation?: string): void {
    this.log(LogLevel.ERROR, message, data, operation, error);
  }

  /**
   * Log an unrecoverable error, including its stack
   */
  fatal(message: string, error?: Error, data?: Record<string, unknown>, operation?: string): void {
    this.log(LogLevel.FATAL, message, data, operation, error);
  }

  /**
   * Filter by level and dispatch to the enabled sinks
   */
  private log(
    level: LogLevel,
    message: string,
    data?: Record<string, unknown>,
    operation?: string,
    error?: Error
  ): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const entry: LogEntry = {
      level,
      message,
      module: this.options.moduleName || 'onboarding',
      operation,
      timestamp: new Date(),
      data,
      error
    };

    if (this.options.consoleOutput) {
      this.writeToConsole(entry);
    }

    if (this.options.fileOutput && this.options.filePath) {
      this.writeToFile(entry, this.options.filePath);
    }
  }

  /**
   * Whether level is at or above the configured minimum
   */
  private shouldLog(level: LogLevel): boolean {
    const minLevel = this.options.minLevel || LogLevel.INFO;
    return LEVEL_ORDER[level] >= LEVEL_ORDER[minLevel];
  }

  /**
   * Render an entry as the text written to both sinks
   */
  format(entry: LogEntry): string {
    const timestamp = entry.timestamp.toISOString();
    const levelStr = entry.level.toUpperCase().padEnd(5);
    const operationStr = entry.operation ? ` [${entry.operation}]` : '';

    let logMessage = `${timestamp} ${levelStr} [${entry.module}]${operationStr} ${entry.message}`;

    if (entry.error) {
      logMessage += `\nError: ${entry.error.message}`;
      if (entry.error.stack && entry.level === LogLevel.FATAL) {
        logMessage += `\nStack: ${entry.error.stack}`;
      }
    }

    if (entry.data && Object.keys(entry.data).length > 0) {
      logMessage += `\nData: ${JSON.stringify(entry.data)}`;
    }

    return logMessage;
  }

  private writeToConsole(entry: LogEntry): void {
    const logMessage = this.format(entry);

    switch (entry.level) {
      case LogLevel.DEBUG:
        console.debug(logMessage);
        break;
      case LogLevel.INFO:
        console.info(logMessage);
        break;
      case LogLevel.WARN:
        console.warn(logMessage);
        break;
      case LogLevel.ERROR:
      case LogLevel.FATAL:
        console.error(logMessage);
        break;
    }
  }

  private writeToFile(entry: LogEntry, filePath: string): void {
    try {
      fs.mkdirSync(path.dirname(filePath), { recursive: true });
      fs.appendFileSync(filePath, this.format(entry) + '\n', 'utf8');
    } catch (error) {
      // file sink failures are reported on the console only
      console.error(
        `Failed to write log file ${filePath}: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }

  /**
   * Logger with the same sinks, tagged `<module>.<moduleName>`
   */
  createSubLogger(moduleName: string): OnboardingLogger {
    return new OnboardingLogger({
      ...this.options,
      moduleName: `${this.options.moduleName}.${moduleName}`
    });
  }
}

/**
 * Level named by value (case-insensitive), or fallback when unrecognised
 */
export function parseLogLevel(value: string | undefined, fallback: LogLevel = LogLevel.INFO): LogLevel {
  switch (value?.toLowerCase()) {
    case 'debug':
      return LogLevel.DEBUG;
    case 'info':
      return LogLevel.INFO;
    case 'warn':
      return LogLevel.WARN;
    case 'error':
      return LogLevel.ERROR;
    case 'fatal':
      return LogLevel.FATAL;
    default:
      return fallback;
  }
}

/**
 * Logger that writes to the console and to `<outputDir>/onboarding.log`
 */
export function createOnboardingLogger(outputDir: string, minLevel: LogLevel = LogLevel.INFO): OnboardingLogger {
  return new OnboardingLogger({
    minLevel,
    consoleOutput: true,
    fileOutput: true,
    filePath: path.join(outputDir, 'onboarding.log')
  });
}
