/**
 * Logger - Conditional logging utility
 *
 * Provides debug/verbose/info logging that respects global configuration.
 * Every level writes to stderr: stdout belongs to the shell completion
 * protocol and must only ever carry candidates or activation scripts.
 *
 * All log messages are stored in memory regardless of log level,
 * allowing for comprehensive debug dumps when needed.
 */

import chalk from 'chalk';
import { BUFFER_SIZES } from '../config/constants.js';
import type { LogLevelName } from '../config/defaults.js';

export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  VERBOSE = 3,
  DEBUG = 4,
}

export interface LogEntry {
  timestamp: number;
  level: LogLevel;
  message: string;
}

export class Logger {
  private static instance: Logger | null = null;
  private logLevel: LogLevel = LogLevel.WARN;
  private logBuffer: LogEntry[] = [];
  private maxBufferSize: number = BUFFER_SIZES.MAX_LOG_BUFFER_SIZE;

  private constructor() {}

  static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  /**
   * Set the global log level
   */
  setLevel(level: LogLevel): void {
    this.logLevel = level;
  }

  /**
   * Set the log level from its configuration name ('warn', 'debug', ...)
   */
  setLevelFromName(name: LogLevelName): void {
    const levels: Record<LogLevelName, LogLevel> = {
      error: LogLevel.ERROR,
      warn: LogLevel.WARN,
      info: LogLevel.INFO,
      verbose: LogLevel.VERBOSE,
      debug: LogLevel.DEBUG,
    };
    this.logLevel = levels[name];
  }

  /**
   * Configure logging from CLI flags
   */
  configure(options: { verbose?: boolean; debug?: boolean }): void {
    if (options.debug) {
      this.logLevel = LogLevel.DEBUG;
      this.debug('[DEBUG] Debug logging enabled');
    } else if (options.verbose) {
      this.logLevel = LogLevel.VERBOSE;
      this.verbose('[VERBOSE] Verbose logging enabled');
    } else {
      this.logLevel = LogLevel.WARN;
    }
  }

  /**
   * Store a log entry in the buffer
   * Serializes immediately so no references to the logged objects are kept
   */
  private storeLog(level: LogLevel, args: unknown[]): void {
    let message = args.map(arg => {
      if (typeof arg === 'object' && arg !== null) {
        try {
          return JSON.stringify(arg);
        } catch {
          return '[Circular]';
        }
      }
      return String(arg);
    }).join(' ');

    if (message.length > BUFFER_SIZES.MAX_LOG_MESSAGE_LENGTH) {
      message = message.substring(0, BUFFER_SIZES.MAX_LOG_MESSAGE_LENGTH) + '... [truncated]';
    }

    this.logBuffer.push({
      timestamp: Date.now(),
      level,
      message,
    });

    if (this.logBuffer.length > this.maxBufferSize) {
      this.logBuffer.shift();
    }
  }

  /**
   * Log an error (always shown)
   */
  error(...args: unknown[]): void {
    this.storeLog(LogLevel.ERROR, args);
    if (this.logLevel >= LogLevel.ERROR) {
      console.error(chalk.red('error:'), ...args);
    }
  }

  /**
   * Log a warning (shown at WARN level and above)
   */
  warn(...args: unknown[]): void {
    this.storeLog(LogLevel.WARN, args);
    if (this.logLevel >= LogLevel.WARN) {
      console.error(chalk.yellow('warning:'), ...args);
    }
  }

  /**
   * Log info (shown at INFO level and above)
   */
  info(...args: unknown[]): void {
    this.storeLog(LogLevel.INFO, args);
    if (this.logLevel >= LogLevel.INFO) {
      console.error(...args);
    }
  }

  /**
   * Log verbose info (shown at VERBOSE level and above)
   */
  verbose(...args: unknown[]): void {
    this.storeLog(LogLevel.VERBOSE, args);
    if (this.logLevel >= LogLevel.VERBOSE) {
      console.error(chalk.dim(...args.map(String)));
    }
  }

  /**
   * Log debug info (shown only at DEBUG level)
   */
  debug(...args: unknown[]): void {
    this.storeLog(LogLevel.DEBUG, args);
    if (this.logLevel >= LogLevel.DEBUG) {
      console.error(chalk.gray(...args.map(String)));
    }
  }

  /**
   * Get logs at or above a certain severity (ERROR is the most severe)
   */
  getLogsAtOrAbove(level: LogLevel): LogEntry[] {
    return this.logBuffer.filter(entry => entry.level <= level);
  }

  /**
   * Clear all stored logs
   */
  clearLogs(): void {
    this.logBuffer = [];
  }
}

export const logger = Logger.getInstance();
