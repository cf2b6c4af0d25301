/**
 * Structured logger
 *
 * Levelled logging to stderr and/or a file in text, JSON or colourised
 * format, with per-entry callbacks and masking of sensitive metadata.
 *
 * @fileoverview Structured logger implementation
 * @since 0.1.0
 */

import { appendFileSync } from 'fs';
import { types } from 'util';
import { WmfdbError } from '../types.js';

/**
 * Log levels
 */
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
  FATAL = 'fatal'
}

/**
 * Logger configuration
 */
export interface LogConfig {
  /** Minimum level that is emitted */
  level: LogLevel;
  format: 'json' | 'text' | 'pretty';
  output: 'console' | 'file' | 'both' | 'none';
  /** Target of 'file' and 'both' output */
  filePath?: string;
  enableTimestamp: boolean;
  enableColors: boolean;
  /** Metadata fields whose values are replaced by *** */
  sensitiveFields: string[];
}

/**
 * A single log record
 */
export interface LogEntry {
  timestamp: Date;
  level: LogLevel;
  message: string;
  category: string;
  pid: number;
  metadata?: Record<string, unknown>;
  error?: Error;
}

export type LogCallback = (entry: LogEntry) => void;

const COLORS = {
  reset: '\x1b[0m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  bright: '\x1b[1m',
  dim: '\x1b[2m'
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: COLORS.blue,
  [LogLevel.INFO]: COLORS.green,
  [LogLevel.WARN]: COLORS.yellow,
  [LogLevel.ERROR]: COLORS.red,
  [LogLevel.FATAL]: COLORS.bright + COLORS.red
};

const LEVEL_WEIGHTS: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 10,
  [LogLevel.INFO]: 20,
  [LogLevel.WARN]: 30,
  [LogLevel.ERROR]: 40,
  [LogLevel.FATAL]: 50
};

/**
 * Structured logger
 *
 * One process-wide instance is shared through {@link StructuredLogger.getInstance};
 * modules that want their own category use {@link StructuredLogger.child}.
 */
export class StructuredLogger {
  /** Shared with child loggers, so config updates reach them too */
  private readonly settings: { config: LogConfig };
  private readonly callbacks: Set<LogCallback>;
  private category: string;

  private static readonly DEFAULT_CONFIG: LogConfig = {
    level: LogLevel.WARN,
    format: 'text',
    output: 'console',
    enableTimestamp: true,
    enableColors: true,
    sensitiveFields: ['password', 'ssl_key', 'secret', 'token']
  };

  private static instance: StructuredLogger | undefined;

  /**
   * Get the process-wide logger, applying `config` when given.
   */
  public static getInstance(config?: Partial<LogConfig>): StructuredLogger {
    if (!StructuredLogger.instance) {
      StructuredLogger.instance = new StructuredLogger(config);
    } else if (config) {
      StructuredLogger.instance.updateConfig(config);
    }
    return StructuredLogger.instance;
  }

  constructor(config?: Partial<LogConfig>, category: string = 'wmfdb', parent?: StructuredLogger) {
    if (parent) {
      this.settings = parent.settings;
      this.callbacks = parent.callbacks;
    } else {
      this.settings = { config: { ...StructuredLogger.DEFAULT_CONFIG, ...config } };
      this.callbacks = new Set();
    }
    this.category = category;
  }

  private get config(): LogConfig {
    return this.settings.config;
  }

  public updateConfig(config: Partial<LogConfig>): void {
    this.settings.config = { ...this.settings.config, ...config };
  }

  public getConfig(): Readonly<LogConfig> {
    return this.config;
  }

  public addCallback(callback: LogCallback): void {
    this.callbacks.add(callback);
  }

  public removeCallback(callback: LogCallback): void {
    this.callbacks.delete(callback);
  }

  public isLevelEnabled(level: LogLevel): boolean {
    return LEVEL_WEIGHTS[level] >= LEVEL_WEIGHTS[this.config.level];
  }

  public debug(message: string, category?: string, metadata?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, message, category, metadata);
  }

  public info(message: string, category?: string, metadata?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, message, category, metadata);
  }

  public warn(message: string, category?: string, metadata?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, message, category, metadata);
  }

  public error(message: string, category?: string, error?: Error, metadata?: Record<string, unknown>): void {
    this.log(LogLevel.ERROR, message, category, metadata, error);
  }

  public fatal(message: string, category?: string, error?: Error, metadata?: Record<string, unknown>): void {
    this.log(LogLevel.FATAL, message, category, metadata, error);
  }

  /**
   * Record an entry at `level`. Entries below the configured level are
   * dropped before formatting.
   */
  public log(
    level: LogLevel,
    message: string,
    category?: string,
    metadata?: Record<string, unknown>,
    error?: Error
  ): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date(),
      level,
      message,
      category: category || this.category,
      pid: process.pid,
      metadata: this.maskSensitiveFields(metadata),
      error
    };

    this.outputLog(this.formatLogEntry(entry));
    this.invokeCallbacks(entry);
  }

  /**
   * Create a logger that shares this one's configuration and callbacks but
   * tags entries with `category` by default.
   */
  public child(category: string): StructuredLogger {
    return new StructuredLogger(undefined, category, this);
  }

  /**
   * Render an entry in the configured format.
   */
  public formatLogEntry(entry: LogEntry): string {
    switch (this.config.format) {
      case 'json':
        return this.formatJson(entry);
      case 'pretty':
        return this.formatPretty(entry);
      case 'text':
      default:
        return this.formatText(entry);
    }
  }

  private formatJson(entry: LogEntry): string {
    const jsonEntry = {
      timestamp: entry.timestamp.toISOString(),
      level: entry.level,
      pid: entry.pid,
      category: entry.category,
      message: entry.message,
      ...(entry.metadata && { metadata: entry.metadata }),
      ...(entry.error && {
        error: {
          name: entry.error.name,
          message: entry.error.message,
          ...(entry.error instanceof WmfdbError && {
            category: entry.error.category,
            severity: entry.error.severity,
            code: entry.error.code
          })
        }
      })
    };

    return JSON.stringify(jsonEntry);
  }

  private formatText(entry: LogEntry): string {
    const timestamp = this.config.enableTimestamp ? `${entry.timestamp.toISOString()} ` : '';
    const error = entry.error ? `: ${entry.error.message}` : '';

    let result = `${timestamp}${entry.pid} [${entry.level.toUpperCase()}] ${entry.category} - ${entry.message}${error}`;

    if (entry.metadata && Object.keys(entry.metadata).length > 0) {
      result += ` ${JSON.stringify(entry.metadata)}`;
    }

    return result;
  }

  private formatPretty(entry: LogEntry): string {
    const timestamp = this.config.enableTimestamp
      ? `${COLORS.dim}[${entry.timestamp.toISOString()}]${COLORS.reset} `
      : '';

    const level = this.config.enableColors
      ? `${LEVEL_COLORS[entry.level]}[${entry.level.toUpperCase()}]${COLORS.reset} `
      : `[${entry.level.toUpperCase()}] `;

    const category = `${COLORS.cyan}[${entry.category}]${COLORS.reset} `;
    const error = entry.error
      ? `${COLORS.red} Error: ${entry.error.message}${COLORS.reset}`
      : '';

    let message = `${timestamp}${level}${category}${entry.message}${error}`;

    if (entry.metadata && Object.keys(entry.metadata).length > 0) {
      message += ` ${COLORS.dim}${JSON.stringify(entry.metadata)}${COLORS.reset}`;
    }

    return message;
  }

  private outputLog(formattedLog: string): void {
    switch (this.config.output) {
      case 'console':
        process.stderr.write(formattedLog + '\n');
        break;
      case 'file':
        this.writeToFile(formattedLog);
        break;
      case 'both':
        process.stderr.write(formattedLog + '\n');
        this.writeToFile(formattedLog);
        break;
      case 'none':
        break;
    }
  }

  private writeToFile(log: string): void {
    if (!this.config.filePath) {
      return;
    }

    try {
      appendFileSync(this.config.filePath, log + '\n');
    } catch (error) {
      // fall back to stderr so the entry is not lost
      process.stderr.write(`Failed to write to log file ${this.config.filePath}: ${error}\n${log}\n`);
    }
  }

  private invokeCallbacks(entry: LogEntry): void {
    this.callbacks.forEach(callback => {
      try {
        callback(entry);
      } catch (error) {
        process.stderr.write(`Error in log callback: ${error}\n`);
      }
    });
  }

  /**
   * Replace the values of configured sensitive fields, recursing into nested
   * plain objects.
   */
  private maskSensitiveFields(metadata?: Record<string, unknown>): Record<string, unknown> | undefined {
    if (!metadata) {
      return metadata;
    }

    const masked: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(metadata)) {
      if (this.config.sensitiveFields.includes(key) && value !== undefined) {
        masked[key] = '***';
      } else if (isPlainRecord(value)) {
        masked[key] = this.maskSensitiveFields(value);
      } else {
        masked[key] = value;
      }
    }
    return masked;
  }
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !types.isNativeError(value);
}
