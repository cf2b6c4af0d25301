/**
 * Process-wide logger
 *
 * @fileoverview Shared logger instance and command-line level setup
 * @since 0.1.0
 */

import { z } from 'zod';
import { LogConfig, LogLevel, StructuredLogger } from './logging/structuredLogger.js';
import { WmfdbValueError } from './types.js';

/**
 * Shared structured logger. Modules take a child for their own category:
 *
 * @example
 * const log = logger.child('mycnf');
 * log.debug('Loaded /etc/my.cnf');
 */
export const logger: StructuredLogger = StructuredLogger.getInstance();

/**
 * Level names accepted on the command line and in WMFDB_LOG_LEVEL, mapped to
 * logger levels. Names are case-sensitive.
 */
const LEVEL_NAMES = {
  DEBUG: LogLevel.DEBUG,
  INFO: LogLevel.INFO,
  WARN: LogLevel.WARN,
  WARNING: LogLevel.WARN,
  ERROR: LogLevel.ERROR,
  CRITICAL: LogLevel.FATAL,
  FATAL: LogLevel.FATAL
} as const;

export const levelNameSchema = z.enum(['DEBUG', 'INFO', 'WARN', 'WARNING', 'ERROR', 'CRITICAL', 'FATAL']);

export type LevelName = z.infer<typeof levelNameSchema>;

/**
 * Map a level name to a logger level.
 *
 * @throws {WmfdbValueError} when the name is not one of {@link LevelName}
 */
export function parseLogLevel(name: string): LogLevel {
  const parsed = levelNameSchema.safeParse(name);
  if (!parsed.success) {
    throw new WmfdbValueError(`Invalid logging level '${name}'`);
  }
  return LEVEL_NAMES[parsed.data];
}

/**
 * Configure the shared logger's threshold, and optionally its format and
 * file target.
 */
export function setupLogging(
  level: string,
  options: Partial<Pick<LogConfig, 'format' | 'filePath'>> = {}
): StructuredLogger {
  const update: Partial<LogConfig> = { level: parseLogLevel(level) };
  if (options.format) {
    update.format = options.format;
  }
  if (options.filePath) {
    update.filePath = options.filePath;
    update.output = 'both';
  }
  logger.updateConfig(update);
  return logger;
}

export { LogLevel, StructuredLogger };
