/**
 * Database error classifier
 *
 * Maps driver errors to wmfdb error categories, using the server/client
 * error number where there is one and the message text otherwise.
 *
 * @fileoverview MySQL error classification
 * @since 0.1.0
 */

import { types } from 'util';
import { MySQLErrorCodes } from '../constants.js';
import { logger } from '../logger.js';
import {
  ErrorCategory,
  ErrorSeverity,
  WmfdbDBError,
  WmfdbError,
  WmfdbValueError
} from '../types.js';

const ERROR_CODE_MAPPING: Readonly<Record<number, ErrorCategory>> = {
  [MySQLErrorCodes.ACCESS_DENIED_FOR_USER]: ErrorCategory.ACCESS_DENIED,
  [MySQLErrorCodes.ACCESS_DENIED]: ErrorCategory.ACCESS_DENIED,
  [MySQLErrorCodes.TABLE_ACCESS_DENIED]: ErrorCategory.ACCESS_DENIED,
  [MySQLErrorCodes.BAD_DB_ERROR]: ErrorCategory.OBJECT_NOT_FOUND,
  [MySQLErrorCodes.TABLE_DOESNT_EXIST]: ErrorCategory.OBJECT_NOT_FOUND,
  [MySQLErrorCodes.PARSE_ERROR]: ErrorCategory.SYNTAX_ERROR,
  [MySQLErrorCodes.STATEMENT_TIMEOUT]: ErrorCategory.TIMEOUT_ERROR,
  [MySQLErrorCodes.QUERY_INTERRUPTED]: ErrorCategory.QUERY_INTERRUPTED,
  [MySQLErrorCodes.CANT_CONNECT_TO_LOCAL_SERVER]: ErrorCategory.CONNECTION_ERROR,
  [MySQLErrorCodes.CANT_CONNECT_TO_SERVER]: ErrorCategory.CONNECTION_ERROR,
  [MySQLErrorCodes.UNKNOWN_HOST]: ErrorCategory.CONNECTION_ERROR,
  [MySQLErrorCodes.SERVER_HAS_GONE_AWAY]: ErrorCategory.CONNECTION_ERROR,
  [MySQLErrorCodes.LOST_CONNECTION]: ErrorCategory.CONNECTION_ERROR,
  [MySQLErrorCodes.SSL_ERROR]: ErrorCategory.SSL_ERROR
};

const SEVERITY_MAPPING: Readonly<Record<ErrorCategory, ErrorSeverity>> = {
  [ErrorCategory.INVALID_INPUT]: ErrorSeverity.MEDIUM,
  [ErrorCategory.IO_ERROR]: ErrorSeverity.HIGH,
  [ErrorCategory.DNS_ERROR]: ErrorSeverity.MEDIUM,
  [ErrorCategory.ACCESS_DENIED]: ErrorSeverity.HIGH,
  [ErrorCategory.OBJECT_NOT_FOUND]: ErrorSeverity.MEDIUM,
  [ErrorCategory.SYNTAX_ERROR]: ErrorSeverity.MEDIUM,
  [ErrorCategory.CONNECTION_ERROR]: ErrorSeverity.HIGH,
  [ErrorCategory.TIMEOUT_ERROR]: ErrorSeverity.MEDIUM,
  [ErrorCategory.QUERY_INTERRUPTED]: ErrorSeverity.MEDIUM,
  [ErrorCategory.SSL_ERROR]: ErrorSeverity.HIGH,
  [ErrorCategory.UNKNOWN]: ErrorSeverity.HIGH
};

/**
 * MySQL error classifier
 */
export class MySQLErrorClassifier {
  /**
   * Wrap a driver error. An unknown database becomes a
   * {@link WmfdbValueError}, since it is a typo to fix rather than a server
   * fault; everything else becomes a {@link WmfdbDBError}.
   *
   * @param context - prefixed to the message, e.g. the instance description
   */
  public static classifyError(error: unknown, context?: string): WmfdbError {
    const message = this.extractErrorMessage(error);
    const code = this.extractErrorCode(error);
    const category = this.categorizeError(code, message);
    const fullMessage = context ? `${context}: ${message}` : message;
    const original = types.isNativeError(error) ? error : undefined;

    const classified = code === MySQLErrorCodes.BAD_DB_ERROR
      ? new WmfdbValueError(fullMessage, category, original)
      : new WmfdbDBError(fullMessage, category, SEVERITY_MAPPING[category], original);

    logger.debug(`Classified database error as ${category}`, 'database_error', {
      code,
      severity: classified.severity,
      context
    });
    return classified;
  }

  /**
   * Driver error number, from `errno` (mysql2) or a numeric `code`.
   */
  public static extractErrorCode(error: unknown): number | undefined {
    if (error && typeof error === 'object') {
      if ('errno' in error && typeof error.errno === 'number') {
        return error.errno;
      }
      if ('code' in error && typeof error.code === 'number') {
        return error.code;
      }
    }
    return undefined;
  }

  private static extractErrorMessage(error: unknown): string {
    if (types.isNativeError(error)) {
      return error.message;
    }
    if (typeof error === 'string') {
      return error;
    }
    if (error && typeof error === 'object' && 'message' in error) {
      return String(error.message);
    }
    return 'Unknown error';
  }

  private static categorizeError(code: number | undefined, message: string): ErrorCategory {
    if (code !== undefined && ERROR_CODE_MAPPING[code]) {
      return ERROR_CODE_MAPPING[code];
    }

    const lowerMessage = message.toLowerCase();
    if (lowerMessage.includes('access denied')) {
      return ErrorCategory.ACCESS_DENIED;
    }
    if (lowerMessage.includes('unknown database') || lowerMessage.includes("doesn't exist")) {
      return ErrorCategory.OBJECT_NOT_FOUND;
    }
    if (lowerMessage.includes('syntax')) {
      return ErrorCategory.SYNTAX_ERROR;
    }
    if (lowerMessage.includes('max_statement_time') || lowerMessage.includes('timeout') || lowerMessage.includes('timed out')) {
      return ErrorCategory.TIMEOUT_ERROR;
    }
    if (lowerMessage.includes('econnrefused') || lowerMessage.includes('connect') || lowerMessage.includes('socket')) {
      return ErrorCategory.CONNECTION_ERROR;
    }
    if (lowerMessage.includes('ssl') || lowerMessage.includes('certificate')) {
      return ErrorCategory.SSL_ERROR;
    }
    return ErrorCategory.UNKNOWN;
  }
}
