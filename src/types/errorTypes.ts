/**
 * Error types shared by every wmfdb module.
 *
 * Two recoverable kinds cover the parsing and resolution code (value and I/O
 * errors); database driver failures get a third. All of them derive from
 * {@link WmfdbError}, which is what the command-line boundary catches.
 *
 * @fileoverview Error categories, severities and the wmfdb error classes
 * @since 0.1.0
 */

/**
 * Error severity
 */
export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  FATAL = 'fatal'
}

/**
 * Error category
 */
export enum ErrorCategory {
  INVALID_INPUT = 'invalid_input',
  IO_ERROR = 'io_error',
  DNS_ERROR = 'dns_error',
  ACCESS_DENIED = 'access_denied',
  OBJECT_NOT_FOUND = 'object_not_found',
  SYNTAX_ERROR = 'syntax_error',
  CONNECTION_ERROR = 'connection_error',
  TIMEOUT_ERROR = 'timeout_error',
  QUERY_INTERRUPTED = 'query_interrupted',
  SSL_ERROR = 'ssl_error',
  UNKNOWN = 'unknown'
}

/**
 * Base class for all wmfdb errors.
 */
export class WmfdbError extends Error {
  public readonly category: ErrorCategory;
  public readonly severity: ErrorSeverity;
  public readonly originalError?: Error;
  public readonly code?: number;
  public readonly timestamp: Date;

  constructor(
    message: string,
    category: ErrorCategory = ErrorCategory.UNKNOWN,
    severity: ErrorSeverity = ErrorSeverity.MEDIUM,
    originalError?: Error
  ) {
    super(message);
    this.name = 'WmfdbError';
    this.category = category;
    this.severity = severity;
    this.originalError = originalError;
    this.timestamp = new Date();

    // mysql2 errors carry the server error number as `errno`
    if (originalError && 'errno' in originalError && typeof originalError.errno === 'number') {
      this.code = originalError.errno;
    }

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      category: this.category,
      severity: this.severity,
      code: this.code,
      timestamp: this.timestamp,
      originalError: this.originalError?.message
    };
  }
}

/**
 * Malformed input that a human has to fix: bad address syntax, unknown
 * section, invalid typed config value, malformed config file.
 */
export class WmfdbValueError extends WmfdbError {
  constructor(
    message: string,
    category: ErrorCategory = ErrorCategory.INVALID_INPUT,
    originalError?: Error
  ) {
    super(message, category, ErrorSeverity.MEDIUM, originalError);
    this.name = 'WmfdbValueError';
  }
}

/**
 * A file that had to be readable could not be read.
 */
export class WmfdbIOError extends WmfdbError {
  constructor(message: string, originalError?: Error) {
    super(message, ErrorCategory.IO_ERROR, ErrorSeverity.HIGH, originalError);
    this.name = 'WmfdbIOError';
  }
}

/**
 * Failure reported by the database driver.
 */
export class WmfdbDBError extends WmfdbError {
  constructor(
    message: string,
    category: ErrorCategory = ErrorCategory.UNKNOWN,
    severity: ErrorSeverity = ErrorSeverity.HIGH,
    originalError?: Error
  ) {
    super(message, category, severity, originalError);
    this.name = 'WmfdbDBError';
  }
}
