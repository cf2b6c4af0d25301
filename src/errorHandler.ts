/**
 * Error handling helpers
 *
 * @fileoverview Conversion of arbitrary thrown values into wmfdb errors
 * @since 0.1.0
 */

import { types } from 'util';
import { MySQLErrorClassifier } from './errors/errorClassifier.js';
import { WmfdbError } from './types.js';

export class ErrorHandler {
  /**
   * Turn any thrown value into a {@link WmfdbError}.
   *
   * wmfdb errors pass through untouched; anything else is classified as a
   * database error, with `context` prefixed to its message.
   *
   * @example
   * try {
   *   await conn.query(sql);
   * } catch (error) {
   *   throw ErrorHandler.safeError(error, 'db1001:3306');
   * }
   */
  public static safeError(error: unknown, context?: string): WmfdbError {
    if (error instanceof WmfdbError) {
      return error;
    }
    return MySQLErrorClassifier.classifyError(error, context);
  }

  /**
   * Message of any thrown value, for log lines.
   */
  public static describe(error: unknown): string {
    return types.isNativeError(error) ? error.message : String(error);
  }

  /**
   * The thrown value as an `Error`, if it is one. Errors raised inside Node's
   * own modules can come from another realm and fail `instanceof Error`.
   */
  public static asError(error: unknown): Error | undefined {
    return types.isNativeError(error) ? error : undefined;
  }
}
