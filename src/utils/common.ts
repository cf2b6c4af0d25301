/**
 * Common utilities
 *
 * Small helpers shared by the config readers, the database wrapper and the
 * command-line front end.
 *
 * @fileoverview Common utility functions
 * @since 0.1.0
 */

const INTEGER_PATTERN = /^\s*[+-]?\d+\s*$/;
const DECIMAL_PATTERN = /^\s*[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?\s*$/;

const TRUE_WORDS = new Set(['true', '1', 'on']);
const FALSE_WORDS = new Set(['false', '0', 'off']);

/**
 * Time helpers
 */
export class TimeUtils {
  static now(): number {
    return Date.now();
  }

  /**
   * Elapsed seconds since `startTime` (a {@link TimeUtils.now} value)
   */
  static getDurationInSeconds(startTime: number): number {
    return (Date.now() - startTime) / 1000;
  }
}

/**
 * Strict parsing of textual config values.
 *
 * Every parser returns `undefined` for text it does not accept instead of
 * coercing it, leaving the caller to decide how to report it.
 */
export class ParseUtils {
  /**
   * Parse a base-10 integer with optional sign and surrounding whitespace.
   */
  static parseInteger(value: string): number | undefined {
    if (!INTEGER_PATTERN.test(value)) {
      return undefined;
    }
    return parseInt(value.trim(), 10);
  }

  /**
   * Parse a decimal number, with optional fraction and exponent.
   */
  static parseDecimal(value: string): number | undefined {
    if (!DECIMAL_PATTERN.test(value)) {
      return undefined;
    }
    return parseFloat(value.trim());
  }

  /**
   * Parse true/false, on/off or 1/0, case-insensitively.
   */
  static parseBoolean(value: string): boolean | undefined {
    const word = value.trim().toLowerCase();
    if (TRUE_WORDS.has(word)) {
      return true;
    }
    if (FALSE_WORDS.has(word)) {
      return false;
    }
    return undefined;
  }
}
