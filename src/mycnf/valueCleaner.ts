/**
 * my.cnf value cleanup
 *
 * Values are stored exactly as written and cleaned when read, following the
 * MySQL client's rules for inline comments and wrapping quotes.
 *
 * @fileoverview Quote and inline-comment stripping for my.cnf values
 * @since 0.1.0
 */

const QUOTE_CHARS = new Set(["'", '"']);

/**
 * Drop an inline `#` comment.
 *
 * A value that opens with a quote which is closed later keeps any `#` inside
 * the quotes; only a `#` at or after the closing quote starts a comment.
 * Anything else is cut at its first `#`.
 */
export function stripComment(value: string): string {
  const quote = value[0];
  const close = quote !== undefined && QUOTE_CHARS.has(quote) ? value.indexOf(quote, 1) : -1;

  if (close === -1) {
    const hash = value.indexOf('#');
    return hash === -1 ? value : value.slice(0, hash).trimEnd();
  }

  const hash = value.indexOf('#', close);
  return hash === -1 ? value : value.slice(0, hash).trimEnd();
}

/**
 * Remove one layer of matching `'` or `"` around the whole value.
 */
export function stripQuotes(value: string): string {
  if (value.length < 2) {
    return value;
  }
  const first = value[0];
  if (QUOTE_CHARS.has(first) && value[value.length - 1] === first) {
    return value.slice(1, -1);
  }
  return value;
}

/**
 * Clean a raw my.cnf value: comment first, since it depends on where the
 * original quotes sit, then quotes.
 *
 * @example
 * cleanValue('"pa#ss" # note'); // 'pa#ss'
 * cleanValue("value # note");   // 'value'
 * cleanValue(null);             // ''
 */
export function cleanValue(raw: string | null | undefined): string {
  if (raw === null || raw === undefined) {
    return '';
  }
  const value = raw.includes('#') ? stripComment(raw) : raw;
  return stripQuotes(value);
}
