/**
 * my.cnf reader
 *
 * Parses the INI dialect of MySQL option files into sections of raw values.
 * Values are kept verbatim (quotes and inline comments included); see
 * {@link cleanValue} for read-time cleanup.
 *
 * @fileoverview INI-style option file parser
 * @since 0.1.0
 */

import { StringConstants } from '../constants.js';
import { logger } from '../logger.js';
import { WmfdbValueError } from '../types.js';

/** Raw option values of one section; `null` marks a key written without `=` */
export type SectionValues = Map<string, string | null>;

/** Section name → raw options, in the order sections were first seen */
export type ConfigStore = Map<string, SectionValues>;

export interface IniReadOptions {
  /**
   * Reject a section or option that appears twice in the same file.
   * Defaults to true.
   */
  strict?: boolean;
}

const log = logger.child('mycnf');

const SECTION_HEADER = /^\[(.+)\]/;
const COMMENT_PREFIXES = ['#', ';'];

/**
 * Option files spell keys with dashes or underscores interchangeably.
 */
export function normalizeKey(key: string): string {
  return key.replace(/-/g, '_');
}

/**
 * Parse `text` and merge it into `store`, later values replacing earlier ones.
 *
 * @param source - file name used in error messages
 * @throws {WmfdbValueError} on options outside a section, empty keys, or
 *   (when strict) repeated sections/options within `text`
 */
export function readIni(
  store: ConfigStore,
  text: string,
  source: string,
  options: IniReadOptions = {}
): void {
  const strict = options.strict ?? true;
  const seenSections = new Set<string>();
  const seenOptions = new Set<string>();
  let current: { name: string; values: SectionValues } | undefined;

  const lines = text.split(/\r?\n/);
  lines.forEach((rawLine, index) => {
    const lineNo = index + 1;
    const line = rawLine.trim();

    if (line === '' || COMMENT_PREFIXES.some(prefix => line.startsWith(prefix))) {
      return;
    }

    if (line.startsWith('!')) {
      // !include and !includedir are left to the mysql client itself
      log.debug(`Skipping directive in ${source} line ${lineNo}: ${line}`);
      return;
    }

    const header = SECTION_HEADER.exec(line);
    if (header) {
      const name = header[1];
      if (strict && seenSections.has(name)) {
        throw new WmfdbValueError(
          `While reading from '${source}' [line ${lineNo}]: section '${name}' already exists`
        );
      }
      seenSections.add(name);

      let values = store.get(name);
      if (!values) {
        values = new Map();
        store.set(name, values);
      }
      current = { name, values };
      return;
    }

    if (!current) {
      throw new WmfdbValueError(
        `${StringConstants.MSG_NO_SECTION_HEADERS} file: '${source}', line: ${lineNo}: '${rawLine}'`
      );
    }

    const eq = line.indexOf('=');
    const rawKey = eq === -1 ? line : line.slice(0, eq).trimEnd();
    const value = eq === -1 ? null : line.slice(eq + 1).trimStart();

    if (rawKey === '') {
      throw new WmfdbValueError(
        `${StringConstants.MSG_PARSING_ERRORS} '${source}' [line ${lineNo}]: '${rawLine}'`
      );
    }

    const key = normalizeKey(rawKey);
    const optionId = `${current.name}\u0000${key}`;
    if (strict && seenOptions.has(optionId)) {
      throw new WmfdbValueError(
        `While reading from '${source}' [line ${lineNo}]: option '${key}' in section '${current.name}' already exists`
      );
    }
    seenOptions.add(optionId);
    current.values.set(key, value);
  });
}
