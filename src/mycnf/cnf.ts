/**
 * my.cnf option reader
 *
 * MySQL option files are INI-like, with some differences a plain INI reader
 * gets wrong:
 *
 * - `max-allowed-packet`, `max_allowed_packet` and `max-allowed_packet` are
 *   the same key.
 * - Single or double quotes around a value are stripped.
 * - An unquoted value may carry an inline `#` comment: `port = 3306 # default`
 *   reads as `3306`, while `port = "3306 # default"` reads as `3306 # default`.
 *
 * Files are loaded in order, later values overriding earlier ones. Lookups
 * walk a list of sections and the first section holding the key wins.
 *
 * @fileoverview my.cnf parsing and connection-argument extraction
 * @since 0.1.0
 */

import { readFileSync } from 'fs';
import { DefaultConfig, StringConstants } from '../constants.js';
import { ErrorHandler } from '../errorHandler.js';
import { logger } from '../logger.js';
import { ConnectionArgs, WmfdbIOError, WmfdbValueError } from '../types.js';
import { ParseUtils } from '../utils/common.js';
import { expandUser, isReadableFile } from '../utils/fileUtils.js';
import { ConfigStore, normalizeKey, readIni } from './iniReader.js';
import { cleanValue } from './valueCleaner.js';

/**
 * Parser options shared by every {@link Cnf} of a selector.
 */
export interface CnfOptions {
  /** Reject repeated sections/options within one file. Default true. */
  strict?: boolean;
  encoding?: BufferEncoding;
}

interface Lookup {
  section: string;
  value: string;
}

const log = logger.child('mycnf');

export class Cnf {
  private readonly store: ConfigStore = new Map();
  private readonly sectionOrder: readonly string[];
  private readonly options: CnfOptions;

  constructor(sectionOrder: readonly string[] = DefaultConfig.MYCNF_SECTION_ORDER, options: CnfOptions = {}) {
    this.sectionOrder = [...sectionOrder];
    this.options = options;
  }

  getSectionOrder(): readonly string[] {
    return this.sectionOrder;
  }

  /**
   * Names of the sections seen so far, in first-seen order.
   */
  sections(): string[] {
    return [...this.store.keys()];
  }

  /**
   * Load option files in order. Paths that are missing, unreadable or not
   * regular files are skipped.
   *
   * @returns number of files loaded
   * @throws {WmfdbValueError} when a file is malformed
   * @throws {WmfdbIOError} when a file that passed the filter cannot be read
   */
  load(paths: readonly string[] = DefaultConfig.MYCNF_PATHS): number {
    const found = Cnf.findFiles(paths);
    for (const path of found) {
      this.loadFile(path);
    }
    return found.length;
  }

  /**
   * Expand `~` and keep only readable regular files, preserving order.
   */
  static findFiles(paths: readonly string[]): string[] {
    return paths.map(expandUser).filter(isReadableFile);
  }

  private loadFile(path: string): void {
    let text: string;
    try {
      text = readFileSync(path, { encoding: this.options.encoding ?? 'utf8' });
    } catch (error) {
      throw new WmfdbIOError(
        `Unable to read ${path}: ${ErrorHandler.describe(error)}`,
        ErrorHandler.asError(error)
      );
    }
    readIni(this.store, text, path, { strict: this.options.strict });
    log.debug(`Loaded ${path}`);
  }

  /**
   * Raw (uncleaned) value of `key` in `section`. `null` for a valueless key,
   * `undefined` when absent.
   */
  getRaw(section: string, key: string): string | null | undefined {
    return this.store.get(section)?.get(normalizeKey(key));
  }

  private find(key: string): Lookup | undefined {
    const normalized = normalizeKey(key);
    for (const section of this.sectionOrder) {
      const values = this.store.get(section);
      if (values?.has(normalized)) {
        return { section, value: cleanValue(values.get(normalized)) };
      }
    }
    return undefined;
  }

  getString(key: string): string | undefined {
    return this.find(key)?.value;
  }

  /**
   * @throws {WmfdbValueError} when the value is not an integer
   */
  getInt(key: string): number | undefined {
    return this.convert(key, ParseUtils.parseInteger, 'integer');
  }

  /**
   * @throws {WmfdbValueError} when the value is not a number
   */
  getFloat(key: string): number | undefined {
    return this.convert(key, ParseUtils.parseDecimal, 'float');
  }

  /**
   * Accepts true/1/on and false/0/off in any case.
   *
   * @throws {WmfdbValueError} for any other value
   */
  getBool(key: string): boolean | undefined {
    return this.convert(key, ParseUtils.parseBoolean, 'boolean');
  }

  /**
   * Whether the key is set at all. Flag-style options such as
   * `ssl-verify-server-cert` are written without a value.
   */
  getPresence(key: string): boolean | undefined {
    return this.find(key) ? true : undefined;
  }

  private convert<T>(key: string, parse: (value: string) => T | undefined, kind: string): T | undefined {
    const found = this.find(key);
    if (!found) {
      return undefined;
    }
    const parsed = parse(found.value);
    if (parsed === undefined) {
      throw new WmfdbValueError(
        `Mysql config value [${found.section}]${key} has non-${kind} value: "${found.value}"`
      );
    }
    return parsed;
  }

  /**
   * Build connection arguments from the loaded files.
   *
   * Arguments present in `overrides` are taken from there and never read
   * from config. Without a host, or with host `localhost`, a configured
   * socket is used in place of the port; for any other host the port is used
   * and the socket dropped.
   */
  connectionArgs(overrides: ConnectionArgs = {}): ConnectionArgs {
    const args: ConnectionArgs = {};
    const assign = <K extends keyof ConnectionArgs>(arg: K, read: () => ConnectionArgs[K]): void => {
      if (overrides[arg] !== undefined) {
        return;
      }
      const value = read();
      if (value !== undefined) {
        args[arg] = value;
      }
    };

    assign('user', () => this.getString('user'));
    assign('password', () => this.getString('password'));
    assign('host', () => this.getString('host'));
    assign('database', () => this.getString('database'));
    assign('unix_socket', () => this.getString('socket'));
    assign('port', () => this.getInt('port'));
    assign('charset', () => this.getString('default_character_set'));
    assign('connect_timeout', () => this.getFloat('connect_timeout'));
    assign('max_allowed_packet', () => this.getString('max_allowed_packet'));
    assign('bind_address', () => this.getString('bind_address'));
    assign('ssl_ca', () => this.getString('ssl_ca'));
    assign('ssl_cert', () => this.getString('ssl_cert'));
    assign('ssl_key', () => this.getString('ssl_key'));
    assign('ssl_verify_cert', () => this.getPresence('ssl_verify_server_cert'));
    assign('ssl_verify_identity', () => this.getPresence('ssl_verify_server_cert'));

    const merged: ConnectionArgs = { ...args };
    for (const [arg, value] of Object.entries(overrides)) {
      if (value !== undefined) {
        Object.assign(merged, { [arg]: value });
      }
    }

    if (merged.host === undefined || merged.host === StringConstants.LOCALHOST) {
      if (merged.unix_socket !== undefined) {
        delete merged.port;
      }
    } else {
      delete merged.unix_socket;
    }
    return merged;
  }
}
