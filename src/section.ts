/**
 * Sections
 *
 * A section is a named database shard bound to a port. The default section
 * is always `default` on 3306 and is never listed in the section table.
 *
 * @fileoverview Section table loading and per-section paths
 * @since 0.1.0
 */

import { readFileSync } from 'fs';
import { DefaultConfig, StringConstants } from './constants.js';
import { ErrorHandler } from './errorHandler.js';
import { WmfdbIOError, WmfdbValueError } from './types.js';
import { ParseUtils } from './utils/common.js';

/**
 * Rows served instead of the on-disk table when
 * `WMFDB_SECTION_MAP_TEST_DATA` is set.
 */
export const TEST_DATA: readonly string[] = [
  'f0, 10110',
  'f1, 10111',
  'f2, 10112',
  'f3, 10113',
  'alpha, 10320'
];

/**
 * Name-to-section lookup, as needed by address parsing.
 */
export interface SectionLookup {
  byName(name: string): Section;
}

export interface SectionOptions {
  name: string;
  port: number;
}

/**
 * A validated (name, port) pair.
 */
export class Section {
  readonly name: string;
  readonly port: number;

  /**
   * @throws {WmfdbValueError} if the name is blank, the port is not positive,
   *   or only one of name/port is the default
   */
  constructor({ name, port }: SectionOptions) {
    if (name.trim() === '') {
      throw new WmfdbValueError(`Empty/blank section name "${name}"`);
    }
    if (!Number.isInteger(port) || port <= 0) {
      throw new WmfdbValueError(`Invalid port number, ${port}`);
    }
    if (name === DefaultConfig.DEFAULT_SECTION && port !== DefaultConfig.DEFAULT_PORT) {
      throw new WmfdbValueError(
        `Section ${name} must have default port (${DefaultConfig.DEFAULT_PORT}), not ${port}`
      );
    }
    if (port === DefaultConfig.DEFAULT_PORT && name !== DefaultConfig.DEFAULT_SECTION) {
      throw new WmfdbValueError(
        `Port ${port} must have ${DefaultConfig.DEFAULT_SECTION} section name, not ${name}`
      );
    }
    this.name = name;
    this.port = port;
  }

  private get isDefault(): boolean {
    return this.name === DefaultConfig.DEFAULT_SECTION;
  }

  /** e.g. /run/mysqld/mysqld.s8.sock */
  socketPath(): string {
    return this.isDefault
      ? `${DefaultConfig.SOCKET_DIR}/mysqld.sock`
      : `${DefaultConfig.SOCKET_DIR}/mysqld.${this.name}.sock`;
  }

  /** e.g. /srv/sqldata.s8 */
  dataDir(): string {
    return this.isDefault ? DefaultConfig.DATA_DIR : `${DefaultConfig.DATA_DIR}.${this.name}`;
  }

  /** Prometheus mysqld exporter port */
  metricsPort(): number {
    return this.isDefault ? DefaultConfig.DEFAULT_PROM_PORT : this.port + DefaultConfig.PROM_PORT_OFFSET;
  }
}

export interface SectionMapOptions {
  /** Table to read; see {@link SectionMap.readConfig} for the fallback */
  path?: string;
  /** Set to false to start with an empty table */
  load?: boolean;
}

/**
 * Maps section names to ports and back.
 *
 * The table is a two-column `name, port` file without a header. Repeated
 * names or ports overwrite earlier rows in their own direction only.
 */
export class SectionMap implements SectionLookup {
  private readonly portsByName = new Map<string, number>();
  private readonly namesByPort = new Map<number, string>();

  constructor(options: SectionMapOptions = {}) {
    if (options.load !== false) {
      this.parse(SectionMap.readConfig(options.path));
    }
  }

  /**
   * Build a table from `name, port` records.
   *
   * @throws {WmfdbValueError} citing the 1-based line of a bad record
   */
  static load(lines: readonly string[]): SectionMap {
    const map = new SectionMap({ load: false });
    map.parse(lines);
    return map;
  }

  /**
   * Lines of the section table. Without a path, the embedded test rows are
   * returned when `WMFDB_SECTION_MAP_TEST_DATA` is set, otherwise the
   * default table is read.
   *
   * @throws {WmfdbIOError} when the file cannot be read
   */
  static readConfig(path?: string): string[] {
    let target = path;
    if (!target) {
      if (process.env[StringConstants.ENV_SECTION_MAP_TEST_DATA] !== undefined) {
        return [...TEST_DATA];
      }
      target = DefaultConfig.SECTION_PORTS_PATH;
    }

    try {
      return readFileSync(target, 'utf8').split(/\r?\n/);
    } catch (error) {
      throw new WmfdbIOError(
        `Unable to read section table ${target}: ${ErrorHandler.describe(error)}`,
        ErrorHandler.asError(error)
      );
    }
  }

  private parse(lines: readonly string[]): void {
    lines.forEach((line, index) => {
      const lineNo = index + 1;
      if (line.trim() === '') {
        return;
      }

      const fields = line.split(',');
      if (fields.length !== 2) {
        throw new WmfdbValueError(`Line ${lineNo} of config has ${fields.length} fields, expected 2`);
      }

      const name = fields[0].trim();
      const portText = fields[1].trim();
      if (name === '') {
        throw new WmfdbValueError(`Line ${lineNo} of config has a blank section entry`);
      }
      const port = ParseUtils.parseInteger(portText);
      if (port === undefined) {
        throw new WmfdbValueError(`Line ${lineNo} of config has an invalid port number: ${portText}`);
      }

      this.portsByName.set(name, port);
      this.namesByPort.set(port, name);
    });
  }

  names(): string[] {
    return [...this.portsByName.keys()].sort();
  }

  ports(): number[] {
    return [...this.namesByPort.keys()].sort((a, b) => a - b);
  }

  /**
   * @throws {WmfdbValueError} for an unknown name
   */
  byName(name: string): Section {
    if (name === DefaultConfig.DEFAULT_SECTION) {
      return new Section({ name, port: DefaultConfig.DEFAULT_PORT });
    }
    const port = this.portsByName.get(name);
    if (port === undefined) {
      throw new WmfdbValueError(`Invalid section name ${name}`);
    }
    return new Section({ name, port });
  }

  /**
   * @throws {WmfdbValueError} for an unknown port
   */
  byPort(port: number): Section {
    if (port === DefaultConfig.DEFAULT_PORT) {
      return new Section({ name: DefaultConfig.DEFAULT_SECTION, port });
    }
    const name = this.namesByPort.get(port);
    if (name === undefined) {
      throw new WmfdbValueError(`Invalid port number ${port}`);
    }
    return new Section({ name, port });
  }
}
