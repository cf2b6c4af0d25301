/**
 * Database connection wrapper
 *
 * Thin layer over a mysql2 connection that names the instance it talks to
 * (`user@host:port[db]`), logs every statement, and adds a server-side
 * statement timeout to queries.
 *
 * @fileoverview DB connection and cursor wrapper
 * @since 0.1.0
 */

import { readFileSync } from 'fs';
import {
  createConnection,
  Connection,
  ConnectionOptions,
  FieldPacket,
  QueryOptions as DriverQueryOptions,
  ResultSetHeader,
  RowDataPacket
} from 'mysql2/promise';
import { DefaultConfig, StringConstants } from './constants.js';
import { ErrorHandler } from './errorHandler.js';
import { logger } from './logger.js';
import {
  ConnectionArgs,
  QueryOptions,
  ResultMeta,
  WmfdbDBError,
  WmfdbIOError
} from './types.js';
import { TimeUtils } from './utils/common.js';

const log = logger.child('db');

/** Placeholder values for a statement, as the driver takes them */
export type QueryArgs = DriverQueryOptions['values'];

/** Row shape of {@link DB.cursor} */
export type Row = unknown[];

/** Row shape of {@link DB.dictCursor} */
export type DictRow = Record<string, unknown>;

/**
 * How a cursor asks the driver for rows, and how it recognises them.
 */
export interface RowFormat<R> {
  rowsAsArray: boolean;
  accept(row: unknown): row is R;
}

export const ARRAY_ROWS: RowFormat<Row> = {
  rowsAsArray: true,
  accept: (row: unknown): row is Row => Array.isArray(row)
};

export const DICT_ROWS: RowFormat<DictRow> = {
  rowsAsArray: false,
  accept: (row: unknown): row is DictRow => typeof row === 'object' && row !== null && !Array.isArray(row)
};

/**
 * The operations a wrapped cursor offers. No batch execute: each statement
 * goes through {@link Cursor.execute} and gets its own timeout clause.
 */
export interface Cursor<R> {
  execute(query: string, args?: QueryArgs, options?: QueryOptions): Promise<number>;
  mogrify(query: string, args?: QueryArgs, options?: QueryOptions): string;
  fetchOne(): R | undefined;
  fetchMany(size?: number): R[];
  fetchAll(): R[];
  resultMeta(): ResultMeta;
  close(): void;
}

/**
 * Cursor over a mysql2 connection.
 *
 * A default timeout given at construction applies to every query that does
 * not pass its own; pass `timeout: 0` to run a single query without one.
 */
export class CursorWrapper<R> implements Cursor<R> {
  private rows: R[] = [];
  private position = 0;
  private columns: string[] = [];
  private rowcount = -1;
  private closed = false;

  constructor(
    private readonly addr: string,
    private readonly conn: Connection,
    private readonly format: RowFormat<R>,
    private readonly defaultTimeout?: number
  ) {}

  /**
   * Run a query, buffering any result rows for the fetch methods.
   *
   * @returns rows returned by a SELECT, or rows affected by anything else
   * @throws {WmfdbDBError} when the cursor is closed or the query fails
   */
  async execute(query: string, args?: QueryArgs, options: QueryOptions = {}): Promise<number> {
    if (this.closed) {
      throw new WmfdbDBError(`${this.addr}: ${StringConstants.MSG_CURSOR_CLOSED}`);
    }

    const sql = this.addTimeout(query, options.timeout);
    log.debug(`${this.addr}: ${this.mogrify(query, args, options)}`);

    const startTime = TimeUtils.now();
    const request: DriverQueryOptions = { sql, rowsAsArray: this.format.rowsAsArray };
    if (args !== undefined) {
      request.values = args;
    }

    let result: RowDataPacket[] | ResultSetHeader;
    let fields: FieldPacket[] | undefined;
    try {
      [result, fields] = await this.conn.query<RowDataPacket[] | ResultSetHeader>(request);
    } catch (error) {
      throw ErrorHandler.safeError(error, this.addr);
    }
    log.debug(`${this.addr}: query took ${TimeUtils.getDurationInSeconds(startTime)}s`);

    this.position = 0;
    if (Array.isArray(result)) {
      const rows: unknown[] = result;
      this.rows = rows.filter(this.format.accept);
      this.columns = (fields ?? []).map(field => field.name);
      this.rowcount = this.rows.length;
    } else {
      this.rows = [];
      this.columns = [];
      this.rowcount = result.affectedRows;
    }
    return this.rowcount;
  }

  /**
   * The statement exactly as {@link execute} would send it, with arguments
   * inlined and the timeout clause added. Nothing is sent to the server.
   */
  mogrify(query: string, args?: QueryArgs, options: QueryOptions = {}): string {
    const sql = this.addTimeout(query, options.timeout);
    return args === undefined ? sql : this.conn.format(sql, args);
  }

  /**
   * Prefix the statement timeout: the explicit one, else the cursor default.
   */
  addTimeout(query: string, timeout?: number): string {
    const effective = timeout ?? this.defaultTimeout;
    if (effective === undefined) {
      return query;
    }
    return StringConstants.STATEMENT_TIMEOUT_TEMPLATE
      .replace('{timeout}', String(effective))
      .replace('{query}', query);
  }

  fetchOne(): R | undefined {
    if (this.position >= this.rows.length) {
      return undefined;
    }
    return this.rows[this.position++];
  }

  fetchMany(size: number = 1): R[] {
    const batch = this.rows.slice(this.position, this.position + size);
    this.position += batch.length;
    return batch;
  }

  fetchAll(): R[] {
    const rest = this.rows.slice(this.position);
    this.position = this.rows.length;
    return rest;
  }

  /**
   * Column names and row count of the last query; `[[], -1]` before any.
   */
  resultMeta(): ResultMeta {
    return [[...this.columns], this.rowcount];
  }

  close(): void {
    this.closed = true;
    this.rows = [];
    this.position = 0;
  }
}

export interface ConnectOptions {
  /** Default statement timeout (seconds) for cursors of this connection */
  timeout?: number;
}

/**
 * A connection to one database instance.
 */
export class DB {
  private readonly user?: string;
  private readonly hostName: string;
  private readonly unixSocket?: string;
  private readonly port?: number;
  private currentDb?: string;

  private constructor(
    private readonly conn: Connection,
    args: ConnectionArgs,
    private readonly defaultTimeout?: number
  ) {
    this.currentDb = args.database;
    if (args.unix_socket) {
      // user, host and port mean nothing over a socket
      this.hostName = StringConstants.LOCALHOST;
      this.unixSocket = args.unix_socket;
    } else {
      this.user = args.user;
      this.hostName = args.host ?? StringConstants.LOCALHOST;
      this.port = args.port ?? DefaultConfig.DEFAULT_PORT;
    }
  }

  /**
   * Open a connection.
   *
   * @throws {WmfdbIOError} when an SSL file cannot be read
   * @throws {WmfdbDBError} when the connection fails
   */
  static async connect(args: ConnectionArgs, options: ConnectOptions = {}): Promise<DB> {
    const connOptions = DB.toDriverOptions(args);
    const target = args.unix_socket ?? `${args.host ?? StringConstants.LOCALHOST}:${args.port ?? DefaultConfig.DEFAULT_PORT}`;
    log.debug(`Connecting to ${target}`, undefined, { user: args.user, password: args.password });

    let conn: Connection;
    try {
      conn = await createConnection(connOptions);
    } catch (error) {
      throw ErrorHandler.safeError(error, `${StringConstants.MSG_CONNECTION_FAILED} ${target}`);
    }
    return new DB(conn, args, options.timeout);
  }

  /**
   * Translate connection arguments to mysql2 options.
   */
  static toDriverOptions(args: ConnectionArgs): ConnectionOptions {
    const options: ConnectionOptions = {
      user: args.user,
      password: args.password,
      database: args.database,
      charset: args.charset
    };

    if (args.unix_socket) {
      options.socketPath = args.unix_socket;
    } else {
      options.host = args.host;
      options.port = args.port;
    }
    if (args.connect_timeout !== undefined) {
      options.connectTimeout = Math.round(args.connect_timeout * 1000);
    }
    if (args.bind_address !== undefined) {
      options.localAddress = args.bind_address;
    }
    if (args.max_allowed_packet !== undefined) {
      log.debug(`Ignoring max_allowed_packet=${args.max_allowed_packet}: not a client setting`);
    }

    if (args.ssl_ca || args.ssl_cert || args.ssl_key || args.ssl_verify_cert) {
      options.ssl = {
        ca: args.ssl_ca ? readSslFile(args.ssl_ca) : undefined,
        cert: args.ssl_cert ? readSslFile(args.ssl_cert) : undefined,
        key: args.ssl_key ? readSslFile(args.ssl_key) : undefined,
        // a CA without an explicit verify flag still verifies
        rejectUnauthorized: args.ssl_verify_cert ?? args.ssl_verify_identity ?? Boolean(args.ssl_ca)
      };
    }
    return options;
  }

  cursor(options: QueryOptions = {}): CursorWrapper<Row> {
    return new CursorWrapper(this.addr(), this.conn, ARRAY_ROWS, options.timeout ?? this.defaultTimeout);
  }

  dictCursor(options: QueryOptions = {}): CursorWrapper<DictRow> {
    return new CursorWrapper(this.addr(), this.conn, DICT_ROWS, options.timeout ?? this.defaultTimeout);
  }

  /**
   * @throws {WmfdbValueError} for an unknown database
   * @throws {WmfdbDBError} for any other failure
   */
  async selectDb(db: string): Promise<void> {
    try {
      await this.conn.query(`USE ${this.conn.escapeId(db)}`);
    } catch (error) {
      throw ErrorHandler.safeError(error, `${StringConstants.MSG_SELECT_DB_FAILED} ${db} on ${this.addr()}`);
    }
    this.currentDb = db;
  }

  db(): string | undefined {
    return this.currentDb;
  }

  /**
   * Short host form: `[v6]`, an IPv4 literal as-is, else the first DNS label.
   */
  host(): string {
    if (this.hostName.includes(':')) {
      return `[${this.hostName}]`;
    }
    if (/^\d/.test(this.hostName)) {
      // hostnames never start with a digit
      return this.hostName;
    }
    return this.hostName.split('.')[0];
  }

  /**
   * `host:/path/to.sock` over a socket, `host:port` for a non-default port,
   * else just the host.
   */
  addr(): string {
    const h = this.host();
    if (this.unixSocket) {
      return `${h}:${this.unixSocket}`;
    }
    if (this.port !== DefaultConfig.DEFAULT_PORT) {
      return `${h}:${this.port}`;
    }
    return h;
  }

  /**
   * `user@addr[db]`, e.g. `wikiadmin@db9999[plwiki]`. root is left out, and
   * `(none)` shown when no database is selected.
   */
  desc(): string {
    const d = `${this.addr()}[${this.currentDb ?? '(none)'}]`;
    if (!this.user || this.user === 'root') {
      return d;
    }
    return `${this.user}@${d}`;
  }

  async begin(): Promise<void> {
    await this.run(() => this.conn.beginTransaction(), 'begin');
  }

  async commit(): Promise<void> {
    await this.run(() => this.conn.commit(), 'commit');
  }

  async rollback(): Promise<void> {
    await this.run(() => this.conn.rollback(), 'rollback');
  }

  async ping(): Promise<void> {
    await this.run(() => this.conn.ping(), 'ping');
  }

  async close(): Promise<void> {
    await this.run(() => this.conn.end(), 'close');
  }

  private async run(op: () => Promise<unknown>, name: string): Promise<void> {
    try {
      await op();
    } catch (error) {
      throw ErrorHandler.safeError(error, `${this.desc()} ${name}`);
    }
  }
}

function readSslFile(path: string): string {
  try {
    return readFileSync(path, 'utf8');
  } catch (error) {
    throw new WmfdbIOError(
      `Unable to read SSL file ${path}: ${ErrorHandler.describe(error)}`,
      ErrorHandler.asError(error)
    );
  }
}
