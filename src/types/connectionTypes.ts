/**
 * Connection parameter types
 *
 * @fileoverview The connection-argument struct produced from my.cnf files and
 * consumed by the database wrapper
 * @since 0.1.0
 */

/**
 * Parameters for opening a database connection.
 *
 * Field names follow the my.cnf / client-library spelling. Config files
 * supply defaults; values given at the call site override them.
 */
export interface ConnectionArgs {
  user?: string;
  password?: string;
  host?: string;
  database?: string;
  unix_socket?: string;
  port?: number;
  charset?: string;
  /** Seconds */
  connect_timeout?: number;
  /** Kept verbatim, e.g. "16M" */
  max_allowed_packet?: string;
  bind_address?: string;
  ssl_ca?: string;
  ssl_cert?: string;
  ssl_key?: string;
  ssl_verify_cert?: boolean;
  ssl_verify_identity?: boolean;
}

/**
 * Host and port pair produced by splitting an address string.
 */
export type Address = [host: string, port: number];

/**
 * Per-call query options.
 */
export interface QueryOptions {
  /**
   * Statement timeout in seconds. `undefined` falls back to the cursor
   * default; `0` disables it.
   */
  timeout?: number;
}

/**
 * Column names and row count of the last executed statement.
 */
export type ResultMeta = [columns: string[], rowcount: number];
