/**
 * mysql client wrapper helpers
 *
 * Argument handling shared by the commands that wrap the `mysql` binary.
 * Only the wrapper's own flags are recognised; everything else is passed
 * through to `mysql` untouched, so options are never matched by prefix.
 *
 * @fileoverview Command-line parsing and mysql argv construction
 * @since 0.1.0
 */

import { DefaultConfig, StringConstants } from './constants.js';
import { WmfdbValueError } from './types.js';

export interface CliArgs {
  instance: string;
  /** Level name from --log, upper-cased */
  log?: string;
  skipSsl: boolean;
  /** Arguments for the mysql binary */
  rest: string[];
}

export type ParsedCli = { help: true } | ({ help: false } & CliArgs);

export const USAGE = `usage: db-mysql [-h] [--log LOG] [--skip-ssl] instance [mysql args...]

A wrapper around the mysql cmdline client

positional arguments:
  instance      host[:port|:section] of the database instance

options:
  -h, --help    show this help message and exit
  --log LOG     Set logging level (default: ${DefaultConfig.LOG_LEVEL})
  --skip-ssl    Do not pass TLS flags to mysql

Example usage:
  db-mysql --log=debug db1115:s3 -e 'show global status'`;

/**
 * Split `argv` (without the node and script entries) into wrapper options,
 * the instance, and pass-through arguments. A `--` ends option parsing.
 *
 * @throws {WmfdbValueError} when the instance is missing or `--log` has no
 *   value
 */
export function parseCliArgs(argv: readonly string[]): ParsedCli {
  let instance: string | undefined;
  let log: string | undefined;
  let skipSsl = false;
  const rest: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === '--') {
      const tail = argv.slice(i + 1);
      if (instance === undefined && tail.length > 0) {
        instance = tail[0];
        rest.push(...tail.slice(1));
      } else {
        rest.push(...tail);
      }
      break;
    }

    if (arg === '-h' || arg === '--help') {
      return { help: true };
    }
    if (arg === '--skip-ssl') {
      skipSsl = true;
      continue;
    }
    if (arg === '--log') {
      const value = argv[i + 1];
      if (value === undefined) {
        throw new WmfdbValueError('argument --log: expected one argument');
      }
      log = value;
      i++;
      continue;
    }
    if (arg.startsWith('--log=')) {
      log = arg.slice('--log='.length);
      continue;
    }

    if (instance === undefined && !arg.startsWith('-')) {
      instance = arg;
    } else {
      rest.push(arg);
    }
  }

  if (instance === undefined) {
    throw new WmfdbValueError('the following arguments are required: instance');
  }
  return { help: false, instance, log: log?.toUpperCase(), skipSsl, rest };
}

/**
 * TLS flags for the mysql client. Without a CA, only `--ssl` is given.
 */
export function sslArgs(sslCa: string | null = DefaultConfig.SSL_CA): string[] {
  const args = ['--ssl'];
  if (sslCa !== null) {
    args.push(`--ssl-ca=${sslCa}`, '--ssl-verify-server-cert');
  }
  return args;
}

/**
 * Cloud database hosts keep their credentials in a suffixed option group.
 */
export function isCloudHost(host: string): boolean {
  return host.startsWith(StringConstants.CLOUD_HOST_PREFIX);
}

export interface MysqlArgsOptions {
  skipSsl?: boolean;
  sslCa?: string | null;
  rest?: readonly string[];
}

/**
 * argv for the mysql binary, excluding the command itself.
 * `--defaults-group-suffix` must come first or mysql ignores it.
 */
export function buildMysqlArgs(host: string, port: number, options: MysqlArgsOptions = {}): string[] {
  const args: string[] = [];
  if (isCloudHost(host)) {
    args.push(`--defaults-group-suffix=${DefaultConfig.LABS_GROUP_SUFFIX}`);
  }
  args.push('-h', host, '-P', String(port));
  if (!options.skipSsl) {
    args.push(...sslArgs(options.sslCa));
  }
  args.push(...(options.rest ?? []));
  return args;
}
