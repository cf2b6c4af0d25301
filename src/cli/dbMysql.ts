#!/usr/bin/env node
/**
 * db-mysql
 *
 * Runs the mysql command-line client against a database instance given as
 * `host[:port|:section]`, adding TLS flags and the cloud option group.
 *
 * @fileoverview db-mysql command
 * @since 0.1.0
 */

import { spawn } from 'child_process';
import { split } from '../addr.js';
import { ConfigurationManager } from '../config.js';
import { DefaultConfig } from '../constants.js';
import { ErrorHandler } from '../errorHandler.js';
import { logger, setupLogging } from '../logger.js';
import { buildMysqlArgs, parseCliArgs, ParsedCli, USAGE } from '../mysqlCli.js';
import { SectionMap } from '../section.js';
import { WmfdbError } from '../types.js';

const CMD = DefaultConfig.MYSQL_COMMAND;
const log = logger.child('db-mysql');

/**
 * Run mysql and resolve with its exit status.
 */
function runMysql(args: readonly string[]): Promise<number> {
  return new Promise(resolve => {
    const child = spawn(CMD, args, { stdio: 'inherit' });

    // Ctrl-C reaches mysql directly through the shared terminal
    const onSigint = (): void => {
      log.debug('SIGINT received, waiting for mysql to exit');
    };
    process.on('SIGINT', onSigint);

    child.on('error', error => {
      process.removeListener('SIGINT', onSigint);
      log.fatal(`Unable to execute command '${CMD}': ${error.message}`);
      resolve(1);
    });
    child.on('exit', (code, signal) => {
      process.removeListener('SIGINT', onSigint);
      if (signal) {
        log.debug(`${CMD} killed by ${signal}`);
      }
      resolve(code ?? 1);
    });
  });
}

/**
 * @returns process exit status
 */
export async function main(argv: readonly string[] = process.argv.slice(2)): Promise<number> {
  let parsed: ParsedCli;
  try {
    parsed = parseCliArgs(argv);
  } catch (error) {
    process.stderr.write(`${USAGE}\ndb-mysql: error: ${ErrorHandler.describe(error)}\n`);
    return 2;
  }
  if (parsed.help) {
    process.stdout.write(`${USAGE}\n`);
    return 0;
  }

  const config = new ConfigurationManager();
  try {
    setupLogging(parsed.log ?? config.logging.level, {
      format: config.logging.format,
      filePath: config.logging.filePath
    });
  } catch (error) {
    // logging is not set up yet
    process.stderr.write(`${ErrorHandler.describe(error)}\n`);
    return 1;
  }
  log.debug('Configuration', undefined, config.toObject());

  try {
    const sections = new SectionMap({ path: config.paths.sectionPorts });
    const [host, port] = split(parsed.instance, sections);
    const args = buildMysqlArgs(host, port, {
      skipSsl: parsed.skipSsl,
      sslCa: config.client.sslCa,
      rest: parsed.rest
    });

    log.info(`Execing: ${JSON.stringify([CMD, ...args])}`);
    return await runMysql(args);
  } catch (error) {
    if (error instanceof WmfdbError) {
      log.fatal(error.message);
      return 1;
    }
    throw error;
  }
}

if (require.main === module) {
  main().then(
    code => {
      process.exitCode = code;
    },
    (error: unknown) => {
      process.stderr.write(`${ErrorHandler.asError(error)?.stack ?? String(error)}\n`);
      process.exitCode = 1;
    }
  );
}
