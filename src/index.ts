/**
 * wmfdb
 *
 * Toolkit for operating a MySQL/MariaDB fleet: instance address parsing and
 * resolution, section tables, my.cnf reading, and a timeout-aware database
 * connection wrapper.
 *
 * @since 0.1.0
 */

export { datacenterFqdn, resolve, split } from './addr.js';
export { ClientConfig, ConfigurationManager, LoggingConfig, PathsConfig } from './config.js';
export { DefaultConfig, DatacenterIds, MySQLErrorCodes, StringConstants } from './constants.js';
export {
  ARRAY_ROWS,
  ConnectOptions,
  Cursor,
  CursorWrapper,
  DB,
  DICT_ROWS,
  DictRow,
  QueryArgs,
  Row,
  RowFormat
} from './db.js';
export { ErrorHandler } from './errorHandler.js';
export { MySQLErrorClassifier } from './errors/errorClassifier.js';
export { connectInstance, instanceArgs, InstanceOptions } from './instance.js';
export { LevelName, logger, parseLogLevel, setupLogging } from './logger.js';
export { LogCallback, LogConfig, LogEntry, LogLevel, StructuredLogger } from './logging/structuredLogger.js';
export { Cnf, CnfOptions } from './mycnf/cnf.js';
export { CnfRule, CnfSelector, DEFAULT_CNF_RULES } from './mycnf/cnfSelector.js';
export { ConfigStore, IniReadOptions, normalizeKey, readIni, SectionValues } from './mycnf/iniReader.js';
export { cleanValue, stripComment, stripQuotes } from './mycnf/valueCleaner.js';
export {
  buildMysqlArgs,
  CliArgs,
  isCloudHost,
  MysqlArgsOptions,
  ParsedCli,
  parseCliArgs,
  sslArgs,
  USAGE
} from './mysqlCli.js';
export {
  Section,
  SectionLookup,
  SectionMap,
  SectionMapOptions,
  SectionOptions,
  TEST_DATA
} from './section.js';
export * from './types.js';
