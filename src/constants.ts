/**
 * wmfdb constants
 *
 * Central home for default paths, ports, environment variable names and
 * message strings used across the toolkit. Anything an operator may want to
 * change at run time is read through {@link ConfigurationManager} instead.
 *
 * @fileoverview Defaults, MySQL error codes and string constants
 * @since 0.1.0
 */

/**
 * MySQL/MariaDB server and client error numbers the classifier recognises.
 */
export const MySQLErrorCodes = {
  /** Access control */
  ACCESS_DENIED_FOR_USER: 1044,
  ACCESS_DENIED: 1045,
  TABLE_ACCESS_DENIED: 1142,

  /** Object resolution */
  BAD_DB_ERROR: 1049,                     // unknown database
  TABLE_DOESNT_EXIST: 1146,

  /** Syntax */
  PARSE_ERROR: 1064,

  /** Statement interrupted by max_statement_time */
  STATEMENT_TIMEOUT: 1969,
  QUERY_INTERRUPTED: 1317,

  /** Client-side connection errors */
  CANT_CONNECT_TO_LOCAL_SERVER: 2002,
  CANT_CONNECT_TO_SERVER: 2003,
  UNKNOWN_HOST: 2005,
  SERVER_HAS_GONE_AWAY: 2006,
  LOST_CONNECTION: 2013,
  SSL_ERROR: 2026
} as const;

/**
 * Default configuration values
 */
export const DefaultConfig = {
  /** Sections */
  DEFAULT_SECTION: 'default',
  DEFAULT_PORT: 3306,
  DEFAULT_PROM_PORT: 9104,
  PROM_PORT_OFFSET: 10000,
  SECTION_PORTS_PATH: '/etc/wmfmariadbpy/section_ports.csv',

  /** Derived per-section paths */
  SOCKET_DIR: '/run/mysqld',
  DATA_DIR: '/srv/sqldata',

  /** my.cnf */
  MYCNF_PATHS: ['/etc/my.cnf', '/etc/mysql/my.cnf', '~/.my.cnf'],
  MYCNF_SECTION_ORDER: ['client'],
  MYCNF_LABS_SECTION_ORDER: ['clientlabsdb', 'client'],

  /** mysql client wrapper */
  MYSQL_COMMAND: 'mysql',
  SSL_CA: '/etc/ssl/certs/Puppet_Internal_CA.pem',
  LABS_GROUP_SUFFIX: 'labsdb',

  /** Logging */
  LOG_LEVEL: 'WARN',
  LOG_FORMAT: 'text'
} as const;

/**
 * Datacenter number embedded in a hostname → datacenter name.
 */
export const DatacenterIds: Readonly<Record<number, string>> = {
  1: 'eqiad',
  2: 'codfw',
  3: 'esams',
  4: 'ulsfo',
  5: 'eqsin',
  6: 'drmrs'
};

/**
 * String constants
 */
export const StringConstants = {
  /** Environment variable keys */
  ENV_SECTION_PORTS: 'WMFDB_SECTION_PORTS',
  ENV_SECTION_MAP_TEST_DATA: 'WMFDB_SECTION_MAP_TEST_DATA',
  ENV_MYCNF_PATHS: 'WMFDB_MYCNF_PATHS',
  ENV_LOG_LEVEL: 'WMFDB_LOG_LEVEL',
  ENV_LOG_FORMAT: 'WMFDB_LOG_FORMAT',
  ENV_LOG_FILE: 'WMFDB_LOG_FILE',
  ENV_SSL_CA: 'WMFDB_SSL_CA',
  ENV_QUERY_TIMEOUT: 'WMFDB_QUERY_TIMEOUT',

  /** Domain suffix appended after the datacenter name */
  FQDN_SUFFIX: 'wmnet',
  LOCALHOST: 'localhost',

  /** Hostname prefix of cloud-hosted database instances */
  CLOUD_HOST_PREFIX: 'clouddb',

  /** Statement timeout clause; {timeout} and {query} are substituted */
  STATEMENT_TIMEOUT_TEMPLATE: 'SET STATEMENT max_statement_time={timeout} FOR {query}',

  /** Messages */
  MSG_NO_SECTION_HEADERS: 'File contains no section headers.',
  MSG_PARSING_ERRORS: 'Source contains parsing errors:',
  MSG_CURSOR_CLOSED: 'Cursor is closed',
  MSG_CONNECTION_FAILED: 'Unable to connect to database',
  MSG_SELECT_DB_FAILED: 'Unable to select database'
} as const;
