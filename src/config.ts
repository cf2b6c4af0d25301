/**
 * Runtime configuration
 *
 * Settings read from the environment (after loading a local `.env`), with
 * defaults for every value. Invalid values are reported and replaced by the
 * default rather than aborting.
 *
 * @fileoverview Environment-driven configuration
 * @since 0.1.0
 */

import { config } from 'dotenv';
import { z } from 'zod';
import { DefaultConfig, StringConstants } from './constants.js';
import { levelNameSchema, logger } from './logger.js';

config();

/**
 * Logging configuration
 */
export interface LoggingConfig {
  /** Level name as accepted by {@link setupLogging} */
  level: string;
  format: 'text' | 'json' | 'pretty';
  /** Also write log lines to this file */
  filePath?: string;
}

/**
 * File locations
 */
export interface PathsConfig {
  /** Section table; unset means the built-in default */
  sectionPorts?: string;
  /** my.cnf files, loaded in order */
  mycnf: string[];
}

/**
 * Database client configuration
 */
export interface ClientConfig {
  /** CA bundle passed to the mysql client; null disables verification flags */
  sslCa: string | null;
  /** Default statement timeout in seconds for connections opened by wmfdb */
  queryTimeout?: number;
}

const logFormatSchema = z.enum(['text', 'json', 'pretty']);
const timeoutSchema = z.coerce.number().nonnegative().finite();

/**
 * Configuration manager
 *
 * @example
 * const configManager = new ConfigurationManager();
 * cnf.load(configManager.paths.mycnf);
 */
export class ConfigurationManager {
  public logging: LoggingConfig;
  public paths: PathsConfig;
  public client: ClientConfig;

  constructor(env: NodeJS.ProcessEnv = process.env) {
    this.logging = this.loadLoggingConfig(env);
    this.paths = this.loadPathsConfig(env);
    this.client = this.loadClientConfig(env);
  }

  private loadLoggingConfig(env: NodeJS.ProcessEnv): LoggingConfig {
    return {
      level: this.parseWithValidation(
        env[StringConstants.ENV_LOG_LEVEL],
        levelNameSchema,
        DefaultConfig.LOG_LEVEL,
        StringConstants.ENV_LOG_LEVEL
      ),
      format: this.parseWithValidation(
        env[StringConstants.ENV_LOG_FORMAT],
        logFormatSchema,
        DefaultConfig.LOG_FORMAT,
        StringConstants.ENV_LOG_FORMAT
      ),
      filePath: env[StringConstants.ENV_LOG_FILE] || undefined
    };
  }

  private loadPathsConfig(env: NodeJS.ProcessEnv): PathsConfig {
    const mycnf = (env[StringConstants.ENV_MYCNF_PATHS] || '')
      .split(':')
      .map(p => p.trim())
      .filter(p => p !== '');

    return {
      sectionPorts: env[StringConstants.ENV_SECTION_PORTS] || undefined,
      mycnf: mycnf.length > 0 ? mycnf : [...DefaultConfig.MYCNF_PATHS]
    };
  }

  private loadClientConfig(env: NodeJS.ProcessEnv): ClientConfig {
    const sslCa = env[StringConstants.ENV_SSL_CA];
    const timeout = env[StringConstants.ENV_QUERY_TIMEOUT];

    return {
      // set but empty means "no CA"
      sslCa: sslCa === undefined ? DefaultConfig.SSL_CA : sslCa || null,
      queryTimeout: timeout
        ? this.parseWithValidation(timeout, timeoutSchema, undefined, StringConstants.ENV_QUERY_TIMEOUT)
        : undefined
    };
  }

  /**
   * Validate an environment value, falling back to `defaultValue` with a
   * warning when it does not pass.
   */
  private parseWithValidation<S extends z.ZodTypeAny, D>(
    envValue: string | undefined,
    schema: S,
    defaultValue: D,
    paramName: string
  ): z.infer<S> | D {
    if (!envValue) {
      return defaultValue;
    }

    const parsed = schema.safeParse(envValue);
    if (!parsed.success) {
      logger.warn('Invalid configuration value, using default', 'ConfigurationManager', {
        parameter: paramName,
        value: envValue,
        defaultValue,
        reason: parsed.error.issues.map(issue => issue.message).join('; ')
      });
      return defaultValue;
    }
    return parsed.data;
  }

  /**
   * Plain snapshot for diagnostics.
   */
  public toObject(): Record<string, unknown> {
    return {
      logging: { ...this.logging },
      paths: { ...this.paths, mycnf: [...this.paths.mycnf] },
      client: { ...this.client }
    };
  }
}
