/**
 * Instance connections
 *
 * @fileoverview Open a {@link DB} from a free-form instance address
 * @since 0.1.0
 */

import { resolve, split } from './addr.js';
import { ConfigurationManager } from './config.js';
import { DB } from './db.js';
import { logger } from './logger.js';
import { CnfSelector } from './mycnf/cnfSelector.js';
import { SectionLookup, SectionMap } from './section.js';
import { Address, ConnectionArgs } from './types.js';

const log = logger.child('instance');

export interface InstanceOptions {
  config?: ConfigurationManager;
  /** Defaults to the section table named by the configuration */
  sections?: SectionLookup;
  /** Defaults to a selector loaded from the configured my.cnf files */
  selector?: CnfSelector;
  /** Applied over everything read from my.cnf */
  overrides?: ConnectionArgs;
  /** Expand bare hostnames and IPs to FQDNs before connecting */
  resolveHost?: boolean;
  /** Default statement timeout; falls back to the configured one */
  timeout?: number;
}

/**
 * Work out host, port and connection arguments for an address without
 * connecting.
 */
export async function instanceArgs(
  address: string,
  options: InstanceOptions = {}
): Promise<{ address: Address; args: ConnectionArgs }> {
  const config = options.config ?? new ConfigurationManager();
  const sections = options.sections ?? new SectionMap({ path: config.paths.sectionPorts });

  const [rawHost, port] = split(address, sections);
  const host = options.resolveHost ? await resolve(rawHost) : rawHost;

  let selector = options.selector;
  if (!selector) {
    selector = new CnfSelector();
    const loaded = selector.load(config.paths.mycnf);
    log.debug(`Loaded ${loaded} my.cnf file(s)`);
  }

  const args = selector.connectionArgs(host, { port, ...options.overrides });
  return { address: [host, port], args };
}

/**
 * Connect to the instance at `address` (`host`, `host:port`, `host:section`,
 * `[v6]:port`).
 *
 * @throws {WmfdbValueError} for a bad address or config value
 * @throws {WmfdbIOError} when a required file cannot be read
 * @throws {WmfdbDBError} when the connection fails
 */
export async function connectInstance(address: string, options: InstanceOptions = {}): Promise<DB> {
  const config = options.config ?? new ConfigurationManager();
  const { args } = await instanceArgs(address, { ...options, config });
  return DB.connect(args, { timeout: options.timeout ?? config.client.queryTimeout });
}
