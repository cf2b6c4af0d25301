/**
 * Host-based my.cnf selection
 *
 * @fileoverview Routes hostnames to the {@link Cnf} whose section order
 * applies to them
 * @since 0.1.0
 */

import { DefaultConfig } from '../constants.js';
import { ConnectionArgs } from '../types.js';
import { Cnf, CnfOptions } from './cnf.js';

/**
 * A hostname pattern and the section order used for hosts matching it.
 * The pattern must match the whole hostname.
 */
export interface CnfRule {
  pattern: RegExp;
  sectionOrder: readonly string[];
}

/**
 * Cloud database hosts read the labs client section before the normal one.
 */
export const DEFAULT_CNF_RULES: readonly CnfRule[] = [
  {
    pattern: /clouddb\d+(?:\.[\w.-]+)?/,
    sectionOrder: DefaultConfig.MYCNF_LABS_SECTION_ORDER
  }
];

/**
 * Owns one {@link Cnf} per rule plus a default one, all loaded from the same
 * files, and hands out the right one for a host. Rules are tried in order;
 * the first full match wins.
 */
export class CnfSelector {
  private readonly defaultCnf: Cnf;
  private readonly routes: { matcher: RegExp; cnf: Cnf }[];

  constructor(
    defaultOrder: readonly string[] = DefaultConfig.MYCNF_SECTION_ORDER,
    rules: readonly CnfRule[] = DEFAULT_CNF_RULES,
    options: CnfOptions = {}
  ) {
    this.defaultCnf = new Cnf(defaultOrder, options);
    this.routes = rules.map(rule => ({
      matcher: new RegExp(`^(?:${rule.pattern.source})$`, rule.pattern.flags.replace(/[gy]/g, '')),
      cnf: new Cnf(rule.sectionOrder, options)
    }));
  }

  select(host: string): Cnf {
    const route = this.routes.find(({ matcher }) => matcher.test(host));
    return route ? route.cnf : this.defaultCnf;
  }

  /**
   * Load the same files into every parser.
   *
   * @returns number of files the default parser loaded
   */
  load(paths: readonly string[] = DefaultConfig.MYCNF_PATHS): number {
    const count = this.defaultCnf.load(paths);
    for (const { cnf } of this.routes) {
      cnf.load(paths);
    }
    return count;
  }

  connectionArgs(host: string, overrides: ConnectionArgs = {}): ConnectionArgs {
    return this.select(host).connectionArgs({ host, ...overrides });
  }
}
