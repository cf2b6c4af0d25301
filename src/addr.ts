/**
 * Instance addresses
 *
 * @fileoverview Splitting `host[:port]` addresses and resolving hosts to FQDNs
 * @since 0.1.0
 */

import { lookupService } from 'dns/promises';
import { BlockList, isIP } from 'net';
import { DatacenterIds, DefaultConfig, StringConstants } from './constants.js';
import { ErrorHandler } from './errorHandler.js';
import { SectionLookup } from './section.js';
import { Address, ErrorCategory, WmfdbValueError } from './types.js';
import { ParseUtils } from './utils/common.js';

const BRACKETED_IPV6 = /^\[([^\]]+)\](?::(\w+))?$/;
const DATACENTER_HOST = /^[a-zA-Z]+(\d)\d{3}$/;

const loopback = new BlockList();
loopback.addSubnet('127.0.0.0', 8, 'ipv4');
loopback.addAddress('::1', 'ipv6');

/**
 * Split an address into host and port.
 *
 * Accepted forms:
 * - `192.0.2.1`, `192.0.2.1:3007`
 * - `2001:db8::11`, `[2001:db8::11]`, `[2001:db8::11]:3116`
 * - `db2034`, `db2054.codfw.wmnet:3241`
 *
 * A port that is not a number is taken as a section name (`db1001:s4`) and
 * mapped through `sections`. Hosts are not validated.
 *
 * @throws {WmfdbValueError} on malformed `[ipv6]:port` syntax, or an unknown
 *   section alias
 */
export function split(
  addr: string,
  sections: SectionLookup,
  defaultPort: number = DefaultConfig.DEFAULT_PORT
): Address {
  let host = addr;
  let portText: string | undefined;

  const colons = addr.split(':').length - 1;
  if (colons > 1) {
    if (addr.startsWith('[')) {
      const match = BRACKETED_IPV6.exec(addr);
      if (!match) {
        throw new WmfdbValueError(`Invalid [ipv6]:port format: '${addr}'`);
      }
      host = match[1];
      portText = match[2];
    }
    // otherwise a bare ipv6 literal, which cannot carry a port
  } else if (colons === 1) {
    const idx = addr.indexOf(':');
    host = addr.slice(0, idx);
    portText = addr.slice(idx + 1);
  }

  if (!portText) {
    return [host, defaultPort];
  }
  const port = ParseUtils.parseInteger(portText);
  return [host, port ?? sections.byName(portText).port];
}

/**
 * Resolve a hostname or IP to an FQDN.
 *
 * Loopback IPs become `localhost`; other IPs go through the system resolver
 * (`/etc/hosts`, then reverse DNS). Bare
 * hostnames get their datacenter domain from the digit after the letter
 * prefix: `db1001` → `db1001.eqiad.wmnet`.
 *
 * @throws {WmfdbValueError} when reverse DNS fails, or no known datacenter
 *   can be derived from the hostname
 */
export async function resolve(host: string): Promise<string> {
  const family = isIP(host);
  if (family === 0) {
    return datacenterFqdn(host);
  }
  if (loopback.check(host, family === 4 ? 'ipv4' : 'ipv6')) {
    return StringConstants.LOCALHOST;
  }
  return resolveIp(host);
}

async function resolveIp(ip: string): Promise<string> {
  let hostname: string;
  try {
    ({ hostname } = await lookupService(ip, 0));
  } catch (error) {
    throw new WmfdbValueError(
      `Unable to resolve ip address: '${ip}': ${ErrorHandler.describe(error)}`,
      ErrorCategory.DNS_ERROR,
      ErrorHandler.asError(error)
    );
  }
  if (!hostname) {
    throw new WmfdbValueError(`Unable to resolve ip address: '${ip}': no PTR record`, ErrorCategory.DNS_ERROR);
  }
  return hostname;
}

/**
 * Append the datacenter domain to a bare hostname.
 *
 * @throws {WmfdbValueError} for a hostname without a datacenter digit, or
 *   with an unknown one
 */
export function datacenterFqdn(host: string): string {
  const match = DATACENTER_HOST.exec(host);
  if (!match) {
    throw new WmfdbValueError(`No datacenter ID detected in ${host}`);
  }
  const dcId = Number(match[1]);
  const dc = DatacenterIds[dcId];
  if (dc === undefined) {
    throw new WmfdbValueError(`Unknown datacenter ID '${dcId}' (from '${host}')`);
  }
  return `${host}.${dc}.${StringConstants.FQDN_SUFFIX}`;
}
