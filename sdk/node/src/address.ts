/**
 * Copyright (C) 2026 Garudex Labs. All Rights Reserved.
 *
 * Target host resolution and base URL construction.
 */

import net from 'node:net';
import { ConnectionInfo } from './config';
import { ConfigurationError } from './errors';

/**
 * Render an IP literal for use in a URL authority. IPv6 addresses come back
 * in canonical compressed form inside brackets.
 */
export function formatIpLiteral(ip: string): string {
  const trimmed = ip.trim();
  if (net.isIPv4(trimmed)) return trimmed;
  if (net.isIPv6(trimmed)) {
    if (trimmed.includes('%')) {
      throw new ConfigurationError(`Scoped IPv6 address '${ip}' cannot be used in a URL; drop the zone index`);
    }
    // WHATWG URL parsing canonicalizes the address (lower case, longest zero run compressed).
    return new URL(`http://[${trimmed}]/`).hostname;
  }
  throw new ConfigurationError(`'${ip}' is not a valid IPv4 or IPv6 address`);
}

/** `host` wins over `ip`; an `ip` must be an address literal. */
export function resolveHost(info: Pick<ConnectionInfo, 'host' | 'ip'>): string {
  if (info.host) return info.host;
  if (info.ip) return formatIpLiteral(info.ip);
  throw new ConfigurationError("Connection info requires either 'host' or 'ip'");
}

export function buildBaseUrl(protocol: string, host: string, port: number | string): string {
  return `${protocol}://${host}:${port}`;
}
