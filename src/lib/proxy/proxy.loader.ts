/**
 * Proxy Loader
 * Parses proxy addresses from lists, comma-separated strings and proxy files
 */

import fs from 'fs';
import path from 'path';
import { URL } from 'url';
import { ProxyHealth, ProxyProtocol, ProxyRecord } from './proxy.types';

const SCHEME_PATTERN = /^[a-z][a-z0-9+.-]*:\/\//i;

/**
 * Parse one proxy address (`host:port` or `scheme://[user:pass@]host:port`)
 */
export function parseProxyAddress(address: string): ProxyRecord {
  const trimmed = address.trim();
  const withScheme = SCHEME_PATTERN.test(trimmed) ? trimmed : `http://${trimmed}`;

  let parsed: URL;
  try {
    parsed = new URL(withScheme);
  } catch {
    throw new Error(`Invalid proxy address: ${address}`);
  }

  const protocol = toProtocol(parsed.protocol.replace(':', '').toLowerCase());
  if (!protocol) {
    throw new Error(`Unsupported proxy scheme in ${address}`);
  }
  if (!parsed.hostname) {
    throw new Error(`Proxy address has no host: ${address}`);
  }

  const port = parsed.port
    ? parseInt(parsed.port, 10)
    : protocol === ProxyProtocol.HTTPS
      ? 443
      : protocol === ProxyProtocol.HTTP
        ? 80
        : 1080;

  const auth = parsed.username
    ? `${parsed.username}${parsed.password ? `:${parsed.password}` : ''}@`
    : '';

  return {
    // Spellings of one endpoint share an id; the password is left out of it
    id: `${protocol}://${parsed.username ? `${parsed.username}@` : ''}${parsed.host}`,
    address: trimmed,
    url: `${protocol}://${auth}${parsed.host}`,
    protocol,
    host: parsed.hostname,
    port,
    username: parsed.username ? decodeURIComponent(parsed.username) : undefined,
    password: parsed.password ? decodeURIComponent(parsed.password) : undefined,
    health: ProxyHealth.UNVALIDATED,
    consecutiveFailures: 0,
    lastValidatedAt: null,
    successCount: 0,
    failureCount: 0,
  };
}

/**
 * Resolve a proxy source to a de-duplicated address list.
 * A string naming an existing file, or containing a path separator, is read
 * as a newline-delimited proxy file; any other string is comma-separated.
 */
export function loadProxyList(source: readonly string[] | string | undefined): string[] {
  if (!source) {
    return [];
  }

  let entries: string[];
  if (typeof source !== 'string') {
    entries = [...source];
  } else if (looksLikeFile(source)) {
    entries = readProxyFile(source);
  } else {
    entries = source.split(',');
  }

  const seen = new Set<string>();
  const addresses: string[] = [];
  for (const entry of entries) {
    const address = entry.trim();
    if (!address || address.startsWith('#') || seen.has(address)) {
      continue;
    }
    seen.add(address);
    addresses.push(address);
  }
  return addresses;
}

export function readProxyFile(filePath: string): string[] {
  const content = fs.readFileSync(filePath, 'utf8');
  return content.split(/\r?\n/);
}

function looksLikeFile(source: string): boolean {
  const value = source.trim();
  if (value.includes(',') || SCHEME_PATTERN.test(value)) {
    return false;
  }
  return value.includes(path.sep) || value.includes('/') || fs.existsSync(value);
}

function toProtocol(scheme: string): ProxyProtocol | null {
  switch (scheme) {
    case 'http':
      return ProxyProtocol.HTTP;
    case 'https':
      return ProxyProtocol.HTTPS;
    case 'socks4':
      return ProxyProtocol.SOCKS4;
    case 'socks5':
      return ProxyProtocol.SOCKS5;
    default:
      return null;
  }
}
