/**
 * Proxy Types
 * Type definitions for the proxy pool
 */

/**
 * Proxy protocol enumeration
 */
export enum ProxyProtocol {
  HTTP = 'http',
  HTTPS = 'https',
  SOCKS4 = 'socks4',
  SOCKS5 = 'socks5',
}

/**
 * Proxy health enumeration
 */
export enum ProxyHealth {
  UNVALIDATED = 'unvalidated',
  HEALTHY = 'healthy',
  UNHEALTHY = 'unhealthy',
}

/**
 * Proxy record, mutated only by the pool that owns it
 */
export interface ProxyRecord {
  id: string;
  /** Address exactly as configured */
  address: string;
  /** Normalized URL (scheme defaults to http) */
  url: string;
  protocol: ProxyProtocol;
  host: string;
  port: number;
  username?: string;
  password?: string;
  health: ProxyHealth;
  consecutiveFailures: number;
  lastValidatedAt: number | null;
  successCount: number;
  failureCount: number;
  lastError?: string;
}

/**
 * Probe outcome for one proxy
 */
export interface ProxyProbeResult {
  healthy: boolean;
  responseTime?: number;
  error?: string;
}

/**
 * Checks whether a proxy can reach the test endpoint
 */
export interface ProxyProber {
  probe(proxy: Readonly<ProxyRecord>): Promise<ProxyProbeResult>;
}

/**
 * Proxy pool configuration
 */
export interface ProxyPoolOptions {
  /** Consecutive live-traffic failures before a proxy is demoted */
  failureThreshold?: number;
  /** Age after which a validated proxy is probed again by validateAll() */
  revalidateAfterMs?: number;
  probeConcurrency?: number;
  prober?: ProxyProber;
  /** Clock, injectable for tests */
  now?: () => number;
}

export interface AcquireOptions {
  /** Skip this proxy when any other healthy proxy is available */
  exclude?: Pick<ProxyRecord, 'id'> | null;
}

export interface ProxyValidationSummary {
  checked: number;
  healthy: number;
  unhealthy: number;
}

/**
 * Proxy statistics
 */
export interface ProxyStats {
  total: number;
  healthy: number;
  unhealthy: number;
  unvalidated: number;
  totalRequests: number;
  successRate: number;
}
