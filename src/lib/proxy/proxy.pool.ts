/**
 * Proxy Pool
 * Holds candidate proxies, tracks their health and rotates healthy ones
 */

import { CrawlError, CrawlErrorKind } from '../crawler/crawler.errors';
import { Logger, silentLogger } from '../logging/logger';
import { loadProxyList, parseProxyAddress } from './proxy.loader';
import {
  AcquireOptions,
  ProxyHealth,
  ProxyPoolOptions,
  ProxyProber,
  ProxyRecord,
  ProxyStats,
  ProxyValidationSummary,
} from './proxy.types';

export const DEFAULT_FAILURE_THRESHOLD = 3;
export const DEFAULT_REVALIDATE_AFTER_MS = 300000; // 5 minutes

export class ProxyPool {
  // Insertion order is the rotation order
  private proxies: Map<string, ProxyRecord> = new Map();
  private roundRobinIndex: number = 0;
  private readonly failureThreshold: number;
  private readonly revalidateAfterMs: number;
  private readonly probeConcurrency: number;
  private readonly prober?: ProxyProber;
  private readonly now: () => number;
  private readonly logger: Logger;

  constructor(
    source: readonly string[] | string | undefined,
    options: ProxyPoolOptions = {},
    logger: Logger = silentLogger
  ) {
    this.failureThreshold = options.failureThreshold ?? DEFAULT_FAILURE_THRESHOLD;
    this.revalidateAfterMs = options.revalidateAfterMs ?? DEFAULT_REVALIDATE_AFTER_MS;
    this.probeConcurrency = Math.max(1, options.probeConcurrency ?? 5);
    this.prober = options.prober;
    this.now = options.now ?? Date.now;
    this.logger = logger;

    for (const address of loadProxyList(source)) {
      const proxy = parseProxyAddress(address);
      if (this.proxies.has(proxy.id)) {
        this.logger.debug(`Skipping duplicate proxy ${address}`);
        continue;
      }
      this.proxies.set(proxy.id, proxy);
    }
  }

  /**
   * No proxies configured: acquire() always returns null
   */
  get isPassThrough(): boolean {
    return this.proxies.size === 0;
  }

  size(): number {
    return this.proxies.size;
  }

  /**
   * Copies of every record, in rotation order
   */
  snapshot(): ProxyRecord[] {
    return Array.from(this.proxies.values(), (proxy) => ({ ...proxy }));
  }

  get(id: string): ProxyRecord | undefined {
    const proxy = this.proxies.get(id);
    return proxy ? { ...proxy } : undefined;
  }

  getHealthy(): ProxyRecord[] {
    return this.snapshot().filter((proxy) => proxy.health === ProxyHealth.HEALTHY);
  }

  /**
   * Next healthy proxy, round-robin. Null only in pass-through mode.
   */
  acquire(options: AcquireOptions = {}): ProxyRecord | null {
    if (this.isPassThrough) {
      return null;
    }

    const excludedId = options.exclude?.id;
    const proxy = this.nextHealthy(excludedId) ?? (excludedId ? this.nextHealthy() : undefined);
    if (!proxy) {
      throw new CrawlError(
        CrawlErrorKind.PROXY_EXHAUSTION,
        `No healthy proxy available (${this.proxies.size} configured)`
      );
    }

    return { ...proxy };
  }

  /**
   * Scan forward from the rotation cursor for a healthy proxy
   */
  private nextHealthy(excludedId?: string): ProxyRecord | undefined {
    const all = Array.from(this.proxies.values());
    for (let offset = 0; offset < all.length; offset++) {
      const index = (this.roundRobinIndex + offset) % all.length;
      const proxy = all[index];
      if (proxy.health === ProxyHealth.HEALTHY && proxy.id !== excludedId) {
        this.roundRobinIndex = (index + 1) % all.length;
        return proxy;
      }
    }
    return undefined;
  }

  /**
   * Probe every unvalidated or stale proxy
   */
  async validateAll(): Promise<ProxyValidationSummary> {
    const now = this.now();
    const due = Array.from(this.proxies.values()).filter(
      (proxy) =>
        proxy.health === ProxyHealth.UNVALIDATED ||
        proxy.lastValidatedAt === null ||
        now - proxy.lastValidatedAt >= this.revalidateAfterMs
    );

    const summary: ProxyValidationSummary = { checked: 0, healthy: 0, unhealthy: 0 };
    if (due.length === 0) {
      return summary;
    }

    this.logger.info(`Validating ${due.length} proxies...`);

    for (let i = 0; i < due.length; i += this.probeConcurrency) {
      const batch = due.slice(i, i + this.probeConcurrency);
      const outcomes = await Promise.all(batch.map((proxy) => this.validate(proxy.id)));
      for (const healthy of outcomes) {
        summary.checked++;
        if (healthy) {
          summary.healthy++;
        } else {
          summary.unhealthy++;
        }
      }
    }

    this.logger.info(
      `Proxy validation finished: ${summary.healthy} healthy, ${summary.unhealthy} unhealthy`
    );
    return summary;
  }

  /**
   * Probe a single proxy and record the outcome
   */
  async validate(id: string): Promise<boolean> {
    const proxy = this.proxies.get(id);
    if (!proxy) {
      return false;
    }
    if (!this.prober) {
      throw new Error('ProxyPool has no prober configured');
    }

    let healthy: boolean;
    let error: string | undefined;
    try {
      const result = await this.prober.probe({ ...proxy });
      healthy = result.healthy;
      error = result.error;
    } catch (probeError: unknown) {
      healthy = false;
      error = probeError instanceof Error ? probeError.message : String(probeError);
    }

    const current = proxy;
    current.lastValidatedAt = this.now();
    if (healthy) {
      current.health = ProxyHealth.HEALTHY;
      current.consecutiveFailures = 0;
      current.lastError = undefined;
      this.logger.debug(`Proxy OK: ${current.id}`);
    } else {
      current.health = ProxyHealth.UNHEALTHY;
      current.lastError = error;
      this.logger.warn(`Proxy check failed for ${current.id}: ${error ?? 'unknown error'}`);
    }
    return healthy;
  }

  reportSuccess(proxy: Pick<ProxyRecord, 'id'>): void {
    const current = this.proxies.get(proxy.id);
    if (!current) {
      return;
    }
    current.successCount++;
    current.consecutiveFailures = 0;
  }

  reportFailure(proxy: Pick<ProxyRecord, 'id'>, reason?: string): void {
    const current = this.proxies.get(proxy.id);
    if (!current) {
      return;
    }

    current.failureCount++;
    current.consecutiveFailures++;
    current.lastError = reason ?? current.lastError;

    if (current.health !== ProxyHealth.UNHEALTHY && current.consecutiveFailures >= this.failureThreshold) {
      current.health = ProxyHealth.UNHEALTHY;
      this.logger.warn(
        `Proxy ${current.id} demoted after ${current.consecutiveFailures} consecutive failures`
      );
    }
  }

  stats(): ProxyStats {
    const all = Array.from(this.proxies.values());
    let totalRequests = 0;
    let totalSuccesses = 0;
    for (const proxy of all) {
      totalRequests += proxy.successCount + proxy.failureCount;
      totalSuccesses += proxy.successCount;
    }

    return {
      total: all.length,
      healthy: all.filter((proxy) => proxy.health === ProxyHealth.HEALTHY).length,
      unhealthy: all.filter((proxy) => proxy.health === ProxyHealth.UNHEALTHY).length,
      unvalidated: all.filter((proxy) => proxy.health === ProxyHealth.UNVALIDATED).length,
      totalRequests,
      successRate: totalRequests > 0 ? totalSuccesses / totalRequests : 0,
    };
  }
}
