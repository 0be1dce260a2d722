/**
 * Proxy Health Checker
 * Checks proxy health by requesting a test endpoint through the proxy
 */

import axios, { AxiosInstance } from 'axios';
import { HttpsProxyAgent } from 'https-proxy-agent';
import { errorMessage } from '../crawler/crawler.errors';
import { ProxyProbeResult, ProxyProber, ProxyProtocol, ProxyRecord } from './proxy.types';

export const DEFAULT_PROXY_TEST_URL = 'http://httpbin.org/ip';
export const DEFAULT_PROBE_TIMEOUT_MS = 5000;

export interface HttpProxyProberOptions {
  testUrl?: string;
  timeoutMs?: number;
  sslVerify?: boolean;
  userAgent?: string;
  /** Injected HTTP client, used by tests */
  client?: AxiosInstance;
}

export class HttpProxyProber implements ProxyProber {
  private readonly testUrl: string;
  private readonly timeoutMs: number;
  private readonly sslVerify: boolean;
  private readonly userAgent: string;
  private readonly client: AxiosInstance;

  constructor(options: HttpProxyProberOptions = {}) {
    this.testUrl = options.testUrl ?? DEFAULT_PROXY_TEST_URL;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS;
    this.sslVerify = options.sslVerify ?? true;
    this.userAgent = options.userAgent ?? 'crawl-engine-proxy-check/1.0';
    this.client = options.client ?? axios.create();
  }

  /**
   * Healthy iff the test endpoint answers 200 through the proxy
   */
  async probe(proxy: Readonly<ProxyRecord>): Promise<ProxyProbeResult> {
    if (proxy.protocol === ProxyProtocol.SOCKS4 || proxy.protocol === ProxyProtocol.SOCKS5) {
      return {
        healthy: false,
        error: 'SOCKS proxies are not supported by the HTTP transport',
      };
    }

    const startTime = Date.now();
    const agent = new HttpsProxyAgent(proxy.url, { rejectUnauthorized: this.sslVerify });

    try {
      const response = await this.client.get(this.testUrl, {
        httpAgent: agent,
        httpsAgent: agent,
        proxy: false,
        timeout: this.timeoutMs,
        signal: AbortSignal.timeout(this.timeoutMs),
        maxRedirects: 0,
        validateStatus: () => true,
        headers: { 'User-Agent': this.userAgent },
      });
      const responseTime = Date.now() - startTime;

      return {
        healthy: response.status === 200,
        responseTime,
        error: response.status !== 200 ? `HTTP ${response.status}` : undefined,
      };
    } catch (error: unknown) {
      return {
        healthy: false,
        responseTime: Date.now() - startTime,
        error: errorMessage(error),
      };
    } finally {
      agent.destroy();
    }
  }
}
