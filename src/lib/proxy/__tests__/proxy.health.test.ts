/**
 * Proxy Health Checker Tests
 * Probes go through an axios adapter stub
 */

import axios, { AxiosAdapter, InternalAxiosRequestConfig } from 'axios';
import { HttpsProxyAgent } from 'https-proxy-agent';
import { parseProxyAddress } from '../proxy.loader';
import { HttpProxyProber } from '../proxy.health';

function stubClient(respond: (config: InternalAxiosRequestConfig) => number, seen: InternalAxiosRequestConfig[]) {
  const adapter: AxiosAdapter = async (config) => {
    seen.push(config);
    const status = respond(config);
    return { data: '{}', status, statusText: 'stub', headers: {}, config };
  };
  return axios.create({ adapter });
}

describe('HttpProxyProber', () => {
  const proxy = parseProxyAddress('http://10.0.0.1:8080');

  it('should report a proxy healthy when the test URL answers 200', async () => {
    const seen: InternalAxiosRequestConfig[] = [];
    const prober = new HttpProxyProber({
      testUrl: 'http://check.example.com/ip',
      timeoutMs: 2000,
      userAgent: 'crawl-engine/test',
      client: stubClient(() => 200, seen),
    });

    const result = await prober.probe(proxy);

    expect(result.healthy).toBe(true);
    expect(result.error).toBeUndefined();
    expect(typeof result.responseTime).toBe('number');
    expect(seen).toHaveLength(1);
    expect(seen[0].url).toBe('http://check.example.com/ip');
    expect(seen[0].proxy).toBe(false);
    expect(seen[0].timeout).toBe(2000);
    expect(seen[0].httpAgent).toBeInstanceOf(HttpsProxyAgent);
    expect(seen[0].headers['User-Agent']).toBe('crawl-engine/test');
  });

  it('should report any other status as unhealthy', async () => {
    const prober = new HttpProxyProber({ client: stubClient(() => 503, []) });

    const result = await prober.probe(proxy);

    expect(result.healthy).toBe(false);
    expect(result.error).toBe('HTTP 503');
  });

  it('should report a failed request as unhealthy', async () => {
    const prober = new HttpProxyProber({
      client: stubClient(() => {
        throw new Error('connect ECONNREFUSED 10.0.0.1:8080');
      }, []),
    });

    const result = await prober.probe(proxy);

    expect(result).toEqual({
      healthy: false,
      responseTime: expect.any(Number),
      error: 'connect ECONNREFUSED 10.0.0.1:8080',
    });
  });

  it('should reject SOCKS proxies without a request', async () => {
    const seen: InternalAxiosRequestConfig[] = [];
    const prober = new HttpProxyProber({ client: stubClient(() => 200, seen) });

    const result = await prober.probe(parseProxyAddress('socks5://10.0.0.1:1080'));

    expect(result.healthy).toBe(false);
    expect(result.error).toBe('SOCKS proxies are not supported by the HTTP transport');
    expect(seen).toHaveLength(0);
  });
});
