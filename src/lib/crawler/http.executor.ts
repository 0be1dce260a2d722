/**
 * HTTP Executor
 * Performs one attempt of a crawl request: header/cookie merge, redirects, timeout and proxy reporting
 */

import type { ProxyPool } from '../proxy/proxy.pool';
import type { ProxyRecord } from '../proxy/proxy.types';
import { MAX_TIMER_MS } from './crawler.config';
import { classifyError, CrawlError, CrawlErrorKind } from './crawler.errors';
import type { CrawlRequest, HttpMethod, ResolvedCrawlerConfig } from './crawler.types';

/**
 * One hop on the wire. Redirects are never followed by the transport.
 */
export interface TransportExchange {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  body?: string;
  /** Proxy URL to tunnel through, null for a direct connection */
  proxyUrl: string | null;
  timeoutMs: number;
}

export interface TransportResponse {
  status: number;
  /** Lower-cased header names */
  headers: Record<string, string>;
  body: string;
}

/**
 * Connection-owning side of the executor, shared by every request of one crawler
 */
export interface HttpTransport {
  send(exchange: TransportExchange, signal: AbortSignal): Promise<TransportResponse>;
  close(): Promise<void>;
}

export interface HttpExchangeResult {
  status: number;
  headers: Record<string, string>;
  body: string;
  finalUrl: string;
  redirects: number;
}

type ExecutorConfig = Pick<
  ResolvedCrawlerConfig,
  'defaultHeaders' | 'defaultCookies' | 'userAgent' | 'followRedirects' | 'maxRedirects' | 'timeoutMs'
>;

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);
const PROXY_AUTH_REQUIRED = 407;

export class HttpExecutor {
  private readonly transport: HttpTransport;
  private readonly proxyPool: ProxyPool | null;
  private readonly config: ExecutorConfig;

  constructor(transport: HttpTransport, proxyPool: ProxyPool | null, config: ExecutorConfig) {
    this.transport = transport;
    this.proxyPool = proxyPool;
    this.config = config;
  }

  /**
   * Run one attempt. Resolves with a 2xx response; anything else throws a CrawlError.
   */
  async execute(
    request: Readonly<CrawlRequest>,
    proxy: Readonly<ProxyRecord> | null,
    signal?: AbortSignal
  ): Promise<HttpExchangeResult> {
    if (signal?.aborted) {
      throw new CrawlError(CrawlErrorKind.CANCELLED, `Request cancelled: ${request.url}`);
    }

    let url = buildRequestUrl(request);
    let method: HttpMethod = request.method ?? 'GET';
    const headers = this.mergeHeaders(request);
    let body = encodeBody(request.data, headers);
    const followRedirects = request.followRedirects ?? this.config.followRedirects;
    const timeoutMs = request.timeoutMs ?? this.config.timeoutMs;
    if (!Number.isFinite(timeoutMs) || timeoutMs <= 0 || timeoutMs > MAX_TIMER_MS) {
      throw new CrawlError(CrawlErrorKind.INVALID_REQUEST, `Invalid timeoutMs: ${timeoutMs}`, { url: request.url });
    }

    // One timer for the whole attempt, redirects included
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);
    const onAbort = () => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      for (let redirects = 0; ; ) {
        let response: TransportResponse;
        try {
          response = await this.transport.send(
            { method, url, headers: { ...headers }, body, proxyUrl: proxy?.url ?? null, timeoutMs },
            controller.signal
          );
        } catch (error: unknown) {
          if (timedOut) {
            throw new CrawlError(CrawlErrorKind.TIMEOUT, `Request timed out after ${timeoutMs}ms: ${url}`, {
              cause: error,
            });
          }
          if (signal?.aborted) {
            throw new CrawlError(CrawlErrorKind.CANCELLED, `Request cancelled: ${url}`, { cause: error });
          }
          throw classifyError(error, { viaProxy: proxy !== null });
        }

        if (proxy && response.status === PROXY_AUTH_REQUIRED) {
          throw new CrawlError(CrawlErrorKind.PROXY_FAILURE, 'Proxy authentication required', {
            statusCode: response.status,
            url,
          });
        }

        const location = response.headers['location'];
        if (followRedirects && REDIRECT_STATUSES.has(response.status) && location) {
          if (redirects >= this.config.maxRedirects) {
            throw new CrawlError(
              CrawlErrorKind.REDIRECT_LIMIT_EXCEEDED,
              `Exceeded ${this.config.maxRedirects} redirects starting from ${request.url}`,
              { statusCode: response.status, url }
            );
          }
          const next = resolveRedirect(location, url);
          if (new URL(next).origin !== new URL(url).origin) {
            deleteHeader(headers, 'cookie');
            deleteHeader(headers, 'authorization');
            deleteHeader(headers, 'proxy-authorization');
          }
          url = next;
          redirects++;

          if (
            (response.status === 303 && method !== 'HEAD') ||
            ((response.status === 301 || response.status === 302) && method !== 'GET' && method !== 'HEAD')
          ) {
            method = 'GET';
            body = undefined;
            deleteHeader(headers, 'content-type');
            deleteHeader(headers, 'content-length');
          }
          continue;
        }

        if (response.status < 200 || response.status >= 300) {
          throw new CrawlError(CrawlErrorKind.HTTP_STATUS, `HTTP ${response.status} from ${url}`, {
            statusCode: response.status,
            url,
          });
        }

        this.reportOutcome(proxy, null);
        return {
          status: response.status,
          headers: response.headers,
          body: response.body,
          finalUrl: url,
          redirects,
        };
      }
    } catch (error: unknown) {
      const failure = classifyError(error, { viaProxy: proxy !== null });
      this.reportOutcome(proxy, failure);
      throw failure;
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }
  }

  /**
   * Config defaults < User-Agent < request headers, names compared case-insensitively
   */
  mergeHeaders(request: Readonly<CrawlRequest>): Record<string, string> {
    const headers: Record<string, string> = {};
    const assign = (source: Readonly<Record<string, string>> | undefined) => {
      for (const [name, value] of Object.entries(source ?? {})) {
        deleteHeader(headers, name);
        headers[name] = value;
      }
    };

    assign(this.config.defaultHeaders);
    assign({ 'User-Agent': this.config.userAgent });
    assign(request.headers);

    const cookie = serializeCookies({ ...this.config.defaultCookies, ...request.cookies });
    if (cookie) {
      const existing = headerName(headers, 'cookie');
      if (existing) {
        headers[existing] = `${headers[existing]}; ${cookie}`;
      } else {
        headers['Cookie'] = cookie;
      }
    }

    return headers;
  }

  /**
   * A received response is a proxy success unless it is a 407; connection failures and timeouts are proxy failures
   */
  private reportOutcome(proxy: Readonly<ProxyRecord> | null, failure: CrawlError | null): void {
    if (!proxy || !this.proxyPool) {
      return;
    }

    if (!failure) {
      this.proxyPool.reportSuccess(proxy);
      return;
    }

    switch (failure.kind) {
      case CrawlErrorKind.PROXY_FAILURE:
      case CrawlErrorKind.CONNECTION_FAILURE:
      case CrawlErrorKind.DNS_FAILURE:
      case CrawlErrorKind.TIMEOUT:
        this.proxyPool.reportFailure(proxy, failure.message);
        break;
      case CrawlErrorKind.HTTP_STATUS:
      case CrawlErrorKind.REDIRECT_LIMIT_EXCEEDED:
        this.proxyPool.reportSuccess(proxy);
        break;
      default:
        break;
    }
  }
}

/**
 * Absolute http(s) URL with `params` appended to the query string
 */
export function buildRequestUrl(request: Readonly<CrawlRequest>): string {
  let url: URL;
  try {
    url = new URL(request.url);
  } catch (error: unknown) {
    throw new CrawlError(CrawlErrorKind.INVALID_URL, `Invalid URL: ${request.url}`, { cause: error });
  }

  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new CrawlError(CrawlErrorKind.INVALID_URL, `Unsupported URL scheme: ${url.protocol}`);
  }

  for (const [name, value] of Object.entries(request.params ?? {})) {
    url.searchParams.append(name, value);
  }

  return url.href;
}

function resolveRedirect(location: string, currentUrl: string): string {
  let next: URL;
  try {
    next = new URL(location, currentUrl);
  } catch (error: unknown) {
    throw new CrawlError(CrawlErrorKind.INVALID_URL, `Invalid redirect location: ${location}`, { cause: error });
  }
  if (next.protocol !== 'http:' && next.protocol !== 'https:') {
    throw new CrawlError(CrawlErrorKind.INVALID_URL, `Redirect to unsupported scheme: ${next.protocol}`);
  }
  return next.href;
}

function encodeBody(data: CrawlRequest['data'], headers: Record<string, string>): string | undefined {
  if (data === undefined) {
    return undefined;
  }
  if (typeof data === 'string') {
    return data;
  }
  if (!headerName(headers, 'content-type')) {
    headers['Content-Type'] = 'application/json';
  }
  return JSON.stringify(data);
}

export function serializeCookies(cookies: Readonly<Record<string, string>>): string {
  return Object.entries(cookies)
    .map(([name, value]) => `${name}=${value}`)
    .join('; ');
}

function headerName(headers: Record<string, string>, name: string): string | undefined {
  const lower = name.toLowerCase();
  return Object.keys(headers).find((key) => key.toLowerCase() === lower);
}

function deleteHeader(headers: Record<string, string>, name: string): void {
  const existing = headerName(headers, name);
  if (existing !== undefined) {
    delete headers[existing];
  }
}
