/**
 * Crawler Types
 * Type definitions for requests, responses and crawler configuration
 */

import type { ExtractionResult, ExtractionStrategyType } from '../extraction/extraction.types';
import type { CrawlErrorKind } from './crawler.errors';

export type HttpMethod = 'GET' | 'HEAD' | 'POST' | 'PUT' | 'PATCH' | 'DELETE' | 'OPTIONS';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type RequestBody = string | Record<string, unknown> | unknown[];

/**
 * A single page to fetch. Frozen once handed to the crawler.
 */
export interface CrawlRequest {
  url: string;
  method?: HttpMethod;
  /** Overrides config default headers (case-insensitive) */
  headers?: Record<string, string>;
  /** Overrides config default cookies */
  cookies?: Record<string, string>;
  /** Query string parameters appended to the URL */
  params?: Record<string, string>;
  data?: RequestBody;
  timeoutMs?: number;
  /**
   * Proxy address for this request only. `null` forces a direct connection
   * even when the crawler has a proxy pool.
   */
  proxy?: string | null;
  followRedirects?: boolean;
  extractionStrategy?: ExtractionStrategyType;
  /** Opaque caller data, echoed on the response */
  metadata?: Record<string, unknown>;
}

/**
 * Crawler configuration as accepted from callers. Every field is optional.
 */
export interface CrawlerConfig {
  maxConcurrentRequests?: number;
  extractionStrategy?: ExtractionStrategyType;
  defaultHeaders?: Record<string, string>;
  defaultCookies?: Record<string, string>;
  userAgent?: string;
  sslVerify?: boolean;
  followRedirects?: boolean;
  maxRedirects?: number;
  timeoutMs?: number;

  /** Total attempts per request, first try included */
  maxRetries?: number;
  baseDelayMs?: number;
  backoffFactor?: number;
  maxDelayMs?: number;

  /** Proxy addresses, a comma-separated string, or a path to a proxy file */
  proxies?: string[] | string;
  proxyTestUrl?: string;
  proxyProbeTimeoutMs?: number;
  proxyFailureThreshold?: number;
  proxyRevalidateAfterMs?: number;
  validateProxiesOnSetup?: boolean;

  stripScripts?: boolean;
  stripStyles?: boolean;
  stripComments?: boolean;
  stripNav?: boolean;
  stripHeaders?: boolean;
  stripFooters?: boolean;
  minTextLength?: number;
  extractMetadata?: boolean;
  extractLinks?: boolean;
  extractImages?: boolean;
  maxHtmlBytes?: number;

  logLevel?: LogLevel;
}

export type ResolvedCrawlerConfig = Readonly<Required<Omit<CrawlerConfig, 'proxies'>>> & {
  readonly proxies: readonly string[] | string;
};

/**
 * Serializable failure attached to a response
 */
export interface CrawlFailure {
  kind: CrawlErrorKind;
  message: string;
  statusCode?: number;
  attempts: number;
}

export interface CrawlResponse {
  request: Readonly<CrawlRequest>;
  /** Final URL after redirects, or the request URL when nothing was received */
  url: string;
  /** Final HTTP status, null when no response was ever received */
  status: number | null;
  headers: Record<string, string>;
  elapsedMs: number;
  attempts: number;
  proxy: string | null;
  extracted: ExtractionResult | null;
  error: CrawlFailure | null;
  metadata: Record<string, unknown>;
}

/**
 * Shape of one entry in a persisted JSON result file
 */
export interface CrawlResultRecord {
  url: string;
  content: string | null;
  metadata: Record<string, string>;
  error: CrawlFailure | null;
}

export interface CrawlerStats {
  inFlight: number;
  pending: number;
  completed: number;
  failed: number;
}

export interface FetchManyOptions {
  signal?: AbortSignal;
}
