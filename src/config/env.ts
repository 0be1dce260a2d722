import dotenv from 'dotenv';
import { CrawlerConfigError } from '../lib/crawler/crawler.errors';
import type { CrawlerConfig, LogLevel } from '../lib/crawler/crawler.types';
import { ExtractionStrategyType } from '../lib/extraction/extraction.types';

dotenv.config();

type EnvSource = Record<string, string | undefined>;

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];
const STRATEGIES: readonly string[] = Object.values(ExtractionStrategyType);

/**
 * CRAWLER_* variables. Unset variables stay undefined so crawler defaults apply.
 */
export function readCrawlerEnv(source: EnvSource = process.env) {
  return {
    // Concurrency and HTTP
    MAX_CONCURRENT_REQUESTS: intVar(source.CRAWLER_MAX_CONCURRENT_REQUESTS),
    EXTRACTION_STRATEGY: source.CRAWLER_EXTRACTION_STRATEGY || undefined,
    USER_AGENT: source.CRAWLER_USER_AGENT || undefined,
    SSL_VERIFY: boolVar(source.CRAWLER_SSL_VERIFY),
    FOLLOW_REDIRECTS: boolVar(source.CRAWLER_FOLLOW_REDIRECTS),
    MAX_REDIRECTS: intVar(source.CRAWLER_MAX_REDIRECTS),
    TIMEOUT_MS: intVar(source.CRAWLER_TIMEOUT_MS),

    // Retry
    MAX_RETRIES: intVar(source.CRAWLER_MAX_RETRIES),
    BASE_DELAY_MS: intVar(source.CRAWLER_BASE_DELAY_MS),
    BACKOFF_FACTOR: floatVar(source.CRAWLER_BACKOFF_FACTOR),
    MAX_DELAY_MS: intVar(source.CRAWLER_MAX_DELAY_MS),

    // Proxies (comma-separated list or a file path)
    PROXIES: source.CRAWLER_PROXIES || undefined,
    PROXY_TEST_URL: source.CRAWLER_PROXY_TEST_URL || undefined,
    PROXY_FAILURE_THRESHOLD: intVar(source.CRAWLER_PROXY_FAILURE_THRESHOLD),

    // Extraction
    MIN_TEXT_LENGTH: intVar(source.CRAWLER_MIN_TEXT_LENGTH),

    LOG_LEVEL: source.CRAWLER_LOG_LEVEL || undefined,
  };
}

export const env = readCrawlerEnv();

/**
 * Map CRAWLER_* variables onto crawler configuration input. Without a source,
 * the variables read at startup are used.
 */
export function crawlerConfigFromEnv(source?: EnvSource): CrawlerConfig {
  const vars = source ? readCrawlerEnv(source) : env;
  // Unset fields stay undefined; the config resolver fills in their defaults
  return {
    maxConcurrentRequests: vars.MAX_CONCURRENT_REQUESTS,
    extractionStrategy: toStrategy(vars.EXTRACTION_STRATEGY),
    userAgent: vars.USER_AGENT,
    sslVerify: vars.SSL_VERIFY,
    followRedirects: vars.FOLLOW_REDIRECTS,
    maxRedirects: vars.MAX_REDIRECTS,
    timeoutMs: vars.TIMEOUT_MS,
    maxRetries: vars.MAX_RETRIES,
    baseDelayMs: vars.BASE_DELAY_MS,
    backoffFactor: vars.BACKOFF_FACTOR,
    maxDelayMs: vars.MAX_DELAY_MS,
    proxies: vars.PROXIES,
    proxyTestUrl: vars.PROXY_TEST_URL,
    proxyFailureThreshold: vars.PROXY_FAILURE_THRESHOLD,
    minTextLength: vars.MIN_TEXT_LENGTH,
    logLevel: toLogLevel(vars.LOG_LEVEL),
  };
}

function intVar(value: string | undefined): number | undefined {
  return value ? parseInt(value, 10) : undefined;
}

function floatVar(value: string | undefined): number | undefined {
  return value ? parseFloat(value) : undefined;
}

function boolVar(value: string | undefined): boolean | undefined {
  if (!value) {
    return undefined;
  }
  return ['1', 'true', 'yes', 'on'].includes(value.toLowerCase());
}

function toStrategy(value: string | undefined): ExtractionStrategyType | undefined {
  if (value === undefined) {
    return undefined;
  }
  const match = Object.values(ExtractionStrategyType).find((strategy) => strategy === value.toLowerCase());
  if (!match) {
    throw new CrawlerConfigError([`CRAWLER_EXTRACTION_STRATEGY: expected one of ${STRATEGIES.join(', ')}`]);
  }
  return match;
}

function toLogLevel(value: string | undefined): LogLevel | undefined {
  if (value === undefined) {
    return undefined;
  }
  const match = LOG_LEVELS.find((level) => level === value.toLowerCase());
  if (!match) {
    throw new CrawlerConfigError([`CRAWLER_LOG_LEVEL: expected one of ${LOG_LEVELS.join(', ')}`]);
  }
  return match;
}
