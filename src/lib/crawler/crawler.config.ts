/**
 * Crawler Configuration
 * Validates caller configuration and fills in defaults
 */

import { z } from 'zod';
import { ExtractionStrategyType } from '../extraction/extraction.types';
import type { ExtractionOptions } from '../extraction/extraction.types';
import { DEFAULT_MAX_HTML_BYTES } from '../extraction/extraction.pipeline';
import { DEFAULT_FAILURE_THRESHOLD, DEFAULT_REVALIDATE_AFTER_MS } from '../proxy/proxy.pool';
import { DEFAULT_PROBE_TIMEOUT_MS, DEFAULT_PROXY_TEST_URL } from '../proxy/proxy.health';
import { CrawlerConfigError } from './crawler.errors';
import type { CrawlerConfig, ResolvedCrawlerConfig } from './crawler.types';
import type { RetryOptions } from './retry.policy';

export const DEFAULT_USER_AGENT = 'crawl-engine/1.0';

/** Longest delay a Node timer honors; larger values fire immediately */
export const MAX_TIMER_MS = 2_147_483_647;

const stringMap = z.record(z.string());
const positiveInt = z.number().int().positive();
const nonNegativeInt = z.number().int().nonnegative();
const nonNegative = z.number().nonnegative();
const timerDuration = z.number().finite().nonnegative().max(MAX_TIMER_MS);
const timeout = z.number().finite().positive().max(MAX_TIMER_MS);

const crawlerConfigSchema = z
  .object({
    maxConcurrentRequests: positiveInt.default(5),
    extractionStrategy: z.nativeEnum(ExtractionStrategyType).default(ExtractionStrategyType.MARKDOWN),
    defaultHeaders: stringMap.default({}),
    defaultCookies: stringMap.default({}),
    userAgent: z.string().min(1).default(DEFAULT_USER_AGENT),
    sslVerify: z.boolean().default(true),
    followRedirects: z.boolean().default(true),
    maxRedirects: nonNegativeInt.default(10),
    timeoutMs: timeout.default(30000),

    // Retry
    maxRetries: positiveInt.default(3),
    baseDelayMs: timerDuration.default(1000),
    backoffFactor: z.number().min(1).default(2),
    maxDelayMs: timerDuration.default(30000),

    // Proxies
    proxies: z.union([z.array(z.string()), z.string()]).default([]),
    proxyTestUrl: z.string().url().default(DEFAULT_PROXY_TEST_URL),
    proxyProbeTimeoutMs: timeout.default(DEFAULT_PROBE_TIMEOUT_MS),
    proxyFailureThreshold: positiveInt.default(DEFAULT_FAILURE_THRESHOLD),
    proxyRevalidateAfterMs: nonNegative.default(DEFAULT_REVALIDATE_AFTER_MS),
    validateProxiesOnSetup: z.boolean().default(true),

    // Extraction
    stripScripts: z.boolean().default(true),
    stripStyles: z.boolean().default(true),
    stripComments: z.boolean().default(true),
    stripNav: z.boolean().default(false),
    stripHeaders: z.boolean().default(false),
    stripFooters: z.boolean().default(false),
    minTextLength: nonNegativeInt.default(10),
    extractMetadata: z.boolean().default(true),
    extractLinks: z.boolean().default(true),
    extractImages: z.boolean().default(true),
    maxHtmlBytes: positiveInt.default(DEFAULT_MAX_HTML_BYTES),

    logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
  })
  .strict();

/**
 * Validate `input` and apply defaults. The result is deep-frozen.
 */
export function resolveCrawlerConfig(input: CrawlerConfig = {}): ResolvedCrawlerConfig {
  const parsed = crawlerConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new CrawlerConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`)
    );
  }
  return deepFreeze(parsed.data);
}

export const DEFAULT_CRAWLER_CONFIG: ResolvedCrawlerConfig = resolveCrawlerConfig();

export function retryOptionsFrom(config: ResolvedCrawlerConfig): RetryOptions {
  return {
    maxAttempts: config.maxRetries,
    baseDelayMs: config.baseDelayMs,
    backoffFactor: config.backoffFactor,
    maxDelayMs: config.maxDelayMs,
    sslVerify: config.sslVerify,
  };
}

export function extractionOptionsFrom(config: ResolvedCrawlerConfig): ExtractionOptions {
  return {
    defaultStrategy: config.extractionStrategy,
    stripScripts: config.stripScripts,
    stripStyles: config.stripStyles,
    stripComments: config.stripComments,
    stripNav: config.stripNav,
    stripHeaders: config.stripHeaders,
    stripFooters: config.stripFooters,
    minTextLength: config.minTextLength,
    extractMetadata: config.extractMetadata,
    extractLinks: config.extractLinks,
    extractImages: config.extractImages,
    maxHtmlBytes: config.maxHtmlBytes,
  };
}

function deepFreeze<T extends object>(value: T): T {
  const nested: unknown[] = Object.values(value);
  for (const child of nested) {
    if (typeof child === 'object' && child !== null && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  Object.freeze(value);
  return value;
}
