/**
 * crawl-engine
 * Bounded-concurrency crawler with proxy rotation, retries and HTML extraction
 */

export * from './lib/crawler';
export * from './lib/proxy';
export * from './lib/extraction';
export { MarkdownProcessor, collectTextBlocks, normalizeWhitespace } from './lib/processing';
export type { MarkdownProcessorOptions } from './lib/processing';
export { createLogger, silentLogger } from './lib/logging/logger';
export type { Logger } from './lib/logging/logger';
export { crawlerConfigFromEnv } from './config/env';
