/**
 * Extraction Pipeline
 * Parses raw HTML, cleans it and renders it with the selected strategy
 */

import * as cheerio from 'cheerio';
import { CrawlError, CrawlErrorKind, errorMessage } from '../crawler/crawler.errors';
import { Logger, silentLogger } from '../logging/logger';
import { cleanDocument, findMainContent } from './extraction.cleaner';
import { documentBaseUrl, extractImages, extractLinks, extractMetadata } from './extraction.metadata';
import {
  ExtractionOptions,
  ExtractionResult,
  ExtractionStrategyType,
  ResolvedExtractionOptions,
} from './extraction.types';
import { STRATEGIES } from './strategies';

export const DEFAULT_MAX_HTML_BYTES = 5 * 1024 * 1024; // 5MB

export const DEFAULT_EXTRACTION_OPTIONS: ResolvedExtractionOptions = Object.freeze({
  defaultStrategy: ExtractionStrategyType.MARKDOWN,
  stripScripts: true,
  stripStyles: true,
  stripComments: true,
  stripNav: false,
  stripHeaders: false,
  stripFooters: false,
  minTextLength: 10,
  extractMetadata: true,
  extractLinks: true,
  extractImages: true,
  maxHtmlBytes: DEFAULT_MAX_HTML_BYTES,
});

// Content types the pipeline can parse; anything else is an extraction failure
const PARSEABLE_CONTENT_TYPE = /^(text\/html|application\/xhtml\+xml|text\/plain|text\/xml|application\/xml)\b/i;

export class ExtractionPipeline {
  readonly options: ResolvedExtractionOptions;
  private readonly logger: Logger;

  constructor(options: ExtractionOptions = {}, logger: Logger = silentLogger) {
    this.options = resolveExtractionOptions(options);
    this.logger = logger;
  }

  /**
   * Whether a response with this content type can go through extract()
   */
  static accepts(contentType: string | undefined): boolean {
    return !contentType || PARSEABLE_CONTENT_TYPE.test(contentType.trim());
  }

  /**
   * Identical input and options always yield an identical result.
   */
  extract(
    html: string,
    pageUrl: string,
    strategy: ExtractionStrategyType = this.options.defaultStrategy
  ): ExtractionResult {
    const renderer = STRATEGIES[strategy];
    if (!renderer) {
      throw new CrawlError(CrawlErrorKind.EXTRACTION_FAILURE, `Unknown extraction strategy: ${strategy}`);
    }
    if (typeof html !== 'string') {
      throw new CrawlError(CrawlErrorKind.EXTRACTION_FAILURE, 'Response body is not text');
    }
    if (html.includes('\u0000')) {
      throw new CrawlError(CrawlErrorKind.EXTRACTION_FAILURE, 'Response body looks binary, not HTML');
    }

    let input = html;
    if (input.length > this.options.maxHtmlBytes) {
      this.logger.warn(`HTML truncated from ${input.length} to ${this.options.maxHtmlBytes} bytes for ${pageUrl}`);
      input = input.substring(0, this.options.maxHtmlBytes);
    }

    try {
      const $ = cheerio.load(input);
      const baseUrl = documentBaseUrl($, pageUrl);

      // Head metadata and URL lists come from the document as served
      const metadata = this.options.extractMetadata ? extractMetadata($) : {};
      const links = this.options.extractLinks ? extractLinks($, baseUrl) : undefined;
      const images = this.options.extractImages ? extractImages($, baseUrl) : undefined;

      cleanDocument($, this.options);

      const content = renderer.render({
        $,
        root: findMainContent($),
        baseUrl: pageUrl,
        options: this.options,
      });

      const result: ExtractionResult = { strategy, content, metadata };
      if (links) {
        result.links = links;
      }
      if (images) {
        result.images = images;
      }
      return result;
    } catch (error: unknown) {
      throw new CrawlError(CrawlErrorKind.EXTRACTION_FAILURE, `Extraction error: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }
}

export function resolveExtractionOptions(options: ExtractionOptions = {}): ResolvedExtractionOptions {
  const defaults = DEFAULT_EXTRACTION_OPTIONS;
  return Object.freeze({
    defaultStrategy: options.defaultStrategy ?? defaults.defaultStrategy,
    stripScripts: options.stripScripts ?? defaults.stripScripts,
    stripStyles: options.stripStyles ?? defaults.stripStyles,
    stripComments: options.stripComments ?? defaults.stripComments,
    stripNav: options.stripNav ?? defaults.stripNav,
    stripHeaders: options.stripHeaders ?? defaults.stripHeaders,
    stripFooters: options.stripFooters ?? defaults.stripFooters,
    minTextLength: options.minTextLength ?? defaults.minTextLength,
    extractMetadata: options.extractMetadata ?? defaults.extractMetadata,
    extractLinks: options.extractLinks ?? defaults.extractLinks,
    extractImages: options.extractImages ?? defaults.extractImages,
    maxHtmlBytes: options.maxHtmlBytes ?? defaults.maxHtmlBytes,
  });
}
