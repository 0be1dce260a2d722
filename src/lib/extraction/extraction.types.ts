/**
 * Extraction Types
 * Type definitions for the HTML extraction pipeline
 */

import type { CheerioAPI, Cheerio } from 'cheerio';
import type { AnyNode } from 'domhandler';

/**
 * Extraction strategy type enumeration
 */
export enum ExtractionStrategyType {
  HTML = 'html',
  CONTENT = 'content',
  MARKDOWN = 'markdown',
}

/**
 * Head metadata: title, description, keywords, author and Open Graph fields
 */
export type PageMetadata = Record<string, string>;

/**
 * Extraction result - normalized representation of one page
 */
export interface ExtractionResult {
  strategy: ExtractionStrategyType;
  content: string;
  metadata: PageMetadata;
  /** Absolute, de-duplicated, document order. Absent when link extraction is off */
  links?: string[];
  /** Absolute, de-duplicated, document order. Absent when image extraction is off */
  images?: string[];
}

export interface ExtractionOptions {
  defaultStrategy?: ExtractionStrategyType;
  stripScripts?: boolean;
  stripStyles?: boolean;
  stripComments?: boolean;
  stripNav?: boolean;
  stripHeaders?: boolean;
  stripFooters?: boolean;
  /** Text blocks shorter than this are discarded */
  minTextLength?: number;
  extractMetadata?: boolean;
  extractLinks?: boolean;
  extractImages?: boolean;
  /** Input beyond this many characters is truncated before parsing */
  maxHtmlBytes?: number;
}

export type ResolvedExtractionOptions = Readonly<Required<ExtractionOptions>>;

/**
 * Cleaned document handed to a strategy
 */
export interface ExtractionContext {
  $: CheerioAPI;
  /** Main content root: main, article, or body */
  root: Cheerio<AnyNode>;
  baseUrl: string;
  options: ResolvedExtractionOptions;
}

/**
 * Produces the content string for one strategy from a cleaned document
 */
export interface ContentStrategy {
  readonly type: ExtractionStrategyType;
  render(context: ExtractionContext): string;
}
