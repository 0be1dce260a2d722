/**
 * Document Cleaner
 * Removes scripts, styles, page chrome and short text blocks from a parsed document
 */

import type { CheerioAPI, Cheerio } from 'cheerio';
import { isComment } from 'domhandler';
import type { AnyNode } from 'domhandler';
import { normalizeWhitespace } from '../processing/text.processor';
import type { ResolvedExtractionOptions } from './extraction.types';

const NAV_SELECTOR = 'nav, [role="navigation"]';
const HEADER_SELECTOR = 'header, [role="banner"]';
const FOOTER_SELECTOR = 'footer, [role="contentinfo"]';

// Blocks subject to the minimum-length filter. Tables are judged by whole rows.
const TEXT_BLOCK_SELECTOR = 'p, h1, h2, h3, h4, h5, h6, li, blockquote, pre, tr';

// Main content selectors (in order of preference)
const MAIN_CONTENT_SELECTORS = ['main', 'article', 'body'];

/**
 * Mutates `$` in place
 */
export function cleanDocument($: CheerioAPI, options: ResolvedExtractionOptions): void {
  if (options.stripScripts) {
    $('script, noscript').remove();
  }
  if (options.stripStyles) {
    $('style, link[rel="stylesheet"]').remove();
  }
  if (options.stripComments) {
    $.root()
      .find('*')
      .addBack()
      .contents()
      .filter((_, node) => isComment(node))
      .remove();
  }
  if (options.stripNav) {
    $(NAV_SELECTOR).remove();
  }
  if (options.stripHeaders) {
    $(HEADER_SELECTOR).remove();
  }
  if (options.stripFooters) {
    $(FOOTER_SELECTOR).remove();
  }

  if (options.minTextLength > 0) {
    dropShortBlocks($, options.minTextLength);
  }
}

/**
 * Remove text blocks shorter than `minLength`. Blocks that carry an image are kept.
 */
export function dropShortBlocks($: CheerioAPI, minLength: number): void {
  $(TEXT_BLOCK_SELECTOR).each((_, element) => {
    const block = $(element);
    if (block.find('img').length > 0) {
      return;
    }
    if (normalizeWhitespace(block.text()).length < minLength) {
      block.remove();
    }
  });
}

export function findMainContent($: CheerioAPI): Cheerio<AnyNode> {
  for (const selector of MAIN_CONTENT_SELECTORS) {
    const element = $(selector).first();
    if (element.length > 0) {
      return element;
    }
  }
  return $.root();
}
