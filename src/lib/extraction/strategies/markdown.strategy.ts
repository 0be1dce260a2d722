/**
 * Markdown Strategy
 * Converts the cleaned main content to Markdown
 */

import { MarkdownProcessor } from '../../processing/markdown.processor';
import { documentBaseUrl, resolveUrl } from '../extraction.metadata';
import { ContentStrategy, ExtractionContext, ExtractionStrategyType } from '../extraction.types';

// One converter per toggle combination; Turndown instances are reusable
const processors = new Map<string, MarkdownProcessor>();

function processorFor(includeLinks: boolean, includeImages: boolean): MarkdownProcessor {
  const key = `${includeLinks}:${includeImages}`;
  let processor = processors.get(key);
  if (!processor) {
    processor = new MarkdownProcessor({ includeLinks, includeImages });
    processors.set(key, processor);
  }
  return processor;
}

export const markdownStrategy: ContentStrategy = {
  type: ExtractionStrategyType.MARKDOWN,

  render({ $, root, baseUrl, options }: ExtractionContext): string {
    const base = documentBaseUrl($, baseUrl);

    if (options.extractLinks) {
      root.find('a[href]').each((_, element) => {
        const anchor = $(element);
        const url = resolveUrl(anchor.attr('href') ?? '', base);
        if (url) {
          anchor.attr('href', url);
        } else {
          anchor.removeAttr('href');
        }
      });
    }

    if (options.extractImages) {
      root.find('img[src]').each((_, element) => {
        const image = $(element);
        const url = resolveUrl(image.attr('src') ?? '', base);
        if (url) {
          image.attr('src', url);
        } else {
          image.remove();
        }
      });
    }

    const html = root
      .toArray()
      .map((node) => $.html(node))
      .join('');

    return processorFor(options.extractLinks, options.extractImages).convert(html);
  },
};
