/**
 * Metadata, link and image extraction from a parsed document
 */

import type { CheerioAPI } from 'cheerio';
import { normalizeWhitespace } from '../processing/text.processor';
import type { PageMetadata } from './extraction.types';

// Output key -> selector, in output order
const META_SELECTORS: ReadonlyArray<readonly [string, string]> = [
  ['description', 'meta[name="description" i]'],
  ['keywords', 'meta[name="keywords" i]'],
  ['author', 'meta[name="author" i]'],
  ['og:title', 'meta[property="og:title"]'],
  ['og:description', 'meta[property="og:description"]'],
  ['og:image', 'meta[property="og:image"]'],
];

const SKIPPED_SCHEMES = /^(javascript|mailto|tel|data|about|blob):/i;

export function extractMetadata($: CheerioAPI): PageMetadata {
  const metadata: PageMetadata = {};

  const title = normalizeWhitespace($('title').first().text());
  if (title) {
    metadata.title = title;
  }

  for (const [key, selector] of META_SELECTORS) {
    const content = $(selector).first().attr('content')?.trim();
    if (content) {
      metadata[key] = content;
    }
  }

  return metadata;
}

/**
 * Effective base for relative URLs, honoring <base href>
 */
export function documentBaseUrl($: CheerioAPI, pageUrl: string): string {
  const baseHref = $('base[href]').first().attr('href')?.trim();
  if (!baseHref) {
    return pageUrl;
  }
  return resolveUrl(baseHref, pageUrl) ?? pageUrl;
}

/**
 * Absolute http(s) URL without fragment, or null when the reference is not a page/resource URL
 */
export function resolveUrl(reference: string, baseUrl: string): string | null {
  const value = reference.trim();
  if (!value || value.startsWith('#') || SKIPPED_SCHEMES.test(value)) {
    return null;
  }

  try {
    const url = new URL(value, baseUrl);
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      return null;
    }
    url.hash = '';
    return url.href;
  } catch {
    return null;
  }
}

export function extractLinks($: CheerioAPI, baseUrl: string): string[] {
  return collectUrls($, 'a[href]', 'href', baseUrl);
}

export function extractImages($: CheerioAPI, baseUrl: string): string[] {
  return collectUrls($, 'img[src]', 'src', baseUrl);
}

function collectUrls($: CheerioAPI, selector: string, attribute: string, baseUrl: string): string[] {
  const seen = new Set<string>();
  const urls: string[] = [];

  $(selector).each((_, element) => {
    const value = $(element).attr(attribute);
    const url = value ? resolveUrl(value, baseUrl) : null;
    if (url && !seen.has(url)) {
      seen.add(url);
      urls.push(url);
    }
  });

  return urls;
}
