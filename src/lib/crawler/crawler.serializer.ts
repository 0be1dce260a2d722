/**
 * Crawl Response Serialization
 * Plain JSON shapes for responses handed to downstream consumers
 */

import type { CrawlResponse, CrawlResultRecord } from './crawler.types';

export function isSuccess(
  response: CrawlResponse
): response is CrawlResponse & { extracted: NonNullable<CrawlResponse['extracted']>; error: null } {
  return response.error === null && response.extracted !== null;
}

/**
 * One entry of a persisted JSON result file: `{ url, content, metadata, error }`
 */
export function toResultRecord(response: CrawlResponse): CrawlResultRecord {
  return {
    url: response.url,
    content: response.extracted ? response.extracted.content : null,
    metadata: response.extracted ? { ...response.extracted.metadata } : {},
    error: response.error ? { ...response.error } : null,
  };
}

export function toResultRecords(responses: readonly CrawlResponse[]): CrawlResultRecord[] {
  return responses.map(toResultRecord);
}
