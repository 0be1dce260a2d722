/**
 * Extraction System
 * Main export file for the extraction pipeline and strategies
 */

export * from './extraction.types';
export * from './extraction.pipeline';
export * from './strategies';
export { cleanDocument, dropShortBlocks, findMainContent } from './extraction.cleaner';
export { documentBaseUrl, extractImages, extractLinks, extractMetadata, resolveUrl } from './extraction.metadata';
