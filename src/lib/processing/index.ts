/**
 * Content Processing
 * Main export file for content processing
 */

export * from './markdown.processor';
export * from './text.processor';
