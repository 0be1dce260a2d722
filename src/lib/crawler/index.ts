/**
 * Crawler
 * Main export file for the scheduler, executor and retry policy
 */

export * from './crawler.types';
export * from './crawler.errors';
export * from './crawler.config';
export * from './crawler.serializer';
export * from './concurrency.gate';
export * from './retry.policy';
export * from './http.executor';
export * from './axios.transport';
export * from './async.crawler';
