/**
 * Proxy Pool
 * Main export file for proxy management
 */

export * from './proxy.types';
export * from './proxy.loader';
export * from './proxy.pool';
export * from './proxy.health';
