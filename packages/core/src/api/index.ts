/**
 * MediaWiki API
 */

export * from './types.js';
export * from './client.js';
export * from './url.js';
