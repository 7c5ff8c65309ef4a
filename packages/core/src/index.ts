/**
 * @wikiport/core - Core library for wikiport
 *
 * Wikitext tokenizer, markup-preserving translation pipeline, publish
 * guard, MediaWiki API client, storage and draft preview.
 */

export const VERSION = '0.1.0';

export * from './api/index.js';
export * from './config/index.js';
export * from './parser/index.js';
export * from './translate/index.js';
export * from './publish/index.js';
export * from './preview/index.js';
export * from './drafts/index.js';
export * from './storage/index.js';
