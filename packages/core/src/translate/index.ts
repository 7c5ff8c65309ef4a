/**
 * Markup-preserving translation
 */

export * from './placeholders.js';
export * from './batching.js';
export * from './adapter.js';
export * from './reassemble.js';
export * from './libretranslate.js';
export * from './pipeline.js';
