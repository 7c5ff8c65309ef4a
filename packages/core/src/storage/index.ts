/**
 * Storage layer
 */

export * from './schema.js';
export * from './sqlite.js';
export * from './filesystem.js';
export * from './migrations.js';
