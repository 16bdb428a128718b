/**
 * Config module exports.
 */

export * from './types.js';
export * from './loader.js';
export * from './ConfigResolver.js';
