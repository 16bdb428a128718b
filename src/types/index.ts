/**
 * Type exports for lintkit.
 */

export * from './common.js';
