/**
 * Catalog module exports.
 */

export * from './types.js';
export * from './RuleRegistry.js';
export * from './ExampleHarness.js';
export * from './CatalogLoader.js';
