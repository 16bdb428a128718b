/**
 * Bundled rules.
 */

import { loadCatalog } from '../catalog/CatalogLoader.js';
import { assertCatalogValid } from '../catalog/ExampleHarness.js';
import { RuleRegistry } from '../catalog/RuleRegistry.js';
import type { RuleImplementation } from '../engine/types.js';
import type { Logger } from '../logging/logger.js';
import { strongIBOutlet } from './lint/StrongIBOutletRule.js';
import { emptyEnumArguments } from './style/EmptyEnumArgumentsRule.js';

export { strongIBOutlet, emptyEnumArguments };

/**
 * Every bundled implementation, in registration order.
 */
export const BUILTIN_RULES: readonly RuleImplementation[] = [strongIBOutlet, emptyEnumArguments];

export interface BuiltinRegistryOptions {
  /** Catalog directory (default: the bundled `rules/`) */
  catalogPath?: string;
  /** Extra implementations, paired with catalog files like the bundled ones */
  extraRules?: readonly RuleImplementation[];
  /** Replay every catalog example before registering (default: true) */
  verifyExamples?: boolean;
  logger?: Logger;
}

/**
 * Load the catalog, check it against its examples, register every rule and
 * seal the registry. Throws CatalogValidationError for the first failing
 * example.
 */
export async function loadBuiltinRegistry(options: BuiltinRegistryOptions = {}): Promise<RuleRegistry> {
  const rules = await loadCatalog({
    implementations: [...BUILTIN_RULES, ...(options.extraRules ?? [])],
    ...(options.catalogPath === undefined ? {} : { basePath: options.catalogPath }),
    ...(options.logger === undefined ? {} : { logger: options.logger }),
  });
  if (options.verifyExamples ?? true) {
    assertCatalogValid(rules, options.logger === undefined ? {} : { logger: options.logger });
  }

  const registry = new RuleRegistry();
  for (const rule of rules) {
    registry.register(rule);
  }
  registry.seal();
  return registry;
}
