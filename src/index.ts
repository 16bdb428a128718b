/**
 * lintkit, a rule engine for Swift source with detection, persistent correction
 * and a self-validating example catalog.
 *
 * This is the main entry point for the library.
 */

import { loadConfig, type LoadConfigOptions } from './config/loader.js';
import type { LintConfig } from './config/types.js';
import type { RuleRegistry } from './catalog/RuleRegistry.js';
import type { RuleImplementation } from './engine/types.js';
import { createLogger, type Logger } from './logging/logger.js';
import { loadBuiltinRegistry } from './rules/index.js';
import { LintRunner } from './runner/LintRunner.js';

// Types
export * from './types/index.js';

// Syntax tree, parser and location conversion
export * from './syntax/index.js';

// Suppression regions
export * from './regions/types.js';
export { CommandScanner } from './regions/CommandScanner.js';
export { DisabledRegionResolver } from './regions/DisabledRegionResolver.js';

// Configuration
export * from './config/index.js';

// Engines
export * from './engine/index.js';

// Rule catalog
export * from './catalog/index.js';

// Bundled rules
export * from './rules/index.js';

// Runner
export * from './runner/LintRunner.js';

// Logging
export * from './logging/logger.js';

export interface LintKit {
  config: LintConfig;
  registry: RuleRegistry;
  runner: LintRunner;
  logger: Logger;
}

export interface CreateLintKitOptions extends Omit<LoadConfigOptions, 'logger'> {
  /** Already-loaded configuration; skips reading the file */
  config?: LintConfig;
  catalogPath?: string;
  extraRules?: readonly RuleImplementation[];
  /** Replay catalog examples while loading (default: true) */
  verifyExamples?: boolean;
  logger?: Logger;
}

/**
 * Load configuration and the rule catalog, and build a runner.
 */
export async function createLintKit(options: CreateLintKitOptions = {}): Promise<LintKit> {
  const { config: preloaded, catalogPath, extraRules, verifyExamples, logger: providedLogger, ...loadOptions } = options;
  const config = preloaded ?? (await loadConfig({ ...loadOptions, ...(providedLogger ? { logger: providedLogger } : {}) }));
  const logger = providedLogger ?? createLogger({ level: config.logLevel });

  const registry = await loadBuiltinRegistry({
    logger,
    ...(catalogPath === undefined ? {} : { catalogPath }),
    ...(extraRules === undefined ? {} : { extraRules }),
    ...(verifyExamples === undefined ? {} : { verifyExamples }),
  });

  const runner = new LintRunner(registry, config, logger);
  logger.info({ rules: registry.size }, 'lintkit initialized');
  return { config, registry, runner, logger };
}
