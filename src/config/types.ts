/**
 * Configuration types for lintkit.
 *
 * These types define the structure of a lintkit YAML file and the
 * per-rule configuration the resolver produces from it.
 */

import type { LogLevel } from '../logging/logger.js';
import type { Severity } from '../types/common.js';

/**
 * Per-rule options at one configuration layer. Every field is optional;
 * unset fields fall through to the layer below.
 */
export interface RuleOverride {
  severity?: Severity;
  optIn?: boolean;
  /** Explicit on/off; overrides the opt-in default */
  enabled?: boolean;
  /** Rule-specific parameters, validated by the rule's schema */
  parameters?: Record<string, unknown>;
}

/**
 * Fully resolved configuration of one rule for one file.
 */
export interface RuleConfiguration {
  severity: Severity;
  optIn: boolean;
  /** Whether the rule runs */
  enabled: boolean;
  /** Validated parameters with defaults applied */
  parameters: unknown;
}

/**
 * How to treat an invalid rule entry.
 * - abort: throw a ConfigurationError
 * - disable: log a warning and turn the rule off
 */
export type InvalidRulePolicy = 'abort' | 'disable';

/**
 * Rule entries that apply to files under the given paths.
 */
export interface FileOverride {
  paths: string[];
  /** Raw entries keyed by rule identifier */
  rules: Record<string, unknown>;
}

export interface CorrectionConfig {
  /** Bound on cross-rule correction rounds (default: 10) */
  maxIterations: number;
}

/**
 * Top-level configuration.
 */
export interface LintConfig {
  /** Log level (default: 'info') */
  logLevel: LogLevel;
  /** Invalid rule entry policy (default: 'abort') */
  onInvalidRule: InvalidRulePolicy;
  correction: CorrectionConfig;
  /** Project-wide raw entries keyed by rule identifier */
  rules: Record<string, unknown>;
  /** File-scoped layers; later entries win */
  overrides: FileOverride[];
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: LintConfig = {
  logLevel: 'info',
  onInvalidRule: 'abort',
  correction: {
    maxIterations: 10,
  },
  rules: {},
  overrides: [],
};
