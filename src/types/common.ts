/**
 * Common type definitions for lintkit.
 *
 * These types are shared by the catalog, the configuration model and the
 * engines. They carry no behaviour.
 */

/**
 * Violation severity levels.
 */
export type Severity = 'warning' | 'error';

export const SEVERITIES: readonly Severity[] = ['warning', 'error'];

/**
 * Rule categories.
 */
export type RuleKind = 'lint' | 'style' | 'idiomatic' | 'performance';

export const RULE_KINDS: readonly RuleKind[] = ['lint', 'style', 'idiomatic', 'performance'];

/**
 * Stable rule identifiers: lowercase words joined by underscores.
 */
export const RULE_IDENTIFIER_PATTERN = /^[a-z][a-z0-9_]*$/;

/**
 * Where an example was declared, for failure attribution.
 */
export interface SourceOrigin {
  /** Catalog file the example came from */
  file: string;
  /** One-based line of the example entry */
  line: number;
}
