/**
 * Types for rule descriptors and the example catalog.
 */

import type { RuleOverride } from '../config/types.js';
import type { RuleImplementation } from '../engine/types.js';
import type { SourceLocation } from '../syntax/types.js';
import type { RuleKind, Severity, SourceOrigin } from '../types/common.js';

/**
 * A source snippet used to exercise a rule.
 */
export interface Example {
  code: string;
  origin: SourceOrigin;
  /** Applied on top of the rule's defaults while the example runs */
  configuration?: RuleOverride;
}

/**
 * An example that must produce violations at exactly `violations`.
 */
export interface TriggeringExample extends Example {
  violations: SourceLocation[];
}

/**
 * A correction pair: correcting `before` yields `after`, and `after` is a
 * fixed point.
 */
export interface CorrectionExample {
  before: string;
  after: string;
  origin: SourceOrigin;
  configuration?: RuleOverride;
}

/**
 * Static metadata and examples for one rule.
 */
export interface RuleDescriptor {
  identifier: string;
  name: string;
  description: string;
  kind: RuleKind;
  defaultSeverity: Severity;
  optIn: boolean;
  nonTriggeringExamples: Example[];
  triggeringExamples: TriggeringExample[];
  corrections: CorrectionExample[];
}

/**
 * A registered rule: descriptor plus implementation.
 */
export interface Rule {
  readonly descriptor: RuleDescriptor;
  readonly implementation: RuleImplementation;
}

/**
 * Raised when a rule's catalog entry is malformed or its examples do not
 * match what the rule actually does.
 */
export class CatalogValidationError extends Error {
  constructor(
    message: string,
    public readonly ruleId: string,
    public readonly origin: SourceOrigin | null = null
  ) {
    const where = origin === null ? '' : ` (${origin.file}:${origin.line})`;
    super(`Catalog validation failed for '${ruleId}'${where}: ${message}`);
    this.name = 'CatalogValidationError';
  }
}

/**
 * Raised by `RuleRegistry.require` for an unknown identifier.
 */
export class RuleNotFoundError extends Error {
  constructor(public readonly ruleId: string) {
    super(`Rule not found: ${ruleId}`);
    this.name = 'RuleNotFoundError';
  }
}
