/**
 * Tests for RuleRegistry.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { strongIBOutlet } from '../rules/lint/StrongIBOutletRule.js';
import { emptyEnumArguments } from '../rules/style/EmptyEnumArgumentsRule.js';
import type { RuleImplementation } from '../engine/types.js';
import { RuleRegistry } from './RuleRegistry.js';
import { CatalogValidationError, RuleNotFoundError, type Rule } from './types.js';

function createRule(implementation: RuleImplementation, identifier = implementation.identifier): Rule {
  return {
    descriptor: {
      identifier,
      name: identifier,
      description: 'Sample description.',
      kind: 'lint',
      defaultSeverity: 'warning',
      optIn: false,
      nonTriggeringExamples: [],
      triggeringExamples: [],
      corrections: [],
    },
    implementation,
  };
}

describe('RuleRegistry', () => {
  let registry: RuleRegistry;

  beforeEach(() => {
    registry = new RuleRegistry();
  });

  it('looks rules up by identifier', () => {
    const rule = createRule(strongIBOutlet);
    registry.register(rule);

    expect(registry.lookup('strong_iboutlet')).toBe(rule);
    expect(registry.lookup('missing_rule')).toBeUndefined();
    expect(registry.has('strong_iboutlet')).toBe(true);
    expect(registry.size).toBe(1);
  });

  it('keeps registration order', () => {
    registry.register(createRule(emptyEnumArguments));
    registry.register(createRule(strongIBOutlet));

    expect(registry.rules().map(rule => rule.descriptor.identifier)).toEqual([
      'empty_enum_arguments',
      'strong_iboutlet',
    ]);
  });

  it('throws RuleNotFoundError from require', () => {
    expect(() => registry.require('missing_rule')).toThrow(RuleNotFoundError);
    expect(() => registry.require('missing_rule')).toThrow('Rule not found: missing_rule');
  });

  it('rejects duplicate identifiers', () => {
    registry.register(createRule(strongIBOutlet));

    expect(() => registry.register(createRule(strongIBOutlet))).toThrow('Rule strong_iboutlet already registered');
  });

  it('rejects malformed identifiers', () => {
    expect(() => registry.register(createRule(strongIBOutlet, 'Strong-IBOutlet'))).toThrow(
      'Invalid rule identifier: Strong-IBOutlet'
    );
  });

  it('rejects a descriptor paired with another implementation', () => {
    expect(() => registry.register(createRule(strongIBOutlet, 'other_rule'))).toThrow(
      'Rule other_rule is paired with the implementation of strong_iboutlet'
    );
  });

  it('rejects registration once sealed', () => {
    registry.seal();

    expect(registry.isSealed).toBe(true);
    expect(() => registry.register(createRule(strongIBOutlet))).toThrow(
      'Cannot register rule strong_iboutlet: registry is sealed'
    );
  });

  it('validates a rule through its examples', () => {
    registry.register(createRule(strongIBOutlet));

    expect(() => registry.validate('strong_iboutlet')).toThrow(CatalogValidationError);
    expect(() => registry.validate('strong_iboutlet')).toThrow(
      "Catalog validation failed for 'strong_iboutlet': rule has no non-triggering examples"
    );
  });
});
