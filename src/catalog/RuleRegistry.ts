/**
 * RuleRegistry — process-wide mapping from rule identifier to rule.
 *
 * Rules are registered once at start-up; `seal()` freezes the registry and
 * later registrations fail.
 */

import { RULE_IDENTIFIER_PATTERN } from '../types/common.js';
import type { RuleLookup } from '../config/ConfigResolver.js';
import { assertRuleValid, type HarnessOptions } from './ExampleHarness.js';
import { RuleNotFoundError, type Rule } from './types.js';

export class RuleRegistry implements RuleLookup {
  private readonly entries = new Map<string, Rule>();
  private sealed = false;

  /**
   * Register a rule.
   */
  register(rule: Rule): void {
    const id = rule.descriptor.identifier;

    if (this.sealed) {
      throw new Error(`Cannot register rule ${id}: registry is sealed`);
    }
    if (!RULE_IDENTIFIER_PATTERN.test(id)) {
      throw new Error(`Invalid rule identifier: ${id}`);
    }
    if (rule.implementation.identifier !== id) {
      throw new Error(`Rule ${id} is paired with the implementation of ${rule.implementation.identifier}`);
    }
    if (this.entries.has(id)) {
      throw new Error(`Rule ${id} already registered`);
    }

    this.entries.set(id, rule);
  }

  lookup(id: string): Rule | undefined {
    return this.entries.get(id);
  }

  /**
   * Like `lookup`, but throws RuleNotFoundError for an unknown identifier.
   */
  require(id: string): Rule {
    const rule = this.entries.get(id);
    if (rule === undefined) {
      throw new RuleNotFoundError(id);
    }
    return rule;
  }

  has(id: string): boolean {
    return this.entries.has(id);
  }

  /**
   * All rules in registration order.
   */
  rules(): readonly Rule[] {
    return Array.from(this.entries.values());
  }

  get size(): number {
    return this.entries.size;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  seal(): void {
    this.sealed = true;
  }

  /**
   * Structural checks plus a replay of the rule's examples. Throws
   * CatalogValidationError on the first failure.
   */
  validate(id: string, options: HarnessOptions = {}): void {
    assertRuleValid(this.require(id), options);
  }
}
