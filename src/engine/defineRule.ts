/**
 * Turns a typed rule definition into a registry-ready implementation.
 */

import type { BoundRule, ParameterResult, RuleDefinition, RuleImplementation } from './types.js';

export function defineRule<P>(definition: RuleDefinition<P>): RuleImplementation {
  const { identifier, parameters: schema } = definition;

  return {
    identifier,
    correctable: definition.rewrite !== undefined,

    parseParameters(raw: unknown): ParameterResult {
      const result = schema.safeParse(raw ?? {});
      return result.success
        ? { success: true, parameters: result.data }
        : { success: false, issues: result.error.issues };
    },

    bind(raw: unknown): BoundRule {
      const parameters = schema.parse(raw ?? {});
      return {
        visit: definition.visit(parameters),
        rewrite: definition.rewrite?.(parameters) ?? {},
      };
    },
  };
}
