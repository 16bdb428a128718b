/**
 * ExampleHarness — replays a rule's catalog examples through the detection
 * and correction engines.
 *
 * For every rule:
 *   - non-triggering examples produce no violations
 *   - triggering examples produce violations at exactly the declared
 *     locations (order-insensitive)
 *   - correcting `before` yields `after` byte for byte, and correcting
 *     `after` changes nothing
 *   - correcting `before` records as many corrections as detection finds
 *     violations in it
 *
 * Examples run with the rule forced on and the example's own override
 * applied over the rule's defaults.
 */

import { ConfigResolver, type RuleLookup } from '../config/ConfigResolver.js';
import type { RuleConfiguration, RuleOverride } from '../config/types.js';
import { CorrectionEngine } from '../engine/CorrectionEngine.js';
import { DetectionEngine } from '../engine/DetectionEngine.js';
import { SourceFile } from '../engine/SourceFile.js';
import { createSilentLogger, type Logger } from '../logging/logger.js';
import { printSyntax } from '../syntax/SyntaxTree.js';
import type { SourceLocation } from '../syntax/types.js';
import type { SourceOrigin } from '../types/common.js';
import { CatalogValidationError, type Rule } from './types.js';

export interface HarnessOptions {
  logger?: Logger;
}

export interface RuleVerification {
  ruleId: string;
  /** Examples replayed, correction pairs counted once */
  examplesRun: number;
  failures: CatalogValidationError[];
}

function formatLocations(locations: readonly SourceLocation[]): string {
  const sorted = [...locations].sort((a, b) => a.line - b.line || a.column - b.column);
  return `[${sorted.map(({ line, column }) => `${line}:${column}`).join(', ')}]`;
}

function sameLocations(actual: readonly SourceLocation[], expected: readonly SourceLocation[]): boolean {
  return formatLocations(actual) === formatLocations(expected);
}

function singleRuleLookup(rule: Rule): RuleLookup {
  return {
    lookup: id => (id === rule.descriptor.identifier ? rule : undefined),
    rules: () => [rule],
  };
}

/**
 * Checks that need no engine: example counts and correctability.
 */
export function structuralFailures(rule: Rule): CatalogValidationError[] {
  const { descriptor, implementation } = rule;
  const id = descriptor.identifier;
  const failures: CatalogValidationError[] = [];

  if (descriptor.nonTriggeringExamples.length === 0) {
    failures.push(new CatalogValidationError('rule has no non-triggering examples', id));
  }
  if (descriptor.triggeringExamples.length === 0) {
    failures.push(new CatalogValidationError('rule has no triggering examples', id));
  }
  for (const example of descriptor.triggeringExamples) {
    if (example.violations.length === 0) {
      failures.push(new CatalogValidationError('triggering example declares no violations', id, example.origin));
    }
  }
  if (!implementation.correctable) {
    for (const correction of descriptor.corrections) {
      failures.push(new CatalogValidationError('correction example on a rule that cannot correct', id, correction.origin));
    }
  }
  return failures;
}

/**
 * Replay one rule's examples. Never throws for example mismatches; they are
 * returned as failures.
 */
export function verifyRule(rule: Rule, options: HarnessOptions = {}): RuleVerification {
  const logger = options.logger ?? createSilentLogger();
  const { descriptor } = rule;
  const id = descriptor.identifier;
  const resolver = new ConfigResolver(
    singleRuleLookup(rule),
    { rules: {}, overrides: [], onInvalidRule: 'abort' },
    logger
  );
  const detection = new DetectionEngine(logger);
  const correction = new CorrectionEngine(logger);
  const failures: CatalogValidationError[] = structuralFailures(rule);
  let examplesRun = 0;

  const fail = (message: string, origin: SourceOrigin): void => {
    failures.push(new CatalogValidationError(message, id, origin));
  };

  /**
   * Run one example; a parse, configuration or rule error is a failure of
   * that example.
   */
  const attempt = (origin: SourceOrigin, run: () => void): void => {
    examplesRun++;
    try {
      run();
    } catch (err) {
      fail(err instanceof Error ? err.message : String(err), origin);
    }
  };

  const prepare = (
    code: string,
    origin: SourceOrigin,
    override: RuleOverride | undefined
  ): { file: SourceFile; configuration: RuleConfiguration } => {
    const configuration = resolver.resolve(id, {
      forceEnabled: true,
      ...(override === undefined ? {} : { example: override }),
    });
    return { file: SourceFile.parse(code, { path: origin.file }), configuration };
  };

  const detect = (file: SourceFile, configuration: RuleConfiguration): SourceLocation[] =>
    detection.detect(rule, configuration, file).violations.map(violation => violation.location);

  for (const example of descriptor.nonTriggeringExamples) {
    attempt(example.origin, () => {
      const { file, configuration } = prepare(example.code, example.origin, example.configuration);
      const found = detect(file, configuration);
      if (found.length > 0) {
        fail(`non-triggering example produced violations at ${formatLocations(found)}`, example.origin);
      }
    });
  }

  for (const example of descriptor.triggeringExamples) {
    attempt(example.origin, () => {
      const { file, configuration } = prepare(example.code, example.origin, example.configuration);
      const found = detect(file, configuration);
      if (!sameLocations(found, example.violations)) {
        fail(
          `expected violations at ${formatLocations(example.violations)} but found ${formatLocations(found)}`,
          example.origin
        );
      }
    });
  }

  for (const pair of descriptor.corrections) {
    attempt(pair.origin, () => {
      const before = prepare(pair.before, pair.origin, pair.configuration);
      const detected = detect(before.file, before.configuration);
      const corrected = correction.correct(rule, before.configuration, before.file);
      const correctedText = printSyntax(corrected.tree);
      if (correctedText !== pair.after) {
        fail(`correction produced ${JSON.stringify(correctedText)}, expected ${JSON.stringify(pair.after)}`, pair.origin);
      }
      if (corrected.corrections.length !== detected.length) {
        fail(
          `correction recorded ${corrected.corrections.length} corrections for ${detected.length} violations`,
          pair.origin
        );
      }

      const after = prepare(pair.after, pair.origin, pair.configuration);
      const again = correction.correct(rule, after.configuration, after.file);
      const againText = printSyntax(again.tree);
      if (again.corrections.length > 0 || againText !== pair.after) {
        fail(`corrected example is not a fixed point: ${JSON.stringify(againText)}`, pair.origin);
      }
    });
  }

  logger.debug({ ruleId: id, examplesRun, failures: failures.length }, 'Rule examples verified');
  return { ruleId: id, examplesRun, failures };
}

export function verifyCatalog(rules: readonly Rule[], options: HarnessOptions = {}): RuleVerification[] {
  return rules.map(rule => verifyRule(rule, options));
}

/**
 * Throw the first failure of one rule.
 */
export function assertRuleValid(rule: Rule, options: HarnessOptions = {}): void {
  const [failure] = verifyRule(rule, options).failures;
  if (failure !== undefined) throw failure;
}

/**
 * Throw the first failure across the catalog.
 */
export function assertCatalogValid(rules: readonly Rule[], options: HarnessOptions = {}): void {
  for (const verification of verifyCatalog(rules, options)) {
    const [failure] = verification.failures;
    if (failure !== undefined) throw failure;
  }
}
