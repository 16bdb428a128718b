/**
 * Tests for LintRunner.
 */

import { describe, it, expect, beforeAll } from 'vitest';
import { z } from 'zod';
import { RuleRegistry } from '../catalog/RuleRegistry.js';
import { DEFAULT_CONFIG, type LintConfig } from '../config/types.js';
import { defineRule } from '../engine/defineRule.js';
import { AnalysisCancelledError } from '../engine/errors.js';
import type { RuleImplementation, VisitHandler } from '../engine/types.js';
import { loadBuiltinRegistry } from '../rules/index.js';
import { LintRunner } from './LintRunner.js';

const source = 'class C { @IBOutlet weak var label: UILabel? }\nswitch foo { case .bar(_): break }';
const corrected = 'class C { @IBOutlet var label: UILabel? }\nswitch foo { case .bar: break }';

/** Fails outside its handlers, the way a stack overflow in the walk does. */
const overflowingRule: RuleImplementation = {
  identifier: 'overflowing_rule',
  correctable: true,
  parseParameters: () => ({ success: true, parameters: {} }),
  bind: () => ({
    visit: {
      get SourceFile(): VisitHandler {
        throw new RangeError('Maximum call stack size exceeded');
      },
    },
    rewrite: {},
  }),
};

function withRule(base: RuleRegistry, implementation: RuleImplementation): RuleRegistry {
  const registry = new RuleRegistry();
  for (const rule of base.rules()) {
    registry.register(rule);
  }
  registry.register({
    descriptor: {
      identifier: implementation.identifier,
      name: implementation.identifier,
      description: 'Sample description.',
      kind: 'lint',
      defaultSeverity: 'error',
      optIn: false,
      nonTriggeringExamples: [],
      triggeringExamples: [],
      corrections: [],
    },
    implementation,
  });
  return registry;
}

function config(overrides: Partial<LintConfig> = {}): LintConfig {
  return { ...DEFAULT_CONFIG, rules: { strong_iboutlet: { enabled: true } }, ...overrides };
}

describe('LintRunner', () => {
  let registry: RuleRegistry;

  beforeAll(async () => {
    registry = await loadBuiltinRegistry();
  });

  describe('lintFile', () => {
    it('reports violations of every active rule in position order', () => {
      const runner = new LintRunner(registry, config());

      const report = runner.lintFile({ path: 'Sources/App/C.swift', text: source });

      expect(report.violations.map(v => [v.ruleId, v.position])).toEqual([
        ['strong_iboutlet', 20],
        ['empty_enum_arguments', 69],
      ]);
      expect(report.summary).toEqual({ errors: 0, warnings: 2, corrections: 0 });
      expect(report.parseFailure).toBeNull();
      expect(report.skippedRules).toEqual([]);
    });

    it('skips opt-in rules that are not enabled', () => {
      const runner = new LintRunner(registry, { ...DEFAULT_CONFIG });

      const report = runner.lintFile({ path: 'C.swift', text: source });

      expect(report.violations.map(v => v.ruleId)).toEqual(['empty_enum_arguments']);
    });

    it('applies file-scoped overrides', () => {
      const runner = new LintRunner(
        registry,
        config({ overrides: [{ paths: ['Sources/Legacy'], rules: { empty_enum_arguments: { enabled: false } } }] })
      );

      const legacy = runner.lintFile({ path: 'Sources/Legacy/C.swift', text: source });
      const app = runner.lintFile({ path: 'Sources/App/C.swift', text: source });

      expect(legacy.violations.map(v => v.ruleId)).toEqual(['strong_iboutlet']);
      expect(app.violations).toHaveLength(2);
    });

    it('records a parse failure instead of throwing', () => {
      const runner = new LintRunner(registry, config());

      const report = runner.lintFile({ path: 'Broken.swift', text: 'let s = "open' });

      expect(report.parseFailure).toEqual({ message: 'Unterminated string literal (offset 8)', offset: 8 });
      expect(report.violations).toEqual([]);
    });

    it('skips a crashing rule and keeps the others', () => {
      const withCrash = new RuleRegistry();
      for (const rule of registry.rules()) {
        withCrash.register(rule);
      }
      withCrash.register({
        descriptor: {
          identifier: 'crashing_rule',
          name: 'Crashing Rule',
          description: 'Always fails.',
          kind: 'lint',
          defaultSeverity: 'error',
          optIn: false,
          nonTriggeringExamples: [],
          triggeringExamples: [],
          corrections: [],
        },
        implementation: defineRule({
          identifier: 'crashing_rule',
          parameters: z.object({}).strict(),
          visit: () => ({
            SourceFile: () => {
              throw new Error('boom');
            },
          }),
        }),
      });
      const runner = new LintRunner(withCrash, config());

      const report = runner.lintFile({ path: 'C.swift', text: source });

      expect(report.skippedRules).toEqual([{ ruleId: 'crashing_rule', reason: "Rule 'crashing_rule' failed: boom" }]);
      expect(report.violations).toHaveLength(2);
    });
  });

  describe('rule failures outside handlers', () => {
    const reason = "Rule 'overflowing_rule' failed: Maximum call stack size exceeded";

    it('skips the rule while linting', () => {
      const runner = new LintRunner(withRule(registry, overflowingRule), config());

      const report = runner.lintFile({ path: 'C.swift', text: source });

      expect(report.skippedRules).toEqual([{ ruleId: 'overflowing_rule', reason }]);
      expect(report.violations.map(v => v.ruleId)).toEqual(['strong_iboutlet', 'empty_enum_arguments']);
    });

    it('skips the rule while correcting', () => {
      const runner = new LintRunner(withRule(registry, overflowingRule), config());

      const report = runner.correctFile({ path: 'C.swift', text: source });

      expect(report.skippedRules).toEqual([{ ruleId: 'overflowing_rule', reason }]);
      expect(report.correctedText).toBe(corrected);
    });
  });

  describe('correctFile', () => {
    it('corrects to a fixed point and reports what remains', () => {
      const runner = new LintRunner(registry, config());

      const report = runner.correctFile({ path: 'C.swift', text: source });

      expect(report.correctedText).toBe(corrected);
      expect(report.corrections.map(c => c.ruleId)).toEqual(['strong_iboutlet', 'empty_enum_arguments']);
      expect(report.violations).toEqual([]);
      expect(report.converged).toBe(true);
      expect(report.summary).toEqual({ errors: 0, warnings: 0, corrections: 2 });
    });

    it('leaves suppressed code untouched', () => {
      const runner = new LintRunner(registry, config());
      const text = '// lintkit:disable all\n' + source;

      const report = runner.correctFile({ path: 'C.swift', text });

      expect(report.correctedText).toBe(text);
      expect(report.corrections).toEqual([]);
    });
  });

  describe('run', () => {
    it('passes when only warnings remain', () => {
      const runner = new LintRunner(registry, config());

      const result = runner.run([{ path: 'C.swift', text: source }]);

      expect(result.status).toBe('passed');
      expect(result.summary).toEqual({
        files: 1,
        errors: 0,
        warnings: 2,
        corrections: 0,
        parseFailures: 0,
        skippedRules: 0,
      });
    });

    it('fails on an error-severity violation', () => {
      const runner = new LintRunner(
        registry,
        config({ rules: { strong_iboutlet: { enabled: true, severity: 'error' } } })
      );

      const result = runner.run([{ path: 'C.swift', text: source }]);

      expect(result.status).toBe('failed');
      expect(result.summary.errors).toBe(1);
    });

    it('fails on a parse failure and still processes the other files', () => {
      const runner = new LintRunner(registry, config());

      const result = runner.run([
        { path: 'Broken.swift', text: 'a }' },
        { path: 'C.swift', text: source },
      ]);

      expect(result.status).toBe('failed');
      expect(result.files.map(file => file.parseFailure?.offset ?? null)).toEqual([2, null]);
      expect(result.files[1]?.violations).toHaveLength(2);
    });

    it('records a file nested too deeply to parse and reports the others', () => {
      const runner = new LintRunner(registry, config());
      const nested = 'let x = ' + '('.repeat(20000) + '1' + ')'.repeat(20000);

      const result = runner.run([
        { path: 'Nested.swift', text: nested },
        { path: 'C.swift', text: source },
      ]);

      expect(result.status).toBe('failed');
      expect(result.files[0]?.parseFailure?.message).toMatch(/^Nesting too deep to parse \(offset \d+\)$/);
      expect(result.files[1]?.violations.map(v => v.ruleId)).toEqual(['strong_iboutlet', 'empty_enum_arguments']);
      expect(result.summary.parseFailures).toBe(1);
    });

    it('corrects every file with fix', () => {
      const runner = new LintRunner(registry, config());

      const result = runner.run([{ path: 'C.swift', text: source }], { fix: true });

      expect(result.status).toBe('passed');
      expect(result.files[0]?.correctedText).toBe(corrected);
      expect(result.summary.corrections).toBe(2);
    });

    it('stops when cancelled', () => {
      const runner = new LintRunner(registry, config());
      const controller = new AbortController();
      controller.abort();

      expect(() => runner.run([{ path: 'C.swift', text: source }], { signal: controller.signal })).toThrow(
        AnalysisCancelledError
      );
    });
  });
});
