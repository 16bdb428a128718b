/**
 * Tests for CorrectionEngine.
 */

import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import type { Rule } from '../catalog/types.js';
import type { RuleConfiguration } from '../config/types.js';
import { emptyEnumArguments } from '../rules/style/EmptyEnumArgumentsRule.js';
import { strongIBOutlet } from '../rules/lint/StrongIBOutletRule.js';
import { elementAtPath, printSyntax } from '../syntax/SyntaxTree.js';
import { CorrectionEngine } from './CorrectionEngine.js';
import { defineRule } from './defineRule.js';
import { RuleExecutionError, TraversalError } from './errors.js';
import { SourceFile } from './SourceFile.js';
import type { RuleImplementation } from './types.js';

function makeRule(implementation: RuleImplementation): Rule {
  return {
    descriptor: {
      identifier: implementation.identifier,
      name: implementation.identifier,
      description: 'Sample description.',
      kind: 'style',
      defaultSeverity: 'warning',
      optIn: false,
      nonTriggeringExamples: [],
      triggeringExamples: [],
      corrections: [],
    },
    implementation,
  };
}

function configuration(parameters: unknown = {}): RuleConfiguration {
  return { severity: 'warning', optIn: false, enabled: true, parameters };
}

const outletRule = makeRule(strongIBOutlet);
const enumRule = makeRule(emptyEnumArguments);

describe('CorrectionEngine', () => {
  const engine = new CorrectionEngine();

  describe('correct', () => {
    it('removes the weak modifier of an outlet', () => {
      const file = SourceFile.parse('class C { @IBOutlet weak var label: UILabel? }');

      const result = engine.correct(outletRule, configuration(), file);

      expect(printSyntax(result.tree)).toBe('class C { @IBOutlet var label: UILabel? }');
      expect(result.corrections).toEqual([
        { ruleId: 'strong_iboutlet', position: 20, location: { line: 1, column: 21 } },
      ]);
    });

    it('moves the removed modifier trivia to the next modifier', () => {
      const file = SourceFile.parse('class C {\n    @IBOutlet weak private var label: UILabel?\n}');

      const result = engine.correct(outletRule, configuration(), file);

      expect(printSyntax(result.tree)).toBe('class C {\n    @IBOutlet private var label: UILabel?\n}');
    });

    it('removes an empty enum argument clause', () => {
      const file = SourceFile.parse('switch foo { case .bar(_): break }');

      const result = engine.correct(enumRule, configuration(), file);

      expect(printSyntax(result.tree)).toBe('switch foo { case .bar: break }');
      expect(result.corrections.map(c => c.position)).toEqual([22]);
    });

    it('keeps the node when its rewrite meets an unexpected shape', () => {
      const shapeRule = makeRule(
        defineRule({
          identifier: 'shape_rule',
          parameters: z.object({}).strict(),
          visit: () => ({
            VariableDecl: (cursor, context) => {
              const position = cursor.positionOf(cursor.node);
              if (position !== undefined) context.report(position);
            },
          }),
          rewrite: () => ({
            VariableDecl: () => {
              throw new TraversalError('odd shape', 'VariableDecl');
            },
          }),
        })
      );
      const file = SourceFile.parse('var a = 1');

      const result = engine.correct(shapeRule, configuration(), file);

      expect(result.tree).toBe(file.tree);
      expect(result.corrections).toEqual([]);
      expect(result.traversalErrors).toEqual([
        { ruleId: 'shape_rule', nodeKind: 'VariableDecl', position: 0, message: 'odd shape' },
      ]);
    });

    it('fixes independent violations in one pass', () => {
      const file = SourceFile.parse('switch foo { case .bar(_), .bar2(_): break }');

      const result = engine.correct(enumRule, configuration(), file);

      expect(printSyntax(result.tree)).toBe('switch foo { case .bar, .bar2: break }');
      expect(result.corrections.map(c => c.position)).toEqual([22, 32]);
    });

    it('records every nested violation its rewrite removed', () => {
      const file = SourceFile.parse('guard case .settings(.notifications(_, _)) = nav else { return }');

      const result = engine.correct(enumRule, configuration({ reportNested: 'every' }), file);

      expect(printSyntax(result.tree)).toBe('guard case .settings(.notifications) = nav else { return }');
      expect(result.corrections.map(c => c.position)).toEqual([20, 35]);
    });

    it('keeps the right parenthesis trailing trivia', () => {
      const file = SourceFile.parse('if case .bar(_)  = foo {\n}');

      const result = engine.correct(enumRule, configuration(), file);

      expect(printSyntax(result.tree)).toBe('if case .bar  = foo {\n}');
    });

    it('leaves suppressed violations alone', () => {
      const file = SourceFile.parse(
        'class C { @IBOutlet weak var label: UILabel? } // lintkit:disable:this strong_iboutlet'
      );

      const result = engine.correct(outletRule, configuration(), file);

      expect(result.tree).toBe(file.tree);
      expect(result.corrections).toEqual([]);
    });

    it('shares untouched subtrees with the input tree', () => {
      const file = SourceFile.parse('let a = 1\nswitch foo { case .bar(_): break }');

      const result = engine.correct(enumRule, configuration(), file);

      expect(result.tree).not.toBe(file.tree);
      expect(elementAtPath(result.tree, [0, 0])).toBe(elementAtPath(file.tree, [0, 0]));
      expect(elementAtPath(result.tree, [0, 1])).not.toBe(elementAtPath(file.tree, [0, 1]));
      expect(elementAtPath(result.tree, [1])).toBe(elementAtPath(file.tree, [1]));
    });

    it('is idempotent', () => {
      const file = SourceFile.parse('switch foo { case .bar(_), .bar2(_): break }');
      const first = engine.correct(enumRule, configuration(), file);
      const corrected = file.withTree(first.tree);

      const second = engine.correct(enumRule, configuration(), corrected);

      expect(second.corrections).toEqual([]);
      expect(second.tree).toBe(first.tree);
    });

    it('records nothing when the rewrite declines to fix', () => {
      const declining = makeRule(
        defineRule({
          identifier: 'declining_rule',
          parameters: z.object({}).strict(),
          visit: () => ({
            VariableDecl: (cursor, context) => context.report(cursor.offset),
          }),
          rewrite: () => ({
            VariableDecl: () => null,
          }),
        })
      );
      const file = SourceFile.parse('var a = 1');

      const result = engine.correct(declining, configuration(), file);

      expect(result.tree).toBe(file.tree);
      expect(result.corrections).toEqual([]);
    });

    it('returns the input tree for a rule without a rewrite', () => {
      const detectOnly = makeRule(
        defineRule({
          identifier: 'detect_only',
          parameters: z.object({}).strict(),
          visit: () => ({
            VariableDecl: (cursor, context) => context.report(cursor.offset),
          }),
        })
      );
      const file = SourceFile.parse('var a = 1');

      const result = engine.correct(detectOnly, configuration(), file);

      expect(result.tree).toBe(file.tree);
      expect(result.corrections).toEqual([]);
    });
  });

  describe('correctToFixedPoint', () => {
    const text = 'class C { @IBOutlet weak var label: UILabel? }\nswitch foo { case .bar(_): break }';
    const rules = [
      { rule: outletRule, configuration: configuration() },
      { rule: enumRule, configuration: configuration() },
    ];

    it('applies rules in sequence until nothing changes', () => {
      const result = engine.correctToFixedPoint(rules, SourceFile.parse(text));

      expect(result.file.text).toBe('class C { @IBOutlet var label: UILabel? }\nswitch foo { case .bar: break }');
      expect(result.corrections).toEqual([
        { ruleId: 'strong_iboutlet', position: 20, location: { line: 1, column: 21 } },
        { ruleId: 'empty_enum_arguments', position: 64, location: { line: 2, column: 23 } },
      ]);
      expect(result.iterations).toBe(2);
      expect(result.converged).toBe(true);
    });

    it('gives the same text whatever the rule order', () => {
      const reversed = engine.correctToFixedPoint([...rules].reverse(), SourceFile.parse(text));
      const forward = engine.correctToFixedPoint(rules, SourceFile.parse(text));

      expect(reversed.file.text).toBe(forward.file.text);
    });

    it('stops at maxIterations', () => {
      const result = engine.correctToFixedPoint(rules, SourceFile.parse(text), { maxIterations: 1 });

      expect(result.iterations).toBe(1);
      expect(result.converged).toBe(false);
      expect(result.corrections).toHaveLength(2);
    });

    it('converges immediately on clean input', () => {
      const file = SourceFile.parse('let a = 1');

      const result = engine.correctToFixedPoint(rules, file);

      expect(result.file).toBe(file);
      expect(result.iterations).toBe(1);
      expect(result.converged).toBe(true);
    });

    it('drops a failing rule and keeps correcting with the others', () => {
      const crashing = makeRule(
        defineRule({
          identifier: 'crashing_rule',
          parameters: z.object({}).strict(),
          visit: () => ({
            SourceFile: () => {
              throw new Error('boom');
            },
          }),
        })
      );
      const failures: string[] = [];

      const result = engine.correctToFixedPoint(
        [{ rule: crashing, configuration: configuration() }, ...rules],
        SourceFile.parse(text),
        { onRuleError: error => failures.push(error.ruleId) }
      );

      expect(failures).toEqual(['crashing_rule']);
      expect(result.file.text).toBe('class C { @IBOutlet var label: UILabel? }\nswitch foo { case .bar: break }');
    });

    it('propagates rule failures without a handler', () => {
      const crashing = makeRule(
        defineRule({
          identifier: 'crashing_rule',
          parameters: z.object({}).strict(),
          visit: () => ({
            SourceFile: () => {
              throw new Error('boom');
            },
          }),
        })
      );

      expect(() =>
        engine.correctToFixedPoint([{ rule: crashing, configuration: configuration() }], SourceFile.parse(text))
      ).toThrow(RuleExecutionError);
    });
  });
});
