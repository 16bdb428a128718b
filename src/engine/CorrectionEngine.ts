/**
 * CorrectionEngine — persistent, innermost-first rewriting of violations.
 *
 * A pass detects first, then rebuilds the tree bottom-up along the paths
 * that lead to violation anchors. Every other subtree is shared with the
 * input tree. Because children are rebuilt before their parent, an anchor
 * nested inside another anchor is rewritten first and the outer rewrite
 * sees the fixed node.
 */

import type { RuleConfiguration } from '../config/types.js';
import type { Rule } from '../catalog/types.js';
import { componentLogger, createSilentLogger, type Logger } from '../logging/logger.js';
import { isNode, syntaxEquals, withChild } from '../syntax/SyntaxTree.js';
import type { SyntaxNode } from '../syntax/types.js';
import { bindRule, DetectionEngine, type AnalysisOptions, type AnchoredViolation } from './DetectionEngine.js';
import { AnalysisCancelledError, RuleExecutionError, throwIfCancelled, TraversalError } from './errors.js';
import type { SourceFile } from './SourceFile.js';
import type { CorrectionRecord, CorrectionResult, TraversalFailure } from './types.js';

export interface ActiveRuleConfiguration {
  rule: Rule;
  configuration: RuleConfiguration;
}

export interface FixedPointOptions extends AnalysisOptions {
  /** Upper bound on correction rounds (default: 10) */
  maxIterations?: number;
  /**
   * Called when a rule fails, including failures outside its handlers such
   * as a stack overflow while walking the tree; the rule is dropped from
   * later passes. Without it the error propagates.
   */
  onRuleError?: (error: RuleExecutionError) => void;
}

export interface FixedPointResult {
  file: SourceFile;
  corrections: CorrectionRecord[];
  traversalErrors: TraversalFailure[];
  /** Rounds run, including the final one that changed nothing */
  iterations: number;
  /** False when `maxIterations` was reached while rules still made changes */
  converged: boolean;
}

export const DEFAULT_MAX_ITERATIONS = 10;

function pathKey(path: readonly number[]): string {
  return path.join('.');
}

export class CorrectionEngine {
  private readonly logger: Logger;
  private readonly detection: DetectionEngine;

  constructor(logger: Logger = createSilentLogger()) {
    this.logger = componentLogger(logger, 'correction');
    this.detection = new DetectionEngine(logger);
  }

  /**
   * One correction pass of one rule.
   */
  correct(
    rule: Rule,
    configuration: RuleConfiguration,
    file: SourceFile,
    options: AnalysisOptions = {}
  ): CorrectionResult {
    const ruleId = rule.descriptor.identifier;
    const detected = this.detection.detectAnchored(rule, configuration, file, options);
    const traversalErrors = [...detected.traversalErrors];

    if (!rule.implementation.correctable || detected.violations.length === 0) {
      return { tree: file.tree, corrections: [], traversalErrors };
    }

    const { rewrite } = bindRule(rule, configuration);
    const anchors = new Map<string, AnchoredViolation[]>();
    const onPath = new Set<string>();
    for (const violation of detected.violations) {
      const key = pathKey(violation.anchor);
      anchors.set(key, [...(anchors.get(key) ?? []), violation]);
      for (let length = 0; length <= violation.anchor.length; length++) {
        onPath.add(pathKey(violation.anchor.slice(0, length)));
      }
    }

    const corrections: CorrectionRecord[] = [];

    const rebuild = (node: SyntaxNode, path: number[]): SyntaxNode => {
      const key = pathKey(path);
      if (!onPath.has(key)) return node;
      throwIfCancelled(options.signal);

      let current = node;
      node.children.forEach((child, index) => {
        if (isNode(child)) {
          current = withChild(current, index, rebuild(child, [...path, index]));
        }
      });

      const anchored = anchors.get(key);
      const handler = rewrite[current.kind];
      if (anchored === undefined || handler === undefined) return current;

      let fixed: SyntaxNode | null;
      try {
        fixed = handler(current, { ruleId });
      } catch (err) {
        if (err instanceof TraversalError) {
          const failure: TraversalFailure = {
            ruleId,
            nodeKind: err.nodeKind,
            position: anchored[0]?.position ?? 0,
            message: err.message,
          };
          traversalErrors.push(failure);
          this.logger.warn(failure, 'Skipping rewrite after unexpected node shape');
          return current;
        }
        if (err instanceof AnalysisCancelledError) throw err;
        throw new RuleExecutionError(ruleId, err);
      }

      if (fixed === null || syntaxEquals(fixed, current)) return current;
      for (const violation of anchored) {
        corrections.push({ ruleId, position: violation.position, location: violation.location });
      }
      return fixed;
    };

    const tree = rebuild(file.tree, []);
    corrections.sort((a, b) => a.position - b.position);
    this.logger.debug({ ruleId, path: file.path, corrected: corrections.length }, 'Correction pass finished');
    return { tree, corrections, traversalErrors };
  }

  /**
   * Apply rules in order, round after round, until a round corrects
   * nothing or `maxIterations` rounds ran. Each pass sees the tree the
   * previous pass produced, with regions re-derived for it.
   */
  correctToFixedPoint(
    rules: readonly ActiveRuleConfiguration[],
    file: SourceFile,
    options: FixedPointOptions = {}
  ): FixedPointResult {
    const maxIterations = options.maxIterations ?? DEFAULT_MAX_ITERATIONS;
    const remaining = [...rules];
    const corrections: CorrectionRecord[] = [];
    const traversalErrors: TraversalFailure[] = [];
    let current = file;
    let iterations = 0;
    let converged = false;

    while (iterations < maxIterations) {
      iterations++;
      let changed = false;

      for (const entry of [...remaining]) {
        let result: CorrectionResult;
        try {
          result = this.correct(entry.rule, entry.configuration, current, options);
        } catch (err) {
          if (err instanceof AnalysisCancelledError || options.onRuleError === undefined) throw err;
          const failure =
            err instanceof RuleExecutionError ? err : new RuleExecutionError(entry.rule.descriptor.identifier, err);
          options.onRuleError(failure);
          remaining.splice(remaining.indexOf(entry), 1);
          continue;
        }
        traversalErrors.push(...result.traversalErrors);
        if (result.corrections.length > 0) {
          changed = true;
          corrections.push(...result.corrections);
          current = current.withTree(result.tree);
        }
      }

      if (!changed) {
        converged = true;
        break;
      }
    }

    if (!converged) {
      this.logger.warn({ path: file.path, iterations }, 'Correction stopped before reaching a fixed point');
    }
    return { file: current, corrections, traversalErrors, iterations, converged };
  }
}
