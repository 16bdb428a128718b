/**
 * DetectionEngine — runs one rule's visit handlers over a tree.
 *
 * The engine owns traversal, suppression and ordering; what counts as a
 * violation is entirely up to the rule's handlers.
 */

import type { RuleConfiguration } from '../config/types.js';
import type { Rule } from '../catalog/types.js';
import { componentLogger, createSilentLogger, type Logger } from '../logging/logger.js';
import { SyntaxCursor } from '../syntax/SyntaxTree.js';
import { AnalysisCancelledError, RuleExecutionError, throwIfCancelled, TraversalError } from './errors.js';
import type { SourceFile } from './SourceFile.js';
import type { BoundRule, DetectionResult, TraversalFailure, Violation } from './types.js';

export interface AnalysisOptions {
  signal?: AbortSignal;
}

/**
 * A violation plus the path of the node it is anchored to.
 */
export interface AnchoredViolation extends Violation {
  anchor: readonly number[];
}

export interface AnchoredDetection {
  violations: AnchoredViolation[];
  traversalErrors: TraversalFailure[];
}

/**
 * Bind a rule's handlers, reporting failures as RuleExecutionError.
 */
export function bindRule(rule: Rule, configuration: RuleConfiguration): BoundRule {
  try {
    return rule.implementation.bind(configuration.parameters);
  } catch (err) {
    throw new RuleExecutionError(rule.descriptor.identifier, err);
  }
}

function byPosition(a: Violation, b: Violation): number {
  if (a.position !== b.position) return a.position - b.position;
  return a.message < b.message ? -1 : a.message > b.message ? 1 : 0;
}

export class DetectionEngine {
  private readonly logger: Logger;

  constructor(logger: Logger = createSilentLogger()) {
    this.logger = componentLogger(logger, 'detection');
  }

  /**
   * Violations of one rule, suppressed ones removed, ordered by position.
   */
  detect(
    rule: Rule,
    configuration: RuleConfiguration,
    file: SourceFile,
    options: AnalysisOptions = {}
  ): DetectionResult {
    const { violations, traversalErrors } = this.detectAnchored(rule, configuration, file, options);
    return {
      violations: violations.map(({ anchor: _anchor, ...violation }) => violation),
      traversalErrors,
    };
  }

  /**
   * Same as `detect`, keeping each violation's anchor path for the
   * correction engine.
   */
  detectAnchored(
    rule: Rule,
    configuration: RuleConfiguration,
    file: SourceFile,
    options: AnalysisOptions = {}
  ): AnchoredDetection {
    const ruleId = rule.descriptor.identifier;
    const { visit } = bindRule(rule, configuration);
    const violations: AnchoredViolation[] = [];
    const traversalErrors: TraversalFailure[] = [];

    const visitCursor = (cursor: SyntaxCursor): void => {
      throwIfCancelled(options.signal);

      const handler = visit[cursor.node.kind];
      if (handler !== undefined) {
        const pending: AnchoredViolation[] = [];
        const context = {
          ruleId,
          report: (position: number, message?: string): void => {
            pending.push({
              ruleId,
              position,
              location: file.converter.locationOf(position),
              severity: configuration.severity,
              message: message ?? rule.descriptor.description,
              anchor: cursor.path,
            });
          },
        };

        try {
          handler(cursor, context);
        } catch (err) {
          if (err instanceof TraversalError) {
            const failure: TraversalFailure = {
              ruleId,
              nodeKind: err.nodeKind,
              position: cursor.positionOf(cursor.node) ?? cursor.offset,
              message: err.message,
            };
            traversalErrors.push(failure);
            this.logger.warn(failure, 'Skipping subtree after unexpected node shape');
            return;
          }
          if (err instanceof AnalysisCancelledError) throw err;
          throw new RuleExecutionError(ruleId, err);
        }
        violations.push(...pending);
      }

      for (const child of cursor.children()) {
        visitCursor(child);
      }
    };

    visitCursor(SyntaxCursor.root(file.tree));

    const kept = violations.filter(violation => !file.resolver.contains(violation.position, ruleId));
    kept.sort(byPosition);

    this.logger.debug(
      { ruleId, path: file.path, found: violations.length, suppressed: violations.length - kept.length },
      'Detection finished'
    );
    return { violations: kept, traversalErrors };
  }
}
