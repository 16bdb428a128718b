/**
 * Types for rule implementations and engine results.
 */

import type { z } from 'zod';
import type { SyntaxCursor } from '../syntax/SyntaxTree.js';
import type { NodeKind, SourceLocation, SyntaxNode } from '../syntax/types.js';
import type { Severity } from '../types/common.js';

// ============================================================================
// Rule implementations
// ============================================================================

/**
 * Passed to visit handlers.
 */
export interface VisitContext {
  readonly ruleId: string;
  /**
   * Record a violation at an absolute offset. The violation is anchored to
   * the node being visited; that node is what the rewrite handler receives.
   */
  report(position: number, message?: string): void;
}

export type VisitHandler = (cursor: SyntaxCursor, context: VisitContext) => void;

export interface RewriteContext {
  readonly ruleId: string;
}

/**
 * Returns the fixed node, or null when no safe fix exists. Returning a node
 * structurally equal to the input also counts as "no fix".
 */
export type RewriteHandler = (node: SyntaxNode, context: RewriteContext) => SyntaxNode | null;

export type VisitTable = Partial<Record<NodeKind, VisitHandler>>;
export type RewriteTable = Partial<Record<NodeKind, RewriteHandler>>;

/**
 * What a rule author writes: a parameter schema and per-node-kind handler
 * tables built from the validated parameters.
 */
export interface RuleDefinition<P> {
  identifier: string;
  parameters: z.ZodType<P, z.ZodTypeDef, unknown>;
  visit(parameters: P): VisitTable;
  rewrite?(parameters: P): RewriteTable;
}

export type ParameterResult =
  | { success: true; parameters: unknown }
  | { success: false; issues: z.ZodIssue[] };

/**
 * A rule with its parameter type erased, as stored in the registry.
 */
export interface RuleImplementation {
  readonly identifier: string;
  readonly correctable: boolean;
  /** Validate raw parameters and apply their defaults. */
  parseParameters(raw: unknown): ParameterResult;
  /** Build handler tables for validated parameters. */
  bind(parameters: unknown): BoundRule;
}

export interface BoundRule {
  visit: VisitTable;
  rewrite: RewriteTable;
}

// ============================================================================
// Results
// ============================================================================

export interface Violation {
  ruleId: string;
  /** Absolute UTF-16 offset */
  position: number;
  location: SourceLocation;
  severity: Severity;
  message: string;
}

export interface CorrectionRecord {
  ruleId: string;
  /** Offset in the tree generation the correction pass started from */
  position: number;
  location: SourceLocation;
}

/**
 * A subtree skipped because a rule met an unexpected node shape.
 */
export interface TraversalFailure {
  ruleId: string;
  nodeKind: NodeKind;
  position: number;
  message: string;
}

export interface DetectionResult {
  violations: Violation[];
  traversalErrors: TraversalFailure[];
}

export interface CorrectionResult {
  tree: SyntaxNode;
  corrections: CorrectionRecord[];
  traversalErrors: TraversalFailure[];
}
