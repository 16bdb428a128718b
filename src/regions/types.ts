/**
 * Types for suppression regions.
 */

import type { LocationConverter } from '../syntax/LocationConverter.js';
import type { SourceRange, SyntaxNode } from '../syntax/types.js';

/**
 * Rule identifiers a region suppresses, or every rule.
 */
export type RegionRules = 'all' | readonly string[];

/**
 * A source range in which the named rules report nothing. The range start
 * is inclusive and the end exclusive.
 */
export interface DisabledRegion {
  range: SourceRange;
  rules: RegionRules;
}

/**
 * Produces the disabled regions of one source unit.
 */
export interface DisabledRegionSource {
  scan(tree: SyntaxNode, converter: LocationConverter): DisabledRegion[];
}

export type DirectiveAction = 'disable' | 'enable';

export type DirectiveScope = 'from' | 'this' | 'next' | 'previous';

/**
 * One suppression directive found in a comment.
 */
export interface Directive {
  action: DirectiveAction;
  scope: DirectiveScope;
  rules: RegionRules;
  /** Offset of the comment that carries the directive */
  offset: number;
  /** One-based line of that comment */
  line: number;
}
