/**
 * empty_enum_arguments: associated values that are never bound can be
 * left out when matching an enum case: `case .bar(_)` is `case .bar`.
 *
 * Only implicit member calls (`.bar(...)`, no base) whose arguments are all
 * `_` or are themselves such calls qualify. With nesting, e.g.
 * `.settings(.notifications(_, _))`, the innermost argument clause is the
 * one removed.
 */

import { z } from 'zod';
import { defineRule } from '../../engine/defineRule.js';
import { isNodeOfKind, withChild, withTrailingTrivia, type SyntaxCursor } from '../../syntax/SyntaxTree.js';
import {
  elementExpression,
  functionCall,
  Layout,
  memberAccess,
  patternOf,
  requireNode,
} from '../../syntax/nodes.js';
import type { SyntaxNode } from '../../syntax/types.js';

const parameters = z
  .object({
    /** `innermost`: one violation per pattern; `every`: one per nesting level */
    reportNested: z.enum(['innermost', 'every']).default('innermost'),
  })
  .strict();

function isImplicitMemberCall(node: SyntaxNode): boolean {
  if (node.kind !== 'FunctionCallExpr') return false;
  const call = functionCall(node);
  return (
    call.leftParen !== null &&
    call.calledExpression.kind === 'MemberAccessExpr' &&
    memberAccess(call.calledExpression).base === null
  );
}

function argumentExpressions(call: SyntaxNode): Array<SyntaxNode | null> {
  return functionCall(call).arguments.map(elementExpression);
}

function isDiscard(expression: SyntaxNode | null): boolean {
  return isNodeOfKind(expression, 'DiscardAssignmentExpr');
}

/**
 * `_`, or an implicit member call whose arguments all qualify.
 */
function isDiscardOrEmptyCall(expression: SyntaxNode | null): boolean {
  if (expression === null) return false;
  if (isDiscard(expression)) return true;
  return isImplicitMemberCall(expression) && hasOnlyDiscardArguments(expression);
}

function hasOnlyDiscardArguments(call: SyntaxNode): boolean {
  return argumentExpressions(call).every(isDiscardOrEmptyCall);
}

/**
 * The qualifying call of a case item or matching pattern condition.
 */
function violatingCall(node: SyntaxNode): SyntaxNode | null {
  const { pattern } = patternOf(node);
  if (pattern === null || pattern.kind !== 'ExpressionPattern') return null;
  const expression = requireNode(pattern, Layout.ExpressionPattern.expression);
  return isImplicitMemberCall(expression) && hasOnlyDiscardArguments(expression) ? expression : null;
}

/**
 * Calls from `call` down to the innermost one, following the first nested
 * call argument at each level.
 */
function nestedCalls(call: SyntaxNode): SyntaxNode[] {
  const chain = [call];
  let current = call;
  for (;;) {
    const inner = argumentExpressions(current).find(
      (expression): expression is SyntaxNode => expression !== null && isImplicitMemberCall(expression)
    );
    if (inner === undefined) return chain;
    chain.push(inner);
    current = inner;
  }
}

/**
 * Drop the innermost all-`_` argument clause below `call`.
 */
function removeInnermostDiscardArguments(call: SyntaxNode): SyntaxNode {
  if (!isImplicitMemberCall(call) || !hasOnlyDiscardArguments(call)) return call;

  const view = functionCall(call);
  if (argumentExpressions(call).every(isDiscard)) {
    if (view.trailingClosure !== null) return call;
    return withTrailingTrivia(view.calledExpression, view.rightParen?.trailingTrivia ?? '');
  }

  const list = requireNode(call, Layout.FunctionCallExpr.arguments, 'TupleElementList');
  let rebuilt = list;
  list.children.forEach((element, index) => {
    if (!isNodeOfKind(element, 'TupleElement')) return;
    const expression = elementExpression(element);
    if (expression === null || expression.kind !== 'FunctionCallExpr') return;
    const replaced = withChild(element, Layout.TupleElement.expression, removeInnermostDiscardArguments(expression));
    rebuilt = withChild(rebuilt, index, replaced);
  });
  return withChild(call, Layout.FunctionCallExpr.arguments, rebuilt);
}

function leftParenPosition(cursor: SyntaxCursor, call: SyntaxNode): number | undefined {
  const { leftParen } = functionCall(call);
  return leftParen === null ? undefined : cursor.positionOf(leftParen);
}

export const emptyEnumArguments = defineRule({
  identifier: 'empty_enum_arguments',
  parameters,

  visit: ({ reportNested }) => {
    const check = (cursor: SyntaxCursor, context: { report(position: number): void }): void => {
      const call = violatingCall(cursor.node);
      if (call === null) return;

      const chain = nestedCalls(call);
      const reported = reportNested === 'every' ? chain : chain.slice(-1);
      for (const level of reported) {
        const position = leftParenPosition(cursor, level);
        if (position !== undefined) context.report(position);
      }
    };
    return { CaseItem: check, MatchingPatternCondition: check };
  },

  rewrite: () => {
    const fix = (node: SyntaxNode): SyntaxNode | null => {
      const call = violatingCall(node);
      if (call === null) return null;
      const { pattern, index } = patternOf(node);
      if (pattern === null) return null;
      const expression = removeInnermostDiscardArguments(call);
      return withChild(node, index, withChild(pattern, Layout.ExpressionPattern.expression, expression));
    };
    return { CaseItem: fix, MatchingPatternCondition: fix };
  },
});
