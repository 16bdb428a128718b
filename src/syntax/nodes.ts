/**
 * Child layouts of every fixed-shape node kind, and checked views over the
 * kinds that rules inspect.
 *
 * Views throw TraversalError when a node does not have the documented
 * shape; the detection engine recovers from that by skipping the subtree.
 */

import { isNode, isToken } from './SyntaxTree.js';
import type { NodeKind, SyntaxElement, SyntaxNode, SyntaxToken } from './types.js';

/**
 * Raised by a rule (usually through a view) on an unexpected node shape.
 */
export class TraversalError extends Error {
  constructor(
    message: string,
    public readonly nodeKind: NodeKind
  ) {
    super(message);
    this.name = 'TraversalError';
  }
}

/**
 * Child index of each named slot. List kinds (`*List`, `TokenGroup`,
 * `UnexpectedNodes`, `SequenceExpr`) have no fixed layout.
 */
export const Layout = {
  SourceFile: { statements: 0, endOfFile: 1 },
  CodeBlockItem: { item: 0, semicolon: 1 },
  CodeBlock: { leftBrace: 0, statements: 1, rightBrace: 2 },
  Attribute: { atSign: 0, name: 1, arguments: 2 },
  DeclModifier: { name: 0, detail: 1 },
  VariableDecl: { attributes: 0, modifiers: 1, bindingKeyword: 2, bindings: 3 },
  PatternBinding: { pattern: 0, typeAnnotation: 1, initializer: 2, accessor: 3, trailingComma: 4 },
  IdentifierPattern: { identifier: 0 },
  TypeAnnotation: { colon: 0, type: 1 },
  InitializerClause: { equal: 0, value: 1 },
  FunctionDecl: { attributes: 0, modifiers: 1, keyword: 2, name: 3, signature: 4, body: 5 },
  TypeDecl: { attributes: 0, modifiers: 1, keyword: 2, name: 3, inheritance: 4, members: 5 },
  EnumCaseDecl: { attributes: 0, modifiers: 1, caseKeyword: 2, elements: 3 },
  OpaqueDecl: { attributes: 0, modifiers: 1, keyword: 2, rest: 3 },
  IfStmt: { ifKeyword: 0, conditions: 1, body: 2, elseKeyword: 3, elseBody: 4 },
  GuardStmt: { guardKeyword: 0, conditions: 1, elseKeyword: 2, body: 3 },
  WhileStmt: { whileKeyword: 0, conditions: 1, body: 2 },
  ForInStmt: { forKeyword: 0, caseKeyword: 1, pattern: 2, inKeyword: 3, sequence: 4, whereClause: 5, body: 6 },
  BlockStmt: { keyword: 0, header: 1, body: 2 },
  ReturnStmt: { keyword: 0, expression: 1 },
  BreakStmt: { keyword: 0, label: 1 },
  ConditionElement: { condition: 0, trailingComma: 1 },
  MatchingPatternCondition: { caseKeyword: 0, pattern: 1, initializer: 2 },
  OptionalBindingCondition: { bindingKeyword: 0, pattern: 1, typeAnnotation: 2, initializer: 3 },
  SwitchStmt: { switchKeyword: 0, subject: 1, leftBrace: 2, cases: 3, rightBrace: 4 },
  SwitchCase: { attributes: 0, label: 1, statements: 2 },
  SwitchCaseLabel: { caseKeyword: 0, items: 1, colon: 2 },
  SwitchDefaultLabel: { defaultKeyword: 0, colon: 1 },
  CaseItem: { pattern: 0, whereClause: 1, trailingComma: 2 },
  WhereClause: { whereKeyword: 0, condition: 1 },
  ExpressionPattern: { expression: 0 },
  ValueBindingPattern: { bindingKeyword: 0, pattern: 1 },
  IdentifierExpr: { identifier: 0 },
  LiteralExpr: { literal: 0 },
  DiscardAssignmentExpr: { wildcard: 0 },
  MemberAccessExpr: { base: 0, period: 1, name: 2 },
  FunctionCallExpr: { calledExpression: 0, leftParen: 1, arguments: 2, rightParen: 3, trailingClosure: 4 },
  SubscriptExpr: { base: 0, leftBracket: 1, arguments: 2, rightBracket: 3 },
  TupleExpr: { leftParen: 0, elements: 1, rightParen: 2 },
  ArrayExpr: { leftBracket: 0, elements: 1, rightBracket: 2 },
  TupleElement: { label: 0, colon: 1, expression: 2, trailingComma: 3 },
  ClosureExpr: { leftBrace: 0, signature: 1, statements: 2, rightBrace: 3 },
  BinaryOperatorExpr: { operator: 0, mark: 1 },
  PrefixOperatorExpr: { operator: 0, operand: 1 },
  PostfixUnaryExpr: { operand: 0, operator: 1 },
  TryExpr: { tryKeyword: 0, mark: 1, expression: 2 },
  MacroExpansionExpr: { pound: 0, name: 1 },
} as const;

function expectKind(node: SyntaxNode, kind: NodeKind): void {
  if (node.kind !== kind) {
    throw new TraversalError(`Expected ${kind} but found ${node.kind}`, node.kind);
  }
}

function slot(node: SyntaxNode, index: number): SyntaxElement | null {
  if (index >= node.children.length) {
    throw new TraversalError(`${node.kind} has no child at index ${index}`, node.kind);
  }
  return node.children[index] ?? null;
}

export function optionalToken(node: SyntaxNode, index: number): SyntaxToken | null {
  const child = slot(node, index);
  if (child === null) return null;
  if (!isToken(child)) {
    throw new TraversalError(`${node.kind} expected a token at index ${index}`, node.kind);
  }
  return child;
}

export function requireToken(node: SyntaxNode, index: number): SyntaxToken {
  const token = optionalToken(node, index);
  if (token === null) {
    throw new TraversalError(`${node.kind} is missing its token at index ${index}`, node.kind);
  }
  return token;
}

export function optionalNode(node: SyntaxNode, index: number, kind?: NodeKind): SyntaxNode | null {
  const child = slot(node, index);
  if (child === null) return null;
  if (!isNode(child) || (kind !== undefined && child.kind !== kind)) {
    throw new TraversalError(`${node.kind} expected ${kind ?? 'a node'} at index ${index}`, node.kind);
  }
  return child;
}

export function requireNode(node: SyntaxNode, index: number, kind?: NodeKind): SyntaxNode {
  const child = optionalNode(node, index, kind);
  if (child === null) {
    throw new TraversalError(`${node.kind} is missing its child at index ${index}`, node.kind);
  }
  return child;
}

/**
 * Node children of a list kind, skipping absent entries.
 */
export function listItems(list: SyntaxNode | null): SyntaxNode[] {
  if (list === null) return [];
  return list.children.filter(isNode);
}

export interface VariableDeclView {
  attributes: SyntaxNode[];
  modifierList: SyntaxNode | null;
  modifiers: SyntaxNode[];
  bindingKeyword: SyntaxToken;
}

export function variableDecl(node: SyntaxNode): VariableDeclView {
  expectKind(node, 'VariableDecl');
  const modifierList = optionalNode(node, Layout.VariableDecl.modifiers, 'ModifierList');
  return {
    attributes: listItems(optionalNode(node, Layout.VariableDecl.attributes, 'AttributeList')),
    modifierList,
    modifiers: listItems(modifierList),
    bindingKeyword: requireToken(node, Layout.VariableDecl.bindingKeyword),
  };
}

export function attributeName(node: SyntaxNode): string | null {
  expectKind(node, 'Attribute');
  return optionalToken(node, Layout.Attribute.name)?.text ?? null;
}

export function modifierName(node: SyntaxNode): SyntaxToken {
  expectKind(node, 'DeclModifier');
  return requireToken(node, Layout.DeclModifier.name);
}

/**
 * The pattern slot of a case item or a matching pattern condition.
 */
export function patternOf(node: SyntaxNode): { pattern: SyntaxNode | null; index: number } {
  switch (node.kind) {
    case 'CaseItem':
      return { pattern: optionalNode(node, Layout.CaseItem.pattern), index: Layout.CaseItem.pattern };
    case 'MatchingPatternCondition':
      return {
        pattern: optionalNode(node, Layout.MatchingPatternCondition.pattern),
        index: Layout.MatchingPatternCondition.pattern,
      };
    default:
      throw new TraversalError(`${node.kind} has no pattern`, node.kind);
  }
}

export interface FunctionCallView {
  calledExpression: SyntaxNode;
  leftParen: SyntaxToken | null;
  arguments: SyntaxNode[];
  rightParen: SyntaxToken | null;
  trailingClosure: SyntaxNode | null;
}

export function functionCall(node: SyntaxNode): FunctionCallView {
  expectKind(node, 'FunctionCallExpr');
  return {
    calledExpression: requireNode(node, Layout.FunctionCallExpr.calledExpression),
    leftParen: optionalToken(node, Layout.FunctionCallExpr.leftParen),
    arguments: listItems(optionalNode(node, Layout.FunctionCallExpr.arguments, 'TupleElementList')),
    rightParen: optionalToken(node, Layout.FunctionCallExpr.rightParen),
    trailingClosure: optionalNode(node, Layout.FunctionCallExpr.trailingClosure),
  };
}

export function memberAccess(node: SyntaxNode): { base: SyntaxNode | null; name: SyntaxToken | null } {
  expectKind(node, 'MemberAccessExpr');
  return {
    base: optionalNode(node, Layout.MemberAccessExpr.base),
    name: optionalToken(node, Layout.MemberAccessExpr.name),
  };
}

/**
 * The expression of a tuple element (a call argument).
 */
export function elementExpression(node: SyntaxNode): SyntaxNode | null {
  expectKind(node, 'TupleElement');
  return optionalNode(node, Layout.TupleElement.expression);
}
