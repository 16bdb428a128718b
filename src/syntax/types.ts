/**
 * Types for the persistent syntax tree.
 *
 * Trees are immutable. A rewrite produces a new node and rebuilds the path
 * to the root; every untouched child is shared by reference with the
 * previous generation. Nodes carry no absolute positions: offsets are
 * computed while walking (see SyntaxTree.ts).
 */

/**
 * Lexical category of a token.
 */
export type TokenKind =
  | 'identifier'
  | 'keyword'
  | 'wildcard'
  | 'number'
  | 'string'
  | 'operator'
  | 'arrow'
  | 'leftParen'
  | 'rightParen'
  | 'leftBrace'
  | 'rightBrace'
  | 'leftBracket'
  | 'rightBracket'
  | 'comma'
  | 'colon'
  | 'semicolon'
  | 'period'
  | 'atSign'
  | 'pound'
  | 'unknown'
  | 'eof';

/**
 * Node kinds produced by the parser. Each kind has a fixed child layout
 * documented in nodes.ts; kinds ending in `List` hold a variable number of
 * children.
 */
export type NodeKind =
  | 'SourceFile'
  | 'CodeBlockItemList'
  | 'CodeBlockItem'
  | 'CodeBlock'
  | 'AttributeList'
  | 'Attribute'
  | 'ModifierList'
  | 'DeclModifier'
  | 'VariableDecl'
  | 'PatternBindingList'
  | 'PatternBinding'
  | 'IdentifierPattern'
  | 'TypeAnnotation'
  | 'TypeSyntax'
  | 'InitializerClause'
  | 'FunctionDecl'
  | 'TypeDecl'
  | 'EnumCaseDecl'
  | 'OpaqueDecl'
  | 'IfStmt'
  | 'GuardStmt'
  | 'WhileStmt'
  | 'ForInStmt'
  | 'BlockStmt'
  | 'ReturnStmt'
  | 'BreakStmt'
  | 'ConditionList'
  | 'ConditionElement'
  | 'MatchingPatternCondition'
  | 'OptionalBindingCondition'
  | 'SwitchStmt'
  | 'SwitchCaseList'
  | 'SwitchCase'
  | 'SwitchCaseLabel'
  | 'SwitchDefaultLabel'
  | 'CaseItemList'
  | 'CaseItem'
  | 'WhereClause'
  | 'ExpressionPattern'
  | 'ValueBindingPattern'
  | 'IdentifierExpr'
  | 'LiteralExpr'
  | 'DiscardAssignmentExpr'
  | 'MemberAccessExpr'
  | 'FunctionCallExpr'
  | 'SubscriptExpr'
  | 'TupleExpr'
  | 'ArrayExpr'
  | 'TupleElementList'
  | 'TupleElement'
  | 'ClosureExpr'
  | 'SequenceExpr'
  | 'BinaryOperatorExpr'
  | 'PrefixOperatorExpr'
  | 'PostfixUnaryExpr'
  | 'TryExpr'
  | 'MacroExpansionExpr'
  | 'TokenGroup'
  | 'UnexpectedNodes';

/**
 * A single token with the trivia attached to it.
 */
export interface SyntaxToken {
  readonly type: 'token';
  readonly tokenKind: TokenKind;
  readonly text: string;
  /** Whitespace, newlines and comments before the token */
  readonly leadingTrivia: string;
  /** Spaces and tabs after the token, up to the end of the line */
  readonly trailingTrivia: string;
}

/**
 * An interior node. `null` children mark absent optional parts.
 */
export interface SyntaxNode {
  readonly type: 'node';
  readonly kind: NodeKind;
  readonly children: ReadonlyArray<SyntaxElement | null>;
}

export type SyntaxElement = SyntaxNode | SyntaxToken;

/**
 * Turns source text into a tree. Implementations throw ParseError when the
 * text cannot be parsed at all.
 */
export interface SyntaxTreeProvider {
  parse(text: string): SyntaxNode;
}

/**
 * One-based line/column location. Columns count UTF-16 code units.
 */
export interface SourceLocation {
  line: number;
  column: number;
}

/**
 * Inclusive start, exclusive end.
 */
export interface SourceRange {
  start: SourceLocation;
  end: SourceLocation;
}
