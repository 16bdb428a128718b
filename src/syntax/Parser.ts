/**
 * Parser — error-tolerant recursive descent over the token stream.
 *
 * Covers the part of Swift the bundled rules inspect: declarations with
 * attributes and modifiers, control flow, switch/case patterns and
 * postfix expression chains. Anything else is kept as opaque token groups
 * so that printing the tree always reproduces the input.
 */

import { ParseError, tokenize } from './Lexer.js';
import { makeNode, withChild } from './SyntaxTree.js';
import { Layout } from './nodes.js';
import type { SyntaxNode, SyntaxToken, SyntaxTreeProvider, TokenKind } from './types.js';

export { ParseError } from './Lexer.js';

const MODIFIERS = new Set([
  'weak', 'unowned', 'private', 'fileprivate', 'public', 'internal', 'open', 'static',
  'final', 'override', 'lazy', 'mutating', 'nonmutating', 'dynamic', 'required',
  'convenience', 'optional', 'indirect', 'prefix', 'postfix', 'infix', 'nonisolated',
  'class',
]);

const DECLARATION_KEYWORDS = new Set([
  'var', 'let', 'func', 'init', 'deinit', 'subscript', 'class', 'struct', 'enum',
  'protocol', 'extension', 'import', 'typealias', 'associatedtype', 'case', 'operator',
]);

const STATEMENT_KEYWORDS = new Set([
  ...DECLARATION_KEYWORDS,
  'if', 'guard', 'switch', 'for', 'while', 'repeat', 'do', 'return', 'break',
  'continue', 'throw', 'defer',
]);

/** Keywords that may appear inside a type annotation. */
const TYPE_KEYWORDS = new Set(['Self', 'throws', 'rethrows', 'inout']);

/** Keywords that may appear in a closure signature before `in`. */
const CLOSURE_SIGNATURE_KEYWORDS = new Set(['self', 'throws', 'rethrows', 'inout', 'Self']);

const CLOSURE_SIGNATURE_TOKENS = new Set<TokenKind>([
  'identifier', 'wildcard', 'comma', 'leftParen', 'rightParen', 'colon', 'arrow',
  'period', 'leftBracket', 'rightBracket', 'operator',
]);

type ItemContext = 'file' | 'block' | 'switchCase';

interface ExpressionOptions {
  allowAssignment: boolean;
  allowTrailingClosure: boolean;
}

const STATEMENT_EXPRESSION: ExpressionOptions = { allowAssignment: true, allowTrailingClosure: true };
const VALUE_EXPRESSION: ExpressionOptions = { allowAssignment: false, allowTrailingClosure: true };
const CONDITION_EXPRESSION: ExpressionOptions = { allowAssignment: false, allowTrailingClosure: false };

function startsLine(token: SyntaxToken): boolean {
  return token.leadingTrivia.includes('\n');
}

class Parser {
  private index = 0;
  private readonly offsets: number[] = [];

  constructor(private readonly tokens: SyntaxToken[]) {
    let offset = 0;
    for (const token of tokens) {
      this.offsets.push(offset);
      offset += token.leadingTrivia.length + token.text.length + token.trailingTrivia.length;
    }
  }

  parseSourceFile(): SyntaxNode {
    let statements: SyntaxNode;
    try {
      statements = this.parseItems('file');
    } catch (err) {
      // Stack overflow on deeply nested input.
      if (err instanceof RangeError) throw new ParseError('Nesting too deep to parse', this.textOffset());
      throw err;
    }
    return makeNode('SourceFile', [statements, this.advance()]);
  }

  // ---------------------------------------------------------------------------
  // Token helpers
  // ---------------------------------------------------------------------------

  private peek(ahead = 0): SyntaxToken {
    const last = this.tokens.length - 1;
    const token = this.tokens[Math.min(this.index + ahead, last)];
    if (token === undefined) {
      throw new ParseError('Empty token stream', 0);
    }
    return token;
  }

  private advance(): SyntaxToken {
    const token = this.peek();
    if (this.index < this.tokens.length - 1) {
      this.index++;
    }
    return token;
  }

  private at(kind: TokenKind): boolean {
    return this.peek().tokenKind === kind;
  }

  private atKeyword(text: string): boolean {
    const token = this.peek();
    return token.tokenKind === 'keyword' && token.text === text;
  }

  private atOperator(text: string): boolean {
    const token = this.peek();
    return token.tokenKind === 'operator' && token.text === text;
  }

  private consume(kind: TokenKind): SyntaxToken | null {
    return this.at(kind) ? this.advance() : null;
  }

  private atEnd(): boolean {
    return this.at('eof');
  }

  /** Whether whitespace separates token `index` from the one before it. */
  private spaceBefore(index: number): boolean {
    const token = this.tokens[index];
    const previous = this.tokens[index - 1];
    if (token === undefined || previous === undefined) return true;
    return previous.trailingTrivia !== '' || token.leadingTrivia !== '';
  }

  private spaceAfter(index: number): boolean {
    const token = this.tokens[index];
    const next = this.tokens[index + 1];
    if (token === undefined || next === undefined) return true;
    return token.trailingTrivia !== '' || next.leadingTrivia !== '';
  }

  private textOffset(): number {
    return (this.offsets[this.index] ?? 0) + this.peek().leadingTrivia.length;
  }

  private isWord(token: SyntaxToken): boolean {
    return token.tokenKind === 'identifier' || token.tokenKind === 'keyword';
  }

  // ---------------------------------------------------------------------------
  // Statements
  // ---------------------------------------------------------------------------

  private parseItems(context: ItemContext): SyntaxNode {
    const items: SyntaxNode[] = [];
    for (;;) {
      if (this.atEnd()) break;
      if (this.at('rightBrace')) {
        if (context === 'file') {
          throw new ParseError("Unexpected '}' at file scope", this.textOffset());
        }
        break;
      }
      if (context === 'switchCase' && this.atSwitchCaseStart()) break;

      if (this.at('semicolon')) {
        items.push(makeNode('CodeBlockItem', [null, this.advance()]));
        continue;
      }
      const statement = this.parseStatement();
      items.push(makeNode('CodeBlockItem', [statement, this.consume('semicolon')]));
    }
    return makeNode('CodeBlockItemList', items);
  }

  private atSwitchCaseStart(): boolean {
    if (this.atKeyword('case') || this.atKeyword('default')) return true;
    return this.at('atSign') && this.peek(1).text === 'unknown';
  }

  private parseStatement(): SyntaxNode {
    const token = this.peek();

    if (token.tokenKind === 'atSign' || (this.isWord(token) && MODIFIERS.has(token.text))) {
      const declaration = this.tryParseDeclaration();
      if (declaration !== null) return declaration;
    }

    if (token.tokenKind === 'keyword') {
      switch (token.text) {
        case 'var':
        case 'let':
          return this.parseVariableDecl(null, null);
        case 'func':
        case 'init':
        case 'deinit':
        case 'subscript':
          return this.parseFunctionDecl(null, null);
        case 'class':
        case 'struct':
        case 'enum':
        case 'protocol':
        case 'extension':
          return this.parseTypeDecl(null, null);
        case 'case':
          return this.parseEnumCaseDecl(null, null);
        case 'import':
        case 'typealias':
        case 'associatedtype':
        case 'operator':
          return this.parseOpaqueDecl(null, null);
        case 'if':
          return this.parseIf();
        case 'guard':
          return this.parseGuard();
        case 'while':
          return this.parseWhile();
        case 'for':
          return this.parseForIn();
        case 'switch':
          return this.parseSwitch();
        case 'do':
        case 'defer':
        case 'repeat':
        case 'catch':
          return this.parseBlockStatement();
        case 'return':
        case 'throw':
          return this.parseReturn();
        case 'break':
        case 'continue':
        case 'fallthrough':
          return this.parseBreak();
        default:
          break;
      }
    }

    const expression = this.parseExpression(STATEMENT_EXPRESSION);
    if (expression !== null) return expression;
    return makeNode('UnexpectedNodes', [this.advance()]);
  }

  /**
   * Attributes and modifiers followed by a declaration keyword. Restores the
   * position and returns null when no declaration follows.
   */
  private tryParseDeclaration(): SyntaxNode | null {
    const start = this.index;
    const attributes = this.parseAttributes();
    const modifiers = this.parseModifiers();
    const token = this.peek();

    if (token.tokenKind === 'keyword' && DECLARATION_KEYWORDS.has(token.text)) {
      switch (token.text) {
        case 'var':
        case 'let':
          return this.parseVariableDecl(attributes, modifiers);
        case 'func':
        case 'init':
        case 'deinit':
        case 'subscript':
          return this.parseFunctionDecl(attributes, modifiers);
        case 'case':
          return this.parseEnumCaseDecl(attributes, modifiers);
        case 'import':
        case 'typealias':
        case 'associatedtype':
        case 'operator':
          return this.parseOpaqueDecl(attributes, modifiers);
        default:
          return this.parseTypeDecl(attributes, modifiers);
      }
    }

    this.index = start;
    return null;
  }

  private parseAttributes(): SyntaxNode | null {
    const attributes: SyntaxNode[] = [];
    while (this.at('atSign')) {
      const atSign = this.advance();
      const name = this.isWord(this.peek()) ? this.advance() : null;
      const args = name !== null && this.at('leftParen') && !this.spaceBefore(this.index)
        ? this.parseBalancedGroup()
        : null;
      attributes.push(makeNode('Attribute', [atSign, name, args]));
    }
    return attributes.length > 0 ? makeNode('AttributeList', attributes) : null;
  }

  private parseModifiers(): SyntaxNode | null {
    const modifiers: SyntaxNode[] = [];
    for (;;) {
      const token = this.peek();
      if (!this.isWord(token) || !MODIFIERS.has(token.text)) break;
      if (token.text === 'class') {
        const next = this.peek(1);
        const nextIsDeclaration =
          (next.tokenKind === 'keyword' && DECLARATION_KEYWORDS.has(next.text)) || MODIFIERS.has(next.text);
        if (!nextIsDeclaration) break;
      }
      const name = this.advance();
      const detail = this.at('leftParen') && !this.spaceBefore(this.index) ? this.parseBalancedGroup() : null;
      modifiers.push(makeNode('DeclModifier', [name, detail]));
    }
    return modifiers.length > 0 ? makeNode('ModifierList', modifiers) : null;
  }

  private parseVariableDecl(attributes: SyntaxNode | null, modifiers: SyntaxNode | null): SyntaxNode {
    const keyword = this.advance();
    const bindings: SyntaxNode[] = [];
    for (;;) {
      const pattern = this.parseBindingPattern();
      const typeAnnotation = this.at('colon') ? this.parseTypeAnnotation() : null;
      const initializer = this.parseInitializer(VALUE_EXPRESSION);
      const accessor = this.at('leftBrace') && !startsLine(this.peek()) ? this.parseCodeBlock() : null;
      const comma = this.consume('comma');
      bindings.push(makeNode('PatternBinding', [pattern, typeAnnotation, initializer, accessor, comma]));
      if (comma === null) break;
    }
    return makeNode('VariableDecl', [attributes, modifiers, keyword, makeNode('PatternBindingList', bindings)]);
  }

  private parseBindingPattern(): SyntaxNode | null {
    const token = this.peek();
    if (token.tokenKind === 'identifier' || token.tokenKind === 'wildcard') {
      return makeNode('IdentifierPattern', [this.advance()]);
    }
    if (token.tokenKind === 'leftParen') {
      return this.parseTuple();
    }
    return null;
  }

  private parseTypeAnnotation(): SyntaxNode {
    const colon = this.advance();
    return makeNode('TypeAnnotation', [colon, this.parseType()]);
  }

  /**
   * Types are kept as flat token runs. The run ends at the first token that
   * cannot continue a type at nesting depth zero.
   */
  private parseType(): SyntaxNode {
    const tokens: SyntaxToken[] = [];
    let depth = 0;
    let angles = 0;

    for (;;) {
      const token = this.peek();
      if (token.tokenKind === 'eof') break;

      if (depth === 0 && angles === 0) {
        if (tokens.length > 0 && startsLine(token)) break;
        if (
          token.tokenKind === 'comma' ||
          token.tokenKind === 'rightParen' ||
          token.tokenKind === 'rightBracket' ||
          token.tokenKind === 'rightBrace' ||
          token.tokenKind === 'leftBrace' ||
          token.tokenKind === 'semicolon' ||
          token.tokenKind === 'colon'
        ) {
          break;
        }
        if (token.tokenKind === 'operator' && (token.text === '=' || token.text.startsWith('>'))) break;
        if (token.tokenKind === 'keyword' && !TYPE_KEYWORDS.has(token.text)) break;
      }

      if (token.tokenKind === 'leftParen' || token.tokenKind === 'leftBracket') {
        depth++;
      } else if (token.tokenKind === 'rightParen' || token.tokenKind === 'rightBracket') {
        if (depth === 0) break;
        depth--;
      } else if (token.tokenKind === 'operator') {
        for (const ch of token.text) {
          if (ch === '<') angles++;
          if (ch === '>' && angles > 0) angles--;
        }
      }
      tokens.push(this.advance());
    }
    return makeNode('TypeSyntax', tokens);
  }

  private parseInitializer(options: ExpressionOptions): SyntaxNode | null {
    if (!this.atOperator('=')) return null;
    const equal = this.advance();
    return makeNode('InitializerClause', [equal, this.parseExpression(options)]);
  }

  private parseFunctionDecl(attributes: SyntaxNode | null, modifiers: SyntaxNode | null): SyntaxNode {
    const keyword = this.advance();
    const next = this.peek();
    const name =
      keyword.text === 'func' && (next.tokenKind === 'identifier' || next.tokenKind === 'operator')
        ? this.advance()
        : null;
    const signature = this.parseHeaderTokens();
    const body = this.at('leftBrace') ? this.parseCodeBlock() : null;
    return makeNode('FunctionDecl', [attributes, modifiers, keyword, name, signature, body]);
  }

  private parseTypeDecl(attributes: SyntaxNode | null, modifiers: SyntaxNode | null): SyntaxNode {
    const keyword = this.advance();
    const name = this.at('identifier') ? this.advance() : null;
    const inheritance = this.parseHeaderTokens();
    const members = this.at('leftBrace') ? this.parseCodeBlock() : null;
    return makeNode('TypeDecl', [attributes, modifiers, keyword, name, inheritance, members]);
  }

  private parseEnumCaseDecl(attributes: SyntaxNode | null, modifiers: SyntaxNode | null): SyntaxNode {
    const keyword = this.advance();
    return makeNode('EnumCaseDecl', [attributes, modifiers, keyword, this.parseRestOfLine()]);
  }

  private parseOpaqueDecl(attributes: SyntaxNode | null, modifiers: SyntaxNode | null): SyntaxNode {
    const keyword = this.advance();
    return makeNode('OpaqueDecl', [attributes, modifiers, keyword, this.parseRestOfLine()]);
  }

  private parseCodeBlock(): SyntaxNode {
    const leftBrace = this.advance();
    const statements = this.parseItems('block');
    return makeNode('CodeBlock', [leftBrace, statements, this.consume('rightBrace')]);
  }

  private parseIf(): SyntaxNode {
    const keyword = this.advance();
    const conditions = this.parseConditionList();
    const body = this.at('leftBrace') ? this.parseCodeBlock() : null;
    const elseKeyword = this.atKeyword('else') ? this.advance() : null;
    let elseBody: SyntaxNode | null = null;
    if (elseKeyword !== null) {
      if (this.atKeyword('if')) {
        elseBody = this.parseIf();
      } else if (this.at('leftBrace')) {
        elseBody = this.parseCodeBlock();
      }
    }
    return makeNode('IfStmt', [keyword, conditions, body, elseKeyword, elseBody]);
  }

  private parseGuard(): SyntaxNode {
    const keyword = this.advance();
    const conditions = this.parseConditionList();
    const elseKeyword = this.atKeyword('else') ? this.advance() : null;
    const body = this.at('leftBrace') ? this.parseCodeBlock() : null;
    return makeNode('GuardStmt', [keyword, conditions, elseKeyword, body]);
  }

  private parseWhile(): SyntaxNode {
    const keyword = this.advance();
    const conditions = this.parseConditionList();
    const body = this.at('leftBrace') ? this.parseCodeBlock() : null;
    return makeNode('WhileStmt', [keyword, conditions, body]);
  }

  private parseForIn(): SyntaxNode {
    const keyword = this.advance();
    const caseKeyword = this.atKeyword('case') ? this.advance() : null;
    const pattern = this.parsePattern();
    const inKeyword = this.atKeyword('in') ? this.advance() : null;
    const sequence = this.parseExpression(CONDITION_EXPRESSION);
    const whereClause = this.parseWhereClause();
    const body = this.at('leftBrace') ? this.parseCodeBlock() : null;
    return makeNode('ForInStmt', [keyword, caseKeyword, pattern, inKeyword, sequence, whereClause, body]);
  }

  private parseBlockStatement(): SyntaxNode {
    const keyword = this.advance();
    const header = this.parseHeaderTokens();
    const body = this.at('leftBrace') ? this.parseCodeBlock() : null;
    return makeNode('BlockStmt', [keyword, header, body]);
  }

  private parseReturn(): SyntaxNode {
    const keyword = this.advance();
    const next = this.peek();
    const hasValue =
      !startsLine(next) &&
      next.tokenKind !== 'rightBrace' &&
      next.tokenKind !== 'semicolon' &&
      next.tokenKind !== 'eof';
    const expression = hasValue ? this.parseExpression(VALUE_EXPRESSION) : null;
    return makeNode('ReturnStmt', [keyword, expression]);
  }

  private parseBreak(): SyntaxNode {
    const keyword = this.advance();
    const label = this.at('identifier') && !startsLine(this.peek()) ? this.advance() : null;
    return makeNode('BreakStmt', [keyword, label]);
  }

  private parseConditionList(): SyntaxNode {
    const elements: SyntaxNode[] = [];
    for (;;) {
      const condition = this.parseCondition();
      if (condition === null) break;
      const comma = this.consume('comma');
      elements.push(makeNode('ConditionElement', [condition, comma]));
      if (comma === null) break;
    }
    return makeNode('ConditionList', elements);
  }

  private parseCondition(): SyntaxNode | null {
    if (this.atKeyword('case')) {
      const keyword = this.advance();
      const pattern = this.parsePattern();
      return makeNode('MatchingPatternCondition', [keyword, pattern, this.parseInitializer(CONDITION_EXPRESSION)]);
    }
    if (this.atKeyword('let') || this.atKeyword('var')) {
      const keyword = this.advance();
      const pattern = this.parseBindingPattern();
      const typeAnnotation = this.at('colon') ? this.parseTypeAnnotation() : null;
      const initializer = this.parseInitializer(CONDITION_EXPRESSION);
      return makeNode('OptionalBindingCondition', [keyword, pattern, typeAnnotation, initializer]);
    }
    return this.parseExpression(CONDITION_EXPRESSION);
  }

  private parsePattern(): SyntaxNode | null {
    if (this.atKeyword('let') || this.atKeyword('var')) {
      const keyword = this.advance();
      return makeNode('ValueBindingPattern', [keyword, this.parseExpression(CONDITION_EXPRESSION)]);
    }
    const expression = this.parseExpression(CONDITION_EXPRESSION);
    return expression === null ? null : makeNode('ExpressionPattern', [expression]);
  }

  private parseWhereClause(): SyntaxNode | null {
    if (!this.atKeyword('where')) return null;
    const keyword = this.advance();
    return makeNode('WhereClause', [keyword, this.parseExpression(CONDITION_EXPRESSION)]);
  }

  private parseSwitch(): SyntaxNode {
    const keyword = this.advance();
    const subject = this.parseExpression(CONDITION_EXPRESSION);
    const leftBrace = this.consume('leftBrace');
    if (leftBrace === null) {
      return makeNode('SwitchStmt', [keyword, subject, null, makeNode('SwitchCaseList', []), null]);
    }
    const cases = this.parseSwitchCases();
    return makeNode('SwitchStmt', [keyword, subject, leftBrace, cases, this.consume('rightBrace')]);
  }

  private parseSwitchCases(): SyntaxNode {
    const cases: SyntaxNode[] = [];
    while (!this.at('rightBrace') && !this.atEnd()) {
      const attributes = this.parseAttributes();
      let label: SyntaxNode | null = null;
      if (this.atKeyword('case')) {
        label = this.parseCaseLabel();
      } else if (this.atKeyword('default')) {
        const keyword = this.advance();
        label = makeNode('SwitchDefaultLabel', [keyword, this.consume('colon')]);
      }
      const statements = this.parseItems('switchCase');
      cases.push(makeNode('SwitchCase', [attributes, label, statements]));
    }
    return makeNode('SwitchCaseList', cases);
  }

  private parseCaseLabel(): SyntaxNode {
    const keyword = this.advance();
    const items: SyntaxNode[] = [];
    for (;;) {
      const pattern = this.parsePattern();
      const whereClause = this.parseWhereClause();
      const comma = this.consume('comma');
      items.push(makeNode('CaseItem', [pattern, whereClause, comma]));
      if (comma === null) break;
    }
    return makeNode('SwitchCaseLabel', [keyword, makeNode('CaseItemList', items), this.consume('colon')]);
  }

  // ---------------------------------------------------------------------------
  // Opaque token runs
  // ---------------------------------------------------------------------------

  /** A parenthesized run starting at `(`, through its matching `)`. */
  private parseBalancedGroup(): SyntaxNode {
    const tokens: SyntaxToken[] = [];
    let depth = 0;
    while (!this.atEnd()) {
      const token = this.advance();
      tokens.push(token);
      if (token.tokenKind === 'leftParen') depth++;
      if (token.tokenKind === 'rightParen') {
        depth--;
        if (depth === 0) break;
      }
    }
    return makeNode('TokenGroup', tokens);
  }

  /**
   * Tokens up to a `{` that opens a body, or to a new line that starts
   * another declaration or statement.
   */
  private parseHeaderTokens(): SyntaxNode | null {
    const tokens: SyntaxToken[] = [];
    let depth = 0;
    for (;;) {
      const token = this.peek();
      if (token.tokenKind === 'eof') break;
      if (depth === 0) {
        if (token.tokenKind === 'leftBrace' || token.tokenKind === 'rightBrace') break;
        if (tokens.length > 0 && startsLine(token) && this.startsDeclarationOrStatement(token)) break;
      }
      if (token.tokenKind === 'leftParen' || token.tokenKind === 'leftBracket') depth++;
      if (token.tokenKind === 'rightParen' || token.tokenKind === 'rightBracket') {
        if (depth === 0) break;
        depth--;
      }
      tokens.push(this.advance());
    }
    return tokens.length > 0 ? makeNode('TokenGroup', tokens) : null;
  }

  private startsDeclarationOrStatement(token: SyntaxToken): boolean {
    if (token.tokenKind === 'atSign') return true;
    if (token.tokenKind === 'keyword' && STATEMENT_KEYWORDS.has(token.text)) return true;
    return token.tokenKind === 'identifier' && MODIFIERS.has(token.text);
  }

  /** Tokens to the end of the line, continuing through open brackets. */
  private parseRestOfLine(): SyntaxNode | null {
    const tokens: SyntaxToken[] = [];
    let depth = 0;
    for (;;) {
      const token = this.peek();
      if (token.tokenKind === 'eof') break;
      if (depth === 0) {
        if (startsLine(token) || token.tokenKind === 'semicolon') break;
        if (
          token.tokenKind === 'rightBrace' ||
          token.tokenKind === 'rightParen' ||
          token.tokenKind === 'rightBracket'
        ) {
          break;
        }
      }
      if (token.tokenKind === 'leftParen' || token.tokenKind === 'leftBracket' || token.tokenKind === 'leftBrace') {
        depth++;
      } else if (
        token.tokenKind === 'rightParen' ||
        token.tokenKind === 'rightBracket' ||
        token.tokenKind === 'rightBrace'
      ) {
        depth--;
      }
      tokens.push(this.advance());
    }
    return tokens.length > 0 ? makeNode('TokenGroup', tokens) : null;
  }

  // ---------------------------------------------------------------------------
  // Expressions
  // ---------------------------------------------------------------------------

  /**
   * A flat sequence of operands and binary operators. Operator precedence
   * is not resolved.
   */
  private parseExpression(options: ExpressionOptions): SyntaxNode | null {
    const first = this.parseUnary(options);
    if (first === null) return null;

    const elements: SyntaxNode[] = [first];
    let openTernaries = 0;
    for (;;) {
      const token = this.peek();
      let operator: SyntaxNode;

      if (token.tokenKind === 'operator') {
        if (this.spaceBefore(this.index) !== this.spaceAfter(this.index)) break;
        if (token.text === '=' && !options.allowAssignment) break;
        if (token.text === '?') openTernaries++;
        operator = makeNode('BinaryOperatorExpr', [this.advance(), null]);
      } else if (token.tokenKind === 'arrow') {
        operator = makeNode('BinaryOperatorExpr', [this.advance(), null]);
      } else if (token.tokenKind === 'keyword' && (token.text === 'as' || token.text === 'is')) {
        const keyword = this.advance();
        const mark =
          (this.atOperator('?') || this.atOperator('!')) && !this.spaceBefore(this.index) ? this.advance() : null;
        operator = makeNode('BinaryOperatorExpr', [keyword, mark]);
      } else if (token.tokenKind === 'colon' && openTernaries > 0) {
        openTernaries--;
        operator = makeNode('BinaryOperatorExpr', [this.advance(), null]);
      } else {
        break;
      }

      elements.push(operator);
      const operand = this.parseUnary(options);
      if (operand === null) break;
      elements.push(operand);
    }
    return elements.length === 1 ? first : makeNode('SequenceExpr', elements);
  }

  private parseUnary(options: ExpressionOptions): SyntaxNode | null {
    const token = this.peek();
    if (token.tokenKind === 'operator') {
      const operator = this.advance();
      return makeNode('PrefixOperatorExpr', [operator, this.parseUnary(options)]);
    }
    if (token.tokenKind === 'keyword' && token.text === 'try') {
      const keyword = this.advance();
      const mark =
        (this.atOperator('?') || this.atOperator('!')) && !this.spaceBefore(this.index) ? this.advance() : null;
      return makeNode('TryExpr', [keyword, mark, this.parseUnary(options)]);
    }
    const primary = this.parsePrimary(options);
    return primary === null ? null : this.parsePostfix(primary, options);
  }

  private parsePrimary(options: ExpressionOptions): SyntaxNode | null {
    const token = this.peek();
    switch (token.tokenKind) {
      case 'identifier':
        return makeNode('IdentifierExpr', [this.advance()]);
      case 'wildcard':
        return makeNode('DiscardAssignmentExpr', [this.advance()]);
      case 'number':
      case 'string':
        return makeNode('LiteralExpr', [this.advance()]);
      case 'keyword':
        return this.parseKeywordPrimary(token, options);
      case 'period': {
        const period = this.advance();
        return makeNode('MemberAccessExpr', [null, period, this.parseMemberName()]);
      }
      case 'leftParen':
        return this.parseTuple();
      case 'leftBracket':
        return this.parseArray();
      case 'leftBrace':
        return this.parseClosure();
      case 'pound': {
        const pound = this.advance();
        const name = this.isWord(this.peek()) && !this.spaceBefore(this.index) ? this.advance() : null;
        return makeNode('MacroExpansionExpr', [pound, name]);
      }
      default:
        return null;
    }
  }

  private parseKeywordPrimary(token: SyntaxToken, options: ExpressionOptions): SyntaxNode | null {
    switch (token.text) {
      case 'true':
      case 'false':
      case 'nil':
        return makeNode('LiteralExpr', [this.advance()]);
      case 'self':
      case 'Self':
      case 'super':
      case 'init':
        return makeNode('IdentifierExpr', [this.advance()]);
      case 'let':
      case 'var': {
        const keyword = this.advance();
        return makeNode('ValueBindingPattern', [
          keyword,
          this.parseExpression({ allowAssignment: false, allowTrailingClosure: options.allowTrailingClosure }),
        ]);
      }
      default:
        return null;
    }
  }

  private parseMemberName(): SyntaxToken | null {
    const token = this.peek();
    if (this.isWord(token) || token.tokenKind === 'number') {
      return this.advance();
    }
    return null;
  }

  private parsePostfix(base: SyntaxNode, options: ExpressionOptions): SyntaxNode {
    let expression = base;
    for (;;) {
      const token = this.peek();

      if (token.tokenKind === 'period') {
        const period = this.advance();
        expression = makeNode('MemberAccessExpr', [expression, period, this.parseMemberName()]);
      } else if (token.tokenKind === 'leftParen' && !startsLine(token)) {
        const leftParen = this.advance();
        const args = this.parseTupleElements();
        const rightParen = this.consume('rightParen');
        expression = makeNode('FunctionCallExpr', [expression, leftParen, args, rightParen, null]);
      } else if (token.tokenKind === 'leftBracket' && !startsLine(token)) {
        const leftBracket = this.advance();
        const args = this.parseTupleElements();
        const rightBracket = this.consume('rightBracket');
        expression = makeNode('SubscriptExpr', [expression, leftBracket, args, rightBracket]);
      } else if (
        token.tokenKind === 'operator' &&
        (token.text === '?' || token.text === '!') &&
        !this.spaceBefore(this.index)
      ) {
        expression = makeNode('PostfixUnaryExpr', [expression, this.advance()]);
      } else if (token.tokenKind === 'leftBrace' && options.allowTrailingClosure && !startsLine(token)) {
        const closure = this.parseClosure();
        const trailingSlot = Layout.FunctionCallExpr.trailingClosure;
        expression =
          expression.kind === 'FunctionCallExpr' && expression.children[trailingSlot] === null
            ? withChild(expression, trailingSlot, closure)
            : makeNode('FunctionCallExpr', [expression, null, null, null, closure]);
      } else {
        return expression;
      }
    }
  }

  private parseTuple(): SyntaxNode {
    const leftParen = this.advance();
    const elements = this.parseTupleElements();
    return makeNode('TupleExpr', [leftParen, elements, this.consume('rightParen')]);
  }

  private parseArray(): SyntaxNode {
    const leftBracket = this.advance();
    const elements = this.parseTupleElements();
    return makeNode('ArrayExpr', [leftBracket, elements, this.consume('rightBracket')]);
  }

  /**
   * Comma-separated elements up to (not including) a closing bracket.
   * Dictionary entries become `key : value` sequences.
   */
  private parseTupleElements(): SyntaxNode {
    const elements: SyntaxNode[] = [];
    for (;;) {
      const token = this.peek();
      if (
        token.tokenKind === 'eof' ||
        token.tokenKind === 'rightParen' ||
        token.tokenKind === 'rightBracket' ||
        token.tokenKind === 'rightBrace'
      ) {
        break;
      }

      let label: SyntaxToken | null = null;
      let colon: SyntaxToken | null = null;
      const isLabelWord = this.isWord(token) || token.tokenKind === 'wildcard';
      if (isLabelWord && this.peek(1).tokenKind === 'colon') {
        label = this.advance();
        colon = this.advance();
      }

      let expression: SyntaxNode | null = this.parseExpression(VALUE_EXPRESSION);
      if (expression !== null && label === null && this.at('colon')) {
        const separator = makeNode('BinaryOperatorExpr', [this.advance(), null]);
        const value = this.parseExpression(VALUE_EXPRESSION);
        expression = makeNode('SequenceExpr', value === null ? [expression, separator] : [expression, separator, value]);
      }
      const comma = this.consume('comma');
      if (expression === null && label === null && comma === null) {
        expression = makeNode('UnexpectedNodes', [this.advance()]);
      }
      elements.push(makeNode('TupleElement', [label, colon, expression, comma]));
    }
    return makeNode('TupleElementList', elements);
  }

  private parseClosure(): SyntaxNode {
    const leftBrace = this.advance();
    const signature = this.parseClosureSignature();
    const statements = this.parseItems('block');
    return makeNode('ClosureExpr', [leftBrace, signature, statements, this.consume('rightBrace')]);
  }

  /** `params in`, recognised by scanning ahead for `in`. */
  private parseClosureSignature(): SyntaxNode | null {
    let end = this.index;
    for (;;) {
      const token = this.tokens[end];
      if (token === undefined) return null;
      if (token.tokenKind === 'keyword' && token.text === 'in') break;
      const allowed =
        CLOSURE_SIGNATURE_TOKENS.has(token.tokenKind) ||
        (token.tokenKind === 'keyword' && CLOSURE_SIGNATURE_KEYWORDS.has(token.text));
      if (!allowed) return null;
      end++;
    }
    const tokens: SyntaxToken[] = [];
    while (this.index <= end) {
      tokens.push(this.advance());
    }
    return makeNode('TokenGroup', tokens);
  }
}

/**
 * Parse source text into a lossless tree: `printSyntax(parseSource(t)) === t`.
 * Malformed input yields `UnexpectedNodes` or absent children where possible;
 * ParseError is thrown for unterminated literals and comments, for a `}`
 * at file scope and for nesting deeper than the call stack allows.
 */
export function parseSource(text: string): SyntaxNode {
  return new Parser(tokenize(text)).parseSourceFile();
}

/**
 * The bundled tree provider.
 */
export class SwiftParser implements SyntaxTreeProvider {
  parse(text: string): SyntaxNode {
    return parseSource(text);
  }
}
