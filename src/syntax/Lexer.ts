/**
 * Lexer: splits Swift source into tokens with attached trivia.
 *
 * Concatenating every token's leading trivia, text and trailing trivia
 * reproduces the input exactly.
 */

import { makeToken } from './SyntaxTree.js';
import type { SyntaxToken, TokenKind } from './types.js';

/**
 * Raised when source text cannot be tokenized or parsed at all.
 */
export class ParseError extends Error {
  constructor(
    message: string,
    public readonly offset: number
  ) {
    super(`${message} (offset ${offset})`);
    this.name = 'ParseError';
  }
}

export const KEYWORDS: ReadonlySet<string> = new Set([
  'as', 'associatedtype', 'break', 'case', 'catch', 'class', 'continue', 'default',
  'defer', 'deinit', 'do', 'else', 'enum', 'extension', 'fallthrough', 'false',
  'fileprivate', 'for', 'func', 'guard', 'if', 'import', 'in', 'init', 'inout',
  'internal', 'is', 'let', 'nil', 'operator', 'private', 'protocol', 'public',
  'repeat', 'rethrows', 'return', 'self', 'Self', 'static', 'struct', 'subscript',
  'super', 'switch', 'throw', 'throws', 'true', 'try', 'typealias', 'var', 'where',
  'while',
]);

const OPERATOR_CHARS = new Set(['/', '=', '-', '+', '!', '*', '%', '<', '>', '&', '|', '^', '~', '?']);

const PUNCTUATION: Readonly<Record<string, TokenKind>> = {
  '(': 'leftParen',
  ')': 'rightParen',
  '{': 'leftBrace',
  '}': 'rightBrace',
  '[': 'leftBracket',
  ']': 'rightBracket',
  ',': 'comma',
  ':': 'colon',
  ';': 'semicolon',
  '@': 'atSign',
  '#': 'pound',
};

/** Keywords after which an adjacent `?` or `!` is a postfix mark. */
const POSTFIX_KEYWORDS = new Set(['as', 'try', 'self', 'Self', 'super', 'init']);

const IDENTIFIER_START = /[\p{L}_$]/u;
const IDENTIFIER_PART = /[\p{L}\p{N}_$]/u;

class Lexer {
  private pos = 0;
  private readonly tokens: SyntaxToken[] = [];

  constructor(private readonly text: string) {}

  run(): SyntaxToken[] {
    for (;;) {
      const leading = this.scanLeadingTrivia();
      if (this.pos >= this.text.length) {
        this.tokens.push(makeToken('eof', '', leading, ''));
        return this.tokens;
      }
      const start = this.pos;
      const kind = this.scanToken(leading);
      const body = this.text.slice(start, this.pos);
      const trailing = this.scanTrailingTrivia();
      this.tokens.push(makeToken(kind, body, leading, trailing));
    }
  }

  private peek(offset = 0): string {
    return this.text.charAt(this.pos + offset);
  }

  private scanLeadingTrivia(): string {
    const start = this.pos;
    for (;;) {
      const c = this.peek();
      if (c === ' ' || c === '\t' || c === '\n' || c === '\r' || c === '\f' || c === '\v') {
        this.pos++;
      } else if (this.text.startsWith('//', this.pos)) {
        const newline = this.text.indexOf('\n', this.pos);
        this.pos = newline < 0 ? this.text.length : newline;
      } else if (this.text.startsWith('/*', this.pos)) {
        this.scanBlockComment();
      } else {
        break;
      }
    }
    return this.text.slice(start, this.pos);
  }

  private scanBlockComment(): void {
    const start = this.pos;
    let depth = 0;
    while (this.pos < this.text.length) {
      if (this.text.startsWith('/*', this.pos)) {
        depth++;
        this.pos += 2;
      } else if (this.text.startsWith('*/', this.pos)) {
        depth--;
        this.pos += 2;
        if (depth === 0) return;
      } else {
        this.pos++;
      }
    }
    throw new ParseError('Unterminated block comment', start);
  }

  private scanTrailingTrivia(): string {
    const start = this.pos;
    while (this.peek() === ' ' || this.peek() === '\t') {
      this.pos++;
    }
    return this.text.slice(start, this.pos);
  }

  private scanToken(leading: string): TokenKind {
    const c = this.peek();

    if (c === '`') {
      const close = this.text.indexOf('`', this.pos + 1);
      if (close < 0) {
        this.pos++;
        return 'unknown';
      }
      this.pos = close + 1;
      return 'identifier';
    }

    if (IDENTIFIER_START.test(c)) {
      const start = this.pos;
      this.pos++;
      while (this.pos < this.text.length && IDENTIFIER_PART.test(this.peek())) {
        this.pos++;
      }
      const word = this.text.slice(start, this.pos);
      if (word === '_') return 'wildcard';
      return KEYWORDS.has(word) ? 'keyword' : 'identifier';
    }

    if (c >= '0' && c <= '9') {
      this.scanNumber();
      return 'number';
    }

    if (c === '"' || (c === '#' && this.rawDelimiterAt(this.pos) > 0)) {
      this.scanString();
      return 'string';
    }

    if (this.text.startsWith('->', this.pos)) {
      this.pos += 2;
      return 'arrow';
    }

    if (c === '.') {
      if (this.peek(1) === '.') {
        while (this.peek() === '.' || OPERATOR_CHARS.has(this.peek())) {
          this.pos++;
        }
        return 'operator';
      }
      this.pos++;
      return 'period';
    }

    if (OPERATOR_CHARS.has(c)) {
      if ((c === '?' || c === '!') && leading === '' && this.followsPostfixOperand()) {
        this.pos++;
        return 'operator';
      }
      while (OPERATOR_CHARS.has(this.peek()) && !this.text.startsWith('//', this.pos) && !this.text.startsWith('/*', this.pos)) {
        this.pos++;
      }
      return 'operator';
    }

    const punctuation = PUNCTUATION[c];
    if (punctuation !== undefined) {
      this.pos++;
      return punctuation;
    }

    const codePoint = this.text.codePointAt(this.pos) ?? 0;
    this.pos += codePoint > 0xffff ? 2 : 1;
    return 'unknown';
  }

  private followsPostfixOperand(): boolean {
    const previous = this.tokens[this.tokens.length - 1];
    if (previous === undefined || previous.trailingTrivia !== '') return false;
    switch (previous.tokenKind) {
      case 'identifier':
      case 'wildcard':
      case 'rightParen':
      case 'rightBracket':
      case 'rightBrace':
      case 'string':
      case 'number':
        return true;
      case 'keyword':
        return POSTFIX_KEYWORDS.has(previous.text);
      case 'operator':
        return previous.text === '?' || previous.text === '!';
      default:
        return false;
    }
  }

  private scanNumber(): void {
    const isPart = (ch: string): boolean => /[0-9a-zA-Z_]/.test(ch);
    while (isPart(this.peek())) this.pos++;
    if (this.peek() === '.' && /[0-9]/.test(this.peek(1))) {
      this.pos++;
      while (isPart(this.peek())) this.pos++;
    }
  }

  /**
   * Number of `#` opening a raw string at `pos`, or 0 when none does.
   */
  private rawDelimiterAt(pos: number): number {
    let end = pos;
    while (this.text[end] === '#') end++;
    return this.text[end] === '"' ? end - pos : 0;
  }

  /**
   * A string literal starting at `pos`, with or without `#` delimiters.
   * In a raw string a backslash escapes only when followed by the same
   * number of `#`, and only a quote followed by them closes it.
   */
  private scanString(): void {
    const start = this.pos;
    const hashes = '#'.repeat(this.rawDelimiterAt(this.pos));
    this.pos += hashes.length;
    const multiline = this.text.startsWith('"""', this.pos);
    this.pos += multiline ? 3 : 1;

    while (this.pos < this.text.length) {
      const c = this.peek();
      if (c === '\\' && this.text.startsWith(hashes, this.pos + 1)) {
        this.pos += 1 + hashes.length;
        if (this.peek() === '(') {
          this.pos++;
          this.scanInterpolation(start);
        } else {
          this.pos++;
        }
        continue;
      }
      if (multiline) {
        if (this.text.startsWith('"""' + hashes, this.pos)) {
          this.pos += 3 + hashes.length;
          return;
        }
      } else if (c === '"') {
        this.pos++;
        if (this.text.startsWith(hashes, this.pos)) {
          this.pos += hashes.length;
          return;
        }
        continue;
      } else if (c === '\n') {
        break;
      }
      this.pos++;
    }
    throw new ParseError('Unterminated string literal', start);
  }

  private scanInterpolation(stringStart: number): void {
    let depth = 1;
    while (this.pos < this.text.length) {
      const c = this.peek();
      if (c === '"' || (c === '#' && this.rawDelimiterAt(this.pos) > 0)) {
        this.scanString();
        continue;
      }
      if (c === '(') depth++;
      if (c === ')') {
        depth--;
        if (depth === 0) {
          this.pos++;
          return;
        }
      }
      this.pos++;
    }
    throw new ParseError('Unterminated string interpolation', stringStart);
  }
}

/**
 * Tokenize source text. The last token is always `eof`, carrying any
 * trailing whitespace and comments as its leading trivia.
 */
export function tokenize(text: string): SyntaxToken[] {
  return new Lexer(text).run();
}
