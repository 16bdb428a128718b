/**
 * Syntax module exports.
 */

export * from './types.js';
export * from './SyntaxTree.js';
export * from './nodes.js';
export { tokenize, KEYWORDS } from './Lexer.js';
export { ParseError, SwiftParser, parseSource } from './Parser.js';
export { LocationConverter } from './LocationConverter.js';
