/**
 * Tests for tree construction and persistent rewriting.
 */

import { describe, it, expect } from 'vitest';
import {
  elementAtPath,
  fullLength,
  makeNode,
  makeToken,
  printSyntax,
  replaceAtPath,
  syntaxEquals,
  SyntaxCursor,
  walk,
  withChild,
  withLeadingTrivia,
  withTrailingTrivia,
} from './SyntaxTree.js';
import { parseSource } from './Parser.js';
import type { NodeKind } from './types.js';

function pair() {
  const left = makeNode('IdentifierExpr', [makeToken('identifier', 'a', '  ', ' ')]);
  const right = makeNode('IdentifierExpr', [makeToken('identifier', 'b')]);
  return { left, right, root: makeNode('SequenceExpr', [left, null, right]) };
}

describe('SyntaxTree', () => {
  it('measures full length including trivia', () => {
    const { root } = pair();
    expect(fullLength(root)).toBe(5);
    expect(printSyntax(root)).toBe('  a b');
  });

  it('returns the same node when a child is unchanged', () => {
    const { root, left } = pair();
    expect(withChild(root, 0, left)).toBe(root);
  });

  it('rejects out-of-range child indexes', () => {
    const { root } = pair();
    expect(() => withChild(root, 3, null)).toThrow(RangeError);
  });

  it('shares untouched siblings when replacing by path', () => {
    const { root, right } = pair();
    const replacement = makeToken('identifier', 'z', '  ', ' ');
    const next = replaceAtPath(root, [0, 0], replacement);

    expect(next).not.toBe(root);
    expect(next.children[2]).toBe(right);
    expect(elementAtPath(next, [0, 0])).toBe(replacement);
    expect(printSyntax(next)).toBe('  z b');
    expect(printSyntax(root)).toBe('  a b');
  });

  it('compares structurally', () => {
    expect(syntaxEquals(pair().root, pair().root)).toBe(true);
    const { root } = pair();
    const changed = replaceAtPath(root, [2, 0], makeToken('identifier', 'b', ' '));
    expect(syntaxEquals(root, changed)).toBe(false);
  });

  it('edits trivia at the edges of a node', () => {
    const { root } = pair();
    expect(printSyntax(withLeadingTrivia(root, ''))).toBe('a b');
    expect(printSyntax(withTrailingTrivia(root, '\t'))).toBe('  a b\t');
  });

  it('walks in pre-order and can skip subtrees', () => {
    const tree = parseSource('f(g(x))');
    const all: NodeKind[] = [];
    walk(tree, cursor => {
      all.push(cursor.node.kind);
    });
    expect(all.filter(kind => kind === 'FunctionCallExpr')).toHaveLength(2);

    const shallow: NodeKind[] = [];
    walk(tree, cursor => {
      shallow.push(cursor.node.kind);
      return cursor.node.kind !== 'FunctionCallExpr';
    });
    expect(shallow.filter(kind => kind === 'FunctionCallExpr')).toHaveLength(1);
  });

  it('computes offsets of descendants from a cursor', () => {
    const tree = parseSource('let a = 1\nlet b = 2');
    const cursors: SyntaxCursor[] = [];
    walk(tree, cursor => {
      if (cursor.node.kind === 'VariableDecl') cursors.push(cursor);
    });
    expect(cursors.map(cursor => cursor.offset)).toEqual([0, 9]);

    const second = cursors[1];
    const keyword = second?.node.children[2] ?? null;
    expect(keyword === null ? undefined : second?.positionOf(keyword)).toBe(10);
  });
});
