/**
 * SyntaxTree — construction, inspection and persistent rewriting of trees.
 *
 * Every "with" operation returns a new node and leaves its input intact;
 * children that are not replaced are shared by reference.
 */

import type { NodeKind, SyntaxElement, SyntaxNode, SyntaxToken, TokenKind } from './types.js';

const lengthCache = new WeakMap<SyntaxNode, number>();

/**
 * Create a token.
 */
export function makeToken(
  tokenKind: TokenKind,
  text: string,
  leadingTrivia = '',
  trailingTrivia = ''
): SyntaxToken {
  return { type: 'token', tokenKind, text, leadingTrivia, trailingTrivia };
}

/**
 * Create a node.
 */
export function makeNode(kind: NodeKind, children: ReadonlyArray<SyntaxElement | null>): SyntaxNode {
  return { type: 'node', kind, children };
}

export function isNode(element: SyntaxElement | null | undefined): element is SyntaxNode {
  return element !== null && element !== undefined && element.type === 'node';
}

export function isToken(element: SyntaxElement | null | undefined): element is SyntaxToken {
  return element !== null && element !== undefined && element.type === 'token';
}

export function isNodeOfKind(
  element: SyntaxElement | null | undefined,
  kind: NodeKind
): element is SyntaxNode {
  return isNode(element) && element.kind === kind;
}

/**
 * Length of the element's text including all trivia, in UTF-16 code units.
 */
export function fullLength(element: SyntaxElement | null): number {
  if (element === null) return 0;
  if (element.type === 'token') {
    return element.leadingTrivia.length + element.text.length + element.trailingTrivia.length;
  }

  const cached = lengthCache.get(element);
  if (cached !== undefined) return cached;

  let total = 0;
  for (const child of element.children) {
    total += fullLength(child);
  }
  lengthCache.set(element, total);
  return total;
}

/**
 * Source text of an element, trivia included.
 */
export function printSyntax(element: SyntaxElement | null): string {
  const parts: string[] = [];
  for (const { token } of tokensOf(element)) {
    parts.push(token.leadingTrivia, token.text, token.trailingTrivia);
  }
  return parts.join('');
}

/**
 * Iterate the tokens of an element in source order with their start offsets
 * (leading trivia included), relative to `baseOffset`.
 */
export function* tokensOf(
  element: SyntaxElement | null,
  baseOffset = 0
): Generator<{ token: SyntaxToken; offset: number }> {
  if (element === null) return;
  if (element.type === 'token') {
    yield { token: element, offset: baseOffset };
    return;
  }
  let offset = baseOffset;
  for (const child of element.children) {
    yield* tokensOf(child, offset);
    offset += fullLength(child);
  }
}

/**
 * Structural equality: same kinds, same layout, same token texts and trivia.
 */
export function syntaxEquals(a: SyntaxElement | null, b: SyntaxElement | null): boolean {
  if (a === b) return true;
  if (a === null || b === null) return false;

  if (a.type === 'token' || b.type === 'token') {
    return (
      a.type === 'token' &&
      b.type === 'token' &&
      a.tokenKind === b.tokenKind &&
      a.text === b.text &&
      a.leadingTrivia === b.leadingTrivia &&
      a.trailingTrivia === b.trailingTrivia
    );
  }

  if (a.kind !== b.kind || a.children.length !== b.children.length) {
    return false;
  }
  return a.children.every((child, index) => syntaxEquals(child, b.children[index] ?? null));
}

/**
 * Replace one child. Returns the same node when the child is unchanged.
 */
export function withChild(node: SyntaxNode, index: number, child: SyntaxElement | null): SyntaxNode {
  if (index < 0 || index >= node.children.length) {
    throw new RangeError(`Child index ${index} out of range for ${node.kind}`);
  }
  if (node.children[index] === child) {
    return node;
  }
  const children = node.children.slice();
  children[index] = child;
  return makeNode(node.kind, children);
}

/**
 * Replace all children of a list-like node.
 */
export function withChildren(node: SyntaxNode, children: ReadonlyArray<SyntaxElement | null>): SyntaxNode {
  const unchanged =
    children.length === node.children.length &&
    children.every((child, index) => child === node.children[index]);
  return unchanged ? node : makeNode(node.kind, children);
}

/**
 * Resolve a child-index path from `root`.
 */
export function elementAtPath(root: SyntaxNode, path: readonly number[]): SyntaxElement | null {
  let current: SyntaxElement | null = root;
  for (const index of path) {
    if (!isNode(current)) return null;
    current = current.children[index] ?? null;
  }
  return current;
}

/**
 * Replace the element at `path` and rebuild every ancestor up to the root.
 * Siblings along the way are shared with the input tree.
 */
export function replaceAtPath(
  root: SyntaxNode,
  path: readonly number[],
  replacement: SyntaxElement | null
): SyntaxNode {
  if (path.length === 0) {
    if (!isNode(replacement)) {
      throw new TypeError('The root of a tree must be a node');
    }
    return replacement;
  }
  const [head, ...rest] = path;
  if (head === undefined) return root;
  const child = root.children[head];
  if (rest.length === 0) {
    return withChild(root, head, replacement);
  }
  if (!isNode(child)) {
    throw new RangeError(`No node at path ${path.join('.')} under ${root.kind}`);
  }
  return withChild(root, head, replaceAtPath(child, rest, replacement));
}

export function firstToken(element: SyntaxElement | null): SyntaxToken | null {
  if (element === null) return null;
  if (element.type === 'token') return element;
  for (const child of element.children) {
    const token = firstToken(child);
    if (token !== null) return token;
  }
  return null;
}

export function lastToken(element: SyntaxElement | null): SyntaxToken | null {
  if (element === null) return null;
  if (element.type === 'token') return element;
  for (let i = element.children.length - 1; i >= 0; i--) {
    const token = lastToken(element.children[i] ?? null);
    if (token !== null) return token;
  }
  return null;
}

export function withLeadingTrivia(element: SyntaxToken, trivia: string): SyntaxToken;
export function withLeadingTrivia(element: SyntaxNode, trivia: string): SyntaxNode;
export function withLeadingTrivia(element: SyntaxElement, trivia: string): SyntaxElement;
export function withLeadingTrivia(element: SyntaxElement, trivia: string): SyntaxElement {
  if (element.type === 'token') {
    return element.leadingTrivia === trivia ? element : { ...element, leadingTrivia: trivia };
  }
  const index = element.children.findIndex(child => firstToken(child) !== null);
  const child = element.children[index];
  if (index < 0 || child === null || child === undefined) return element;
  return withChild(element, index, withLeadingTrivia(child, trivia));
}

export function withTrailingTrivia(element: SyntaxToken, trivia: string): SyntaxToken;
export function withTrailingTrivia(element: SyntaxNode, trivia: string): SyntaxNode;
export function withTrailingTrivia(element: SyntaxElement, trivia: string): SyntaxElement;
export function withTrailingTrivia(element: SyntaxElement, trivia: string): SyntaxElement {
  if (element.type === 'token') {
    return element.trailingTrivia === trivia ? element : { ...element, trailingTrivia: trivia };
  }
  for (let index = element.children.length - 1; index >= 0; index--) {
    const child = element.children[index];
    if (child !== null && child !== undefined && lastToken(child) !== null) {
      return withChild(element, index, withTrailingTrivia(child, trivia));
    }
  }
  return element;
}

/**
 * A node plus where it sits: absolute offset (leading trivia included) and
 * the child-index path from the root. Cursors are only valid for the tree
 * generation they were created on.
 */
export class SyntaxCursor {
  constructor(
    readonly node: SyntaxNode,
    readonly offset: number,
    readonly path: readonly number[],
    readonly parent: SyntaxCursor | null
  ) {}

  static root(tree: SyntaxNode): SyntaxCursor {
    return new SyntaxCursor(tree, 0, [], null);
  }

  get endOffset(): number {
    return this.offset + fullLength(this.node);
  }

  /**
   * Cursors for the non-null node children, in order.
   */
  *children(): Generator<SyntaxCursor> {
    let offset = this.offset;
    for (let index = 0; index < this.node.children.length; index++) {
      const child = this.node.children[index] ?? null;
      if (isNode(child)) {
        yield new SyntaxCursor(child, offset, [...this.path, index], this);
      }
      offset += fullLength(child);
    }
  }

  /**
   * Absolute offset of `element` (a descendant found by identity), after
   * skipping its leading trivia.
   */
  positionOf(element: SyntaxElement): number | undefined {
    const start = locate(this.node, this.offset, element);
    if (start === undefined) return undefined;
    const token = firstToken(element);
    return start + (token === null ? 0 : token.leadingTrivia.length);
  }
}

function locate(current: SyntaxElement, offset: number, target: SyntaxElement): number | undefined {
  if (current === target) return offset;
  if (current.type === 'token') return undefined;
  let childOffset = offset;
  for (const child of current.children) {
    if (child !== null) {
      const found = locate(child, childOffset, target);
      if (found !== undefined) return found;
    }
    childOffset += fullLength(child);
  }
  return undefined;
}

/**
 * Pre-order walk. Returning `false` from `visit` skips the node's subtree.
 */
export function walk(tree: SyntaxNode, visit: (cursor: SyntaxCursor) => boolean | void): void {
  const visitCursor = (cursor: SyntaxCursor): void => {
    if (visit(cursor) === false) return;
    for (const child of cursor.children()) {
      visitCursor(child);
    }
  };
  visitCursor(SyntaxCursor.root(tree));
}
