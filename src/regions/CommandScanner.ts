/**
 * CommandScanner: finds suppression directives in comments and turns
 * them into disabled regions.
 *
 * Directive forms (inside any `//` or `/* *\/` comment):
 *
 *   lintkit:disable rule_a rule_b      suppress from here on
 *   lintkit:enable rule_a              end an earlier disable
 *   lintkit:disable:this all           suppress the comment's own line
 *   lintkit:disable:next rule_a        suppress the following line
 *   lintkit:disable:previous rule_a    suppress the preceding line
 *
 * `enable` takes the same line modifiers and carves the line out of any
 * region that covers it. A plain `disable` that is never closed runs to
 * the end of the file.
 */

import { tokensOf } from '../syntax/SyntaxTree.js';
import type { LocationConverter } from '../syntax/LocationConverter.js';
import type { SyntaxNode } from '../syntax/types.js';
import type { Directive, DirectiveScope, DisabledRegion, DisabledRegionSource, RegionRules } from './types.js';

const COMMENT_PATTERN = /\/\/[^\n]*|\/\*[\s\S]*?\*\//g;

type Span = [start: number, end: number];

function directivePattern(prefix: string): RegExp {
  return new RegExp(`${prefix}:(disable|enable)(?::(this|next|previous))?((?:[ \\t]+[A-Za-z0-9_]+)+)`, 'g');
}

function subtract(spans: Span[], [cutStart, cutEnd]: Span): Span[] {
  const result: Span[] = [];
  for (const [start, end] of spans) {
    if (cutEnd <= start || cutStart >= end) {
      result.push([start, end]);
      continue;
    }
    if (start < cutStart) result.push([start, cutStart]);
    if (cutEnd < end) result.push([cutEnd, end]);
  }
  return result;
}

function merge(spans: Span[]): Span[] {
  const sorted = spans.filter(([start, end]) => end > start).sort((a, b) => a[0] - b[0]);
  const result: Span[] = [];
  for (const span of sorted) {
    const last = result[result.length - 1];
    if (last !== undefined && span[0] <= last[1]) {
      last[1] = Math.max(last[1], span[1]);
    } else {
      result.push([span[0], span[1]]);
    }
  }
  return result;
}

export class CommandScanner implements DisabledRegionSource {
  private readonly pattern: RegExp;

  constructor(prefix = 'lintkit') {
    this.pattern = directivePattern(prefix);
  }

  /**
   * Every directive in the tree's comments, in source order.
   */
  directives(tree: SyntaxNode, converter: LocationConverter): Directive[] {
    const found: Directive[] = [];
    for (const { token, offset } of tokensOf(tree)) {
      if (!token.leadingTrivia.includes('/')) continue;
      for (const comment of token.leadingTrivia.matchAll(COMMENT_PATTERN)) {
        const commentOffset = offset + (comment.index ?? 0);
        for (const match of comment[0].matchAll(this.pattern)) {
          const [, action, scope, names] = match;
          const rules = (names ?? '').trim().split(/[ \t]+/);
          found.push({
            action: action === 'enable' ? 'enable' : 'disable',
            scope: this.toScope(scope),
            rules: rules.includes('all') ? 'all' : rules,
            offset: commentOffset,
            line: converter.locationOf(commentOffset).line,
          });
        }
      }
    }
    return found;
  }

  scan(tree: SyntaxNode, converter: LocationConverter): DisabledRegion[] {
    const directives = this.directives(tree, converter);
    const keys = new Set<string>();
    for (const directive of directives) {
      if (directive.action !== 'disable') continue;
      if (directive.rules === 'all') {
        keys.add('all');
      } else {
        directive.rules.forEach(rule => keys.add(rule));
      }
    }

    const regions: Array<{ span: Span; rules: RegionRules }> = [];
    for (const key of keys) {
      for (const span of this.spansFor(key, directives, converter)) {
        regions.push({ span, rules: key === 'all' ? 'all' : [key] });
      }
    }

    return regions
      .sort((a, b) => a.span[0] - b.span[0] || a.span[1] - b.span[1])
      .map(({ span, rules }) => ({
        range: { start: converter.locationOf(span[0]), end: converter.locationOf(span[1]) },
        rules,
      }));
  }

  private toScope(scope: string | undefined): DirectiveScope {
    return scope === 'this' || scope === 'next' || scope === 'previous' ? scope : 'from';
  }

  private spansFor(key: string, directives: Directive[], converter: LocationConverter): Span[] {
    const disables = (directive: Directive): boolean =>
      directive.rules === 'all' ? key === 'all' : directive.rules.includes(key);
    const enables = (directive: Directive): boolean =>
      directive.rules === 'all' || directive.rules.includes(key);

    let spans: Span[] = [];
    let openedAt: number | null = null;
    for (const directive of directives) {
      if (directive.scope !== 'from') continue;
      if (directive.action === 'disable' && disables(directive) && openedAt === null) {
        openedAt = directive.offset;
      } else if (directive.action === 'enable' && enables(directive) && openedAt !== null) {
        spans.push([openedAt, directive.offset]);
        openedAt = null;
      }
    }
    if (openedAt !== null) {
      spans.push([openedAt, converter.length]);
    }

    for (const directive of directives) {
      if (directive.scope === 'from' || directive.action !== 'disable' || !disables(directive)) continue;
      const line = this.lineSpan(directive, converter);
      if (line !== null) spans.push(line);
    }
    spans = merge(spans);

    for (const directive of directives) {
      if (directive.scope === 'from' || directive.action !== 'enable' || !enables(directive)) continue;
      const line = this.lineSpan(directive, converter);
      if (line !== null) spans = subtract(spans, line);
    }
    return spans;
  }

  /** The whole target line of a line-scoped directive, newline included. */
  private lineSpan(directive: Directive, converter: LocationConverter): Span | null {
    const delta = directive.scope === 'next' ? 1 : directive.scope === 'previous' ? -1 : 0;
    const range = converter.lineRange(directive.line + delta);
    if (range === undefined) return null;
    return [range.start, Math.min(range.end + 1, converter.length)];
  }
}
