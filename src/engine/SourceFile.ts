/**
 * One tree generation of a source unit together with what is
 * derived from it: text, location converter and suppression regions.
 */

import { CommandScanner } from '../regions/CommandScanner.js';
import { DisabledRegionResolver } from '../regions/DisabledRegionResolver.js';
import type { DisabledRegion, DisabledRegionSource } from '../regions/types.js';
import { LocationConverter } from '../syntax/LocationConverter.js';
import { SwiftParser } from '../syntax/Parser.js';
import { printSyntax } from '../syntax/SyntaxTree.js';
import type { SyntaxNode, SyntaxTreeProvider } from '../syntax/types.js';

export interface SourceFileOptions {
  path?: string;
  /**
   * Precomputed regions. When given they are used as-is for every tree
   * generation; otherwise `regionSource` scans each generation.
   */
  regions?: readonly DisabledRegion[];
  regionSource?: DisabledRegionSource;
  provider?: SyntaxTreeProvider;
}

export class SourceFile {
  readonly text: string;
  readonly converter: LocationConverter;
  readonly regions: readonly DisabledRegion[];
  readonly resolver: DisabledRegionResolver;

  private constructor(
    readonly tree: SyntaxNode,
    readonly path: string | undefined,
    private readonly regionSource: DisabledRegionSource | null,
    regions: readonly DisabledRegion[] | undefined
  ) {
    this.text = printSyntax(tree);
    this.converter = new LocationConverter(this.text);
    this.regions = regions ?? this.regionSource?.scan(tree, this.converter) ?? [];
    this.resolver = new DisabledRegionResolver(this.regions, this.converter);
  }

  /**
   * Parse text. Throws ParseError when the provider cannot parse it.
   */
  static parse(text: string, options: SourceFileOptions = {}): SourceFile {
    const provider = options.provider ?? new SwiftParser();
    return SourceFile.fromTree(provider.parse(text), options);
  }

  static fromTree(tree: SyntaxNode, options: SourceFileOptions = {}): SourceFile {
    const regionSource = options.regions === undefined ? options.regionSource ?? new CommandScanner() : null;
    return new SourceFile(tree, options.path, regionSource, options.regions);
  }

  /**
   * The next generation after a rewrite.
   */
  withTree(tree: SyntaxNode): SourceFile {
    if (tree === this.tree) return this;
    return new SourceFile(tree, this.path, this.regionSource, this.regionSource === null ? this.regions : undefined);
  }
}
