/**
 * Converts between absolute UTF-16 offsets and one-based line/column
 * locations for one source text.
 */

import type { SourceLocation } from './types.js';

export class LocationConverter {
  /** Offset of the first character of each line. */
  private readonly lineStarts: number[] = [0];

  constructor(private readonly text: string) {
    for (let i = 0; i < text.length; i++) {
      if (text.charCodeAt(i) === 10) {
        this.lineStarts.push(i + 1);
      }
    }
  }

  /** Length of the text in UTF-16 code units. */
  get length(): number {
    return this.text.length;
  }

  get lineCount(): number {
    return this.lineStarts.length;
  }

  /**
   * Location of an offset. Offsets past the end clamp to the end of text.
   */
  locationOf(offset: number): SourceLocation {
    const clamped = Math.max(0, Math.min(offset, this.text.length));
    let low = 0;
    let high = this.lineStarts.length - 1;
    while (low < high) {
      const mid = (low + high + 1) >> 1;
      if ((this.lineStarts[mid] ?? 0) <= clamped) {
        low = mid;
      } else {
        high = mid - 1;
      }
    }
    return { line: low + 1, column: clamped - (this.lineStarts[low] ?? 0) + 1 };
  }

  /**
   * Offset of a location, or undefined when the line does not exist or the
   * column lies beyond the line's end (its newline included).
   */
  offsetOf(location: SourceLocation): number | undefined {
    const start = this.lineStarts[location.line - 1];
    if (start === undefined || location.column < 1) return undefined;
    const next = this.lineStarts[location.line];
    const end = next === undefined ? this.text.length : next - 1;
    const offset = start + location.column - 1;
    return offset > end ? undefined : offset;
  }

  /**
   * Offset of a location, clamped into the text: a column past the end of
   * its line maps to the start of the next line, a line past the end maps
   * to the end of the text.
   */
  clampedOffsetOf(location: SourceLocation): number {
    const exact = this.offsetOf(location);
    if (exact !== undefined) return exact;
    if (location.line < 1) return 0;
    const next = this.lineStarts[location.line];
    if (location.line <= this.lineStarts.length && location.column < 1) {
      return this.lineStarts[location.line - 1] ?? 0;
    }
    return next === undefined ? this.text.length : next;
  }

  /** Offset range `[start, end)` of a line, excluding its newline. */
  lineRange(line: number): { start: number; end: number } | undefined {
    const start = this.lineStarts[line - 1];
    if (start === undefined) return undefined;
    const next = this.lineStarts[line];
    return { start, end: next === undefined ? this.text.length : next - 1 };
  }

  /**
   * Byte offset of a UTF-16 offset when the text is encoded as UTF-8.
   */
  utf8Offset(offset: number): number {
    return Buffer.byteLength(this.text.slice(0, Math.max(0, offset)), 'utf8');
  }

  /**
   * One-based column counted in UTF-8 bytes.
   */
  utf8Column(offset: number): number {
    const { line } = this.locationOf(offset);
    const start = this.lineStarts[line - 1] ?? 0;
    return Buffer.byteLength(this.text.slice(start, offset), 'utf8') + 1;
  }
}
