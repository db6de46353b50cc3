// Line/offset arithmetic over raw source text. Lines and columns are 1-based.

export interface SourceLocation {
  line: number;
  column: number;
}

export function computeLineStarts(text: string): number[] {
  const starts = [0];
  for (let i = 0; i < text.length; i += 1) {
    const ch = text.charCodeAt(i);
    if (ch === 13 /* CR */ || ch === 10 /* LF */) {
      if (ch === 13 /* CR */ && text.charCodeAt(i + 1) === 10 /* LF */) i += 1;
      starts.push(i + 1);
    }
  }
  return starts;
}

/**
 * Precomputed line starts for one source text.
 *
 * `characterPosition(line, column)` is `lineStart + column - 2`: the `-1`
 * turns the 1-based column into an offset and the second `-1` steps from the
 * first character of a tag name back to its `<`, which is where structural
 * readers point an element's column.
 */
export class PositionIndex {
  readonly lineStarts: readonly number[];

  constructor(readonly text: string) {
    this.lineStarts = computeLineStarts(text);
  }

  get lineCount(): number {
    return this.lineStarts.length;
  }

  /** Offset of the first character of `line`, or -1 when out of range. */
  lineStart(line: number): number {
    return this.lineStarts[line - 1] ?? -1;
  }

  characterPosition(line: number, column: number): number {
    const start = this.lineStart(line);
    if (start < 0) return -1;
    return start + column - 2;
  }

  /** Inverse mapping: offset → 1-based line and column. */
  locationAt(offset: number): SourceLocation {
    const clamped = Math.max(0, Math.min(offset, this.text.length));
    let low = 0;
    let high = this.lineStarts.length - 1;
    while (low < high) {
      const mid = (low + high + 1) >> 1;
      if ((this.lineStarts[mid] ?? Number.POSITIVE_INFINITY) <= clamped) low = mid;
      else high = mid - 1;
    }
    return { line: low + 1, column: clamped - (this.lineStarts[low] ?? 0) + 1 };
  }
}
