// ============================================================
// SOURCE LOCATION
// ============================================================

/** Position in the scanned buffer. Line and column are 1-based. */
export interface SourceLocation {
  readonly line: number;
  /** Column counted in code points */
  readonly column: number;
  /** UTF-16 offset into the buffer */
  readonly offset: number;
}

export interface SourceSpan {
  readonly start: SourceLocation;
  readonly end: SourceLocation;
}

export const START_LOCATION: SourceLocation = { line: 1, column: 1, offset: 0 };

/**
 * Walk `text` from `from` up to (not including) `offset`, tracking lines and
 * columns. `from.offset` must not exceed `offset`.
 */
export function advanceLocation(
  text: string,
  from: SourceLocation,
  offset: number
): SourceLocation {
  let { line, column } = from;
  let pos = from.offset;

  while (pos < offset) {
    const code = text.codePointAt(pos) ?? 0;
    pos += code > 0xffff ? 2 : 1;
    if (code === 0x0a) {
      line++;
      column = 1;
    } else {
      column++;
    }
  }

  return { line, column, offset: pos };
}
