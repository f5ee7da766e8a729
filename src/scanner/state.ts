/**
 * Scanner State
 * Tracks the window over the buffer during scanning
 */

import {
  advanceLocation,
  START_LOCATION,
  type SourceLocation,
  type SourceSpan,
} from '../source-location.js';

export interface ScanState {
  readonly buffer: string;
  /** Window start (inclusive) */
  start: number;
  /** Window end (exclusive) */
  end: number;
  /** Location of `start`, kept so spans need not rescan the buffer */
  startLocation: SourceLocation;
  /** Set once end of input has been reported for this buffer */
  endReported: boolean;
}

export function createScanState(buffer: string): ScanState {
  return {
    buffer,
    start: 0,
    end: 0,
    startLocation: START_LOCATION,
    endReported: false,
  };
}

/**
 * Offset one code point past the window end. Returns a value past the
 * buffer length once the window already covers the whole buffer.
 */
export function nextBoundary(state: ScanState): number {
  if (state.end >= state.buffer.length) return state.end + 1;
  const code = state.buffer.codePointAt(state.end) ?? 0;
  return state.end + (code > 0xffff ? 2 : 1);
}

export function isExhausted(state: ScanState): boolean {
  return state.end >= state.buffer.length;
}

export function windowText(state: ScanState): string {
  return state.buffer.slice(state.start, state.end);
}

export function trailingText(state: ScanState): string {
  return state.buffer.slice(state.start);
}

export function locationAt(state: ScanState, offset: number): SourceLocation {
  return advanceLocation(state.buffer, state.startLocation, offset);
}

/** Span from the window start to `offset` */
export function spanTo(state: ScanState, offset: number): SourceSpan {
  return { start: state.startLocation, end: locationAt(state, offset) };
}

/** Consume the window: the next window starts where this one ended */
export function consume(state: ScanState, end: SourceLocation): void {
  state.start = state.end;
  state.startLocation = end;
}
