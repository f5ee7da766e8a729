/**
 * Match Results
 * Tri-state outcome of evaluating one rule against one window
 */

/** The window cannot be part of anything the rule matches */
export interface NoMatch {
  readonly kind: 'none';
}

/** The window is a proper prefix of something the rule could fully match */
export interface PartialMatch {
  readonly kind: 'partial';
}

/** The window is a complete match */
export interface FullMatch<T> {
  readonly kind: 'full';
  /** Extracted value; undefined for rules that extract nothing */
  readonly value: T | undefined;
  /** Set when the match passed through an Ignore rule: the value must not be emitted */
  readonly ignored: boolean;
}

export type MatchResult<T> = NoMatch | PartialMatch | FullMatch<T>;

export const NO_MATCH: NoMatch = Object.freeze({ kind: 'none' });

export const PARTIAL_MATCH: PartialMatch = Object.freeze({ kind: 'partial' });

export function fullMatch<T>(value?: T): FullMatch<T> {
  return { kind: 'full', value, ignored: false };
}

export function isNoMatch<T>(result: MatchResult<T>): result is NoMatch {
  return result.kind === 'none';
}

export function isPartialMatch<T>(
  result: MatchResult<T>
): result is PartialMatch {
  return result.kind === 'partial';
}

export function isFullMatch<T>(result: MatchResult<T>): result is FullMatch<T> {
  return result.kind === 'full';
}
