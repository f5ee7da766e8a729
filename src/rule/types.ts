/**
 * Rule Types
 * Closed set of matching rules. Leaves test the window directly; combinators
 * delegate to child rules. Trees are acyclic and never mutated once built.
 */

/**
 * Produces a token value from the matched window text.
 * May run several times for one lexeme while the window grows, so it must
 * not rely on side effects.
 */
export type Extractor<T> = (text: string) => T;

// ============================================================
// LEAVES
// ============================================================

/** Window equals `text`; any proper prefix of `text` is a partial match */
export interface LiteralRule {
  readonly type: 'Literal';
  readonly text: string;
}

/** Every code point is numeric (Unicode N) */
export interface NumericRule {
  readonly type: 'Numeric';
}

/** Every code point is alphabetic (Unicode Alphabetic) */
export interface AlphabeticRule {
  readonly type: 'Alphabetic';
}

/** Every code point is whitespace (Unicode White_Space) */
export interface WhitespaceRule {
  readonly type: 'Whitespace';
}

/** Window ends with `suffix` */
export interface EndsWithRule {
  readonly type: 'EndsWith';
  readonly suffix: string;
}

// ============================================================
// UNARY COMBINATORS
// ============================================================

/** Extract a value from the whole window when `rule` fully matches */
export interface ValueRule<T> {
  readonly type: 'Value';
  readonly rule: Rule<T>;
  readonly extract: Extractor<T>;
}

/** Match like `rule`, but the scanner discards the value */
export interface IgnoreRule<T> {
  readonly type: 'Ignore';
  readonly rule: Rule<T>;
}

/** Full match exactly when `rule` does not match at all */
export interface NotRule<T> {
  readonly type: 'Not';
  readonly rule: Rule<T>;
}

/** Grouping; classifies exactly like `rule` */
export interface OnlyRule<T> {
  readonly type: 'Only';
  readonly rule: Rule<T>;
}

// ============================================================
// BINARY COMBINATORS
// ============================================================

/** Both sides fully match */
export interface BothRule<T> {
  readonly type: 'Both';
  readonly left: Rule<T>;
  readonly right: Rule<T>;
}

/** Left, or right once left is out of the running */
export interface EitherRule<T> {
  readonly type: 'Either';
  readonly left: Rule<T>;
  readonly right: Rule<T>;
}

// ============================================================
// N-ARY COMBINATORS
// ============================================================

/** Every rule fully matches; `extract` runs once on the window */
export interface AllRule<T> {
  readonly type: 'All';
  readonly rules: readonly Rule<T>[];
  readonly extract: Extractor<T>;
}

/** First full match wins while no earlier alternative is still partial */
export interface AnyRule<T> {
  readonly type: 'Any';
  readonly rules: readonly Rule<T>[];
}

export type LeafRule =
  | LiteralRule
  | NumericRule
  | AlphabeticRule
  | WhitespaceRule
  | EndsWithRule;

export type Rule<T> =
  | LeafRule
  | ValueRule<T>
  | IgnoreRule<T>
  | NotRule<T>
  | OnlyRule<T>
  | BothRule<T>
  | EitherRule<T>
  | AllRule<T>
  | AnyRule<T>;
