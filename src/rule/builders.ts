/**
 * Rule Builders
 * Constructors for frozen rule nodes
 */

import type {
  AllRule,
  AlphabeticRule,
  AnyRule,
  BothRule,
  EitherRule,
  EndsWithRule,
  Extractor,
  IgnoreRule,
  LiteralRule,
  NotRule,
  NumericRule,
  OnlyRule,
  Rule,
  ValueRule,
  WhitespaceRule,
} from './types.js';

const NUMERIC: NumericRule = Object.freeze({ type: 'Numeric' });
const ALPHABETIC: AlphabeticRule = Object.freeze({ type: 'Alphabetic' });
const WHITESPACE: WhitespaceRule = Object.freeze({ type: 'Whitespace' });

export function literal(text: string): LiteralRule {
  return Object.freeze({ type: 'Literal', text });
}

export function numeric(): NumericRule {
  return NUMERIC;
}

export function alphabetic(): AlphabeticRule {
  return ALPHABETIC;
}

export function whitespace(): WhitespaceRule {
  return WHITESPACE;
}

export function endsWith(suffix: string): EndsWithRule {
  return Object.freeze({ type: 'EndsWith', suffix });
}

export function value<T>(rule: Rule<T>, extract: Extractor<T>): ValueRule<T> {
  return Object.freeze({ type: 'Value', rule, extract });
}

export function ignore<T>(rule: Rule<T>): IgnoreRule<T> {
  return Object.freeze({ type: 'Ignore', rule });
}

export function not<T>(rule: Rule<T>): NotRule<T> {
  return Object.freeze({ type: 'Not', rule });
}

export function only<T>(rule: Rule<T>): OnlyRule<T> {
  return Object.freeze({ type: 'Only', rule });
}

export function both<T>(left: Rule<T>, right: Rule<T>): BothRule<T> {
  return Object.freeze({ type: 'Both', left, right });
}

export function either<T>(left: Rule<T>, right: Rule<T>): EitherRule<T> {
  return Object.freeze({ type: 'Either', left, right });
}

export function all<T>(
  rules: readonly Rule<T>[],
  extract: Extractor<T>
): AllRule<T> {
  return Object.freeze({ type: 'All', rules: Object.freeze([...rules]), extract });
}

export function any<T>(rules: readonly Rule<T>[]): AnyRule<T> {
  return Object.freeze({ type: 'Any', rules: Object.freeze([...rules]) });
}
