/**
 * Rule Engine Module
 * Exports rule types, builders, and the match evaluator
 */

export type {
  AllRule,
  AlphabeticRule,
  AnyRule,
  BothRule,
  EitherRule,
  EndsWithRule,
  Extractor,
  IgnoreRule,
  LeafRule,
  LiteralRule,
  NotRule,
  NumericRule,
  OnlyRule,
  Rule,
  ValueRule,
  WhitespaceRule,
} from './types.js';
export {
  all,
  alphabetic,
  any,
  both,
  either,
  endsWith,
  ignore,
  literal,
  not,
  numeric,
  only,
  value,
  whitespace,
} from './builders.js';
export {
  fullMatch,
  isFullMatch,
  isNoMatch,
  isPartialMatch,
  NO_MATCH,
  PARTIAL_MATCH,
  type FullMatch,
  type MatchResult,
  type NoMatch,
  type PartialMatch,
} from './match-result.js';
export { isAlphabetic, isNumeric, isWhitespace } from './character-classes.js';
export { matches } from './matches.js';
export {
  childRules,
  formatRule,
  MAX_RULE_DEPTH,
  ruleDepth,
  validateRule,
} from './inspect.js';
