/**
 * Rule Evaluation
 * Classifies a window against a rule tree. Pure: the result depends only on
 * the rule and the window text.
 */

import { isAlphabetic, isNumeric, isWhitespace } from './character-classes.js';
import {
  fullMatch,
  isFullMatch,
  isNoMatch,
  NO_MATCH,
  PARTIAL_MATCH,
  type MatchResult,
} from './match-result.js';
import type { AllRule, AnyRule, EitherRule, Rule } from './types.js';

function fromPredicate<T>(ok: boolean): MatchResult<T> {
  return ok ? fullMatch<T>() : NO_MATCH;
}

function matchLiteral<T>(text: string, window: string): MatchResult<T> {
  if (window === text) return fullMatch<T>();
  if (text.startsWith(window)) return PARTIAL_MATCH;
  return NO_MATCH;
}

/**
 * Ordered disjunction. A partial left side defers the decision rather than
 * falling through, so the earlier alternative wins ties once it completes.
 */
function matchEither<T>(rule: EitherRule<T>, window: string): MatchResult<T> {
  const left = matches(rule.left, window);
  if (!isNoMatch(left)) return left;
  return matches(rule.right, window);
}

/** Ordered conjunction; the first non-full member decides. */
function matchAll<T>(rule: AllRule<T>, window: string): MatchResult<T> {
  for (const sub of rule.rules) {
    const result = matches(sub, window);
    if (!isFullMatch(result)) return result;
  }
  return fullMatch(rule.extract(window));
}

/**
 * First full match wins, but only while no earlier alternative is still a
 * partial candidate. Never reports a partial match itself.
 */
function matchAny<T>(rule: AnyRule<T>, window: string): MatchResult<T> {
  let partials = 0;

  for (const sub of rule.rules) {
    const result = matches(sub, window);
    switch (result.kind) {
      case 'partial':
        partials++;
        break;
      case 'full':
        if (partials === 0) return result;
        break;
      case 'none':
        break;
    }
  }

  return NO_MATCH;
}

export function matches<T>(rule: Rule<T>, window: string): MatchResult<T> {
  switch (rule.type) {
    case 'Literal':
      return matchLiteral(rule.text, window);

    case 'Numeric':
      return fromPredicate(isNumeric(window));

    case 'Alphabetic':
      return fromPredicate(isAlphabetic(window));

    case 'Whitespace':
      return fromPredicate(isWhitespace(window));

    case 'EndsWith':
      return fromPredicate(window.endsWith(rule.suffix));

    case 'Value': {
      const inner = matches(rule.rule, window);
      if (isFullMatch(inner)) return fullMatch(rule.extract(window));
      return inner;
    }

    case 'Ignore': {
      const inner = matches(rule.rule, window);
      if (isFullMatch(inner)) return { ...inner, ignored: true };
      return inner;
    }

    case 'Not':
      return fromPredicate(isNoMatch(matches(rule.rule, window)));

    case 'Only':
      return matches(rule.rule, window);

    case 'Both':
      return fromPredicate(
        isFullMatch(matches(rule.left, window)) &&
          isFullMatch(matches(rule.right, window))
      );

    case 'Either':
      return matchEither(rule, window);

    case 'All':
      return matchAll(rule, window);

    case 'Any':
      return matchAny(rule, window);

    default: {
      const _exhaustive: never = rule;
      throw new Error(
        `Unhandled rule type: ${(_exhaustive as Rule<T>).type}`
      );
    }
  }
}
