/**
 * Rule Inspection
 * Depth limits and printable rendering of rule trees
 */

import { GrammarError } from '../error-classes.js';
import type { Rule } from './types.js';

/** Maximum nesting depth accepted for a rule tree */
export const MAX_RULE_DEPTH = 64;

/** Direct children of a rule, in evaluation order */
export function childRules<T>(rule: Rule<T>): readonly Rule<T>[] {
  switch (rule.type) {
    case 'Literal':
    case 'Numeric':
    case 'Alphabetic':
    case 'Whitespace':
    case 'EndsWith':
      return [];
    case 'Value':
    case 'Ignore':
    case 'Not':
    case 'Only':
      return [rule.rule];
    case 'Both':
    case 'Either':
      return [rule.left, rule.right];
    case 'All':
    case 'Any':
      return rule.rules;
    default: {
      const _exhaustive: never = rule;
      throw new Error(
        `Unhandled rule type: ${(_exhaustive as Rule<T>).type}`
      );
    }
  }
}

/** Depth per node; shared subtrees are measured once */
const depthCache = new WeakMap<Rule<unknown>, number>();

/** Nesting depth of a rule tree. A leaf has depth 1. */
export function ruleDepth<T>(rule: Rule<T>): number {
  const cached = depthCache.get(rule);
  if (cached !== undefined) return cached;

  const maxChild = childRules(rule).reduce(
    (max, sub) => Math.max(max, ruleDepth(sub)),
    0
  );
  const depth = 1 + maxChild;
  depthCache.set(rule, depth);
  return depth;
}

/** Throws GrammarError (LEX-G004) if the tree exceeds MAX_RULE_DEPTH. */
export function validateRule<T>(rule: Rule<T>): void {
  const depth = ruleDepth(rule);
  if (depth > MAX_RULE_DEPTH) {
    throw new GrammarError('LEX-G004', { depth, max: MAX_RULE_DEPTH });
  }
}

/**
 * Render a rule tree on one line.
 *
 * @example
 * formatRule(any([ignore(whitespace()), value(literal('end'), f)]))
 * // 'any(ignore(whitespace), value(literal("end")))'
 */
export function formatRule<T>(rule: Rule<T>): string {
  switch (rule.type) {
    case 'Literal':
      return `literal(${JSON.stringify(rule.text)})`;
    case 'EndsWith':
      return `endsWith(${JSON.stringify(rule.suffix)})`;
    case 'Numeric':
      return 'numeric';
    case 'Alphabetic':
      return 'alphabetic';
    case 'Whitespace':
      return 'whitespace';
    default: {
      const name = rule.type.charAt(0).toLowerCase() + rule.type.slice(1);
      const args = childRules(rule).map((sub) => formatRule(sub));
      return `${name}(${args.join(', ')})`;
    }
  }
}
