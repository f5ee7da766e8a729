/**
 * Character Classes
 * Whole-window predicates. The empty window satisfies every class.
 */

const NUMERIC_PATTERN = /^\p{N}*$/u;
const ALPHABETIC_PATTERN = /^\p{Alphabetic}*$/u;
const WHITESPACE_PATTERN = /^\p{White_Space}*$/u;

export function isNumeric(text: string): boolean {
  return NUMERIC_PATTERN.test(text);
}

export function isAlphabetic(text: string): boolean {
  return ALPHABETIC_PATTERN.test(text);
}

export function isWhitespace(text: string): boolean {
  return WHITESPACE_PATTERN.test(text);
}
