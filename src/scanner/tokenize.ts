/**
 * Tokenize
 * Runs a scanner over a whole buffer and collects its tokens
 */

import type { Rule } from '../rule/index.js';
import { Scanner } from './scanner.js';
import type { Lexeme, ScannerOptions, TokenizeResult } from './types.js';

/**
 * Scan `source` to the end and collect every emitted token.
 *
 * Input left unconsumed at the end is returned as `trailing`; with
 * `strict: true` it raises ScanError (UnrecognizedToken) instead.
 */
export function tokenize<T>(
  rule: Rule<T>,
  source: string,
  options: ScannerOptions<T> = {}
): TokenizeResult<T> {
  const scanner = Scanner.withBuffer(rule, source, options);
  const tokens: Lexeme<T>[] = [];

  for (const lexeme of scanner.lexemes()) {
    tokens.push(lexeme);
  }

  return { tokens, trailing: scanner.trailingInput() };
}
