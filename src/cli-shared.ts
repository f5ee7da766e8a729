/**
 * CLI Shared Utilities
 * Formatting functions for CLI output
 */

import type { GrammarToken } from './grammar/index.js';
import type {
  Lexeme,
  StepEvent,
  TokenizeResult,
  TrailingInput,
} from './scanner/index.js';
import { GrammarError, RulelexError, ScanError } from './error-classes.js';

export type OutputFormat = 'text' | 'json';

/**
 * Format one token as `line:column TYPE "text"`
 *
 * @example
 * formatLexeme({ value: { type: 'END', text: 'end' }, text: 'end', span })
 * // '4:1 END "end"'
 */
export function formatLexeme(lexeme: Lexeme<GrammarToken>): string {
  const { line, column } = lexeme.span.start;
  return `${line}:${column} ${lexeme.value.type} ${JSON.stringify(lexeme.text)}`;
}

/** Warning line for input the scan could not consume */
export function formatTrailing(trailing: TrailingInput): string {
  const { line, column } = trailing.span.start;
  return `warning: unmatched trailing input ${JSON.stringify(trailing.text)} at ${line}:${column}`;
}

/** Trace line for a single scanner step */
export function formatStepEvent(event: StepEvent<GrammarToken>): string {
  const { start, end } = event.window;
  return `window [${start},${end}) ${JSON.stringify(event.text)} -> ${event.result}`;
}

/** Render a tokenize result for stdout */
export function formatOutput(
  result: TokenizeResult<GrammarToken>,
  format: OutputFormat
): string {
  if (format === 'json') {
    return JSON.stringify(
      {
        tokens: result.tokens.map((lexeme) => ({
          type: lexeme.value.type,
          text: lexeme.text,
          span: lexeme.span,
        })),
        trailing: result.trailing,
      },
      null,
      2
    );
  }
  return result.tokens.map(formatLexeme).join('\n');
}

/**
 * Format error for stderr output
 */
export function formatError(err: Error): string {
  if (err instanceof RulelexError) {
    const kind =
      err instanceof GrammarError
        ? 'Grammar error'
        : err instanceof ScanError
          ? 'Scan error'
          : 'Error';
    const baseMessage = err.message.replace(/ at \d+:\d+$/, '');
    const location = err.location;
    if (location) {
      return `${kind} at line ${location.line}: ${baseMessage} [${err.errorId}]`;
    }
    return `${kind}: ${baseMessage} [${err.errorId}]`;
  }

  // Handle file not found errors (ENOENT)
  if ('code' in err && err.code === 'ENOENT' && 'path' in err) {
    return `File not found: ${String(err.path)}`;
  }

  return err.message;
}
