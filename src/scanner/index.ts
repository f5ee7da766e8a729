/**
 * Scanner Module
 * Exports the incremental scanner and batch tokenization
 */

export { Scanner } from './scanner.js';
export { tokenize } from './tokenize.js';
export type {
  EndOfInputEvent,
  Lexeme,
  ScannerOptions,
  ScanObservabilityCallbacks,
  ScanWindow,
  StepEvent,
  StepResult,
  TokenEvent,
  TokenizeResult,
  TrailingInput,
} from './types.js';
