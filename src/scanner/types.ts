/**
 * Scanner Types
 * Public types for scanner configuration, step results, and events.
 */

import type { MatchResult } from '../rule/index.js';
import type { SourceSpan } from '../source-location.js';

/** Current candidate token, as offsets into the buffer */
export interface ScanWindow {
  readonly start: number;
  readonly end: number;
}

/** Observability callbacks for monitoring a scan */
export interface ScanObservabilityCallbacks<T> {
  /** Called after each window evaluation */
  onStep?: (event: StepEvent<T>) => void;
  /** Called when a full match emits a value */
  onToken?: (event: TokenEvent<T>) => void;
  /** Called the first time a step runs past the end of the current buffer */
  onEndOfInput?: (event: EndOfInputEvent) => void;
}

/** Event emitted after a window is classified */
export interface StepEvent<T> {
  readonly window: ScanWindow;
  readonly text: string;
  readonly result: MatchResult<T>['kind'];
  readonly span: SourceSpan;
}

/** Event emitted for each emitted token */
export interface TokenEvent<T> {
  readonly value: T;
  readonly text: string;
  readonly span: SourceSpan;
}

/** Event emitted on end of input */
export interface EndOfInputEvent {
  /** Unconsumed text left in the window (empty when everything matched) */
  readonly trailing: string;
  readonly span: SourceSpan;
}

/** Options for creating a scanner */
export interface ScannerOptions<T> {
  /** Raise UnrecognizedToken for unconsumed trailing input instead of ending quietly */
  strict?: boolean;
  /** Observability callbacks */
  observability?: ScanObservabilityCallbacks<T>;
}

/** Result of a single step */
export interface StepResult<T> {
  /** Emitted value; undefined when nothing was emitted this step */
  readonly token: T | undefined;
  /** True when the window fully matched and was consumed */
  readonly consumed: boolean;
  /** Window text evaluated by this step */
  readonly text: string;
  readonly span: SourceSpan;
}

/** An emitted token with the text it was extracted from */
export interface Lexeme<T> {
  readonly value: T;
  readonly text: string;
  readonly span: SourceSpan;
}

/** Input left unconsumed when the scan reached the end of the buffer */
export interface TrailingInput {
  readonly text: string;
  readonly span: SourceSpan;
}

/** Result of tokenizing a whole buffer */
export interface TokenizeResult<T> {
  readonly tokens: Lexeme<T>[];
  /** null when the whole buffer was consumed */
  readonly trailing: TrailingInput | null;
}
