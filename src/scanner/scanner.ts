/**
 * Scanner
 * Grows a window over the buffer one code point at a time and asks the rule
 * tree to classify it. A full match consumes the window; anything else keeps
 * growing it.
 */

import { isEndOfInput, ScanError } from '../error-classes.js';
import {
  isFullMatch,
  matches,
  validateRule,
  type Rule,
} from '../rule/index.js';
import {
  consume,
  createScanState,
  isExhausted,
  nextBoundary,
  spanTo,
  trailingText,
  windowText,
  type ScanState,
} from './state.js';
import type {
  Lexeme,
  ScannerOptions,
  ScanWindow,
  StepResult,
  TrailingInput,
} from './types.js';

export class Scanner<T> implements Iterable<T | undefined> {
  readonly rule: Rule<T>;
  private readonly options: ScannerOptions<T>;
  private state: ScanState;

  /**
   * Create a scanner with an empty buffer. Bind input with `reset`.
   *
   * @throws GrammarError (LEX-G004) if the rule tree is too deep
   */
  constructor(rule: Rule<T>, options: ScannerOptions<T> = {}) {
    validateRule(rule);
    this.rule = rule;
    this.options = options;
    this.state = createScanState('');
  }

  /** Create a scanner bound to `buffer` */
  static withBuffer<T>(
    rule: Rule<T>,
    buffer: string,
    options: ScannerOptions<T> = {}
  ): Scanner<T> {
    const scanner = new Scanner(rule, options);
    scanner.reset(buffer);
    return scanner;
  }

  get buffer(): string {
    return this.state.buffer;
  }

  get window(): ScanWindow {
    return { start: this.state.start, end: this.state.end };
  }

  /** Text of the current window */
  get current(): string {
    return windowText(this.state);
  }

  /** Text from the window start to the end of the buffer */
  get trailing(): string {
    return trailingText(this.state);
  }

  /** True once the next step can only report end of input */
  get done(): boolean {
    return isExhausted(this.state);
  }

  /** Bind a new buffer and move the window back to the start */
  reset(buffer: string): void {
    this.state = createScanState(buffer);
  }

  /**
   * Grow the window by one code point and classify it.
   *
   * @throws ScanError (EndOfInput) once the window cannot grow any further
   */
  step(): StepResult<T> {
    const state = this.state;
    const end = nextBoundary(state);

    if (end > state.buffer.length) {
      throw this.endOfInput();
    }

    state.end = end;
    const text = windowText(state);
    const result = matches(this.rule, text);
    const span = spanTo(state, end);
    const observability = this.options.observability;

    observability?.onStep?.({
      window: { start: state.start, end },
      text,
      result: result.kind,
      span,
    });

    if (!isFullMatch(result)) {
      return { token: undefined, consumed: false, text, span };
    }

    consume(state, span.end);
    const token = result.ignored ? undefined : result.value;
    if (token !== undefined) {
      observability?.onToken?.({ value: token, text, span });
    }
    return { token, consumed: true, text, span };
  }

  /**
   * One item per step: the emitted value, or undefined when the step emitted
   * nothing. Ends quietly at end of input unless the scanner is strict and
   * input was left unconsumed.
   */
  *[Symbol.iterator](): Generator<T | undefined, void, undefined> {
    for (;;) {
      const result = this.nextStep();
      if (result === null) return;
      yield result.token;
    }
  }

  /** Emitted tokens with their text and span, skipping empty steps */
  *lexemes(): Generator<Lexeme<T>, void, undefined> {
    for (;;) {
      const result = this.nextStep();
      if (result === null) return;
      if (result.token !== undefined) {
        yield { value: result.token, text: result.text, span: result.span };
      }
    }
  }

  /** Unconsumed input, or null when the buffer was fully consumed */
  trailingInput(): TrailingInput | null {
    const text = trailingText(this.state);
    if (text === '') return null;
    return { text, span: spanTo(this.state, this.state.buffer.length) };
  }

  private nextStep(): StepResult<T> | null {
    try {
      return this.step();
    } catch (error) {
      if (!isEndOfInput(error)) throw error;
      if (this.options.strict === true) this.assertConsumed();
      return null;
    }
  }

  private assertConsumed(): void {
    const trailing = this.trailingInput();
    if (trailing === null) return;
    throw new ScanError(
      'UnrecognizedToken',
      { text: JSON.stringify(trailing.text), trailing: trailing.text },
      trailing.span.start
    );
  }

  private endOfInput(): ScanError {
    const state = this.state;
    const trailing = trailingText(state);
    const span = spanTo(state, state.buffer.length);

    if (!state.endReported) {
      state.endReported = true;
      this.options.observability?.onEndOfInput?.({ trailing, span });
    }

    return new ScanError(
      'EndOfInput',
      { offset: state.buffer.length, trailing },
      span.end
    );
  }
}
