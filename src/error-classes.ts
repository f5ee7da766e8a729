/**
 * Error Classes and Factory
 * Structured error types with registry-based error codes
 */

import type { SourceLocation } from './source-location.js';
import {
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
  type ErrorDefinition,
} from './error-registry.js';

// ============================================================
// ERROR DATA
// ============================================================

/** Structured error data for host applications */
export interface RulelexErrorData {
  readonly errorId: string;
  readonly message: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;
}

function lookupDefinition(
  errorId: string,
  category?: ErrorCategory
): ErrorDefinition {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  if (category !== undefined && definition.category !== category) {
    throw new TypeError(`Expected ${category} error ID, got: ${errorId}`);
  }
  return definition;
}

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base error class for all rulelex errors.
 * Provides structured data for host applications to format as needed.
 */
export class RulelexError extends Error {
  readonly errorId: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;

  constructor(data: RulelexErrorData) {
    if (!data.errorId) {
      throw new TypeError('errorId is required');
    }
    lookupDefinition(data.errorId);

    const locationStr = data.location
      ? ` at ${data.location.line}:${data.location.column}`
      : '';
    super(`${data.message}${locationStr}`);
    this.name = 'RulelexError';
    this.errorId = data.errorId;
    this.location = data.location;
    this.context = data.context;
  }

  /** Get structured error data for custom formatting */
  toData(): RulelexErrorData {
    return {
      errorId: this.errorId,
      message: this.message.replace(/ at \d+:\d+$/, ''), // Strip location suffix
      location: this.location,
      context: this.context,
    };
  }

  /** Format error for display (can be overridden by host) */
  format(formatter?: (data: RulelexErrorData) => string): string {
    if (formatter) return formatter(this.toData());
    return this.message;
  }
}

// ============================================================
// ERROR FACTORY
// ============================================================

/**
 * Create an error from the registry, rendering its message template with
 * `context`.
 *
 * @throws TypeError if errorId is not found in registry
 *
 * @example
 * createError('LEX-G005', { path: 'lua.yaml', reason: 'ENOENT' })
 * // message: "Cannot read grammar file lua.yaml: ENOENT"
 */
export function createError(
  errorId: string,
  context: Record<string, unknown>,
  location?: SourceLocation | undefined
): RulelexError {
  const definition = lookupDefinition(errorId);
  return new RulelexError({
    errorId,
    message: renderMessage(definition.messageTemplate, context),
    location,
    context,
  });
}

// ============================================================
// SPECIALIZED ERROR CLASSES
// ============================================================

/** Failure kinds a scan can report */
export type ScanErrorKind = 'NoSignal' | 'EndOfInput' | 'UnrecognizedToken';

const SCAN_ERROR_IDS: Record<ScanErrorKind, string> = {
  NoSignal: 'LEX-S000',
  EndOfInput: 'LEX-S001',
  UnrecognizedToken: 'LEX-S002',
};

/** Scan-time errors */
export class ScanError extends RulelexError {
  readonly kind: ScanErrorKind;

  constructor(
    kind: ScanErrorKind,
    context: Record<string, unknown> = {},
    location?: SourceLocation
  ) {
    const errorId = SCAN_ERROR_IDS[kind];
    const definition = lookupDefinition(errorId, 'scan');
    super({
      errorId,
      message: renderMessage(definition.messageTemplate, context),
      location,
      context,
    });
    this.name = 'ScanError';
    this.kind = kind;
  }
}

/** Grammar definition and loading errors */
export class GrammarError extends RulelexError {
  constructor(
    errorId: string,
    context: Record<string, unknown>,
    location?: SourceLocation
  ) {
    const definition = lookupDefinition(errorId, 'grammar');
    super({
      errorId,
      message: renderMessage(definition.messageTemplate, context),
      location,
      context,
    });
    this.name = 'GrammarError';
  }
}

/** True for the end-of-input condition that terminates a scan */
export function isEndOfInput(error: unknown): error is ScanError {
  return error instanceof ScanError && error.kind === 'EndOfInput';
}
