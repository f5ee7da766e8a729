/**
 * rulelex
 * Exports the rule engine, scanner, grammar loader, and error types
 */

export * from './rule/index.js';
export * from './scanner/index.js';
export * from './grammar/index.js';

// ============================================================
// ERROR TAXONOMY
// ============================================================
export {
  createError,
  GrammarError,
  isEndOfInput,
  RulelexError,
  ScanError,
  type RulelexErrorData,
  type ScanErrorKind,
} from './error-classes.js';
export {
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorRegistry,
  type ErrorSeverity,
} from './error-registry.js';
export {
  advanceLocation,
  START_LOCATION,
  type SourceLocation,
  type SourceSpan,
} from './source-location.js';
