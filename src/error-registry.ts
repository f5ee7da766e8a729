/**
 * Error Registry
 * Central error definition registry with template rendering.
 */

// ============================================================
// ERROR CATEGORIES AND SEVERITY
// ============================================================

/** Error category determining error ID prefix */
export type ErrorCategory = 'scan' | 'grammar';

/** Error severity level */
export type ErrorSeverity = 'error' | 'warning';

/** Error registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: LEX-{category letter}{3-digit} (e.g., LEX-S001) */
  readonly errorId: string;
  readonly category: ErrorCategory;
  /** Severity level (defaults to 'error' when omitted) */
  readonly severity?: ErrorSeverity | undefined;
  /** Human-readable description */
  readonly description: string;
  /** Message template with {placeholder} syntax */
  readonly messageTemplate: string;
  /** What causes this error */
  readonly cause?: string | undefined;
  /** How to resolve this error */
  readonly resolution?: string | undefined;
}

// ============================================================
// ERROR REGISTRY
// ============================================================

/**
 * Lookup table for all error definitions.
 * Immutable after initialization.
 */
export interface ErrorRegistry {
  get(errorId: string): ErrorDefinition | undefined;
  has(errorId: string): boolean;
  readonly size: number;
  entries(): IterableIterator<[string, ErrorDefinition]>;
}

class ErrorRegistryImpl implements ErrorRegistry {
  private readonly byId: ReadonlyMap<string, ErrorDefinition>;

  constructor(definitions: ErrorDefinition[]) {
    const idMap = new Map<string, ErrorDefinition>();

    for (const def of definitions) {
      idMap.set(def.errorId, def);
    }

    this.byId = idMap;
  }

  get(errorId: string): ErrorDefinition | undefined {
    return this.byId.get(errorId);
  }

  has(errorId: string): boolean {
    return this.byId.has(errorId);
  }

  get size(): number {
    return this.byId.size;
  }

  entries(): IterableIterator<[string, ErrorDefinition]> {
    return this.byId.entries();
  }
}

const ERROR_DEFINITIONS: ErrorDefinition[] = [
  // Scan Errors (LEX-S0xx)
  {
    errorId: 'LEX-S000',
    category: 'scan',
    description: 'No diagnostic available',
    messageTemplate: 'Scan failed without a specific diagnosis',
    cause:
      'Reserved for hosts that wrap scanner failures without a more specific condition. The scanner never raises it.',
  },
  {
    errorId: 'LEX-S001',
    category: 'scan',
    severity: 'warning',
    description: 'End of input',
    messageTemplate: 'End of input reached at offset {offset}',
    cause:
      'The scan window grew past the end of the buffer. Raised once every token has been read, and also when trailing text never resolved to a full match.',
    resolution:
      'Treat as normal termination. Inspect the trailing text in the error context to detect unmatched input.',
  },
  {
    errorId: 'LEX-S002',
    category: 'scan',
    description: 'Unrecognized token',
    messageTemplate: 'Unrecognized input {text}',
    cause:
      'Strict scanning reached the end of the buffer with text that no rule fully matched.',
    resolution:
      'Add a rule covering the text, or wrap it in an ignore rule if it should be skipped.',
  },

  // Grammar Errors (LEX-G0xx)
  {
    errorId: 'LEX-G001',
    category: 'grammar',
    description: 'Invalid grammar source',
    messageTemplate: 'Invalid grammar: {reason}',
    cause: 'The grammar file is not valid YAML or JSON.',
    resolution: 'Fix the syntax reported by the YAML parser.',
  },
  {
    errorId: 'LEX-G002',
    category: 'grammar',
    description: 'Invalid rule node',
    messageTemplate: 'Invalid rule at {path}: {reason}',
    cause: 'A rule node has an unknown shape or a field of the wrong type.',
    resolution:
      'Use one of: numeric, alphabetic, whitespace, literal, endsWith, not, only, ignore, both, either, any, all, token/match, ref.',
  },
  {
    errorId: 'LEX-G003',
    category: 'grammar',
    description: 'Bad rule reference',
    messageTemplate: 'Rule reference {name} at {path} {reason}',
    cause: 'A ref names a rule that is not defined, or rules refer to each other in a cycle.',
    resolution: 'Define the named rule under rules, and keep references acyclic.',
  },
  {
    errorId: 'LEX-G004',
    category: 'grammar',
    description: 'Rule tree too deep',
    messageTemplate: 'Rule depth {depth} exceeds maximum allowed depth {max}',
    cause: 'The rule tree nests more combinators than the engine accepts.',
    resolution: 'Flatten nested any/all groups.',
  },
  {
    errorId: 'LEX-G005',
    category: 'grammar',
    description: 'Unreadable grammar file',
    messageTemplate: 'Cannot read grammar file {path}: {reason}',
    cause: 'The grammar file does not exist or cannot be read.',
    resolution: 'Check the --grammar path and file permissions.',
  },
];

/**
 * Global error registry instance.
 * Read-only singleton initialized at module load.
 */
export const ERROR_REGISTRY: ErrorRegistry = new ErrorRegistryImpl(
  ERROR_DEFINITIONS
);

// ============================================================
// TEMPLATE RENDERING
// ============================================================

/**
 * Renders a message template by replacing placeholders with context values.
 *
 * Missing context values render as empty string; other values are coerced
 * via String().
 *
 * @example
 * renderMessage("Unrecognized input {text}", { text: '"@"' })
 * // Returns: 'Unrecognized input "@"'
 */
export function renderMessage(
  template: string,
  context: Record<string, unknown>
): string {
  return template.replace(/\{(\w+)\}/g, (_match, name: string) => {
    const value = context[name];
    return value === undefined ? '' : String(value);
  });
}
