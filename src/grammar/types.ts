/**
 * Grammar Types
 */

import type { Rule } from '../rule/index.js';

/** Value extracted by grammar-defined token rules */
export interface GrammarToken {
  /** Token name from the `token` field */
  readonly type: string;
  /** Matched text */
  readonly text: string;
}

export interface GrammarOptions {
  readonly strict: boolean;
}

/** A compiled grammar file */
export interface Grammar {
  /** Root rule the scanner runs */
  readonly rule: Rule<GrammarToken>;
  /** Named rules from the `rules` section */
  readonly rules: ReadonlyMap<string, Rule<GrammarToken>>;
  readonly options: GrammarOptions;
}
