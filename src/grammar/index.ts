/**
 * Grammar Module
 * Declarative rule trees loaded from YAML or JSON
 */

export { compileGrammar } from './compile.js';
export { loadGrammar, parseGrammar } from './load.js';
export type { Grammar, GrammarOptions, GrammarToken } from './types.js';
