/**
 * Grammar Loader
 * Reads grammar files written in YAML (or JSON, which YAML accepts).
 */

import { readFileSync } from 'node:fs';
import * as yaml from 'yaml';
import { GrammarError } from '../error-classes.js';
import type { SourceLocation } from '../source-location.js';
import { compileGrammar } from './compile.js';
import type { Grammar } from './types.js';

function yamlErrorLocation(err: yaml.YAMLError): SourceLocation | undefined {
  const pos = err.linePos?.[0];
  if (!pos) return undefined;
  return { line: pos.line, column: pos.col, offset: err.pos[0] };
}

function invalidSource(err: yaml.YAMLError): GrammarError {
  return new GrammarError(
    'LEX-G001',
    { reason: err.message.split('\n')[0] },
    yamlErrorLocation(err)
  );
}

/**
 * Parse and compile grammar source text.
 *
 * YAML warnings such as unresolved tags are rejected like syntax errors.
 *
 * @throws GrammarError (LEX-G001) when the text is not valid YAML
 */
export function parseGrammar(source: string): Grammar {
  const doc = yaml.parseDocument(source, { logLevel: 'silent' });
  const problem = doc.errors[0] ?? doc.warnings[0];
  if (problem) {
    throw invalidSource(problem);
  }
  const data: unknown = doc.toJS();
  return compileGrammar(data);
}

/**
 * Load a grammar file.
 *
 * @throws GrammarError (LEX-G005) if the file cannot be read
 */
export function loadGrammar(path: string): Grammar {
  let source: string;
  try {
    source = readFileSync(path, 'utf-8');
  } catch (err) {
    throw new GrammarError('LEX-G005', {
      path,
      reason: err instanceof Error ? err.message : String(err),
    });
  }
  return parseGrammar(source);
}
