#!/usr/bin/env node
/**
 * CLI Tokenize Entry Point
 *
 * Implements main(), parseArgs(), and runTokenize() for the rulelex binary.
 * Scans a file (or stdin) with a grammar file and prints the tokens.
 */

import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { loadGrammar, type GrammarToken } from './grammar/index.js';
import { formatRule } from './rule/index.js';
import { tokenize, type TokenizeResult } from './scanner/index.js';
import {
  formatError,
  formatOutput,
  formatStepEvent,
  formatTrailing,
  type OutputFormat,
} from './cli-shared.js';

/**
 * Parsed command-line arguments
 */
export type ParsedArgs =
  | {
      mode: 'tokenize';
      file: string;
      grammar: string;
      format: OutputFormat;
      strict: boolean;
      trace: boolean;
    }
  | { mode: 'explain'; grammar: string }
  | { mode: 'help' | 'version' };

const USAGE = `Usage:
  rulelex <input> --grammar <file>   Tokenize a file with a grammar
  rulelex - --grammar <file>         Read input from stdin
  rulelex --explain --grammar <file> Print the compiled root rule
  rulelex --help                     Show this help message
  rulelex --version                  Show version information

Options:
  -g, --grammar <file>  Grammar file (YAML or JSON)
  --format <text|json>  Output format (default: text)
  --strict              Fail on input no rule matched
  --trace               Print every scanner step to stderr`;

function takeValue(argv: string[], i: number, flag: string): string {
  const value = argv[i + 1];
  if (value === undefined || (value.startsWith('-') && value !== '-')) {
    throw new Error(`Missing value for ${flag}`);
  }
  return value;
}

/**
 * Parse command-line arguments into structured command
 *
 * @param argv - Raw command-line arguments (typically process.argv.slice(2))
 */
export function parseArgs(argv: string[]): ParsedArgs {
  if (argv.includes('--help') || argv.includes('-h')) {
    return { mode: 'help' };
  }
  if (argv.includes('--version') || argv.includes('-v')) {
    return { mode: 'version' };
  }

  let file: string | undefined;
  let grammar: string | undefined;
  let format: OutputFormat = 'text';
  let strict = false;
  let trace = false;
  let explain = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';

    switch (arg) {
      case '--grammar':
      case '-g':
        grammar = takeValue(argv, i, arg);
        i++;
        break;
      case '--format': {
        const value = takeValue(argv, i, arg);
        if (value !== 'text' && value !== 'json') {
          throw new Error(
            `Invalid format: ${value} (must be 'text' or 'json')`
          );
        }
        format = value;
        i++;
        break;
      }
      case '--strict':
        strict = true;
        break;
      case '--trace':
        trace = true;
        break;
      case '--explain':
        explain = true;
        break;
      default:
        if (arg.startsWith('-') && arg !== '-') {
          throw new Error(`Unknown option: ${arg}`);
        }
        if (file !== undefined) {
          throw new Error(`Unexpected argument: ${arg}`);
        }
        file = arg;
    }
  }

  if (grammar === undefined) {
    throw new Error('Missing --grammar option');
  }
  if (explain) {
    return { mode: 'explain', grammar };
  }
  if (file === undefined) {
    throw new Error('Missing input file argument');
  }
  return { mode: 'tokenize', file, grammar, format, strict, trace };
}

/**
 * Tokenize a file with a grammar file
 *
 * @param file - Input path or '-' for stdin
 * @throws GrammarError if the grammar cannot be loaded
 * @throws ScanError (UnrecognizedToken) when strict and input is left over
 */
export function runTokenize(options: {
  file: string;
  grammar: string;
  strict?: boolean;
  trace?: boolean;
}): TokenizeResult<GrammarToken> {
  const grammar = loadGrammar(options.grammar);
  const source =
    options.file === '-'
      ? fs.readFileSync(0, 'utf-8')
      : fs.readFileSync(options.file, 'utf-8');

  return tokenize(grammar.rule, source, {
    strict: options.strict === true || grammar.options.strict,
    observability: options.trace
      ? { onStep: (event) => console.error(formatStepEvent(event)) }
      : {},
  });
}

function readVersion(): string {
  const packageJsonPath = path.resolve(
    path.dirname(fileURLToPath(import.meta.url)),
    '../package.json'
  );
  try {
    const packageJson: unknown = JSON.parse(
      fs.readFileSync(packageJsonPath, 'utf-8')
    );
    if (
      typeof packageJson === 'object' &&
      packageJson !== null &&
      'version' in packageJson &&
      typeof packageJson.version === 'string'
    ) {
      return packageJson.version;
    }
  } catch {
    return '0.0.0'; // Fallback version
  }
  return '0.0.0';
}

/**
 * Entry point for the rulelex binary
 *
 * Writes tokens to stdout and errors to stderr. Exits 1 on any error.
 */
export async function main(): Promise<void> {
  try {
    const parsed = parseArgs(process.argv.slice(2));

    switch (parsed.mode) {
      case 'help':
        console.log(USAGE);
        return;

      case 'version':
        console.log(readVersion());
        return;

      case 'explain':
        console.log(formatRule(loadGrammar(parsed.grammar).rule));
        return;

      case 'tokenize': {
        const result = runTokenize(parsed);
        const output = formatOutput(result, parsed.format);
        if (output !== '') console.log(output);
        if (parsed.format === 'text' && result.trailing !== null) {
          console.error(formatTrailing(result.trailing));
        }
        return;
      }
    }
  } catch (err) {
    console.error(
      formatError(err instanceof Error ? err : new Error(String(err)))
    );
    process.exit(1);
  }
}

// Only run main if not in test environment
const shouldRunMain =
  process.env['NODE_ENV'] !== 'test' &&
  !process.env['VITEST'] &&
  !process.env['VITEST_WORKER_ID'];

if (shouldRunMain) {
  void main();
}
