/**
 * Grammar Compiler
 * Validates parsed grammar data and builds the rule tree it describes.
 */

import { GrammarError } from '../error-classes.js';
import {
  all,
  alphabetic,
  any,
  both,
  either,
  endsWith,
  ignore,
  literal,
  not,
  numeric,
  only,
  validateRule,
  value,
  whitespace,
  type Extractor,
  type Rule,
} from '../rule/index.js';
import type { Grammar, GrammarOptions, GrammarToken } from './types.js';

type GrammarRule = Rule<GrammarToken>;

interface CompileContext {
  readonly definitions: Record<string, unknown>;
  readonly compiled: Map<string, GrammarRule>;
  /** Names currently being compiled, for cycle detection */
  readonly resolving: Set<string>;
}

const TOP_LEVEL_KEYS = new Set(['rules', 'rule', 'options']);

// ============================================================
// VALIDATION HELPERS
// ============================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function invalid(path: string, reason: string): GrammarError {
  return new GrammarError('LEX-G002', { path, reason });
}

function invalidGrammar(reason: string): GrammarError {
  return new GrammarError('LEX-G001', { reason });
}

function expectString(value: unknown, path: string): string {
  if (typeof value !== 'string') {
    throw invalid(path, 'expected a string');
  }
  return value;
}

function expectList(value: unknown, path: string): unknown[] {
  if (!Array.isArray(value)) {
    throw invalid(path, 'expected a list of rules');
  }
  return value;
}

function tokenExtractor(type: string): Extractor<GrammarToken> {
  return (text) => ({ type, text });
}

// ============================================================
// NODE COMPILATION
// ============================================================

function compileList(
  value: unknown,
  path: string,
  ctx: CompileContext
): GrammarRule[] {
  return expectList(value, path).map((item, i) =>
    compileNode(item, `${path}[${i}]`, ctx)
  );
}

function compilePair(
  value: unknown,
  path: string,
  ctx: CompileContext
): [GrammarRule, GrammarRule] {
  const list = expectList(value, path);
  if (list.length !== 2) {
    throw invalid(path, `expected exactly 2 rules, got ${list.length}`);
  }
  return [
    compileNode(list[0], `${path}[0]`, ctx),
    compileNode(list[1], `${path}[1]`, ctx),
  ];
}

function compileKeyword(name: string, path: string): GrammarRule {
  switch (name) {
    case 'numeric':
      return numeric();
    case 'alphabetic':
      return alphabetic();
    case 'whitespace':
      return whitespace();
    default:
      throw invalid(path, `unknown rule "${name}"`);
  }
}

function compileToken(
  node: Record<string, unknown>,
  path: string,
  ctx: CompileContext
): GrammarRule {
  const type = expectString(node['token'], `${path}.token`);
  if (type === '') {
    throw invalid(`${path}.token`, 'token name must not be empty');
  }

  const keys = Object.keys(node).filter((key) => key !== 'token');
  if (keys.length !== 1 || (keys[0] !== 'match' && keys[0] !== 'all')) {
    throw invalid(path, 'token requires exactly one of match or all');
  }

  if (keys[0] === 'all') {
    return all(compileList(node['all'], `${path}.all`, ctx), tokenExtractor(type));
  }
  return value(
    compileNode(node['match'], `${path}.match`, ctx),
    tokenExtractor(type)
  );
}

function resolveRef(name: string, path: string, ctx: CompileContext): GrammarRule {
  const cached = ctx.compiled.get(name);
  if (cached) return cached;

  if (!Object.hasOwn(ctx.definitions, name)) {
    throw new GrammarError('LEX-G003', { name, path, reason: 'is not defined' });
  }
  if (ctx.resolving.has(name)) {
    throw new GrammarError('LEX-G003', { name, path, reason: 'forms a cycle' });
  }

  ctx.resolving.add(name);
  const rule = compileNode(ctx.definitions[name], `rules.${name}`, ctx);
  ctx.resolving.delete(name);
  ctx.compiled.set(name, rule);
  return rule;
}

function compileNode(node: unknown, path: string, ctx: CompileContext): GrammarRule {
  if (typeof node === 'string') {
    return compileKeyword(node, path);
  }
  if (!isRecord(node)) {
    throw invalid(path, 'expected a rule name or a rule object');
  }
  if ('token' in node) {
    return compileToken(node, path, ctx);
  }

  const keys = Object.keys(node);
  const key = keys[0];
  if (keys.length !== 1 || key === undefined) {
    throw invalid(path, 'a rule object must have exactly one key');
  }

  const body = node[key];
  const childPath = `${path}.${key}`;

  switch (key) {
    case 'literal':
      return literal(expectString(body, childPath));
    case 'endsWith':
      return endsWith(expectString(body, childPath));
    case 'not':
      return not(compileNode(body, childPath, ctx));
    case 'only':
      return only(compileNode(body, childPath, ctx));
    case 'ignore':
      return ignore(compileNode(body, childPath, ctx));
    case 'both':
      return both(...compilePair(body, childPath, ctx));
    case 'either':
      return either(...compilePair(body, childPath, ctx));
    case 'any':
      return any(compileList(body, childPath, ctx));
    case 'all':
      throw invalid(path, 'all requires a token name');
    case 'ref':
      return resolveRef(expectString(body, childPath), path, ctx);
    default:
      throw invalid(path, `unknown rule key "${key}"`);
  }
}

// ============================================================
// GRAMMAR COMPILATION
// ============================================================

function compileOptions(data: unknown): GrammarOptions {
  if (data === undefined) return { strict: false };
  if (!isRecord(data)) {
    throw invalidGrammar('options must be a mapping');
  }
  for (const key of Object.keys(data)) {
    if (key !== 'strict') {
      throw invalidGrammar(`unknown option "${key}"`);
    }
  }
  const strict = data['strict'] ?? false;
  if (typeof strict !== 'boolean') {
    throw invalidGrammar('options.strict must be a boolean');
  }
  return { strict };
}

/**
 * Build a grammar from parsed YAML or JSON data.
 *
 * @throws GrammarError for malformed data, bad references, or trees deeper
 * than MAX_RULE_DEPTH
 */
export function compileGrammar(data: unknown): Grammar {
  if (!isRecord(data)) {
    throw invalidGrammar('grammar must be a mapping');
  }
  for (const key of Object.keys(data)) {
    if (!TOP_LEVEL_KEYS.has(key)) {
      throw invalidGrammar(`unknown top-level key "${key}"`);
    }
  }
  if (!('rule' in data)) {
    throw invalidGrammar('missing root rule');
  }

  const definitions = data['rules'] ?? {};
  if (!isRecord(definitions)) {
    throw invalidGrammar('rules must be a mapping');
  }

  const ctx: CompileContext = {
    definitions,
    compiled: new Map(),
    resolving: new Set(),
  };

  // Compile every named rule so unused definitions are still checked
  for (const name of Object.keys(definitions)) {
    resolveRef(name, `rules.${name}`, ctx);
  }

  const rule = compileNode(data['rule'], 'rule', ctx);
  validateRule(rule);

  return { rule, rules: ctx.compiled, options: compileOptions(data['options']) };
}
