/**
 * Grammar Loader Tests
 * YAML and JSON sources, files, and read errors
 */

import { fileURLToPath } from 'node:url';
import { afterEach, describe, expect, it, vi } from 'vitest';
import {
  formatRule,
  GrammarError,
  loadGrammar,
  parseGrammar,
  tokenize,
} from '../../src/index.js';

const FIXTURE = fileURLToPath(
  new URL('../fixtures/keywords.yaml', import.meta.url)
);

describe('parseGrammar', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('reads YAML', () => {
    const grammar = parseGrammar('rule:\n  token: N\n  match: numeric\n');
    expect(formatRule(grammar.rule)).toBe('value(numeric)');
  });

  it('reads JSON', () => {
    const grammar = parseGrammar('{"rule": {"token": "N", "match": "numeric"}}');
    expect(formatRule(grammar.rule)).toBe('value(numeric)');
  });

  it('wraps YAML syntax errors', () => {
    let caught: unknown;
    try {
      parseGrammar('rule: [numeric\n');
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(GrammarError);
    expect(caught).toMatchObject({ errorId: 'LEX-G001' });
  });

  it('rejects unresolved tags without writing warnings', () => {
    const warnSpy = vi
      .spyOn(process, 'emitWarning')
      .mockImplementation(() => undefined);
    const stderrSpy = vi
      .spyOn(process.stderr, 'write')
      .mockImplementation(() => true);

    let caught: unknown;
    try {
      parseGrammar('rule: !custom numeric');
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(GrammarError);
    expect(caught).toMatchObject({
      errorId: 'LEX-G001',
      location: { line: 1, column: 7 },
    });
    expect(warnSpy).not.toHaveBeenCalled();
    expect(stderrSpy).not.toHaveBeenCalled();
  });

  it('reports an empty document as a grammar without a mapping', () => {
    expect(() => parseGrammar('')).toThrow(
      'Invalid grammar: grammar must be a mapping'
    );
  });
});

describe('loadGrammar', () => {
  it('loads a grammar file', () => {
    const grammar = loadGrammar(FIXTURE);
    expect([...grammar.rules.keys()]).toEqual(['blank']);
    expect(grammar.options).toEqual({ strict: false });
    expect(formatRule(grammar.rule)).toBe(
      'any(ignore(whitespace), value(literal("if")), value(literal("then")), ' +
        'value(literal("end")), ' +
        'value(either(literal("function"), literal("func"))), ' +
        'value(numeric), value(alphabetic))'
    );
  });

  it('tokenizes with the loaded rule', () => {
    const { tokens, trailing } = tokenize(
      loadGrammar(FIXTURE).rule,
      'if 7 then\n  end\n'
    );
    expect(
      tokens.map((t) => [t.value.type, t.text, t.span.start.line, t.span.start.column])
    ).toEqual([
      ['IF', 'if', 1, 1],
      ['NUMBER', '7', 1, 4],
      ['THEN', 'then', 1, 6],
      ['END', 'end', 2, 3],
    ]);
    expect(trailing).toBeNull();
  });

  it('reports unreadable files', () => {
    let caught: unknown;
    try {
      loadGrammar('/nonexistent/grammar.yaml');
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(GrammarError);
    expect(caught).toMatchObject({
      errorId: 'LEX-G005',
      context: { path: '/nonexistent/grammar.yaml' },
    });
    expect(caught).toHaveProperty(
      'message',
      expect.stringMatching(
        /^Cannot read grammar file \/nonexistent\/grammar\.yaml: ENOENT/
      )
    );
  });
});
