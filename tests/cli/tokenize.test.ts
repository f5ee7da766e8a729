/**
 * CLI Tokenize Tests
 * Argument parsing, file tokenizing, output and error formatting
 */

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { afterAll, afterEach, beforeAll, describe, expect, it, vi } from 'vitest';
import {
  formatError,
  formatOutput,
  formatStepEvent,
  formatTrailing,
} from '../../src/cli-shared.js';
import { main, parseArgs, runTokenize } from '../../src/cli-tokenize.js';
import { createError, GrammarError, ScanError } from '../../src/index.js';

const GRAMMAR = fileURLToPath(
  new URL('../fixtures/keywords.yaml', import.meta.url)
);

describe('parseArgs', () => {
  describe('help and version modes', () => {
    it('returns help mode for --help or -h anywhere', () => {
      expect(parseArgs(['--help'])).toEqual({ mode: 'help' });
      expect(parseArgs(['in.txt', '-h', '--strict'])).toEqual({ mode: 'help' });
    });

    it('returns version mode for --version or -v', () => {
      expect(parseArgs(['--version'])).toEqual({ mode: 'version' });
      expect(parseArgs(['in.txt', '-v'])).toEqual({ mode: 'version' });
    });
  });

  describe('tokenize mode', () => {
    it('uses defaults for optional flags', () => {
      expect(parseArgs(['in.txt', '--grammar', 'g.yaml'])).toEqual({
        mode: 'tokenize',
        file: 'in.txt',
        grammar: 'g.yaml',
        format: 'text',
        strict: false,
        trace: false,
      });
    });

    it('parses every flag', () => {
      expect(
        parseArgs(['-g', 'g.yaml', '--format', 'json', '--strict', '--trace', '-'])
      ).toEqual({
        mode: 'tokenize',
        file: '-',
        grammar: 'g.yaml',
        format: 'json',
        strict: true,
        trace: true,
      });
    });
  });

  it('returns explain mode without an input file', () => {
    expect(parseArgs(['--explain', '-g', 'g.yaml'])).toEqual({
      mode: 'explain',
      grammar: 'g.yaml',
    });
  });

  describe('error cases', () => {
    it.each([
      [['in.txt', '-g', 'g.yaml', '--verbose'], 'Unknown option: --verbose'],
      [['a.txt', 'b.txt', '-g', 'g.yaml'], 'Unexpected argument: b.txt'],
      [['in.txt'], 'Missing --grammar option'],
      [['-g', 'g.yaml'], 'Missing input file argument'],
      [['in.txt', '--grammar'], 'Missing value for --grammar'],
      [['in.txt', '-g', '--strict'], 'Missing value for -g'],
      [
        ['in.txt', '-g', 'g.yaml', '--format', 'xml'],
        "Invalid format: xml (must be 'text' or 'json')",
      ],
    ])('rejects %j', (argv, message) => {
      expect(() => parseArgs(argv)).toThrow(message);
    });
  });
});

describe('runTokenize', () => {
  let tempDir: string;

  beforeAll(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'rulelex-test-'));
  });

  afterAll(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  async function writeInput(name: string, content: string): Promise<string> {
    const file = path.join(tempDir, name);
    await fs.writeFile(file, content);
    return file;
  }

  it('tokenizes a file and formats it as text', async () => {
    const file = await writeInput('basic.txt', 'if 7 then\n  end\n');
    const result = runTokenize({ file, grammar: GRAMMAR });

    expect(formatOutput(result, 'text')).toBe(
      '1:1 IF "if"\n1:4 NUMBER "7"\n1:6 THEN "then"\n2:3 END "end"'
    );
    expect(result.trailing).toBeNull();
  });

  it('formats tokens and trailing input as JSON', async () => {
    const file = await writeInput('trailing.txt', 'end 9?');
    const result = runTokenize({ file, grammar: GRAMMAR });

    expect(JSON.parse(formatOutput(result, 'json'))).toEqual({
      tokens: [
        {
          type: 'END',
          text: 'end',
          span: {
            start: { line: 1, column: 1, offset: 0 },
            end: { line: 1, column: 4, offset: 3 },
          },
        },
        {
          type: 'NUMBER',
          text: '9',
          span: {
            start: { line: 1, column: 5, offset: 4 },
            end: { line: 1, column: 6, offset: 5 },
          },
        },
      ],
      trailing: {
        text: '?',
        span: {
          start: { line: 1, column: 6, offset: 5 },
          end: { line: 1, column: 7, offset: 6 },
        },
      },
    });
  });

  it('reports trailing input as a warning line', async () => {
    const file = await writeInput('warning.txt', 'end 9?');
    const { trailing } = runTokenize({ file, grammar: GRAMMAR });

    expect(trailing).not.toBeNull();
    if (trailing === null) return;
    expect(formatTrailing(trailing)).toBe(
      'warning: unmatched trailing input "?" at 1:6'
    );
  });

  it('raises a scan error for trailing input when strict', async () => {
    const file = await writeInput('strict.txt', 'end 9?');
    expect(() => runTokenize({ file, grammar: GRAMMAR, strict: true })).toThrow(
      ScanError
    );
  });

  it('takes strict from the grammar options', async () => {
    const grammar = await writeInput(
      'strict.yaml',
      'options:\n  strict: true\nrule:\n  token: END\n  match: { literal: end }\n'
    );
    const file = await writeInput('strict-input.txt', 'end!');
    expect(() => runTokenize({ file, grammar })).toThrow(
      'Unrecognized input "!" at 1:4'
    );
  });

  it('traces every step to stderr', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const file = await writeInput('trace.txt', 'if');
    runTokenize({ file, grammar: GRAMMAR, trace: true });

    expect(errorSpy.mock.calls).toEqual([
      ['window [0,1) "i" -> none'],
      ['window [0,2) "if" -> full'],
    ]);
  });

  it('raises a grammar error for a missing grammar file', async () => {
    const file = await writeInput('any.txt', 'if');
    expect(() =>
      runTokenize({ file, grammar: path.join(tempDir, 'missing.yaml') })
    ).toThrow(GrammarError);
  });
});

describe('main', () => {
  const originalArgv = process.argv;

  afterEach(() => {
    process.argv = originalArgv;
    vi.restoreAllMocks();
  });

  it('prints usage for --help', async () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    process.argv = ['node', 'rulelex', '--help'];
    await main();

    expect(logSpy).toHaveBeenCalledTimes(1);
    expect(String(logSpy.mock.calls[0]?.[0])).toMatch(/^Usage:/);
  });

  it('prints the package version for --version', async () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    process.argv = ['node', 'rulelex', '--version'];
    await main();

    expect(logSpy.mock.calls).toEqual([['0.1.0']]);
  });

  it('prints the compiled root rule for --explain', async () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    process.argv = ['node', 'rulelex', '--explain', '-g', GRAMMAR];
    await main();

    expect(String(logSpy.mock.calls[0]?.[0])).toMatch(
      /^any\(ignore\(whitespace\), value\(literal\("if"\)\)/
    );
  });
});

describe('formatStepEvent', () => {
  it('shows the window, its text and the result', () => {
    const location = { line: 1, column: 1, offset: 0 };
    expect(
      formatStepEvent({
        window: { start: 0, end: 2 },
        text: 'en',
        result: 'partial',
        span: { start: location, end: { line: 1, column: 3, offset: 2 } },
      })
    ).toBe('window [0,2) "en" -> partial');
  });
});

describe('formatError', () => {
  it('formats grammar errors with their location', () => {
    const err = new GrammarError(
      'LEX-G001',
      { reason: 'bad indentation' },
      { line: 3, column: 2, offset: 20 }
    );
    expect(formatError(err)).toBe(
      'Grammar error at line 3: Invalid grammar: bad indentation [LEX-G001]'
    );
  });

  it('formats scan errors', () => {
    const err = new ScanError(
      'UnrecognizedToken',
      { text: '"?"' },
      { line: 1, column: 6, offset: 5 }
    );
    expect(formatError(err)).toBe(
      'Scan error at line 1: Unrecognized input "?" [LEX-S002]'
    );
  });

  it('formats errors without a location', () => {
    const err = new GrammarError('LEX-G003', {
      name: 'word',
      path: 'rule',
      reason: 'is not defined',
    });
    expect(formatError(err)).toBe(
      'Grammar error: Rule reference word at rule is not defined [LEX-G003]'
    );
  });

  it('formats registry errors from createError', () => {
    const err = createError('LEX-G004', { depth: 70, max: 64 });
    expect(formatError(err)).toBe(
      'Error: Rule depth 70 exceeds maximum allowed depth 64 [LEX-G004]'
    );
  });

  it('formats missing files', () => {
    const err = Object.assign(new Error('ENOENT'), {
      code: 'ENOENT',
      path: 'in.txt',
    });
    expect(formatError(err)).toBe('File not found: in.txt');
  });

  it('passes other messages through', () => {
    expect(formatError(new Error('Missing --grammar option'))).toBe(
      'Missing --grammar option'
    );
  });
});
