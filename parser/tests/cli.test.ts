import { beforeEach, describe, expect, test } from 'vitest';

import { CliIO, USAGE, parseArguments, runCli } from '../cli.js';

/**
 * In-memory stand-in for the file system and the console
 */
class MemoryIO implements CliIO {
  files = new Map<string, string>();
  out: string[] = [];
  err: string[] = [];
  readOnly = false;

  async readFile(path: string): Promise<string> {
    const content = this.files.get(path);
    if (content === undefined) throw new Error(`ENOENT: no such file or directory, open '${path}'`);
    return content;
  }

  async writeFile(path: string, content: string): Promise<void> {
    if (this.readOnly) throw new Error('EACCES: permission denied');
    this.files.set(path, content);
  }

  stdout(line: string): void {
    this.out.push(line);
  }

  stderr(line: string): void {
    this.err.push(line);
  }
}

describe('parseArguments', () => {
  test('positional input and output with options', () => {
    const args = parseArguments(['in.tex', 'out.md', '--heading-offset=1', '--preserve-comments', '--callout-icon=']);
    expect(args).toEqual({
      input: 'in.tex',
      output: 'out.md',
      help: false,
      options: { headingLevelOffset: 1, preserveComments: true, calloutIcon: '' }
    });
  });

  test('math mode is passed through for validation', () => {
    expect(parseArguments(['a.tex', '--math-mode=mathjax']).options.mathMode).toBe('mathjax');
  });

  test('unknown option is a problem', () => {
    expect(parseArguments(['--fast', 'a.tex']).problem).toBe('Unknown option: --fast');
  });

  test('third positional argument is a problem', () => {
    expect(parseArguments(['a', 'b', 'c']).problem).toBe('Unexpected argument: c');
  });
});

describe('runCli', () => {
  let io: MemoryIO;

  beforeEach(() => {
    io = new MemoryIO();
    io.files.set('doc.tex', '\\section{Intro}\nHello \\foo.');
  });

  test('help goes to stdout', async () => {
    expect(await runCli(['--help'], io)).toBe(0);
    expect(io.out).toEqual([USAGE]);
  });

  test('missing input prints usage to stderr', async () => {
    expect(await runCli([], io)).toBe(1);
    expect(io.err).toEqual([USAGE]);
  });

  test('argument problems are reported before the usage', async () => {
    expect(await runCli(['doc.tex', '--nope'], io)).toBe(1);
    expect(io.err).toEqual(['Unknown option: --nope', USAGE]);
  });

  test('without an output path the result goes to stdout', async () => {
    expect(await runCli(['doc.tex'], io)).toBe(0);
    expect(io.out).toEqual(['# Intro\nHello \\foo.']);
    expect(io.err).toEqual(['doc.tex:2:7: warning: Unknown command \\foo kept as text']);
  });

  test('with an output path the file is written and confirmed', async () => {
    expect(await runCli(['doc.tex', 'doc.md', '--heading-offset=1'], io)).toBe(0);
    expect(io.files.get('doc.md')).toBe('## Intro\nHello \\foo.\n');
    expect(io.out).toEqual(['Converted doc.tex -> doc.md']);
  });

  test('unreadable input', async () => {
    expect(await runCli(['missing.tex'], io)).toBe(1);
    expect(io.err).toEqual([
      "error: cannot read 'missing.tex': ENOENT: no such file or directory, open 'missing.tex'"
    ]);
  });

  test('structural errors are reported without output', async () => {
    io.files.set('bad.tex', '\\begin{itemize}\n\\item A');
    expect(await runCli(['bad.tex', 'bad.md'], io)).toBe(1);
    expect(io.err).toEqual(["error: Environment 'itemize' is never closed (line 1, column 1)"]);
    expect(io.files.has('bad.md')).toBe(false);
  });

  test('invalid option values are reported', async () => {
    expect(await runCli(['doc.tex', '--heading-offset=x'], io)).toBe(1);
    expect(io.err).toEqual(["error: Invalid value for option 'headingLevelOffset': NaN (expected an integer)"]);
  });

  test('write failures are reported', async () => {
    io.readOnly = true;
    expect(await runCli(['doc.tex', 'doc.md'], io)).toBe(1);
    expect(io.err).toEqual([
      'doc.tex:2:7: warning: Unknown command \\foo kept as text',
      "error: cannot write 'doc.md': EACCES: permission denied"
    ]);
  });
});
