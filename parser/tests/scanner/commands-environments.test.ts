import { describe, expect, test } from 'vitest';

import { scanAll, scanTokensStrings, tokenFlagsToString } from '../test-utils.js';

describe('Commands and environments', () => {
  test('scans plain text as one run', () => {
    expect(scanTokensStrings('Hello world')).toEqual(['Hello world Text', 'EndOfFileToken']);
  });

  test('scans a command with its group argument', () => {
    expect(scanTokensStrings('\\section{Intro}')).toEqual([
      'section Command',
      '{ GroupOpen',
      'Intro Text',
      '} GroupClose',
      'EndOfFileToken'
    ]);
  });

  test('keeps the star on starred commands', () => {
    expect(scanTokensStrings('\\section*{A}')[0]).toBe('section* Command');
  });

  test('scans environment markers with their names', () => {
    expect(scanTokensStrings('\\begin{itemize}\\item A\\end{itemize}')).toEqual([
      'itemize EnvBegin',
      'item Command',
      ' A Text',
      'itemize EnvEnd',
      'EndOfFileToken'
    ]);
  });

  test('allows spaces between \\begin and the name', () => {
    expect(scanTokensStrings('\\begin {quote}')).toEqual(['quote EnvBegin', 'EndOfFileToken']);
  });

  test('environment marker spans the name group', () => {
    const [begin] = scanAll('\\begin{align*}x');
    expect(begin.text).toBe('align*');
    expect(begin.pos).toBe(0);
    expect(begin.end).toBe(14);
  });

  test('\\begin without a valid name is an ordinary command', () => {
    expect(scanTokensStrings('\\begin{x y}')).toEqual([
      'begin Command',
      '{ GroupOpen',
      'x y Text',
      '} GroupClose',
      'EndOfFileToken'
    ]);
  });

  test('scans math delimiters', () => {
    expect(scanTokensStrings('$x$')).toEqual(['$ MathInlineDelimiter', 'x Text', '$ MathInlineDelimiter', 'EndOfFileToken']);
    expect(scanTokensStrings('$$x$$')).toEqual(['$$ MathDisplayDelimiter', 'x Text', '$$ MathDisplayDelimiter', 'EndOfFileToken']);
    expect(scanTokensStrings('\\(a\\)')).toEqual(['\\( MathInlineDelimiter', 'a Text', '\\) MathInlineDelimiter', 'EndOfFileToken']);
    expect(scanTokensStrings('\\[a\\]')).toEqual(['\\[ MathDisplayDelimiter', 'a Text', '\\] MathDisplayDelimiter', 'EndOfFileToken']);
  });

  test('scans alignment tabs and row breaks', () => {
    expect(scanTokensStrings('a & b \\\\ c')).toEqual([
      'a  Text',
      '& AlignmentTab',
      ' b  Text',
      '\\\\ LineBreak',
      ' c Text',
      'EndOfFileToken'
    ]);
  });

  test('scans optional argument brackets', () => {
    expect(scanTokensStrings('[h]')).toEqual(['[ BracketOpen', 'h Text', '] BracketClose', 'EndOfFileToken']);
  });
});

describe('Escapes', () => {
  test('escaped specials become their bare character', () => {
    const tokens = scanAll('50\\% off');
    expect(tokens.map(t => t.text)).toEqual(['50', '%', ' off', '']);
    expect(tokenFlagsToString(tokens[1].flags)).toContain('Escaped');
    expect(tokens[1].end - tokens[1].pos).toBe(2);
  });

  test('escaped underscore and braces', () => {
    expect(scanTokensStrings('\\_\\{\\}')).toEqual(['_ Text', '{ Text', '} Text', 'EndOfFileToken']);
  });

  test('escaped space is a space', () => {
    expect(scanTokensStrings('a\\ b')).toEqual(['a Text', '  Text', 'b Text', 'EndOfFileToken']);
  });

  test('tie is a space', () => {
    expect(scanTokensStrings('a~b')).toEqual(['a Text', '  Text', 'b Text', 'EndOfFileToken']);
  });

  test('escape naming nothing keeps its spelling and is flagged', () => {
    const tokens = scanAll('a\\@b');
    expect(tokens[1].text).toBe('\\@');
    expect(tokenFlagsToString(tokens[1].flags)).toContain('Malformed');
  });

  test('backslash at end of input is malformed text', () => {
    const tokens = scanAll('\\');
    expect(tokens).toHaveLength(2);
    expect(tokens[0].text).toBe('\\');
    expect(tokenFlagsToString(tokens[0].flags)).toContain('Malformed');
  });

  test('backslash before a line break does not swallow it', () => {
    expect(scanTokensStrings('a\\\nb')).toEqual(['a Text', '\\ Text', 'NewLine', 'b Text', 'EndOfFileToken']);
  });
});
