/**
 * End-to-end conversion: examples, determinism, reentrancy and markdown validity
 */

import { marked } from 'marked';
import { describe, expect, test } from 'vitest';

import { convert, convertWithDiagnostics } from '../convert.js';
import { lines } from './test-utils.js';

const ARTICLE = lines(
  '\\documentclass{article}',
  '\\begin{document}',
  '\\section{Intro}',
  'Some $x^2$ text with \\textbf{bold} words.',
  '',
  '\\begin{lstlisting}[language=Python]',
  'print(1)',
  '\\end{lstlisting}',
  '\\begin{tabular}{ll}',
  'Name & Value \\\\',
  'a & 1',
  '\\end{tabular}',
  '\\end{document}'
);

const ARTICLE_MARKDOWN = lines(
  '# Intro',
  'Some $$x^2$$ text with **bold** words.',
  '```python',
  'print(1)',
  '```',
  '| Name | Value |',
  '| --- | --- |',
  '| a | 1 |'
);

describe('Examples', () => {
  test('section with inline math', () => {
    expect(convert('\\section{Intro}\nSome $x^2$ text.')).toBe('# Intro\nSome $$x^2$$ text.');
  });

  test('nested formatting', () => {
    expect(convert('\\textbf{bold \\textit{both}}')).toBe('**bold *both***');
  });

  test('inline itemize', () => {
    expect(convert('\\begin{itemize}\\item A\\item B\\end{itemize}')).toBe(lines('- A', '- B'));
  });

  test('sibling enumerations each start at one', () => {
    const source = lines(
      '\\begin{enumerate}', '\\item a', '\\item b', '\\end{enumerate}',
      '\\begin{enumerate}', '\\item c', '\\end{enumerate}'
    );
    expect(convert(source)).toBe(lines('1. a', '2. b', '1. c'));
  });

  test('small article', () => {
    expect(convert(ARTICLE)).toBe(ARTICLE_MARKDOWN);
  });
});

describe('Determinism and reentrancy', () => {
  test('same input and options give the same output', () => {
    const options = { headingLevelOffset: 1, calloutIcon: '' };
    expect(convert(ARTICLE, options)).toBe(convert(ARTICLE, options));
  });

  test('concurrent conversions do not interfere', async () => {
    const sources = [
      ARTICLE,
      '\\begin{quote}q\\end{quote}',
      '\\begin{enumerate}\\item x\\end{enumerate}',
      '\\begin{verbatim}$raw$\\end{verbatim}'
    ];
    const expected = sources.map(source => convert(source));
    const results = await Promise.all(
      [...sources, ...sources].map(source => Promise.resolve().then(() => convert(source)))
    );
    expect(results).toEqual([...expected, ...expected]);
  });

  test('warnings are collected per conversion', () => {
    const first = convertWithDiagnostics('\\foo');
    const second = convertWithDiagnostics('plain');
    expect(first.diagnostics).toHaveLength(1);
    expect(second.diagnostics).toEqual([]);
  });
});

describe('Markdown validity', () => {
  function blockTokens(markdown: string) {
    return marked.lexer(markdown).filter(token => token.type !== 'space');
  }

  test('article output is read back as heading, paragraph, code and table', () => {
    const tokens = blockTokens(ARTICLE_MARKDOWN);
    expect(tokens.map(token => token.type)).toEqual(['heading', 'paragraph', 'code', 'table']);
    expect(tokens[0]).toMatchObject({ depth: 1, text: 'Intro' });
    expect(tokens[2]).toMatchObject({ lang: 'python', text: 'print(1)' });
    expect(tokens[3]).toMatchObject({
      header: [{ text: 'Name' }, { text: 'Value' }],
      rows: [[{ text: 'a' }, { text: '1' }]]
    });
  });

  test('padded rows keep the column count', () => {
    const markdown = convert('\\begin{tabular}{ccc}a & b & c\\\\d\\end{tabular}');
    const [table] = blockTokens(markdown);
    expect(table).toMatchObject({
      type: 'table',
      rows: [[{ text: 'd' }, { text: '' }, { text: '' }]]
    });
  });

  test('lists are read back with their items', () => {
    const [bullets] = blockTokens(convert('\\begin{itemize}\\item A\\item B\\end{itemize}'));
    expect(bullets).toMatchObject({ type: 'list', ordered: false, items: [{ text: 'A' }, { text: 'B' }] });

    const [numbers] = blockTokens(convert('\\begin{enumerate}\\item A\\item B\\end{enumerate}'));
    expect(numbers).toMatchObject({ type: 'list', ordered: true, start: 1, items: [{ text: 'A' }, { text: 'B' }] });
  });
});
