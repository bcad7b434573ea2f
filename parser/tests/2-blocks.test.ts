/**
 * Tests for block recognition: headings, paragraphs, transparent environments
 */

import { describe, expect, test } from 'vitest';

import { convert, convertWithDiagnostics } from '../convert.js';
import { NodeFlags, NodeKind, hasNodeFlag } from '../ast-types.js';
import { ParseErrorCode } from '../parser-interfaces.js';
import { lines, parseTree } from './test-utils.js';

describe('Headings', () => {
  test('section with following paragraph', () => {
    expect(convert('\\section{Intro}\nSome $x^2$ text.')).toBe('# Intro\nSome $$x^2$$ text.');
  });

  test('section levels map to one, two and three hashes', () => {
    const source = lines('\\section{A}', '\\subsection{B}', '\\subsubsection{C}');
    expect(convert(source)).toBe(lines('# A', '## B', '### C'));
  });

  test('starred form and short title are accepted', () => {
    expect(convert('\\section*[Short]{Long title}')).toBe('# Long title');
  });

  test('heading argument may follow after spaces', () => {
    expect(convert('\\section {Spaced}')).toBe('# Spaced');
  });

  test('heading keeps inline formatting', () => {
    expect(convert('\\subsection{The \\emph{real} deal}')).toBe('## The *real* deal');
  });

  test('heading level offset shifts levels', () => {
    expect(convert('\\section{A}', { headingLevelOffset: 1 })).toBe('## A');
  });

  test('levels past the maximum are clamped and reported', () => {
    const result = convertWithDiagnostics('\\subsubsection{Deep}', { headingLevelOffset: 2 });
    expect(result.output).toBe('### Deep');
    expect(result.diagnostics).toHaveLength(1);
    expect(result.diagnostics[0]).toMatchObject({
      code: ParseErrorCode.HEADING_LEVEL_CLAMPED,
      subject: 'subsubsection',
      message: 'Heading level 5 clamped to 3',
      pos: 0
    });
  });

  test('levels below one are clamped to one', () => {
    const document = parseTree('\\subsection{Up}', { headingLevelOffset: -3 });
    const [heading] = document.children;
    expect(heading.kind).toBe(NodeKind.Heading);
    if (heading.kind !== NodeKind.Heading) return;
    expect(heading.level).toBe(1);
    expect(hasNodeFlag(heading, NodeFlags.Clamped)).toBe(true);
  });

  test('a heading ends the paragraph before it', () => {
    expect(convert('Text before\n\\section{After}')).toBe(lines('Text before', '# After'));
  });
});

describe('Paragraphs', () => {
  test('single line breaks join lines with a space', () => {
    expect(convert('First line\nsecond line\n\nNext para')).toBe(lines('First line second line', 'Next para'));
  });

  test('runs of whitespace collapse', () => {
    expect(convert('a    b\t\tc')).toBe('a b c');
  });

  test('several blank lines separate paragraphs once', () => {
    const document = parseTree('One\n\n\n\nTwo');
    expect(document.children.map(block => block.kind)).toEqual([NodeKind.Paragraph, NodeKind.Paragraph]);
  });

  test('empty input converts to empty output', () => {
    expect(convert('')).toBe('');
    expect(convert('  \n\n \n')).toBe('');
  });

  test('paragraph spans its source', () => {
    const [first, second] = parseTree('Hi\n\nHello').children;
    expect([first.pos, first.end]).toEqual([0, 3]);
    expect([second.pos, second.end]).toEqual([4, 9]);
  });
});

describe('Transparent environments', () => {
  test('document body is parsed in place', () => {
    expect(convert('\\begin{document}\nHello\n\\end{document}')).toBe('Hello');
  });

  test('preamble and layout commands are dropped', () => {
    const source = lines(
      '\\documentclass[11pt]{article}',
      '\\usepackage{amsmath}',
      '\\begin{document}',
      '\\maketitle',
      '\\noindent Body',
      '\\vspace{2em}',
      '\\end{document}'
    );
    expect(convert(source)).toBe('Body');
  });

  test('placement and width arguments are skipped', () => {
    expect(convert('\\begin{figure}[h]\nCaption text\n\\end{figure}')).toBe('Caption text');
    expect(convert('\\begin{minipage}{0.5\\textwidth}\nInside\n\\end{minipage}')).toBe('Inside');
  });

  test('unknown environments keep their content and are reported', () => {
    const result = convertWithDiagnostics('\\begin{theorem}\nEvery claim.\n\\end{theorem}');
    expect(result.output).toBe('Every claim.');
    expect(result.diagnostics.map(d => [d.code, d.subject])).toEqual([
      [ParseErrorCode.UNKNOWN_ENVIRONMENT, 'theorem']
    ]);
  });

  test('blocks inside a transparent environment stay separate', () => {
    const source = lines('\\begin{center}', 'One', '', '\\subsection{Two}', '\\end{center}');
    expect(convert(source)).toBe(lines('One', '## Two'));
  });
});
