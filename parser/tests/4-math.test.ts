/**
 * Tests for inline and display math
 */

import { describe, expect, test } from 'vitest';

import { convert } from '../convert.js';
import { NodeKind } from '../ast-types.js';
import { lines, parseTree } from './test-utils.js';

describe('Inline math', () => {
  test('dollar math uses double dollars', () => {
    expect(convert('Let $a+b$ hold.')).toBe('Let $$a+b$$ hold.');
  });

  test('parenthesis delimiters', () => {
    expect(convert('Let \\(x_1\\) be')).toBe('Let $$x_1$$ be');
  });

  test('math keeps commands and braces verbatim', () => {
    expect(convert('$\\frac{1}{2} \\alpha$')).toBe('$$\\frac{1}{2} \\alpha$$');
  });

  test('empty inline math is dropped', () => {
    expect(convert('a $ $ b')).toBe('a b');
  });

  test('math inside formatting', () => {
    expect(convert('\\textbf{$n$ items}')).toBe('**$$n$$ items**');
  });

  test('touching dollar spans are two maths', () => {
    expect(convert('Let $a$$b$ be.')).toBe('Let $$a$$ $$b$$ be.');
    const [paragraph] = parseTree('$a$$b$').children;
    expect(paragraph.kind === NodeKind.Paragraph && paragraph.children.map(node => [node.kind, node.pos, node.end]))
      .toEqual([[NodeKind.MathInline, 0, 3], [NodeKind.MathInline, 3, 6]]);
  });
});

describe('Multi-line inline math', () => {
  test('line breaks collapse in paragraphs', () => {
    expect(convert('Sum $a +\n  b$ here')).toBe('Sum $$a + b$$ here');
  });

  test('heading stays on one line', () => {
    expect(convert('\\section{Energy $E =\n mc^2$}\nBody')).toBe(lines('# Energy $$E = mc^2$$', 'Body'));
  });

  test('table row keeps every cell', () => {
    const source = lines('\\begin{tabular}{cc}', 'A & $x +', ' y$ \\\\', 'B & C', '\\end{tabular}');
    expect(convert(source)).toBe(lines('| A | $$x + y$$ |', '| --- | --- |', '| B | C |'));
  });

  test('heading inside a quote stays inside the callout', () => {
    const source = lines('\\begin{quote}', '\\section{$a', '+b$}', '\\end{quote}');
    expect(convert(source)).toBe('> 💡 # $$a +b$$');
  });
});

describe('Display math', () => {
  test('double dollar block is trimmed', () => {
    expect(convert('$$\n\\int_0^1 x\\,dx\n$$')).toBe('$$\\int_0^1 x\\,dx$$');
  });

  test('bracket delimiters', () => {
    expect(convert('\\[ a = b \\]')).toBe('$$a = b$$');
  });

  test('display math splits the paragraph around it', () => {
    expect(convert('Before $$x$$ after')).toBe(lines('Before', '$$x$$', 'after'));
  });

  test('equation environment', () => {
    expect(convert('\\begin{equation}\nE = mc^2\n\\end{equation}')).toBe('$$E = mc^2$$');
  });

  test('align is re-wrapped as aligned', () => {
    const source = lines('\\begin{align*}', 'a &= b \\\\', 'c &= d', '\\end{align*}');
    expect(convert(source)).toBe('$$\\begin{aligned}a &= b \\\\\nc &= d\\end{aligned}$$');
  });

  test('gather is re-wrapped as gathered', () => {
    expect(convert('\\begin{gather}x\\\\y\\end{gather}')).toBe('$$\\begin{gathered}x\\\\y\\end{gathered}$$');
  });

  test('only multi-line environments keep their name on the node', () => {
    const [equation, align] = parseTree(lines(
      '\\begin{equation}x\\end{equation}',
      '\\begin{align}y\\end{align}'
    )).children;
    expect(equation.kind).toBe(NodeKind.MathBlock);
    expect(align.kind).toBe(NodeKind.MathBlock);
    if (equation.kind !== NodeKind.MathBlock || align.kind !== NodeKind.MathBlock) return;
    expect(equation.environment).toBeUndefined();
    expect(align.environment).toBe('align');
    expect(align.text).toBe('y');
  });

  test('empty display math produces no block', () => {
    expect(parseTree('$$ $$').children).toEqual([]);
  });
});
