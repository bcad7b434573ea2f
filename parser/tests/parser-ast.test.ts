import { describe, expect, test } from 'vitest';

import {
  createCodeBlockNode,
  createMathBlockNode,
  createTextNode,
  markSynthetic,
  validateChildPositions,
  validateNodePosition
} from '../ast-factory.js';
import { AnyNode, NodeFlags, NodeKind, hasNodeFlag } from '../ast-types.js';
import {
  VisitResult,
  findNodeAt,
  findNodesOfKind,
  getChildren,
  getNodePath,
  getParent,
  walkAST,
  walkASTBottomUp
} from '../ast-traversal.js';
import { parseTree } from './test-utils.js';

const SOURCE = '\\section{T}\n\\textbf{x} y';

describe('Node factories', () => {
  test('optional fields are left out when empty', () => {
    expect('language' in createCodeBlockNode(0, 1, 'x')).toBe(false);
    expect(createCodeBlockNode(0, 1, 'x', 'ts').language).toBe('ts');
    expect('environment' in createMathBlockNode(0, 1, 'y')).toBe(false);
  });

  test('synthetic flag', () => {
    const node = markSynthetic(createTextNode(0, 0, ''));
    expect(hasNodeFlag(node, NodeFlags.Synthetic)).toBe(true);
    expect(hasNodeFlag(node, NodeFlags.Clamped)).toBe(false);
  });

  test('parsed spans nest inside their parents', () => {
    const source = 'x \\textbf{y} z\n\n\\begin{itemize}\\item a\\end{itemize}';
    const document = parseTree(source);
    const checked: AnyNode[] = [];
    walkAST(document, {
      visitNode(node) {
        expect(validateNodePosition(node, source.length)).toBe(true);
        expect(validateChildPositions(node, [...getChildren(node)])).toBe(true);
        checked.push(node);
        return VisitResult.Continue;
      }
    });
    expect(checked).toHaveLength(9);
  });
});

describe('Traversal', () => {
  test('walks top-down in document order', () => {
    const kinds: NodeKind[] = [];
    walkAST(parseTree(SOURCE), {
      visitNode(node) {
        kinds.push(node.kind);
        return VisitResult.Continue;
      }
    });
    expect(kinds).toEqual([
      NodeKind.Document,
      NodeKind.Heading,
      NodeKind.InlineText,
      NodeKind.Paragraph,
      NodeKind.Strong,
      NodeKind.InlineText,
      NodeKind.InlineText
    ]);
  });

  test('Skip leaves out the children of a node', () => {
    const kinds: NodeKind[] = [];
    walkAST(parseTree(SOURCE), {
      visitHeading: () => VisitResult.Skip,
      visitNode(node) {
        kinds.push(node.kind);
        return VisitResult.Continue;
      }
    });
    expect(kinds).toEqual([
      NodeKind.Document,
      NodeKind.Paragraph,
      NodeKind.Strong,
      NodeKind.InlineText,
      NodeKind.InlineText
    ]);
  });

  test('Stop ends the walk', () => {
    const texts: string[] = [];
    walkAST(parseTree(SOURCE), {
      visitStrong: () => VisitResult.Stop,
      visitText(node) {
        texts.push(node.text);
        return VisitResult.Continue;
      }
    });
    expect(texts).toEqual(['T']);
  });

  test('bottom-up walk visits children first', () => {
    const kinds: NodeKind[] = [];
    walkASTBottomUp(parseTree('a'), {
      visitNode(node) {
        kinds.push(node.kind);
        return VisitResult.Continue;
      }
    });
    expect(kinds).toEqual([NodeKind.InlineText, NodeKind.Paragraph, NodeKind.Document]);
  });

  test('list items yield inline content before nested blocks', () => {
    const document = parseTree('\\begin{itemize}\\item a\n\nb\\end{itemize}');
    const [item] = findNodesOfKind(document, NodeKind.ListItem);
    expect(getChildren(item).map(node => node.kind)).toEqual([NodeKind.InlineText, NodeKind.Paragraph]);
  });
});

describe('Queries', () => {
  test('findNodesOfKind collects in order', () => {
    const texts = findNodesOfKind(parseTree(SOURCE), NodeKind.InlineText);
    expect(texts.map(node => node.text)).toEqual(['T', 'x', ' y']);
  });

  test('findNodeAt returns the deepest node at an offset', () => {
    const document = parseTree(SOURCE);
    const node = findNodeAt(document, 20);
    expect(node?.kind).toBe(NodeKind.InlineText);
    expect(node?.kind === NodeKind.InlineText && node.text).toBe('x');
    expect(findNodeAt(document, 100)).toBeUndefined();
  });

  test('path and parent of a nested node', () => {
    const document = parseTree(SOURCE);
    const [, x] = findNodesOfKind(document, NodeKind.InlineText);
    expect(getNodePath(document, x).map(node => node.kind)).toEqual([
      NodeKind.Document,
      NodeKind.Paragraph,
      NodeKind.Strong,
      NodeKind.InlineText
    ]);
    expect(getParent(document, x)?.kind).toBe(NodeKind.Strong);
    expect(getParent(document, document)).toBeUndefined();
  });

  test('parsed trees are frozen', () => {
    const document = parseTree(SOURCE);
    const [, x] = findNodesOfKind(document, NodeKind.InlineText);
    expect(Object.isFrozen(document)).toBe(true);
    expect(Object.isFrozen(document.children)).toBe(true);
    expect(Object.isFrozen(document.lineStarts)).toBe(true);
    expect(Object.isFrozen(x)).toBe(true);
  });
});
