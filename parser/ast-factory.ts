/**
 * Document Tree Factory Utilities
 *
 * Helper functions for creating Document Tree nodes.
 */

import {
  Node,
  NodeKind,
  NodeFlags,
  Document,
  InlineTextNode,
  ParagraphNode,
  HeadingNode,
  HeadingLevel,
  BlockquoteNode,
  ListNode,
  ListItemNode,
  CodeBlockNode,
  TableNode,
  TableRowNode,
  TableCellNode,
  MathBlockNode,
  EmphasisNode,
  StrongNode,
  InlineCodeNode,
  LinkNode,
  MathInlineNode,
  InlineHardBreak,
  BlockNode,
  InlineNode
} from './ast-types.js';

/**
 * Creates the common node header with the specified kind and position
 */
export function createNode<K extends NodeKind>(kind: K, pos: number, end: number): Node & { kind: K } {
  return {
    kind,
    flags: NodeFlags.None,
    pos,
    end
  };
}

/**
 * Marks a node as created by error recovery
 */
export function markSynthetic<T extends Node>(node: T): T {
  node.flags |= NodeFlags.Synthetic;
  return node;
}

/**
 * Validates that a node's position is within bounds
 */
export function validateNodePosition(node: Node, sourceLength: number): boolean {
  return node.pos >= 0 &&
         node.end >= node.pos &&
         node.end <= sourceLength;
}

/**
 * Validates that child positions are within parent bounds
 */
export function validateChildPositions(parent: Node, children: Node[]): boolean {
  return children.every(child =>
    child.pos >= parent.pos &&
    child.end <= parent.end
  );
}

// =============================================================================
// Specific Node Creation Functions
// =============================================================================

export function createDocumentNode(
  pos: number,
  end: number,
  children: BlockNode[] = [],
  lineStarts: number[] = []
): Document {
  return {
    ...createNode(NodeKind.Document, pos, end),
    children,
    lineStarts
  };
}

export function createTextNode(pos: number, end: number, text: string): InlineTextNode {
  return {
    ...createNode(NodeKind.InlineText, pos, end),
    text
  };
}

export function createParagraphNode(
  pos: number,
  end: number,
  children: InlineNode[] = []
): ParagraphNode {
  return {
    ...createNode(NodeKind.Paragraph, pos, end),
    children
  };
}

export function createHeadingNode(
  pos: number,
  end: number,
  level: HeadingLevel,
  children: InlineNode[] = []
): HeadingNode {
  return {
    ...createNode(NodeKind.Heading, pos, end),
    level,
    children
  };
}

export function createBlockquoteNode(
  pos: number,
  end: number,
  children: BlockNode[] = []
): BlockquoteNode {
  return {
    ...createNode(NodeKind.Blockquote, pos, end),
    children
  };
}

export function createListNode(
  pos: number,
  end: number,
  ordered: boolean,
  children: ListItemNode[] = []
): ListNode {
  return {
    ...createNode(NodeKind.List, pos, end),
    ordered,
    children
  };
}

export function createListItemNode(
  pos: number,
  end: number,
  children: InlineNode[] = [],
  blocks: BlockNode[] = []
): ListItemNode {
  return {
    ...createNode(NodeKind.ListItem, pos, end),
    children,
    blocks
  };
}

export function createCodeBlockNode(
  pos: number,
  end: number,
  text: string,
  language?: string
): CodeBlockNode {
  const node: CodeBlockNode = {
    ...createNode(NodeKind.CodeBlock, pos, end),
    text
  };
  if (language) node.language = language;
  return node;
}

export function createTableNode(
  pos: number,
  end: number,
  children: TableRowNode[] = []
): TableNode {
  return {
    ...createNode(NodeKind.Table, pos, end),
    children
  };
}

export function createTableRowNode(
  pos: number,
  end: number,
  children: TableCellNode[] = []
): TableRowNode {
  return {
    ...createNode(NodeKind.TableRow, pos, end),
    children
  };
}

export function createTableCellNode(
  pos: number,
  end: number,
  children: InlineNode[] = []
): TableCellNode {
  return {
    ...createNode(NodeKind.TableCell, pos, end),
    children
  };
}

export function createMathBlockNode(pos: number, end: number, text: string, environment?: string): MathBlockNode {
  const node: MathBlockNode = {
    ...createNode(NodeKind.MathBlock, pos, end),
    text
  };
  if (environment) node.environment = environment;
  return node;
}

export function createEmphasisNode(
  pos: number,
  end: number,
  children: InlineNode[] = []
): EmphasisNode {
  return {
    ...createNode(NodeKind.Emphasis, pos, end),
    children
  };
}

export function createStrongNode(
  pos: number,
  end: number,
  children: InlineNode[] = []
): StrongNode {
  return {
    ...createNode(NodeKind.Strong, pos, end),
    children
  };
}

export function createInlineCodeNode(pos: number, end: number, text: string): InlineCodeNode {
  return {
    ...createNode(NodeKind.InlineCode, pos, end),
    text
  };
}

export function createLinkNode(
  pos: number,
  end: number,
  destination: string,
  children: InlineNode[] = []
): LinkNode {
  return {
    ...createNode(NodeKind.Link, pos, end),
    destination,
    children
  };
}

export function createMathInlineNode(pos: number, end: number, text: string): MathInlineNode {
  return {
    ...createNode(NodeKind.MathInline, pos, end),
    text
  };
}

export function createHardBreakNode(pos: number, end: number): InlineHardBreak {
  return createNode(NodeKind.InlineHardBreak, pos, end);
}
