/**
 * Document Tree Traversal
 *
 * Visitor pattern and utility functions for walking and querying trees.
 */

import {
  AnyNode,
  NodeKind,
  Document,
  ParagraphNode,
  HeadingNode,
  BlockquoteNode,
  ListNode,
  ListItemNode,
  CodeBlockNode,
  TableNode,
  TableRowNode,
  TableCellNode,
  MathBlockNode,
  InlineTextNode,
  EmphasisNode,
  StrongNode,
  InlineCodeNode,
  LinkNode,
  MathInlineNode,
  InlineHardBreak
} from './ast-types.js';

/**
 * Visit result controls traversal flow
 */
export enum VisitResult {
  /** Continue normal traversal (visit children) */
  Continue,

  /** Skip children but continue with siblings */
  Skip,

  /** Stop traversal entirely */
  Stop
}

/**
 * Visitor with optional methods for each node kind
 */
export interface Visitor {
  /** Generic node visitor (called for all nodes if specific visitor not defined) */
  visitNode?(node: AnyNode, parent?: AnyNode): VisitResult;

  visitDocument?(node: Document, parent?: AnyNode): VisitResult;

  /** Block node visitors */
  visitParagraph?(node: ParagraphNode, parent?: AnyNode): VisitResult;
  visitHeading?(node: HeadingNode, parent?: AnyNode): VisitResult;
  visitBlockquote?(node: BlockquoteNode, parent?: AnyNode): VisitResult;
  visitList?(node: ListNode, parent?: AnyNode): VisitResult;
  visitListItem?(node: ListItemNode, parent?: AnyNode): VisitResult;
  visitCodeBlock?(node: CodeBlockNode, parent?: AnyNode): VisitResult;
  visitTable?(node: TableNode, parent?: AnyNode): VisitResult;
  visitTableRow?(node: TableRowNode, parent?: AnyNode): VisitResult;
  visitTableCell?(node: TableCellNode, parent?: AnyNode): VisitResult;
  visitMathBlock?(node: MathBlockNode, parent?: AnyNode): VisitResult;

  /** Inline node visitors */
  visitText?(node: InlineTextNode, parent?: AnyNode): VisitResult;
  visitEmphasis?(node: EmphasisNode, parent?: AnyNode): VisitResult;
  visitStrong?(node: StrongNode, parent?: AnyNode): VisitResult;
  visitInlineCode?(node: InlineCodeNode, parent?: AnyNode): VisitResult;
  visitLink?(node: LinkNode, parent?: AnyNode): VisitResult;
  visitMathInline?(node: MathInlineNode, parent?: AnyNode): VisitResult;
  visitBreak?(node: InlineHardBreak, parent?: AnyNode): VisitResult;
}

/**
 * Walk tree using visitor pattern (top-down)
 */
export function walkAST(root: AnyNode, visitor: Visitor): void {
  walkASTRecursive(root, visitor, undefined);
}

/**
 * Walk tree bottom-up (children first, then parent)
 */
export function walkASTBottomUp(root: AnyNode, visitor: Visitor): void {
  walkASTBottomUpRecursive(root, visitor, undefined);
}

function walkASTRecursive(node: AnyNode, visitor: Visitor, parent?: AnyNode): VisitResult {
  const result = callVisitorMethod(node, visitor, parent);

  if (result === VisitResult.Stop) {
    return VisitResult.Stop;
  }

  if (result === VisitResult.Skip) {
    return VisitResult.Continue;
  }

  for (const child of getChildren(node)) {
    if (walkASTRecursive(child, visitor, node) === VisitResult.Stop) {
      return VisitResult.Stop;
    }
  }

  return VisitResult.Continue;
}

function walkASTBottomUpRecursive(node: AnyNode, visitor: Visitor, parent?: AnyNode): VisitResult {
  for (const child of getChildren(node)) {
    if (walkASTBottomUpRecursive(child, visitor, node) === VisitResult.Stop) {
      return VisitResult.Stop;
    }
  }

  return callVisitorMethod(node, visitor, parent);
}

/**
 * Call the appropriate visitor method based on node kind
 */
function callVisitorMethod(node: AnyNode, visitor: Visitor, parent?: AnyNode): VisitResult {
  let result: VisitResult | undefined;

  switch (node.kind) {
    case NodeKind.Document: result = visitor.visitDocument?.(node, parent); break;
    case NodeKind.Paragraph: result = visitor.visitParagraph?.(node, parent); break;
    case NodeKind.Heading: result = visitor.visitHeading?.(node, parent); break;
    case NodeKind.Blockquote: result = visitor.visitBlockquote?.(node, parent); break;
    case NodeKind.List: result = visitor.visitList?.(node, parent); break;
    case NodeKind.ListItem: result = visitor.visitListItem?.(node, parent); break;
    case NodeKind.CodeBlock: result = visitor.visitCodeBlock?.(node, parent); break;
    case NodeKind.Table: result = visitor.visitTable?.(node, parent); break;
    case NodeKind.TableRow: result = visitor.visitTableRow?.(node, parent); break;
    case NodeKind.TableCell: result = visitor.visitTableCell?.(node, parent); break;
    case NodeKind.MathBlock: result = visitor.visitMathBlock?.(node, parent); break;
    case NodeKind.InlineText: result = visitor.visitText?.(node, parent); break;
    case NodeKind.Emphasis: result = visitor.visitEmphasis?.(node, parent); break;
    case NodeKind.Strong: result = visitor.visitStrong?.(node, parent); break;
    case NodeKind.InlineCode: result = visitor.visitInlineCode?.(node, parent); break;
    case NodeKind.Link: result = visitor.visitLink?.(node, parent); break;
    case NodeKind.MathInline: result = visitor.visitMathInline?.(node, parent); break;
    case NodeKind.InlineHardBreak: result = visitor.visitBreak?.(node, parent); break;
  }

  return result ?? visitor.visitNode?.(node, parent) ?? VisitResult.Continue;
}

/**
 * Direct children of a node in source order. A list item yields its inline
 * content first, then its nested blocks.
 */
export function getChildren(node: AnyNode): readonly AnyNode[] {
  switch (node.kind) {
    case NodeKind.Document:
    case NodeKind.Paragraph:
    case NodeKind.Heading:
    case NodeKind.Blockquote:
    case NodeKind.List:
    case NodeKind.Table:
    case NodeKind.TableRow:
    case NodeKind.TableCell:
    case NodeKind.Emphasis:
    case NodeKind.Strong:
    case NodeKind.Link:
      return node.children;
    case NodeKind.ListItem:
      return [...node.children, ...node.blocks];
    default:
      return [];
  }
}

// =============================================================================
// Query Functions
// =============================================================================

/**
 * Find the deepest node that contains the given offset
 */
export function findNodeAt(root: AnyNode, offset: number): AnyNode | undefined {
  if (offset < root.pos || offset > root.end) {
    return undefined;
  }

  let result: AnyNode = root;

  walkAST(root, {
    visitNode(node: AnyNode): VisitResult {
      if (offset >= node.pos && offset <= node.end) {
        result = node;
        return VisitResult.Continue;
      }
      return VisitResult.Skip;
    }
  });

  return result;
}

/**
 * Collect all nodes of one kind in document order
 */
export function findNodesOfKind<K extends AnyNode['kind']>(root: AnyNode, kind: K): Extract<AnyNode, { kind: K }>[] {
  const result: Extract<AnyNode, { kind: K }>[] = [];

  walkAST(root, {
    visitNode(node: AnyNode): VisitResult {
      if (isNodeOfKind(node, kind)) result.push(node);
      return VisitResult.Continue;
    }
  });

  return result;
}

function isNodeOfKind<K extends AnyNode['kind']>(node: AnyNode, kind: K): node is Extract<AnyNode, { kind: K }> {
  return node.kind === kind;
}

/**
 * Get the path from root to a specific node
 */
export function getNodePath(root: AnyNode, target: AnyNode): AnyNode[] {
  const path: AnyNode[] = [];

  function findPath(node: AnyNode): boolean {
    path.push(node);
    if (node === target) return true;

    for (const child of getChildren(node)) {
      if (findPath(child)) return true;
    }

    path.pop();
    return false;
  }

  return findPath(root) ? path : [];
}

/**
 * Get the parent node of a target node
 */
export function getParent(root: AnyNode, target: AnyNode): AnyNode | undefined {
  const path = getNodePath(root, target);
  return path.length > 1 ? path[path.length - 2] : undefined;
}

/**
 * Deep-freeze a tree. The parser hands out frozen trees only.
 */
export function freezeTree<T extends AnyNode>(root: T): T {
  walkASTBottomUp(root, {
    visitNode(node: AnyNode): VisitResult {
      if (node.kind === NodeKind.Document) {
        Object.freeze(node.lineStarts);
      }
      if (node.kind === NodeKind.ListItem) {
        Object.freeze(node.blocks);
      }
      if ('children' in node) {
        Object.freeze(node.children);
      }
      Object.freeze(node);
      return VisitResult.Continue;
    }
  });
  return root;
}
