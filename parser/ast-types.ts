/**
 * Document Tree node types
 *
 * Every node carries its kind, flags and source span. Block and inline
 * nodes form two closed unions; container nodes own their children.
 */

/**
 * Node kinds - each node type gets a unique identifier
 */
export enum NodeKind {
  // Root node
  Document,

  // Block-level nodes
  Paragraph,
  Heading,
  Blockquote,
  List,
  ListItem,
  CodeBlock,
  Table,
  TableRow,
  TableCell,
  MathBlock,

  // Inline-level nodes
  InlineText,
  Emphasis,
  Strong,
  InlineCode,
  Link,
  MathInline,
  InlineHardBreak,
}

/**
 * Node flags for additional metadata
 */
export enum NodeFlags {
  None = 0,
  Synthetic = 1 << 0,         // Node was created by best-effort recovery
  Clamped = 1 << 1,           // Heading level was clamped into the supported range
}

/**
 * Heading levels the target dialect supports
 */
export type HeadingLevel = 1 | 2 | 3;

export const MAX_HEADING_LEVEL: HeadingLevel = 3;

/**
 * Base interface for all tree nodes
 */
export interface Node {
  kind: NodeKind;        // Node type identifier
  flags: NodeFlags;      // Node flags for metadata
  pos: number;           // Source offset start
  end: number;           // Source offset end
}

// =============================================================================
// Specific Node Interfaces
// =============================================================================

/**
 * Document root node
 */
export interface Document extends Node {
  kind: NodeKind.Document;
  children: BlockNode[];
  lineStarts: number[];           // Precomputed line starts for position mapping
}

/**
 * Plain text span
 */
export interface InlineTextNode extends Node {
  kind: NodeKind.InlineText;
  text: string;
}

export interface ParagraphNode extends Node {
  kind: NodeKind.Paragraph;
  children: InlineNode[];
}

/**
 * Heading node; the level is already offset and clamped
 */
export interface HeadingNode extends Node {
  kind: NodeKind.Heading;
  level: HeadingLevel;
  children: InlineNode[];
}

/**
 * Quote/quotation environment, rendered as a callout
 */
export interface BlockquoteNode extends Node {
  kind: NodeKind.Blockquote;
  children: BlockNode[];
}

/**
 * itemize/description (unordered) or enumerate (ordered)
 */
export interface ListNode extends Node {
  kind: NodeKind.List;
  ordered: boolean;
  children: ListItemNode[];
}

/**
 * List item: leading inline content plus any nested blocks (nested lists among them)
 */
export interface ListItemNode extends Node {
  kind: NodeKind.ListItem;
  children: InlineNode[];
  blocks: BlockNode[];
}

/**
 * verbatim/lstlisting/minted body
 */
export interface CodeBlockNode extends Node {
  kind: NodeKind.CodeBlock;
  language?: string;
  text: string;
}

export interface TableNode extends Node {
  kind: NodeKind.Table;
  children: TableRowNode[];
}

export interface TableRowNode extends Node {
  kind: NodeKind.TableRow;
  children: TableCellNode[];
}

export interface TableCellNode extends Node {
  kind: NodeKind.TableCell;
  children: InlineNode[];
}

/**
 * Display math; environment is set for align-like bodies that need re-wrapping
 */
export interface MathBlockNode extends Node {
  kind: NodeKind.MathBlock;
  text: string;
  environment?: string;
}

/**
 * \textit, \emph
 */
export interface EmphasisNode extends Node {
  kind: NodeKind.Emphasis;
  children: InlineNode[];
}

/**
 * \textbf
 */
export interface StrongNode extends Node {
  kind: NodeKind.Strong;
  children: InlineNode[];
}

/**
 * \texttt, \verb
 */
export interface InlineCodeNode extends Node {
  kind: NodeKind.InlineCode;
  text: string;
}

/**
 * \href, \url
 */
export interface LinkNode extends Node {
  kind: NodeKind.Link;
  destination: string;
  children: InlineNode[];
}

export interface MathInlineNode extends Node {
  kind: NodeKind.MathInline;
  text: string;
}

/**
 * \\ or \newline in running text
 */
export interface InlineHardBreak extends Node {
  kind: NodeKind.InlineHardBreak;
}

// =============================================================================
// Type Unions for Category Safety
// =============================================================================

/**
 * Block-level node types
 */
export type BlockNode =
  | ParagraphNode
  | HeadingNode
  | BlockquoteNode
  | ListNode
  | CodeBlockNode
  | TableNode
  | MathBlockNode;

/**
 * Inline-level node types
 */
export type InlineNode =
  | InlineTextNode
  | EmphasisNode
  | StrongNode
  | InlineCodeNode
  | LinkNode
  | MathInlineNode
  | InlineHardBreak;

/**
 * All possible node types
 */
export type AnyNode = Document | BlockNode | ListItemNode | TableRowNode | TableCellNode | InlineNode;

/**
 * Check whether a flag is set on a node
 */
export function hasNodeFlag(node: Node, flag: NodeFlags): boolean {
  return (node.flags & flag) !== 0;
}
