/**
 * Markdown renderer
 *
 * Serialises a Document Tree to Notion-flavoured markdown. Every block renders
 * to a list of lines; blocks are joined with a single line break. The tree is
 * only read, never changed.
 */

import {
  BlockNode,
  BlockquoteNode,
  CodeBlockNode,
  Document,
  InlineNode,
  ListNode,
  MathBlockNode,
  NodeKind,
  TableNode
} from './ast-types.js';
import { getAlignedWrapper } from './command-table.js';
import { resolveOptions } from './conversion-options.js';
import { ConvertOptions, ResolvedOptions } from './parser-interfaces.js';

const INDENT = '  ';

interface RenderState {
  options: ResolvedOptions;
  /** Nesting depth of the list being rendered */
  listDepth: number;
}

export function renderDocument(document: Document, options?: ConvertOptions): string {
  return renderResolved(document, resolveOptions(options));
}

/**
 * Render with options that have already been validated
 */
export function renderResolved(document: Document, options: ResolvedOptions): string {
  const state: RenderState = { options, listDepth: 0 };
  return renderBlocks(document.children, state).join('\n');
}

function renderBlocks(blocks: readonly BlockNode[], state: RenderState): string[] {
  const lines: string[] = [];
  for (const block of blocks) {
    lines.push(...renderBlock(block, state));
  }
  return lines;
}

function renderBlock(node: BlockNode, state: RenderState): string[] {
  switch (node.kind) {
    case NodeKind.Paragraph:
      return renderInlines(node.children, '\n').split('\n');
    case NodeKind.Heading:
      return ['#'.repeat(node.level) + ' ' + renderInlines(node.children, ' ')];
    case NodeKind.MathBlock:
      return renderMathBlock(node).split('\n');
    case NodeKind.CodeBlock:
      return renderCodeBlock(node);
    case NodeKind.Table:
      return renderTable(node);
    case NodeKind.Blockquote:
      return renderBlockquote(node, state);
    case NodeKind.List:
      return renderList(node, state);
  }
}

function renderMathBlock(node: MathBlockNode): string {
  if (!node.environment) return '$$' + node.text + '$$';
  const wrapper = getAlignedWrapper(node.environment);
  return `$$\\begin{${wrapper}}${node.text}\\end{${wrapper}}$$`;
}

function renderCodeBlock(node: CodeBlockNode): string[] {
  const fence = '`'.repeat(Math.max(3, longestBacktickRun(node.text) + 1));
  const body = node.text === '' ? [] : node.text.split(/\r?\n/);
  return [fence + (node.language ?? ''), ...body, fence];
}

function renderTable(node: TableNode): string[] {
  if (node.children.length === 0) return [];

  const columns = Math.max(...node.children.map(row => row.children.length));
  const rows = node.children.map(row => {
    const cells = row.children.map(cell => escapeTableCell(renderInlines(cell.children, ' ')));
    while (cells.length < columns) cells.push('');
    return '| ' + cells.join(' | ') + ' |';
  });

  const separator = '|' + ' --- |'.repeat(columns);
  return [rows[0], separator, ...rows.slice(1)];
}

function escapeTableCell(text: string): string {
  return text.replace(/\|/g, '\\|');
}

function renderBlockquote(node: BlockquoteNode, state: RenderState): string[] {
  const lines = renderBlocks(node.children, { ...state, listDepth: 0 });
  const icon = state.options.calloutIcon;
  if (lines.length === 0) return [icon === '' ? '>' : '> ' + icon];

  return lines.map((line, index) => {
    const content = index === 0 && icon !== '' ? (line === '' ? icon : icon + ' ' + line) : line;
    return content === '' ? '>' : '> ' + content;
  });
}

function renderList(node: ListNode, state: RenderState): string[] {
  const indent = INDENT.repeat(state.listDepth);
  const continuation = indent + INDENT;
  const lines: string[] = [];

  node.children.forEach((item, index) => {
    const marker = node.ordered ? `${index + 1}. ` : '- ';
    const [first, ...rest] = renderInlines(item.children, '\n').split('\n');
    lines.push((indent + marker + first).trimEnd());
    for (const line of rest) lines.push(continuation + line);

    for (const block of item.blocks) {
      if (block.kind === NodeKind.List) {
        lines.push(...renderList(block, { ...state, listDepth: state.listDepth + 1 }));
      } else {
        for (const line of renderBlock(block, state)) lines.push(line === '' ? '' : continuation + line);
      }
    }
  });

  return lines;
}

/**
 * Inline spans to text; `hardBreak` is what a forced line break becomes
 */
function renderInlines(nodes: readonly InlineNode[], hardBreak: string): string {
  let out = '';
  let previous: InlineNode | undefined;
  for (const node of nodes) {
    switch (node.kind) {
      case NodeKind.InlineText:
        out += node.text;
        break;
      case NodeKind.Strong:
        out += '**' + renderInlines(node.children, hardBreak) + '**';
        break;
      case NodeKind.Emphasis:
        out += '*' + renderInlines(node.children, hardBreak) + '*';
        break;
      case NodeKind.InlineCode:
        out += renderCodeSpan(node.text);
        break;
      case NodeKind.Link:
        out += '[' + renderInlines(node.children, hardBreak) + '](' + escapeDestination(node.destination) + ')';
        break;
      case NodeKind.MathInline:
        // `$$a$$$$b$$` would read as one span
        if (previous?.kind === NodeKind.MathInline) out += ' ';
        out += '$$' + node.text + '$$';
        break;
      case NodeKind.InlineHardBreak:
        out += hardBreak;
        break;
    }
    previous = node;
  }
  return out;
}

function renderCodeSpan(text: string): string {
  const run = longestBacktickRun(text);
  if (run === 0) return '`' + text + '`';
  const fence = '`'.repeat(run + 1);
  return fence + ' ' + text + ' ' + fence;
}

function escapeDestination(url: string): string {
  return url.replace(/[ ()]/g, ch => ch === ' ' ? '%20' : ch === '(' ? '%28' : '%29');
}

function longestBacktickRun(text: string): number {
  let longest = 0;
  for (const match of text.matchAll(/`+/g)) {
    longest = Math.max(longest, match[0].length);
  }
  return longest;
}
