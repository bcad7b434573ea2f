// Helpers for inline content accumulation: the parser pushes small text
// fragments as it consumes tokens; they are merged, whitespace-collapsed and
// trimmed once the owning block or span is complete.

import { createTextNode } from './ast-factory.js';
import { InlineNode, InlineTextNode, NodeKind } from './ast-types.js';

const WHITESPACE_RUN = /[ \t\f\v\r\n]+/g;
const LEADING_WHITESPACE = /^[ \t\f\v\r\n]/;
const TRAILING_WHITESPACE = /[ \t\f\v\r\n]$/;

/**
 * Accumulates inline nodes for one block or span. Text pieces are collected
 * and only joined into a single string when the run ends.
 */
export class InlineAccumulator {
  private readonly nodes: InlineNode[] = [];
  private pieces: string[] = [];
  private textStart = -1;
  private textEnd = -1;

  /** Append a literal text fragment */
  pushText(pos: number, end: number, text: string): void {
    if (this.textStart < 0) this.textStart = pos;
    this.textEnd = end;
    this.pieces.push(text);
  }

  /** Append a finished inline node */
  push(node: InlineNode): void {
    this.flushText();
    this.nodes.push(node);
  }

  /** Append several finished inline nodes, merging any text they carry */
  pushAll(nodes: readonly InlineNode[]): void {
    for (const node of nodes) {
      if (node.kind === NodeKind.InlineText) {
        this.pushText(node.pos, node.end, node.text);
      } else {
        this.push(node);
      }
    }
  }

  /** Whether the content gathered so far starts or ends with whitespace */
  edgeWhitespace(): { leading: boolean, trailing: boolean } {
    this.flushText();
    const first = this.nodes[0];
    const last = this.nodes[this.nodes.length - 1];
    return {
      leading: first?.kind === NodeKind.InlineText && LEADING_WHITESPACE.test(first.text),
      trailing: last?.kind === NodeKind.InlineText && TRAILING_WHITESPACE.test(last.text)
    };
  }

  /** Merged, collapsed and edge-trimmed nodes */
  finish(): InlineNode[] {
    this.flushText();
    return normalizeInlines(this.nodes);
  }

  private flushText(): void {
    if (this.pieces.length === 0) return;
    const text = this.pieces.length === 1 ? this.pieces[0] : this.pieces.join('');
    this.nodes.push(createTextNode(this.textStart, this.textEnd, text));
    this.pieces = [];
    this.textStart = -1;
    this.textEnd = -1;
  }
}

/**
 * Merge adjacent text nodes, collapse whitespace runs to one space, drop
 * spaces touching a hard break and trim the edges of the sequence.
 */
export function normalizeInlines(nodes: readonly InlineNode[]): InlineNode[] {
  const merged = mergeContiguousText(nodes);

  for (let i = 0; i < merged.length; i++) {
    const node = merged[i];
    if (node.kind !== NodeKind.InlineText) continue;

    let text = node.text.replace(WHITESPACE_RUN, ' ');
    const previous = merged[i - 1];
    const next = merged[i + 1];
    if (!previous || previous.kind === NodeKind.InlineHardBreak) text = text.replace(/^ /, '');
    if (!next || next.kind === NodeKind.InlineHardBreak) text = text.replace(/ $/, '');
    merged[i] = createTextNode(node.pos, node.end, text);
  }

  return trimHardBreaks(merged.filter(node => node.kind !== NodeKind.InlineText || node.text !== ''));
}

function mergeContiguousText(nodes: readonly InlineNode[]): InlineNode[] {
  const out: InlineNode[] = [];
  for (const node of nodes) {
    const previous = out[out.length - 1];
    if (node.kind === NodeKind.InlineText && previous?.kind === NodeKind.InlineText) {
      out[out.length - 1] = joinText(previous, node);
      continue;
    }
    out.push(node);
  }
  return out;
}

function joinText(first: InlineTextNode, second: InlineTextNode): InlineTextNode {
  return createTextNode(first.pos, second.end, first.text + second.text);
}

// Breaks at the very start or end of a block render as nothing useful
function trimHardBreaks(nodes: InlineNode[]): InlineNode[] {
  let start = 0;
  let end = nodes.length;
  while (start < end && nodes[start].kind === NodeKind.InlineHardBreak) start++;
  while (end > start && nodes[end - 1].kind === NodeKind.InlineHardBreak) end--;
  return start === 0 && end === nodes.length ? nodes : nodes.slice(start, end);
}

/**
 * Plain text of an inline sequence, formatting dropped
 */
export function flattenInlineText(nodes: readonly InlineNode[]): string {
  let text = '';
  for (const node of nodes) {
    switch (node.kind) {
      case NodeKind.InlineText:
      case NodeKind.InlineCode:
      case NodeKind.MathInline:
        text += node.text;
        break;
      case NodeKind.InlineHardBreak:
        text += ' ';
        break;
      default:
        text += flattenInlineText(node.children);
    }
  }
  return text;
}
