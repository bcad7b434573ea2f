/**
 * Core Parser Implementation
 *
 * Recursive descent over the scanner's token stream. Blocks are recognised
 * first; paragraphs, headings, list items and table cells then run the inline
 * sub-grammar. Structural problems throw StructuralError, everything else
 * degrades to a warning diagnostic.
 */

import {
  ConvertOptions,
  DiagnosticCategory,
  DiagnosticSeverity,
  ParseDiagnostic,
  ParseErrorCode,
  ParseResult,
  Parser,
  ResolvedOptions
} from './parser-interfaces.js';

import {
  BlockNode,
  CodeBlockNode,
  HeadingLevel,
  InlineNode,
  ListItemNode,
  ListNode,
  MAX_HEADING_LEVEL,
  NodeFlags,
  NodeKind,
  TableCellNode,
  TableNode,
  TableRowNode
} from './ast-types.js';

import {
  createBlockquoteNode,
  createCodeBlockNode,
  createDocumentNode,
  createEmphasisNode,
  createHardBreakNode,
  createHeadingNode,
  createInlineCodeNode,
  createLinkNode,
  createListItemNode,
  createListNode,
  createMathBlockNode,
  createMathInlineNode,
  createParagraphNode,
  createStrongNode,
  createTableCellNode,
  createTableNode,
  createTableRowNode,
  createTextNode,
  markSynthetic
} from './ast-factory.js';

import {
  EnvironmentKind,
  InlineStyle,
  getDroppedArgumentCount,
  getEnvironmentArgumentCount,
  getEnvironmentKind,
  getHeadingLevel,
  getInlineStyle,
  getTableRuleArgumentCount
} from './command-table.js';

import { freezeTree } from './ast-traversal.js';
import { resolveOptions } from './conversion-options.js';
import { StructuralError } from './errors.js';
import { InlineAccumulator, flattenInlineText } from './inline-fragments.js';
import {
  TokenCursor,
  computeLineStarts,
  isBlankLine,
  isCommand,
  isWhitespaceText,
  offsetToPosition,
  skipWhitespace
} from './parser-utils.js';
import { Token, scanTokens } from './scanner/scanner.js';
import { SyntaxKind, TokenFlags } from './scanner/token-types.js';

/** Deepest environment/group nesting accepted before giving up */
export const MAX_NESTING_DEPTH = 256;

/**
 * A token that opened something, with its index for error reporting
 */
interface OpenMarker {
  token: Token;
  index: number;
}

/**
 * Parser context for state management
 */
interface ParserContext {
  cursor: TokenCursor;
  sourceText: string;
  lineStarts: number[];
  options: ResolvedOptions;
  diagnostics: ParseDiagnostic[];
  depth: number;
  /** Open tables; comments inside them are always dropped */
  tableDepth: number;
}

/**
 * Where a run of blocks lives
 */
interface BlockScope {
  /** Environment whose \end closes this run */
  environment?: OpenMarker;
  /** \item ends the run */
  inList?: boolean;
  /** Inside a table float: caption and similar commands are skipped */
  inFloat?: boolean;
}

/**
 * What terminates a run of inline content
 */
const enum InlineMode {
  /** Blank line, block boundary or end of input */
  Paragraph,
  /** Matching `}` */
  Group,
  /** Matching `]` of an \item label */
  Label,
  /** `&`, `\\` or the table's \end */
  Cell
}

/**
 * Core parser implementation class
 */
class CoreParser implements Parser {
  private readonly defaultOptions: ConvertOptions;

  constructor(options?: ConvertOptions) {
    this.defaultOptions = { ...options };
  }

  parseDocument(text: string, options?: ConvertOptions): ParseResult {
    return parseResolved(text, resolveOptions({ ...this.defaultOptions, ...options }));
  }
}

/**
 * Parse with options that have already been validated
 */
export function parseResolved(text: string, options: ResolvedOptions): ParseResult {
  const lineStarts = computeLineStarts(text);
  const context: ParserContext = {
    cursor: new TokenCursor(scanTokens(text, { preserveComments: options.preserveComments })),
    sourceText: text,
    lineStarts,
    options,
    diagnostics: [],
    depth: 0,
    tableDepth: 0
  };

  const children = parseBlocks(context, {});
  const document = freezeTree(createDocumentNode(0, text.length, children, lineStarts));

  return {
    document,
    diagnostics: context.diagnostics,
    sourceText: text
  };
}

// =============================================================================
// Blocks
// =============================================================================

function parseBlocks(context: ParserContext, scope: BlockScope): BlockNode[] {
  const { cursor } = context;
  const blocks: BlockNode[] = [];

  while (true) {
    skipWhitespace(cursor);
    const token = cursor.current;

    switch (token.kind) {
      case SyntaxKind.EndOfFileToken:
        if (scope.environment) throw unclosedEnvironment(context, scope.environment);
        return blocks;

      case SyntaxKind.EnvEnd:
        if (!scope.environment) {
          throw structuralError(context, ParseErrorCode.UNEXPECTED_ENVIRONMENT_END,
            `\\end{${token.text}} has no matching \\begin`, currentMarker(context), token.text);
        }
        if (token.text !== scope.environment.token.text) throw mismatchedEnvironment(context, scope.environment);
        return blocks;

      case SyntaxKind.EnvBegin:
        blocks.push(...parseEnvironment(context));
        continue;

      case SyntaxKind.MathDisplayDelimiter:
        if (isDisplayMathOpener(token)) {
          const math = parseDisplayMath(context);
          if (math) blocks.push(math);
          continue;
        }
        break;

      case SyntaxKind.Command: {
        if (scope.inList && token.text === 'item') return blocks;

        const level = getHeadingLevel(token.text);
        if (level !== undefined) {
          blocks.push(parseHeading(context, level));
          continue;
        }

        const dropped = getDroppedArgumentCount(token.text) ??
          (scope.inFloat ? getTableRuleArgumentCount(token.text) : undefined);
        if (dropped !== undefined) {
          skipCommand(context, dropped);
          continue;
        }
        break;
      }
    }

    const paragraph = parseParagraph(context, !!scope.inList);
    if (paragraph) blocks.push(paragraph);
  }
}

function parseParagraph(context: ParserContext, inList: boolean): BlockNode | undefined {
  const start = context.cursor.current.pos;
  const inlines = new InlineAccumulator();
  parseInlineContent(context, inlines, InlineMode.Paragraph, undefined, inList);

  const children = inlines.finish();
  if (children.length === 0) return undefined;
  return createParagraphNode(start, context.cursor.lastEnd, children);
}

function parseHeading(context: ParserContext, baseLevel: HeadingLevel): BlockNode {
  const command = consumeMarker(context);
  skipOptionalArgument(context);
  const group = parseInlineGroup(context, command, ParseErrorCode.MISSING_ARGUMENT);

  const requested = baseLevel + context.options.headingLevelOffset;
  const level = clampHeadingLevel(requested);
  const heading = createHeadingNode(command.token.pos, group.end, level, group.children);

  if (level !== requested) {
    heading.flags |= NodeFlags.Clamped;
    addWarning(context, ParseErrorCode.HEADING_LEVEL_CLAMPED, DiagnosticCategory.Structure,
      `Heading level ${requested} clamped to ${level}`, command.token, command.token.text);
  }
  return heading;
}

function clampHeadingLevel(level: number): HeadingLevel {
  if (level <= 1) return 1;
  if (level === 2) return 2;
  return MAX_HEADING_LEVEL;
}

function isDisplayMathOpener(token: Token): boolean {
  return token.kind === SyntaxKind.MathDisplayDelimiter && (token.text === '$$' || token.text === '\\[');
}

function parseDisplayMath(context: ParserContext): BlockNode | undefined {
  const open = consumeMarker(context);
  const closer = open.token.text === '$$' ? '$$' : '\\]';
  const body = collectMath(context, open, SyntaxKind.MathDisplayDelimiter, closer);
  if (body.text === '') return undefined;
  return createMathBlockNode(open.token.pos, body.end, body.text);
}

// =============================================================================
// Environments
// =============================================================================

function parseEnvironment(context: ParserContext): BlockNode[] {
  const begin = consumeMarker(context);
  const name = begin.token.text;
  const kind = getEnvironmentKind(name);

  enter(context, begin);
  let blocks: BlockNode[];

  switch (kind) {
    case EnvironmentKind.UnorderedList:
    case EnvironmentKind.OrderedList:
      blocks = [parseList(context, begin, kind === EnvironmentKind.OrderedList)];
      break;

    case EnvironmentKind.Table:
      blocks = [parseTable(context, begin)];
      break;

    case EnvironmentKind.TableFloat:
      skipOptionalArgument(context);
      blocks = parseBlocks(context, { environment: begin, inFloat: true });
      expectEnvironmentEnd(context, begin);
      break;

    case EnvironmentKind.CodeBlock:
      blocks = [parseCodeBlock(context, begin)];
      break;

    case EnvironmentKind.Comment:
      if (context.cursor.current.kind === SyntaxKind.RawText) context.cursor.advance();
      expectEnvironmentEnd(context, begin);
      blocks = [];
      break;

    case EnvironmentKind.Blockquote: {
      const children = parseBlocks(context, { environment: begin });
      const end = expectEnvironmentEnd(context, begin);
      blocks = [createBlockquoteNode(begin.token.pos, end, children)];
      break;
    }

    case EnvironmentKind.MathBlock:
    case EnvironmentKind.AlignedMath: {
      const body = collectEnvironmentMath(context, begin);
      const environment = kind === EnvironmentKind.AlignedMath ? name : undefined;
      blocks = [createMathBlockNode(begin.token.pos, body.end, body.text, environment)];
      break;
    }

    default:
      if (kind === undefined) {
        addWarning(context, ParseErrorCode.UNKNOWN_ENVIRONMENT, DiagnosticCategory.Unsupported,
          `Unknown environment '${name}' treated as plain content`, begin.token, name);
      }
      skipOptionalArgument(context);
      skipRequiredArguments(context, begin, getEnvironmentArgumentCount(name));
      blocks = parseBlocks(context, { environment: begin });
      expectEnvironmentEnd(context, begin);
  }

  leave(context);
  return blocks;
}

/**
 * Consume the \end that closes `begin`; returns its end offset
 */
function expectEnvironmentEnd(context: ParserContext, begin: OpenMarker): number {
  const token = context.cursor.current;
  if (token.kind === SyntaxKind.EndOfFileToken) throw unclosedEnvironment(context, begin);
  if (token.kind !== SyntaxKind.EnvEnd || token.text !== begin.token.text) throw mismatchedEnvironment(context, begin);
  context.cursor.advance();
  return token.end;
}

function parseList(context: ParserContext, begin: OpenMarker, ordered: boolean): ListNode {
  const { cursor } = context;
  const items: ListItemNode[] = [];
  const scope: BlockScope = { environment: begin, inList: true };

  skipWhitespace(cursor);
  if (!isCommand(cursor.current, 'item')) {
    const start = cursor.current.pos;
    const blocks = parseBlocks(context, scope);
    if (blocks.length > 0) {
      addWarning(context, ParseErrorCode.IMPLICIT_LIST_ITEM, DiagnosticCategory.Structure,
        `Content before the first \\item in '${begin.token.text}'`, begin.token, begin.token.text);
      items.push(markSynthetic(createListItem(start, cursor.lastEnd, [], blocks)));
    }
  }

  while (isCommand(cursor.current, 'item')) {
    const item = consumeMarker(context);
    const label = parseItemLabel(context, item);
    const blocks = parseBlocks(context, scope);
    items.push(createListItem(item.token.pos, cursor.lastEnd, label, blocks));
  }

  const end = expectEnvironmentEnd(context, begin);
  return createListNode(begin.token.pos, end, ordered, items);
}

function parseItemLabel(context: ParserContext, item: OpenMarker): InlineNode[] {
  if (!startOptionalArgument(context)) return [];
  const open = consumeMarker(context);
  enter(context, item);
  const label = new InlineAccumulator();
  parseInlineContent(context, label, InlineMode.Label, open, false);
  context.cursor.advance();
  leave(context);
  return label.finish();
}

/**
 * The first paragraph of an item is its inline content; the label, when
 * present, leads as strong text.
 */
function createListItem(pos: number, end: number, label: InlineNode[], blocks: BlockNode[]): ListItemNode {
  const first = blocks[0];
  let children: InlineNode[] = [];
  let rest = blocks;
  if (first?.kind === NodeKind.Paragraph) {
    children = first.children;
    rest = blocks.slice(1);
  }

  if (label.length > 0) {
    const labelEnd = label[label.length - 1].end;
    const strong = createStrongNode(label[0].pos, labelEnd, label);
    children = children.length > 0 ? [strong, createTextNode(labelEnd, labelEnd, ' '), ...children] : [strong];
  }

  return createListItemNode(pos, end, children, rest);
}

function parseTable(context: ParserContext, begin: OpenMarker): TableNode {
  const { cursor } = context;
  skipOptionalArgument(context);
  skipRequiredArguments(context, begin, getEnvironmentArgumentCount(begin.token.text));

  const rows: TableRowNode[] = [];
  context.tableDepth++;
  while (true) {
    const row = parseTableRow(context, begin);
    if (row.children.some(cell => cell.children.length > 0)) rows.push(row);
    if (cursor.current.kind !== SyntaxKind.LineBreak) break;
    cursor.advance();
    if (cursor.peek(0).kind === SyntaxKind.BracketOpen) skipOptionalArgument(context);
  }

  context.tableDepth--;

  const end = expectEnvironmentEnd(context, begin);
  const columns = Math.max(0, ...rows.map(row => row.children.length));
  for (const row of rows) {
    if (row.children.length < columns) {
      addWarning(context, ParseErrorCode.RAGGED_TABLE_ROW, DiagnosticCategory.Structure,
        `Table row has ${row.children.length} of ${columns} cells`, row, begin.token.text);
    }
  }
  return createTableNode(begin.token.pos, end, rows);
}

/**
 * Cells up to `\\`, the table's \end or end of input; the terminator is left current
 */
function parseTableRow(context: ParserContext, begin: OpenMarker): TableRowNode {
  const { cursor } = context;
  const start = cursor.current.pos;
  const cells: TableCellNode[] = [];

  while (true) {
    const cellStart = cursor.current.pos;
    const content = new InlineAccumulator();
    let span = 1;

    while (cursor.current.kind === SyntaxKind.Comment || isWhitespaceText(cursor.current) || cursor.current.kind === SyntaxKind.NewLine) {
      cursor.advance();
    }
    if (isCommand(cursor.current, 'multicolumn')) {
      span = parseMulticolumn(context, content);
    }
    parseInlineContent(context, content, InlineMode.Cell, begin, false);

    const cellEnd = cursor.lastEnd;
    cells.push(createTableCellNode(cellStart, Math.max(cellStart, cellEnd), content.finish()));
    for (let i = 1; i < span; i++) {
      cells.push(createTableCellNode(cellEnd, cellEnd));
    }

    if (cursor.current.kind !== SyntaxKind.AlignmentTab) break;
    cursor.advance();
  }

  return createTableRowNode(start, Math.max(start, cursor.lastEnd), cells);
}

/**
 * \multicolumn{n}{spec}{text}: text goes into `content`, returns n
 */
function parseMulticolumn(context: ParserContext, content: InlineAccumulator): number {
  const command = consumeMarker(context);
  const count = Number.parseInt(readRawGroup(context, command, ParseErrorCode.MISSING_ARGUMENT).text.trim(), 10);
  readRawGroup(context, command, ParseErrorCode.MISSING_ARGUMENT);
  content.pushAll(parseInlineGroup(context, command, ParseErrorCode.MISSING_ARGUMENT).children);
  return Number.isInteger(count) && count > 1 ? count : 1;
}

function parseCodeBlock(context: ParserContext, begin: OpenMarker): CodeBlockNode {
  const { cursor } = context;
  let body = '';
  if (cursor.current.kind === SyntaxKind.RawText) body = cursor.advance().text;
  const end = expectEnvironmentEnd(context, begin);

  let language: string | undefined;
  const name = begin.token.text;
  if (name === 'lstlisting') {
    const header = /^[ \t]*\[([^\]\n]*)\]/.exec(body);
    if (header) {
      language = /(?:^|,)\s*language\s*=\s*([^,\s]+)/i.exec(header[1])?.[1];
      body = body.slice(header[0].length);
    }
  } else if (name === 'minted') {
    const header = /^[ \t]*(?:\[[^\]\n]*\])?[ \t]*\{([^}\n]*)\}/.exec(body);
    if (header) {
      language = header[1].trim();
      body = body.slice(header[0].length);
    }
  }

  const text = body.replace(/^[ \t]*\r?\n/, '').replace(/\r?\n[ \t]*$/, '');
  return createCodeBlockNode(begin.token.pos, end, text, language?.toLowerCase());
}

/**
 * Raw body of an equation-like environment up to its own \end
 */
function collectEnvironmentMath(context: ParserContext, begin: OpenMarker): { text: string, end: number } {
  const { cursor } = context;
  let text = '';
  while (true) {
    const token = cursor.current;
    if (token.kind === SyntaxKind.EndOfFileToken) throw unclosedEnvironment(context, begin);
    if (token.kind === SyntaxKind.EnvEnd && token.text === begin.token.text) break;
    text += rawSpelling(context, token);
    cursor.advance();
  }
  const end = expectEnvironmentEnd(context, begin);
  return { text: text.trim(), end };
}

interface CollectedMath {
  text: string;
  end: number;
  /** `$a$$b$`: the closer's second `$` opens the next inline math */
  reopened?: OpenMarker;
}

/**
 * Raw math up to the closing delimiter; the closer is consumed
 */
function collectMath(context: ParserContext, open: OpenMarker, closerKind: SyntaxKind, closer: string): CollectedMath {
  const { cursor } = context;
  let text = '';
  while (true) {
    const token = cursor.current;
    if (token.kind === SyntaxKind.EndOfFileToken) {
      throw structuralError(context, ParseErrorCode.UNCLOSED_MATH,
        `Math opened with '${open.token.text}' is never closed`, open, open.token.text);
    }
    const index = cursor.index;
    cursor.advance();
    if (token.kind === closerKind && token.text === closer) return { text: text.trim(), end: token.end };
    if (closer === '$' && token.kind === SyntaxKind.MathDisplayDelimiter && token.text === '$$') {
      const next: Token = { kind: SyntaxKind.MathInlineDelimiter, flags: token.flags, pos: token.pos + 1, end: token.end, text: '$' };
      return { text: text.trim(), end: token.pos + 1, reopened: { token: next, index } };
    }
    text += rawSpelling(context, token);
  }
}

function rawSpelling(context: ParserContext, token: Token): string {
  // Comments never reach math output
  if (token.kind === SyntaxKind.Comment) return '';
  return context.sourceText.slice(token.pos, token.end);
}

// =============================================================================
// Inline content
// =============================================================================

/**
 * Consume inline tokens into `inlines` until the mode's terminator, which is
 * left current. `open` is the token that opened a group, label or table.
 */
function parseInlineContent(
  context: ParserContext,
  inlines: InlineAccumulator,
  mode: InlineMode,
  open: OpenMarker | undefined,
  inList: boolean
): void {
  const { cursor } = context;

  while (true) {
    const token = cursor.current;

    switch (token.kind) {
      case SyntaxKind.EndOfFileToken:
        if ((mode === InlineMode.Group || mode === InlineMode.Label) && open) throw unclosedGroup(context, open);
        return;

      case SyntaxKind.Text:
      case SyntaxKind.RawText:
        if (token.flags & TokenFlags.Malformed) {
          addWarning(context, ParseErrorCode.MALFORMED_ESCAPE, DiagnosticCategory.Syntax,
            `Escape '${token.text}' names nothing; kept as text`, token, token.text);
        }
        inlines.pushText(token.pos, token.end, token.text);
        cursor.advance();
        continue;

      case SyntaxKind.NewLine:
        if (mode === InlineMode.Paragraph && isBlankLine(token)) return;
        inlines.pushText(token.pos, token.end, ' ');
        cursor.advance();
        continue;

      case SyntaxKind.Comment:
        cursor.advance();
        // A pipe row has one line
        if (context.tableDepth > 0) continue;
        inlines.pushText(token.pos, token.end, '%' + token.text);
        if (cursor.current.kind === SyntaxKind.NewLine && !isBlankLine(cursor.current)) {
          const newline = cursor.advance();
          inlines.push(createHardBreakNode(newline.pos, newline.end));
        }
        continue;

      case SyntaxKind.LineBreak:
        if (mode === InlineMode.Cell) return;
        cursor.advance();
        inlines.push(createHardBreakNode(token.pos, token.end));
        if (cursor.current.kind === SyntaxKind.BracketOpen) skipOptionalArgument(context);
        continue;

      case SyntaxKind.AlignmentTab:
        if (mode === InlineMode.Cell) return;
        break;

      case SyntaxKind.BracketOpen:
        break;

      case SyntaxKind.BracketClose:
        if (mode === InlineMode.Label) return;
        break;

      case SyntaxKind.GroupOpen:
        parseBareGroup(context, inlines);
        continue;

      case SyntaxKind.GroupClose:
        if (mode === InlineMode.Group) return;
        throw structuralError(context, ParseErrorCode.UNEXPECTED_GROUP_CLOSE,
          `Unexpected '}' without a matching '{'`, currentMarker(context));

      case SyntaxKind.EnvBegin:
        if (mode === InlineMode.Paragraph) return;
        throw structuralError(context, ParseErrorCode.INVALID_NESTING,
          `Environment '${token.text}' cannot begin inside an inline argument`, currentMarker(context), token.text);

      case SyntaxKind.EnvEnd:
        if (mode === InlineMode.Paragraph || mode === InlineMode.Cell) return;
        if (open) throw unclosedGroup(context, open);
        return;

      case SyntaxKind.MathInlineDelimiter:
        if (token.text === '\\)') break;
        parseInlineMath(context, inlines, token.text === '$' ? '$' : '\\)', SyntaxKind.MathInlineDelimiter);
        continue;

      case SyntaxKind.MathDisplayDelimiter:
        if (!isDisplayMathOpener(token)) break;
        if (mode === InlineMode.Paragraph) return;
        parseInlineMath(context, inlines, token.text === '$$' ? '$$' : '\\]', SyntaxKind.MathDisplayDelimiter);
        continue;

      case SyntaxKind.Command:
        if (mode === InlineMode.Paragraph && (getHeadingLevel(token.text) !== undefined || (inList && token.text === 'item'))) {
          return;
        }
        parseInlineCommand(context, inlines, mode);
        continue;
    }

    // Anything that fell through is literal text
    inlines.pushText(token.pos, token.end, context.sourceText.slice(token.pos, token.end));
    cursor.advance();
  }
}

function parseInlineMath(context: ParserContext, inlines: InlineAccumulator, closer: string, closerKind: SyntaxKind): void {
  let open: OpenMarker | undefined = consumeMarker(context);
  while (open) {
    const math = collectMath(context, open, closerKind, closer);
    // Inline math always renders on one line
    const text = math.text.replace(/\s+/g, ' ');
    if (text !== '') inlines.push(createMathInlineNode(open.token.pos, math.end, text));
    open = math.reopened;
  }
}

/**
 * A bare `{...}` contributes its content without the braces
 */
function parseBareGroup(context: ParserContext, inlines: InlineAccumulator): void {
  const open = consumeMarker(context);
  enter(context, open);
  parseInlineContent(context, inlines, InlineMode.Group, open, false);
  context.cursor.advance();
  leave(context);
}

function parseInlineCommand(context: ParserContext, inlines: InlineAccumulator, mode: InlineMode): void {
  const { cursor } = context;
  const token = cursor.current;
  const name = token.text;

  if (getHeadingLevel(name) !== undefined) {
    throw structuralError(context, ParseErrorCode.INVALID_NESTING,
      `\\${name} cannot appear inside an inline argument`, currentMarker(context), name);
  }

  const dropped = getDroppedArgumentCount(name) ??
    (mode === InlineMode.Cell ? getTableRuleArgumentCount(name) : undefined);
  if (dropped !== undefined) {
    skipCommand(context, dropped);
    return;
  }

  if (name === 'newline') {
    cursor.advance();
    inlines.push(createHardBreakNode(token.pos, token.end));
    return;
  }

  const style = getInlineStyle(name);
  if (style !== undefined) {
    const command = consumeMarker(context);
    const group = parseInlineGroup(context, command, ParseErrorCode.MISSING_ARGUMENT);
    // Edge spaces go outside the markers
    if (group.leadingSpace || (group.trailingSpace && group.children.length === 0)) {
      inlines.pushText(token.pos, token.pos, ' ');
    }
    if (group.children.length === 0) return;

    switch (style) {
      case InlineStyle.Strong:
        inlines.push(createStrongNode(token.pos, group.end, group.children));
        break;
      case InlineStyle.Emphasis:
        inlines.push(createEmphasisNode(token.pos, group.end, group.children));
        break;
      case InlineStyle.Code:
        inlines.push(createInlineCodeNode(token.pos, group.end, flattenInlineText(group.children)));
        break;
      case InlineStyle.Plain:
        inlines.pushAll(group.children);
        break;
    }
    if (group.trailingSpace) inlines.pushText(group.end, group.end, ' ');
    return;
  }

  switch (name) {
    case 'href': {
      const command = consumeMarker(context);
      const destination = readRawGroup(context, command, ParseErrorCode.MALFORMED_LINK);
      const label = parseInlineGroup(context, command, ParseErrorCode.MALFORMED_LINK);
      const url = destination.text.trim();
      const children = label.children.length > 0 ? label.children : [createTextNode(token.pos, label.end, url)];
      inlines.push(createLinkNode(token.pos, label.end, url, children));
      return;
    }

    case 'url': {
      const command = consumeMarker(context);
      const destination = readRawGroup(context, command, ParseErrorCode.MISSING_ARGUMENT);
      const url = destination.text.trim();
      inlines.push(createLinkNode(token.pos, destination.end, url, [createTextNode(token.pos, destination.end, url)]));
      return;
    }

    case 'verb':
    case 'verb*': {
      const command = consumeMarker(context);
      if (cursor.current.kind !== SyntaxKind.RawText) throw missingArgument(context, command);
      const raw = cursor.advance();
      inlines.push(createInlineCodeNode(token.pos, raw.end, raw.text));
      return;
    }
  }

  parseUnknownCommand(context, inlines);
}

/**
 * Unknown commands stay literal, with directly attached groups kept braced
 */
function parseUnknownCommand(context: ParserContext, inlines: InlineAccumulator): void {
  const { cursor } = context;
  const token = cursor.advance();
  addWarning(context, ParseErrorCode.UNKNOWN_COMMAND, DiagnosticCategory.Unsupported,
    `Unknown command \\${token.text} kept as text`, token, token.text);
  inlines.pushText(token.pos, token.end, '\\' + token.text);

  while (cursor.current.kind === SyntaxKind.GroupOpen) {
    const open = consumeMarker(context);
    enter(context, open);
    inlines.pushText(open.token.pos, open.token.end, '{');
    parseInlineContent(context, inlines, InlineMode.Group, open, false);
    const close = cursor.advance();
    inlines.pushText(close.pos, close.end, '}');
    leave(context);
  }
}

// =============================================================================
// Arguments
// =============================================================================

/**
 * Moves past whitespace to an argument opener of the given kind. Nothing is
 * consumed when the next significant token is something else.
 */
function startArgument(context: ParserContext, kind: SyntaxKind): boolean {
  const { cursor } = context;
  let offset = 0;
  while (isArgumentTrivia(cursor.peek(offset))) offset++;
  if (cursor.peek(offset).kind !== kind) return false;
  for (let i = 0; i < offset; i++) cursor.advance();
  return true;
}

function isArgumentTrivia(token: Token): boolean {
  return isWhitespaceText(token) || (token.kind === SyntaxKind.NewLine && !isBlankLine(token));
}

function startOptionalArgument(context: ParserContext): boolean {
  return startArgument(context, SyntaxKind.BracketOpen);
}

/**
 * Skips a `[...]` argument when one follows; an unclosed bracket stays literal
 */
function skipOptionalArgument(context: ParserContext): void {
  const { cursor } = context;
  let offset = 0;
  while (isArgumentTrivia(cursor.peek(offset))) offset++;
  if (cursor.peek(offset).kind !== SyntaxKind.BracketOpen) return;

  let depth = 0;
  for (let i = offset + 1; ; i++) {
    const token = cursor.peek(i);
    if (token.kind === SyntaxKind.EndOfFileToken || isBlankLine(token)) return;
    if (token.kind === SyntaxKind.GroupOpen) depth++;
    if (token.kind === SyntaxKind.GroupClose) depth--;
    if (token.kind === SyntaxKind.BracketClose && depth <= 0) {
      for (let j = 0; j <= i; j++) cursor.advance();
      return;
    }
  }
}

function skipRequiredArguments(context: ParserContext, owner: OpenMarker, count: number): void {
  for (let i = 0; i < count; i++) {
    readRawGroup(context, owner, ParseErrorCode.MISSING_ARGUMENT);
  }
}

/**
 * Drops a command together with an optional `[...]` and `count` groups
 */
function skipCommand(context: ParserContext, count: number): void {
  const command = consumeMarker(context);
  skipOptionalArgument(context);
  skipRequiredArguments(context, command, count);
}

/**
 * A required `{...}` taken verbatim. Escaped specials contribute their bare character.
 */
function readRawGroup(context: ParserContext, owner: OpenMarker, code: ParseErrorCode): { text: string, end: number } {
  const { cursor } = context;
  if (!startArgument(context, SyntaxKind.GroupOpen)) throw argumentError(context, owner, code);
  const open = consumeMarker(context);

  let depth = 0;
  let text = '';
  while (true) {
    const token = cursor.advance();
    switch (token.kind) {
      case SyntaxKind.EndOfFileToken:
        throw unclosedGroup(context, open);
      case SyntaxKind.GroupOpen:
        depth++;
        break;
      case SyntaxKind.GroupClose:
        if (depth === 0) return { text, end: token.end };
        depth--;
        break;
    }
    text += token.kind === SyntaxKind.Text && (token.flags & TokenFlags.Escaped) ?
      token.text :
      rawSpelling(context, token);
  }
}

/**
 * A required `{...}` parsed as inline content
 */
interface InlineGroup {
  children: InlineNode[];
  end: number;
  leadingSpace: boolean;
  trailingSpace: boolean;
}

function parseInlineGroup(context: ParserContext, owner: OpenMarker, code: ParseErrorCode): InlineGroup {
  if (!startArgument(context, SyntaxKind.GroupOpen)) throw argumentError(context, owner, code);
  const open = consumeMarker(context);
  enter(context, open);

  const inlines = new InlineAccumulator();
  parseInlineContent(context, inlines, InlineMode.Group, open, false);
  const close = context.cursor.advance();

  leave(context);
  const edges = inlines.edgeWhitespace();
  return { children: inlines.finish(), end: close.end, leadingSpace: edges.leading, trailingSpace: edges.trailing };
}

// =============================================================================
// Context helpers
// =============================================================================

function currentMarker(context: ParserContext): OpenMarker {
  return { token: context.cursor.current, index: context.cursor.index };
}

function consumeMarker(context: ParserContext): OpenMarker {
  const marker = currentMarker(context);
  context.cursor.advance();
  return marker;
}

function enter(context: ParserContext, marker: OpenMarker): void {
  context.depth++;
  if (context.depth > MAX_NESTING_DEPTH) {
    throw structuralError(context, ParseErrorCode.NESTING_TOO_DEEP,
      `Nesting deeper than ${MAX_NESTING_DEPTH} levels`, marker);
  }
}

function leave(context: ParserContext): void {
  context.depth--;
}

function addWarning(
  context: ParserContext,
  code: ParseErrorCode,
  category: DiagnosticCategory,
  message: string,
  span: { pos: number, end: number },
  subject?: string
): void {
  const diagnostic: ParseDiagnostic = {
    severity: DiagnosticSeverity.Warning,
    category,
    code,
    message,
    pos: span.pos,
    end: span.end
  };
  if (subject !== undefined) diagnostic.subject = subject;
  context.diagnostics.push(diagnostic);
}

function structuralError(
  context: ParserContext,
  code: ParseErrorCode,
  message: string,
  at: OpenMarker,
  subject?: string
): StructuralError {
  return new StructuralError(message, {
    code,
    subject,
    pos: at.token.pos,
    tokenIndex: at.index,
    position: offsetToPosition(context.lineStarts, at.token.pos)
  });
}

function unclosedEnvironment(context: ParserContext, begin: OpenMarker): StructuralError {
  const name = begin.token.text;
  return structuralError(context, ParseErrorCode.UNCLOSED_ENVIRONMENT,
    `Environment '${name}' is never closed`, begin, name);
}

function mismatchedEnvironment(context: ParserContext, begin: OpenMarker): StructuralError {
  const found = context.cursor.current;
  return structuralError(context, ParseErrorCode.MISMATCHED_ENVIRONMENT,
    `\\end{${found.text}} does not match \\begin{${begin.token.text}}`, currentMarker(context), found.text);
}

function unclosedGroup(context: ParserContext, open: OpenMarker): StructuralError {
  return structuralError(context, ParseErrorCode.UNCLOSED_GROUP,
    `'${open.token.text}' is never closed`, open);
}

function missingArgument(context: ParserContext, command: OpenMarker): StructuralError {
  return structuralError(context, ParseErrorCode.MISSING_ARGUMENT,
    `\\${command.token.text} requires an argument`, command, command.token.text);
}

function argumentError(context: ParserContext, owner: OpenMarker, code: ParseErrorCode): StructuralError {
  if (code === ParseErrorCode.MALFORMED_LINK) {
    return structuralError(context, code, `\\${owner.token.text} requires a URL and a link text`, owner, owner.token.text);
  }
  if (owner.token.kind === SyntaxKind.EnvBegin) {
    return structuralError(context, code, `Environment '${owner.token.text}' requires an argument`, owner, owner.token.text);
  }
  return missingArgument(context, owner);
}

/**
 * Creates a new parser instance
 */
export function createParser(options?: ConvertOptions): Parser {
  return new CoreParser(options);
}

/**
 * Parse a document with a one-off parser
 */
export function parseDocument(text: string, options?: ConvertOptions): ParseResult {
  return createParser(options).parseDocument(text);
}
