import {
  CharacterCodes,
  isEscapableSpecial,
  isLetter,
  isLineBreak,
  isWhiteSpaceOnly,
  isWhiteSpaceSingleLine
} from './character-codes.js';
import { SyntaxKind, TokenFlags } from './token-types.js';

export interface ScanOptions {
  /** Emit Comment tokens instead of dropping comments (default: false) */
  preserveComments?: boolean;
}

export interface Scanner {
  /** Initialize scanner text and comment policy. */
  initText(text: string, options?: ScanOptions): void;

  /** Advances to the next token and updates all public token fields. */
  scan(): void;

  /** Restart scanning from an earlier offset (0 restarts from the beginning). */
  rollback(pos: number): void;

  /** Fill a zero-allocation diagnostics state object. */
  fillDebugState(state: ScannerDebugState): void;

  /** Current token type. Updated by scan() and rollback(). */
  readonly token: SyntaxKind;

  /** Current token payload: text, command name, environment name or delimiter. */
  readonly tokenText: string;

  /** Token flags including line context and escape flags. */
  readonly tokenFlags: TokenFlags;

  /** Offset where the current token starts. */
  readonly tokenPos: number;

  /** Where the next token will start (offset into the source). */
  readonly offsetNext: number;
}

/**
 * Materialized token as handed to the parser
 */
export interface Token {
  readonly kind: SyntaxKind;
  readonly flags: TokenFlags;
  readonly pos: number;
  readonly end: number;
  readonly text: string;
}

/** Content processing mode - only one active at a time. */
const enum ContentMode {
  /** Regular LaTeX tokenization. */
  Normal = 0,

  /** Literal text until \end{name} (verbatim-like environments). */
  RawText = 1,

  /** Literal text until the \verb delimiter repeats. */
  InlineVerbatim = 2,
}

/**
 * Environments whose body is captured as raw text
 */
const RAW_ENVIRONMENTS: ReadonlySet<string> = new Set([
  'verbatim',
  'verbatim*',
  'lstlisting',
  'minted',
  'comment'
]);

/**
 * Debug state interface for zero-allocation diagnostics
 */
export interface ScannerDebugState {
  /** Current absolute position (index) in the source. */
  pos: number;

  /** Current 1-based line number. */
  line: number;

  /** Current 1-based column number. */
  column: number;

  /** Human-readable mode name ('Normal', 'RawText', 'InlineVerbatim'). */
  mode: string;

  /** True when nothing but whitespace precedes pos on its line. */
  atLineStart: boolean;

  /** True when there was a line break immediately before the current pos. */
  precedingLineBreak: boolean;

  /** The current token kind reported by the scanner. */
  currentToken: SyntaxKind;

  /** The current token's text. */
  currentTokenText: string;

  /** Flags associated with the current token. */
  currentTokenFlags: TokenFlags;

  /** The offset where the next token will start. */
  nextOffset: number;
}

export function createDebugState(): ScannerDebugState {
  return {
    pos: 0,
    line: 0,
    column: 0,
    mode: '',
    atLineStart: false,
    precedingLineBreak: false,
    currentToken: SyntaxKind.Unknown,
    currentTokenText: '',
    currentTokenFlags: TokenFlags.None,
    nextOffset: 0
  };
}

/**
 * LaTeX scanner with closure-based architecture.
 * Each instance owns its state; nothing is shared between scanners.
 */
export function createScanner(): Scanner {
  // Scanner state - encapsulated within closure
  let source = '';
  let pos = 0;
  let end = 0;
  let line = 1;
  let column = 1;
  let lastLineStart = 0;
  let preserveComments = false;

  // Content processing mode
  let contentMode: ContentMode = ContentMode.Normal;
  let rawEnvironmentName = '';
  let verbatimDelimiter = 0;

  // Line context
  let lineHasContent = false;
  let precedingLineBreak = false;

  // Scanner interface fields
  let token: SyntaxKind = SyntaxKind.Unknown;
  let tokenText = '';
  let tokenFlags: TokenFlags = TokenFlags.None;
  let tokenPos = 0;
  let offsetNext = 0;

  function updatePosition(newPos: number): void {
    while (pos < newPos) {
      const ch = source.charCodeAt(pos);
      if (isLineBreak(ch)) {
        if (ch === CharacterCodes.carriageReturn &&
          pos + 1 < end &&
          source.charCodeAt(pos + 1) === CharacterCodes.lineFeed) {
          pos++; // Skip CR in CRLF
        }
        line++;
        column = 1;
        lastLineStart = pos + 1;
      } else {
        column++;
      }
      pos++;
    }
  }

  function lineBreakLength(at: number): number {
    const ch = source.charCodeAt(at);
    if (ch === CharacterCodes.carriageReturn) {
      return at + 1 < end && source.charCodeAt(at + 1) === CharacterCodes.lineFeed ? 2 : 1;
    }
    return ch === CharacterCodes.lineFeed ? 1 : 0;
  }

  function emitToken(kind: SyntaxKind, start: number, endPos: number, text: string, flags: TokenFlags = TokenFlags.None): void {
    token = kind;
    tokenText = text;
    tokenPos = start;

    let contextFlags = TokenFlags.None;
    if (!lineHasContent) contextFlags |= TokenFlags.IsAtLineStart;
    if (precedingLineBreak) contextFlags |= TokenFlags.PrecedingLineBreak;
    tokenFlags = flags | contextFlags;

    updatePosition(endPos);
    offsetNext = pos;

    if (kind === SyntaxKind.NewLine) {
      lineHasContent = false;
      precedingLineBreak = true;
    } else {
      precedingLineBreak = false;
      if (kind !== SyntaxKind.Text || !isWhiteSpaceOnly(text)) {
        lineHasContent = true;
      }
    }
  }

  function emitNewline(start: number): void {
    const flags = lineHasContent ? TokenFlags.None : TokenFlags.IsBlankLine;
    const length = lineBreakLength(start);
    emitToken(SyntaxKind.NewLine, start, start + length, source.slice(start, start + length), flags);
  }

  function isTextRunTerminator(ch: number): boolean {
    switch (ch) {
      case CharacterCodes.backslash:
      case CharacterCodes.percent:
      case CharacterCodes.dollar:
      case CharacterCodes.openBrace:
      case CharacterCodes.closeBrace:
      case CharacterCodes.openBracket:
      case CharacterCodes.closeBracket:
      case CharacterCodes.ampersand:
      case CharacterCodes.tilde:
      case CharacterCodes.lineFeed:
      case CharacterCodes.carriageReturn:
        return true;
      default:
        return false;
    }
  }

  function emitTextRun(start: number): void {
    let p = start + 1;
    while (p < end && !isTextRunTerminator(source.charCodeAt(p))) p++;
    emitToken(SyntaxKind.Text, start, p, source.slice(start, p));
  }

  /**
   * Scans `%...` to the end of the line. Returns false when the comment was
   * dropped, in which case the caller keeps scanning.
   */
  function scanComment(start: number): boolean {
    let p = start + 1;
    while (p < end && !isLineBreak(source.charCodeAt(p))) p++;

    if (preserveComments) {
      emitToken(SyntaxKind.Comment, start, p, source.slice(start + 1, p));
      return true;
    }

    // A dropped comment also consumes its line break, as TeX does.
    const length = p < end ? lineBreakLength(p) : 0;
    updatePosition(p + length);
    offsetNext = pos;
    if (length > 0) {
      lineHasContent = false;
      precedingLineBreak = true;
    }
    return false;
  }

  function scanDollar(start: number): void {
    if (start + 1 < end && source.charCodeAt(start + 1) === CharacterCodes.dollar) {
      emitToken(SyntaxKind.MathDisplayDelimiter, start, start + 2, '$$');
    } else {
      emitToken(SyntaxKind.MathInlineDelimiter, start, start + 1, '$');
    }
  }

  /**
   * Matches `{name}` (optionally preceded by spaces) right after \begin or \end.
   */
  function matchEnvironmentName(afterCommand: number): { name: string, next: number } | undefined {
    let p = afterCommand;
    while (p < end && isWhiteSpaceSingleLine(source.charCodeAt(p))) p++;
    if (p >= end || source.charCodeAt(p) !== CharacterCodes.openBrace) return undefined;

    const nameStart = p + 1;
    let q = nameStart;
    while (q < end) {
      const ch = source.charCodeAt(q);
      if (ch === CharacterCodes.closeBrace) break;
      if (!isLetter(ch) && ch !== CharacterCodes.asterisk) return undefined;
      q++;
    }
    if (q >= end || q === nameStart) return undefined;
    return { name: source.slice(nameStart, q), next: q + 1 };
  }

  function scanCommand(start: number): void {
    let p = start + 1;
    while (p < end && isLetter(source.charCodeAt(p))) p++;
    if (p < end && source.charCodeAt(p) === CharacterCodes.asterisk) p++;
    const name = source.slice(start + 1, p);

    if (name === 'begin' || name === 'end') {
      const environment = matchEnvironmentName(p);
      if (environment) {
        const kind = name === 'begin' ? SyntaxKind.EnvBegin : SyntaxKind.EnvEnd;
        emitToken(kind, start, environment.next, environment.name);
        if (kind === SyntaxKind.EnvBegin && RAW_ENVIRONMENTS.has(environment.name)) {
          contentMode = ContentMode.RawText;
          rawEnvironmentName = environment.name;
        }
        return;
      }
    }

    emitToken(SyntaxKind.Command, start, p, name);

    if (name === 'verb' || name === 'verb*') {
      const delimiter = p < end ? source.charCodeAt(p) : CharacterCodes.nullCharacter;
      if (p < end && !isLetter(delimiter) && !isWhiteSpaceSingleLine(delimiter) && !isLineBreak(delimiter)) {
        contentMode = ContentMode.InlineVerbatim;
        verbatimDelimiter = delimiter;
      }
    }
  }

  function scanBackslash(start: number): void {
    if (start + 1 >= end) {
      emitToken(SyntaxKind.Text, start, start + 1, '\\', TokenFlags.Malformed);
      return;
    }

    const next = source.charCodeAt(start + 1);
    if (isLetter(next)) {
      scanCommand(start);
      return;
    }

    switch (next) {
      case CharacterCodes.backslash:
        emitToken(SyntaxKind.LineBreak, start, start + 2, '\\\\');
        return;
      case CharacterCodes.openParen:
        emitToken(SyntaxKind.MathInlineDelimiter, start, start + 2, '\\(');
        return;
      case CharacterCodes.closeParen:
        emitToken(SyntaxKind.MathInlineDelimiter, start, start + 2, '\\)');
        return;
      case CharacterCodes.openBracket:
        emitToken(SyntaxKind.MathDisplayDelimiter, start, start + 2, '\\[');
        return;
      case CharacterCodes.closeBracket:
        emitToken(SyntaxKind.MathDisplayDelimiter, start, start + 2, '\\]');
        return;
      case CharacterCodes.space:
      case CharacterCodes.tab:
        emitToken(SyntaxKind.Text, start, start + 2, ' ', TokenFlags.Escaped);
        return;
    }

    if (isEscapableSpecial(next)) {
      emitToken(SyntaxKind.Text, start, start + 2, source.charAt(start + 1), TokenFlags.Escaped);
      return;
    }

    // Escape that names nothing: keep the spelling, never swallow a line break
    const length = isLineBreak(next) ? 1 : 2;
    emitToken(SyntaxKind.Text, start, start + length, source.slice(start, start + length), TokenFlags.Malformed);
  }

  function scanRawEnvironmentBody(start: number): void {
    contentMode = ContentMode.Normal;
    const pattern = new RegExp('\\\\end[ \\t]*\\{' + escapeRegExp(rawEnvironmentName) + '\\}', 'g');
    pattern.lastIndex = start;
    const match = pattern.exec(source);
    const bodyEnd = match ? match.index : end;
    if (bodyEnd === start) {
      // Empty body: nothing to emit, continue with the end marker
      scanNormal(start);
      return;
    }
    emitToken(SyntaxKind.RawText, start, bodyEnd, source.slice(start, bodyEnd), match ? TokenFlags.None : TokenFlags.Unterminated);
  }

  function scanInlineVerbatim(start: number): void {
    contentMode = ContentMode.Normal;
    let p = start + 1;
    while (p < end && source.charCodeAt(p) !== verbatimDelimiter && !isLineBreak(source.charCodeAt(p))) p++;
    if (p < end && source.charCodeAt(p) === verbatimDelimiter) {
      emitToken(SyntaxKind.RawText, start, p + 1, source.slice(start + 1, p));
    } else {
      emitToken(SyntaxKind.RawText, start, p, source.slice(start + 1, p), TokenFlags.Unterminated);
    }
  }

  function scanNormal(start: number): void {
    let p = start;
    while (p < end) {
      const ch = source.charCodeAt(p);
      switch (ch) {
        case CharacterCodes.lineFeed:
        case CharacterCodes.carriageReturn:
          emitNewline(p);
          return;
        case CharacterCodes.backslash:
          scanBackslash(p);
          return;
        case CharacterCodes.percent:
          if (scanComment(p)) return;
          p = pos;
          continue;
        case CharacterCodes.dollar:
          scanDollar(p);
          return;
        case CharacterCodes.openBrace:
          emitToken(SyntaxKind.GroupOpen, p, p + 1, '{');
          return;
        case CharacterCodes.closeBrace:
          emitToken(SyntaxKind.GroupClose, p, p + 1, '}');
          return;
        case CharacterCodes.openBracket:
          emitToken(SyntaxKind.BracketOpen, p, p + 1, '[');
          return;
        case CharacterCodes.closeBracket:
          emitToken(SyntaxKind.BracketClose, p, p + 1, ']');
          return;
        case CharacterCodes.ampersand:
          emitToken(SyntaxKind.AlignmentTab, p, p + 1, '&');
          return;
        case CharacterCodes.tilde:
          // A tie is an unbreakable space
          emitToken(SyntaxKind.Text, p, p + 1, ' ');
          return;
        default:
          emitTextRun(p);
          return;
      }
    }

    emitToken(SyntaxKind.EndOfFileToken, end, end, '');
  }

  function scanImpl(): void {
    if (pos >= end) {
      emitToken(SyntaxKind.EndOfFileToken, end, end, '');
      return;
    }

    switch (contentMode) {
      case ContentMode.RawText:
        scanRawEnvironmentBody(pos);
        return;
      case ContentMode.InlineVerbatim:
        scanInlineVerbatim(pos);
        return;
      default:
        scanNormal(pos);
    }
  }

  /**
   * Public interface implementation
   */

  function setText(text: string, options?: ScanOptions): void {
    source = text;
    end = text.length;
    preserveComments = !!options?.preserveComments;
    rollback(0);
  }

  function scan(): void {
    scanImpl();
  }

  function rollback(position: number): void {
    if (position < 0 || position > source.length) {
      throw new RangeError(`Invalid rollback position: ${position}`);
    }

    pos = 0;
    line = 1;
    column = 1;
    lastLineStart = 0;
    updatePosition(position);

    contentMode = ContentMode.Normal;
    rawEnvironmentName = '';
    verbatimDelimiter = 0;
    lineHasContent = !isWhiteSpaceOnly(source.slice(lastLineStart, pos));
    precedingLineBreak = position > 0 && lastLineStart === pos;

    token = SyntaxKind.Unknown;
    tokenText = '';
    tokenFlags = TokenFlags.None;
    tokenPos = position;
    offsetNext = position;
  }

  function fillDebugState(state: ScannerDebugState): void {
    state.pos = pos;
    state.line = line;
    state.column = column;
    state.mode = contentMode === ContentMode.Normal ? 'Normal' :
      contentMode === ContentMode.RawText ? 'RawText' : 'InlineVerbatim';

    state.atLineStart = !lineHasContent;
    state.precedingLineBreak = precedingLineBreak;

    state.currentToken = token;
    state.currentTokenText = tokenText;
    state.currentTokenFlags = tokenFlags;
    state.nextOffset = offsetNext;
  }

  const scanner: Scanner = {
    scan,
    rollback,
    fillDebugState,
    initText: setText,

    get token() { return token; },
    get tokenText() { return tokenText; },
    get tokenFlags() { return tokenFlags; },
    get tokenPos() { return tokenPos; },
    get offsetNext() { return offsetNext; }
  };

  return scanner;
}

/**
 * Lazy token sequence over the source. Every iteration restarts from the
 * beginning with a fresh scanner, so the sequence can be consumed repeatedly.
 * The final token is always EndOfFileToken.
 */
export function scanTokens(text: string, options?: ScanOptions): Iterable<Token> {
  return {
    *[Symbol.iterator]() {
      const scanner = createScanner();
      scanner.initText(text, options);
      while (true) {
        scanner.scan();
        yield {
          kind: scanner.token,
          flags: scanner.tokenFlags,
          pos: scanner.tokenPos,
          end: scanner.offsetNext,
          text: scanner.tokenText
        };
        if (scanner.token === SyntaxKind.EndOfFileToken) return;
      }
    }
  };
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
