/**
 * Parser Utilities
 * Token cursor and helper predicates for common parsing operations
 */

import { isWhiteSpaceOnly } from './scanner/character-codes.js';
import { Token } from './scanner/scanner.js';
import { SyntaxKind, TokenFlags } from './scanner/token-types.js';
import { SourcePosition } from './parser-interfaces.js';

/**
 * Pulls tokens lazily from a token sequence and buffers them so the parser
 * can look ahead without re-scanning.
 */
export class TokenCursor {
  private readonly buffer: Token[] = [];
  private readonly iterator: Iterator<Token>;
  private exhausted = false;

  /** Index of the current token in the stream */
  index = 0;

  constructor(tokens: Iterable<Token>) {
    this.iterator = tokens[Symbol.iterator]();
  }

  /** Current token (EndOfFileToken once the stream is drained) */
  get current(): Token {
    return this.peek(0);
  }

  /** Token `offset` positions ahead of the current one */
  peek(offset = 1): Token {
    const target = this.index + offset;
    while (this.buffer.length <= target && !this.exhausted) {
      const next = this.iterator.next();
      if (next.done) {
        this.exhausted = true;
      } else {
        this.buffer.push(next.value);
      }
    }
    return this.buffer[Math.min(target, this.buffer.length - 1)] ?? END_OF_FILE;
  }

  /** Consume the current token and return it */
  advance(): Token {
    const token = this.current;
    if (token.kind !== SyntaxKind.EndOfFileToken) this.index++;
    return token;
  }

  /** End offset of the most recently consumed token */
  get lastEnd(): number {
    return this.index > 0 ? this.buffer[this.index - 1].end : 0;
  }
}

const END_OF_FILE: Token = Object.freeze({
  kind: SyntaxKind.EndOfFileToken,
  flags: TokenFlags.None,
  pos: 0,
  end: 0,
  text: ''
});

/**
 * Checks if the token is a line break that ends a line with no content
 */
export function isBlankLine(token: Token): boolean {
  return token.kind === SyntaxKind.NewLine && (token.flags & TokenFlags.IsBlankLine) !== 0;
}

/**
 * Checks if the token is a text run of whitespace only
 */
export function isWhitespaceText(token: Token): boolean {
  return token.kind === SyntaxKind.Text && isWhiteSpaceOnly(token.text);
}

/**
 * Checks if the token is a command with the given name
 */
export function isCommand(token: Token, name: string): boolean {
  return token.kind === SyntaxKind.Command && token.text === name;
}

/**
 * Skips whitespace text and any line breaks, blank ones included
 */
export function skipWhitespace(cursor: TokenCursor): void {
  while (isWhitespaceText(cursor.current) || cursor.current.kind === SyntaxKind.NewLine) {
    cursor.advance();
  }
}

/**
 * Compute line starts for position mapping
 */
export function computeLineStarts(text: string): number[] {
  const lineStarts = [0];

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (ch === '\n' || (ch === '\r' && text[i + 1] !== '\n')) {
      lineStarts.push(i + 1);
    }
  }

  return lineStarts;
}

/**
 * Convert an offset to a 1-based line/column position
 */
export function offsetToPosition(lineStarts: readonly number[], offset: number): SourcePosition {
  let low = 0;
  let high = lineStarts.length - 1;
  while (low < high) {
    const mid = (low + high + 1) >> 1;
    if (lineStarts[mid] <= offset) {
      low = mid;
    } else {
      high = mid - 1;
    }
  }
  return { line: low + 1, column: offset - lineStarts[low] + 1 };
}
