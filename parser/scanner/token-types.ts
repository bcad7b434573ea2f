/**
 * Token types for the LaTeX scanner
 *
 * The scanner resolves every structural construct the parser cares about into
 * its own token kind, so the parser never needs to re-lex text.
 */

/**
 * Token kinds emitted by the scanner
 */
export enum SyntaxKind {
  Unknown,
  EndOfFileToken,

  // Text and whitespace
  Text,                     // Literal text run (may contain spaces, never a line break)
  NewLine,                  // Line break (LF, CRLF, CR)
  RawText,                  // Verbatim content, no inner structure

  // Commands and environments
  Command,                  // \name or \name* (tokenText is the name without the backslash)
  EnvBegin,                 // \begin{name} (tokenText is the environment name)
  EnvEnd,                   // \end{name}

  // Math mode delimiters
  MathInlineDelimiter,      // $  \(  \)
  MathDisplayDelimiter,     // $$ \[  \]

  // Grouping
  GroupOpen,                // {
  GroupClose,               // }
  BracketOpen,              // [
  BracketClose,             // ]

  // Tabular structure
  AlignmentTab,             // &
  LineBreak,                // \\

  Comment,                  // % to end of line (tokenText excludes the %)
}

/**
 * Token flags
 */
export const enum TokenFlags {
  None = 0,

  // Line and position context
  PrecedingLineBreak = 1 << 0,   // Token follows a line break
  IsAtLineStart = 1 << 1,        // Only whitespace precedes the token on its line
  IsBlankLine = 1 << 2,          // NewLine token ends a line without content

  // Escapes
  Escaped = 1 << 3,              // Text produced from an escaped special character (\&, \%, ...)
  Malformed = 1 << 4,            // Text produced from an escape that names nothing

  Unterminated = 1 << 5,         // Raw text or environment marker missing its closing delimiter
}

/**
 * Human-readable token kind name, used by debug output and test dumps
 */
export function syntaxKindToString(kind: SyntaxKind): string {
  return SyntaxKind[kind] ?? 'SyntaxKind:' + kind;
}
