/**
 * Character code constants and classification functions
 * Following TypeScript's character code pattern for consistent character handling
 */

export const enum CharacterCodes {
  nullCharacter = 0,
  maxAsciiCharacter = 0x7F,

  lineFeed = 0x0A,              // \n
  carriageReturn = 0x0D,        // \r

  // Control characters
  tab = 0x09,
  verticalTab = 0x0B,
  formFeed = 0x0C,

  // ASCII printable characters
  space = 0x20,
  hash = 0x23,                  // #
  dollar = 0x24,                // $
  percent = 0x25,               // %
  ampersand = 0x26,             // &
  openParen = 0x28,             // (
  closeParen = 0x29,            // )
  asterisk = 0x2A,              // *

  _0 = 0x30,                    // 0
  _9 = 0x39,                    // 9

  A = 0x41,
  Z = 0x5A,

  openBracket = 0x5B,           // [
  backslash = 0x5C,             // \
  closeBracket = 0x5D,          // ]
  underscore = 0x5F,            // _
  backtick = 0x60,              // `

  a = 0x61,
  z = 0x7A,

  openBrace = 0x7B,             // {
  bar = 0x7C,                   // |
  closeBrace = 0x7D,            // }
  tilde = 0x7E,                 // ~

  nonBreakingSpace = 0x00A0,
}

/**
 * Check if character is a line break
 */
export function isLineBreak(ch: number): boolean {
  return ch === CharacterCodes.lineFeed ||
         ch === CharacterCodes.carriageReturn;
}

/**
 * Check if character is whitespace (excluding line breaks)
 */
export function isWhiteSpaceSingleLine(ch: number): boolean {
  return ch === CharacterCodes.space ||
         ch === CharacterCodes.tab ||
         ch === CharacterCodes.verticalTab ||
         ch === CharacterCodes.formFeed ||
         ch === CharacterCodes.nonBreakingSpace;
}

/**
 * Check if character is any whitespace (including line breaks)
 */
export function isWhiteSpace(ch: number): boolean {
  return isWhiteSpaceSingleLine(ch) || isLineBreak(ch);
}

/**
 * Check if character is an ASCII letter. Command names are maximal runs of these.
 */
export function isLetter(ch: number): boolean {
  return (ch >= CharacterCodes.A && ch <= CharacterCodes.Z) ||
         (ch >= CharacterCodes.a && ch <= CharacterCodes.z);
}

/**
 * Characters whose escaped form (`\&`, `\%`, ...) stands for the bare character
 */
export function isEscapableSpecial(ch: number): boolean {
  return ch === CharacterCodes.hash ||
         ch === CharacterCodes.dollar ||
         ch === CharacterCodes.percent ||
         ch === CharacterCodes.ampersand ||
         ch === CharacterCodes.underscore ||
         ch === CharacterCodes.openBrace ||
         ch === CharacterCodes.closeBrace;
}

/**
 * Check if the text consists of whitespace only (empty string included)
 */
export function isWhiteSpaceOnly(text: string): boolean {
  for (let i = 0; i < text.length; i++) {
    if (!isWhiteSpace(text.charCodeAt(i))) return false;
  }
  return true;
}
