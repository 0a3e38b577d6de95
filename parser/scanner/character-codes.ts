/**
 * Codes of the inline delimiter characters and the few others the scanner
 * classifies context by.
 */

export const enum CharacterCodes {
  /** Reported as the lookahead once the input is exhausted. */
  nullCharacter = 0,

  lineFeed = 0x0A,              // \n
  carriageReturn = 0x0D,        // \r
  tab = 0x09,

  space = 0x20,
  exclamation = 0x21,           // !
  doubleQuote = 0x22,           // "
  dollar = 0x24,                // $
  singleQuote = 0x27,           // '
  asterisk = 0x2A,              // *
  minus = 0x2D,                 // -
  slash = 0x2F,                 // /

  colon = 0x3A,                 // :
  lessThan = 0x3C,              // <
  greaterThan = 0x3E,           // >
  at = 0x40,                    // @

  openBracket = 0x5B,           // [
  backslash = 0x5C,             // \
  caret = 0x5E,                 // ^
  underscore = 0x5F,            // _
  backtick = 0x60,              // `

  openBrace = 0x7B,             // {
  closeBrace = 0x7D,            // }
  tilde = 0x7E,                 // ~
}

/**
 * Check if character is a line break (LF or CR)
 */
export function isLineBreak(ch: number): boolean {
  return ch === CharacterCodes.lineFeed ||
         ch === CharacterCodes.carriageReturn;
}

/**
 * ASCII punctuation as markdown defines it: ! through /, : through @,
 * [ through `, { through ~
 */
export function isPunctuation(ch: number): boolean {
  return (ch >= CharacterCodes.exclamation && ch <= CharacterCodes.slash) ||
         (ch >= CharacterCodes.colon && ch <= CharacterCodes.at) ||
         (ch >= CharacterCodes.openBracket && ch <= CharacterCodes.backtick) ||
         (ch >= CharacterCodes.openBrace && ch <= CharacterCodes.tilde);
}

/**
 * Space, tab or line break
 */
export function isWhiteSpace(ch: number): boolean {
  return ch === CharacterCodes.space ||
         ch === CharacterCodes.tab ||
         isLineBreak(ch);
}
