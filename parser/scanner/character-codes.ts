/**
 * Character code constants and classification functions
 * Following TypeScript's character code pattern for consistent character handling
 */

export const enum CharacterCodes {
  lineFeed = 0x0A,              // \n
  carriageReturn = 0x0D,        // \r

  tab = 0x09,
  verticalTab = 0x0B,
  formFeed = 0x0C,
  space = 0x20,

  comma = 0x2C,                 // ,
  equals = 0x3D,                // =
  backslash = 0x5C,             // \
  openBrace = 0x7B,             // {
  closeBrace = 0x7D,            // }

  nonBreakingSpace = 0x00A0,
  ogham = 0x1680,
  enQuad = 0x2000,
  hairSpace = 0x200A,
  lineSeparator = 0x2028,
  paragraphSeparator = 0x2029,
  narrowNoBreakSpace = 0x202F,
  mathematicalSpace = 0x205F,
  ideographicSpace = 0x3000,
}

/** Characters with a structural meaning to the text scanner. */
export const Chars = {
  BACKSLASH: '\\',
  PERCENT: '%',
  OPEN_BRACE: '{',
  CLOSE_BRACE: '}',
  OPEN_BRACKET: '[',
  CLOSE_BRACKET: ']',
  ASTERISK: '*',
} as const;

/**
 * Check if character is whitespace. Lines reach the scanner without their
 * line terminators, but separators inside a line still count.
 */
export function isWhiteSpace(ch: number): boolean {
  return ch === CharacterCodes.space ||
         ch === CharacterCodes.tab ||
         ch === CharacterCodes.verticalTab ||
         ch === CharacterCodes.formFeed ||
         ch === CharacterCodes.carriageReturn ||
         ch === CharacterCodes.lineFeed ||
         ch === CharacterCodes.nonBreakingSpace ||
         ch === CharacterCodes.ogham ||
         ch === CharacterCodes.narrowNoBreakSpace ||
         ch === CharacterCodes.mathematicalSpace ||
         ch === CharacterCodes.ideographicSpace ||
         ch === CharacterCodes.lineSeparator ||
         ch === CharacterCodes.paragraphSeparator ||
         (ch >= CharacterCodes.enQuad && ch <= CharacterCodes.hairSpace);
}

const commandLetter = /^[\p{L}\p{Mn}\p{Mc}]$/u;

/**
 * Check if a code point may be part of a command name: any letter, or a
 * nonspacing/spacing-combining mark.
 *
 * Known limitation: the test is per code point, so grapheme clusters such as
 * regional-indicator flags or ZWJ emoji sequences are not treated as one
 * character.
 */
export function isCommandLetter(ch: string): boolean {
  return commandLetter.test(ch);
}
