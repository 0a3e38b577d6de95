import { CharacterCodes } from './character-codes.js';
import type { InputCursor } from './input-cursor.js';
import type { InlineResolver } from './resolver.js';
import { MAX_COUNTER, type ScannerState } from './scanner-state.js';
import { InlineTokenKind, type ValidTokens } from './token-types.js';

/**
 * Shortcode delimiters: `{{<` / `>}}` and the escaped `{{{<` / `>}}}`.
 *
 * Only the nesting depth is tracked, not which variant opened. While the
 * depth is non-zero the quote resolvers stand down.
 */
function scanShortcodeOpen(cursor: InputCursor, valid: ValidTokens, state: ScannerState): InlineTokenKind | undefined {
  if (state.shortcodeDepth >= MAX_COUNTER) return undefined;

  cursor.advance();
  if (cursor.lookahead !== CharacterCodes.openBrace) return undefined;
  cursor.advance();

  if (cursor.lookahead === CharacterCodes.lessThan && valid.has(InlineTokenKind.ShortcodeOpen)) {
    cursor.advance();
    cursor.markEnd();
    state.shortcodeDepth++;
    return InlineTokenKind.ShortcodeOpen;
  }

  if (cursor.lookahead === CharacterCodes.openBrace) {
    cursor.advance();
    if (cursor.lookahead === CharacterCodes.lessThan && valid.has(InlineTokenKind.ShortcodeOpenEscaped)) {
      cursor.advance();
      cursor.markEnd();
      state.shortcodeDepth++;
      return InlineTokenKind.ShortcodeOpenEscaped;
    }
  }

  return undefined;
}

/**
 * The closer is reached either at its `>` or, when the grammar has already
 * taken the `>`, at the first `}`.
 */
function scanShortcodeClose(cursor: InputCursor, valid: ValidTokens, state: ScannerState): InlineTokenKind | undefined {
  if (state.shortcodeDepth === 0) return undefined;

  if (cursor.lookahead === CharacterCodes.greaterThan) cursor.advance();
  if (cursor.lookahead !== CharacterCodes.closeBrace) return undefined;
  cursor.advance();
  if (cursor.lookahead !== CharacterCodes.closeBrace) return undefined;
  cursor.advance();

  if (cursor.lookahead === CharacterCodes.closeBrace && valid.has(InlineTokenKind.ShortcodeCloseEscaped)) {
    cursor.advance();
    cursor.markEnd();
    state.shortcodeDepth--;
    return InlineTokenKind.ShortcodeCloseEscaped;
  }

  if (valid.has(InlineTokenKind.ShortcodeClose)) {
    cursor.markEnd();
    state.shortcodeDepth--;
    return InlineTokenKind.ShortcodeClose;
  }

  return undefined;
}

export const shortcodeOpenResolver: InlineResolver = {
  triggers: [CharacterCodes.openBrace],
  attempt: scanShortcodeOpen
};

export const shortcodeCloseResolver: InlineResolver = {
  triggers: [CharacterCodes.greaterThan, CharacterCodes.closeBrace],
  attempt: scanShortcodeClose
};
