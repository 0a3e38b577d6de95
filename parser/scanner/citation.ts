import { CharacterCodes } from './character-codes.js';
import type { InputCursor } from './input-cursor.js';
import type { InlineResolver } from './resolver.js';
import { InlineTokenKind, type ValidTokens } from './token-types.js';

/**
 * Finish a citation marker once its `@` is under the read head. The citation
 * key itself is left to the grammar.
 */
function scanCitationMarker(cursor: InputCursor, valid: ValidTokens, bracketed: InlineTokenKind, plain: InlineTokenKind): InlineTokenKind | undefined {
  cursor.advance();
  if (cursor.lookahead === CharacterCodes.openBrace && valid.has(bracketed)) {
    cursor.advance();
    cursor.markEnd();
    return bracketed;
  }
  if (valid.has(plain)) {
    cursor.markEnd();
    return plain;
  }
  return undefined;
}

export const authorInTextCitationResolver: InlineResolver = {
  triggers: [CharacterCodes.at],
  attempt: (cursor, valid) => scanCitationMarker(
    cursor, valid,
    InlineTokenKind.CitationAuthorBracketed,
    InlineTokenKind.CitationAuthor)
};

export const suppressAuthorCitationResolver: InlineResolver = {
  triggers: [CharacterCodes.minus],
  attempt: (cursor, valid) => {
    cursor.advance();
    if (cursor.lookahead !== CharacterCodes.at) return undefined;
    return scanCitationMarker(
      cursor, valid,
      InlineTokenKind.CitationSuppressAuthorBracketed,
      InlineTokenKind.CitationSuppressAuthor);
  }
};
