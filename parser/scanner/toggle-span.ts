import { CharacterCodes, isWhiteSpace } from './character-codes.js';
import type { InputCursor } from './input-cursor.js';
import type { InlineResolver } from './resolver.js';
import { getLexicalMode, LexicalMode, type ScannerState } from './scanner-state.js';
import { InlineTokenKind, type ValidTokens } from './token-types.js';

type ToggleField = 'superscriptOpen' | 'subscriptOpen' | 'strikeoutOpen' | 'singleQuoteOpen' | 'doubleQuoteOpen';

/** Spans that do not nest: inside or not. */
interface ToggleSpan {
  field: ToggleField;
  open: InlineTokenKind;
  close: InlineTokenKind;
}

const strikeout: ToggleSpan = { field: 'strikeoutOpen', open: InlineTokenKind.StrikeoutOpen, close: InlineTokenKind.StrikeoutClose };
const subscript: ToggleSpan = { field: 'subscriptOpen', open: InlineTokenKind.SubscriptOpen, close: InlineTokenKind.SubscriptClose };
const superscript: ToggleSpan = { field: 'superscriptOpen', open: InlineTokenKind.SuperscriptOpen, close: InlineTokenKind.SuperscriptClose };
const singleQuote: ToggleSpan = { field: 'singleQuoteOpen', open: InlineTokenKind.SingleQuoteOpen, close: InlineTokenKind.SingleQuoteClose };
const doubleQuote: ToggleSpan = { field: 'doubleQuoteOpen', open: InlineTokenKind.DoubleQuoteOpen, close: InlineTokenKind.DoubleQuoteClose };

/**
 * Decide open or close once the marker has been consumed. A close is taken
 * whenever the grammar expects one, whether or not the flag was tracked.
 */
function toggle(span: ToggleSpan, valid: ValidTokens, state: ScannerState, canOpen: boolean = true): InlineTokenKind | undefined {
  if (valid.has(span.close)) {
    state[span.field] = false;
    return span.close;
  }

  if (canOpen && !state[span.field] && valid.has(span.open)) {
    state[span.field] = true;
    return span.open;
  }

  return undefined;
}

function scanTilde(cursor: InputCursor, valid: ValidTokens, state: ScannerState): InlineTokenKind | undefined {
  cursor.advance();
  if (cursor.lookahead === CharacterCodes.tilde) {
    cursor.advance();
    return toggle(strikeout, valid, state);
  }
  return toggle(subscript, valid, state);
}

function scanCaret(cursor: InputCursor, valid: ValidTokens, state: ScannerState): InlineTokenKind | undefined {
  cursor.advance();
  cursor.markEnd();
  // ^[ starts an inline footnote, which the grammar lexes itself
  if (cursor.lookahead === CharacterCodes.openBracket) return undefined;
  return toggle(superscript, valid, state);
}

function scanQuote(span: ToggleSpan, cursor: InputCursor, valid: ValidTokens, state: ScannerState): InlineTokenKind | undefined {
  // Inside shortcode arguments quotes delimit string literals
  if (getLexicalMode(state) !== LexicalMode.Normal) return undefined;
  if (!valid.has(InlineTokenKind.LastTokenWhitespace) && !state[span.field]) return undefined;

  cursor.advance();
  cursor.markEnd();

  // A single quote followed by whitespace is an apostrophe, not an opener
  const canOpen = span !== singleQuote || !(cursor.isEof() || isWhiteSpace(cursor.lookahead));
  return toggle(span, valid, state, canOpen);
}

export const tildeResolver: InlineResolver = {
  triggers: [CharacterCodes.tilde],
  attempt: scanTilde
};

export const caretResolver: InlineResolver = {
  triggers: [CharacterCodes.caret],
  attempt: scanCaret
};

export const singleQuoteResolver: InlineResolver = {
  triggers: [CharacterCodes.singleQuote],
  attempt: (cursor, valid, state) => scanQuote(singleQuote, cursor, valid, state)
};

export const doubleQuoteResolver: InlineResolver = {
  triggers: [CharacterCodes.doubleQuote],
  attempt: (cursor, valid, state) => scanQuote(doubleQuote, cursor, valid, state)
};
