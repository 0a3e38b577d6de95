import { CharacterCodes } from './character-codes.js';
import type { InputCursor } from './input-cursor.js';
import type { InlineResolver } from './resolver.js';
import { MAX_COUNTER, type ScannerState } from './scanner-state.js';
import { InlineTokenKind, type ValidTokens } from './token-types.js';

/**
 * Symmetric, length-sensitive delimiters: a run of N backticks (or dollars)
 * only closes on another run of exactly N.
 */
interface LeafSpan {
  delimiter: number;
  open: InlineTokenKind;
  close: InlineTokenKind;
  getRunLength(state: ScannerState): number;
  setRunLength(state: ScannerState, length: number): void;
}

function scanLeafDelimiter(span: LeafSpan, cursor: InputCursor, valid: ValidTokens, state: ScannerState): InlineTokenKind | undefined {
  let level = 0;
  while (cursor.lookahead === span.delimiter) {
    cursor.advance();
    level++;
  }
  cursor.markEnd();

  if (level === span.getRunLength(state) && valid.has(span.close)) {
    span.setRunLength(state, 0);
    return span.close;
  }

  if (!valid.has(span.open)) return undefined;

  // Read ahead for a closing run of the same length; the commit point stays
  // after the opener.
  let closeLevel = 0;
  while (!cursor.isEof()) {
    if (cursor.lookahead === span.delimiter) {
      closeLevel++;
    } else {
      if (closeLevel === level) break;
      closeLevel = 0;
    }
    cursor.advance();
  }

  if (closeLevel === level && level <= MAX_COUNTER) {
    span.setRunLength(state, level);
    return span.open;
  }

  if (valid.has(InlineTokenKind.UnclosedSpan)) return InlineTokenKind.UnclosedSpan;

  return undefined;
}

function createLeafSpanResolver(span: LeafSpan): InlineResolver {
  return {
    triggers: [span.delimiter],
    attempt: (cursor, valid, state) => scanLeafDelimiter(span, cursor, valid, state)
  };
}

export const codeSpanResolver = createLeafSpanResolver({
  delimiter: CharacterCodes.backtick,
  open: InlineTokenKind.CodeSpanOpen,
  close: InlineTokenKind.CodeSpanClose,
  getRunLength: state => state.codeSpanRunLength,
  setRunLength: (state, length) => { state.codeSpanRunLength = length; }
});

export const mathSpanResolver = createLeafSpanResolver({
  delimiter: CharacterCodes.dollar,
  open: InlineTokenKind.MathSpanOpen,
  close: InlineTokenKind.MathSpanClose,
  getRunLength: state => state.mathSpanRunLength,
  setRunLength: (state, length) => { state.mathSpanRunLength = length; }
});
