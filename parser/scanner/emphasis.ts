import { CharacterCodes, isPunctuation, isWhiteSpace } from './character-codes.js';
import type { InputCursor } from './input-cursor.js';
import type { InlineResolver } from './resolver.js';
import { MAX_COUNTER, ScannerFlags, type ScannerState } from './scanner-state.js';
import { InlineTokenKind, type ValidTokens } from './token-types.js';

interface EmphasisDelimiter {
  delimiter: number;
  open: InlineTokenKind;
  close: InlineTokenKind;
}

/**
 * Emphasis delimiter runs, one delimiter per call.
 *
 * The first delimiter of a run is classified with the CommonMark flanking
 * rules: left context comes from the LastTokenWhitespace/LastTokenPunctuation
 * flags in the valid set, right context from the character after the run.
 * The rest of the run repeats that decision without looking at context again,
 * so the grammar can nest `***` into emphasis and strong emphasis.
 */
function scanEmphasis(emphasis: EmphasisDelimiter, cursor: InputCursor, valid: ValidTokens, state: ScannerState): InlineTokenKind | undefined {
  cursor.advance();

  if (state.emphasisRemaining > 0) {
    const continued = state.flags & ScannerFlags.EmphasisOpening ? emphasis.open : emphasis.close;
    if (valid.has(continued)) {
      state.emphasisRemaining--;
      return continued;
    }
    // The grammar left the run behind: classify afresh
    state.emphasisRemaining = 0;
  }

  // Each token is a single delimiter; the rest of the run is lookahead
  cursor.markEnd();
  let runLength = 1;
  while (cursor.lookahead === emphasis.delimiter) {
    runLength++;
    cursor.advance();
  }

  const canOpen = valid.has(emphasis.open);
  const canClose = valid.has(emphasis.close);
  if (!canOpen && !canClose) return undefined;

  const nextIsWhitespace = cursor.isEof() || isWhiteSpace(cursor.lookahead);
  const nextIsPunctuation = isPunctuation(cursor.lookahead);
  const lastIsWhitespace = valid.has(InlineTokenKind.LastTokenWhitespace);
  const lastIsPunctuation = valid.has(InlineTokenKind.LastTokenPunctuation);
  const remaining = Math.min(runLength - 1, MAX_COUNTER);

  // Closing takes precedence
  if (canClose && !lastIsWhitespace &&
    (!lastIsPunctuation || nextIsPunctuation || nextIsWhitespace)) {
    state.flags &= ~ScannerFlags.EmphasisOpening;
    state.emphasisRemaining = remaining;
    return emphasis.close;
  }

  if (canOpen && !nextIsWhitespace &&
    (!nextIsPunctuation || lastIsPunctuation || lastIsWhitespace)) {
    state.flags |= ScannerFlags.EmphasisOpening;
    state.emphasisRemaining = remaining;
    return emphasis.open;
  }

  return undefined;
}

function createEmphasisResolver(emphasis: EmphasisDelimiter): InlineResolver {
  return {
    triggers: [emphasis.delimiter],
    attempt: (cursor, valid, state) => scanEmphasis(emphasis, cursor, valid, state)
  };
}

export const starResolver = createEmphasisResolver({
  delimiter: CharacterCodes.asterisk,
  open: InlineTokenKind.EmphasisOpenStar,
  close: InlineTokenKind.EmphasisCloseStar
});

export const underscoreResolver = createEmphasisResolver({
  delimiter: CharacterCodes.underscore,
  open: InlineTokenKind.EmphasisOpenUnderscore,
  close: InlineTokenKind.EmphasisCloseUnderscore
});
