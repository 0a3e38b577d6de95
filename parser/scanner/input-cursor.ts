import { CharacterCodes } from './character-codes.js';

/**
 * What a resolver sees of the document. Reading past the last `markEnd()` is
 * speculative: the committed token ends at the marked point, or at the read
 * head when nothing was marked.
 */
export interface InputCursor {
  /** Character code at the read head, `CharacterCodes.nullCharacter` at end of input. */
  readonly lookahead: number;

  /** Move the read head one character forward. No-op at end of input. */
  advance(): void;

  /** Set the commit point to the read head. */
  markEnd(): void;

  isEof(): boolean;
}

/**
 * Cursor over a string, driven by the embedding loop: `resetTo` starts a new
 * attempt, `tokenEnd` reads where the attempt committed.
 */
export interface StringCursor extends InputCursor {
  /** Offset where the current attempt started. */
  readonly tokenStart: number;

  /** Exclusive end of the committed range. */
  readonly tokenEnd: number;

  /** Offset of the read head. */
  readonly pos: number;

  /** Start a new attempt at `position`, forgetting any commit point. */
  resetTo(position: number): void;
}

export function createStringCursor(text: string, start: number = 0, length?: number): StringCursor {
  const end = length !== undefined ? start + length : text.length;
  if (start < 0 || end > text.length || start > end) {
    throw new Error(`Invalid cursor range: ${start}..${end} of ${text.length}`);
  }

  let pos = start;
  let tokenStart = start;
  // -1 = no commit point marked in this attempt
  let markedEnd = -1;

  function advance(): void {
    if (pos < end) pos++;
  }

  function markEnd(): void {
    markedEnd = pos;
  }

  function isEof(): boolean {
    return pos >= end;
  }

  function resetTo(position: number): void {
    if (position < start || position > end) {
      throw new Error(`Invalid rollback position: ${position}`);
    }
    pos = position;
    tokenStart = position;
    markedEnd = -1;
  }

  const cursor: StringCursor = {
    advance,
    markEnd,
    isEof,
    resetTo,

    get lookahead() { return pos < end ? text.charCodeAt(pos) : CharacterCodes.nullCharacter; },
    get tokenStart() { return tokenStart; },
    get tokenEnd() { return markedEnd >= 0 ? markedEnd : pos; },
    get pos() { return pos; }
  };

  return cursor;
}
