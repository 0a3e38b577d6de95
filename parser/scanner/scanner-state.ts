/**
 * Persistent scanner state, carried across scan() calls and checkpointed
 * as a fixed 10-byte record so incremental re-lexing can resume anywhere.
 */

export const enum ScannerFlags {
  None = 0,

  /** 0x04 - The in-progress emphasis delimiter run resolves as opening. */
  EmphasisOpening = 1 << 2,
}

/** Content lexing mode - only one active at a time. */
export const enum LexicalMode {
  /** Regular inline markdown. */
  Normal = 0,

  /** Inside `{{< ... >}}`: quotes belong to the shortcode's string literals. */
  ShortcodeArguments = 1,
}

export interface ScannerState {
  flags: ScannerFlags;

  /** Length of the unmatched code span opener, 0 when none is open. */
  codeSpanRunLength: number;

  /** Length of the unmatched math span opener, 0 when none is open. */
  mathSpanRunLength: number;

  /** Delimiters of the current `*`/`_` run not yet emitted. */
  emphasisRemaining: number;

  /** Number of open shortcodes. */
  shortcodeDepth: number;

  superscriptOpen: boolean;
  subscriptOpen: boolean;
  strikeoutOpen: boolean;
  singleQuoteOpen: boolean;
  doubleQuoteOpen: boolean;
}

export const SERIALIZED_STATE_SIZE = 10;

/** Counters are persisted as single bytes. */
export const MAX_COUNTER = 0xFF;

export function createScannerState(): ScannerState {
  return {
    flags: ScannerFlags.None,
    codeSpanRunLength: 0,
    mathSpanRunLength: 0,
    emphasisRemaining: 0,
    shortcodeDepth: 0,
    superscriptOpen: false,
    subscriptOpen: false,
    strikeoutOpen: false,
    singleQuoteOpen: false,
    doubleQuoteOpen: false
  };
}

export function resetScannerState(state: ScannerState): void {
  Object.assign(state, createScannerState());
}

export function copyState(target: ScannerState, source: ScannerState): void {
  Object.assign(target, source);
}

export function statesEqual(a: ScannerState, b: ScannerState): boolean {
  return a.flags === b.flags &&
    a.codeSpanRunLength === b.codeSpanRunLength &&
    a.mathSpanRunLength === b.mathSpanRunLength &&
    a.emphasisRemaining === b.emphasisRemaining &&
    a.shortcodeDepth === b.shortcodeDepth &&
    a.superscriptOpen === b.superscriptOpen &&
    a.subscriptOpen === b.subscriptOpen &&
    a.strikeoutOpen === b.strikeoutOpen &&
    a.singleQuoteOpen === b.singleQuoteOpen &&
    a.doubleQuoteOpen === b.doubleQuoteOpen;
}

export function getLexicalMode(state: ScannerState): LexicalMode {
  return state.shortcodeDepth > 0 ? LexicalMode.ShortcodeArguments : LexicalMode.Normal;
}

/**
 * Write the whole state into `buffer` at `offset`, returning the number of
 * bytes written. Field order is fixed; deserializeState reads it back.
 */
export function serializeState(state: ScannerState, buffer: Uint8Array, offset: number = 0): number {
  if (buffer.length - offset < SERIALIZED_STATE_SIZE)
    throw new Error(`Scanner state needs ${SERIALIZED_STATE_SIZE} bytes, buffer has ${buffer.length - offset}`);

  let size = offset;
  buffer[size++] = state.flags;
  buffer[size++] = state.codeSpanRunLength;
  buffer[size++] = state.mathSpanRunLength;
  buffer[size++] = state.emphasisRemaining;
  buffer[size++] = state.shortcodeDepth;
  buffer[size++] = state.superscriptOpen ? 1 : 0;
  buffer[size++] = state.subscriptOpen ? 1 : 0;
  buffer[size++] = state.strikeoutOpen ? 1 : 0;
  buffer[size++] = state.singleQuoteOpen ? 1 : 0;
  buffer[size++] = state.doubleQuoteOpen ? 1 : 0;
  return size - offset;
}

/**
 * Restore state written by serializeState. Anything shorter than a full
 * record leaves the state all-zero; bytes past the record are ignored.
 */
export function deserializeState(state: ScannerState, buffer: ArrayLike<number>): void {
  resetScannerState(state);
  if (buffer.length < SERIALIZED_STATE_SIZE) return;

  let size = 0;
  state.flags = buffer[size++] & MAX_COUNTER;
  state.codeSpanRunLength = buffer[size++] & MAX_COUNTER;
  state.mathSpanRunLength = buffer[size++] & MAX_COUNTER;
  state.emphasisRemaining = buffer[size++] & MAX_COUNTER;
  state.shortcodeDepth = buffer[size++] & MAX_COUNTER;
  state.superscriptOpen = (buffer[size++] & MAX_COUNTER) !== 0;
  state.subscriptOpen = (buffer[size++] & MAX_COUNTER) !== 0;
  state.strikeoutOpen = (buffer[size++] & MAX_COUNTER) !== 0;
  state.singleQuoteOpen = (buffer[size++] & MAX_COUNTER) !== 0;
  state.doubleQuoteOpen = (buffer[size++] & MAX_COUNTER) !== 0;
}
