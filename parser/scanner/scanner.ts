import { authorInTextCitationResolver, suppressAuthorCitationResolver } from './citation.js';
import { codeSpanResolver, mathSpanResolver } from './delimiter-run.js';
import { starResolver, underscoreResolver } from './emphasis.js';
import type { InputCursor } from './input-cursor.js';
import type { InlineResolver } from './resolver.js';
import {
  createScannerState,
  deserializeState,
  getLexicalMode,
  LexicalMode,
  resetScannerState,
  ScannerFlags,
  SERIALIZED_STATE_SIZE,
  serializeState
} from './scanner-state.js';
import { shortcodeCloseResolver, shortcodeOpenResolver } from './shortcode.js';
import { caretResolver, doubleQuoteResolver, singleQuoteResolver, tildeResolver } from './toggle-span.js';
import { InlineTokenKind, type ValidTokens } from './token-types.js';

export interface InlineScanner {
  /**
   * Try to recognize an inline delimiter at the cursor. Returns the committed
   * kind, with the cursor's commit point at the token end, or undefined when
   * the grammar should try something else.
   */
  scan(cursor: InputCursor, valid: ValidTokens): InlineTokenKind | undefined;

  /** Snapshot the whole state as a fixed-size byte record. */
  serialize(): Uint8Array;

  /** Restore a snapshot; a short or empty buffer resets to the initial state. */
  deserialize(buffer: ArrayLike<number>): void;

  /** Back to the initial all-zero state. */
  reset(): void;

  /** Fill a caller-owned diagnostics object with the current state. */
  fillDebugState(state: InlineScannerDebugState): void;
}

/**
 * Debug state interface for zero-allocation diagnostics
 */
export interface InlineScannerDebugState {
  /** Human-readable lexical mode ('Normal' or 'ShortcodeArguments'). */
  mode: string;

  /** True while an emphasis run is resolving as opening. */
  emphasisOpening: boolean;

  codeSpanRunLength: number;
  mathSpanRunLength: number;
  emphasisRemaining: number;
  shortcodeDepth: number;

  superscriptOpen: boolean;
  subscriptOpen: boolean;
  strikeoutOpen: boolean;
  singleQuoteOpen: boolean;
  doubleQuoteOpen: boolean;
}

const resolvers: readonly InlineResolver[] = [
  shortcodeOpenResolver,
  shortcodeCloseResolver,
  authorInTextCitationResolver,
  suppressAuthorCitationResolver,
  caretResolver,
  codeSpanResolver,
  mathSpanResolver,
  starResolver,
  underscoreResolver,
  tildeResolver,
  singleQuoteResolver,
  doubleQuoteResolver
];

/** Resolver by first character; all triggers are ASCII. */
const resolverByCharacter = new Map<number, InlineResolver>();
for (const resolver of resolvers) {
  for (const ch of resolver.triggers) {
    resolverByCharacter.set(ch, resolver);
  }
}

/**
 * Inline scanner with closure-based architecture. One instance per parse
 * session; not reentrant.
 */
export function createInlineScanner(): InlineScanner {
  const state = createScannerState();

  function scan(cursor: InputCursor, valid: ValidTokens): InlineTokenKind | undefined {
    // The grammar decided the current branch is invalid and asks for an
    // error token to stop it
    if (valid.has(InlineTokenKind.ForcedError)) {
      cursor.markEnd();
      return InlineTokenKind.Error;
    }

    const resolver = resolverByCharacter.get(cursor.lookahead);
    if (!resolver || cursor.isEof()) return undefined;

    return resolver.attempt(cursor, valid, state);
  }

  function serialize(): Uint8Array {
    const buffer = new Uint8Array(SERIALIZED_STATE_SIZE);
    serializeState(state, buffer);
    return buffer;
  }

  function deserialize(buffer: ArrayLike<number>): void {
    deserializeState(state, buffer);
  }

  function reset(): void {
    resetScannerState(state);
  }

  function fillDebugState(debugState: InlineScannerDebugState): void {
    debugState.mode = getLexicalMode(state) === LexicalMode.Normal ? 'Normal' : 'ShortcodeArguments';
    debugState.emphasisOpening = !!(state.flags & ScannerFlags.EmphasisOpening);

    debugState.codeSpanRunLength = state.codeSpanRunLength;
    debugState.mathSpanRunLength = state.mathSpanRunLength;
    debugState.emphasisRemaining = state.emphasisRemaining;
    debugState.shortcodeDepth = state.shortcodeDepth;

    debugState.superscriptOpen = state.superscriptOpen;
    debugState.subscriptOpen = state.subscriptOpen;
    debugState.strikeoutOpen = state.strikeoutOpen;
    debugState.singleQuoteOpen = state.singleQuoteOpen;
    debugState.doubleQuoteOpen = state.doubleQuoteOpen;
  }

  const scanner: InlineScanner = {
    scan,
    serialize,
    deserialize,
    reset,
    fillDebugState
  };

  return scanner;
}
