import type { InputCursor } from './input-cursor.js';
import type { ScannerState } from './scanner-state.js';
import type { InlineTokenKind, ValidTokens } from './token-types.js';

/**
 * One family of inline delimiters. The dispatcher routes a scan to the
 * resolver whose triggers contain the next character.
 */
export interface InlineResolver {
  /** Character codes this resolver claims. */
  readonly triggers: readonly number[];

  /**
   * Commit to a token kind, leaving the commit point on the cursor, or
   * return undefined to decline.
   */
  attempt(cursor: InputCursor, valid: ValidTokens, state: ScannerState): InlineTokenKind | undefined;
}
