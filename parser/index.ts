export { createInlineScanner, type InlineScanner, type InlineScannerDebugState } from './scanner/scanner.js';
export { createStringCursor, type InputCursor, type StringCursor } from './scanner/input-cursor.js';
export { InlineTokenKind, INLINE_TOKEN_KIND_COUNT, tokenKindToString, type ValidTokens } from './scanner/token-types.js';
export type { InlineResolver } from './scanner/resolver.js';
export {
  createScannerState,
  deserializeState,
  getLexicalMode,
  LexicalMode,
  serializeState,
  SERIALIZED_STATE_SIZE,
  type ScannerState
} from './scanner/scanner-state.js';

export * from './inline-driver.js';
