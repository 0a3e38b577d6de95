import { createInlineScanner, tokenizeInline, tokenKindToString, type InlineScannerDebugState } from './parser/index.js';

const testText = process.argv[2] ?? '**bold** `code` "quoted" ~~gone~~ {{< video "a.mp4" >}} [-@doe, p. 3]';

console.log('Input text:', JSON.stringify(testText));

const scanner = createInlineScanner();
const debugState: InlineScannerDebugState = {
  mode: '',
  emphasisOpening: false,
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

for (const token of tokenizeInline(testText)) {
  scanner.deserialize(token.checkpoint.scannerState);
  scanner.fillDebugState(debugState);
  console.log(
    `${token.pos}..${token.end} ${tokenKindToString(token.kind)} ${JSON.stringify(token.text)}`,
    `mode=${debugState.mode} shortcodeDepth=${debugState.shortcodeDepth} emphasisRemaining=${debugState.emphasisRemaining}`);
}

console.log('Done.');
