/**
 * Inline driver - a small stand-in for the embedding grammar.
 *
 * Runs the inline scanner over a string the way an incremental parser would:
 * it decides which token kinds are legal at each position, lets the scanner
 * commit or decline, and keeps declined characters as plain text. Every token
 * carries a checkpoint from which tokenizing can resume.
 */

import { CharacterCodes, isLineBreak, isPunctuation, isWhiteSpace } from './scanner/character-codes.js';
import { createStringCursor } from './scanner/input-cursor.js';
import { createInlineScanner } from './scanner/scanner.js';
import { InlineTokenKind, type ValidTokens } from './scanner/token-types.js';

export interface InlineToken {
  /** Committed scanner token, or undefined for a run of plain text. */
  kind: InlineTokenKind | undefined;

  pos: number;
  end: number;
  text: string;

  /** Where tokenizing stands right after this token. */
  checkpoint: InlineCheckpoint;
}

/**
 * Everything needed to resume: the offset, the scanner's serialized state and
 * the driver's own stack of open spans.
 */
export interface InlineCheckpoint {
  pos: number;
  scannerState: Uint8Array;
  openSpans: readonly InlineTokenKind[];

  /** Quote character of the shortcode string literal being read, 0 outside one. */
  shortcodeStringQuote: number;
}

/**
 * What the grammar knows at a position
 */
export interface InlineGrammarContext {
  /** Opening tokens not yet closed, innermost last. */
  openSpans: readonly InlineTokenKind[];

  /** Previous character is whitespace, or this is the start of the range. */
  lastTokenWhitespace: boolean;

  /** Previous character is ASCII punctuation. */
  lastTokenPunctuation: boolean;

  /** A blank line starts here, so the paragraph cannot continue. */
  paragraphEnd: boolean;

  /** Inside a quoted shortcode argument, which the grammar lexes as one string. */
  inShortcodeString: boolean;
}

export interface InlineDriverOptions {
  /** Offset to start at (default: 0). */
  start?: number;

  /** Number of characters to tokenize (default: to the end of the text). */
  length?: number;

  /** Validity oracle (default: defaultValidTokens). */
  validTokens?: (context: InlineGrammarContext) => ValidTokens;

  /** Continue from a checkpoint of an earlier run over the same text. */
  resume?: InlineCheckpoint;
}

/** Spans that nest, keyed by closing token. */
const openerOf = new Map<InlineTokenKind, InlineTokenKind>([
  [InlineTokenKind.CodeSpanClose, InlineTokenKind.CodeSpanOpen],
  [InlineTokenKind.MathSpanClose, InlineTokenKind.MathSpanOpen],
  [InlineTokenKind.EmphasisCloseStar, InlineTokenKind.EmphasisOpenStar],
  [InlineTokenKind.EmphasisCloseUnderscore, InlineTokenKind.EmphasisOpenUnderscore],
  [InlineTokenKind.StrikeoutClose, InlineTokenKind.StrikeoutOpen],
  [InlineTokenKind.SuperscriptClose, InlineTokenKind.SuperscriptOpen],
  [InlineTokenKind.SubscriptClose, InlineTokenKind.SubscriptOpen],
  [InlineTokenKind.SingleQuoteClose, InlineTokenKind.SingleQuoteOpen],
  [InlineTokenKind.DoubleQuoteClose, InlineTokenKind.DoubleQuoteOpen],
  [InlineTokenKind.ShortcodeClose, InlineTokenKind.ShortcodeOpen],
  [InlineTokenKind.ShortcodeCloseEscaped, InlineTokenKind.ShortcodeOpenEscaped],
]);

const openers = new Set(openerOf.values());

/** Open/close pairs that are not length-sensitive leaves or shortcodes. */
const emphasisPairs: readonly [InlineTokenKind, InlineTokenKind][] = [
  [InlineTokenKind.EmphasisOpenStar, InlineTokenKind.EmphasisCloseStar],
  [InlineTokenKind.EmphasisOpenUnderscore, InlineTokenKind.EmphasisCloseUnderscore],
];

const togglePairs: readonly [InlineTokenKind, InlineTokenKind][] = [
  [InlineTokenKind.StrikeoutOpen, InlineTokenKind.StrikeoutClose],
  [InlineTokenKind.SuperscriptOpen, InlineTokenKind.SuperscriptClose],
  [InlineTokenKind.SubscriptOpen, InlineTokenKind.SubscriptClose],
  [InlineTokenKind.SingleQuoteOpen, InlineTokenKind.SingleQuoteClose],
  [InlineTokenKind.DoubleQuoteOpen, InlineTokenKind.DoubleQuoteClose],
];

/**
 * Built-in grammar approximation: code and math spans admit only their own
 * close, shortcodes only shortcode delimiters; elsewhere every opener is legal
 * and a close is legal once its opener is on the stack. Toggle spans never
 * nest inside themselves. Nothing is legal inside a shortcode string literal.
 */
export function defaultValidTokens(context: InlineGrammarContext): ValidTokens {
  const valid = new Set<InlineTokenKind>();
  if (context.paragraphEnd) {
    valid.add(InlineTokenKind.ForcedError);
    return valid;
  }

  if (context.lastTokenWhitespace) valid.add(InlineTokenKind.LastTokenWhitespace);
  if (context.lastTokenPunctuation) valid.add(InlineTokenKind.LastTokenPunctuation);
  if (context.inShortcodeString) return valid;

  const { openSpans } = context;
  const innermost = openSpans[openSpans.length - 1];
  switch (innermost) {
    case InlineTokenKind.CodeSpanOpen:
      valid.add(InlineTokenKind.CodeSpanClose);
      return valid;

    case InlineTokenKind.MathSpanOpen:
      valid.add(InlineTokenKind.MathSpanClose);
      return valid;

    case InlineTokenKind.ShortcodeOpen:
    case InlineTokenKind.ShortcodeOpenEscaped:
      valid.add(InlineTokenKind.ShortcodeOpen);
      valid.add(InlineTokenKind.ShortcodeOpenEscaped);
      valid.add(innermost === InlineTokenKind.ShortcodeOpen ?
        InlineTokenKind.ShortcodeClose :
        InlineTokenKind.ShortcodeCloseEscaped);
      return valid;
  }

  valid.add(InlineTokenKind.CodeSpanOpen);
  valid.add(InlineTokenKind.MathSpanOpen);
  valid.add(InlineTokenKind.UnclosedSpan);
  valid.add(InlineTokenKind.ShortcodeOpen);
  valid.add(InlineTokenKind.ShortcodeOpenEscaped);
  valid.add(InlineTokenKind.CitationAuthor);
  valid.add(InlineTokenKind.CitationAuthorBracketed);
  valid.add(InlineTokenKind.CitationSuppressAuthor);
  valid.add(InlineTokenKind.CitationSuppressAuthorBracketed);

  for (const [open, close] of emphasisPairs) {
    valid.add(open);
    if (openSpans.includes(open)) valid.add(close);
  }

  for (const [open, close] of togglePairs) {
    valid.add(openSpans.includes(open) ? close : open);
  }

  return valid;
}

const defaultOptions = {
  start: 0,
  validTokens: defaultValidTokens
} satisfies InlineDriverOptions;

/**
 * Tokenize `text` into scanner tokens and plain text runs. Stops after the
 * zero-length error token the scanner emits at a blank line; the scanner
 * never looks past that line.
 */
export function tokenizeInline(text: string, options?: InlineDriverOptions): InlineToken[] {
  const { start, length, validTokens, resume } = { ...defaultOptions, ...options };
  const end = length !== undefined ? start + length : text.length;

  const scanner = createInlineScanner();
  const openSpans: InlineTokenKind[] = [];
  const tokens: InlineToken[] = [];
  let shortcodeStringQuote = 0;

  let pos = start;
  if (resume) {
    if (resume.pos < start || resume.pos > end)
      throw new Error(`Invalid checkpoint position: ${resume.pos}`);
    scanner.deserialize(resume.scannerState);
    openSpans.push(...resume.openSpans);
    shortcodeStringQuote = resume.shortcodeStringQuote;
    pos = resume.pos;
  }

  // The scanner sees the text up to the next blank line only
  let paragraphEnd = findParagraphEnd(pos);
  let cursor = createStringCursor(text, start, paragraphEnd - start);

  // Pending plain text: where it started and the state right after it
  let textStart = -1;
  let textCheckpoint: InlineCheckpoint | undefined;

  while (pos < end) {
    // A custom oracle may carry on past the blank line
    if (pos > paragraphEnd) {
      paragraphEnd = findParagraphEnd(pos);
      cursor = createStringCursor(text, start, paragraphEnd - start);
    }

    const context: InlineGrammarContext = {
      openSpans,
      lastTokenWhitespace: pos === start || isWhiteSpace(text.charCodeAt(pos - 1)),
      lastTokenPunctuation: pos > start && isPunctuation(text.charCodeAt(pos - 1)),
      paragraphEnd: isBlankLineStart(pos),
      inShortcodeString: shortcodeStringQuote !== 0
    };

    cursor.resetTo(pos);
    const kind = scanner.scan(cursor, validTokens(context));

    if (kind === InlineTokenKind.Error) {
      flushText(pos);
      tokens.push(createToken(kind, pos, pos));
      return tokens;
    }

    const tokenEnd = cursor.tokenEnd;
    if (kind !== undefined && tokenEnd > pos) {
      flushText(pos);
      updateOpenSpans(kind);
      tokens.push(createToken(kind, pos, tokenEnd));
      pos = tokenEnd;
      continue;
    }

    if (textStart < 0) textStart = pos;
    pos = consumeText(pos);
    textCheckpoint = createCheckpoint(pos);
  }

  flushText(pos);
  return tokens;

  function flushText(textEnd: number): void {
    if (textStart < 0 || !textCheckpoint) return;
    tokens.push({
      kind: undefined,
      pos: textStart,
      end: textEnd,
      text: text.slice(textStart, textEnd),
      checkpoint: textCheckpoint
    });
    textStart = -1;
    textCheckpoint = undefined;
  }

  function createToken(kind: InlineTokenKind, tokenPos: number, tokenEnd: number): InlineToken {
    return {
      kind,
      pos: tokenPos,
      end: tokenEnd,
      text: text.slice(tokenPos, tokenEnd),
      checkpoint: createCheckpoint(tokenEnd)
    };
  }

  function createCheckpoint(checkpointPos: number): InlineCheckpoint {
    return {
      pos: checkpointPos,
      scannerState: scanner.serialize(),
      openSpans: openSpans.slice(),
      shortcodeStringQuote
    };
  }

  /**
   * Step over a plain character. Inside shortcode arguments this follows
   * string literals: a quote opens one, the same quote or a line break ends
   * it, a backslash escapes the next character.
   */
  function consumeText(at: number): number {
    const ch = text.charCodeAt(at);
    const innermost = openSpans[openSpans.length - 1];
    if (innermost !== InlineTokenKind.ShortcodeOpen && innermost !== InlineTokenKind.ShortcodeOpenEscaped)
      return at + 1;

    if (!shortcodeStringQuote) {
      if (ch === CharacterCodes.doubleQuote || ch === CharacterCodes.singleQuote)
        shortcodeStringQuote = ch;
      return at + 1;
    }

    if (ch === CharacterCodes.backslash && at + 1 < paragraphEnd) return at + 2;
    if (ch === shortcodeStringQuote || isLineBreak(ch)) shortcodeStringQuote = 0;
    return at + 1;
  }

  function findParagraphEnd(from: number): number {
    for (let i = from; i < end; i++) {
      if (isBlankLineStart(i)) return i;
    }
    return end;
  }

  function updateOpenSpans(kind: InlineTokenKind): void {
    if (openers.has(kind)) {
      openSpans.push(kind);
      return;
    }
    const opener = openerOf.get(kind);
    if (opener === undefined) return;
    const index = openSpans.lastIndexOf(opener);
    if (index >= 0) openSpans.splice(index, 1);
  }

  /** A line break that ends an empty (or whitespace-only) line. */
  function isBlankLineStart(linePos: number): boolean {
    const ch = text.charCodeAt(linePos);
    if (!isLineBreak(ch)) return false;
    // LF of a CRLF pair belongs to the CR
    if (ch === CharacterCodes.lineFeed && linePos > start &&
      text.charCodeAt(linePos - 1) === CharacterCodes.carriageReturn) return false;

    let i = linePos - 1;
    while (i >= start &&
      (text.charCodeAt(i) === CharacterCodes.space || text.charCodeAt(i) === CharacterCodes.tab)) {
      i--;
    }
    return i >= start && isLineBreak(text.charCodeAt(i));
  }
}
