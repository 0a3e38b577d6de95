/**
 * Token kinds for the inline-span scanner.
 *
 * The numeric order is shared with the embedding grammar's list of external
 * tokens and must not be rearranged.
 */
export const enum InlineTokenKind {
  Error,                            // emitted to kill an invalid parse branch
  ForcedError,                      // requested by the grammar, never emitted

  CodeSpanOpen,                     // ` `` ```...
  CodeSpanClose,

  EmphasisOpenStar,                 // *
  EmphasisOpenUnderscore,           // _
  EmphasisCloseStar,
  EmphasisCloseUnderscore,

  // Classification of the previous token; only ever present in the valid set
  LastTokenWhitespace,
  LastTokenPunctuation,

  StrikeoutOpen,                    // ~~
  StrikeoutClose,

  MathSpanOpen,                     // $ $$ ...
  MathSpanClose,

  SingleQuoteOpen,                  // '
  SingleQuoteClose,
  DoubleQuoteOpen,                  // "
  DoubleQuoteClose,
  SuperscriptOpen,                  // ^
  SuperscriptClose,
  SubscriptOpen,                    // ~
  SubscriptClose,

  CitationAuthorBracketed,          // @{
  CitationSuppressAuthorBracketed,  // -@{
  CitationAuthor,                   // @
  CitationSuppressAuthor,           // -@

  ShortcodeOpenEscaped,             // {{{<
  ShortcodeCloseEscaped,            // >}}}
  ShortcodeOpen,                    // {{<
  ShortcodeClose,                   // >}}

  UnclosedSpan,                     // leaf span opener with no closer ahead
}

/** Number of declared token kinds. */
export const INLINE_TOKEN_KIND_COUNT = InlineTokenKind.UnclosedSpan + 1;

/**
 * The grammar's answer to "is this token legal here". A `ReadonlySet` of
 * kinds satisfies it.
 */
export interface ValidTokens {
  has(kind: InlineTokenKind): boolean;
}

/** Kind name for logs and test output; `Text` for a plain text run. */
export function tokenKindToString(kind: InlineTokenKind | undefined): string {
  if (kind === undefined) return 'Text';
  return InlineTokenKindShadow[kind] || '0x' + kind.toString(16).toUpperCase();
}

/** Same members as InlineTokenKind, kept as a regular enum for the reverse mapping. */
export enum InlineTokenKindShadow {
  Error = InlineTokenKind.Error,
  ForcedError = InlineTokenKind.ForcedError,
  CodeSpanOpen = InlineTokenKind.CodeSpanOpen,
  CodeSpanClose = InlineTokenKind.CodeSpanClose,
  EmphasisOpenStar = InlineTokenKind.EmphasisOpenStar,
  EmphasisOpenUnderscore = InlineTokenKind.EmphasisOpenUnderscore,
  EmphasisCloseStar = InlineTokenKind.EmphasisCloseStar,
  EmphasisCloseUnderscore = InlineTokenKind.EmphasisCloseUnderscore,
  LastTokenWhitespace = InlineTokenKind.LastTokenWhitespace,
  LastTokenPunctuation = InlineTokenKind.LastTokenPunctuation,
  StrikeoutOpen = InlineTokenKind.StrikeoutOpen,
  StrikeoutClose = InlineTokenKind.StrikeoutClose,
  MathSpanOpen = InlineTokenKind.MathSpanOpen,
  MathSpanClose = InlineTokenKind.MathSpanClose,
  SingleQuoteOpen = InlineTokenKind.SingleQuoteOpen,
  SingleQuoteClose = InlineTokenKind.SingleQuoteClose,
  DoubleQuoteOpen = InlineTokenKind.DoubleQuoteOpen,
  DoubleQuoteClose = InlineTokenKind.DoubleQuoteClose,
  SuperscriptOpen = InlineTokenKind.SuperscriptOpen,
  SuperscriptClose = InlineTokenKind.SuperscriptClose,
  SubscriptOpen = InlineTokenKind.SubscriptOpen,
  SubscriptClose = InlineTokenKind.SubscriptClose,
  CitationAuthorBracketed = InlineTokenKind.CitationAuthorBracketed,
  CitationSuppressAuthorBracketed = InlineTokenKind.CitationSuppressAuthorBracketed,
  CitationAuthor = InlineTokenKind.CitationAuthor,
  CitationSuppressAuthor = InlineTokenKind.CitationSuppressAuthor,
  ShortcodeOpenEscaped = InlineTokenKind.ShortcodeOpenEscaped,
  ShortcodeCloseEscaped = InlineTokenKind.ShortcodeCloseEscaped,
  ShortcodeOpen = InlineTokenKind.ShortcodeOpen,
  ShortcodeClose = InlineTokenKind.ShortcodeClose,
  UnclosedSpan = InlineTokenKind.UnclosedSpan,
}
