import { describe, expect, test } from 'vitest';

import { InlineTokenKind } from '../scanner/token-types.js';
import { scanString, valid } from './utils.test.js';

const allCitations = valid(
  InlineTokenKind.CitationAuthor,
  InlineTokenKind.CitationAuthorBracketed,
  InlineTokenKind.CitationSuppressAuthor,
  InlineTokenKind.CitationSuppressAuthorBracketed);

describe('Citations', () => {
  test('author in text', () => {
    expect(scanString('@doe99', allCitations)).toBe('@ CitationAuthor');
  });

  test('bracketed author', () => {
    expect(scanString('@{doe 99}', allCitations)).toBe('@{ CitationAuthorBracketed');
  });

  test('brace without the bracketed kind falls back to plain', () => {
    expect(scanString('@{doe}', valid(InlineTokenKind.CitationAuthor))).toBe('@ CitationAuthor');
  });

  test('suppressed author', () => {
    expect(scanString('-@doe99', allCitations)).toBe('-@ CitationSuppressAuthor');
  });

  test('suppressed bracketed author', () => {
    expect(scanString('-@{doe}', allCitations)).toBe('-@{ CitationSuppressAuthorBracketed');
  });

  test('minus without at sign declines', () => {
    expect(scanString('-x', allCitations)).toBe('declined');
    expect(scanString('-', allCitations)).toBe('declined');
  });

  test('suppressed marker needs its own kind', () => {
    expect(scanString('-@doe', valid(InlineTokenKind.CitationAuthor))).toBe('declined');
  });

  test('declines when citations are not valid', () => {
    expect(scanString('@doe', valid(InlineTokenKind.CodeSpanOpen))).toBe('declined');
  });

  test('from the middle of a line', () => {
    expect(scanString('see [-@doe, p. 3]', allCitations, undefined, 5)).toBe('-@ CitationSuppressAuthor');
  });
});
