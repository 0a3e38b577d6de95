import { describe, expect, test } from 'vitest';

import { createStringCursor } from '../scanner/input-cursor.js';
import { createInlineScanner } from '../scanner/scanner.js';
import { InlineTokenKind } from '../scanner/token-types.js';
import { scanString, valid } from './utils.test.js';

describe('Dispatch', () => {
  test('forced error is a zero-length error token', () => {
    expect(scanString('abc', valid(InlineTokenKind.ForcedError))).toBe('Error');
  });

  test('forced error wins over any delimiter', () => {
    expect(scanString('`a`', valid(InlineTokenKind.ForcedError, InlineTokenKind.CodeSpanOpen))).toBe('Error');
  });

  test('forced error at end of input', () => {
    expect(scanString('', valid(InlineTokenKind.ForcedError))).toBe('Error');
  });

  test('other characters decline', () => {
    for (const input of ['a', ' ', '#', '[', '\n']) {
      expect(scanString(input, valid(InlineTokenKind.CodeSpanOpen, InlineTokenKind.LastTokenWhitespace))).toBe('declined');
    }
  });

  test('end of input declines', () => {
    expect(scanString('', valid(InlineTokenKind.CodeSpanOpen, InlineTokenKind.UnclosedSpan))).toBe('declined');
  });

  test('declining leaves no commit point', () => {
    const cursor = createStringCursor('xyz');
    expect(createInlineScanner().scan(cursor, valid(InlineTokenKind.CodeSpanOpen))).toBeUndefined();
    expect(cursor.tokenEnd).toBe(0);
  });

  test('scanners do not share state', () => {
    const first = createInlineScanner();
    const second = createInlineScanner();
    scanString('`a`', valid(InlineTokenKind.CodeSpanOpen), first);
    expect(first.serialize()[1]).toBe(1);
    expect(second.serialize()[1]).toBe(0);
  });

  test('cursor range bounds the lookahead', () => {
    const cursor = createStringCursor('`a`b', 0, 2);
    const kind = createInlineScanner().scan(cursor, valid(InlineTokenKind.CodeSpanOpen, InlineTokenKind.UnclosedSpan));
    expect(kind).toBe(InlineTokenKind.UnclosedSpan);
    expect(cursor.tokenEnd).toBe(1);
  });
});
