import { describe, expect, test } from 'vitest';

import { CharacterCodes } from '../scanner/character-codes.js';
import { createStringCursor } from '../scanner/input-cursor.js';

describe('StringCursor', () => {
  test('reads and advances', () => {
    const cursor = createStringCursor('ab');
    expect(cursor.lookahead).toBe(0x61);
    cursor.advance();
    expect(cursor.lookahead).toBe(0x62);
    expect(cursor.pos).toBe(1);
    cursor.advance();
    expect(cursor.isEof()).toBe(true);
    expect(cursor.lookahead).toBe(CharacterCodes.nullCharacter);
  });

  test('advance stops at end of input', () => {
    const cursor = createStringCursor('a');
    cursor.advance();
    cursor.advance();
    expect(cursor.pos).toBe(1);
  });

  test('token end follows the read head until marked', () => {
    const cursor = createStringCursor('abcd');
    cursor.advance();
    expect(cursor.tokenEnd).toBe(1);
    cursor.markEnd();
    cursor.advance();
    cursor.advance();
    expect(cursor.tokenEnd).toBe(1);
    expect(cursor.pos).toBe(3);
  });

  test('resetTo starts a new attempt', () => {
    const cursor = createStringCursor('abcd');
    cursor.advance();
    cursor.markEnd();
    cursor.resetTo(2);
    expect(cursor.tokenStart).toBe(2);
    expect(cursor.tokenEnd).toBe(2);
    expect(cursor.lookahead).toBe(0x63);
  });

  test('range limits the input', () => {
    const cursor = createStringCursor('abcd', 1, 2);
    expect(cursor.pos).toBe(1);
    expect(cursor.lookahead).toBe(0x62);
    cursor.advance();
    cursor.advance();
    expect(cursor.isEof()).toBe(true);
    expect(cursor.lookahead).toBe(CharacterCodes.nullCharacter);
  });

  test('rejects a position outside the range', () => {
    const cursor = createStringCursor('abcd', 1, 2);
    expect(() => cursor.resetTo(0)).toThrow('Invalid rollback position: 0');
    expect(() => cursor.resetTo(4)).toThrow('Invalid rollback position: 4');
    cursor.resetTo(3);
    expect(cursor.isEof()).toBe(true);
  });

  test('rejects an invalid range', () => {
    expect(() => createStringCursor('abc', 2, 5)).toThrow('Invalid cursor range: 2..7 of 3');
    expect(() => createStringCursor('abc', -1)).toThrow('Invalid cursor range: -1..3 of 3');
  });
});
