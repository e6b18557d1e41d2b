import { bool, bytes, float32, float64, integer, rune, str } from '@widefmt/core';
import { describe, expect, it } from 'vitest';

import { parseValueLiteral, ValueLiteralError } from './value-literals.js';

describe('parseValueLiteral', () => {
  it.each([
    { literal: 'nil', expected: null },
    { literal: 'true', expected: true },
    { literal: 'false', expected: false },
    { literal: '42', expected: 42 },
    { literal: '-7', expected: -7 },
    { literal: '0x2a', expected: 42 },
    { literal: '-0x10', expected: -16 },
    { literal: '0o17', expected: 15 },
    { literal: '0b101', expected: 5 },
    { literal: '9007199254740993', expected: 9_007_199_254_740_993n },
    { literal: '1.5', expected: float64(1.5) },
    { literal: '2.0', expected: float64(2) },
    { literal: '1e3', expected: float64(1000) },
    { literal: '-Inf', expected: float64(Number.NEGATIVE_INFINITY) },
    { literal: 'NaN', expected: float64(Number.NaN) },
    { literal: "'x'", expected: rune('x') },
    { literal: "'日'", expected: rune(0x65_e5) },
  ])('reads $literal', ({ literal, expected }) => {
    expect(parseValueLiteral(literal)).toEqual(expected);
  });

  it.each([
    { literal: 'uint8:300', expected: integer('uint8', 44) },
    { literal: 'int8:-129', expected: integer('int8', 127) },
    { literal: 'uint64:0xffffffffffffffff', expected: integer('uint64', 2n ** 64n - 1n) },
    { literal: 'rune:65', expected: integer('int32', 65) },
    { literal: 'rune:日', expected: integer('int32', 0x65_e5) },
    { literal: 'float32:0.1', expected: float32(0.1) },
    { literal: 'float64:Inf', expected: float64(Number.POSITIVE_INFINITY) },
    { literal: 'bool:false', expected: bool(false) },
    { literal: 'string:42', expected: str('42') },
    { literal: 'string:', expected: str('') },
    { literal: 'bytes:00ff', expected: bytes([0, 255]) },
  ])('reads the typed literal $literal', ({ literal, expected }) => {
    expect(parseValueLiteral(literal)).toEqual(expected);
  });

  it.each(['hello', 'http://example.test', ':x', '1.2.3', '-', "'ab'"])(
    'keeps %s as a string',
    (literal) => {
      expect(parseValueLiteral(literal)).toBe(literal);
    },
  );

  it.each([
    { literal: 'int:abc', message: 'Invalid int literal: abc' },
    { literal: 'bytes:abc', message: 'Invalid bytes literal: abc' },
    { literal: 'rune:ab', message: 'Invalid rune literal: ab' },
    { literal: 'bool:yes', message: 'Invalid bool literal: yes' },
    { literal: 'float64:x', message: 'Invalid float64 literal: x' },
  ])('rejects $literal', ({ literal, message }) => {
    expect(() => parseValueLiteral(literal)).toThrow(ValueLiteralError);
    expect(() => parseValueLiteral(literal)).toThrow(message);
  });
});
