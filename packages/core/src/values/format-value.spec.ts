import { describe, expect, it } from 'vitest';

import {
  array,
  byteArray,
  bytes,
  complex64,
  float32,
  int8,
  list,
  nilPointer,
  pointer,
  rune,
  typeName,
  uint16,
  uint64,
} from './constructors.js';
import { classifyNumber, NIL, toFormatValue, typeNameOf } from './format-value.js';

describe('constructors', () => {
  it('wraps integers to their declared width', () => {
    expect(int8(200).value).toBe(-56n);
    expect(uint16(-1).value).toBe(65_535n);
    expect(uint64(-1n).value).toBe(18_446_744_073_709_551_615n);
  });

  it('rejects fractional integers', () => {
    expect(() => int8(1.5)).toThrow(RangeError);
  });

  it('stores characters as int32 code points', () => {
    expect(rune('日')).toEqual({ kind: 'integer', type: 'int32', value: 0x65_e5n });
    expect(rune(0x41).value).toBe(65n);
  });

  it('rounds 32-bit floats on construction', () => {
    expect(float32(0.1).value).toBe(Math.fround(0.1));
    expect(complex64(0.1, 0.2).imag).toBe(Math.fround(0.2));
  });

  it('encodes strings into bytes', () => {
    expect([...bytes('é').value]).toEqual([0xc3, 0xa9]);
    expect(byteArray([1, 2, 3]).fixedLength).toBe(true);
  });

  it('normalises pointer addresses to 64 bits', () => {
    expect(pointer('*int', 0x10).address).toBe(16n);
    expect(nilPointer('*int').address).toBe(0n);
  });
});

describe('toFormatValue', () => {
  it('tags plain JavaScript values', () => {
    expect(toFormatValue(5)).toEqual({ kind: 'number', value: 5 });
    expect(toFormatValue(5n)).toEqual({ kind: 'integer', type: 'int', value: 5n });
    expect(toFormatValue('x')).toEqual({ kind: 'string', value: 'x' });
    expect(toFormatValue(false)).toEqual({ kind: 'boolean', value: false });
    expect(toFormatValue(null)).toBe(NIL);
    expect(toFormatValue(undefined)).toBe(NIL);
  });

  it('treats arrays as untyped lists and keeps their identity', () => {
    const elements = [1, 'a'];
    const value = toFormatValue(elements);

    expect(value.kind).toBe('list');
    expect(value.kind === 'list' && value.elements).toBe(elements);
  });

  it('passes tagged values through', () => {
    const value = typeName('main.T');

    expect(toFormatValue(value)).toBe(value);
  });
});

describe('classifyNumber', () => {
  it('formats safe integers as int except under float verbs', () => {
    expect(classifyNumber({ kind: 'number', value: 3 }, 'd')).toEqual({
      kind: 'integer',
      type: 'int',
      value: 3n,
    });
    expect(classifyNumber({ kind: 'number', value: 3 }, 'f')).toEqual({
      kind: 'float',
      bitSize: 64,
      value: 3,
    });
    expect(classifyNumber({ kind: 'number', value: 2.5 }, 'v').kind).toBe('float');
    expect(classifyNumber({ kind: 'number', value: 1e300 }, 'd').kind).toBe('float');
  });
});

describe('typeNameOf', () => {
  it('names every kind', () => {
    expect(typeNameOf(toFormatValue(1))).toBe('int');
    expect(typeNameOf(toFormatValue(1.5))).toBe('float64');
    expect(typeNameOf(float32(1))).toBe('float32');
    expect(typeNameOf(complex64(1, 2))).toBe('complex64');
    expect(typeNameOf(toFormatValue(true))).toBe('bool');
    expect(typeNameOf(toFormatValue('s'))).toBe('string');
    expect(typeNameOf(bytes([1]))).toBe('[]uint8');
    expect(typeNameOf(byteArray([1, 2]))).toBe('[2]uint8');
    expect(typeNameOf(nilPointer('*int'))).toBe('*int');
    expect(typeNameOf(typeName('int'))).toBe('type');
    expect(typeNameOf(NIL)).toBe('<nil>');
    expect(typeNameOf(list([1, 2], 'int'))).toBe('[]int');
    expect(typeNameOf(array([1, 2], 'int'))).toBe('[2]int');
  });
});
