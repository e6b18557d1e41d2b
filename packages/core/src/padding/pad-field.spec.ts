import { describe, expect, it } from 'vitest';

import { stringColumns } from '../width/columns.js';
import { padField, type PaddingField } from './pad-field.js';

const field = (overrides: Partial<PaddingField>): PaddingField => ({
  width: undefined,
  minus: false,
  zero: false,
  ...overrides,
});

const measure = (text: string): number => stringColumns(text);

describe('padField', () => {
  it('leaves bodies alone without a width', () => {
    expect(padField('abc', field({}), 'leading', measure)).toBe('abc');
    expect(padField('abc', field({ width: 0 }), 'leading', measure)).toBe('abc');
  });

  it('pads on the left by default and on the right when left-aligned', () => {
    expect(padField('ab', field({ width: 5 }), 'none', measure)).toBe('   ab');
    expect(padField('ab', field({ width: 5, minus: true }), 'none', measure)).toBe('ab   ');
  });

  it('never truncates', () => {
    expect(padField('abcdef', field({ width: 3 }), 'none', measure)).toBe('abcdef');
  });

  it('measures in display columns', () => {
    expect(padField('日本', field({ width: 6 }), 'none', measure)).toBe('  日本');
    expect(padField('日本語', field({ width: 5 }), 'none', measure)).toBe('日本語');
  });

  it('zero-fills according to the fill mode', () => {
    const zeroField = field({ width: 6, zero: true });

    expect(padField('-1.5', zeroField, 'none', measure)).toBe('  -1.5');
    expect(padField('-1.5', zeroField, 'leading', measure)).toBe('00-1.5');
    expect(padField('-1.5', zeroField, 'after-sign', measure)).toBe('-001.5');
    expect(padField(' 1.5', zeroField, 'after-sign', measure)).toBe(' 001.5');
    expect(padField('1.5', zeroField, 'after-sign', measure)).toBe('0001.5');
  });

  it('ignores zero filling when left-aligned', () => {
    expect(padField('7', field({ width: 3, zero: true, minus: true }), 'leading', measure)).toBe(
      '7  ',
    );
  });
});
