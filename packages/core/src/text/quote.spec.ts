import { describe, expect, it } from 'vitest';

import { canBackquote, isPrintable, quoteCodePoint, quoteUnits } from './quote.js';
import { decodeUtf8, textUnits } from './utf8.js';

describe('isPrintable', () => {
  it('accepts graphic characters and the ASCII space', () => {
    expect(isPrintable(0x41)).toBe(true);
    expect(isPrintable(0x20)).toBe(true);
    expect(isPrintable(0x65_e5)).toBe(true);
    expect(isPrintable(0x26_3a)).toBe(true);
  });

  it('rejects controls, format characters, other spaces and surrogates', () => {
    expect(isPrintable(0x0a)).toBe(false);
    expect(isPrintable(0xad)).toBe(false);
    expect(isPrintable(0xa0)).toBe(false);
    expect(isPrintable(0xfe_ff)).toBe(false);
    expect(isPrintable(0xd8_00)).toBe(false);
  });
});

describe('quoteUnits', () => {
  it('escapes quotes, backslashes and controls', () => {
    expect(quoteUnits(textUnits('a"b\\c'), false)).toBe(String.raw`"a\"b\\c"`);
    expect(quoteUnits(textUnits('\u0007\b\f\n\r\t\v'), false)).toBe(String.raw`"\a\b\f\n\r\t\v"`);
    expect(quoteUnits(textUnits('\u0001\u007f'), false)).toBe(String.raw`"\x01\x7f"`);
  });

  it('keeps printable non-ASCII text unless ASCII output is requested', () => {
    expect(quoteUnits(textUnits('日本語'), false)).toBe('"日本語"');
    expect(quoteUnits(textUnits('日本語'), true)).toBe(String.raw`"\u65e5\u672c\u8a9e"`);
    expect(quoteUnits(textUnits('\u{1f600}'), true)).toBe(String.raw`"\U0001f600"`);
  });

  it('escapes non-printable code points with \\u', () => {
    expect(quoteUnits(textUnits('\u00a0\ufeff'), false)).toBe(String.raw`"\u00a0\ufeff"`);
  });

  it('writes invalid UTF-8 bytes as hex escapes', () => {
    const units = [...decodeUtf8(new Uint8Array([0x61, 0xff, 0x62]))];

    expect(quoteUnits(units, false)).toBe(String.raw`"a\xffb"`);
  });
});

describe('quoteCodePoint', () => {
  it('quotes characters with single quotes', () => {
    expect(quoteCodePoint(0x78, false)).toBe("'x'");
    expect(quoteCodePoint(0x27, false)).toBe(String.raw`'\''`);
    expect(quoteCodePoint(0x22, false)).toBe(`'"'`);
    expect(quoteCodePoint(0x65_e5, true)).toBe(String.raw`'\u65e5'`);
  });

  it('replaces values outside the scalar range', () => {
    expect(quoteCodePoint(0x11_00_00, false)).toBe("'\ufffd'");
    expect(quoteCodePoint(0xd8_00, true)).toBe(String.raw`'\ufffd'`);
  });
});

describe('canBackquote', () => {
  it('allows tabs and printable text', () => {
    expect(canBackquote(textUnits('a\tb 日'))).toBe(true);
  });

  it('rejects back quotes, newlines and invalid bytes', () => {
    expect(canBackquote(textUnits('a`b'))).toBe(false);
    expect(canBackquote(textUnits('a\nb'))).toBe(false);
    expect(canBackquote([...decodeUtf8(new Uint8Array([0xff]))])).toBe(false);
  });
});

describe('decodeUtf8', () => {
  it('decodes multi-byte sequences and flags malformed bytes', () => {
    const units = [...decodeUtf8(new Uint8Array([0xe6, 0x97, 0xa5, 0xc0, 0x80, 0xf0, 0x9f, 0x98, 0x80]))];

    expect(units).toEqual([
      { codePoint: 0x65_e5 },
      { codePoint: 0xff_fd, byte: 0xc0 },
      { codePoint: 0xff_fd, byte: 0x80 },
      { codePoint: 0x1_f6_00 },
    ]);
  });

  it('rejects encoded surrogates', () => {
    const units = [...decodeUtf8(new Uint8Array([0xed, 0xa0, 0x80]))];

    expect(units.map((unit) => unit.byte)).toEqual([0xed, 0xa0, 0x80]);
  });
});
