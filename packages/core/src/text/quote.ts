import { isValidCodePoint, REPLACEMENT_CHARACTER, type TextUnit } from './utf8.js';

const printablePattern = /^[\p{L}\p{M}\p{N}\p{P}\p{S}]$/u;

/** Letters, marks, numbers, punctuation, symbols and the ASCII space. */
export function isPrintable(codePoint: number): boolean {
  if (codePoint === 0x20) {
    return true;
  }
  if (!isValidCodePoint(codePoint)) {
    return false;
  }
  return printablePattern.test(String.fromCodePoint(codePoint));
}

const hex = (value: number, digits: number): string => value.toString(16).padStart(digits, '0');

const SHORT_ESCAPES: ReadonlyMap<number, string> = new Map([
  [0x07, String.raw`\a`],
  [0x08, String.raw`\b`],
  [0x0c, String.raw`\f`],
  [0x0a, String.raw`\n`],
  [0x0d, String.raw`\r`],
  [0x09, String.raw`\t`],
  [0x0b, String.raw`\v`],
]);

/**
 * Escapes one code point for a quoted literal.
 * @param codePoint - Code point to escape.
 * @param quote - The delimiter in use, escaped with a backslash.
 * @param asciiOnly - Escape every non-ASCII code point.
 */
export function escapeCodePoint(codePoint: number, quote: '"' | "'", asciiOnly: boolean): string {
  if (codePoint === quote.charCodeAt(0) || codePoint === 0x5c) {
    return `\\${String.fromCodePoint(codePoint)}`;
  }
  const printable = isPrintable(codePoint);
  if (printable && (!asciiOnly || codePoint < 0x80)) {
    return String.fromCodePoint(codePoint);
  }
  const short = SHORT_ESCAPES.get(codePoint);
  if (short !== undefined) {
    return short;
  }
  if (codePoint < 0x20 || codePoint === 0x7f) {
    return `\\x${hex(codePoint, 2)}`;
  }
  const scalar = isValidCodePoint(codePoint) ? codePoint : REPLACEMENT_CHARACTER;
  return scalar < 0x1_00_00 ? `\\u${hex(scalar, 4)}` : `\\U${hex(scalar, 8)}`;
}

/**
 * Double-quoted literal with escapes. Units carrying an invalid byte print as `\xNN`.
 * @param units - Text to quote.
 * @param asciiOnly - Escape non-ASCII code points as `\u` / `\U`.
 */
export function quoteUnits(units: readonly TextUnit[], asciiOnly: boolean): string {
  let quoted = '"';
  for (const unit of units) {
    quoted +=
      unit.byte === undefined ? escapeCodePoint(unit.codePoint, '"', asciiOnly) : `\\x${hex(unit.byte, 2)}`;
  }
  return `${quoted}"`;
}

/**
 * Single-quoted character literal. Values outside the Unicode scalar range
 * are replaced with U+FFFD first.
 */
export function quoteCodePoint(codePoint: number, asciiOnly: boolean): string {
  const scalar = isValidCodePoint(codePoint) ? codePoint : REPLACEMENT_CHARACTER;
  return `'${escapeCodePoint(scalar, "'", asciiOnly)}'`;
}

/**
 * Whether the text can be written as a back-quoted raw literal: no control
 * characters other than TAB, no back quote, no BOM and no invalid units.
 */
export function canBackquote(units: readonly TextUnit[]): boolean {
  return units.every(({ codePoint, byte }) => {
    if (byte !== undefined || !isValidCodePoint(codePoint)) {
      return false;
    }
    if (codePoint === 0xfe_ff || codePoint === 0x60 || codePoint === 0x7f) {
      return false;
    }
    return codePoint >= 0x20 || codePoint === 0x09;
  });
}
