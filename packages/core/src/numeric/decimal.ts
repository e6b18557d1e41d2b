/**
 * Decimal digit strings for binary floating point values.
 *
 * A {@link DecimalDigits} value `{ digits: '125', point: 1 }` reads as
 * `1.25`: `point` is the position of the decimal point relative to the
 * first digit. Digit strings never carry trailing zeros, and zero is the
 * empty string with point 0.
 */

export interface DecimalDigits {
  readonly digits: string;
  readonly point: number;
}

const ZERO: DecimalDigits = { digits: '', point: 0 };

const trimTrailingZeros = (digits: string, point: number): DecimalDigits => {
  let end = digits.length;
  while (end > 0 && digits.charCodeAt(end - 1) === 0x30) {
    end--;
  }
  return end === 0 ? ZERO : { digits: digits.slice(0, end), point };
};

/**
 * Splits a finite double into its binary mantissa and exponent so that
 * `|value| = mantissa * 2^exponent`.
 */
export function decomposeFloat64(value: number): { mantissa: bigint; exponent: number } {
  const view = new DataView(new ArrayBuffer(8));
  view.setFloat64(0, value);
  const bits = view.getBigUint64(0);
  const biasedExponent = Number((bits >> 52n) & 0x7_ffn);
  const fraction = bits & 0xf_ff_ff_ff_ff_ff_ffn;
  if (biasedExponent === 0) {
    return { mantissa: fraction, exponent: -1074 };
  }
  return { mantissa: fraction | (1n << 52n), exponent: biasedExponent - 1075 };
}

/**
 * Exact decimal expansion of a finite double's magnitude.
 * @param value - Finite number; its sign is ignored.
 * @returns Every significant digit of the binary value.
 */
export function exactDecimal(value: number): DecimalDigits {
  if (value === 0) {
    return ZERO;
  }
  const { mantissa, exponent } = decomposeFloat64(Math.abs(value));
  if (exponent >= 0) {
    const digits = (mantissa << BigInt(exponent)).toString();
    return trimTrailingZeros(digits, digits.length);
  }
  // mantissa / 2^k == mantissa * 5^k / 10^k
  const scale = -exponent;
  const digits = (mantissa * 5n ** BigInt(scale)).toString();
  return trimTrailingZeros(digits, digits.length - scale);
}

const shouldRoundUp = (decimal: DecimalDigits, count: number): boolean => {
  const next = decimal.digits.charCodeAt(count);
  if (next === 0x35 && count + 1 === decimal.digits.length) {
    // exactly halfway: round to even
    return count > 0 && (decimal.digits.charCodeAt(count - 1) - 0x30) % 2 === 1;
  }
  return next >= 0x35;
};

/**
 * Rounds to `count` significant digits, ties to even.
 * @param decimal - Digits to round.
 * @param count - Significant digits to keep; negative counts leave the value unchanged.
 * @returns The rounded digits.
 */
export function roundDecimal(decimal: DecimalDigits, count: number): DecimalDigits {
  if (count < 0 || count >= decimal.digits.length) {
    return decimal;
  }
  if (!shouldRoundUp(decimal, count)) {
    return trimTrailingZeros(decimal.digits.slice(0, count), decimal.point);
  }
  let index = count - 1;
  while (index >= 0 && decimal.digits.charCodeAt(index) === 0x39) {
    index--;
  }
  if (index < 0) {
    return { digits: '1', point: decimal.point + 1 };
  }
  const incremented = String.fromCharCode(decimal.digits.charCodeAt(index) + 1);
  return { digits: decimal.digits.slice(0, index) + incremented, point: decimal.point };
}

const parseExponential = (text: string): DecimalDigits => {
  const [mantissa = '', exponent = '0'] = text.split('e');
  const digits = mantissa.replace('.', '');
  return trimTrailingZeros(digits, Number(exponent) + 1);
};

/**
 * Fewest digits that read back as the same value at the given precision.
 * @param value - Finite number; its sign is ignored.
 * @param bitSize - 64 for doubles, 32 for values already rounded with `Math.fround`.
 * @returns Shortest round-tripping digits.
 */
export function shortestDecimal(value: number, bitSize: 32 | 64): DecimalDigits {
  const magnitude = Math.abs(value);
  if (magnitude === 0) {
    return ZERO;
  }
  if (bitSize === 64) {
    return parseExponential(magnitude.toExponential());
  }
  const exact = exactDecimal(magnitude);
  for (let count = 1; count < 9; count++) {
    const candidate = roundDecimal(exact, count);
    if (Math.fround(Number(`0.${candidate.digits}e${candidate.point}`)) === magnitude) {
      return candidate;
    }
  }
  return roundDecimal(exact, 9);
}
