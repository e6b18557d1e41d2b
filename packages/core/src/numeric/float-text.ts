import {
  decomposeFloat64,
  exactDecimal,
  roundDecimal,
  shortestDecimal,
  type DecimalDigits,
} from './decimal.js';

export type FloatFormat = 'b' | 'e' | 'E' | 'f' | 'g' | 'G';

export type FloatBitSize = 32 | 64;

const digitAt = (digits: string, index: number): string => digits[index] ?? '0';

const exponentText = (exponent: number): string => {
  const sign = exponent < 0 ? '-' : '+';
  const magnitude = Math.abs(exponent);
  return sign + (magnitude < 10 ? `0${magnitude}` : String(magnitude));
};

/** `d.ddddde±dd` with `precision` digits after the point. */
const scientific = (
  decimal: DecimalDigits,
  precision: number,
  marker: 'e' | 'E',
): string => {
  let text = digitAt(decimal.digits, 0);
  if (precision > 0) {
    text += '.';
    for (let index = 1; index <= precision; index++) {
      text += digitAt(decimal.digits, index);
    }
  }
  const exponent = decimal.digits.length === 0 ? 0 : decimal.point - 1;
  return text + marker + exponentText(exponent);
};

/** `ddd.ddd` with `precision` digits after the point. */
const positional = (decimal: DecimalDigits, precision: number): string => {
  let text = '';
  if (decimal.point > 0) {
    for (let index = 0; index < decimal.point; index++) {
      text += digitAt(decimal.digits, index);
    }
  } else {
    text = '0';
  }
  if (precision > 0) {
    text += '.';
    for (let index = 1; index <= precision; index++) {
      text += digitAt(decimal.digits, decimal.point + index - 1);
    }
  }
  return text;
};

const formatDigits = (
  decimal: DecimalDigits,
  format: Exclude<FloatFormat, 'b'>,
  precision: number,
  shortest: boolean,
): string => {
  switch (format) {
    case 'e':
    case 'E': {
      return scientific(decimal, precision, format);
    }
    case 'f': {
      return positional(decimal, precision);
    }
    case 'g':
    case 'G': {
      let exponentPrecision = precision;
      if (exponentPrecision > decimal.digits.length && decimal.digits.length >= decimal.point) {
        exponentPrecision = decimal.digits.length;
      }
      // shortest output switches to exponent form at 1e+06
      if (shortest) {
        exponentPrecision = 6;
      }
      const exponent = decimal.point - 1;
      if (exponent < -4 || exponent >= exponentPrecision) {
        const significant = Math.min(precision, decimal.digits.length);
        return scientific(decimal, significant - 1, format === 'g' ? 'e' : 'E');
      }
      const fractionDigits = precision > decimal.point ? decimal.digits.length : precision;
      return positional(decimal, Math.max(fractionDigits - decimal.point, 0));
    }
  }
};

const binaryExponentForm = (value: number, bitSize: FloatBitSize): string => {
  if (bitSize === 32) {
    const view = new DataView(new ArrayBuffer(4));
    view.setFloat32(0, value);
    const bits = view.getUint32(0);
    const biased = (bits >>> 23) & 0xff;
    const fraction = bits & 0x7f_ff_ff;
    const mantissa = biased === 0 ? fraction : fraction | 0x80_00_00;
    const exponent = (biased === 0 ? 1 : biased) - 127 - 23;
    return `${mantissa}p${exponent < 0 ? '' : '+'}${exponent}`;
  }
  const { mantissa, exponent } = decomposeFloat64(value);
  return `${mantissa}p${exponent < 0 ? '' : '+'}${exponent}`;
};

/**
 * Text of a floating point value in one of the `strconv`-style formats.
 *
 * A negative `precision` selects the shortest digits that round-trip at
 * `bitSize`. Infinities render as `+Inf` / `-Inf` and NaN as `NaN`;
 * negative zero keeps its sign.
 *
 * @param value - Value to format; callers pass `Math.fround`-ed values for 32-bit floats.
 * @param format - `b`, `e`, `E`, `f`, `g` or `G`.
 * @param precision - Digits after the point (`e`, `f`) or significant digits (`g`).
 * @param bitSize - Precision of the source value.
 * @returns The formatted number with a leading `-` when negative.
 */
export function formatFloatText(
  value: number,
  format: FloatFormat,
  precision: number,
  bitSize: FloatBitSize,
): string {
  if (Number.isNaN(value)) {
    return 'NaN';
  }
  if (value === Number.POSITIVE_INFINITY) {
    return '+Inf';
  }
  if (value === Number.NEGATIVE_INFINITY) {
    return '-Inf';
  }
  const sign = value < 0 || Object.is(value, -0) ? '-' : '';
  if (format === 'b') {
    return sign + binaryExponentForm(Math.abs(value), bitSize);
  }

  const shortest = precision < 0;
  let decimal: DecimalDigits;
  let digitsPrecision = precision;
  if (shortest) {
    decimal = shortestDecimal(value, bitSize);
    switch (format) {
      case 'e':
      case 'E': {
        digitsPrecision = Math.max(decimal.digits.length - 1, 0);
        break;
      }
      case 'f': {
        digitsPrecision = Math.max(decimal.digits.length - decimal.point, 0);
        break;
      }
      default: {
        digitsPrecision = decimal.digits.length;
      }
    }
  } else {
    const exact = exactDecimal(value);
    switch (format) {
      case 'e':
      case 'E': {
        decimal = roundDecimal(exact, precision + 1);
        break;
      }
      case 'f': {
        decimal = roundDecimal(exact, exact.point + precision);
        break;
      }
      default: {
        digitsPrecision = precision === 0 ? 1 : precision;
        decimal = roundDecimal(exact, digitsPrecision);
      }
    }
  }
  return sign + formatDigits(decimal, format, digitsPrecision, shortest);
}
