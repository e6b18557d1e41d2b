import { padField, type MeasureColumns } from '../padding/pad-field.js';
import { isPrintable, quoteCodePoint } from '../text/quote.js';
import { isSurrogate, MAX_CODE_POINT, REPLACEMENT_CHARACTER } from '../text/utf8.js';
import { isSignedIntegerType, type IntegerValue } from '../values/format-value.js';
import type { FieldState } from './field.js';
import { fromVerbTable, type VerbHandler } from './kind-renderer.js';
import { textBody } from './rendered.js';

export type IntegerBase = 2 | 8 | 10 | 16;

/**
 * Integer digits with precision, zero fill, base prefix and sign applied.
 *
 * Precision is a minimum digit count; precision 0 renders zero as nothing.
 * Zero padding counts as precision, so it lands between the sign or prefix
 * and the digits.
 *
 * @param value - Signed value.
 * @param base - Radix.
 * @param verb - `X` selects upper-case digits and `O` the `0o` prefix.
 * @param field - Flags and sizes.
 * @param measure - Column measure used for padding.
 */
export function formatIntegerText(
  value: bigint,
  base: IntegerBase,
  verb: string,
  field: FieldState,
  measure: MeasureColumns,
): string {
  const spaceOnly = { ...field, zero: false };
  const negative = value < 0n;
  let precision = 0;
  if (field.precision !== undefined) {
    precision = field.precision;
    if (precision === 0 && value === 0n) {
      return padField('', spaceOnly, 'none', measure);
    }
  } else if (field.zero && field.width !== undefined) {
    precision = field.width;
    if (negative || field.plus || field.space) {
      precision--;
    }
  }

  let digits = (negative ? -value : value).toString(base);
  if (verb === 'X') {
    digits = digits.toUpperCase();
  }
  if (digits.length < precision) {
    digits = '0'.repeat(precision - digits.length) + digits;
  }

  let prefix = '';
  if (field.sharp) {
    if (base === 2) {
      prefix = '0b';
    } else if (base === 8 && !digits.startsWith('0')) {
      prefix = '0';
    } else if (base === 16) {
      prefix = verb === 'X' ? '0X' : '0x';
    }
  }
  if (verb === 'O') {
    prefix = `0o${prefix}`;
  }

  let sign = '';
  if (negative) {
    sign = '-';
  } else if (field.plus) {
    sign = '+';
  } else if (field.space) {
    sign = ' ';
  }
  return padField(sign + prefix + digits, spaceOnly, 'none', measure);
}

/**
 * Hexadecimal with an optional `0x` prefix, as used for pointers and `%#v` bytes.
 */
export function formatHex0x(
  value: bigint,
  leading0x: boolean,
  field: FieldState,
  measure: MeasureColumns,
): string {
  return formatIntegerText(value, 16, 'v', { ...field, sharp: leading0x }, measure);
}

const toCodePoint = (value: bigint): number => {
  const unsigned = BigInt.asUintN(64, value);
  if (unsigned > BigInt(MAX_CODE_POINT)) {
    return REPLACEMENT_CHARACTER;
  }
  return Number(unsigned);
};

/** `U+` and at least four upper-case hex digits, optionally followed by the quoted character. */
export function formatUnicode(value: bigint, field: FieldState, measure: MeasureColumns): string {
  const unsigned = BigInt.asUintN(64, value);
  const minimumDigits = field.precision !== undefined && field.precision > 4 ? field.precision : 4;
  let text = `U+${unsigned.toString(16).toUpperCase().padStart(minimumDigits, '0')}`;
  if (field.sharp && unsigned <= BigInt(MAX_CODE_POINT) && isPrintable(Number(unsigned))) {
    text += ` '${String.fromCodePoint(Number(unsigned))}'`;
  }
  return padField(text, { ...field, zero: false }, 'none', measure);
}

const withBase =
  (base: IntegerBase): VerbHandler<IntegerValue> =>
  (value, field, renderer, verb) =>
    textBody(formatIntegerText(value.value, base, verb, field, renderer.measure));

const INTEGER_VERBS: ReadonlyMap<string, VerbHandler<IntegerValue>> = new Map<
  string,
  VerbHandler<IntegerValue>
>([
  [
    'v',
    (value, field, renderer) =>
      textBody(
        field.sharpV && !isSignedIntegerType(value.type)
          ? formatHex0x(value.value, true, field, renderer.measure)
          : formatIntegerText(value.value, 10, 'v', field, renderer.measure),
      ),
  ],
  ['d', withBase(10)],
  ['b', withBase(2)],
  ['o', withBase(8)],
  ['O', withBase(8)],
  ['x', withBase(16)],
  ['X', withBase(16)],
  [
    'c',
    (value, field, renderer) => {
      const codePoint = toCodePoint(value.value);
      const character = String.fromCodePoint(
        isSurrogate(codePoint) ? REPLACEMENT_CHARACTER : codePoint,
      );
      return textBody(renderer.pad(character, field, 'leading'));
    },
  ],
  [
    'q',
    (value, field, renderer) =>
      textBody(renderer.pad(quoteCodePoint(toCodePoint(value.value), field.plus), field, 'leading')),
  ],
  ['U', (value, field, renderer) => textBody(formatUnicode(value.value, field, renderer.measure))],
]);

export const renderInteger = fromVerbTable(INTEGER_VERBS);
