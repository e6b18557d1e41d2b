import { formatFloatText, type FloatBitSize, type FloatFormat } from '../numeric/float-text.js';
import { padField, type MeasureColumns } from '../padding/pad-field.js';
import type { ComplexValue, FloatValue } from '../values/format-value.js';
import type { FieldState } from './field.js';
import { fromVerbTable, type VerbHandler } from './kind-renderer.js';
import { textBody } from './rendered.js';

interface FloatVerb {
  readonly format: FloatFormat;
  /** Precision used when the directive gives none; -1 means shortest. */
  readonly precision: number;
}

const FLOAT_VERBS: ReadonlyMap<string, FloatVerb> = new Map<string, FloatVerb>([
  ['v', { format: 'g', precision: -1 }],
  ['b', { format: 'b', precision: -1 }],
  ['g', { format: 'g', precision: -1 }],
  ['G', { format: 'G', precision: -1 }],
  ['e', { format: 'e', precision: 6 }],
  ['E', { format: 'E', precision: 6 }],
  ['f', { format: 'f', precision: 6 }],
  ['F', { format: 'f', precision: 6 }],
]);

/** Applies `#`: keep the decimal point and, for `g`, pad to the significant digit count. */
const alternateForm = (num: string, format: FloatFormat, precision: number): string => {
  let remaining = 0;
  if (format === 'g' || format === 'G') {
    remaining = precision === -1 ? 6 : precision;
  }
  let body = num;
  let tail = '';
  let sawPoint = false;
  let sawNonzero = false;
  for (let index = 1; index < num.length; index++) {
    const character = num.charAt(index);
    if (character === '.') {
      sawPoint = true;
    } else if (character === 'e' || character === 'E' || character === 'p' || character === 'P') {
      tail = num.slice(index);
      body = num.slice(0, index);
      break;
    } else {
      if (character !== '0') {
        sawNonzero = true;
      }
      if (sawNonzero) {
        remaining--;
      }
    }
  }
  if (!sawPoint) {
    if (body.length === 2 && body.charAt(1) === '0') {
      remaining--;
    }
    body += '.';
  }
  if (remaining > 0) {
    body += '0'.repeat(remaining);
  }
  return body + tail;
};

/**
 * One floating point field: sign handling, `#` alternate form and padding.
 *
 * Zero padding goes after the sign; infinities and NaN never zero-pad, and
 * NaN shows a sign only when `+` or space asks for one.
 *
 * @param value - The value, already rounded to `bitSize`.
 * @param bitSize - 32 or 64.
 * @param verb - Float verb settings.
 * @param field - Flags and sizes.
 * @param measure - Column measure.
 */
export function formatFloatField(
  value: number,
  bitSize: FloatBitSize,
  verb: FloatVerb,
  field: FieldState,
  measure: MeasureColumns,
): string {
  const precision = field.precision ?? verb.precision;
  let num = formatFloatText(value, verb.format, precision, bitSize);
  if (!num.startsWith('-') && !num.startsWith('+')) {
    num = `+${num}`;
  }
  if (field.space && num.startsWith('+') && !field.plus) {
    num = ` ${num.slice(1)}`;
  }

  const special = num.charAt(1);
  if (special === 'I' || special === 'N') {
    if (special === 'N' && !field.space && !field.plus) {
      num = num.slice(1);
    }
    return padField(num, { ...field, zero: false }, 'none', measure);
  }

  if (field.sharp && verb.format !== 'b') {
    num = alternateForm(num, verb.format, precision);
  }

  if (field.plus || !num.startsWith('+')) {
    return padField(num, field, 'after-sign', measure);
  }
  return padField(num.slice(1), field, 'leading', measure);
}

const FLOAT_HANDLERS = new Map<string, VerbHandler<FloatValue>>();
for (const [verb, settings] of FLOAT_VERBS) {
  FLOAT_HANDLERS.set(verb, (value, field, renderer) =>
    textBody(formatFloatField(value.value, value.bitSize, settings, field, renderer.measure)),
  );
}

export const renderFloat = fromVerbTable<FloatValue>(FLOAT_HANDLERS);

const COMPLEX_HANDLERS = new Map<string, VerbHandler<ComplexValue>>();
for (const [verb, settings] of FLOAT_VERBS) {
  COMPLEX_HANDLERS.set(verb, (value, field, renderer) => {
    const partSize: FloatBitSize = value.bitSize === 64 ? 32 : 64;
    const real = formatFloatField(value.real, partSize, settings, field, renderer.measure);
    const imag = formatFloatField(
      value.imag,
      partSize,
      settings,
      { ...field, plus: true },
      renderer.measure,
    );
    return textBody(`(${real}${imag}i)`);
  });
}

export const renderComplex = fromVerbTable<ComplexValue>(COMPLEX_HANDLERS);
