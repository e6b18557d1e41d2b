import { padField, type MeasureColumns } from '../padding/pad-field.js';
import { canBackquote, quoteUnits } from '../text/quote.js';
import { decodeUtf8, encodeUtf8, textUnits, unitsToString, type TextUnit } from '../text/utf8.js';
import type {
  BooleanValue,
  BytesValue,
  NilValue,
  StringValue,
  TypeValue,
} from '../values/format-value.js';
import type { FieldState } from './field.js';
import { formatHex0x, renderInteger } from './integer.js';
import { fromVerbTable, type KindRenderer, type VerbHandler } from './kind-renderer.js';
import { textBody } from './rendered.js';

const truncate = (units: readonly TextUnit[], field: FieldState): readonly TextUnit[] =>
  field.precision !== undefined && field.precision < units.length
    ? units.slice(0, field.precision)
    : units;

/** Plain text cut to the precision in code points, then padded. */
export function formatText(
  units: readonly TextUnit[],
  field: FieldState,
  measure: MeasureColumns,
): string {
  return padField(unitsToString(truncate(units, field)), field, 'leading', measure);
}

/** Quoted text: back quotes under `#` when possible, `\u` escapes under `+`. */
export function formatQuoted(
  units: readonly TextUnit[],
  field: FieldState,
  measure: MeasureColumns,
): string {
  const kept = truncate(units, field);
  const quoted =
    field.sharp && canBackquote(kept)
      ? `\`${unitsToString(kept)}\``
      : quoteUnits(kept, field.plus);
  return padField(quoted, field, 'leading', measure);
}

/**
 * Hex dump of bytes. Precision limits the bytes used. The space flag
 * separates bytes, and with `#` every byte gets its own `0x`.
 */
export function formatHexBytes(
  bytes: Uint8Array,
  upper: boolean,
  field: FieldState,
  measure: MeasureColumns,
): string {
  const length =
    field.precision !== undefined && field.precision < bytes.length ? field.precision : bytes.length;
  if (length === 0) {
    return padField('', field, 'leading', measure);
  }
  const prefix = upper ? '0X' : '0x';
  let text = field.sharp ? prefix : '';
  for (let index = 0; index < length; index++) {
    if (field.space && index > 0) {
      text += field.sharp ? ` ${prefix}` : ' ';
    }
    const hex = (bytes[index] ?? 0).toString(16).padStart(2, '0');
    text += upper ? hex.toUpperCase() : hex;
  }
  return padField(text, field, 'leading', measure);
}

const STRING_VERBS: ReadonlyMap<string, VerbHandler<StringValue>> = new Map<
  string,
  VerbHandler<StringValue>
>([
  [
    'v',
    (value, field, renderer) =>
      textBody(
        field.sharpV
          ? formatQuoted(textUnits(value.value), field, renderer.measure)
          : formatText(textUnits(value.value), field, renderer.measure),
      ),
  ],
  ['s', (value, field, renderer) => textBody(formatText(textUnits(value.value), field, renderer.measure))],
  [
    'q',
    (value, field, renderer) => textBody(formatQuoted(textUnits(value.value), field, renderer.measure)),
  ],
  [
    'x',
    (value, field, renderer) =>
      textBody(formatHexBytes(encodeUtf8(value.value), false, field, renderer.measure)),
  ],
  [
    'X',
    (value, field, renderer) =>
      textBody(formatHexBytes(encodeUtf8(value.value), true, field, renderer.measure)),
  ],
]);

export const renderString = fromVerbTable(STRING_VERBS);

const bytesLiteral = (value: BytesValue, field: FieldState, measure: MeasureColumns): string => {
  const typeText = value.fixedLength ? `[${value.value.length}]uint8` : '[]byte';
  const elements = [...value.value].map((byte) => formatHex0x(BigInt(byte), true, field, measure));
  return `${typeText}{${elements.join(', ')}}`;
};

/**
 * Bytes print as text under `s` and `q`, as a hex dump under `x` and `X`,
 * as a literal under `#v`, and element by element otherwise.
 */
export const renderBytes: KindRenderer<BytesValue> = (value, verb, field, renderer, depth) => {
  switch (verb) {
    case 's': {
      return textBody(formatText([...decodeUtf8(value.value)], field, renderer.measure));
    }
    case 'q': {
      return textBody(formatQuoted([...decodeUtf8(value.value)], field, renderer.measure));
    }
    case 'x':
    case 'X': {
      return textBody(formatHexBytes(value.value, verb === 'X', field, renderer.measure));
    }
    default: {
      break;
    }
  }
  if (field.sharpV && (verb === 'v' || verb === 'd')) {
    return textBody(bytesLiteral(value, field, renderer.measure));
  }
  const elementVerb = verb === 'v' ? 'd' : verb;
  const elements: string[] = [];
  for (const byte of value.value) {
    const element = renderInteger(
      { kind: 'integer', type: 'uint8', value: BigInt(byte) },
      elementVerb,
      field,
      renderer,
      depth + 1,
    );
    elements.push(element.text);
  }
  return textBody(`[${elements.join(' ')}]`);
};

export const renderBoolean = fromVerbTable<BooleanValue>(
  new Map<string, VerbHandler<BooleanValue>>([
    ['t', (value, field, renderer) => textBody(renderer.pad(String(value.value), field, 'leading'))],
    ['v', (value, field, renderer) => textBody(renderer.pad(String(value.value), field, 'leading'))],
  ]),
);

export const renderType = fromVerbTable<TypeValue>(
  new Map<string, VerbHandler<TypeValue>>([
    ['v', (value, field, renderer) => textBody(formatText(textUnits(value.name), field, renderer.measure))],
    ['s', (value, field, renderer) => textBody(formatText(textUnits(value.name), field, renderer.measure))],
    [
      'q',
      (value, field, renderer) => textBody(formatQuoted(textUnits(value.name), field, renderer.measure)),
    ],
  ]),
);

export const renderNil = fromVerbTable<NilValue>(
  new Map<string, VerbHandler<NilValue>>([
    ['v', (_value, field, renderer) => textBody(renderer.pad('<nil>', field, 'leading'))],
  ]),
);
