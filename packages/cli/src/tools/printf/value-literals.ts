import {
  bool,
  bytes,
  float32,
  float64,
  integer,
  rune,
  str,
  type FormatArgument,
  type IntegerType,
} from '@widefmt/core';

/** A command line value that names a type but does not parse as one. */
export class ValueLiteralError extends Error {
  constructor(
    readonly literal: string,
    readonly expected: string,
  ) {
    super(`Invalid ${expected} literal: ${literal}`);
    this.name = 'ValueLiteralError';
  }
}

const INTEGER_TYPES: readonly IntegerType[] = [
  'int',
  'int8',
  'int16',
  'int32',
  'int64',
  'uint',
  'uint8',
  'uint16',
  'uint32',
  'uint64',
  'uintptr',
];

const isIntegerType = (name: string): name is IntegerType =>
  INTEGER_TYPES.some((type) => type === name);

const INTEGER_PATTERN = /^([+-]?)(0[xX][\dA-Fa-f]+|0[oO][0-7]+|0[bB][01]+|\d+)$/;
const FLOAT_PATTERN = /^[+-]?(?:\d+\.\d*|\.\d+|\d+)(?:[eE][+-]?\d+)?$/;
const RUNE_PATTERN = /^'(.)'$/u;
const HEX_BYTES_PATTERN = /^(?:[\dA-Fa-f]{2})*$/;

const SPECIAL_FLOATS: ReadonlyMap<string, number> = new Map([
  ['Inf', Number.POSITIVE_INFINITY],
  ['+Inf', Number.POSITIVE_INFINITY],
  ['-Inf', Number.NEGATIVE_INFINITY],
  ['NaN', Number.NaN],
]);

const parseInteger = (text: string): bigint | undefined => {
  const match = INTEGER_PATTERN.exec(text);
  if (match === null) {
    return undefined;
  }
  const [, sign, digits = ''] = match;
  const magnitude = BigInt(digits);
  return sign === '-' ? -magnitude : magnitude;
};

const parseFloatLiteral = (text: string): number | undefined => {
  const special = SPECIAL_FLOATS.get(text);
  if (special !== undefined) {
    return special;
  }
  return FLOAT_PATTERN.test(text) ? Number(text) : undefined;
};

const parseHexBytes = (text: string): Uint8Array | undefined => {
  if (!HEX_BYTES_PATTERN.test(text)) {
    return undefined;
  }
  const values: number[] = [];
  for (let index = 0; index < text.length; index += 2) {
    values.push(Number.parseInt(text.slice(index, index + 2), 16));
  }
  return Uint8Array.from(values);
};

const parseTyped = (type: string, literal: string): FormatArgument | undefined => {
  if (isIntegerType(type)) {
    const value = parseInteger(literal);
    if (value === undefined) {
      throw new ValueLiteralError(literal, type);
    }
    return integer(type, value);
  }
  switch (type) {
    case 'rune': {
      const value = parseInteger(literal);
      if (value !== undefined) {
        return integer('int32', value);
      }
      if ([...literal].length !== 1) {
        throw new ValueLiteralError(literal, type);
      }
      return rune(literal);
    }
    case 'float32':
    case 'float64': {
      const value = parseFloatLiteral(literal);
      if (value === undefined) {
        throw new ValueLiteralError(literal, type);
      }
      return type === 'float32' ? float32(value) : float64(value);
    }
    case 'bool': {
      if (literal !== 'true' && literal !== 'false') {
        throw new ValueLiteralError(literal, type);
      }
      return bool(literal === 'true');
    }
    case 'string': {
      return str(literal);
    }
    case 'bytes': {
      const value = parseHexBytes(literal);
      if (value === undefined) {
        throw new ValueLiteralError(literal, type);
      }
      return bytes(value);
    }
    default: {
      return undefined;
    }
  }
};

/**
 * Reads one command line value.
 *
 * - `nil`, `true` and `false`
 * - integers in decimal or with a `0x`, `0o` or `0b` prefix; these stay
 *   untyped, so float verbs still apply
 * - decimal floats, `Inf`, `-Inf` and `NaN`, as `float64`
 * - `'c'` for a single character
 * - `<type>:<literal>` for an explicitly typed value
 *
 * Anything else is a string.
 *
 * @throws {ValueLiteralError} When a typed literal does not parse as its type.
 */
export const parseValueLiteral = (text: string): FormatArgument => {
  switch (text) {
    case 'nil': {
      return null;
    }
    case 'true': {
      return true;
    }
    case 'false': {
      return false;
    }
    default: {
      break;
    }
  }

  const separator = text.indexOf(':');
  if (separator > 0) {
    const typed = parseTyped(text.slice(0, separator), text.slice(separator + 1));
    if (typed !== undefined) {
      return typed;
    }
  }

  const integerValue = parseInteger(text);
  if (integerValue !== undefined) {
    const inSafeRange =
      integerValue >= BigInt(Number.MIN_SAFE_INTEGER) &&
      integerValue <= BigInt(Number.MAX_SAFE_INTEGER);
    return inSafeRange ? Number(integerValue) : integerValue;
  }

  const floatValue = parseFloatLiteral(text);
  if (floatValue !== undefined) {
    return float64(floatValue);
  }

  const runeMatch = RUNE_PATTERN.exec(text);
  if (runeMatch?.[1] !== undefined) {
    return rune(runeMatch[1]);
  }

  return text;
};
