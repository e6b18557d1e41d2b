import { encodeUtf8 } from '../text/utf8.js';
import {
  INTEGER_BITS,
  isSignedIntegerType,
  NIL,
  type BooleanValue,
  type BytesValue,
  type ComplexValue,
  type FloatValue,
  type FormatArgument,
  type IntegerType,
  type IntegerValue,
  type ListValue,
  type NilValue,
  type PointerValue,
  type StringValue,
  type TypeValue,
} from './format-value.js';

const toBigInt = (type: IntegerType, value: number | bigint): bigint => {
  if (typeof value === 'bigint') {
    return value;
  }
  if (!Number.isInteger(value)) {
    throw new RangeError(`${type} requires an integral value, received ${value}`);
  }
  return BigInt(value);
};

/**
 * Builds a sized integer, wrapping out-of-range input the way fixed-width
 * two's complement arithmetic does.
 * @param type - Integer type name.
 * @param value - Integral number or bigint.
 */
export function integer(type: IntegerType, value: number | bigint): IntegerValue {
  const bits = INTEGER_BITS[type];
  const raw = toBigInt(type, value);
  return {
    kind: 'integer',
    type,
    value: isSignedIntegerType(type) ? BigInt.asIntN(bits, raw) : BigInt.asUintN(bits, raw),
  };
}

export const int = (value: number | bigint): IntegerValue => integer('int', value);
export const int8 = (value: number | bigint): IntegerValue => integer('int8', value);
export const int16 = (value: number | bigint): IntegerValue => integer('int16', value);
export const int32 = (value: number | bigint): IntegerValue => integer('int32', value);
export const int64 = (value: number | bigint): IntegerValue => integer('int64', value);
export const uint = (value: number | bigint): IntegerValue => integer('uint', value);
export const uint8 = (value: number | bigint): IntegerValue => integer('uint8', value);
export const uint16 = (value: number | bigint): IntegerValue => integer('uint16', value);
export const uint32 = (value: number | bigint): IntegerValue => integer('uint32', value);
export const uint64 = (value: number | bigint): IntegerValue => integer('uint64', value);
export const uintptr = (value: number | bigint): IntegerValue => integer('uintptr', value);
export const byte = uint8;

/**
 * A character, stored as an `int32` code point.
 * @param value - Code point, or a string whose first code point is used.
 */
export function rune(value: number | string): IntegerValue {
  if (typeof value === 'string') {
    const codePoint = value.codePointAt(0);
    if (codePoint === undefined) {
      throw new RangeError('rune requires a non-empty string');
    }
    return integer('int32', codePoint);
  }
  return integer('int32', value);
}

export const float64 = (value: number): FloatValue => ({ kind: 'float', bitSize: 64, value });

/** Rounds to single precision on construction. */
export const float32 = (value: number): FloatValue => ({
  kind: 'float',
  bitSize: 32,
  value: Math.fround(value),
});

export const complex128 = (real: number, imag: number): ComplexValue => ({
  kind: 'complex',
  bitSize: 128,
  real,
  imag,
});

export const complex64 = (real: number, imag: number): ComplexValue => ({
  kind: 'complex',
  bitSize: 64,
  real: Math.fround(real),
  imag: Math.fround(imag),
});

export const bool = (value: boolean): BooleanValue => ({ kind: 'boolean', value });

export const str = (value: string): StringValue => ({ kind: 'string', value });

type ByteSource = Uint8Array | readonly number[] | string;

const toBytes = (source: ByteSource): Uint8Array => {
  if (typeof source === 'string') {
    return encodeUtf8(source);
  }
  return source instanceof Uint8Array ? source : Uint8Array.from(source);
};

/**
 * A byte slice (`[]byte`). Strings are UTF-8 encoded; numbers are truncated to 8 bits.
 */
export const bytes = (source: ByteSource): BytesValue => ({
  kind: 'bytes',
  value: toBytes(source),
  fixedLength: false,
});

/** A fixed-length byte array (`[N]uint8`). */
export const byteArray = (source: ByteSource): BytesValue => ({
  kind: 'bytes',
  value: toBytes(source),
  fixedLength: true,
});

/**
 * An opaque pointer.
 * @param type - Declared pointer type, e.g. `*int`.
 * @param address - Address; 0 is nil.
 */
export const pointer = (type: string, address: number | bigint): PointerValue => ({
  kind: 'pointer',
  type,
  address: BigInt.asUintN(64, toBigInt('uintptr', address)),
});

export const nilPointer = (type: string): PointerValue => ({ kind: 'pointer', type, address: 0n });

export const typeName = (name: string): TypeValue => ({ kind: 'type', name });

export const nil = (): NilValue => NIL;

/**
 * A slice (`[]T`) of arguments.
 * @param elements - Elements, tagged or plain.
 * @param elementType - Element type used by `%T` and `%#v`.
 */
export const list = (
  elements: readonly FormatArgument[],
  elementType = 'interface {}',
): ListValue => ({ kind: 'list', elementType, length: undefined, elements });

/** A fixed-length array (`[N]T`) of arguments. */
export const array = (
  elements: readonly FormatArgument[],
  elementType = 'interface {}',
): ListValue => ({ kind: 'list', elementType, length: elements.length, elements });
