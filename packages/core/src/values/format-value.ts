export type SignedIntegerType = 'int' | 'int8' | 'int16' | 'int32' | 'int64';
export type UnsignedIntegerType = 'uint' | 'uint8' | 'uint16' | 'uint32' | 'uint64' | 'uintptr';
export type IntegerType = SignedIntegerType | UnsignedIntegerType;

/** Sized integer. `value` is already wrapped to the type's range. */
export interface IntegerValue {
  readonly kind: 'integer';
  readonly type: IntegerType;
  readonly value: bigint;
}

/**
 * Plain JavaScript number whose kind is decided by the verb: integral
 * values format as `int` unless a floating point verb asks otherwise.
 */
export interface NumberValue {
  readonly kind: 'number';
  readonly value: number;
}

export interface FloatValue {
  readonly kind: 'float';
  readonly bitSize: 32 | 64;
  readonly value: number;
}

export interface ComplexValue {
  readonly kind: 'complex';
  readonly bitSize: 64 | 128;
  readonly real: number;
  readonly imag: number;
}

export interface BooleanValue {
  readonly kind: 'boolean';
  readonly value: boolean;
}

export interface StringValue {
  readonly kind: 'string';
  readonly value: string;
}

/** Byte sequence; `fixedLength` distinguishes `[N]uint8` arrays from `[]byte` slices. */
export interface BytesValue {
  readonly kind: 'bytes';
  readonly value: Uint8Array;
  readonly fixedLength: boolean;
}

/** Opaque address with a declared pointer type such as `*int`. Address 0 is nil. */
export interface PointerValue {
  readonly kind: 'pointer';
  readonly type: string;
  readonly address: bigint;
}

/** A type descriptor; `%T` prints `type`, `%v` prints the name. */
export interface TypeValue {
  readonly kind: 'type';
  readonly name: string;
}

export interface NilValue {
  readonly kind: 'nil';
}

/**
 * Ordered collection. `elements` keeps the caller's array so that
 * self-referencing lists can be detected by identity.
 */
export interface ListValue {
  readonly kind: 'list';
  readonly elementType: string;
  readonly length: number | undefined;
  readonly elements: readonly FormatArgument[];
}

export type FormatValue =
  | IntegerValue
  | NumberValue
  | FloatValue
  | ComplexValue
  | BooleanValue
  | StringValue
  | BytesValue
  | PointerValue
  | TypeValue
  | NilValue
  | ListValue;

export type FormatValueKind = FormatValue['kind'];

/**
 * Anything accepted as a formatting argument. Plain values are converted
 * with {@link toFormatValue}.
 */
export type FormatArgument =
  | FormatValue
  | number
  | bigint
  | string
  | boolean
  | null
  | undefined
  | Uint8Array
  | readonly FormatArgument[];

const SIGNED_TYPES: ReadonlySet<IntegerType> = new Set(['int', 'int8', 'int16', 'int32', 'int64']);

export const isSignedIntegerType = (type: IntegerType): type is SignedIntegerType =>
  SIGNED_TYPES.has(type);

export const INTEGER_BITS: Readonly<Record<IntegerType, number>> = {
  int: 64,
  int8: 8,
  int16: 16,
  int32: 32,
  int64: 64,
  uint: 64,
  uint8: 8,
  uint16: 16,
  uint32: 32,
  uint64: 64,
  uintptr: 64,
};

export const NIL: NilValue = Object.freeze({ kind: 'nil' });

const isFormatArgumentList = (
  argument: FormatArgument,
): argument is readonly FormatArgument[] => Array.isArray(argument);

/**
 * Converts a plain argument into its tagged form.
 * @param argument - Tagged value or plain JavaScript value.
 * @returns The tagged value.
 */
export function toFormatValue(argument: FormatArgument): FormatValue {
  if (argument === null || argument === undefined) {
    return NIL;
  }
  switch (typeof argument) {
    case 'number': {
      return { kind: 'number', value: argument };
    }
    case 'bigint': {
      return { kind: 'integer', type: 'int', value: BigInt.asIntN(64, argument) };
    }
    case 'string': {
      return { kind: 'string', value: argument };
    }
    case 'boolean': {
      return { kind: 'boolean', value: argument };
    }
    default: {
      break;
    }
  }
  if (argument instanceof Uint8Array) {
    return { kind: 'bytes', value: argument, fixedLength: false };
  }
  if (isFormatArgumentList(argument)) {
    return { kind: 'list', elementType: 'interface {}', length: undefined, elements: argument };
  }
  return argument;
}

const FLOAT_VERBS: ReadonlySet<string> = new Set(['e', 'E', 'f', 'F', 'g', 'G']);

/**
 * Settles the kind of a plain number for a verb: safe integers format as
 * `int` except under floating point verbs; everything else is `float64`.
 */
export function classifyNumber(value: NumberValue, verb: string): IntegerValue | FloatValue {
  if (Number.isSafeInteger(value.value) && !FLOAT_VERBS.has(verb)) {
    return { kind: 'integer', type: 'int', value: BigInt(value.value) };
  }
  return { kind: 'float', bitSize: 64, value: value.value };
}

/**
 * The type name printed by `%T`, `%#v` and diagnostics.
 * @param value - Tagged value.
 */
export function typeNameOf(value: FormatValue): string {
  switch (value.kind) {
    case 'integer': {
      return value.type;
    }
    case 'number': {
      return Number.isSafeInteger(value.value) ? 'int' : 'float64';
    }
    case 'float': {
      return `float${value.bitSize}`;
    }
    case 'complex': {
      return `complex${value.bitSize}`;
    }
    case 'boolean': {
      return 'bool';
    }
    case 'string': {
      return 'string';
    }
    case 'bytes': {
      return value.fixedLength ? `[${value.value.length}]uint8` : '[]uint8';
    }
    case 'pointer': {
      return value.type;
    }
    case 'type': {
      return 'type';
    }
    case 'nil': {
      return '<nil>';
    }
    case 'list': {
      return value.length === undefined
        ? `[]${value.elementType}`
        : `[${value.length}]${value.elementType}`;
    }
  }
}
