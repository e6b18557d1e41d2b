/**
 * One decoded unit of text. `byte` is set when the unit came from an
 * invalid UTF-8 byte, in which case `codePoint` is U+FFFD.
 */
export interface TextUnit {
  readonly codePoint: number;
  readonly byte?: number;
}

export const REPLACEMENT_CHARACTER = 0xff_fd;
export const MAX_CODE_POINT = 0x10_ff_ff;

export const isSurrogate = (codePoint: number): boolean =>
  codePoint >= 0xd8_00 && codePoint <= 0xdf_ff;

/** Scalar values only: in range and not a surrogate. */
export const isValidCodePoint = (codePoint: number): boolean =>
  codePoint >= 0 && codePoint <= MAX_CODE_POINT && !isSurrogate(codePoint);

const encoder = new TextEncoder();

export const encodeUtf8 = (text: string): Uint8Array => encoder.encode(text);

const isContinuation = (value: number | undefined): value is number =>
  value !== undefined && value >= 0x80 && value <= 0xbf;

/**
 * Decodes UTF-8, yielding one unit per code point and one replacement unit
 * per byte that does not start a well-formed sequence.
 * @param bytes - Possibly malformed UTF-8.
 */
export function* decodeUtf8(bytes: Uint8Array): Generator<TextUnit, void, undefined> {
  let index = 0;
  while (index < bytes.length) {
    const lead = bytes[index] ?? 0;
    if (lead < 0x80) {
      yield { codePoint: lead };
      index++;
      continue;
    }
    const second = bytes[index + 1];
    const third = bytes[index + 2];
    const fourth = bytes[index + 3];
    if (lead >= 0xc2 && lead <= 0xdf && isContinuation(second)) {
      yield { codePoint: ((lead & 0x1f) << 6) | (second & 0x3f) };
      index += 2;
      continue;
    }
    if (lead >= 0xe0 && lead <= 0xef && isContinuation(second) && isContinuation(third)) {
      const low = lead === 0xe0 ? 0xa0 : 0x80;
      const high = lead === 0xed ? 0x9f : 0xbf;
      if (second >= low && second <= high) {
        yield { codePoint: ((lead & 0x0f) << 12) | ((second & 0x3f) << 6) | (third & 0x3f) };
        index += 3;
        continue;
      }
    }
    if (
      lead >= 0xf0 &&
      lead <= 0xf4 &&
      isContinuation(second) &&
      isContinuation(third) &&
      isContinuation(fourth)
    ) {
      const low = lead === 0xf0 ? 0x90 : 0x80;
      const high = lead === 0xf4 ? 0x8f : 0xbf;
      if (second >= low && second <= high) {
        yield {
          codePoint:
            ((lead & 0x07) << 18) | ((second & 0x3f) << 12) | ((third & 0x3f) << 6) | (fourth & 0x3f),
        };
        index += 4;
        continue;
      }
    }
    yield { codePoint: REPLACEMENT_CHARACTER, byte: lead };
    index++;
  }
}

/**
 * Splits a string into code point units; lone surrogates stay as their own unit.
 * @param text - Source string.
 */
export function textUnits(text: string): TextUnit[] {
  const units: TextUnit[] = [];
  for (const character of text) {
    units.push({ codePoint: character.codePointAt(0) ?? REPLACEMENT_CHARACTER });
  }
  return units;
}

/**
 * Joins units back into a string. Invalid bytes become U+FFFD.
 * @param units - Units from {@link decodeUtf8} or {@link textUnits}.
 */
export function unitsToString(units: readonly TextUnit[]): string {
  let text = '';
  for (const unit of units) {
    text += String.fromCodePoint(unit.codePoint);
  }
  return text;
}
