import { z } from 'zod';

import eastAsianWidthData from './east-asian-width.json' with { type: 'json' };

/** Inclusive code point range `[first, last]`. */
export type CodePointRange = readonly [first: number, last: number];

const codePointSchema = z.number().int().min(0).max(0x10_ff_ff);

const rangeListSchema = z
  .array(z.tuple([codePointSchema, codePointSchema]))
  .superRefine((ranges, context) => {
    let previousLast = -1;
    for (const [index, [first, last]] of ranges.entries()) {
      if (first > last || first <= previousLast) {
        context.addIssue({
          code: z.ZodIssueCode.custom,
          message: `range ${index} is empty or out of order`,
          path: [index],
        });
      }
      previousLast = last;
    }
  });

const widthTableSchema = z.object({
  unicodeVersion: z.string().min(1),
  zero: rangeListSchema,
  wide: rangeListSchema,
  pictographic: rangeListSchema.default([]),
  ambiguous: rangeListSchema,
});

export interface WidthTable {
  readonly unicodeVersion: string;
  /** Combining marks, format characters, variation selectors and C0/C1 controls other than TAB. */
  readonly zero: readonly CodePointRange[];
  /** East Asian Wide and Fullwidth. */
  readonly wide: readonly CodePointRange[];
  /**
   * Emoji-capable pictographs in Miscellaneous Symbols and Dingbats that are
   * East Asian Neutral but render two columns wide in terminals.
   */
  readonly pictographic: readonly CodePointRange[];
  /** East Asian Ambiguous. */
  readonly ambiguous: readonly CodePointRange[];
}

/**
 * Parses a width table document, rejecting overlapping or unsorted ranges.
 * @param document - Untrusted table contents.
 * @returns The validated table.
 */
export function parseWidthTable(document: unknown): WidthTable {
  return widthTableSchema.parse(document);
}

/** The table bundled with the package, pinned to the Unicode version it records. */
export const EAST_ASIAN_WIDTH_TABLE: WidthTable = parseWidthTable(eastAsianWidthData);

/**
 * Binary search over sorted, non-overlapping ranges.
 * @param ranges - Ranges ordered by first code point.
 * @param codePoint - Code point to look up.
 * @returns `true` when a range contains the code point.
 */
export function rangesContain(ranges: readonly CodePointRange[], codePoint: number): boolean {
  let low = 0;
  let high = ranges.length - 1;
  while (low <= high) {
    const middle = (low + high) >>> 1;
    const range = ranges[middle];
    if (range === undefined) {
      return false;
    }
    if (codePoint < range[0]) {
      high = middle - 1;
    } else if (codePoint > range[1]) {
      low = middle + 1;
    } else {
      return true;
    }
  }
  return false;
}
