/**
 * Display-column measurement for monospace terminals.
 *
 * Width rules, checked in order:
 *   - printable ASCII: 1 column
 *   - zero-width table (combining marks, format characters, variation
 *     selectors, C0/C1 controls): 0 columns; TAB counts as 1
 *   - East Asian Wide and Fullwidth: 2 columns
 *   - pictographs in U+2600..U+27BF that are not Ambiguous (☺, ☀, ✈): 2 columns
 *   - East Asian Ambiguous: 1 column, or 2 when `ambiguousWidth` is 2
 *   - everything else, including lone surrogates: 1 column
 *
 * Measurement is per code point. Grapheme clusters are not merged, so an
 * emoji followed by a variation selector measures as the emoji alone.
 */

import { EAST_ASIAN_WIDTH_TABLE, rangesContain, type WidthTable } from './width-table.js';

export type ColumnWidth = 0 | 1 | 2;

export interface ColumnOptions {
  /** Columns assigned to East Asian Ambiguous characters. Defaults to 1. */
  readonly ambiguousWidth?: 1 | 2;
  /** Alternate table, mainly for tests. */
  readonly table?: WidthTable;
}

/**
 * Columns occupied by a single code point.
 * @param codePoint - Unicode scalar value or lone surrogate.
 * @param options - Ambiguous-width policy and table override.
 * @returns 0, 1 or 2.
 */
export function codePointColumns(codePoint: number, options: ColumnOptions = {}): ColumnWidth {
  if (codePoint >= 0x20 && codePoint < 0x7f) {
    return 1;
  }
  const table = options.table ?? EAST_ASIAN_WIDTH_TABLE;
  if (rangesContain(table.zero, codePoint)) {
    return 0;
  }
  if (rangesContain(table.wide, codePoint) || rangesContain(table.pictographic, codePoint)) {
    return 2;
  }
  if (rangesContain(table.ambiguous, codePoint)) {
    return options.ambiguousWidth ?? 1;
  }
  return 1;
}

/**
 * Sum of {@link codePointColumns} over every code point of `text`.
 * @param text - Text to measure.
 * @param options - Ambiguous-width policy and table override.
 * @returns Display columns.
 */
export function stringColumns(text: string, options: ColumnOptions = {}): number {
  let columns = 0;
  for (const character of text) {
    const codePoint = character.codePointAt(0);
    if (codePoint !== undefined) {
      columns += codePointColumns(codePoint, options);
    }
  }
  return columns;
}

/**
 * Binds an ambiguous-width policy into a reusable measure function.
 * @param ambiguousWidth - Columns for East Asian Ambiguous characters.
 * @returns A measure function suitable for padding.
 */
export function createColumnMeasure(ambiguousWidth: 1 | 2 = 1): (text: string) => number {
  const options: ColumnOptions = { ambiguousWidth };
  return (text) => stringColumns(text, options);
}
