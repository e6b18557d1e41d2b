/**
 * How zero padding applies to a body:
 * - `none`: always pad with spaces.
 * - `leading`: zeros go in front of the whole body.
 * - `after-sign`: zeros go between a leading `+`, `-` or space and the digits.
 */
export type ZeroFill = 'none' | 'leading' | 'after-sign';

export interface PaddingField {
  readonly width: number | undefined;
  readonly minus: boolean;
  readonly zero: boolean;
}

export type MeasureColumns = (text: string) => number;

const SIGNS: ReadonlySet<string> = new Set(['+', '-', ' ']);

/**
 * Pads a rendered body to the field width, measured in display columns.
 *
 * Left alignment always pads with spaces on the right. Bodies already as
 * wide as the field are returned unchanged.
 *
 * @param body - Rendered operand.
 * @param field - Width and alignment flags.
 * @param fill - Zero padding mode for the body's kind.
 * @param measure - Column measure.
 * @returns The padded text.
 */
export function padField(
  body: string,
  field: PaddingField,
  fill: ZeroFill,
  measure: MeasureColumns,
): string {
  if (field.width === undefined || field.width === 0) {
    return body;
  }
  const deficit = field.width - measure(body);
  if (deficit <= 0) {
    return body;
  }
  if (field.minus) {
    return body + ' '.repeat(deficit);
  }
  if (!field.zero || fill === 'none') {
    return ' '.repeat(deficit) + body;
  }
  const zeros = '0'.repeat(deficit);
  const sign = body.charAt(0);
  if (fill === 'after-sign' && SIGNS.has(sign)) {
    return sign + zeros + body.slice(1);
  }
  return zeros + body;
}
