/**
 * Flags and sizes in effect while rendering one operand. `sharpV` is the
 * `#` flag as seen by the `v` verb, which reads it as "literal syntax"
 * instead of "alternate form".
 */
export interface FieldState {
  readonly plus: boolean;
  readonly minus: boolean;
  readonly space: boolean;
  readonly sharp: boolean;
  readonly zero: boolean;
  readonly sharpV: boolean;
  readonly width: number | undefined;
  readonly precision: number | undefined;
}

export const PLAIN_FIELD: FieldState = {
  plus: false,
  minus: false,
  space: false,
  sharp: false,
  zero: false,
  sharpV: false,
  width: undefined,
  precision: undefined,
};

/**
 * Moves `#` and `+` out of the way for the `v` verb.
 * @param field - Field as resolved from the directive.
 */
export function fieldForVerbV(field: FieldState): FieldState {
  return { ...field, sharpV: field.sharp, sharp: false, plus: false };
}
