import type { Directive } from '../directive/directive.js';
import type { FieldState } from '../render/field.js';
import type { ArgumentCursor } from './argument-cursor.js';

export type SizeProblem = 'BADWIDTH' | 'BADPREC';

export interface ResolvedDirective {
  readonly field: FieldState;
  /** Problems with `*` sizes, in the order they occurred. */
  readonly sizeProblems: readonly SizeProblem[];
  /** `false` when an `[n]` index was malformed, out of range or misplaced. */
  readonly indexValid: boolean;
}

/**
 * Replays a directive's argument operations against the cursor and settles
 * the field's width, precision and alignment.
 *
 * A negative `*` width left-aligns the field and drops zero padding. A
 * negative `*` precision is treated as absent.
 *
 * @param directive - Scanned directive.
 * @param cursor - Cursor shared by every directive of the call.
 * @returns The resolved field, with the cursor left on the operand.
 */
export function resolveDirective(directive: Directive, cursor: ArgumentCursor): ResolvedDirective {
  let { minus, zero } = directive.flags;
  let width = directive.width;
  let precision = directive.precision;
  let indexValid = !directive.misplacedIndex;
  const sizeProblems: SizeProblem[] = [];

  for (const operation of directive.operations) {
    switch (operation.kind) {
      case 'index': {
        if (!cursor.seek(operation.position)) {
          indexValid = false;
        }
        break;
      }
      case 'width': {
        const size = cursor.takeSize();
        if (!size.ok) {
          width = undefined;
          sizeProblems.push('BADWIDTH');
        } else if (size.size < 0) {
          width = -size.size;
          minus = true;
          zero = false;
        } else {
          width = size.size;
        }
        break;
      }
      case 'precision': {
        const size = cursor.takeSize();
        if (size.ok && size.size >= 0) {
          precision = size.size;
        } else {
          precision = undefined;
          sizeProblems.push('BADPREC');
        }
        break;
      }
    }
  }

  return {
    field: {
      plus: directive.flags.plus,
      minus,
      space: directive.flags.space,
      sharp: directive.flags.sharp,
      zero,
      sharpV: false,
      width,
      precision,
    },
    sizeProblems,
    indexValid,
  };
}
