import type { FormatArgument } from '../values/format-value.js';

/** Largest magnitude accepted for a width or precision read from an argument. */
export const MAX_ARGUMENT_SIZE = 1_000_000;

export type TakeResult =
  | { readonly found: true; readonly argument: FormatArgument }
  | { readonly found: false };

export type SizeResult = { readonly ok: true; readonly size: number } | { readonly ok: false };

const sizeOf = (argument: FormatArgument): number | undefined => {
  if (typeof argument === 'number') {
    return Number.isSafeInteger(argument) ? argument : undefined;
  }
  if (typeof argument === 'bigint') {
    return argument >= -BigInt(MAX_ARGUMENT_SIZE) && argument <= BigInt(MAX_ARGUMENT_SIZE)
      ? Number(argument)
      : undefined;
  }
  if (argument !== null && typeof argument === 'object' && 'kind' in argument) {
    if (argument.kind === 'integer') {
      return sizeOf(argument.value);
    }
    if (argument.kind === 'number') {
      return sizeOf(argument.value);
    }
  }
  return undefined;
};

/**
 * Position in the argument list. Sequential consumption advances one
 * argument at a time; an explicit index moves the cursor and marks the
 * call as reordered, which turns off the unused-argument check.
 */
export class ArgumentCursor {
  private next = 0;
  private hasReordered = false;

  constructor(private readonly argumentList: readonly FormatArgument[]) {}

  get position(): number {
    return this.next;
  }

  get reordered(): boolean {
    return this.hasReordered;
  }

  /** Arguments from the cursor to the end. */
  remaining(): readonly FormatArgument[] {
    return this.argumentList.slice(this.next);
  }

  /**
   * Moves to a 1-based position.
   * @param position - Position from `[n]`; `undefined` for a malformed index.
   * @returns `false` when the position is malformed or out of range; the cursor stays put.
   */
  seek(position: number | undefined): boolean {
    this.hasReordered = true;
    if (position === undefined || position < 1 || position > this.argumentList.length) {
      return false;
    }
    this.next = position - 1;
    return true;
  }

  /** Consumes the argument under the cursor. */
  take(): TakeResult {
    if (this.next >= this.argumentList.length) {
      return { found: false };
    }
    const argument = this.argumentList[this.next];
    this.next++;
    return { found: true, argument };
  }

  /**
   * Consumes an argument as a `*` width or precision. The argument is
   * consumed whenever one is present, even when it is not a usable integer.
   */
  takeSize(): SizeResult {
    const taken = this.take();
    if (!taken.found) {
      return { ok: false };
    }
    const size = sizeOf(taken.argument);
    if (size === undefined || Math.abs(size) > MAX_ARGUMENT_SIZE) {
      return { ok: false };
    }
    return { ok: true, size };
  }
}
