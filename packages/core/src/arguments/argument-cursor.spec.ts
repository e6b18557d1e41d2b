import { describe, expect, it } from 'vitest';

import { scanTemplate } from '../directive/scanner.js';
import { int, int64, str, uint64 } from '../values/constructors.js';
import { ArgumentCursor } from './argument-cursor.js';
import { resolveDirective } from './resolve-directive.js';

const directiveOf = (template: string) => {
  for (const segment of scanTemplate(template)) {
    if (segment.kind === 'directive') {
      return segment.directive;
    }
  }
  throw new Error(`no directive in ${template}`);
};

describe('ArgumentCursor', () => {
  it('consumes arguments in order', () => {
    const cursor = new ArgumentCursor(['a', 'b']);

    expect(cursor.take()).toEqual({ found: true, argument: 'a' });
    expect(cursor.take()).toEqual({ found: true, argument: 'b' });
    expect(cursor.take()).toEqual({ found: false });
    expect(cursor.position).toBe(2);
    expect(cursor.reordered).toBe(false);
  });

  it('seeks to 1-based positions and remembers reordering', () => {
    const cursor = new ArgumentCursor(['a', 'b', 'c']);

    expect(cursor.seek(3)).toBe(true);
    expect(cursor.take()).toEqual({ found: true, argument: 'c' });
    expect(cursor.seek(1)).toBe(true);
    expect(cursor.remaining()).toEqual(['a', 'b', 'c']);
    expect(cursor.reordered).toBe(true);
  });

  it('rejects out-of-range and malformed positions without moving', () => {
    const cursor = new ArgumentCursor(['a']);

    expect(cursor.seek(0)).toBe(false);
    expect(cursor.seek(2)).toBe(false);
    expect(cursor.seek(undefined)).toBe(false);
    expect(cursor.position).toBe(0);
    expect(cursor.reordered).toBe(true);
  });

  it('reads sizes from integer arguments only', () => {
    const cursor = new ArgumentCursor([4, int64(-3), uint64(7), 2.5, 'x', int(2_000_000), 1e6]);

    expect(cursor.takeSize()).toEqual({ ok: true, size: 4 });
    expect(cursor.takeSize()).toEqual({ ok: true, size: -3 });
    expect(cursor.takeSize()).toEqual({ ok: true, size: 7 });
    expect(cursor.takeSize()).toEqual({ ok: false });
    expect(cursor.takeSize()).toEqual({ ok: false });
    expect(cursor.takeSize()).toEqual({ ok: false });
    expect(cursor.takeSize()).toEqual({ ok: true, size: 1_000_000 });
    expect(cursor.takeSize()).toEqual({ ok: false });
    expect(cursor.position).toBe(7);
  });
});

describe('resolveDirective', () => {
  it('keeps literal sizes and flags', () => {
    const resolved = resolveDirective(directiveOf('%-8.3s'), new ArgumentCursor([]));

    expect(resolved.field).toEqual({
      plus: false,
      minus: true,
      space: false,
      sharp: false,
      zero: false,
      sharpV: false,
      width: 8,
      precision: 3,
    });
    expect(resolved.sizeProblems).toEqual([]);
    expect(resolved.indexValid).toBe(true);
  });

  it('left-aligns on a negative star width and clears zero padding', () => {
    const cursor = new ArgumentCursor([-6, 'x']);
    const resolved = resolveDirective(directiveOf('%0*s'), cursor);

    expect(resolved.field.width).toBe(6);
    expect(resolved.field.minus).toBe(true);
    expect(resolved.field.zero).toBe(false);
    expect(cursor.position).toBe(1);
  });

  it('reports unusable star sizes in order', () => {
    const cursor = new ArgumentCursor([str('w'), -1, 'x']);
    const resolved = resolveDirective(directiveOf('%*.*d'), cursor);

    expect(resolved.sizeProblems).toEqual(['BADWIDTH', 'BADPREC']);
    expect(resolved.field.width).toBeUndefined();
    expect(resolved.field.precision).toBeUndefined();
  });

  it('reports a missing star argument as a bad width', () => {
    expect(resolveDirective(directiveOf('%*d'), new ArgumentCursor([])).sizeProblems).toEqual([
      'BADWIDTH',
    ]);
  });

  it('replays index operations before reading sizes', () => {
    const cursor = new ArgumentCursor([2, 5]);
    const resolved = resolveDirective(directiveOf('%[2]*[1]d'), cursor);

    expect(resolved.field.width).toBe(5);
    expect(resolved.indexValid).toBe(true);
    expect(cursor.take()).toEqual({ found: true, argument: 2 });
  });

  it('invalidates the index when it is out of range or misplaced', () => {
    expect(resolveDirective(directiveOf('%[3]d'), new ArgumentCursor([1])).indexValid).toBe(false);
    expect(resolveDirective(directiveOf('%[1]2d'), new ArgumentCursor([1])).indexValid).toBe(false);
  });
});
