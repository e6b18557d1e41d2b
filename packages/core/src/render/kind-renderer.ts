import type { FormatValue } from '../values/format-value.js';
import type { FieldState } from './field.js';
import type { Rendered } from './rendered.js';
import type { ValueRenderer } from './value-renderer.js';

/** Renders one kind of value for any verb, falling back to a bad-verb body. */
export type KindRenderer<V extends FormatValue> = (
  value: V,
  verb: string,
  field: FieldState,
  renderer: ValueRenderer,
  depth: number,
) => Rendered;

export type VerbHandler<V extends FormatValue> = (
  value: V,
  field: FieldState,
  renderer: ValueRenderer,
  verb: string,
  depth: number,
) => Rendered;

/**
 * Builds a kind renderer from the verbs the kind supports.
 * @param verbs - Supported verbs and their handlers.
 */
export function fromVerbTable<V extends FormatValue>(
  verbs: ReadonlyMap<string, VerbHandler<V>>,
): KindRenderer<V> {
  return (value, verb, field, renderer, depth) => {
    const handler = verbs.get(verb);
    return handler === undefined
      ? renderer.badVerb(verb, value, field, depth)
      : handler(value, field, renderer, verb, depth);
  };
}
