import type { IntegerValue, PointerValue } from '../values/format-value.js';
import { formatHex0x, renderInteger } from './integer.js';
import type { KindRenderer } from './kind-renderer.js';
import { textBody } from './rendered.js';

const INTEGER_VERBS: ReadonlySet<string> = new Set(['b', 'o', 'd', 'x', 'X']);

/**
 * Pointers print as `0x`-prefixed hex (`<nil>` for address 0), as
 * `(type)(address)` under `#v`, and as plain integers under `b o d x X`.
 */
export const renderPointer: KindRenderer<PointerValue> = (value, verb, field, renderer, depth) => {
  const { measure } = renderer;
  switch (verb) {
    case 'v': {
      if (field.sharpV) {
        const address =
          value.address === 0n ? 'nil' : formatHex0x(value.address, true, field, measure);
        return textBody(`(${value.type})(${address})`);
      }
      if (value.address === 0n) {
        return textBody(renderer.pad('<nil>', field, 'leading'));
      }
      return textBody(formatHex0x(value.address, !field.sharp, field, measure));
    }
    case 'p': {
      return textBody(formatHex0x(value.address, !field.sharp, field, measure));
    }
    default: {
      if (INTEGER_VERBS.has(verb)) {
        const address: IntegerValue = { kind: 'integer', type: 'uintptr', value: value.address };
        return renderInteger(address, verb, field, renderer, depth);
      }
      return renderer.badVerb(verb, value, field, depth);
    }
  }
};
