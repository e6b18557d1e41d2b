import { toFormatValue, typeNameOf, type ListValue } from '../values/format-value.js';
import type { KindRenderer } from './kind-renderer.js';
import { diagnosticBody, textBody } from './rendered.js';

const isNilArgument = (argument: unknown): boolean =>
  argument === null ||
  argument === undefined ||
  (typeof argument === 'object' && 'kind' in argument && argument.kind === 'nil');

/**
 * Lists print as `[a b c]`, or as `type{a, b, c}` under `#v`. Nil elements
 * print without padding. A list that contains itself prints `%!v(CYCLE)`
 * where it recurs, and lists nested deeper than the configured limit print
 * `%!v(DEPTH)`.
 */
export const renderList: KindRenderer<ListValue> = (value, verb, field, renderer, depth) => {
  const entry = renderer.enterList(value, depth);
  if (entry !== 'entered') {
    const code = entry === 'cycle' ? 'CYCLE' : 'DEPTH';
    renderer.report(code, verb, entry === 'cycle' ? 'list contains itself' : 'lists nested too deeply');
    return diagnosticBody(code, `%!${verb}(${code})`);
  }
  try {
    const elements: string[] = [];
    for (const element of value.elements) {
      if (isNilArgument(element)) {
        elements.push(field.sharpV ? `${value.elementType}(nil)` : '<nil>');
        continue;
      }
      elements.push(renderer.render(toFormatValue(element), verb, field, depth + 1).text);
    }
    if (field.sharpV) {
      return textBody(`${typeNameOf(value)}{${elements.join(', ')}}`);
    }
    return textBody(`[${elements.join(' ')}]`);
  } finally {
    renderer.leaveList(value);
  }
};
