import type { DiagnosticCode } from '../instrumentation/diagnostics.js';
import { padField, type MeasureColumns, type ZeroFill } from '../padding/pad-field.js';
import {
  classifyNumber,
  typeNameOf,
  type FormatArgument,
  type FormatValue,
  type FormatValueKind,
  type ListValue,
  type NumberValue,
} from '../values/format-value.js';
import type { FieldState } from './field.js';
import { renderComplex, renderFloat } from './float.js';
import { renderInteger } from './integer.js';
import type { KindRenderer } from './kind-renderer.js';
import { renderList } from './list.js';
import { renderPointer } from './pointer.js';
import { diagnosticBody, textBody, type Rendered } from './rendered.js';
import { renderBoolean, renderBytes, renderNil, renderString, renderType } from './text.js';

type ValueOfKind<K extends FormatValueKind> = Extract<FormatValue, { kind: K }>;

export type RendererTable = { readonly [K in FormatValueKind]: KindRenderer<ValueOfKind<K>> };

const renderNumber: KindRenderer<NumberValue> = (value, verb, field, renderer, depth) =>
  renderer.render(classifyNumber(value, verb), verb, field, depth);

/** Kind-to-renderer dispatch table. Every kind has an entry. */
export const KIND_RENDERERS: RendererTable = {
  integer: renderInteger,
  number: renderNumber,
  float: renderFloat,
  complex: renderComplex,
  boolean: renderBoolean,
  string: renderString,
  bytes: renderBytes,
  pointer: renderPointer,
  type: renderType,
  nil: renderNil,
  list: renderList,
};

const dispatch = <K extends FormatValueKind>(
  kind: K,
  value: ValueOfKind<K>,
  verb: string,
  field: FieldState,
  renderer: ValueRenderer,
  depth: number,
): Rendered => {
  const render: KindRenderer<ValueOfKind<K>> = KIND_RENDERERS[kind];
  return render(value, verb, field, renderer, depth);
};

export interface ValueRendererOptions {
  readonly measure: MeasureColumns;
  /** Deepest list nesting rendered before `%!v(DEPTH)`. */
  readonly maxDepth: number;
  readonly report: (code: DiagnosticCode, verb: string, message: string) => void;
}

export type ListEntry = 'entered' | 'cycle' | 'depth';

/**
 * Renders tagged values by verb. One instance serves one formatting call,
 * tracking the lists currently open so that cycles terminate.
 */
export class ValueRenderer {
  private readonly openLists = new Set<readonly FormatArgument[]>();

  constructor(private readonly options: ValueRendererOptions) {}

  get measure(): MeasureColumns {
    return this.options.measure;
  }

  pad(body: string, field: FieldState, fill: ZeroFill): string {
    return padField(body, field, fill, this.options.measure);
  }

  report(code: DiagnosticCode, verb: string, message: string): void {
    this.options.report(code, verb, message);
  }

  /**
   * Renders a value. `T` and `p` are handled for every kind; other verbs go
   * through the kind's renderer.
   * @param value - Tagged value.
   * @param verb - Verb code point.
   * @param field - Flags and sizes.
   * @param depth - List nesting of the value; 0 for operands.
   */
  render(value: FormatValue, verb: string, field: FieldState, depth = 0): Rendered {
    if (verb === 'T') {
      const name = typeNameOf(value);
      return textBody(
        value.kind === 'nil'
          ? this.pad(name, field, 'leading')
          : this.pad(truncateCodePoints(name, field.precision), field, 'leading'),
      );
    }
    if (verb === 'p' && value.kind !== 'pointer') {
      return this.badVerb(verb, value, field, depth);
    }
    return dispatch(value.kind, value, verb, field, this, depth);
  }

  /**
   * Diagnostic body for a verb the value's kind does not support:
   * `%!verb(type=value)`, or `%!verb(<nil>)` for nil.
   */
  badVerb(verb: string, value: FormatValue, field: FieldState, depth: number): Rendered {
    const typeName = typeNameOf(value);
    this.report('BADVERB', verb, `verb %${verb} is not defined for ${typeName}`);
    if (value.kind === 'nil') {
      return diagnosticBody('BADVERB', `%!${verb}(<nil>)`);
    }
    const shown = this.render(value, 'v', field, depth).text;
    return diagnosticBody('BADVERB', `%!${verb}(${typeName}=${shown})`);
  }

  enterList(list: ListValue, depth: number): ListEntry {
    if (this.openLists.has(list.elements)) {
      return 'cycle';
    }
    if (depth >= this.options.maxDepth) {
      return 'depth';
    }
    this.openLists.add(list.elements);
    return 'entered';
  }

  leaveList(list: ListValue): void {
    this.openLists.delete(list.elements);
  }
}

const truncateCodePoints = (text: string, precision: number | undefined): string => {
  if (precision === undefined) {
    return text;
  }
  const codePoints = [...text];
  return codePoints.length > precision ? codePoints.slice(0, precision).join('') : text;
};
