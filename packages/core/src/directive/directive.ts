export interface DirectiveFlags {
  readonly plus: boolean;
  readonly minus: boolean;
  readonly space: boolean;
  readonly sharp: boolean;
  readonly zero: boolean;
}

/**
 * A step the argument cursor replays, in template order: an explicit
 * `[n]` index (1-based; `undefined` when malformed) or a `*` that reads
 * the width or precision from the next argument.
 */
export type ArgumentOperation =
  | { readonly kind: 'index'; readonly position: number | undefined }
  | { readonly kind: 'width' }
  | { readonly kind: 'precision' };

export interface Directive {
  /** Offset of the introducing `%` in the template. */
  readonly offset: number;
  /** Directive text as written, from `%` through the verb. */
  readonly source: string;
  readonly flags: DirectiveFlags;
  /** Literal width; `undefined` when absent or given by `*`. */
  readonly width: number | undefined;
  /** Literal precision; a bare `.` reads as 0. */
  readonly precision: number | undefined;
  readonly operations: readonly ArgumentOperation[];
  /** An `[n]` index was followed by literal digits, which makes the index unusable. */
  readonly misplacedIndex: boolean;
  /** The verb code point; `undefined` when the template ends first. */
  readonly verb: string | undefined;
}

export type TemplateSegment =
  | { readonly kind: 'literal'; readonly text: string }
  | { readonly kind: 'directive'; readonly directive: Directive };
