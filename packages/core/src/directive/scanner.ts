import type { ArgumentOperation, Directive, TemplateSegment } from './directive.js';

/** Literal widths, precisions and indexes may not grow past this. */
export const MAX_DIRECTIVE_NUMBER = 1_000_000;

interface ParsedNumber {
  readonly value: number;
  readonly found: boolean;
  readonly next: number;
}

const isDigit = (code: number): boolean => code >= 0x30 && code <= 0x39;

/**
 * Reads decimal digits in `[start, end)`. Another digit after the value has
 * passed {@link MAX_DIRECTIVE_NUMBER} fails the parse and consumes everything up to `end`.
 */
const parseNumber = (template: string, start: number, end: number): ParsedNumber => {
  if (start >= end) {
    return { value: 0, found: false, next: end };
  }
  let value = 0;
  let index = start;
  while (index < end && isDigit(template.charCodeAt(index))) {
    if (value > MAX_DIRECTIVE_NUMBER) {
      return { value: 0, found: false, next: end };
    }
    value = value * 10 + (template.charCodeAt(index) - 0x30);
    index++;
  }
  return { value, found: index > start, next: index };
};

interface ParsedIndex {
  readonly position: number | undefined;
  readonly wellFormed: boolean;
  readonly next: number;
}

/** Reads `[n]` starting at the `[`. Without a closing bracket only the `[` is consumed. */
const parseIndex = (template: string, start: number): ParsedIndex => {
  if (template.length - start < 3) {
    return { position: undefined, wellFormed: false, next: start + 1 };
  }
  const close = template.indexOf(']', start + 1);
  if (close === -1) {
    return { position: undefined, wellFormed: false, next: start + 1 };
  }
  const number = parseNumber(template, start + 1, close);
  if (!number.found || number.next !== close) {
    return { position: undefined, wellFormed: false, next: close + 1 };
  }
  return { position: number.value, wellFormed: true, next: close + 1 };
};

class DirectiveReader {
  private index: number;
  private plus = false;
  private minus = false;
  private space = false;
  private sharp = false;
  private zero = false;
  private width: number | undefined;
  private precision: number | undefined;
  private afterIndex = false;
  private misplacedIndex = false;
  private readonly operations: ArgumentOperation[] = [];

  constructor(
    private readonly template: string,
    private readonly offset: number,
  ) {
    this.index = offset + 1;
  }

  read(): { directive: Directive; next: number } {
    this.readFlagsAndIndexes();
    this.readWidth();
    this.readPrecision();
    if (!this.afterIndex) {
      this.readIndex();
    }
    const verb = this.readVerb();
    return {
      directive: {
        offset: this.offset,
        source: this.template.slice(this.offset, this.index),
        flags: {
          plus: this.plus,
          minus: this.minus,
          space: this.space,
          sharp: this.sharp,
          zero: this.zero,
        },
        width: this.width,
        precision: this.precision,
        operations: this.operations,
        misplacedIndex: this.misplacedIndex,
        verb,
      },
      next: this.index,
    };
  }

  private peek(): string | undefined {
    return this.template[this.index];
  }

  private readFlagsAndIndexes(): void {
    for (;;) {
      switch (this.peek()) {
        case '#': {
          this.sharp = true;
          break;
        }
        case '0': {
          this.zero = !this.minus;
          break;
        }
        case '+': {
          this.plus = true;
          break;
        }
        case '-': {
          this.minus = true;
          this.zero = false;
          break;
        }
        case ' ': {
          this.space = true;
          break;
        }
        case '[': {
          this.readIndex();
          continue;
        }
        default: {
          return;
        }
      }
      this.afterIndex = false;
      this.index++;
    }
  }

  private readIndex(): void {
    if (this.peek() !== '[') {
      return;
    }
    const parsed = parseIndex(this.template, this.index);
    this.operations.push({ kind: 'index', position: parsed.position });
    this.afterIndex = parsed.wellFormed;
    this.index = parsed.next;
  }

  private readWidth(): void {
    if (this.peek() === '*') {
      this.operations.push({ kind: 'width' });
      this.afterIndex = false;
      this.index++;
      return;
    }
    const parsed = parseNumber(this.template, this.index, this.template.length);
    if (parsed.found) {
      this.width = parsed.value;
      if (this.afterIndex) {
        this.misplacedIndex = true;
      }
    }
    this.index = parsed.next;
  }

  private readPrecision(): void {
    if (this.index + 1 >= this.template.length || this.peek() !== '.') {
      return;
    }
    this.index++;
    if (this.afterIndex) {
      this.misplacedIndex = true;
    }
    this.readIndex();
    if (this.peek() === '*') {
      this.operations.push({ kind: 'precision' });
      this.afterIndex = false;
      this.index++;
      return;
    }
    const parsed = parseNumber(this.template, this.index, this.template.length);
    this.precision = parsed.found ? parsed.value : 0;
    this.index = parsed.next;
  }

  private readVerb(): string | undefined {
    const codePoint = this.template.codePointAt(this.index);
    if (codePoint === undefined) {
      return undefined;
    }
    const verb = String.fromCodePoint(codePoint);
    this.index += verb.length;
    return verb;
  }
}

/**
 * Splits a template into literal runs and directives.
 *
 * A plain `%%` becomes the literal `%`. A directive without a verb ends the
 * scan, since it consumed the rest of the template.
 *
 * @param template - Template text.
 */
export function* scanTemplate(template: string): Generator<TemplateSegment, void, undefined> {
  let index = 0;
  while (index < template.length) {
    const percent = template.indexOf('%', index);
    const literalEnd = percent === -1 ? template.length : percent;
    if (literalEnd > index) {
      yield { kind: 'literal', text: template.slice(index, literalEnd) };
    }
    if (percent === -1) {
      return;
    }
    if (template[percent + 1] === '%') {
      yield { kind: 'literal', text: '%' };
      index = percent + 2;
      continue;
    }
    const { directive, next } = new DirectiveReader(template, percent).read();
    yield { kind: 'directive', directive };
    if (directive.verb === undefined) {
      return;
    }
    index = next;
  }
}
