import { ArgumentCursor } from '../arguments/argument-cursor.js';
import { resolveDirective } from '../arguments/resolve-directive.js';
import { describeSettingsIssues, formatterSettingsSchema, type FormatterSettings } from '../config/formatter-settings.js';
import type { Directive } from '../directive/directive.js';
import { scanTemplate } from '../directive/scanner.js';
import type { DiagnosticCode, DiagnosticsPort, FormatDiagnostic } from '../instrumentation/diagnostics.js';
import { noopLogger, type StructuredLogger } from '../logging/structured-logger.js';
import { fieldForVerbV, PLAIN_FIELD } from '../render/field.js';
import { ValueRenderer } from '../render/value-renderer.js';
import { toFormatValue, typeNameOf, type FormatArgument } from '../values/format-value.js';
import { createColumnMeasure } from '../width/columns.js';

export interface FormatterOptions {
  /** Columns for East Asian Ambiguous characters. */
  readonly ambiguousWidth?: 1 | 2;
  /** Deepest list nesting rendered before `%!v(DEPTH)`. */
  readonly maxDepth?: number;
  readonly logger?: StructuredLogger;
  readonly diagnostics?: DiagnosticsPort;
}

/** Formatter options that failed validation. */
export class FormatterOptionsError extends Error {
  constructor(readonly issues: readonly string[]) {
    super(`Invalid formatter options: ${issues.join('; ')}`);
    this.name = 'FormatterOptionsError';
  }
}

const DIAGNOSTIC_MESSAGES = {
  NOVERB: 'directive has no verb',
  BADWIDTH: 'width argument is not an integer in range',
  BADPREC: 'precision argument is not a non-negative integer in range',
  BADINDEX: 'argument index is malformed or out of range',
  MISSING: 'no argument left for directive',
} as const;

/**
 * Interprets printf templates. Padding is measured in display columns, so
 * wide characters line up in fixed-width output.
 */
export class Formatter {
  readonly settings: FormatterSettings;
  private readonly logger: StructuredLogger;
  private readonly diagnostics: DiagnosticsPort | undefined;
  private readonly measure: (text: string) => number;

  /**
   * @throws {FormatterOptionsError} When `ambiguousWidth` or `maxDepth` is invalid.
   */
  constructor(options: FormatterOptions = {}) {
    const parsed = formatterSettingsSchema.safeParse({
      ambiguousWidth: options.ambiguousWidth,
      maxDepth: options.maxDepth,
    });
    if (!parsed.success) {
      throw new FormatterOptionsError(describeSettingsIssues(parsed.error));
    }
    this.settings = parsed.data;
    this.logger = options.logger ?? noopLogger;
    this.diagnostics = options.diagnostics;
    this.measure = createColumnMeasure(this.settings.ambiguousWidth);
  }

  /**
   * Formats `args` according to `template`. Problems with the template or
   * the arguments are written into the output as `%!` tokens; this never throws.
   */
  format(template: string, args: readonly FormatArgument[] = []): string {
    const problems: FormatDiagnostic[] = [];
    let current: Directive | undefined;

    const record = (code: DiagnosticCode, message: string, verb?: string): void => {
      const offset = current?.offset ?? template.length;
      problems.push({
        code,
        message,
        offset,
        ...(current === undefined ? {} : { directive: current.source }),
        ...(verb === undefined ? {} : { verb }),
      });
    };

    const cursor = new ArgumentCursor(args);
    const renderer = new ValueRenderer({
      measure: this.measure,
      maxDepth: this.settings.maxDepth,
      report: (code, verb, message) => record(code, message, verb),
    });

    let output = '';
    for (const segment of scanTemplate(template)) {
      if (segment.kind === 'literal') {
        output += segment.text;
        continue;
      }
      current = segment.directive;
      output += this.renderDirective(segment.directive, cursor, renderer, record);
    }
    current = undefined;

    if (!cursor.reordered && cursor.remaining().length > 0) {
      output += this.renderExtra(cursor.remaining(), renderer);
      record('EXTRA', `${cursor.remaining().length} unused argument(s)`);
    }

    this.publish(template, problems);
    return output;
  }

  /** Variadic form of {@link Formatter.format}. */
  sprintf(template: string, ...args: FormatArgument[]): string {
    return this.format(template, args);
  }

  private renderDirective(
    directive: Directive,
    cursor: ArgumentCursor,
    renderer: ValueRenderer,
    record: (code: DiagnosticCode, message: string, verb?: string) => void,
  ): string {
    const { field, sizeProblems, indexValid } = resolveDirective(directive, cursor);
    let text = '';
    for (const problem of sizeProblems) {
      record(problem, DIAGNOSTIC_MESSAGES[problem]);
      text += `%!(${problem})`;
    }

    const verb = directive.verb;
    if (verb === undefined) {
      record('NOVERB', DIAGNOSTIC_MESSAGES.NOVERB);
      return `${text}%!(NOVERB)`;
    }
    if (verb === '%') {
      return `${text}%`;
    }
    if (!indexValid) {
      record('BADINDEX', DIAGNOSTIC_MESSAGES.BADINDEX, verb);
      return `${text}%!${verb}(BADINDEX)`;
    }
    const taken = cursor.take();
    if (!taken.found) {
      record('MISSING', DIAGNOSTIC_MESSAGES.MISSING, verb);
      return `${text}%!${verb}(MISSING)`;
    }
    const value = toFormatValue(taken.argument);
    const rendered = renderer.render(value, verb, verb === 'v' ? fieldForVerbV(field) : field);
    return text + rendered.text;
  }

  private renderExtra(unused: readonly FormatArgument[], renderer: ValueRenderer): string {
    const entries = unused.map((argument) => {
      const value = toFormatValue(argument);
      if (value.kind === 'nil') {
        return '<nil>';
      }
      return `${typeNameOf(value)}=${renderer.render(value, 'v', PLAIN_FIELD).text}`;
    });
    return `%!(EXTRA ${entries.join(', ')})`;
  }

  private publish(template: string, problems: readonly FormatDiagnostic[]): void {
    if (problems.length === 0) {
      return;
    }
    if (this.diagnostics !== undefined) {
      for (const problem of problems) {
        this.diagnostics.emit(problem);
      }
    }
    this.logger.log({
      level: 'warn',
      name: 'widefmt',
      event: 'format.diagnostics',
      data: { template, codes: problems.map((problem) => problem.code) },
    });
  }
}

/**
 * Creates a formatter with its own settings, logger and diagnostics port.
 * @throws {FormatterOptionsError} When the options fail validation.
 */
export function createFormatter(options: FormatterOptions = {}): Formatter {
  return new Formatter(options);
}

let defaultFormatter: Formatter | undefined;

const getDefaultFormatter = (): Formatter => {
  defaultFormatter ??= new Formatter();
  return defaultFormatter;
};

/** Formats with default settings. */
export function format(template: string, args: readonly FormatArgument[] = []): string {
  return getDefaultFormatter().format(template, args);
}

export function sprintf(template: string, ...args: FormatArgument[]): string {
  return getDefaultFormatter().format(template, args);
}
