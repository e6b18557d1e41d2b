/**
 * Problem codes written inline into formatted output. Each one appears in
 * the output as a `%!` token, and is also emitted through a
 * {@link DiagnosticsPort} when one is configured.
 */
export const DiagnosticCodes = {
  noVerb: 'NOVERB',
  badVerb: 'BADVERB',
  badWidth: 'BADWIDTH',
  badPrecision: 'BADPREC',
  badIndex: 'BADINDEX',
  missing: 'MISSING',
  extra: 'EXTRA',
  cycle: 'CYCLE',
  depth: 'DEPTH',
} as const;

export type DiagnosticCode = (typeof DiagnosticCodes)[keyof typeof DiagnosticCodes];

export interface FormatDiagnostic {
  readonly code: DiagnosticCode;
  readonly message: string;
  /** Offset of the directive's `%` in the template, or the template length for unused arguments. */
  readonly offset: number;
  /** Directive text as written. */
  readonly directive?: string;
  readonly verb?: string;
}

export interface DiagnosticsPort<Event = FormatDiagnostic> {
  emit(event: Event): void;
}

/**
 * Creates a diagnostics port that ignores all emitted events.
 *
 * @returns A diagnostics port implementation that performs no I/O.
 */
export function createNullDiagnosticsPort<Event = FormatDiagnostic>(): DiagnosticsPort<Event> {
  return {
    emit() {
      // noop
    },
  };
}

export interface CollectingDiagnosticsPort<Event = FormatDiagnostic> extends DiagnosticsPort<Event> {
  readonly events: readonly Event[];
  clear(): void;
}

/**
 * Creates a diagnostics port that keeps every event in memory.
 *
 * @returns A port whose `events` lists emitted events in order.
 */
export function createCollectingDiagnosticsPort<
  Event = FormatDiagnostic,
>(): CollectingDiagnosticsPort<Event> {
  const events: Event[] = [];
  return {
    events,
    emit(event) {
      events.push(event);
    },
    clear() {
      events.length = 0;
    },
  };
}
