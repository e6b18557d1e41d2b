export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface StructuredLogEvent {
  readonly level: LogLevel;
  readonly name: string;
  readonly event: string;
  readonly elapsedMs?: number;
  readonly data?: Readonly<Record<string, unknown>>;
}

export interface StructuredLogger {
  log(entry: StructuredLogEvent): void;
}

export interface LineOutput {
  write(line: string): void;
}

/** Writes one JSON object per line, stamped with an ISO timestamp. */
export class JsonLineLogger implements StructuredLogger {
  constructor(private readonly output: LineOutput) {}

  log(entry: StructuredLogEvent): void {
    const payload = JSON.stringify({
      ...entry,
      timestamp: new Date().toISOString(),
    });
    this.output.write(`${payload}\n`);
  }
}

export const noopLogger: StructuredLogger = {
  log() {
    // noop
  },
};

/**
 * Drops entries below a minimum level before they reach `logger`.
 * @param logger - Destination logger.
 * @param minimum - Lowest level passed through.
 */
export function createLevelFilter(logger: StructuredLogger, minimum: LogLevel): StructuredLogger {
  const threshold = LOG_LEVELS.indexOf(minimum);
  return {
    log(entry) {
      if (LOG_LEVELS.indexOf(entry.level) >= threshold) {
        logger.log(entry);
      }
    },
  };
}
