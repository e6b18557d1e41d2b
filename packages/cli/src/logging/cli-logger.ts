import {
  createLevelFilter,
  JsonLineLogger,
  noopLogger,
  type StructuredLogEvent,
  type StructuredLogger,
} from '@widefmt/core';

import type { CliIo } from '../io/cli-io.js';
import type { CliLogFormat } from '../kernel/types.js';

const formatDataValue = (value: unknown): string => JSON.stringify(value) ?? String(value);

/**
 * Human-readable single-line logger: `level name event key=value ...`.
 */
export class PrettyLineLogger implements StructuredLogger {
  constructor(private readonly write: (line: string) => void) {}

  log(entry: StructuredLogEvent): void {
    const fields = Object.entries(entry.data ?? {}).map(
      ([key, value]) => `${key}=${formatDataValue(value)}`,
    );
    if (entry.elapsedMs !== undefined) {
      fields.push(`elapsedMs=${entry.elapsedMs}`);
    }
    const head = `${entry.level} ${entry.name} ${entry.event}`;
    this.write(fields.length === 0 ? `${head}\n` : `${head} ${fields.join(' ')}\n`);
  }
}

/**
 * Picks the logger for an invocation. JSON logs always go to stderr; pretty
 * logs only when stderr is a terminal, and only warnings and errors.
 */
export const createCliLogger = (io: CliIo, format: CliLogFormat): StructuredLogger => {
  const write = (line: string): void => io.writeErr(line);
  if (format === 'json') {
    return new JsonLineLogger({ write });
  }
  if (io.stderrIsTerminal) {
    return createLevelFilter(new PrettyLineLogger(write), 'warn');
  }
  return noopLogger;
};
