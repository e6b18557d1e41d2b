import { inspect } from 'node:util';

export interface FormatCliErrorOptions {
  /** Prefix for the first line, normally the program name. */
  readonly programName: string;
  /** Print the stack of `Error` values instead of their message. */
  readonly stackTraces?: boolean;
}

const MAX_CAUSES = 5;

const describeThrown = (value: unknown): string => {
  if (value instanceof Error) {
    return value.message;
  }
  if (typeof value === 'string') {
    return value;
  }
  return inspect(value, { depth: 4, maxArrayLength: 10 });
};

/**
 * Renders an unexpected failure for stderr as `program: message`, followed
 * by one `caused by:` line per error in the `cause` chain.
 */
export const formatCliError = (error: unknown, options: FormatCliErrorOptions): string => {
  if (options.stackTraces === true && error instanceof Error && error.stack !== undefined) {
    return error.stack;
  }

  const lines = [`${options.programName}: ${describeThrown(error)}`];
  let cause = error instanceof Error ? error.cause : undefined;
  while (cause !== undefined && lines.length <= MAX_CAUSES) {
    lines.push(`  caused by: ${describeThrown(cause)}`);
    cause = cause instanceof Error ? cause.cause : undefined;
  }
  return lines.join('\n');
};
