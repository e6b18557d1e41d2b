import { z } from 'zod';

export const formatterSettingsSchema = z
  .object({
    ambiguousWidth: z.union([z.literal(1), z.literal(2)]).default(1),
    maxDepth: z.number().int().min(1).max(1024).default(32),
  })
  .strict();

/** Validated formatter settings with defaults applied. */
export type FormatterSettings = z.output<typeof formatterSettingsSchema>;

/** Settings as written by callers and configuration files; every field is optional. */
export type FormatterSettingsInput = z.input<typeof formatterSettingsSchema>;

export const DEFAULT_FORMATTER_SETTINGS: FormatterSettings = Object.freeze(
  formatterSettingsSchema.parse({}),
);

/**
 * Renders zod issues as `path: message` lines.
 * @param error - Validation failure.
 */
export function describeSettingsIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const location = issue.path.length === 0 ? '(root)' : issue.path.join('.');
    return `${location}: ${issue.message}`;
  });
}
