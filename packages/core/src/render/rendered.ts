import type { DiagnosticCode } from '../instrumentation/diagnostics.js';

/**
 * Result of rendering one operand. Diagnostic bodies are ordinary text in
 * the output but stay distinguishable until they are concatenated.
 */
export type Rendered =
  | { readonly kind: 'text'; readonly text: string }
  | { readonly kind: 'diagnostic'; readonly code: DiagnosticCode; readonly text: string };

export const textBody = (text: string): Rendered => ({ kind: 'text', text });

export const diagnosticBody = (code: DiagnosticCode, text: string): Rendered => ({
  kind: 'diagnostic',
  code,
  text,
});
